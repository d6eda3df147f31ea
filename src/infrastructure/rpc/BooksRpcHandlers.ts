// gRPC adapter for BookCatalogService

import { status } from '@grpc/grpc-js';
import type { sendUnaryData } from '@grpc/grpc-js';
import { z } from 'zod';
import { BookCatalogService, ListBooksResult, MutationResult } from '../../application/services/BookCatalogService';
import { CatalogError, CatalogErrorCode, ErrorFactory } from '../../domain/models/Errors';
import { Logger } from '../../shared/utils/Logger';
import {
  BookIdSchema,
  CreateBookRequestSchema,
  CreateBookResponse,
  DeleteBookResponse,
  EmptySchema,
  GetBookResponse,
  ListBooksRequestSchema,
  ListBooksResponse,
  UpdateBookRequestSchema,
  UpdateBookResponse,
  toBookMessage,
  toBookPatch,
  toCreateBookInput
} from './messages';

const COMPONENT = 'BooksRpcHandlers';

/**
 * Unary handler shape; ServerUnaryCall satisfies the call parameter
 */
export type UnaryHandler<Res> = (
  call: { request: unknown },
  callback: sendUnaryData<Res>
) => void;

export type BooksRpcHandlers = {
  CreateBook: UnaryHandler<CreateBookResponse>;
  GetBook: UnaryHandler<GetBookResponse>;
  UpdateBook: UnaryHandler<UpdateBookResponse>;
  DeleteBook: UnaryHandler<DeleteBookResponse>;
  ListBooks: UnaryHandler<ListBooksResponse>;
  GetAllBooks: UnaryHandler<ListBooksResponse>;
};

const STATUS_BY_CODE: Readonly<Record<CatalogErrorCode, status>> = {
  INVALID_ARGUMENT: status.INVALID_ARGUMENT,
  ALREADY_EXISTS: status.ALREADY_EXISTS,
  NOT_FOUND: status.NOT_FOUND,
  INTERNAL: status.INTERNAL,
  CONFIGURATION: status.FAILED_PRECONDITION
};

export function toStatus(code: CatalogErrorCode): status {
  return STATUS_BY_CODE[code];
}

/**
 * Handlers for books.BooksService.
 *
 * Requests are validated against the wire schema first; a request that does
 * not decode is rejected with INVALID_ARGUMENT. Business failures travel in
 * the response payload; errors thrown by the service abort the call with
 * the status matching their code.
 */
export function createBooksRpcHandlers(service: BookCatalogService, logger: Logger): BooksRpcHandlers {
  function unary<Req, Res>(
    method: string,
    schema: z.ZodType<Req, z.ZodTypeDef, unknown>,
    handle: (request: Req) => Res
  ): UnaryHandler<Res> {
    return (call, callback) => {
      const parsed = schema.safeParse(call.request);
      if (!parsed.success) {
        const details = `Invalid ${method} request: ${parsed.error.issues.map(issue => issue.message).join('; ')}`;
        logger.warn(COMPONENT, details);
        callback({ code: status.INVALID_ARGUMENT, details });
        return;
      }

      let response: Res;
      try {
        response = handle(parsed.data);
      } catch (error) {
        const catalogError = error instanceof CatalogError
          ? error
          : ErrorFactory.internal(method, error);
        logger.error(COMPONENT, `${method} aborted`, catalogError.context, catalogError);
        callback({ code: toStatus(catalogError.code), details: catalogError.message });
        return;
      }
      callback(null, response);
    };
  }

  return {
    CreateBook: unary('CreateBook', CreateBookRequestSchema, request =>
      toMutationResponse(service.createBook(toCreateBookInput(request)))
    ),

    GetBook: unary('GetBook', BookIdSchema, request => {
      const result = service.getBook(request.id);
      return result.book
        ? { book: toBookMessage(result.book), found: true }
        : { book: null, found: false };
    }),

    UpdateBook: unary('UpdateBook', UpdateBookRequestSchema, request =>
      toMutationResponse(service.updateBook({
        id: request.id,
        patch: toBookPatch(request.book),
        paths: request.update_mask?.paths ?? []
      }))
    ),

    DeleteBook: unary('DeleteBook', BookIdSchema, request =>
      service.deleteBook(request.id)
    ),

    ListBooks: unary('ListBooks', ListBooksRequestSchema, request =>
      toListResponse(service.listBooks({
        genreFilter: request.genre_filter,
        authorFilter: request.author_filter,
        limit: request.limit,
        offset: request.offset
      }))
    ),

    GetAllBooks: unary('GetAllBooks', EmptySchema, () =>
      toListResponse(service.getAllBooks())
    )
  };
}

function toMutationResponse(result: MutationResult): CreateBookResponse {
  return {
    book: result.book ? toBookMessage(result.book) : null,
    success: result.success,
    message: result.message
  };
}

function toListResponse(result: ListBooksResult): ListBooksResponse {
  return {
    books: result.books.map(toBookMessage),
    total_count: result.totalCount
  };
}
