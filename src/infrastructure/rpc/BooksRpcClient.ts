// Promise-based client for books.BooksService

import { Client, credentials } from '@grpc/grpc-js';
import type { ServiceDefinition } from '@grpc/proto-loader';
import { z } from 'zod';
import { Book, BookPatch, CreateBookInput } from '../../domain/models/Book';
import { ValidationError } from '../../domain/models/Errors';
import { ListBooksQuery, MutationResult, GetBookResult, DeleteBookResult, ListBooksResult } from '../../application/services/BookCatalogService';
import {
  BookMessage,
  CreateBookResponseSchema,
  DeleteBookResponseSchema,
  GetBookResponseSchema,
  ListBooksResponse,
  ListBooksResponseSchema,
  UpdateBookResponseSchema,
  fromBookMessage
} from './messages';
import { BooksMethod, loadBooksService } from './protoLoader';

export class BooksRpcClient {
  private readonly client: Client;
  private readonly service: ServiceDefinition;

  constructor(address: string, service: ServiceDefinition = loadBooksService()) {
    this.client = new Client(address, credentials.createInsecure());
    this.service = service;
  }

  async createBook(input: CreateBookInput): Promise<MutationResult> {
    const response = await this.call('CreateBook', {
      title: input.title,
      author: input.author,
      isbn: input.isbn ?? '',
      published_year: input.publishedYear ?? 0,
      genre: input.genre ?? '',
      description: input.description ?? ''
    }, CreateBookResponseSchema);
    return toMutationResult(response);
  }

  async getBook(id: number): Promise<GetBookResult> {
    const response = await this.call('GetBook', { id }, GetBookResponseSchema);
    return response.found && response.book
      ? { found: true, book: fromBookMessage(response.book) }
      : { found: false };
  }

  /**
   * Omitted patch fields go out as proto3 defaults; with a mask they clear
   */
  async updateBook(id: number, patch: BookPatch, paths: readonly string[] = []): Promise<MutationResult> {
    const response = await this.call('UpdateBook', {
      id,
      book: {
        title: patch.title ?? '',
        author: patch.author ?? '',
        isbn: patch.isbn ?? '',
        published_year: patch.publishedYear ?? 0,
        genre: patch.genre ?? '',
        description: patch.description ?? ''
      },
      update_mask: { paths: [...paths] }
    }, UpdateBookResponseSchema);
    return toMutationResult(response);
  }

  async deleteBook(id: number): Promise<DeleteBookResult> {
    return this.call('DeleteBook', { id }, DeleteBookResponseSchema);
  }

  async listBooks(query: ListBooksQuery = {}): Promise<ListBooksResult> {
    const response = await this.call('ListBooks', {
      genre_filter: query.genreFilter ?? '',
      author_filter: query.authorFilter ?? '',
      limit: query.limit ?? 0,
      offset: query.offset ?? 0
    }, ListBooksResponseSchema);
    return toListResult(response);
  }

  async getAllBooks(): Promise<ListBooksResult> {
    const response = await this.call('GetAllBooks', {}, ListBooksResponseSchema);
    return toListResult(response);
  }

  close(): void {
    this.client.close();
  }

  // === Private Methods ===

  private call<Res>(
    method: BooksMethod,
    request: object,
    schema: z.ZodType<Res, z.ZodTypeDef, unknown>
  ): Promise<Res> {
    const definition = this.service[method];

    return new Promise((resolve, reject) => {
      this.client.makeUnaryRequest(
        definition.path,
        definition.requestSerialize,
        definition.responseDeserialize,
        request,
        (error, value) => {
          if (error) {
            reject(error);
            return;
          }
          const parsed = schema.safeParse(value);
          if (!parsed.success) {
            reject(new ValidationError(`Malformed ${method} response`, method, { issues: parsed.error.issues }));
            return;
          }
          resolve(parsed.data);
        }
      );
    });
  }
}

function toMutationResult(response: { book?: BookMessage | null; success: boolean; message: string }): MutationResult {
  const book: Book | undefined = response.book ? fromBookMessage(response.book) : undefined;
  return {
    success: response.success,
    message: response.message,
    book
  };
}

function toListResult(response: ListBooksResponse): ListBooksResult {
  return {
    books: response.books.map(fromBookMessage),
    totalCount: response.total_count
  };
}
