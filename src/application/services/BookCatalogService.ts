// Book catalog service

import {
  Book,
  BookFactory,
  BookFields,
  BookPatch,
  Clock,
  CreateBookInput,
  systemClock
} from '../../domain/models/Book';
import {
  CatalogError,
  ErrorFactory,
  ErrorSeverity,
  ValidationError
} from '../../domain/models/Errors';
import { Logger } from '../../shared/utils/Logger';
import { TextUtils } from '../../shared/utils/TextUtils';

const COMPONENT = 'BookCatalogService';

/**
 * Record store (injected)
 */
export interface BookStore {
  insert(fields: BookFields): Book;
  get(id: number): Book | undefined;
  replace(book: Book): void;
  remove(id: number): boolean;
  all(): Book[];
  isbnConflict(isbn: string | undefined, excludeId?: number): boolean;
  size(): number;
}

export interface MutationResult {
  success: boolean;
  message: string;
  book?: Book;
}

export interface GetBookResult {
  found: boolean;
  book?: Book;
}

export interface DeleteBookResult {
  success: boolean;
  message: string;
}

export interface UpdateBookRequest {
  id: number;
  patch: BookPatch;
  // Field mask; empty or absent selects the legacy non-empty-only mode
  paths?: readonly string[];
}

export interface ListBooksQuery {
  genreFilter?: string;
  authorFilter?: string;
  limit?: number;
  offset?: number;
}

export interface ListBooksResult {
  books: Book[];
  totalCount: number;
}

/**
 * Catalog operations over a single record store.
 *
 * Expected business failures (missing fields, duplicate isbn, unknown id)
 * come back as failure results. Unexpected faults during reads are thrown
 * as InternalError; during mutations they become failure results.
 *
 * Every store call is synchronous, so a request never observes another
 * request's half-applied change.
 */
export class BookCatalogService {
  private readonly store: BookStore;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    store: BookStore,
    logger: Logger,
    clock: Clock = systemClock
  ) {
    this.store = store;
    this.logger = logger;
    this.clock = clock;
  }

  /**
   * Insert startup records without validation
   */
  seed(samples: readonly CreateBookInput[]): Book[] {
    const books = samples.map(sample => this.store.insert(BookFactory.fields(sample)));
    this.logger.info(COMPONENT, `Seeded ${books.length} sample books`);
    return books;
  }

  /**
   * Validate, check the isbn and insert a new book
   */
  createBook(input: CreateBookInput): MutationResult {
    this.logger.info(COMPONENT, `Creating book: ${input.title} by ${input.author}`);

    try {
      const validation = BookFactory.validate(input);
      if (!validation.isValid) {
        throw new ValidationError(
          'Title and author are required',
          undefined,
          { errors: validation.errors }
        );
      }

      const fields = BookFactory.fields(input);
      this.assertIsbnAvailable(fields.isbn);

      const book = this.store.insert(fields);
      this.logger.info(COMPONENT, `Book created with ID: ${book.id}`);

      return {
        book,
        success: true,
        message: 'Book created successfully'
      };

    } catch (error) {
      return this.failure('createBook', error);
    }
  }

  /**
   * Look up one book; a miss is found: false, not an error
   */
  getBook(id: number): GetBookResult {
    this.logger.info(COMPONENT, `Getting book with ID: ${id}`);

    try {
      const book = this.store.get(id);
      return book ? { book, found: true } : { found: false };
    } catch (error) {
      throw this.internal('getBook', error);
    }
  }

  /**
   * Update a book.
   *
   * With paths, each named field is copied from the patch as-is (empty
   * values clear). Without paths, only non-empty patch values overwrite.
   * The new value is checked in full before it replaces the stored one.
   */
  updateBook(request: UpdateBookRequest): MutationResult {
    const { id, patch } = request;
    const paths = request.paths ?? [];
    this.logger.info(COMPONENT, `Updating book with ID: ${id}`);

    try {
      const existing = this.store.get(id);
      if (!existing) {
        throw ErrorFactory.bookNotFound(id);
      }

      let fields: BookFields;
      if (paths.length === 0) {
        this.logger.warn(COMPONENT, 'No field mask provided, falling back to non-empty field updates');
        fields = BookFactory.applyNonEmpty(existing, patch);
      } else {
        const applied = BookFactory.applyMask(existing, patch, paths);
        applied.ignoredPaths.forEach(path => {
          this.logger.warn(COMPONENT, `Ignoring unknown field path: ${path}`);
        });
        fields = applied.fields;
      }

      this.assertIsbnAvailable(fields.isbn, id);

      const book = BookFactory.revise(existing, fields, this.clock());
      this.store.replace(book);
      this.logger.info(COMPONENT, `Book ${id} updated successfully`);

      return {
        book,
        success: true,
        message: 'Book updated successfully'
      };

    } catch (error) {
      return this.failure('updateBook', error);
    }
  }

  /**
   * Remove a book; its id is never handed out again
   */
  deleteBook(id: number): DeleteBookResult {
    this.logger.info(COMPONENT, `Deleting book with ID: ${id}`);

    try {
      if (!this.store.remove(id)) {
        throw ErrorFactory.bookNotFound(id);
      }
      return {
        success: true,
        message: 'Book deleted successfully'
      };
    } catch (error) {
      const { success, message } = this.failure('deleteBook', error);
      return { success, message };
    }
  }

  /**
   * Filter by genre and author (case-insensitive substring), then page.
   * totalCount is the size of the filtered view.
   */
  listBooks(query: ListBooksQuery = {}): ListBooksResult {
    const limit = query.limit ?? 0;
    const offset = query.offset ?? 0;
    this.logger.info(COMPONENT, `Listing books - limit: ${limit}, offset: ${offset}`);
    const done = this.logger.startTimer(COMPONENT, 'listBooks');

    try {
      let books = this.store.all();

      const { genreFilter, authorFilter } = query;
      if (genreFilter) {
        books = books.filter(book => TextUtils.containsIgnoreCase(book.genre, genreFilter));
      }
      if (authorFilter) {
        books = books.filter(book => TextUtils.containsIgnoreCase(book.author, authorFilter));
      }

      const totalCount = books.length;
      const start = offset > 0 ? offset : 0;
      const end = limit > 0 ? start + limit : books.length;

      return {
        books: books.slice(start, end),
        totalCount
      };

    } catch (error) {
      throw this.internal('listBooks', error);
    } finally {
      done();
    }
  }

  /**
   * Every live book in insertion order
   */
  getAllBooks(): ListBooksResult {
    this.logger.info(COMPONENT, 'Getting all books');

    try {
      const books = this.store.all();
      return { books, totalCount: books.length };
    } catch (error) {
      throw this.internal('getAllBooks', error);
    }
  }

  // === Private Methods ===

  /**
   * Throws AlreadyExistsError when another book holds the isbn
   */
  private assertIsbnAvailable(isbn: string | undefined, excludeId?: number): void {
    if (isbn && this.store.isbnConflict(isbn, excludeId)) {
      throw ErrorFactory.duplicateIsbn(isbn);
    }
  }

  /**
   * Turn an error into a failure payload, logging by severity
   */
  private failure(operation: string, error: unknown): MutationResult {
    const catalogError = error instanceof CatalogError
      ? error
      : ErrorFactory.internal(operation, error);

    const severity = catalogError.getSeverity();
    if (severity === ErrorSeverity.HIGH || severity === ErrorSeverity.CRITICAL) {
      this.logger.error(COMPONENT, `${operation} failed`, catalogError.context, catalogError);
    } else {
      this.logger.warn(COMPONENT, `${operation} rejected: ${catalogError.message}`, catalogError.context);
    }

    return {
      success: false,
      message: catalogError.message
    };
  }

  private internal(operation: string, error: unknown): CatalogError {
    const internal = ErrorFactory.internal(operation, error);
    this.logger.error(COMPONENT, `${operation} failed`, internal.context, internal);
    return internal;
  }
}
