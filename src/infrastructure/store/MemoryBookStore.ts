// In-memory record store

import { Book, BookFactory, BookFields, Clock, systemClock } from '../../domain/models/Book';
import { ErrorFactory } from '../../domain/models/Errors';
import { BookStore } from '../../application/services/BookCatalogService';
import { Logger } from '../../shared/utils/Logger';

export interface StoreStats {
  size: number;
  nextId: number;
  insertCount: number;
  replaceCount: number;
  removeCount: number;
}

/**
 * Map-backed book store with a monotonic id allocator.
 *
 * - ids start at 1 and are never reused, even after removal
 * - Map iteration keeps insertion order, so all() is deterministic
 * - records are immutable values; updates swap in a new value
 */
export class MemoryBookStore implements BookStore {
  private readonly books = new Map<number, Book>();
  private readonly clock: Clock;
  private readonly logger?: Logger;
  private nextId = 1;

  private insertCount = 0;
  private replaceCount = 0;
  private removeCount = 0;

  constructor(clock: Clock = systemClock, logger?: Logger) {
    this.clock = clock;
    this.logger = logger;
  }

  /**
   * Store a new book under the next id
   */
  insert(fields: BookFields): Book {
    const book = BookFactory.create(this.nextId, fields, this.clock());
    this.books.set(book.id, book);
    this.nextId++;
    this.insertCount++;
    this.logger?.debug('MemoryBookStore', `Inserted book ${book.id}`);
    return book;
  }

  /**
   * Get a book by id
   */
  get(id: number): Book | undefined {
    return this.books.get(id);
  }

  /**
   * Swap in a revised value for an existing id
   */
  replace(book: Book): void {
    if (!this.books.has(book.id)) {
      throw ErrorFactory.bookNotFound(book.id);
    }
    this.books.set(book.id, book);
    this.replaceCount++;
    this.logger?.debug('MemoryBookStore', `Replaced book ${book.id}`);
  }

  /**
   * Delete a book; false when the id is unknown
   */
  remove(id: number): boolean {
    const removed = this.books.delete(id);
    if (removed) {
      this.removeCount++;
      this.logger?.debug('MemoryBookStore', `Removed book ${id}`);
    }
    return removed;
  }

  /**
   * All books in insertion order
   */
  all(): Book[] {
    return Array.from(this.books.values());
  }

  /**
   * Exact, case-sensitive match against every live record except excludeId
   */
  isbnConflict(isbn: string | undefined, excludeId?: number): boolean {
    if (!isbn) {
      return false;
    }
    for (const [id, book] of this.books) {
      if (id !== excludeId && book.isbn === isbn) {
        return true;
      }
    }
    return false;
  }

  size(): number {
    return this.books.size;
  }

  /**
   * Counters for shutdown logging
   */
  getStats(): StoreStats {
    return {
      size: this.books.size,
      nextId: this.nextId,
      insertCount: this.insertCount,
      replaceCount: this.replaceCount,
      removeCount: this.removeCount
    };
  }
}
