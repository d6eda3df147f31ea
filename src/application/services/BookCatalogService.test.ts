import { Book, Clock } from '../../domain/models/Book';
import { InternalError } from '../../domain/models/Errors';
import { MemoryBookStore } from '../../infrastructure/store/MemoryBookStore';
import { SAMPLE_BOOKS } from '../../shared/constants/sampleBooks';
import { LogLevel, Logger, MemoryOutput } from '../../shared/utils/Logger';
import { BookCatalogService } from './BookCatalogService';

// Each reading is one second after the previous one
function steppingClock(start = Date.UTC(2024, 0, 1)): Clock {
  let now = start;
  return () => {
    now += 1000;
    return new Date(now);
  };
}

function createCatalog(store?: MemoryBookStore) {
  const output = new MemoryOutput();
  const logger = new Logger([output]);
  const clock = steppingClock();
  const catalogStore = store ?? new MemoryBookStore(clock);
  const service = new BookCatalogService(catalogStore, logger, clock);
  service.seed(SAMPLE_BOOKS);
  return { service, store: catalogStore, output };
}

function messages(output: MemoryOutput, level: LogLevel): string[] {
  return output.getEntriesByLevel(level).map(entry => entry.message);
}

class FailingStore extends MemoryBookStore {
  get(): Book | undefined {
    throw new Error('store offline');
  }

  all(): Book[] {
    throw new Error('store offline');
  }

  isbnConflict(): boolean {
    throw new Error('store offline');
  }
}

describe('BookCatalogService', () => {
  describe('seed', () => {
    it('inserts the sample books with ids 1 to 3', () => {
      const { service } = createCatalog();
      const all = service.getAllBooks();

      expect(all.totalCount).toBe(3);
      expect(all.books.map(book => [book.id, book.title])).toEqual([
        [1, 'The Python Handbook'],
        [2, 'Microservices Architecture'],
        [3, 'The Great Adventure']
      ]);
    });
  });

  describe('createBook', () => {
    it('creates a book with the next id', () => {
      const { service } = createCatalog();
      const result = service.createBook({
        title: 'gRPC in Action',
        author: 'Tech Writer',
        isbn: '978-1111111111',
        publishedYear: 2024,
        genre: 'Technology',
        description: 'Learn gRPC with practical examples'
      });

      expect(result.success).toBe(true);
      expect(result.message).toBe('Book created successfully');
      expect(result.book?.id).toBe(4);
      expect(result.book?.isbn).toBe('978-1111111111');
      expect(result.book?.createdAt.getTime()).toBe(result.book?.updatedAt.getTime());
    });

    it('rejects a missing title or author without touching the store', () => {
      const { service, store, output } = createCatalog();

      expect(service.createBook({ title: '', author: 'Someone' })).toEqual({
        success: false,
        message: 'Title and author are required'
      });
      expect(service.createBook({ title: 'Something', author: '' }).success).toBe(false);
      expect(store.size()).toBe(3);
      expect(messages(output, LogLevel.WARN)).toContain('createBook rejected: Title and author are required');
    });

    it('rejects an isbn that is already taken', () => {
      const { service, store } = createCatalog();
      const result = service.createBook({ title: 'Copy', author: 'Copier', isbn: '978-1234567890' });

      expect(result).toEqual({
        success: false,
        message: 'Book with ISBN 978-1234567890 already exists'
      });
      expect(store.size()).toBe(3);
    });

    it('allows any number of books without an isbn', () => {
      const { service } = createCatalog();

      expect(service.createBook({ title: 'Zine 1', author: 'Editor', isbn: '' }).success).toBe(true);
      expect(service.createBook({ title: 'Zine 2', author: 'Editor', isbn: '' }).success).toBe(true);
    });

    it('compares isbns case-sensitively', () => {
      const { service } = createCatalog();

      expect(service.createBook({ title: 'Upper', author: 'A', isbn: 'ISBN-X1' }).success).toBe(true);
      expect(service.createBook({ title: 'Lower', author: 'B', isbn: 'isbn-x1' }).success).toBe(true);
    });

    it('reports an unexpected fault as a failure result', () => {
      const { service } = createCatalog(new FailingStore(steppingClock()));
      const result = service.createBook({ title: 'T', author: 'A', isbn: 'ISBN-1' });

      expect(result).toEqual({ success: false, message: 'Internal error: store offline' });
    });
  });

  describe('ids', () => {
    it('keeps increasing after deletions', () => {
      const { service } = createCatalog();
      const fourth = service.createBook({ title: 'Four', author: 'A' });
      service.deleteBook(4);
      service.deleteBook(3);
      const fifth = service.createBook({ title: 'Five', author: 'B' });

      expect(fourth.book?.id).toBe(4);
      expect(fifth.book?.id).toBe(5);
      expect(service.getBook(4).found).toBe(false);
    });
  });

  describe('getBook', () => {
    it('returns the stored book', () => {
      const { service } = createCatalog();
      const result = service.getBook(1);

      expect(result.found).toBe(true);
      expect(result.book?.author).toBe('Jane Doe');
    });

    it('reports a missing id as not found', () => {
      const { service } = createCatalog();

      expect(service.getBook(999)).toEqual({ found: false });
    });

    it('throws InternalError on an unexpected fault', () => {
      const { service } = createCatalog(new FailingStore(steppingClock()));

      expect(() => service.getBook(1)).toThrow(InternalError);
      expect(() => service.getBook(1)).toThrow('Internal error: store offline');
    });
  });

  describe('updateBook with a field mask', () => {
    it('sets only the masked field, even to empty', () => {
      const { service } = createCatalog();
      const result = service.updateBook({
        id: 1,
        patch: { title: '', author: '', genre: '' },
        paths: ['genre']
      });

      expect(result.success).toBe(true);
      expect(result.message).toBe('Book updated successfully');
      expect(result.book?.title).toBe('The Python Handbook');
      expect(result.book?.author).toBe('Jane Doe');
      expect(result.book?.genre).toBeUndefined();
      expect(service.getBook(1).book?.genre).toBeUndefined();
    });

    it('can clear a required field when it is masked', () => {
      const { service } = createCatalog();
      const result = service.updateBook({ id: 2, patch: { title: '' }, paths: ['title'] });

      expect(result.book?.title).toBe('');
      expect(result.book?.author).toBe('John Smith');
    });

    it('skips unknown paths with a warning', () => {
      const { service, output } = createCatalog();
      const result = service.updateBook({
        id: 3,
        patch: { genre: 'Adventure' },
        paths: ['genre', 'cover_colour']
      });

      expect(result.success).toBe(true);
      expect(result.book?.genre).toBe('Adventure');
      expect(messages(output, LogLevel.WARN)).toContain('Ignoring unknown field path: cover_colour');
    });

    it('aborts the whole update when the new isbn is taken', () => {
      const { service } = createCatalog();
      const before = service.getBook(1).book;
      const result = service.updateBook({
        id: 1,
        patch: { title: 'Hijacked', isbn: '978-0987654321' },
        paths: ['title', 'isbn']
      });

      expect(result).toEqual({
        success: false,
        message: 'Book with ISBN 978-0987654321 already exists'
      });
      expect(service.getBook(1).book).toBe(before);
      expect(service.getBook(1).book?.title).toBe('The Python Handbook');
    });

    it('accepts a book keeping its own isbn', () => {
      const { service } = createCatalog();
      const result = service.updateBook({ id: 1, patch: { isbn: '978-1234567890' }, paths: ['isbn'] });

      expect(result.success).toBe(true);
      expect(result.book?.isbn).toBe('978-1234567890');
    });

    it('refreshes updatedAt and keeps createdAt', () => {
      const { service } = createCatalog();
      const before = service.getBook(1).book;
      const result = service.updateBook({ id: 1, patch: {}, paths: ['cover_colour'] });

      expect(result.book?.createdAt).toBe(before?.createdAt);
      expect(result.book?.updatedAt.getTime()).toBeGreaterThan(before?.updatedAt.getTime() ?? Infinity);
    });
  });

  describe('updateBook without a field mask', () => {
    it('overwrites only non-empty values and cannot clear a field', () => {
      const { service, output } = createCatalog();
      const result = service.updateBook({
        id: 1,
        patch: { title: 'The Python Handbook, 2nd ed.', author: '', genre: '', publishedYear: 0 }
      });

      expect(result.success).toBe(true);
      expect(result.book?.title).toBe('The Python Handbook, 2nd ed.');
      expect(result.book?.author).toBe('Jane Doe');
      expect(result.book?.genre).toBe('Technology');
      expect(result.book?.publishedYear).toBe(2023);
      expect(messages(output, LogLevel.WARN)).toContain(
        'No field mask provided, falling back to non-empty field updates'
      );
    });

    it('checks a supplied isbn for conflicts', () => {
      const { service } = createCatalog();
      const result = service.updateBook({
        id: 3,
        patch: { title: 'Renamed', isbn: '978-1234567890' },
        paths: []
      });

      expect(result.success).toBe(false);
      expect(result.message).toBe('Book with ISBN 978-1234567890 already exists');
      expect(service.getBook(3).book?.title).toBe('The Great Adventure');
    });
  });

  describe('updateBook on a missing id', () => {
    it('returns a not found failure', () => {
      const { service } = createCatalog();

      expect(service.updateBook({ id: 999, patch: { title: 'X' }, paths: ['title'] })).toEqual({
        success: false,
        message: 'Book with ID 999 not found'
      });
    });
  });

  describe('deleteBook', () => {
    it('succeeds once and then reports not found', () => {
      const { service } = createCatalog();

      expect(service.deleteBook(2)).toEqual({ success: true, message: 'Book deleted successfully' });
      expect(service.deleteBook(2)).toEqual({ success: false, message: 'Book with ID 2 not found' });
      expect(service.getAllBooks().totalCount).toBe(2);
    });
  });

  describe('listBooks', () => {
    it('pages over the filtered view', () => {
      const { service } = createCatalog();
      const page = service.listBooks({ limit: 2, offset: 1 });

      expect(page.totalCount).toBe(3);
      expect(page.books.map(book => book.id)).toEqual([2, 3]);
    });

    it('filters genre by case-insensitive substring', () => {
      const { service } = createCatalog();
      const page = service.listBooks({ genreFilter: 'techno', limit: 10 });

      expect(page.totalCount).toBe(2);
      expect(page.books.map(book => book.title)).toEqual([
        'The Python Handbook',
        'Microservices Architecture'
      ]);
    });

    it('filters author by case-insensitive substring', () => {
      const { service } = createCatalog();
      const page = service.listBooks({ authorFilter: 'JOHN' });

      expect(page.books.map(book => book.author)).toEqual(['John Smith', 'Alice Johnson']);
    });

    it('combines both filters', () => {
      const { service } = createCatalog();
      const page = service.listBooks({ genreFilter: 'tech', authorFilter: 'doe' });

      expect(page.totalCount).toBe(1);
      expect(page.books[0].id).toBe(1);
    });

    it('returns an empty page past the end with the filtered total', () => {
      const { service } = createCatalog();
      const page = service.listBooks({ genreFilter: 'Technology', offset: 5, limit: 10 });

      expect(page.books).toEqual([]);
      expect(page.totalCount).toBe(2);
    });

    it('treats zero and negative limit or offset as unbounded and start', () => {
      const { service } = createCatalog();

      expect(service.listBooks({ limit: 0, offset: 0 }).books).toHaveLength(3);
      expect(service.listBooks({ limit: -1, offset: -4 }).books).toHaveLength(3);
      expect(service.listBooks().books).toHaveLength(3);
    });

    it('throws InternalError on an unexpected fault', () => {
      const { service } = createCatalog(new FailingStore(steppingClock()));

      expect(() => service.listBooks({})).toThrow('Internal error: store offline');
      expect(() => service.getAllBooks()).toThrow(InternalError);
    });
  });

  describe('catalog walkthrough', () => {
    it('creates, updates by mask, lists and looks up', () => {
      const { service } = createCatalog();

      const created = service.createBook({
        title: 'gRPC in Action',
        author: 'Tech Writer',
        isbn: '978-1111111111',
        publishedYear: 2024,
        genre: 'Technology',
        description: 'Learn gRPC with practical examples'
      });
      expect(created.book?.id).toBe(4);

      const updated = service.updateBook({
        id: 4,
        patch: { description: 'Updated: hands-on examples', genre: 'Programming' },
        paths: ['description', 'genre']
      });
      expect(updated.book?.title).toBe('gRPC in Action');
      expect(updated.book?.genre).toBe('Programming');

      const technology = service.listBooks({ genreFilter: 'Technology', limit: 10 });
      expect(technology.totalCount).toBe(2);
      expect(technology.books.map(book => book.id)).toEqual([1, 2]);

      expect(service.getBook(999).found).toBe(false);
    });
  });

  describe('isbn uniqueness', () => {
    it('holds after every create and update in a mixed sequence', () => {
      const { service } = createCatalog();
      const pool = ['ISBN-A', 'ISBN-B', '978-1234567890', ''];

      const assertUnique = (): void => {
        const isbns = service.getAllBooks().books
          .map(book => book.isbn)
          .filter((isbn): isbn is string => Boolean(isbn));
        expect(new Set(isbns).size).toBe(isbns.length);
      };

      for (let step = 0; step < 24; step++) {
        const isbn = pool[step % pool.length];
        if (step % 3 === 0) {
          service.createBook({ title: `Book ${step}`, author: 'Author', isbn });
        } else {
          const ids = service.getAllBooks().books.map(book => book.id);
          const id = ids[step % ids.length];
          const paths = step % 2 === 0 ? ['isbn'] : [];
          service.updateBook({ id, patch: { isbn }, paths });
        }
        assertUnique();
      }
    });
  });
});
