// Book catalog domain model

export interface Book {
  // Identity, assigned by the store
  readonly id: number;

  // Required at creation
  readonly title: string;
  readonly author: string;

  // Optional catalog data
  readonly isbn?: string;
  readonly publishedYear?: number;
  readonly genre?: string;
  readonly description?: string;

  // Metadata
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

// Input for creating a book (id and timestamps come from the store)
export interface CreateBookInput {
  title: string;
  author: string;
  isbn?: string;
  publishedYear?: number;
  genre?: string;
  description?: string;
}

// The client-writable part of a book
export type BookFields = Omit<Book, 'id' | 'createdAt' | 'updatedAt'>;

// Partial update payload; which values apply depends on the update mode
export type BookPatch = Partial<BookFields>;

// Field paths accepted in an update mask, as they appear on the wire
export const BOOK_FIELD_PATHS = [
  'title',
  'author',
  'isbn',
  'published_year',
  'genre',
  'description'
] as const;

export type BookFieldPath = typeof BOOK_FIELD_PATHS[number];

export function isBookFieldPath(path: string): path is BookFieldPath {
  return BOOK_FIELD_PATHS.some(field => field === path);
}

type FieldUpdater = (fields: BookFields, patch: BookPatch) => BookFields;

/**
 * Mask-driven updaters. Each one copies its field from the patch
 * unconditionally, so a missing or empty value clears the field.
 */
const FIELD_UPDATERS: Readonly<Record<BookFieldPath, FieldUpdater>> = {
  title: (fields, patch) => ({ ...fields, title: patch.title ?? '' }),
  author: (fields, patch) => ({ ...fields, author: patch.author ?? '' }),
  isbn: (fields, patch) => ({ ...fields, isbn: optionalText(patch.isbn) }),
  published_year: (fields, patch) => ({ ...fields, publishedYear: optionalYear(patch.publishedYear) }),
  genre: (fields, patch) => ({ ...fields, genre: optionalText(patch.genre) }),
  description: (fields, patch) => ({ ...fields, description: optionalText(patch.description) })
};

export interface MaskApplication {
  readonly fields: BookFields;
  readonly ignoredPaths: readonly string[];
}

export class BookFactory {
  /**
   * Normalise creation input into book fields
   */
  static fields(input: CreateBookInput): BookFields {
    return {
      title: input.title,
      author: input.author,
      isbn: optionalText(input.isbn),
      publishedYear: optionalYear(input.publishedYear),
      genre: optionalText(input.genre),
      description: optionalText(input.description)
    };
  }

  /**
   * Build a stored book; both timestamps get the same instant
   */
  static create(id: number, fields: BookFields, now: Date): Book {
    return {
      id,
      ...fields,
      createdAt: now,
      updatedAt: now
    };
  }

  static fieldsOf(book: Book): BookFields {
    return {
      title: book.title,
      author: book.author,
      isbn: book.isbn,
      publishedYear: book.publishedYear,
      genre: book.genre,
      description: book.description
    };
  }

  /**
   * Apply the named paths of a patch. Unknown paths are returned, not applied.
   */
  static applyMask(existing: Book, patch: BookPatch, paths: readonly string[]): MaskApplication {
    let fields = BookFactory.fieldsOf(existing);
    const ignoredPaths: string[] = [];

    for (const path of paths) {
      if (isBookFieldPath(path)) {
        fields = FIELD_UPDATERS[path](fields, patch);
      } else {
        ignoredPaths.push(path);
      }
    }

    return { fields, ignoredPaths };
  }

  /**
   * Legacy update: only non-empty, non-zero patch values overwrite.
   * This mode cannot clear a field.
   */
  static applyNonEmpty(existing: Book, patch: BookPatch): BookFields {
    const fields = BookFactory.fieldsOf(existing);

    return {
      title: patch.title || fields.title,
      author: patch.author || fields.author,
      isbn: patch.isbn || fields.isbn,
      publishedYear: patch.publishedYear || fields.publishedYear,
      genre: patch.genre || fields.genre,
      description: patch.description || fields.description
    };
  }

  /**
   * New value of an existing book with refreshed updatedAt.
   * updatedAt never falls behind createdAt, even if the clock steps back.
   */
  static revise(existing: Book, fields: BookFields, now: Date): Book {
    const updatedAt = now.getTime() < existing.createdAt.getTime() ? existing.createdAt : now;

    return {
      ...existing,
      ...fields,
      id: existing.id,
      createdAt: existing.createdAt,
      updatedAt
    };
  }

  static validate(input: CreateBookInput): { isValid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!input.title) {
      errors.push('title is required');
    }

    if (!input.author) {
      errors.push('author is required');
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }
}

function optionalText(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

function optionalYear(value: number | undefined): number | undefined {
  return value ? value : undefined;
}

export type BookId = Book['id'];

// Source of "now" for timestamps
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
