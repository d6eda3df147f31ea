// Wire messages of books.BooksService and their domain mappings

import { z } from 'zod';
import { Book, BookPatch, CreateBookInput } from '../../domain/models/Book';

const text = z.string().default('');
const int32 = z.number().int().default(0);

export const TimestampSchema = z.object({
  seconds: z.number().int(),
  nanos: z.number().int().default(0)
});

export const BookMessageSchema = z.object({
  id: int32,
  title: text,
  author: text,
  isbn: text,
  published_year: int32,
  genre: text,
  description: text,
  created_at: TimestampSchema.nullish(),
  updated_at: TimestampSchema.nullish()
});

export const BookIdSchema = z.object({
  id: int32
});

export const CreateBookRequestSchema = z.object({
  title: text,
  author: text,
  isbn: text,
  published_year: int32,
  genre: text,
  description: text
});

export const UpdateBookRequestSchema = z.object({
  id: int32,
  book: BookMessageSchema.nullish(),
  update_mask: z.object({ paths: z.array(z.string()).default([]) }).nullish()
});

export const ListBooksRequestSchema = z.object({
  genre_filter: text,
  author_filter: text,
  limit: int32,
  offset: int32
});

export const EmptySchema = z.object({});

export const CreateBookResponseSchema = z.object({
  book: BookMessageSchema.nullish(),
  success: z.boolean().default(false),
  message: text
});

export const GetBookResponseSchema = z.object({
  book: BookMessageSchema.nullish(),
  found: z.boolean().default(false)
});

export const UpdateBookResponseSchema = CreateBookResponseSchema;

export const DeleteBookResponseSchema = z.object({
  success: z.boolean().default(false),
  message: text
});

export const ListBooksResponseSchema = z.object({
  books: z.array(BookMessageSchema).default([]),
  total_count: int32
});

export type TimestampMessage = z.infer<typeof TimestampSchema>;
export type BookMessage = z.infer<typeof BookMessageSchema>;
export type CreateBookRequest = z.infer<typeof CreateBookRequestSchema>;
export type UpdateBookRequest = z.infer<typeof UpdateBookRequestSchema>;
export type ListBooksRequest = z.infer<typeof ListBooksRequestSchema>;
export type CreateBookResponse = z.infer<typeof CreateBookResponseSchema>;
export type GetBookResponse = z.infer<typeof GetBookResponseSchema>;
export type UpdateBookResponse = z.infer<typeof UpdateBookResponseSchema>;
export type DeleteBookResponse = z.infer<typeof DeleteBookResponseSchema>;
export type ListBooksResponse = z.infer<typeof ListBooksResponseSchema>;

export function toTimestamp(date: Date): TimestampMessage {
  const millis = date.getTime();
  const seconds = Math.floor(millis / 1000);
  return {
    seconds,
    nanos: (millis - seconds * 1000) * 1_000_000
  };
}

export function fromTimestamp(timestamp: TimestampMessage | null | undefined): Date {
  if (!timestamp) {
    return new Date(0);
  }
  return new Date(timestamp.seconds * 1000 + Math.floor(timestamp.nanos / 1_000_000));
}

/**
 * Absent optional values become proto3 defaults
 */
export function toBookMessage(book: Book): BookMessage {
  return {
    id: book.id,
    title: book.title,
    author: book.author,
    isbn: book.isbn ?? '',
    published_year: book.publishedYear ?? 0,
    genre: book.genre ?? '',
    description: book.description ?? '',
    created_at: toTimestamp(book.createdAt),
    updated_at: toTimestamp(book.updatedAt)
  };
}

export function fromBookMessage(message: BookMessage): Book {
  return {
    id: message.id,
    title: message.title,
    author: message.author,
    isbn: message.isbn || undefined,
    publishedYear: message.published_year || undefined,
    genre: message.genre || undefined,
    description: message.description || undefined,
    createdAt: fromTimestamp(message.created_at),
    updatedAt: fromTimestamp(message.updated_at)
  };
}

/**
 * Every payload field is carried; the update mode decides which apply
 */
export function toBookPatch(message: BookMessage | null | undefined): BookPatch {
  if (!message) {
    return {};
  }
  return {
    title: message.title,
    author: message.author,
    isbn: message.isbn,
    publishedYear: message.published_year,
    genre: message.genre,
    description: message.description
  };
}

export function toCreateBookInput(request: CreateBookRequest): CreateBookInput {
  return {
    title: request.title,
    author: request.author,
    isbn: request.isbn,
    publishedYear: request.published_year,
    genre: request.genre,
    description: request.description
  };
}
