import { CreateBookInput } from '../../domain/models/Book';

// Records inserted at startup when seedSampleData is enabled
export const SAMPLE_BOOKS: readonly CreateBookInput[] = [
  {
    title: 'The Python Handbook',
    author: 'Jane Doe',
    isbn: '978-1234567890',
    publishedYear: 2023,
    genre: 'Technology',
    description: 'A comprehensive guide to Python programming'
  },
  {
    title: 'Microservices Architecture',
    author: 'John Smith',
    isbn: '978-0987654321',
    publishedYear: 2022,
    genre: 'Technology',
    description: 'Building scalable distributed systems'
  },
  {
    title: 'The Great Adventure',
    author: 'Alice Johnson',
    isbn: '978-1122334455',
    publishedYear: 2021,
    genre: 'Fiction',
    description: 'An epic tale of discovery'
  }
];
