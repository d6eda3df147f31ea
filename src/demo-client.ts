// Walks every endpoint of a running books service

import { config as loadEnv } from 'dotenv';
import { loadSettings } from './settings';
import { BooksRpcClient } from './infrastructure/rpc/BooksRpcClient';

async function run(): Promise<void> {
  loadEnv();
  const settings = loadSettings();
  const host = settings.host === '0.0.0.0' ? 'localhost' : settings.host;
  const client = new BooksRpcClient(`${host}:${settings.port}`);

  try {
    console.log('=== Books gRPC Service ===\n');

    console.log('1. All books:');
    const all = await client.getAllBooks();
    all.books.forEach(book => console.log(`   ID: ${book.id}, Title: ${book.title}, Author: ${book.author}`));

    console.log('\n2. Book with ID 1:');
    const first = await client.getBook(1);
    console.log(first.book
      ? `   Found: ${first.book.title} by ${first.book.author} (${first.book.genre ?? ''})`
      : '   Book not found');

    console.log('\n3. Creating a book:');
    const created = await client.createBook({
      title: 'gRPC in Action',
      author: 'Tech Writer',
      isbn: '978-1111111111',
      publishedYear: 2024,
      genre: 'Technology',
      description: 'Learn gRPC with practical examples'
    });
    console.log(created.book
      ? `   Created: ${created.book.title} with ID ${created.book.id}`
      : `   Failed: ${created.message}`);

    if (created.book) {
      console.log('\n4. Updating description and genre with a field mask:');
      const updated = await client.updateBook(created.book.id, {
        description: 'Updated: Learn gRPC with hands-on examples',
        genre: 'Programming'
      }, ['description', 'genre']);
      console.log(updated.book
        ? `   Genre: ${updated.book.genre ?? ''}, title unchanged: ${updated.book.title}`
        : `   Update failed: ${updated.message}`);
    }

    console.log('\n5. Technology books:');
    const technology = await client.listBooks({ genreFilter: 'Technology', limit: 10 });
    console.log(`   Found ${technology.totalCount} technology books`);
    technology.books.forEach(book => console.log(`   - ${book.title} by ${book.author}`));

    console.log('\n6. Book with ID 999:');
    const missing = await client.getBook(999);
    console.log(missing.found ? `   Unexpected: ${missing.book?.title}` : "   Correctly returned 'not found'");
  } finally {
    client.close();
  }
}

run().catch(error => {
  console.error('Demo failed:', error);
  process.exitCode = 1;
});
