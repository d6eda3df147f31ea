import path from 'node:path';
import { loadSync } from '@grpc/proto-loader';
import type { AnyDefinition, ServiceDefinition } from '@grpc/proto-loader';
import { ConfigurationError } from '../../domain/models/Errors';

// proto/ sits at the project root, two levels above src/ and dist/ alike
export const DEFAULT_PROTO_PATH = path.resolve(__dirname, '../../../proto/books.proto');

export const BOOKS_SERVICE_NAME = 'books.BooksService';

export const BOOKS_METHODS = [
  'CreateBook',
  'GetBook',
  'UpdateBook',
  'DeleteBook',
  'ListBooks',
  'GetAllBooks'
] as const;

export type BooksMethod = typeof BOOKS_METHODS[number];

/**
 * snake_case fields, int64 as number, proto3 defaults filled in
 */
export const PROTO_LOADER_OPTIONS = {
  keepCase: true,
  longs: Number,
  enums: String,
  defaults: true,
  oneofs: true
};

function isServiceDefinition(definition: AnyDefinition | undefined): definition is ServiceDefinition {
  return definition !== undefined && !('format' in definition);
}

/**
 * Load the BooksService definition from its .proto file
 */
export function loadBooksService(protoPath: string = DEFAULT_PROTO_PATH): ServiceDefinition {
  const packageDefinition = loadSync(protoPath, PROTO_LOADER_OPTIONS);
  const service = packageDefinition[BOOKS_SERVICE_NAME];

  if (!isServiceDefinition(service)) {
    throw new ConfigurationError(
      `${BOOKS_SERVICE_NAME} is not defined in ${protoPath}`,
      'protoPath'
    );
  }

  const missing = BOOKS_METHODS.filter(method => !(method in service));
  if (missing.length > 0) {
    throw new ConfigurationError(
      `${BOOKS_SERVICE_NAME} is missing methods: ${missing.join(', ')}`,
      'protoPath',
      { missing }
    );
  }

  return service;
}
