// Catalog error hierarchy

/**
 * Error codes, named after the RPC status each one maps to
 */
export type CatalogErrorCode =
  | 'INVALID_ARGUMENT'
  | 'ALREADY_EXISTS'
  | 'NOT_FOUND'
  | 'INTERNAL'
  | 'CONFIGURATION';

/**
 * Base catalog error
 */
export abstract class CatalogError extends Error {
  abstract readonly code: CatalogErrorCode;
  abstract readonly category: string;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, { cause });
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  abstract getSeverity(): ErrorSeverity;

  toJSON(): ErrorInfo {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      severity: this.getSeverity(),
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack
    };
  }
}

/**
 * Missing or malformed input
 */
export class ValidationError extends CatalogError {
  readonly code = 'INVALID_ARGUMENT';
  readonly category = 'VALIDATION';

  constructor(
    message: string,
    public readonly field?: string,
    context?: Record<string, unknown>
  ) {
    super(message, { ...context, field });
  }

  getSeverity(): ErrorSeverity {
    return ErrorSeverity.LOW;
  }
}

/**
 * Unique key already taken by another live record
 */
export class AlreadyExistsError extends CatalogError {
  readonly code = 'ALREADY_EXISTS';
  readonly category = 'CONFLICT';

  constructor(
    message: string,
    public readonly key?: string,
    context?: Record<string, unknown>
  ) {
    super(message, { ...context, key });
  }

  getSeverity(): ErrorSeverity {
    return ErrorSeverity.LOW;
  }
}

/**
 * No live record with the requested id
 */
export class NotFoundError extends CatalogError {
  readonly code = 'NOT_FOUND';
  readonly category = 'LOOKUP';

  constructor(
    message: string,
    public readonly bookId?: number,
    context?: Record<string, unknown>
  ) {
    super(message, { ...context, bookId });
  }

  getSeverity(): ErrorSeverity {
    return ErrorSeverity.LOW;
  }
}

/**
 * Unexpected fault inside the service
 */
export class InternalError extends CatalogError {
  readonly code = 'INTERNAL';
  readonly category = 'INTERNAL';

  constructor(
    message: string,
    public readonly operation?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, { ...context, operation }, cause);
  }

  getSeverity(): ErrorSeverity {
    return ErrorSeverity.HIGH;
  }
}

/**
 * Invalid service settings
 */
export class ConfigurationError extends CatalogError {
  readonly code = 'CONFIGURATION';
  readonly category = 'CONFIGURATION';

  constructor(
    message: string,
    public readonly setting?: string,
    context?: Record<string, unknown>
  ) {
    super(message, { ...context, setting });
  }

  getSeverity(): ErrorSeverity {
    return ErrorSeverity.CRITICAL;
  }
}

export enum ErrorSeverity {
  LOW = 'low',          // expected business outcome
  MEDIUM = 'medium',
  HIGH = 'high',        // request could not be served
  CRITICAL = 'critical' // service cannot start
}

export interface ErrorInfo {
  name: string;
  code: CatalogErrorCode;
  category: string;
  message: string;
  severity: ErrorSeverity;
  timestamp: Date;
  context?: Record<string, unknown>;
  stack?: string;
}

export class ErrorFactory {
  static bookNotFound(id: number): NotFoundError {
    return new NotFoundError(`Book with ID ${id} not found`, id);
  }

  static duplicateIsbn(isbn: string): AlreadyExistsError {
    return new AlreadyExistsError(`Book with ISBN ${isbn} already exists`, isbn);
  }

  /**
   * Wrap an unexpected throwable; the message keeps the wrapped error's text
   */
  static internal(operation: string, error: unknown): InternalError {
    const detail = error instanceof Error ? error.message : String(error);
    return new InternalError(
      `Internal error: ${detail}`,
      operation,
      undefined,
      error instanceof Error ? error : undefined
    );
  }
}
