import { z } from 'zod';
import { BookCatalogSettings } from './types';
import { ConfigurationError } from './domain/models/Errors';

export const DEFAULT_SETTINGS: BookCatalogSettings = {
  host: '0.0.0.0',
  port: 50052,
  debugMode: false,
  logLevel: 'info',
  seedSampleData: true,
  enableFileLogging: false,
  logFilePath: 'logs/books-service.log',
  shutdownGraceMs: 5000
};

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const EnvSchema = z.object({
  BOOKS_HOST: z.string().min(1).optional(),
  BOOKS_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  BOOKS_DEBUG: booleanFlag.optional(),
  BOOKS_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  BOOKS_SEED_SAMPLE_DATA: booleanFlag.optional(),
  BOOKS_FILE_LOGGING: booleanFlag.optional(),
  BOOKS_LOG_FILE: z.string().min(1).optional(),
  BOOKS_SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).optional()
});

/**
 * Merge environment overrides onto DEFAULT_SETTINGS.
 * Unset variables keep their defaults; invalid ones are a ConfigurationError.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): BookCatalogSettings {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue.path.length > 0 ? String(issue.path[0]) : 'environment';
    throw new ConfigurationError(
      `Invalid value for ${variable}: ${issue.message}`,
      variable,
      { issues: parsed.error.issues }
    );
  }

  const overrides = parsed.data;
  return {
    host: overrides.BOOKS_HOST ?? DEFAULT_SETTINGS.host,
    port: overrides.BOOKS_PORT ?? DEFAULT_SETTINGS.port,
    debugMode: overrides.BOOKS_DEBUG ?? DEFAULT_SETTINGS.debugMode,
    logLevel: overrides.BOOKS_LOG_LEVEL ?? DEFAULT_SETTINGS.logLevel,
    seedSampleData: overrides.BOOKS_SEED_SAMPLE_DATA ?? DEFAULT_SETTINGS.seedSampleData,
    enableFileLogging: overrides.BOOKS_FILE_LOGGING ?? DEFAULT_SETTINGS.enableFileLogging,
    logFilePath: overrides.BOOKS_LOG_FILE ?? DEFAULT_SETTINGS.logFilePath,
    shutdownGraceMs: overrides.BOOKS_SHUTDOWN_GRACE_MS ?? DEFAULT_SETTINGS.shutdownGraceMs
  };
}
