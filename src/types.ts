// Service settings

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface BookCatalogSettings {
  // Listener address
  host: string;
  port: number;
  // Debug mode lowers the log level to DEBUG regardless of logLevel
  debugMode: boolean;
  logLevel: LogLevelName;
  // Insert the three sample books at startup
  seedSampleData: boolean;
  enableFileLogging: boolean;
  logFilePath: string;
  // Time allowed for in-flight calls on shutdown before forcing it
  shutdownGraceMs: number;
}
