// Component-tagged logging

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  component: string;
  message: string;
  data?: unknown;
  error?: Error;
}

export interface LogOutput {
  write(entry: LogEntry): void;
  flush?(): void | Promise<void>;
  close?(): Promise<void>;
}

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

const CONSOLE_METHODS: Readonly<Record<LogLevel, ConsoleMethod | null>> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.SILENT]: null
};

/**
 * Writes to the process console; errors are only appended at WARN and above
 */
export class ConsoleOutput implements LogOutput {
  write(entry: LogEntry): void {
    const method = CONSOLE_METHODS[entry.level];
    if (!method) return;

    const prefix = `[${new Date(entry.timestamp).toISOString()}] [${LogLevel[entry.level]}] [${entry.component}]`;
    const extras: unknown[] = [entry.data ?? ''];
    if (entry.level >= LogLevel.WARN) {
      extras.push(entry.error ?? '');
    }
    console[method](prefix, entry.message, ...extras);
  }
}

/**
 * Bounded in-memory buffer of recent entries
 */
export class MemoryOutput implements LogOutput {
  private entries: LogEntry[] = [];
  private readonly maxEntries: number;

  constructor(maxEntries = 1000) {
    this.maxEntries = maxEntries;
  }

  /**
   * Append an entry, dropping the oldest past maxEntries
   */
  write(entry: LogEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter(entry => entry.level === level);
  }

  getEntriesByComponent(component: string): LogEntry[] {
    return this.entries.filter(entry => entry.component === component);
  }

  clear(): void {
    this.entries = [];
  }
}

/**
 * Logger with pluggable outputs and per-component levels.
 *
 * Outputs are injected, so tests can capture entries with a MemoryOutput
 * while the server writes to the console and, optionally, a file.
 */
export class Logger {
  private readonly outputs: LogOutput[];
  private globalLogLevel: LogLevel = LogLevel.INFO;
  private readonly componentLogLevels = new Map<string, LogLevel>();

  constructor(outputs: LogOutput[] = [new ConsoleOutput()]) {
    this.outputs = outputs;
  }

  /**
   * Set the level applied to components without their own
   */
  setLogLevel(level: LogLevel): void {
    this.globalLogLevel = level;
  }

  /**
   * Override the level for one component
   */
  setComponentLogLevel(component: string, level: LogLevel): void {
    this.componentLogLevels.set(component, level);
  }

  /**
   * Attach another output, such as a log file
   */
  addOutput(output: LogOutput): void {
    this.outputs.push(output);
  }

  /**
   * Flush and close every output, then detach them
   */
  async close(): Promise<void> {
    const outputs = this.outputs.splice(0, this.outputs.length);
    for (const output of outputs) {
      if (output.close) {
        await output.close();
      } else {
        await output.flush?.();
      }
    }
  }

  /**
   * Store and request tracing
   */
  debug(component: string, message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, component, message, data);
  }

  /**
   * Lifecycle and successful operations
   */
  info(component: string, message: string, data?: unknown): void {
    this.log(LogLevel.INFO, component, message, data);
  }

  /**
   * Rejected requests and recoverable problems
   */
  warn(component: string, message: string, data?: unknown, error?: Error): void {
    this.log(LogLevel.WARN, component, message, data, error);
  }

  /**
   * Faults that fail a request
   */
  error(component: string, message: string, data?: unknown, error?: Error): void {
    this.log(LogLevel.ERROR, component, message, data, error);
  }

  /**
   * Start timing an operation; call the returned function when it ends
   */
  startTimer(component: string, operation: string): () => void {
    const startTime = Date.now();
    this.debug(component, `${operation} started`);

    return () => {
      const duration = Date.now() - startTime;
      this.debug(component, `${operation} finished (${duration}ms)`);
    };
  }

  // === Private Methods ===

  private log(
    level: LogLevel,
    component: string,
    message: string,
    data?: unknown,
    error?: Error
  ): void {
    const effectiveLevel = this.componentLogLevels.get(component) ?? this.globalLogLevel;
    if (level < effectiveLevel) {
      return;
    }

    const entry: LogEntry = {
      timestamp: Date.now(),
      level,
      component,
      message,
      data,
      error
    };

    this.outputs.forEach(output => {
      try {
        output.write(entry);
      } catch (outputError) {
        // a failing output must not recurse into the logger
        console.error('Logger output error:', outputError);
      }
    });
  }
}

/**
 * Map a settings level name; unknown names fall back to INFO
 */
export function parseLogLevel(name: string): LogLevel {
  switch (name.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Console logger at DEBUG, used when debugMode is on
 */
export function createDevelopmentLogger(): Logger {
  const logger = new Logger([new ConsoleOutput()]);
  logger.setLogLevel(LogLevel.DEBUG);
  return logger;
}

/**
 * Console logger at WARN; callers usually lower it from settings
 */
export function createProductionLogger(): Logger {
  const logger = new Logger([new ConsoleOutput()]);
  logger.setLogLevel(LogLevel.WARN);
  return logger;
}
