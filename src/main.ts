import { config as loadEnv } from 'dotenv';
import { BookCatalogSettings } from './types';
import { loadSettings } from './settings';
import { BookCatalogService } from './application/services/BookCatalogService';
import { MemoryBookStore } from './infrastructure/store/MemoryBookStore';
import { FileOutput } from './infrastructure/logging/FileOutput';
import { createBooksRpcHandlers } from './infrastructure/rpc/BooksRpcHandlers';
import { BooksRpcServer } from './infrastructure/rpc/BooksRpcServer';
import { loadBooksService } from './infrastructure/rpc/protoLoader';
import { SAMPLE_BOOKS } from './shared/constants/sampleBooks';
import { Logger, LogLevel, createDevelopmentLogger, createProductionLogger, parseLogLevel } from './shared/utils/Logger';

const COMPONENT = 'BookCatalogApp';

/**
 * Wires settings, logging, the store, the service and the gRPC server
 */
export class BookCatalogApp {
  readonly settings: BookCatalogSettings;
  readonly logger: Logger;
  readonly store: MemoryBookStore;
  readonly service: BookCatalogService;
  private server: BooksRpcServer | null = null;
  private stopped = false;

  constructor(settings: BookCatalogSettings, logger?: Logger) {
    this.settings = settings;
    this.logger = logger ?? BookCatalogApp.createLogger(settings);
    this.store = new MemoryBookStore(undefined, this.logger);
    this.service = new BookCatalogService(this.store, this.logger);

    if (settings.seedSampleData) {
      this.service.seed(SAMPLE_BOOKS);
    }
  }

  static createLogger(settings: BookCatalogSettings): Logger {
    const logger = settings.debugMode
      ? createDevelopmentLogger()
      : createProductionLogger();

    logger.setLogLevel(settings.debugMode ? LogLevel.DEBUG : parseLogLevel(settings.logLevel));

    if (settings.enableFileLogging) {
      logger.addOutput(new FileOutput(settings.logFilePath, { flushInterval: 1500, maxBuffer: 100 }));
      logger.info(COMPONENT, `File logging enabled: ${settings.logFilePath}`);
    }

    return logger;
  }

  async start(): Promise<number> {
    const handlers = createBooksRpcHandlers(this.service, this.logger);
    this.server = new BooksRpcServer(loadBooksService(), handlers, this.logger, {
      host: this.settings.host,
      port: this.settings.port
    });
    return this.server.start();
  }

  /**
   * Stop serving and close the logger; later calls are no-ops
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    await this.server?.stop(this.settings.shutdownGraceMs);
    this.server = null;
    this.logger.info(COMPONENT, 'Catalog stopped', this.store.getStats());
    await this.logger.close();
  }
}

async function run(): Promise<void> {
  loadEnv();
  const app = new BookCatalogApp(loadSettings());
  await app.start();

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    app.logger.info(COMPONENT, `Received ${signal}`);
    app.stop().catch(error => {
      console.error('Shutdown failed:', error);
      process.exitCode = 1;
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  run().catch(error => {
    console.error('Books service failed to start:', error);
    process.exitCode = 1;
  });
}
