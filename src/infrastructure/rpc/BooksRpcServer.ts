// gRPC server lifecycle

import { Server, ServerCredentials } from '@grpc/grpc-js';
import type { ServiceDefinition } from '@grpc/proto-loader';
import { InternalError } from '../../domain/models/Errors';
import { Logger } from '../../shared/utils/Logger';
import { BooksRpcHandlers } from './BooksRpcHandlers';

const COMPONENT = 'BooksRpcServer';

export interface RpcServerOptions {
  host: string;
  port: number;
}

/**
 * One insecure listener serving books.BooksService
 */
export class BooksRpcServer {
  private readonly server = new Server();
  private readonly logger: Logger;
  private readonly options: RpcServerOptions;
  private boundPort: number | null = null;

  constructor(
    service: ServiceDefinition,
    handlers: BooksRpcHandlers,
    logger: Logger,
    options: RpcServerOptions
  ) {
    this.logger = logger;
    this.options = options;
    this.server.addService(service, handlers);
  }

  /**
   * Bind and start serving; resolves with the bound port
   */
  start(): Promise<number> {
    const address = `${this.options.host}:${this.options.port}`;

    return new Promise((resolve, reject) => {
      this.server.bindAsync(address, ServerCredentials.createInsecure(), (error, port) => {
        if (error) {
          reject(new InternalError(`Failed to bind ${address}: ${error.message}`, 'start', { address }, error));
          return;
        }
        this.boundPort = port;
        this.logger.info(COMPONENT, `Books gRPC server listening on ${this.options.host}:${port}`);
        resolve(port);
      });
    });
  }

  get port(): number | null {
    return this.boundPort;
  }

  /**
   * Let in-flight calls finish, forcing shutdown after graceMs
   */
  stop(graceMs: number): Promise<void> {
    if (this.boundPort === null) {
      return Promise.resolve();
    }
    this.boundPort = null;
    this.logger.info(COMPONENT, 'Shutting down gRPC server...');

    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.logger.warn(COMPONENT, `Graceful shutdown exceeded ${graceMs}ms, forcing`);
        this.server.forceShutdown();
        resolve();
      }, graceMs);
      timer.unref();

      this.server.tryShutdown(error => {
        clearTimeout(timer);
        if (error) {
          this.logger.warn(COMPONENT, 'Graceful shutdown failed, forcing', undefined, error);
          this.server.forceShutdown();
        }
        resolve();
      });
    });
  }
}
