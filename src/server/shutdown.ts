/**
 * Graceful Shutdown Handler
 *
 * Handles graceful shutdown of the server when SIGTERM or SIGINT is received:
 * 1. Mark the health check as failing so load balancers drain traffic
 * 2. Stop accepting connections and wait for in-flight requests
 * 3. Force-close idle and remaining connections after the timeout
 * 4. Release AWS clients
 */

import type { Server } from 'http';
import { HealthCheck, Logger } from '../monitoring';

/**
 * Graceful shutdown timeout in milliseconds (30 seconds)
 */
const GRACEFUL_SHUTDOWN_TIMEOUT_MS = 30000;

/**
 * Anything holding sockets or timers that must be released on exit.
 */
export interface Disposable {
  destroy(): void;
}

export interface ShutdownHandlerOptions {
  server: Server;
  logger: Logger;
  healthCheck?: HealthCheck;
  resources?: Disposable[];
  timeoutMs?: number;
}

export class ShutdownHandler {
  private readonly server: Server;
  private readonly logger: Logger;
  private readonly healthCheck?: HealthCheck;
  private readonly resources: Disposable[];
  private readonly timeoutMs: number;
  private shuttingDown: boolean = false;

  constructor(options: ShutdownHandlerOptions) {
    this.server = options.server;
    this.logger = options.logger;
    this.healthCheck = options.healthCheck;
    this.resources = options.resources ?? [];
    this.timeoutMs = options.timeoutMs ?? GRACEFUL_SHUTDOWN_TIMEOUT_MS;
  }

  public isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  /**
   * Execute graceful shutdown. A second call while one is running is ignored.
   */
  public async shutdown(): Promise<void> {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    const startTime = Date.now();

    this.logger.info('Starting graceful shutdown', { event: 'shutdown_started' });

    this.healthCheck?.markShuttingDown();

    try {
      await this.closeServer();
    } finally {
      this.releaseResources();
    }

    const shutdownTime = Date.now() - startTime;
    this.logger.info('Graceful shutdown completed', {
      event: 'shutdown_completed',
      shutdownTime,
      withinTimeout: shutdownTime <= this.timeoutMs,
    });
  }

  private closeServer(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.logger.warn('Graceful shutdown timeout reached, closing remaining connections', {
          event: 'shutdown_timeout',
          timeoutMs: this.timeoutMs,
        });
        this.server.closeAllConnections();
      }, this.timeoutMs);
      timer.unref();

      this.server.close((error?: Error) => {
        clearTimeout(timer);
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('HTTP server closed', { event: 'http_server_closed' });
        resolve();
      });

      this.server.closeIdleConnections();
    });
  }

  private releaseResources(): void {
    for (const resource of this.resources) {
      try {
        resource.destroy();
      } catch (error) {
        this.logger.error(
          'Failed to release resource during shutdown',
          { event: 'resource_release_failed' },
          error instanceof Error ? error : new Error(String(error))
        );
      }
    }
  }

  /**
   * Get the default graceful shutdown timeout in milliseconds
   */
  public static getShutdownTimeout(): number {
    return GRACEFUL_SHUTDOWN_TIMEOUT_MS;
  }
}
