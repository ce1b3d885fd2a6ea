import { logger } from './logger.js';

export interface ShutdownHandler {
  name: string;
  priority: number;
  handler: () => Promise<void>;
}

export class GracefulShutdown {
  private handlers: ShutdownHandler[] = [];
  private isShuttingDown = false;
  private readonly FORCE_EXIT_TIMEOUT = 15000;

  register(name: string, priority: number, handler: () => Promise<void>): void {
    this.handlers.push({ name, priority, handler });
  }

  /**
   * Run handlers in priority order (lowest first). Failures are logged and the
   * remaining handlers still run. Resolves with the number of failed handlers.
   */
  async runHandlers(): Promise<number> {
    const sortedHandlers = [...this.handlers].sort((a, b) => a.priority - b.priority);
    let failures = 0;

    for (const { name, handler } of sortedHandlers) {
      try {
        logger.info(`Running shutdown handler: ${name}`);
        await handler();
        logger.info(`Shutdown handler completed: ${name}`);
      } catch (error) {
        failures++;
        logger.error({ err: error }, `Shutdown handler failed: ${name}`);
      }
    }

    return failures;
  }

  async shutdown(signal: string): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }

    this.isShuttingDown = true;
    logger.info({ signal }, 'Graceful shutdown initiated');

    const timeout = setTimeout(() => {
      logger.error('Force exit timeout reached, exiting with error');
      process.exit(1);
    }, this.FORCE_EXIT_TIMEOUT);
    timeout.unref();

    const failures = await this.runHandlers();

    clearTimeout(timeout);
    logger.info({ failures }, 'Graceful shutdown completed');
    process.exit(failures > 0 ? 1 : 0);
  }

  listen(signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): void {
    for (const signal of signals) {
      process.once(signal, () => {
        void this.shutdown(signal);
      });
    }
  }
}
