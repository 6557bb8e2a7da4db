import type { Logger } from '../logger/index.js';
import { toError } from '../errors/index.js';

/**
 * Server lifecycle manager
 * Handles graceful startup and shutdown
 */

export interface LifecycleHook {
  name: string;
  handler: () => Promise<void>;
}

export interface LifecycleOptions {
  shutdownTimeout?: number;
  /** Install SIGTERM/SIGINT and process error handlers */
  handleSignals?: boolean;
  /** Exit the process once shutdown hooks have run */
  exitOnShutdown?: boolean;
}

export class LifecycleManager {
  private logger: Logger;
  private startupHooks: LifecycleHook[] = [];
  private shutdownHooks: LifecycleHook[] = [];
  private isShuttingDown = false;
  private shutdownTimeout: number;
  private exitOnShutdown: boolean;

  constructor(logger: Logger, options: LifecycleOptions = {}) {
    this.logger = logger;
    this.shutdownTimeout = options.shutdownTimeout ?? 30000;
    this.exitOnShutdown = options.exitOnShutdown ?? true;
    if (options.handleSignals ?? true) {
      this.setupSignalHandlers();
    }
  }

  /**
   * Register a startup hook
   */
  onStartup(name: string, handler: () => Promise<void>): void {
    this.startupHooks.push({ name, handler });
  }

  /**
   * Register a shutdown hook
   */
  onShutdown(name: string, handler: () => Promise<void>): void {
    this.shutdownHooks.push({ name, handler });
  }

  /**
   * Execute all startup hooks
   */
  async startup(): Promise<void> {
    this.logger.info('Starting server lifecycle...');

    for (const hook of this.startupHooks) {
      try {
        this.logger.debug(`Executing startup hook: ${hook.name}`);
        await hook.handler();
        this.logger.debug(`Startup hook completed: ${hook.name}`);
      } catch (error) {
        this.logger.error(`Startup hook failed: ${hook.name}`, toError(error));
        throw error;
      }
    }

    this.logger.info('Server startup complete');
  }

  /**
   * Execute all shutdown hooks, then exit unless configured otherwise
   */
  async shutdown(signal?: string): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    this.logger.info(`Initiating graceful shutdown${signal ? ` (signal: ${signal})` : ''}`);

    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<void>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Shutdown timeout after ${this.shutdownTimeout}ms`));
      }, this.shutdownTimeout);
    });

    let exitCode = 0;
    try {
      await Promise.race([this.executeShutdownHooks(), timeoutPromise]);
      this.logger.info('Graceful shutdown complete');
    } catch (error) {
      this.logger.error('Error during shutdown', toError(error));
      exitCode = 1;
    } finally {
      clearTimeout(timer);
    }

    if (this.exitOnShutdown) {
      process.exit(exitCode);
    }
  }

  /**
   * Execute all shutdown hooks in reverse order
   */
  private async executeShutdownHooks(): Promise<void> {
    // LIFO
    const hooks = [...this.shutdownHooks].reverse();

    for (const hook of hooks) {
      try {
        this.logger.debug(`Executing shutdown hook: ${hook.name}`);
        await hook.handler();
        this.logger.debug(`Shutdown hook completed: ${hook.name}`);
      } catch (error) {
        // Remaining hooks still run
        this.logger.error(`Shutdown hook failed: ${hook.name}`, toError(error));
      }
    }
  }

  /**
   * Setup signal handlers for graceful shutdown
   */
  private setupSignalHandlers(): void {
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

    signals.forEach((signal) => {
      process.on(signal, () => {
        void this.shutdown(signal);
      });
    });

    process.on('uncaughtException', (error: Error) => {
      this.logger.error('Uncaught exception', error);
      void this.shutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason: unknown) => {
      this.logger.error('Unhandled rejection', toError(reason));
      void this.shutdown('unhandledRejection');
    });
  }

  /**
   * Check if shutdown is in progress
   */
  isShuttingDownStatus(): boolean {
    return this.isShuttingDown;
  }
}
