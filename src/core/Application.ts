/**
 * Main Application Orchestrator
 * Coordinates startup, shutdown, and service lifecycle
 */
import { logger, symbols } from './Logger.js';
import { eventBus, EventTypes } from './EventBus.js';
import { ConfigManager, getConfig } from '../config/ConfigManager.js';
import { initDatabase, closeDatabase, ensureDatabaseExists } from '../database/connection.js';
import { DrizzlePageRepository } from '../repositories/PageRepository.js';
import { WikiRacer } from '../services/WikiRacer.js';
import { WikipediaClient } from '../wiki/WikipediaClient.js';

export const VERSION = '1.0.0';

export interface ApplicationOptions {
  /** Skip CREATE DATABASE when the database is provisioned elsewhere */
  skipDatabaseCreation?: boolean;
  searchDepth?: number;
}

export class Application {
  private config: ConfigManager;
  private isRunning: boolean = false;
  private shutdownPromise: Promise<void> | null = null;
  private client: WikipediaClient | null = null;
  private racer: WikiRacer | null = null;
  private signalHandlers: Array<[NodeJS.Signals, () => void]> = [];

  constructor(private options: ApplicationOptions = {}) {
    this.config = getConfig();
    if (options.searchDepth !== undefined) {
      this.config.withSearchDepth(options.searchDepth);
    }
  }

  /**
   * MediaWiki client; available without a database connection
   */
  get wikipedia(): WikipediaClient {
    if (!this.client) {
      this.client = new WikipediaClient(this.config.wiki);
    }
    return this.client;
  }

  /**
   * Connect the page cache and build the racer
   */
  async start(): Promise<WikiRacer> {
    if (this.isRunning && this.racer) {
      logger.warn('Application already running');
      return this.racer;
    }

    const { url, verbose } = this.config.database;

    try {
      if (!this.options.skipDatabaseCreation) {
        await ensureDatabaseExists(url);
      }

      const db = await initDatabase({ url, verbose });
      this.racer = new WikiRacer(this.wikipedia, new DrizzlePageRepository(db), this.config.race);

      this.setupShutdownHandlers();
      this.isRunning = true;

      eventBus.publish(EventTypes.SYSTEM_STARTED, { version: VERSION });
      logger.debug(`${symbols.startup} wikiracer started`);
      return this.racer;
    } catch (error) {
      logger.error({ error }, 'Failed to start application');
      await closeDatabase();
      throw error;
    }
  }

  /**
   * Setup graceful shutdown handlers
   */
  private setupShutdownHandlers(): void {
    const shutdown = async (signal: string): Promise<void> => {
      if (this.shutdownPromise) {
        return this.shutdownPromise;
      }

      logger.info({ signal }, 'Shutdown signal received');
      this.shutdownPromise = this.shutdown(signal);
      await this.shutdownPromise;
      process.exit(130);
    };

    const onSignal = (signal: string): void => {
      shutdown(signal).catch((error: unknown) => {
        logger.fatal({ error }, 'Shutdown failed');
        process.exit(1);
      });
    };

    for (const signal of ['SIGTERM', 'SIGINT'] as const) {
      const handler = (): void => onSignal(signal);
      process.once(signal, handler);
      this.signalHandlers.push([signal, handler]);
    }
  }

  private removeShutdownHandlers(): void {
    for (const [signal, handler] of this.signalHandlers) {
      process.off(signal, handler);
    }
    this.signalHandlers = [];
  }

  /**
   * Shutdown the application
   */
  async shutdown(reason: string = 'manual'): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    eventBus.publish(EventTypes.SYSTEM_SHUTDOWN, { reason });
    this.removeShutdownHandlers();

    try {
      await closeDatabase();
      this.racer = null;
      this.isRunning = false;
      logger.debug({ reason }, 'wikiracer shutdown complete');
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      throw error;
    }
  }
}

export function createApplication(options?: ApplicationOptions): Application {
  return new Application(options);
}
