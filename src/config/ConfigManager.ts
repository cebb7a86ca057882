/**
 * Configuration Manager
 * Centralized configuration loading and validation
 */
import type { z } from 'zod';
import { logger, setLogLevel } from '../core/Logger.js';
import { ConfigError } from '../core/errors.js';
import {
  appConfigSchema,
  databaseConfigSchema,
  wikiConfigSchema,
  raceConfigSchema,
  type AppConfig,
  type DatabaseConfig,
  type WikiConfig,
  type RaceConfig,
} from './schema.js';

/**
 * Read environment variable with optional default
 */
function getEnv(key: string, defaultValue?: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

/**
 * Read environment variable as integer
 */
function getEnvInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Read environment variable as boolean
 */
function getEnvBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

function parseSection<T extends z.ZodTypeAny>(section: string, schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ConfigError.fromZod(section, result.error);
  }
  return result.data;
}

export class ConfigManager {
  private _app: AppConfig;
  private _database: DatabaseConfig;
  private _wiki: WikiConfig;
  private _race: RaceConfig;

  constructor() {
    this._app = parseSection('app', appConfigSchema, {
      logLevel: getEnv('LOG_LEVEL', 'info')?.toLowerCase(),
    });

    setLogLevel(this._app.logLevel);

    this._database = parseSection('database', databaseConfigSchema, {
      url: getEnv('DATABASE_URL'),
      verbose: getEnvBool('DATABASE_LOG', false),
    });

    this._wiki = parseSection('wiki', wikiConfigSchema, {
      apiUrl: getEnv('WIKI_API_URL'),
      linksPerPage: getEnvInt('LINKS_PER_PAGE', 200),
      requestsPerMinute: getEnvInt('REQUESTS_PER_MINUTE', 100),
      timeoutMs: getEnvInt('REQUEST_TIMEOUT', 10000),
      userAgent: getEnv('USER_AGENT'),
    });

    this._race = parseSection('race', raceConfigSchema, {
      searchDepth: getEnvInt('SEARCH_DEPTH', 1),
      fetchBacklinks: getEnvBool('FETCH_BACKLINKS', true),
    });

    logger.debug({
      apiUrl: this._wiki.apiUrl,
      depth: this._race.searchDepth,
      logLevel: this._app.logLevel,
    }, 'Configuration loaded');
  }

  get app(): Readonly<AppConfig> {
    return this._app;
  }

  get database(): Readonly<DatabaseConfig> {
    return this._database;
  }

  get wiki(): Readonly<WikiConfig> {
    return this._wiki;
  }

  get race(): Readonly<RaceConfig> {
    return this._race;
  }

  /**
   * Override the search depth for a single run (e.g. from a CLI flag)
   */
  withSearchDepth(depth: number): void {
    this._race = parseSection('race', raceConfigSchema, { ...this._race, searchDepth: depth });
  }
}

// Singleton instance
let configInstance: ConfigManager | null = null;

export function getConfig(): ConfigManager {
  if (!configInstance) {
    configInstance = new ConfigManager();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
