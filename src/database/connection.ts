/**
 * Database connection management
 */
import pg from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { sql } from 'drizzle-orm';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { createChildLogger, symbols } from '../core/Logger.js';
import { MAX_TITLE_LENGTH } from '../wiki/titles.js';
import * as schema from './schema/index.js';

const logger = createChildLogger({ service: 'Database' });

export type Schema = typeof schema;

/**
 * Any drizzle Postgres database over this schema:
 * node-postgres in production, PGlite in tests
 */
export type PageDatabase<TQueryResult extends PgQueryResultHKT = PgQueryResultHKT> = PgDatabase<TQueryResult, Schema>;

let db: NodePgDatabase<Schema> | null = null;
let pool: pg.Pool | null = null;

export interface DatabaseOptions {
  url: string;
  createTables?: boolean;
  verbose?: boolean;
}

const TABLE_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS wikipage (
    id SERIAL PRIMARY KEY,
    title VARCHAR(${MAX_TITLE_LENGTH}) NOT NULL UNIQUE,
    links TEXT[] NOT NULL DEFAULT '{}'::text[],
    backlinks TEXT[] NOT NULL DEFAULT '{}'::text[]
  )`,
  `CREATE INDEX IF NOT EXISTS ix_wikipage_title ON wikipage (title)`,
  `CREATE TABLE IF NOT EXISTS descendances (
    parent_page_id INTEGER NOT NULL REFERENCES wikipage(id) ON DELETE CASCADE,
    child_page_id INTEGER NOT NULL REFERENCES wikipage(id) ON DELETE CASCADE,
    PRIMARY KEY (parent_page_id, child_page_id)
  )`,
];

/**
 * Split a connection URL into the database name and a URL for the
 * server's maintenance database
 */
export function parseDatabaseUrl(url: string): { databaseName: string; maintenanceUrl: string } {
  const target = new URL(url);
  const databaseName = decodeURIComponent(target.pathname.replace(/^\//, ''));
  if (!databaseName) {
    throw new Error(`Database URL has no database name: ${target.host}`);
  }

  const maintenance = new URL(url);
  maintenance.pathname = '/postgres';
  return { databaseName, maintenanceUrl: maintenance.toString() };
}

/**
 * Create the target database if the server does not have it yet
 */
export async function ensureDatabaseExists(url: string): Promise<boolean> {
  const { databaseName, maintenanceUrl } = parseDatabaseUrl(url);
  const client = new pg.Client({ connectionString: maintenanceUrl });

  await client.connect();
  try {
    const result = await client.query<{ exists: boolean }>(
      'SELECT EXISTS (SELECT 1 FROM pg_database WHERE datname = $1) AS "exists"',
      [databaseName]
    );
    if (result.rows[0]?.exists) {
      return false;
    }

    await client.query(`CREATE DATABASE ${client.escapeIdentifier(databaseName)}`);
    logger.info({ database: databaseName }, 'Created database');
    return true;
  } finally {
    await client.end();
  }
}

/**
 * Create tables directly; existing data is preserved.
 * Statements run one at a time since PGlite rejects multi-statement queries.
 */
export async function createTables<TQueryResult extends PgQueryResultHKT>(
  database: PageDatabase<TQueryResult>
): Promise<void> {
  for (const statement of TABLE_STATEMENTS) {
    await database.execute(sql.raw(statement));
  }
  logger.debug('Database tables ready');
}

/**
 * Initialize the database connection
 */
export async function initDatabase(options: DatabaseOptions): Promise<NodePgDatabase<Schema>> {
  const { url, createTables: shouldCreateTables = true, verbose = false } = options;

  if (db) {
    logger.warn('Database already initialized');
    return db;
  }

  pool = new pg.Pool({ connectionString: url });
  pool.on('error', (error) => {
    logger.error({ error }, 'Idle database client error');
  });

  db = drizzle(pool, {
    schema,
    logger: verbose
      ? {
          logQuery: (query: string, params: unknown[]) => {
            logger.trace({ sql: query, params }, 'SQL');
          },
        }
      : false,
  });

  try {
    if (shouldCreateTables) {
      await createTables(db);
    }
  } catch (error) {
    logger.error({ error }, 'Failed to create database tables');
    await closeDatabase();
    throw error;
  }

  logger.info({ host: new URL(url).host }, `${symbols.database} Database connection established`);
  return db;
}

/**
 * Close the database connection
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    const closing = pool;
    pool = null;
    db = null;
    await closing.end();
    logger.info('Database connection closed');
  }
}
