/**
 * Database module exports
 */
export {
  initDatabase,
  closeDatabase,
  createTables,
  ensureDatabaseExists,
  parseDatabaseUrl,
  type DatabaseOptions,
  type PageDatabase,
  type Schema,
} from './connection.js';

export * from './schema/index.js';
