import Database from 'better-sqlite3';
import { SCHEMA_SQL, SCHEMA_VERSION } from './schema.js';

/**
 * Bring a database up to the current schema.
 *
 * The cache database never outlives the process, so there is no incremental
 * migration path: the schema SQL is idempotent and user_version records it.
 */
export function migrateDatabase(db: Database.Database): void {
  db.exec(SCHEMA_SQL);
  db.pragma(`user_version = ${SCHEMA_VERSION}`);
}

/** Open the process-local cache database. */
export function openCacheDatabase(): Database.Database {
  const db = new Database(':memory:');
  migrateDatabase(db);
  return db;
}
