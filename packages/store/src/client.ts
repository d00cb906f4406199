/**
 * SQLite connection setup for the local ledger file.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { runMigrations } from './migrations.js';

export interface DatabaseOptions {
  /** Milliseconds to wait on a lock held by another writer process. */
  busyTimeoutMs?: number;
  /** Skip running migrations on open. */
  skipMigrations?: boolean;
}

export const MEMORY_DATABASE = ':memory:';

/**
 * Open (creating when missing) the ledger database and bring its schema up to date.
 */
export function openLedgerDatabase(filePath: string, options: DatabaseOptions = {}): Database.Database {
  if (filePath !== MEMORY_DATABASE) {
    mkdirSync(dirname(filePath), { recursive: true });
  }

  const db = new Database(filePath);
  db.pragma('foreign_keys = ON');
  db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);
  if (filePath !== MEMORY_DATABASE) {
    db.pragma('journal_mode = WAL');
  }

  if (options.skipMigrations !== true) {
    runMigrations(db);
  }

  return db;
}

export type { Database };
