/**
 * @ledgersync/store: SQLite persistence layer.
 */

// Client
export {
  openLedgerDatabase,
  MEMORY_DATABASE,
  type DatabaseOptions,
  type Database,
} from './client.js';

// Store
export { SqliteLedgerStore } from './ledger-store.js';

// Row types
export type {
  LinkRow,
  AccountRow,
  TransactionRow,
  LinkedTransactionRow,
  PostingRow,
  TagRow,
} from './types.js';

// Migration functions
export {
  MIGRATIONS,
  getCurrentVersion,
  needsMigration,
  runMigrations,
  getMigrationSQL,
  type Migration,
  type MigrationResult,
} from './migrations.js';
