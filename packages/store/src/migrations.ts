/**
 * Schema migrations for the SQLite ledger file.
 * Applied in order on open; each version runs once and is recorded in
 * `schema_migrations`.
 */

import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  sql: string;
}

/**
 * Links, accounts and the canonical transaction tables.
 */
const LINKS_SQL = `
create table if not exists plaid_links (
  id text not null primary key,
  alias text not null default '',
  access_token text not null,
  link_state text not null default 'ACTIVE'
    check (link_state in ('ACTIVE', 'REQUIRES_VERIFICATION')),
  sync_cursor text,
  institution_id text
);

create table if not exists accounts (
  id text not null primary key,
  item_id text not null references plaid_links(id) on delete cascade,
  name text not null,
  type text not null
    check (type in ('depository', 'credit', 'loan', 'investment', 'other')),
  mask text,
  currency text not null default 'USD',
  current_balance text,
  available_balance text
);

create index if not exists idx_accounts_item on accounts(item_id);
`;

const TRANSACTIONS_SQL = `
create table if not exists transactions (
  id text not null primary key,
  date text not null,
  narration text not null,
  payee text,
  merchant text,
  category text,
  account_id text not null,
  amount text not null,
  currency text not null,
  source text not null,
  status text not null check (status in ('PENDING', 'POSTED'))
);

create table if not exists int_transactions_links (
  item_id text not null,
  txn_id text not null references transactions(id),
  plaid_txn_id text not null
);

create unique index if not exists idx_txn_links_upstream on int_transactions_links(item_id, plaid_txn_id);
create index if not exists idx_txn_links_txn on int_transactions_links(txn_id);
create index if not exists idx_transactions_date on transactions(date);
`;

const POSTINGS_SQL = `
create table if not exists postings (
  id text not null primary key,
  txn_id text not null references transactions(id),
  account text not null,
  amount text not null,
  currency text not null,
  status text not null check (status in ('PENDING', 'POSTED'))
);

create table if not exists tags (
  id text not null primary key,
  txn_id text not null references transactions(id),
  value text not null
);

create index if not exists idx_postings_txn on postings(txn_id);
create index if not exists idx_tags_txn on tags(txn_id);
`;

export const MIGRATIONS: readonly Migration[] = [
  { version: 1, name: 'links', sql: LINKS_SQL },
  { version: 2, name: 'canonical_transactions', sql: TRANSACTIONS_SQL },
  { version: 3, name: 'postings', sql: POSTINGS_SQL },
];

export interface MigrationResult {
  applied: number[];
  currentVersion: number;
}

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    create table if not exists schema_migrations (
      version integer not null primary key,
      name text not null,
      applied_at text not null
    )
  `);
}

export function getCurrentVersion(db: Database.Database): number {
  ensureMigrationsTable(db);
  const row = db
    .prepare<[], { version: number | null }>('select max(version) as version from schema_migrations')
    .get();
  return row?.version ?? 0;
}

export function needsMigration(db: Database.Database, migrations: readonly Migration[] = MIGRATIONS): boolean {
  const latest = migrations.reduce((max, m) => Math.max(max, m.version), 0);
  return getCurrentVersion(db) < latest;
}

/**
 * Apply every pending migration inside one transaction.
 */
export function runMigrations(db: Database.Database, migrations: readonly Migration[] = MIGRATIONS): MigrationResult {
  const current = getCurrentVersion(db);
  const pending = [...migrations]
    .filter((m) => m.version > current)
    .sort((a, b) => a.version - b.version);

  const record = db.prepare<[number, string, string]>(
    'insert into schema_migrations (version, name, applied_at) values (?, ?, ?)'
  );

  db.transaction(() => {
    for (const migration of pending) {
      db.exec(migration.sql);
      record.run(migration.version, migration.name, new Date().toISOString());
    }
  })();

  const applied = pending.map((m) => m.version);
  return {
    applied,
    currentVersion: applied.length > 0 ? Math.max(...applied) : current,
  };
}

/**
 * Full schema as one script, for `ledgersync migrate --print` style inspection.
 */
export function getMigrationSQL(): string {
  return MIGRATIONS.map((m) => `-- ${m.version}: ${m.name}\n${m.sql.trim()}\n`).join('\n');
}
