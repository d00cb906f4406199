/**
 * SQLite-backed LedgerStore.
 *
 * better-sqlite3 runs statements synchronously, so a `transaction(fn)` call
 * cannot interleave with another write in the same process. Writers in other
 * processes wait on SQLite's file lock (busy_timeout).
 */

import Database from 'better-sqlite3';
import {
  PersistenceError,
  type Account,
  type LedgerStore,
  type Link,
  type LinkState,
  type Posting,
  type Tag,
  type Transaction,
  type TransactionQuery,
} from '@ledgersync/types';
import { MEMORY_DATABASE, openLedgerDatabase, type DatabaseOptions } from './client.js';
import {
  accountToRow,
  linkToRow,
  rowToAccount,
  rowToLink,
  rowToPosting,
  rowToTag,
  rowToTransaction,
  transactionToRow,
  type AccountRow,
  type LinkRow,
  type LinkedTransactionRow,
  type PostingRow,
  type TagRow,
  type TransactionRow,
} from './types.js';

const LINK_COLUMNS = 'id, alias, access_token, link_state, sync_cursor, institution_id';

const LINKED_TRANSACTION_SELECT = `
  select t.id, t.date, t.narration, t.payee, t.merchant, t.category, t.account_id,
         t.amount, t.currency, t.source, t.status, l.item_id, l.plaid_txn_id
  from transactions t
  join int_transactions_links l on l.txn_id = t.id
`;

export class SqliteLedgerStore implements LedgerStore {
  constructor(readonly db: Database.Database) {}

  /**
   * Open a store on a file path (or `:memory:`), running migrations.
   */
  static open(filePath: string = MEMORY_DATABASE, options?: DatabaseOptions): SqliteLedgerStore {
    return new SqliteLedgerStore(openLedgerDatabase(filePath, options));
  }

  transaction<T>(fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (err) {
      if (err instanceof Database.SqliteError) {
        throw new PersistenceError(`Ledger write failed: ${err.message}`, { cause: err });
      }
      throw err;
    }
  }

  close(): void {
    this.db.close();
  }

  // Links

  upsertLink(link: Link): void {
    this.db
      .prepare<LinkRow>(
        `insert into plaid_links (${LINK_COLUMNS})
         values (@id, @alias, @access_token, @link_state, @sync_cursor, @institution_id)
         on conflict(id) do update set
           alias = excluded.alias,
           access_token = excluded.access_token,
           link_state = excluded.link_state,
           sync_cursor = excluded.sync_cursor,
           institution_id = excluded.institution_id`
      )
      .run(linkToRow(link));
  }

  getLink(itemId: string): Link | null {
    const row = this.db
      .prepare<[string], LinkRow>(`select ${LINK_COLUMNS} from plaid_links where id = ?`)
      .get(itemId);
    return row === undefined ? null : rowToLink(row);
  }

  listLinks(): Link[] {
    return this.db
      .prepare<[], LinkRow>(`select ${LINK_COLUMNS} from plaid_links order by id`)
      .all()
      .map(rowToLink);
  }

  /**
   * Delete a link and, through the foreign key cascade, its accounts.
   * Transactions and their link associations are kept.
   */
  deleteLink(itemId: string): Link | null {
    return this.transaction(() => {
      const link = this.getLink(itemId);
      if (link === null) {
        return null;
      }
      this.db.prepare<[string]>('delete from plaid_links where id = ?').run(itemId);
      return link;
    });
  }

  setLinkState(itemId: string, state: LinkState): void {
    this.db
      .prepare<[string, string]>('update plaid_links set link_state = ? where id = ?')
      .run(state, itemId);
  }

  getCursor(itemId: string): string | null {
    const row = this.db
      .prepare<[string], { sync_cursor: string | null }>('select sync_cursor from plaid_links where id = ?')
      .get(itemId);
    return row?.sync_cursor ?? null;
  }

  setCursor(itemId: string, cursor: string | null): void {
    const result = this.db
      .prepare<[string | null, string]>('update plaid_links set sync_cursor = ? where id = ?')
      .run(cursor, itemId);
    if (result.changes === 0) {
      throw new PersistenceError(`Cannot store cursor: link not found: ${itemId}`);
    }
  }

  // Accounts

  upsertAccount(account: Account): void {
    this.db
      .prepare<AccountRow>(
        `insert into accounts (id, item_id, name, type, mask, currency, current_balance, available_balance)
         values (@id, @item_id, @name, @type, @mask, @currency, @current_balance, @available_balance)
         on conflict(id) do update set
           item_id = excluded.item_id,
           name = excluded.name,
           type = excluded.type,
           mask = excluded.mask,
           currency = excluded.currency,
           current_balance = excluded.current_balance,
           available_balance = excluded.available_balance`
      )
      .run(accountToRow(account));
  }

  getAccount(id: string): Account | null {
    const row = this.db.prepare<[string], AccountRow>('select * from accounts where id = ?').get(id);
    return row === undefined ? null : rowToAccount(row);
  }

  listAccounts(itemId?: string): Account[] {
    const rows =
      itemId === undefined
        ? this.db.prepare<[], AccountRow>('select * from accounts order by item_id, name').all()
        : this.db
            .prepare<[string], AccountRow>('select * from accounts where item_id = ? order by name')
            .all(itemId);
    return rows.map(rowToAccount);
  }

  // Transactions

  /**
   * Insert or replace a transaction together with its postings, tags and link
   * association. Existing postings and tags for the id are removed first, so
   * re-applying the same record never duplicates rows.
   */
  upsertTransaction(txn: Transaction, postings: Posting[], tags: Tag[]): void {
    this.transaction(() => {
      this.db
        .prepare<TransactionRow>(
          `insert into transactions
             (id, date, narration, payee, merchant, category, account_id, amount, currency, source, status)
           values
             (@id, @date, @narration, @payee, @merchant, @category, @account_id, @amount, @currency, @source, @status)
           on conflict(id) do update set
             date = excluded.date,
             narration = excluded.narration,
             payee = excluded.payee,
             merchant = excluded.merchant,
             category = excluded.category,
             account_id = excluded.account_id,
             amount = excluded.amount,
             currency = excluded.currency,
             source = excluded.source,
             status = excluded.status`
        )
        .run(transactionToRow(txn));

      this.clearChildren(txn.id);

      this.db
        .prepare<[string, string, string]>(
          'insert into int_transactions_links (item_id, txn_id, plaid_txn_id) values (?, ?, ?)'
        )
        .run(txn.itemId, txn.id, txn.upstreamId);

      const insertPosting = this.db.prepare<PostingRow>(
        `insert into postings (id, txn_id, account, amount, currency, status)
         values (@id, @txn_id, @account, @amount, @currency, @status)`
      );
      for (const posting of postings) {
        insertPosting.run({
          id: posting.id,
          txn_id: posting.txnId,
          account: posting.account,
          amount: posting.amount,
          currency: posting.currency,
          status: posting.status,
        });
      }

      const insertTag = this.db.prepare<TagRow>(
        'insert into tags (id, txn_id, value) values (@id, @txn_id, @value)'
      );
      for (const tag of tags) {
        insertTag.run({ id: tag.id, txn_id: tag.txnId, value: tag.value });
      }
    });
  }

  /**
   * Remove a transaction with its postings, tags and association.
   * Accounts and links are never touched.
   */
  deleteTransaction(id: string): boolean {
    return this.transaction(() => {
      this.clearChildren(id);
      const result = this.db.prepare<[string]>('delete from transactions where id = ?').run(id);
      return result.changes > 0;
    });
  }

  findTransactionIdByUpstreamId(itemId: string, upstreamId: string): string | null {
    const row = this.db
      .prepare<[string, string], { txn_id: string }>(
        'select txn_id from int_transactions_links where item_id = ? and plaid_txn_id = ?'
      )
      .get(itemId, upstreamId);
    return row?.txn_id ?? null;
  }

  getTransaction(id: string): Transaction | null {
    const row = this.db
      .prepare<[string], LinkedTransactionRow>(`${LINKED_TRANSACTION_SELECT} where t.id = ?`)
      .get(id);
    return row === undefined ? null : rowToTransaction(row);
  }

  listTransactions(query: TransactionQuery = {}): Transaction[] {
    const clauses: string[] = [];
    const params: string[] = [];

    if (query.itemId !== undefined) {
      clauses.push('l.item_id = ?');
      params.push(query.itemId);
    }
    if (query.since !== undefined) {
      clauses.push('t.date >= ?');
      params.push(query.since);
    }
    if (query.until !== undefined) {
      clauses.push('t.date <= ?');
      params.push(query.until);
    }

    const where = clauses.length > 0 ? `where ${clauses.join(' and ')}` : '';
    return this.db
      .prepare<string[], LinkedTransactionRow>(`${LINKED_TRANSACTION_SELECT} ${where} order by t.date, t.id`)
      .all(...params)
      .map(rowToTransaction);
  }

  getPostings(txnId: string): Posting[] {
    return this.db
      .prepare<[string], PostingRow>('select * from postings where txn_id = ? order by rowid')
      .all(txnId)
      .map(rowToPosting);
  }

  getTags(txnId: string): Tag[] {
    return this.db
      .prepare<[string], TagRow>('select * from tags where txn_id = ? order by value')
      .all(txnId)
      .map(rowToTag);
  }

  private clearChildren(txnId: string): void {
    this.db.prepare<[string]>('delete from postings where txn_id = ?').run(txnId);
    this.db.prepare<[string]>('delete from tags where txn_id = ?').run(txnId);
    this.db.prepare<[string]>('delete from int_transactions_links where txn_id = ?').run(txnId);
  }
}
