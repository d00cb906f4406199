/**
 * LedgerStore interface. It lives in @ledgersync/types so plaid-bridge can depend
 * on the contract without importing the SQLite implementation.
 *
 * Every method may be called inside `transaction(fn)`; writes made there are
 * committed together when `fn` returns and rolled back together when it throws.
 */

import type { Account, Link, LinkState, Posting, Tag, Transaction } from '../schemas/index.js';

export interface TransactionQuery {
  itemId?: string;
  since?: string;
  until?: string;
}

export interface LedgerStore {
  transaction<T>(fn: () => T): T;

  upsertLink(link: Link): void;
  getLink(itemId: string): Link | null;
  listLinks(): Link[];
  deleteLink(itemId: string): Link | null;
  setLinkState(itemId: string, state: LinkState): void;
  getCursor(itemId: string): string | null;
  setCursor(itemId: string, cursor: string | null): void;

  upsertAccount(account: Account): void;
  getAccount(id: string): Account | null;
  listAccounts(itemId?: string): Account[];

  upsertTransaction(txn: Transaction, postings: Posting[], tags: Tag[]): void;
  deleteTransaction(id: string): boolean;
  findTransactionIdByUpstreamId(itemId: string, upstreamId: string): string | null;
  getTransaction(id: string): Transaction | null;
  listTransactions(query?: TransactionQuery): Transaction[];
  getPostings(txnId: string): Posting[];
  getTags(txnId: string): Tag[];
}
