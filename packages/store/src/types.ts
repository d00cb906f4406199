/**
 * Row shapes of the ledger schema (see migrations.ts) and their mapping to
 * the domain types in @ledgersync/types.
 */

import {
  AccountTypeSchema,
  LinkStateSchema,
  TransactionStatusSchema,
  type Account,
  type Link,
  type Posting,
  type Tag,
  type Transaction,
} from '@ledgersync/types';

export interface LinkRow {
  id: string;
  alias: string;
  access_token: string;
  link_state: string;
  sync_cursor: string | null;
  institution_id: string | null;
}

export interface AccountRow {
  id: string;
  item_id: string;
  name: string;
  type: string;
  mask: string | null;
  currency: string;
  current_balance: string | null;
  available_balance: string | null;
}

export interface TransactionRow {
  id: string;
  date: string;
  narration: string;
  payee: string | null;
  merchant: string | null;
  category: string | null;
  account_id: string;
  amount: string;
  currency: string;
  source: string;
  status: string;
}

/** Transaction row joined with its link association. */
export interface LinkedTransactionRow extends TransactionRow {
  item_id: string;
  plaid_txn_id: string;
}

export interface PostingRow {
  id: string;
  txn_id: string;
  account: string;
  amount: string;
  currency: string;
  status: string;
}

export interface TagRow {
  id: string;
  txn_id: string;
  value: string;
}

export function rowToLink(row: LinkRow): Link {
  return {
    itemId: row.id,
    alias: row.alias,
    accessToken: row.access_token,
    state: LinkStateSchema.parse(row.link_state),
    syncCursor: row.sync_cursor,
    institutionId: row.institution_id,
  };
}

export function linkToRow(link: Link): LinkRow {
  return {
    id: link.itemId,
    alias: link.alias,
    access_token: link.accessToken,
    link_state: link.state,
    sync_cursor: link.syncCursor,
    institution_id: link.institutionId,
  };
}

export function rowToAccount(row: AccountRow): Account {
  return {
    id: row.id,
    itemId: row.item_id,
    name: row.name,
    type: AccountTypeSchema.parse(row.type),
    mask: row.mask,
    currency: row.currency,
    currentBalance: row.current_balance,
    availableBalance: row.available_balance,
  };
}

export function accountToRow(account: Account): AccountRow {
  return {
    id: account.id,
    item_id: account.itemId,
    name: account.name,
    type: account.type,
    mask: account.mask,
    currency: account.currency,
    current_balance: account.currentBalance,
    available_balance: account.availableBalance,
  };
}

export function rowToTransaction(row: LinkedTransactionRow): Transaction {
  return {
    id: row.id,
    upstreamId: row.plaid_txn_id,
    itemId: row.item_id,
    accountId: row.account_id,
    date: row.date,
    narration: row.narration,
    payee: row.payee,
    merchant: row.merchant,
    category: row.category,
    amount: row.amount,
    currency: row.currency,
    source: row.source,
    status: TransactionStatusSchema.parse(row.status),
  };
}

export function transactionToRow(txn: Transaction): TransactionRow {
  return {
    id: txn.id,
    date: txn.date,
    narration: txn.narration,
    payee: txn.payee,
    merchant: txn.merchant,
    category: txn.category,
    account_id: txn.accountId,
    amount: txn.amount,
    currency: txn.currency,
    source: txn.source,
    status: txn.status,
  };
}

export function rowToPosting(row: PostingRow): Posting {
  return {
    id: row.id,
    txnId: row.txn_id,
    account: row.account,
    amount: row.amount,
    currency: row.currency,
    status: TransactionStatusSchema.parse(row.status),
  };
}

export function rowToTag(row: TagRow): Tag {
  return {
    id: row.id,
    txnId: row.txn_id,
    value: row.value,
  };
}
