import type { Transaction } from '@ledgersync/types';

export interface EvaluationContext {
  /** Display name of the origin account, when known. */
  accountName?: string | null;
}

/**
 * Read-only view of a transaction as seen by rules scripts.
 * `amount` is a number here for convenient comparisons; the ledger keeps the decimal string.
 */
export interface ScriptTransactionView {
  id: string;
  date: string;
  narration: string;
  payee: string | null;
  merchant: string | null;
  category: string | null;
  amount: number;
  currency: string;
  account: string;
  accountName: string | null;
  status: Transaction['status'];
}

export function toScriptView(txn: Transaction, context: EvaluationContext = {}): ScriptTransactionView {
  return {
    id: txn.id,
    date: txn.date,
    narration: txn.narration,
    payee: txn.payee,
    merchant: txn.merchant,
    category: txn.category,
    amount: Number(txn.amount),
    currency: txn.currency,
    account: txn.accountId,
    accountName: context.accountName ?? null,
    status: txn.status,
  };
}
