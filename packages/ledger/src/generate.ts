import { Decimal } from 'decimal.js';
import {
  UNKNOWN_ACCOUNT,
  computePostingId,
  computeTagId,
  negateAmount,
  toAmount,
  type CategorizationDirective,
  type Posting,
  type Tag,
  type Transaction,
} from '@ledgersync/types';

export interface GeneratedEntry {
  postings: Posting[];
  tags: Tag[];
  /** Narration to persist: the directive alias when one was given, else the original. */
  narration: string;
}

/**
 * Build the double-entry postings for one transaction.
 *
 * Leg 0 is the target (first directive's account, or Expenses:Unknown) and
 * carries the negated amount; leg 1 is the origin account and carries the
 * transaction amount as is. Only the first directive is used.
 */
export function generatePostings(
  txn: Transaction,
  directives: readonly CategorizationDirective[],
  originAccount: string
): GeneratedEntry {
  const directive = directives.length > 0 ? directives[0] : undefined;

  const postings: Posting[] = [
    {
      id: computePostingId(txn.id, 0),
      txnId: txn.id,
      account: directive?.account ?? UNKNOWN_ACCOUNT,
      amount: negateAmount(txn.amount),
      currency: txn.currency,
      status: txn.status,
    },
    {
      id: computePostingId(txn.id, 1),
      txnId: txn.id,
      account: originAccount,
      amount: toAmount(txn.amount),
      currency: txn.currency,
      status: txn.status,
    },
  ];

  const values = [...new Set(directive?.tags ?? [])];
  const tags: Tag[] = values.map((value) => ({ id: computeTagId(txn.id, value), txnId: txn.id, value }));

  return {
    postings,
    tags,
    narration: directive?.alias ?? txn.narration,
  };
}

/**
 * True when postings sum to zero in every currency they use.
 */
export function isBalanced(postings: readonly Posting[]): boolean {
  const totals = new Map<string, Decimal>();
  for (const posting of postings) {
    totals.set(posting.currency, (totals.get(posting.currency) ?? new Decimal(0)).plus(posting.amount));
  }
  return [...totals.values()].every((total) => total.isZero());
}
