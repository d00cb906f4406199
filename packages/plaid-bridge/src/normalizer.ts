/**
 * Plaid to canonical transformer.
 * Converts upstream records to the project's canonical Transaction and Account.
 */

import {
  AccountSchema,
  DEFAULT_CURRENCY,
  TransactionSchema,
  computeTransactionId,
  negateAmount,
  toAmount,
  type Account,
  type AccountType,
  type PlaidAccount,
  type PlaidTransaction,
  type Transaction,
} from '@ledgersync/types';

export interface NormalizeContext {
  /** Link the record was fetched through. */
  itemId: string;
}

/**
 * Map Plaid account type to our AccountType.
 */
export function mapAccountType(type: string): AccountType {
  switch (type.toLowerCase()) {
    case 'depository':
      return 'depository';
    case 'credit':
      return 'credit';
    case 'loan':
      return 'loan';
    case 'investment':
    case 'brokerage':
      return 'investment';
    default:
      return 'other';
  }
}

/**
 * Convert a Plaid transaction to the canonical Transaction.
 *
 * Plaid amounts are positive when money leaves the account; canonical amounts
 * are signed from the account's side, so the sign is flipped.
 */
export function normalizeTransaction(raw: PlaidTransaction, context: NormalizeContext): Transaction {
  return TransactionSchema.parse({
    id: computeTransactionId(context.itemId, raw.transactionId),
    upstreamId: raw.transactionId,
    itemId: context.itemId,
    accountId: raw.accountId,
    date: raw.date,
    narration: raw.name,
    payee: raw.merchantName ?? raw.paymentMeta?.payee ?? null,
    merchant: raw.merchantName ?? null,
    category: raw.personalFinanceCategory?.primary ?? raw.category?.[0] ?? null,
    amount: negateAmount(toAmount(raw.amount)),
    currency: raw.isoCurrencyCode ?? raw.unofficialCurrencyCode ?? DEFAULT_CURRENCY,
    source: JSON.stringify(raw),
    status: raw.pending ? 'PENDING' : 'POSTED',
  });
}

export function normalizeAccount(raw: PlaidAccount, context: NormalizeContext): Account {
  const { balances } = raw;
  return AccountSchema.parse({
    id: raw.accountId,
    itemId: context.itemId,
    name: raw.name,
    type: mapAccountType(raw.type),
    mask: raw.mask ?? null,
    currency: balances.isoCurrencyCode ?? balances.unofficialCurrencyCode ?? DEFAULT_CURRENCY,
    currentBalance: balances.current === undefined ? null : toAmount(balances.current),
    availableBalance: balances.available === undefined ? null : toAmount(balances.available),
  });
}
