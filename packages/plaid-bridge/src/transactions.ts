/**
 * Mapping from Plaid SDK payloads (snake_case) to the camelCase upstream
 * records in @ledgersync/types.
 */

import type {
  AccountBase,
  RemovedTransaction as SdkRemovedTransaction,
  Transaction as SdkTransaction,
} from 'plaid';
import type { PlaidAccount, PlaidTransaction, RemovedTransaction } from '@ledgersync/types';

/** Drop null so optional fields are simply absent in the stored JSON. */
function opt<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

export function mapPlaidTransaction(tx: SdkTransaction): PlaidTransaction {
  const result: PlaidTransaction = {
    transactionId: tx.transaction_id,
    accountId: tx.account_id,
    amount: tx.amount,
    isoCurrencyCode: opt(tx.iso_currency_code),
    unofficialCurrencyCode: opt(tx.unofficial_currency_code),
    date: tx.date,
    authorizedDate: opt(tx.authorized_date),
    name: tx.name,
    merchantName: opt(tx.merchant_name),
    paymentChannel: tx.payment_channel,
    pending: tx.pending,
    pendingTransactionId: opt(tx.pending_transaction_id),
    category: opt(tx.category),
    checkNumber: opt(tx.check_number),
  };

  const pfc = tx.personal_finance_category;
  if (pfc !== null && pfc !== undefined) {
    result.personalFinanceCategory = {
      primary: pfc.primary,
      detailed: pfc.detailed,
      confidenceLevel: opt(pfc.confidence_level),
    };
  }

  const meta = tx.payment_meta;
  if (meta !== null && meta !== undefined) {
    result.paymentMeta = {
      referenceNumber: opt(meta.reference_number),
      payee: opt(meta.payee),
      payer: opt(meta.payer),
      paymentMethod: opt(meta.payment_method),
      paymentProcessor: opt(meta.payment_processor),
    };
  }

  return result;
}

export function mapRemovedTransactions(removed: readonly SdkRemovedTransaction[]): RemovedTransaction[] {
  return removed.flatMap((r) =>
    typeof r.transaction_id === 'string' && r.transaction_id !== '' ? [{ transactionId: r.transaction_id }] : []
  );
}

export function mapPlaidAccount(account: AccountBase, itemId: string): PlaidAccount {
  return {
    accountId: account.account_id,
    itemId,
    name: account.name,
    officialName: opt(account.official_name),
    type: account.type,
    subtype: opt(account.subtype),
    mask: opt(account.mask),
    balances: {
      available: opt(account.balances.available),
      current: opt(account.balances.current),
      limit: opt(account.balances.limit),
      isoCurrencyCode: opt(account.balances.iso_currency_code),
      unofficialCurrencyCode: opt(account.balances.unofficial_currency_code),
    },
  };
}
