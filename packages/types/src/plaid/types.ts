/**
 * Upstream (Plaid) record types.
 * These mirror the /transactions/sync and /accounts/get payloads after the
 * snake_case → camelCase mapping done in plaid-bridge.
 */

import { z } from 'zod';

export type PlaidEnvironment = 'sandbox' | 'production';

export interface PlaidConfig {
  clientId: string;
  secret: string;
  env: PlaidEnvironment;
}

export interface PlaidAccount {
  accountId: string;
  itemId: string;
  name: string;
  officialName?: string;
  type: string;
  subtype?: string;
  mask?: string;
  balances: {
    available?: number;
    current?: number;
    limit?: number;
    isoCurrencyCode?: string;
    unofficialCurrencyCode?: string;
  };
}

/**
 * Stored as the transaction's `source` and parsed back when rules are replayed.
 */
export const PlaidTransactionSchema = z.object({
  transactionId: z.string().min(1),
  accountId: z.string().min(1),
  /** Plaid convention: positive when money moves out of the account. */
  amount: z.number(),
  isoCurrencyCode: z.string().optional(),
  unofficialCurrencyCode: z.string().optional(),
  date: z.string(),
  authorizedDate: z.string().optional(),
  name: z.string(),
  merchantName: z.string().optional(),
  paymentChannel: z.string(),
  pending: z.boolean(),
  pendingTransactionId: z.string().optional(),
  category: z.array(z.string()).optional(),
  personalFinanceCategory: z
    .object({
      primary: z.string(),
      detailed: z.string(),
      confidenceLevel: z.string().optional(),
    })
    .optional(),
  paymentMeta: z
    .object({
      referenceNumber: z.string().optional(),
      payee: z.string().optional(),
      payer: z.string().optional(),
      paymentMethod: z.string().optional(),
      paymentProcessor: z.string().optional(),
    })
    .optional(),
  checkNumber: z.string().optional(),
});
export type PlaidTransaction = z.infer<typeof PlaidTransactionSchema>;

export interface RemovedTransaction {
  transactionId: string;
}

/** One page of a cursor-based delta fetch. */
export interface DeltaPage {
  added: PlaidTransaction[];
  modified: PlaidTransaction[];
  removed: RemovedTransaction[];
  nextCursor: string;
  hasMore: boolean;
}

/** Error body returned by the Plaid API, camel-cased. */
export interface PlaidError {
  errorType: string;
  errorCode: string;
  errorMessage: string;
  displayMessage?: string;
  requestId?: string;
  status?: number;
}
