export type {
  PlaidEnvironment,
  PlaidConfig,
  PlaidAccount,
  PlaidTransaction,
  RemovedTransaction,
  DeltaPage,
  PlaidError,
} from './types.js';
export { PlaidTransactionSchema } from './types.js';
export type { LedgerStore, TransactionQuery } from './store-interface.js';
export type { UpstreamClient } from './upstream-interface.js';
