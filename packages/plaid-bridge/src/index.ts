/**
 * Plaid integration module.
 * Upstream client, normalization and the ledger sync service.
 */

// Client
export { createPlaidClient, type PlaidApi } from './client.js';

// Configuration
export {
  loadConfig,
  requirePlaidCredentials,
  DEFAULT_DB_FILE,
  type LedgerSyncConfig,
  type LedgerSyncConfigOverrides,
} from './config.js';

// Upstream
export {
  PlaidUpstreamClient,
  classifyPlaidError,
  extractPlaidError,
  type PlaidUpstreamOptions,
} from './upstream.js';
export { mapPlaidTransaction, mapPlaidAccount, mapRemovedTransactions } from './transactions.js';

// Normalizer
export { normalizeTransaction, normalizeAccount, mapAccountType, type NormalizeContext } from './normalizer.js';

// Pipeline
export {
  TransactionPipeline,
  type PipelineConfig,
  type PreparedEntry,
  type CategorizationFailure,
  type RecategorizeOptions,
  type RecategorizeReport,
} from './pipeline.js';

// Retry
export { withRetry, calculateDelay, isRetryableError, RateLimiter, type RetryOptions } from './retry.js';

// Sync
export {
  LedgerSyncService,
  createSyncService,
  MAX_PAGINATION_RESTARTS,
  type SyncServiceConfig,
  type SyncPhase,
  type SyncProgressEvent,
  type SyncStatus,
  type SyncReport,
  type SyncOptions,
  type BalanceRefresh,
} from './sync-service.js';
