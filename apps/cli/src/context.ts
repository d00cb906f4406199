/**
 * Wiring shared by the CLI commands: configuration, store, rules and the sync service.
 */

import { SqliteLedgerStore } from '@ledgersync/store';
import { loadRuleEvaluator, type RuleEvaluator } from '@ledgersync/categorizer';
import {
  LedgerSyncService,
  PlaidUpstreamClient,
  TransactionPipeline,
  RateLimiter,
  createPlaidClient,
  loadConfig,
  requirePlaidCredentials,
  type LedgerSyncConfig,
  type LedgerSyncConfigOverrides,
  type SyncProgressEvent,
} from '@ledgersync/plaid-bridge';
import { createConsoleLogger, type Logger, type UpstreamClient } from '@ledgersync/types';

export interface CliContext {
  config: LedgerSyncConfig;
  store: SqliteLedgerStore;
  logger: Logger;
}

export function openContext(verbose: boolean, overrides: LedgerSyncConfigOverrides = {}): CliContext {
  const logger = createConsoleLogger(verbose);
  const config = loadConfig(overrides);
  logger.debug(`Ledger file: ${config.dbFile}`);
  const store = SqliteLedgerStore.open(config.dbFile);
  return { config, store, logger };
}

function logProgress(logger: Logger): (event: SyncProgressEvent) => void {
  return (event) => {
    logger.debug(
      `[${event.itemId}] ${event.phase}: +${event.added} ~${event.modified} -${event.removed}`
    );
  };
}

function loadRules(context: CliContext): RuleEvaluator {
  const { config, logger } = context;
  if (config.rulesFile !== undefined) {
    logger.debug(`Rules script: ${config.rulesFile}`);
  }
  return loadRuleEvaluator(config.rulesFile, { timeoutMs: config.scriptTimeoutMs });
}

/**
 * Build the sync service; the upstream client defaults to the Plaid API.
 */
export function createService(context: CliContext, upstream?: UpstreamClient): LedgerSyncService {
  const { config, store, logger } = context;
  return new LedgerSyncService({
    store,
    upstream:
      upstream ??
      new PlaidUpstreamClient(createPlaidClient(requirePlaidCredentials(config)), {
        rateLimiter: new RateLimiter(),
      }),
    rules: loadRules(context),
    accountAliases: config.accountAliases,
    logger,
    onProgress: logProgress(logger),
  });
}

export function createPipeline(context: CliContext): TransactionPipeline {
  return new TransactionPipeline({
    store: context.store,
    rules: loadRules(context),
    accountAliases: context.config.accountAliases,
    logger: context.logger,
  });
}
