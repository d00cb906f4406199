/**
 * Ledger sync service.
 *
 * Pulls cursor-based deltas for each link, runs every record through
 * normalize → rules → postings and writes each page in one store transaction
 * together with the page's cursor. A page is either fully applied with its
 * cursor or not applied at all, so re-running a sync after any failure resumes
 * from the last committed page.
 */

import {
  CredentialInvalidError,
  PaginationRestartError,
  silentLogger,
  toError,
  type DeltaPage,
  type LedgerStore,
  type Link,
  type Logger,
  type UpstreamClient,
} from '@ledgersync/types';
import type { RuleEvaluator } from '@ledgersync/categorizer';
import type { AccountAliases } from '@ledgersync/ledger';
import { normalizeAccount } from './normalizer.js';
import {
  TransactionPipeline,
  type CategorizationFailure,
  type RecategorizeOptions,
  type RecategorizeReport,
} from './pipeline.js';
import { withRetry, type RetryOptions } from './retry.js';

/** Times one sync restarts pagination before giving up. */
export const MAX_PAGINATION_RESTARTS = 3;

export interface SyncServiceConfig {
  store: LedgerStore;
  upstream: UpstreamClient;
  rules?: RuleEvaluator;
  accountAliases?: AccountAliases;
  logger?: Logger;
  retryOptions?: RetryOptions;
  onProgress?: (event: SyncProgressEvent) => void;
}

export type SyncPhase = 'fetching' | 'importing' | 'complete' | 'error';

export interface SyncProgressEvent {
  itemId: string;
  phase: SyncPhase;
  added: number;
  modified: number;
  removed: number;
  error?: Error | undefined;
}

export type SyncStatus = 'ok' | 'requires_verification' | 'failed' | 'cancelled';

export interface SyncReport {
  itemId: string;
  status: SyncStatus;
  /** Committed counts; a page that rolled back contributes nothing. */
  added: number;
  modified: number;
  removed: number;
  pages: number;
  categorizationFailures: CategorizationFailure[];
  /** Cursor stored after the last committed page. */
  finalCursor: string | null;
  error?: Error;
  durationMs: number;
}

export interface SyncOptions {
  /**
   * Checked before each page request and during retry backoff; an aborted
   * sync stops with status `cancelled`.
   */
  signal?: AbortSignal;
}

export interface BalanceRefresh {
  itemId: string;
  /** False when the link's accounts kept the figures of an earlier fetch. */
  refreshed: boolean;
  error?: Error;
}

export class LedgerSyncService {
  private readonly store: LedgerStore;
  private readonly upstream: UpstreamClient;
  private readonly pipeline: TransactionPipeline;
  private readonly logger: Logger;
  private readonly retryOptions: RetryOptions;
  private readonly onProgress: ((event: SyncProgressEvent) => void) | undefined;

  constructor(config: SyncServiceConfig) {
    this.store = config.store;
    this.upstream = config.upstream;
    this.logger = config.logger ?? silentLogger;
    this.pipeline = new TransactionPipeline({
      store: config.store,
      rules: config.rules,
      accountAliases: config.accountAliases,
      logger: this.logger,
    });
    this.retryOptions = config.retryOptions ?? {};
    this.onProgress = config.onProgress;
  }

  /**
   * Sync one link until upstream reports no more pages.
   * Never throws; the outcome is in the report's status.
   */
  async syncLink(link: Link, options: SyncOptions = {}): Promise<SyncReport> {
    const startTime = Date.now();
    const { itemId } = link;
    const report: SyncReport = {
      itemId,
      status: 'ok',
      added: 0,
      modified: 0,
      removed: 0,
      pages: 0,
      categorizationFailures: [],
      finalCursor: this.store.getCursor(itemId),
      durationMs: 0,
    };

    try {
      if (options.signal?.aborted === true) {
        report.status = 'cancelled';
        return report;
      }

      this.emitProgress(report, 'fetching');
      await this.refreshAccounts(link, options.signal);

      const startCursor = report.finalCursor;
      let cursor = startCursor;
      let restarts = 0;
      let hasMore = true;
      while (hasMore) {
        if (options.signal?.aborted) {
          this.logger.info(`Sync of ${itemId} cancelled after ${report.pages} page(s)`);
          report.status = 'cancelled';
          break;
        }

        const pageCursor = cursor;
        let page: DeltaPage;
        try {
          page = await withRetry(() => this.upstream.fetchDelta(link.accessToken, pageCursor), {
            ...this.retryOptions,
            signal: options.signal,
            onRetry: (attempt, error, delayMs) => {
              this.logger.warn(`Retrying page for ${itemId} (attempt ${attempt}) in ${Math.round(delayMs)}ms: ${error.message}`);
              this.retryOptions.onRetry?.(attempt, error, delayMs);
            },
          });
        } catch (error) {
          if (!(error instanceof PaginationRestartError)) {
            throw error;
          }
          // Cursors handed out since the loop began are no longer valid.
          if (cursor !== startCursor) {
            this.store.setCursor(itemId, startCursor);
            cursor = startCursor;
            report.finalCursor = startCursor;
          }
          if (restarts >= MAX_PAGINATION_RESTARTS) {
            throw error;
          }
          restarts++;
          this.logger.warn(`Restarting pagination for ${itemId} (restart ${restarts}): ${error.message}`);
          continue;
        }

        this.applyPage(link, page, report);
        cursor = page.nextCursor;
        report.finalCursor = cursor;
        report.pages++;
        hasMore = page.hasMore;
        this.emitProgress(report, 'importing');
      }
    } catch (error) {
      if (options.signal?.aborted === true) {
        this.logger.info(`Sync of ${itemId} cancelled while waiting to retry`);
        report.status = 'cancelled';
        return report;
      }
      const err = toError(error);
      report.error = err;
      if (error instanceof CredentialInvalidError) {
        this.store.setLinkState(itemId, 'REQUIRES_VERIFICATION');
        report.status = 'requires_verification';
        this.logger.warn(`Link ${itemId} requires re-authentication: ${err.message}`);
      } else {
        report.status = 'failed';
        this.logger.error(`Sync of ${itemId} failed: ${err.message}`);
      }
      this.emitProgress(report, 'error', err);
    } finally {
      report.durationMs = Date.now() - startTime;
    }

    if (report.status === 'ok') {
      this.emitProgress(report, 'complete');
      this.logger.info(
        `Synced ${itemId}: ${report.added} added, ${report.modified} modified, ${report.removed} removed in ${report.pages} page(s)`
      );
    }

    return report;
  }

  /**
   * Sync every active link in turn. Links awaiting re-authentication are
   * skipped and one link's failure does not stop the others.
   */
  async syncAll(options: SyncOptions = {}): Promise<SyncReport[]> {
    const reports: SyncReport[] = [];

    for (const link of this.store.listLinks()) {
      if (link.state === 'REQUIRES_VERIFICATION') {
        this.logger.info(`Skipping ${link.itemId}: requires re-authentication`);
        continue;
      }
      reports.push(await this.syncLink(link, options));
    }

    return reports;
  }

  /**
   * Fetch current account balances for every active link without touching
   * transactions. A link that cannot be reached keeps its stored balances;
   * rejected credentials flag the link as they do during a sync.
   */
  async refreshBalances(options: SyncOptions = {}): Promise<BalanceRefresh[]> {
    const results: BalanceRefresh[] = [];

    for (const link of this.store.listLinks()) {
      if (link.state === 'REQUIRES_VERIFICATION') {
        results.push({ itemId: link.itemId, refreshed: false });
        continue;
      }
      try {
        await this.refreshAccounts(link, options.signal);
        results.push({ itemId: link.itemId, refreshed: true });
      } catch (error) {
        const err = toError(error);
        if (error instanceof CredentialInvalidError) {
          this.store.setLinkState(link.itemId, 'REQUIRES_VERIFICATION');
        }
        this.logger.warn(`Could not refresh balances of ${link.itemId}: ${err.message}`);
        results.push({ itemId: link.itemId, refreshed: false, error: err });
      }
    }

    return results;
  }

  /**
   * Replay rules over stored transactions without fetching.
   */
  recategorize(options: RecategorizeOptions = {}): RecategorizeReport {
    return this.pipeline.recategorize(options);
  }

  private async refreshAccounts(link: Link, signal: AbortSignal | undefined): Promise<void> {
    const accounts = await withRetry(() => this.upstream.fetchAccounts(link.accessToken), {
      ...this.retryOptions,
      signal,
    });
    this.store.transaction(() => {
      for (const account of accounts) {
        this.store.upsertAccount(normalizeAccount(account, { itemId: link.itemId }));
      }
    });
    this.logger.debug(`Refreshed ${accounts.length} account(s) for ${link.itemId}`);
  }

  /**
   * Compute every entry of the page first, then write them, the removals and
   * the cursor in one transaction.
   */
  private applyPage(link: Link, page: DeltaPage, report: SyncReport): void {
    const failures: CategorizationFailure[] = [];
    const entries = [...page.added, ...page.modified].map((raw) => this.pipeline.prepare(raw, link.itemId, failures));

    const removed = this.store.transaction(() => {
      for (const entry of entries) {
        this.store.upsertTransaction(entry.transaction, entry.postings, entry.tags);
      }

      let count = 0;
      for (const { transactionId } of page.removed) {
        const id = this.store.findTransactionIdByUpstreamId(link.itemId, transactionId);
        if (id === null) {
          this.logger.debug(`Removed transaction ${transactionId} was never stored`);
          continue;
        }
        if (this.store.deleteTransaction(id)) {
          count++;
        }
      }

      this.store.setCursor(link.itemId, page.nextCursor);
      return count;
    });

    report.added += page.added.length;
    report.modified += page.modified.length;
    report.removed += removed;
    report.categorizationFailures.push(...failures);
  }

  private emitProgress(report: SyncReport, phase: SyncPhase, error?: Error): void {
    if (this.onProgress !== undefined) {
      const event: SyncProgressEvent = {
        itemId: report.itemId,
        phase,
        added: report.added,
        modified: report.modified,
        removed: report.removed,
      };
      if (error !== undefined) {
        event.error = error;
      }
      this.onProgress(event);
    }
  }
}

/**
 * Create a LedgerSyncService instance.
 */
export function createSyncService(config: SyncServiceConfig): LedgerSyncService {
  return new LedgerSyncService(config);
}
