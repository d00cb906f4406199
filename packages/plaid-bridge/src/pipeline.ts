/**
 * Raw record → canonical transaction → rule directives → postings.
 * Pure apart from account lookups; writing the result is up to the caller.
 */

import {
  CategorizationError,
  PlaidTransactionSchema,
  silentLogger,
  type CategorizationDirective,
  type LedgerStore,
  type Logger,
  type PlaidTransaction,
  type Posting,
  type Tag,
  type Transaction,
} from '@ledgersync/types';
import { NullRuleEvaluator, type RuleEvaluator } from '@ledgersync/categorizer';
import { generatePostings, resolveOriginAccount, type AccountAliases } from '@ledgersync/ledger';
import { normalizeTransaction } from './normalizer.js';

export interface PipelineConfig {
  store: LedgerStore;
  rules?: RuleEvaluator;
  accountAliases?: AccountAliases;
  logger?: Logger;
}

export interface CategorizationFailure {
  transactionId: string;
  message: string;
}

export interface PreparedEntry {
  transaction: Transaction;
  postings: Posting[];
  tags: Tag[];
}

export interface RecategorizeOptions {
  /** Also rewrite POSTED transactions. */
  force?: boolean;
  itemId?: string;
}

export interface RecategorizeReport {
  updated: number;
  skipped: number;
  categorizationFailures: CategorizationFailure[];
}

export class TransactionPipeline {
  private readonly store: LedgerStore;
  private readonly rules: RuleEvaluator;
  private readonly accountAliases: AccountAliases;
  private readonly logger: Logger;

  constructor(config: PipelineConfig) {
    this.store = config.store;
    this.rules = config.rules ?? new NullRuleEvaluator();
    this.accountAliases = config.accountAliases ?? {};
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * A rules failure is recorded in `failures` and the transaction comes back
   * uncategorized; any other error propagates.
   */
  prepare(raw: PlaidTransaction, itemId: string, failures: CategorizationFailure[]): PreparedEntry {
    const txn = normalizeTransaction(raw, { itemId });
    const account = this.store.getAccount(txn.accountId);
    const origin = resolveOriginAccount(txn.accountId, account, this.accountAliases);

    let directives: CategorizationDirective[] = [];
    try {
      directives = this.rules.evaluate(txn, { accountName: account?.name ?? null });
    } catch (error) {
      if (!(error instanceof CategorizationError)) {
        throw error;
      }
      this.logger.warn(`${error.message}; storing ${txn.id} uncategorized`);
      failures.push({ transactionId: txn.id, message: error.message });
    }

    const generated = generatePostings(txn, directives, origin);
    return {
      transaction: { ...txn, narration: generated.narration },
      postings: generated.postings,
      tags: generated.tags,
    };
  }

  /**
   * Re-run rules and posting generation over stored transactions from their
   * stored upstream record, in one store transaction. POSTED transactions are
   * left alone unless forced.
   */
  recategorize(options: RecategorizeOptions = {}): RecategorizeReport {
    const report: RecategorizeReport = { updated: 0, skipped: 0, categorizationFailures: [] };
    const query = options.itemId === undefined ? {} : { itemId: options.itemId };

    this.store.transaction(() => {
      for (const stored of this.store.listTransactions(query)) {
        if (stored.status === 'POSTED' && options.force !== true) {
          report.skipped++;
          continue;
        }
        const raw = PlaidTransactionSchema.parse(JSON.parse(stored.source));
        const entry = this.prepare(raw, stored.itemId, report.categorizationFailures);
        this.store.upsertTransaction(entry.transaction, entry.postings, entry.tags);
        report.updated++;
      }
    });

    this.logger.info(`Recategorized ${report.updated} transaction(s), skipped ${report.skipped}`);
    return report;
  }
}
