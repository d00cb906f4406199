#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { LEDGERSYNC_VERSION, LinkSchema, isValidISODate } from '@ledgersync/types';
import { renderLedger, type LedgerEntry } from '@ledgersync/ledger';
import type { SyncReport } from '@ledgersync/plaid-bridge';
import { createPipeline, createService, openContext, type CliContext } from './context.js';
import {
  formatAccounts,
  formatBalances,
  formatLinks,
  formatRecategorizeReport,
  formatSyncReport,
} from './format.js';

const program = new Command();

program
  .name('ledgersync')
  .description('Sync bank transactions from Plaid into a local double-entry ledger')
  .version(LEDGERSYNC_VERSION)
  .option('-v, --verbose', 'Enable verbose output', process.env['LEDGERSYNC_VERBOSE'] === 'true')
  .option('--db <file>', 'Ledger database file (overrides LEDGERSYNC_DB_FILE)')
  .option('--rules <file>', 'Rules script (overrides LEDGERSYNC_RULES_FILE)');

interface GlobalOptions {
  verbose?: boolean;
  db?: string;
  rules?: string;
}

/**
 * Open the ledger, run the command and always close the database.
 * Errors are reported on stderr with a non-zero exit code.
 */
async function run(fn: (context: CliContext) => Promise<number> | number): Promise<void> {
  const globals = program.opts<GlobalOptions>();
  let context: CliContext | null = null;
  try {
    context = openContext(globals.verbose === true, {
      ...(globals.db !== undefined ? { dbFile: globals.db } : {}),
      ...(globals.rules !== undefined ? { rulesFile: globals.rules } : {}),
    });
    process.exitCode = await fn(context);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[ERROR] ${message}`);
    if (globals.verbose === true && error instanceof Error && error.stack !== undefined) {
      console.error(error.stack);
    }
    process.exitCode = 1;
  } finally {
    context?.store.close();
  }
}

program
  .command('sync')
  .description('Fetch new, modified and removed transactions for every active link')
  .option('--link <id>', 'Sync only this link')
  .action(async (options: { link?: string }) => {
    await run(async (context) => {
      const service = createService(context);
      const controller = new AbortController();
      const onSigint = (): void => {
        context.logger.warn('Interrupted; stopping after the current page');
        controller.abort();
      };
      process.once('SIGINT', onSigint);

      let reports: SyncReport[];
      try {
        if (options.link !== undefined) {
          const link = context.store.getLink(options.link);
          if (link === null) {
            throw new Error(`Link not found: ${options.link}`);
          }
          reports = [await service.syncLink(link, { signal: controller.signal })];
        } else {
          reports = await service.syncAll({ signal: controller.signal });
        }
      } finally {
        process.removeListener('SIGINT', onSigint);
      }

      if (reports.length === 0) {
        context.logger.info('No active links to sync');
      }
      for (const report of reports) {
        console.error(formatSyncReport(report));
      }
      return reports.some((report) => report.status === 'failed') ? 1 : 0;
    });
  });

program
  .command('print')
  .description('Print stored transactions as ledger entries')
  .option('--link <id>', 'Only transactions of this link')
  .option('--since <date>', 'First date to include (YYYY-MM-DD)')
  .option('--until <date>', 'Last date to include (YYYY-MM-DD)')
  .action(async (options: { link?: string; since?: string; until?: string }) => {
    await run(({ store }) => {
      for (const date of [options.since, options.until]) {
        if (date !== undefined && !isValidISODate(date)) {
          throw new Error(`Invalid date: ${date} (expected YYYY-MM-DD)`);
        }
      }
      const transactions = store.listTransactions({
        ...(options.link !== undefined ? { itemId: options.link } : {}),
        ...(options.since !== undefined ? { since: options.since } : {}),
        ...(options.until !== undefined ? { until: options.until } : {}),
      });
      const entries: LedgerEntry[] = transactions.map((transaction) => ({
        transaction,
        postings: store.getPostings(transaction.id),
        tags: store.getTags(transaction.id),
      }));
      if (entries.length > 0) {
        console.log(renderLedger(entries));
      }
      return 0;
    });
  });

const accounts = program
  .command('accounts')
  .description('List accounts and the ledger paths they post to')
  .action(async () => {
    await run(({ store, config }) => {
      console.log(formatAccounts(store.listAccounts(), config.accountAliases));
      return 0;
    });
  });

accounts
  .command('balance')
  .description('Fetch current balances from Plaid and show them')
  .option('--cached', 'Show the balances stored by the last sync or refresh without contacting Plaid')
  .action(async (options: { cached?: boolean }) => {
    await run(async (context) => {
      if (options.cached !== true) {
        const results = await createService(context).refreshBalances();
        const stale = results.filter((result) => !result.refreshed).map((result) => result.itemId);
        if (stale.length > 0) {
          context.logger.warn(`Showing stored balances for ${stale.join(', ')}`);
        }
      }
      console.log(formatBalances(context.store.listAccounts()));
      return 0;
    });
  });

const link = program.command('link').description('Manage linked institutions');

link
  .command('add')
  .description('Store an item id and access token obtained from the Plaid Link flow')
  .requiredOption('--item-id <id>', 'Plaid item id')
  .requiredOption('--access-token <token>', 'Plaid access token')
  .option('--alias <name>', 'Display name', '')
  .option('--institution-id <id>', 'Plaid institution id')
  .action(async (options: { itemId: string; accessToken: string; alias: string; institutionId?: string }) => {
    await run(({ store, logger }) => {
      const existing = store.getLink(options.itemId);
      store.upsertLink(
        LinkSchema.parse({
          itemId: options.itemId,
          alias: options.alias,
          accessToken: options.accessToken,
          state: 'ACTIVE',
          syncCursor: existing?.syncCursor ?? null,
          institutionId: options.institutionId ?? existing?.institutionId ?? null,
        })
      );
      logger.info(`${existing === null ? 'Added' : 'Updated'} link ${options.itemId}`);
      return 0;
    });
  });

link
  .command('status')
  .description('List links with their state and sync cursor')
  .action(async () => {
    await run(({ store }) => {
      console.log(formatLinks(store.listLinks()));
      return 0;
    });
  });

link
  .command('delete')
  .description('Remove a link and its accounts; stored transactions are kept')
  .argument('<id>', 'Plaid item id')
  .action(async (id: string) => {
    await run(({ store, logger }) => {
      const removed = store.deleteLink(id);
      if (removed === null) {
        logger.error(`Link not found: ${id}`);
        return 1;
      }
      logger.info(`Deleted link ${id}`);
      return 0;
    });
  });

program
  .command('recategorize')
  .description('Re-run the rules script over stored pending transactions')
  .option('--force', 'Also rewrite posted transactions', false)
  .option('--link <id>', 'Only transactions of this link')
  .action(async (options: { force: boolean; link?: string }) => {
    await run((context) => {
      const report = createPipeline(context).recategorize({
        force: options.force,
        ...(options.link !== undefined ? { itemId: options.link } : {}),
      });
      console.error(formatRecategorizeReport(report));
      return 0;
    });
  });

await program.parseAsync(process.argv);
