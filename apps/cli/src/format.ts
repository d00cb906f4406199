/**
 * Plain-text tables and summaries for CLI output.
 */

import { formatAmount, type Account, type Link } from '@ledgersync/types';
import { resolveOriginAccount, type AccountAliases } from '@ledgersync/ledger';
import type { RecategorizeReport, SyncReport } from '@ledgersync/plaid-bridge';

/**
 * Left-aligned columns separated by two spaces.
 */
export function formatTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, i) => Math.max(header.length, ...rows.map((row) => (row[i] ?? '').length)));
  const line = (cells: string[]): string =>
    cells
      .map((cell, i) => cell.padEnd(widths[i] ?? cell.length))
      .join('  ')
      .trimEnd();
  return [line(headers), ...rows.map(line)].join('\n');
}

export function formatLinks(links: readonly Link[]): string {
  if (links.length === 0) {
    return 'No links.';
  }
  return formatTable(
    ['ITEM', 'ALIAS', 'STATE', 'CURSOR'],
    links.map((link) => [link.itemId, link.alias, link.state, link.syncCursor ?? '-'])
  );
}

export function formatAccounts(accounts: readonly Account[], aliases: AccountAliases = {}): string {
  if (accounts.length === 0) {
    return 'No accounts.';
  }
  return formatTable(
    ['ACCOUNT', 'ITEM', 'NAME', 'TYPE', 'MASK', 'LEDGER'],
    accounts.map((account) => [
      account.id,
      account.itemId,
      account.name,
      account.type,
      account.mask ?? '-',
      resolveOriginAccount(account.id, account, aliases),
    ])
  );
}

export function formatBalances(accounts: readonly Account[]): string {
  if (accounts.length === 0) {
    return 'No accounts.';
  }
  const money = (amount: string | null, currency: string): string =>
    amount === null ? '-' : formatAmount(amount, currency);
  return formatTable(
    ['ACCOUNT', 'NAME', 'CURRENT', 'AVAILABLE'],
    accounts.map((account) => [
      account.id,
      account.name,
      money(account.currentBalance, account.currency),
      money(account.availableBalance, account.currency),
    ])
  );
}

export function formatSyncReport(report: SyncReport): string {
  const counts = `${report.added} added, ${report.modified} modified, ${report.removed} removed`;
  const parts = [`${report.itemId}: ${report.status} (${counts}, ${report.pages} page(s))`];
  if (report.categorizationFailures.length > 0) {
    parts.push(`  ${report.categorizationFailures.length} transaction(s) stored uncategorized`);
  }
  if (report.error !== undefined) {
    parts.push(`  ${report.error.message}`);
  }
  return parts.join('\n');
}

export function formatRecategorizeReport(report: RecategorizeReport): string {
  const failed = report.categorizationFailures.length;
  return `${report.updated} updated, ${report.skipped} skipped (posted)${failed > 0 ? `, ${failed} rule failure(s)` : ''}`;
}
