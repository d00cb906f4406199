/**
 * Ledger journal rendering for the `print` command.
 *
 *   2024-03-01 * KFC #1234
 *     ; Payee: KFC
 *     ; :food:
 *     Expenses:Food:Restaurant   50.00 USD
 *     Assets:Checking           -50.00 USD
 *
 * The payee goes in a metadata comment when it differs from the description,
 * and tags in a `; :tag:` comment.
 */

import { compareDates, formatAmount, type Posting, type Tag, type Transaction } from '@ledgersync/types';

export interface LedgerEntry {
  transaction: Transaction;
  postings: Posting[];
  tags: Tag[];
}

export interface RenderOptions {
  /** Column the amounts are right-aligned to (default: 52). */
  amountColumn?: number;
}

const DEFAULT_AMOUNT_COLUMN = 52;

/** Collapse line breaks and runs of whitespace so a value stays on one line. */
function singleLine(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/** Ledger tag names cannot hold whitespace or colons. */
function tagName(value: string): string {
  return value.trim().replace(/[\s:]+/g, '-');
}

function renderPosting(posting: Posting, amountColumn: number): string {
  const account = `  ${posting.account}`;
  const amount = formatAmount(posting.amount, posting.currency);
  const padding = Math.max(2, amountColumn - account.length - amount.length);
  return `${account}${' '.repeat(padding)}${amount}`;
}

export function renderTransaction(entry: LedgerEntry, options: RenderOptions = {}): string {
  const { transaction: txn } = entry;
  const amountColumn = options.amountColumn ?? DEFAULT_AMOUNT_COLUMN;
  const flag = txn.status === 'PENDING' ? '!' : '*';

  const narration = singleLine(txn.narration);
  const lines: string[] = [`${txn.date} ${flag} ${narration}`];

  const payee = txn.payee === null ? '' : singleLine(txn.payee);
  if (payee !== '' && payee !== narration) {
    lines.push(`  ; Payee: ${payee}`);
  }
  const tags = entry.tags.map((tag) => tagName(tag.value)).filter((name) => name !== '');
  if (tags.length > 0) {
    lines.push(`  ; :${tags.join(':')}:`);
  }
  for (const posting of entry.postings) {
    lines.push(renderPosting(posting, amountColumn));
  }
  return lines.join('\n');
}

/**
 * Render entries in date order, separated by blank lines.
 */
export function renderLedger(entries: readonly LedgerEntry[], options: RenderOptions = {}): string {
  return [...entries]
    .sort((a, b) => {
      const byDate = compareDates(a.transaction.date, b.transaction.date);
      return byDate !== 0 ? byDate : a.transaction.id.localeCompare(b.transaction.id);
    })
    .map((entry) => renderTransaction(entry, options))
    .join('\n\n');
}
