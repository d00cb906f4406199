import type { Account } from '@ledgersync/types';

/** Upstream account id → ledger account path, e.g. `{ acc_1: 'Assets:Checking:Joint' }`. */
export type AccountAliases = Readonly<Record<string, string>>;

/**
 * Turn a display name into a ledger path segment: each word capitalized,
 * anything but letters and digits removed.
 */
export function sanitizeSegment(name: string): string {
  const words = name
    .split(/[^A-Za-z0-9]+/)
    .filter((word) => word.length > 0)
    .map((word) => word[0].toUpperCase() + word.slice(1));
  return words.length > 0 ? words.join('') : 'Unnamed';
}

/**
 * Ledger path of the account a transaction came from.
 *
 * A configured alias wins. Otherwise depository, investment and other accounts
 * live under `Assets:` and credit cards and loans under `Liabilities:`.
 */
export function resolveOriginAccount(
  accountId: string,
  account: Account | null,
  aliases: AccountAliases = {}
): string {
  const alias = aliases[accountId];
  if (alias !== undefined && alias.trim() !== '') {
    return alias.trim();
  }

  if (account === null) {
    return `Assets:Unknown:${sanitizeSegment(accountId)}`;
  }

  const root = account.type === 'credit' || account.type === 'loan' ? 'Liabilities' : 'Assets';
  return `${root}:${sanitizeSegment(account.name)}`;
}
