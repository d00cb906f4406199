import { Decimal } from 'decimal.js';

/**
 * Amounts travel as decimal strings; arithmetic goes through decimal.js so
 * binary floating point never leaks into stored postings.
 */
function fixed(amount: Decimal): string {
  // At least cents, never fewer digits than the value carries, never "-0.00".
  return amount.isZero() ? '0.00' : amount.toFixed(Math.max(2, amount.decimalPlaces()));
}

export function toAmount(value: number | string): string {
  const amount = new Decimal(value);
  if (!amount.isFinite()) {
    throw new Error(`Unable to parse amount: ${String(value)}`);
  }
  return fixed(amount);
}

export function negateAmount(amount: string): string {
  return fixed(new Decimal(amount).negated());
}

export function sumAmounts(amounts: string[]): string {
  return fixed(amounts.reduce((sum, amt) => sum.plus(amt), new Decimal(0)));
}

/** Sum per currency code, e.g. `{ USD: '0.00' }`. */
export function sumByCurrency(entries: Array<{ amount: string; currency: string }>): Map<string, string> {
  const totals = new Map<string, Decimal>();
  for (const entry of entries) {
    const current = totals.get(entry.currency) ?? new Decimal(0);
    totals.set(entry.currency, current.plus(entry.amount));
  }
  return new Map([...totals].map(([currency, total]) => [currency, fixed(total)]));
}

export function formatAmount(amount: string, currency: string): string {
  return `${fixed(new Decimal(amount))} ${currency}`;
}
