export {
  LEDGERSYNC_VERSION,
  UNKNOWN_ACCOUNT,
  DEFAULT_CURRENCY,
  DEFAULT_SCRIPT_TIMEOUT_MS,
} from './constants.js';
export { isValidISODate, compareDates } from './date.js';
export { toAmount, negateAmount, sumAmounts, sumByCurrency, formatAmount } from './money.js';
export {
  computeTransactionId,
  computePostingId,
  computeTagId,
  isValidTransactionId,
} from './id-generator.js';
