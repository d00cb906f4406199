export const LEDGERSYNC_VERSION = '0.1.0';

/** Target leg for transactions no rule categorized. */
export const UNKNOWN_ACCOUNT = 'Expenses:Unknown';

export const DEFAULT_CURRENCY = 'USD';

export const DEFAULT_SCRIPT_TIMEOUT_MS = 50;
