/**
 * Error taxonomy shared by every package.
 */

export type LedgerSyncErrorKind =
  | 'transient_upstream'
  | 'credential_invalid'
  | 'upstream'
  | 'categorization'
  | 'script_load'
  | 'persistence';

export class LedgerSyncError extends Error {
  readonly kind: LedgerSyncErrorKind;

  constructor(kind: LedgerSyncErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LedgerSyncError';
    this.kind = kind;
  }
}

/** Rate limits, 5xx responses and network failures. Retried at page level. */
export class TransientUpstreamError extends LedgerSyncError {
  readonly code: string | undefined;

  constructor(message: string, code?: string, options?: { cause?: unknown }) {
    super('transient_upstream', message, options);
    this.name = 'TransientUpstreamError';
    this.code = code;
  }
}

/**
 * Upstream data changed while a multi-page sync was in progress. The pages
 * must be requested again from the cursor the loop started at, so this is not
 * retried like a TransientUpstreamError.
 */
export class PaginationRestartError extends LedgerSyncError {
  readonly code: string | undefined;

  constructor(message: string, code?: string, options?: { cause?: unknown }) {
    super('transient_upstream', message, options);
    this.name = 'PaginationRestartError';
    this.code = code;
  }
}

/** The link's access credential is no longer accepted upstream. */
export class CredentialInvalidError extends LedgerSyncError {
  readonly code: string | undefined;

  constructor(message: string, code?: string, options?: { cause?: unknown }) {
    super('credential_invalid', message, options);
    this.name = 'CredentialInvalidError';
    this.code = code;
  }
}

export class UpstreamError extends LedgerSyncError {
  readonly code: string | undefined;

  constructor(message: string, code?: string, options?: { cause?: unknown }) {
    super('upstream', message, options);
    this.name = 'UpstreamError';
    this.code = code;
  }
}

export class CategorizationError extends LedgerSyncError {
  readonly transactionId: string;

  constructor(transactionId: string, message: string, options?: { cause?: unknown }) {
    super('categorization', message, options);
    this.name = 'CategorizationError';
    this.transactionId = transactionId;
  }
}

export class ScriptLoadError extends LedgerSyncError {
  readonly filename: string;

  constructor(filename: string, message: string, options?: { cause?: unknown }) {
    super('script_load', message, options);
    this.name = 'ScriptLoadError';
    this.filename = filename;
  }
}

export class PersistenceError extends LedgerSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('persistence', message, options);
    this.name = 'PersistenceError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
