/**
 * UpstreamClient over the Plaid SDK.
 *
 * Every SDK failure is classified before it leaves this module:
 * TransientUpstreamError (retried by the sync service), PaginationRestartError
 * (the sync service restarts from its starting cursor), CredentialInvalidError
 * (the link needs the user to re-authenticate) or UpstreamError.
 */

import type { PlaidApi, TransactionsSyncRequest } from 'plaid';
import {
  CredentialInvalidError,
  LedgerSyncError,
  PaginationRestartError,
  TransientUpstreamError,
  UpstreamError,
  type DeltaPage,
  type PlaidAccount,
  type PlaidError,
  type UpstreamClient,
} from '@ledgersync/types';
import type { RateLimiter } from './retry.js';
import { mapPlaidAccount, mapPlaidTransaction, mapRemovedTransactions } from './transactions.js';

const CREDENTIAL_ERROR_CODES = new Set([
  'ITEM_LOGIN_REQUIRED',
  'INVALID_ACCESS_TOKEN',
  'ITEM_NOT_FOUND',
  'ACCESS_NOT_GRANTED',
  'USER_PERMISSION_REVOKED',
  'PENDING_EXPIRATION',
  'ITEM_LOCKED',
  'INVALID_CREDENTIALS',
]);

const TRANSIENT_ERROR_CODES = new Set([
  'RATE_LIMIT_EXCEEDED',
  'INTERNAL_SERVER_ERROR',
  'INSTITUTION_DOWN',
  'INSTITUTION_NOT_RESPONDING',
  'INSTITUTION_NOT_AVAILABLE',
  'PLANNED_MAINTENANCE',
  'PRODUCT_NOT_READY',
]);

const PAGINATION_RESTART_CODE = 'TRANSACTIONS_SYNC_MUTATION_DURING_PAGINATION';

const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ERR_NETWORK',
]);

function stringField(value: object, key: string): string | undefined {
  const entry = Object.entries(value).find(([k]) => k === key);
  return entry !== undefined && typeof entry[1] === 'string' ? entry[1] : undefined;
}

/**
 * Pull the Plaid error body and HTTP status out of an SDK (axios) error.
 */
export function extractPlaidError(error: unknown): PlaidError | null {
  if (typeof error !== 'object' || error === null || !('response' in error)) {
    return null;
  }
  const { response } = error;
  if (typeof response !== 'object' || response === null) {
    return null;
  }

  const status = 'status' in response && typeof response.status === 'number' ? response.status : undefined;
  const data = 'data' in response && typeof response.data === 'object' && response.data !== null ? response.data : {};

  return {
    errorType: stringField(data, 'error_type') ?? 'UNKNOWN',
    errorCode: stringField(data, 'error_code') ?? (status === undefined ? 'UNKNOWN' : `HTTP_${status}`),
    errorMessage: stringField(data, 'error_message') ?? `Plaid request failed${status === undefined ? '' : ` with status ${status}`}`,
    displayMessage: stringField(data, 'display_message'),
    requestId: stringField(data, 'request_id'),
    status,
  };
}

export function classifyPlaidError(error: unknown): LedgerSyncError {
  if (error instanceof LedgerSyncError) {
    return error;
  }

  const plaidError = extractPlaidError(error);
  if (plaidError !== null) {
    const message = `${plaidError.errorCode}: ${plaidError.errorMessage}`;
    if (CREDENTIAL_ERROR_CODES.has(plaidError.errorCode)) {
      return new CredentialInvalidError(message, plaidError.errorCode, { cause: error });
    }
    if (plaidError.errorCode === PAGINATION_RESTART_CODE) {
      return new PaginationRestartError(message, plaidError.errorCode, { cause: error });
    }
    if (
      TRANSIENT_ERROR_CODES.has(plaidError.errorCode) ||
      plaidError.errorType === 'RATE_LIMIT_EXCEEDED' ||
      plaidError.status === 429 ||
      (plaidError.status !== undefined && plaidError.status >= 500 && plaidError.status < 600)
    ) {
      return new TransientUpstreamError(message, plaidError.errorCode, { cause: error });
    }
    return new UpstreamError(message, plaidError.errorCode, { cause: error });
  }

  const code = typeof error === 'object' && error !== null ? stringField(error, 'code') : undefined;
  const message = error instanceof Error ? error.message : String(error);
  if (code !== undefined && NETWORK_ERROR_CODES.has(code)) {
    return new TransientUpstreamError(`Network error: ${message}`, code, { cause: error });
  }
  return new UpstreamError(message, code, { cause: error });
}

export interface PlaidUpstreamOptions {
  /** Transactions per /transactions/sync page (Plaid allows 1-500). */
  pageSize?: number;
  rateLimiter?: RateLimiter;
}

export class PlaidUpstreamClient implements UpstreamClient {
  constructor(
    private readonly client: PlaidApi,
    private readonly options: PlaidUpstreamOptions = {}
  ) {}

  async fetchDelta(accessToken: string, cursor: string | null): Promise<DeltaPage> {
    const request: TransactionsSyncRequest = { access_token: accessToken };
    if (cursor !== null && cursor !== '') {
      request.cursor = cursor;
    }
    if (this.options.pageSize !== undefined) {
      request.count = this.options.pageSize;
    }

    const response = await this.call(() => this.client.transactionsSync(request));

    return {
      added: response.data.added.map(mapPlaidTransaction),
      modified: response.data.modified.map(mapPlaidTransaction),
      removed: mapRemovedTransactions(response.data.removed),
      nextCursor: response.data.next_cursor,
      hasMore: response.data.has_more,
    };
  }

  async fetchAccounts(accessToken: string): Promise<PlaidAccount[]> {
    const response = await this.call(() => this.client.accountsGet({ access_token: accessToken }));
    const itemId = response.data.item.item_id;
    return response.data.accounts.map((account) => mapPlaidAccount(account, itemId));
  }

  private async call<T>(fn: () => Promise<T>): Promise<T> {
    if (this.options.rateLimiter !== undefined) {
      await this.options.rateLimiter.acquire();
    }
    try {
      return await fn();
    } catch (error) {
      throw classifyPlaidError(error);
    }
  }
}
