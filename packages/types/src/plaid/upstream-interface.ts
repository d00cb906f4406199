/**
 * Delta-fetch capability of the account-aggregation service.
 * Implementations must throw CredentialInvalidError for stale credentials and
 * TransientUpstreamError for failures worth retrying.
 */

import type { DeltaPage, PlaidAccount } from './types.js';

export interface UpstreamClient {
  fetchDelta(accessToken: string, cursor: string | null): Promise<DeltaPage>;
  fetchAccounts(accessToken: string): Promise<PlaidAccount[]>;
}
