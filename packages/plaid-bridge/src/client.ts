/**
 * Plaid SDK client construction.
 */

import { Configuration, PlaidApi, PlaidEnvironments } from 'plaid';
import type { PlaidConfig } from '@ledgersync/types';

/**
 * Create a Plaid client for the configured environment.
 * Credentials must be present; see `requirePlaidCredentials`.
 */
export function createPlaidClient(config: PlaidConfig): PlaidApi {
  const configuration = new Configuration({
    basePath: PlaidEnvironments[config.env],
    baseOptions: {
      headers: {
        'PLAID-CLIENT-ID': config.clientId,
        'PLAID-SECRET': config.secret,
      },
    },
  });

  return new PlaidApi(configuration);
}

export type { PlaidApi };
