/**
 * Runtime configuration.
 *
 * Built once by `loadConfig` and passed explicitly to the components.
 * Priority: explicit overrides > environment variables > defaults.
 */

import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { DEFAULT_SCRIPT_TIMEOUT_MS, type PlaidConfig } from '@ledgersync/types';

export const DEFAULT_DB_FILE = join(homedir(), '.ledgersync', 'ledgersync.db');

const LedgerSyncConfigSchema = z.object({
  plaid: z.object({
    clientId: z.string(),
    secret: z.string(),
    env: z.enum(['sandbox', 'production']),
  }),
  dbFile: z.string().min(1),
  rulesFile: z.string().min(1).optional(),
  scriptTimeoutMs: z.number().int().positive(),
  accountAliases: z.record(z.string(), z.string().min(1)),
});

export type LedgerSyncConfig = z.infer<typeof LedgerSyncConfigSchema>;

export interface LedgerSyncConfigOverrides {
  plaid?: Partial<PlaidConfig>;
  dbFile?: string;
  rulesFile?: string;
  scriptTimeoutMs?: number;
  accountAliases?: Record<string, string>;
}

/** Config path → environment variable, for error messages. */
const ENV_NAMES: Record<string, string> = {
  'plaid.clientId': 'PLAID_CLIENT_ID',
  'plaid.secret': 'PLAID_SECRET',
  'plaid.env': 'PLAID_ENV',
  dbFile: 'LEDGERSYNC_DB_FILE',
  rulesFile: 'LEDGERSYNC_RULES_FILE',
  scriptTimeoutMs: 'LEDGERSYNC_SCRIPT_TIMEOUT_MS',
  accountAliases: 'LEDGERSYNC_ACCOUNT_ALIASES',
};

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function parseTimeout(raw: string | undefined): number | undefined {
  const value = nonEmpty(raw);
  return value === undefined ? undefined : Number(value);
}

function parseAliases(raw: string | undefined): unknown {
  const value = nonEmpty(raw);
  if (value === undefined) {
    return undefined;
  }
  try {
    return JSON.parse(value);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid LEDGERSYNC_ACCOUNT_ALIASES: not valid JSON (${message})`);
  }
}

export function loadConfig(
  overrides: LedgerSyncConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): LedgerSyncConfig {
  const candidate = {
    plaid: {
      clientId: overrides.plaid?.clientId ?? env['PLAID_CLIENT_ID'] ?? '',
      secret: overrides.plaid?.secret ?? env['PLAID_SECRET'] ?? '',
      env: (overrides.plaid?.env ?? nonEmpty(env['PLAID_ENV']) ?? 'sandbox').toLowerCase(),
    },
    dbFile: overrides.dbFile ?? nonEmpty(env['LEDGERSYNC_DB_FILE']) ?? DEFAULT_DB_FILE,
    rulesFile: overrides.rulesFile ?? nonEmpty(env['LEDGERSYNC_RULES_FILE']),
    scriptTimeoutMs:
      overrides.scriptTimeoutMs ?? parseTimeout(env['LEDGERSYNC_SCRIPT_TIMEOUT_MS']) ?? DEFAULT_SCRIPT_TIMEOUT_MS,
    accountAliases: overrides.accountAliases ?? parseAliases(env['LEDGERSYNC_ACCOUNT_ALIASES']) ?? {},
  };

  const result = LedgerSyncConfigSchema.safeParse(candidate);
  if (!result.success) {
    const details = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      const topLevel = path.startsWith('accountAliases') ? 'accountAliases' : path;
      const name = ENV_NAMES[topLevel] ?? path;
      return `${name}: ${issue.message}`;
    });
    throw new Error(`Invalid configuration: ${details.join('; ')}`);
  }

  return result.data;
}

/**
 * Plaid settings, failing when the credentials needed to call the API are missing.
 */
export function requirePlaidCredentials(config: LedgerSyncConfig): PlaidConfig {
  if (config.plaid.clientId === '') {
    throw new Error(
      'Plaid client ID is required. Set PLAID_CLIENT_ID environment variable or pass clientId in config.'
    );
  }
  if (config.plaid.secret === '') {
    throw new Error(
      'Plaid secret is required. Set PLAID_SECRET environment variable or pass secret in config.'
    );
  }
  return config.plaid;
}
