import type {
  DeltaPage,
  Link,
  PlaidAccount,
  PlaidTransaction,
  Transaction,
  UpstreamClient,
} from '@ledgersync/types';

export const createTestLink = (overrides: Partial<Link> = {}): Link => ({
  itemId: 'item-1',
  alias: 'Test Bank',
  accessToken: 'access-sandbox-test',
  state: 'ACTIVE',
  syncCursor: null,
  institutionId: 'ins_test',
  ...overrides,
});

export const createTestPlaidAccount = (overrides: Partial<PlaidAccount> = {}): PlaidAccount => ({
  accountId: 'acc-checking',
  itemId: 'item-1',
  name: 'Everyday Checking',
  type: 'depository',
  subtype: 'checking',
  mask: '0042',
  balances: {
    current: 1200.5,
    available: 1100,
    isoCurrencyCode: 'USD',
  },
  ...overrides,
});

export const createTestPlaidTransaction = (overrides: Partial<PlaidTransaction> = {}): PlaidTransaction => ({
  transactionId: 'plaid-txn-1',
  accountId: 'acc-checking',
  amount: 50,
  isoCurrencyCode: 'USD',
  date: '2024-03-01',
  name: 'KFC #1234',
  merchantName: 'KFC',
  paymentChannel: 'in store',
  pending: false,
  ...overrides,
});

export const createTestTransaction = (overrides: Partial<Transaction> = {}): Transaction => ({
  id: 'txn_000000000000000000000001',
  upstreamId: 'plaid-txn-1',
  itemId: 'item-1',
  accountId: 'acc-checking',
  date: '2024-03-01',
  narration: 'KFC #1234',
  payee: 'KFC',
  merchant: 'KFC',
  category: 'FOOD_AND_DRINK',
  amount: '-50.00',
  currency: 'USD',
  source: '{}',
  status: 'POSTED',
  ...overrides,
});

export const createPage = (overrides: Partial<DeltaPage> = {}): DeltaPage => ({
  added: [],
  modified: [],
  removed: [],
  nextCursor: 'cursor-1',
  hasMore: false,
  ...overrides,
});

/**
 * In-process UpstreamClient. Pages are keyed by access token and cursor, like
 * /transactions/sync; queued errors for a token are thrown before any page.
 */
export class FakeUpstream implements UpstreamClient {
  readonly deltaCalls: Array<{ accessToken: string; cursor: string | null }> = [];
  private readonly pages = new Map<string, DeltaPage>();
  private readonly errors = new Map<string, Error[]>();
  private readonly accounts = new Map<string, PlaidAccount[]>();

  addPage(accessToken: string, cursor: string | null, page: DeltaPage): this {
    this.pages.set(`${accessToken}|${cursor ?? ''}`, page);
    return this;
  }

  setAccounts(accessToken: string, accounts: PlaidAccount[]): this {
    this.accounts.set(accessToken, accounts);
    return this;
  }

  failNext(accessToken: string, error: Error, times = 1): this {
    const queue = this.errors.get(accessToken) ?? [];
    for (let i = 0; i < times; i++) {
      queue.push(error);
    }
    this.errors.set(accessToken, queue);
    return this;
  }

  fetchDelta(accessToken: string, cursor: string | null): Promise<DeltaPage> {
    this.deltaCalls.push({ accessToken, cursor });
    const error = this.errors.get(accessToken)?.shift();
    if (error !== undefined) {
      return Promise.reject(error);
    }
    const page = this.pages.get(`${accessToken}|${cursor ?? ''}`);
    return Promise.resolve(page ?? createPage({ nextCursor: cursor ?? '', hasMore: false }));
  }

  fetchAccounts(accessToken: string): Promise<PlaidAccount[]> {
    return Promise.resolve(this.accounts.get(accessToken) ?? []);
  }
}
