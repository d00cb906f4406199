import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  CredentialInvalidError,
  PaginationRestartError,
  PersistenceError,
  TransientUpstreamError,
  UpstreamError,
  computeTransactionId,
} from '@ledgersync/types';
import { SqliteLedgerStore } from '@ledgersync/store';
import { createRuleEvaluator } from '@ledgersync/categorizer';
import { LedgerSyncService, createSyncService, type SyncProgressEvent } from '@ledgersync/plaid-bridge';
import {
  FakeUpstream,
  createPage,
  createTestLink,
  createTestPlaidAccount,
  createTestPlaidTransaction,
} from '../helpers/fixtures.js';

const TOKEN = 'access-sandbox-test';
const FAST_RETRY = { initialDelayMs: 0, maxDelayMs: 0 };

const KFC_RULES = `rule('KFC', { account: 'Expenses:Food:Restaurant', tags: ['food'] });`;

describe('LedgerSyncService', () => {
  let store: SqliteLedgerStore;
  let upstream: FakeUpstream;

  const txnId = (upstreamId: string, itemId = 'item-1') => computeTransactionId(itemId, upstreamId);
  const postingsOf = (upstreamId: string) =>
    store.getPostings(txnId(upstreamId)).map((p) => [p.account, p.amount, p.currency]);

  beforeEach(() => {
    store = SqliteLedgerStore.open();
    store.upsertLink(createTestLink());
    upstream = new FakeUpstream().setAccounts(TOKEN, [createTestPlaidAccount()]);
  });

  afterEach(() => {
    store.close();
  });

  describe('syncLink', () => {
    it('should import a page with uncategorized postings when no rules are loaded', async () => {
      upstream.addPage(TOKEN, null, createPage({ added: [createTestPlaidTransaction()] }));
      const service = createSyncService({ store, upstream });

      const report = await service.syncLink(createTestLink());

      expect(report).toMatchObject({
        itemId: 'item-1',
        status: 'ok',
        added: 1,
        modified: 0,
        removed: 0,
        pages: 1,
        categorizationFailures: [],
        finalCursor: 'cursor-1',
      });
      expect(postingsOf('plaid-txn-1')).toEqual([
        ['Expenses:Unknown', '50.00', 'USD'],
        ['Assets:EverydayChecking', '-50.00', 'USD'],
      ]);
      expect(store.getCursor('item-1')).toBe('cursor-1');
    });

    it('should categorize with the rules script', async () => {
      upstream.addPage(TOKEN, null, createPage({ added: [createTestPlaidTransaction()] }));
      const service = new LedgerSyncService({ store, upstream, rules: createRuleEvaluator(KFC_RULES) });

      await service.syncLink(createTestLink());

      expect(postingsOf('plaid-txn-1')).toEqual([
        ['Expenses:Food:Restaurant', '50.00', 'USD'],
        ['Assets:EverydayChecking', '-50.00', 'USD'],
      ]);
      expect(store.getTags(txnId('plaid-txn-1')).map((t) => t.value)).toEqual(['food']);
    });

    it('should use a configured alias for the origin account', async () => {
      upstream.addPage(TOKEN, null, createPage({ added: [createTestPlaidTransaction()] }));
      const service = new LedgerSyncService({
        store,
        upstream,
        accountAliases: { 'acc-checking': 'Assets:Bank:Checking' },
      });

      await service.syncLink(createTestLink());

      expect(postingsOf('plaid-txn-1')[1]).toEqual(['Assets:Bank:Checking', '-50.00', 'USD']);
    });

    it('should store refreshed account balances', async () => {
      const service = new LedgerSyncService({ store, upstream });

      await service.syncLink(createTestLink());

      expect(store.getAccount('acc-checking')?.currentBalance).toBe('1200.50');
      expect(store.getAccount('acc-checking')?.availableBalance).toBe('1100.00');
    });

    it('should replace postings of modified transactions', async () => {
      upstream
        .addPage(TOKEN, null, createPage({ added: [createTestPlaidTransaction()] }))
        .addPage(TOKEN, 'cursor-1', createPage({ modified: [createTestPlaidTransaction({ amount: 45 })], nextCursor: 'cursor-2' }));
      const service = new LedgerSyncService({ store, upstream });

      await service.syncLink(createTestLink());
      const report = await service.syncLink(createTestLink());

      expect(report).toMatchObject({ status: 'ok', added: 0, modified: 1, finalCursor: 'cursor-2' });
      expect(store.getTransaction(txnId('plaid-txn-1'))?.amount).toBe('-45.00');
      expect(postingsOf('plaid-txn-1')).toEqual([
        ['Expenses:Unknown', '45.00', 'USD'],
        ['Assets:EverydayChecking', '-45.00', 'USD'],
      ]);
    });

    it('should not duplicate anything when a page is applied twice', async () => {
      upstream.addPage(TOKEN, null, createPage({ added: [createTestPlaidTransaction()] }));
      const service = new LedgerSyncService({ store, upstream, rules: createRuleEvaluator(KFC_RULES) });

      await service.syncLink(createTestLink());
      store.setCursor('item-1', null);
      await service.syncLink(createTestLink());

      expect(store.listTransactions()).toHaveLength(1);
      expect(store.getPostings(txnId('plaid-txn-1'))).toHaveLength(2);
      expect(store.getTags(txnId('plaid-txn-1'))).toHaveLength(1);
    });

    it('should keep the cursor of the last committed page when a later page fails', async () => {
      upstream
        .addPage(TOKEN, null, createPage({ added: [createTestPlaidTransaction()], hasMore: true }))
        .addPage(
          TOKEN,
          'cursor-1',
          createPage({ added: [createTestPlaidTransaction({ transactionId: 'plaid-txn-2' })], nextCursor: 'cursor-2' })
        );
      const upsert = store.upsertTransaction.bind(store);
      vi.spyOn(store, 'upsertTransaction').mockImplementation((txn, postings, tags) => {
        if (txn.upstreamId === 'plaid-txn-2') {
          throw new Error('disk full');
        }
        upsert(txn, postings, tags);
      });
      const service = new LedgerSyncService({ store, upstream });

      const report = await service.syncLink(createTestLink());

      expect(report).toMatchObject({ status: 'failed', added: 1, pages: 1, finalCursor: 'cursor-1' });
      expect(report.error?.message).toBe('disk full');
      expect(store.getCursor('item-1')).toBe('cursor-1');
      expect(store.getTransaction(txnId('plaid-txn-1'))).not.toBeNull();
      expect(store.findTransactionIdByUpstreamId('item-1', 'plaid-txn-2')).toBeNull();
    });

    it('should roll back a page whose cursor cannot be stored', async () => {
      upstream.addPage('access-ghost', null, createPage({ added: [createTestPlaidTransaction()] }));
      const service = new LedgerSyncService({ store, upstream });

      const report = await service.syncLink(createTestLink({ itemId: 'item-ghost', accessToken: 'access-ghost' }));

      expect(report.status).toBe('failed');
      expect(report.error).toBeInstanceOf(PersistenceError);
      expect(report.added).toBe(0);
      expect(store.listTransactions()).toEqual([]);
    });

    it('should store a transaction uncategorized when the rules script fails on it', async () => {
      const rules = createRuleEvaluator(
        `
        rule(function (t) { if (t.payee === 'Bad') throw new Error('boom'); return false; }, { account: 'Expenses:Never' });
        rule('KFC', { account: 'Expenses:Food:Restaurant' });
        `,
        { timeoutMs: 1000 }
      );
      upstream.addPage(
        TOKEN,
        null,
        createPage({
          added: [
            createTestPlaidTransaction(),
            createTestPlaidTransaction({ transactionId: 'plaid-txn-2', name: 'Bad Shop', merchantName: 'Bad' }),
          ],
        })
      );
      const service = new LedgerSyncService({ store, upstream, rules });

      const report = await service.syncLink(createTestLink());

      expect(report.status).toBe('ok');
      expect(report.added).toBe(2);
      expect(report.categorizationFailures).toEqual([
        {
          transactionId: txnId('plaid-txn-2'),
          message: `Rules script failed for transaction ${txnId('plaid-txn-2')}: boom`,
        },
      ]);
      expect(postingsOf('plaid-txn-1')[0]?.[0]).toBe('Expenses:Food:Restaurant');
      expect(postingsOf('plaid-txn-2')[0]?.[0]).toBe('Expenses:Unknown');
    });

    it('should delete removed transactions and ignore unknown ids', async () => {
      upstream
        .addPage(
          TOKEN,
          null,
          createPage({
            added: [createTestPlaidTransaction(), createTestPlaidTransaction({ transactionId: 'plaid-txn-2' })],
          })
        )
        .addPage(
          TOKEN,
          'cursor-1',
          createPage({
            removed: [{ transactionId: 'plaid-txn-1' }, { transactionId: 'never-seen' }],
            nextCursor: 'cursor-2',
          })
        );
      const service = new LedgerSyncService({ store, upstream });

      await service.syncLink(createTestLink());
      const report = await service.syncLink(createTestLink());

      expect(report).toMatchObject({ status: 'ok', removed: 1 });
      expect(store.getTransaction(txnId('plaid-txn-1'))).toBeNull();
      expect(store.getPostings(txnId('plaid-txn-1'))).toEqual([]);
      expect(store.getTransaction(txnId('plaid-txn-2'))).not.toBeNull();
    });

    it('should end with the record absent when a page both modifies and removes it', async () => {
      upstream
        .addPage(TOKEN, null, createPage({ added: [createTestPlaidTransaction()], hasMore: true }))
        .addPage(
          TOKEN,
          'cursor-1',
          createPage({
            modified: [createTestPlaidTransaction({ amount: 45 })],
            removed: [{ transactionId: 'plaid-txn-1' }],
            nextCursor: 'cursor-2',
          })
        );
      const service = new LedgerSyncService({ store, upstream });

      const report = await service.syncLink(createTestLink());

      expect(report).toMatchObject({ status: 'ok', added: 1, modified: 1, removed: 1, pages: 2 });
      expect(store.listTransactions()).toEqual([]);
    });

    it('should flag the link when its credentials are rejected', async () => {
      upstream.failNext(TOKEN, new CredentialInvalidError('ITEM_LOGIN_REQUIRED: login required', 'ITEM_LOGIN_REQUIRED'));
      const service = new LedgerSyncService({ store, upstream, retryOptions: FAST_RETRY });

      const report = await service.syncLink(createTestLink());

      expect(report.status).toBe('requires_verification');
      expect(report.error).toBeInstanceOf(CredentialInvalidError);
      expect(store.getLink('item-1')?.state).toBe('REQUIRES_VERIFICATION');
      expect(upstream.deltaCalls).toHaveLength(1);

      await expect(service.syncAll()).resolves.toEqual([]);
      expect(upstream.deltaCalls).toHaveLength(1);
    });

    it('should retry transient failures', async () => {
      upstream
        .failNext(TOKEN, new TransientUpstreamError('rate limited', 'RATE_LIMIT_EXCEEDED'), 2)
        .addPage(TOKEN, null, createPage({ added: [createTestPlaidTransaction()] }));
      const onRetry = vi.fn();
      const service = new LedgerSyncService({ store, upstream, retryOptions: { ...FAST_RETRY, onRetry } });

      const report = await service.syncLink(createTestLink());

      expect(report.status).toBe('ok');
      expect(report.added).toBe(1);
      expect(upstream.deltaCalls).toHaveLength(3);
      expect(onRetry).toHaveBeenCalledTimes(2);
    });

    it('should fail once retries are exhausted', async () => {
      upstream.failNext(TOKEN, new TransientUpstreamError('institution down', 'INSTITUTION_DOWN'), 4);
      const service = new LedgerSyncService({ store, upstream, retryOptions: FAST_RETRY });

      const report = await service.syncLink(createTestLink());

      expect(report.status).toBe('failed');
      expect(report.error).toBeInstanceOf(TransientUpstreamError);
      expect(upstream.deltaCalls).toHaveLength(4);
      expect(store.getCursor('item-1')).toBeNull();
    });

    it('should not retry other upstream errors', async () => {
      upstream.failNext(TOKEN, new UpstreamError('INVALID_FIELD: bad count', 'INVALID_FIELD'));
      const service = new LedgerSyncService({ store, upstream, retryOptions: FAST_RETRY });

      const report = await service.syncLink(createTestLink());

      expect(report.status).toBe('failed');
      expect(upstream.deltaCalls).toHaveLength(1);
      expect(store.getLink('item-1')?.state).toBe('ACTIVE');
    });

    describe('when upstream data changes during pagination', () => {
      const mutation = () =>
        new PaginationRestartError(
          'TRANSACTIONS_SYNC_MUTATION_DURING_PAGINATION: underlying data changed',
          'TRANSACTIONS_SYNC_MUTATION_DURING_PAGINATION'
        );

      beforeEach(() => {
        upstream
          .addPage(TOKEN, null, createPage({ added: [createTestPlaidTransaction()], hasMore: true }))
          .addPage(
            TOKEN,
            'cursor-1',
            createPage({ added: [createTestPlaidTransaction({ transactionId: 'plaid-txn-2' })], nextCursor: 'cursor-2' })
          );
      });

      const failAfterFirstPage = (times: number) => {
        let armed = true;
        return (event: SyncProgressEvent) => {
          if (armed && event.phase === 'importing') {
            armed = false;
            upstream.failNext(TOKEN, mutation(), times);
          }
        };
      };

      it('should restart from the cursor the sync started with', async () => {
        const service = new LedgerSyncService({ store, upstream, onProgress: failAfterFirstPage(1) });

        const report = await service.syncLink(createTestLink());

        expect(upstream.deltaCalls.map((call) => call.cursor)).toEqual([null, 'cursor-1', null, 'cursor-1']);
        expect(report).toMatchObject({ status: 'ok', pages: 3, finalCursor: 'cursor-2' });
        expect(store.getCursor('item-1')).toBe('cursor-2');
        expect(store.listTransactions()).toHaveLength(2);
      });

      it('should not go through the transient retry path', async () => {
        const onRetry = vi.fn();
        const service = new LedgerSyncService({
          store,
          upstream,
          retryOptions: { ...FAST_RETRY, onRetry },
          onProgress: failAfterFirstPage(1),
        });

        await service.syncLink(createTestLink());

        expect(onRetry).not.toHaveBeenCalled();
      });

      it('should fail and leave the starting cursor stored after too many restarts', async () => {
        const service = new LedgerSyncService({ store, upstream, onProgress: failAfterFirstPage(4) });

        const report = await service.syncLink(createTestLink());

        expect(upstream.deltaCalls.map((call) => call.cursor)).toEqual([null, 'cursor-1', null, null, null]);
        expect(report).toMatchObject({ status: 'failed', pages: 1, finalCursor: null });
        expect(report.error).toBeInstanceOf(PaginationRestartError);
        expect(store.getCursor('item-1')).toBeNull();
        expect(store.getTransaction(txnId('plaid-txn-1'))).not.toBeNull();
      });
    });

    it('should not fetch anything when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const service = new LedgerSyncService({ store, upstream });

      const report = await service.syncLink(createTestLink(), { signal: controller.signal });

      expect(report.status).toBe('cancelled');
      expect(upstream.deltaCalls).toEqual([]);
    });

    it('should stop between pages when cancelled', async () => {
      upstream
        .addPage(TOKEN, null, createPage({ added: [createTestPlaidTransaction()], hasMore: true }))
        .addPage(TOKEN, 'cursor-1', createPage({ nextCursor: 'cursor-2' }));
      const controller = new AbortController();
      const service = new LedgerSyncService({
        store,
        upstream,
        onProgress: (event) => {
          if (event.phase === 'importing') controller.abort();
        },
      });

      const report = await service.syncLink(createTestLink(), { signal: controller.signal });

      expect(report).toMatchObject({ status: 'cancelled', pages: 1, finalCursor: 'cursor-1' });
      expect(store.getCursor('item-1')).toBe('cursor-1');
      expect(upstream.deltaCalls).toHaveLength(1);
    });

    it('should stop waiting for a retry when cancelled', async () => {
      upstream.failNext(TOKEN, new TransientUpstreamError('rate limited', 'RATE_LIMIT_EXCEEDED'));
      const controller = new AbortController();
      const service = new LedgerSyncService({
        store,
        upstream,
        retryOptions: { initialDelayMs: 60_000, maxDelayMs: 60_000, onRetry: () => controller.abort() },
      });

      const report = await service.syncLink(createTestLink(), { signal: controller.signal });

      expect(report.status).toBe('cancelled');
      expect(report.error).toBeUndefined();
      expect(upstream.deltaCalls).toHaveLength(1);
      expect(store.getCursor('item-1')).toBeNull();
    });

    it('should report progress phases', async () => {
      upstream.addPage(TOKEN, null, createPage({ added: [createTestPlaidTransaction()] }));
      const events: SyncProgressEvent[] = [];
      const service = new LedgerSyncService({ store, upstream, onProgress: (event) => events.push(event) });

      await service.syncLink(createTestLink());

      expect(events.map((e) => e.phase)).toEqual(['fetching', 'importing', 'complete']);
      expect(events[2]).toEqual({ itemId: 'item-1', phase: 'complete', added: 1, modified: 0, removed: 0 });
    });
  });

  describe('refreshBalances', () => {
    it('should store current balances without fetching transactions', async () => {
      const service = new LedgerSyncService({ store, upstream });
      await service.syncLink(createTestLink());
      upstream.setAccounts(TOKEN, [createTestPlaidAccount({ balances: { current: 900.25, available: 850, isoCurrencyCode: 'USD' } })]);

      const results = await service.refreshBalances();

      expect(results).toEqual([{ itemId: 'item-1', refreshed: true }]);
      expect(store.getAccount('acc-checking')?.currentBalance).toBe('900.25');
      expect(store.getAccount('acc-checking')?.availableBalance).toBe('850.00');
      expect(upstream.deltaCalls).toHaveLength(1);
    });

    it('should keep stored balances and flag the link when credentials are rejected', async () => {
      const service = new LedgerSyncService({ store, upstream });
      await service.syncLink(createTestLink());
      vi.spyOn(upstream, 'fetchAccounts').mockRejectedValueOnce(
        new CredentialInvalidError('ITEM_LOGIN_REQUIRED: login required', 'ITEM_LOGIN_REQUIRED')
      );

      const [result] = await service.refreshBalances();

      expect(result).toMatchObject({ itemId: 'item-1', refreshed: false });
      expect(result?.error).toBeInstanceOf(CredentialInvalidError);
      expect(store.getAccount('acc-checking')?.currentBalance).toBe('1200.50');
      expect(store.getLink('item-1')?.state).toBe('REQUIRES_VERIFICATION');
    });

    it('should not contact upstream for links awaiting re-authentication', async () => {
      store.setLinkState('item-1', 'REQUIRES_VERIFICATION');
      const fetchAccounts = vi.spyOn(upstream, 'fetchAccounts');
      const service = new LedgerSyncService({ store, upstream });

      expect(await service.refreshBalances()).toEqual([{ itemId: 'item-1', refreshed: false }]);
      expect(fetchAccounts).not.toHaveBeenCalled();
    });
  });

  describe('syncAll', () => {
    it('should keep syncing other links after one fails', async () => {
      store.upsertLink(createTestLink({ itemId: 'item-2', accessToken: 'access-sandbox-other' }));
      upstream
        .failNext(TOKEN, new UpstreamError('boom'))
        .addPage(
          'access-sandbox-other',
          null,
          createPage({ added: [createTestPlaidTransaction({ transactionId: 'plaid-txn-9', accountId: 'acc-savings' })] })
        );
      const service = new LedgerSyncService({ store, upstream, retryOptions: FAST_RETRY });

      const reports = await service.syncAll();

      expect(reports.map((r) => [r.itemId, r.status])).toEqual([
        ['item-1', 'failed'],
        ['item-2', 'ok'],
      ]);
      expect(store.getPostings(txnId('plaid-txn-9', 'item-2')).map((p) => p.account)).toEqual([
        'Expenses:Unknown',
        'Assets:Unknown:AccSavings',
      ]);
    });
  });
});
