import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  reportTaggingRun,
  runTaggingWorkflow,
  type RunState,
  type TaggingRunDeps,
  type TaggingRunResult,
} from '../../src/tagging/workflow.js';
import { MappingStore } from '../../src/store/mappingStore.js';
import { AuthError, ConnectivityError, RemoteWriteError } from '../../src/errors.js';
import { FakeCatalogSession, createLog, product } from '../helpers/fakeCatalog.js';

const NOW = new Date('2024-05-01T12:00:00.000Z');

describe('runTaggingWorkflow', () => {
  let store: MappingStore;
  let states: RunState[];

  beforeEach(() => {
    store = new MappingStore(':memory:');
    store.upsert('Shoes', ['sale', 'new']);
    states = [];
  });

  afterEach(() => {
    store.close();
  });

  function deps(session: FakeCatalogSession, overrides: Partial<TaggingRunDeps> = {}): TaggingRunDeps {
    return {
      openSession: async () => session,
      mappings: store,
      log: createLog(),
      onStateChange: (state) => states.push(state),
      now: () => NOW,
      ...overrides,
    };
  }

  it('applies the worklist unattended and closes the session', async () => {
    const session = new FakeCatalogSession([product(1, 'Shoes', 'old, sale'), product(2, 'Hat', '')]);

    const result = await runTaggingWorkflow(deps(session));

    expect(result).toMatchObject({ status: 'applied', scanned: 2, successCount: 1, totalCount: 1, failures: [] });
    expect(session.saved).toEqual([product(1, 'Shoes', 'new, old, sale')]);
    expect(session.closed).toBe(true);
    expect(states).toEqual(['SessionOpen', 'MappingLoaded', 'Scanned', 'Applying', 'Reported', 'SessionClosed']);
  });

  it('asks for confirmation before applying in interactive mode', async () => {
    const session = new FakeCatalogSession([product(1, 'Shoes', '')]);
    const review = vi.fn(async () => true);

    const result = await runTaggingWorkflow(deps(session, { review }));

    expect(review).toHaveBeenCalledWith([{ product: product(1, 'Shoes', ''), tagsToAdd: ['sale', 'new'] }]);
    expect(result.status).toBe('applied');
    expect(states).toContain('ConfirmPending');
  });

  it('stops without writing when the operator declines', async () => {
    const session = new FakeCatalogSession([product(1, 'Shoes', '')]);

    const result = await runTaggingWorkflow(deps(session, { review: async () => false }));

    expect(result.status).toBe('declined');
    expect(session.saved).toEqual([]);
    expect(session.closed).toBe(true);
    expect(states).toEqual(['SessionOpen', 'MappingLoaded', 'Scanned', 'ConfirmPending', 'Reported', 'SessionClosed']);
  });

  it('stops early when there are no mappings', async () => {
    store.remove('Shoes');
    const session = new FakeCatalogSession([product(1, 'Shoes', '')]);

    const result = await runTaggingWorkflow(deps(session));

    expect(result).toEqual({ status: 'no-mappings', startedAt: NOW });
    expect(session.pageSizes).toEqual([]);
    expect(session.closed).toBe(true);
    expect(states).toEqual(['SessionOpen', 'MappingLoaded', 'Reported', 'SessionClosed']);
  });

  it('skips review when every product is already tagged', async () => {
    const session = new FakeCatalogSession([product(1, 'Shoes', 'new, sale')]);
    const review = vi.fn(async () => true);

    const result = await runTaggingWorkflow(deps(session, { review }));

    expect(result).toEqual({ status: 'up-to-date', startedAt: NOW, scanned: 1 });
    expect(review).not.toHaveBeenCalled();
    expect(states).toEqual(['SessionOpen', 'MappingLoaded', 'Scanned', 'Reported', 'SessionClosed']);
  });

  it('returns a failure when the session cannot be opened', async () => {
    const session = new FakeCatalogSession([]);
    const openSession = async () => {
      throw new AuthError(401, 'Shopify rejected the access token');
    };

    const result = await runTaggingWorkflow(deps(session, { openSession }));

    expect(result.status).toBe('failed');
    if (result.status === 'failed') {
      expect(result.failedIn).toBe('Idle');
      expect(result.error.kind).toBe('auth');
    }
    expect(states).toEqual(['Reported']);
  });

  it('closes the session when fetching products fails', async () => {
    const session = new FakeCatalogSession([], { findError: new ConnectivityError('HTTP 502') });

    const result = await runTaggingWorkflow(deps(session));

    expect(result.status).toBe('failed');
    if (result.status === 'failed') {
      expect(result.failedIn).toBe('MappingLoaded');
      expect(result.error).toBeInstanceOf(ConnectivityError);
    }
    expect(session.closed).toBe(true);
    expect(states).toEqual(['SessionOpen', 'MappingLoaded', 'Reported', 'SessionClosed']);
  });

  it('closes the session when the mapping cannot be loaded', async () => {
    const session = new FakeCatalogSession([]);
    const mappings = {
      loadAllAsMapping: () => {
        throw new Error('disk I/O error');
      },
    };

    const result = await runTaggingWorkflow(deps(session, { mappings }));

    expect(result.status).toBe('failed');
    if (result.status === 'failed') {
      expect(result.failedIn).toBe('SessionOpen');
      expect(result.error.kind).toBe('unexpected');
      expect(result.error.message).toBe('disk I/O error');
    }
    expect(session.closed).toBe(true);
  });

  it('reports the outcome before closing the session', async () => {
    const session = new FakeCatalogSession([product(1, 'Shoes', '')]);
    const log = createLog();
    const closedWhenReported: boolean[] = [];
    log.log.mockImplementation((message: string) => {
      if (message === '   Products updated: 1/1') closedWhenReported.push(session.closed);
    });

    await runTaggingWorkflow(deps(session, {
      log,
      onStateChange: (state) => {
        states.push(state);
        if (state === 'Reported') closedWhenReported.push(session.closed);
      },
    }));

    expect(closedWhenReported).toEqual([false, false]);
    expect(states.slice(-2)).toEqual(['Reported', 'SessionClosed']);
  });

  it('counts per-product failures without failing the run', async () => {
    const session = new FakeCatalogSession(
      [product(1, 'Shoes', ''), product(2, 'Shoes', ''), product(3, 'Shoes', '')],
      { failSaveFor: [2] }
    );

    const result = await runTaggingWorkflow(deps(session));

    expect(result).toMatchObject({ status: 'applied', successCount: 2, totalCount: 3 });
    expect(session.saved.map(p => p.id)).toEqual([1, 3]);
  });
});

describe('reportTaggingRun', () => {
  it('reports the update count and failures', () => {
    const log = createLog();
    const failure = {
      item: { product: product(2, 'Shoes', ''), tagsToAdd: ['new'] },
      error: new RemoteWriteError(2, 'boom'),
    };
    const result: TaggingRunResult = {
      status: 'applied',
      startedAt: NOW,
      finishedAt: NOW,
      scanned: 10,
      successCount: 2,
      totalCount: 3,
      failures: [failure],
    };

    reportTaggingRun(result, log);

    expect(log.log).toHaveBeenCalledWith(`\n[${NOW.toISOString()}] 🎉 Tagging complete!`);
    expect(log.log).toHaveBeenCalledWith('   Products updated: 2/3');
    expect(log.warn).toHaveBeenCalledWith('   ⚠️  1 products failed; re-run to retry them.');
  });

  it('reports an aborted run with its state and cause', () => {
    const log = createLog();

    reportTaggingRun(
      { status: 'failed', startedAt: NOW, failedIn: 'MappingLoaded', error: new ConnectivityError('boom') },
      log
    );

    expect(log.error).toHaveBeenCalledWith(
      '❌ Tagging run aborted during MappingLoaded. Could not reach the catalog: boom'
    );
  });

  it('reports runs that had nothing to do', () => {
    const log = createLog();

    reportTaggingRun({ status: 'up-to-date', startedAt: NOW, scanned: 4 }, log);
    reportTaggingRun({ status: 'no-mappings', startedAt: NOW }, log);

    expect(log.log).toHaveBeenCalledWith('✅ No products need type tags (4 checked).');
    expect(log.log).toHaveBeenCalledWith('⚠️  No product type mappings found in the database.');
  });
});
