import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { CredentialPool } from '../credentials/credential-pool.js';
import { FetchError } from '../fetcher/fetch-error.js';
import type { Fetcher, FetcherFactory, StatsSnapshot } from '../fetcher/types.js';
import { FailureSnapshotWriter } from '../observability/failure-snapshot.js';
import { CheckpointStore } from '../pipeline/checkpoint-store.js';
import { TaskSource } from '../queue/task-source.js';
import { InMemoryItemSink } from '../storage/in-memory-sink.js';
import type { ItemRecord, UpsertResult } from '../storage/types.js';
import {
  FakeFetcher,
  makeEntity,
  makeItem,
  pagesOf,
  type FakeChannel,
} from '../testing/fixtures.js';
import type { WorkerPoolConfig } from './types.js';
import { IngestRunner } from './worker-pool.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-worker-pool');
const CHECKPOINT_PATH = join(TEST_DIR, 'checkpoint.json');
const SNAPSHOT_DIR = join(TEST_DIR, 'errors');

function cleanup(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

function channel(name: string, itemIds: string[]): FakeChannel {
  return {
    entity: makeEntity({
      entityId: `UC-${name}`,
      handle: `@${name}`,
      title: name,
      childListingId: `UU-${name}`,
    }),
    pages: pagesOf(itemIds.map((id) => makeItem(id))),
  };
}

function transient(): FetchError {
  return new FetchError({
    classification: 'transient',
    operation: 'resolve',
    message: 'backendError',
    status: 503,
  });
}

function quota(): FetchError {
  return new FetchError({
    classification: 'quota-exhausted',
    operation: 'resolve',
    message: 'quotaExceeded',
    status: 403,
    reason: 'quotaExceeded',
  });
}

const TEST_CONFIG: Partial<WorkerPoolConfig> = {
  maxWorkers: 1,
  flushEvery: 3,
  callDelayMs: 0,
  taskDelayMs: 0,
  retryBaseDelayMs: 0,
  retryMaxDelayMs: 0,
  metricsIntervalMs: 0,
  handleSignals: false,
};

function setup(options: {
  handles: string[];
  secrets?: string[];
  fetcherFactory: FetcherFactory;
  sink?: InMemoryItemSink;
  config?: Partial<WorkerPoolConfig>;
  snapshots?: FailureSnapshotWriter;
}) {
  const checkpoints = new CheckpointStore(CHECKPOINT_PATH, 'channels.csv');
  const credentials = new CredentialPool(options.secrets ?? ['key-one']);
  const sink = options.sink ?? new InMemoryItemSink();
  const runner = new IngestRunner(
    {
      credentials,
      source: new TaskSource(options.handles, checkpoints),
      sink,
      fetcherFactory: options.fetcherFactory,
      snapshots: options.snapshots,
      sleepFn: async () => {},
    },
    { ...TEST_CONFIG, ...options.config },
  );

  return { runner, sink, checkpoints, credentials };
}

function entityIds(records: readonly ItemRecord[]): string[] {
  return [...new Set(records.map((record) => record.entityId))].sort();
}

class FailingSink extends InMemoryItemSink {
  attempts = 0;

  override async upsert(): Promise<UpsertResult> {
    this.attempts += 1;
    throw new Error('connection refused');
  }
}

describe('IngestRunner', () => {
  beforeEach(() => {
    cleanup();
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    cleanup();
  });

  it('skips an unresolvable handle and still advances past it', async () => {
    const fetcher = new FakeFetcher({
      '@alpha': channel('alpha', ['a1', 'a2']),
      '@gamma': channel('gamma', ['g1']),
    });
    const { runner, sink, checkpoints } = setup({
      handles: ['@alpha', '@missing', '@gamma'],
      secrets: ['key-one', 'key-two'],
      fetcherFactory: () => fetcher,
      config: { maxWorkers: 2 },
    });

    const summary = await runner.run();

    expect(summary.status).toBe('completed');
    expect(summary.processedCount).toBe(3);
    expect(summary.outcomes['persisted']).toBe(2);
    expect(summary.outcomes['skipped-no-entity']).toBe(1);
    expect(checkpoints.load()?.processedCount).toBe(3);
    expect(entityIds(sink.all())).toEqual(['UC-alpha', 'UC-gamma']);
    expect(sink.size).toBe(3);
  });

  it('retries transient failures and persists one record set', async () => {
    const fetcher = new FakeFetcher({ '@alpha': channel('alpha', ['a1', 'a2']) });
    fetcher.failNext('@alpha', transient(), transient());
    const { runner, sink } = setup({
      handles: ['@alpha'],
      fetcherFactory: () => fetcher,
      config: { maxRetries: 3 },
    });

    const summary = await runner.run();

    expect(summary.outcomes['persisted']).toBe(1);
    expect(fetcher.calls.resolve).toEqual(['@alpha', '@alpha', '@alpha']);
    expect(sink.size).toBe(2);
    expect(sink.upsertCount).toBe(1);
  });

  it('skips a task whose retries run out and records a failure snapshot', async () => {
    const fetcher = new FakeFetcher({ '@beta': channel('beta', ['b1']) });
    fetcher.failNext('@alpha', transient(), transient(), transient());
    const snapshots = new FailureSnapshotWriter({ directory: SNAPSHOT_DIR });
    const { runner, checkpoints } = setup({
      handles: ['@alpha', '@beta'],
      fetcherFactory: () => fetcher,
      config: { maxRetries: 2 },
      snapshots,
    });

    const summary = await runner.run();

    expect(summary.status).toBe('completed');
    expect(summary.outcomes['failed-skipped']).toBe(1);
    expect(summary.outcomes['persisted']).toBe(1);
    expect(checkpoints.load()?.processedCount).toBe(2);
    expect(readdirSync(SNAPSHOT_DIR)).toEqual(['000000-_alpha.json']);
  });

  it('halts without advancing past the failed task when configured to', async () => {
    const fetcher = new FakeFetcher({ '@beta': channel('beta', ['b1']) });
    fetcher.failNext('@alpha', transient(), transient());
    const { runner, checkpoints } = setup({
      handles: ['@alpha', '@beta'],
      fetcherFactory: () => fetcher,
      config: { maxRetries: 1, onRetriesExhausted: 'halt' },
    });

    const summary = await runner.run();

    expect(summary.status).toBe('halted');
    expect(summary.processedCount).toBe(0);
    expect(checkpoints.load()).toBeUndefined();
    expect(fetcher.calls.resolve).toEqual(['@alpha', '@alpha']);
  });

  it('resumes from the checkpoint and processes only the remaining tasks', async () => {
    const fetcher = new FakeFetcher({
      '@c': channel('c', ['c1']),
      '@d': channel('d', ['d1']),
    });
    const { runner, checkpoints, sink } = setup({
      handles: ['@a', '@b', '@c', '@d'],
      fetcherFactory: () => fetcher,
    });
    checkpoints.commit(2, '@b');

    const summary = await runner.run();

    expect(summary.startIndex).toBe(2);
    expect(summary.dispatched).toBe(2);
    expect(fetcher.calls.resolve).toEqual(['@c', '@d']);
    expect(checkpoints.load()?.processedCount).toBe(4);
    expect(entityIds(sink.all())).toEqual(['UC-c', 'UC-d']);
  });

  it('does nothing when the checkpoint already covers the input', async () => {
    const fetcher = new FakeFetcher({});
    const { runner, checkpoints } = setup({
      handles: ['@a'],
      fetcherFactory: () => fetcher,
    });
    checkpoints.commit(1, '@a');

    const summary = await runner.run();

    expect(summary.status).toBe('completed');
    expect(summary.workers).toBe(0);
    expect(fetcher.calls.resolve).toEqual([]);
  });

  it('rotates to the next credential on quota exhaustion', async () => {
    const exhausted = new FakeFetcher({});
    exhausted.resolve = async () => {
      throw quota();
    };
    const healthy = new FakeFetcher({
      '@alpha': channel('alpha', ['a1']),
      '@beta': channel('beta', ['b1']),
    });
    const { runner, credentials } = setup({
      handles: ['@alpha', '@beta'],
      secrets: ['key-one', 'key-two'],
      fetcherFactory: (credential) => (credential.id === 1 ? exhausted : healthy),
    });

    const summary = await runner.run();

    expect(summary.status).toBe('completed');
    expect(summary.outcomes['persisted']).toBe(2);
    expect(credentials.getStats()).toEqual({ total: 2, available: 1, exhausted: 1 });
  });

  it('stops dispatching once every credential is exhausted', async () => {
    const fetcher = new FakeFetcher({
      '@alpha': channel('alpha', ['a1']),
      '@beta': channel('beta', ['b1']),
      '@gamma': channel('gamma', ['g1']),
    });
    fetcher.failNext('@beta', quota());
    const { runner, checkpoints, sink } = setup({
      handles: ['@alpha', '@beta', '@gamma'],
      fetcherFactory: () => fetcher,
    });

    const summary = await runner.run();

    expect(summary.status).toBe('credentials-exhausted');
    expect(summary.dispatched).toBe(2);
    expect(fetcher.calls.resolve).toEqual(['@alpha', '@beta']);
    expect(checkpoints.load()).toMatchObject({ processedCount: 1, lastHandle: '@alpha' });
    expect(entityIds(sink.all())).toEqual(['UC-alpha']);
  });

  it('stops immediately without credentials', async () => {
    const fetcher = new FakeFetcher({});
    const { runner } = setup({
      handles: ['@alpha'],
      secrets: [],
      fetcherFactory: () => fetcher,
    });

    const summary = await runner.run();

    expect(summary.status).toBe('credentials-exhausted');
    expect(summary.dispatched).toBe(0);
    expect(summary.workers).toBe(0);
  });

  it('never runs more workers than credentials or the configured cap', async () => {
    let active = 0;
    let peak = 0;
    const slow: Fetcher = {
      async resolve() {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active -= 1;
        return null;
      },
      async fetchEntity() {
        return null;
      },
      async fetchChildren() {
        return { items: [] };
      },
      async fetchStats() {
        return new Map<string, StatsSnapshot>();
      },
    };

    const capped = setup({
      handles: ['@1', '@2', '@3', '@4', '@5', '@6'],
      secrets: ['k1', 'k2', 'k3'],
      fetcherFactory: () => slow,
      config: { maxWorkers: 2 },
    });
    const summary = await capped.runner.run();

    expect(summary.workers).toBe(2);
    expect(peak).toBe(2);
    expect(summary.outcomes['skipped-no-entity']).toBe(6);
  });

  it('sizes the pool by available credentials', async () => {
    const { runner } = setup({
      handles: ['@1', '@2', '@3'],
      secrets: ['only-key'],
      fetcherFactory: () => new FakeFetcher({}),
      config: { maxWorkers: 4 },
    });

    expect((await runner.run()).workers).toBe(1);
  });

  it('does not ingest the same entity twice in one run', async () => {
    const alpha = channel('alpha', ['a1']);
    const fetcher = new FakeFetcher({ '@alpha': alpha, '@alpha-alias': alpha });
    const { runner, sink } = setup({
      handles: ['@alpha', '@alpha-alias'],
      fetcherFactory: () => fetcher,
      config: { flushEvery: 10 },
    });

    const summary = await runner.run();

    expect(summary.outcomes['persisted']).toBe(1);
    expect(summary.outcomes['skipped-already-processed']).toBe(1);
    expect(sink.size).toBe(1);
  });

  it('records not-found from a later stage as skipped-not-found', async () => {
    const fetcher = new FakeFetcher({ '@alpha': channel('alpha', ['a1']) });
    fetcher.fetchEntity = async () => {
      throw new FetchError({
        classification: 'not-found',
        operation: 'fetchEntity',
        message: 'channelNotFound',
        status: 404,
      });
    };
    const { runner, checkpoints } = setup({
      handles: ['@alpha'],
      fetcherFactory: () => fetcher,
    });

    const summary = await runner.run();

    expect(summary.outcomes['skipped-not-found']).toBe(1);
    expect(checkpoints.load()?.processedCount).toBe(1);
  });

  it('stops with persistence-failed when the sink keeps failing', async () => {
    const fetcher = new FakeFetcher({
      '@alpha': channel('alpha', ['a1']),
      '@beta': channel('beta', ['b1']),
    });
    const sink = new FailingSink();
    const { runner, checkpoints } = setup({
      handles: ['@alpha', '@beta'],
      fetcherFactory: () => fetcher,
      sink,
      config: { flushEvery: 1, maxRetries: 2 },
    });

    const summary = await runner.run();

    expect(summary.status).toBe('persistence-failed');
    expect(sink.attempts).toBe(3);
    expect(summary.dispatched).toBe(1);
    expect(checkpoints.load()).toBeUndefined();
  });
});
