import { createLogger } from '@workspace/logger';
import type { CredentialPool } from '../credentials/credential-pool.js';
import type { Credential } from '../credentials/types.js';
import { FetchError } from '../fetcher/fetch-error.js';
import type { Fetcher, FetcherFactory } from '../fetcher/types.js';
import { MAX_STATS_BATCH } from '../fetcher/types.js';
import type { FailureSnapshotWriter } from '../observability/failure-snapshot.js';
import { IngestMetrics } from '../observability/metrics.js';
import { CommitLog } from '../pipeline/commit-log.js';
import { RetryPolicy } from '../policy/retry-policy.js';
import { TaskQueue, type TaskSource } from '../queue/task-source.js';
import type { Task } from '../queue/types.js';
import { PersistenceError } from '../storage/persistence-error.js';
import type { ItemRecord, ItemSink } from '../storage/types.js';
import { sleep } from '../utils/sleep.js';
import { runTaskPipeline } from './task-pipeline.js';
import type {
  RunStatus,
  RunSummary,
  TaskOutcome,
  WorkerPoolConfig,
} from './types.js';

const runLog = createLogger('ingest-runner');

export const RUN_EXIT_CODES: Record<RunStatus, number> = {
  completed: 0,
  'credentials-exhausted': 2,
  'persistence-failed': 3,
  halted: 4,
  interrupted: 130,
};

const DEFAULT_CONFIG: WorkerPoolConfig = {
  maxWorkers: 4,
  maxRetries: 3,
  retryBaseDelayMs: 1000,
  retryMaxDelayMs: 30_000,
  flushEvery: 3,
  callDelayMs: 200,
  taskDelayMs: 1500,
  maxPages: 1000,
  statsBatchSize: MAX_STATS_BATCH,
  onRetriesExhausted: 'skip',
  metricsIntervalMs: 30_000,
  handleSignals: true,
};

type IngestRunnerDeps = {
  credentials: CredentialPool;
  source: TaskSource;
  sink: ItemSink;
  fetcherFactory: FetcherFactory;
  snapshots?: FailureSnapshotWriter;
  metrics?: IngestMetrics;
  sleepFn?: (ms: number) => Promise<void>;
};

type TaskResolution = {
  outcome: TaskOutcome;
  records: ItemRecord[];
};

type RunState = {
  queue: TaskQueue;
  commitLog: CommitLog;
  outcomes: Record<TaskOutcome, number>;
};

function emptyOutcomes(): Record<TaskOutcome, number> {
  return {
    persisted: 0,
    'skipped-no-entity': 0,
    'skipped-no-children': 0,
    'skipped-already-processed': 0,
    'skipped-not-found': 0,
    'failed-skipped': 0,
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Bounded pool of async workers over one shared task queue. Workers fetch in
 * parallel; results go through the commit log, which serializes sink writes
 * and checkpoint updates.
 */
export class IngestRunner {
  private readonly config: WorkerPoolConfig;
  private readonly credentials: CredentialPool;
  private readonly source: TaskSource;
  private readonly sink: ItemSink;
  private readonly fetcherFactory: FetcherFactory;
  private readonly retryPolicy: RetryPolicy;
  private readonly snapshots: FailureSnapshotWriter | undefined;
  private readonly metrics: IngestMetrics;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly fetchers: Map<number, Fetcher>;
  private stopStatus: RunStatus | undefined;

  constructor(deps: IngestRunnerDeps, config?: Partial<WorkerPoolConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.credentials = deps.credentials;
    this.source = deps.source;
    this.sink = deps.sink;
    this.fetcherFactory = deps.fetcherFactory;
    this.retryPolicy = new RetryPolicy({
      maxRetries: this.config.maxRetries,
      baseDelayMs: this.config.retryBaseDelayMs,
      maxDelayMs: this.config.retryMaxDelayMs,
      onRetriesExhausted: this.config.onRetriesExhausted,
    });
    this.snapshots = deps.snapshots;
    this.metrics = deps.metrics ?? new IngestMetrics();
    this.sleepFn = deps.sleepFn ?? sleep;
    this.fetchers = new Map();
    this.stopStatus = undefined;
  }

  /** First stop reason wins; in-flight tasks still finish. */
  requestStop(status: RunStatus): void {
    if (this.stopStatus === undefined) {
      this.stopStatus = status;
      runLog.warn('Stop requested, no new tasks will start', { status });
    }
  }

  get stopRequested(): boolean {
    return this.stopStatus !== undefined;
  }

  async run(): Promise<RunSummary> {
    const startedAt = Date.now();
    const total = this.source.total;
    const startIndex = this.source.resume();
    const remaining = total - startIndex;

    const state: RunState = {
      queue: new TaskQueue(this.source.nextBatch(startIndex)),
      commitLog: new CommitLog({
        sink: this.sink,
        checkpoints: this.source.checkpointStore,
        startIndex,
        flushEvery: this.config.flushEvery,
        retryPolicy: this.retryPolicy,
        metrics: this.metrics,
        sleepFn: this.sleepFn,
      }),
      outcomes: emptyOutcomes(),
    };

    const available = this.credentials.getStats().available;
    const workerCount = Math.max(
      1,
      Math.min(this.config.maxWorkers, available, remaining),
    );

    runLog.info('Starting ingest', {
      total,
      startIndex,
      remaining,
      workers: workerCount,
      credentials: available,
    });

    if (remaining > 0 && available === 0) {
      this.requestStop('credentials-exhausted');
    }

    const onShutdown = () => {
      this.requestStop('interrupted');
    };
    if (this.config.handleSignals) {
      process.on('SIGINT', onShutdown);
      process.on('SIGTERM', onShutdown);
    }

    const metricsInterval =
      this.config.metricsIntervalMs > 0
        ? setInterval(() => {
            this.updateGauges(state);
            this.metrics.log(runLog);
          }, this.config.metricsIntervalMs)
        : undefined;

    let workers = 0;
    try {
      if (remaining > 0 && !this.stopRequested) {
        workers = workerCount;
        await Promise.all(
          Array.from({ length: workerCount }, (_, workerId) =>
            this.runWorker(workerId, state),
          ),
        );
      }

      await this.finalFlush(state.commitLog);
    } finally {
      if (metricsInterval) {
        clearInterval(metricsInterval);
      }
      if (this.config.handleSignals) {
        process.removeListener('SIGINT', onShutdown);
        process.removeListener('SIGTERM', onShutdown);
      }

      this.updateGauges(state);
      this.metrics.log(runLog);
    }

    const stats = state.commitLog.getStats();
    const summary: RunSummary = {
      status: this.stopStatus ?? 'completed',
      total,
      startIndex,
      processedCount: stats.processedCount,
      dispatched: state.queue.deliveredCount,
      workers,
      outcomes: state.outcomes,
      recordsWritten: stats.recordsWritten,
      credentials: this.credentials.getStats(),
      durationMs: Date.now() - startedAt,
    };

    const level = summary.status === 'completed' ? 'info' : 'warn';
    runLog[level]('Ingest finished', {
      status: summary.status,
      processedCount: summary.processedCount,
      total,
      recordsWritten: summary.recordsWritten,
    });

    return summary;
  }

  private async finalFlush(commitLog: CommitLog): Promise<void> {
    try {
      await commitLog.flush();
    } catch (error) {
      if (!(error instanceof PersistenceError)) {
        throw error;
      }
      this.requestStop('persistence-failed');
    }
  }

  private async runWorker(workerId: number, state: RunState): Promise<void> {
    const workerLog = runLog.child({ workerId });

    while (!this.stopRequested) {
      if (!this.credentials.hasAvailable()) {
        this.requestStop('credentials-exhausted');
        break;
      }

      const task = state.queue.take();
      if (!task) {
        break;
      }

      const resolution = await this.processTask(task, state.commitLog);
      if (!resolution) {
        workerLog.info('Task left for the next run', {
          sequenceIndex: task.sequenceIndex,
          handle: task.entityHandle,
        });
        break;
      }

      state.outcomes[resolution.outcome] += 1;
      this.metrics.increment(`tasks.${resolution.outcome}`);
      workerLog.info('Task finished', {
        sequenceIndex: task.sequenceIndex,
        handle: task.entityHandle,
        outcome: resolution.outcome,
        records: resolution.records.length,
      });

      try {
        await state.commitLog.record(task, resolution.records);
      } catch (error) {
        if (!(error instanceof PersistenceError)) {
          throw error;
        }
        this.requestStop('persistence-failed');
        break;
      }

      if (!state.queue.isDrained && !this.stopRequested) {
        await this.sleepFn(this.config.taskDelayMs);
      }
    }
  }

  /**
   * Runs the pipeline for one task until it reaches a terminal outcome.
   * `undefined` means the task was abandoned and stays below the checkpoint.
   */
  private async processTask(
    task: Task,
    commitLog: CommitLog,
  ): Promise<TaskResolution | undefined> {
    let transientAttempts = 0;

    for (;;) {
      const credential = this.credentials.acquire();
      if (!credential) {
        this.requestStop('credentials-exhausted');
        return undefined;
      }

      try {
        const result = await runTaskPipeline({
          task,
          fetcher: this.fetcherFor(credential),
          isAlreadyProcessed: (entityId) =>
            this.isAlreadyProcessed(commitLog, entityId),
          callDelayMs: this.config.callDelayMs,
          maxPages: this.config.maxPages,
          statsBatchSize: this.config.statsBatchSize,
          sleepFn: this.sleepFn,
          metrics: this.metrics,
        });

        return { outcome: result.outcome, records: result.records };
      } catch (error) {
        const classification = this.retryPolicy.classify(error);
        const decision = this.retryPolicy.decide(classification, transientAttempts);
        this.metrics.increment(`errors.${classification}`);

        const fields = {
          sequenceIndex: task.sequenceIndex,
          handle: task.entityHandle,
          classification,
          action: decision.action,
          attempt: transientAttempts + 1,
          credentialId: credential.id,
          operation: error instanceof FetchError ? error.operation : undefined,
          err: errorMessage(error),
        };

        switch (decision.action) {
          case 'complete':
            runLog.info('Target not found', fields);
            return { outcome: 'skipped-not-found', records: [] };

          case 'rotate':
            runLog.warn('Credential unusable, rotating', fields);
            this.credentials.markExhausted(
              credential.id,
              classification === 'fatal-auth' ? 'fatal-auth' : 'quota-exhausted',
            );
            continue;

          case 'retry':
            runLog.warn('Task will be retried', { ...fields, delayMs: decision.delayMs });
            transientAttempts += 1;
            await this.sleepFn(decision.delayMs);
            continue;

          case 'skip':
            runLog.error('Task failed permanently, skipping', fields);
            this.snapshots?.write({
              sequenceIndex: task.sequenceIndex,
              entityHandle: task.entityHandle,
              classification,
              errorMessage: fields.err,
              attempts: transientAttempts + 1,
              operation: fields.operation,
              status: error instanceof FetchError ? error.status : undefined,
              reason: error instanceof FetchError ? error.reason : undefined,
              timestamp: new Date().toISOString(),
            });
            return { outcome: 'failed-skipped', records: [] };

          case 'halt':
            runLog.error('Task failed permanently, halting run', fields);
            this.requestStop(
              classification === 'persistence' ? 'persistence-failed' : 'halted',
            );
            return undefined;
        }
      }
    }
  }

  /** Unflushed records count as processed, so one run never ingests an entity twice. */
  private async isAlreadyProcessed(
    commitLog: CommitLog,
    entityId: string,
  ): Promise<boolean> {
    return (
      commitLog.hasPendingEntity(entityId) ||
      (await this.sink.hasEntity(entityId))
    );
  }

  private fetcherFor(credential: Credential): Fetcher {
    const existing = this.fetchers.get(credential.id);
    if (existing) {
      return existing;
    }

    const fetcher = this.fetcherFactory(credential);
    this.fetchers.set(credential.id, fetcher);
    return fetcher;
  }

  private updateGauges(state: RunState): void {
    const pool = this.credentials.getStats();
    const log = state.commitLog.getStats();
    this.metrics.gauge('credentials.available', pool.available);
    this.metrics.gauge('queue.dispatched', state.queue.deliveredCount);
    this.metrics.gauge('checkpoint.processed', log.processedCount);
    this.metrics.gauge('buffer.tasks', log.bufferedTasks);
  }
}

export type { IngestRunnerDeps };
