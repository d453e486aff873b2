import pLimit from 'p-limit';
import { createLogger } from '@workspace/logger';
import type { IngestMetrics } from '../observability/metrics.js';
import type { RetryPolicy } from '../policy/retry-policy.js';
import type { Task } from '../queue/types.js';
import { PersistenceError } from '../storage/persistence-error.js';
import type { ItemRecord, ItemSink } from '../storage/types.js';
import { sleep } from '../utils/sleep.js';
import type { CheckpointStore } from './checkpoint-store.js';
import type { CommitLogStats } from './types.js';

const commitLog = createLogger('commit-log');

type CommitLogOptions = {
  sink: ItemSink;
  checkpoints: CheckpointStore;
  startIndex: number;
  flushEvery: number;
  retryPolicy: RetryPolicy;
  metrics?: IngestMetrics;
  sleepFn?: (ms: number) => Promise<void>;
};

/**
 * Results buffer and checkpoint behind one critical section. Completed tasks
 * are buffered; a flush writes their records to the sink and then moves the
 * checkpoint to the end of the contiguous run of durable tasks.
 */
export class CommitLog {
  private readonly sink: ItemSink;
  private readonly checkpoints: CheckpointStore;
  private readonly flushEvery: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly metrics: IngestMetrics | undefined;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly mutex: ReturnType<typeof pLimit>;

  private bufferedTasks: Task[];
  private bufferedRecords: ItemRecord[];
  private readonly pendingEntities: Set<string>;
  private readonly durable: Map<number, string>;
  private watermark: number;
  private flushes: number;
  private recordsWritten: number;

  constructor(options: CommitLogOptions) {
    this.sink = options.sink;
    this.checkpoints = options.checkpoints;
    this.flushEvery = Math.max(1, options.flushEvery);
    this.retryPolicy = options.retryPolicy;
    this.metrics = options.metrics;
    this.sleepFn = options.sleepFn ?? sleep;
    this.mutex = pLimit(1);

    this.bufferedTasks = [];
    this.bufferedRecords = [];
    this.pendingEntities = new Set();
    this.durable = new Map();
    this.watermark = options.startIndex;
    this.flushes = 0;
    this.recordsWritten = 0;
  }

  /** Number of leading input rows whose outcome is durable. */
  get processedCount(): number {
    return this.watermark;
  }

  record(task: Task, records: readonly ItemRecord[]): Promise<void> {
    return this.mutex(async () => {
      this.bufferedTasks.push(task);
      for (const record of records) {
        this.bufferedRecords.push(record);
        this.pendingEntities.add(record.entityId);
      }

      if (this.bufferedTasks.length >= this.flushEvery) {
        await this.flushLocked();
      }
    });
  }

  flush(): Promise<void> {
    return this.mutex(() => this.flushLocked());
  }

  hasPendingEntity(entityId: string): boolean {
    return this.pendingEntities.has(entityId);
  }

  getStats(): CommitLogStats {
    return {
      processedCount: this.watermark,
      bufferedTasks: this.bufferedTasks.length,
      bufferedRecords: this.bufferedRecords.length,
      flushes: this.flushes,
      recordsWritten: this.recordsWritten,
    };
  }

  private async flushLocked(): Promise<void> {
    if (this.bufferedTasks.length === 0) {
      return;
    }

    const tasks = this.bufferedTasks;
    const records = this.bufferedRecords;
    this.bufferedTasks = [];
    this.bufferedRecords = [];

    try {
      await this.writeWithRetry(records, tasks);
    } finally {
      this.pendingEntities.clear();
    }

    this.flushes += 1;

    for (const task of tasks) {
      this.durable.set(task.sequenceIndex, task.entityHandle);
    }

    this.advanceCheckpoint();
  }

  private async writeWithRetry(
    records: ItemRecord[],
    tasks: readonly Task[],
  ): Promise<void> {
    if (records.length === 0) {
      return;
    }

    for (let attempt = 0; ; attempt++) {
      try {
        const result = await this.sink.upsert(records);
        this.recordsWritten += result.written;
        this.metrics?.increment('records.written', result.written);
        return;
      } catch (error) {
        const decision = this.retryPolicy.decide('persistence', attempt);
        this.metrics?.increment('errors.persistence');

        const fields = {
          classification: decision.classification,
          attempt: attempt + 1,
          records: records.length,
          firstIndex: tasks[0]?.sequenceIndex,
          lastIndex: tasks[tasks.length - 1]?.sequenceIndex,
          err: error instanceof Error ? error.message : String(error),
        };

        if (decision.action === 'retry') {
          commitLog.warn('Flush failed, will retry', {
            ...fields,
            delayMs: decision.delayMs,
          });
          await this.sleepFn(decision.delayMs);
          continue;
        }

        // Buffered tasks stay below the checkpoint and are fetched again next run
        commitLog.error('Flush failed permanently', fields);
        throw error instanceof PersistenceError
          ? error
          : new PersistenceError('Failed to persist buffered records', {
              cause: error,
            });
      }
    }
  }

  private advanceCheckpoint(): void {
    const previous = this.watermark;
    let lastHandle: string | undefined;

    for (
      let handle = this.durable.get(this.watermark);
      handle !== undefined;
      handle = this.durable.get(this.watermark)
    ) {
      this.durable.delete(this.watermark);
      lastHandle = handle;
      this.watermark += 1;
    }

    if (this.watermark === previous || lastHandle === undefined) {
      if (this.durable.size > 0) {
        commitLog.debug('Checkpoint held below an unfinished task', {
          processedCount: this.watermark,
          durableAbove: this.durable.size,
        });
      }
      return;
    }

    try {
      this.checkpoints.commit(this.watermark, lastHandle);
      commitLog.info('Checkpoint committed', {
        processedCount: this.watermark,
        lastHandle,
      });
    } catch (error) {
      // The next successful commit carries this progress forward
      commitLog.error('Checkpoint write failed', {
        processedCount: this.watermark,
        path: this.checkpoints.path,
        err: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

export type { CommitLogOptions };
