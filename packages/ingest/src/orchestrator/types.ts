import type { CredentialPoolStats } from '../credentials/types.js';
import type { Fetcher } from '../fetcher/types.js';
import type { IngestMetrics } from '../observability/metrics.js';
import type { RetriesExhaustedPolicy } from '../policy/types.js';
import type { Task } from '../queue/types.js';
import type { ItemRecord } from '../storage/types.js';

type TaskOutcome =
  | 'persisted'
  | 'skipped-no-entity'
  | 'skipped-no-children'
  | 'skipped-already-processed'
  | 'skipped-not-found'
  | 'failed-skipped';

/** Outcomes the pipeline itself reaches; the rest come from the retry policy. */
type PipelineOutcome = Exclude<TaskOutcome, 'skipped-not-found' | 'failed-skipped'>;

type PipelineResult = {
  outcome: PipelineOutcome;
  entityId?: string;
  records: ItemRecord[];
  pages?: number;
};

type PipelineContext = {
  task: Task;
  fetcher: Fetcher;
  isAlreadyProcessed: (entityId: string) => Promise<boolean>;
  callDelayMs: number;
  maxPages: number;
  statsBatchSize: number;
  sleepFn: (ms: number) => Promise<void>;
  metrics?: IngestMetrics;
};

type RunStatus =
  | 'completed'
  | 'credentials-exhausted'
  | 'persistence-failed'
  | 'halted'
  | 'interrupted';

type RunSummary = {
  status: RunStatus;
  total: number;
  startIndex: number;
  processedCount: number;
  dispatched: number;
  workers: number;
  outcomes: Record<TaskOutcome, number>;
  recordsWritten: number;
  credentials: CredentialPoolStats;
  durationMs: number;
};

type WorkerPoolConfig = {
  maxWorkers: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  flushEvery: number;
  callDelayMs: number;
  taskDelayMs: number;
  maxPages: number;
  statsBatchSize: number;
  onRetriesExhausted: RetriesExhaustedPolicy;
  metricsIntervalMs: number;
  handleSignals: boolean;
};

export type {
  PipelineContext,
  PipelineOutcome,
  PipelineResult,
  RunStatus,
  RunSummary,
  TaskOutcome,
  WorkerPoolConfig,
};
