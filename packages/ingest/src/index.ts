export { CredentialPool } from "./credentials/credential-pool.js";
export type {
  Credential,
  CredentialPoolStats,
  ExhaustionReason
} from "./credentials/types.js";
export { InputError, loadInputHandles, parseInputHandles } from "./queue/input-loader.js";
export { TaskQueue, TaskSource } from "./queue/task-source.js";
export type { InputOptions, Task } from "./queue/types.js";
export { CheckpointStore } from "./pipeline/checkpoint-store.js";
export { CommitLog } from "./pipeline/commit-log.js";
export { mergeItemRecords } from "./pipeline/merge-records.js";
export type { CheckpointState, CommitLogStats } from "./pipeline/types.js";
export { RetryPolicy } from "./policy/retry-policy.js";
export type {
  ErrorClassification,
  RetriesExhaustedPolicy,
  RetryAction,
  RetryDecision,
  RetryPolicyConfig
} from "./policy/types.js";
export { IngestRunner, RUN_EXIT_CODES } from "./orchestrator/worker-pool.js";
export {
  collectChildren,
  collectStats,
  runTaskPipeline
} from "./orchestrator/task-pipeline.js";
export type {
  PipelineResult,
  RunStatus,
  RunSummary,
  TaskOutcome,
  WorkerPoolConfig
} from "./orchestrator/types.js";
export { PersistenceError } from "./storage/persistence-error.js";
export { InMemoryItemSink } from "./storage/in-memory-sink.js";
export {
  PostgresItemSink,
  createPostgresPool,
  type ConnectionConfig
} from "./storage/postgres-sink.js";
export type { ItemRecord, ItemSink, SqlPool, UpsertResult } from "./storage/types.js";
export { FetchError } from "./fetcher/fetch-error.js";
export {
  YouTubeDataClient,
  classifyApiFailure,
  createYouTubeFetcherFactory
} from "./fetcher/youtube-client.js";
export { MAX_STATS_BATCH } from "./fetcher/types.js";
export type {
  ChildItem,
  ChildPage,
  EntitySnapshot,
  Fetcher,
  FetcherFactory,
  StatsSnapshot
} from "./fetcher/types.js";
export { IngestMetrics } from "./observability/metrics.js";
export { FailureSnapshotWriter } from "./observability/failure-snapshot.js";
export { ConfigError, loadConfig, type IngestConfig } from "./config/env.js";
