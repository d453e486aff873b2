import { resolve } from 'node:path';
import { log } from '@workspace/logger';
import { z } from 'zod';
import { ConfigError, loadConfig, type IngestConfig } from '../config/env.js';
import { CredentialPool } from '../credentials/credential-pool.js';
import type { FetcherFactory } from '../fetcher/types.js';
import { createYouTubeFetcherFactory } from '../fetcher/youtube-client.js';
import { FailureSnapshotWriter } from '../observability/failure-snapshot.js';
import { IngestRunner, RUN_EXIT_CODES } from '../orchestrator/worker-pool.js';
import { CheckpointStore } from '../pipeline/checkpoint-store.js';
import { InputError, loadInputHandles } from '../queue/input-loader.js';
import { TaskSource } from '../queue/task-source.js';
import { InMemoryItemSink } from '../storage/in-memory-sink.js';
import { PersistenceError } from '../storage/persistence-error.js';
import {
  PostgresItemSink,
  createPostgresPool,
  type ConnectionConfig,
} from '../storage/postgres-sink.js';
import type { ItemSink, SqlPool } from '../storage/types.js';
import { formatJson } from '../utils/json.js';
import { flagOption, integerOption, pathOption } from './options.js';

const runArgsSchema = z.object({
  input: pathOption('input'),
  column: pathOption('column'),
  checkpoint: pathOption('checkpoint'),
  workers: integerOption('workers', 1),
  flushEvery: integerOption('flushEvery', 1),
  maxRetries: integerOption('maxRetries', 0),
  onRetriesExhausted: z
    .preprocess(
      (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      z.enum(['skip', 'halt'], {
        errorMap: () => ({
          message: 'Invalid --onRetriesExhausted. Use skip or halt.',
        }),
      }),
    )
    .optional(),
  fresh: flagOption(),
  dryRun: flagOption(),
  pretty: flagOption(),
});

type RunArgs = z.infer<typeof runArgsSchema>;

/** Seams the CLI leaves at their defaults. */
type RunActionContext = {
  env?: NodeJS.ProcessEnv;
  fetcherFactory?: FetcherFactory;
  createPool?: (connection: ConnectionConfig) => SqlPool;
  sleepFn?: (ms: number) => Promise<void>;
  handleSignals?: boolean;
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function openSink(
  config: IngestConfig,
  dryRun: boolean,
  createPool: (connection: ConnectionConfig) => SqlPool,
): Promise<ItemSink | undefined> {
  if (dryRun) {
    return new InMemoryItemSink();
  }

  if (!config.database) {
    log.error(
      'Database is not configured. Set DATABASE_URL or DB_NAME and DB_USER, or pass --dryRun.',
    );
    return undefined;
  }

  const sink = new PostgresItemSink(createPool(config.database), {
    schema: config.schema,
    table: config.table,
  });
  try {
    await sink.ensureSchema();
  } catch (error) {
    await sink.close().catch((closeError: unknown) => {
      log.warn('Could not close the sink', { err: describeError(closeError) });
    });
    throw error;
  }
  return sink;
}

export async function runIngestAction(
  options: RunArgs,
  context: RunActionContext = {},
): Promise<number> {
  let config: IngestConfig;
  let handles: string[];
  try {
    config = loadConfig(context.env);
    handles = loadInputHandles(options.input ?? config.inputFile, {
      column: options.column ?? config.inputColumn,
    });
  } catch (error) {
    if (error instanceof ConfigError || error instanceof InputError) {
      log.error(error.message);
      return 1;
    }
    throw error;
  }

  const inputFile = options.input ?? config.inputFile;
  const checkpoints = new CheckpointStore(
    options.checkpoint ?? config.checkpointFile,
    resolve(inputFile),
  );
  if (options.fresh && checkpoints.clear()) {
    log.info('Removed existing checkpoint', { path: checkpoints.path });
  }

  log.info('Starting ingest run', {
    input: inputFile,
    rows: handles.length,
    checkpoint: checkpoints.path,
    credentials: config.apiKeys.length,
    dryRun: options.dryRun,
  });

  let sink: ItemSink | undefined;
  try {
    sink = await openSink(
      config,
      options.dryRun,
      context.createPool ?? createPostgresPool,
    );
  } catch (error) {
    log.error('Could not prepare the target table', {
      err: describeError(error),
    });
    return error instanceof PersistenceError
      ? RUN_EXIT_CODES['persistence-failed']
      : 1;
  }

  if (!sink) {
    return 1;
  }

  const snapshots = new FailureSnapshotWriter({
    directory: config.errorSnapshotDir,
  });
  snapshots.initialize();

  const runner = new IngestRunner(
    {
      credentials: new CredentialPool(config.apiKeys),
      source: new TaskSource(handles, checkpoints),
      sink,
      fetcherFactory:
        context.fetcherFactory ??
        createYouTubeFetcherFactory({
          baseUrl: config.apiBaseUrl,
          timeoutMs: config.requestTimeoutMs,
        }),
      snapshots,
      sleepFn: context.sleepFn,
    },
    {
      maxWorkers: options.workers ?? config.maxWorkers,
      flushEvery: options.flushEvery ?? config.flushEvery,
      maxRetries: options.maxRetries ?? config.maxRetries,
      onRetriesExhausted: options.onRetriesExhausted ?? config.onRetriesExhausted,
      callDelayMs: config.callDelayMs,
      taskDelayMs: config.taskDelayMs,
      maxPages: config.maxPages,
      handleSignals: context.handleSignals ?? true,
    },
  );

  try {
    const summary = await runner.run();
    console.log(formatJson(summary, options.pretty));
    return RUN_EXIT_CODES[summary.status];
  } finally {
    await sink.close().catch((error: unknown) => {
      log.warn('Could not close the sink', { err: describeError(error) });
    });
  }
}

export { runArgsSchema };
export type { RunActionContext, RunArgs };
