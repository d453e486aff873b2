import { z } from 'zod';
import type { ConnectionConfig } from '../storage/postgres-sink.js';

const MAX_NUMBERED_KEYS = 10;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function blankToUndefined(value: unknown): unknown {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length ? trimmed : undefined;
  }

  return value;
}

const optionalText = z.preprocess(blankToUndefined, z.string().optional());

function textWithDefault(fallback: string) {
  return z.preprocess(blankToUndefined, z.string().default(fallback));
}

function integerWithDefault(fallback: number, min: number) {
  return z.preprocess(
    (value) => {
      const cleaned = blankToUndefined(value);
      if (typeof cleaned === 'string') {
        const parsedValue = Number(cleaned);
        return Number.isFinite(parsedValue) ? parsedValue : cleaned;
      }

      return cleaned;
    },
    z.number().int().min(min).default(fallback),
  );
}

const envSchema = z.object({
  DATABASE_URL: optionalText,
  DB_HOST: textWithDefault('localhost'),
  DB_PORT: integerWithDefault(5432, 1),
  DB_NAME: optionalText,
  DB_USER: optionalText,
  DB_PASSWORD: optionalText,
  DB_SCHEMA: textWithDefault('recycle_bin'),
  DB_TABLE: textWithDefault('youtube_scraped_data'),
  YOUTUBE_API_KEYS: optionalText,
  YOUTUBE_API_BASE_URL: z.preprocess(
    blankToUndefined,
    z.string().url().default('https://www.googleapis.com/youtube/v3'),
  ),
  INPUT_FILE: textWithDefault('channels.csv'),
  INPUT_COLUMN: optionalText,
  CHECKPOINT_FILE: textWithDefault('checkpoint.json'),
  FLUSH_EVERY: integerWithDefault(3, 1),
  MAX_WORKERS: integerWithDefault(4, 1),
  MAX_RETRIES: integerWithDefault(3, 0),
  ON_RETRIES_EXHAUSTED: z.preprocess(
    (value) => {
      const cleaned = blankToUndefined(value);
      return typeof cleaned === 'string' ? cleaned.toLowerCase() : cleaned;
    },
    z.enum(['skip', 'halt']).default('skip'),
  ),
  CALL_DELAY_MS: integerWithDefault(200, 0),
  TASK_DELAY_MS: integerWithDefault(1500, 0),
  REQUEST_TIMEOUT_MS: integerWithDefault(10_000, 1),
  MAX_PAGES: integerWithDefault(1000, 1),
  ERROR_SNAPSHOT_DIR: textWithDefault('tmp/errors'),
});

type IngestConfig = {
  database: ConnectionConfig | undefined;
  schema: string;
  table: string;
  apiKeys: string[];
  apiBaseUrl: string;
  inputFile: string;
  inputColumn: string | undefined;
  checkpointFile: string;
  flushEvery: number;
  maxWorkers: number;
  maxRetries: number;
  onRetriesExhausted: 'skip' | 'halt';
  callDelayMs: number;
  taskDelayMs: number;
  requestTimeoutMs: number;
  maxPages: number;
  errorSnapshotDir: string;
};

/** `YOUTUBE_API_KEYS` first, then `YOUTUBE_API_KEY_1..10`; blanks and repeats dropped. */
export function collectApiKeys(
  env: NodeJS.ProcessEnv,
  listed: string | undefined,
): string[] {
  const keys = (listed ?? '').split(',');
  for (let index = 1; index <= MAX_NUMBERED_KEYS; index++) {
    keys.push(env[`YOUTUBE_API_KEY_${index}`] ?? '');
  }

  return [...new Set(keys.map((key) => key.trim()).filter((key) => key.length > 0))];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): IngestConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') ?? 'environment';
    throw new ConfigError(
      `Invalid ${variable}: ${issue?.message ?? 'unrecognized value'}`,
    );
  }

  const values = parsed.data;

  let database: ConnectionConfig | undefined;
  if (values.DATABASE_URL) {
    database = { connectionString: values.DATABASE_URL };
  } else if (values.DB_NAME && values.DB_USER) {
    database = {
      host: values.DB_HOST,
      port: values.DB_PORT,
      database: values.DB_NAME,
      user: values.DB_USER,
      password: values.DB_PASSWORD,
    };
  }

  return {
    database,
    schema: values.DB_SCHEMA,
    table: values.DB_TABLE,
    apiKeys: collectApiKeys(env, values.YOUTUBE_API_KEYS),
    apiBaseUrl: values.YOUTUBE_API_BASE_URL,
    inputFile: values.INPUT_FILE,
    inputColumn: values.INPUT_COLUMN,
    checkpointFile: values.CHECKPOINT_FILE,
    flushEvery: values.FLUSH_EVERY,
    maxWorkers: values.MAX_WORKERS,
    maxRetries: values.MAX_RETRIES,
    onRetriesExhausted: values.ON_RETRIES_EXHAUSTED,
    callDelayMs: values.CALL_DELAY_MS,
    taskDelayMs: values.TASK_DELAY_MS,
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    maxPages: values.MAX_PAGES,
    errorSnapshotDir: values.ERROR_SNAPSHOT_DIR,
  };
}

export type { IngestConfig };
