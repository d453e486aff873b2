import { resolve } from 'node:path';
import { log } from '@workspace/logger';
import { z } from 'zod';
import { ConfigError, loadConfig } from '../config/env.js';
import { CheckpointStore } from '../pipeline/checkpoint-store.js';
import { InputError, loadInputHandles } from '../queue/input-loader.js';
import { formatJson } from '../utils/json.js';
import { flagOption, pathOption } from './options.js';

const statusArgsSchema = z.object({
  input: pathOption('input'),
  column: pathOption('column'),
  checkpoint: pathOption('checkpoint'),
  pretty: flagOption(),
});

type StatusArgs = z.infer<typeof statusArgsSchema>;

type IngestStatus = {
  input: string;
  checkpoint: string;
  total: number;
  processedCount: number;
  remaining: number;
  lastHandle: string | null;
  updatedAt: string | null;
};

export async function runStatusAction(
  options: StatusArgs,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  try {
    const config = loadConfig(env);
    const input = options.input ?? config.inputFile;
    const handles = loadInputHandles(input, {
      column: options.column ?? config.inputColumn,
    });
    const checkpoints = new CheckpointStore(
      options.checkpoint ?? config.checkpointFile,
      resolve(input),
    );

    const state = checkpoints.load();
    const processedCount = Math.min(state?.processedCount ?? 0, handles.length);
    const status: IngestStatus = {
      input,
      checkpoint: checkpoints.path,
      total: handles.length,
      processedCount,
      remaining: handles.length - processedCount,
      lastHandle: state?.lastHandle ?? null,
      updatedAt: state?.timestamp ?? null,
    };

    console.log(formatJson(status, options.pretty));
    return 0;
  } catch (error) {
    if (error instanceof ConfigError || error instanceof InputError) {
      log.error(error.message);
      return 1;
    }
    throw error;
  }
}

export { statusArgsSchema };
export type { IngestStatus, StatusArgs };
