import { log } from '@workspace/logger';
import { z } from 'zod';
import { ConfigError, loadConfig } from '../config/env.js';
import { CheckpointStore } from '../pipeline/checkpoint-store.js';
import { formatJson } from '../utils/json.js';
import { pathOption } from './options.js';

const resetArgsSchema = z.object({
  checkpoint: pathOption('checkpoint'),
});

type ResetArgs = z.infer<typeof resetArgsSchema>;

export async function runResetAction(
  options: ResetArgs,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  let checkpointFile: string;
  try {
    checkpointFile = options.checkpoint ?? loadConfig(env).checkpointFile;
  } catch (error) {
    if (error instanceof ConfigError) {
      log.error(error.message);
      return 1;
    }
    throw error;
  }

  // Clearing never reads the file, so the source tag is irrelevant here
  const checkpoints = new CheckpointStore(checkpointFile, '');
  const removed = checkpoints.clear();
  log.info(removed ? 'Checkpoint removed' : 'No checkpoint to remove', {
    path: checkpoints.path,
  });

  console.log(formatJson({ checkpoint: checkpoints.path, removed }, false));
  return 0;
}

export { resetArgsSchema };
export type { ResetArgs };
