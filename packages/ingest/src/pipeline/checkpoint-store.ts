import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { createLogger } from '@workspace/logger';
import type { CheckpointState } from './types.js';

const checkpointLog = createLogger('checkpoint');

const checkpointFileSchema = z.object({
  processed_count: z.number().int().min(0),
  last_handle: z.string(),
  timestamp: z.string(),
  source: z.string().optional(),
});

type CheckpointFile = z.infer<typeof checkpointFileSchema>;

/**
 * Durable progress cursor. Only the count of leading input rows whose outcome
 * is recorded lives here; ingested records go to the sink.
 */
export class CheckpointStore {
  private readonly checkpointPath: string;
  private readonly tmpPath: string;
  private readonly source: string;

  constructor(checkpointPath: string, source: string) {
    this.checkpointPath = checkpointPath;
    this.tmpPath = `${checkpointPath}.tmp`;
    this.source = source;
  }

  get path(): string {
    return this.checkpointPath;
  }

  /** Absent, corrupt, or foreign checkpoints all read as "no checkpoint". */
  load(): CheckpointState | undefined {
    if (!existsSync(this.checkpointPath)) {
      return undefined;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.checkpointPath, 'utf-8'));
    } catch (error) {
      checkpointLog.warn('Ignoring unreadable checkpoint', {
        path: this.checkpointPath,
        err: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }

    const parsed = checkpointFileSchema.safeParse(raw);
    if (!parsed.success) {
      checkpointLog.warn('Ignoring malformed checkpoint', {
        path: this.checkpointPath,
        issue: parsed.error.issues[0]?.message,
      });
      return undefined;
    }

    const saved = parsed.data;
    if (saved.source !== undefined && saved.source !== this.source) {
      checkpointLog.warn('Ignoring checkpoint recorded for another input', {
        path: this.checkpointPath,
        recordedSource: saved.source,
        source: this.source,
      });
      return undefined;
    }

    return {
      processedCount: saved.processed_count,
      lastHandle: saved.last_handle,
      timestamp: saved.timestamp,
      source: saved.source,
    };
  }

  resume(total?: number): number {
    const state = this.load();
    if (!state) {
      return 0;
    }

    return total === undefined
      ? state.processedCount
      : Math.min(state.processedCount, total);
  }

  /** Write-temp-then-rename, so readers see the old file or the new one. */
  commit(processedCount: number, lastHandle: string): CheckpointState {
    const file: CheckpointFile = {
      processed_count: processedCount,
      last_handle: lastHandle,
      timestamp: new Date().toISOString(),
      source: this.source,
    };

    const dir = dirname(this.checkpointPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    writeFileSync(this.tmpPath, JSON.stringify(file, null, 2), 'utf-8');
    renameSync(this.tmpPath, this.checkpointPath);

    return {
      processedCount,
      lastHandle,
      timestamp: file.timestamp,
      source: this.source,
    };
  }

  clear(): boolean {
    let removed = false;
    for (const path of [this.checkpointPath, this.tmpPath]) {
      if (existsSync(path)) {
        rmSync(path);
        removed = true;
      }
    }

    return removed;
  }
}
