import { existsSync, mkdirSync, readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { createLogger } from '@workspace/logger';
import type { ErrorClassification } from '../policy/types.js';

const snapshotLog = createLogger('failure-snapshot');

type FailureSnapshotData = {
  sequenceIndex: number;
  entityHandle: string;
  classification: ErrorClassification;
  errorMessage: string;
  attempts: number;
  operation?: string;
  status?: number;
  reason?: string;
  timestamp: string;
};

type FailureSnapshotConfig = {
  directory: string;
  maxSnapshots: number;
};

const DEFAULT_CONFIG: FailureSnapshotConfig = {
  directory: 'tmp/errors',
  maxSnapshots: 100,
};

/**
 * One JSON file per permanently skipped task, capped so a broken run cannot
 * fill the disk.
 */
export class FailureSnapshotWriter {
  private readonly config: FailureSnapshotConfig;
  private snapshotCount: number;

  constructor(config?: Partial<FailureSnapshotConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.snapshotCount = 0;
  }

  initialize(): void {
    this.snapshotCount = this.countExistingSnapshots();
  }

  write(data: FailureSnapshotData): string | undefined {
    if (this.snapshotCount >= this.config.maxSnapshots) {
      snapshotLog.debug('Snapshot cap reached, not writing', {
        sequenceIndex: data.sequenceIndex,
        maxSnapshots: this.config.maxSnapshots,
      });
      return undefined;
    }

    const baseName = `${String(data.sequenceIndex).padStart(6, '0')}-${this.sanitizeFilename(data.entityHandle)}`;
    const path = join(this.config.directory, `${baseName}.json`);

    try {
      if (!existsSync(this.config.directory)) {
        mkdirSync(this.config.directory, { recursive: true });
      }

      writeFileSync(path, JSON.stringify(data, null, 2), 'utf-8');
    } catch (error) {
      snapshotLog.warn('Could not write failure snapshot', {
        path,
        err: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }

    this.snapshotCount += 1;
    return path;
  }

  getSnapshotCount(): number {
    return this.snapshotCount;
  }

  private countExistingSnapshots(): number {
    if (!existsSync(this.config.directory)) {
      return 0;
    }

    return readdirSync(this.config.directory).filter((file) =>
      file.endsWith('.json'),
    ).length;
  }

  private sanitizeFilename(value: string): string {
    const cleaned = value.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 100);
    return cleaned.length > 0 ? cleaned : 'blank';
  }
}

export type { FailureSnapshotConfig, FailureSnapshotData };
