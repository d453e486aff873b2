type CheckpointState = {
  processedCount: number;
  lastHandle: string;
  timestamp: string;
  source?: string;
};

type CommitLogStats = {
  processedCount: number;
  bufferedTasks: number;
  bufferedRecords: number;
  flushes: number;
  recordsWritten: number;
};

export type { CheckpointState, CommitLogStats };
