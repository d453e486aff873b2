import type { CheckpointStore } from '../pipeline/checkpoint-store.js';
import type { Task } from './types.js';

/**
 * Ordered work list backed by the input handles. The resume index comes from
 * the last durable checkpoint.
 */
export class TaskSource {
  private readonly handles: readonly string[];
  private readonly checkpoints: CheckpointStore;

  constructor(handles: readonly string[], checkpoints: CheckpointStore) {
    this.handles = handles;
    this.checkpoints = checkpoints;
  }

  get checkpointStore(): CheckpointStore {
    return this.checkpoints;
  }

  get total(): number {
    return this.handles.length;
  }

  resume(): number {
    return this.checkpoints.resume(this.handles.length);
  }

  *nextBatch(fromIndex: number = this.resume()): Generator<Task> {
    for (
      let index = Math.max(0, fromIndex);
      index < this.handles.length;
      index++
    ) {
      yield { sequenceIndex: index, entityHandle: this.handles[index] ?? '' };
    }
  }
}

/**
 * Single-consumption queue shared by all workers. `take` never awaits, so no
 * two workers can receive the same task.
 */
export class TaskQueue {
  private readonly iterator: Iterator<Task>;
  private delivered: number;
  private drained: boolean;

  constructor(tasks: Iterable<Task>) {
    this.iterator = tasks[Symbol.iterator]();
    this.delivered = 0;
    this.drained = false;
  }

  take(): Task | undefined {
    if (this.drained) {
      return undefined;
    }

    const next = this.iterator.next();
    if (next.done) {
      this.drained = true;
      return undefined;
    }

    this.delivered += 1;
    return next.value;
  }

  get deliveredCount(): number {
    return this.delivered;
  }

  get isDrained(): boolean {
    return this.drained;
  }
}
