type Task = {
  readonly sequenceIndex: number;
  readonly entityHandle: string;
};

type InputOptions = {
  column?: string;
};

export type { Task, InputOptions };
