import type { ErrorClassification } from '../policy/types.js';

type FetchErrorClassification = Exclude<ErrorClassification, 'persistence'>;

type FetchOperation = 'resolve' | 'fetchEntity' | 'fetchChildren' | 'fetchStats';

/**
 * Failure of one external call, carrying the classification the retry policy
 * acts on.
 */
export class FetchError extends Error {
  readonly classification: FetchErrorClassification;
  readonly operation: FetchOperation;
  readonly status: number | undefined;
  readonly reason: string | undefined;

  constructor(args: {
    classification: FetchErrorClassification;
    operation: FetchOperation;
    message: string;
    status?: number;
    reason?: string;
    cause?: unknown;
  }) {
    super(args.message, { cause: args.cause });
    this.name = 'FetchError';
    this.classification = args.classification;
    this.operation = args.operation;
    this.status = args.status;
    this.reason = args.reason;
  }
}

export type { FetchErrorClassification, FetchOperation };
