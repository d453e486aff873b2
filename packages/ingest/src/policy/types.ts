type ErrorClassification =
  | 'not-found'
  | 'transient'
  | 'quota-exhausted'
  | 'fatal-auth'
  | 'persistence';

type RetryAction = 'retry' | 'rotate' | 'complete' | 'skip' | 'halt';

type RetryDecision = {
  action: RetryAction;
  delayMs: number;
  countsAgainstBudget: boolean;
  classification: ErrorClassification;
};

type RetriesExhaustedPolicy = 'skip' | 'halt';

type RetryPolicyConfig = {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number;
  onRetriesExhausted: RetriesExhaustedPolicy;
  randomFn: () => number;
};

export type {
  ErrorClassification,
  RetryAction,
  RetryDecision,
  RetriesExhaustedPolicy,
  RetryPolicyConfig,
};
