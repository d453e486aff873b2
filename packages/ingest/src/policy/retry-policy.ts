import { FetchError } from '../fetcher/fetch-error.js';
import { PersistenceError } from '../storage/persistence-error.js';
import type {
  ErrorClassification,
  RetryDecision,
  RetryPolicyConfig,
} from './types.js';

const DEFAULT_CONFIG: RetryPolicyConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  jitterRatio: 0.2,
  onRetriesExhausted: 'skip',
  randomFn: Math.random,
};

const QUOTA_MARKERS = ['quotaexceeded', 'dailylimitexceeded'];
const AUTH_MARKERS = ['keyinvalid', 'keyexpired', 'api key not valid'];

/**
 * Single place where a failed external call or sink write is turned into an
 * action: retry with backoff, rotate the credential, finish the task without
 * data, skip it, or halt the run.
 */
export class RetryPolicy {
  private readonly config: RetryPolicyConfig;

  constructor(config?: Partial<RetryPolicyConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get maxRetries(): number {
    return this.config.maxRetries;
  }

  classify(error: unknown): ErrorClassification {
    if (error instanceof FetchError) {
      return error.classification;
    }

    if (error instanceof PersistenceError) {
      return 'persistence';
    }

    const message = (
      error instanceof Error ? error.message : String(error)
    ).toLowerCase();

    if (QUOTA_MARKERS.some((marker) => message.includes(marker))) {
      return 'quota-exhausted';
    }

    if (AUTH_MARKERS.some((marker) => message.includes(marker))) {
      return 'fatal-auth';
    }

    return 'transient';
  }

  /**
   * `attempt` counts transient retries already spent on the current task;
   * credential rotations never add to it.
   */
  decide(classification: ErrorClassification, attempt: number): RetryDecision {
    switch (classification) {
      case 'not-found':
        return {
          action: 'complete',
          delayMs: 0,
          countsAgainstBudget: false,
          classification,
        };

      case 'quota-exhausted':
      case 'fatal-auth':
        return {
          action: 'rotate',
          delayMs: 0,
          countsAgainstBudget: false,
          classification,
        };

      case 'transient':
        if (attempt < this.config.maxRetries) {
          return {
            action: 'retry',
            delayMs: this.backoffDelay(attempt),
            countsAgainstBudget: true,
            classification,
          };
        }

        return {
          action: this.config.onRetriesExhausted,
          delayMs: 0,
          countsAgainstBudget: true,
          classification,
        };

      case 'persistence':
        // Records must never be dropped, so an exhausted write halts the run
        if (attempt < this.config.maxRetries) {
          return {
            action: 'retry',
            delayMs: this.backoffDelay(attempt),
            countsAgainstBudget: true,
            classification,
          };
        }

        return {
          action: 'halt',
          delayMs: 0,
          countsAgainstBudget: true,
          classification,
        };
    }
  }

  backoffDelay(attempt: number): number {
    const backoff = Math.min(
      this.config.maxDelayMs,
      this.config.baseDelayMs * Math.pow(2, attempt),
    );
    const jitterRatio = Math.min(1, Math.max(0, this.config.jitterRatio));
    const random = Math.min(1, Math.max(0, this.config.randomFn()));

    return backoff + Math.floor(backoff * jitterRatio * random);
  }
}
