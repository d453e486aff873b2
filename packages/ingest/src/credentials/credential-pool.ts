import { createLogger } from '@workspace/logger';
import type {
  Credential,
  CredentialPoolStats,
  ExhaustionReason,
} from './types.js';

const poolLog = createLogger('credential-pool');

type PooledCredential = {
  id: number;
  secret: string;
  exhausted: boolean;
};

/**
 * Round-robin pool of API credentials with reactive exhaustion tracking.
 *
 * Workers share one instance. `acquire` and `markExhausted` never await, so
 * each call runs to completion on the event loop before another worker can
 * observe the pool.
 */
export class CredentialPool {
  private readonly credentials: PooledCredential[];
  private cursor: number;

  constructor(secrets: readonly string[]) {
    const unique = [...new Set(secrets.map((secret) => secret.trim()))].filter(
      (secret) => secret.length > 0,
    );

    this.credentials = unique.map((secret, index) => ({
      id: index + 1,
      secret,
      exhausted: false,
    }));
    this.cursor = 0;
  }

  get size(): number {
    return this.credentials.length;
  }

  /**
   * Returns the next non-exhausted credential, starting after the last one
   * handed out. Probes each credential at most once.
   */
  acquire(): Credential | undefined {
    const total = this.credentials.length;

    for (let probe = 0; probe < total; probe++) {
      const index = (this.cursor + probe) % total;
      const credential = this.credentials[index];

      if (credential && !credential.exhausted) {
        this.cursor = (index + 1) % total;
        return credential;
      }
    }

    return undefined;
  }

  /** Returns true only for the call that flipped the flag. */
  markExhausted(id: number, reason: ExhaustionReason): boolean {
    const credential = this.credentials.find((entry) => entry.id === id);
    if (!credential || credential.exhausted) {
      return false;
    }

    credential.exhausted = true;
    const stats = this.getStats();
    poolLog.warn('Credential exhausted', {
      credentialId: id,
      reason,
      available: stats.available,
      total: stats.total,
    });

    if (stats.available === 0) {
      poolLog.error('All credentials exhausted', { total: stats.total });
    }

    return true;
  }

  hasAvailable(): boolean {
    return this.credentials.some((credential) => !credential.exhausted);
  }

  getStats(): CredentialPoolStats {
    const exhausted = this.credentials.filter(
      (credential) => credential.exhausted,
    ).length;

    return {
      total: this.credentials.length,
      available: this.credentials.length - exhausted,
      exhausted,
    };
  }
}
