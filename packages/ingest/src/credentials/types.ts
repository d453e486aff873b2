type ExhaustionReason = 'quota-exhausted' | 'fatal-auth';

type Credential = {
  readonly id: number;
  readonly secret: string;
  readonly exhausted: boolean;
};

type CredentialPoolStats = {
  total: number;
  available: number;
  exhausted: number;
};

export type { Credential, CredentialPoolStats, ExhaustionReason };
