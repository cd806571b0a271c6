/**
 * RetryPolicy - one place for max attempts and failure classification.
 *
 * @module deploy/slotcast/scheduler/retry-policy
 */

import { PublishError, errorMessage } from '../errors.js';
import type { EntryError, FailureKind } from '../types.js';

export interface RetryPolicyConfig {
  /** Attempts per slot before an entry fails (default: 3) */
  maxAttempts: number;
  /** Recovery sweeps per entry before it needs a human (default: 2) */
  maxRecoveryRounds: number;
}

export type RetryDecision = 'retry' | 'fail';

const FATAL_KINDS: ReadonlySet<FailureKind> = new Set(['auth', 'validation']);

export const DEFAULT_RETRY_POLICY: RetryPolicyConfig = {
  maxAttempts: 3,
  maxRecoveryRounds: 2,
};

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly maxRecoveryRounds: number;

  constructor(config?: Partial<RetryPolicyConfig>) {
    this.maxAttempts = config?.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts;
    this.maxRecoveryRounds = config?.maxRecoveryRounds ?? DEFAULT_RETRY_POLICY.maxRecoveryRounds;
  }

  /** Anything that is not a PublishError counts as transient. */
  classify(error: unknown): FailureKind {
    return error instanceof PublishError ? error.kind : 'transient';
  }

  isFatal(kind: FailureKind): boolean {
    return FATAL_KINDS.has(kind);
  }

  /**
   * Decide what happens after a failed attempt. `attemptCount` already
   * includes the attempt that just failed.
   */
  decide(kind: FailureKind, attemptCount: number): RetryDecision {
    if (this.isFatal(kind)) return 'fail';
    return attemptCount < this.maxAttempts ? 'retry' : 'fail';
  }

  /** Whether the recovery sweeper may pick up a failed entry. */
  isRecoverable(lastError: EntryError | null, recoveryRounds: number): boolean {
    if (lastError && this.isFatal(lastError.kind)) return false;
    return recoveryRounds < this.maxRecoveryRounds;
  }

  toEntryError(error: unknown, at: Date): EntryError {
    return { kind: this.classify(error), message: errorMessage(error), at: at.toISOString() };
  }
}
