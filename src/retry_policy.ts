/**
 * Retry policy: which failures are redelivered, and when.
 *
 * Owned by the orchestrator configuration. Workers consult it after recording a
 * failure but never schedule the retry themselves.
 */

import type { ErrorCode, FailureDescription } from './structured_error';

export const RETRYABLE_CODES: readonly ErrorCode[] = ['TRANSIENT_FETCH', 'COMPUTE_TIMEOUT'];

export interface RetrySettings {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

export type RetryDecision =
    | { retry: true; nextAttempt: number; delayMs: number }
    | { retry: false; reason: 'not_retryable' | 'attempts_exhausted' };

export class RetryPolicy {
    constructor(private readonly settings: RetrySettings) {}

    get maxAttempts(): number {
        return this.settings.maxAttempts;
    }

    /** Delay before re-running after `attempt` failed: base * 2^(attempt-1), capped. */
    backoffMs(attempt: number): number {
        const exp = Math.max(0, attempt - 1);
        return Math.min(this.settings.baseDelayMs * Math.pow(2, exp), this.settings.maxDelayMs);
    }

    decide(attempt: number, failure: Pick<FailureDescription, 'code' | 'retryable'>): RetryDecision {
        if (!failure.retryable || !RETRYABLE_CODES.includes(failure.code)) {
            return { retry: false, reason: 'not_retryable' };
        }
        if (attempt >= this.settings.maxAttempts) {
            return { retry: false, reason: 'attempts_exhausted' };
        }
        return { retry: true, nextAttempt: attempt + 1, delayMs: this.backoffMs(attempt) };
    }
}
