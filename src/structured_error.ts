/**
 * Error taxonomy for the precompute pipeline.
 *
 * Every failure a Worker can hit is normalised into a code, a message and a
 * retryable flag before it is written to the job state store and the report
 * cache. Readers only ever see the stored message, never a raw exception.
 */

import type { CostScore } from './cost_gate';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Worker-local failures (recorded per job)
    | 'TRANSIENT_FETCH'
    | 'COMPUTE_ERROR'
    | 'COMPUTE_TIMEOUT'
    | 'BUDGET_EXCEEDED'

    // Pipeline plumbing
    | 'DISPATCH_ERROR'
    | 'SCHEMA_MISMATCH'
    | 'INVALID_STATE_TRANSITION'
    | 'EXECUTION_LOCKED'

    // Caller errors
    | 'INVALID_CONFIG'
    | 'INVALID_REQUEST'
    | 'NOT_FOUND';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export interface FailureDescription {
    code: ErrorCode;
    message: string;
    retryable: boolean;
    severity: Severity;
}

/* -------------------------------------------------------------------------- */
/* Error classes                                                              */
/* -------------------------------------------------------------------------- */

export class PipelineError extends Error {
    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly retryable: boolean = false,
        public readonly context: Record<string, unknown> = {},
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'PipelineError';
    }
}

export class TransientFetchError extends PipelineError {
    constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
        super(message, 'TRANSIENT_FETCH', true, context, options);
        this.name = 'TransientFetchError';
    }
}

export class ComputeError extends PipelineError {
    constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
        super(message, 'COMPUTE_ERROR', false, context, options);
        this.name = 'ComputeError';
    }
}

export class ComputeTimeoutError extends PipelineError {
    constructor(public readonly timeoutMs: number, label: string) {
        super(`Computation timed out after ${timeoutMs}ms for ${label}`, 'COMPUTE_TIMEOUT', true, { timeout_ms: timeoutMs });
        this.name = 'ComputeTimeoutError';
    }
}

export class BudgetExceededError extends PipelineError {
    constructor(public readonly score: CostScore, public readonly limit: number) {
        super(
            `Budget exceeded: report cost ${score.total.toFixed(4)} ${score.currency} reached the ${limit.toFixed(2)} ${score.currency} over-budget limit`,
            'BUDGET_EXCEEDED',
            false,
            { total: score.total, band: score.band, limit }
        );
        this.name = 'BudgetExceededError';
    }
}

export class DispatchError extends PipelineError {
    constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
        super(message, 'DISPATCH_ERROR', false, context, options);
        this.name = 'DispatchError';
    }
}

export class SchemaMismatchError extends PipelineError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super(message, 'SCHEMA_MISMATCH', false, context);
        this.name = 'SchemaMismatchError';
    }
}

export class StateTransitionError extends PipelineError {
    constructor(public readonly from: string, public readonly to: string, context: Record<string, unknown> = {}) {
        super(`Invalid job state transition ${from} → ${to}`, 'INVALID_STATE_TRANSITION', false, { from, to, ...context });
        this.name = 'StateTransitionError';
    }
}

export class ExecutionLockedError extends PipelineError {
    constructor(public readonly lockKey: string, public readonly heldBy: string) {
        super(`Execution lock for ${lockKey} is held by ${heldBy}`, 'EXECUTION_LOCKED', false, { lock_key: lockKey, held_by: heldBy });
        this.name = 'ExecutionLockedError';
    }
}

export class ConfigError extends PipelineError {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`, 'INVALID_CONFIG', false, { issues });
        this.name = 'ConfigError';
    }
}

export class InvalidRequestError extends PipelineError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super(message, 'INVALID_REQUEST', false, context);
        this.name = 'InvalidRequestError';
    }
}

export class NotFoundError extends PipelineError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super(message, 'NOT_FOUND', false, context);
        this.name = 'NotFoundError';
    }
}

/* -------------------------------------------------------------------------- */
/* Classification                                                             */
/* -------------------------------------------------------------------------- */

function getSeverity(code: ErrorCode): Severity {
    const fatalCodes: ErrorCode[] = ['SCHEMA_MISMATCH', 'INVALID_CONFIG'];
    const warningCodes: ErrorCode[] = ['TRANSIENT_FETCH', 'COMPUTE_TIMEOUT', 'EXECUTION_LOCKED'];

    if (fatalCodes.includes(code)) return 'FATAL';
    if (warningCodes.includes(code)) return 'WARNING';
    return 'ERROR';
}

/**
 * Normalise anything thrown into a recordable failure. Values that are not
 * PipelineErrors are treated as non-retryable compute errors.
 */
export function describeFailure(err: unknown): FailureDescription {
    if (err instanceof PipelineError) {
        return { code: err.code, message: err.message, retryable: err.retryable, severity: getSeverity(err.code) };
    }
    const message = err instanceof Error ? err.message : String(err);
    return { code: 'COMPUTE_ERROR', message: message || 'Unknown compute failure', retryable: false, severity: 'ERROR' };
}

export function isFatal(err: unknown): boolean {
    return err instanceof PipelineError && getSeverity(err.code) === 'FATAL';
}
