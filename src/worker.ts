/**
 * ReportWorker — computes one instrument's report for one Execution.
 *
 * Per delivery:
 *   1. Skip duplicates and stale attempts (idempotent under redelivery)
 *   2. Mark the job running
 *   3. Build the report under a hard timeout, tracking resource usage
 *   4. Score the usage; over-budget is a hard stop
 *   5. Write the cache entry and the terminal job state
 *
 * Compute failures are captured into the job record and the cache. Failures
 * while RECORDING an outcome propagate so the queue redelivers the message.
 */

import type { Instrument, InstrumentRegistry } from './instrument_registry';
import type { JobKey, JobStateStore } from './job_state_store';
import type { ReportCache } from './report_cache';
import type { CostGate, CostScore, ResourceUsage } from './cost_gate';
import type { RetryDecision, RetryPolicy } from './retry_policy';
import type { ComputeMessage } from './work_queue';
import type { FailureDescription } from './structured_error';
import { BudgetExceededError, ComputeError, describeFailure, isFatal } from './structured_error';
import { withTimeout } from './timeout';
import { createLogger } from './logger';

const baseLog = createLogger('worker');

/* -------------------------------------------------------------------------- */
/* Builder contract                                                           */
/* -------------------------------------------------------------------------- */

/** Accumulates the resources one computation consumed. */
export class UsageTracker {
    private promptTokens = 0;
    private completionTokens = 0;
    private queryCount = 0;

    addTokens(prompt: number, completion: number): void {
        this.promptTokens += prompt;
        this.completionTokens += completion;
    }

    addQueries(count = 1): void {
        this.queryCount += count;
    }

    snapshot(): ResourceUsage {
        return { promptTokens: this.promptTokens, completionTokens: this.completionTokens, queryCount: this.queryCount };
    }
}

export interface BuildContext {
    instrument: Instrument;
    asOfDate: string;
    executionId: string;
    attempt: number;
    usage: UsageTracker;
    /** Fires when the hard compute timeout expires. */
    signal: AbortSignal;
}

/**
 * Produces report content. Throw TransientFetchError for failures worth
 * retrying; anything else is recorded as a permanent compute error.
 */
export interface ReportBuilder {
    build(ctx: BuildContext): Promise<unknown>;
}

/* -------------------------------------------------------------------------- */
/* Outcomes                                                                   */
/* -------------------------------------------------------------------------- */

export type SkipReason = 'duplicate' | 'stale' | 'unknown_job' | 'superseded';

export type WorkOutcome =
    | { status: 'skipped'; reason: SkipReason }
    | { status: 'success'; score: CostScore; cacheWritten: boolean }
    | { status: 'failed'; failure: FailureDescription; retry: RetryDecision; score?: CostScore };

export interface WorkerSettings {
    ttlMs: number;
    errorTtlMs: number;
    computeTimeoutMs: number;
}

export interface WorkerDeps {
    jobs: JobStateStore;
    cache: ReportCache;
    costGate: CostGate;
    retryPolicy: RetryPolicy;
    registry: InstrumentRegistry;
    builder: ReportBuilder;
    settings: WorkerSettings;
    now?: () => Date;
}

type BuildResult = { ok: true; payload: unknown } | { ok: false; error: unknown };

type ComputeResult =
    | { ok: true; payload: unknown; score: CostScore }
    | { ok: false; error: unknown; score?: CostScore };

/* -------------------------------------------------------------------------- */
/* Worker                                                                     */
/* -------------------------------------------------------------------------- */

export class ReportWorker {
    private readonly now: () => Date;

    constructor(private readonly deps: WorkerDeps) {
        this.now = deps.now ?? (() => new Date());
    }

    async process(message: ComputeMessage): Promise<WorkOutcome> {
        const { jobs } = this.deps;
        const key: JobKey = { executionId: message.execution_id, instrumentId: message.instrument_id };
        const attempt = message.attempt;
        const log = baseLog.bind({ execution_id: key.executionId, instrument: key.instrumentId, attempt });

        const job = jobs.getJob(key);
        const execution = job ? jobs.getExecution(key.executionId) : null;
        if (!job || !execution) {
            log.warn(`No job record for message, skipping`);
            return { status: 'skipped', reason: 'unknown_job' };
        }
        if (job.state === 'success' || (job.state === 'failed' && job.attemptCount >= attempt)) {
            log.debug(`Duplicate delivery skipped`, { state: job.state });
            return { status: 'skipped', reason: 'duplicate' };
        }
        if (attempt !== job.attemptCount) {
            log.debug(`Stale delivery skipped`, { current_attempt: job.attemptCount });
            return { status: 'skipped', reason: 'stale' };
        }

        jobs.markRunning(key, attempt, this.now());
        log.info(`Computing report`, { as_of_date: execution.asOfDate });

        const instrument = this.deps.registry.get(key.instrumentId) ?? { id: key.instrumentId, name: key.instrumentId };
        const result = await this.compute(instrument, execution.asOfDate, key.executionId, attempt);

        if (!result.ok && isFatal(result.error)) throw result.error;

        // Another delivery of the same attempt may have finished while this one computed.
        const current = jobs.getJob(key);
        if (!current || current.state !== 'running' || current.attemptCount !== attempt) {
            log.warn(`Job moved on while computing, discarding result`, { state: current?.state });
            return { status: 'skipped', reason: 'superseded' };
        }

        if (result.ok) return this.recordSuccess(key, execution.asOfDate, attempt, result.payload, result.score);
        return this.recordFailure(key, execution.asOfDate, attempt, result.error, result.score);
    }

    private async compute(instrument: Instrument, asOfDate: string, executionId: string, attempt: number): Promise<ComputeResult> {
        const { builder, costGate, settings } = this.deps;
        const usage = new UsageTracker();

        const built = await withTimeout(
            signal => builder.build({ instrument, asOfDate, executionId, attempt, usage, signal }),
            settings.computeTimeoutMs,
            `${instrument.id}@${asOfDate}`
        ).then(
            (payload): BuildResult => ({ ok: true, payload }),
            (error: unknown): BuildResult => ({ ok: false, error })
        );

        // Usage reported by the builder is untrusted: a bad count fails this attempt, not the delivery.
        let score: CostScore;
        try {
            score = costGate.score(usage.snapshot());
        } catch (cause) {
            if (!built.ok) return built;
            const reason = cause instanceof Error ? cause.message : String(cause);
            return {
                ok: false,
                error: new ComputeError(`Invalid resource usage reported: ${reason}`, { instrument: instrument.id }, { cause }),
            };
        }
        costGate.record(executionId, instrument.id, score);

        if (!built.ok) return { ok: false, error: built.error, score };
        if (costGate.isHardStop(score)) {
            return { ok: false, error: new BudgetExceededError(score, costGate.overBudgetAt), score };
        }
        return { ok: true, payload: built.payload, score };
    }

    private recordSuccess(key: JobKey, asOfDate: string, attempt: number, payload: unknown, score: CostScore): WorkOutcome {
        const computedAt = this.now();
        const { written } = this.deps.cache.put({
            instrumentId: key.instrumentId,
            asOfDate,
            status: 'success',
            payload,
            computedAt,
            ttlMs: this.deps.settings.ttlMs,
            executionId: key.executionId,
        });
        this.deps.jobs.markSuccess(key, attempt, computedAt, score);

        baseLog.bind({ execution_id: key.executionId, instrument: key.instrumentId, attempt })
            .info(`Report computed`, { cost: score.total, band: score.band, cache_written: written });
        return { status: 'success', score, cacheWritten: written };
    }

    private recordFailure(key: JobKey, asOfDate: string, attempt: number, error: unknown, score?: CostScore): WorkOutcome {
        const failure = describeFailure(error);
        const retry = this.deps.retryPolicy.decide(attempt, failure);
        const at = this.now();

        this.deps.cache.put({
            instrumentId: key.instrumentId,
            asOfDate,
            status: 'error',
            errorMessage: failure.message,
            computedAt: at,
            ttlMs: this.deps.settings.errorTtlMs,
            executionId: key.executionId,
        });
        this.deps.jobs.markFailed(
            key,
            attempt,
            at,
            { message: failure.message, code: failure.code, cost: score },
            retry.retry ? retry.nextAttempt : undefined
        );

        const log = baseLog.bind({ execution_id: key.executionId, instrument: key.instrumentId, attempt });
        if (retry.retry) {
            log.warn(`Attempt failed, retry scheduled`, { code: failure.code, error: failure.message, next_attempt: retry.nextAttempt, delay_ms: retry.delayMs });
        } else {
            log.error(`Report failed`, { code: failure.code, error: failure.message, reason: retry.reason });
        }
        return { status: 'failed', failure, retry, score };
    }
}
