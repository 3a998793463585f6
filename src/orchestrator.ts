/**
 * Orchestrator — turns a trigger into an Execution and fans out work.
 *
 * start() validates, selects instruments, takes the per-date execution lock,
 * creates the Execution with one pending JobRecord per instrument (one
 * transaction), enqueues one report.compute per instrument and returns.
 * It never waits for workers.
 *
 * Retry scheduling lives here too: workers decide nothing about redelivery
 * timing; the pool hands retry decisions back through redispatch().
 */

import { v4 as uuidv4 } from 'uuid';
import type { PipelineConfig } from './config';
import type { PipelineDatabase } from './pipeline_store';
import type { ExecutionRecord, JobStateStore } from './job_state_store';
import type { InstrumentRegistry } from './instrument_registry';
import type { RetryDecision, RetryPolicy } from './retry_policy';
import type { ComputeMessage, WorkQueue } from './work_queue';
import type { Redispatcher } from './worker_pool';
import type { ExecutionLock } from './execution_lock';
import { lockKeyForDate } from './execution_lock';
import { computeMessage } from './work_queue';
import { DispatchError, InvalidRequestError } from './structured_error';
import { createLogger } from './logger';

const log = createLogger('orchestrator');

export interface StartRequest {
    /** Take only the first `limit` registry instruments. */
    limit?: number;
    /** Trigger origin, recorded on the Execution. Default "manual". */
    source?: string;
    /** YYYY-MM-DD; defaults to today in the configured timezone. */
    asOfDate?: string;
    /** Start even if another execution holds the date's lock. */
    force?: boolean;
}

export interface StartResult {
    executionId: string;
    dispatchedCount: number;
    asOfDate: string;
    /** Instruments whose enqueue failed; their jobs stay pending. */
    undispatched: string[];
}

export interface RetryFailedResult {
    reopened: string[];
    exhausted: string[];
}

export interface RecoveryResult extends RetryFailedResult {
    /** Pending jobs re-enqueued at their current attempt. */
    resumed: number;
}

export interface OrchestratorDeps {
    db: PipelineDatabase;
    jobs: JobStateStore;
    lock: ExecutionLock;
    queue: WorkQueue;
    registry: InstrumentRegistry;
    retryPolicy: RetryPolicy;
    config: PipelineConfig;
    now?: () => Date;
}

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function newExecutionId(): string {
    return `exe_${uuidv4().replace(/-/g, '').slice(0, 12)}`;
}

/** Calendar date of `at` in `timeZone`, as YYYY-MM-DD. */
export function formatAsOfDate(at: Date, timeZone: string): string {
    const parts = new Intl.DateTimeFormat('en-US', { timeZone, year: 'numeric', month: '2-digit', day: '2-digit' }).formatToParts(at);
    const part = (type: Intl.DateTimeFormatPartTypes) => parts.find(p => p.type === type)?.value ?? '';
    return `${part('year')}-${part('month')}-${part('day')}`;
}

export class Orchestrator implements Redispatcher {
    private readonly now: () => Date;

    constructor(private readonly deps: OrchestratorDeps) {
        this.now = deps.now ?? (() => new Date());
    }

    start(request: StartRequest = {}): StartResult {
        const { config, registry, jobs, lock, db } = this.deps;

        const { limit, force = false } = request;
        if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
            throw new InvalidRequestError(`limit must be a positive integer, got ${limit}`, { limit });
        }
        const source = request.source ?? 'manual';
        if (!source.trim()) throw new InvalidRequestError('source must not be empty');

        const now = this.now();
        const asOfDate = request.asOfDate ?? formatAsOfDate(now, config.timezone);
        if (!DATE_RE.test(asOfDate) || Number.isNaN(Date.parse(`${asOfDate}T00:00:00Z`))) {
            throw new InvalidRequestError(`asOfDate must be YYYY-MM-DD, got "${asOfDate}"`, { as_of_date: asOfDate });
        }

        const instruments = registry.list(limit);
        const executionId = newExecutionId();

        db.transaction(() => {
            if (config.lock.mode === 'per-date' && !force) {
                lock.acquire(lockKeyForDate(asOfDate), executionId, now);
            } else if (force) {
                log.warn(`Execution lock bypassed (force)`, { execution_id: executionId, as_of_date: asOfDate });
            }
            jobs.createExecution({
                executionId,
                source,
                asOfDate,
                limit,
                instrumentIds: instruments.map(i => i.id),
                createdAt: now,
            });
        })();

        const undispatched: string[] = [];
        for (const instrument of instruments) {
            if (!this.dispatch(computeMessage(executionId, instrument.id, 1))) undispatched.push(instrument.id);
        }

        log.info(`Execution dispatched`, {
            execution_id: executionId,
            as_of_date: asOfDate,
            source,
            dispatched: instruments.length,
            undispatched: undispatched.length,
        });

        return { executionId, dispatchedCount: instruments.length, asOfDate, undispatched };
    }

    /** Enqueue the next attempt chosen by the retry policy. */
    redispatch(message: ComputeMessage, decision: Extract<RetryDecision, { retry: true }>): void {
        this.dispatch(computeMessage(message.execution_id, message.instrument_id, decision.nextAttempt), decision.delayMs);
    }

    /**
     * Manual recovery: re-open failed jobs that still have attempts left and
     * dispatch them. Failures of any code qualify.
     */
    retryFailed(executionId: string): RetryFailedResult {
        const { jobs, retryPolicy } = this.deps;
        jobs.requireExecution(executionId);

        const result: RetryFailedResult = { reopened: [], exhausted: [] };
        for (const job of jobs.listJobs(executionId, 'failed')) {
            if (job.attemptCount >= retryPolicy.maxAttempts) {
                result.exhausted.push(job.instrumentId);
                continue;
            }
            const reopened = jobs.reopen(job, job.attemptCount + 1, this.now());
            this.dispatch(computeMessage(executionId, job.instrumentId, reopened.attemptCount));
            result.reopened.push(job.instrumentId);
        }

        log.info(`Failed jobs re-opened`, { execution_id: executionId, reopened: result.reopened.length, exhausted: result.exhausted.length });
        return result;
    }

    /** Re-enqueue every pending job at its current attempt (lost or undispatched messages). */
    resumePending(executionId: string): number {
        const { jobs } = this.deps;
        jobs.requireExecution(executionId);

        let count = 0;
        for (const job of jobs.listJobs(executionId, 'pending')) {
            if (this.dispatch(computeMessage(executionId, job.instrumentId, job.attemptCount))) count++;
        }
        log.info(`Pending jobs re-dispatched`, { execution_id: executionId, count });
        return count;
    }

    /**
     * resumePending() then retryFailed(). In this order a job re-opened here is
     * enqueued exactly once: it is still failed while pending jobs are resumed.
     */
    recover(executionId: string): RecoveryResult {
        const resumed = this.resumePending(executionId);
        return { ...this.retryFailed(executionId), resumed };
    }

    getExecution(executionId: string): ExecutionRecord {
        return this.deps.jobs.requireExecution(executionId);
    }

    /** Enqueue failures are logged, never thrown: the job stays pending. */
    private dispatch(message: ComputeMessage, delayMs = 0): boolean {
        try {
            this.deps.queue.enqueue(message, { delayMs });
            return true;
        } catch (cause) {
            const err = new DispatchError(
                `Failed to enqueue ${message.instrument_id} (attempt ${message.attempt})`,
                { execution_id: message.execution_id, instrument: message.instrument_id, attempt: message.attempt },
                { cause }
            );
            log.error(err.message, { ...err.context, error: cause instanceof Error ? cause.message : String(cause) });
            return false;
        }
    }
}
