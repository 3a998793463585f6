/**
 * JobStateStore — durable Execution and JobRecord bookkeeping.
 *
 * INVARIANT: job state only moves along VALID_TRANSITIONS. success is final;
 * failed re-opens only as an explicit new attempt (attempt_count + 1).
 * Executions, job records and per-attempt rows are never deleted.
 */

import type { PipelineDatabase } from './pipeline_store';
import type { CostScore } from './cost_gate';
import type { ErrorCode } from './structured_error';
import { NotFoundError, StateTransitionError } from './structured_error';
import { createLogger } from './logger';

const log = createLogger('job-state');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type JobState = 'pending' | 'running' | 'success' | 'failed';

export const TERMINAL_STATES: readonly JobState[] = ['success', 'failed'];

const VALID_TRANSITIONS: Record<JobState, JobState[]> = {
    pending: ['running', 'failed'],
    running: ['running', 'success', 'failed'], // running → running: redelivery after a worker crash
    success: [],
    failed: ['pending'],
};

export interface JobKey {
    executionId: string;
    instrumentId: string;
}

export interface JobRecord extends JobKey {
    state: JobState;
    attemptCount: number;
    startedAt?: Date;
    finishedAt?: Date;
    error?: string;
    errorCode?: string;
    updatedAt: Date;
}

export interface ExecutionRecord {
    executionId: string;
    createdAt: Date;
    source: string;
    asOfDate: string;
    limit?: number;
    dispatchedCount: number;
}

export interface JobAttempt extends JobKey {
    attempt: number;
    state: Exclude<JobState, 'pending'>;
    startedAt?: Date;
    finishedAt?: Date;
    error?: string;
    errorCode?: string;
    costTotal?: number;
    costBand?: string;
}

export interface JobCounts {
    total: number;
    pending: number;
    running: number;
    success: number;
    failed: number;
}

/** Status upsert as written by a Worker. */
export interface JobStatusUpdate extends JobKey {
    state: JobState;
    attempt: number;
    timestamp: Date;
    error?: string;
    errorCode?: ErrorCode;
    cost?: CostScore;
}

export interface CreateExecutionParams {
    executionId: string;
    source: string;
    asOfDate: string;
    limit?: number;
    instrumentIds: string[];
    createdAt: Date;
}

interface JobRow {
    execution_id: string;
    instrument_id: string;
    state: JobState;
    attempt_count: number;
    started_at: string | null;
    finished_at: string | null;
    error: string | null;
    error_code: string | null;
    updated_at: string;
}

interface ExecutionRow {
    execution_id: string;
    created_at: string;
    source: string;
    as_of_date: string;
    instrument_limit: number | null;
    dispatched_count: number;
}

interface AttemptRow {
    execution_id: string;
    instrument_id: string;
    attempt: number;
    state: Exclude<JobState, 'pending'>;
    started_at: string | null;
    finished_at: string | null;
    error: string | null;
    error_code: string | null;
    cost_total: number | null;
    cost_band: string | null;
}

function optionalDate(value: string | null): Date | undefined {
    return value === null ? undefined : new Date(value);
}

/* -------------------------------------------------------------------------- */
/* Job State Store                                                            */
/* -------------------------------------------------------------------------- */

export class JobStateStore {
    constructor(private readonly db: PipelineDatabase) {}

    /* ------------------------------------------------------------------------ */
    /* Executions                                                               */
    /* ------------------------------------------------------------------------ */

    /** Execution row and one pending JobRecord per instrument, all or nothing. */
    createExecution(params: CreateExecutionParams): ExecutionRecord {
        const createdAt = params.createdAt.toISOString();
        const unique = new Set(params.instrumentIds);
        if (unique.size !== params.instrumentIds.length) {
            throw new RangeError(`Duplicate instrument ids in execution ${params.executionId}`);
        }

        this.db.transaction(() => {
            this.db.prepare(`
                INSERT INTO executions (execution_id, created_at, source, as_of_date, instrument_limit, dispatched_count)
                VALUES (?, ?, ?, ?, ?, ?)
            `).run(params.executionId, createdAt, params.source, params.asOfDate, params.limit ?? null, params.instrumentIds.length);

            const insertJob = this.db.prepare(`
                INSERT INTO job_records (execution_id, instrument_id, state, attempt_count, updated_at)
                VALUES (?, ?, 'pending', 1, ?)
            `);
            for (const instrumentId of params.instrumentIds) {
                insertJob.run(params.executionId, instrumentId, createdAt);
            }
        })();

        log.info(`Execution created`, { execution_id: params.executionId, jobs: params.instrumentIds.length, as_of_date: params.asOfDate });

        return {
            executionId: params.executionId,
            createdAt: params.createdAt,
            source: params.source,
            asOfDate: params.asOfDate,
            limit: params.limit,
            dispatchedCount: params.instrumentIds.length,
        };
    }

    getExecution(executionId: string): ExecutionRecord | null {
        const row = this.db
            .prepare(`SELECT * FROM executions WHERE execution_id = ?`)
            .get(executionId) as ExecutionRow | undefined;
        return row ? toExecution(row) : null;
    }

    requireExecution(executionId: string): ExecutionRecord {
        const execution = this.getExecution(executionId);
        if (!execution) throw new NotFoundError(`Execution not found: ${executionId}`, { execution_id: executionId });
        return execution;
    }

    listExecutions(limit = 20): ExecutionRecord[] {
        const rows = this.db
            .prepare(`SELECT * FROM executions ORDER BY created_at DESC, execution_id DESC LIMIT ?`)
            .all(limit) as ExecutionRow[];
        return rows.map(toExecution);
    }

    /* ------------------------------------------------------------------------ */
    /* Jobs                                                                     */
    /* ------------------------------------------------------------------------ */

    getJob(key: JobKey): JobRecord | null {
        const row = this.db
            .prepare(`SELECT * FROM job_records WHERE execution_id = ? AND instrument_id = ?`)
            .get(key.executionId, key.instrumentId) as JobRow | undefined;
        return row ? toJob(row) : null;
    }

    listJobs(executionId: string, state?: JobState): JobRecord[] {
        const rows = state
            ? this.db.prepare(`SELECT * FROM job_records WHERE execution_id = ? AND state = ? ORDER BY instrument_id`).all(executionId, state)
            : this.db.prepare(`SELECT * FROM job_records WHERE execution_id = ? ORDER BY instrument_id`).all(executionId);
        return (rows as JobRow[]).map(toJob);
    }

    listAttempts(key: JobKey): JobAttempt[] {
        const rows = this.db
            .prepare(`SELECT * FROM job_attempts WHERE execution_id = ? AND instrument_id = ? ORDER BY attempt`)
            .all(key.executionId, key.instrumentId) as AttemptRow[];
        return rows.map(toAttempt);
    }

    countJobs(executionId: string): JobCounts {
        const rows = this.db
            .prepare(`SELECT state, COUNT(*) AS n FROM job_records WHERE execution_id = ? GROUP BY state`)
            .all(executionId) as Array<{ state: JobState; n: number }>;

        const counts: JobCounts = { total: 0, pending: 0, running: 0, success: 0, failed: 0 };
        for (const row of rows) {
            counts[row.state] = row.n;
            counts.total += row.n;
        }
        return counts;
    }

    /* ------------------------------------------------------------------------ */
    /* Transitions                                                              */
    /* ------------------------------------------------------------------------ */

    /**
     * Apply one status update. The update's attempt must be the job's current
     * attempt; older attempts are rejected as stale.
     */
    applyStatus(update: JobStatusUpdate): JobRecord {
        let result: JobRecord | undefined;
        this.db.transaction(() => {
            result = this.applyInTransaction(update);
        })();
        if (!result) throw new NotFoundError(`Job not found: ${update.executionId}/${update.instrumentId}`);
        return result;
    }

    markRunning(key: JobKey, attempt: number, at: Date): JobRecord {
        return this.applyStatus({ ...key, state: 'running', attempt, timestamp: at });
    }

    markSuccess(key: JobKey, attempt: number, at: Date, cost?: CostScore): JobRecord {
        return this.applyStatus({ ...key, state: 'success', attempt, timestamp: at, cost });
    }

    /**
     * Record a failed attempt. With `reopenAs`, the failed job is re-opened as
     * that explicit new attempt inside the same transaction, so readers never
     * observe a failure that is about to be redelivered.
     */
    markFailed(
        key: JobKey,
        attempt: number,
        at: Date,
        failure: { message: string; code: ErrorCode; cost?: CostScore },
        reopenAs?: number
    ): JobRecord {
        let result: JobRecord | undefined;
        this.db.transaction(() => {
            result = this.applyInTransaction({
                ...key,
                state: 'failed',
                attempt,
                timestamp: at,
                error: failure.message,
                errorCode: failure.code,
                cost: failure.cost,
            });
            if (reopenAs !== undefined) {
                result = this.reopenInTransaction(key, reopenAs, at);
            }
        })();
        if (!result) throw new NotFoundError(`Job not found: ${key.executionId}/${key.instrumentId}`);
        return result;
    }

    /** Explicit new attempt for a failed job: failed → pending, attempt_count = nextAttempt. */
    reopen(key: JobKey, nextAttempt: number, at: Date): JobRecord {
        let result: JobRecord | undefined;
        this.db.transaction(() => {
            result = this.reopenInTransaction(key, nextAttempt, at);
        })();
        if (!result) throw new NotFoundError(`Job not found: ${key.executionId}/${key.instrumentId}`);
        return result;
    }

    private requireRow(key: JobKey): JobRow {
        const row = this.db
            .prepare(`SELECT * FROM job_records WHERE execution_id = ? AND instrument_id = ?`)
            .get(key.executionId, key.instrumentId) as JobRow | undefined;
        if (!row) throw new NotFoundError(`Job not found: ${key.executionId}/${key.instrumentId}`, { ...key });
        return row;
    }

    private applyInTransaction(update: JobStatusUpdate): JobRecord {
        const row = this.requireRow(update);
        const ctx = { execution_id: update.executionId, instrument: update.instrumentId, attempt: update.attempt };

        if (update.attempt !== row.attempt_count) {
            throw new StateTransitionError(row.state, update.state, { ...ctx, reason: `stale attempt (current ${row.attempt_count})` });
        }
        if (!VALID_TRANSITIONS[row.state].includes(update.state)) {
            throw new StateTransitionError(row.state, update.state, ctx);
        }

        const ts = update.timestamp.toISOString();

        if (update.state === 'running') {
            this.db.prepare(`
                UPDATE job_records SET state = 'running', started_at = ?, finished_at = NULL, updated_at = ?
                WHERE execution_id = ? AND instrument_id = ?
            `).run(ts, ts, update.executionId, update.instrumentId);

            this.db.prepare(`
                INSERT INTO job_attempts (execution_id, instrument_id, attempt, state, started_at)
                VALUES (?, ?, ?, 'running', ?)
                ON CONFLICT(execution_id, instrument_id, attempt) DO UPDATE SET state = 'running', started_at = excluded.started_at
            `).run(update.executionId, update.instrumentId, update.attempt, ts);
        } else if (update.state === 'success' || update.state === 'failed') {
            const error = update.state === 'failed' ? update.error ?? 'Unknown failure' : null;
            const code = update.state === 'failed' ? update.errorCode ?? 'COMPUTE_ERROR' : null;

            this.db.prepare(`
                UPDATE job_records SET state = ?, finished_at = ?, error = ?, error_code = ?, updated_at = ?
                WHERE execution_id = ? AND instrument_id = ?
            `).run(update.state, ts, error, code, ts, update.executionId, update.instrumentId);

            this.db.prepare(`
                INSERT INTO job_attempts (execution_id, instrument_id, attempt, state, started_at, finished_at, error, error_code, cost_total, cost_band)
                VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
                ON CONFLICT(execution_id, instrument_id, attempt) DO UPDATE SET
                  state = excluded.state,
                  finished_at = excluded.finished_at,
                  error = excluded.error,
                  error_code = excluded.error_code,
                  cost_total = excluded.cost_total,
                  cost_band = excluded.cost_band
            `).run(
                update.executionId,
                update.instrumentId,
                update.attempt,
                update.state,
                row.started_at,
                ts,
                error,
                code,
                update.cost?.total ?? null,
                update.cost?.band ?? null
            );
        } else {
            throw new StateTransitionError(row.state, update.state, { ...ctx, reason: 'pending is only reachable through reopen()' });
        }

        log.debug(`Job ${row.state} → ${update.state}`, ctx);
        return toJob(this.requireRow(update));
    }

    private reopenInTransaction(key: JobKey, nextAttempt: number, at: Date): JobRecord {
        const row = this.requireRow(key);
        if (!VALID_TRANSITIONS[row.state].includes('pending')) {
            throw new StateTransitionError(row.state, 'pending', { ...key });
        }
        if (nextAttempt !== row.attempt_count + 1) {
            throw new StateTransitionError(row.state, 'pending', { ...key, reason: `next attempt must be ${row.attempt_count + 1}, got ${nextAttempt}` });
        }

        const ts = at.toISOString();
        this.db.prepare(`
            UPDATE job_records SET state = 'pending', attempt_count = ?, started_at = NULL, finished_at = NULL, updated_at = ?
            WHERE execution_id = ? AND instrument_id = ?
        `).run(nextAttempt, ts, key.executionId, key.instrumentId);

        log.debug(`Job re-opened`, { execution_id: key.executionId, instrument: key.instrumentId, attempt: nextAttempt });
        return toJob(this.requireRow(key));
    }
}

/* -------------------------------------------------------------------------- */
/* Row mapping                                                                */
/* -------------------------------------------------------------------------- */

function toExecution(row: ExecutionRow): ExecutionRecord {
    return {
        executionId: row.execution_id,
        createdAt: new Date(row.created_at),
        source: row.source,
        asOfDate: row.as_of_date,
        limit: row.instrument_limit ?? undefined,
        dispatchedCount: row.dispatched_count,
    };
}

function toJob(row: JobRow): JobRecord {
    return {
        executionId: row.execution_id,
        instrumentId: row.instrument_id,
        state: row.state,
        attemptCount: row.attempt_count,
        startedAt: optionalDate(row.started_at),
        finishedAt: optionalDate(row.finished_at),
        error: row.error ?? undefined,
        errorCode: row.error_code ?? undefined,
        updatedAt: new Date(row.updated_at),
    };
}

function toAttempt(row: AttemptRow): JobAttempt {
    return {
        executionId: row.execution_id,
        instrumentId: row.instrument_id,
        attempt: row.attempt,
        state: row.state,
        startedAt: optionalDate(row.started_at),
        finishedAt: optionalDate(row.finished_at),
        error: row.error ?? undefined,
        errorCode: row.error_code ?? undefined,
        costTotal: row.cost_total ?? undefined,
        costBand: row.cost_band ?? undefined,
    };
}
