// execution_lock.ts — one live Execution per target date
//
// A lock row names the execution that owns it. The lock is held while that
// execution still has non-terminal jobs AND the row has not passed its expiry;
// otherwise it is stale and the next acquirer takes it over.
//
// CONTRACT: acquire() is a single SQLite transaction, so two triggers racing
// on the same database cannot both win.

import type { PipelineDatabase } from './pipeline_store';
import { ExecutionLockedError } from './structured_error';
import { createLogger } from './logger';

const log = createLogger('execution-lock');

export interface LockHolder {
    lockKey: string;
    executionId: string;
    acquiredAt: Date;
    expiresAt: Date;
}

interface LockRow {
    lock_key: string;
    execution_id: string;
    acquired_at: number;
    expires_at: number;
}

export function lockKeyForDate(asOfDate: string): string {
    return `as_of:${asOfDate}`;
}

export class ExecutionLock {
    constructor(
        private readonly db: PipelineDatabase,
        private readonly staleAfterMs: number
    ) {}

    /**
     * Take the lock for `lockKey` on behalf of `executionId`.
     * Throws ExecutionLockedError while another live execution holds it.
     *
     * Must be called in the same transaction that creates the execution when
     * the caller needs both to land together; better-sqlite3 nests it as a savepoint.
     */
    acquire(lockKey: string, executionId: string, now: Date): LockHolder {
        const nowMs = now.getTime();
        const expiresAt = nowMs + this.staleAfterMs;

        const tx = this.db.transaction((): LockHolder => {
            const row = this.db
                .prepare(`SELECT * FROM execution_locks WHERE lock_key = ?`)
                .get(lockKey) as LockRow | undefined;

            if (row && row.execution_id !== executionId && this.isLive(row, nowMs)) {
                throw new ExecutionLockedError(lockKey, row.execution_id);
            }

            if (row && row.execution_id !== executionId) {
                log.warn(`Taking over stale execution lock`, { lock_key: lockKey, previous: row.execution_id, execution_id: executionId });
            }

            this.db.prepare(`
                INSERT INTO execution_locks (lock_key, execution_id, acquired_at, expires_at)
                VALUES (?, ?, ?, ?)
                ON CONFLICT(lock_key) DO UPDATE SET
                  execution_id = excluded.execution_id,
                  acquired_at = excluded.acquired_at,
                  expires_at = excluded.expires_at
            `).run(lockKey, executionId, nowMs, expiresAt);

            return { lockKey, executionId, acquiredAt: now, expiresAt: new Date(expiresAt) };
        });

        return tx();
    }

    /** Current holder if the lock is live, null otherwise. */
    holder(lockKey: string, now: Date): LockHolder | null {
        const row = this.db
            .prepare(`SELECT * FROM execution_locks WHERE lock_key = ?`)
            .get(lockKey) as LockRow | undefined;
        if (!row || !this.isLive(row, now.getTime())) return null;
        return {
            lockKey: row.lock_key,
            executionId: row.execution_id,
            acquiredAt: new Date(row.acquired_at),
            expiresAt: new Date(row.expires_at),
        };
    }

    private isLive(row: LockRow, nowMs: number): boolean {
        if (nowMs >= row.expires_at) return false;
        const open = this.db
            .prepare(`SELECT COUNT(*) AS n FROM job_records WHERE execution_id = ? AND state IN ('pending','running')`)
            .get(row.execution_id) as { n: number };
        return open.n > 0;
    }
}
