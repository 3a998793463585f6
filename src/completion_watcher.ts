/**
 * CompletionWatcher — waits for an Execution to reach a terminal aggregate.
 *
 * WAITING → DONE       every dispatched job is success or failed
 *         → TIMEOUT    elapsed > timeoutMs
 *         → CANCELLED  caller's AbortSignal fired
 *
 * Read-only: it never writes job state, and a TIMEOUT does not cancel workers
 * that are still computing.
 */

import type { JobStateStore } from './job_state_store';
import { AbortedError, sleep as defaultSleep } from './timeout';
import { createLogger } from './logger';

const log = createLogger('watcher');

export type WatchState = 'DONE' | 'TIMEOUT' | 'CANCELLED';

export interface ExecutionSummary {
    executionId: string;
    state: WatchState;
    total: number;
    succeeded: number;
    failed: number;
    /** pending + running */
    pending: number;
    durationMs: number;
    polls: number;
}

export interface WatchOptions {
    pollIntervalMs: number;
    timeoutMs: number;
    signal?: AbortSignal;
}

export interface WatcherDeps {
    jobs: JobStateStore;
    clock?: () => number;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class CompletionWatcher {
    private readonly clock: () => number;
    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

    constructor(private readonly deps: WatcherDeps) {
        this.clock = deps.clock ?? Date.now;
        this.sleep = deps.sleep ?? defaultSleep;
    }

    /** One read of the current aggregate; DONE only when every job is terminal. */
    snapshot(executionId: string, startedAt: number, polls: number): { summary: ExecutionSummary; complete: boolean } {
        const execution = this.deps.jobs.requireExecution(executionId);
        const counts = this.deps.jobs.countJobs(executionId);
        const terminal = counts.success + counts.failed;
        return {
            summary: {
                executionId,
                state: 'DONE',
                total: execution.dispatchedCount,
                succeeded: counts.success,
                failed: counts.failed,
                pending: counts.pending + counts.running,
                durationMs: this.clock() - startedAt,
                polls,
            },
            complete: terminal >= execution.dispatchedCount,
        };
    }

    async waitForCompletion(executionId: string, opts: WatchOptions): Promise<ExecutionSummary> {
        const startedAt = this.clock();
        let polls = 0;

        for (;;) {
            polls++;
            const { summary, complete } = this.snapshot(executionId, startedAt, polls);

            if (complete) {
                log.info(`Execution complete`, { execution_id: executionId, succeeded: summary.succeeded, failed: summary.failed, polls });
                return summary;
            }
            if (summary.durationMs > opts.timeoutMs) {
                log.warn(`Execution watch timed out`, { execution_id: executionId, pending: summary.pending, timeout_ms: opts.timeoutMs });
                return { ...summary, state: 'TIMEOUT' };
            }
            if (opts.signal?.aborted) {
                return { ...summary, state: 'CANCELLED' };
            }

            try {
                // Never sleep past the deadline: the poll after it reports TIMEOUT on time.
                const untilDeadline = Math.max(0, opts.timeoutMs - summary.durationMs + 1);
                await this.sleep(Math.min(opts.pollIntervalMs, untilDeadline), opts.signal);
            } catch (err) {
                if (!(err instanceof AbortedError)) throw err;
                log.info(`Execution watch cancelled`, { execution_id: executionId });
                return { ...this.snapshot(executionId, startedAt, polls).summary, state: 'CANCELLED' };
            }
        }
    }
}
