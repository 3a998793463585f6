/**
 * Composition root: every component wired from one validated config.
 */

import type { PipelineConfig } from './config';
import type { PipelineDatabase } from './pipeline_store';
import type { ReportBuilder } from './worker';
import type { WorkQueue } from './work_queue';
import type { ExecutionSummary } from './completion_watcher';
import { openPipelineDatabase } from './pipeline_store';
import { ReportCache } from './report_cache';
import { JobStateStore } from './job_state_store';
import { ExecutionLock } from './execution_lock';
import { CostGate } from './cost_gate';
import { RetryPolicy } from './retry_policy';
import { InMemoryWorkQueue } from './work_queue';
import { ReportWorker } from './worker';
import { WorkerPool } from './worker_pool';
import { Orchestrator } from './orchestrator';
import { CompletionWatcher } from './completion_watcher';
import { InstrumentRegistry } from './instrument_registry';
import { createLogger } from './logger';

const log = createLogger('pipeline');

export interface PipelineOverrides {
    /** Pre-opened database (tests pass ':memory:' handles). */
    db?: PipelineDatabase;
    registry?: InstrumentRegistry;
    queue?: WorkQueue;
    now?: () => Date;
}

export interface Pipeline {
    config: PipelineConfig;
    db: PipelineDatabase;
    registry: InstrumentRegistry;
    cache: ReportCache;
    jobs: JobStateStore;
    lock: ExecutionLock;
    costGate: CostGate;
    retryPolicy: RetryPolicy;
    queue: WorkQueue;
    worker: ReportWorker;
    pool: WorkerPool;
    orchestrator: Orchestrator;
    watcher: CompletionWatcher;
    /** Wait with the configured poll interval and timeout. */
    waitForCompletion(executionId: string, signal?: AbortSignal): Promise<ExecutionSummary>;
    close(): Promise<void>;
}

export function createPipeline(config: PipelineConfig, builder: ReportBuilder, overrides: PipelineOverrides = {}): Pipeline {
    const db = overrides.db ?? openPipelineDatabase(config.dbPath);
    const now = overrides.now ?? (() => new Date());
    const clock = () => now().getTime();

    const registry = overrides.registry ?? InstrumentRegistry.fromFile(config.instrumentsPath);
    const cache = new ReportCache(db, { reportVersion: config.cache.reportVersion, memoryEntries: config.cache.memoryEntries, clock });
    const jobs = new JobStateStore(db);
    const lock = new ExecutionLock(db, config.lock.staleAfterMs);
    const costGate = new CostGate(config.cost);
    const retryPolicy = new RetryPolicy(config.retry);
    const queue = overrides.queue ?? new InMemoryWorkQueue({ concurrency: config.worker.concurrency });

    const worker = new ReportWorker({
        jobs,
        cache,
        costGate,
        retryPolicy,
        registry,
        builder,
        settings: {
            ttlMs: config.cache.ttlMs,
            errorTtlMs: config.cache.errorTtlMs,
            computeTimeoutMs: config.worker.computeTimeoutMs,
        },
        now,
    });

    const orchestrator = new Orchestrator({ db, jobs, lock, queue, registry, retryPolicy, config, now });
    const pool = new WorkerPool({ queue, worker, cache, redispatcher: orchestrator });
    const watcher = new CompletionWatcher({ jobs, clock });

    pool.start();
    log.debug(`Pipeline ready`, { instruments: registry.size, report_version: config.cache.reportVersion });

    let closed = false;
    return {
        config,
        db,
        registry,
        cache,
        jobs,
        lock,
        costGate,
        retryPolicy,
        queue,
        worker,
        pool,
        orchestrator,
        watcher,
        waitForCompletion: (executionId, signal) =>
            watcher.waitForCompletion(executionId, {
                pollIntervalMs: config.watcher.pollIntervalMs,
                timeoutMs: config.watcher.timeoutMs,
                signal,
            }),
        close: async () => {
            if (closed) return;
            closed = true;
            await pool.stop();
            if (!overrides.db) db.close();
        },
    };
}
