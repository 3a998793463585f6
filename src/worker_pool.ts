/**
 * WorkerPool — consumes the Work Queue and routes each message.
 *
 *   report.compute   → ReportWorker; a scheduled retry goes back to the Redispatcher
 *   cache.invalidate → ReportCache.invalidate
 *
 * A SchemaMismatchError (message or store written by a newer release) is fatal:
 * the message is dead-lettered, 'fatal' is emitted and the pool stops consuming.
 *
 * Events:
 *   'outcome'  (message: ComputeMessage, outcome: WorkOutcome)
 *   'fatal'    (err: PipelineError)
 */

import { EventEmitter } from 'events';
import type { ReportCache } from './report_cache';
import type { RetryDecision } from './retry_policy';
import type { ComputeMessage, QueueDelivery, WorkMessage, WorkQueue } from './work_queue';
import type { ReportWorker, WorkOutcome } from './worker';
import { decodeWorkMessage } from './work_queue';
import { PipelineError, isFatal } from './structured_error';
import { createLogger } from './logger';

const log = createLogger('worker-pool');

/** Whoever owns retry scheduling (the Orchestrator). */
export interface Redispatcher {
    redispatch(message: ComputeMessage, decision: Extract<RetryDecision, { retry: true }>): void;
}

export interface WorkerPoolDeps {
    queue: WorkQueue;
    worker: ReportWorker;
    cache: ReportCache;
    redispatcher: Redispatcher;
}

export class WorkerPool extends EventEmitter {
    private started = false;
    private fatalError: PipelineError | null = null;

    constructor(private readonly deps: WorkerPoolDeps) {
        super();
    }

    get fatal(): PipelineError | null {
        return this.fatalError;
    }

    start(): void {
        if (this.started) return;
        this.started = true;
        this.deps.queue.consume(delivery => this.handle(delivery));
        log.info(`Worker pool consuming`);
    }

    async stop(): Promise<void> {
        await this.deps.queue.stop();
        log.info(`Worker pool stopped`, { dead_letters: this.deps.queue.deadLetters().length });
    }

    private async handle(delivery: QueueDelivery): Promise<void> {
        if (this.fatalError) {
            delivery.deadLetter(`pool halted: ${this.fatalError.message}`);
            return;
        }

        try {
            await this.route(decodeWorkMessage(delivery.body));
        } catch (err) {
            if (err instanceof PipelineError && isFatal(err)) {
                delivery.deadLetter(err.message);
                this.halt(err);
                return;
            }
            throw err; // queue redelivers
        }
    }

    private async route(message: WorkMessage): Promise<void> {
        switch (message.kind) {
            case 'report.compute': {
                const outcome: WorkOutcome = await this.deps.worker.process(message);
                if (outcome.status === 'failed' && outcome.retry.retry) {
                    this.deps.redispatcher.redispatch(message, outcome.retry);
                }
                this.emit('outcome', message, outcome);
                return;
            }
            case 'cache.invalidate':
                this.deps.cache.invalidate(message.instrument_id, message.as_of_date);
                return;
        }
    }

    private halt(err: PipelineError): void {
        if (this.fatalError) return;
        this.fatalError = err;
        log.error(`FATAL: ${err.message}. Worker pool halting; upgrade this build before processing more work.`, { code: err.code, ...err.context });
        this.emit('fatal', err);
        this.stop().catch((stopErr: unknown) => {
            log.error(`Worker pool stop failed`, { error: stopErr instanceof Error ? stopErr.message : String(stopErr) });
        });
    }
}
