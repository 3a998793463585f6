/**
 * Work messages and the in-process Work Queue.
 *
 * Messages are a tagged, versioned union and travel encoded (JSON) so a
 * consumer always decodes what a producer wrote. A message whose kind or
 * version this build does not know raises SchemaMismatchError: it was written
 * by a newer producer and must not be guessed at.
 *
 * Delivery is at-least-once. A handler that throws gets its message back
 * (up to maxReceives), after which the message is parked as a dead letter
 * for manual review.
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { SchemaMismatchError } from './structured_error';
import { createLogger } from './logger';

const log = createLogger('work-queue');

export const WORK_MESSAGE_VERSION = 1;

/* -------------------------------------------------------------------------- */
/* Messages                                                                   */
/* -------------------------------------------------------------------------- */

const computeMessageSchema = z.object({
    kind: z.literal('report.compute'),
    version: z.literal(WORK_MESSAGE_VERSION),
    execution_id: z.string().min(1),
    instrument_id: z.string().min(1),
    attempt: z.number().int().positive(),
});

const invalidateMessageSchema = z.object({
    kind: z.literal('cache.invalidate'),
    version: z.literal(WORK_MESSAGE_VERSION),
    instrument_id: z.string().min(1),
    as_of_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
});

const workMessageSchema = z.discriminatedUnion('kind', [computeMessageSchema, invalidateMessageSchema]);

const envelopeSchema = z.object({
    kind: z.string(),
    version: z.number(),
});

export type ComputeMessage = z.infer<typeof computeMessageSchema>;
export type InvalidateMessage = z.infer<typeof invalidateMessageSchema>;
export type WorkMessage = z.infer<typeof workMessageSchema>;

const KNOWN_KINDS: readonly string[] = ['report.compute', 'cache.invalidate'];

export function computeMessage(executionId: string, instrumentId: string, attempt: number): ComputeMessage {
    return { kind: 'report.compute', version: WORK_MESSAGE_VERSION, execution_id: executionId, instrument_id: instrumentId, attempt };
}

export function invalidateMessage(instrumentId: string, asOfDate: string): InvalidateMessage {
    return { kind: 'cache.invalidate', version: WORK_MESSAGE_VERSION, instrument_id: instrumentId, as_of_date: asOfDate };
}

export function encodeWorkMessage(message: WorkMessage): string {
    return JSON.stringify(workMessageSchema.parse(message));
}

export function decodeWorkMessage(body: string): WorkMessage {
    let raw: unknown;
    try {
        raw = JSON.parse(body);
    } catch (err) {
        throw new SchemaMismatchError(`Work message is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }

    const envelope = envelopeSchema.safeParse(raw);
    if (!envelope.success) {
        throw new SchemaMismatchError('Work message has no kind/version envelope');
    }
    const { kind, version } = envelope.data;
    if (!KNOWN_KINDS.includes(kind)) {
        throw new SchemaMismatchError(`Unknown work message kind "${kind}"`, { kind, version });
    }
    if (version !== WORK_MESSAGE_VERSION) {
        throw new SchemaMismatchError(
            `Unsupported ${kind} message version ${version} (this build reads version ${WORK_MESSAGE_VERSION})`,
            { kind, version }
        );
    }

    const parsed = workMessageSchema.safeParse(raw);
    if (!parsed.success) {
        const detail = parsed.error.issues.map(i => `${i.path.join('.') || 'message'}: ${i.message}`).join('; ');
        throw new SchemaMismatchError(`Malformed ${kind} message: ${detail}`, { kind, version });
    }
    return parsed.data;
}

/* -------------------------------------------------------------------------- */
/* Queue contract                                                             */
/* -------------------------------------------------------------------------- */

export interface QueueDelivery {
    id: string;
    body: string;
    /** 1 on first delivery */
    receiveCount: number;
    /** Park the message for manual review instead of acknowledging or redelivering it. */
    deadLetter(reason: string): void;
}

export type DeliveryHandler = (delivery: QueueDelivery) => Promise<void>;

export interface DeadLetter {
    id: string;
    body: string;
    receiveCount: number;
    reason: string;
    failedAt: Date;
}

export interface EnqueueOptions {
    delayMs?: number;
}

export interface QueueStats {
    ready: number;
    delayed: number;
    inFlight: number;
    deadLettered: number;
}

export interface WorkQueue {
    enqueue(message: WorkMessage, opts?: EnqueueOptions): string;
    /** Raw publish of an already encoded body. */
    publish(body: string, opts?: EnqueueOptions): string;
    consume(handler: DeliveryHandler): void;
    /** Resolves once nothing is ready, delayed or in flight. */
    drain(): Promise<void>;
    /** Stop handing out messages; waits for in-flight handlers. */
    stop(): Promise<void>;
    deadLetters(): DeadLetter[];
    stats(): QueueStats;
}

/* -------------------------------------------------------------------------- */
/* In-process implementation                                                  */
/* -------------------------------------------------------------------------- */

export interface InMemoryWorkQueueOptions {
    concurrency: number;
    /** Deliveries before a throwing message is dead-lettered. Default 5. */
    maxReceives?: number;
    /** Delay before a message whose handler threw is handed out again. Default 0. */
    redeliveryDelayMs?: number;
}

interface QueuedMessage {
    id: string;
    body: string;
    receiveCount: number;
}

export class InMemoryWorkQueue implements WorkQueue {
    private readonly ready: QueuedMessage[] = [];
    private readonly timers = new Map<NodeJS.Timeout, QueuedMessage>();
    private readonly dead: DeadLetter[] = [];
    private readonly idleWaiters: Array<() => void> = [];
    private readonly stopWaiters: Array<() => void> = [];

    private handler: DeliveryHandler | null = null;
    private inFlight = 0;
    private stopped = false;

    private readonly concurrency: number;
    private readonly maxReceives: number;
    private readonly redeliveryDelayMs: number;

    constructor(opts: InMemoryWorkQueueOptions) {
        if (!Number.isInteger(opts.concurrency) || opts.concurrency < 1) {
            throw new RangeError(`concurrency must be a positive integer, got ${opts.concurrency}`);
        }
        this.concurrency = opts.concurrency;
        this.maxReceives = opts.maxReceives ?? 5;
        this.redeliveryDelayMs = opts.redeliveryDelayMs ?? 0;
    }

    enqueue(message: WorkMessage, opts: EnqueueOptions = {}): string {
        return this.publish(encodeWorkMessage(message), opts);
    }

    publish(body: string, opts: EnqueueOptions = {}): string {
        if (this.stopped) throw new Error('Work queue is stopped');
        const queued: QueuedMessage = { id: uuidv4(), body, receiveCount: 0 };
        this.schedule(queued, opts.delayMs ?? 0);
        return queued.id;
    }

    consume(handler: DeliveryHandler): void {
        if (this.handler) throw new Error('Work queue already has a consumer');
        this.handler = handler;
        this.pump();
    }

    drain(): Promise<void> {
        if (this.isIdle()) return Promise.resolve();
        return new Promise<void>(resolve => this.idleWaiters.push(resolve));
    }

    stop(): Promise<void> {
        this.stopped = true;
        for (const [timer, queued] of this.timers) {
            clearTimeout(timer);
            this.ready.push(queued); // kept for inspection; never handed out after stop
        }
        this.timers.clear();
        this.notifyIdle();
        if (this.inFlight === 0) return Promise.resolve();
        return new Promise<void>(resolve => this.stopWaiters.push(resolve));
    }

    deadLetters(): DeadLetter[] {
        return [...this.dead];
    }

    stats(): QueueStats {
        return { ready: this.ready.length, delayed: this.timers.size, inFlight: this.inFlight, deadLettered: this.dead.length };
    }

    private schedule(queued: QueuedMessage, delayMs: number): void {
        if (delayMs <= 0) {
            this.ready.push(queued);
            this.pump();
            return;
        }
        const timer = setTimeout(() => {
            this.timers.delete(timer);
            this.ready.push(queued);
            this.pump();
        }, delayMs);
        this.timers.set(timer, queued);
    }

    private pump(): void {
        const handler = this.handler;
        if (!handler) return;
        while (!this.stopped && this.inFlight < this.concurrency && this.ready.length > 0) {
            const queued = this.ready.shift();
            if (!queued) break;
            this.inFlight++;
            void this.deliver(handler, queued);
        }
        this.notifyIdle();
    }

    private async deliver(handler: DeliveryHandler, queued: QueuedMessage): Promise<void> {
        queued.receiveCount++;
        let parked = false;
        const delivery: QueueDelivery = {
            id: queued.id,
            body: queued.body,
            receiveCount: queued.receiveCount,
            deadLetter: (reason: string) => {
                if (parked) return;
                parked = true;
                this.park(queued, reason);
            },
        };

        try {
            await handler(delivery);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            if (parked) {
                log.warn(`Handler threw after dead-lettering`, { id: queued.id, error: reason });
            } else if (queued.receiveCount >= this.maxReceives) {
                this.park(queued, reason);
            } else {
                log.warn(`Delivery failed, redelivering`, { id: queued.id, receive_count: queued.receiveCount, error: reason });
                if (!this.stopped) this.schedule(queued, this.redeliveryDelayMs);
                else this.ready.push(queued);
            }
        } finally {
            this.inFlight--;
            if (this.inFlight === 0) this.notifyStopped();
            this.pump();
        }
    }

    private park(queued: QueuedMessage, reason: string): void {
        this.dead.push({ id: queued.id, body: queued.body, receiveCount: queued.receiveCount, reason, failedAt: new Date() });
        log.error(`Message dead-lettered`, { id: queued.id, receive_count: queued.receiveCount, reason });
    }

    private isIdle(): boolean {
        if (this.inFlight > 0) return false;
        if (this.stopped) return true;
        return this.ready.length === 0 && this.timers.size === 0;
    }

    private notifyIdle(): void {
        if (!this.isIdle()) return;
        for (const resolve of this.idleWaiters.splice(0)) resolve();
    }

    private notifyStopped(): void {
        if (!this.stopped) return;
        for (const resolve of this.stopWaiters.splice(0)) resolve();
    }
}
