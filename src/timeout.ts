// timeout.ts — hard time limits and abortable waits
//
// withTimeout() races a task against a timer. Whichever settles first wins;
// the loser is ignored (settled flag), and the task's AbortSignal fires so a
// cooperative builder can stop its own I/O.

import { ComputeTimeoutError } from './structured_error';

export class AbortedError extends Error {
    constructor(message = 'Operation aborted') {
        super(message);
        this.name = 'AbortedError';
    }
}

/** Resolves after `ms`, or rejects with AbortedError as soon as `signal` fires. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(new AbortedError());
            return;
        }

        const onAbort = () => {
            clearTimeout(timer);
            reject(new AbortedError());
        };

        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);

        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Run `task` with a hard limit. On expiry the task's signal is aborted and the
 * returned promise rejects with ComputeTimeoutError (retryable).
 */
export function withTimeout<T>(
    task: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    label: string
): Promise<T> {
    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
        let settled = false;

        const timer = setTimeout(() => {
            if (settled) return;
            settled = true;
            const err = new ComputeTimeoutError(timeoutMs, label);
            controller.abort(err);
            reject(err);
        }, timeoutMs);

        let pending: Promise<T>;
        try {
            pending = task(controller.signal);
        } catch (err) {
            settled = true;
            clearTimeout(timer);
            reject(err);
            return;
        }

        pending.then(
            value => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                resolve(value);
            },
            (err: unknown) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                reject(err);
            }
        );
    });
}
