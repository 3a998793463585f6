import test from 'node:test';
import assert from 'node:assert/strict';

import { CompletionWatcher } from '../src/completion_watcher';
import { JobStateStore } from '../src/job_state_store';
import { NotFoundError } from '../src/structured_error';
import { AS_OF, FakeClock, T0, memoryDb } from './helpers';

const INSTRUMENTS = ['DBS19', 'UOB19', 'TENCENT19', 'HONDA19', 'AAPL'];

function setup() {
    const jobs = new JobStateStore(memoryDb());
    jobs.createExecution({ executionId: 'exe_w', source: 'manual', asOfDate: AS_OF, instrumentIds: INSTRUMENTS, createdAt: new Date(T0) });
    const clock = new FakeClock();
    const sleeps: number[] = [];
    const watcher = new CompletionWatcher({
        jobs,
        clock: clock.millis,
        sleep: async ms => {
            sleeps.push(ms);
            clock.advance(ms);
        },
    });
    return { jobs, clock, watcher, sleeps };
}

function succeed(jobs: JobStateStore, instrumentId: string): void {
    const key = { executionId: 'exe_w', instrumentId };
    jobs.markRunning(key, 1, new Date(T0));
    jobs.markSuccess(key, 1, new Date(T0 + 1000));
}

test('reports TIMEOUT with the partial aggregate while a job is still running', async () => {
    const { jobs, watcher, sleeps } = setup();
    for (const id of INSTRUMENTS.slice(0, 4)) succeed(jobs, id);
    jobs.markRunning({ executionId: 'exe_w', instrumentId: 'AAPL' }, 1, new Date(T0));

    const summary = await watcher.waitForCompletion('exe_w', { pollIntervalMs: 1000, timeoutMs: 3000 });

    assert.deepEqual(summary, {
        executionId: 'exe_w',
        state: 'TIMEOUT',
        total: 5,
        succeeded: 4,
        failed: 0,
        pending: 1,
        durationMs: 3001,
        polls: 5,
    });
    assert.deepEqual(sleeps, [1000, 1000, 1000, 1]);
    assert.equal(jobs.getJob({ executionId: 'exe_w', instrumentId: 'AAPL' })?.state, 'running');
});

test('reports DONE on the first poll when every job is terminal', async () => {
    const { jobs, watcher, sleeps } = setup();
    for (const id of INSTRUMENTS.slice(0, 3)) succeed(jobs, id);
    for (const id of INSTRUMENTS.slice(3)) {
        const key = { executionId: 'exe_w', instrumentId: id };
        jobs.markRunning(key, 1, new Date(T0));
        jobs.markFailed(key, 1, new Date(T0), { message: 'bad data', code: 'COMPUTE_ERROR' });
    }

    const summary = await watcher.waitForCompletion('exe_w', { pollIntervalMs: 1000, timeoutMs: 3000 });
    assert.deepEqual(summary, {
        executionId: 'exe_w',
        state: 'DONE',
        total: 5,
        succeeded: 3,
        failed: 2,
        pending: 0,
        durationMs: 0,
        polls: 1,
    });
    assert.deepEqual(sleeps, []);
});

test('keeps polling until the last job finishes', async () => {
    const { jobs, clock } = setup();
    for (const id of INSTRUMENTS.slice(0, 4)) succeed(jobs, id);

    let naps = 0;
    const watcher = new CompletionWatcher({
        jobs,
        clock: clock.millis,
        sleep: async ms => {
            clock.advance(ms);
            if (++naps === 2) succeed(jobs, 'AAPL');
        },
    });

    const summary = await watcher.waitForCompletion('exe_w', { pollIntervalMs: 500, timeoutMs: 60_000 });
    assert.equal(summary.state, 'DONE');
    assert.equal(summary.polls, 3);
    assert.equal(summary.durationMs, 1000);
    assert.equal(summary.succeeded, 5);
});

test('stops with CANCELLED when the caller aborts', async () => {
    const jobs = new JobStateStore(memoryDb());
    jobs.createExecution({ executionId: 'exe_c', source: 'manual', asOfDate: AS_OF, instrumentIds: ['DBS19'], createdAt: new Date(T0) });
    const watcher = new CompletionWatcher({ jobs });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const summary = await watcher.waitForCompletion('exe_c', { pollIntervalMs: 60_000, timeoutMs: 120_000, signal: controller.signal });
    assert.equal(summary.state, 'CANCELLED');
    assert.equal(summary.polls, 1);
    assert.equal(summary.pending, 1);
});

test('the last sleep is cut short so TIMEOUT lands at the deadline', async () => {
    const { jobs, watcher, sleeps } = setup();
    jobs.markRunning({ executionId: 'exe_w', instrumentId: 'AAPL' }, 1, new Date(T0));

    const summary = await watcher.waitForCompletion('exe_w', { pollIntervalMs: 1000, timeoutMs: 2500 });
    assert.equal(summary.state, 'TIMEOUT');
    assert.equal(summary.durationMs, 2501);
    assert.equal(summary.polls, 4);
    assert.deepEqual(sleeps, [1000, 1000, 501]);
});

test('an unknown execution is an error, not a timeout', async () => {
    const { watcher } = setup();
    await assert.rejects(watcher.waitForCompletion('exe_missing', { pollIntervalMs: 10, timeoutMs: 100 }), NotFoundError);
});
