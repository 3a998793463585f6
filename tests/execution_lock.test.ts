import test from 'node:test';
import assert from 'node:assert/strict';

import { ExecutionLock, lockKeyForDate } from '../src/execution_lock';
import { JobStateStore } from '../src/job_state_store';
import { ExecutionLockedError } from '../src/structured_error';
import { AS_OF, HOUR, T0, memoryDb } from './helpers';

const KEY = lockKeyForDate(AS_OF);
const at = (offsetMs = 0) => new Date(T0 + offsetMs);

function setup() {
    const db = memoryDb();
    const jobs = new JobStateStore(db);
    const lock = new ExecutionLock(db, 2 * HOUR);
    for (const executionId of ['exe_a', 'exe_b']) {
        jobs.createExecution({ executionId, source: 'manual', asOfDate: AS_OF, instrumentIds: ['DBS19'], createdAt: at() });
    }
    return { jobs, lock };
}

test('a second execution cannot take a date held by one with open jobs', () => {
    const { lock } = setup();
    lock.acquire(KEY, 'exe_a', at());

    assert.throws(() => lock.acquire(KEY, 'exe_b', at(HOUR)), (err: unknown) => {
        assert.ok(err instanceof ExecutionLockedError);
        assert.equal(err.message, 'Execution lock for as_of:2026-01-05 is held by exe_a');
        assert.equal(err.heldBy, 'exe_a');
        return true;
    });
    assert.equal(lock.holder(KEY, at(HOUR))?.executionId, 'exe_a');
});

test('the lock frees once the holder has no open jobs', () => {
    const { jobs, lock } = setup();
    lock.acquire(KEY, 'exe_a', at());

    const key = { executionId: 'exe_a', instrumentId: 'DBS19' };
    jobs.markRunning(key, 1, at(1000));
    jobs.markFailed(key, 1, at(2000), { message: 'bad data', code: 'COMPUTE_ERROR' });

    assert.equal(lock.holder(KEY, at(3000)), null);
    const taken = lock.acquire(KEY, 'exe_b', at(3000));
    assert.equal(taken.executionId, 'exe_b');
    assert.deepEqual(taken.expiresAt, at(3000 + 2 * HOUR));
});

test('an expired lock is taken over even with open jobs', () => {
    const { lock } = setup();
    lock.acquire(KEY, 'exe_a', at());
    const taken = lock.acquire(KEY, 'exe_b', at(2 * HOUR));
    assert.equal(taken.executionId, 'exe_b');
});

test('the holder may re-acquire its own lock', () => {
    const { lock } = setup();
    lock.acquire(KEY, 'exe_a', at());
    const renewed = lock.acquire(KEY, 'exe_a', at(1000));
    assert.equal(renewed.executionId, 'exe_a');
    assert.deepEqual(renewed.expiresAt, at(1000 + 2 * HOUR));
    assert.equal(lock.holder(KEY, at(2000))?.executionId, 'exe_a');
});

test('locks are independent per date', () => {
    const { lock } = setup();
    lock.acquire(KEY, 'exe_a', at());
    assert.equal(lock.acquire(lockKeyForDate('2026-01-06'), 'exe_b', at()).lockKey, 'as_of:2026-01-06');
});
