import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { JobStateStore } from '../src/job_state_store';
import { openPipelineDatabase, readSchemaVersion, SCHEMA_VERSION } from '../src/pipeline_store';
import { NotFoundError, SchemaMismatchError, StateTransitionError } from '../src/structured_error';
import { AS_OF, DAY, MINUTE, T0, memoryDb } from './helpers';

const at = (offsetMs = 0) => new Date(T0 + offsetMs);

function setup(instrumentIds = ['DBS19', 'UOB19', 'AAPL']) {
    const db = memoryDb();
    const jobs = new JobStateStore(db);
    jobs.createExecution({ executionId: 'exe_a', source: 'manual', asOfDate: AS_OF, limit: 3, instrumentIds, createdAt: at() });
    return { db, jobs };
}

test('creates an execution with one pending job per instrument', () => {
    const { jobs } = setup();

    const execution = jobs.getExecution('exe_a');
    assert.deepEqual(execution, {
        executionId: 'exe_a',
        createdAt: at(),
        source: 'manual',
        asOfDate: AS_OF,
        limit: 3,
        dispatchedCount: 3,
    });
    assert.deepEqual(jobs.countJobs('exe_a'), { total: 3, pending: 3, running: 0, success: 0, failed: 0 });
    assert.deepEqual(jobs.listJobs('exe_a').map(j => [j.instrumentId, j.state, j.attemptCount]), [
        ['AAPL', 'pending', 1],
        ['DBS19', 'pending', 1],
        ['UOB19', 'pending', 1],
    ]);
});

test('execution creation is all or nothing', () => {
    const db = memoryDb();
    const jobs = new JobStateStore(db);
    assert.throws(
        () => jobs.createExecution({ executionId: 'exe_dup', source: 'manual', asOfDate: AS_OF, instrumentIds: ['DBS19', 'DBS19'], createdAt: at() }),
        RangeError
    );
    assert.equal(jobs.getExecution('exe_dup'), null);

    jobs.createExecution({ executionId: 'exe_b', source: 'manual', asOfDate: AS_OF, instrumentIds: ['DBS19'], createdAt: at() });
    assert.throws(() =>
        jobs.createExecution({ executionId: 'exe_b', source: 'manual', asOfDate: AS_OF, instrumentIds: ['UOB19'], createdAt: at() })
    );
    assert.deepEqual(jobs.listJobs('exe_b').map(j => j.instrumentId), ['DBS19']);
});

test('moves pending → running → success and records the attempt', () => {
    const { jobs } = setup();
    const key = { executionId: 'exe_a', instrumentId: 'DBS19' };

    const running = jobs.markRunning(key, 1, at(1000));
    assert.equal(running.state, 'running');
    assert.deepEqual(running.startedAt, at(1000));

    const score = {
        band: 'excellent' as const,
        llmCost: 1.575,
        dbCost: 0.005,
        total: 1.58,
        currency: 'THB',
        breakdown: { promptTokens: 10_000, completionTokens: 2_000, totalTokens: 12_000, queryCount: 5, llmCostUsd: 0.045 },
    };
    const done = jobs.markSuccess(key, 1, at(5000), score);
    assert.equal(done.state, 'success');
    assert.deepEqual(done.finishedAt, at(5000));

    const attempts = jobs.listAttempts(key);
    assert.equal(attempts.length, 1);
    assert.equal(attempts[0].state, 'success');
    assert.equal(attempts[0].costTotal, 1.58);
    assert.equal(attempts[0].costBand, 'excellent');
    assert.deepEqual(attempts[0].startedAt, at(1000));
});

test('success is final', () => {
    const { jobs } = setup();
    const key = { executionId: 'exe_a', instrumentId: 'DBS19' };
    jobs.markRunning(key, 1, at());
    jobs.markSuccess(key, 1, at(1000));

    assert.throws(() => jobs.markRunning(key, 1, at(2000)), (err: unknown) => {
        assert.ok(err instanceof StateTransitionError);
        assert.equal(err.message, 'Invalid job state transition success → running');
        return true;
    });
    assert.throws(() => jobs.markFailed(key, 1, at(2000), { message: 'late', code: 'COMPUTE_ERROR' }), StateTransitionError);
    assert.equal(jobs.getJob(key)?.state, 'success');
});

test('pending cannot jump to success', () => {
    const { jobs } = setup();
    assert.throws(
        () => jobs.markSuccess({ executionId: 'exe_a', instrumentId: 'DBS19' }, 1, at()),
        /Invalid job state transition pending → success/
    );
});

test('updates for an attempt other than the current one are rejected', () => {
    const { jobs } = setup();
    assert.throws(() => jobs.markRunning({ executionId: 'exe_a', instrumentId: 'DBS19' }, 2, at()), StateTransitionError);
});

test('running → running is allowed for redelivery', () => {
    const { jobs } = setup();
    const key = { executionId: 'exe_a', instrumentId: 'UOB19' };
    jobs.markRunning(key, 1, at());
    const again = jobs.markRunning(key, 1, at(MINUTE));
    assert.equal(again.state, 'running');
    assert.deepEqual(again.startedAt, at(MINUTE));
    assert.equal(jobs.listAttempts(key).length, 1);
});

test('a failure with a scheduled retry commits the failed attempt and the re-open together', () => {
    const { jobs } = setup();
    const key = { executionId: 'exe_a', instrumentId: 'UOB19' };
    jobs.markRunning(key, 1, at());

    const job = jobs.markFailed(key, 1, at(1000), { message: 'quote feed unavailable', code: 'TRANSIENT_FETCH' }, 2);
    assert.equal(job.state, 'pending');
    assert.equal(job.attemptCount, 2);
    assert.equal(jobs.countJobs('exe_a').failed, 0);

    const attempts = jobs.listAttempts(key);
    assert.deepEqual(attempts.map(a => [a.attempt, a.state, a.errorCode, a.error]), [
        [1, 'failed', 'TRANSIENT_FETCH', 'quote feed unavailable'],
    ]);
});

test('a failed job re-opens only as the next attempt', () => {
    const { jobs } = setup();
    const key = { executionId: 'exe_a', instrumentId: 'AAPL' };
    jobs.markRunning(key, 1, at());
    const failed = jobs.markFailed(key, 1, at(1000), { message: 'bad data', code: 'COMPUTE_ERROR' });
    assert.equal(failed.state, 'failed');
    assert.equal(failed.error, 'bad data');
    assert.equal(failed.errorCode, 'COMPUTE_ERROR');

    assert.throws(() => jobs.reopen(key, 3, at(2000)), StateTransitionError);
    const reopened = jobs.reopen(key, 2, at(2000));
    assert.equal(reopened.state, 'pending');
    assert.equal(reopened.attemptCount, 2);
    assert.equal(reopened.startedAt, undefined);

    assert.throws(() => jobs.reopen(key, 3, at(3000)), /Invalid job state transition pending → pending/);
});

test('unknown jobs and executions raise NotFoundError', () => {
    const { jobs } = setup();
    assert.throws(() => jobs.markRunning({ executionId: 'exe_a', instrumentId: 'MSFT' }, 1, at()), NotFoundError);
    assert.throws(() => jobs.requireExecution('exe_missing'), NotFoundError);
    assert.equal(jobs.getJob({ executionId: 'exe_missing', instrumentId: 'DBS19' }), null);
});

test('lists executions newest first', () => {
    const { jobs } = setup();
    jobs.createExecution({ executionId: 'exe_b', source: 'scheduler', asOfDate: '2026-01-06', instrumentIds: ['DBS19'], createdAt: at(DAY) });
    assert.deepEqual(jobs.listExecutions().map(e => e.executionId), ['exe_b', 'exe_a']);
    assert.equal(jobs.listExecutions(1).length, 1);
});

test('a database written by a newer release is refused', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-store-'));
    const file = path.join(dir, 'pipeline.db');
    try {
        const db = openPipelineDatabase(file);
        assert.equal(readSchemaVersion(db), SCHEMA_VERSION);
        db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION + 1);
        db.close();

        assert.throws(() => openPipelineDatabase(file), (err: unknown) => {
            assert.ok(err instanceof SchemaMismatchError);
            assert.equal(err.code, 'SCHEMA_MISMATCH');
            return true;
        });
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('reopening a current database keeps its data', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-store-'));
    const file = path.join(dir, 'pipeline.db');
    try {
        const first = openPipelineDatabase(file);
        new JobStateStore(first).createExecution({ executionId: 'exe_keep', source: 'manual', asOfDate: AS_OF, instrumentIds: ['DBS19'], createdAt: at() });
        first.close();

        const second = openPipelineDatabase(file);
        assert.equal(new JobStateStore(second).getExecution('exe_keep')?.dispatchedCount, 1);
        second.close();
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});
