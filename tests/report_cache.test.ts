import test from 'node:test';
import assert from 'node:assert/strict';

import { ReportCache } from '../src/report_cache';
import { AS_OF, DAY, FakeClock, HOUR, MINUTE, T0, memoryDb } from './helpers';

function setup(reportVersion = 1) {
    const db = memoryDb();
    const clock = new FakeClock();
    const cache = new ReportCache(db, { reportVersion, clock: clock.millis });
    return { db, clock, cache };
}

test('serves a success entry until its TTL and keeps the row after expiry', () => {
    const { cache, clock } = setup();
    cache.put({ instrumentId: 'DBS19', asOfDate: AS_OF, status: 'success', payload: { summary: 'ok' }, computedAt: new Date(T0), ttlMs: DAY });

    clock.ms = T0 + DAY - 1000;
    const fresh = cache.get('DBS19', AS_OF);
    assert.equal(fresh.hit, true);
    if (fresh.hit) {
        assert.deepEqual(fresh.entry.payload, { summary: 'ok' });
        assert.equal(fresh.entry.expiresAt.getTime(), T0 + DAY);
    }

    clock.ms = T0 + DAY + 1000;
    assert.deepEqual(cache.get('DBS19', AS_OF), { hit: false, reason: 'expired' });

    const row = cache.peek('DBS19', AS_OF);
    assert.equal(row?.status, 'success');
    assert.deepEqual(row?.payload, { summary: 'ok' });
});

test('expires exactly at expires_at', () => {
    const { cache, clock } = setup();
    cache.put({ instrumentId: 'DBS19', asOfDate: AS_OF, status: 'success', payload: 1, computedAt: new Date(T0), ttlMs: HOUR });
    clock.ms = T0 + HOUR;
    assert.deepEqual(cache.get('DBS19', AS_OF), { hit: false, reason: 'expired' });
});

test('rejects non-positive TTLs and success writes without a payload', () => {
    const { cache } = setup();
    assert.throws(
        () => cache.put({ instrumentId: 'DBS19', asOfDate: AS_OF, status: 'success', payload: {}, computedAt: new Date(T0), ttlMs: 0 }),
        RangeError
    );
    assert.throws(
        () => cache.put({ instrumentId: 'DBS19', asOfDate: AS_OF, status: 'success', computedAt: new Date(T0), ttlMs: HOUR }),
        TypeError
    );
    assert.equal(cache.peek('DBS19', AS_OF), null);
});

test('the storage layer refuses expires_at <= computed_at', () => {
    const { db } = setup();
    assert.throws(
        () =>
            db.prepare(`
                INSERT INTO report_cache (instrument_id, as_of_date, status, computed_at, expires_at, report_version)
                VALUES ('DBS19', ?, 'error', ?, ?, 1)
            `).run(AS_OF, T0, T0),
        /CHECK constraint failed/
    );
});

test('an error entry is a miss carrying its reason and retry time', () => {
    const { cache, clock } = setup();
    cache.put({ instrumentId: 'UOB19', asOfDate: AS_OF, status: 'error', errorMessage: 'upstream timeout', computedAt: new Date(T0), ttlMs: 15 * MINUTE });

    clock.ms = T0 + MINUTE;
    const lookup = cache.get('UOB19', AS_OF);
    assert.deepEqual(lookup, { hit: false, reason: 'error', errorMessage: 'upstream timeout', retryAfter: new Date(T0 + 15 * MINUTE) });
    assert.equal(
        cache.describeMiss('UOB19', lookup),
        `The report for UOB19 is temporarily unavailable (upstream timeout). Please try again after ${new Date(T0 + 15 * MINUTE).toISOString()}.`
    );

    clock.ms = T0 + 16 * MINUTE;
    assert.deepEqual(cache.get('UOB19', AS_OF), { hit: false, reason: 'expired' });
});

test('describes an absent entry', () => {
    const { cache } = setup();
    const lookup = cache.get('AAPL', AS_OF);
    assert.deepEqual(lookup, { hit: false, reason: 'absent' });
    assert.equal(cache.describeMiss('AAPL', lookup), 'No report for AAPL has been computed yet.');
});

test('the latest computed_at wins', () => {
    const { cache, clock } = setup();
    const newer = cache.put({ instrumentId: 'DBS19', asOfDate: AS_OF, status: 'success', payload: { v: 2 }, computedAt: new Date(T0 + 10_000), ttlMs: DAY });
    const older = cache.put({ instrumentId: 'DBS19', asOfDate: AS_OF, status: 'success', payload: { v: 1 }, computedAt: new Date(T0), ttlMs: DAY });

    assert.equal(newer.written, true);
    assert.equal(older.written, false);

    clock.ms = T0 + 20_000;
    const lookup = cache.get('DBS19', AS_OF);
    assert.equal(lookup.hit, true);
    if (lookup.hit) assert.deepEqual(lookup.entry.payload, { v: 2 });
});

test('an error write never replaces a fresh success', () => {
    const { cache, clock } = setup();
    cache.put({ instrumentId: 'DBS19', asOfDate: AS_OF, status: 'success', payload: { v: 1 }, computedAt: new Date(T0), ttlMs: DAY });
    const result = cache.put({ instrumentId: 'DBS19', asOfDate: AS_OF, status: 'error', errorMessage: 'boom', computedAt: new Date(T0 + MINUTE), ttlMs: 15 * MINUTE });

    assert.equal(result.written, false);
    clock.ms = T0 + 2 * MINUTE;
    assert.equal(cache.get('DBS19', AS_OF).hit, true);
});

test('an error write replaces an expired success', () => {
    const { cache, clock } = setup();
    cache.put({ instrumentId: 'DBS19', asOfDate: AS_OF, status: 'success', payload: { v: 1 }, computedAt: new Date(T0), ttlMs: HOUR });
    const result = cache.put({ instrumentId: 'DBS19', asOfDate: AS_OF, status: 'error', errorMessage: 'boom', computedAt: new Date(T0 + 2 * HOUR), ttlMs: 15 * MINUTE });

    assert.equal(result.written, true);
    clock.ms = T0 + 2 * HOUR + MINUTE;
    const lookup = cache.get('DBS19', AS_OF);
    assert.equal(lookup.hit, false);
    if (!lookup.hit) assert.equal(lookup.reason, 'error');
});

test('invalidation hides an entry until the next write', () => {
    const { cache, clock } = setup();
    cache.put({ instrumentId: 'DBS19', asOfDate: AS_OF, status: 'success', payload: { v: 1 }, computedAt: new Date(T0), ttlMs: DAY });

    clock.ms = T0 + MINUTE;
    assert.equal(cache.invalidate('DBS19', AS_OF), true);
    assert.equal(cache.invalidate('DBS19', AS_OF), false);
    assert.deepEqual(cache.get('DBS19', AS_OF), { hit: false, reason: 'invalidated' });
    assert.equal(cache.peek('DBS19', AS_OF)?.invalidatedAt?.getTime(), T0 + MINUTE);

    cache.put({ instrumentId: 'DBS19', asOfDate: AS_OF, status: 'success', payload: { v: 2 }, computedAt: new Date(T0 + 2 * MINUTE), ttlMs: DAY });
    const lookup = cache.get('DBS19', AS_OF);
    assert.equal(lookup.hit, true);
    if (lookup.hit) assert.deepEqual(lookup.entry.payload, { v: 2 });
});

test('entries from an older report version are misses and can be bulk-invalidated', () => {
    const { db, clock } = setup();
    const v1 = new ReportCache(db, { reportVersion: 1, clock: clock.millis });
    const v2 = new ReportCache(db, { reportVersion: 2, clock: clock.millis });

    v1.put({ instrumentId: 'DBS19', asOfDate: AS_OF, status: 'success', payload: { v: 1 }, computedAt: new Date(T0), ttlMs: DAY });
    v1.put({ instrumentId: 'UOB19', asOfDate: AS_OF, status: 'success', payload: { v: 1 }, computedAt: new Date(T0), ttlMs: DAY });
    v2.put({ instrumentId: 'AAPL', asOfDate: AS_OF, status: 'success', payload: { v: 2 }, computedAt: new Date(T0), ttlMs: DAY });

    clock.ms = T0 + MINUTE;
    assert.deepEqual(v2.get('DBS19', AS_OF), { hit: false, reason: 'stale_version' });
    assert.equal(v2.invalidateStaleVersions(), 2);
    assert.deepEqual(v1.get('DBS19', AS_OF), { hit: false, reason: 'invalidated' });
    assert.equal(v2.get('AAPL', AS_OF).hit, true);
});

test('a reader changing its payload does not change what later readers get', () => {
    const { cache } = setup();
    cache.put({ instrumentId: 'DBS19', asOfDate: AS_OF, status: 'success', payload: { summary: 'ok', levels: [1, 2] }, computedAt: new Date(T0), ttlMs: DAY });

    const first = cache.get('DBS19', AS_OF);
    assert.ok(first.hit);
    const payload = first.entry.payload;
    assert.ok(typeof payload === 'object' && payload !== null);
    Object.assign(payload, { summary: 'tampered', levels: [] });

    const second = cache.get('DBS19', AS_OF);
    assert.ok(second.hit);
    assert.deepEqual(second.entry.payload, { summary: 'ok', levels: [1, 2] });
    assert.deepEqual(cache.peek('DBS19', AS_OF)?.payload, { summary: 'ok', levels: [1, 2] });
});
