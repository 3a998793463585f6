/**
 * ReportCache — durable, freshness-bounded store of computed reports.
 *
 * One row per (instrument, as-of date). Rows are never deleted: invalidation and
 * expiry only change what get() is willing to return. Concurrent writers resolve
 * by computed_at, the latest one wins.
 */

import { LRUCache } from 'lru-cache';
import type { PipelineDatabase } from './pipeline_store';
import { createLogger } from './logger';

const log = createLogger('report-cache');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type CacheStatus = 'success' | 'error';

export interface CacheEntry {
    instrumentId: string;
    asOfDate: string;
    status: CacheStatus;
    payload: unknown;
    errorMessage?: string;
    computedAt: Date;
    expiresAt: Date;
    reportVersion: number;
    executionId?: string;
    invalidatedAt?: Date;
}

export type MissReason = 'absent' | 'expired' | 'error' | 'invalidated' | 'stale_version';

export type CacheLookup =
    | { hit: true; entry: CacheEntry }
    | { hit: false; reason: MissReason; errorMessage?: string; retryAfter?: Date };

export interface PutEntryParams {
    instrumentId: string;
    asOfDate: string;
    status: CacheStatus;
    payload?: unknown;
    errorMessage?: string;
    computedAt: Date;
    ttlMs: number;
    executionId?: string;
}

export interface PutResult {
    written: boolean;
    expiresAt: Date;
}

export interface ReportCacheOptions {
    reportVersion: number;
    memoryEntries?: number;
    clock?: () => number;
}

interface CacheRow {
    instrument_id: string;
    as_of_date: string;
    status: CacheStatus;
    payload: string | null;
    error_message: string | null;
    computed_at: number;
    expires_at: number;
    report_version: number;
    execution_id: string | null;
    invalidated_at: number | null;
}

/* -------------------------------------------------------------------------- */
/* Report Cache                                                               */
/* -------------------------------------------------------------------------- */

export class ReportCache {
    private readonly reportVersion: number;
    private readonly clock: () => number;

    // Parsed payloads keyed by row identity + computed_at: a rewrite gets a new key,
    // so memoised content is never stale.
    private readonly parsed: LRUCache<string, { value: unknown }>;

    constructor(private readonly db: PipelineDatabase, opts: ReportCacheOptions) {
        this.reportVersion = opts.reportVersion;
        this.clock = opts.clock ?? Date.now;
        this.parsed = new LRUCache<string, { value: unknown }>({ max: opts.memoryEntries ?? 500 });
    }

    get currentVersion(): number {
        return this.reportVersion;
    }

    /**
     * Fresh successful entry, or a Miss. Error, expired, invalidated and
     * old-version rows are never returned as hits even though they stay on disk.
     */
    get(instrumentId: string, asOfDate: string): CacheLookup {
        const row = this.readRow(instrumentId, asOfDate);
        if (!row) return { hit: false, reason: 'absent' };

        const now = this.clock();

        if (row.invalidated_at !== null) return { hit: false, reason: 'invalidated' };
        if (row.report_version !== this.reportVersion) return { hit: false, reason: 'stale_version' };

        if (row.status === 'error') {
            return row.expires_at > now
                ? { hit: false, reason: 'error', errorMessage: row.error_message ?? 'Report computation failed', retryAfter: new Date(row.expires_at) }
                : { hit: false, reason: 'expired' };
        }

        if (now >= row.expires_at) return { hit: false, reason: 'expired' };

        return { hit: true, entry: this.toEntry(row) };
    }

    /** Raw row regardless of freshness, status or invalidation. */
    peek(instrumentId: string, asOfDate: string): CacheEntry | null {
        const row = this.readRow(instrumentId, asOfDate);
        return row ? this.toEntry(row) : null;
    }

    /**
     * Upsert keyed by (instrument, date). A write older than the stored row is
     * dropped, and an error write never replaces a success that is still servable.
     */
    put(params: PutEntryParams): PutResult {
        if (!Number.isFinite(params.ttlMs) || params.ttlMs <= 0) {
            throw new RangeError(`ttlMs must be positive, got ${params.ttlMs}`);
        }
        if (params.status === 'success' && params.payload === undefined) {
            throw new TypeError('success entries require a payload');
        }

        const computedAt = params.computedAt.getTime();
        const expiresAt = computedAt + params.ttlMs;
        const payload = params.status === 'success' ? JSON.stringify(params.payload) : null;

        const info = this.db.prepare(`
            INSERT INTO report_cache
              (instrument_id, as_of_date, status, payload, error_message, computed_at, expires_at, report_version, execution_id, invalidated_at)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, NULL)
            ON CONFLICT(instrument_id, as_of_date) DO UPDATE SET
              status = excluded.status,
              payload = excluded.payload,
              error_message = excluded.error_message,
              computed_at = excluded.computed_at,
              expires_at = excluded.expires_at,
              report_version = excluded.report_version,
              execution_id = excluded.execution_id,
              invalidated_at = NULL
            WHERE excluded.computed_at >= report_cache.computed_at
              AND NOT (
                excluded.status = 'error'
                AND report_cache.status = 'success'
                AND report_cache.invalidated_at IS NULL
                AND report_cache.report_version = excluded.report_version
                AND report_cache.expires_at > excluded.computed_at
              )
        `).run(
            params.instrumentId,
            params.asOfDate,
            params.status,
            payload,
            params.errorMessage ?? null,
            computedAt,
            expiresAt,
            this.reportVersion,
            params.executionId ?? null
        );

        const written = info.changes > 0;
        if (!written) {
            log.debug(`Cache write superseded`, { instrument: params.instrumentId, as_of_date: params.asOfDate, status: params.status });
        }
        return { written, expiresAt: new Date(expiresAt) };
    }

    /** Treat one entry as expired without deleting it. */
    invalidate(instrumentId: string, asOfDate: string): boolean {
        const info = this.db.prepare(`
            UPDATE report_cache SET invalidated_at = ?
            WHERE instrument_id = ? AND as_of_date = ? AND invalidated_at IS NULL
        `).run(this.clock(), instrumentId, asOfDate);

        if (info.changes > 0) log.info(`Cache entry invalidated`, { instrument: instrumentId, as_of_date: asOfDate });
        return info.changes > 0;
    }

    /** Invalidate every entry written under an older report version. */
    invalidateStaleVersions(): number {
        const info = this.db.prepare(`
            UPDATE report_cache SET invalidated_at = ?
            WHERE report_version < ? AND invalidated_at IS NULL
        `).run(this.clock(), this.reportVersion);

        log.info(`Stale report versions invalidated`, { current_version: this.reportVersion, rows: info.changes });
        return info.changes;
    }

    /** Reader-facing text for a miss. */
    describeMiss(instrumentId: string, lookup: CacheLookup): string {
        if (lookup.hit) return '';
        switch (lookup.reason) {
            case 'error': {
                const after = lookup.retryAfter ? ` after ${lookup.retryAfter.toISOString()}` : ' later';
                return `The report for ${instrumentId} is temporarily unavailable (${lookup.errorMessage}). Please try again${after}.`;
            }
            case 'absent':
                return `No report for ${instrumentId} has been computed yet.`;
            default:
                return `The report for ${instrumentId} is being refreshed. Please try again later.`;
        }
    }

    private readRow(instrumentId: string, asOfDate: string): CacheRow | undefined {
        return this.db
            .prepare(`SELECT * FROM report_cache WHERE instrument_id = ? AND as_of_date = ?`)
            .get(instrumentId, asOfDate) as CacheRow | undefined;
    }

    private parsePayload(row: CacheRow): unknown {
        if (row.payload === null) return null;
        const key = `${row.instrument_id}|${row.as_of_date}|${row.computed_at}`;
        let memo = this.parsed.get(key);
        if (!memo) {
            memo = { value: JSON.parse(row.payload) };
            this.parsed.set(key, memo);
        }
        // Every reader gets its own copy; the memo mirrors the stored row only.
        return structuredClone(memo.value);
    }

    private toEntry(row: CacheRow): CacheEntry {
        return {
            instrumentId: row.instrument_id,
            asOfDate: row.as_of_date,
            status: row.status,
            payload: this.parsePayload(row),
            errorMessage: row.error_message ?? undefined,
            computedAt: new Date(row.computed_at),
            expiresAt: new Date(row.expires_at),
            reportVersion: row.report_version,
            executionId: row.execution_id ?? undefined,
            invalidatedAt: row.invalidated_at !== null ? new Date(row.invalidated_at) : undefined,
        };
    }
}
