// pipeline_store.ts — SQLite home of the report cache and job state store
//
// GUARANTEES:
// - Forward-only migrations tracked in schema_version
// - A database written by a newer release is refused (SCHEMA_MISMATCH), never read
// - executions / job_records / job_attempts are append-or-update only (audit trail)
// - report_cache enforces expires_at > computed_at at the storage layer
//
// CONTRACT: Synchronous API (better-sqlite3 blocks by design)

import Database from 'better-sqlite3';
import { SchemaMismatchError } from './structured_error';
import { createLogger } from './logger';

const log = createLogger('store');

export const SCHEMA_VERSION = 1;

export type PipelineDatabase = Database.Database;

/* -------------------------------------------------------------------------- */
/* Open                                                                       */
/* -------------------------------------------------------------------------- */

export function openPipelineDatabase(dbPath: string): PipelineDatabase {
    const db = new Database(dbPath);
    try {
        configureDatabase(db);
        runMigrations(db);
        integrityCheck(db);
    } catch (err) {
        db.close();
        throw err;
    }
    log.debug(`Pipeline database ready`, { path: dbPath, schema_version: SCHEMA_VERSION });
    return db;
}

function configureDatabase(db: PipelineDatabase): void {
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.pragma('synchronous = NORMAL');
    db.pragma('busy_timeout = 5000');
}

/* -------------------------------------------------------------------------- */
/* Migrations                                                                 */
/* -------------------------------------------------------------------------- */

export function readSchemaVersion(db: PipelineDatabase): number {
    const row = db
        .prepare(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
        .get() as { version: number } | undefined;
    return row?.version ?? 0;
}

function runMigrations(db: PipelineDatabase): void {
    const tx = db.transaction(() => {
        db.exec(`
          CREATE TABLE IF NOT EXISTS schema_version (
            version INTEGER PRIMARY KEY,
            applied_at TEXT DEFAULT CURRENT_TIMESTAMP
          ) STRICT
        `);

        const current = readSchemaVersion(db);

        if (current > SCHEMA_VERSION) {
            throw new SchemaMismatchError(
                `Database schema version ${current} is newer than supported version ${SCHEMA_VERSION}; refusing to run`,
                { found: current, supported: SCHEMA_VERSION }
            );
        }

        if (current < 1) {
            db.exec(`
              CREATE TABLE IF NOT EXISTS executions (
                execution_id TEXT PRIMARY KEY,
                created_at TEXT NOT NULL,
                source TEXT NOT NULL,
                as_of_date TEXT NOT NULL,
                instrument_limit INTEGER,
                dispatched_count INTEGER NOT NULL,
                CHECK(dispatched_count >= 0)
              ) STRICT;

              CREATE TABLE IF NOT EXISTS job_records (
                execution_id TEXT NOT NULL,
                instrument_id TEXT NOT NULL,
                state TEXT NOT NULL,
                attempt_count INTEGER NOT NULL DEFAULT 1,
                started_at TEXT,
                finished_at TEXT,
                error TEXT,
                error_code TEXT,
                updated_at TEXT NOT NULL,
                PRIMARY KEY (execution_id, instrument_id),
                FOREIGN KEY (execution_id) REFERENCES executions(execution_id),
                CHECK(state IN ('pending','running','success','failed')),
                CHECK(attempt_count >= 1)
              ) STRICT;

              CREATE TABLE IF NOT EXISTS job_attempts (
                execution_id TEXT NOT NULL,
                instrument_id TEXT NOT NULL,
                attempt INTEGER NOT NULL,
                state TEXT NOT NULL,
                started_at TEXT,
                finished_at TEXT,
                error TEXT,
                error_code TEXT,
                cost_total REAL,
                cost_band TEXT,
                PRIMARY KEY (execution_id, instrument_id, attempt),
                FOREIGN KEY (execution_id, instrument_id) REFERENCES job_records(execution_id, instrument_id),
                CHECK(state IN ('running','success','failed'))
              ) STRICT;

              CREATE TABLE IF NOT EXISTS report_cache (
                instrument_id TEXT NOT NULL,
                as_of_date TEXT NOT NULL,
                status TEXT NOT NULL,
                payload TEXT,
                error_message TEXT,
                computed_at INTEGER NOT NULL,
                expires_at INTEGER NOT NULL,
                report_version INTEGER NOT NULL,
                execution_id TEXT,
                invalidated_at INTEGER,
                PRIMARY KEY (instrument_id, as_of_date),
                CHECK(status IN ('success','error')),
                CHECK(expires_at > computed_at)
              ) STRICT;

              CREATE TABLE IF NOT EXISTS execution_locks (
                lock_key TEXT PRIMARY KEY,
                execution_id TEXT NOT NULL,
                acquired_at INTEGER NOT NULL,
                expires_at INTEGER NOT NULL
              ) STRICT;

              CREATE INDEX IF NOT EXISTS idx_jobs_execution_state ON job_records(execution_id, state);
              CREATE INDEX IF NOT EXISTS idx_executions_date ON executions(as_of_date);
              CREATE INDEX IF NOT EXISTS idx_cache_version ON report_cache(report_version);
            `);

            db.prepare(`INSERT INTO schema_version (version) VALUES (1)`).run();
        }

        // Future migrations: add only, never remove.
    });

    tx();
}

function integrityCheck(db: PipelineDatabase): void {
    const result = db.prepare('PRAGMA quick_check').get() as { quick_check: string } | undefined;
    if (result?.quick_check !== 'ok') {
        throw new SchemaMismatchError(`Database integrity check failed: ${result?.quick_check ?? 'no result'}`);
    }
}
