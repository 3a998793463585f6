/**
 * Pipeline Configuration
 *
 * Built once at startup, validated eagerly and passed by reference into
 * every component. Nothing reads process.env after loadConfig() returns.
 */

import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from './structured_error';

const HOUR_MS = 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

// GPT-4o class pricing (USD per million tokens)
export const DEFAULT_PROMPT_USD_PER_M = 2.5;
export const DEFAULT_COMPLETION_USD_PER_M = 10.0;

// Reporting currency conversion
export const DEFAULT_CURRENCY = 'THB';
export const DEFAULT_USD_TO_REPORTING = 35.0;

// Per-query data store cost, reporting currency
export const DEFAULT_DB_QUERY_COST = 0.001;

/* -------------------------------------------------------------------------- */
/* Schema                                                                     */
/* -------------------------------------------------------------------------- */

const positiveInt = z.number().int().positive();
const positiveNumber = z.number().positive();

const bandSchema = z
    .object({
        excellent: positiveNumber.default(1.75),
        good: positiveNumber.default(3.5),
        acceptable: positiveNumber.default(7.0),
        poor: positiveNumber.default(14.0),
    })
    .refine(b => b.excellent < b.good && b.good < b.acceptable && b.acceptable < b.poor, {
        message: 'band thresholds must be strictly ascending (excellent < good < acceptable < poor)',
    });

const configSchema = z.object({
    dbPath: z.string().min(1, 'PRECOMPUTE_DB_PATH is required'),
    instrumentsPath: z.string().min(1).default(path.resolve('data', 'instruments.json')),
    /** Module exporting createReportBuilder(config); required by the CLI commands that compute. */
    builderModule: z.string().min(1).optional(),
    timezone: z
        .string()
        .default('Asia/Bangkok')
        .refine(isValidTimezone, { message: 'timezone must be a valid IANA zone' }),
    cache: z
        .object({
            ttlMs: positiveInt.default(24 * HOUR_MS),
            errorTtlMs: positiveInt.default(15 * MINUTE_MS),
            reportVersion: positiveInt.default(1),
            memoryEntries: positiveInt.default(500),
        })
        .default({}),
    retry: z
        .object({
            maxAttempts: positiveInt.default(3),
            baseDelayMs: z.number().int().nonnegative().default(1000),
            maxDelayMs: z.number().int().nonnegative().default(30_000),
        })
        .default({}),
    watcher: z
        .object({
            pollIntervalMs: positiveInt.default(5000),
            timeoutMs: positiveInt.default(15 * MINUTE_MS),
        })
        .default({}),
    worker: z
        .object({
            concurrency: positiveInt.default(4),
            computeTimeoutMs: positiveInt.default(5 * MINUTE_MS),
        })
        .default({}),
    cost: z
        .object({
            promptUsdPerMillion: z.number().nonnegative().default(DEFAULT_PROMPT_USD_PER_M),
            completionUsdPerMillion: z.number().nonnegative().default(DEFAULT_COMPLETION_USD_PER_M),
            dbQueryCost: z.number().nonnegative().default(DEFAULT_DB_QUERY_COST),
            usdToReporting: positiveNumber.default(DEFAULT_USD_TO_REPORTING),
            currency: z.string().min(1).default(DEFAULT_CURRENCY),
            bands: bandSchema.default({}),
            warnAtExecutionTotal: positiveNumber.optional(),
        })
        .default({}),
    lock: z
        .object({
            mode: z.enum(['per-date', 'none']).default('per-date'),
            staleAfterMs: positiveInt.default(2 * HOUR_MS),
        })
        .default({}),
});

export type PipelineConfig = Readonly<z.output<typeof configSchema>>;
export type PipelineConfigInput = z.input<typeof configSchema>;
export type CostConfig = PipelineConfig['cost'];
export type BandThresholds = CostConfig['bands'];

function isValidTimezone(tz: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone: tz });
        return true;
    } catch {
        return false;
    }
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object') {
        for (const inner of Object.values(value)) deepFreeze(inner);
        Object.freeze(value);
    }
    return value;
}

/* -------------------------------------------------------------------------- */
/* Builders                                                                   */
/* -------------------------------------------------------------------------- */

/**
 * Validate a config object, fill defaults and freeze it.
 * Throws ConfigError listing every problem at once.
 */
export function buildConfig(input: PipelineConfigInput): PipelineConfig {
    const parsed = configSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => {
            const where = issue.path.join('.') || 'config';
            return `${where}: ${issue.message}`;
        });
        throw new ConfigError(issues);
    }
    return deepFreeze(parsed.data);
}

type Env = Record<string, string | undefined>;

function numberVar(env: Env, name: string, issues: string[], scale = 1): number | undefined {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return undefined;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        issues.push(`${name}: expected a number, got "${raw}"`);
        return undefined;
    }
    return Math.round(value * scale);
}

function floatVar(env: Env, name: string, issues: string[]): number | undefined {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return undefined;
    const value = parseFloat(raw);
    if (!Number.isFinite(value)) {
        issues.push(`${name}: expected a number, got "${raw}"`);
        return undefined;
    }
    return value;
}

/**
 * Read the pipeline configuration from environment variables.
 *
 *   PRECOMPUTE_DB_PATH            (required) SQLite file for cache + job state
 *   PRECOMPUTE_INSTRUMENTS_PATH   instrument registry JSON
 *   PRECOMPUTE_BUILDER_MODULE     report builder module (start, retry)
 *   PRECOMPUTE_TIMEZONE           as-of date timezone (default Asia/Bangkok)
 *   PRECOMPUTE_CACHE_TTL_HOURS    success entry TTL (default 24)
 *   PRECOMPUTE_ERROR_TTL_MINUTES  negative-cache TTL (default 15)
 *   PRECOMPUTE_REPORT_VERSION     current report schema version (default 1)
 *   PRECOMPUTE_MAX_ATTEMPTS       attempts per instrument (default 3)
 *   PRECOMPUTE_RETRY_BASE_MS      backoff base (default 1000)
 *   PRECOMPUTE_RETRY_MAX_MS       backoff cap (default 30000)
 *   PRECOMPUTE_CONCURRENCY        parallel workers (default 4)
 *   PRECOMPUTE_COMPUTE_TIMEOUT_MS hard limit per report (default 300000)
 *   PRECOMPUTE_POLL_INTERVAL_MS   watcher poll interval (default 5000)
 *   PRECOMPUTE_WATCH_TIMEOUT_MS   watcher timeout (default 900000)
 *   PRECOMPUTE_LOCK_MODE          per-date | none (default per-date)
 *   PRECOMPUTE_USD_TO_REPORTING   currency conversion rate (default 35)
 *   PRECOMPUTE_OVER_BUDGET_AT     over-budget threshold, reporting currency (default 14)
 */
export function loadConfig(env: Env = process.env): PipelineConfig {
    const issues: string[] = [];

    const dbPath = env.PRECOMPUTE_DB_PATH;
    if (!dbPath) issues.push('PRECOMPUTE_DB_PATH: required (SQLite file for report cache and job state)');

    const lockMode = env.PRECOMPUTE_LOCK_MODE;
    if (lockMode !== undefined && lockMode !== 'per-date' && lockMode !== 'none') {
        issues.push(`PRECOMPUTE_LOCK_MODE: expected per-date or none, got "${lockMode}"`);
    }

    const input: PipelineConfigInput = {
        dbPath: dbPath ?? '',
        instrumentsPath: env.PRECOMPUTE_INSTRUMENTS_PATH || undefined,
        builderModule: env.PRECOMPUTE_BUILDER_MODULE || undefined,
        timezone: env.PRECOMPUTE_TIMEZONE || undefined,
        cache: {
            ttlMs: numberVar(env, 'PRECOMPUTE_CACHE_TTL_HOURS', issues, HOUR_MS),
            errorTtlMs: numberVar(env, 'PRECOMPUTE_ERROR_TTL_MINUTES', issues, MINUTE_MS),
            reportVersion: numberVar(env, 'PRECOMPUTE_REPORT_VERSION', issues),
        },
        retry: {
            maxAttempts: numberVar(env, 'PRECOMPUTE_MAX_ATTEMPTS', issues),
            baseDelayMs: numberVar(env, 'PRECOMPUTE_RETRY_BASE_MS', issues),
            maxDelayMs: numberVar(env, 'PRECOMPUTE_RETRY_MAX_MS', issues),
        },
        watcher: {
            pollIntervalMs: numberVar(env, 'PRECOMPUTE_POLL_INTERVAL_MS', issues),
            timeoutMs: numberVar(env, 'PRECOMPUTE_WATCH_TIMEOUT_MS', issues),
        },
        worker: {
            concurrency: numberVar(env, 'PRECOMPUTE_CONCURRENCY', issues),
            computeTimeoutMs: numberVar(env, 'PRECOMPUTE_COMPUTE_TIMEOUT_MS', issues),
        },
        cost: {
            usdToReporting: floatVar(env, 'PRECOMPUTE_USD_TO_REPORTING', issues),
            bands: { poor: floatVar(env, 'PRECOMPUTE_OVER_BUDGET_AT', issues) },
        },
        lock: {
            mode: lockMode === 'none' ? 'none' : 'per-date',
        },
    };

    if (issues.length > 0) throw new ConfigError(issues);
    return buildConfig(input);
}
