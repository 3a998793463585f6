/**
 * Structured Logger for the precompute pipeline
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR (plus SILENT for test runs)
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when PRECOMPUTE_LOG_JSON=1
 * - Optional file output via PRECOMPUTE_LOG_FILE
 * - Module context (component name) on every line
 * - Bound job context (execution id, instrument, attempt) via logger.bind()
 *
 * Environment:
 *   PRECOMPUTE_LOG_LEVEL  = debug|info|warn|error|silent (default: info)
 *   PRECOMPUTE_LOG_JSON   = 1 (default: text)
 *   PRECOMPUTE_LOG_FILE   = path (optional, appends)
 *   PRECOMPUTE_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

function isLevelName(key: string): key is keyof typeof LEVEL_ORDER {
    return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, key);
}

function parseLevel(raw: string | undefined): number {
    const key = (raw || 'info').toLowerCase();
    return isLevelName(key) ? LEVEL_ORDER[key] : LEVEL_ORDER.info;
}

const MIN_LEVEL = parseLevel(process.env.PRECOMPUTE_LOG_LEVEL);
const DEBUG_OVERRIDE = process.env.PRECOMPUTE_DEBUG === '1' || process.env.PRECOMPUTE_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.PRECOMPUTE_LOG_JSON === '1';
const LOG_FILE = process.env.PRECOMPUTE_LOG_FILE || '';

let fileWriteFailed = false;

/** Job context carried on every line a bound logger writes. */
export interface LogContext {
    execution_id?: string;
    instrument?: string;
    attempt?: number;
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, ctx: LogContext, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (ctx.execution_id) entry.execution_id = ctx.execution_id;
        if (ctx.instrument) entry.instrument = ctx.instrument;
        if (ctx.attempt !== undefined) entry.attempt = ctx.attempt;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const scope = ctx.execution_id
            ? ` [${ctx.execution_id}${ctx.instrument ? '/' + ctx.instrument : ''}${ctx.attempt !== undefined ? '#' + ctx.attempt : ''}]`
            : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${scope}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(level, line);
    }
}

function writeOutput(level: LogLevel, line: string): void {
    switch (level) {
        case 'error': process.stderr.write(line + '\n'); break;
        case 'warn':  process.stderr.write(line + '\n'); break;
        default:      process.stdout.write(line + '\n'); break;
    }

    if (LOG_FILE && !fileWriteFailed) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (err) {
            fileWriteFailed = true;
            process.stderr.write(`[logger] file output disabled, cannot append to ${LOG_FILE}: ${String(err)}\n`);
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
    /** Returns a logger that stamps the given job context on every line. */
    bind(ctx: LogContext): Logger;
}

export function createLogger(component: string, ctx: LogContext = {}): Logger {
    return {
        debug: (msg, data) => emit('debug', component, ctx, msg, data),
        info:  (msg, data) => emit('info',  component, ctx, msg, data),
        warn:  (msg, data) => emit('warn',  component, ctx, msg, data),
        error: (msg, data) => emit('error', component, ctx, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`, ctx),
        bind: (extra) => createLogger(component, { ...ctx, ...extra }),
    };
}
