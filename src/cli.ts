#!/usr/bin/env node
/**
 * CLI Entry Point for the report precompute pipeline
 */

import * as path from 'path';
import { loadConfig, PipelineConfig } from './config';
import { openPipelineDatabase, PipelineDatabase } from './pipeline_store';
import { JobStateStore } from './job_state_store';
import { ReportCache } from './report_cache';
import { InstrumentRegistry, Resolution } from './instrument_registry';
import { createPipeline } from './pipeline';
import { formatAsOfDate, StartRequest } from './orchestrator';
import type { ReportBuilder } from './worker';
import type { ExecutionSummary } from './completion_watcher';
import { PipelineError } from './structured_error';

interface BuilderModule {
    createReportBuilder(config: PipelineConfig): ReportBuilder | Promise<ReportBuilder>;
}

function isBuilderModule(value: unknown): value is BuilderModule {
    return typeof value === 'object' && value !== null && 'createReportBuilder' in value && typeof value.createReportBuilder === 'function';
}

function optionValue(args: string[], name: string): string | undefined {
    const index = args.indexOf(name);
    if (index === -1) return undefined;
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
        throw new CliUsageError(`${name} requires a value`);
    }
    return value;
}

class CliUsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CliUsageError';
    }
}

class PrecomputeCLI {
    async run(args: string[]): Promise<void> {
        const command = args[2] || 'help';
        const rest = args.slice(3);

        if (command === 'help' || command === '--help') {
            this.showHelp();
            return;
        }

        const config = loadConfig();

        switch (command) {
            case 'start':
                await this.runStart(config, rest);
                break;
            case 'retry':
                await this.runRetry(config, rest);
                break;
            case 'status':
                this.withDatabase(config, db => this.runStatus(db, rest));
                break;
            case 'report':
                this.withDatabase(config, db => this.runReport(config, db, rest));
                break;
            case 'resolve':
                this.runResolve(config, rest);
                break;
            case 'invalidate':
                this.withDatabase(config, db => this.runInvalidate(config, db, rest));
                break;
            case 'invalidate-version':
                this.withDatabase(config, db => {
                    const count = new ReportCache(db, { reportVersion: config.cache.reportVersion }).invalidateStaleVersions();
                    console.log(`Invalidated ${count} cache entries older than report version ${config.cache.reportVersion}`);
                });
                break;
            default:
                console.error(`Unknown command: ${command}`);
                this.showHelp();
                process.exitCode = 1;
        }
    }

    private withDatabase(config: PipelineConfig, fn: (db: PipelineDatabase) => void): void {
        const db = openPipelineDatabase(config.dbPath);
        try {
            fn(db);
        } finally {
            db.close();
        }
    }

    private async loadBuilder(config: PipelineConfig): Promise<ReportBuilder> {
        const modulePath = config.builderModule;
        if (!modulePath) {
            throw new CliUsageError('PRECOMPUTE_BUILDER_MODULE must name a module exporting createReportBuilder(config)');
        }
        const loaded: unknown = await import(path.resolve(modulePath));
        if (!isBuilderModule(loaded)) {
            throw new CliUsageError(`${modulePath} does not export createReportBuilder(config)`);
        }
        return loaded.createReportBuilder(config);
    }

    private async runStart(config: PipelineConfig, args: string[]): Promise<void> {
        const limitRaw = optionValue(args, '--limit');
        const request: StartRequest = {
            limit: limitRaw !== undefined ? Number(limitRaw) : undefined,
            source: optionValue(args, '--source') ?? 'cli',
            asOfDate: optionValue(args, '--date'),
            force: args.includes('--force'),
        };

        const pipeline = createPipeline(config, await this.loadBuilder(config));
        const controller = new AbortController();
        const onSigint = () => controller.abort();
        process.once('SIGINT', onSigint);

        try {
            const started = pipeline.orchestrator.start(request);
            console.log(`Execution ${started.executionId} started for ${started.asOfDate}: ${started.dispatchedCount} instruments`);
            if (started.undispatched.length > 0) {
                console.warn(`   Not dispatched (still pending): ${started.undispatched.join(', ')}`);
            }

            const summary = await pipeline.waitForCompletion(started.executionId, controller.signal);
            this.printSummary(summary);
            if (pipeline.pool.fatal) process.exitCode = 3;
            else if (summary.state !== 'DONE') process.exitCode = 2;
        } finally {
            process.removeListener('SIGINT', onSigint);
            await pipeline.close();
        }
    }

    private async runRetry(config: PipelineConfig, args: string[]): Promise<void> {
        const executionId = args[0];
        if (!executionId) throw new CliUsageError('Usage: precompute retry <execution_id>');

        const pipeline = createPipeline(config, await this.loadBuilder(config));
        try {
            const result = pipeline.orchestrator.recover(executionId);
            console.log(`Re-opened ${result.reopened.length} failed jobs, re-dispatched ${result.resumed} pending`);
            if (result.exhausted.length > 0) {
                console.log(`   Out of attempts: ${result.exhausted.join(', ')}`);
            }
            this.printSummary(await pipeline.waitForCompletion(executionId));
        } finally {
            await pipeline.close();
        }
    }

    private runStatus(db: PipelineDatabase, args: string[]): void {
        const jobs = new JobStateStore(db);
        const executionId = args[0];

        if (!executionId) {
            const executions = jobs.listExecutions();
            if (executions.length === 0) {
                console.log('No executions recorded.');
                return;
            }
            for (const e of executions) {
                const c = jobs.countJobs(e.executionId);
                console.log(`${e.executionId}  ${e.asOfDate}  ${e.source.padEnd(10)} ok=${c.success} failed=${c.failed} open=${c.pending + c.running}/${e.dispatchedCount}`);
            }
            return;
        }

        const execution = jobs.requireExecution(executionId);
        const counts = jobs.countJobs(executionId);
        console.log(`Execution ${execution.executionId} (${execution.asOfDate}, source=${execution.source})`);
        console.log(`   Created: ${execution.createdAt.toISOString()}`);
        console.log(`   Jobs: ${counts.total}  success=${counts.success} failed=${counts.failed} running=${counts.running} pending=${counts.pending}`);
        for (const job of jobs.listJobs(executionId)) {
            const error = job.error ? `  ${job.errorCode}: ${job.error}` : '';
            console.log(`   ${job.instrumentId.padEnd(12)} ${job.state.padEnd(8)} attempt ${job.attemptCount}${error}`);
        }
    }

    private runReport(config: PipelineConfig, db: PipelineDatabase, args: string[]): void {
        const symbol = args[0];
        if (!symbol) throw new CliUsageError('Usage: precompute report <symbol> [--date YYYY-MM-DD]');

        const registry = InstrumentRegistry.fromFile(config.instrumentsPath);
        const resolution = registry.resolve(symbol);
        const instrumentId = this.resolvedId(resolution);
        if (!instrumentId) {
            this.printResolution(resolution);
            process.exitCode = 1;
            return;
        }

        const asOfDate = optionValue(args, '--date') ?? formatAsOfDate(new Date(), config.timezone);
        const cache = new ReportCache(db, { reportVersion: config.cache.reportVersion });
        const lookup = cache.get(instrumentId, asOfDate);
        if (lookup.hit) {
            console.log(JSON.stringify(lookup.entry.payload, null, 2));
            return;
        }
        console.log(cache.describeMiss(instrumentId, lookup));
        process.exitCode = 1;
    }

    private runResolve(config: PipelineConfig, args: string[]): void {
        const symbol = args[0];
        if (!symbol) throw new CliUsageError('Usage: precompute resolve <symbol>');
        const resolution = InstrumentRegistry.fromFile(config.instrumentsPath).resolve(symbol);
        this.printResolution(resolution);
        if (resolution.kind === 'rejected') process.exitCode = 1;
    }

    private runInvalidate(config: PipelineConfig, db: PipelineDatabase, args: string[]): void {
        const symbol = args[0];
        const asOfDate = optionValue(args, '--date');
        if (!symbol || !asOfDate) throw new CliUsageError('Usage: precompute invalidate <symbol> --date YYYY-MM-DD');

        const cache = new ReportCache(db, { reportVersion: config.cache.reportVersion });
        const instrumentId = symbol.trim().toUpperCase();
        const changed = cache.invalidate(instrumentId, asOfDate);
        console.log(changed ? `Invalidated ${instrumentId} for ${asOfDate}` : `No live cache entry for ${instrumentId} on ${asOfDate}`);
    }

    private resolvedId(resolution: Resolution): string | null {
        switch (resolution.kind) {
            case 'exact':
            case 'corrected':
                return resolution.instrument.id;
            default:
                return null;
        }
    }

    private printResolution(resolution: Resolution): void {
        switch (resolution.kind) {
            case 'exact':
                console.log(`${resolution.instrument.id}  ${resolution.instrument.name}`);
                break;
            case 'corrected':
                console.log(`${resolution.query} → ${resolution.instrument.id} (${resolution.instrument.name}, similarity ${resolution.score.toFixed(2)})`);
                break;
            case 'suggested':
                console.log(`Unknown symbol ${resolution.query}. Did you mean:`);
                for (const s of resolution.suggestions) {
                    console.log(`   ${s.instrument.id.padEnd(12)} ${s.instrument.name} (${s.score.toFixed(2)})`);
                }
                break;
            case 'rejected':
                console.log(
                    resolution.nearest
                        ? `Unknown symbol ${resolution.query} (nearest: ${resolution.nearest.instrument.id}, similarity ${resolution.nearest.score.toFixed(2)})`
                        : `Unknown symbol ${resolution.query}`
                );
                break;
        }
    }

    private printSummary(summary: ExecutionSummary): void {
        console.log(`Execution ${summary.executionId} ${summary.state}`);
        console.log(`   Succeeded: ${summary.succeeded}/${summary.total}  Failed: ${summary.failed}  Pending: ${summary.pending}`);
        console.log(`   Duration: ${(summary.durationMs / 1000).toFixed(1)}s over ${summary.polls} polls`);
    }

    private showHelp(): void {
        console.log(`
precompute <command>

Commands:
  start [--limit N] [--source S] [--date YYYY-MM-DD] [--force]
                                 Precompute reports and wait for the execution to finish
  retry <execution_id>           Re-open failed jobs with attempts left, re-dispatch pending ones
  status [execution_id]          Recent executions, or one execution's jobs
  report <symbol> [--date D]     Print a cached report
  resolve <symbol>               Resolve a (possibly misspelled) symbol
  invalidate <symbol> --date D   Mark one cached report as expired
  invalidate-version             Expire every report written under an older report version

Environment:
  PRECOMPUTE_DB_PATH (required), PRECOMPUTE_BUILDER_MODULE (start, retry),
  PRECOMPUTE_INSTRUMENTS_PATH, PRECOMPUTE_TIMEZONE, PRECOMPUTE_LOG_LEVEL, ...
`);
    }
}

// Run CLI
if (require.main === module) {
    const cli = new PrecomputeCLI();
    cli.run(process.argv).catch((err: unknown) => {
        if (err instanceof CliUsageError || err instanceof PipelineError) {
            console.error(`Error: ${err.message}`);
        } else {
            console.error('Fatal error:', err);
        }
        process.exit(1);
    });
}

export { PrecomputeCLI };
