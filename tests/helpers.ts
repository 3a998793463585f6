// Shared fixtures for the test suite: in-memory stores, a controllable clock
// and scripted report builders.

import { buildConfig, PipelineConfig, PipelineConfigInput } from '../src/config';
import { openPipelineDatabase, PipelineDatabase } from '../src/pipeline_store';
import { InstrumentRegistry } from '../src/instrument_registry';
import type { BuildContext, ReportBuilder } from '../src/worker';

export const AS_OF = '2026-01-05';
export const T0 = Date.UTC(2026, 0, 5, 1, 0, 0);
export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;

export function testConfig(overrides: Omit<PipelineConfigInput, 'dbPath'> = {}): PipelineConfig {
    return buildConfig({ dbPath: ':memory:', ...overrides });
}

export function memoryDb(): PipelineDatabase {
    return openPipelineDatabase(':memory:');
}

export function testRegistry(): InstrumentRegistry {
    return new InstrumentRegistry([
        { id: 'DBS19', name: 'Test Bank A' },
        { id: 'UOB19', name: 'Test Bank B' },
        { id: 'TENCENT19', name: 'Test Tech A' },
        { id: 'HONDA19', name: 'Test Motor A' },
        { id: 'AAPL', name: 'Test Tech B' },
    ]);
}

export class FakeClock {
    constructor(public ms: number = T0) {}

    readonly now = (): Date => new Date(this.ms);
    readonly millis = (): number => this.ms;

    advance(ms: number): void {
        this.ms += ms;
    }
}

type BuildStep = (ctx: BuildContext) => Promise<unknown>;

/** Builder whose behaviour per call is scripted by a function of the context. */
export class ScriptedBuilder implements ReportBuilder {
    readonly calls: Array<{ instrument: string; attempt: number; executionId: string }> = [];

    constructor(private readonly step: BuildStep = defaultStep) {}

    build(ctx: BuildContext): Promise<unknown> {
        this.calls.push({ instrument: ctx.instrument.id, attempt: ctx.attempt, executionId: ctx.executionId });
        return this.step(ctx);
    }

    callsFor(instrument: string): number {
        return this.calls.filter(c => c.instrument === instrument).length;
    }
}

export async function defaultStep(ctx: BuildContext): Promise<unknown> {
    ctx.usage.addTokens(10_000, 2_000);
    ctx.usage.addQueries(5);
    return { instrument: ctx.instrument.id, asOfDate: ctx.asOfDate, summary: `report for ${ctx.instrument.id}` };
}
