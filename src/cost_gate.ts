/**
 * CostGate — scores the resource spend of one report computation.
 *
 * INVARIANT: a Worker never persists a successful report without scoring it here.
 * Every band is advisory except 'over-budget', which the Worker treats as a hard stop.
 *
 * Features:
 * - LLM cost from prompt/completion token counts (USD rates per million tokens)
 * - Data store cost from query count (reporting currency per query)
 * - Conversion to the reporting currency
 * - Band classification by fixed ascending thresholds
 * - Spend ledger per execution for audit and reconciliation
 */

import type { CostConfig } from './config';
import { createLogger } from './logger';

const log = createLogger('cost-gate');

export type CostBand = 'excellent' | 'good' | 'acceptable' | 'poor' | 'over-budget';

export const COST_BANDS: readonly CostBand[] = ['excellent', 'good', 'acceptable', 'poor', 'over-budget'];

export interface ResourceUsage {
    promptTokens: number;
    completionTokens: number;
    queryCount: number;
}

export interface CostBreakdown {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
    queryCount: number;
    llmCostUsd: number;
}

export interface CostScore {
    band: CostBand;
    /** LLM spend, reporting currency */
    llmCost: number;
    /** Data store spend, reporting currency */
    dbCost: number;
    /** llmCost + dbCost, reporting currency */
    total: number;
    currency: string;
    breakdown: CostBreakdown;
}

export interface SpendRecord {
    execution_id: string;
    instrument_id: string;
    band: CostBand;
    total: number;
    timestamp: string;
}

function round6(n: number): number {
    return Math.round(n * 1e6) / 1e6;
}

function assertCount(name: string, value: number): void {
    if (!Number.isFinite(value) || value < 0) {
        throw new RangeError(`${name} must be a non-negative finite number, got ${value}`);
    }
}

export class CostGate {
    private spent = new Map<string, number>();            // execution_id -> cumulative spend
    private ledger = new Map<string, SpendRecord[]>();    // execution_id -> records
    private warned = new Set<string>();

    constructor(private readonly config: CostConfig) {}

    get currency(): string {
        return this.config.currency;
    }

    /** Threshold at or above which a score is over-budget. */
    get overBudgetAt(): number {
        return this.config.bands.poor;
    }

    score(usage: ResourceUsage): CostScore {
        assertCount('promptTokens', usage.promptTokens);
        assertCount('completionTokens', usage.completionTokens);
        assertCount('queryCount', usage.queryCount);

        const rates = this.config;
        const llmCostUsd =
            (usage.promptTokens / 1_000_000) * rates.promptUsdPerMillion +
            (usage.completionTokens / 1_000_000) * rates.completionUsdPerMillion;

        const llmCost = round6(llmCostUsd * rates.usdToReporting);
        const dbCost = round6(usage.queryCount * rates.dbQueryCost);
        const total = round6(llmCost + dbCost);

        return {
            band: this.classify(total),
            llmCost,
            dbCost,
            total,
            currency: rates.currency,
            breakdown: {
                promptTokens: usage.promptTokens,
                completionTokens: usage.completionTokens,
                totalTokens: usage.promptTokens + usage.completionTokens,
                queryCount: usage.queryCount,
                llmCostUsd: round6(llmCostUsd),
            },
        };
    }

    classify(total: number): CostBand {
        const bands = this.config.bands;
        if (total < bands.excellent) return 'excellent';
        if (total < bands.good) return 'good';
        if (total < bands.acceptable) return 'acceptable';
        if (total < bands.poor) return 'poor';
        return 'over-budget';
    }

    isHardStop(score: CostScore): boolean {
        return score.band === 'over-budget';
    }

    /**
     * Record a scored computation against its execution, including over-budget
     * ones: the spend was incurred whether or not the report is kept.
     */
    record(executionId: string, instrumentId: string, score: CostScore): void {
        const entry: SpendRecord = {
            execution_id: executionId,
            instrument_id: instrumentId,
            band: score.band,
            total: score.total,
            timestamp: new Date().toISOString(),
        };

        const prev = this.spent.get(executionId) || 0;
        const cumulative = round6(prev + score.total);
        this.spent.set(executionId, cumulative);

        const records = this.ledger.get(executionId) || [];
        records.push(entry);
        this.ledger.set(executionId, records);

        const warnAt = this.config.warnAtExecutionTotal;
        if (warnAt !== undefined && cumulative >= warnAt && !this.warned.has(executionId)) {
            this.warned.add(executionId);
            log.warn(`Execution spend warning`, { execution_id: executionId, spent: cumulative, threshold: warnAt, currency: this.currency });
        }

        log.debug(`Spend recorded`, { execution_id: executionId, instrument: instrumentId, cost: score.total, band: score.band, cumulative });
    }

    /** Cumulative spend for an execution, reporting currency. */
    getSpend(executionId: string): number {
        return this.spent.get(executionId) || 0;
    }

    getLedger(executionId: string): SpendRecord[] {
        return [...(this.ledger.get(executionId) || [])];
    }

    /** Drop an execution's in-memory ledger once it is finished; returns the records. */
    releaseExecution(executionId: string): SpendRecord[] {
        const records = this.getLedger(executionId);
        this.spent.delete(executionId);
        this.ledger.delete(executionId);
        this.warned.delete(executionId);
        log.info(`Spend ledger released`, { execution_id: executionId, total_records: records.length });
        return records;
    }
}
