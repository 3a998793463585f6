/**
 * Instrument registry and symbol resolution.
 *
 * The registry is the fixed, ordered set of instruments the pipeline precomputes.
 * resolve() maps a user-typed symbol onto it:
 *   1. exact (case-insensitive)          → 'exact'
 *   2. similarity ≥ AUTO_CORRECT_AT      → 'corrected'
 *   3. similarity ≥ SUGGEST_AT           → 'suggested' (caller confirms)
 *   4. otherwise                         → 'rejected'
 */

import * as fs from 'fs';
import { z } from 'zod';
import { similarityRatio } from './similarity';
import { InvalidRequestError, SchemaMismatchError } from './structured_error';

export const AUTO_CORRECT_AT = 0.85;
export const SUGGEST_AT = 0.6;
const MAX_SUGGESTIONS = 3;

const instrumentSchema = z.object({
    id: z
        .string()
        .min(1)
        .transform(s => s.trim().toUpperCase()),
    name: z.string().min(1),
    exchange: z.string().min(1).optional(),
});

const registryFileSchema = z.object({
    instruments: z.array(instrumentSchema).min(1),
});

export type Instrument = z.output<typeof instrumentSchema>;

export interface ScoredInstrument {
    instrument: Instrument;
    score: number;
}

export type Resolution =
    | { kind: 'exact'; query: string; instrument: Instrument }
    | { kind: 'corrected'; query: string; instrument: Instrument; score: number }
    | { kind: 'suggested'; query: string; suggestions: ScoredInstrument[] }
    | { kind: 'rejected'; query: string; nearest?: ScoredInstrument };

export class InstrumentRegistry {
    private readonly byId = new Map<string, Instrument>();

    constructor(private readonly instruments: readonly Instrument[]) {
        for (const instrument of instruments) {
            if (this.byId.has(instrument.id)) {
                throw new SchemaMismatchError(`Duplicate instrument id in registry: ${instrument.id}`, { id: instrument.id });
            }
            this.byId.set(instrument.id, instrument);
        }
    }

    static fromFile(filePath: string): InstrumentRegistry {
        const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
        const parsed = registryFileSchema.safeParse(raw);
        if (!parsed.success) {
            const detail = parsed.error.issues.map(i => `${i.path.join('.') || 'root'}: ${i.message}`).join('; ');
            throw new SchemaMismatchError(`Invalid instrument registry ${filePath}: ${detail}`, { path: filePath });
        }
        return new InstrumentRegistry(parsed.data.instruments);
    }

    get size(): number {
        return this.instruments.length;
    }

    /** Registry order; the first `limit` when given. */
    list(limit?: number): Instrument[] {
        return limit === undefined ? [...this.instruments] : this.instruments.slice(0, limit);
    }

    get(id: string): Instrument | undefined {
        return this.byId.get(id.trim().toUpperCase());
    }

    resolve(input: string): Resolution {
        const query = input.trim().toUpperCase();
        if (!query) throw new InvalidRequestError('Symbol must not be empty');

        const exact = this.byId.get(query);
        if (exact) return { kind: 'exact', query, instrument: exact };

        const ranked = this.instruments
            .map(instrument => ({ instrument, score: similarityRatio(query, instrument.id) }))
            .sort((a, b) => b.score - a.score); // stable: ties keep registry order

        const best = ranked[0];
        if (!best || best.score < SUGGEST_AT) {
            return best && best.score > 0 ? { kind: 'rejected', query, nearest: best } : { kind: 'rejected', query };
        }

        if (best.score >= AUTO_CORRECT_AT) {
            return { kind: 'corrected', query, instrument: best.instrument, score: best.score };
        }

        return {
            kind: 'suggested',
            query,
            suggestions: ranked.filter(r => r.score >= SUGGEST_AT).slice(0, MAX_SUGGESTIONS),
        };
    }
}
