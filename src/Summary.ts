/**
 * Summary — Tracked-Total Rates
 *
 * @module
 */
import type { TrackedTotal } from './TrackedTotals.js';

export interface TrackedSummary {
    readonly pattern: string;
    readonly total: number;
    /** total ÷ onlineCpus */
    readonly avgPerCpu: number;
    /** total ÷ interval */
    readonly perSecond: number;
    /** total ÷ interval ÷ onlineCpus */
    readonly perSecondPerCpu: number;
}

/** Division that yields 0 instead of Infinity/NaN. */
export function safeDivide(numerator: number, denominator: number): number {
    return denominator === 0 ? 0 : numerator / denominator;
}

export function summarizeTracked(
    totals: readonly TrackedTotal[],
    onlineCpus: number,
    intervalSeconds: number,
): TrackedSummary[] {
    return totals.map(({ pattern, total }) => ({
        pattern,
        total,
        avgPerCpu: safeDivide(total, onlineCpus),
        perSecond: safeDivide(total, intervalSeconds),
        perSecondPerCpu: safeDivide(safeDivide(total, intervalSeconds), onlineCpus),
    }));
}
