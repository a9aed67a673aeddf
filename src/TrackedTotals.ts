/**
 * TrackedTotals — Running Sums per Pattern
 *
 * Every row whose raw line matches a tracked pattern adds the sum of its
 * per-CPU deltas to that pattern's total. One row may feed several
 * patterns. Totals are never reset during a run.
 *
 * @module
 */
import { describeMatcher, matchesLine, type LineMatcher } from './LineMatcher.js';

export interface TrackedTotal {
    /** Pattern text as given on the command line */
    readonly pattern: string;
    readonly total: number;
}

export class TrackedTotals {
    private readonly _matchers: readonly LineMatcher[];
    private readonly _totals: number[];

    constructor(matchers: readonly LineMatcher[]) {
        this._matchers = matchers;
        this._totals = matchers.map(() => 0);
    }

    /** Add `deltas` to every pattern matching `line`. */
    accumulate(line: string, deltas: readonly number[]): void {
        let sum = 0;
        for (const d of deltas) sum += d;

        this._matchers.forEach((matcher, i) => {
            if (matchesLine(matcher, line)) this._totals[i] = (this._totals[i] ?? 0) + sum;
        });
    }

    /** Current totals, in pattern order. */
    entries(): TrackedTotal[] {
        return this._matchers.map((matcher, i) => ({
            pattern: describeMatcher(matcher),
            total: this._totals[i] ?? 0,
        }));
    }

    /** Total for a pattern, or `undefined` when it is not tracked. */
    get(pattern: string): number | undefined {
        return this.entries().find(e => e.pattern === pattern)?.total;
    }
}
