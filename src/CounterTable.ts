/**
 * CounterTable — Per-Source Counter State
 *
 * Holds the last sampled value and the last delta of every row seen in
 * one kernel source. Rows are created on first sight and never removed;
 * only rows whose `everChanged` flag is set are ever displayed.
 *
 * @module
 */
import type { CounterSourceKind, ParsedRow } from './SourceParser.js';

/** Live state of one interrupt vector or softirq class. */
export interface CounterRow {
    readonly name: string;
    /** Last sampled counter per CPU */
    readonly current: number[];
    /** `current_new - current_old` per CPU, from the last apply */
    readonly delta: number[];
    /** Description tokens from the last sample, opaque */
    description: readonly string[];
    /** Raw source line from the last sample */
    line: string;
    /** Set once a non-warm-up, non-excluded sample changed; never cleared */
    everChanged: boolean;
}

export class CounterTable {
    private readonly _rows = new Map<string, CounterRow>();

    constructor(readonly kind: CounterSourceKind) {}

    /**
     * Fold one sample into the table.
     *
     * For each of the first `columns` CPUs the delta against the stored
     * value is computed before the stored value is replaced. A row seen
     * for the first time has a stored value of 0.
     *
     * @param markChanges - Whether a non-zero delta may set `everChanged`
     * @returns The updated row
     */
    apply(sample: ParsedRow, columns: number, markChanges: boolean): CounterRow {
        let row = this._rows.get(sample.name);
        if (!row) {
            row = {
                name: sample.name,
                current: new Array<number>(columns).fill(0),
                delta: new Array<number>(columns).fill(0),
                description: sample.description,
                line: sample.line,
                everChanged: false,
            };
            this._rows.set(sample.name, row);
        }

        let changed = false;
        for (let cpu = 0; cpu < columns; cpu++) {
            const next = sample.counts[cpu] ?? 0;
            const delta = next - (row.current[cpu] ?? 0);
            row.delta[cpu] = delta;
            row.current[cpu] = next;
            if (delta !== 0) changed = true;
        }
        row.description = sample.description;
        row.line = sample.line;

        if (markChanges && changed) row.everChanged = true;
        return row;
    }

    /** Look up a row by name. */
    get(name: string): CounterRow | undefined {
        return this._rows.get(name);
    }

    /** All rows, in first-seen order. */
    rows(): CounterRow[] {
        return [...this._rows.values()];
    }

    /** Rows that have changed at least once since warm-up. */
    changedRows(): CounterRow[] {
        return this.rows().filter(r => r.everChanged);
    }

    /** Number of distinct rows seen. */
    get size(): number { return this._rows.size; }
}
