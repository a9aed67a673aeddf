/**
 * MonitorState — Everything One Monitoring Run Accumulates
 *
 * Created once at startup, mutated once per cycle by the collectors,
 * discarded at exit. Nothing else holds counter state.
 *
 * @module
 */
import { CounterTable } from './CounterTable.js';
import { TrackedTotals } from './TrackedTotals.js';
import type { LineMatcher } from './LineMatcher.js';

export class MonitorState {
    readonly hard = new CounterTable('hard');
    readonly soft = new CounterTable('soft');
    readonly tracked: TrackedTotals;

    /** CPU column count, fixed by the first hard-irq collection */
    onlineCpus: number | undefined;

    /** Reported cycles so far (the warm-up pass is not counted) */
    cycle = 0;

    /** Whether the warm-up pass has run */
    warmedUp = false;

    constructor(tracked: readonly LineMatcher[] = []) {
        this.tracked = new TrackedTotals(tracked);
    }
}
