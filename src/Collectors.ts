/**
 * Collectors — Hard-IRQ and Soft-IRQ Sampling
 *
 * Each collector reads one kernel source, parses it and folds every row
 * into its {@link CounterTable}:
 *
 * 1. delta = new − old per online CPU, then old := new
 * 2. `everChanged` is set when this is not the warm-up pass, the raw
 *    line matches no exclusion pattern, and some delta is non-zero
 * 3. independently of (2), the deltas are added to every tracked
 *    pattern that matches the raw line
 *
 * The hard-irq collector owns the CPU count: its header decides
 * `onlineCpus` on the first pass and must not change afterwards.
 * `/proc/softirqs` may list more CPUs (possible rather than online);
 * the extra columns are ignored.
 *
 * @module
 */
import { join } from 'node:path';
import { matchesAny, type LineMatcher } from './LineMatcher.js';
import { MonitorError } from './MonitorError.js';
import { parseCounterSource, type CounterSourceKind, type ParsedSource } from './SourceParser.js';
import type { CounterTable } from './CounterTable.js';
import type { MonitorState } from './MonitorState.js';
import type { TextSource } from './TextSource.js';

export interface CollectorPolicy {
    /** Rows whose line matches any of these never become `everChanged` */
    readonly exclude: readonly LineMatcher[];
    /** Whether the warm-up pass contributes to tracked totals */
    readonly trackWarmup: boolean;
}

/** Outcome of one collection, reported to the observer. */
export interface CollectResult {
    readonly source: CounterSourceKind;
    readonly path: string;
    /** Rows present in this sample */
    readonly rows: number;
    /** Rows with at least one non-zero delta in this sample */
    readonly changed: number;
}

// ============================================================================
// Shared Engine
// ============================================================================

export abstract class InterruptCollector {
    abstract readonly kind: CounterSourceKind;

    constructor(
        protected readonly state: MonitorState,
        readonly path: string,
        private readonly text: TextSource,
        private readonly policy: CollectorPolicy,
    ) {}

    /**
     * Sample the source once and update the state in place.
     *
     * @param isFirstPass - Warm-up pass: establishes baselines only
     * @throws MonitorError `SOURCE_UNREADABLE`, `PARSE` or `CPU_COUNT_CHANGED`
     */
    collect(isFirstPass: boolean): CollectResult {
        const parsed = this.parse(this.text.read(this.path));
        const columns = this.resolveColumns(parsed);
        const table = this.table();

        let changed = 0;
        for (const sample of parsed.rows) {
            const markChanges = !isFirstPass && !matchesAny(this.policy.exclude, sample.line);
            const row = table.apply(sample, columns, markChanges);
            if (row.delta.some(d => d !== 0)) changed++;

            if (!isFirstPass || this.policy.trackWarmup) {
                this.state.tracked.accumulate(sample.line, row.delta);
            }
        }

        return { source: this.kind, path: this.path, rows: parsed.rows.length, changed };
    }

    protected abstract table(): CounterTable;
    protected abstract parse(text: string): ParsedSource;
    protected abstract resolveColumns(parsed: ParsedSource): number;
}

// ============================================================================
// Hard IRQs — /proc/interrupts
// ============================================================================

export class HardIrqCollector extends InterruptCollector {
    readonly kind = 'hard' as const;

    protected table(): CounterTable { return this.state.hard; }

    protected parse(text: string): ParsedSource {
        return parseCounterSource(text, { source: this.path });
    }

    protected resolveColumns(parsed: ParsedSource): number {
        const known = this.state.onlineCpus;
        if (known === undefined) {
            this.state.onlineCpus = parsed.columns;
            return parsed.columns;
        }
        if (known !== parsed.columns) {
            throw new MonitorError(
                'CPU_COUNT_CHANGED',
                `${this.path} now lists ${parsed.columns} CPUs, was ${known}; restart irqtop after CPU hotplug`,
            );
        }
        return known;
    }
}

// ============================================================================
// Soft IRQs — /proc/softirqs
// ============================================================================

export class SoftIrqCollector extends InterruptCollector {
    readonly kind = 'soft' as const;

    protected table(): CounterTable { return this.state.soft; }

    protected parse(text: string): ParsedSource {
        return parseCounterSource(text, { source: this.path, requiredColumns: this.onlineCpus() });
    }

    protected resolveColumns(parsed: ParsedSource): number {
        const online = this.onlineCpus();
        if (parsed.columns < online) {
            throw new MonitorError(
                'PARSE',
                `${this.path}: header lists ${parsed.columns} CPUs, expected at least ${online}`,
            );
        }
        return online;
    }

    private onlineCpus(): number {
        const online = this.state.onlineCpus;
        if (online === undefined) {
            throw new Error('SoftIrqCollector.collect() called before the hard-irq source set the CPU count');
        }
        return online;
    }
}

// ============================================================================
// Paths
// ============================================================================

/** Location of both counter sources under a proc root. */
export function counterSourcePaths(procRoot: string): { hard: string; soft: string } {
    return {
        hard: join(procRoot, 'interrupts'),
        soft: join(procRoot, 'softirqs'),
    };
}
