/**
 * InterruptMonitor — Warm-Up Pass and Monitoring Cycles
 *
 * ```
 * warmUp():  hard(first) → soft(first)                      (no report)
 * cycle():   hard → soft → cpu stats (waits interval) → snapshot
 * ```
 *
 * The monitor owns one {@link MonitorState}; the collectors mutate it,
 * the snapshot exposes what the presenter needs for one frame.
 *
 * @module
 */
import { performance } from 'node:perf_hooks';
import { HardIrqCollector, SoftIrqCollector, counterSourcePaths, type InterruptCollector } from './Collectors.js';
import { MonitorState } from './MonitorState.js';
import { summarizeTracked, type TrackedSummary } from './Summary.js';
import type { CounterRow } from './CounterTable.js';
import type { CpuSample, CpuStatsCollector } from './CpuStats.js';
import type { MonitorConfig } from './MonitorConfig.js';
import type { MonitorObserverFn } from './MonitorObserver.js';
import type { TextSource } from './TextSource.js';

/** Everything one frame shows. */
export interface MonitorSnapshot {
    readonly cycle: number;
    readonly onlineCpus: number;
    readonly intervalSeconds: number;
    readonly cpu: readonly CpuSample[];
    /** Ever-changed rows of both tables, sorted by name */
    readonly rows: readonly CounterRow[];
    readonly tracked: readonly TrackedSummary[];
}

export interface MonitorDeps {
    readonly text: TextSource;
    readonly cpuStats: CpuStatsCollector;
    readonly observer?: MonitorObserverFn | undefined;
}

/** Plain code-unit order, hard rows first on equal names. */
export function compareRowNames(a: CounterRow, b: CounterRow): number {
    if (a.name < b.name) return -1;
    if (a.name > b.name) return 1;
    return 0;
}

export class InterruptMonitor {
    readonly state: MonitorState;
    private readonly _hard: HardIrqCollector;
    private readonly _soft: SoftIrqCollector;

    constructor(
        private readonly config: MonitorConfig,
        private readonly deps: MonitorDeps,
    ) {
        this.state = new MonitorState(config.track);
        const paths = counterSourcePaths(config.procRoot);
        const policy = { exclude: config.exclude, trackWarmup: config.trackWarmup };
        this._hard = new HardIrqCollector(this.state, paths.hard, deps.text, policy);
        this._soft = new SoftIrqCollector(this.state, paths.soft, deps.text, policy);
    }

    /** Establish baselines for both tables. Nothing is marked changed. */
    warmUp(): void {
        this.collectCounters(true);
        this.state.warmedUp = true;
    }

    /**
     * Run one reported cycle. Performs the warm-up first if it has not
     * happened yet.
     */
    async cycle(): Promise<MonitorSnapshot> {
        if (!this.state.warmedUp) this.warmUp();
        const started = performance.now();

        this.collectCounters(false);

        const cpuStarted = performance.now();
        let cpu: CpuSample[];
        try {
            cpu = await this.deps.cpuStats.collect(this.config.intervalSeconds);
        } catch (err) {
            this.emitError('cpu', err);
            throw err;
        }
        this.deps.observer?.({
            type: 'cpu',
            cpus: cpu.length,
            durationMs: performance.now() - cpuStarted,
            timestamp: Date.now(),
        });

        this.state.cycle++;
        const snapshot = this.snapshot(cpu);
        this.deps.observer?.({
            type: 'cycle',
            cycle: snapshot.cycle,
            displayed: snapshot.rows.length,
            durationMs: performance.now() - started,
            timestamp: Date.now(),
        });
        return snapshot;
    }

    /** Build a snapshot of the current state. */
    snapshot(cpu: readonly CpuSample[] = []): MonitorSnapshot {
        const onlineCpus = this.state.onlineCpus ?? 0;
        const rows = [...this.state.hard.changedRows(), ...this.state.soft.changedRows()]
            .sort(compareRowNames);

        return {
            cycle: this.state.cycle,
            onlineCpus,
            intervalSeconds: this.config.intervalSeconds,
            cpu,
            rows,
            tracked: summarizeTracked(this.state.tracked.entries(), onlineCpus, this.config.intervalSeconds),
        };
    }

    private collectCounters(isFirstPass: boolean): void {
        this.collectOne(this._hard, isFirstPass);
        this.collectOne(this._soft, isFirstPass);
    }

    private collectOne(collector: InterruptCollector, isFirstPass: boolean): void {
        const started = performance.now();
        try {
            const result = collector.collect(isFirstPass);
            this.deps.observer?.({
                type: 'collect',
                ...result,
                firstPass: isFirstPass,
                durationMs: performance.now() - started,
                timestamp: Date.now(),
            });
        } catch (err) {
            this.emitError('collect', err);
            throw err;
        }
    }

    private emitError(step: 'collect' | 'cpu', err: unknown): void {
        this.deps.observer?.({
            type: 'error',
            step,
            error: err instanceof Error ? err.message : String(err),
            timestamp: Date.now(),
        });
    }
}
