/**
 * CpuStats — Per-CPU Utilization for the Last Interval
 *
 * The CPU statistics call is the loop's tick: it returns only after
 * `intervalSeconds` have elapsed, so the monitor never sleeps on its own.
 *
 * Two collaborators are provided:
 *
 * - {@link MpstatCollector} — runs `mpstat -P ALL <interval> 1` (sysstat)
 * - {@link ProcStatCollector} — samples `/proc/stat` twice, `interval` apart
 *
 * @module
 */
import { execFile } from 'node:child_process';
import { join } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { MonitorError } from './MonitorError.js';
import type { TextSource } from './TextSource.js';

// ============================================================================
// Types
// ============================================================================

/** Percentage breakdown of one CPU over one interval. */
export interface CpuSample {
    readonly cpu: number;
    readonly usr: number;
    readonly nice: number;
    readonly sys: number;
    readonly iowait: number;
    readonly irq: number;
    readonly soft: number;
    readonly steal: number;
    readonly guest: number;
    readonly idle: number;
}

export type CpuField = Exclude<keyof CpuSample, 'cpu'>;

/** Column order used by mpstat and by the presenter. */
export const CPU_FIELDS: readonly CpuField[] = [
    'usr', 'nice', 'sys', 'iowait', 'irq', 'soft', 'steal', 'guest', 'idle',
];

export interface CpuStatsCollector {
    /** Block for `intervalSeconds`, then report one sample per CPU (sorted). */
    collect(intervalSeconds: number): Promise<CpuSample[]>;
}

/** Runs an external program and resolves with its stdout. */
export type CommandRunner = (
    file: string,
    args: readonly string[],
    env: NodeJS.ProcessEnv,
) => Promise<string>;

// ============================================================================
// mpstat
// ============================================================================

/** Default {@link CommandRunner} backed by `execFile`. */
export const execFileRunner: CommandRunner = (file, args, env) =>
    new Promise<string>((resolve, reject) => {
        execFile(file, [...args], { env, encoding: 'utf8' }, (err, stdout) => {
            if (err) reject(err);
            else resolve(stdout);
        });
    });

/**
 * Parse `mpstat -P ALL <n> 1` output.
 *
 * Columns are located through the header line, so the optional AM/PM
 * field and the `%gnice` column of newer sysstat releases are handled.
 * The banner, blank, header, `all` and `Average:` lines are skipped.
 */
export function parseMpstatOutput(output: string): CpuSample[] {
    const samples: CpuSample[] = [];
    let columns: Map<string, number> | undefined;

    for (const rawLine of output.split('\n')) {
        const line = rawLine.trim();
        if (line.length === 0 || line.startsWith('Average')) continue;

        const tokens = line.split(/\s+/);
        if (tokens.includes('%idle')) {
            columns = new Map(tokens.map((t, i) => [t, i]));
            continue;
        }
        if (!columns) continue; // banner

        const cpuIndex = columns.get('CPU');
        const cpuToken = cpuIndex === undefined ? undefined : tokens[cpuIndex];
        if (cpuToken === undefined || !/^\d+$/.test(cpuToken)) continue; // 'all'

        const read = (field: CpuField): number => {
            const index = columns?.get(`%${field}`);
            const value = index === undefined ? NaN : Number(tokens[index]);
            return Number.isFinite(value) ? value : 0;
        };

        samples.push({
            cpu: Number(cpuToken),
            usr: read('usr'), nice: read('nice'), sys: read('sys'),
            iowait: read('iowait'), irq: read('irq'), soft: read('soft'),
            steal: read('steal'), guest: read('guest'), idle: read('idle'),
        });
    }

    return samples.sort((a, b) => a.cpu - b.cpu);
}

export class MpstatCollector implements CpuStatsCollector {
    constructor(
        private readonly run: CommandRunner = execFileRunner,
        private readonly command = 'mpstat',
    ) {}

    async collect(intervalSeconds: number): Promise<CpuSample[]> {
        let output: string;
        try {
            output = await this.run(
                this.command,
                ['-P', 'ALL', String(intervalSeconds), '1'],
                { ...process.env, LC_ALL: 'C' },
            );
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new MonitorError(
                'CPU_STATS',
                `${this.command} failed: ${reason} (install sysstat or use --cpu-source procstat)`,
                { cause: err },
            );
        }
        return parseMpstatOutput(output);
    }
}

// ============================================================================
// /proc/stat
// ============================================================================

/** Cumulative jiffies of one `cpuN` line. */
export interface CpuTimes {
    readonly user: number;
    readonly nice: number;
    readonly system: number;
    readonly idle: number;
    readonly iowait: number;
    readonly irq: number;
    readonly softirq: number;
    readonly steal: number;
    readonly guest: number;
    readonly guestNice: number;
}

/** Parse the per-CPU lines of `/proc/stat` (the aggregate `cpu` line is skipped). */
export function parseProcStat(text: string): Map<number, CpuTimes> {
    const result = new Map<number, CpuTimes>();
    for (const line of text.split('\n')) {
        const match = /^cpu(\d+)\s+(.*)$/.exec(line.trim());
        if (!match) continue;
        const v = (match[2] ?? '').split(/\s+/).map(Number);
        const at = (i: number): number => {
            const n = v[i];
            return n === undefined || !Number.isFinite(n) ? 0 : n;
        };
        result.set(Number(match[1]), {
            user: at(0), nice: at(1), system: at(2), idle: at(3), iowait: at(4),
            irq: at(5), softirq: at(6), steal: at(7), guest: at(8), guestNice: at(9),
        });
    }
    return result;
}

function percent(part: number, total: number): number {
    return total > 0 ? (part / total) * 100 : 0;
}

/**
 * Convert two `/proc/stat` readings into percentages.
 *
 * The kernel already counts guest time inside user (and guest_nice
 * inside nice), so those are subtracted to avoid double counting.
 */
export function diffCpuTimes(before: Map<number, CpuTimes>, after: Map<number, CpuTimes>): CpuSample[] {
    const samples: CpuSample[] = [];
    for (const [cpu, b] of before) {
        const a = after.get(cpu);
        if (!a) continue;

        const d = (k: keyof CpuTimes): number => Math.max(0, a[k] - b[k]);
        const total = d('user') + d('nice') + d('system') + d('idle')
            + d('iowait') + d('irq') + d('softirq') + d('steal');

        samples.push({
            cpu,
            usr: percent(Math.max(0, d('user') - d('guest')), total),
            nice: percent(Math.max(0, d('nice') - d('guestNice')), total),
            sys: percent(d('system'), total),
            iowait: percent(d('iowait'), total),
            irq: percent(d('irq'), total),
            soft: percent(d('softirq'), total),
            steal: percent(d('steal'), total),
            guest: percent(d('guest') + d('guestNice'), total),
            idle: percent(d('idle'), total),
        });
    }
    return samples.sort((x, y) => x.cpu - y.cpu);
}

export class ProcStatCollector implements CpuStatsCollector {
    private readonly path: string;

    constructor(
        procRoot: string,
        private readonly text: TextSource,
        private readonly sleep: (ms: number) => Promise<unknown> = delay,
    ) {
        this.path = join(procRoot, 'stat');
    }

    async collect(intervalSeconds: number): Promise<CpuSample[]> {
        const before = this.read();
        await this.sleep(intervalSeconds * 1000);
        const after = this.read();
        return diffCpuTimes(before, after);
    }

    private read(): Map<number, CpuTimes> {
        try {
            return parseProcStat(this.text.read(this.path));
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new MonitorError('CPU_STATS', `Cannot sample ${this.path}: ${reason}`, { cause: err });
        }
    }
}
