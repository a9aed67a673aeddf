/**
 * CpuStats.test.ts — mpstat and /proc/stat Collaborators
 *
 * Categories:
 *  1. mpstat output — header mapping, AM/PM, %gnice, skipped lines
 *  2. MpstatCollector — invocation, failures
 *  3. /proc/stat — parsing, guest accounting, idle CPUs
 *  4. ProcStatCollector — two reads around the interval
 *
 * @module
 */
import { describe, it, expect } from 'vitest';
import {
    parseMpstatOutput, MpstatCollector, parseProcStat, diffCpuTimes, ProcStatCollector,
    type CommandRunner, type CpuSample,
} from '../src/CpuStats.js';
import { MonitorError } from '../src/MonitorError.js';
import { MemoryTextSource } from '../src/TextSource.js';

function cpu(n: number, values: Partial<Omit<CpuSample, 'cpu'>>): CpuSample {
    return {
        cpu: n, usr: 0, nice: 0, sys: 0, iowait: 0, irq: 0, soft: 0, steal: 0, guest: 0, idle: 0,
        ...values,
    };
}

// ============================================================================
// 1. mpstat Output
// ============================================================================

const MPSTAT_24H = `Linux 6.1.0-test (box) \t10/18/26 \t_x86_64_\t(2 CPU)

12:00:01     CPU    %usr   %nice    %sys %iowait    %irq   %soft  %steal  %guest  %gnice   %idle
12:00:02     all    1.00    0.00    0.50    0.00    0.00    0.25    0.00    0.00    0.00   98.25
12:00:02       1    0.00    0.00    0.00    0.00    0.00    0.00    0.00    0.00    0.00  100.00
12:00:02       0    2.00    0.10    1.00    0.20    0.30    0.50    0.40    0.60    0.00   94.90

Average:     CPU    %usr   %nice    %sys %iowait    %irq   %soft  %steal  %guest  %gnice   %idle
Average:     all    1.00    0.00    0.50    0.00    0.00    0.25    0.00    0.00    0.00   98.25
Average:       0    2.00    0.10    1.00    0.20    0.30    0.50    0.40    0.60    0.00   94.90
`;

const MPSTAT_AMPM = `Linux 4.19.0 (old) \t10/18/2026 \t_x86_64_\t(1 CPU)

12:00:01 PM  CPU    %usr   %nice    %sys %iowait    %irq   %soft  %steal  %guest   %idle
12:00:02 PM  all    5.00    0.00    5.00    0.00    0.00    0.00    0.00    0.00   90.00
12:00:02 PM    0    5.00    0.00    5.00    0.00    0.00    0.00    0.00    0.00   90.00
`;

describe('parseMpstatOutput', () => {
    it('should map columns through the header and sort by CPU', () => {
        expect(parseMpstatOutput(MPSTAT_24H)).toEqual([
            cpu(0, { usr: 2, nice: 0.1, sys: 1, iowait: 0.2, irq: 0.3, soft: 0.5, steal: 0.4, guest: 0.6, idle: 94.9 }),
            cpu(1, { idle: 100 }),
        ]);
    });

    it('should handle the AM/PM column and a missing %gnice', () => {
        expect(parseMpstatOutput(MPSTAT_AMPM)).toEqual([cpu(0, { usr: 5, sys: 5, idle: 90 })]);
    });

    it('should return nothing for output without a header', () => {
        expect(parseMpstatOutput('')).toEqual([]);
        expect(parseMpstatOutput('Linux 6.1.0 (box)\n')).toEqual([]);
    });

    it('should read unparseable values as zero', () => {
        const out = '00:00:00 CPU %usr %idle\n00:00:01 0 n/a 99.00\n';
        expect(parseMpstatOutput(out)).toEqual([cpu(0, { idle: 99 })]);
    });
});

// ============================================================================
// 2. MpstatCollector
// ============================================================================

describe('MpstatCollector', () => {
    it('should run mpstat for one report of the interval under the C locale', async () => {
        const calls: { file: string; args: readonly string[]; lcAll: string | undefined }[] = [];
        const run: CommandRunner = async (file, args, env) => {
            calls.push({ file, args, lcAll: env['LC_ALL'] });
            return MPSTAT_AMPM;
        };

        const samples = await new MpstatCollector(run).collect(2);
        expect(calls).toEqual([{ file: 'mpstat', args: ['-P', 'ALL', '2', '1'], lcAll: 'C' }]);
        expect(samples).toHaveLength(1);
    });

    it('should wrap runner failures', async () => {
        const run: CommandRunner = async () => { throw new Error('spawn mpstat ENOENT'); };
        const err = await new MpstatCollector(run).collect(1).then(() => undefined, (e: unknown) => e);
        expect(err).toBeInstanceOf(MonitorError);
        expect(err).toMatchObject({
            code: 'CPU_STATS',
            message: 'mpstat failed: spawn mpstat ENOENT (install sysstat or use --cpu-source procstat)',
        });
    });
});

// ============================================================================
// 3. /proc/stat
// ============================================================================

const STAT_BEFORE = [
    'cpu  300 10 150 1500 20 5 5 0 0 0',
    'cpu0 100 10 50 800 20 5 5 0 0 0',
    'cpu1 200 0 100 700 0 0 0 0 0 0',
    'intr 12345 0 0',
    'ctxt 999',
    '',
].join('\n');

const STAT_AFTER = [
    'cpu  410 10 180 1640 20 5 25 0 40 0',
    'cpu0 150 10 80 900 20 5 25 0 0 0',
    'cpu1 260 0 100 740 0 0 0 0 40 0',
    'intr 12999 0 0',
    '',
].join('\n');

describe('parseProcStat', () => {
    it('should read per-CPU lines only', () => {
        const times = parseProcStat(STAT_BEFORE);
        expect([...times.keys()]).toEqual([0, 1]);
        expect(times.get(0)).toEqual({
            user: 100, nice: 10, system: 50, idle: 800, iowait: 20,
            irq: 5, softirq: 5, steal: 0, guest: 0, guestNice: 0,
        });
    });

    it('should default missing trailing fields to zero', () => {
        expect(parseProcStat('cpu0 1 2 3 4\n').get(0)).toMatchObject({ idle: 4, iowait: 0, guestNice: 0 });
    });
});

describe('diffCpuTimes', () => {
    it('should convert jiffy deltas to percentages', () => {
        const samples = diffCpuTimes(parseProcStat(STAT_BEFORE), parseProcStat(STAT_AFTER));
        expect(samples[0]).toEqual(cpu(0, { usr: 25, sys: 15, soft: 10, idle: 50 }));
    });

    it('should take guest time out of user time', () => {
        const samples = diffCpuTimes(parseProcStat(STAT_BEFORE), parseProcStat(STAT_AFTER));
        expect(samples[1]).toEqual(cpu(1, { usr: 20, guest: 40, idle: 40 }));
    });

    it('should report zeros for a CPU with no elapsed time', () => {
        const same = parseProcStat(STAT_BEFORE);
        expect(diffCpuTimes(same, same)[0]).toEqual(cpu(0, {}));
    });

    it('should skip CPUs missing from the second reading', () => {
        const after = parseProcStat('cpu1 260 0 100 740 0 0 0 0 40 0\n');
        expect(diffCpuTimes(parseProcStat(STAT_BEFORE), after).map(s => s.cpu)).toEqual([1]);
    });
});

// ============================================================================
// 4. ProcStatCollector
// ============================================================================

describe('ProcStatCollector', () => {
    it('should read, wait for the interval, and read again', async () => {
        const text = new MemoryTextSource({ '/p/stat': STAT_BEFORE });
        const waits: number[] = [];
        const sleep = async (ms: number): Promise<void> => {
            waits.push(ms);
            text.set('/p/stat', STAT_AFTER);
        };

        const samples = await new ProcStatCollector('/p', text, sleep).collect(2);
        expect(waits).toEqual([2000]);
        expect(samples.map(s => s.cpu)).toEqual([0, 1]);
        expect(samples[0]?.idle).toBe(50);
    });

    it('should wrap read failures', async () => {
        const collector = new ProcStatCollector('/p', new MemoryTextSource(), async () => undefined);
        await expect(collector.collect(1)).rejects.toMatchObject({
            code: 'CPU_STATS',
            message: 'Cannot sample /p/stat: Cannot read /p/stat: no such file',
        });
    });
});
