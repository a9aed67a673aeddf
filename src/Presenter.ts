/**
 * Presenter — Snapshot → Frame
 *
 * Turns a {@link MonitorSnapshot} into the lines of one frame:
 *
 * ```
 * irqtop 1.0.0  interval=1s  cpus=4  cycle=3
 *
 * CPU       %usr    %nice     %sys  %iowait     %irq    %soft   %steal   %guest    %idle
 * 0         1.00     0.00     0.50     0.00     0.00     0.25     0.00     0.00    98.25
 * ...
 *
 * IRQ         CPU0    CPU1    CPU2    CPU3
 * 95:            5       5       0       0  IR-PCI-MSI eth0  hint=0-3,aff=0-3
 * NET_RX:        3       1       0       0
 *
 * eth: total=10 avg/cpu=2.50 total/s=10.00 avg/s/cpu=2.50
 * ```
 *
 * Affinity is looked up here, while rendering, for numeric rows only.
 *
 * @module
 */
import { pad, type Palette } from './AnsiRenderer.js';
import { isVectorName, type AffinityInfo, type AffinityLookup } from './AffinityReader.js';
import { CPU_FIELDS, type CpuSample } from './CpuStats.js';
import type { CounterRow } from './CounterTable.js';
import type { MonitorSnapshot } from './InterruptMonitor.js';
import type { TrackedSummary } from './Summary.js';

export interface PresenterOptions {
    readonly version: string;
    readonly palette: Palette;
    readonly affinity: AffinityLookup;
    /**
     * Screen height. When the frame would be taller, IRQ rows are cut
     * and replaced by a `… N more rows` line so the summaries stay visible.
     */
    readonly maxRows?: number | undefined;
}

const MIN_NAME_WIDTH = 8;
const MIN_COLUMN_WIDTH = 8;
const CPU_LABEL_WIDTH = 5;
const CPU_VALUE_WIDTH = 9;

// ============================================================================
// Text Frame
// ============================================================================

export function renderFrame(snapshot: MonitorSnapshot, options: PresenterOptions): string[] {
    const { palette } = options;
    const head: string[] = [];
    head.push(palette.bold(
        `irqtop ${options.version}  interval=${snapshot.intervalSeconds}s` +
        `  cpus=${snapshot.onlineCpus}  cycle=${snapshot.cycle}`,
    ));

    if (snapshot.cpu.length > 0) {
        head.push('');
        head.push(...renderCpuBlock(snapshot.cpu, palette));
    }
    head.push('');

    const tail: string[] = [];
    if (snapshot.tracked.length > 0) {
        tail.push('');
        for (const summary of snapshot.tracked) tail.push(palette.green(renderSummaryLine(summary)));
    }

    // Header line of the IRQ block is part of the budget too
    const rowBudget = options.maxRows === undefined
        ? undefined
        : options.maxRows - head.length - tail.length - 1;

    return [
        ...head,
        ...renderIrqBlock(snapshot.rows, snapshot.onlineCpus, options, rowBudget),
        ...tail,
    ];
}

export function renderCpuBlock(samples: readonly CpuSample[], palette: Palette): string[] {
    const header = pad('CPU', CPU_LABEL_WIDTH)
        + CPU_FIELDS.map(f => pad(`%${f}`, CPU_VALUE_WIDTH, 'right')).join('');

    const rows = samples.map(sample =>
        pad(String(sample.cpu), CPU_LABEL_WIDTH)
        + CPU_FIELDS.map(f => pad(sample[f].toFixed(2), CPU_VALUE_WIDTH, 'right')).join(''),
    );

    return [palette.bold(header), ...rows];
}

export function renderIrqBlock(
    rows: readonly CounterRow[],
    onlineCpus: number,
    options: PresenterOptions,
    maxLines?: number,
): string[] {
    const { palette } = options;
    const labels = Array.from({ length: onlineCpus }, (_, i) => `CPU${i}`);

    const nameWidth = Math.max(MIN_NAME_WIDTH, ...rows.map(r => r.name.length + 2));
    const widest = Math.max(
        0,
        ...labels.map(l => l.length),
        ...rows.flatMap(r => r.delta.slice(0, onlineCpus).map(d => String(d).length)),
    );
    const columnWidth = Math.max(MIN_COLUMN_WIDTH, widest + 2);

    const header = pad('IRQ', nameWidth) + labels.map(l => pad(l, columnWidth, 'right')).join('');
    const lines = [palette.bold(header)];

    if (rows.length === 0) {
        lines.push(palette.dim('(no interrupt activity since start)'));
        return lines;
    }

    // When cut, the last line of the budget says how many rows are hidden
    const shown = maxLines === undefined || rows.length <= maxLines
        ? rows
        : rows.slice(0, Math.max(0, maxLines - 1));

    for (const row of shown) {
        const affinity = isVectorName(row.name) ? options.affinity(row.name) : undefined;
        lines.push(renderRowLine(row, onlineCpus, nameWidth, columnWidth, palette, affinity));
    }
    if (shown.length < rows.length) {
        lines.push(palette.dim(`… ${rows.length - shown.length} more rows`));
    }
    return lines;
}

export function renderRowLine(
    row: CounterRow,
    onlineCpus: number,
    nameWidth: number,
    columnWidth: number,
    palette: Palette,
    affinity: AffinityInfo | undefined,
): string {
    let line = palette.cyan(pad(`${row.name}:`, nameWidth));
    for (let cpu = 0; cpu < onlineCpus; cpu++) {
        const delta = row.delta[cpu] ?? 0;
        const cell = pad(String(delta), columnWidth, 'right');
        line += delta === 0 ? palette.dim(cell) : palette.yellow(cell);
    }

    const tail: string[] = [];
    if (row.description.length > 0) tail.push(row.description.join(' '));
    if (affinity) tail.push(`hint=${affinity.hint},aff=${affinity.aff}`);

    return tail.length > 0 ? `${line}  ${tail.join('  ')}` : line;
}

export function renderSummaryLine(summary: TrackedSummary): string {
    return `${summary.pattern}: total=${summary.total}` +
        ` avg/cpu=${summary.avgPerCpu.toFixed(2)}` +
        ` total/s=${summary.perSecond.toFixed(2)}` +
        ` avg/s/cpu=${summary.perSecondPerCpu.toFixed(2)}`;
}

// ============================================================================
// JSON Frame (--out json)
// ============================================================================

/**
 * One NDJSON line per cycle, for log shippers and scripts.
 */
export function renderFrameJson(snapshot: MonitorSnapshot, affinity: AffinityLookup, now = Date.now()): string {
    return JSON.stringify({
        time: new Date(now).toISOString(),
        cycle: snapshot.cycle,
        onlineCpus: snapshot.onlineCpus,
        intervalSeconds: snapshot.intervalSeconds,
        cpu: snapshot.cpu,
        rows: snapshot.rows.map(row => {
            const info = isVectorName(row.name) ? affinity(row.name) : undefined;
            return {
                name: row.name,
                delta: row.delta.slice(0, snapshot.onlineCpus),
                description: row.description,
                ...(info !== undefined && { hint: info.hint, aff: info.aff }),
            };
        }),
        tracked: snapshot.tracked,
    });
}
