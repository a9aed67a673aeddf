/**
 * MonitorConfig — Validated Runtime Options
 *
 * The CLI collects raw values; this schema applies defaults and checks
 * them once, so the rest of the monitor can trust its inputs.
 *
 * @module
 */
import { z } from 'zod';
import { ConfigValidationError } from './MonitorError.js';
import { parseLineMatcher, type LineMatcher } from './LineMatcher.js';

export const OUTPUT_MODES = ['tui', 'stream', 'json'] as const;
export const CPU_SOURCES = ['mpstat', 'procstat'] as const;

export type OutputMode = typeof OUTPUT_MODES[number];
export type CpuSource = typeof CPU_SOURCES[number];

/** Longest wait a Node timer can hold (2^31 − 1 ms), in whole seconds. */
export const MAX_INTERVAL_SECONDS = 2147483;

const pattern = z.string().min(1, 'Pattern must not be empty').refine(
    p => p !== '^',
    'Prefix pattern needs text after "^"',
);

export const MonitorConfigSchema = z.object({
    /** Seconds between frames */
    intervalSeconds: z.number().int().positive().max(MAX_INTERVAL_SECONDS).default(1),
    /** Stop after this many reported cycles (runs forever when absent) */
    count: z.number().int().positive().optional(),
    /** Rows matching these never count as changed */
    exclude: z.array(pattern).default([]),
    /** Running totals, one per pattern */
    track: z.array(pattern).default([]),
    /** Directory holding `interrupts`, `softirqs`, `stat` and `irq/` */
    procRoot: z.string().min(1).default('/proc'),
    cpuSource: z.enum(CPU_SOURCES).default('mpstat'),
    output: z.enum(OUTPUT_MODES).default('stream'),
    /** Whether the warm-up pass feeds tracked totals */
    trackWarmup: z.boolean().default(true),
    color: z.boolean().default(false),
    debug: z.boolean().default(false),
});

export type MonitorConfigInput = z.input<typeof MonitorConfigSchema>;

export interface MonitorConfig extends Omit<z.output<typeof MonitorConfigSchema>, 'exclude' | 'track'> {
    readonly exclude: readonly LineMatcher[];
    readonly track: readonly LineMatcher[];
}

/**
 * Validate raw options and compile the pattern lists.
 *
 * @throws ConfigValidationError listing every invalid field
 */
export function resolveMonitorConfig(input: MonitorConfigInput = {}): MonitorConfig {
    const result = MonitorConfigSchema.safeParse(input);
    if (!result.success) throw new ConfigValidationError(result.error);

    const { exclude, track, ...rest } = result.data;
    return {
        ...rest,
        exclude: exclude.map(parseLineMatcher),
        track: track.map(parseLineMatcher),
    };
}
