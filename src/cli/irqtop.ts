#!/usr/bin/env node
/**
 * irqtop CLI — Live Interrupt and CPU Monitor
 *
 * USAGE
 *   irqtop                    Refresh every second
 *   irqtop 5                  Refresh every 5 seconds
 *   irqtop -t eth -x LOC      Track eth* vectors, hide local timer
 *   irqtop -o json -c 10      Ten NDJSON frames, then exit
 *   irqtop --help             Show help
 *
 * @module
 */
import { colorEnabled } from '../AnsiRenderer.js';
import { commandTop } from '../CommandTop.js';
import { MonitorError } from '../MonitorError.js';
import {
    CPU_SOURCES, OUTPUT_MODES, resolveMonitorConfig,
    type CpuSource, type MonitorConfig, type OutputMode,
} from '../MonitorConfig.js';

export const IRQTOP_VERSION = '1.0.0';

// ============================================================================
// Arg Parser
// ============================================================================

export interface IrqtopArgs {
    interval: number | undefined;
    count: number | undefined;
    exclude: string[];
    track: string[];
    out: OutputMode | undefined;
    cpuSource: CpuSource | undefined;
    procRoot: string | undefined;
    trackWarmup: boolean;
    debug: boolean;
    help: boolean;
    version: boolean;
}

const DIGITS = /^\d+$/;

function usage(message: string): MonitorError {
    return new MonitorError('USAGE', `${message}\nRun "irqtop --help" for usage.`);
}

function oneOf<T extends string>(allowed: readonly T[], value: string): value is T {
    return allowed.some(a => a === value);
}

/**
 * Parse the command line (without `node` and the script path).
 *
 * @throws MonitorError `USAGE` for unknown options, missing option
 *   values, non-digit or repeated positionals
 */
export function parseIrqtopArgs(argv: readonly string[]): IrqtopArgs {
    const result: IrqtopArgs = {
        interval: undefined,
        count: undefined,
        exclude: [],
        track: [],
        out: undefined,
        cpuSource: undefined,
        procRoot: undefined,
        trackWarmup: true,
        debug: false,
        help: false,
        version: false,
    };

    let i = 0;
    const valueOf = (option: string): string => {
        const val = argv[++i];
        if (val === undefined) throw usage(`Option ${option} requires a value`);
        return val;
    };

    for (; i < argv.length; i++) {
        const arg = argv[i] ?? '';
        switch (arg) {
            case '-h':
            case '--help':
                result.help = true;
                break;
            case '-V':
            case '--version':
                result.version = true;
                break;
            case '-x':
            case '--exclude':
                result.exclude.push(valueOf(arg));
                break;
            case '-t':
            case '--track':
                result.track.push(valueOf(arg));
                break;
            case '-c':
            case '--count': {
                const val = valueOf(arg);
                if (!DIGITS.test(val)) throw usage(`Option ${arg} expects a number, got "${val}"`);
                result.count = parseInt(val, 10);
                break;
            }
            case '-o':
            case '--out': {
                const val = valueOf(arg);
                if (!oneOf(OUTPUT_MODES, val)) throw usage(`Option ${arg} expects one of ${OUTPUT_MODES.join(', ')}`);
                result.out = val;
                break;
            }
            case '--cpu-source': {
                const val = valueOf(arg);
                if (!oneOf(CPU_SOURCES, val)) throw usage(`Option ${arg} expects one of ${CPU_SOURCES.join(', ')}`);
                result.cpuSource = val;
                break;
            }
            case '--proc':
                result.procRoot = valueOf(arg);
                break;
            case '--no-warmup-totals':
                result.trackWarmup = false;
                break;
            case '--debug':
                result.debug = true;
                break;
            default:
                if (arg.startsWith('-')) throw usage(`Unknown option "${arg}"`);
                if (!DIGITS.test(arg)) throw usage(`Interval must be a whole number of seconds, got "${arg}"`);
                if (result.interval !== undefined) throw usage(`Unexpected argument "${arg}"`);
                result.interval = parseInt(arg, 10);
                break;
        }
    }

    return result;
}

// ============================================================================
// Help
// ============================================================================

export const IRQTOP_HELP = `
\x1b[1m\x1b[36mirqtop\x1b[0m — interrupt and CPU activity monitor

  Shows, every interval, how many hardware and soft interrupts each CPU
  handled, next to the CPU time breakdown. Vectors that never fired since
  start are hidden.

\x1b[1mUSAGE\x1b[0m
  irqtop [options] [interval]

\x1b[1mARGUMENTS\x1b[0m
  interval                 Seconds between frames (default: 1)

\x1b[1mOPTIONS\x1b[0m
  --exclude, -x <pattern>  Never show rows matching pattern (repeatable)
  --track, -t <pattern>    Sum deltas of rows matching pattern (repeatable)
  --count, -c <n>          Exit after n frames
  --out, -o <mode>         tui (default on a terminal), stream, json
  --cpu-source <source>    mpstat (default) or procstat
  --proc <dir>             Read counters from <dir> instead of /proc
  --no-warmup-totals       Leave the first sample out of tracked totals
  --debug                  Print timing of each step to stderr
  --version, -V            Print version and exit
  --help, -h               Show this help message

\x1b[1mPATTERNS\x1b[0m
  eth                      Line contains "eth" (name or description)
  ^NET_                    Line starts with "NET_"

\x1b[1mEXAMPLES\x1b[0m
  irqtop 2 -t eth -t mlx5             \x1b[2m# Totals for two NIC families\x1b[0m
  irqtop -x LOC -x ^RES               \x1b[2m# Hide timer and rescheduling noise\x1b[0m
  irqtop -o json -c 60 > irq.ndjson   \x1b[2m# One minute of samples\x1b[0m
`.trim();

// ============================================================================
// Entry Point
// ============================================================================

/** Turn parsed arguments into a validated configuration. */
export function configFromArgs(
    args: IrqtopArgs,
    env: NodeJS.ProcessEnv = process.env,
    stdout: { isTTY?: boolean } = process.stdout,
): MonitorConfig {
    const output = args.out ?? (stdout.isTTY === true ? 'tui' : 'stream');
    return resolveMonitorConfig({
        ...(args.interval !== undefined && { intervalSeconds: args.interval }),
        ...(args.count !== undefined && { count: args.count }),
        ...(args.procRoot !== undefined && { procRoot: args.procRoot }),
        ...(args.cpuSource !== undefined && { cpuSource: args.cpuSource }),
        exclude: args.exclude,
        track: args.track,
        output,
        trackWarmup: args.trackWarmup,
        color: output !== 'json' && colorEnabled(stdout, env),
        debug: args.debug || env['IRQTOP_DEBUG'] === '1',
    });
}

/** Process exit status for a failure. */
export function exitCodeFor(err: unknown): number {
    if (err instanceof MonitorError && (err.code === 'USAGE' || err.code === 'CONFIG')) return 2;
    return 1;
}

/**
 * Execute irqtop.
 *
 * @param argv - Command arguments (without `node` and the script path)
 */
export async function runIrqtop(argv: readonly string[]): Promise<void> {
    const args = parseIrqtopArgs(argv);

    if (args.help) {
        console.log(IRQTOP_HELP);
        return;
    }
    if (args.version) {
        console.log(`irqtop ${IRQTOP_VERSION}`);
        return;
    }

    const config = configFromArgs(args);
    if (config.output === 'tui' && !process.stdout.isTTY) {
        throw usage('The tui output needs an interactive terminal; use --out stream');
    }

    await commandTop({ config, version: IRQTOP_VERSION });
}

// ── Standalone execution ──────────────────────────────────
const script = process.argv[1] ?? '';
const isMainModule = script.endsWith('irqtop') || script.endsWith('irqtop.js') || script.endsWith('irqtop.ts');
if (isMainModule) {
    runIrqtop(process.argv.slice(2)).catch((err: unknown) => {
        console.error(`\x1b[31m✗\x1b[0m ${err instanceof Error ? err.message : String(err)}`);
        process.exit(exitCodeFor(err));
    });
}
