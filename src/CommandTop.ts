/**
 * CommandTop — The Monitoring Loop
 *
 * Wires the collaborators together and drives them:
 *
 * ```
 * warm-up ─▶ ┌─ collect hard ─▶ collect soft ─▶ cpu stats (waits) ─▶ frame ─┐
 *            └──────────────────────────────────────────────────────────────┘
 * ```
 *
 * Frames go to one of three sinks:
 *   - `tui`    — alternate screen, redrawn in place; `q` or Ctrl+C quits
 *   - `stream` — plain frames appended to stdout, separated by a blank line
 *   - `json`   — one NDJSON object per cycle
 *
 * The warm-up runs before the screen is taken over, so a missing
 * `/proc/interrupts` is reported on the normal terminal.
 *
 * @module
 */
import { AffinityReader, type AffinityLookup } from './AffinityReader.js';
import { ScreenManager, createPalette } from './AnsiRenderer.js';
import { MpstatCollector, ProcStatCollector, type CpuStatsCollector } from './CpuStats.js';
import { InterruptMonitor, type MonitorSnapshot } from './InterruptMonitor.js';
import { errorCode } from './MonitorError.js';
import { createMonitorObserver, type MonitorObserverFn } from './MonitorObserver.js';
import { renderFrame, renderFrameJson } from './Presenter.js';
import { fsTextSource, type TextSource } from './TextSource.js';
import type { MonitorConfig } from './MonitorConfig.js';

// ============================================================================
// Frame Sinks
// ============================================================================

/** Anything frames can be written to. */
export interface TextOutput {
    write(text: string): unknown;
    /** Streams report asynchronous write failures (a closed pipe) here */
    on?(event: 'error', listener: (err: Error) => void): unknown;
    removeListener?(event: 'error', listener: (err: Error) => void): unknown;
}

export interface FrameSink {
    write(snapshot: MonitorSnapshot): void;
    close(): void;
}

export interface SinkContext {
    readonly config: MonitorConfig;
    readonly version: string;
    readonly affinity: AffinityLookup;
}

function createStreamSink(out: TextOutput, ctx: SinkContext): FrameSink {
    const palette = createPalette(ctx.config.color);
    let first = true;
    return {
        write(snapshot) {
            const lines = renderFrame(snapshot, { version: ctx.version, palette, affinity: ctx.affinity });
            out.write((first ? '' : '\n') + lines.join('\n') + '\n');
            first = false;
        },
        close() { /* nothing buffered */ },
    };
}

function createJsonSink(out: TextOutput, ctx: SinkContext): FrameSink {
    return {
        write(snapshot) {
            out.write(renderFrameJson(snapshot, ctx.affinity) + '\n');
        },
        close() { /* nothing buffered */ },
    };
}

/**
 * Full-screen sink. Frames are rendered to the current terminal height,
 * and re-rendered from the last snapshot after a resize.
 */
export function createTuiSink(screen: ScreenManager, ctx: SinkContext, onQuit: () => void): FrameSink {
    const palette = createPalette(ctx.config.color);
    const waiting = [palette.dim(`irqtop ${ctx.version}  sampling for ${ctx.config.intervalSeconds}s…`)];
    let last: MonitorSnapshot | undefined;

    const redraw = (): void => {
        screen.draw(last === undefined ? waiting : renderFrame(last, {
            version: ctx.version,
            palette,
            affinity: ctx.affinity,
            maxRows: screen.rows,
        }));
    };

    screen.enter(
        () => { if (screen.active) redraw(); },
        (key) => { if (key === '\x03' || key === 'q' || key === 'Q') onQuit(); },
    );
    redraw();

    return {
        write(snapshot) {
            last = snapshot;
            redraw();
        },
        close() { screen.exit(); },
    };
}

function createFrameSink(out: TextOutput, ctx: SinkContext, onQuit: () => void): FrameSink {
    switch (ctx.config.output) {
        case 'tui':    return createTuiSink(new ScreenManager(), ctx, onQuit);
        case 'json':   return createJsonSink(out, ctx);
        case 'stream': return createStreamSink(out, ctx);
    }
}

// ============================================================================
// Collaborators
// ============================================================================

/** The CPU statistics collaborator selected by `--cpu-source`. */
export function createCpuStatsCollector(config: MonitorConfig, text: TextSource): CpuStatsCollector {
    return config.cpuSource === 'procstat'
        ? new ProcStatCollector(config.procRoot, text)
        : new MpstatCollector();
}

// ============================================================================
// Entry Point
// ============================================================================

export interface TopOptions {
    readonly config: MonitorConfig;
    readonly version: string;
    /** Defaults to the real file system */
    readonly text?: TextSource;
    /** Defaults to the collector named by `config.cpuSource` */
    readonly cpuStats?: CpuStatsCollector;
    /** Defaults to `console.debug` output when `config.debug` is set */
    readonly observer?: MonitorObserverFn;
    /** Destination of `stream` and `json` frames (default: stdout) */
    readonly out?: TextOutput;
}

/**
 * Run the monitor until `config.count` cycles have been shown, or
 * forever when no count is set (until a signal or `q`).
 */
export async function commandTop(options: TopOptions): Promise<void> {
    const { config, version } = options;
    const text = options.text ?? fsTextSource;
    const observer = options.observer ?? (config.debug ? createMonitorObserver() : undefined);
    const monitor = new InterruptMonitor(config, {
        text,
        cpuStats: options.cpuStats ?? createCpuStatsCollector(config, text),
        observer,
    });
    const affinity = new AffinityReader(config.procRoot, text).asLookup;
    const ctx: SinkContext = { config, version, affinity };

    monitor.warmUp();

    let stopped = false;
    let outputError: Error | undefined;
    const onSignal = (): void => {
        shutdown();
        process.exit(0);
    };
    // A reader that went away (`irqtop | head`) ends the run quietly
    const onOutputError = (err: Error): void => {
        stopped = true;
        if (errorCode(err) !== 'EPIPE') outputError = err;
    };
    const out = options.out ?? process.stdout;
    const sink = createFrameSink(out, ctx, onSignal);

    function shutdown(): void {
        stopped = true;
        sink.close();
    }

    out.on?.('error', onOutputError);
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
    try {
        while (!stopped && (config.count === undefined || monitor.state.cycle < config.count)) {
            const snapshot = await monitor.cycle();
            if (stopped) break;
            sink.write(snapshot);
        }
    } finally {
        process.removeListener('SIGINT', onSignal);
        process.removeListener('SIGTERM', onSignal);
        out.removeListener?.('error', onOutputError);
        shutdown();
    }
    if (outputError) throw outputError;
}
