/**
 * irqtop — Live Interrupt and CPU Activity Monitor
 *
 * Library surface for embedding the monitor or reusing its parsers.
 *
 * @example
 * ```typescript
 * import { resolveMonitorConfig, commandTop } from 'irqtop';
 *
 * await commandTop({
 *     config: resolveMonitorConfig({ intervalSeconds: 2, count: 5, track: ['eth'] }),
 *     version: '1.0.0',
 * });
 * ```
 *
 * @module
 */

// ── Bitmasks & Patterns ──────────────────────────────────
export { encodeCpuMask, decodeCpuList, parseAffinityHint, MASK_BITS, NO_CPUS } from './CpuMask.js';
export { parseLineMatcher, matchesLine, matchesAny, describeMatcher } from './LineMatcher.js';
export type { LineMatcher } from './LineMatcher.js';

// ── Parsing & State ──────────────────────────────────────
export { parseCounterSource } from './SourceParser.js';
export type { CounterSourceKind, ParsedRow, ParsedSource, ParseOptions } from './SourceParser.js';
export { CounterTable } from './CounterTable.js';
export type { CounterRow } from './CounterTable.js';
export { TrackedTotals } from './TrackedTotals.js';
export type { TrackedTotal } from './TrackedTotals.js';
export { MonitorState } from './MonitorState.js';
export { InterruptCollector, HardIrqCollector, SoftIrqCollector, counterSourcePaths } from './Collectors.js';
export type { CollectorPolicy, CollectResult } from './Collectors.js';
export { summarizeTracked, safeDivide } from './Summary.js';
export type { TrackedSummary } from './Summary.js';

// ── Sources ──────────────────────────────────────────────
export { fsTextSource, MemoryTextSource } from './TextSource.js';
export type { TextSource } from './TextSource.js';
export { AffinityReader, isVectorName } from './AffinityReader.js';
export type { AffinityInfo, AffinityLookup } from './AffinityReader.js';
export {
    MpstatCollector, ProcStatCollector, parseMpstatOutput, parseProcStat, diffCpuTimes,
    execFileRunner, CPU_FIELDS,
} from './CpuStats.js';
export type { CpuSample, CpuField, CpuTimes, CpuStatsCollector, CommandRunner } from './CpuStats.js';

// ── Monitor ──────────────────────────────────────────────
export { InterruptMonitor, compareRowNames } from './InterruptMonitor.js';
export type { MonitorSnapshot, MonitorDeps } from './InterruptMonitor.js';
export { resolveMonitorConfig, MonitorConfigSchema, OUTPUT_MODES, CPU_SOURCES, MAX_INTERVAL_SECONDS } from './MonitorConfig.js';
export type { MonitorConfig, MonitorConfigInput, OutputMode, CpuSource } from './MonitorConfig.js';
export { MonitorError, SourceParseError, ConfigValidationError, errorCode } from './MonitorError.js';
export type { MonitorErrorCode } from './MonitorError.js';
export { createMonitorObserver } from './MonitorObserver.js';
export type {
    MonitorEvent, MonitorObserverFn, CollectEvent, CpuEvent, CycleEvent, ErrorEvent,
} from './MonitorObserver.js';

// ── Output ───────────────────────────────────────────────
export { renderFrame, renderFrameJson, renderCpuBlock, renderIrqBlock, renderSummaryLine } from './Presenter.js';
export type { PresenterOptions } from './Presenter.js';
export { ansi, createPalette, colorEnabled, stripAnsi, stringWidth, truncate, pad, ScreenManager } from './AnsiRenderer.js';
export type { Palette, StyleName, ScreenOutput, ScreenInput } from './AnsiRenderer.js';
export { commandTop, createCpuStatsCollector, createTuiSink } from './CommandTop.js';
export type { TopOptions, TextOutput, FrameSink, SinkContext } from './CommandTop.js';
