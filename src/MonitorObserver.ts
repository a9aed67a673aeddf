/**
 * MonitorObserver — Opt-In Debug Events
 *
 * Typed events emitted at each step of a monitoring cycle. When no
 * observer is attached the monitor emits nothing.
 *
 * ```
 * [irqtop] collect   hard /proc/interrupts rows=41 changed=7 0.4ms
 * [irqtop] collect   soft /proc/softirqs rows=10 changed=5 0.1ms
 * [irqtop] cpu       4 CPUs 1002.3ms
 * [irqtop] cycle     #3 1003.1ms
 * ```
 *
 * @module
 */
import type { CounterSourceKind } from './SourceParser.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** Emitted after one counter source has been folded into the state. */
export interface CollectEvent {
    readonly type: 'collect';
    readonly source: CounterSourceKind;
    readonly path: string;
    readonly rows: number;
    readonly changed: number;
    readonly firstPass: boolean;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted when the CPU statistics call returns (includes the interval wait). */
export interface CpuEvent {
    readonly type: 'cpu';
    readonly cpus: number;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted at the end of every reported cycle. */
export interface CycleEvent {
    readonly type: 'cycle';
    readonly cycle: number;
    /** Rows currently displayed (ever changed) */
    readonly displayed: number;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted when a step fails, just before the error propagates. */
export interface ErrorEvent {
    readonly type: 'error';
    readonly step: 'collect' | 'cpu';
    readonly error: string;
    readonly timestamp: number;
}

export type MonitorEvent = CollectEvent | CpuEvent | CycleEvent | ErrorEvent;

export type MonitorObserverFn = (event: MonitorEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create an observer. Without a handler, events are printed with
 * `console.debug`.
 */
export function createMonitorObserver(handler?: MonitorObserverFn): MonitorObserverFn {
    if (handler) return handler;

    return (event: MonitorEvent): void => {
        const prefix = '[irqtop]';
        switch (event.type) {
            case 'collect':
                console.debug(
                    `${prefix} collect   ${event.source} ${event.path} rows=${event.rows} changed=${event.changed}` +
                    `${event.firstPass ? ' (warm-up)' : ''} ${event.durationMs.toFixed(1)}ms`,
                );
                break;
            case 'cpu':
                console.debug(`${prefix} cpu       ${event.cpus} CPUs ${event.durationMs.toFixed(1)}ms`);
                break;
            case 'cycle':
                console.debug(`${prefix} cycle     #${event.cycle} rows=${event.displayed} ${event.durationMs.toFixed(1)}ms`);
                break;
            case 'error':
                console.debug(`${prefix} ERROR     [${event.step}] ${event.error}`);
                break;
        }
    };
}
