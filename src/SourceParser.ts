/**
 * SourceParser — `/proc/interrupts` and `/proc/softirqs` Text
 *
 * Both sources share one shape:
 *
 * ```
 *            CPU0       CPU1       CPU2       CPU3
 *   95:        10         20         30          0  IR-PCI-MSI 524288-edge  eth0
 *  NMI:         0          0          0          0  Non-maskable interrupts
 *  ERR:         0
 * ```
 *
 * The header defines how many counter columns a row has. Leading
 * unsigned integers (at most one per header column) are counters;
 * everything after them is kept as opaque description tokens.
 *
 * @module
 */
import { SourceParseError } from './MonitorError.js';

/** Which kernel table a source belongs to. */
export type CounterSourceKind = 'hard' | 'soft';

/** One parsed row, before it is applied to a {@link CounterTable}. */
export interface ParsedRow {
    readonly name: string;
    /** One counter per header column that was present on the line */
    readonly counts: readonly number[];
    /** Trailing tokens (controller, trigger type, device names) */
    readonly description: readonly string[];
    /** The raw line, for pattern matching */
    readonly line: string;
}

export interface ParsedSource {
    /** Number of CPU columns in the header */
    readonly columns: number;
    readonly rows: readonly ParsedRow[];
}

export interface ParseOptions {
    /** Label used in error messages (usually the file path) */
    readonly source: string;
    /** Minimum number of counters each row must carry */
    readonly requiredColumns?: number;
}

const ROW = /^\s*([^\s:]+):(.*)$/;
const UNSIGNED = /^\d+$/;

/**
 * Parse a whole counter source.
 *
 * Kernel aggregate rows (`ERR:`, `MIS:`), which carry a single system-wide
 * value instead of one per CPU, are skipped.
 *
 * @throws SourceParseError when the header is missing, a line has no
 *   `name:` prefix, a counter overflows, or a row has fewer counters
 *   than `requiredColumns` (default: the header column count)
 */
export function parseCounterSource(text: string, options: ParseOptions): ParsedSource {
    const lines = text.split('\n');

    const headerIndex = lines.findIndex(l => l.trim().length > 0);
    if (headerIndex < 0) {
        throw new SourceParseError(options.source, 1, '', 'missing CPU header');
    }
    const header = lines[headerIndex] ?? '';
    if (header.includes(':')) {
        throw new SourceParseError(options.source, headerIndex + 1, header, 'missing CPU header');
    }
    const columns = header.trim().split(/\s+/).length;
    const required = options.requiredColumns ?? columns;

    const rows: ParsedRow[] = [];
    for (let i = headerIndex + 1; i < lines.length; i++) {
        const line = lines[i] ?? '';
        if (line.trim().length === 0) continue;

        const match = ROW.exec(line);
        const name = match?.[1];
        const rest = match?.[2];
        if (name === undefined || rest === undefined) {
            throw new SourceParseError(options.source, i + 1, line, 'expected "<name>: <counts>"');
        }

        const tokens = rest.trim().split(/\s+/).filter(t => t.length > 0);
        const counts: number[] = [];
        while (counts.length < columns && counts.length < tokens.length) {
            const token = tokens[counts.length] ?? '';
            if (!UNSIGNED.test(token)) break;
            const value = Number(token);
            if (!Number.isSafeInteger(value)) {
                throw new SourceParseError(options.source, i + 1, line, `counter "${token}" is too large`);
            }
            counts.push(value);
        }
        const description = tokens.slice(counts.length);

        if (counts.length === 1 && description.length === 0 && columns > 1) continue;

        if (counts.length < required) {
            throw new SourceParseError(
                options.source, i + 1, line,
                `expected ${required} counters, found ${counts.length}`,
            );
        }

        rows.push({ name, counts, description, line });
    }

    return { columns, rows };
}
