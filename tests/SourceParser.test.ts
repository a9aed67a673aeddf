/**
 * SourceParser.test.ts — Counter Source Text
 *
 * Categories:
 *  1. Header — column count, missing header
 *  2. Rows — counters vs description tokens
 *  3. Aggregate rows — ERR/MIS
 *  4. Required columns — short rows, wider soft headers
 *  5. Malformed input — positions in error messages
 *
 * @module
 */
import { describe, it, expect } from 'vitest';
import { parseCounterSource } from '../src/SourceParser.js';
import { MonitorError, SourceParseError } from '../src/MonitorError.js';

const HARD = [
    '           CPU0       CPU1       CPU2       CPU3',
    '  0:         40          0          0          0  IR-IO-APIC    2-edge      timer',
    ' 95:         10         20         30          0  IR-PCI-MSI 524288-edge      eth0',
    'NMI:          1          2          3          4   Non-maskable interrupts',
    'LOC:     123456     654321     111111     222222   Local timer interrupts',
    'ERR:          0',
    'MIS:          0',
    '',
].join('\n');

const opts = { source: '/proc/interrupts' };

// ============================================================================
// 1. Header
// ============================================================================

describe('parseCounterSource — Header', () => {
    it('should count CPU columns from the header', () => {
        expect(parseCounterSource(HARD, opts).columns).toBe(4);
    });

    it('should skip leading blank lines before the header', () => {
        const parsed = parseCounterSource('\n\n   CPU0 CPU1\nA: 1 2\n', opts);
        expect(parsed.columns).toBe(2);
        expect(parsed.rows).toHaveLength(1);
    });

    it('should reject empty text', () => {
        expect(() => parseCounterSource('', opts)).toThrow('/proc/interrupts:1: missing CPU header');
    });

    it('should reject a source that starts with a row', () => {
        expect(() => parseCounterSource('  0: 1 2\n', opts)).toThrow(SourceParseError);
    });
});

// ============================================================================
// 2. Rows
// ============================================================================

describe('parseCounterSource — Rows', () => {
    it('should split counters from description tokens', () => {
        const row = parseCounterSource(HARD, opts).rows[1];
        expect(row?.name).toBe('95');
        expect(row?.counts).toEqual([10, 20, 30, 0]);
        expect(row?.description).toEqual(['IR-PCI-MSI', '524288-edge', 'eth0']);
    });

    it('should keep the raw line for pattern matching', () => {
        const row = parseCounterSource(HARD, opts).rows[0];
        expect(row?.line).toBe('  0:         40          0          0          0  IR-IO-APIC    2-edge      timer');
    });

    it('should treat numbers past the last column as description', () => {
        const row = parseCounterSource('CPU0 CPU1\n  7:  3  4  5 edge\n', opts).rows[0];
        expect(row?.counts).toEqual([3, 4]);
        expect(row?.description).toEqual(['5', 'edge']);
    });

    it('should accept rows without a description', () => {
        const row = parseCounterSource('CPU0 CPU1\nHI: 0 9\n', opts).rows[0];
        expect(row?.description).toEqual([]);
    });

    it('should skip blank lines between rows', () => {
        const parsed = parseCounterSource('CPU0 CPU1\nA: 1 2\n\n   \nB: 3 4\n', opts);
        expect(parsed.rows.map(r => r.name)).toEqual(['A', 'B']);
    });
});

// ============================================================================
// 3. Aggregate Rows
// ============================================================================

describe('parseCounterSource — Aggregate rows', () => {
    it('should skip single-value rows on multi-CPU systems', () => {
        const names = parseCounterSource(HARD, opts).rows.map(r => r.name);
        expect(names).toEqual(['0', '95', 'NMI', 'LOC']);
    });

    it('should keep single-value rows on a single-CPU system', () => {
        const parsed = parseCounterSource('CPU0\nERR: 0\n  1: 7 i8042\n', opts);
        expect(parsed.rows.map(r => r.name)).toEqual(['ERR', '1']);
    });
});

// ============================================================================
// 4. Required Columns
// ============================================================================

describe('parseCounterSource — Required columns', () => {
    it('should reject a row with fewer counters than columns', () => {
        const text = 'CPU0 CPU1\n  0:  5  IO-APIC\n';
        expect(() => parseCounterSource(text, opts))
            .toThrow('/proc/interrupts:2: expected 2 counters, found 1: "0:  5  IO-APIC"');
    });

    it('should accept wider headers when fewer columns are required', () => {
        const text = '   CPU0 CPU1 CPU2 CPU3\n  NET_RX: 1 2 3 4\n';
        const parsed = parseCounterSource(text, { source: '/proc/softirqs', requiredColumns: 2 });
        expect(parsed.columns).toBe(4);
        expect(parsed.rows[0]?.counts).toEqual([1, 2, 3, 4]);
    });

    it('should enforce the required count even when the header is narrower', () => {
        const text = 'CPU0 CPU1\nNET_RX: 1 2\n';
        expect(() => parseCounterSource(text, { source: '/proc/softirqs', requiredColumns: 4 }))
            .toThrow('expected 4 counters, found 2');
    });
});

// ============================================================================
// 5. Malformed Input
// ============================================================================

describe('parseCounterSource — Malformed input', () => {
    it('should reject a line without a name prefix', () => {
        try {
            parseCounterSource('CPU0 CPU1\nA: 1 2\ngarbage here\n', opts);
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(SourceParseError);
            if (!(err instanceof SourceParseError)) return;
            expect(err.code).toBe('PARSE');
            expect(err.lineNumber).toBe(3);
            expect(err.line).toBe('garbage here');
            expect(err.message).toBe('/proc/interrupts:3: expected "<name>: <counts>": "garbage here"');
        }
    });

    it('should reject counters beyond the safe integer range', () => {
        expect(() => parseCounterSource('CPU0\nA: 99999999999999999999\n', opts))
            .toThrow('counter "99999999999999999999" is too large');
    });

    it('should raise a MonitorError subclass', () => {
        expect(() => parseCounterSource('', opts)).toThrow(MonitorError);
    });
});
