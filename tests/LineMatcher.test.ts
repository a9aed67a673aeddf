/**
 * LineMatcher.test.ts — Exclusion and Tracking Patterns
 *
 * Categories:
 *  1. Parsing — substring vs prefix, empty patterns
 *  2. Matching — whole raw line, leading indentation
 *
 * @module
 */
import { describe, it, expect } from 'vitest';
import { parseLineMatcher, matchesLine, matchesAny, describeMatcher } from '../src/LineMatcher.js';

const ETH_LINE = '  95:         10         20         30          0  IR-PCI-MSI 524288-edge      eth0';
const NET_LINE = '      NET_RX:        100         50          0          0';

// ============================================================================
// 1. Parsing
// ============================================================================

describe('parseLineMatcher', () => {
    it('should parse plain text as a substring matcher', () => {
        expect(parseLineMatcher('eth')).toEqual({ kind: 'substring', text: 'eth' });
    });

    it('should parse a leading caret as a prefix matcher', () => {
        expect(parseLineMatcher('^NET_')).toEqual({ kind: 'prefix', text: 'NET_' });
    });

    it('should keep regex metacharacters literal', () => {
        expect(parseLineMatcher('a.b')).toEqual({ kind: 'substring', text: 'a.b' });
    });

    it('should reject empty patterns', () => {
        expect(() => parseLineMatcher('')).toThrow('Empty pattern');
        expect(() => parseLineMatcher('^')).toThrow('Empty prefix pattern "^"');
    });

    it('should describe a matcher by its pattern text', () => {
        expect(describeMatcher(parseLineMatcher('^NET_'))).toBe('^NET_');
        expect(describeMatcher(parseLineMatcher('eth'))).toBe('eth');
    });
});

// ============================================================================
// 2. Matching
// ============================================================================

describe('matchesLine', () => {
    it('should match description tokens as well as names', () => {
        expect(matchesLine(parseLineMatcher('eth'), ETH_LINE)).toBe(true);
        expect(matchesLine(parseLineMatcher('IR-PCI'), ETH_LINE)).toBe(true);
    });

    it('should not treat substring text as a pattern', () => {
        expect(matchesLine(parseLineMatcher('e.h'), ETH_LINE)).toBe(false);
    });

    it('should test prefixes against the trimmed line', () => {
        expect(matchesLine(parseLineMatcher('^NET_'), NET_LINE)).toBe(true);
        expect(matchesLine(parseLineMatcher('^95:'), ETH_LINE)).toBe(true);
    });

    it('should not match a prefix that appears later in the line', () => {
        expect(matchesLine(parseLineMatcher('^eth'), ETH_LINE)).toBe(false);
        expect(matchesLine(parseLineMatcher('^RX'), NET_LINE)).toBe(false);
    });

    it('should match when any pattern in a list does', () => {
        const list = [parseLineMatcher('LOC'), parseLineMatcher('^NET_')];
        expect(matchesAny(list, NET_LINE)).toBe(true);
        expect(matchesAny(list, ETH_LINE)).toBe(false);
        expect(matchesAny([], ETH_LINE)).toBe(false);
    });
});
