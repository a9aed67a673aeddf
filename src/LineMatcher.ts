/**
 * LineMatcher — Explicit Predicates over Raw Counter Lines
 *
 * Exclusion (`--exclude`) and tracked-total (`--track`) patterns are
 * plain strings, not regular expressions:
 *
 * - `eth`   → substring: the raw source line contains `eth`
 * - `^NET_` → prefix: the trimmed line starts with `NET_`
 *
 * The whole line is matched, so description tokens (`IR-PCI-MSI eth0`)
 * take part as well as the row name.
 *
 * @module
 */

export type LineMatcher =
    | { readonly kind: 'substring'; readonly text: string }
    | { readonly kind: 'prefix'; readonly text: string };

/**
 * Parse one pattern into a matcher.
 *
 * @throws Error when the pattern (or the text after `^`) is empty
 */
export function parseLineMatcher(pattern: string): LineMatcher {
    if (pattern.startsWith('^')) {
        const text = pattern.slice(1);
        if (text.length === 0) throw new Error(`Empty prefix pattern "${pattern}"`);
        return { kind: 'prefix', text };
    }
    if (pattern.length === 0) throw new Error('Empty pattern');
    return { kind: 'substring', text: pattern };
}

/** Test a single matcher against a raw line. */
export function matchesLine(matcher: LineMatcher, line: string): boolean {
    switch (matcher.kind) {
        case 'substring': return line.includes(matcher.text);
        case 'prefix':    return line.trimStart().startsWith(matcher.text);
    }
}

/** True when any matcher in the list matches. */
export function matchesAny(matchers: readonly LineMatcher[], line: string): boolean {
    return matchers.some(m => matchesLine(m, line));
}

/** The pattern text a matcher was parsed from. */
export function describeMatcher(matcher: LineMatcher): string {
    return matcher.kind === 'prefix' ? `^${matcher.text}` : matcher.text;
}
