/**
 * MonitorError — Typed Failures of the Monitoring Loop
 *
 * Every failure the monitor can raise carries a `code` so the CLI can
 * pick an exit status and tests can assert on the category instead of
 * on message text.
 *
 * | Code                | Raised when                                          |
 * |---------------------|------------------------------------------------------|
 * | `SOURCE_UNREADABLE` | `/proc/interrupts` or `/proc/softirqs` cannot be read |
 * | `PARSE`             | a counter line does not have the expected shape      |
 * | `CPU_COUNT_CHANGED` | the hard-irq header column count differs mid-run     |
 * | `CPU_STATS`         | the CPU statistics collaborator failed               |
 * | `CONFIG`            | resolved options fail schema validation              |
 * | `USAGE`             | the command line cannot be parsed                    |
 *
 * @module
 */
import type { ZodError } from 'zod';

export type MonitorErrorCode =
    | 'SOURCE_UNREADABLE'
    | 'PARSE'
    | 'CPU_COUNT_CHANGED'
    | 'CPU_STATS'
    | 'CONFIG'
    | 'USAGE';

export class MonitorError extends Error {
    /** Failure category. */
    readonly code: MonitorErrorCode;

    constructor(code: MonitorErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'MonitorError';
        this.code = code;
    }
}

/**
 * A counter source line that does not match `<name>: <counts...> <description...>`.
 */
export class SourceParseError extends MonitorError {
    /** Path (or label) of the source being parsed */
    readonly source: string;
    /** 1-based line number inside the source */
    readonly lineNumber: number;
    /** The offending line, verbatim */
    readonly line: string;

    constructor(source: string, lineNumber: number, line: string, reason: string) {
        super('PARSE', `${source}:${lineNumber}: ${reason}: "${line.trim()}"`);
        this.name = 'SourceParseError';
        this.source = source;
        this.lineNumber = lineNumber;
        this.line = line;
    }
}

/**
 * Wraps a `ZodError` raised while validating monitor options.
 *
 * The message lists one bullet per issue:
 * ```
 * Invalid irqtop options:
 *   • 'intervalSeconds': Number must be greater than 0
 * ```
 */
export class ConfigValidationError extends MonitorError {
    constructor(zodError: ZodError) {
        const fieldErrors = zodError.issues
            .map(issue => {
                const path = issue.path.length > 0
                    ? `'${issue.path.join('.')}'`
                    : '(root)';
                return `  • ${path}: ${issue.message}`;
            })
            .join('\n');

        super('CONFIG', `Invalid irqtop options:\n${fieldErrors}`, { cause: zodError });
        this.name = 'ConfigValidationError';
    }
}

/** The `code` of a Node system error (`ENOENT`, `EPIPE`, ...), if any. */
export function errorCode(err: unknown): string | undefined {
    if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
    return undefined;
}
