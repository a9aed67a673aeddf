/**
 * AnsiRenderer — Terminal Output Primitives
 *
 * ANSI escape helpers, column-width-aware padding and the alternate
 * screen manager used by the full-screen (`--out tui`) mode.
 *
 * @module
 */
import pc from 'picocolors';

// ============================================================================
// ANSI Escape Sequences
// ============================================================================

export const ansi = {
    hideCursor:  '\x1b[?25l',
    showCursor:  '\x1b[?25h',
    altScreen:   '\x1b[?1049h',
    mainScreen:  '\x1b[?1049l',
    clearScreen: '\x1b[2J\x1b[H',
    home:        '\x1b[H',
    clearLine:   '\x1b[2K',
    clearBelow:  '\x1b[J',
} as const;

export type StyleName = 'bold' | 'dim' | 'green' | 'yellow' | 'cyan';
export type Palette = Record<StyleName, (s: string) => string>;

/**
 * Style functions that either wrap text in escape codes or, when
 * colour is off (`NO_COLOR`, pipes, `--out stream` to a file), return
 * it unchanged.
 */
export function createPalette(enabled: boolean): Palette {
    const c = pc.createColors(enabled);
    return {
        bold: c.bold,
        dim: c.dim,
        green: c.green,
        yellow: c.yellow,
        cyan: c.cyan,
    };
}

/** Whether colour should be used on a stream, honouring `NO_COLOR`. */
export function colorEnabled(stream: { isTTY?: boolean }, env: NodeJS.ProcessEnv = process.env): boolean {
    return !env['NO_COLOR'] && stream.isTTY === true;
}

// ============================================================================
// Width Calculation
// ============================================================================

const ANSI_PATTERN = /\x1b\[[0-9;?]*[a-zA-Z]/g;

/** Remove escape sequences. */
export function stripAnsi(str: string): string {
    return str.replace(ANSI_PATTERN, '');
}

function isWide(code: number): boolean {
    return (
        (code >= 0x1100 && code <= 0x115F) ||
        (code >= 0x2E80 && code <= 0x9FFF) ||
        (code >= 0xF900 && code <= 0xFAFF) ||
        (code >= 0xFF01 && code <= 0xFF60) ||
        (code >= 0x1F300 && code <= 0x1FAFF)
    );
}

/**
 * Visual width of a string in terminal columns. Escape sequences count
 * as zero, CJK and emoji as two.
 */
export function stringWidth(str: string): number {
    let width = 0;
    for (const ch of stripAnsi(str)) {
        const code = ch.codePointAt(0) ?? 0;
        width += isWide(code) ? 2 : 1;
    }
    return width;
}

/**
 * Cut a string to `maxWidth` columns, ending in `suffix`. Styled input
 * loses its styling; plain input stays plain.
 */
export function truncate(str: string, maxWidth: number, suffix = '…'): string {
    if (stringWidth(str) <= maxWidth) return str;

    const targetWidth = maxWidth - stringWidth(suffix);
    if (targetWidth <= 0) return suffix.slice(0, Math.max(0, maxWidth));

    let result = '';
    let width = 0;
    for (const ch of stripAnsi(str)) {
        const w = isWide(ch.codePointAt(0) ?? 0) ? 2 : 1;
        if (width + w > targetWidth) break;
        result += ch;
        width += w;
    }
    return result + suffix;
}

/**
 * Pad to an exact visual width. Text wider than the target is returned
 * as-is so that counters are never cut.
 */
export function pad(str: string, targetWidth: number, align: 'left' | 'right' = 'left'): string {
    const width = stringWidth(str);
    if (width >= targetWidth) return str;
    const spaces = ' '.repeat(targetWidth - width);
    return align === 'left' ? str + spaces : spaces + str;
}

// ============================================================================
// Screen Manager
// ============================================================================

/** The parts of a TTY write stream the screen manager uses. */
export interface ScreenOutput {
    readonly columns?: number;
    readonly rows?: number;
    write(text: string): unknown;
    on(event: 'resize', listener: () => void): unknown;
    removeListener(event: 'resize', listener: () => void): unknown;
}

/** The parts of a TTY read stream the screen manager uses. */
export interface ScreenInput {
    readonly isTTY?: boolean;
    setRawMode(mode: boolean): unknown;
    resume(): unknown;
    pause(): unknown;
    on(event: 'data', listener: (data: Buffer) => void): unknown;
    removeListener(event: 'data', listener: (data: Buffer) => void): unknown;
}

/**
 * Alternate-screen output for the full-screen mode.
 *
 * Each frame is drawn from the home position and every line is cleared
 * to its end, so the previous frame never shows through.
 */
export class ScreenManager {
    private _active = false;
    private _resizeTimer: ReturnType<typeof setTimeout> | undefined;
    private _resizeCallback: (() => void) | undefined;
    private _inputCallback: ((key: string) => void) | undefined;
    private _cols = 80;
    private _rows = 24;

    constructor(
        private readonly out: ScreenOutput = process.stdout,
        private readonly input: ScreenInput = process.stdin,
    ) {}

    get cols(): number { return this._cols; }
    get rows(): number { return this._rows; }
    get active(): boolean { return this._active; }

    /**
     * Enter the alternate screen buffer and start listening for keys.
     *
     * @param onResize - Called after the terminal size settles (debounced 100ms)
     * @param onInput - Called with each chunk of keyboard input
     */
    enter(onResize: () => void, onInput: (key: string) => void): void {
        if (this._active) return;
        this._active = true;
        this._resizeCallback = onResize;
        this._inputCallback = onInput;

        this._cols = this.out.columns || 80;
        this._rows = this.out.rows || 24;

        this.out.write(ansi.altScreen + ansi.hideCursor + ansi.clearScreen);

        if (this.input.isTTY) {
            this.input.setRawMode(true);
            this.input.resume();
            this.input.on('data', this._handleInput);
        }

        this.out.on('resize', this._handleResize);
    }

    /** Leave the alternate screen and restore the terminal. */
    exit(): void {
        if (!this._active) return;
        this._active = false;

        if (this._resizeTimer) {
            clearTimeout(this._resizeTimer);
            this._resizeTimer = undefined;
        }

        this.out.write(ansi.showCursor + ansi.mainScreen);

        if (this.input.isTTY) {
            this.input.setRawMode(false);
            this.input.removeListener('data', this._handleInput);
            this.input.pause();
        }

        this.out.removeListener('resize', this._handleResize);
    }

    /** Replace the screen content with `lines`, clipped to the terminal. */
    draw(lines: readonly string[]): void {
        const visible = lines.slice(0, this._rows);
        const body = visible
            .map(line => ansi.clearLine + truncate(line, this._cols))
            .join('\r\n');
        this.out.write(ansi.home + body + ansi.clearBelow);
    }

    private _handleResize = (): void => {
        if (this._resizeTimer) clearTimeout(this._resizeTimer);

        this._resizeTimer = setTimeout(() => {
            this._cols = this.out.columns || 80;
            this._rows = this.out.rows || 24;
            this.out.write(ansi.clearScreen);
            this._resizeCallback?.();
        }, 100);
    };

    private _handleInput = (data: Buffer): void => {
        this._inputCallback?.(data.toString('utf8'));
    };
}
