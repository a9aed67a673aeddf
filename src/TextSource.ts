/**
 * TextSource — Synchronous Reads of Kernel Text Files
 *
 * `/proc` reads are small and never block for long, so the monitor
 * reads them synchronously. The interface exists so tests can feed
 * in-memory text instead of the real files.
 *
 * @module
 */
import { readFileSync } from 'node:fs';
import { MonitorError, errorCode } from './MonitorError.js';

export interface TextSource {
    /**
     * Read a required file.
     * @throws MonitorError with code `SOURCE_UNREADABLE`
     */
    read(path: string): string;

    /** Read an optional file; `undefined` when it does not exist. */
    readOptional(path: string): string | undefined;
}

/** Error codes that mean "the file is not there for us". */
const ABSENT_CODES = new Set(['ENOENT', 'ENOTDIR', 'EACCES', 'EPERM', 'EINVAL']);

/** Reads from the local file system. */
export const fsTextSource: TextSource = {
    read(path: string): string {
        try {
            return readFileSync(path, 'utf8');
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new MonitorError('SOURCE_UNREADABLE', `Cannot read ${path}: ${reason}`, { cause: err });
        }
    },

    readOptional(path: string): string | undefined {
        try {
            return readFileSync(path, 'utf8');
        } catch (err) {
            const code = errorCode(err);
            if (code !== undefined && ABSENT_CODES.has(code)) return undefined;
            throw err;
        }
    },
};

/**
 * In-memory source keyed by path. Entries may be replaced between
 * cycles with {@link MemoryTextSource.set}.
 */
export class MemoryTextSource implements TextSource {
    private readonly _files = new Map<string, string>();

    constructor(files: Record<string, string> = {}) {
        for (const [path, text] of Object.entries(files)) this._files.set(path, text);
    }

    set(path: string, text: string): this {
        this._files.set(path, text);
        return this;
    }

    delete(path: string): this {
        this._files.delete(path);
        return this;
    }

    read(path: string): string {
        const text = this._files.get(path);
        if (text === undefined) {
            throw new MonitorError('SOURCE_UNREADABLE', `Cannot read ${path}: no such file`);
        }
        return text;
    }

    readOptional(path: string): string | undefined {
        return this._files.get(path);
    }
}
