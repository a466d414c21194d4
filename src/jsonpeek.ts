import { JsonScanError, MAX_DEPTH, type JsonSource, type Match, type PeekOptions, type TokenCallback } from './types.js';
import { scan as scanBytes } from './core/tokenizer.js';
import { advance, createCursor } from './core/matcher.js';
import { asciiText } from './core/bytes.js';
import { unescape } from './core/strings.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });
const DOLLAR = 0x24;

/**
 * UTF-8 encode string input; byte input is used as is.
 */
export function toBytes(input: JsonSource): Uint8Array {
    return typeof input === 'string' ? encoder.encode(input) : input;
}

export class JsonPeek {
    readonly maxDepth: number;

    constructor(options: PeekOptions = {}) {
        this.maxDepth = options.maxDepth ?? MAX_DEPTH;
        if (!Number.isInteger(this.maxDepth) || this.maxDepth < 1) {
            throw new RangeError(`maxDepth must be a positive integer, got ${this.maxDepth}`);
        }
    }

    /**
     * Tokenize the value at the start of `input`.
     * Returns the number of bytes consumed.
     *
     * @throws JsonScanError
     */
    scan(input: JsonSource, onToken?: TokenCallback): number {
        return scanBytes(toBytes(input), onToken, this.maxDepth);
    }

    /**
     * Locate the value at `path`, or null when the document has none.
     * Offsets refer to `input` (its UTF-8 bytes for a string).
     *
     * @throws JsonScanError for malformed input or a path not starting with $
     */
    find(input: JsonSource, path: string): Match | null {
        return this.lookup(toBytes(input), path);
    }

    findNumber(input: JsonSource, path: string, fallback: number): number {
        const buf = toBytes(input);
        const match = this.tryLookup(buf, path);
        if (match?.kind !== 'NUMBER') return fallback;
        return Number.parseFloat(asciiText(buf, match.offset, match.length));
    }

    findBool(input: JsonSource, path: string, fallback: boolean): boolean {
        const match = this.tryLookup(toBytes(input), path);
        if (match?.kind === 'TRUE') return true;
        if (match?.kind === 'FALSE') return false;
        return fallback;
    }

    /**
     * Unescape the string at `path` into `dest`, NUL-terminated.
     * Returns the decoded length, 0 when there is no string at `path`,
     * or -1 when `dest` is too small or an escape is invalid.
     */
    findString(input: JsonSource, path: string, dest: Uint8Array): number {
        const buf = toBytes(input);
        const match = this.tryLookup(buf, path);
        if (match?.kind !== 'STRING') return 0;
        return unescape(buf, match.offset + 1, match.length - 2, dest);
    }

    /**
     * The string at `path` decoded as UTF-8, or undefined when there is none,
     * it holds an escape outside the table, or its bytes are not valid UTF-8.
     */
    getString(input: JsonSource, path: string): string | undefined {
        const buf = toBytes(input);
        const match = this.tryLookup(buf, path);
        if (match?.kind !== 'STRING') return undefined;

        // Unescaping never grows the text; one extra byte for the terminator
        const dest = new Uint8Array(match.length - 1);
        const n = unescape(buf, match.offset + 1, match.length - 2, dest);
        if (n < 0) return undefined;
        try {
            return decoder.decode(dest.subarray(0, n));
        } catch (err) {
            if (err instanceof TypeError) return undefined;
            throw err;
        }
    }

    private lookup(buf: Uint8Array, path: string): Match | null {
        if (path.charCodeAt(0) !== DOLLAR) {
            throw new JsonScanError('INVALID_INPUT', `path must start with $: ${JSON.stringify(path)}`, 0);
        }
        const cursor = createCursor(encoder.encode(path));
        scanBytes(buf, (kind, b, offset, length) => advance(cursor, kind, b, offset, length), this.maxDepth);
        return cursor.result;
    }

    // Accessors treat every failure as "no value"
    private tryLookup(buf: Uint8Array, path: string): Match | null {
        try {
            return this.lookup(buf, path);
        } catch (err) {
            if (err instanceof JsonScanError) return null;
            throw err;
        }
    }
}

// ============ Default Instance ============

const peek = new JsonPeek();

export function scan(input: JsonSource, onToken?: TokenCallback): number {
    return peek.scan(input, onToken);
}

export function find(input: JsonSource, path: string): Match | null {
    return peek.find(input, path);
}

export function findNumber(input: JsonSource, path: string, fallback: number): number {
    return peek.findNumber(input, path, fallback);
}

export function findBool(input: JsonSource, path: string, fallback: boolean): boolean {
    return peek.findBool(input, path, fallback);
}

export function findString(input: JsonSource, path: string, dest: Uint8Array): number {
    return peek.findString(input, path, dest);
}

export function getString(input: JsonSource, path: string): string | undefined {
    return peek.getString(input, path);
}
