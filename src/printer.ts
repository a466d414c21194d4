import { esc } from './core/strings.js';
import type { JsonSource } from './types.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const QUOTE = Uint8Array.of(0x22);
const BACKSLASH = Uint8Array.of(0x5c);
const MINUS = Uint8Array.of(0x2d);
const DIGITS = Uint8Array.from([0x30, 0x31, 0x32, 0x33, 0x34, 0x35, 0x36, 0x37, 0x38, 0x39]);

/**
 * Destination for printed bytes.
 */
export interface Sink {
    /** Accept `chunk`, returning how many of its bytes were taken */
    write(chunk: Uint8Array): number;
}

/**
 * Sink over a fixed-capacity buffer. Bytes past capacity are dropped;
 * `length` counts what was actually stored and `dropped` what was not.
 */
export class FixedBufferSink implements Sink {
    readonly buffer: Uint8Array;
    private written = 0;
    private overflow = 0;

    constructor(bufferOrCapacity: Uint8Array | number) {
        this.buffer = typeof bufferOrCapacity === 'number' ? new Uint8Array(bufferOrCapacity) : bufferOrCapacity;
    }

    get length(): number {
        return this.written;
    }

    get capacity(): number {
        return this.buffer.length;
    }

    /** Bytes offered after the buffer filled up */
    get dropped(): number {
        return this.overflow;
    }

    get truncated(): boolean {
        return this.overflow > 0;
    }

    write(chunk: Uint8Array): number {
        const n = Math.min(chunk.length, this.buffer.length - this.written);
        this.buffer.set(chunk.subarray(0, n), this.written);
        this.written += n;
        this.overflow += chunk.length - n;
        return n;
    }

    /** View of the bytes written so far */
    bytes(): Uint8Array {
        return this.buffer.subarray(0, this.written);
    }

    toString(): string {
        return decoder.decode(this.bytes());
    }
}

export function printBuf(chunk: Uint8Array, sink: Sink): number {
    return sink.write(chunk);
}

/**
 * Print a safe integer in decimal. Returns the bytes the sink accepted.
 */
export function printInt(n: number, sink: Sink): number {
    if (!Number.isSafeInteger(n)) {
        throw new RangeError(`printInt expects a safe integer, got ${n}`);
    }
    if (n < 0) {
        // Every negative safe integer has a safe magnitude
        return sink.write(MINUS) + printDigits(-n, sink);
    }
    return printDigits(n, sink);
}

function printDigits(n: number, sink: Sink): number {
    const head = n >= 10 ? printDigits(Math.floor(n / 10), sink) : 0;
    const digit = n % 10;
    return head + sink.write(DIGITS.subarray(digit, digit + 1));
}

/**
 * Print `src` as a quoted JSON string, using short escapes where the
 * escape table has one and raw bytes otherwise.
 */
export function printStr(src: JsonSource, sink: Sink): number {
    const bytes = typeof src === 'string' ? encoder.encode(src) : src;
    let n = sink.write(QUOTE);
    for (let i = 0; i < bytes.length; i++) {
        const c = esc(bytes[i], 'escape');
        if (c !== 0) {
            n += sink.write(BACKSLASH);
            n += sink.write(Uint8Array.of(c));
        } else {
            n += sink.write(bytes.subarray(i, i + 1));
        }
    }
    return n + sink.write(QUOTE);
}
