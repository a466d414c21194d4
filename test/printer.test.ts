import { describe, it, expect } from 'vitest';
import { FixedBufferSink, printBuf, printInt, printStr, type Sink } from '../src/printer.js';
import { findNumber, getString } from '../src/jsonpeek.js';
import { bytes, text } from './helpers.js';

function printedInt(n: number): { out: string; total: number } {
    const sink = new FixedBufferSink(32);
    const total = printInt(n, sink);
    return { out: sink.toString(), total };
}

describe('Printer Primitives', () => {
    describe('FixedBufferSink', () => {
        it('stores bytes up to capacity and drops the rest', () => {
            const sink = new FixedBufferSink(4);

            expect(printBuf(bytes('xyz'), sink)).toBe(3);
            expect(printBuf(bytes('abc'), sink)).toBe(1);
            expect(sink.length).toBe(4);
            expect(sink.capacity).toBe(4);
            expect(sink.toString()).toBe('xyza');
            expect(sink.dropped).toBe(2);
            expect(printBuf(bytes('!'), sink)).toBe(0);
            expect(sink.dropped).toBe(3);
            expect(sink.truncated).toBe(true);
        });

        it('tells an exact fit apart from an overflow', () => {
            const exact = new FixedBufferSink(8);
            expect(printStr('abcdef', exact)).toBe(8);
            expect(exact.toString()).toBe('"abcdef"');
            expect(exact.truncated).toBe(false);
            expect(exact.dropped).toBe(0);

            const over = new FixedBufferSink(8);
            expect(printStr('abcdefgh', over)).toBe(8);
            expect(over.toString()).toBe('"abcdefg');
            expect(over.truncated).toBe(true);
            expect(over.dropped).toBe(2);
        });

        it('writes into a caller-provided buffer', () => {
            const backing = new Uint8Array(8);
            const sink = new FixedBufferSink(backing.subarray(2, 6));

            printBuf(bytes('hello'), sink);

            expect(text(backing, 2, 4)).toBe('hell');
            expect(backing[0]).toBe(0);
            expect(backing[6]).toBe(0);
            expect(Array.from(sink.bytes())).toEqual(Array.from(bytes('hell')));
        });

        it('works with any sink implementation', () => {
            const chunks: number[][] = [];
            const sink: Sink = {
                write(chunk) {
                    chunks.push(Array.from(chunk));
                    return chunk.length;
                },
            };

            expect(printInt(-12, sink)).toBe(3);
            expect(chunks).toEqual([[0x2d], [0x31], [0x32]]);
        });
    });

    describe('printInt', () => {
        it('prints small and boundary values', () => {
            expect(printedInt(0)).toEqual({ out: '0', total: 1 });
            expect(printedInt(7)).toEqual({ out: '7', total: 1 });
            expect(printedInt(10)).toEqual({ out: '10', total: 2 });
            expect(printedInt(100)).toEqual({ out: '100', total: 3 });
        });

        it('prints negative values sign first', () => {
            expect(printedInt(-42)).toEqual({ out: '-42', total: 3 });
            expect(printedInt(-2147483648)).toEqual({ out: '-2147483648', total: 11 });
            expect(printedInt(Number.MIN_SAFE_INTEGER)).toEqual({ out: '-9007199254740991', total: 17 });
        });

        it('prints values that parse back to themselves', () => {
            const values = [1, 9, 11, 99, 101, 1000, 65535, 2147483647, 123456789012, Number.MAX_SAFE_INTEGER];
            for (const n of values) {
                const sink = new FixedBufferSink(32);
                printInt(n, sink);
                expect(Number.parseInt(sink.toString(), 10)).toBe(n);
                expect(findNumber(sink.bytes(), '$', -1)).toBe(n);
            }
        });

        it('reports only what the sink accepted', () => {
            const sink = new FixedBufferSink(3);
            expect(printInt(12345, sink)).toBe(3);
            expect(sink.toString()).toBe('123');
            expect(sink.dropped).toBe(2);
        });

        it('rejects values that are not safe integers', () => {
            const sink = new FixedBufferSink(32);
            expect(() => printInt(1.5, sink)).toThrow(RangeError);
            expect(() => printInt(Number.NaN, sink)).toThrow(RangeError);
            expect(() => printInt(2 ** 53, sink)).toThrow(RangeError);
            expect(sink.length).toBe(0);
        });
    });

    describe('printStr', () => {
        it('quotes and escapes table bytes', () => {
            const sink = new FixedBufferSink(32);

            expect(printStr('a"b\\c\n/', sink)).toBe(13);
            expect(sink.toString()).toBe('"a\\"b\\\\c\\n\\/"');
        });

        it('passes other bytes through raw', () => {
            const sink = new FixedBufferSink(8);

            expect(printStr(bytes('é\u0001'), sink)).toBe(5);
            expect(Array.from(sink.bytes())).toEqual([0x22, 0xc3, 0xa9, 0x01, 0x22]);
        });

        it('prints an empty string as two quotes', () => {
            const sink = new FixedBufferSink(4);
            expect(printStr('', sink)).toBe(2);
            expect(sink.toString()).toBe('""');
        });

        it('truncates at capacity', () => {
            const sink = new FixedBufferSink(4);

            expect(printStr('abcdef', sink)).toBe(4);
            expect(sink.length).toBe(sink.capacity);
            expect(sink.toString()).toBe('"abc');
        });

        it('produces text the scanner reads back', () => {
            const input = 'line1\nline2\t"q"/\\\b\f\r';
            const sink = new FixedBufferSink(64);
            printStr(input, sink);

            expect(getString(sink.bytes(), '$')).toBe(input);
        });
    });
});
