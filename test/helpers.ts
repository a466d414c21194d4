import { JsonPeek, scan, toBytes } from '../src/jsonpeek.js';
import { JsonScanError, type TokenKind } from '../src/types.js';

export interface RecordedToken {
    kind: TokenKind;
    offset: number;
    length: number;
    text: string;
}

/**
 * Helper to encode test input as bytes
 */
export function bytes(text: string): Uint8Array {
    return toBytes(text);
}

/**
 * Helper to decode a byte span for assertions
 */
export function text(buf: Uint8Array, offset = 0, length = buf.length - offset): string {
    return new TextDecoder().decode(buf.subarray(offset, offset + length));
}

/**
 * Helper to scan input and collect every reported token
 */
export function collectTokens(input: string): { consumed: number; tokens: RecordedToken[] } {
    const tokens: RecordedToken[] = [];
    const consumed = scan(input, (kind, buf, offset, length) => {
        tokens.push({ kind, offset, length, text: text(buf, offset, length) });
    });
    return { consumed, tokens };
}

/**
 * Helper to list token kinds and texts compactly
 */
export function tokenList(input: string): [TokenKind, string][] {
    return collectTokens(input).tokens.map((t): [TokenKind, string] => [t.kind, t.text]);
}

/**
 * Helper to capture the error a scan fails with
 */
export function scanError(input: string, peek: JsonPeek = new JsonPeek()): JsonScanError {
    try {
        peek.scan(input);
    } catch (err) {
        if (err instanceof JsonScanError) return err;
        throw err;
    }
    throw new Error(`expected scan of ${JSON.stringify(input)} to fail`);
}
