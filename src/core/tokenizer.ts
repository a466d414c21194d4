/**
 * JSON Tokenizer State Machine
 *
 *                           ┌──────────────┐
 *                      ┌───▶│ EXPECT_VALUE │◀──────────────┐
 *                      │    └──────┬───────┘               │
 *                      │           │                       │
 *         ┌────────────┼───────┬───┴───────┬───────────┐   │
 *         ▼            │       ▼           ▼           ▼   │
 *     ┌───────┐        │   ┌───────┐  ┌─────────┐  ┌──────────────┐
 *     │   {   │        │   │   [   │  │ scalar  │  │ ] right after│
 *     └───┬───┘        │   └───┬───┘  └────┬────┘  │ [ (empty)    │
 *         ▼            │       │  push     │       └──────┬───────┘
 *   ┌────────────┐     │       └───────────┘ depth 0?     │
 *   │ EXPECT_KEY │     │                     └─▶ DONE     │
 *   └─────┬──────┘     │                                  │
 *         │ "key"      │ :                                │
 *         ▼            │                                  │
 *   ┌──────────────┐   │                                  │
 *   │ EXPECT_COLON │───┘                                  │
 *   └──────────────┘                                      │
 *                                                         ▼
 *   ┌───────────────────────┐   , in object ─▶ EXPECT_KEY
 *   │ EXPECT_COMMA_OR_CLOSE │   , in array  ─▶ EXPECT_VALUE
 *   └───────────────────────┘   } or ]      ─▶ pop, DONE at depth 0
 *
 * Every transition not drawn is an error. Containers are tracked on a
 * bounded NestingStack instead of the call stack.
 */

import { JsonScanError, MAX_DEPTH, type ParserState, type TokenCallback, type TokenKind } from '../types.js';
import { NestingStack, OPEN_ARRAY, OPEN_OBJECT } from './nesting.js';
import { isDigit, matchesAt } from './bytes.js';
import { numberPrefixLength } from './number.js';
import { passString } from './strings.js';

const CLOSE_OBJECT = 0x7d;
const CLOSE_ARRAY = 0x5d;
const QUOTE = 0x22;
const COMMA = 0x2c;
const COLON = 0x3a;

const TRUE = [0x74, 0x72, 0x75, 0x65];
const FALSE = [0x66, 0x61, 0x6c, 0x73, 0x65];
const NULL = [0x6e, 0x75, 0x6c, 0x6c];

// ============ Context ============

interface ScanContext {
    buf: Uint8Array;
    state: ParserState;
    stack: NestingStack;
    // Last token opened a container, so its closer may follow directly
    justOpened: boolean;
    done: boolean;
    onToken: TokenCallback | undefined;
}

/**
 * Scan one JSON value from the start of `buf`, reporting each token to
 * `onToken`. Returns the number of bytes consumed, which is less than
 * `buf.length` when the value is followed by more input.
 *
 * @throws JsonScanError on malformed input or nesting beyond `maxDepth`
 */
export function scan(buf: Uint8Array, onToken?: TokenCallback, maxDepth: number = MAX_DEPTH): number {
    const ctx: ScanContext = {
        buf,
        state: 'EXPECT_VALUE',
        stack: new NestingStack(maxDepth),
        justOpened: false,
        done: false,
        onToken,
    };

    for (let i = 0; i < buf.length; i++) {
        const c = buf[i];
        if (isWhitespace(c)) continue;

        switch (ctx.state) {
            case 'EXPECT_VALUE':
                i = handleExpectValue(ctx, i, c);
                break;
            case 'EXPECT_KEY':
                i = handleExpectKey(ctx, i, c);
                break;
            case 'EXPECT_COLON':
                i = handleExpectColon(ctx, i, c);
                break;
            case 'EXPECT_COMMA_OR_CLOSE':
                i = handleExpectCommaOrClose(ctx, i, c);
                break;
        }

        if (ctx.done) return i + 1;
    }

    throw new JsonScanError('INVALID_INPUT', 'unexpected end of input', buf.length);
}

// ============ State Handlers ============
// Each handler consumes one token starting at `i` and returns the offset of
// its last byte.

function handleExpectValue(ctx: ScanContext, i: number, c: number): number {
    const { buf } = ctx;

    if (c === OPEN_OBJECT || c === OPEN_ARRAY) {
        if (ctx.stack.full) {
            throw new JsonScanError('TOO_DEEP', 'nesting exceeds maximum depth', i);
        }
        ctx.stack.push(c);
        ctx.state = c === OPEN_OBJECT ? 'EXPECT_KEY' : 'EXPECT_VALUE';
        return emit(ctx, c === OPEN_OBJECT ? 'BEGIN_OBJECT' : 'BEGIN_ARRAY', i, 1);
    }

    if (c === CLOSE_ARRAY && ctx.justOpened) {
        return handleClose(ctx, i, c);
    }

    let kind: TokenKind;
    let length: number;

    if (c === 0x74 && matchesAt(buf, i, buf.length, TRUE)) {
        kind = 'TRUE';
        length = TRUE.length;
    } else if (c === 0x66 && matchesAt(buf, i, buf.length, FALSE)) {
        kind = 'FALSE';
        length = FALSE.length;
    } else if (c === 0x6e && matchesAt(buf, i, buf.length, NULL)) {
        kind = 'NULL';
        length = NULL.length;
    } else if (c === 0x2d || isDigit(c)) {
        length = numberPrefixLength(buf, i, buf.length);
        if (length === 0) throw new JsonScanError('INVALID_INPUT', 'malformed number', i);
        kind = 'NUMBER';
    } else if (c === QUOTE) {
        const close = passString(buf, i + 1, buf.length);
        if (close < 0) throw new JsonScanError('INVALID_INPUT', 'unterminated string', i);
        kind = 'STRING';
        length = close - i + 1;
    } else {
        throw unexpected(c, i);
    }

    const last = emit(ctx, kind, i, length);
    afterValue(ctx);
    return last;
}

function handleExpectKey(ctx: ScanContext, i: number, c: number): number {
    if (c === QUOTE) {
        const close = passString(ctx.buf, i + 1, ctx.buf.length);
        if (close < 0) throw new JsonScanError('INVALID_INPUT', 'unterminated key', i);
        ctx.state = 'EXPECT_COLON';
        return emit(ctx, 'KEY', i, close - i + 1);
    }

    if (c === CLOSE_OBJECT && ctx.justOpened) {
        return handleClose(ctx, i, c);
    }

    throw unexpected(c, i);
}

function handleExpectColon(ctx: ScanContext, i: number, c: number): number {
    if (c !== COLON) throw unexpected(c, i);
    ctx.state = 'EXPECT_VALUE';
    return emit(ctx, 'COLON', i, 1);
}

function handleExpectCommaOrClose(ctx: ScanContext, i: number, c: number): number {
    if (c === COMMA) {
        ctx.state = ctx.stack.top() === OPEN_OBJECT ? 'EXPECT_KEY' : 'EXPECT_VALUE';
        return emit(ctx, 'COMMA', i, 1);
    }

    if (c === CLOSE_OBJECT || c === CLOSE_ARRAY) {
        return handleClose(ctx, i, c);
    }

    throw unexpected(c, i);
}

function handleClose(ctx: ScanContext, i: number, c: number): number {
    if (!ctx.stack.close(c)) throw unexpected(c, i);
    const last = emit(ctx, c === CLOSE_OBJECT ? 'END_OBJECT' : 'END_ARRAY', i, 1);
    afterValue(ctx);
    return last;
}

// ============ Helpers ============

function emit(ctx: ScanContext, kind: TokenKind, offset: number, length: number): number {
    ctx.justOpened = kind === 'BEGIN_OBJECT' || kind === 'BEGIN_ARRAY';
    if (ctx.onToken) ctx.onToken(kind, ctx.buf, offset, length);
    return offset + length - 1;
}

function afterValue(ctx: ScanContext): void {
    if (ctx.stack.depth === 0) {
        ctx.done = true;  // Top-level value complete
    } else {
        ctx.state = 'EXPECT_COMMA_OR_CLOSE';
    }
}

function isWhitespace(c: number): boolean {
    return c === 0x20 || c === 0x09 || c === 0x0a || c === 0x0d;
}

function unexpected(c: number, offset: number): JsonScanError {
    const shown = c >= 0x20 && c < 0x7f ? `'${String.fromCharCode(c)}'` : `byte 0x${c.toString(16).padStart(2, '0')}`;
    return new JsonScanError('INVALID_INPUT', `unexpected ${shown}`, offset);
}
