import type { Match, TokenKind } from '../types.js';
import { isValueToken } from '../types.js';
import { isDigit } from './bytes.js';

const DOT = 0x2e;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;

// ============ Match Cursor ============

export interface MatchCursor {
    path: Uint8Array;
    pos: number;            // Next unread path byte, after the leading $
    depth: number;          // Current traversal depth
    target: number;         // Depth at which the next path segment applies
    index: number;          // Element counter of the array being matched into
    wanted: number;         // Requested element index, -1 when none
    containerStart: number; // Offset of the container that may be the result, -1 when none
    result: Match | null;
    missed: boolean;        // Targeted value ended without matching the rest of the path
}

/**
 * Create a cursor for a path. The caller has checked that it starts with $.
 */
export function createCursor(path: Uint8Array): MatchCursor {
    return {
        path,
        pos: 1,
        depth: 0,
        target: 0,
        index: 0,
        wanted: -1,
        containerStart: -1,
        result: null,
        missed: false,
    };
}

// ============ Advance ============

/**
 * Feed one token to the cursor. Events after the lookup has settled are ignored.
 */
export function advance(cursor: MatchCursor, kind: TokenKind, buf: Uint8Array, offset: number, length: number): void {
    if (cursor.result !== null || cursor.missed) return;

    switch (kind) {
        case 'BEGIN_OBJECT':
        case 'BEGIN_ARRAY':
            handleOpen(cursor, kind, offset);
            return;
        case 'END_OBJECT':
        case 'END_ARRAY':
            handleClose(cursor, kind, offset);
            return;
        case 'COMMA':
            handleComma(cursor);
            return;
        case 'KEY':
            handleKey(cursor, buf, offset, length);
            return;
        case 'COLON':
            return;
        default:
            if (isValueToken(kind) && cursor.depth === cursor.target) {
                if (pathDone(cursor)) {
                    cursor.result = { kind, offset, length };
                } else {
                    cursor.missed = true;  // A scalar has no members
                }
            }
    }
}

// ============ Event Handlers ============

function handleOpen(cursor: MatchCursor, kind: 'BEGIN_OBJECT' | 'BEGIN_ARRAY', offset: number): void {
    if (cursor.depth === cursor.target) {
        cursor.index = 0;
        cursor.wanted = -1;

        if (kind === 'BEGIN_ARRAY' && peek(cursor) === OPEN_BRACKET) {
            cursor.wanted = readIndex(cursor.path, cursor.pos + 1);
            if (cursor.wanted === 0) {
                // Element 0 starts right here, no comma will announce it
                cursor.target++;
                cursor.pos = skipIndex(cursor.path, cursor.pos);
            }
        }

        if (pathDone(cursor) && cursor.depth === cursor.target) {
            cursor.containerStart = offset;
        }
    }
    cursor.depth++;
}

function handleClose(cursor: MatchCursor, kind: 'END_OBJECT' | 'END_ARRAY', offset: number): void {
    cursor.depth--;
    if (cursor.depth > cursor.target) return;

    if (cursor.depth === cursor.target && pathDone(cursor) && cursor.containerStart !== -1) {
        cursor.result = {
            kind: kind === 'END_OBJECT' ? 'OBJECT' : 'ARRAY',
            offset: cursor.containerStart,
            length: offset - cursor.containerStart + 1,
        };
        return;
    }

    // The targeted container closed without holding the rest of the path
    cursor.missed = true;
}

function handleComma(cursor: MatchCursor): void {
    if (cursor.depth !== cursor.target + 1 || cursor.wanted < 0) return;

    cursor.index++;
    if (cursor.index === cursor.wanted) {
        cursor.pos = skipIndex(cursor.path, cursor.pos);
        cursor.target++;
    }
}

function handleKey(cursor: MatchCursor, buf: Uint8Array, offset: number, length: number): void {
    if (cursor.depth !== cursor.target + 1 || peek(cursor) !== DOT) return;

    const nameStart = cursor.pos + 1;
    const nameEnd = segmentEnd(cursor.path, nameStart);

    // Raw key bytes, quotes excluded
    const keyStart = offset + 1;
    const keyLength = length - 2;
    if (nameEnd - nameStart !== keyLength) return;
    for (let k = 0; k < keyLength; k++) {
        if (buf[keyStart + k] !== cursor.path[nameStart + k]) return;
    }

    cursor.pos = nameEnd;
    cursor.target++;
}

// ============ Path Helpers ============

function pathDone(cursor: MatchCursor): boolean {
    return cursor.pos >= cursor.path.length;
}

function peek(cursor: MatchCursor): number {
    return pathDone(cursor) ? 0 : cursor.path[cursor.pos];
}

/**
 * End of a `.name` segment: the next `.` or `[`, or the end of the path.
 */
function segmentEnd(path: Uint8Array, start: number): number {
    let i = start;
    while (i < path.length && path[i] !== DOT && path[i] !== OPEN_BRACKET) i++;
    return i;
}

/**
 * Read the digits of `[N]` starting after the bracket.
 * Returns -1 unless the selector is digits followed by `]`.
 */
function readIndex(path: Uint8Array, start: number): number {
    let i = start;
    let value = 0;
    while (i < path.length && isDigit(path[i])) {
        value = value * 10 + (path[i] - 0x30);
        i++;
    }
    if (i === start || i >= path.length || path[i] !== CLOSE_BRACKET) return -1;
    return value;
}

/**
 * Position just past the `]` of the index selector at `pos`.
 */
function skipIndex(path: Uint8Array, pos: number): number {
    let i = pos;
    while (i < path.length && path[i] !== CLOSE_BRACKET) i++;
    return i + 1;
}
