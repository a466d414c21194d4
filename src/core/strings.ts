// ============ Escape Table ============

const QUOTE = 0x22;
const BACKSLASH = 0x5c;

// Literal bytes and their escape letters, index-aligned: \b \f \n \r \t \\ \" \/
const LITERALS = [0x08, 0x0c, 0x0a, 0x0d, 0x09, BACKSLASH, QUOTE, 0x2f];
const LETTERS = [0x62, 0x66, 0x6e, 0x72, 0x74, BACKSLASH, QUOTE, 0x2f];

export type EscapeDirection = 'escape' | 'unescape';

/**
 * Map a literal byte to its escape letter ('escape') or an escape letter back
 * to the literal byte ('unescape'). Returns 0 for bytes with no short escape.
 */
export function esc(c: number, direction: EscapeDirection): number {
    const from = direction === 'escape' ? LITERALS : LETTERS;
    const to = direction === 'escape' ? LETTERS : LITERALS;
    const index = from.indexOf(c);
    return index < 0 ? 0 : to[index];
}

// ============ String Scanner ============

/**
 * Find the closing quote of a string whose body starts at `start`.
 * Returns its absolute offset, or -1 for an unterminated string or a raw NUL.
 */
export function passString(buf: Uint8Array, start: number, end: number): number {
    for (let i = start; i < end; i++) {
        const c = buf[i];
        if (c === BACKSLASH && i + 1 < end && esc(buf[i + 1], 'unescape') !== 0) {
            i++;
        } else if (c === 0) {
            return -1;
        } else if (c === QUOTE) {
            return i;
        }
    }
    return -1;
}

// ============ Unescape ============

/**
 * Decode `length` raw string bytes at `start` into `dest`, followed by a NUL.
 * Returns the decoded length, or -1 when `dest` has no room for the result
 * and its terminator or an escape is not in the table.
 */
export function unescape(buf: Uint8Array, start: number, length: number, dest: Uint8Array): number {
    const end = start + length;
    let i = start;
    let j = 0;
    for (; i < end && j < dest.length; i++, j++) {
        if (buf[i] === BACKSLASH && i + 1 < end) {
            const c = esc(buf[i + 1], 'unescape');
            if (c === 0) return -1;
            dest[j] = c;
            i++;
        } else {
            dest[j] = buf[i];
        }
    }
    if (j >= dest.length) return -1;
    dest[j] = 0;
    return j;
}
