export function isDigit(c: number): boolean {
    return c >= 0x30 && c <= 0x39;
}

/**
 * Check that `bytes` occur in `buf` at `start`, within `end`.
 */
export function matchesAt(buf: Uint8Array, start: number, end: number, bytes: readonly number[]): boolean {
    if (start + bytes.length > end) return false;
    for (let k = 0; k < bytes.length; k++) {
        if (buf[start + k] !== bytes[k]) return false;
    }
    return true;
}

/**
 * Decode an ASCII span, as number tokens are.
 */
export function asciiText(buf: Uint8Array, offset: number, length: number): string {
    let text = '';
    for (let i = offset; i < offset + length; i++) {
        text += String.fromCharCode(buf[i]);
    }
    return text;
}
