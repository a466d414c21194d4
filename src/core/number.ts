import { isDigit, matchesAt } from './bytes.js';

const INFINITY = [0x49, 0x6e, 0x66, 0x69, 0x6e, 0x69, 0x74, 0x79]; // "Infinity"

function countDigits(buf: Uint8Array, start: number, end: number): number {
    let i = start;
    while (i < end && isDigit(buf[i])) i++;
    return i - start;
}

/**
 * Length of the longest prefix at `start` that `Number.parseFloat` reads as a
 * number: an optional sign, then `Infinity` or a decimal literal with optional
 * fraction and exponent. Returns 0 when there is none.
 */
export function numberPrefixLength(buf: Uint8Array, start: number, end: number): number {
    let i = start;
    if (i < end && (buf[i] === 0x2d || buf[i] === 0x2b)) i++;

    if (matchesAt(buf, i, end, INFINITY)) {
        return i + INFINITY.length - start;
    }

    const intDigits = countDigits(buf, i, end);
    i += intDigits;

    if (i < end && buf[i] === 0x2e) {
        const fracDigits = countDigits(buf, i + 1, end);
        // "." alone is not a number, "1." is
        if (intDigits === 0 && fracDigits === 0) return 0;
        i += 1 + fracDigits;
    } else if (intDigits === 0) {
        return 0;
    }

    if (i < end && (buf[i] === 0x65 || buf[i] === 0x45)) {
        let j = i + 1;
        if (j < end && (buf[j] === 0x2d || buf[j] === 0x2b)) j++;
        const expDigits = countDigits(buf, j, end);
        if (expDigits > 0) i = j + expDigits;
    }

    return i - start;
}
