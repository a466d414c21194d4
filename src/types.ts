/**
 * Default bound on container nesting. Scanning a document nested deeper
 * than this fails with `TOO_DEEP`.
 */
export const MAX_DEPTH = 20;

/**
 * Token kinds reported by the tokenizer.
 */
export type TokenKind =
    | 'KEY'             // "..." in key position
    | 'STRING'          // "..."
    | 'NUMBER'          // 123, -1.5, 1e10
    | 'TRUE'            // true
    | 'FALSE'           // false
    | 'NULL'            // null
    | 'BEGIN_OBJECT'    // {
    | 'END_OBJECT'      // }
    | 'BEGIN_ARRAY'     // [
    | 'END_ARRAY'       // ]
    | 'COMMA'           // ,
    | 'COLON';          // :

/**
 * Kinds a path lookup can resolve to.
 */
export type ValueKind =
    | 'STRING'
    | 'NUMBER'
    | 'TRUE'
    | 'FALSE'
    | 'NULL'
    | 'OBJECT'
    | 'ARRAY';

export type ScalarKind = Exclude<ValueKind, 'OBJECT' | 'ARRAY'>;

/**
 * Check if a token kind carries a scalar value.
 */
export function isValueToken(kind: TokenKind): kind is ScalarKind {
    return kind === 'STRING' || kind === 'NUMBER' || kind === 'TRUE' || kind === 'FALSE' || kind === 'NULL';
}

/**
 * Receives every token in document order. The span is a view into `buf`,
 * strings and keys include their quotes.
 */
export type TokenCallback = (kind: TokenKind, buf: Uint8Array, offset: number, length: number) => void;

/**
 * Location of the value a path resolved to.
 */
export interface Match {
    kind: ValueKind;

    /** Start of the value in the input bytes */
    offset: number;

    /** Byte length, quotes and brackets included */
    length: number;
}

/**
 * Input accepted by the lookup functions. Strings are UTF-8 encoded once
 * and every offset refers to the encoded bytes.
 */
export type JsonSource = Uint8Array | string;

/**
 * Expectation states of the tokenizer.
 */
export type ParserState =
    | 'EXPECT_VALUE'            // Expecting any value
    | 'EXPECT_KEY'              // Expecting object key (or } right after {)
    | 'EXPECT_COLON'            // Expecting : after key
    | 'EXPECT_COMMA_OR_CLOSE';  // Expecting , or the innermost closer

/**
 * Options for creating a JsonPeek scanner.
 */
export interface PeekOptions {
    /** Maximum container nesting (default: 20) */
    maxDepth?: number;
}

export type ScanErrorCode = 'INVALID_INPUT' | 'TOO_DEEP';

export class JsonScanError extends Error {
    readonly code: ScanErrorCode;

    /** Byte offset where scanning stopped */
    readonly offset: number;

    constructor(code: ScanErrorCode, message: string, offset: number) {
        super(`${message} at offset ${offset}`);
        this.name = 'JsonScanError';
        this.code = code;
        this.offset = offset;
    }
}
