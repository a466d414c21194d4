export {
    JsonPeek,
    scan,
    find,
    findNumber,
    findBool,
    findString,
    getString,
    toBytes,
} from './jsonpeek.js';
export { esc, passString, unescape, type EscapeDirection } from './core/strings.js';
export { NestingStack } from './core/nesting.js';
export { FixedBufferSink, printBuf, printInt, printStr, type Sink } from './printer.js';
export {
    MAX_DEPTH,
    JsonScanError,
    isValueToken,
    type ScanErrorCode,
    type TokenKind,
    type ValueKind,
    type ScalarKind,
    type TokenCallback,
    type Match,
    type JsonSource,
    type ParserState,
    type PeekOptions,
} from './types.js';
