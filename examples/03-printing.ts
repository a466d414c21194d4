/**
 * Printing Example
 *
 * Writes integers and escaped strings into a fixed-size buffer and
 * shows how truncation is detected.
 *
 * Run: npx tsx examples/03-printing.ts
 */

import { FixedBufferSink, printBuf, printInt, printStr, toBytes } from '../src/index.js';

function main() {
    console.log('--- Printing Example ---\n');

    const sink = new FixedBufferSink(64);
    let total = printBuf(toBytes('{"min":'), sink);
    total += printInt(-2147483648, sink);
    total += printBuf(toBytes(',"msg":'), sink);
    total += printStr('tab\there "quoted"', sink);
    total += printBuf(toBytes('}'), sink);
    console.log(`  ${sink.toString()}  (${total} bytes)`);

    const exact = new FixedBufferSink(8);
    const fitted = printStr('fits!!', exact);
    console.log(`  ${exact.toString()}  (${fitted} bytes, truncated: ${exact.truncated})`);

    const small = new FixedBufferSink(8);
    const written = printStr('does not fit', small);
    console.log(`  ${small.toString()}  (${written} bytes, truncated: ${small.truncated}, dropped: ${small.dropped})`);

    console.log('\n--- Done ---');
}

main();
