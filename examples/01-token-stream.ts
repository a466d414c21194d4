/**
 * Token Stream Example
 *
 * Prints every token the scanner reports for a small document,
 * with its offset and length into the input bytes.
 *
 * Run: npx tsx examples/01-token-stream.ts
 */

import { JsonScanError, scan, toBytes } from '../src/index.js';

const input = toBytes('{"sensor": "t-01", "readings": [21.5, 22.0, -3e1], "ok": true}');
const decoder = new TextDecoder();

function main() {
    console.log('--- Token Stream Example ---\n');

    const consumed = scan(input, (kind, buf, offset, length) => {
        const raw = decoder.decode(buf.subarray(offset, offset + length));
        console.log(`  ${kind.padEnd(12)} @${String(offset).padStart(3)} +${length}  ${raw}`);
    });
    console.log(`\nConsumed ${consumed} of ${input.length} bytes`);

    try {
        scan('[1, 2,]');
    } catch (err) {
        if (!(err instanceof JsonScanError)) throw err;
        console.log(`\nMalformed input: ${err.code} (${err.message})`);
    }

    console.log('\n--- Done ---');
}

main();
