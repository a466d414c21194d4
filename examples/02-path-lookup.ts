/**
 * Path Lookup Example
 *
 * Reads single values out of a device status document without
 * building an object tree.
 *
 * Run: npx tsx examples/02-path-lookup.ts
 */

import { JsonPeek, find, findBool, findNumber, findString, getString } from '../src/index.js';

const status = '{"device":{"id":"gw-7","uptime":86400,"ports":[{"up":true},{"up":false}]},"note":"line1\\nline2"}';

function main() {
    console.log('--- Path Lookup Example ---\n');

    console.log(`  $.device.id           = ${getString(status, '$.device.id')}`);
    console.log(`  $.device.uptime       = ${findNumber(status, '$.device.uptime', 0)}`);
    console.log(`  $.device.ports[1].up  = ${findBool(status, '$.device.ports[1].up', true)}`);
    console.log(`  $.device.fan (absent) = ${findNumber(status, '$.device.fan', -1)}`);

    const ports = find(status, '$.device.ports');
    if (ports) {
        console.log(`  $.device.ports        = ${ports.kind} at ${ports.offset}, ${ports.length} bytes`);
    }

    // Fixed-size destination, as on a device without spare memory
    const note = new Uint8Array(16);
    const n = findString(status, '$.note', note);
    console.log(`  $.note                = ${n} bytes: ${JSON.stringify(new TextDecoder().decode(note.subarray(0, n)))}`);
    console.log(`  $.note into 8 bytes   = ${findString(status, '$.note', new Uint8Array(8))}`);

    const shallow = new JsonPeek({ maxDepth: 2 });
    console.log(`  depth 2, ports[0].up  = ${shallow.findBool(status, '$.device.ports[0].up', false)} (fallback)`);

    console.log('\n--- Done ---');
}

main();
