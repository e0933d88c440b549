/**
 * Basic Streaming Example
 *
 * Demonstrates how a partial object becomes visible while text streams in.
 * Run: npx tsx examples/01-basic-streaming.ts
 */

import { StreamingJsonParser } from '../src/index.js';

// Fragments as they might arrive from a model generating structured output
const fragments = [
    '{"message": "Hel',
    'lo, ',
    'World!',
    '", "status": "com',
    'plete"}',
];

function main(): void {
    console.log('--- Basic Streaming Example ---\n');

    const parser = new StreamingJsonParser();

    fragments.forEach((fragment, i) => {
        parser.consume(fragment);
        const snapshot = parser.snapshot();

        console.log(`[Fragment ${i + 1}] ${JSON.stringify(fragment)}`);
        console.log(`  message: "${snapshot.message ?? ''}"`);
        console.log(`  status:  "${snapshot.status ?? '(not yet)'}"`);
    });

    console.log('\n--- Done ---');
}

main();
