/**
 * Strict Mode Example
 *
 * Lenient parsing skips characters the grammar does not allow;
 * strict parsing stops at the first one and says where it was.
 *
 * Run: npx tsx examples/04-strict-mode.ts
 */

import { StreamSyntaxError, parseJson } from '../src/index.js';

const input = '{"answer": "Paris", "confidence": 0.95}';

function main(): void {
    console.log('--- Strict Mode Example ---\n');
    console.log(`Input: ${input}\n`);

    console.log('[Lenient]', JSON.stringify(parseJson(input)));

    try {
        parseJson(input, { strict: true });
    } catch (error) {
        if (!(error instanceof StreamSyntaxError)) throw error;
        console.log(`[Strict]  ${error.message}`);
        console.log(`          ${input}`);
        console.log(`          ${' '.repeat(error.position)}^`);
    }
}

main();
