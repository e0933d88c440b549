/**
 * Delta Tracking Example
 *
 * Shows how to use delta to get only NEW characters for efficient UI updates.
 * Instead of re-rendering the entire content, just append the delta.
 *
 * Run: npx tsx examples/02-delta-tracking.ts
 */

import { JsonSnapshotStream, META } from '../src/index.js';

async function* mockStream(): AsyncIterable<string> {
    const chunks = [
        '{"content": "The ',
        'quick ',
        'brown ',
        'fox ',
        'jumps ',
        'over ',
        'the ',
        'lazy ',
        'dog."}'
    ];

    for (const chunk of chunks) {
        await new Promise(resolve => setTimeout(resolve, 200));
        yield chunk;
    }
}

interface ChatMessage {
    content: string;
}

async function main(): Promise<void> {
    console.log('--- Delta Tracking Example ---\n');

    const stream = new JsonSnapshotStream<ChatMessage>({
        stream: mockStream()
    });

    let chatBubble = '';

    for await (const snapshot of stream) {
        const delta = snapshot[META].delta;

        // The first snapshot has no delta: take it whole
        const appended = delta ? delta.content : snapshot.content;
        if (appended) {
            chatBubble += appended;
            process.stdout.write(`\r[Chat Bubble] ${chatBubble}`);
        }
    }

    console.log('\n\n--- Done ---');
    console.log(`Final content: "${chatBubble}"`);
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
