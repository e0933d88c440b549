/**
 * Pending Tracking Example
 *
 * Shows how to know when a member is final vs still streaming.
 * Use this to trigger actions only once a value is complete.
 *
 * Run: npx tsx examples/03-pending-tracking.ts
 */

import { JsonSnapshotStream, META, isPending } from '../src/index.js';

interface UserProfile {
    user: string;
    bio: string;
}

async function main(): Promise<void> {
    console.log('--- Pending Tracking Example ---\n');

    const stream = new JsonSnapshotStream<UserProfile>({
        stream: mockStream(),
        trackDelta: false,
    });

    let userActionTaken = false;

    for await (const snapshot of stream) {
        const pending = snapshot[META].pending;

        console.log('\n[Snapshot]');
        console.log(`  user: "${snapshot.user ?? ''}" ${isPending(pending.user) ? '(streaming...)' : '(DONE)'}`);
        console.log(`  bio:  "${snapshot.bio ?? ''}" ${isPending(pending.bio) ? '(streaming...)' : '(DONE)'}`);

        if (!userActionTaken && !isPending(pending.user)) {
            console.log(`\n  >> ACTION: User "${snapshot.user}" confirmed - updating page title`);
            userActionTaken = true;
        }
    }

    console.log('\n--- Done ---');
}

// --- Mock Stream ---

async function* mockStream(): AsyncIterable<string> {
    const chunks = [
        '{"user": "alice",',
        ' "bio": "Software ',
        'engineer ',
        'at ',
        'Acme"}',
    ];

    for (const chunk of chunks) {
        await new Promise(resolve => setTimeout(resolve, 400));
        console.log(`[Stream] ${JSON.stringify(chunk)}`);
        yield chunk;
    }
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
