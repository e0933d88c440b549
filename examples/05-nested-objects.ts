/**
 * Nested Objects Example
 *
 * Shows how nested objects appear and fill in while streaming.
 * Pending tracking works at every level of nesting.
 *
 * Run: npx tsx examples/05-nested-objects.ts
 */

import { JsonSnapshotStream, META, isPending, pendingAt } from '../src/index.js';

interface UserData {
    user: {
        name: string;
        profile: {
            city: string;
            team: string;
        };
    };
    timestamp: string;
}

function status(done: boolean): string {
    return done ? 'DONE' : '...';
}

async function main(): Promise<void> {
    console.log('--- Nested Objects Example ---\n');

    const stream = new JsonSnapshotStream<UserData>({
        stream: mockStream(),
        trackDelta: false,
    });

    for await (const snapshot of stream) {
        const pending = snapshot[META].pending;

        console.log('[Snapshot]');
        console.log(`  user.name: "${snapshot.user?.name ?? ''}" ${status(!isPending(pendingAt(pending, 'user', 'name')))}`);
        console.log(`  user.profile.city: "${snapshot.user?.profile?.city ?? ''}" ${status(!isPending(pendingAt(pending, 'user', 'profile', 'city')))}`);
        console.log(`  user.profile.team: "${snapshot.user?.profile?.team ?? ''}" ${status(!isPending(pendingAt(pending, 'user', 'profile', 'team')))}`);
        console.log(`  timestamp: "${snapshot.timestamp ?? ''}" ${status(!isPending(pending.timestamp))}`);
        console.log();
    }

    console.log('--- Done ---');
}

// --- Mock Stream ---

async function* mockStream(): AsyncIterable<string> {
    const chunks = [
        '{"user": {"name": "Al',
        'ice", "profile": {"city":',
        ' "San Fran',
        'cisco", "team": "pla',
        'tform"}},',
        ' "timestamp": "2024-01-15"}'
    ];

    for (const chunk of chunks) {
        await new Promise(resolve => setTimeout(resolve, 300));
        yield chunk;
    }
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
