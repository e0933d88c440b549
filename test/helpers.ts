import { StreamingJsonParser, parseJson } from '../src/parser.js';
import { JsonSnapshotStream } from '../src/stream.js';
import { META, PENDING, isPending, pendingAt, type JsonSnapshot, type ParseResult } from '../src/types.js';

/**
 * Helper to create an async iterable from an array of strings
 */
export async function* toStream(chunks: string[]): AsyncIterable<string> {
    for (const chunk of chunks) {
        yield chunk;
    }
}

/**
 * Helper to collect all snapshots from a stream
 */
export async function collect<T extends object>(stream: JsonSnapshotStream<T>): Promise<ParseResult<T>[]> {
    const results: ParseResult<T>[] = [];
    for await (const snapshot of stream) {
        results.push(snapshot);
    }
    return results;
}

/**
 * Helper to create a stream and collect results in one step
 */
export async function parseChunks<T extends object = JsonSnapshot>(
    chunks: string[],
    options: { trackDelta?: boolean; strict?: boolean } = {}
): Promise<ParseResult<T>[]> {
    const stream = new JsonSnapshotStream<T>({
        stream: toStream(chunks),
        ...options
    });
    return collect(stream);
}

/**
 * Feed fragments one by one and record the snapshot after each
 */
export function feed(parser: StreamingJsonParser, fragments: string[]): JsonSnapshot[] {
    return fragments.map(fragment => {
        parser.consume(fragment);
        return parser.snapshot();
    });
}

/**
 * Split text into fragments of the given size (in UTF-16 code units)
 */
export function split(text: string, size: number): string[] {
    const fragments: string[] = [];
    for (let i = 0; i < text.length; i += size) {
        fragments.push(text.slice(i, i + size));
    }
    return fragments;
}

export { StreamingJsonParser, JsonSnapshotStream, parseJson, META, PENDING, isPending, pendingAt };
