import { META, type DeepPartial, type JsonSnapshot, type MetaInfo, type ParseResult } from './types.js';
import { StreamingJsonParser } from './parser.js';
import { defineMember } from './core/tree.js';
import { StreamOptionsSchema, resolveOptions, type StreamOptions } from './options.js';

/**
 * Async iterable over a text stream that yields one snapshot per chunk.
 */
export class JsonSnapshotStream<T extends object = JsonSnapshot> implements AsyncIterable<ParseResult<T>> {
    readonly parser: StreamingJsonParser;
    private stream: AsyncIterable<string>;
    private trackDelta: boolean;
    private text: string = '';
    private previous: JsonSnapshot | null = null;

    constructor(options: StreamOptions) {
        const { stream, trackDelta, strict } = resolveOptions(StreamOptionsSchema, options);
        this.stream = stream;
        this.trackDelta = trackDelta;
        this.parser = new StreamingJsonParser({ strict });
    }

    async *[Symbol.asyncIterator](): AsyncIterator<ParseResult<T>> {
        for await (const chunk of this.stream) {
            this.text += chunk;
            this.parser.consume(chunk);
            yield this.createSnapshot();
        }
    }

    private createSnapshot(): ParseResult<T> {
        const data = this.parser.snapshot();

        let delta: unknown;
        if (this.trackDelta) {
            if (this.previous) {
                delta = calculateDelta(this.previous, data);
            }
            // Kept apart from the yielded object, which the caller may modify
            this.previous = this.parser.snapshot();
        }

        const meta: MetaInfo<T> = {
            pending: this.parser.pending(),
            text: this.text,
            done: this.parser.done,
            delta: delta as DeepPartial<T> | undefined,
        };

        return attachMeta(data, meta);
    }
}

function attachMeta<T extends object>(value: object, meta: MetaInfo<T>): ParseResult<T> {
    Object.defineProperty(value, META, { value: meta, enumerable: false });
    return value as ParseResult<T>;
}

interface DeltaFrame {
    prev: JsonSnapshot;
    curr: JsonSnapshot;
    out: JsonSnapshot;
    parent: JsonSnapshot | null;
    key: string;
}

/**
 * Members added or grown since `prev`. A string that only grew is reported
 * as its new suffix; any other change reports the full current value.
 */
export function calculateDelta(prev: JsonSnapshot, curr: JsonSnapshot): JsonSnapshot | undefined {
    const root: JsonSnapshot = {};
    const work: DeltaFrame[] = [{ prev, curr, out: root, parent: null, key: '' }];
    const visited: DeltaFrame[] = [];

    for (let frame = work.pop(); frame !== undefined; frame = work.pop()) {
        visited.push(frame);
        for (const key of Object.keys(frame.curr)) {
            const currVal = frame.curr[key];
            const prevVal = Object.prototype.hasOwnProperty.call(frame.prev, key) ? frame.prev[key] : undefined;

            if (prevVal === undefined) {
                defineMember(frame.out, key, currVal);
            } else if (typeof currVal === 'string') {
                if (currVal === prevVal) continue;
                const grown = typeof prevVal === 'string' && currVal.startsWith(prevVal);
                defineMember(frame.out, key, grown ? currVal.slice(prevVal.length) : currVal);
            } else if (typeof prevVal === 'string') {
                defineMember(frame.out, key, currVal);
            } else {
                // Placeholder keeps member order; dropped below if nothing changed
                const out: JsonSnapshot = {};
                defineMember(frame.out, key, out);
                work.push({ prev: prevVal, curr: currVal, out, parent: frame.out, key });
            }
        }
    }

    // Children come after their parents in visit order
    for (let i = visited.length - 1; i >= 0; i--) {
        const { out, parent, key } = visited[i];
        if (parent !== null && Object.keys(out).length === 0) {
            delete parent[key];
        }
    }

    return Object.keys(root).length > 0 ? root : undefined;
}
