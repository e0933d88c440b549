import { createReadStream } from 'node:fs';
import { JsonSnapshotStream } from '../stream.js';
import { CliOptionsSchema, resolveOptions, type CliOptions } from '../options.js';
import type { JsonSnapshot } from '../types.js';

export type WriteLine = (line: string) => void;

/**
 * UTF-8 text of a file, or of stdin when no path (or "-") is given.
 */
export function openSource(file: string | undefined): AsyncIterable<string> {
    if (file === undefined || file === '-') {
        process.stdin.setEncoding('utf8');
        return process.stdin;
    }
    return createReadStream(file, { encoding: 'utf8' });
}

/**
 * Re-split a text stream into fragments of `size` characters (code points).
 * The last fragment may be shorter.
 */
export async function* rechunk(source: AsyncIterable<string>, size: number): AsyncIterable<string> {
    let fragment = '';
    let count = 0;
    for await (const chunk of source) {
        for (const char of chunk) {
            fragment += char;
            count++;
            if (count === size) {
                yield fragment;
                fragment = '';
                count = 0;
            }
        }
    }
    if (count > 0) {
        yield fragment;
    }
}

/**
 * Feed the source through a snapshot stream. With `every`, one compact JSON
 * line is written per fragment; otherwise only the final snapshot, indented.
 */
export async function printSnapshots(
    source: AsyncIterable<string>,
    options: CliOptions,
    writeLine: WriteLine,
): Promise<JsonSnapshot> {
    const { strict, every, chunkSize } = resolveOptions(CliOptionsSchema, options);
    const stream = new JsonSnapshotStream({
        stream: chunkSize === undefined ? source : rechunk(source, chunkSize),
        strict,
        trackDelta: false,
    });

    for await (const snapshot of stream) {
        if (every) {
            writeLine(JSON.stringify(snapshot));
        }
    }

    const result = stream.parser.snapshot();
    if (!every) {
        writeLine(JSON.stringify(result, null, 2));
    }
    return result;
}
