import { describe, it, expect } from 'vitest';
import { StreamSyntaxError, InvalidOptionsError } from '../src/errors.js';
import { StreamOptionsSchema, resolveOptions } from '../src/options.js';
import { calculateDelta } from '../src/stream.js';
import { JsonSnapshotStream, META, StreamingJsonParser, isPending, parseChunks, toStream } from './helpers.js';

describe('JsonSnapshotStream', () => {
    describe('snapshots', () => {
        it('yields one snapshot per chunk', async () => {
            const results = await parseChunks<{ msg: string }>(['{"msg": "He', 'llo"}']);

            expect(results).toHaveLength(2);
            expect(results[0].msg).toBe('He');
            expect(results[1].msg).toBe('Hello');
        });

        it('yields for empty chunks too', async () => {
            const results = await parseChunks(['{"a":', '', ' "1"', '', '}']);

            expect(results).toEqual([{}, {}, { a: '1' }, { a: '1' }, { a: '1' }]);
        });

        it('yields nothing for an empty stream', async () => {
            expect(await parseChunks([])).toEqual([]);
        });

        it('exposes the underlying parser', async () => {
            const stream = new JsonSnapshotStream({ stream: toStream(['{"a": "b']) });
            for await (const snapshot of stream) {
                expect(snapshot).toEqual({ a: 'b' });
            }

            expect(stream.parser.state).toBe('IN_VALUE');
            expect(stream.parser.strict).toBe(false);
        });

        it('yields independent objects', async () => {
            const results = await parseChunks<{ a: string; b?: string }>(['{"a": "1"', ', "b": "2"}']);
            results[0].a = '999';

            expect(results[1].a).toBe('1');
        });
    });

    describe('metadata', () => {
        it('accumulates the raw text', async () => {
            const results = await parseChunks(['{"a":', ' "1"}']);

            expect(results[0][META].text).toBe('{"a":');
            expect(results[1][META].text).toBe('{"a": "1"}');
        });

        it('reports when the root has closed', async () => {
            const results = await parseChunks(['{"a": "1"', '}', ' junk']);

            expect(results.map(r => r[META].done)).toEqual([false, true, true]);
        });

        it('carries the pending tree', async () => {
            const results = await parseChunks<{ msg: string }>(['{"msg": "He', 'llo"}']);

            expect(isPending(results[0][META].pending)).toBe(true);
            expect(isPending(results[0][META].pending.msg)).toBe(true);
            expect(isPending(results[1][META].pending)).toBe(false);
            expect(isPending(results[1][META].pending.msg)).toBe(false);
        });

        it('keeps metadata out of enumeration and serialisation', async () => {
            const [result] = await parseChunks(['{"a": "1"}']);

            expect(Object.keys(result)).toEqual(['a']);
            expect(JSON.stringify(result)).toBe('{"a":"1"}');
        });
    });

    describe('delta tracking', () => {
        it('has no delta on the first snapshot', async () => {
            const results = await parseChunks(['{"a": "1"']);

            expect(results[0][META].delta).toBeUndefined();
        });

        it('tracks new keys', async () => {
            const results = await parseChunks<{ a: string; b?: string }>(['{"a": "1"', ', "b": "2"}']);

            expect(results[1][META].delta).toEqual({ b: '2' });
        });

        it('reports only the appended part of a growing string', async () => {
            const results = await parseChunks<{ msg: string }>(['{"msg": "He', 'llo"}']);

            expect(results[1][META].delta).toEqual({ msg: 'llo' });
        });

        it('tracks nested changes', async () => {
            const results = await parseChunks(['{"u": {"n": "Al', 'ice", "c": "x"}}']);

            expect(results[1][META].delta).toEqual({ u: { n: 'ice', c: 'x' } });
        });

        it('has no delta when nothing changed', async () => {
            const results = await parseChunks(['{"a": "1"}', '   ']);

            expect(results[1][META].delta).toBeUndefined();
        });

        it('reports the full value of a replaced string', async () => {
            const results = await parseChunks(['{"a": "abc", ', '"a": "x']);

            expect(results[1][META].delta).toEqual({ a: 'x' });
        });

        it('reports a string replaced by an object', async () => {
            const results = await parseChunks(['{"a": "abc", ', '"a": {']);

            expect(results[1][META].delta).toEqual({ a: {} });
        });

        it('is unaffected by changes the caller makes to a snapshot', async () => {
            const deltas: unknown[] = [];
            const stream = new JsonSnapshotStream({ stream: toStream(['{"a": "1"', ', "b": "2"}']) });
            for await (const snapshot of stream) {
                snapshot.a = 'changed';
                deltas.push(snapshot[META].delta);
            }

            expect(deltas).toEqual([undefined, { b: '2' }]);
        });

        it('can be disabled', async () => {
            const results = await parseChunks(['{"a": "1"', ', "b": "2"}'], { trackDelta: false });

            expect(results.map(r => r[META].delta)).toEqual([undefined, undefined]);
        });
    });

    describe('calculateDelta', () => {
        it('returns undefined for equal objects', () => {
            expect(calculateDelta({ a: { b: 'c' } }, { a: { b: 'c' } })).toBeUndefined();
        });

        it('reports an object replaced by a string', () => {
            expect(calculateDelta({ a: { b: 'c' } }, { a: 'd' })).toEqual({ a: 'd' });
        });

        it('leaves out nested objects that did not change', () => {
            const delta = calculateDelta({ a: { x: '1' }, b: '1' }, { a: { x: '1' }, b: '12', c: {} });

            expect(delta).toEqual({ b: '2', c: {} });
        });

        it('keeps member order around changed nested objects', () => {
            const delta = calculateDelta({ a: { x: '1' }, b: '1' }, { a: { x: '12' }, b: '1', c: 'n' });

            expect(delta && Object.keys(delta)).toEqual(['a', 'c']);
            expect(delta).toEqual({ a: { x: '2' }, c: 'n' });
        });

        it('reaches a change far deeper than the call stack', () => {
            const depth = 50_000;
            const parser = new StreamingJsonParser();
            parser.consume('{' + '"k": {'.repeat(depth) + '"leaf": "a');
            const prev = parser.snapshot();
            parser.consume('b');

            let node = calculateDelta(prev, parser.snapshot());
            for (let i = 0; i < depth; i++) {
                const next = node?.k;
                if (next === undefined || typeof next === 'string') {
                    throw new Error(`no nested delta at level ${i}`);
                }
                expect(node && Object.keys(node)).toEqual(['k']);
                node = next;
            }

            expect(node).toEqual({ leaf: 'b' });
        });

        it('keeps a __proto__ key as data', () => {
            const curr = {};
            Object.defineProperty(curr, '__proto__', { value: 'x', enumerable: true, writable: true, configurable: true });
            const delta = calculateDelta({}, curr);

            expect(delta && Object.keys(delta)).toEqual(['__proto__']);
        });
    });

    describe('strict mode', () => {
        it('propagates syntax errors out of the iteration', async () => {
            await expect(parseChunks(['{"a"', 'x'], { strict: true })).rejects.toThrow(StreamSyntaxError);
        });

        it('yields the snapshots before the error', async () => {
            const seen: unknown[] = [];
            const stream = new JsonSnapshotStream({ stream: toStream(['{"a": "1"', ' x']), strict: true });

            await expect((async () => {
                for await (const snapshot of stream) {
                    seen.push({ ...snapshot });
                }
            })()).rejects.toThrow('Unexpected "x" at position 10 in state EXPECT_COMMA_OR_END; expected one of ",", "}"');
            expect(seen).toEqual([{ a: '1' }]);
        });
    });

    describe('options', () => {
        it('rejects a stream that is not async iterable', () => {
            expect(() => resolveOptions(StreamOptionsSchema, { stream: 'text' })).toThrow(InvalidOptionsError);
        });

        it('names the failing option', () => {
            expect(() => resolveOptions(StreamOptionsSchema, { stream: toStream([]), trackDelta: 'yes' }))
                .toThrow('Invalid options: trackDelta: Expected boolean, received string');
        });

        it('applies defaults', () => {
            const stream = toStream([]);

            expect(resolveOptions(StreamOptionsSchema, { stream })).toEqual({ stream, strict: false, trackDelta: true });
        });
    });
});
