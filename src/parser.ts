import { type Context, type State, createContext, mutate } from './core/statemachine.js';
import { type ResultState, createResultState, reduce } from './core/reducer.js';
import { toPendingTree, toSnapshot } from './core/tree.js';
import { ParserOptionsSchema, resolveOptions, type ParserOptions } from './options.js';
import type { JsonSnapshot, PendingNode } from './types.js';

/**
 * Incremental parser for objects whose values are strings or objects.
 *
 * Feed it fragments of any size with `consume`; read the best-effort
 * structure at any point with `snapshot`.
 */
export class StreamingJsonParser {
    readonly strict: boolean;
    private ctx: Context;
    private result: ResultState;

    constructor(options: ParserOptions = {}) {
        this.strict = resolveOptions(ParserOptionsSchema, options).strict;
        this.ctx = createContext();
        this.result = createResultState();
    }

    get state(): State {
        return this.ctx.state;
    }

    /** The root object has closed; further input is inert */
    get done(): boolean {
        return this.ctx.done;
    }

    /**
     * Number of code points consumed so far, counted per fragment: a
     * surrogate pair split across two fragments counts as two.
     */
    get position(): number {
        return this.ctx.position;
    }

    /**
     * Process every character of the fragment. In strict mode a rejected
     * character throws StreamSyntaxError; characters before it stay applied.
     */
    consume(fragment: string): void {
        for (const char of fragment) {
            const { ctx, action } = mutate({ ctx: this.ctx, char, strict: this.strict });
            this.ctx = ctx;
            if (action) {
                this.result = reduce({ state: this.result, action });
            }
        }
    }

    /**
     * Fresh copy of the root object. Later input never changes it.
     */
    snapshot(): JsonSnapshot {
        return toSnapshot(this.result.tree);
    }

    /**
     * Which objects and strings are still open.
     */
    pending(): PendingNode {
        return toPendingTree(this.result.tree);
    }
}

/**
 * Parse a whole text in one call and return its snapshot.
 */
export function parseJson(text: string, options: ParserOptions = {}): JsonSnapshot {
    const parser = new StreamingJsonParser(options);
    parser.consume(text);
    return parser.snapshot();
}
