/**
 * Streaming Parser State Machine (string-only JSON objects)
 *
 * ┌─────────────────────────────────────────────────────────────────────┐
 * │                           STATE DIAGRAM                             │
 * └─────────────────────────────────────────────────────────────────────┘
 *
 *        ┌─────────┐
 *        │  START  │
 *        └────┬────┘
 *             │ {
 *             ▼
 *   ┌───────────────────┐   "    ┌──────────┐   "    ┌──────────────┐
 *   │ EXPECT_KEY_OR_END │──────▶│  IN_KEY  │──────▶│ EXPECT_COLON │
 *   └───┬───────────────┘        └──────────┘        └──────┬───────┘
 *       │     ▲      ▲                                      │ :
 *       │     │      │ {  (push object)                     ▼
 *       │     │      └─────────────────────────────┌──────────────┐
 *       │     │                                     │ EXPECT_VALUE │
 *       │     │ ,                                   └──────┬───────┘
 *       │     │                                            │ "  (insert string)
 *       │     │                                            ▼
 *       │  ┌──┴──────────────────┐        "         ┌──────────────┐
 *       └─▶│ EXPECT_COMMA_OR_END │◀─────────────────│   IN_VALUE   │
 *     }    └──────────┬──────────┘                   └──────────────┘
 *                     │ }  (pop, or close root)
 *                     └──────▶ EXPECT_COMMA_OR_END
 *
 * Once the root object has closed every further character is inert.
 */

import { StreamSyntaxError } from '../errors.js';

// ============ State Types ============

export type State =
    | 'START'                // before root {
    | 'EXPECT_KEY_OR_END'    // " or }
    | 'IN_KEY'               // any char, " ends the key
    | 'EXPECT_COLON'         // :
    | 'EXPECT_VALUE'         // " or {
    | 'IN_VALUE'             // any char, " ends the value
    | 'EXPECT_COMMA_OR_END'; // , or }

type StructuralState = Exclude<State, 'IN_KEY' | 'IN_VALUE'>;

/**
 * Accepted non-whitespace characters per state in strict mode.
 * String states accept anything as content.
 */
export const EXPECTED_CHARS: Readonly<Record<StructuralState, readonly string[]>> = {
    START: ['{'],
    EXPECT_KEY_OR_END: ['"', '}'],
    EXPECT_COLON: [':'],
    EXPECT_VALUE: ['"', '{'],
    EXPECT_COMMA_OR_END: [',', '}'],
};

// ============ Context ============

export interface Context {
    state: State;
    /** Key of the member being parsed */
    key: string;
    /** Number of open objects below the root */
    depth: number;
    /** Root object has been closed */
    done: boolean;
    /** Code points consumed so far, whitespace included */
    position: number;
}

export function createContext(): Context {
    return {
        state: 'START',
        key: '',
        depth: 0,
        done: false,
        position: 0,
    };
}

// ============ Actions ============

export type Action =
    | { type: 'string_start'; key: string }
    | { type: 'object_start'; key: string }
    | { type: 'append'; char: string }
    | { type: 'string_end' }
    | { type: 'object_end' };

export type MutateResult = {
    ctx: Context;
    action: Action | null;
};

export function isWhitespace(c: string): boolean {
    return c === ' ' || c === '\n' || c === '\t' || c === '\r';
}

export function isStringState(state: State): state is 'IN_KEY' | 'IN_VALUE' {
    return state === 'IN_KEY' || state === 'IN_VALUE';
}

/**
 * Accepted set for a state, or null when any character is content.
 */
export function expectedChars(state: State): readonly string[] | null {
    return isStringState(state) ? null : EXPECTED_CHARS[state];
}

/**
 * Pure transition function: one character in, new context and at most one
 * action out. Throws StreamSyntaxError in strict mode.
 */
export function mutate({ ctx, char, strict }: { ctx: Context; char: string; strict: boolean }): MutateResult {
    const position = ctx.position;
    const next = { ...ctx, position: position + 1 };

    if (isWhitespace(char) && !isStringState(ctx.state)) {
        return { ctx: next, action: null };
    }

    if (strict) {
        const expected = expectedChars(ctx.state);
        if (expected && !expected.includes(char)) {
            throw new StreamSyntaxError(char, expected, ctx.state, position);
        }
    }

    if (ctx.done) {
        return { ctx: next, action: null };
    }

    switch (ctx.state) {
        case 'START':
            return handleStart(next, char);
        case 'EXPECT_KEY_OR_END':
            return handleExpectKeyOrEnd(next, char);
        case 'IN_KEY':
            return handleInKey(next, char);
        case 'EXPECT_COLON':
            return handleExpectColon(next, char);
        case 'EXPECT_VALUE':
            return handleExpectValue(next, char);
        case 'IN_VALUE':
            return handleInValue(next, char);
        case 'EXPECT_COMMA_OR_END':
            return handleExpectCommaOrEnd(next, char);
    }
}

// ============ State Handlers ============

function handleStart(ctx: Context, char: string): MutateResult {
    if (char === '{') {
        return { ctx: { ...ctx, state: 'EXPECT_KEY_OR_END' }, action: null };
    }
    return { ctx, action: null };
}

function handleExpectKeyOrEnd(ctx: Context, char: string): MutateResult {
    if (char === '"') {
        return { ctx: { ...ctx, state: 'IN_KEY', key: '' }, action: null };
    }
    if (char === '}') {
        return closeObject(ctx);
    }
    return { ctx, action: null };
}

function handleInKey(ctx: Context, char: string): MutateResult {
    if (char === '"') {
        return { ctx: { ...ctx, state: 'EXPECT_COLON' }, action: null };
    }
    return { ctx: { ...ctx, key: ctx.key + char }, action: null };
}

function handleExpectColon(ctx: Context, char: string): MutateResult {
    if (char === ':') {
        return { ctx: { ...ctx, state: 'EXPECT_VALUE' }, action: null };
    }
    return { ctx, action: null };
}

function handleExpectValue(ctx: Context, char: string): MutateResult {
    if (char === '"') {
        return {
            ctx: { ...ctx, state: 'IN_VALUE' },
            action: { type: 'string_start', key: ctx.key },
        };
    }

    if (char === '{') {
        return {
            ctx: { ...ctx, state: 'EXPECT_KEY_OR_END', depth: ctx.depth + 1 },
            action: { type: 'object_start', key: ctx.key },
        };
    }

    return { ctx, action: null };
}

function handleInValue(ctx: Context, char: string): MutateResult {
    if (char === '"') {
        return {
            ctx: { ...ctx, state: 'EXPECT_COMMA_OR_END' },
            action: { type: 'string_end' },
        };
    }
    return { ctx, action: { type: 'append', char } };
}

function handleExpectCommaOrEnd(ctx: Context, char: string): MutateResult {
    if (char === ',') {
        return { ctx: { ...ctx, state: 'EXPECT_KEY_OR_END' }, action: null };
    }
    if (char === '}') {
        return closeObject(ctx);
    }
    return { ctx, action: null };
}

// ============ Helpers ============

function closeObject(ctx: Context): MutateResult {
    // depth 0 means the } belongs to the root
    if (ctx.depth === 0) {
        return {
            ctx: { ...ctx, state: 'EXPECT_COMMA_OR_END', done: true },
            action: { type: 'object_end' },
        };
    }
    return {
        ctx: { ...ctx, state: 'EXPECT_COMMA_OR_END', depth: ctx.depth - 1 },
        action: { type: 'object_end' },
    };
}
