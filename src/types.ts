/**
 * Unique symbol used to access metadata on stream results.
 * Using a symbol prevents collisions with actual JSON keys.
 */
export const META = Symbol('meta');

/**
 * Unique symbol used to access the pending flag in the pending tree.
 */
export const PENDING = Symbol('pending');

/**
 * A parsed object: string keys mapping to strings or nested objects.
 */
export interface JsonSnapshot {
    [key: string]: string | JsonSnapshot;
}

/**
 * Pending tree node - mirrors an object of the snapshot.
 * [PENDING]: true until the object's closing brace is consumed.
 * String members are plain booleans: true until their closing quote.
 */
export interface PendingNode {
    [PENDING]: boolean;
    [key: string]: PendingNode | boolean;
}

/**
 * Check if a node of the pending tree is still streaming.
 * Returns true if node is undefined (member not yet seen = still pending).
 */
export function isPending(node: PendingNode | boolean | undefined): boolean {
    if (node === undefined) return true;
    if (typeof node === 'boolean') return node;
    return node[PENDING];
}

/**
 * Walk the pending tree along a key path.
 * Returns undefined as soon as a key is missing or a string member is passed through.
 */
export function pendingAt(node: PendingNode, ...path: string[]): PendingNode | boolean | undefined {
    let current: PendingNode | boolean | undefined = node;
    for (const key of path) {
        if (current === undefined || typeof current === 'boolean') return undefined;
        current = Object.prototype.hasOwnProperty.call(current, key) ? current[key] : undefined;
    }
    return current;
}

/**
 * Metadata about the current parse state.
 */
export interface MetaInfo<T = JsonSnapshot> {
    /** Tree tracking which values are still open */
    pending: PendingNode;

    /** The accumulated raw input text */
    text: string;

    /** The root object has been closed; further input is ignored */
    done: boolean;

    /** What changed since the last snapshot (only present when trackDelta is enabled) */
    delta?: DeepPartial<T>;
}

/**
 * Deep partial type - makes all nested properties optional.
 */
export type DeepPartial<T> = T extends object
    ? { [P in keyof T]?: DeepPartial<T[P]> }
    : T;

/**
 * The result type yielded during iteration.
 * Contains the parsed value T with metadata accessible via [META].
 */
export type ParseResult<T> = T & { [META]: MetaInfo<T> };
