import type { Action } from './statemachine.js';
import {
    ROOT,
    type NodeId,
    type ValueTree,
    allocObject,
    allocString,
    appendText,
    closeNode,
    createTree,
    setMember,
} from './tree.js';

// ============ Result State ============

export interface ResultState {
    tree: ValueTree;
    /** Open inner objects, innermost last; root is implicit when empty */
    stack: NodeId[];
    /** String node receiving characters while a value is streaming */
    cursor: NodeId | null;
}

/**
 * Create initial result state
 */
export function createResultState(): ResultState {
    return {
        tree: createTree(),
        stack: [],
        cursor: null,
    };
}

export function currentObject(state: ResultState): NodeId {
    return state.stack.length === 0 ? ROOT : state.stack[state.stack.length - 1];
}

// ============ Reduce Function ============

/**
 * Apply one action. Nodes and the container stack are mutated in place;
 * the returned state carries the updated cursor.
 */
export function reduce({ state, action }: { state: ResultState; action: Action }): ResultState {
    switch (action.type) {
        case 'string_start':
            return handleStringStart(state, action.key);
        case 'object_start':
            return handleObjectStart(state, action.key);
        case 'append':
            return handleAppend(state, action.char);
        case 'string_end':
            return handleStringEnd(state);
        case 'object_end':
            return handleObjectEnd(state);
    }
}

// ============ Action Handlers ============

function handleStringStart(state: ResultState, key: string): ResultState {
    const id = allocString(state.tree);
    setMember(state.tree, currentObject(state), key, id);
    return { ...state, cursor: id };
}

function handleObjectStart(state: ResultState, key: string): ResultState {
    const id = allocObject(state.tree);
    setMember(state.tree, currentObject(state), key, id);
    state.stack.push(id);
    return state;
}

function handleAppend(state: ResultState, char: string): ResultState {
    if (state.cursor === null) {
        throw new Error('Append without an open string value');
    }
    appendText(state.tree, state.cursor, char);
    return state;
}

function handleStringEnd(state: ResultState): ResultState {
    if (state.cursor === null) {
        throw new Error('String end without an open string value');
    }
    closeNode(state.tree, state.cursor);
    return { ...state, cursor: null };
}

function handleObjectEnd(state: ResultState): ResultState {
    // Closing with an empty stack closes the root itself
    closeNode(state.tree, currentObject(state));
    state.stack.pop();
    return state;
}
