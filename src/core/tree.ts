import { PENDING, type JsonSnapshot, type PendingNode } from '../types.js';

// ============ Nodes ============

/** Index of a node in the tree's arena */
export type NodeId = number;

export interface StringNode {
    kind: 'string';
    value: string;
    closed: boolean;
}

export interface ObjectNode {
    kind: 'object';
    members: Map<string, NodeId>;
    closed: boolean;
}

export type ValueNode = StringNode | ObjectNode;

/**
 * Arena of nodes. Handles are indices and stay valid for the life of the
 * tree: nodes are never removed, only detached by a duplicate key.
 */
export interface ValueTree {
    nodes: ValueNode[];
}

export const ROOT: NodeId = 0;

export function createTree(): ValueTree {
    return { nodes: [{ kind: 'object', members: new Map(), closed: false }] };
}

export function allocString(tree: ValueTree): NodeId {
    tree.nodes.push({ kind: 'string', value: '', closed: false });
    return tree.nodes.length - 1;
}

export function allocObject(tree: ValueTree): NodeId {
    tree.nodes.push({ kind: 'object', members: new Map(), closed: false });
    return tree.nodes.length - 1;
}

export function getNode(tree: ValueTree, id: NodeId): ValueNode {
    const node = tree.nodes[id];
    if (node === undefined) {
        throw new Error(`Unknown node handle ${id}`);
    }
    return node;
}

export function getObject(tree: ValueTree, id: NodeId): ObjectNode {
    const node = getNode(tree, id);
    if (node.kind !== 'object') {
        throw new Error(`Node ${id} is a ${node.kind}, expected an object`);
    }
    return node;
}

export function getString(tree: ValueTree, id: NodeId): StringNode {
    const node = getNode(tree, id);
    if (node.kind !== 'string') {
        throw new Error(`Node ${id} is an ${node.kind}, expected a string`);
    }
    return node;
}

/**
 * Last write wins: a repeated key keeps its position and takes the new value.
 */
export function setMember(tree: ValueTree, parent: NodeId, key: string, child: NodeId): void {
    getObject(tree, parent).members.set(key, child);
}

export function appendText(tree: ValueTree, id: NodeId, text: string): void {
    getString(tree, id).value += text;
}

export function closeNode(tree: ValueTree, id: NodeId): void {
    getNode(tree, id).closed = true;
}

// ============ Translation ============

/**
 * Copy an object node into a plain object. Members are defined as own
 * properties so keys like "__proto__" stay ordinary data. Nested objects
 * are filled from a work stack, so depth is not limited by the call stack.
 */
export function toSnapshot(tree: ValueTree, id: NodeId = ROOT): JsonSnapshot {
    const root: JsonSnapshot = {};
    const work: { id: NodeId; out: JsonSnapshot }[] = [{ id, out: root }];

    for (let frame = work.pop(); frame !== undefined; frame = work.pop()) {
        for (const [key, childId] of getObject(tree, frame.id).members) {
            const child = getNode(tree, childId);
            if (child.kind === 'string') {
                defineMember(frame.out, key, child.value);
            } else {
                const out: JsonSnapshot = {};
                defineMember(frame.out, key, out);
                work.push({ id: childId, out });
            }
        }
    }
    return root;
}

export function toPendingTree(tree: ValueTree, id: NodeId = ROOT): PendingNode {
    const root: PendingNode = { [PENDING]: !getObject(tree, id).closed };
    const work: { id: NodeId; out: PendingNode }[] = [{ id, out: root }];

    for (let frame = work.pop(); frame !== undefined; frame = work.pop()) {
        for (const [key, childId] of getObject(tree, frame.id).members) {
            const child = getNode(tree, childId);
            if (child.kind === 'string') {
                defineMember(frame.out, key, !child.closed);
            } else {
                const out: PendingNode = { [PENDING]: !child.closed };
                defineMember(frame.out, key, out);
                work.push({ id: childId, out });
            }
        }
    }
    return root;
}

export function defineMember<V>(target: { [key: string]: V }, key: string, value: V): void {
    Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}
