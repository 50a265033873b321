// src/context.ts
// Persistent context chain shared by a logger and all of its descendants.
// Each node holds one group of key/values and points at its parent; nodes never change after construction.

import type { OwnedKeyValue, OwnedValue } from './ser';

/** One group of context key/values, as added by a single `child()` call. */
export type ContextGroup = readonly OwnedKeyValue[];

export class ContextChain implements Iterable<OwnedKeyValue> {
    /** Entries across this node and all ancestors. */
    readonly size: number;

    private constructor(
        private readonly group: ContextGroup,
        readonly parent: ContextChain | undefined,
    ) {
        this.size = group.length + (parent?.size ?? 0);
    }

    /** Chain with no parent; used for the root logger. */
    static root(group: ContextGroup = []): ContextChain {
        return new ContextChain(freezeGroup(group), undefined);
    }

    /** New node on top of `parent`. The parent is shared, not copied. */
    static child(group: ContextGroup, parent: ContextChain): ContextChain {
        return new ContextChain(freezeGroup(group), parent);
    }

    /** The group owned by this node only (ancestors excluded). */
    values(): ContextGroup {
        return this.group;
    }

    /**
     * Walk this node's group, then the parent's, up to the root.
     * Insertion order within a group; duplicate keys are all yielded.
     */
    *iter(): IterableIterator<OwnedKeyValue> {
        for (let node: ContextChain | undefined = this; node; node = node.parent) {
            yield* node.group;
        }
    }

    [Symbol.iterator](): IterableIterator<OwnedKeyValue> {
        return this.iter();
    }
}

function freezeGroup(group: ContextGroup): ContextGroup {
    return Object.isFrozen(group) && group.every(pair => Object.isFrozen(pair))
        ? group
        : Object.freeze(group.map(pair => Object.freeze([pair[0], pair[1]] as const)));
}

/* ------------------------------ Group builder ------------------------------ */

export type ContextObject = { readonly [key: string]: OwnedValue };

function isPair(arg: OwnedKeyValue | ContextObject): arg is OwnedKeyValue {
    return Array.isArray(arg);
}

/**
 * Build a context group.
 * - `o({ service: 'api', port: 8080 })`
 * - `o(['tag', 'a'], ['tag', 'b'])` when a key must appear more than once
 * - `o()` for an empty group
 */
export function o(values: ContextObject): ContextGroup;
export function o(...pairs: OwnedKeyValue[]): ContextGroup;
export function o(...args: OwnedKeyValue[] | [ContextObject]): ContextGroup {
    const pairs: OwnedKeyValue[] = [];
    for (const arg of args) {
        if (isPair(arg)) pairs.push(arg);
        else pairs.push(...Object.entries(arg));
    }
    return freezeGroup(pairs);
}
