// src/record.ts
// One logging event, built only after the call passed the static ceiling.
// A record is handed to the drain tree and dropped when the dispatch returns; drains must not keep it.

import type { Level } from './level';
import type { BorrowedKeyValue, Value } from './ser';

/* ---------------------------------- Types ---------------------------------- */

/** Static metadata describing where a logging call lives. */
export interface CallSite {
    readonly file: string;
    readonly line: number;
    readonly column: number;
    readonly function: string;
    readonly module: string;
    readonly target: string;
}

/** A message, or a thunk producing it when a drain first asks. */
export type Message = string | (() => string);

/** Per-call data: a plain object, or pairs when a key repeats. */
export type CallData = { readonly [key: string]: Value } | readonly BorrowedKeyValue[];

export const UNKNOWN_CALL_SITE: CallSite = Object.freeze({
    file: '',
    line: 0,
    column: 0,
    function: '',
    module: '',
    target: '',
});

/**
 * Build a reusable call site; omitted fields are blank.
 * `target` defaults to `module`.
 * Hoist the result to module scope so repeated calls share one object.
 */
export function callSite(meta: Partial<CallSite>): CallSite {
    const module = meta.module ?? '';
    return Object.freeze({
        file: meta.file ?? '',
        line: meta.line ?? 0,
        column: meta.column ?? 0,
        function: meta.function ?? '',
        module,
        target: meta.target ?? module,
    });
}

const NO_VALUES: readonly BorrowedKeyValue[] = Object.freeze([]);

/** Normalize call data into borrowed key/values, keeping order and duplicates. */
export function kv(data?: CallData): readonly BorrowedKeyValue[] {
    if (!data) return NO_VALUES;
    if (isPairList(data)) return data;
    return Object.entries(data);
}

function isPairList(data: CallData): data is readonly BorrowedKeyValue[] {
    return Array.isArray(data);
}

/* --------------------------------- Record ---------------------------------- */

export class LogRecord {
    private message: Message;

    constructor(
        readonly level: Level,
        message: Message,
        private readonly data: readonly BorrowedKeyValue[] = NO_VALUES,
        readonly site: CallSite = UNKNOWN_CALL_SITE,
    ) {
        this.message = message;
    }

    /** Resolved message; a thunk runs at most once per record. */
    msg(): string {
        if (typeof this.message === 'function') this.message = this.message();
        return this.message;
    }

    /** Key/values supplied at the call site. */
    values(): readonly BorrowedKeyValue[] {
        return this.data;
    }

    get file(): string { return this.site.file; }
    get line(): number { return this.site.line; }
    get column(): number { return this.site.column; }
    get function(): string { return this.site.function; }
    get module(): string { return this.site.module; }
    get target(): string { return this.site.target; }
}
