// src/drain.ts
// Drains: pluggable record consumers, and the combinators that chain them.
// A root drain has failure type `never`; pick `ignoreErrors()` or `fuse()` to get there.

import type { ContextChain } from './context';
import { DrainBusyError, DrainFusedError } from './errors';
import { FilterLevel, filterLevelFromOrdinal, isLevelEnabled, type Level } from './level';
import type { LogRecord } from './record';
import { fail, OK, type Result } from './result';

/* ---------------------------------- Types ---------------------------------- */

/**
 * Consumes records. `E` is whatever the drain reports on failure.
 * Implementations are shared by every logger descending from the same root and may be re-entered;
 * any drain needing exclusive access guards itself (see `exclusive()`).
 */
export interface Drain<E = never> {
    log(record: LogRecord, context: ContextChain): Result<E>;
}

/** Failure type of a drain. */
export type DrainError<D> = D extends Drain<infer E> ? E : never;

export type RecordPredicate = (record: LogRecord, context: ContextChain) => boolean;

/* --------------------------------- Discard --------------------------------- */

/** Accepts everything, does nothing. */
export class Discard implements Drain<never> {
    log(_record: LogRecord, _context: ContextChain): Result<never> {
        return OK;
    }
}

export function discard(): Discard {
    return new Discard();
}

/* --------------------------------- Filters --------------------------------- */

/** Forwards only records the predicate accepts; the rest succeed untouched. */
export class Filter<E> implements Drain<E> {
    constructor(
        private readonly drain: Drain<E>,
        private readonly predicate: RecordPredicate,
    ) {}

    log(record: LogRecord, context: ContextChain): Result<E> {
        return this.predicate(record, context) ? this.drain.log(record, context) : OK;
    }
}

export function filter<E>(predicate: RecordPredicate, drain: Drain<E>): Filter<E> {
    return new Filter(drain, predicate);
}

/** Forwards records at `threshold` or more severe. */
export class LevelFilter<E> implements Drain<E> {
    readonly threshold: FilterLevel;

    constructor(
        private readonly drain: Drain<E>,
        threshold: FilterLevel | Level,
    ) {
        this.threshold = filterLevelFromOrdinal(threshold) ?? FilterLevel.Off;
    }

    log(record: LogRecord, context: ContextChain): Result<E> {
        return isLevelEnabled(record.level, this.threshold) ? this.drain.log(record, context) : OK;
    }
}

export function filterLevel<E>(threshold: FilterLevel | Level, drain: Drain<E>): LevelFilter<E> {
    return new LevelFilter(drain, threshold);
}

/* ------------------------------ Error handling ----------------------------- */

export class MapError<E, F> implements Drain<F> {
    constructor(
        private readonly drain: Drain<E>,
        private readonly map: (error: E) => F,
    ) {}

    log(record: LogRecord, context: ContextChain): Result<F> {
        const result = this.drain.log(record, context);
        return result.ok ? OK : fail(this.map(result.error));
    }
}

export function mapError<E, F>(drain: Drain<E>, map: (error: E) => F): MapError<E, F> {
    return new MapError(drain, map);
}

/** Turns every inner failure into success. Usable as a root drain. */
export class IgnoreErrors<E> implements Drain<never> {
    constructor(private readonly drain: Drain<E>) {}

    log(record: LogRecord, context: ContextChain): Result<never> {
        this.drain.log(record, context);
        return OK;
    }
}

export function ignoreErrors<E>(drain: Drain<E>): IgnoreErrors<E> {
    return new IgnoreErrors(drain);
}

/**
 * Treats any inner failure as unrecoverable: throws `DrainFusedError` with the failure as `cause`.
 * Usable as a root drain.
 */
export class Fuse<E> implements Drain<never> {
    constructor(private readonly drain: Drain<E>) {}

    log(record: LogRecord, context: ContextChain): Result<never> {
        const result = this.drain.log(record, context);
        if (!result.ok) throw new DrainFusedError(result.error);
        return OK;
    }
}

export function fuse<E>(drain: Drain<E>): Fuse<E> {
    return new Fuse(drain);
}

/* --------------------------------- Fan-out --------------------------------- */

/**
 * Sends each record to both drains, left first.
 * Both are always invoked; the first failure (if any) is returned.
 */
export class Duplicate<E1, E2> implements Drain<E1 | E2> {
    constructor(
        private readonly first: Drain<E1>,
        private readonly second: Drain<E2>,
    ) {}

    log(record: LogRecord, context: ContextChain): Result<E1 | E2> {
        const a = this.first.log(record, context);
        const b = this.second.log(record, context);
        return a.ok ? b : a;
    }
}

/** Fan out to two or more drains, nested left to right. */
export function duplicate<E>(first: Drain<E>, second: Drain<E>, ...rest: Drain<E>[]): Drain<E> {
    let drain: Drain<E> = new Duplicate(first, second);
    for (const next of rest) drain = new Duplicate(drain, next);
    return drain;
}

/* ------------------------------- Hot swapping ------------------------------ */

/** Handle that replaces the drain behind an `AtomicSwitch`. */
export class AtomicSwitchCtrl<E> {
    constructor(private readonly target: AtomicSwitch<E>) {}

    /** Install `drain`; dispatches starting after this call see it. */
    set(drain: Drain<E>): void {
        this.target.current = drain;
    }

    /** Install `drain` and return the previous one. */
    swap(drain: Drain<E>): Drain<E> {
        const previous = this.target.current;
        this.target.current = drain;
        return previous;
    }

    get(): Drain<E> {
        return this.target.current;
    }
}

/**
 * Forwards to a drain that can be replaced at runtime (e.g. from a signal handler to raise verbosity).
 * The current drain is read once per dispatch.
 */
export class AtomicSwitch<E> implements Drain<E> {
    /** @internal */
    current: Drain<E>;

    constructor(drain: Drain<E>) {
        this.current = drain;
    }

    ctrl(): AtomicSwitchCtrl<E> {
        return new AtomicSwitchCtrl(this);
    }

    log(record: LogRecord, context: ContextChain): Result<E> {
        return this.current.log(record, context);
    }
}

export function atomicSwitch<E>(drain: Drain<E>): AtomicSwitch<E> {
    return new AtomicSwitch(drain);
}

/* -------------------------------- Exclusion -------------------------------- */

/**
 * Guards a drain that must not be entered twice at once, such as a buffered writer mid-line.
 * A dispatch arriving while the lock is held (a drain logging through its own logger, a callback
 * re-entering) fails with `DrainBusyError`. The lock is released on every exit path, throws included.
 */
export class Exclusive<E> implements Drain<E | DrainBusyError> {
    private locked = false;

    constructor(private readonly drain: Drain<E>) {}

    get isLocked(): boolean {
        return this.locked;
    }

    log(record: LogRecord, context: ContextChain): Result<E | DrainBusyError> {
        if (this.locked) return fail(new DrainBusyError());
        this.locked = true;
        try {
            return this.drain.log(record, context);
        } finally {
            this.locked = false;
        }
    }
}

export function exclusive<E>(drain: Drain<E>): Exclusive<E> {
    return new Exclusive(drain);
}
