// src/ser.ts
// Value serialization: what can be logged, decoupled from how it is encoded.
// Output formats implement `Serializer`; loggable values are primitives, `Serialize` objects, or lazy closures.

import { ValueAlreadySerializedError } from './errors';
import type { LogRecord } from './record';
import type { Result } from './result';

/* ---------------------------------- Types ---------------------------------- */

/**
 * Output-agnostic sink for one key/value at a time.
 * A `Serialize` implementation calls exactly one of these per `serialize()` invocation.
 * Calling more than one for the same key is left to the serializer to ignore or reject.
 */
export interface Serializer<E> {
    emitBool(key: string, value: boolean): Result<E>;
    /** Integers. Numbers are passed through as-is; bigints stay bigints. */
    emitI64(key: string, value: number | bigint): Result<E>;
    /** Bigints at or above 2^63. */
    emitU64(key: string, value: bigint): Result<E>;
    emitF64(key: string, value: number): Result<E>;
    emitStr(key: string, value: string): Result<E>;
    /** An explicitly absent value (`null`). */
    emitNone(key: string): Result<E>;
    /** A value carrying no information (`undefined`). */
    emitUnit(key: string): Result<E>;
}

/** Anything that knows how to emit itself into a `Serializer`. */
export interface Serialize {
    serialize<E>(record: LogRecord, key: string, serializer: Serializer<E>): Result<E>;
}

export type Primitive = boolean | number | bigint | string | null | undefined;

/** Computed only once the record carrying it is serialized. */
export type Lazy = (record: LogRecord) => Value;

export type Value = Primitive | Serialize | Lazy;

/**
 * Value placed in a logger's context chain.
 * Groups holding them are frozen when attached, so every logger sharing the chain reads the same data.
 */
export type OwnedValue = Value;

/** Per-call data; lives only for one dispatch. */
export type BorrowedKeyValue = readonly [key: string, value: Value];

/** Context data, attached to a logger for its lifetime. */
export type OwnedKeyValue = readonly [key: string, value: OwnedValue];

/* -------------------------------- Dispatch --------------------------------- */

const I64_MIN = -(2n ** 63n);
const I64_LIMIT = 2n ** 63n;
const U64_LIMIT = 2n ** 64n;

/**
 * Emit one value under `key`.
 * - safe integers → `emitI64`; other numbers (incl. -0, NaN/Infinity) → `emitF64`
 * - bigint in [-2^63, 2^63) → `emitI64`, in [2^63, 2^64) → `emitU64`, else its decimal text via `emitStr`
 * - `null` → `emitNone`, `undefined` → `emitUnit`
 * - functions are lazy values: called with the record, their result is serialized in turn
 */
export function serializeValue<E>(value: Value, record: LogRecord, key: string, serializer: Serializer<E>): Result<E> {
    if (value === null) return serializer.emitNone(key);
    if (value === undefined) return serializer.emitUnit(key);
    if (typeof value === 'boolean') return serializer.emitBool(key, value);
    if (typeof value === 'string') return serializer.emitStr(key, value);
    if (typeof value === 'number') {
        return Number.isSafeInteger(value) && !Object.is(value, -0)
            ? serializer.emitI64(key, value)
            : serializer.emitF64(key, value);
    }
    if (typeof value === 'bigint') {
        if (value >= I64_MIN && value < I64_LIMIT) return serializer.emitI64(key, value);
        if (value >= I64_LIMIT && value < U64_LIMIT) return serializer.emitU64(key, value);
        return serializer.emitStr(key, value.toString());
    }
    if (typeof value === 'function') return serializeValue(value(record), record, key, serializer);
    return value.serialize(record, key, serializer);
}

export function serializeKeyValue<E>(pair: BorrowedKeyValue, record: LogRecord, serializer: Serializer<E>): Result<E> {
    return serializeValue(pair[1], record, pair[0], serializer);
}

/* ---------------------------------- Lazy ----------------------------------- */

/**
 * Mark a closure as a lazily computed value.
 * `fn` runs only if a record survives filtering and a drain serializes it.
 */
export function lazy(fn: (record: LogRecord) => Value): Lazy {
    return fn;
}

/** Single-use handle given to `PushLazy` closures. */
export class ValueSerializer<E> {
    private done = false;

    constructor(
        private readonly record: LogRecord,
        private readonly key: string,
        private readonly serializer: Serializer<E>,
    ) {}

    get isDone(): boolean {
        return this.done;
    }

    serialize(value: Value): Result<E> {
        if (this.done) throw new ValueAlreadySerializedError(this.key);
        this.done = true;
        return serializeValue(value, this.record, this.key, this.serializer);
    }
}

export type PushLazyFn = <E>(record: LogRecord, value: ValueSerializer<E>) => Result<E>;

/**
 * Lazy value that pushes straight into the serializer, so no intermediate value is built.
 * If the closure never pushes, the key is emitted as unit.
 */
export class PushLazy implements Serialize {
    constructor(private readonly fn: PushLazyFn) {}

    serialize<E>(record: LogRecord, key: string, serializer: Serializer<E>): Result<E> {
        const value = new ValueSerializer(record, key, serializer);
        const result = this.fn(record, value);
        if (!result.ok || value.isDone) return result;
        return serializer.emitUnit(key);
    }
}

export function pushLazy(fn: PushLazyFn): PushLazy {
    return new PushLazy(fn);
}
