// src/errors.ts
// Error types raised by the logging core.
// Drain failures travel as `Result` values; these are thrown only for misuse
// or when the tree owner picked the fuse strategy.

export class LogTreeError extends Error {
    readonly code: string;

    constructor(message: string, code: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'LogTreeError';
        this.code = code;
    }
}

/* ------------------------------- Domain errors ------------------------------ */

/** Text that names no level. */
export class InvalidLevelNameError extends LogTreeError {
    constructor(text: string) {
        super(`unrecognized level name: ${JSON.stringify(text)}`, 'INVALID_LEVEL_NAME');
        this.name = 'InvalidLevelNameError';
    }
}

/** A fused drain saw its inner drain fail. The inner failure is the `cause`. */
export class DrainFusedError extends LogTreeError {
    constructor(cause: unknown) {
        super(`drain failed: ${errorMessage(cause)}`, 'DRAIN_FUSED', { cause });
        this.name = 'DrainFusedError';
    }
}

/** An exclusive drain was entered again while already held. */
export class DrainBusyError extends LogTreeError {
    constructor() {
        super('drain is busy with another record', 'DRAIN_BUSY');
        this.name = 'DrainBusyError';
    }
}

export class ValueAlreadySerializedError extends LogTreeError {
    constructor(key: string) {
        super(`value for key "${key}" was already serialized`, 'VALUE_ALREADY_SERIALIZED');
        this.name = 'ValueAlreadySerializedError';
    }
}

/* --------------------------------- Utilities -------------------------------- */

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
    if (value instanceof Error) return value.message;
    if (value == null) return 'Unknown error';
    return String(value);
}
