// src/result.ts
// Outcome of a drain or serializer call. The failure payload is defined by whoever produced it.

export type Result<E> =
    | { readonly ok: true }
    | { readonly ok: false; readonly error: E };

export const OK: { readonly ok: true } = Object.freeze({ ok: true } as const);

export function fail<E>(error: E): Result<E> {
    return { ok: false, error };
}
