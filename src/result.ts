import type { WriterError } from "./errors.js";

/** Successful outcome of an operation. */
export interface Ok<T> {
    readonly ok: true;
    readonly value: T;
}

/** Failed outcome of an operation, carrying the error that stopped it. */
export interface Err {
    readonly ok: false;
    readonly error: WriterError;
}

export type Result<T> = Ok<T> | Err;

/** Outcome of a single {@link JsonWriter} operation. */
export type WriteResult = Result<undefined>;

export const OK: WriteResult = { ok: true, value: undefined };

export function ok<T>(value: T): Ok<T> {
    return { ok: true, value };
}

export function err(error: WriterError): Err {
    return { ok: false, error };
}

/** Returns the value of a successful result, or throws the error of a failed one. */
export function unwrap<T>(result: Result<T>): T {
    if (!result.ok) {
        throw result.error;
    }
    return result.value;
}
