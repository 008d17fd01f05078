import { InternalError } from "./errors.js";

/** Marks a branch that exhaustive type checking proves unreachable. */
export function impossible(value: never, message: string): Error {
    return new InternalError(`${message}: ${JSON.stringify(value)}`);
}
