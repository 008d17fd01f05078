/** Generic error produced by this library. */
export class InterchangeError extends Error {
    /** @private */
    constructor(message: string) {
        super(message);
        this.name = "InterchangeError";
    }
}

/** Stable identifiers of the failures reported by {@link JsonWriter}. */
export type WriterErrorCode =
    | "NON_FINITE_NUMBER"
    | "INTEGER_RANGE"
    | "STRUCTURAL_UNDERFLOW"
    | "MISMATCHED_CLOSE"
    | "MISSING_VALUE"
    | "DEPTH_OVERFLOW"
    | "KEY_EXPECTED"
    | "VALUE_EXPECTED"
    | "UNCLOSED_CONTAINER"
    | "WHITESPACE_HOOK"
    | "SINK_FAILURE"
    | "FLUSH_FAILURE"
    | "WRITER_POISONED";

/** Error reported by a {@link JsonWriter} operation.
 *
 * When `fatal` is true, the writer refuses every later operation: the bytes already handed to the sink can
 * no longer be completed into a valid document.
 */
export abstract class WriterError extends InterchangeError {
    abstract readonly code: WriterErrorCode;
    readonly fatal: boolean;

    /** @private */
    constructor(message: string, fatal: boolean) {
        super(message);
        this.name = "WriterError";
        this.fatal = fatal;
    }
}

/** Error reported when Infinity or NaN is written; JSON has no literal for either. */
export class NonFiniteNumberError extends WriterError {
    readonly code = "NON_FINITE_NUMBER";

    /** @private */
    constructor(value: number) {
        super(`${value} cannot be serialized in JSON`, false);
        this.name = "NonFiniteNumberError";
    }
}

/** Error reported when an integer is fractional or outside the 64-bit range of the operation. */
export class IntegerRangeError extends WriterError {
    readonly code = "INTEGER_RANGE";

    /** @private */
    constructor(message: string) {
        super(message, false);
        this.name = "IntegerRangeError";
    }
}

/** Error reported when a container is closed while no container is open. */
export class StructuralUnderflowError extends WriterError {
    readonly code = "STRUCTURAL_UNDERFLOW";

    /** @private */
    constructor(message: string) {
        super(message, true);
        this.name = "StructuralUnderflowError";
    }
}

/** Error reported when the closed container kind differs from the innermost open container. */
export class MismatchedCloseError extends WriterError {
    readonly code = "MISMATCHED_CLOSE";

    /** @private */
    constructor(message: string) {
        super(message, false);
        this.name = "MismatchedCloseError";
    }
}

/** Error reported when an object is closed right after a key, before the key's value. */
export class MissingValueError extends WriterError {
    readonly code = "MISSING_VALUE";

    /** @private */
    constructor(message: string) {
        super(message, false);
        this.name = "MissingValueError";
    }
}

/** Error reported when opening a container would exceed the configured maximum depth. */
export class DepthOverflowError extends WriterError {
    readonly code = "DEPTH_OVERFLOW";
    maxDepth: number;

    /** @private */
    constructor(maxDepth: number) {
        super(`Cannot nest containers deeper than ${maxDepth} levels`, false);
        this.name = "DepthOverflowError";
        this.maxDepth = maxDepth;
    }
}

/** Error reported when an object member key is expected but another token was written. */
export class KeyExpectedError extends WriterError {
    readonly code = "KEY_EXPECTED";

    /** @private */
    constructor(token: string) {
        super(`Expected a string key inside the object, but got ${token}`, false);
        this.name = "KeyExpectedError";
    }
}

/** Error reported by {@link JsonWriter.writeKey} outside of a key position. */
export class ValueExpectedError extends WriterError {
    readonly code = "VALUE_EXPECTED";

    /** @private */
    constructor(message: string) {
        super(message, false);
        this.name = "ValueExpectedError";
    }
}

/** Error reported when a complete document was requested but containers are still open. */
export class UnclosedContainerError extends WriterError {
    readonly code = "UNCLOSED_CONTAINER";
    depth: number;

    /** @private */
    constructor(depth: number) {
        super(`The document still has ${depth} open container(s)`, false);
        this.name = "UnclosedContainerError";
        this.depth = depth;
    }
}

/** Error reported when the whitespace hook of a writer throws. Nothing has been written for the token. */
export class WhitespaceHookError extends WriterError {
    readonly code = "WHITESPACE_HOOK";

    /** @private */
    constructor(cause: unknown) {
        super(`The whitespace hook failed: ${cause}`, false);
        this.name = "WhitespaceHookError";
        this.cause = cause;
    }
}

/** Error reported when the sink rejects a write. */
export class SinkError extends WriterError {
    readonly code: WriterErrorCode = "SINK_FAILURE";

    /** @private */
    constructor(message: string, cause: unknown) {
        super(`${message}: ${cause}`, true);
        this.name = "SinkError";
        this.cause = cause;
    }
}

/** Error reported when the sink fails to flush its buffered bytes. */
export class FlushError extends SinkError {
    readonly code: WriterErrorCode = "FLUSH_FAILURE";

    /** @private */
    constructor(cause: unknown) {
        super("Could not flush the sink", cause);
        this.name = "FlushError";
    }
}

/** Error reported by every operation on a writer after a fatal error. */
export class WriterPoisonedError extends WriterError {
    readonly code = "WRITER_POISONED";

    /** @private */
    constructor(cause: WriterError) {
        super(`The writer is unusable after a previous error: ${cause.message}`, true);
        this.name = "WriterPoisonedError";
        this.cause = cause;
    }
}

/** Error thrown when writer options are not valid. */
export class ConfigError extends InterchangeError {
    /** @private */
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

/** Error thrown when a digest is built from a byte sequence of the wrong size or encoding. */
export class DigestError extends InterchangeError {
    /** @private */
    constructor(message: string) {
        super(message);
        this.name = "DigestError";
    }
}

/** Error thrown by checked element access past the end of a value. */
export class OutOfRangeError extends InterchangeError {
    /** @private */
    constructor(message: string) {
        super(message);
        this.name = "OutOfRangeError";
    }
}

/** Error thrown when an internal invariant is violated. */
export class InternalError extends InterchangeError {
    /** @private */
    constructor(message: string) {
        super(message);
        this.name = "InternalError";
    }
}
