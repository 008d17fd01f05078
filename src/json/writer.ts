import { ByteQueue } from "../byte_queue.js";
import type { ResolvedWriterConfig, TokenContext, TokenKind, WriterConfig } from "../config.js";
import { resolveWriterConfig } from "../config.js";
import type { WriterError } from "../errors.js";
import {
    FlushError, IntegerRangeError, KeyExpectedError, NonFiniteNumberError, SinkError, ValueExpectedError,
    WhitespaceHookError, WriterPoisonedError,
} from "../errors.js";
import { log } from "../logger.js";
import type { Err, WriteResult } from "../result.js";
import { OK, err } from "../result.js";
import type { Sink } from "../sink.js";
import { escapeInto } from "./escape.js";
import type { ContainerKind } from "./state.js";
import { EmissionState } from "./state.js";

const QUOTE = 0x22;

const minInt64 = -9223372036854775808n;
const maxInt64 = 9223372036854775807n;
const maxUint64 = 18446744073709551615n;

const encoder = new TextEncoder();

const tokenNames: Record<TokenKind, string> = {
    beginObject: "an object",
    endObject: "the end of an object",
    beginArray: "an array",
    endArray: "the end of an array",
    key: "a key",
    null: "null",
    boolean: "a boolean",
    number: "a number",
    string: "a string",
};

/** Streaming JSON writer.
 *
 * Every operation writes one complete token (with its separator) to the sink in a single call, and returns a
 * {@link WriteResult} instead of throwing. Member keys and values inside objects must alternate: a key is
 * written with {@link writeString} or {@link writeKey}, and the writer inserts the `:` and `,` separators.
 *
 * The writer never closes containers on its own, and it does not own the sink.
 */
export class JsonWriter {
    #sink: Sink;
    #state: EmissionState;
    #scratch: ByteQueue;
    #config: ResolvedWriterConfig;
    #poison: WriterError | undefined;

    constructor(sink: Sink, config?: WriterConfig) {
        this.#sink = sink;
        this.#config = resolveWriterConfig(config);
        this.#state = new EmissionState(this.#config.maxDepth);
        this.#scratch = new ByteQueue(64);
        this.#poison = undefined;
    }

    get config(): ResolvedWriterConfig {
        return this.#config;
    }

    /** Number of open containers. */
    get depth(): number {
        return this.#state.depth;
    }

    /** Kind of the innermost open container, or `undefined` if none is open. */
    get kind(): ContainerKind | undefined {
        return this.#state.kind;
    }

    /** True if a value has been written and every container is closed. */
    get complete(): boolean {
        return this.#state.depth === 0 && this.#state.hasOutput;
    }

    /** True after a fatal error; every later operation fails with {@link WriterPoisonedError}. */
    get poisoned(): boolean {
        return this.#poison !== undefined;
    }

    beginObject(): WriteResult {
        return this.#begin("object");
    }

    endObject(): WriteResult {
        return this.#end("object");
    }

    beginArray(): WriteResult {
        return this.#begin("array");
    }

    endArray(): WriteResult {
        return this.#end("array");
    }

    writeNull(): WriteResult {
        return this.#scalar("null", () => "null");
    }

    writeBoolean(value: boolean): WriteResult {
        return this.#scalar("boolean", () => value ? "true" : "false");
    }

    /** Writes a signed 64-bit integer in exact decimal form. */
    writeInteger(value: number | bigint): WriteResult {
        return this.#scalar("number", () => {
            const int = toBigInt(value);
            if (typeof int !== "bigint") {
                return int;
            }
            if (int < minInt64 || int > maxInt64) {
                return new IntegerRangeError(`${int} is outside the range of a signed 64-bit integer`);
            }
            return int.toString();
        });
    }

    /** Writes an unsigned 64-bit integer in exact decimal form. */
    writeUnsigned(value: number | bigint): WriteResult {
        return this.#scalar("number", () => {
            const int = toBigInt(value);
            if (typeof int !== "bigint") {
                return int;
            }
            if (int < 0n || int > maxUint64) {
                return new IntegerRangeError(`${int} is outside the range of an unsigned 64-bit integer`);
            }
            return int.toString();
        });
    }

    /** Writes a double in the shortest decimal form that reads back as the same value. Infinity and NaN fail
     * with {@link NonFiniteNumberError}. */
    writeNumber(value: number): WriteResult {
        return this.#scalar("number", () => {
            if (!Number.isFinite(value)) {
                return new NonFiniteNumberError(value);
            }
            return Object.is(value, -0) ? "-0" : String(value);
        });
    }

    /** Writes a string token, or `null` if `value` is `null` or `undefined`.
     *
     * Inside an object, this writes the member key when a key is expected. A JavaScript string is encoded
     * as UTF-8; the bytes of a `Uint8Array` are written without validation.
     */
    writeString(value: string | Uint8Array | null | undefined): WriteResult {
        if (value === null || value === undefined) {
            return this.writeNull();
        }
        return this.#string(this.#state.expectsKey() ? "key" : "string", value);
    }

    /** Writes an object member key; fails with {@link ValueExpectedError} where a key is not expected. */
    writeKey(name: string | Uint8Array): WriteResult {
        const refused = this.#refuse();
        if (refused !== undefined) {
            return refused;
        }
        if (!this.#state.expectsKey()) {
            return this.#fail(new ValueExpectedError(
                this.#state.kind === "object"
                    ? "Cannot write a key: the previous key has no value yet"
                    : "Cannot write a key outside of an object",
            ));
        }
        return this.#string("key", name);
    }

    /** Flushes the sink. */
    flush(): WriteResult {
        const refused = this.#refuse();
        if (refused !== undefined) {
            return refused;
        }
        try {
            this.#sink.flush();
        } catch (e) {
            return this.#fail(new FlushError(e));
        }
        return OK;
    }

    #begin(kind: ContainerKind): WriteResult {
        const token = kind === "object" ? "beginObject" : "beginArray";
        const refused = this.#refuse();
        if (refused !== undefined) {
            return refused;
        }
        if (this.#state.expectsKey()) {
            return this.#fail(new KeyExpectedError(tokenNames[token]));
        }
        const overflow = this.#state.checkEnter();
        if (overflow !== undefined) {
            return this.#fail(overflow);
        }

        const hookError = this.#prefix(token);
        if (hookError !== undefined) {
            return this.#fail(hookError);
        }
        this.#scratch.pushAscii(kind === "object" ? "{" : "[");
        const result = this.#writeToken();
        if (!result.ok) {
            return result;
        }

        this.#state.markEmitted();
        const error = this.#state.enter(kind);
        if (error !== undefined) {
            return this.#fail(error);
        }
        return OK;
    }

    #end(kind: ContainerKind): WriteResult {
        const token = kind === "object" ? "endObject" : "endArray";
        const refused = this.#refuse();
        if (refused !== undefined) {
            return refused;
        }
        const invalid = this.#state.checkLeave(kind);
        if (invalid !== undefined) {
            return this.#fail(invalid);
        }

        this.#scratch.clear();
        const state = this.#state.state;
        const hookError = this.#whitespace({
            token,
            depth: this.#state.depth - 1,
            separator: undefined,
            first: state === "objectStart" || state === "arrayStart",
        });
        if (hookError !== undefined) {
            return this.#fail(hookError);
        }
        this.#scratch.pushAscii(kind === "object" ? "}" : "]");
        const result = this.#writeToken();
        if (!result.ok) {
            return result;
        }

        const error = this.#state.leave(kind);
        if (error !== undefined) {
            return this.#fail(error);
        }
        return OK;
    }

    #scalar(token: TokenKind, render: () => string | WriterError): WriteResult {
        const refused = this.#refuse();
        if (refused !== undefined) {
            return refused;
        }
        if (this.#state.expectsKey()) {
            return this.#fail(new KeyExpectedError(tokenNames[token]));
        }
        const body = render();
        if (typeof body !== "string") {
            return this.#fail(body);
        }

        const hookError = this.#prefix(token);
        if (hookError !== undefined) {
            return this.#fail(hookError);
        }
        this.#scratch.pushAscii(body);
        const result = this.#writeToken();
        if (result.ok) {
            this.#state.markEmitted();
        }
        return result;
    }

    #string(token: "key" | "string", value: string | Uint8Array): WriteResult {
        const refused = this.#refuse();
        if (refused !== undefined) {
            return refused;
        }

        const bytes = typeof value === "string" ? encoder.encode(value) : value;
        const hookError = this.#prefix(token);
        if (hookError !== undefined) {
            return this.#fail(hookError);
        }
        this.#scratch.pushByte(QUOTE);
        escapeInto(this.#scratch, bytes, this.#config.escapeSolidus);
        this.#scratch.pushByte(QUOTE);
        const result = this.#writeToken();
        if (result.ok) {
            this.#state.markEmitted();
        }
        return result;
    }

    // Starts a new token in the scratch buffer with its separator and whitespace.
    #prefix(token: TokenKind): WhitespaceHookError | undefined {
        this.#scratch.clear();
        const separator = this.#state.separator();
        if (separator !== undefined) {
            this.#scratch.pushAscii(separator);
        }
        return this.#whitespace({ token, depth: this.#state.depth, separator, first: separator === undefined });
    }

    #whitespace(context: TokenContext): WhitespaceHookError | undefined {
        const hook = this.#config.whitespace;
        if (hook === undefined) {
            return undefined;
        }
        let text: string;
        try {
            text = hook(context);
        } catch (e) {
            this.#scratch.clear();
            return new WhitespaceHookError(e);
        }
        if (text.length > 0) {
            this.#scratch.push(encoder.encode(text));
        }
        return undefined;
    }

    #writeToken(): WriteResult {
        try {
            this.#sink.write(this.#scratch.data());
        } catch (e) {
            return this.#fail(new SinkError("Could not write to the sink", e));
        } finally {
            this.#scratch.clear();
        }
        return OK;
    }

    #refuse(): Err | undefined {
        if (this.#poison === undefined) {
            return undefined;
        }
        return err(new WriterPoisonedError(this.#poison));
    }

    #fail(error: WriterError): Err {
        const poisons = error.fatal && this.#poison === undefined;
        if (poisons) {
            this.#poison = error;
        }
        log.debug(`JSON writer operation failed: ${error.message}`, { code: error.code, depth: this.depth });
        if (poisons) {
            log.debug("JSON writer is now unusable", { code: error.code });
        }
        return err(error);
    }
}

function toBigInt(value: number | bigint): bigint | IntegerRangeError {
    if (typeof value === "bigint") {
        return value;
    }
    if (!Number.isInteger(value)) {
        return new IntegerRangeError(`${value} is not an integer`);
    }
    return BigInt(value);
}
