import type { WriterConfig } from "../config.js";
import { UnclosedContainerError } from "../errors.js";
import type { Result, WriteResult } from "../result.js";
import { err, ok } from "../result.js";
import { BufferSink } from "../sink.js";
import { JsonWriter } from "./writer.js";

/** JavaScript values that {@link writeValue} can write. */
export type JsonValue =
    | null
    | boolean
    | number
    | bigint
    | string
    | Uint8Array
    | Array<JsonValue>
    | JsonObject;

export type JsonObject = { [key: string]: JsonValue | undefined };

export type WriterFun<T> = (w: JsonWriter, value: T) => WriteResult;

const maxInt64 = 9223372036854775807n;

/** Writes a whole value tree, stopping at the first failure.
 *
 * Object members are written in property order, skipping members whose value is `undefined`. A `bigint`
 * above the signed 64-bit range is written as an unsigned integer.
 */
export function writeValue(w: JsonWriter, value: JsonValue): WriteResult {
    if (value === null) {
        return w.writeNull();
    } else if (typeof value === "boolean") {
        return w.writeBoolean(value);
    } else if (typeof value === "number") {
        return w.writeNumber(value);
    } else if (typeof value === "bigint") {
        return value > maxInt64 ? w.writeUnsigned(value) : w.writeInteger(value);
    } else if (typeof value === "string" || value instanceof Uint8Array) {
        return w.writeString(value);
    } else if (Array.isArray(value)) {
        return writeArray(w, value);
    } else {
        return writeObject(w, value);
    }
}

function writeArray(w: JsonWriter, values: Array<JsonValue>): WriteResult {
    let result = w.beginArray();
    for (let i = 0; result.ok && i < values.length; ++i) {
        result = writeValue(w, values[i]);
    }
    return result.ok ? w.endArray() : result;
}

function writeObject(w: JsonWriter, obj: JsonObject): WriteResult {
    let result = w.beginObject();
    for (const [key, value] of Object.entries(obj)) {
        if (!result.ok) {
            break;
        }
        if (value === undefined) {
            continue;
        }
        result = w.writeKey(key);
        if (result.ok) {
            result = writeValue(w, value);
        }
    }
    return result.ok ? w.endObject() : result;
}

/** Runs `fun` against a fresh writer and returns the complete document it wrote as a string. */
export function writeJson<T>(value: T, fun: WriterFun<T>, config?: WriterConfig): Result<string> {
    const sink = new BufferSink();
    const w = new JsonWriter(sink, config);
    const result = fun(w, value);
    if (!result.ok) {
        return result;
    }
    if (w.depth !== 0) {
        return err(new UnclosedContainerError(w.depth));
    }
    return ok(sink.text());
}

/** Serializes a value tree to a JSON string.
 *
 * `Uint8Array` strings are written without UTF-8 validation, and the document is decoded leniently: invalid
 * sequences in them come back as U+FFFD. Write to a {@link BufferSink} and read its bytes to keep them as-is.
 */
export function stringify(value: JsonValue, config?: WriterConfig): Result<string> {
    return writeJson(value, writeValue, config);
}
