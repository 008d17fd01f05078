export * from "./errors.js";
export type { Result, Ok, Err, WriteResult } from "./result.js";
export { OK, ok, err, unwrap } from "./result.js";
export type {
    WriterConfig, ResolvedWriterConfig, WhitespaceHook, TokenContext, TokenKind, LogLevel,
} from "./config.js";
export { resolveWriterConfig, defaultMaxDepth } from "./config.js";
export { resetLogger } from "./logger.js";

export { ByteQueue } from "./byte_queue.js";
export type { Sink, FdSinkOptions } from "./sink.js";
export { BufferSink, FdSink } from "./sink.js";

export { JsonWriter } from "./json/writer.js";
export type { ContainerKind, LevelState, Separator } from "./json/state.js";
export { EmissionState } from "./json/state.js";
export { escapeByte, escapeInto, escapeString } from "./json/escape.js";
export type { JsonValue, JsonObject, WriterFun } from "./json/value.js";
export { writeValue, writeJson, stringify } from "./json/value.js";

export type { BytePredicate } from "./ctype.js";
export * as ctype from "./ctype.js";
export type { StrLike } from "./str.js";
export { StrView } from "./str.js";
export { Sha1Digest } from "./digest.js";
