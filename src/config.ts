import { ConfigError } from "./errors.js";
import type { Separator } from "./json/state.js";

/** Kinds of tokens that {@link JsonWriter} emits, as reported to a {@link WhitespaceHook}. */
export type TokenKind =
    | "beginObject"
    | "endObject"
    | "beginArray"
    | "endArray"
    | "key"
    | "null"
    | "boolean"
    | "number"
    | "string";

/** Position of a token that is about to be written. */
export interface TokenContext {
    /** Kind of the token. */
    token: TokenKind;
    /** Nesting depth at which the token appears; a closing token reports the depth of its container's
     * parent, like the matching opening token. */
    depth: number;
    /** Separator written just before the token: `","` between siblings, `":"` between a key and its value.
     * Always `undefined` for a closing token. */
    separator: Separator | undefined;
    /** True if nothing precedes the token at its level. A closing token reports whether its container is
     * empty. */
    first: boolean;
}

/** Returns whitespace to insert after the separator and before the token itself.
 *
 * This is the hook for indentation: the writer never inserts whitespace on its own, and the returned text
 * is copied to the output unchanged.
 */
export type WhitespaceHook = (context: TokenContext) => string;

/** Options for {@link JsonWriter}. */
export interface WriterConfig {
    /** Write `/` as `\/` (default `true`). The escape is optional in JSON, but keeps the output safe to
     * embed in HTML `<script>` elements. */
    escapeSolidus?: boolean;
    /** Maximum number of nested containers (default 512). */
    maxDepth?: number;
    /** Whitespace inserted before every token (default: nothing). */
    whitespace?: WhitespaceHook;
}

export interface ResolvedWriterConfig {
    readonly escapeSolidus: boolean;
    readonly maxDepth: number;
    readonly whitespace: WhitespaceHook | undefined;
}

export const defaultMaxDepth = 512;

export function resolveWriterConfig(config: WriterConfig = {}): ResolvedWriterConfig {
    const maxDepth = config.maxDepth ?? defaultMaxDepth;
    if (!Number.isSafeInteger(maxDepth) || maxDepth < 1) {
        throw new ConfigError(`The "maxDepth" option must be a positive integer, got ${maxDepth}`);
    }
    return {
        escapeSolidus: config.escapeSolidus ?? true,
        maxDepth,
        whitespace: config.whitespace,
    };
}

const logLevels = ["error", "warn", "info", "verbose", "debug", "silly"] as const;
export type LogLevel = typeof logLevels[number];

/** Reads the log level from the `INTERCHANGE_LOG_LEVEL` environment variable (default `"info"`). */
export function logLevel(): LogLevel {
    const value = process.env.INTERCHANGE_LOG_LEVEL;
    if (value === undefined || value === "") {
        return "info";
    }
    const level = logLevels.find((l) => l === value);
    if (level === undefined) {
        throw new ConfigError(
            `Unknown value for INTERCHANGE_LOG_LEVEL: ${JSON.stringify(value)}, expected one of ${logLevels.join(", ")}`,
        );
    }
    return level;
}
