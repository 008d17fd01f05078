import type { BytePredicate } from "./ctype.js";
import * as ctype from "./ctype.js";
import { OutOfRangeError } from "./errors.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export type StrLike = StrView | string | Uint8Array;

/** Non-owning view of a NUL-terminated byte string.
 *
 * The view refers to bytes of a buffer that it does not own, starting at an offset and running up to the
 * first NUL byte (or the end of the buffer). Nothing is copied: the view sees later changes to the buffer,
 * and keeping the buffer alive and unchanged while the view is used is up to the caller. A view without a
 * buffer is empty.
 */
export class StrView {
    /** Returned by the search methods when nothing was found. */
    static readonly NPOS = -1;

    #buffer: Uint8Array | null;
    #offset: number;

    constructor(buffer: Uint8Array | null = null, offset: number = 0) {
        if (buffer !== null && (offset < 0 || offset > buffer.byteLength)) {
            throw new OutOfRangeError(`Offset ${offset} is outside of a buffer of ${buffer.byteLength} bytes`);
        }
        this.#buffer = buffer;
        this.#offset = offset;
    }

    /** Encodes `text` as UTF-8 into a new NUL-terminated buffer and returns a view of it. */
    static from(text: string): StrView {
        const encoded = encoder.encode(text);
        const buffer = new Uint8Array(encoded.byteLength + 1);
        buffer.set(encoded);
        return new StrView(buffer);
    }

    /** Byte length, not counting the terminating NUL. */
    get length(): number {
        const buffer = this.#buffer;
        if (buffer === null) {
            return 0;
        }
        const end = buffer.indexOf(0, this.#offset);
        return (end < 0 ? buffer.byteLength : end) - this.#offset;
    }

    get empty(): boolean {
        return this.#buffer === null || this.#offset >= this.#buffer.byteLength || this.#buffer[this.#offset] === 0;
    }

    /** Detaches the view from its buffer; the buffer itself is left untouched. */
    clear(): void {
        this.#buffer = null;
        this.#offset = 0;
    }

    /** Returns the viewed bytes as a subarray of the buffer, without copying. */
    bytes(): Uint8Array {
        if (this.#buffer === null) {
            return new Uint8Array(0);
        }
        return this.#buffer.subarray(this.#offset, this.#offset + this.length);
    }

    /** Returns the byte at `pos`, or `undefined` past the end. */
    byteAt(pos: number): number | undefined {
        if (this.#buffer === null || pos < 0 || pos >= this.length) {
            return undefined;
        }
        return this.#buffer[this.#offset + pos];
    }

    /** Returns the byte at `pos`, throwing {@link OutOfRangeError} if `pos >= length`. */
    at(pos: number): number {
        const byte = this.byteAt(pos);
        if (byte === undefined) {
            throw new OutOfRangeError(`Position ${pos} is outside of a string of ${this.length} bytes`);
        }
        return byte;
    }

    front(): number | undefined {
        return this.byteAt(0);
    }

    back(): number | undefined {
        return this.byteAt(this.length - 1);
    }

    /** Removes the last byte by writing a NUL over it in the referenced buffer. */
    popBack(): void {
        const length = this.length;
        if (this.#buffer !== null && length > 0) {
            this.#buffer[this.#offset + length - 1] = 0;
        }
    }

    /** Compares bytes as unsigned values, like `strcmp`; returns -1, 0 or 1. */
    compare(other: StrLike): number {
        const a = this.bytes();
        const b = toBytes(other);
        const n = Math.min(a.byteLength, b.byteLength);
        for (let i = 0; i < n; ++i) {
            if (a[i] !== b[i]) {
                return a[i] < b[i] ? -1 : 1;
            }
        }
        return Math.sign(a.byteLength - b.byteLength);
    }

    equals(other: StrLike): boolean {
        return this.compare(other) === 0;
    }

    /** Copies up to `length` bytes starting at `pos` into `target`, padding the rest of the `length` bytes
     * with NULs, like `strncpy`. */
    copy(target: Uint8Array, length: number, pos: number = 0): void {
        const source = this.bytes().subarray(Math.min(pos, this.length));
        const count = Math.min(length, target.byteLength);
        const copied = Math.min(count, source.byteLength);
        target.set(source.subarray(0, copied));
        target.fill(0, copied, count);
    }

    /** Returns the position of the first occurrence of a byte or a byte string at or after `pos`, or
     * {@link StrView.NPOS}. */
    find(needle: number | StrLike, pos: number = 0): number {
        const haystack = this.bytes();
        if (pos < 0 || pos > haystack.byteLength) {
            return StrView.NPOS;
        }
        if (typeof needle === "number") {
            return haystack.indexOf(needle, pos);
        }
        const bytes = toBytes(needle);
        const last = haystack.byteLength - bytes.byteLength;
        outer: for (let i = pos; i <= last; ++i) {
            for (let j = 0; j < bytes.byteLength; ++j) {
                if (haystack[i + j] !== bytes[j]) {
                    continue outer;
                }
            }
            return i;
        }
        return StrView.NPOS;
    }

    /** Returns the position of the last occurrence of a byte at or after `pos`, or {@link StrView.NPOS}. */
    rfind(byte: number | string, pos: number = 0): number {
        const found = this.bytes().lastIndexOf(toByte(byte));
        return found >= pos ? found : StrView.NPOS;
    }

    /** Returns a view of the bytes from `pos` on, sharing the buffer. */
    substr(pos: number): StrView {
        if (this.#buffer === null) {
            return new StrView();
        }
        return new StrView(this.#buffer, this.#offset + Math.max(0, Math.min(pos, this.length)));
    }

    /** Returns a view starting at the first occurrence of `byte`, or an empty view. */
    substrFrom(byte: number | string): StrView {
        const pos = this.find(toByte(byte));
        return pos !== StrView.NPOS ? this.substr(pos) : new StrView();
    }

    /** Returns a view starting just after the first occurrence of `byte`, or an empty view. */
    substrAfter(byte: number | string): StrView {
        const pos = this.find(toByte(byte));
        return pos !== StrView.NPOS ? this.substr(pos + 1) : new StrView();
    }

    hasPrefix(prefix: StrLike | null | undefined): boolean {
        if (prefix === null || prefix === undefined) {
            return false;
        }
        const bytes = toBytes(prefix);
        return bytes.byteLength <= this.length && this.find(bytes) === 0;
    }

    hasSuffix(suffix: StrLike | null | undefined): boolean {
        if (suffix === null || suffix === undefined) {
            return false;
        }
        const bytes = toBytes(suffix);
        const start = this.length - bytes.byteLength;
        return start >= 0 && this.find(bytes, start) === start;
    }

    /** Tests `predicate` on every byte; true for an empty view. */
    is(predicate: BytePredicate): boolean {
        for (const byte of this.bytes()) {
            if (!predicate(byte)) {
                return false;
            }
        }
        return true;
    }

    isAlnum(): boolean { return this.is(ctype.isAlnum); }
    isAlpha(): boolean { return this.is(ctype.isAlpha); }
    isAscii(): boolean { return this.is(ctype.isAscii); }
    isBlank(): boolean { return this.is(ctype.isBlank); }
    isCntrl(): boolean { return this.is(ctype.isCntrl); }
    isDigit(): boolean { return this.is(ctype.isDigit); }
    isGraph(): boolean { return this.is(ctype.isGraph); }
    isLower(): boolean { return this.is(ctype.isLower); }
    isPrint(): boolean { return this.is(ctype.isPrint); }
    isPunct(): boolean { return this.is(ctype.isPunct); }
    isSpace(): boolean { return this.is(ctype.isSpace); }
    isUpper(): boolean { return this.is(ctype.isUpper); }
    isXdigit(): boolean { return this.is(ctype.isXdigit); }

    [Symbol.iterator](): Iterator<number> {
        return this.bytes()[Symbol.iterator]();
    }

    /** Decodes the viewed bytes as UTF-8. */
    toString(): string {
        return decoder.decode(this.bytes());
    }
}

// Byte string of a comparison operand; a `Uint8Array` ends at its first NUL byte.
function toBytes(value: StrLike): Uint8Array {
    if (value instanceof StrView) {
        return value.bytes();
    } else if (typeof value === "string") {
        return encoder.encode(value);
    }
    const end = value.indexOf(0);
    return end < 0 ? value : value.subarray(0, end);
}

function toByte(value: number | string): number {
    if (typeof value === "number") {
        return value;
    }
    const bytes = encoder.encode(value);
    if (bytes.byteLength !== 1) {
        throw new RangeError(`Expected a single-byte character, got ${JSON.stringify(value)}`);
    }
    return bytes[0];
}
