import { ByteQueue } from "../byte_queue.js";

const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const SOLIDUS = 0x2f;

const hexDigits = "0123456789ABCDEF";

function ascii(text: string): Uint8Array {
    const bytes = new Uint8Array(text.length);
    for (let i = 0; i < text.length; ++i) {
        bytes[i] = text.charCodeAt(i);
    }
    return bytes;
}

// Replacement bytes indexed by input byte; `undefined` means the byte is copied unchanged.
const escapeTable: ReadonlyArray<Uint8Array | undefined> = (() => {
    const table = new Array<Uint8Array | undefined>(256).fill(undefined);
    for (let byte = 0; byte <= 0x1f; ++byte) {
        table[byte] = ascii("\\u00" + hexDigits[byte >> 4] + hexDigits[byte & 0xf]);
    }
    table[QUOTE] = ascii("\\\"");
    table[BACKSLASH] = ascii("\\\\");
    table[SOLIDUS] = ascii("\\/");
    table[0x08] = ascii("\\b");
    table[0x0c] = ascii("\\f");
    table[0x0a] = ascii("\\n");
    table[0x0d] = ascii("\\r");
    table[0x09] = ascii("\\t");
    return table;
})();

/** Returns the escape sequence for `byte`, or `undefined` if the byte is written as is. */
export function escapeByte(byte: number, escapeSolidus: boolean = true): Uint8Array | undefined {
    if (byte === SOLIDUS && !escapeSolidus) {
        return undefined;
    }
    return escapeTable[byte];
}

/** Appends the escaped form of `input` to `output`, without the surrounding quotes. Bytes of multi-byte
 * UTF-8 sequences are copied without validation. */
export function escapeInto(output: ByteQueue, input: Uint8Array, escapeSolidus: boolean = true): void {
    let start = 0;
    for (let i = 0; i < input.byteLength; ++i) {
        const replacement = escapeByte(input[i], escapeSolidus);
        if (replacement === undefined) {
            continue;
        }
        if (i > start) {
            output.push(input.subarray(start, i));
        }
        output.push(replacement);
        start = i + 1;
    }
    if (start < input.byteLength) {
        output.push(input.subarray(start));
    }
}

/** Returns the escaped form of `input` as bytes. A string is encoded as UTF-8 first. */
export function escapeString(input: string | Uint8Array, escapeSolidus: boolean = true): Uint8Array {
    const bytes = typeof input === "string" ? new TextEncoder().encode(input) : input;
    const output = new ByteQueue(bytes.byteLength + 16);
    escapeInto(output, bytes, escapeSolidus);
    return output.data();
}
