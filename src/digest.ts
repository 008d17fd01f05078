import { createHash } from "node:crypto";
import { Base64 } from "js-base64";

import { DigestError, OutOfRangeError } from "./errors.js";

/** A SHA-1 digest: a 20-byte value ordered byte by byte.
 *
 * Digests are compared and copied by value; the bytes are never shared with the array passed to the
 * constructor.
 */
export class Sha1Digest {
    /** Size of a digest in bytes (160 bits). */
    static readonly SIZE = 20;

    #data: Uint8Array;

    /** Copies exactly {@link Sha1Digest.SIZE} bytes from `data`, or creates an all-zero digest. */
    constructor(data?: Uint8Array) {
        this.#data = new Uint8Array(Sha1Digest.SIZE);
        if (data !== undefined) {
            if (data.byteLength !== Sha1Digest.SIZE) {
                throw new DigestError(`A SHA-1 digest has ${Sha1Digest.SIZE} bytes, got ${data.byteLength}`);
            }
            this.#data.set(data);
        }
    }

    /** Computes the digest of `data`; a string is hashed as its UTF-8 bytes. */
    static compute(data: string | Uint8Array): Sha1Digest {
        const hash = createHash("sha1");
        hash.update(data);
        return new Sha1Digest(hash.digest());
    }

    static fromHex(hex: string): Sha1Digest {
        if (!/^[0-9a-fA-F]{40}$/.test(hex)) {
            throw new DigestError(`Expected ${2 * Sha1Digest.SIZE} hexadecimal digits, got ${JSON.stringify(hex)}`);
        }
        const data = new Uint8Array(Sha1Digest.SIZE);
        for (let i = 0; i < Sha1Digest.SIZE; ++i) {
            data[i] = parseInt(hex.substring(2 * i, 2 * i + 2), 16);
        }
        return new Sha1Digest(data);
    }

    static fromBase64(base64: string): Sha1Digest {
        if (!Base64.isValid(base64)) {
            throw new DigestError(`Invalid base64 digest ${JSON.stringify(base64)}`);
        }
        return new Sha1Digest(Base64.toUint8Array(base64));
    }

    /** Comparison function for sorting digests in ascending byte order. */
    static compare(a: Sha1Digest, b: Sha1Digest): number {
        return a.compare(b);
    }

    /** Returns -1, 0 or 1 as this digest sorts before, equal to or after `other`. */
    compare(other: Sha1Digest): number {
        for (let i = 0; i < Sha1Digest.SIZE; ++i) {
            if (this.#data[i] !== other.#data[i]) {
                return this.#data[i] < other.#data[i] ? -1 : 1;
            }
        }
        return 0;
    }

    equals(other: Sha1Digest): boolean {
        return this.compare(other) === 0;
    }

    lessThan(other: Sha1Digest): boolean {
        return this.compare(other) < 0;
    }

    greaterThan(other: Sha1Digest): boolean {
        return this.compare(other) > 0;
    }

    at(position: number): number {
        if (!Number.isInteger(position) || position < 0 || position >= Sha1Digest.SIZE) {
            throw new OutOfRangeError(`Position ${position} is outside of a ${Sha1Digest.SIZE}-byte digest`);
        }
        return this.#data[position];
    }

    front(): number {
        return this.#data[0];
    }

    back(): number {
        return this.#data[Sha1Digest.SIZE - 1];
    }

    /** Returns a copy of the digest bytes. */
    data(): Uint8Array {
        return this.#data.slice();
    }

    clone(): Sha1Digest {
        return new Sha1Digest(this.#data);
    }

    isZero(): boolean {
        return this.#data.every((byte) => byte === 0);
    }

    /** Sets every byte to zero. */
    clear(): void {
        this.#data.fill(0);
    }

    /** Exchanges the bytes of this digest with those of `other`. */
    swap(other: Sha1Digest): void {
        const data = this.#data;
        this.#data = other.#data;
        other.#data = data;
    }

    toHex(): string {
        let hex = "";
        for (const byte of this.#data) {
            hex += byte.toString(16).padStart(2, "0");
        }
        return hex;
    }

    toBase64(): string {
        return Base64.fromUint8Array(this.#data);
    }

    toString(): string {
        return this.toHex();
    }
}
