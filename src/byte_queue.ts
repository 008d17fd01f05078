/** Growable FIFO of bytes: bytes are appended at the back and consumed from the front. */
export class ByteQueue {
    #array: Uint8Array;
    #shiftPos: number;
    #pushPos: number;

    constructor(initialCap: number = 64) {
        this.#array = new Uint8Array(new ArrayBuffer(Math.max(1, initialCap)));
        this.#shiftPos = 0;
        this.#pushPos = 0;
    }

    get length(): number {
        return this.#pushPos - this.#shiftPos;
    }

    /** Returns a copy of the queued bytes. */
    data(): Uint8Array {
        return this.#array.slice(this.#shiftPos, this.#pushPos);
    }

    /** Returns the queued bytes without copying; the view is invalidated by the next push or shift. */
    view(): Uint8Array {
        return this.#array.subarray(this.#shiftPos, this.#pushPos);
    }

    push(chunk: Uint8Array): void {
        this.#ensurePush(chunk.byteLength);
        this.#array.set(chunk, this.#pushPos);
        this.#pushPos += chunk.byteLength;
    }

    pushByte(byte: number): void {
        this.#ensurePush(1);
        this.#array[this.#pushPos++] = byte;
    }

    /** Appends a string made only of ASCII characters, one byte per character. */
    pushAscii(text: string): void {
        this.#ensurePush(text.length);
        for (let i = 0; i < text.length; ++i) {
            this.#array[this.#pushPos++] = text.charCodeAt(i);
        }
    }

    #ensurePush(pushLength: number): void {
        if (this.#pushPos + pushLength <= this.#array.byteLength) {
            return;
        }

        const filledLength = this.#pushPos - this.#shiftPos;
        if (
            filledLength + pushLength <= this.#array.byteLength &&
            2*this.#pushPos >= this.#array.byteLength
        ) {
            this.#array.copyWithin(0, this.#shiftPos, this.#pushPos);
        } else {
            let newCap = this.#array.byteLength;
            do {
                newCap *= 2;
            } while (filledLength + pushLength > newCap);

            const newArray = new Uint8Array(new ArrayBuffer(newCap));
            newArray.set(this.#array.subarray(this.#shiftPos, this.#pushPos), 0);
            this.#array = newArray;
        }

        this.#pushPos = filledLength;
        this.#shiftPos = 0;
    }

    shift(length: number): void {
        this.#shiftPos = Math.min(this.#shiftPos + length, this.#pushPos);
        if (this.#shiftPos === this.#pushPos) {
            this.#shiftPos = 0;
            this.#pushPos = 0;
        }
    }

    clear(): void {
        this.#shiftPos = 0;
        this.#pushPos = 0;
    }
}
