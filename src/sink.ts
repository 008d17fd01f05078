import * as fs from "node:fs";

import { ByteQueue } from "./byte_queue.js";
import { InterchangeError } from "./errors.js";

/** Byte-oriented destination of a {@link JsonWriter}.
 *
 * Both methods report failures by throwing; the writer turns them into failed results. A sink must accept
 * the whole chunk or throw.
 */
export interface Sink {
    write(chunk: Uint8Array): void;
    flush(): void;
}

/** Sink that keeps everything written to it in memory. */
export class BufferSink implements Sink {
    #queue: ByteQueue;

    constructor(initialCap: number = 256) {
        this.#queue = new ByteQueue(initialCap);
    }

    get length(): number {
        return this.#queue.length;
    }

    write(chunk: Uint8Array): void {
        this.#queue.push(chunk);
    }

    flush(): void {
    }

    /** Returns a copy of the bytes written so far. */
    data(): Uint8Array {
        return this.#queue.data();
    }

    /** Decodes the bytes written so far as UTF-8. Invalid sequences, which can only come from `Uint8Array`
     * strings, are replaced with U+FFFD. */
    text(): string {
        return new TextDecoder().decode(this.#queue.view());
    }

    clear(): void {
        this.#queue.clear();
    }
}

export interface FdSinkOptions {
    /** Number of buffered bytes above which a write drains the buffer to the descriptor (default 65536). */
    bufferSize?: number;
    /** Call `fsync` on the descriptor after draining in {@link FdSink.flush} (default `false`). */
    sync?: boolean;
}

/** Sink that writes to an open file descriptor through a write buffer.
 *
 * The sink does not own the descriptor: it never closes it.
 */
export class FdSink implements Sink {
    #fd: number;
    #pending: ByteQueue;
    #bufferSize: number;
    #sync: boolean;

    constructor(fd: number, options: FdSinkOptions = {}) {
        this.#fd = fd;
        this.#bufferSize = options.bufferSize ?? 65536;
        this.#sync = options.sync ?? false;
        this.#pending = new ByteQueue(Math.min(this.#bufferSize, 65536));
    }

    /** Number of bytes written but not yet handed to the descriptor. */
    get pending(): number {
        return this.#pending.length;
    }

    write(chunk: Uint8Array): void {
        this.#pending.push(chunk);
        if (this.#pending.length >= this.#bufferSize) {
            this.#drain();
        }
    }

    flush(): void {
        this.#drain();
        if (this.#sync) {
            fs.fsyncSync(this.#fd);
        }
    }

    #drain(): void {
        while (this.#pending.length > 0) {
            const written = fs.writeSync(this.#fd, this.#pending.view());
            if (written <= 0) {
                throw new InterchangeError(`Could not write to file descriptor ${this.#fd}: no bytes were written`);
            }
            this.#pending.shift(written);
        }
    }
}
