import {
    DepthOverflowError, MismatchedCloseError, MissingValueError, StructuralUnderflowError,
} from "../errors.js";
import { impossible } from "../util.js";

export type ContainerKind = "object" | "array";

/** State of one open container.
 *
 * - `arrayStart`: array opened, no element written yet
 * - `arrayNext`: at least one element written, the next one needs `,`
 * - `objectStart`: object opened, expecting the first key
 * - `objectValue`: key written, expecting its value after `:`
 * - `objectNext`: at least one member written, the next key needs `,`
 */
export type LevelState =
    | "arrayStart"
    | "arrayNext"
    | "objectStart"
    | "objectValue"
    | "objectNext";

export type Separator = "," | ":";

export type LeaveError = StructuralUnderflowError | MismatchedCloseError | MissingValueError;

export function levelKind(state: LevelState): ContainerKind {
    switch (state) {
        case "arrayStart":
        case "arrayNext":
            return "array";
        case "objectStart":
        case "objectValue":
        case "objectNext":
            return "object";
        default:
            throw impossible(state, "Impossible nesting level state");
    }
}

/** Tracks the open containers of a JSON document and where separators belong.
 *
 * The `check*` methods validate a transition without performing it, so that a caller can write the token
 * first and commit the transition only when the write succeeded.
 */
export class EmissionState {
    #levels: Array<LevelState>;
    #maxDepth: number;
    #hasOutput: boolean;

    constructor(maxDepth: number) {
        this.#levels = [];
        this.#maxDepth = maxDepth;
        this.#hasOutput = false;
    }

    /** Number of open containers; 0 at the document root. */
    get depth(): number {
        return this.#levels.length;
    }

    /** State of the innermost open container, or `undefined` at the root. */
    get state(): LevelState | undefined {
        return this.#levels[this.#levels.length - 1];
    }

    /** Kind of the innermost open container, or `undefined` at the root. */
    get kind(): ContainerKind | undefined {
        const state = this.state;
        return state !== undefined ? levelKind(state) : undefined;
    }

    /** True once any token has been emitted at the root level. */
    get hasOutput(): boolean {
        return this.#hasOutput;
    }

    checkEnter(): DepthOverflowError | undefined {
        if (this.#levels.length >= this.#maxDepth) {
            return new DepthOverflowError(this.#maxDepth);
        }
        return undefined;
    }

    enter(kind: ContainerKind): DepthOverflowError | undefined {
        const error = this.checkEnter();
        if (error !== undefined) {
            return error;
        }
        this.#levels.push(kind === "object" ? "objectStart" : "arrayStart");
        return undefined;
    }

    checkLeave(kind: ContainerKind): LeaveError | undefined {
        const state = this.state;
        if (state === undefined) {
            return new StructuralUnderflowError(`Cannot close an ${kind}: no container is open`);
        }
        const openKind = levelKind(state);
        if (openKind !== kind) {
            return new MismatchedCloseError(`Cannot close an ${kind}: the innermost open container is an ${openKind}`);
        }
        if (state === "objectValue") {
            return new MissingValueError("Cannot close an object: the last key has no value");
        }
        return undefined;
    }

    leave(kind: ContainerKind): LeaveError | undefined {
        const error = this.checkLeave(kind);
        if (error !== undefined) {
            return error;
        }
        this.#levels.pop();
        return undefined;
    }

    needsSeparator(): boolean {
        return this.separator() !== undefined;
    }

    separator(): Separator | undefined {
        switch (this.state) {
            case undefined:
            case "arrayStart":
            case "objectStart":
                return undefined;
            case "arrayNext":
            case "objectNext":
                return ",";
            case "objectValue":
                return ":";
        }
    }

    /** True if the next token must be an object member key. */
    expectsKey(): boolean {
        const state = this.state;
        return state === "objectStart" || state === "objectNext";
    }

    /** Records that a token (a scalar, a key, or a whole container) was written at the current level. */
    markEmitted(): void {
        const last = this.#levels.length - 1;
        if (last < 0) {
            this.#hasOutput = true;
            return;
        }
        switch (this.#levels[last]) {
            case "arrayStart":
            case "arrayNext":
                this.#levels[last] = "arrayNext";
                break;
            case "objectStart":
            case "objectNext":
                this.#levels[last] = "objectValue";
                break;
            case "objectValue":
                this.#levels[last] = "objectNext";
                break;
        }
    }
}
