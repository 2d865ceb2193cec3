/**
 * Raised by a builtin when its call arguments have the wrong shape.
 */
export class ArgumentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ArgumentError";
    }
}

/**
 * Raised by a builtin function or variable the runtime does not support.
 */
export class UnimplementedError extends Error {
    constructor(message: string = "not implemented") {
        super(message);
        this.name = "UnimplementedError";
    }
}
