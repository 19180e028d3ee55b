/**
 * Base class for every failure the console knows how to report.
 * The `message` is the short diagnostic shown to the user.
 */
export class HbnbError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class UnknownKindError extends HbnbError {
    constructor(readonly kind: string) {
        super("class doesn't exist");
    }
}

export type MissingArgument = 'class name' | 'instance id' | 'attribute name' | 'value';

export class MissingArgumentError extends HbnbError {
    constructor(readonly argument: MissingArgument) {
        super(`${argument} missing`);
    }
}

export class NotFoundError extends HbnbError {
    constructor(readonly kind: string, readonly id: string) {
        super('no instance found');
    }
}

export class MalformedAttributeError extends HbnbError {
    constructor(readonly attribute: string, readonly expected: string) {
        super(`${attribute} must be ${/^[aeiou]/.test(expected) ? 'an' : 'a'} ${expected}`);
    }
}

/** The persisted document cannot be read back into a table. */
export class CorruptStoreError extends HbnbError {
    constructor(readonly filePath: string, readonly reason: string, options?: { cause?: unknown }) {
        super(`${filePath} is corrupt: ${reason}`, options);
    }
}

export class IOFailureError extends HbnbError {
    readonly reason: string;

    constructor(readonly filePath: string, readonly operation: 'load' | 'save', cause: unknown) {
        const reason = describeCause(cause);
        super(`unable to ${operation} ${filePath}: ${reason}`, { cause });
        this.reason = reason;
    }
}

/** Errors the interpreter reports and then keeps going. */
export function isRecoverable(error: unknown): error is HbnbError {
    return error instanceof UnknownKindError
        || error instanceof MissingArgumentError
        || error instanceof NotFoundError
        || error instanceof MalformedAttributeError
        || error instanceof IOFailureError;
}

function describeCause(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}
