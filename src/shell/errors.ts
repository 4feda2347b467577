/**
 * @file Shell Error Taxonomy
 *
 * Command handlers throw these; the interpreter converts them into a
 * stderr line and exit code at the dispatch boundary.
 *
 * @module
 */

export abstract class ShellError extends Error {
    public abstract readonly exitCode: number;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Malformed quoting in the input line. */
export class ParseError extends ShellError {
    public readonly exitCode: number = 2;
}

/** Required argument missing. */
export class OperandError extends ShellError {
    public readonly exitCode: number = 2;
}

/** Path does not exist. */
export class NotFoundError extends ShellError {
    public readonly exitCode: number = 1;
}

/** File given where a directory was expected, or the reverse. */
export class TypeMismatchError extends ShellError {
    public readonly exitCode: number = 1;
}

/** Malformed redirection or heredoc token sequence. */
export class RedirectSyntaxError extends ShellError {
    public readonly exitCode: number = 2;
}

/** Underlying read, write or permission failure. */
export class IOFailure extends ShellError {
    public readonly exitCode: number = 1;
}

export class UnknownCommandError extends ShellError {
    public readonly exitCode: number = 127;
}

/**
 * Failure with a caller-chosen exit code, for utility behaviors that do
 * not fit the taxonomy (`ls` reports a missing path with exit 2).
 */
export class CommandFailure extends ShellError {
    public readonly exitCode: number;

    constructor(message: string, exitCode: number) {
        super(message);
        this.exitCode = exitCode;
    }
}

/**
 * Convert unknown thrown values into display-safe messages.
 */
export function errorMessage_get(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Read the `code` property carried by Node system errors.
 */
export function errorCode_get(error: unknown): string | null {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return null;
}
