/**
 * Error classes raised while lexing, parsing or evaluating a logical line
 */

export type ErrorKind =
    | 'LexicalError'
    | 'ParseError'
    | 'UndefinedMutationError'
    | 'ArityMismatchError'
    | 'TypeCoercionError'
    | 'NotCallableError'
    | 'UnknownConstructError';

/**
 * Base class for every error the interpreter raises itself
 */
export class MoonletError extends Error {
    readonly kind: ErrorKind;

    constructor(kind: ErrorKind, message: string) {
        super(message);
        this.kind = kind;
        this.name = kind;
    }
}

/**
 * Unrecognized character or unterminated string literal
 */
export class LexicalError extends MoonletError {
    readonly character: string | null;

    constructor(message: string, character: string | null = null) {
        super('LexicalError', message);
        this.character = character;
    }
}

/**
 * A grammar expectation was not met. `expected` names the missing construct.
 */
export class ParseError extends MoonletError {
    readonly expected: string;

    constructor(expected: string, message: string) {
        super('ParseError', message);
        this.expected = expected;
    }
}

export class UndefinedMutationError extends MoonletError {
    readonly variable: string;

    constructor(variable: string) {
        super('UndefinedMutationError', `Undefined variable '${variable}'.`);
        this.variable = variable;
    }
}

export class ArityMismatchError extends MoonletError {
    readonly expected: number;
    readonly received: number;

    constructor(functionName: string, expected: number, received: number) {
        super('ArityMismatchError', `Argument count mismatch calling '${functionName}': expected ${expected}, got ${received}`);
        this.expected = expected;
        this.received = received;
    }
}

export class TypeCoercionError extends MoonletError {
    constructor(message: string) {
        super('TypeCoercionError', message);
    }
}

export class NotCallableError extends MoonletError {
    constructor(description: string) {
        super('NotCallableError', `Attempt to call a non-function value (${description})`);
    }
}

/**
 * An AST node reached the executor with no matching case
 */
export class UnknownConstructError extends MoonletError {
    constructor(construct: string) {
        super('UnknownConstructError', `Unknown ${construct}`);
    }
}
