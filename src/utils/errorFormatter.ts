/**
 * Utility for turning errors raised on a logical line into report records
 */

import { MoonletError, type ErrorKind } from '../classes/exceptions';

export type LineErrorKind = ErrorKind | 'HostError';

/**
 * One failed logical line
 */
export interface LineError {
    lineNumber: number; // 1-based index of the logical line
    line: string;       // Logical line text
    kind: LineErrorKind;
    message: string;
}

/**
 * Build a LineError from anything thrown while running a line.
 * Errors thrown by host code (builtins, the runtime itself) are HostErrors.
 */
export function toLineError(error: unknown, lineNumber: number, line: string): LineError {
    if (error instanceof MoonletError) {
        return { lineNumber, line, kind: error.kind, message: error.message };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { lineNumber, line, kind: 'HostError', message };
}

/**
 * Format a LineError for display
 *
 * @example
 * Error executing line 2: Unexpected character: @ [LexicalError]
 *   > x = @
 */
export function formatLineError(error: LineError): string {
    return `Error executing line ${error.lineNumber}: ${error.message} [${error.kind}]\n  > ${error.line}`;
}
