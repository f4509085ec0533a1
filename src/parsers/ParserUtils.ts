/**
 * Parser utilities and shared helper types
 */

import { TokenStream } from '../classes/TokenStream';
import { TokenKind } from '../classes/Lexer';
import type { Statement } from '../types/Ast.type';

/**
 * Callbacks block parsers use to recurse into nested statements
 */
export interface StatementParserContext {
    parseStatement: (stream: TokenStream) => Statement;
}

/**
 * Parse statements until one of the stop kinds (or the end of input) is reached.
 * The stop token is left unconsumed.
 */
export function parseBlockBody(
    stream: TokenStream,
    context: StatementParserContext,
    stopKinds: readonly TokenKind[]
): Statement[] {
    const body: Statement[] = [];
    while (!stream.isAtEnd() && !stopKinds.some((kind) => stream.check(kind))) {
        body.push(context.parseStatement(stream));
    }
    return body;
}

/**
 * Parse a comma-separated, non-empty list of identifiers
 */
export function parseNameList(stream: TokenStream, expected: string, message: string): string[] {
    const names: string[] = [];
    do {
        names.push(stream.expect(TokenKind.IDENTIFIER, expected, message).text);
    } while (stream.match(TokenKind.COMMA));
    return names;
}
