/**
 * Parser for assignments
 * Handles: name = expr
 *          a, b, c = expr
 *
 * Exactly one right-hand expression is parsed; several targets are filled
 * from that expression's multiple results.
 */

import { TokenStream } from '../classes/TokenStream';
import { TokenKind } from '../classes/Lexer';
import type { Assignment } from '../types/Ast.type';
import { parseExpression } from './ExpressionParser';
import { parseNameList } from './ParserUtils';

/**
 * Whether the stream is positioned at the start of an assignment
 */
export function isAssignmentStart(stream: TokenStream): boolean {
    if (!stream.check(TokenKind.IDENTIFIER)) {
        return false;
    }
    const following = stream.peek(1).kind;
    return following === TokenKind.ASSIGN || following === TokenKind.COMMA;
}

export function parseAssignment(stream: TokenStream): Assignment {
    const targets = parseNameList(stream, 'variable name', 'Expected variable name.');
    stream.expect(TokenKind.ASSIGN, "'='", "Expected '=' after variable name(s).");
    const value = parseExpression(stream);
    return { type: 'assignment', targets, value };
}
