/**
 * Parser for return statements
 * Handles: return value [, value]*
 */

import { TokenStream } from '../classes/TokenStream';
import { TokenKind } from '../classes/Lexer';
import type { Expression, ReturnStatement } from '../types/Ast.type';
import { parseExpression } from './ExpressionParser';

/**
 * @param stream - TokenStream positioned just after the 'return' keyword
 */
export function parseReturn(stream: TokenStream): ReturnStatement {
    const values: Expression[] = [parseExpression(stream)];
    while (stream.match(TokenKind.COMMA)) {
        values.push(parseExpression(stream));
    }
    return { type: 'return', values };
}
