/**
 * Parser for if blocks
 * Handles: if cond then ... [else ...] end
 */

import { TokenStream } from '../classes/TokenStream';
import { TokenKind } from '../classes/Lexer';
import type { IfStatement, Statement } from '../types/Ast.type';
import { parseExpression } from './ExpressionParser';
import { parseBlockBody, type StatementParserContext } from './ParserUtils';

/**
 * Parse an if block
 *
 * @param stream - TokenStream positioned just after the 'if' keyword
 * @param context - Context used to parse the branch statements
 */
export function parseIfBlock(stream: TokenStream, context: StatementParserContext): IfStatement {
    const condition = parseExpression(stream);
    stream.expect(TokenKind.THEN, "'then'", "Expected 'then' after condition.");

    const thenBody = parseBlockBody(stream, context, [TokenKind.ELSE, TokenKind.END]);

    let elseBody: Statement[] | null = null;
    if (stream.match(TokenKind.ELSE)) {
        elseBody = parseBlockBody(stream, context, [TokenKind.END]);
    }

    stream.expect(TokenKind.END, "'end'", "Expected 'end' after if statement.");
    return { type: 'if', condition, thenBody, elseBody };
}
