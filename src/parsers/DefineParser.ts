/**
 * Parser for function declarations
 * Handles: local function name(a, b) ... end
 *          function name(a, b) ... end
 */

import { TokenStream } from '../classes/TokenStream';
import { TokenKind } from '../classes/Lexer';
import type { FunctionDeclaration } from '../types/Ast.type';
import { parseBlockBody, parseNameList, type StatementParserContext } from './ParserUtils';

/**
 * Parse a function declaration
 *
 * @param stream - TokenStream positioned just after the 'function' keyword
 * @param context - Context used to parse the body statements
 * @param isLocal - Whether the declaration was written with 'local'
 * @returns Parsed FunctionDeclaration
 */
export function parseFunctionDeclaration(
    stream: TokenStream,
    context: StatementParserContext,
    isLocal: boolean
): FunctionDeclaration {
    const name = stream.expect(TokenKind.IDENTIFIER, 'function name', 'Expected function name.').text;

    stream.expect(TokenKind.LPAREN, "'('", "Expected '(' after function name.");
    const params = stream.check(TokenKind.RPAREN)
        ? []
        : parseNameList(stream, 'parameter name', 'Expected parameter name.');
    stream.expect(TokenKind.RPAREN, "')'", "Expected ')' after parameters.");

    const body = parseBlockBody(stream, context, [TokenKind.END]);
    stream.expect(TokenKind.END, "'end'", "Expected 'end' after function body.");

    return { type: 'function', name, params, body, isLocal };
}
