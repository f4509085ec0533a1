/**
 * Parser class for Moonlet
 *
 * Turns one logical line into exactly one Statement by recursive descent.
 * Tokens left over after the statement completes are not an error; they are
 * available through trailingTokens() for callers that want to report them.
 */

import { Lexer, TokenKind } from './Lexer';
import type { Token } from './Lexer';
import { TokenStream } from './TokenStream';
import type { Statement } from '../types/Ast.type';
import {
    parseExpression,
    parseFunctionDeclaration,
    parseIfBlock,
    parseReturn,
    parseAssignment,
    isAssignmentStart,
    type StatementParserContext
} from '../parsers';

export class Parser {
    private readonly stream: TokenStream;
    private readonly context: StatementParserContext;

    /**
     * @param source - A logical line, or tokens already produced by the Lexer
     */
    constructor(source: string | readonly Token[]) {
        const tokens = typeof source === 'string' ? Lexer.tokenize(source) : source;
        this.stream = new TokenStream(tokens);
        this.context = {
            parseStatement: (stream) => this.parseStatement(stream)
        };
    }

    /**
     * Parse the top-level statement of the line
     */
    parse(): Statement {
        return this.parseStatement(this.stream);
    }

    /**
     * Tokens the statement did not consume
     */
    trailingTokens(): Token[] {
        return this.stream.remaining();
    }

    private parseStatement(stream: TokenStream): Statement {
        if (stream.match(TokenKind.LOCAL)) {
            if (stream.match(TokenKind.FUNCTION)) {
                return parseFunctionDeclaration(stream, this.context, true);
            }
            // `local x = ...` declares in the current scope, same as a bare assignment
        }

        if (stream.match(TokenKind.FUNCTION)) {
            return parseFunctionDeclaration(stream, this.context, false);
        }

        if (stream.match(TokenKind.IF)) {
            return parseIfBlock(stream, this.context);
        }

        if (stream.match(TokenKind.RETURN)) {
            return parseReturn(stream);
        }

        if (isAssignmentStart(stream)) {
            return parseAssignment(stream);
        }

        return { type: 'expression', expression: parseExpression(stream) };
    }
}
