/**
 * Parser for expressions
 * Converts tokens into Expression AST nodes
 *
 * Precedence, lowest to highest:
 *   or → and → == ~= < <= > >= → .. → + - → * / → not, unary - → primary
 * Every binary level is left-associative.
 */

import { TokenStream } from '../classes/TokenStream';
import { TokenKind } from '../classes/Lexer';
import type { Token } from '../classes/Lexer';
import { ParseError } from '../classes/exceptions';
import type { Expression, BinaryOperator, LogicalOperator } from '../types/Ast.type';

const RELATIONAL_OPERATORS: ReadonlyMap<TokenKind, BinaryOperator> = new Map<TokenKind, BinaryOperator>([
    [TokenKind.EQ, '=='],
    [TokenKind.NE, '~='],
    [TokenKind.LT, '<'],
    [TokenKind.LTE, '<='],
    [TokenKind.GT, '>'],
    [TokenKind.GTE, '>='],
]);

const ADDITIVE_OPERATORS: ReadonlyMap<TokenKind, BinaryOperator> = new Map<TokenKind, BinaryOperator>([
    [TokenKind.PLUS, '+'],
    [TokenKind.MINUS, '-'],
]);

const MULTIPLICATIVE_OPERATORS: ReadonlyMap<TokenKind, BinaryOperator> = new Map<TokenKind, BinaryOperator>([
    [TokenKind.MULTIPLY, '*'],
    [TokenKind.DIVIDE, '/'],
]);

const CONCAT_OPERATORS: ReadonlyMap<TokenKind, BinaryOperator> = new Map<TokenKind, BinaryOperator>([
    [TokenKind.CONCAT, '..'],
]);

/**
 * Parse an expression from TokenStream
 *
 * @param stream - TokenStream positioned at the start of the expression
 * @returns Expression AST node
 */
export function parseExpression(stream: TokenStream): Expression {
    return parseOr(stream);
}

function parseOr(stream: TokenStream): Expression {
    return parseLogicalLevel(stream, TokenKind.OR, 'or', parseAnd);
}

function parseAnd(stream: TokenStream): Expression {
    return parseLogicalLevel(stream, TokenKind.AND, 'and', parseRelational);
}

function parseRelational(stream: TokenStream): Expression {
    return parseBinaryLevel(stream, RELATIONAL_OPERATORS, parseConcat);
}

function parseConcat(stream: TokenStream): Expression {
    return parseBinaryLevel(stream, CONCAT_OPERATORS, parseAdditive);
}

function parseAdditive(stream: TokenStream): Expression {
    return parseBinaryLevel(stream, ADDITIVE_OPERATORS, parseMultiplicative);
}

function parseMultiplicative(stream: TokenStream): Expression {
    return parseBinaryLevel(stream, MULTIPLICATIVE_OPERATORS, parseUnary);
}

function parseLogicalLevel(
    stream: TokenStream,
    kind: TokenKind,
    operator: LogicalOperator,
    parseOperand: (stream: TokenStream) => Expression
): Expression {
    let left = parseOperand(stream);
    while (stream.match(kind)) {
        const right = parseOperand(stream);
        left = { type: 'logical', operator, left, right };
    }
    return left;
}

function parseBinaryLevel(
    stream: TokenStream,
    operators: ReadonlyMap<TokenKind, BinaryOperator>,
    parseOperand: (stream: TokenStream) => Expression
): Expression {
    let left = parseOperand(stream);
    let operator = operators.get(stream.current().kind);
    while (operator !== undefined) {
        stream.next();
        const right = parseOperand(stream);
        left = { type: 'binary', operator, left, right };
        operator = operators.get(stream.current().kind);
    }
    return left;
}

/**
 * Parse a unary expression: `not x`, `-x`
 */
function parseUnary(stream: TokenStream): Expression {
    if (stream.match(TokenKind.NOT)) {
        return { type: 'unary', operator: 'not', operand: parseUnary(stream) };
    }
    if (stream.match(TokenKind.MINUS)) {
        return { type: 'unary', operator: '-', operand: parseUnary(stream) };
    }
    return parsePrimary(stream);
}

/**
 * Parse a primary expression (literals, variables, calls, parenthesized expressions)
 */
function parsePrimary(stream: TokenStream): Expression {
    if (stream.match(TokenKind.LPAREN)) {
        const expr = parseExpression(stream);
        stream.expect(TokenKind.RPAREN, "')'", "Expected ')' after expression.");
        return expr;
    }

    if (stream.match(TokenKind.NUMBER, TokenKind.STRING)) {
        return { type: 'literal', value: literalValue(stream.previous()) };
    }
    if (stream.match(TokenKind.TRUE)) {
        return { type: 'literal', value: true };
    }
    if (stream.match(TokenKind.FALSE)) {
        return { type: 'literal', value: false };
    }
    if (stream.match(TokenKind.NIL)) {
        return { type: 'literal', value: null };
    }

    if (stream.match(TokenKind.IDENTIFIER)) {
        const callee: Expression = { type: 'variable', name: stream.previous().text };
        if (!stream.match(TokenKind.LPAREN)) {
            return callee;
        }
        return { type: 'call', callee, args: parseCallArguments(stream) };
    }

    const found = stream.isAtEnd() ? 'end of input' : `'${stream.current().text}'`;
    throw new ParseError('expression', `Unexpected token in primary expression (found ${found})`);
}

/**
 * Parse `arg, arg, ...)` after a consumed '('
 */
function parseCallArguments(stream: TokenStream): Expression[] {
    const args: Expression[] = [];
    if (!stream.check(TokenKind.RPAREN)) {
        do {
            args.push(parseExpression(stream));
        } while (stream.match(TokenKind.COMMA));
    }
    stream.expect(TokenKind.RPAREN, "')'", "Expected ')' after function arguments.");
    return args;
}

function literalValue(token: Token): string | number {
    if (token.value === null) {
        throw new ParseError('literal', `Literal token '${token.text}' carries no value`);
    }
    return token.value;
}
