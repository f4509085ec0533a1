/**
 * Lexer class for tokenizing one Moonlet logical line
 */

import { LexicalError } from './exceptions';

// ============================================================================
// Token Types
// ============================================================================

/**
 * Token kinds for the Moonlet language
 * Using const object instead of enum for better compatibility
 */
export const TokenKind = {
    // Literals
    STRING: 'STRING',           // "hello"
    NUMBER: 'NUMBER',           // 42
    IDENTIFIER: 'IDENTIFIER',   // name, factorial

    // Keywords
    LOCAL: 'LOCAL',
    FUNCTION: 'FUNCTION',
    RETURN: 'RETURN',
    END: 'END',
    IF: 'IF',
    THEN: 'THEN',
    ELSE: 'ELSE',
    TRUE: 'TRUE',
    FALSE: 'FALSE',
    NIL: 'NIL',
    AND: 'AND',
    OR: 'OR',
    NOT: 'NOT',

    // Operators
    ASSIGN: 'ASSIGN',           // =
    PLUS: 'PLUS',               // +
    MINUS: 'MINUS',             // -
    MULTIPLY: 'MULTIPLY',       // *
    DIVIDE: 'DIVIDE',           // /
    CONCAT: 'CONCAT',           // ..

    // Comparison Operators
    EQ: 'EQ',                   // ==
    NE: 'NE',                   // ~=
    GT: 'GT',                   // >
    LT: 'LT',                   // <
    GTE: 'GTE',                 // >=
    LTE: 'LTE',                 // <=

    // Punctuation
    LPAREN: 'LPAREN',           // (
    RPAREN: 'RPAREN',           // )
    COMMA: 'COMMA',             // ,

    EOF: 'EOF',
} as const;

export type TokenKind = typeof TokenKind[keyof typeof TokenKind];

/**
 * Reserved words and the kind each one is reclassified to
 */
export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
    ['local', TokenKind.LOCAL],
    ['function', TokenKind.FUNCTION],
    ['return', TokenKind.RETURN],
    ['end', TokenKind.END],
    ['if', TokenKind.IF],
    ['then', TokenKind.THEN],
    ['else', TokenKind.ELSE],
    ['true', TokenKind.TRUE],
    ['false', TokenKind.FALSE],
    ['nil', TokenKind.NIL],
    ['and', TokenKind.AND],
    ['or', TokenKind.OR],
    ['not', TokenKind.NOT],
]);

/**
 * A single token in a logical line
 */
export interface Token {
    readonly kind: TokenKind;
    readonly text: string;                  // Verbatim slice of the source
    readonly value: string | number | null; // Parsed payload for string and number literals
}

// ============================================================================
// Lexer Implementation
// ============================================================================

export class Lexer {
    /**
     * Tokenize a single logical line
     *
     * @param source - One logical line as produced by the line assembler
     * @returns Tokens in source order, terminated by an EOF token
     * @throws LexicalError on an unexpected character or an unterminated string
     */
    static tokenize(source: string): Token[] {
        const tokens: Token[] = [];
        let i = 0;

        const makeToken = (kind: TokenKind, text: string, value: string | number | null = null): Token => {
            return Object.freeze({ kind, text, value });
        };

        const isDigit = (char: string): boolean => {
            return char >= '0' && char <= '9';
        };

        const isAlpha = (char: string): boolean => {
            return char === '_' || /\p{L}/u.test(char);
        };

        const isAlphaNumeric = (char: string): boolean => {
            return isAlpha(char) || /\p{Nd}/u.test(char);
        };

        while (i < source.length) {
            const char = source[i];
            const nextChar = i + 1 < source.length ? source[i + 1] : '';

            // Whitespace
            if (char === ' ' || char === '\t') {
                i++;
                continue;
            }

            // Strings run to the next double quote; there are no escape sequences
            if (char === '"') {
                const close = source.indexOf('"', i + 1);
                if (close === -1) {
                    throw new LexicalError('Unterminated string literal.');
                }
                const content = source.slice(i + 1, close);
                tokens.push(makeToken(TokenKind.STRING, source.slice(i, close + 1), content));
                i = close + 1;
                continue;
            }

            // Numbers are digit runs only
            if (isDigit(char)) {
                let end = i;
                while (end < source.length && isDigit(source[end])) {
                    end++;
                }
                const numText = source.slice(i, end);
                tokens.push(makeToken(TokenKind.NUMBER, numText, parseFloat(numText)));
                i = end;
                continue;
            }

            // Identifiers and keywords
            if (isAlpha(char)) {
                let end = i;
                while (end < source.length && isAlphaNumeric(source[end])) {
                    end++;
                }
                const identText = source.slice(i, end);
                tokens.push(makeToken(KEYWORDS.get(identText) ?? TokenKind.IDENTIFIER, identText));
                i = end;
                continue;
            }

            // Two-character operators
            if (char === '=' && nextChar === '=') {
                tokens.push(makeToken(TokenKind.EQ, '=='));
                i += 2;
                continue;
            }
            if (char === '~' && nextChar === '=') {
                tokens.push(makeToken(TokenKind.NE, '~='));
                i += 2;
                continue;
            }
            if (char === '<' && nextChar === '=') {
                tokens.push(makeToken(TokenKind.LTE, '<='));
                i += 2;
                continue;
            }
            if (char === '>' && nextChar === '=') {
                tokens.push(makeToken(TokenKind.GTE, '>='));
                i += 2;
                continue;
            }
            if (char === '.' && nextChar === '.') {
                tokens.push(makeToken(TokenKind.CONCAT, '..'));
                i += 2;
                continue;
            }

            // Single-character operators and punctuation
            switch (char) {
                case '=':
                    tokens.push(makeToken(TokenKind.ASSIGN, '='));
                    i++;
                    continue;
                case '+':
                    tokens.push(makeToken(TokenKind.PLUS, '+'));
                    i++;
                    continue;
                case '-':
                    tokens.push(makeToken(TokenKind.MINUS, '-'));
                    i++;
                    continue;
                case '*':
                    tokens.push(makeToken(TokenKind.MULTIPLY, '*'));
                    i++;
                    continue;
                case '/':
                    tokens.push(makeToken(TokenKind.DIVIDE, '/'));
                    i++;
                    continue;
                case '<':
                    tokens.push(makeToken(TokenKind.LT, '<'));
                    i++;
                    continue;
                case '>':
                    tokens.push(makeToken(TokenKind.GT, '>'));
                    i++;
                    continue;
                case '(':
                    tokens.push(makeToken(TokenKind.LPAREN, '('));
                    i++;
                    continue;
                case ')':
                    tokens.push(makeToken(TokenKind.RPAREN, ')'));
                    i++;
                    continue;
                case ',':
                    tokens.push(makeToken(TokenKind.COMMA, ','));
                    i++;
                    continue;
            }

            throw new LexicalError(`Unexpected character: ${char}`, char);
        }

        tokens.push(makeToken(TokenKind.EOF, ''));

        return tokens;
    }
}
