import { describe, it, expect } from 'vitest';
import { TokenStream } from './TokenStream';
import { Lexer, TokenKind } from './Lexer';
import { ParseError } from './exceptions';

describe('TokenStream', () => {
    it('peeks without consuming and yields EOF past the end', () => {
        const stream = new TokenStream(Lexer.tokenize('a = 1'));
        expect(stream.current().text).toBe('a');
        expect(stream.peek(1).kind).toBe(TokenKind.ASSIGN);
        expect(stream.peek(10).kind).toBe(TokenKind.EOF);
        expect(stream.getPosition()).toBe(0);
    });

    it('matches any of several kinds', () => {
        const stream = new TokenStream(Lexer.tokenize('x + 1'));
        expect(stream.match(TokenKind.NUMBER, TokenKind.IDENTIFIER)).toBe(true);
        expect(stream.previous().text).toBe('x');
        expect(stream.match(TokenKind.MINUS)).toBe(false);
        expect(stream.getPosition()).toBe(1);
    });

    it('never checks true at the end', () => {
        const stream = new TokenStream(Lexer.tokenize(''));
        expect(stream.isAtEnd()).toBe(true);
        expect(stream.check(TokenKind.EOF)).toBe(false);
    });

    it('expects a kind or raises a ParseError naming what was found', () => {
        const stream = new TokenStream(Lexer.tokenize('end'));
        expect(() => stream.expect(TokenKind.THEN, "'then'", "Expected 'then'.")).toThrow(ParseError);
        expect(() => stream.expect(TokenKind.THEN, "'then'", "Expected 'then'.")).toThrow("Expected 'then'. (found 'end')");
        expect(stream.expect(TokenKind.END, "'end'", "Expected 'end'.").kind).toBe(TokenKind.END);
        expect(() => stream.expect(TokenKind.END, "'end'", "Expected 'end'.")).toThrow("Expected 'end'. (found end of input)");
    });

    it('detects repeated reads at the end of input', () => {
        const stream = new TokenStream(Lexer.tokenize(''));
        stream.next();
        stream.next();
        stream.next();
        expect(() => stream.next()).toThrow('Infinite loop detected');
    });

    it('lists the tokens not yet consumed', () => {
        const stream = new TokenStream(Lexer.tokenize('a b c'));
        stream.next();
        expect(stream.remaining().map((token) => token.text)).toEqual(['b', 'c']);
    });
});
