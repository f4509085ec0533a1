/**
 * TokenStream - A stream of tokens for parsing
 *
 * Provides the lookahead, matching and expectation helpers the
 * recursive-descent parsers consume tokens through.
 */

import { TokenKind } from './Lexer';
import type { Token } from './Lexer';
import { ParseError } from './exceptions';

const EOF_TOKEN: Token = Object.freeze({ kind: TokenKind.EOF, text: '', value: null });

export class TokenStream {
    private tokens: readonly Token[];
    private position: number = 0;
    private lastNextPosition: number = -1; // Track last position where next() was called
    private consecutiveNextCalls: number = 0; // Track consecutive next() calls at same position

    /**
     * Maximum number of consecutive next() calls allowed at the same position before throwing
     */
    static readonly MAX_CONSECUTIVE_NEXT_AT_SAME_POSITION = 3;

    /**
     * Debug mode flag - set to true to log every consumed token
     * Controlled via the MOONLET_DEBUG environment variable or set programmatically
     */
    static debug: boolean = typeof process !== 'undefined' && process.env.MOONLET_DEBUG === 'true';

    /**
     * @param tokens - Tokens to stream, normally ending with EOF
     * @param startIndex - Optional starting index (default 0)
     */
    constructor(tokens: readonly Token[], startIndex: number = 0) {
        this.tokens = tokens;
        this.position = startIndex;
    }

    /**
     * Get the current token without consuming it
     */
    current(): Token {
        return this.peek(0);
    }

    /**
     * Look ahead at a token without consuming it. Past the end this yields EOF.
     */
    peek(offset: number = 0): Token {
        const index = this.position + offset;
        if (index < 0 || index >= this.tokens.length) {
            return EOF_TOKEN;
        }
        return this.tokens[index];
    }

    /**
     * The most recently consumed token
     */
    previous(): Token {
        return this.peek(-1);
    }

    /**
     * Consume and return the current token. At EOF the position does not advance.
     * @throws Error if called repeatedly without advancing (indicates an infinite loop)
     */
    next(): Token {
        if (this.isAtEnd()) {
            if (this.position === this.lastNextPosition) {
                this.consecutiveNextCalls++;
                if (this.consecutiveNextCalls >= TokenStream.MAX_CONSECUTIVE_NEXT_AT_SAME_POSITION) {
                    throw new Error(`[TokenStream] Infinite loop detected! next() called ${this.consecutiveNextCalls} times at end of input`);
                }
            } else {
                this.consecutiveNextCalls = 0;
                this.lastNextPosition = this.position;
            }
            return this.current();
        }

        const token = this.tokens[this.position];
        this.position++;
        this.lastNextPosition = -1;
        this.consecutiveNextCalls = 0;

        if (TokenStream.debug) {
            console.log(`[TokenStream] next() - consumed ${token.kind} '${token.text}' (position ${this.position})`);
        }
        return token;
    }

    /**
     * Check if we're at the end of the token stream
     */
    isAtEnd(): boolean {
        return this.current().kind === TokenKind.EOF;
    }

    /**
     * Check if the current token is of the given kind, without consuming it
     */
    check(kind: TokenKind): boolean {
        if (this.isAtEnd()) return false;
        return this.current().kind === kind;
    }

    /**
     * If the current token is one of the given kinds, consume it and return true
     */
    match(...kinds: TokenKind[]): boolean {
        for (const kind of kinds) {
            if (this.check(kind)) {
                this.next();
                return true;
            }
        }
        return false;
    }

    /**
     * Consume a token of the given kind or fail
     *
     * @param kind - The kind to expect
     * @param expected - Short name of the construct, kept on the ParseError
     * @param message - Error message used when the token does not match
     * @throws ParseError if the current token is of another kind
     */
    expect(kind: TokenKind, expected: string, message: string): Token {
        if (this.check(kind)) {
            return this.next();
        }
        const found = this.isAtEnd() ? 'end of input' : `'${this.current().text}'`;
        throw new ParseError(expected, `${message} (found ${found})`);
    }

    /**
     * Current position, for callers that need to know how much was consumed
     */
    getPosition(): number {
        return this.position;
    }

    /**
     * Tokens not yet consumed, EOF excluded
     */
    remaining(): Token[] {
        return this.tokens.slice(this.position).filter((token) => token.kind !== TokenKind.EOF);
    }
}
