/**
 * Barrel export for all Moonlet classes
 */

export { Lexer, TokenKind, KEYWORDS } from './Lexer';
export type { Token } from './Lexer';
export { TokenStream } from './TokenStream';
export { Parser } from './Parser';
export { Environment } from './Environment';
export { Executor } from './Executor';
export { ScriptThread } from './ScriptThread';
export {
    MoonletError,
    LexicalError,
    ParseError,
    UndefinedMutationError,
    ArityMismatchError,
    TypeCoercionError,
    NotCallableError,
    UnknownConstructError
} from './exceptions';
export type { ErrorKind } from './exceptions';
