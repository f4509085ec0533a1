/**
 * Barrel export for statement and expression parsers
 */

export { parseExpression } from './ExpressionParser';
export { parseFunctionDeclaration } from './DefineParser';
export { parseIfBlock } from './IfBlockParser';
export { parseReturn } from './ReturnParser';
export { parseAssignment, isAssignmentStart } from './AssignmentParser';
export { parseBlockBody, parseNameList } from './ParserUtils';
export type { StatementParserContext } from './ParserUtils';
