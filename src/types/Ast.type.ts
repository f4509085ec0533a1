/**
 * AST (Abstract Syntax Tree) Type Definitions for Moonlet
 *
 * One logical line parses to exactly one Statement. Expressions and
 * statements are closed unions discriminated by `type`.
 */

import type { Value } from '../utils/types';

// ============================================================================
// Operators
// ============================================================================

export type ArithmeticOperator = '+' | '-' | '*' | '/';
export type RelationalOperator = '==' | '~=' | '<' | '<=' | '>' | '>=';

/**
 * Binary operators for expressions
 */
export type BinaryOperator = ArithmeticOperator | RelationalOperator | '..';

export type LogicalOperator = 'and' | 'or';

export type UnaryOperator = 'not' | '-';

// ============================================================================
// Expressions
// ============================================================================

export interface LiteralExpression {
    type: 'literal';
    value: Value;
}

export interface VariableExpression {
    type: 'variable';
    name: string;
}

/**
 * Both operands are always evaluated
 */
export interface BinaryExpression {
    type: 'binary';
    operator: BinaryOperator;
    left: Expression;
    right: Expression;
}

/**
 * The right operand is only evaluated when the left does not decide the result
 */
export interface LogicalExpression {
    type: 'logical';
    operator: LogicalOperator;
    left: Expression;
    right: Expression;
}

export interface UnaryExpression {
    type: 'unary';
    operator: UnaryOperator;
    operand: Expression;
}

export interface CallExpression {
    type: 'call';
    callee: Expression;
    args: Expression[];
}

export type Expression =
    | LiteralExpression
    | VariableExpression
    | BinaryExpression
    | LogicalExpression
    | UnaryExpression
    | CallExpression;

// ============================================================================
// Statements
// ============================================================================

export interface ExpressionStatement {
    type: 'expression';
    expression: Expression;
}

/**
 * `a, b = expr` - one right-hand expression spread over the targets
 */
export interface Assignment {
    type: 'assignment';
    targets: string[];
    value: Expression;
}

export interface ReturnStatement {
    type: 'return';
    values: Expression[];
}

export interface FunctionDeclaration {
    type: 'function';
    name: string;
    params: string[];
    body: Statement[];
    isLocal: boolean;
}

export interface IfStatement {
    type: 'if';
    condition: Expression;
    thenBody: Statement[];
    elseBody: Statement[] | null;
}

export type Statement =
    | ExpressionStatement
    | Assignment
    | ReturnStatement
    | FunctionDeclaration
    | IfStatement;
