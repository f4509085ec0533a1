/**
 * Executor class for executing Moonlet statements
 *
 * Walks the AST against an explicit current Environment. A `return` does not
 * throw: statement execution yields a Completion, and a 'return' completion
 * travels up through nested blocks until the enclosing call consumes it.
 */

import {
    BuiltinFunction,
    MultiValue,
    UserFunction,
    type Callable,
    type EvalResult,
    type Value
} from '../utils/types';
import { collapse, getValueType, isTruthy, toNumber, toText, valuesEqual } from '../utils/valueConversion';
import { ArityMismatchError, NotCallableError, UnknownConstructError } from './exceptions';
import type { Environment } from './Environment';
import type {
    Statement,
    Expression,
    Assignment,
    BinaryExpression,
    CallExpression,
    FunctionDeclaration,
    IfStatement,
    LogicalExpression,
    ReturnStatement,
    UnaryExpression
} from '../types/Ast.type';

/**
 * Outcome of executing a statement or block
 */
export type Completion =
    | { kind: 'normal' }
    | { kind: 'return'; values: MultiValue };

const NORMAL: Completion = Object.freeze({ kind: 'normal' });

/**
 * How an assignment statement binds its targets:
 * - 'local': always define in the current scope, shadowing outer bindings
 * - 'nearest': update the nearest existing binding, define locally when there is none
 */
export type AssignmentScope = 'local' | 'nearest';

export interface ExecutorOptions {
    assignmentScope?: AssignmentScope;
}

export class Executor {
    private readonly assignmentScope: AssignmentScope;

    /**
     * Debug mode flag - set to true to trace executed statements
     * Controlled via the MOONLET_DEBUG environment variable or set programmatically
     */
    static debug: boolean = typeof process !== 'undefined' && process.env.MOONLET_DEBUG === 'true';

    constructor(options: ExecutorOptions = {}) {
        this.assignmentScope = options.assignmentScope ?? 'local';
    }

    /**
     * Execute statements in order, stopping at the first 'return' completion
     */
    async executeBlock(statements: readonly Statement[], env: Environment): Promise<Completion> {
        for (const stmt of statements) {
            const completion = await this.executeStatement(stmt, env);
            if (completion.kind === 'return') {
                return completion;
            }
        }
        return NORMAL;
    }

    async executeStatement(stmt: Statement, env: Environment): Promise<Completion> {
        if (Executor.debug) {
            console.log(`[Executor] ${stmt.type} statement`);
        }

        switch (stmt.type) {
            case 'expression':
                await this.evaluate(stmt.expression, env);
                return NORMAL;
            case 'assignment':
                await this.executeAssignment(stmt, env);
                return NORMAL;
            case 'function':
                this.registerFunction(stmt, env);
                return NORMAL;
            case 'return':
                return { kind: 'return', values: await this.evaluateReturnValues(stmt, env) };
            case 'if':
                return this.executeIf(stmt, env);
            default:
                throw new UnknownConstructError(`statement type: ${describeNode(stmt)}`);
        }
    }

    private async executeAssignment(assign: Assignment, env: Environment): Promise<void> {
        const result = await this.evaluate(assign.value, env);
        const values = result instanceof MultiValue ? result.values : [result];

        assign.targets.forEach((target, index) => {
            const value = index < values.length ? values[index] : null;
            if (this.assignmentScope === 'nearest' && env.has(target)) {
                env.assign(target, value);
            } else {
                env.define(target, value);
            }
        });
    }

    /**
     * The function's name is bound in the same environment it closes over,
     * so the body can call itself.
     */
    private registerFunction(decl: FunctionDeclaration, env: Environment): void {
        env.define(decl.name, new UserFunction(decl.name, decl.params, decl.body, env));
    }

    /**
     * The last expression contributes all of its values; earlier ones contribute their first
     */
    private async evaluateReturnValues(stmt: ReturnStatement, env: Environment): Promise<MultiValue> {
        const values: Value[] = [];
        for (let i = 0; i < stmt.values.length; i++) {
            const result = await this.evaluate(stmt.values[i], env);
            if (result instanceof MultiValue && i === stmt.values.length - 1) {
                values.push(...result.values);
            } else {
                values.push(collapse(result));
            }
        }
        return new MultiValue(values);
    }

    private async executeIf(stmt: IfStatement, env: Environment): Promise<Completion> {
        const condition = collapse(await this.evaluate(stmt.condition, env));
        if (isTruthy(condition)) {
            return this.executeBlock(stmt.thenBody, env);
        }
        if (stmt.elseBody !== null) {
            return this.executeBlock(stmt.elseBody, env);
        }
        return NORMAL;
    }

    // ========================================================================
    // Expressions
    // ========================================================================

    /**
     * Evaluate an Expression node. Calls may yield a MultiValue.
     */
    async evaluate(expr: Expression, env: Environment): Promise<EvalResult> {
        switch (expr.type) {
            case 'literal':
                return expr.value;
            case 'variable':
                return env.get(expr.name);
            case 'binary':
                return this.evaluateBinary(expr, env);
            case 'logical':
                return this.evaluateLogical(expr, env);
            case 'unary':
                return this.evaluateUnary(expr, env);
            case 'call':
                return this.evaluateCall(expr, env);
            default:
                throw new UnknownConstructError(`expression type: ${describeNode(expr)}`);
        }
    }

    private async evaluateBinary(expr: BinaryExpression, env: Environment): Promise<Value> {
        const left = await this.evaluate(expr.left, env);
        const right = await this.evaluate(expr.right, env);
        const op = expr.operator;

        switch (op) {
            case '+':
                return toNumber(left, op) + toNumber(right, op);
            case '-':
                return toNumber(left, op) - toNumber(right, op);
            case '*':
                return toNumber(left, op) * toNumber(right, op);
            case '/':
                return toNumber(left, op) / toNumber(right, op);
            case '..':
                return toText(left) + toText(right);
            case '==':
                return valuesEqual(left, right);
            case '~=':
                return !valuesEqual(left, right);
            case '<':
                return toNumber(left, op) < toNumber(right, op);
            case '<=':
                return toNumber(left, op) <= toNumber(right, op);
            case '>':
                return toNumber(left, op) > toNumber(right, op);
            case '>=':
                return toNumber(left, op) >= toNumber(right, op);
            default:
                throw new UnknownConstructError(`binary operator: ${String(op)}`);
        }
    }

    /**
     * `and`/`or` yield one of their operands, not a coerced boolean
     */
    private async evaluateLogical(expr: LogicalExpression, env: Environment): Promise<Value> {
        const left = collapse(await this.evaluate(expr.left, env));

        if (expr.operator === 'and') {
            return isTruthy(left) ? collapse(await this.evaluate(expr.right, env)) : left;
        }
        return isTruthy(left) ? left : collapse(await this.evaluate(expr.right, env));
    }

    private async evaluateUnary(expr: UnaryExpression, env: Environment): Promise<Value> {
        const operand = await this.evaluate(expr.operand, env);

        switch (expr.operator) {
            case 'not':
                return !isTruthy(collapse(operand));
            case '-':
                return -toNumber(operand, '-');
            default:
                throw new UnknownConstructError(`unary operator: ${String(expr.operator)}`);
        }
    }

    private async evaluateCall(expr: CallExpression, env: Environment): Promise<EvalResult> {
        const callee = collapse(await this.evaluate(expr.callee, env));
        if (!(callee instanceof UserFunction) && !(callee instanceof BuiltinFunction)) {
            const name = expr.callee.type === 'variable' ? `'${expr.callee.name}' is ${getValueType(callee)}` : getValueType(callee);
            throw new NotCallableError(name);
        }

        const args: Value[] = [];
        for (const argExpr of expr.args) {
            args.push(collapse(await this.evaluate(argExpr, env)));
        }

        const result = await this.callFunction(callee, args);
        if (result instanceof MultiValue && result.length === 1) {
            return result.values[0];
        }
        return result;
    }

    /**
     * Invoke a user function or builtin with already evaluated arguments.
     * User functions run in a fresh child of their closure and always
     * produce a MultiValue (`[nil]` when the body does not return).
     */
    async callFunction(callee: Callable, args: Value[]): Promise<EvalResult> {
        if (callee instanceof BuiltinFunction) {
            return callee.handler(args);
        }

        if (args.length !== callee.params.length) {
            throw new ArityMismatchError(callee.name, callee.params.length, args.length);
        }

        const local = callee.closure.child();
        callee.params.forEach((param, index) => {
            local.define(param, args[index]);
        });

        const completion = await this.executeBlock(callee.body, local);
        if (completion.kind === 'return') {
            return completion.values;
        }
        return new MultiValue([null]);
    }
}

function describeNode(node: unknown): string {
    if (typeof node === 'object' && node !== null && 'type' in node) {
        return String(node.type);
    }
    return String(node);
}
