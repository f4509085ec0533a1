/**
 * Shared runtime value types for Moonlet
 */

import type { Statement } from '../types/Ast.type';
import type { Environment } from '../classes/Environment';

export type BuiltinResult = Value | MultiValue;
export type BuiltinHandler = (args: Value[]) => Promise<BuiltinResult> | BuiltinResult;

/**
 * A function declared in script code, closed over its defining environment
 */
export class UserFunction {
    readonly name: string;
    readonly params: readonly string[];
    readonly body: readonly Statement[];
    readonly closure: Environment;

    constructor(name: string, params: readonly string[], body: readonly Statement[], closure: Environment) {
        this.name = name;
        this.params = params;
        this.body = body;
        this.closure = closure;
    }
}

/**
 * A host function registered under a name
 */
export class BuiltinFunction {
    readonly name: string;
    readonly handler: BuiltinHandler;

    constructor(name: string, handler: BuiltinHandler) {
        this.name = name;
        this.handler = handler;
    }
}

export type Callable = UserFunction | BuiltinFunction;

/**
 * A script value. `null` is nil.
 */
export type Value = null | boolean | number | string | Callable;

/**
 * Result of a call or return statement. Never stored in a variable and never nested.
 */
export class MultiValue {
    readonly values: readonly Value[];

    constructor(values: readonly Value[]) {
        this.values = values;
    }

    /**
     * Collapse to the first element, nil when empty
     */
    first(): Value {
        return this.values.length > 0 ? this.values[0] : null;
    }

    get length(): number {
        return this.values.length;
    }
}

export type EvalResult = Value | MultiValue;
