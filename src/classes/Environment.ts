/**
 * Lexical scope for Moonlet
 *
 * Each environment holds its own bindings and a reference to the enclosing
 * scope. Function values keep the environment they were declared in, and
 * every call runs in a fresh child of that environment.
 */

import type { Value } from '../utils/types';
import { UndefinedMutationError } from './exceptions';

export class Environment {
    private readonly values: Map<string, Value> = new Map();
    readonly parent: Environment | null;

    constructor(parent: Environment | null = null) {
        this.parent = parent;
    }

    /**
     * Create a scope whose parent is this one
     */
    child(): Environment {
        return new Environment(this);
    }

    /**
     * Bind a name in this scope only, overwriting an existing binding
     */
    define(name: string, value: Value): void {
        this.values.set(name, value);
    }

    /**
     * Look a name up through the scope chain. A miss is nil.
     */
    get(name: string): Value {
        let scope: Environment | null = this;
        while (scope !== null) {
            if (scope.values.has(name)) {
                return scope.values.get(name) ?? null;
            }
            scope = scope.parent;
        }
        return null;
    }

    /**
     * Mutate the nearest existing binding
     * @throws UndefinedMutationError when no scope in the chain binds the name
     */
    assign(name: string, value: Value): void {
        const owner = this.resolve(name);
        if (owner === null) {
            throw new UndefinedMutationError(name);
        }
        owner.values.set(name, value);
    }

    /**
     * Whether the name is bound anywhere in the chain
     */
    has(name: string): boolean {
        return this.resolve(name) !== null;
    }

    /**
     * Whether the name is bound in this scope itself
     */
    hasOwn(name: string): boolean {
        return this.values.has(name);
    }

    /**
     * Names bound in this scope, in insertion order
     */
    names(): string[] {
        return [...this.values.keys()];
    }

    private resolve(name: string): Environment | null {
        let scope: Environment | null = this;
        while (scope !== null) {
            if (scope.values.has(name)) {
                return scope;
            }
            scope = scope.parent;
        }
        return null;
    }
}
