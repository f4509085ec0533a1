/**
 * Value conversion and type checking utilities for Moonlet
 */

import { BuiltinFunction, MultiValue, UserFunction, type EvalResult, type Value } from './types';
import { TypeCoercionError } from '../classes/exceptions';

export type ValueType = 'nil' | 'boolean' | 'number' | 'string' | 'function';

const NUMERIC_STRING = /^\s*-?\d+(\.\d+)?\s*$/;

/**
 * Collapse a call or return result to a single value: first element, or nil
 */
export function collapse(result: EvalResult): Value {
    return result instanceof MultiValue ? result.first() : result;
}

/**
 * Only nil and false are falsy
 */
export function isTruthy(val: Value): boolean {
    return val !== null && val !== false;
}

/**
 * Get the type name of a value
 */
export function getValueType(value: Value): ValueType {
    if (value === null) {
        return 'nil';
    }
    if (typeof value === 'boolean') {
        return 'boolean';
    }
    if (typeof value === 'number') {
        return 'number';
    }
    if (typeof value === 'string') {
        return 'string';
    }
    return 'function';
}

function describe(value: EvalResult): string {
    if (value instanceof MultiValue) {
        return `multiple values (${value.length})`;
    }
    return `a ${getValueType(value)} value`;
}

/**
 * Numeric coercion for arithmetic and ordering. Numbers pass through and
 * numeric strings are parsed; anything else fails.
 */
export function toNumber(value: EvalResult, operator: string): number {
    if (typeof value === 'number') {
        return value;
    }
    if (typeof value === 'string' && NUMERIC_STRING.test(value)) {
        return parseFloat(value);
    }
    throw new TypeCoercionError(`Attempt to perform '${operator}' on ${describe(value)}`);
}

/**
 * Textual coercion for concatenation
 */
export function toText(value: EvalResult): string {
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number') {
        return formatNumber(value);
    }
    if (typeof value === 'boolean') {
        return String(value);
    }
    throw new TypeCoercionError(`Attempt to concatenate ${describe(value)}`);
}

/**
 * Structural equality: numbers numerically, strings textually, booleans by
 * value, nil only with nil, functions by identity. Multiple values equal nothing.
 */
export function valuesEqual(left: EvalResult, right: EvalResult): boolean {
    if (left instanceof MultiValue || right instanceof MultiValue) {
        return false;
    }
    return left === right;
}

export function formatNumber(value: number): string {
    if (Number.isNaN(value)) {
        return 'nan';
    }
    if (value === Infinity) {
        return 'inf';
    }
    if (value === -Infinity) {
        return '-inf';
    }
    return String(value);
}

/**
 * Display form used by print and tostring
 */
export function formatValue(value: Value): string {
    if (value === null) {
        return 'nil';
    }
    if (typeof value === 'number') {
        return formatNumber(value);
    }
    if (value instanceof UserFunction) {
        return `function: ${value.name}`;
    }
    if (value instanceof BuiltinFunction) {
        return `builtin: ${value.name}`;
    }
    return String(value);
}
