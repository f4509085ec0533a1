import { describe, it, expect } from 'vitest';
import {
    collapse,
    formatNumber,
    formatValue,
    getValueType,
    isTruthy,
    toNumber,
    toText,
    valuesEqual
} from './valueConversion';
import { BuiltinFunction, MultiValue, UserFunction } from './types';
import { Environment } from '../classes/Environment';
import { TypeCoercionError } from '../classes/exceptions';

describe('valueConversion', () => {
    const userFn = new UserFunction('f', [], [], new Environment());
    const builtin = new BuiltinFunction('print', () => null);

    it('collapses multiple values to the first or nil', () => {
        expect(collapse(new MultiValue([1, 2]))).toBe(1);
        expect(collapse(new MultiValue([]))).toBeNull();
        expect(collapse('x')).toBe('x');
    });

    it('treats only nil and false as falsy', () => {
        expect(isTruthy(null)).toBe(false);
        expect(isTruthy(false)).toBe(false);
        expect(isTruthy(0)).toBe(true);
        expect(isTruthy('')).toBe(true);
        expect(isTruthy(userFn)).toBe(true);
    });

    it('names value types', () => {
        expect(getValueType(null)).toBe('nil');
        expect(getValueType(true)).toBe('boolean');
        expect(getValueType(3)).toBe('number');
        expect(getValueType('s')).toBe('string');
        expect(getValueType(userFn)).toBe('function');
        expect(getValueType(builtin)).toBe('function');
    });

    it('coerces numbers and numeric strings', () => {
        expect(toNumber(4, '+')).toBe(4);
        expect(toNumber(' 12 ', '+')).toBe(12);
        expect(toNumber('-2.5', '+')).toBe(-2.5);
        expect(() => toNumber('12abc', '+')).toThrow(TypeCoercionError);
        expect(() => toNumber(null, '-')).toThrow("Attempt to perform '-' on a nil value");
    });

    it('coerces text for concatenation', () => {
        expect(toText('a')).toBe('a');
        expect(toText(1)).toBe('1');
        expect(toText(false)).toBe('false');
        expect(() => toText(userFn)).toThrow('Attempt to concatenate a function value');
    });

    it('compares by value and functions by identity', () => {
        expect(valuesEqual(1, 1)).toBe(true);
        expect(valuesEqual('a', 'a')).toBe(true);
        expect(valuesEqual(1, '1')).toBe(false);
        expect(valuesEqual(null, false)).toBe(false);
        expect(valuesEqual(userFn, userFn)).toBe(true);
        expect(valuesEqual(userFn, new UserFunction('f', [], [], new Environment()))).toBe(false);
        expect(valuesEqual(new MultiValue([1]), 1)).toBe(false);
    });

    it('formats special numbers', () => {
        expect(formatNumber(120)).toBe('120');
        expect(formatNumber(0.5)).toBe('0.5');
        expect(formatNumber(Infinity)).toBe('inf');
        expect(formatNumber(-Infinity)).toBe('-inf');
        expect(formatNumber(NaN)).toBe('nan');
    });

    it('formats values for display', () => {
        expect(formatValue(null)).toBe('nil');
        expect(formatValue(true)).toBe('true');
        expect(formatValue(7)).toBe('7');
        expect(formatValue('text')).toBe('text');
        expect(formatValue(userFn)).toBe('function: f');
        expect(formatValue(builtin)).toBe('builtin: print');
    });
});
