import type {
    BuiltinHandler,
    FunctionMetadata,
    ModuleMetadata,
    ModuleAdapter
} from '../types/Environment.type';
import type { Value } from '../utils/types';
import { toNumber } from '../utils/valueConversion';
import { ArityMismatchError } from '../classes/exceptions';

/**
 * Math module for Moonlet
 * Provides numeric helpers on top of the arithmetic operators
 */

function numericArgs(name: string, args: Value[]): number[] {
    if (args.length === 0) {
        throw new Error(`${name} expects at least 1 argument.`);
    }
    return args.map((arg) => toNumber(arg, name));
}

export const MathFunctions: Record<string, BuiltinHandler> = {
    sqrt: (args) => {
        if (args.length !== 1) {
            throw new ArityMismatchError('sqrt', 1, args.length);
        }
        return Math.sqrt(toNumber(args[0], 'sqrt'));
    },

    abs: (args) => {
        return Math.abs(toNumber(args[0] ?? null, 'abs'));
    },

    floor: (args) => {
        return Math.floor(toNumber(args[0] ?? null, 'floor'));
    },

    ceil: (args) => {
        return Math.ceil(toNumber(args[0] ?? null, 'ceil'));
    },

    min: (args) => {
        return Math.min(...numericArgs('min', args));
    },

    max: (args) => {
        return Math.max(...numericArgs('max', args));
    }
};

export const MathFunctionMetadata: Record<string, FunctionMetadata> = {
    sqrt: {
        description: 'Square root of a number',
        parameters: [
            { name: 'x', dataType: 'number', description: 'Number to take the root of', required: true }
        ],
        returnType: 'number',
        returnDescription: 'Square root of x (nan for negative input)',
        example: 'sqrt(16)  -- 4'
    },

    abs: {
        description: 'Absolute value of a number',
        parameters: [
            { name: 'x', dataType: 'number', description: 'Input number', required: true }
        ],
        returnType: 'number',
        returnDescription: 'x without its sign'
    },

    floor: {
        description: 'Rounds down to the nearest integer',
        parameters: [
            { name: 'x', dataType: 'number', description: 'Input number', required: true }
        ],
        returnType: 'number',
        returnDescription: 'Largest integer not greater than x'
    },

    ceil: {
        description: 'Rounds up to the nearest integer',
        parameters: [
            { name: 'x', dataType: 'number', description: 'Input number', required: true }
        ],
        returnType: 'number',
        returnDescription: 'Smallest integer not less than x'
    },

    min: {
        description: 'Smallest of its arguments',
        parameters: [
            { name: 'values', dataType: 'number', description: 'Numbers to compare', required: true, variadic: true }
        ],
        returnType: 'number',
        returnDescription: 'The minimum',
        example: 'min(4, 2, 9)  -- 2'
    },

    max: {
        description: 'Largest of its arguments',
        parameters: [
            { name: 'values', dataType: 'number', description: 'Numbers to compare', required: true, variadic: true }
        ],
        returnType: 'number',
        returnDescription: 'The maximum',
        example: 'max(4, 2, 9)  -- 9'
    }
};

export const MathModuleMetadata: ModuleMetadata = {
    description: 'Numeric helpers: roots, rounding and extremes',
    methods: Object.keys(MathFunctions)
};

// Module adapter for auto-loading
const MathModule: ModuleAdapter = {
    name: 'math',
    functions: MathFunctions,
    functionMetadata: MathFunctionMetadata,
    moduleMetadata: MathModuleMetadata
};

export default MathModule;
