import type {
    BuiltinHandler,
    FunctionMetadata,
    ModuleMetadata,
    ModuleAdapter
} from '../types/Environment.type';
import { formatValue, getValueType } from '../utils/valueConversion';

/**
 * Core module for Moonlet
 * Provides print, tostring and type
 */

export type OutputSink = (line: string) => void;

/**
 * Build the core functions around an output sink; print writes one line per call
 */
export function createCoreFunctions(output: OutputSink): Record<string, BuiltinHandler> {
    return {
        print: (args) => {
            output(args.map(formatValue).join(' '));
            return null;
        },

        tostring: (args) => {
            return formatValue(args[0] ?? null);
        },

        type: (args) => {
            return getValueType(args[0] ?? null);
        }
    };
}

export const CoreFunctionMetadata: Record<string, FunctionMetadata> = {
    print: {
        description: 'Writes its arguments to the output, separated by spaces',
        parameters: [
            { name: 'values', dataType: 'any', description: 'Values to print; nil prints as "nil"', variadic: true }
        ],
        returnType: 'nil',
        returnDescription: 'Nothing',
        example: 'print("a =", a)'
    },

    tostring: {
        description: 'Display form of a value',
        parameters: [
            { name: 'value', dataType: 'any', description: 'Value to convert', required: true }
        ],
        returnType: 'string',
        returnDescription: 'The value as printed by print'
    },

    type: {
        description: 'Type name of a value',
        parameters: [
            { name: 'value', dataType: 'any', description: 'Value to inspect', required: true }
        ],
        returnType: 'string',
        returnDescription: 'One of nil, boolean, number, string, function',
        example: 'type(1)  -- "number"'
    }
};

export const CoreModuleMetadata: ModuleMetadata = {
    description: 'Core builtins: output and value inspection',
    methods: ['print', 'tostring', 'type']
};

export function createCoreModule(output: OutputSink): ModuleAdapter {
    return {
        name: 'core',
        functions: createCoreFunctions(output),
        functionMetadata: CoreFunctionMetadata,
        moduleMetadata: CoreModuleMetadata
    };
}
