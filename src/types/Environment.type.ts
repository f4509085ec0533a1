import type { BuiltinHandler } from '../utils/types';

export type { BuiltinHandler };

export type DataType = 'string' | 'number' | 'boolean' | 'nil' | 'function' | 'any';

export interface ParameterMetadata {
    name: string;
    dataType: DataType;
    description: string;
    required?: boolean;
    variadic?: boolean; // Accepts any number of trailing arguments
}

export interface FunctionMetadata {
    description: string;
    parameters: ParameterMetadata[];
    returnType: DataType;
    returnDescription: string;
    example?: string; // Optional example usage
}

export interface ModuleMetadata {
    description: string;
    methods: string[];
}

/**
 * A native module: a named group of builtins with their documentation
 */
export interface ModuleAdapter {
    name: string;
    functions: Record<string, BuiltinHandler>;
    functionMetadata: Record<string, FunctionMetadata>;
    moduleMetadata: ModuleMetadata;
}
