/**
 * Configuration file support for the Moonlet CLI
 *
 * Files are JSON5; only the options that can be written as data are accepted.
 *
 * @example
 * {
 *   modules: ['core', 'math'],
 *   assignmentScope: 'nearest',
 *   debug: false,
 * }
 */

import { readFileSync } from 'node:fs';
import JSON5 from 'json5';
import type { AssignmentScope } from '../classes/Executor';

export type ModuleName = 'core' | 'math' | 'test';

export const MODULE_NAMES: readonly ModuleName[] = ['core', 'math', 'test'];

const ASSIGNMENT_SCOPES: readonly AssignmentScope[] = ['local', 'nearest'];

export interface MoonletConfig {
    modules?: ModuleName[];
    assignmentScope?: AssignmentScope;
    debug?: boolean;
}

function isModuleName(value: unknown): value is ModuleName {
    return MODULE_NAMES.some((name) => name === value);
}

function isAssignmentScope(value: unknown): value is AssignmentScope {
    return ASSIGNMENT_SCOPES.some((scope) => scope === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse and validate configuration text
 * @throws Error on invalid JSON5, unknown keys or badly typed values
 */
export function parseConfig(text: string): MoonletConfig {
    let raw: unknown;
    try {
        raw = JSON5.parse(text);
    } catch (error) {
        throw new Error(`Invalid JSON5: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (!isRecord(raw)) {
        throw new Error('Configuration must be an object');
    }

    const config: MoonletConfig = {};
    for (const [key, value] of Object.entries(raw)) {
        switch (key) {
            case 'modules': {
                if (!Array.isArray(value)) {
                    throw new Error('"modules" must be an array of module names');
                }
                const modules: ModuleName[] = [];
                for (const item of value) {
                    if (!isModuleName(item)) {
                        throw new Error(`Unknown module "${String(item)}" (expected one of ${MODULE_NAMES.join(', ')})`);
                    }
                    modules.push(item);
                }
                config.modules = modules;
                break;
            }
            case 'assignmentScope':
                if (!isAssignmentScope(value)) {
                    throw new Error(`"assignmentScope" must be one of ${ASSIGNMENT_SCOPES.join(', ')}`);
                }
                config.assignmentScope = value;
                break;
            case 'debug':
                if (typeof value !== 'boolean') {
                    throw new Error('"debug" must be a boolean');
                }
                config.debug = value;
                break;
            default:
                throw new Error(`Unknown configuration key "${key}"`);
        }
    }

    return config;
}

/**
 * Read and parse a configuration file
 */
export function loadConfig(path: string): MoonletConfig {
    return parseConfig(readFileSync(path, 'utf8'));
}
