/**
 * Built-in demonstration scripts with their expected print output
 *
 * Cases run in order on one thread, so later cases can read globals that
 * earlier ones defined.
 */

import { ScriptThread } from './ScriptThread';
import { BuiltinFunction } from '../utils/types';
import type { ModuleAdapter } from '../types/Environment.type';
import { createCoreModule } from '../modules/Core';
import MathModule from '../modules/Math';
import TestModule from '../modules/Test';

export interface DemoCase {
    name: string;
    lines: readonly string[];
    expectedOutput: readonly string[];
}

export interface DemoCaseResult {
    name: string;
    passed: boolean;
    output: string[];
    message: string | null;
}

export interface DemoSuiteResult {
    results: DemoCaseResult[];
    passed: number;
    failed: number;
}

export const DEMO_CASES: readonly DemoCase[] = [
    {
        name: 'Arithmetic and Grouping',
        lines: [
            'a = 3 + 4 * 2',
            'b = (3 + 4) * 2',
            "print('a =', a, 'b =', b)"
        ],
        expectedOutput: ['a = 11 b = 14']
    },
    {
        name: 'Relational Operators',
        lines: [
            "print('1 == 1:', 1 == 1)",
            "print('1 ~= 2:', 1 ~= 2)",
            "print('a < b:', a < b)"
        ],
        expectedOutput: ['1 == 1: true', '1 ~= 2: true', 'a < b: true']
    },
    {
        name: 'Nil and Undefined Variables',
        lines: [
            "print('s:', s)",
            "print('1 == s:', 1 == s)"
        ],
        expectedOutput: ['s: nil', '1 == s: false']
    },
    {
        name: 'Logical Operators',
        lines: [
            'if 1 == 1 and 2 == 2 then',
            "   print('and: true')",
            'else',
            "   print('and: false')",
            'end',
            'if 1 == 2 or 2 == 2 then',
            "   print('or: true')",
            'else',
            "   print('or: false')",
            'end',
            'if not false then',
            "   print('not: true')",
            'end'
        ],
        expectedOutput: ['and: true', 'or: true', 'not: true']
    },
    {
        name: 'Function and Recursion',
        lines: [
            'local function factorial(n)',
            '   if n == 0 then',
            '      return 1',
            '   else',
            '      return n * factorial(n - 1)',
            '   end',
            'end',
            "print('factorial(5):', factorial(5))"
        ],
        expectedOutput: ['factorial(5): 120']
    },
    {
        name: 'Multiple Return Values',
        lines: [
            'local function multiReturn(a, b)',
            '   return a + b, a * b',
            'end',
            'sum, product = multiReturn(3, 4)',
            "print('sum:', sum, 'product:', product)"
        ],
        expectedOutput: ['sum: 7 product: 12']
    },
    {
        name: 'Nested if/else',
        lines: [
            'if 1 == 1 then',
            '   if 2 == 3 then',
            "      print('nested: inner if')",
            '   else',
            "      print('nested: inner else')",
            '   end',
            'end'
        ],
        expectedOutput: ['nested: inner else']
    },
    {
        name: 'String Concatenation',
        lines: [
            "name = 'Alice'",
            "greeting = 'Hello ' .. name .. '!'",
            'print(greeting)'
        ],
        expectedOutput: ['Hello Alice!']
    }
];

function toBuiltins(modules: readonly ModuleAdapter[]): BuiltinFunction[] {
    return modules.flatMap((module) =>
        Object.entries(module.functions).map(([name, handler]) => new BuiltinFunction(name, handler))
    );
}

function compareOutput(expected: readonly string[], actual: readonly string[]): string | null {
    if (expected.length !== actual.length) {
        return `Expected ${expected.length} output line(s), got ${actual.length}`;
    }
    for (let i = 0; i < expected.length; i++) {
        if (expected[i] !== actual[i]) {
            return `Output line ${i + 1}: expected "${expected[i]}", got "${actual[i]}"`;
        }
    }
    return null;
}

/**
 * Run demonstration cases on a fresh thread with captured output
 */
export async function runDemoSuite(cases: readonly DemoCase[] = DEMO_CASES): Promise<DemoSuiteResult> {
    let captured: string[] = [];
    const thread = new ScriptThread(
        toBuiltins([createCoreModule((line) => captured.push(line)), MathModule, TestModule]),
        'demo',
        { onError: null }
    );

    const results: DemoCaseResult[] = [];
    for (const demo of cases) {
        captured = [];
        const report = await thread.executeScript(demo.lines);
        const message = report.errors.length > 0
            ? report.errors[0].message
            : compareOutput(demo.expectedOutput, captured);
        results.push({ name: demo.name, passed: message === null, output: captured, message });
    }

    const passed = results.filter((result) => result.passed).length;
    return { results, passed, failed: results.length - passed };
}

/**
 * One summary line per case: `<name>: PASS` or `<name>: FAIL - <message>`
 */
export function formatDemoResult(result: DemoCaseResult): string {
    return result.passed ? `${result.name}: PASS` : `${result.name}: FAIL - ${result.message}`;
}
