import { describe, it, expect } from 'vitest';
import { runDemoSuite, formatDemoResult, DEMO_CASES, type DemoCase } from './DemoSuite';

describe('DemoSuite', () => {
    it('passes every built-in case', async () => {
        const suite = await runDemoSuite();
        expect(suite.failed).toBe(0);
        expect(suite.passed).toBe(DEMO_CASES.length);
        expect(suite.results.map(formatDemoResult)).toEqual([
            'Arithmetic and Grouping: PASS',
            'Relational Operators: PASS',
            'Nil and Undefined Variables: PASS',
            'Logical Operators: PASS',
            'Function and Recursion: PASS',
            'Multiple Return Values: PASS',
            'Nested if/else: PASS',
            'String Concatenation: PASS'
        ]);
    });

    it('captures print output per case', async () => {
        const suite = await runDemoSuite();
        expect(suite.results[0].output).toEqual(['a = 11 b = 14']);
        expect(suite.results[5].output).toEqual(['sum: 7 product: 12']);
    });

    it('fails a case whose output differs', async () => {
        const cases: DemoCase[] = [{ name: 'Wrong', lines: ['print(1 + 1)'], expectedOutput: ['3'] }];
        const suite = await runDemoSuite(cases);
        expect(suite.failed).toBe(1);
        expect(formatDemoResult(suite.results[0])).toBe('Wrong: FAIL - Output line 1: expected "3", got "2"');
    });

    it('fails a case on the first error', async () => {
        const cases: DemoCase[] = [{ name: 'Broken', lines: ['x = 1 +', 'print(x)'], expectedOutput: ['nil'] }];
        const suite = await runDemoSuite(cases);
        expect(suite.results[0]).toEqual({
            name: 'Broken',
            passed: false,
            output: ['nil'],
            message: 'Unexpected token in primary expression (found end of input)'
        });
    });

    it('reports a missing output line', async () => {
        const cases: DemoCase[] = [{ name: 'Quiet', lines: ['x = 1'], expectedOutput: ['1'] }];
        const suite = await runDemoSuite(cases);
        expect(suite.results[0].message).toBe('Expected 1 output line(s), got 0');
    });
});
