import { describe, it, expect, beforeEach } from 'vitest';
import { Executor, type ExecutorOptions } from './Executor';
import { Environment } from './Environment';
import { Parser } from './Parser';
import { ArityMismatchError, NotCallableError, TypeCoercionError } from './exceptions';
import { BuiltinFunction, MultiValue, UserFunction, type EvalResult, type Value } from '../utils/types';
import { formatValue } from '../utils/valueConversion';

describe('Executor', () => {
    let env: Environment;
    let output: string[];

    beforeEach(() => {
        env = new Environment();
        output = [];
        env.define('print', new BuiltinFunction('print', (args) => {
            output.push(args.map(formatValue).join(' '));
            return null;
        }));
    });

    async function run(lines: string[], options: ExecutorOptions = {}): Promise<void> {
        const executor = new Executor(options);
        for (const line of lines) {
            await executor.executeStatement(new Parser(line).parse(), env);
        }
    }

    async function evaluate(source: string): Promise<EvalResult> {
        const stmt = new Parser(source).parse();
        if (stmt.type !== 'expression') {
            throw new Error(`not an expression: ${source}`);
        }
        return new Executor().evaluate(stmt.expression, env);
    }

    describe('arithmetic and comparison', () => {
        it('follows operator precedence and grouping', async () => {
            await run(['a = 3 + 4 * 2', 'b = (3 + 4) * 2']);
            expect(env.get('a')).toBe(11);
            expect(env.get('b')).toBe(14);
        });

        it('divides as floating point', async () => {
            expect(await evaluate('7 / 2')).toBe(3.5);
            expect(await evaluate('1 / 0')).toBe(Infinity);
        });

        it('coerces numeric strings in arithmetic', async () => {
            expect(await evaluate('"10" + 5')).toBe(15);
        });

        it('rejects non-numeric operands', async () => {
            await expect(evaluate('1 + nil')).rejects.toThrow(TypeCoercionError);
            await expect(evaluate('"abc" * 2')).rejects.toThrow("Attempt to perform '*' on a string value");
            await expect(evaluate('true < 1')).rejects.toThrow("Attempt to perform '<' on a boolean value");
        });

        it('compares for equality without coercion', async () => {
            expect(await evaluate('1 == 1')).toBe(true);
            expect(await evaluate('1 ~= 2')).toBe(true);
            expect(await evaluate('1 == "1"')).toBe(false);
            expect(await evaluate('nil == nil')).toBe(true);
            expect(await evaluate('1 == missing')).toBe(false);
        });

        it('orders numbers', async () => {
            expect(await evaluate('1 < 2')).toBe(true);
            expect(await evaluate('2 <= 2')).toBe(true);
            expect(await evaluate('1 > 2')).toBe(false);
            expect(await evaluate('3 >= 4')).toBe(false);
        });

        it('negates numbers and truthiness', async () => {
            expect(await evaluate('-5 + 2')).toBe(-3);
            expect(await evaluate('not nil')).toBe(true);
            expect(await evaluate('not 0')).toBe(false);
        });
    });

    describe('concatenation', () => {
        it('joins strings and numbers', async () => {
            await run(['name = "Alice"', 'greeting = "Hello " .. name .. "!"']);
            expect(env.get('greeting')).toBe('Hello Alice!');
            expect(await evaluate('"n" .. 12')).toBe('n12');
            expect(await evaluate('"ok: " .. true')).toBe('ok: true');
        });

        it('rejects nil', async () => {
            await expect(evaluate('"x" .. nothing')).rejects.toThrow('Attempt to concatenate a nil value');
        });
    });

    describe('logical operators', () => {
        it('returns the deciding operand', async () => {
            expect(await evaluate('nil or "fallback"')).toBe('fallback');
            expect(await evaluate('1 and 2')).toBe(2);
            expect(await evaluate('false and undefinedCall()')).toBe(false);
        });

        it('short-circuits the right operand', async () => {
            await run(['x = 1 == 1 or print("never")']);
            expect(env.get('x')).toBe(true);
            expect(output).toEqual([]);
        });

        it('treats zero and the empty string as truthy', async () => {
            await run(['if 0 then print("zero") end', 'if "" then print("empty") end']);
            expect(output).toEqual(['zero', 'empty']);
        });
    });

    describe('if statements', () => {
        it('runs the matching branch only', async () => {
            await run(['if 1 == 2 or 2 == 2 then print("or: true") else print("or: false") end']);
            expect(output).toEqual(['or: true']);
        });

        it('handles nested if/else', async () => {
            await run(['if 1 == 1 then if 2 == 3 then print("inner if") else print("inner else") end end']);
            expect(output).toEqual(['inner else']);
        });

        it('does nothing when the condition fails and there is no else', async () => {
            await run(['if nil then print("no") end']);
            expect(output).toEqual([]);
        });
    });

    describe('functions', () => {
        it('computes factorial recursively', async () => {
            await run([
                'local function factorial(n) if n == 0 then return 1 else return n * factorial(n - 1) end end',
                'result = factorial(5)'
            ]);
            expect(env.get('result')).toBe(120);
        });

        it('spreads multiple return values over assignment targets', async () => {
            await run([
                'local function multiReturn(a, b) return a + b, a * b end',
                'sum, product = multiReturn(3, 4)'
            ]);
            expect(env.get('sum')).toBe(7);
            expect(env.get('product')).toBe(12);
        });

        it('fills missing targets with nil and drops extra values', async () => {
            env.define('seed', 9);
            await run([
                'local function two() return 1, 2 end',
                'a, b, seed = two()',
                'c = two()'
            ]);
            expect(env.get('a')).toBe(1);
            expect(env.get('b')).toBe(2);
            expect(env.get('seed')).toBeNull();
            expect(env.get('c')).toBe(1);
        });

        it('collapses multiple results passed as arguments', async () => {
            await run([
                'local function two() return 1, 2 end',
                'print(two(), "x")'
            ]);
            expect(output).toEqual(['1 x']);
        });

        it('returns nil from a body without return', async () => {
            await run(['function noop() x = 1 end', 'r = noop()']);
            expect(env.get('r')).toBeNull();
            expect(await evaluate('noop()')).toBeNull();
        });

        it('keeps a call yielding several values as a MultiValue', async () => {
            await run(['function pair() return "a", "b" end']);
            const result = await evaluate('pair()');
            expect(result).toBeInstanceOf(MultiValue);
            if (result instanceof MultiValue) {
                expect(result.values).toEqual(['a', 'b']);
            }
        });

        it('refuses arithmetic on several values', async () => {
            await run(['function pair() return 1, 2 end']);
            await expect(evaluate('pair() + 1')).rejects.toThrow("Attempt to perform '+' on multiple values (2)");
        });

        it('expands only the last return expression', async () => {
            await run([
                'function pair() return 1, 2 end',
                'function wrap() return pair(), pair() end',
                'a, b, c, d = wrap()'
            ]);
            expect([env.get('a'), env.get('b'), env.get('c'), env.get('d')]).toEqual([1, 1, 2, null]);
        });

        it('propagates return through nested if blocks', async () => {
            await run([
                'function classify(n) if n > 0 then if n > 10 then return "big" end return "small" end return "none" end',
                'x = classify(50)',
                'y = classify(5)',
                'z = classify(0)'
            ]);
            expect([env.get('x'), env.get('y'), env.get('z')]).toEqual(['big', 'small', 'none']);
        });

        it('captures the defining environment', async () => {
            await run([
                'function makeCounter() local count = 10 local function current() return count end return current end',
                'counter = makeCounter()',
                'count = 99',
                'value = counter()'
            ]);
            expect(env.get('counter')).toBeInstanceOf(UserFunction);
            expect(env.get('value')).toBe(10);
        });

        it('does not leak parameters into the caller', async () => {
            await run(['function f(p) return p end', 'f(1)']);
            expect(env.hasOwn('p')).toBe(false);
        });

        it('checks arity', async () => {
            await run(['function f(a, b) return a end']);
            await expect(evaluate('f(1)')).rejects.toThrow(ArityMismatchError);
            await expect(evaluate('f(1)')).rejects.toThrow("Argument count mismatch calling 'f': expected 2, got 1");
        });

        it('rejects calling a non-function', async () => {
            await run(['x = 5']);
            await expect(evaluate('x()')).rejects.toThrow(NotCallableError);
            await expect(evaluate('x()')).rejects.toThrow("Attempt to call a non-function value ('x' is number)");
        });

        it('awaits asynchronous builtins', async () => {
            env.define('later', new BuiltinFunction('later', async (args: Value[]) => {
                await Promise.resolve();
                return args.length;
            }));
            expect(await evaluate('later(1, 2, 3)')).toBe(3);
        });

        it('calls functions directly from the host', async () => {
            await run(['function add(a, b) return a + b end']);
            const add = env.get('add');
            expect(add).toBeInstanceOf(UserFunction);
            if (add instanceof UserFunction) {
                const result = await new Executor().callFunction(add, [2, 3]);
                expect(result).toBeInstanceOf(MultiValue);
                if (result instanceof MultiValue) {
                    expect(result.values).toEqual([5]);
                }
            }
        });
    });

    describe('assignment scope', () => {
        const script = [
            'total = 1',
            'function bump() total = total + 1 return total end',
            'inner = bump()'
        ];

        it('shadows outer bindings by default', async () => {
            await run(script);
            expect(env.get('inner')).toBe(2);
            expect(env.get('total')).toBe(1);
        });

        it('updates the nearest binding with the nearest strategy', async () => {
            await run(script, { assignmentScope: 'nearest' });
            expect(env.get('inner')).toBe(2);
            expect(env.get('total')).toBe(2);
        });

        it('still defines new names locally with the nearest strategy', async () => {
            await run(['function setTemp() temp = 4 end', 'setTemp()'], { assignmentScope: 'nearest' });
            expect(env.get('temp')).toBeNull();
        });
    });
});
