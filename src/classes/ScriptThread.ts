/**
 * ScriptThread class for running scripts against one root environment
 *
 * A thread owns its root Environment; builtins are shared with the Moonlet
 * instance that created it. Scripts run as a detached task that checks the
 * cancellation signal between logical lines and never lets one failing line
 * stop the next.
 */

import { Parser } from './Parser';
import { Executor, type ExecutorOptions } from './Executor';
import { Environment } from './Environment';
import { BuiltinFunction, MultiValue, UserFunction, type Value } from '../utils/types';
import { collapse, getValueType } from '../utils/valueConversion';
import { NotCallableError } from './exceptions';
import { splitIntoLogicalLines, splitSourceLines } from '../utils/stringParsing';
import { formatLineError, toLineError, type LineError } from '../utils/errorFormatter';

export type ErrorReporter = (error: LineError) => void;

export interface ThreadOptions extends ExecutorOptions {
    /**
     * Called for every failed line; null records errors in the report only
     */
    onError?: ErrorReporter | null;
}

/**
 * Outcome of running a script
 */
export interface ScriptReport {
    lines: string[];     // Logical lines the script was assembled into
    executed: number;    // Lines that ran, successfully or not
    errors: LineError[];
    cancelled: boolean;
}

/**
 * Handle to a script running in the background
 */
export interface ScriptRun {
    readonly done: Promise<ScriptReport>;
    cancel(): void;
}

export class ScriptThread {
    public readonly id: string;
    private readonly environment: Environment;
    private readonly executor: Executor;
    private readonly onError: ErrorReporter | null;

    constructor(builtins: Iterable<BuiltinFunction>, id: string, options: ThreadOptions = {}) {
        this.id = id;
        this.environment = new Environment();
        for (const builtin of builtins) {
            this.environment.define(builtin.name, builtin);
        }
        this.executor = new Executor(options);
        this.onError = options.onError === undefined ? defaultReporter : options.onError;
    }

    /**
     * Start a script in the background. The returned handle resolves once
     * every line has run or the run was cancelled.
     *
     * @param source - Script text or its raw lines
     * @param signal - Optional external cancellation signal
     */
    runScript(source: string | readonly string[], signal?: AbortSignal): ScriptRun {
        const controller = new AbortController();
        if (signal) {
            if (signal.aborted) {
                controller.abort();
            } else {
                signal.addEventListener('abort', () => controller.abort(), { once: true });
            }
        }

        const done = new Promise<void>((resolve) => setImmediate(resolve))
            .then(() => this.executeScript(source, controller.signal));

        return {
            done,
            cancel: () => controller.abort()
        };
    }

    /**
     * Assemble and run a script in the calling task
     */
    async executeScript(source: string | readonly string[], signal?: AbortSignal): Promise<ScriptReport> {
        const rawLines = typeof source === 'string' ? splitSourceLines(source) : source;
        return this.executeLines(splitIntoLogicalLines(rawLines), signal);
    }

    /**
     * Run logical lines in order. Cancellation is checked before each line.
     */
    async executeLines(lines: readonly string[], signal?: AbortSignal): Promise<ScriptReport> {
        const report: ScriptReport = { lines: [...lines], executed: 0, errors: [], cancelled: false };

        for (let i = 0; i < lines.length; i++) {
            if (signal?.aborted) {
                report.cancelled = true;
                if (Executor.debug) {
                    console.log(`[ScriptThread ${this.id}] cancelled before line ${i + 1}`);
                }
                break;
            }

            const line = lines[i];
            try {
                await this.executeLine(line);
            } catch (error) {
                const lineError = toLineError(error, i + 1, line);
                report.errors.push(lineError);
                this.onError?.(lineError);
            }
            report.executed++;
        }

        return report;
    }

    /**
     * Lex, parse and execute one logical line (for REPL use).
     * Errors propagate to the caller.
     *
     * @returns The value of an expression statement or top-level return, nil otherwise
     */
    async executeLine(line: string): Promise<Value> {
        const parser = new Parser(line);
        const stmt = parser.parse();

        if (Executor.debug) {
            const trailing = parser.trailingTokens();
            if (trailing.length > 0) {
                console.log(`[ScriptThread ${this.id}] ignoring trailing tokens: ${trailing.map((t) => t.text).join(' ')}`);
            }
        }

        if (stmt.type === 'expression') {
            return collapse(await this.executor.evaluate(stmt.expression, this.environment));
        }

        const completion = await this.executor.executeStatement(stmt, this.environment);
        return completion.kind === 'return' ? completion.values.first() : null;
    }

    /**
     * Call a function bound in this thread's root environment from the host
     *
     * @returns Every value the function produced
     */
    async call(name: string, ...args: Value[]): Promise<Value[]> {
        const callee = this.environment.get(name);
        if (!(callee instanceof UserFunction) && !(callee instanceof BuiltinFunction)) {
            throw new NotCallableError(`'${name}' is ${getValueType(callee)}`);
        }
        const result = await this.executor.callFunction(callee, args);
        return result instanceof MultiValue ? [...result.values] : [result];
    }

    /**
     * Get a root variable value from this thread
     */
    getVariable(name: string): Value {
        return this.environment.get(name);
    }

    /**
     * Set a root variable value in this thread
     */
    setVariable(name: string, value: Value): void {
        this.environment.define(name, value);
    }

    /**
     * Get the root environment of this thread
     */
    getEnvironment(): Environment {
        return this.environment;
    }
}

function defaultReporter(error: LineError): void {
    console.error(formatLineError(error));
}
