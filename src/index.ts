/**
 * Moonlet - an interpreter for a small Lua-like scripting language
 *
 * @example
 * const moonlet = new Moonlet();
 * await moonlet.executeScript('local a = 1 + 2\nprint("a =", a)');
 */

import { Executor, type AssignmentScope } from './classes/Executor';
import { TokenStream } from './classes/TokenStream';
import { ScriptThread, type ErrorReporter, type ScriptReport, type ScriptRun } from './classes/ScriptThread';
import { BuiltinFunction, type BuiltinHandler, type Value } from './utils/types';
import type {
    FunctionMetadata,
    ModuleAdapter,
    ModuleMetadata
} from './types/Environment.type';
import { createCoreModule, type OutputSink } from './modules/Core';
import MathModule from './modules/Math';
import TestModule from './modules/Test';
import { MODULE_NAMES, type ModuleName } from './utils/config';

export type { Value, BuiltinHandler, BuiltinResult, Callable, EvalResult } from './utils/types';
export { UserFunction, BuiltinFunction, MultiValue } from './utils/types';
export type {
    DataType,
    ParameterMetadata,
    FunctionMetadata,
    ModuleMetadata,
    ModuleAdapter
} from './types/Environment.type';
export type { AssignmentScope, Completion, ExecutorOptions } from './classes/Executor';
export type { ErrorReporter, ScriptReport, ScriptRun, ThreadOptions } from './classes/ScriptThread';
export type { OutputSink } from './modules/Core';
export type { LineError, LineErrorKind } from './utils/errorFormatter';
export { formatLineError, toLineError } from './utils/errorFormatter';
export { formatValue, getValueType, isTruthy } from './utils/valueConversion';
export * from './classes';
export { runDemoSuite, formatDemoResult, DEMO_CASES } from './classes/DemoSuite';
export type { DemoCase, DemoCaseResult, DemoSuiteResult } from './classes/DemoSuite';
export { parseConfig, loadConfig, MODULE_NAMES } from './utils/config';
export type { MoonletConfig, ModuleName } from './utils/config';

export interface MoonletOptions {
    /**
     * Native modules to load (default: all)
     */
    modules?: readonly ModuleName[];
    /**
     * Where print writes its lines (default: console.log)
     */
    output?: OutputSink;
    /**
     * Reporter for failed lines; null keeps errors in the script report only
     */
    onError?: ErrorReporter | null;
    assignmentScope?: AssignmentScope;
    /**
     * Turn on trace output for every Moonlet instance
     */
    debug?: boolean;
}

export class Moonlet {
    private readonly builtins: Map<string, BuiltinFunction> = new Map();
    private readonly functionMetadata: Map<string, FunctionMetadata> = new Map();
    private readonly moduleMetadata: Map<string, ModuleMetadata> = new Map();
    private readonly threads: Map<string, ScriptThread> = new Map();
    private readonly options: MoonletOptions;
    private defaultThread: ScriptThread | null = null;

    constructor(options: MoonletOptions = {}) {
        this.options = options;

        if (options.debug !== undefined) {
            Executor.debug = options.debug;
            TokenStream.debug = options.debug;
        }

        const output: OutputSink = options.output ?? ((line) => console.log(line));
        const natives: Record<ModuleName, ModuleAdapter> = {
            core: createCoreModule(output),
            math: MathModule,
            test: TestModule
        };

        for (const name of options.modules ?? MODULE_NAMES) {
            this.loadModule(natives[name]);
        }
    }

    /**
     * Load a module using the adapter pattern: its functions become global
     * builtins and its documentation becomes queryable.
     */
    loadModule(module: ModuleAdapter): void {
        for (const [name, handler] of Object.entries(module.functions)) {
            this.registerBuiltin(name, handler);
        }
        for (const [name, metadata] of Object.entries(module.functionMetadata)) {
            this.functionMetadata.set(name, metadata);
        }
        this.moduleMetadata.set(module.name, module.moduleMetadata);
    }

    /**
     * Register a builtin function. Threads that already exist see it too,
     * unless a script there has rebound the name.
     */
    registerBuiltin(name: string, handler: BuiltinHandler): void {
        const previous = this.builtins.get(name);
        const builtin = new BuiltinFunction(name, handler);
        this.builtins.set(name, builtin);

        for (const thread of this.threads.values()) {
            const env = thread.getEnvironment();
            if (!env.hasOwn(name) || env.get(name) === previous) {
                env.define(name, builtin);
            }
        }
    }

    /**
     * Get metadata for a builtin; null if none is registered
     */
    getFunctionMetadata(functionName: string): FunctionMetadata | null {
        return this.functionMetadata.get(functionName) ?? null;
    }

    /**
     * Get module metadata (description and methods list); null if the module is not loaded
     */
    getModuleInfo(moduleName: string): ModuleMetadata | null {
        return this.moduleMetadata.get(moduleName) ?? null;
    }

    /**
     * Names of every registered builtin
     */
    getBuiltinNames(): string[] {
        return [...this.builtins.keys()];
    }

    /**
     * Generate a UUID v4
     */
    private generateUUID(): string {
        return 'xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx'.replace(/[xy]/g, (c) => {
            const r = Math.random() * 16 | 0;
            const v = c === 'x' ? r : (r & 0x3 | 0x8);
            return v.toString(16);
        });
    }

    /**
     * Create a new thread. Each thread has its own root environment but
     * shares the builtin registry with this instance.
     *
     * @param id - Thread ID; a UUID is generated when omitted
     *
     * @example
     * const thread = moonlet.createThread('worker');
     * const run = thread.runScript('print(sqrt(16))');
     * const report = await run.done;
     */
    createThread(id?: string): ScriptThread {
        const threadId = id || this.generateUUID();

        if (this.threads.has(threadId)) {
            throw new Error(`Thread with ID "${threadId}" already exists`);
        }

        const thread = new ScriptThread(this.builtins.values(), threadId, {
            assignmentScope: this.options.assignmentScope,
            onError: this.options.onError
        });
        this.threads.set(threadId, thread);
        return thread;
    }

    /**
     * Get a thread by ID
     */
    getThread(id: string): ScriptThread | null {
        return this.threads.get(id) ?? null;
    }

    /**
     * List the IDs of all open threads
     */
    listThreads(): string[] {
        return [...this.threads.keys()];
    }

    /**
     * Close a thread by ID
     */
    closeThread(id: string): void {
        const thread = this.threads.get(id);
        if (!thread) {
            throw new Error(`Thread with ID "${id}" not found`);
        }
        if (this.defaultThread === thread) {
            this.defaultThread = null;
        }
        this.threads.delete(id);
    }

    private getDefaultThread(): ScriptThread {
        if (!this.defaultThread) {
            this.defaultThread = this.createThread();
        }
        return this.defaultThread;
    }

    /**
     * Execute a script on the default thread and wait for it to finish
     */
    async executeScript(script: string | readonly string[]): Promise<ScriptReport> {
        return this.getDefaultThread().executeScript(script);
    }

    /**
     * Start a script on the default thread in the background
     */
    runScript(script: string | readonly string[], signal?: AbortSignal): ScriptRun {
        return this.getDefaultThread().runScript(script, signal);
    }

    /**
     * Execute a single logical line on the default thread (for REPL)
     */
    async executeLine(line: string): Promise<Value> {
        return this.getDefaultThread().executeLine(line);
    }

    /**
     * Get a variable from the default thread's root environment
     */
    getVariable(name: string): Value {
        return this.getDefaultThread().getVariable(name);
    }

    /**
     * Set a variable in the default thread's root environment
     */
    setVariable(name: string, value: Value): void {
        this.getDefaultThread().setVariable(name, value);
    }
}

export default Moonlet;
