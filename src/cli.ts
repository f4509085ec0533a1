#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { Moonlet } from './index';
import { runDemoSuite, formatDemoResult } from './classes/DemoSuite';
import { loadConfig, type MoonletConfig } from './utils/config';
import { parseCliArgs } from './utils/args';

function printUsage(): void {
    console.error('Usage: moonlet <script.lua> [--config <file.json5>]');
    console.error('       moonlet --demo');
}

async function runDemo(): Promise<number> {
    const suite = await runDemoSuite();
    console.log('------------ Moonlet Demo Summary ------------');
    for (const result of suite.results) {
        console.log(formatDemoResult(result));
    }
    console.log(`${suite.passed} passed, ${suite.failed} failed`);
    return suite.failed === 0 ? 0 : 1;
}

async function runFile(path: string, config: MoonletConfig): Promise<number> {
    const source = await readFile(path, 'utf8');
    const moonlet = new Moonlet(config);
    const run = moonlet.createThread('main').runScript(source);

    const onInterrupt = (): void => {
        console.error('Interrupted; stopping after the current line');
        run.cancel();
    };
    process.once('SIGINT', onInterrupt);

    try {
        const report = await run.done;
        if (report.cancelled) {
            return 130;
        }
        return report.errors.length === 0 ? 0 : 1;
    } finally {
        process.off('SIGINT', onInterrupt);
    }
}

async function main(): Promise<number> {
    const { positionalArgs, namedArgs } = parseCliArgs(process.argv.slice(2), ['demo', 'help']);

    if (namedArgs.help === true) {
        printUsage();
        return 0;
    }
    if (namedArgs.demo === true) {
        return runDemo();
    }

    const script = positionalArgs[0];
    if (script === undefined) {
        printUsage();
        return 2;
    }

    const configPath = namedArgs.config;
    if (configPath === true) {
        console.error('--config needs a file path');
        return 2;
    }
    const config = configPath === undefined ? {} : loadConfig(configPath);

    return runFile(script, config);
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
    });
