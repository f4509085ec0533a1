/**
 * Command-line argument parsing for the Moonlet CLI
 */

export interface CliArgs {
    positionalArgs: string[];
    namedArgs: Record<string, string | true>;
}

/**
 * Split argv into positional arguments and named flags.
 * `--name value` and `--name=value` carry a value; a flag followed by
 * another flag or by nothing is a bare switch (true).
 *
 * @example
 * ```typescript
 * parseCliArgs(['script.lua', '--config', 'moonlet.json5']);
 * // { positionalArgs: ['script.lua'], namedArgs: { config: 'moonlet.json5' } }
 * ```
 */
export function parseCliArgs(argv: readonly string[], switches: readonly string[] = []): CliArgs {
    const positionalArgs: string[] = [];
    const namedArgs: Record<string, string | true> = {};

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (!arg.startsWith('--') || arg === '--') {
            positionalArgs.push(arg);
            continue;
        }

        const body = arg.slice(2);
        const equals = body.indexOf('=');
        if (equals >= 0) {
            namedArgs[body.slice(0, equals)] = body.slice(equals + 1);
            continue;
        }

        const following = argv[i + 1];
        if (!switches.includes(body) && following !== undefined && !following.startsWith('--')) {
            namedArgs[body] = following;
            i++;
        } else {
            namedArgs[body] = true;
        }
    }

    return { positionalArgs, namedArgs };
}
