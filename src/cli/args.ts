/**
 * @file CLI Argument Parsing
 *
 * Flag parsing shared by the `termlet` and `termlet-server` entry points.
 *
 * @module
 */

export interface CliOptions {
    host?: string;
    port?: number;
    cwd?: string;
    config?: string;
}

/**
 * Parse `--host`, `--port`, `--cwd` and `--config` flags.
 *
 * Unknown tokens are returned for the caller to report.
 *
 * @param argv - Arguments after the script name.
 * @param allowed - Flags this entry point accepts.
 */
export function cliArgs_parse(
    argv: readonly string[],
    allowed: ReadonlySet<keyof CliOptions>
): { options: CliOptions; unknown: string[] } {
    const options: CliOptions = {};
    const unknown: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        const flag: string = argv[i];
        const value: string | undefined = argv[i + 1];
        const name: string = flag.replace(/^--/, '');

        if (!flag.startsWith('--') || value === undefined || !cliOption_isAllowed(name, allowed)) {
            unknown.push(flag);
            continue;
        }

        i++;
        if (name === 'port') {
            options.port = Number.parseInt(value, 10);
        } else if (name === 'host') {
            options.host = value;
        } else if (name === 'cwd') {
            options.cwd = value;
        } else {
            options.config = value;
        }
    }

    return { options, unknown };
}

function cliOption_isAllowed(name: string, allowed: ReadonlySet<keyof CliOptions>): name is keyof CliOptions {
    return (name === 'host' || name === 'port' || name === 'cwd' || name === 'config') && allowed.has(name);
}
