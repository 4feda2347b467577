#!/usr/bin/env node
/**
 * @file Server Entry Point
 *
 * Usage:
 *   npx tsx src/cli/server.ts
 *   npx tsx src/cli/server.ts --host 0.0.0.0 --port 5001 --cwd /srv/scratch
 *
 * @module
 */

import { shellServer_start } from '../server/ShellServer.js';
import { cliArgs_parse, type CliOptions } from './args.js';

const ALLOWED: ReadonlySet<keyof CliOptions> = new Set<keyof CliOptions>(['host', 'port', 'cwd', 'config']);

const parsed = cliArgs_parse(process.argv.slice(2), ALLOWED);
if (parsed.unknown.length > 0) {
    console.error(`Unknown arguments: ${parsed.unknown.join(' ')}`);
    console.error('Usage: termlet-server [--host HOST] [--port PORT] [--cwd DIR] [--config FILE]');
    process.exit(2);
}

try {
    shellServer_start({
        host: parsed.options.host,
        port: parsed.options.port,
        initialCwd: parsed.options.cwd,
        configPath: parsed.options.config
    });
} catch (e: unknown) {
    console.error(`Fatal error: ${e instanceof Error ? e.message : String(e)}`);
    process.exit(1);
}
