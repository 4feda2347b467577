#!/usr/bin/env node
/**
 * @file REPL Entry Point
 *
 * Usage:
 *   npx tsx src/cli/main.ts
 *   npx tsx src/cli/main.ts --cwd /srv/scratch
 *   npx tsx src/cli/main.ts --config ./termlet.yaml
 *
 * @module
 */

import { settings_resolve, workingDirectory_prepare, type ResolvedSettings } from '../config/settings.js';
import { cliArgs_parse, type CliOptions } from './args.js';
import { repl_start } from './Repl.js';

const ALLOWED: ReadonlySet<keyof CliOptions> = new Set<keyof CliOptions>(['cwd', 'config']);

const parsed = cliArgs_parse(process.argv.slice(2), ALLOWED);
if (parsed.unknown.length > 0) {
    console.error(`Unknown arguments: ${parsed.unknown.join(' ')}`);
    console.error('Usage: termlet [--cwd DIR] [--config FILE]');
    process.exit(2);
}

try {
    const resolved: ResolvedSettings = settings_resolve({
        initialCwd: parsed.options.cwd,
        configPath: parsed.options.config
    });
    for (const warning of resolved.warnings) {
        console.warn(warning);
    }
    workingDirectory_prepare(resolved.settings.initialCwd);
    repl_start({ cwd: resolved.settings.initialCwd });
} catch (e: unknown) {
    console.error(`Fatal error: ${e instanceof Error ? e.message : String(e)}`);
    process.exit(1);
}
