/**
 * `ls` builtin implementation.
 *
 * Supported flags:
 * - `-l`: long format (type, size, modification time, name).
 * - `-a`: include entries whose name starts with a dot.
 * - `-la`, `-al`: both of the above.
 *
 * Other dash tokens are ignored. The last remaining token is the target.
 */

import fs from 'fs';
import path from 'path';
import type { BuiltinCommand } from './types.js';
import { CommandFailure } from '../errors.js';
import { path_basename, path_resolve } from '../path.js';
import { argv_parse, entry_stat, outcome_ok, timestamp_format, type ParsedArgv } from './_shared.js';

const SIZE_WIDTH: number = 10;
const TIME_WIDTH: number = 16;

export const command: BuiltinCommand = {
    name: 'ls',
    create: () => (args, cwd) => {
        const parsed: ParsedArgv = argv_parse(args, {
            flags: {
                '-l': ['long'],
                '-a': ['all'],
                '-la': ['long', 'all'],
                '-al': ['long', 'all']
            },
            unknown: 'ignore'
        });
        const target: string = parsed.operands.length > 0
            ? path_resolve(parsed.operands[parsed.operands.length - 1], cwd)
            : cwd;

        const stats: fs.Stats | null = entry_stat(target);
        if (stats === null) {
            throw new CommandFailure(`ls: cannot access '${target}': No such file or directory`, 2);
        }
        if (!stats.isDirectory()) {
            return outcome_ok(`${path_basename(target)}\n`, cwd);
        }

        const entries: string[] = fs.readdirSync(target)
            .filter((name: string): boolean => parsed.flags.has('all') || !name.startsWith('.'))
            .sort();

        if (!parsed.flags.has('long')) {
            return outcome_ok(`${entries.join('  ')}\n`, cwd);
        }

        const lines: string[] = entries.map((name: string): string => lsLongLine_render(target, name));
        return outcome_ok(lines.length > 0 ? `${lines.join('\n')}\n` : '', cwd);
    }
};

/**
 * Render one long-format row. Entries that cannot be stat'ed (dangling or
 * looping symlinks, denied access) render with `?` placeholders.
 */
function lsLongLine_render(directory: string, name: string): string {
    let stats: fs.Stats | null;
    try {
        stats = entry_stat(path.join(directory, name));
    } catch {
        stats = null;
    }
    if (stats === null) {
        return `?  ${'?'.padStart(SIZE_WIDTH)}  ${'?'.padStart(TIME_WIDTH)}  ${name}`;
    }
    const type: string = stats.isDirectory() ? 'd' : '-';
    const size: string = String(stats.size).padStart(SIZE_WIDTH);
    return `${type}  ${size}  ${timestamp_format(stats.mtime)}  ${name}`;
}
