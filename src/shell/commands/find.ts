/**
 * `find` builtin implementation.
 *
 * Supported flags:
 * - `-name PATTERN`: keep entries whose name contains `PATTERN`.
 *
 * Other dash tokens are ignored; the last remaining token is the start
 * path (default: the working directory). Each directory reports its files
 * and then its subdirectories, both sorted, before descending. Symlinked
 * directories are reported but not entered.
 */

import path from 'path';
import type { BuiltinCommand } from './types.js';
import { NotFoundError } from '../errors.js';
import { path_resolve } from '../path.js';
import { argv_parse, directory_list, entry_stat, outcome_ok, type DirectoryListing, type ParsedArgv } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'find',
    create: () => (args, cwd) => {
        const parsed: ParsedArgv = argv_parse(args, { values: { '-name': 'name' }, unknown: 'ignore' });
        const start: string = parsed.operands.length > 0
            ? path_resolve(parsed.operands[parsed.operands.length - 1], cwd)
            : cwd;

        const stats = entry_stat(start);
        if (stats === null) {
            throw new NotFoundError(`find: '${start}': No such file or directory`);
        }

        const pattern: string | undefined = parsed.values.get('name');
        const results: string[] = [];
        if (stats.isDirectory()) {
            find_walk(start, pattern, results);
        }
        return outcome_ok(results.length > 0 ? `${results.join('\n')}\n` : '', cwd);
    }
};

function find_walk(root: string, pattern: string | undefined, results: string[]): void {
    const listing: DirectoryListing | null = directory_list(root);
    if (listing === null) {
        return;
    }
    for (const name of [...listing.files, ...listing.directories]) {
        if (pattern === undefined || name.includes(pattern)) {
            results.push(path.join(root, name));
        }
    }
    for (const name of listing.descend) {
        find_walk(path.join(root, name), pattern, results);
    }
}
