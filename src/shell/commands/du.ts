/**
 * `du` builtin implementation.
 *
 * Prints `BYTES\tPATH` for the first operand (default: the working
 * directory). A directory reports the summed size of every file below it;
 * entries that cannot be stat'ed are left out of the sum.
 */

import fs from 'fs';
import path from 'path';
import type { BuiltinCommand } from './types.js';
import { NotFoundError } from '../errors.js';
import { path_resolve } from '../path.js';
import { directory_list, entry_stat, outcome_ok, type DirectoryListing } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'du',
    create: () => (args, cwd) => {
        const operand: string = args.length > 0 ? args[0] : cwd;
        const target: string = path_resolve(operand, cwd);

        const stats: fs.Stats | null = entry_stat(target);
        if (stats === null) {
            throw new NotFoundError(`du: ${operand}: No such file or directory`);
        }

        const total: number = stats.isDirectory() ? directorySize_sum(target) : stats.size;
        return outcome_ok(`${total}\t${target}\n`, cwd);
    }
};

function directorySize_sum(directory: string): number {
    const listing: DirectoryListing | null = directory_list(directory);
    if (listing === null) {
        return 0;
    }

    let total: number = 0;
    for (const name of listing.files) {
        total += fileSize_get(path.join(directory, name));
    }
    for (const name of listing.descend) {
        total += directorySize_sum(path.join(directory, name));
    }
    return total;
}

/**
 * Size of one file, or 0 when it cannot be stat'ed (dangling symlink,
 * removed mid-walk, permission denied).
 */
function fileSize_get(filePath: string): number {
    try {
        return fs.statSync(filePath).size;
    } catch {
        return 0;
    }
}
