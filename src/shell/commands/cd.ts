/**
 * `cd` builtin implementation.
 *
 * With no operand the target is the user's home directory. Only the first
 * operand is used.
 */

import type { BuiltinCommand } from './types.js';
import { NotFoundError, TypeMismatchError } from '../errors.js';
import { path_resolve } from '../path.js';
import { entry_stat, outcome_ok } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'cd',
    create: ({ homeDir }) => (args, cwd) => {
        const operand: string = args.length > 0 ? args[0] : homeDir;
        const target: string = path_resolve(operand, cwd);

        const stats = entry_stat(target);
        if (stats === null) {
            throw new NotFoundError(`cd: ${operand}: No such file or directory`);
        }
        if (!stats.isDirectory()) {
            throw new TypeMismatchError(`cd: ${operand}: Not a directory`);
        }
        return outcome_ok('', target);
    }
};
