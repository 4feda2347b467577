/**
 * `stat` builtin implementation. Reports the first operand only.
 */

import fs from 'fs';
import type { BuiltinCommand } from './types.js';
import { NotFoundError, OperandError } from '../errors.js';
import { path_resolve } from '../path.js';
import { entry_stat, outcome_ok, timestamp_format } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'stat',
    create: () => (args, cwd) => {
        if (args.length === 0) {
            throw new OperandError('stat: missing file operand');
        }

        const operand: string = args[0];
        const stats: fs.Stats | null = entry_stat(path_resolve(operand, cwd));
        if (stats === null) {
            throw new NotFoundError(`stat: ${operand}: No such file or directory`);
        }

        const lines: string[] = [
            `  File: ${operand}`,
            `  Size: ${stats.size}`,
            `  Mode: 0o${stats.mode.toString(8)}`,
            `Access: ${timestamp_format(stats.atime, true)}`,
            `Modify: ${timestamp_format(stats.mtime, true)}`,
            `Change: ${timestamp_format(stats.ctime, true)}`
        ];
        return outcome_ok(`${lines.join('\n')}\n`, cwd);
    }
};
