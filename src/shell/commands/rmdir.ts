/**
 * `rmdir` builtin implementation. Removes empty directories only.
 */

import fs from 'fs';
import type { BuiltinCommand } from './types.js';
import { IOFailure, NotFoundError, OperandError, TypeMismatchError, errorCode_get, errorMessage_get } from '../errors.js';
import { path_resolve } from '../path.js';
import { entry_stat, outcome_ok } from './_shared.js';

const NOT_EMPTY_CODES: ReadonlySet<string> = new Set<string>(['ENOTEMPTY', 'EEXIST']);

export const command: BuiltinCommand = {
    name: 'rmdir',
    create: () => (args, cwd) => {
        if (args.length === 0) {
            throw new OperandError('rmdir: missing operand');
        }
        for (const operand of args) {
            const target: string = path_resolve(operand, cwd);
            const stats = entry_stat(target);
            if (stats === null) {
                throw new NotFoundError(`rmdir: failed to remove '${operand}': No such file or directory`);
            }
            if (!stats.isDirectory()) {
                throw new TypeMismatchError(`rmdir: failed to remove '${operand}': Not a directory`);
            }
            try {
                fs.rmdirSync(target);
            } catch (error: unknown) {
                const code: string | null = errorCode_get(error);
                if (code !== null && NOT_EMPTY_CODES.has(code)) {
                    throw new TypeMismatchError(`rmdir: failed to remove '${operand}': Directory not empty`);
                }
                throw new IOFailure(`rmdir: failed to remove '${operand}': ${errorMessage_get(error)}`);
            }
        }
        return outcome_ok('', cwd);
    }
};
