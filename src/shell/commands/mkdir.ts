/**
 * `mkdir` builtin implementation.
 *
 * Missing parent directories are always created. Operands are processed in
 * order; the first one that already exists stops the command, leaving
 * earlier directories in place.
 */

import fs from 'fs';
import type { BuiltinCommand } from './types.js';
import { OperandError, TypeMismatchError } from '../errors.js';
import { path_resolve } from '../path.js';
import { entry_lstat, outcome_ok } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'mkdir',
    create: () => (args, cwd) => {
        if (args.length === 0) {
            throw new OperandError('mkdir: missing operand');
        }
        for (const operand of args) {
            const target: string = path_resolve(operand, cwd);
            if (entry_lstat(target) !== null) {
                throw new TypeMismatchError(`mkdir: cannot create directory '${operand}': File exists`);
            }
            fs.mkdirSync(target, { recursive: true });
        }
        return outcome_ok('', cwd);
    }
};
