/**
 * `touch` builtin implementation.
 *
 * Creates missing parent directories and an empty file when absent;
 * otherwise sets access and modification time to now.
 */

import fs from 'fs';
import path from 'path';
import type { BuiltinCommand } from './types.js';
import { OperandError } from '../errors.js';
import { path_resolve } from '../path.js';
import { outcome_ok } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'touch',
    create: ({ clock }) => (args, cwd) => {
        if (args.length === 0) {
            throw new OperandError('touch: missing file operand');
        }
        for (const operand of args) {
            const target: string = path_resolve(operand, cwd);
            fs.mkdirSync(path.dirname(target), { recursive: true });
            fs.closeSync(fs.openSync(target, 'a'));
            const now: Date = clock();
            fs.utimesSync(target, now, now);
        }
        return outcome_ok('', cwd);
    }
};
