/**
 * `grep` builtin implementation.
 *
 * `grep PATTERN FILE` prints `LINE:TEXT` for every line containing
 * `PATTERN` as a literal substring, with trailing whitespace removed.
 * Exit status is 1 when nothing matches.
 */

import fs from 'fs';
import type { BuiltinCommand } from './types.js';
import { OperandError } from '../errors.js';
import { path_resolve } from '../path.js';
import { file_require, lines_split, outcome_ok, outcome_status } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'grep',
    create: () => (args, cwd) => {
        if (args.length < 2) {
            throw new OperandError('grep: missing pattern or file');
        }

        const pattern: string = args[0];
        const operand: string = args[1];
        const resolved: string = path_resolve(operand, cwd);
        file_require('grep', operand, resolved);

        const matches: string[] = [];
        lines_split(fs.readFileSync(resolved, 'utf-8')).forEach((line: string, index: number): void => {
            if (line.includes(pattern)) {
                matches.push(`${index + 1}:${line.trimEnd()}`);
            }
        });

        if (matches.length === 0) {
            return outcome_status('', 1, cwd);
        }
        return outcome_ok(`${matches.join('\n')}\n`, cwd);
    }
};
