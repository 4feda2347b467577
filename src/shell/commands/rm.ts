/**
 * `rm` builtin implementation.
 *
 * Supported flags:
 * - `-r`, `-rf`, `-fr`: remove directories and their contents.
 *
 * Every other token, including other dash tokens, is a path operand.
 * Symbolic links are removed themselves, never their targets.
 */

import fs from 'fs';
import type { BuiltinCommand } from './types.js';
import { NotFoundError, OperandError, TypeMismatchError } from '../errors.js';
import { path_resolve } from '../path.js';
import { argv_parse, entry_lstat, outcome_ok, type ParsedArgv } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'rm',
    create: () => (args, cwd) => {
        if (args.length === 0) {
            throw new OperandError('rm: missing operand');
        }

        const parsed: ParsedArgv = argv_parse(args, {
            flags: { '-r': ['recursive'], '-rf': ['recursive'], '-fr': ['recursive'] },
            unknown: 'operand'
        });
        if (parsed.operands.length === 0) {
            throw new OperandError('rm: missing path');
        }

        const recursive: boolean = parsed.flags.has('recursive');
        for (const operand of parsed.operands) {
            const target: string = path_resolve(operand, cwd);
            const stats = entry_lstat(target);
            if (stats === null) {
                throw new NotFoundError(`rm: cannot remove '${operand}': No such file or directory`);
            }
            if (stats.isDirectory()) {
                if (!recursive) {
                    throw new TypeMismatchError(`rm: cannot remove '${operand}': Is a directory`);
                }
                fs.rmSync(target, { recursive: true });
            } else {
                fs.unlinkSync(target);
            }
        }
        return outcome_ok('', cwd);
    }
};
