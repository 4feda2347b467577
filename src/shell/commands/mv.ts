/**
 * `mv` builtin implementation.
 *
 * `mv SRC DEST` renames; `mv SRC... DIR` moves each source into `DIR`
 * under its own basename. Sources are processed in order and the command
 * stops at the first failure. Moves across filesystems fall back to a
 * copy followed by removal of the source.
 */

import fs from 'fs';
import path from 'path';
import type { BuiltinCommand } from './types.js';
import { IOFailure, NotFoundError, OperandError, TypeMismatchError, errorCode_get, errorMessage_get } from '../errors.js';
import { path_basename, path_resolve } from '../path.js';
import { directory_check, entry_stat, outcome_ok } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'mv',
    create: () => (args, cwd) => {
        if (args.length < 2) {
            throw new OperandError('mv: missing file operands');
        }

        const sources: string[] = args.slice(0, -1);
        const destination: string = path_resolve(args[args.length - 1], cwd);
        if (sources.length > 1 && !directory_check(destination)) {
            throw new TypeMismatchError('mv: target is not a directory');
        }

        for (const operand of sources) {
            const source: string = path_resolve(operand, cwd);
            if (entry_stat(source) === null) {
                throw new NotFoundError(`mv: cannot stat '${operand}': No such file or directory`);
            }
            const target: string = directory_check(destination)
                ? path.join(destination, path_basename(source))
                : destination;
            try {
                entry_move(source, target);
            } catch (error: unknown) {
                throw new IOFailure(`mv error: ${errorMessage_get(error)}`);
            }
        }
        return outcome_ok('', cwd);
    }
};

/**
 * Rename an entry, copying then deleting when the rename crosses devices.
 */
function entry_move(source: string, target: string): void {
    try {
        fs.renameSync(source, target);
    } catch (error: unknown) {
        if (errorCode_get(error) !== 'EXDEV') {
            throw error;
        }
        fs.cpSync(source, target, { recursive: true, preserveTimestamps: true });
        fs.rmSync(source, { recursive: true });
    }
}
