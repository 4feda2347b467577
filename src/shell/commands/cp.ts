/**
 * `cp` builtin implementation.
 *
 * Supported flags:
 * - `-r`: copy directories recursively.
 *
 * File copies keep the source mode and timestamps. A directory copied into
 * an existing directory lands under its own basename; otherwise the
 * destination path names the new copy.
 */

import fs from 'fs';
import path from 'path';
import type { BuiltinCommand } from './types.js';
import { IOFailure, NotFoundError, OperandError, TypeMismatchError, errorMessage_get } from '../errors.js';
import { path_basename, path_resolve } from '../path.js';
import { argv_parse, directory_check, entry_stat, outcome_ok, type ParsedArgv } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'cp',
    create: () => (args, cwd) => {
        if (args.length < 2) {
            throw new OperandError('cp: missing file operands');
        }

        const parsed: ParsedArgv = argv_parse(args, { flags: { '-r': ['recursive'] }, unknown: 'operand' });
        if (parsed.operands.length < 2) {
            throw new OperandError('cp: missing destination file operand after source');
        }

        const sources: string[] = parsed.operands.slice(0, -1);
        const destination: string = path_resolve(parsed.operands[parsed.operands.length - 1], cwd);
        if (sources.length > 1 && !directory_check(destination)) {
            throw new TypeMismatchError('cp: target is not a directory');
        }

        for (const operand of sources) {
            const source: string = path_resolve(operand, cwd);
            const stats = entry_stat(source);
            if (stats === null) {
                throw new NotFoundError(`cp: cannot stat '${operand}': No such file or directory`);
            }
            if (stats.isDirectory() && !parsed.flags.has('recursive')) {
                throw new TypeMismatchError(`cp: -r not specified; omitting directory '${operand}'`);
            }

            const target: string = directory_check(destination)
                ? path.join(destination, path_basename(source))
                : destination;
            try {
                if (stats.isDirectory()) {
                    fs.cpSync(source, target, { recursive: true, preserveTimestamps: true, errorOnExist: true, force: false });
                } else {
                    file_copy(source, target, stats);
                }
            } catch (error: unknown) {
                throw new IOFailure(`cp error: ${errorMessage_get(error)}`);
            }
        }
        return outcome_ok('', cwd);
    }
};

/**
 * Copy file content, then carry over permission bits and timestamps.
 */
function file_copy(source: string, target: string, stats: fs.Stats): void {
    fs.copyFileSync(source, target);
    fs.chmodSync(target, stats.mode & 0o7777);
    fs.utimesSync(target, stats.atime, stats.mtime);
}
