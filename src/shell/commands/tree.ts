/**
 * `tree` builtin implementation.
 *
 * Renders the directory named by the first operand (default: the working
 * directory) with box-drawing connectors. Hidden entries are included,
 * entries are sorted, and only real directories are expanded.
 */

import fs from 'fs';
import path from 'path';
import type { BuiltinCommand } from './types.js';
import { NotFoundError, TypeMismatchError, errorCode_get } from '../errors.js';
import { path_resolve } from '../path.js';
import { entry_stat, outcome_ok } from './_shared.js';

const BRANCH: string = '├── ';
const LAST_BRANCH: string = '└── ';
const PIPE_INDENT: string = '│   ';
const BLANK_INDENT: string = '    ';

const DENIED_CODES: ReadonlySet<string> = new Set<string>(['EACCES', 'EPERM']);

export const command: BuiltinCommand = {
    name: 'tree',
    create: () => (args, cwd) => {
        const operand: string = args.length > 0 ? args[0] : cwd;
        const start: string = path_resolve(operand, cwd);

        const stats = entry_stat(start);
        if (stats === null) {
            throw new NotFoundError(`tree: ${operand}: No such file or directory`);
        }
        if (!stats.isDirectory()) {
            throw new TypeMismatchError(`tree: ${operand}: Not a directory`);
        }

        const lines: string[] = [start, ...treeLines_build(start, '')];
        return outcome_ok(`${lines.join('\n')}\n`, cwd);
    }
};

/**
 * Render the entries below one directory.
 *
 * @param directory - Directory to list.
 * @param prefix - Indentation inherited from ancestors.
 * @returns Rendered lines, depth-first.
 */
function treeLines_build(directory: string, prefix: string): string[] {
    let entries: fs.Dirent[];
    try {
        entries = fs.readdirSync(directory, { withFileTypes: true });
    } catch (error: unknown) {
        const code: string | null = errorCode_get(error);
        if (code !== null && DENIED_CODES.has(code)) {
            return [`${prefix}[Permission Denied]`];
        }
        throw error;
    }

    entries.sort((a: fs.Dirent, b: fs.Dirent): number => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const lines: string[] = [];
    entries.forEach((entry: fs.Dirent, index: number): void => {
        const isLast: boolean = index === entries.length - 1;
        lines.push(`${prefix}${isLast ? LAST_BRANCH : BRANCH}${entry.name}`);
        if (entry.isDirectory()) {
            lines.push(...treeLines_build(path.join(directory, entry.name), prefix + (isLast ? BLANK_INDENT : PIPE_INDENT)));
        }
    });
    return lines;
}
