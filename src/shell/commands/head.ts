/**
 * `head` and `tail` builtin implementations.
 *
 * Supported flags:
 * - `-n COUNT`: number of lines (default 10).
 *
 * A trailing `-n` with no value is taken as the file operand. When several
 * operands are given the last one is read. Lines keep their terminators.
 */

import fs from 'fs';
import type { BuiltinCommand, BuiltinHandler } from './types.js';
import { CommandFailure, OperandError } from '../errors.js';
import { path_resolve } from '../path.js';
import { argv_parse, count_parse, file_require, lines_split, outcome_ok, type ParsedArgv } from './_shared.js';

const DEFAULT_LINE_COUNT: number = 10;

type LineSelector = (lines: string[], count: number) => string[];

/**
 * Build a line-window handler shared by `head` and `tail`.
 */
function lineWindow_create(verb: string, select: LineSelector): BuiltinHandler {
    return (args, cwd) => {
        const parsed: ParsedArgv = argv_parse(args, { values: { '-n': 'lines' }, unknown: 'operand' });

        let count: number = DEFAULT_LINE_COUNT;
        const rawCount: string | undefined = parsed.values.get('lines');
        if (rawCount !== undefined) {
            const validated: number | null = count_parse(rawCount);
            if (validated === null) {
                throw new CommandFailure(`${verb}: invalid number of lines`, 1);
            }
            count = validated;
        }

        if (parsed.operands.length === 0) {
            throw new OperandError(`${verb}: missing file operand`);
        }
        const operand: string = parsed.operands[parsed.operands.length - 1];
        const resolved: string = path_resolve(operand, cwd);
        file_require(verb, operand, resolved);

        const lines: string[] = lines_split(fs.readFileSync(resolved, 'utf-8'));
        return outcome_ok(select(lines, count).join(''), cwd);
    };
}

export const headCommand: BuiltinCommand = {
    name: 'head',
    create: () => lineWindow_create('head', (lines: string[], count: number): string[] => lines.slice(0, count))
};

export const tailCommand: BuiltinCommand = {
    name: 'tail',
    create: () => lineWindow_create('tail', (lines: string[], count: number): string[] =>
        count === 0 ? [] : lines.slice(-count))
};
