/**
 * `chmod` builtin implementation.
 *
 * `chmod MODE FILE` with `MODE` given in octal, optionally prefixed `0o`.
 */

import fs from 'fs';
import type { BuiltinCommand } from './types.js';
import { CommandFailure, IOFailure, NotFoundError, OperandError, errorMessage_get } from '../errors.js';
import { path_resolve } from '../path.js';
import { entry_stat, outcome_ok } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'chmod',
    create: () => (args, cwd) => {
        if (args.length < 2) {
            throw new OperandError('chmod: missing operands');
        }

        const [modeText, operand] = args;
        const mode: number | null = mode_parse(modeText);
        if (mode === null) {
            throw new CommandFailure(`chmod: invalid mode: '${modeText}'`, 1);
        }

        const target: string = path_resolve(operand, cwd);
        if (entry_stat(target) === null) {
            throw new NotFoundError(`chmod: ${operand}: No such file or directory`);
        }
        try {
            fs.chmodSync(target, mode);
        } catch (error: unknown) {
            throw new IOFailure(`chmod: error: ${errorMessage_get(error)}`);
        }
        return outcome_ok('', cwd);
    }
};

/**
 * Parse an octal permission string.
 *
 * @returns Numeric mode, or null when the text is not octal.
 */
export function mode_parse(text: string): number | null {
    const match: RegExpMatchArray | null = text.trim().match(/^\+?(?:0o)?([0-7]+)$/i);
    if (match === null) {
        return null;
    }
    return Number.parseInt(match[1], 8);
}
