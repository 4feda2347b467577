/**
 * `clear` builtin implementation: a block of blank lines.
 */

import type { BuiltinCommand } from './types.js';
import { outcome_ok } from './_shared.js';

const CLEAR_LINES: number = 50;

export const command: BuiltinCommand = {
    name: 'clear',
    create: () => (_args, cwd) => outcome_ok('\n'.repeat(CLEAR_LINES), cwd)
};
