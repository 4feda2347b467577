/**
 * `pwd` builtin implementation. Arguments are ignored.
 */

import type { BuiltinCommand } from './types.js';
import { outcome_ok } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'pwd',
    create: () => (_args, cwd) => outcome_ok(`${cwd}\n`, cwd)
};
