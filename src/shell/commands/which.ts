/**
 * `which` builtin implementation.
 *
 * Every registered verb reports a synthetic `/usr/bin/<verb>` location.
 */

import type { BuiltinCommand } from './types.js';
import { CommandFailure, OperandError } from '../errors.js';
import { outcome_ok } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'which',
    create: ({ listCommands }) => (args, cwd) => {
        if (args.length === 0) {
            throw new OperandError('which: missing command');
        }
        const name: string = args[0];
        if (!listCommands().includes(name)) {
            throw new CommandFailure(`which: no ${name} in built-in commands`, 1);
        }
        return outcome_ok(`/usr/bin/${name}\n`, cwd);
    }
};
