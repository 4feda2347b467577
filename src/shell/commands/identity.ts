/**
 * `whoami` and `hostname` builtin implementations.
 */

import type { BuiltinCommand } from './types.js';
import { outcome_ok } from './_shared.js';

export const whoamiCommand: BuiltinCommand = {
    name: 'whoami',
    create: ({ identity }) => (_args, cwd) => outcome_ok(`${identity.username}\n`, cwd)
};

export const hostnameCommand: BuiltinCommand = {
    name: 'hostname',
    create: ({ identity }) => (_args, cwd) => outcome_ok(`${identity.hostname}\n`, cwd)
};
