/**
 * `echo` builtin implementation.
 *
 * Prints its arguments joined by single spaces plus a newline. A `>` or
 * `>>` token anywhere in the arguments redirects the text before it into
 * the file named by the token after it; `>` wins when both appear.
 */

import fs from 'fs';
import type { BuiltinCommand } from './types.js';
import type { WriteMode } from '../types.js';
import { IOFailure, errorMessage_get } from '../errors.js';
import { path_resolve } from '../path.js';
import { outcome_ok } from './_shared.js';

interface EchoRedirect {
    index: number;
    mode: WriteMode;
}

export const command: BuiltinCommand = {
    name: 'echo',
    create: () => (args, cwd) => {
        const redirect: EchoRedirect | null = echoRedirect_find(args);
        if (redirect === null) {
            return outcome_ok(`${args.join(' ')}\n`, cwd);
        }

        const text: string = `${args.slice(0, redirect.index).join(' ')}\n`;
        if (redirect.index + 1 >= args.length) {
            throw new IOFailure('echo: redirection error: missing file operand');
        }
        const target: string = path_resolve(args[redirect.index + 1], cwd);
        try {
            if (redirect.mode === 'append') {
                fs.appendFileSync(target, text, 'utf-8');
            } else {
                fs.writeFileSync(target, text, 'utf-8');
            }
        } catch (error: unknown) {
            throw new IOFailure(`echo: redirection error: ${errorMessage_get(error)}`);
        }
        return outcome_ok('', cwd);
    }
};

function echoRedirect_find(args: string[]): EchoRedirect | null {
    const overwriteIndex: number = args.indexOf('>');
    if (overwriteIndex !== -1) {
        return { index: overwriteIndex, mode: 'overwrite' };
    }
    const appendIndex: number = args.indexOf('>>');
    if (appendIndex !== -1) {
        return { index: appendIndex, mode: 'append' };
    }
    return null;
}
