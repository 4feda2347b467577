/**
 * `cat` builtin implementation.
 *
 * Forms:
 * - `cat FILE...`: print the files joined by newlines.
 * - `cat FILE... > OUT`, `cat FILE... >> OUT`: write or append the same
 *   joined content to `OUT` (no trailing newline is added).
 * - `cat > OUT`, `cat >> OUT`: open a raw-input capture ended by a blank line.
 * - `cat > OUT << WORD`, `cat >> OUT << WORD`: open a heredoc capture ended
 *   by `WORD` (default `EOF`).
 *
 * Outside heredocs `>>` is looked up before `>`.
 */

import fs from 'fs';
import type { BuiltinCommand } from './types.js';
import type { CommandOutcome, WriteMode } from '../types.js';
import { IOFailure, OperandError, RedirectSyntaxError, errorMessage_get } from '../errors.js';
import { path_resolve } from '../path.js';
import { file_require, outcome_ok } from './_shared.js';

const HEREDOC_USAGE: string = 'cat: invalid syntax, use: cat [>>|>] file << EOF';
const DEFAULT_TERMINATOR: string = 'EOF';

interface CatRedirect {
    index: number;
    operator: '>' | '>>';
    mode: WriteMode;
}

export const command: BuiltinCommand = {
    name: 'cat',
    create: () => (args, cwd) => {
        const redirect: CatRedirect | null = catRedirect_find(args);

        if (args.includes('<<')) {
            return catHeredoc_open(args, redirect, cwd);
        }

        if (redirect !== null) {
            return catRedirect_run(args, redirect, cwd);
        }

        if (args.length === 0) {
            throw new OperandError('cat: missing file operand');
        }
        return outcome_ok(catSources_read(args, cwd), cwd);
    }
};

function catRedirect_find(args: string[]): CatRedirect | null {
    const appendIndex: number = args.indexOf('>>');
    if (appendIndex !== -1) {
        return { index: appendIndex, operator: '>>', mode: 'append' };
    }
    const overwriteIndex: number = args.indexOf('>');
    if (overwriteIndex !== -1) {
        return { index: overwriteIndex, operator: '>', mode: 'overwrite' };
    }
    return null;
}

/**
 * Validate `[> | >>] FILE << WORD` ordering and request a heredoc capture.
 */
function catHeredoc_open(args: string[], redirect: CatRedirect | null, cwd: string): CommandOutcome {
    const heredocIndex: number = args.indexOf('<<');
    if (redirect === null || heredocIndex < redirect.index) {
        throw new RedirectSyntaxError(HEREDOC_USAGE);
    }
    const terminator: string = heredocIndex + 1 < args.length ? args[heredocIndex + 1] : DEFAULT_TERMINATOR;
    return {
        kind: 'capture',
        request: {
            kind: 'heredoc',
            targetFile: path_resolve(args[redirect.index + 1], cwd),
            writeMode: redirect.mode,
            terminator
        }
    };
}

/**
 * Handle `cat [FILE...] (>|>>) OUT` without a heredoc marker.
 */
function catRedirect_run(args: string[], redirect: CatRedirect, cwd: string): CommandOutcome {
    if (redirect.index + 1 >= args.length) {
        throw new RedirectSyntaxError(`cat: missing file operand after '${redirect.operator}'`);
    }
    const targetFile: string = path_resolve(args[redirect.index + 1], cwd);

    if (redirect.index === 0) {
        return { kind: 'capture', request: { kind: 'rawInput', targetFile, writeMode: redirect.mode } };
    }

    const content: string = catSources_read(args.slice(0, redirect.index), cwd);
    try {
        if (redirect.mode === 'append') {
            fs.appendFileSync(targetFile, content, 'utf-8');
        } else {
            fs.writeFileSync(targetFile, content, 'utf-8');
        }
    } catch (error: unknown) {
        const label: string = redirect.mode === 'append' ? 'append error' : 'write error';
        throw new IOFailure(`cat: ${label}: ${errorMessage_get(error)}`);
    }
    return outcome_ok('', cwd);
}

/**
 * Read every operand in order and join the contents with newlines.
 */
function catSources_read(operands: string[], cwd: string): string {
    const blocks: string[] = [];
    for (const operand of operands) {
        const resolved: string = path_resolve(operand, cwd);
        file_require('cat', operand, resolved);
        blocks.push(fs.readFileSync(resolved, 'utf-8'));
    }
    return blocks.join('\n');
}
