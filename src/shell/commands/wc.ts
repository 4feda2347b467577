/**
 * `wc` builtin implementation.
 *
 * Prints `LINES WORDS CHARS FILE` per operand, each count right-aligned to
 * seven columns. Lines are newline characters; words are runs of
 * non-whitespace; characters are Unicode code points. No total row.
 */

import fs from 'fs';
import type { BuiltinCommand } from './types.js';
import { OperandError } from '../errors.js';
import { path_resolve } from '../path.js';
import { file_require, outcome_ok } from './_shared.js';

const COUNT_WIDTH: number = 7;

interface WcCounts {
    lines: number;
    words: number;
    chars: number;
}

export const command: BuiltinCommand = {
    name: 'wc',
    create: () => (args, cwd) => {
        if (args.length === 0) {
            throw new OperandError('wc: missing file operand');
        }

        const rows: string[] = [];
        for (const operand of args) {
            const resolved: string = path_resolve(operand, cwd);
            file_require('wc', operand, resolved);
            const counts: WcCounts = wcCounts_compute(fs.readFileSync(resolved, 'utf-8'));
            rows.push(`${wcCount_pad(counts.lines)} ${wcCount_pad(counts.words)} ${wcCount_pad(counts.chars)} ${operand}`);
        }
        return outcome_ok(`${rows.join('\n')}\n`, cwd);
    }
};

export function wcCounts_compute(content: string): WcCounts {
    return {
        lines: (content.match(/\n/g) ?? []).length,
        words: content.split(/\s+/).filter((word: string): boolean => word.length > 0).length,
        chars: Array.from(content).length
    };
}

function wcCount_pad(value: number): string {
    return String(value).padStart(COUNT_WIDTH);
}
