/**
 * @file Line Tokenizer
 *
 * Splits one input line into words using POSIX shell quoting:
 * - single quotes preserve every character literally;
 * - double quotes allow `\` to escape `\`, `"`, `$`, backtick and newline;
 * - outside quotes `\` escapes any following character;
 * - adjacent quoted and unquoted fragments join into one word.
 *
 * No expansion of any kind is performed.
 *
 * @module
 */

import { ParseError } from './errors.js';

type QuoteState = 'none' | 'single' | 'double';

const DOUBLE_QUOTE_ESCAPABLE: ReadonlySet<string> = new Set<string>(['\\', '"', '$', '`', '\n']);

/**
 * Tokenize a raw command line.
 *
 * @param line - Raw input line.
 * @returns Ordered word list (empty for blank input).
 * @throws ParseError on an unterminated quote or a trailing escape.
 */
export function line_tokenize(line: string): string[] {
    const tokens: string[] = [];
    let current: string = '';
    let inWord: boolean = false;
    let quote: QuoteState = 'none';

    for (let i = 0; i < line.length; i++) {
        const ch: string = line[i];

        if (quote === 'single') {
            if (ch === "'") {
                quote = 'none';
            } else {
                current += ch;
            }
            continue;
        }

        if (quote === 'double') {
            if (ch === '"') {
                quote = 'none';
            } else if (ch === '\\' && i + 1 < line.length && DOUBLE_QUOTE_ESCAPABLE.has(line[i + 1])) {
                current += line[i + 1];
                i++;
            } else if (ch === '\\' && i + 1 >= line.length) {
                throw new ParseError('No escaped character');
            } else {
                current += ch;
            }
            continue;
        }

        if (/[ \t\r\n]/.test(ch)) {
            if (inWord) {
                tokens.push(current);
                current = '';
                inWord = false;
            }
            continue;
        }

        inWord = true;
        if (ch === "'") {
            quote = 'single';
        } else if (ch === '"') {
            quote = 'double';
        } else if (ch === '\\') {
            if (i + 1 >= line.length) {
                throw new ParseError('No escaped character');
            }
            current += line[i + 1];
            i++;
        } else {
            current += ch;
        }
    }

    if (quote !== 'none') {
        throw new ParseError('No closing quotation');
    }
    if (inWord) {
        tokens.push(current);
    }
    return tokens;
}
