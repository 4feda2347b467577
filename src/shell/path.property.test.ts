/**
 * @file Path and Tokenizer Property Tests
 *
 * Invariants under test:
 *   1. path_resolve always yields an absolute path without a trailing slash
 *      (other than the root itself).
 *   2. Resolving an already resolved path changes nothing.
 *   3. Plain words joined by spaces tokenize back to the same words.
 *   4. Single-quoting text without a quote character yields that text.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { path_resolve } from './path.js';
import { line_tokenize } from './tokenizer.js';

const segment: fc.Arbitrary<string> = fc.constantFrom('a', 'bb', 'c.txt', '.', '..', '', 'dir');
const relative: fc.Arbitrary<string> = fc.array(segment, { maxLength: 6 }).map((parts: string[]): string => parts.join('/'));
const absolute: fc.Arbitrary<string> = fc.array(fc.constantFrom('srv', 'home', 'user', 'x'), { maxLength: 4 })
    .map((parts: string[]): string => `/${parts.join('/')}`);

describe('path_resolve property invariants', (): void => {
    it('returns an absolute path with no trailing slash', (): void => {
        fc.assert(fc.property(relative, absolute, (input: string, cwd: string): void => {
            const resolved: string = path_resolve(input, cwd);
            expect(resolved.startsWith('/')).toBe(true);
            if (resolved !== '/') {
                expect(resolved.endsWith('/')).toBe(false);
            }
        }));
    });

    it('is idempotent', (): void => {
        fc.assert(fc.property(relative, absolute, absolute, (input: string, cwd: string, other: string): void => {
            const once: string = path_resolve(input, cwd);
            expect(path_resolve(once, other)).toBe(once);
        }));
    });
});

describe('line_tokenize property invariants', (): void => {
    it('round-trips plain words', (): void => {
        const word: fc.Arbitrary<string> = fc.stringMatching(/^[a-z0-9._-]{1,8}$/);
        fc.assert(fc.property(fc.array(word, { minLength: 1, maxLength: 6 }), (words: string[]): void => {
            expect(line_tokenize(words.join(' '))).toEqual(words);
        }));
    });

    it('returns single-quoted text unchanged', (): void => {
        const text: fc.Arbitrary<string> = fc.string().filter((value: string): boolean => !value.includes("'"));
        fc.assert(fc.property(text, (value: string): void => {
            expect(line_tokenize(`'${value}'`)).toEqual([value]);
        }));
    });
});
