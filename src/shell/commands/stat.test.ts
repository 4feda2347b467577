import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Interpreter } from '../Interpreter.js';
import type { InvocationResult } from '../types.js';
import { mode_parse } from './chmod.js';
import { date_format } from './date.js';
import { interpreter_create, workspace_create, workspace_remove } from '../../testing/fixtures.js';

describe('file information and utility verbs', () => {
    let dir: string;
    let shell: Interpreter;

    function run(line: string): InvocationResult {
        return shell.command_execute(line, dir);
    }

    beforeEach(() => {
        dir = workspace_create();
        shell = interpreter_create(dir);
        fs.writeFileSync(path.join(dir, 'f.txt'), 'hello');
    });

    afterEach(() => {
        workspace_remove(dir);
    });

    describe('stat', () => {
        it('prints size, octal mode and timestamps', () => {
            fs.chmodSync(path.join(dir, 'f.txt'), 0o644);
            const stamp: Date = new Date(2021, 0, 2, 3, 4, 5);
            fs.utimesSync(path.join(dir, 'f.txt'), stamp, stamp);

            const lines: string[] = run('stat f.txt').stdout.split('\n');
            expect(lines.slice(0, 5)).toEqual([
                '  File: f.txt',
                '  Size: 5',
                '  Mode: 0o100644',
                'Access: 2021-01-02 03:04:05',
                'Modify: 2021-01-02 03:04:05'
            ]);
            expect(lines[5].startsWith('Change: ')).toBe(true);
        });

        it('reports a missing path', () => {
            expect(run('stat ghost').stderr).toBe('stat: ghost: No such file or directory\n');
            expect(run('stat').exitCode).toBe(2);
        });
    });

    describe('chmod', () => {
        it('applies an octal mode', () => {
            expect(run('chmod 600 f.txt').exitCode).toBe(0);
            expect(fs.statSync(path.join(dir, 'f.txt')).mode & 0o777).toBe(0o600);
        });

        it('rejects malformed modes and operands', () => {
            const invalid: InvocationResult = run('chmod 9z f.txt');
            expect(invalid.stderr).toBe("chmod: invalid mode: '9z'\n");
            expect(invalid.exitCode).toBe(1);
            expect(run('chmod 600').stderr).toBe('chmod: missing operands\n');
            expect(run('chmod 644 ghost').stderr).toBe('chmod: ghost: No such file or directory\n');
        });

        it('parses octal text with an optional prefix', () => {
            expect(mode_parse('755')).toBe(0o755);
            expect(mode_parse('0o640')).toBe(0o640);
            expect(mode_parse('8')).toBeNull();
        });
    });

    describe('date', () => {
        it('prints the clock reading', () => {
            expect(run('date').stdout).toBe('Tue Mar 05 07:08:09 2024\n');
        });

        it('formats single-digit fields with padding', () => {
            expect(date_format(new Date(2023, 0, 1, 0, 0, 0))).toBe('Sun Jan 01 00:00:00 2023');
        });
    });

    describe('identity', () => {
        it('prints the configured user and host', () => {
            expect(run('whoami').stdout).toBe('tester\n');
            expect(run('hostname').stdout).toBe('test-host\n');
        });
    });

    describe('which', () => {
        it('locates builtins under /usr/bin', () => {
            expect(run('which ls').stdout).toBe('/usr/bin/ls\n');
        });

        it('fails for unknown names and aliases', () => {
            const result: InvocationResult = run('which nope');
            expect(result.stderr).toBe('which: no nope in built-in commands\n');
            expect(result.exitCode).toBe(1);
            expect(run('which --help').exitCode).toBe(1);
            expect(run('which').exitCode).toBe(2);
        });
    });

    describe('clear', () => {
        it('prints fifty newlines', () => {
            expect(run('clear').stdout).toBe('\n'.repeat(50));
        });
    });
});
