import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Interpreter } from '../Interpreter.js';
import type { InvocationResult } from '../types.js';
import { interpreter_create, workspace_create, workspace_remove } from '../../testing/fixtures.js';

describe('md5sum and sha256sum', () => {
    let dir: string;
    let shell: Interpreter;

    function run(line: string): InvocationResult {
        return shell.command_execute(line, dir);
    }

    beforeEach(() => {
        dir = workspace_create();
        shell = interpreter_create(dir);
        fs.writeFileSync(path.join(dir, 'abc.txt'), 'abc');
        fs.mkdirSync(path.join(dir, 'sub'));
    });

    afterEach(() => {
        workspace_remove(dir);
    });

    it('prints one row per operand', () => {
        expect(run('md5sum abc.txt abc.txt')).toEqual({
            stdout: '900150983cd24fb0d6963f7d28e17f72  abc.txt\n900150983cd24fb0d6963f7d28e17f72  abc.txt\n',
            stderr: '',
            workingDirectory: dir,
            exitCode: 0
        });
    });

    it('fails with exit 1 on a directory operand', () => {
        expect(run('md5sum sub')).toEqual({
            stdout: '',
            stderr: 'md5sum: sub: Is a directory\n',
            workingDirectory: dir,
            exitCode: 1
        });
    });

    it('fails with exit 1 on a missing operand file', () => {
        const result: InvocationResult = run('sha256sum ghost');
        expect(result.stdout).toBe('');
        expect(result.stderr).toBe('sha256sum: ghost: No such file or directory\n');
        expect(result.exitCode).toBe(1);
    });

    it('prints nothing when a later operand fails', () => {
        const result: InvocationResult = run('sha256sum abc.txt ghost');
        expect(result.stdout).toBe('');
        expect(result.exitCode).toBe(1);
    });

    it('requires a file operand with exit 2', () => {
        for (const verb of ['md5sum', 'sha256sum']) {
            const result: InvocationResult = run(verb);
            expect(result.stderr).toBe(`${verb}: missing file operand\n`);
            expect(result.exitCode).toBe(2);
        }
    });
});
