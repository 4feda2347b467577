/**
 * @file Interpreter Unit Tests
 *
 * Covers dispatch, error rendering, working-directory reporting and the
 * heredoc and raw-input capture sessions, against a real scratch directory.
 *
 * @module
 */

import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CONTINUATION_MARKER, Interpreter } from './Interpreter.js';
import type { InvocationResult } from './types.js';
import { interpreter_create, workspace_create, workspace_remove } from '../testing/fixtures.js';

describe('Interpreter', () => {
    let dir: string;
    let shell: Interpreter;

    beforeEach(() => {
        dir = workspace_create();
        shell = interpreter_create(dir);
    });

    afterEach(() => {
        workspace_remove(dir);
    });

    function run(line: string, cwd: string = dir): InvocationResult {
        return shell.command_execute(line, cwd);
    }

    // ─── Dispatch ───────────────────────────────────────────────

    describe('dispatch', () => {
        it('returns an empty success for blank input', () => {
            expect(run('   ')).toEqual({ stdout: '', stderr: '', workingDirectory: dir, exitCode: 0 });
        });

        it('reports unknown verbs with exit 127', () => {
            const result: InvocationResult = run('frobnicate x');
            expect(result.stdout).toBe('');
            expect(result.stderr).toBe('frobnicate: command not found\n');
            expect(result.exitCode).toBe(127);
            expect(result.workingDirectory).toBe(dir);
        });

        it('reports unbalanced quotes as a parse error with exit 2', () => {
            const result: InvocationResult = run('echo "abc');
            expect(result.stderr).toBe('parse error: No closing quotation\n');
            expect(result.exitCode).toBe(2);
        });

        it('honours quoting when splitting arguments', () => {
            expect(run(`echo 'single $x' "double \\"q\\""`).stdout).toBe('single $x double "q"\n');
            expect(run('echo hello    world').stdout).toBe('hello world\n');
        });

        it('renders unexpected failures as Error lines with exit 1', () => {
            fs.writeFileSync(path.join(dir, 'plain'), 'x');
            const result: InvocationResult = run('touch plain/child');
            expect(result.stderr.startsWith('Error: ')).toBe(true);
            expect(result.exitCode).toBe(1);
        });

        it('dispatches help and its aliases to the same text', () => {
            const help: string = run('help').stdout;
            expect(help.startsWith('Supported commands:\nFile Operations:\n')).toBe(true);
            expect(run('--help').stdout).toBe(help);
            expect(run('-h').stdout).toBe(help);
        });

        it('lists verb names without aliases', () => {
            const names: string[] = shell.commands_list();
            expect(names).toContain('sha256sum');
            expect(names).not.toContain('--help');
            expect(names).toHaveLength(33);
        });
    });

    // ─── Working Directory ──────────────────────────────────────

    describe('working directory', () => {
        it('prints the caller directory for pwd', () => {
            expect(run('pwd').stdout).toBe(`${dir}\n`);
        });

        it('reports the new directory after cd', () => {
            fs.mkdirSync(path.join(dir, 'sub'));
            expect(run('cd sub').workingDirectory).toBe(path.join(dir, 'sub'));
            expect(run('cd ..', path.join(dir, 'sub')).workingDirectory).toBe(dir);
        });

        it('goes home when cd has no argument', () => {
            fs.mkdirSync(path.join(dir, 'elsewhere'));
            expect(run('cd', path.join(dir, 'elsewhere')).workingDirectory).toBe(dir);
        });

        it('rejects missing and non-directory cd targets', () => {
            fs.writeFileSync(path.join(dir, 'f.txt'), '');
            const missing: InvocationResult = run('cd nope');
            expect(missing.stderr).toBe('cd: nope: No such file or directory\n');
            expect(missing.exitCode).toBe(1);
            expect(missing.workingDirectory).toBe(dir);
            expect(run('cd f.txt').stderr).toBe('cd: f.txt: Not a directory\n');
        });

        it('returns null for verbs that report global state', () => {
            for (const verb of ['cpu', 'mem', 'ps', 'df', 'uptime']) {
                const result: InvocationResult = run(verb);
                expect(result.exitCode).toBe(0);
                expect(result.workingDirectory).toBeNull();
            }
        });

        it('returns the caller directory for other verbs', () => {
            expect(run('date').workingDirectory).toBe(dir);
            expect(run('whoami').workingDirectory).toBe(dir);
        });
    });

    // ─── File Verbs ─────────────────────────────────────────────

    describe('file verbs', () => {
        it('fails the second mkdir of the same name and keeps the directory', () => {
            expect(run('mkdir x').exitCode).toBe(0);
            const again: InvocationResult = run('mkdir x');
            expect(again.exitCode).toBe(1);
            expect(again.stderr).toBe("mkdir: cannot create directory 'x': File exists\n");
            expect(fs.statSync(path.join(dir, 'x')).isDirectory()).toBe(true);
        });

        it('creates missing parents for nested mkdir', () => {
            expect(run('mkdir a/b/c').exitCode).toBe(0);
            expect(fs.statSync(path.join(dir, 'a', 'b', 'c')).isDirectory()).toBe(true);
        });

        it('requires an operand for mkdir', () => {
            const result: InvocationResult = run('mkdir');
            expect(result.stderr).toBe('mkdir: missing operand\n');
            expect(result.exitCode).toBe(2);
        });

        it('writes with echo redirection and reads back with cat', () => {
            expect(run('echo "a b" > f.txt').stdout).toBe('');
            expect(run('cat f.txt').stdout).toBe('a b\n');
            run('echo more >> f.txt');
            expect(fs.readFileSync(path.join(dir, 'f.txt'), 'utf-8')).toBe('a b\nmore\n');
        });

        it('needs -r to remove a non-empty directory', () => {
            fs.mkdirSync(path.join(dir, 'd'));
            fs.writeFileSync(path.join(dir, 'd', 'inner.txt'), 'x');

            const refused: InvocationResult = run('rm d');
            expect(refused.stderr).toBe("rm: cannot remove 'd': Is a directory\n");
            expect(refused.exitCode).toBe(1);
            expect(fs.existsSync(path.join(dir, 'd', 'inner.txt'))).toBe(true);

            expect(run('rm -r d').exitCode).toBe(0);
            expect(fs.existsSync(path.join(dir, 'd'))).toBe(false);
        });

        it('reports rm operand problems', () => {
            expect(run('rm').exitCode).toBe(2);
            expect(run('rm -r').stderr).toBe('rm: missing path\n');
            expect(run('rm ghost').stderr).toBe("rm: cannot remove 'ghost': No such file or directory\n");
        });

        it('refuses rmdir on a non-empty directory', () => {
            fs.mkdirSync(path.join(dir, 'd'));
            fs.writeFileSync(path.join(dir, 'd', 'inner.txt'), 'x');
            const result: InvocationResult = run('rmdir d');
            expect(result.stderr).toBe("rmdir: failed to remove 'd': Directory not empty\n");
            expect(result.exitCode).toBe(1);
        });

        it('numbers matching grep lines and exits 1 on no match', () => {
            fs.writeFileSync(path.join(dir, 'words.txt'), 'foo\nbar\nfoobar\n');
            expect(run('grep foo words.txt')).toEqual({
                stdout: '1:foo\n3:foobar\n',
                stderr: '',
                workingDirectory: dir,
                exitCode: 0
            });
            const none: InvocationResult = run('grep zzz words.txt');
            expect(none.stdout).toBe('');
            expect(none.stderr).toBe('');
            expect(none.exitCode).toBe(1);
        });

        it('prints known digests of an empty file', () => {
            fs.writeFileSync(path.join(dir, 'empty.txt'), '');
            expect(run('md5sum empty.txt').stdout).toBe('d41d8cd98f00b204e9800998ecf8427e  empty.txt\n');
            expect(run('sha256sum empty.txt').stdout)
                .toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855  empty.txt\n');
        });
    });

    // ─── Capture Sessions ───────────────────────────────────────

    describe('heredoc capture', () => {
        it('appends captured lines when the terminator arrives', () => {
            fs.writeFileSync(path.join(dir, 'log.txt'), 'prior\n');

            const opened: InvocationResult = run('cat >> log.txt << EOF');
            expect(opened.stdout).toBe(CONTINUATION_MARKER);
            expect(opened.exitCode).toBe(0);
            expect(shell.session_active()).toBe(true);

            expect(run('x').stdout).toBe(CONTINUATION_MARKER);
            expect(run('y').stdout).toBe(CONTINUATION_MARKER);
            expect(run('EOF')).toEqual({ stdout: '', stderr: '', workingDirectory: dir, exitCode: 0 });

            expect(fs.readFileSync(path.join(dir, 'log.txt'), 'utf-8')).toBe('prior\nx\ny\n');
            expect(shell.session_active()).toBe(false);
            expect(run('pwd').stdout).toBe(`${dir}\n`);
        });

        it('overwrites with a custom terminator', () => {
            fs.writeFileSync(path.join(dir, 'out.txt'), 'old\n');
            run('cat > out.txt << END');
            run('EOF');
            run('  END  ');
            expect(fs.readFileSync(path.join(dir, 'out.txt'), 'utf-8')).toBe('EOF\n');
        });

        it('defaults the terminator to EOF', () => {
            run('cat > out.txt <<');
            expect(shell.session_describe()).toEqual({
                kind: 'heredoc',
                targetFile: path.join(dir, 'out.txt'),
                writeMode: 'overwrite',
                terminator: 'EOF'
            });
        });

        it('does not interpret lines fed to the session', () => {
            run('cat > out.txt << EOF');
            run('rm -r /');
            run('echo "unclosed');
            run('EOF');
            expect(fs.readFileSync(path.join(dir, 'out.txt'), 'utf-8')).toBe('rm -r /\necho "unclosed\n');
        });

        it('rejects a heredoc without a preceding redirect', () => {
            for (const line of ['cat << EOF', 'cat << EOF > f.txt']) {
                const result: InvocationResult = run(line);
                expect(result.stderr).toBe('cat: invalid syntax, use: cat [>>|>] file << EOF\n');
                expect(result.exitCode).toBe(2);
                expect(shell.session_active()).toBe(false);
            }
        });

        it('closes the session and reports a failed flush', () => {
            run('cat > missing-dir/f.txt << EOF');
            run('x');
            const result: InvocationResult = run('EOF');
            expect(result.stderr).toMatch(/^cat: write error: ENOENT/);
            expect(result.exitCode).toBe(1);
            expect(shell.session_active()).toBe(false);
        });
    });

    describe('raw input capture', () => {
        it('writes lines verbatim until an empty line', () => {
            expect(run('cat > notes.txt').stdout).toBe(CONTINUATION_MARKER);
            run('one');
            run('  two');
            run('');
            expect(fs.readFileSync(path.join(dir, 'notes.txt'), 'utf-8')).toBe('one\n  two\n');
        });

        it('treats a whitespace-only line as the end', () => {
            run('cat >> notes.txt');
            run('alpha');
            run('   ');
            expect(fs.readFileSync(path.join(dir, 'notes.txt'), 'utf-8')).toBe('alpha\n');
        });

        it('writes a single newline when no lines were captured', () => {
            run('cat > empty.txt');
            run('');
            expect(fs.readFileSync(path.join(dir, 'empty.txt'), 'utf-8')).toBe('\n');
        });

        it('discards the buffer on cancel', () => {
            run('cat > dropped.txt');
            run('lost');
            expect(shell.session_cancel()).toBe(true);
            expect(shell.session_cancel()).toBe(false);
            expect(fs.existsSync(path.join(dir, 'dropped.txt'))).toBe(false);
            expect(run('pwd').stdout).toBe(`${dir}\n`);
        });
    });

    it('keeps sessions separate between instances', () => {
        const other: Interpreter = interpreter_create(dir);
        run('cat > a.txt << EOF');
        expect(other.command_execute('pwd', dir).stdout).toBe(`${dir}\n`);
        expect(other.session_active()).toBe(false);
    });
});
