/**
 * `help` builtin implementation, also reachable as `--help` and `-h`.
 */

import type { BuiltinCommand } from './types.js';
import { outcome_ok } from './_shared.js';

interface HelpEntry {
    usage: string;
    summary: string;
}

const USAGE_WIDTH: number = 29;

const HELP_SECTIONS: ReadonlyArray<[string, readonly HelpEntry[]]> = [
    ['File Operations', [
        { usage: 'pwd', summary: 'Print working directory' },
        { usage: 'ls [-l] [-a] [path]', summary: 'List directory contents' },
        { usage: 'cd <path>', summary: 'Change directory' },
        { usage: 'mkdir <name>', summary: 'Create directory' },
        { usage: 'rmdir <name>', summary: 'Remove empty directory' },
        { usage: 'rm [-r] <path>', summary: 'Remove file or directory' },
        { usage: 'cat <file>', summary: 'Display file contents' },
        { usage: 'touch <file>', summary: 'Create empty file or update timestamp' },
        { usage: 'mv <src> <dest>', summary: 'Move/rename files' },
        { usage: 'cp [-r] <src> <dest>', summary: 'Copy files or directories' },
        { usage: 'head [-n num] <file>', summary: 'Display first lines of file (default 10)' },
        { usage: 'tail [-n num] <file>', summary: 'Display last lines of file (default 10)' },
        { usage: 'wc <file>', summary: 'Count lines, words, characters' },
        { usage: 'grep <pattern> <file>', summary: 'Search for pattern in file' },
        { usage: 'find [path] [-name pattern]', summary: 'Find files matching pattern' }
    ]],
    ['File Information', [
        { usage: 'stat <file>', summary: 'Display file status and metadata' },
        { usage: 'chmod <mode> <file>', summary: 'Change file permissions (octal)' },
        { usage: 'du [path]', summary: 'Display disk usage' },
        { usage: 'df', summary: 'Display filesystem disk space' },
        { usage: 'tree [path]', summary: 'Display directory tree structure' },
        { usage: 'md5sum <file>', summary: 'Calculate MD5 checksum' },
        { usage: 'sha256sum <file>', summary: 'Calculate SHA256 checksum' }
    ]],
    ['Text Output', [
        { usage: 'echo [text]', summary: 'Print text to stdout' },
        { usage: 'echo [text] > file', summary: 'Write text to file (overwrite)' },
        { usage: 'echo [text] >> file', summary: 'Append text to file' },
        { usage: 'cat <file>', summary: 'Display file contents' },
        { usage: 'cat > file', summary: 'Write input to file (empty line to end)' },
        { usage: 'cat >> file', summary: 'Append input to file (empty line to end)' },
        { usage: 'cat >> file << EOF', summary: 'Heredoc: write until EOF is entered' }
    ]],
    ['System Information', [
        { usage: 'cpu', summary: 'Display CPU usage' },
        { usage: 'mem', summary: 'Display memory usage' },
        { usage: 'ps', summary: 'List running processes' },
        { usage: 'date', summary: 'Display current date and time' },
        { usage: 'uptime', summary: 'Display system uptime' },
        { usage: 'whoami', summary: 'Display current user' },
        { usage: 'hostname', summary: 'Display system hostname' }
    ]],
    ['Utilities', [
        { usage: 'clear', summary: 'Clear screen' },
        { usage: 'which <cmd>', summary: 'Show command location' },
        { usage: 'help', summary: 'Display this help message' }
    ]]
];

/**
 * Render the grouped usage text.
 */
export function helpText_render(): string {
    const blocks: string[] = HELP_SECTIONS.map(([title, entries]: [string, readonly HelpEntry[]]): string => {
        const rows: string[] = entries.map((entry: HelpEntry): string => `  ${entry.usage.padEnd(USAGE_WIDTH)}- ${entry.summary}`);
        return `${title}:\n${rows.join('\n')}\n`;
    });
    return `Supported commands:\n${blocks.join('\n')}`;
}

export const command: BuiltinCommand = {
    name: 'help',
    aliases: ['--help', '-h'],
    create: () => (_args, cwd) => outcome_ok(helpText_render(), cwd)
};
