/**
 * Shared helpers for shell builtin command modules.
 *
 * Argument scanning, redirect lookup, filesystem lookups and outcome
 * builders used across the verbs.
 */

import fs from 'fs';
import path from 'path';
import type { CompletedOutcome } from '../types.js';
import { NotFoundError, TypeMismatchError, errorCode_get } from '../errors.js';

// ─── Argument Parsing ───────────────────────────────────────────────────────

/**
 * Declarative option table for one verb.
 *
 * `flags` maps an exact token to the flag names it switches on, so a
 * combined token such as `-la` can set several. `values` maps an option
 * token to the name under which its following token is stored.
 * `unknown` decides the fate of dash tokens absent from both tables.
 */
export interface ArgvSpec {
    flags?: Readonly<Record<string, readonly string[]>>;
    values?: Readonly<Record<string, string>>;
    unknown: 'operand' | 'ignore';
}

export interface ParsedArgv {
    flags: Set<string>;
    values: Map<string, string>;
    operands: string[];
}

/**
 * Scan verb arguments against an option table.
 *
 * A valued option with no following token is treated like an unknown
 * token. Repeated valued options keep the last value.
 *
 * @param args - Tokens following the verb.
 * @param spec - Option table.
 * @returns Switched-on flags, option values and positional operands.
 */
export function argv_parse(args: readonly string[], spec: ArgvSpec): ParsedArgv {
    const parsed: ParsedArgv = { flags: new Set<string>(), values: new Map<string, string>(), operands: [] };
    const flagTable: Readonly<Record<string, readonly string[]>> = spec.flags ?? {};
    const valueTable: Readonly<Record<string, string>> = spec.values ?? {};

    for (let i = 0; i < args.length; i++) {
        const arg: string = args[i];

        if (Object.hasOwn(flagTable, arg)) {
            for (const flag of flagTable[arg]) {
                parsed.flags.add(flag);
            }
            continue;
        }

        if (Object.hasOwn(valueTable, arg) && i + 1 < args.length) {
            parsed.values.set(valueTable[arg], args[i + 1]);
            i++;
            continue;
        }

        if (spec.unknown === 'ignore' && arg.startsWith('-')) {
            continue;
        }
        parsed.operands.push(arg);
    }

    return parsed;
}

/**
 * Parse a line-count argument.
 *
 * @param raw - Token supplied after `-n`.
 * @returns Non-negative integer, or null when the token is not one.
 */
export function count_parse(raw: string): number | null {
    const trimmed: string = raw.trim();
    if (!/^\+?\d+$/.test(trimmed)) {
        return null;
    }
    return Number.parseInt(trimmed, 10);
}

// ─── Filesystem Lookups ─────────────────────────────────────────────────────

/**
 * Stat a path, following symlinks. Returns null when nothing is there.
 */
export function entry_stat(resolved: string): fs.Stats | null {
    try {
        return fs.statSync(resolved, { throwIfNoEntry: false }) ?? null;
    } catch (error: unknown) {
        if (errorCode_get(error) === 'ENOTDIR') {
            return null;
        }
        throw error;
    }
}

/**
 * Stat a path without following a final symlink.
 */
export function entry_lstat(resolved: string): fs.Stats | null {
    try {
        return fs.lstatSync(resolved, { throwIfNoEntry: false }) ?? null;
    } catch (error: unknown) {
        if (errorCode_get(error) === 'ENOTDIR') {
            return null;
        }
        throw error;
    }
}

/**
 * Whether a path exists and resolves to a directory.
 */
export function directory_check(resolved: string): boolean {
    return entry_stat(resolved)?.isDirectory() ?? false;
}

/**
 * Require that a path names a readable regular entry, not a directory.
 *
 * @param verb - Verb used as message prefix.
 * @param operand - Path as typed by the user.
 * @param resolved - Resolved absolute path.
 * @throws NotFoundError or TypeMismatchError.
 */
export function file_require(verb: string, operand: string, resolved: string): void {
    const stats: fs.Stats | null = entry_stat(resolved);
    if (stats === null) {
        throw new NotFoundError(`${verb}: ${operand}: No such file or directory`);
    }
    if (stats.isDirectory()) {
        throw new TypeMismatchError(`${verb}: ${operand}: Is a directory`);
    }
}

export interface DirectoryListing {
    files: string[];
    directories: string[];
    /** Subdirectories that are real directories, not symlinks. */
    descend: string[];
}

/**
 * Split a directory's entries into files and directories, sorted.
 *
 * A symlink pointing at a directory counts as a directory but is not
 * descended into.
 *
 * @returns The listing, or null when the directory cannot be read.
 */
export function directory_list(directory: string): DirectoryListing | null {
    let entries: fs.Dirent[];
    try {
        entries = fs.readdirSync(directory, { withFileTypes: true });
    } catch {
        return null;
    }

    const listing: DirectoryListing = { files: [], directories: [], descend: [] };
    for (const entry of entries) {
        if (entry.isDirectory()) {
            listing.directories.push(entry.name);
            listing.descend.push(entry.name);
        } else if (entry.isSymbolicLink() && symlinkTarget_isDirectory(path.join(directory, entry.name))) {
            listing.directories.push(entry.name);
        } else {
            listing.files.push(entry.name);
        }
    }
    listing.files.sort();
    listing.directories.sort();
    listing.descend.sort();
    return listing;
}

/**
 * Whether a symlink resolves to a directory. Dangling, looping and
 * unreadable links count as files.
 */
function symlinkTarget_isDirectory(linkPath: string): boolean {
    try {
        return fs.statSync(linkPath).isDirectory();
    } catch {
        return false;
    }
}

/**
 * Split text into lines, each keeping its `\n` terminator.
 */
export function lines_split(content: string): string[] {
    return content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

// ─── Formatting ─────────────────────────────────────────────────────────────

function pad2(value: number): string {
    return String(value).padStart(2, '0');
}

/**
 * Format a local timestamp as `YYYY-MM-DD HH:MM`, or with `:SS` appended.
 */
export function timestamp_format(date: Date, withSeconds: boolean = false): string {
    const day: string = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
    const time: string = `${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
    return withSeconds ? `${day} ${time}:${pad2(date.getSeconds())}` : `${day} ${time}`;
}

// ─── Outcome Builders ───────────────────────────────────────────────────────

/**
 * Successful outcome that keeps (or sets) the working directory.
 */
export function outcome_ok(stdout: string, workingDirectory: string): CompletedOutcome {
    return { kind: 'completed', stdout, stderr: '', exitCode: 0, workingDirectory };
}

/**
 * Successful outcome for verbs that report global state; the caller keeps
 * its working directory.
 */
export function outcome_global(stdout: string): CompletedOutcome {
    return { kind: 'completed', stdout, stderr: '', exitCode: 0, workingDirectory: null };
}

/**
 * Failure outcome that is not an error (e.g. `grep` without matches).
 */
export function outcome_status(stdout: string, exitCode: number, workingDirectory: string): CompletedOutcome {
    return { kind: 'completed', stdout, stderr: '', exitCode, workingDirectory };
}
