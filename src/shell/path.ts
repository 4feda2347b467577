/**
 * @file Path Resolver
 *
 * Pure path algebra: no filesystem access, never fails.
 *
 * @module
 */

import path from 'path';

/**
 * Resolve a user-supplied path against the working directory.
 *
 * Absolute inputs are normalized as they are; relative inputs are joined
 * to `cwd` first. `.` and `..` segments collapse and trailing slashes drop.
 *
 * @param input - Path as typed by the user.
 * @param cwd - Current working directory (absolute).
 * @returns Normalized absolute path.
 */
export function path_resolve(input: string, cwd: string): string {
    const joined: string = path.posix.isAbsolute(input) ? input : path.posix.join(cwd, input);
    return path_normalize(joined);
}

/**
 * Normalize an absolute path, dropping any trailing separator except on root.
 */
export function path_normalize(input: string): string {
    const normalized: string = path.posix.normalize(input);
    if (normalized.length > 1 && normalized.endsWith('/')) {
        return normalized.slice(0, -1);
    }
    return normalized;
}

/**
 * Return the final segment of a path.
 */
export function path_basename(input: string): string {
    return path.posix.basename(input);
}
