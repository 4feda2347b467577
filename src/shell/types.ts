/**
 * @file Shell Result Types
 *
 * Value types exchanged between the interpreter, its command handlers,
 * and the front ends that call it.
 *
 * @module
 */

/**
 * Result of one interpreter invocation.
 *
 * `workingDirectory` is `null` when the command reports global state and
 * the caller should keep the directory it already holds.
 */
export interface InvocationResult {
    stdout: string;
    stderr: string;
    workingDirectory: string | null;
    exitCode: number;
}

export type WriteMode = 'overwrite' | 'append';

/**
 * Heredoc capture: lines accumulate until one matches `terminator`.
 */
export interface HeredocCaptureRequest {
    kind: 'heredoc';
    targetFile: string;
    writeMode: WriteMode;
    terminator: string;
}

/**
 * Raw input capture: lines accumulate until a blank line.
 */
export interface RawInputCaptureRequest {
    kind: 'rawInput';
    targetFile: string;
    writeMode: WriteMode;
}

export type CaptureRequest = HeredocCaptureRequest | RawInputCaptureRequest;

export interface CompletedOutcome {
    kind: 'completed';
    stdout: string;
    stderr: string;
    exitCode: number;
    workingDirectory: string | null;
}

export interface CaptureOutcome {
    kind: 'capture';
    request: CaptureRequest;
}

/**
 * What a command handler hands back to dispatch.
 */
export type CommandOutcome = CompletedOutcome | CaptureOutcome;
