/**
 * @file Pseudo-Shell Command Interpreter
 *
 * Entry point for both front ends. Each call takes one raw input line and
 * the caller's working directory and returns a structured result; nothing
 * is written to a terminal.
 *
 * While a capture session is open every line goes to the session instead
 * of dispatch. Otherwise the line is tokenized and the first word selects
 * a builtin. Handler failures arrive as thrown `ShellError`s and are
 * rendered here, so no fault escapes to the host process.
 *
 * One instance serves one command stream; instances share no state.
 *
 * @module
 */

import os from 'os';
import type { CaptureRequest, CommandOutcome, InvocationResult } from './types.js';
import type { BuiltinDeps, BuiltinHandler, HostIdentity } from './commands/types.js';
import type { SystemMetricsProvider } from '../system/metrics.js';
import { HostMetricsProvider } from '../system/metrics.js';
import { CaptureSession, type CaptureFeedResult } from './capture.js';
import { ShellError, UnknownCommandError, errorMessage_get } from './errors.js';
import { line_tokenize } from './tokenizer.js';
import { commandNames_list, registry_create } from './commands/index.js';

/** Reply sent on stdout while a capture session waits for more lines. */
export const CONTINUATION_MARKER: string = '> ';

export interface InterpreterOptions {
    metrics?: SystemMetricsProvider;
    homeDir?: string;
    identity?: HostIdentity;
    clock?: () => Date;
}

/**
 * Resolve the identity of the user running the process.
 */
function hostIdentity_resolve(): HostIdentity {
    let username: string;
    try {
        username = os.userInfo().username;
    } catch {
        username = process.env.USER ?? process.env.LOGNAME ?? 'unknown';
    }
    return { username, hostname: os.hostname() };
}

export class Interpreter {
    private readonly registry: Map<string, BuiltinHandler>;
    private session: CaptureSession | null = null;

    constructor(options: InterpreterOptions = {}) {
        const deps: BuiltinDeps = {
            metrics: options.metrics ?? new HostMetricsProvider(),
            homeDir: options.homeDir ?? os.homedir(),
            identity: options.identity ?? hostIdentity_resolve(),
            clock: options.clock ?? ((): Date => new Date()),
            listCommands: commandNames_list
        };
        this.registry = registry_create(deps);
    }

    // ─── Command Execution ──────────────────────────────────────

    /**
     * Interpret one raw input line.
     *
     * @param line - Raw line as typed or received.
     * @param cwd - Caller's working directory (absolute).
     * @returns Output, exit code and the working directory to keep
     *   (`null` when the caller should keep its own).
     */
    public command_execute(line: string, cwd: string): InvocationResult {
        if (this.session !== null) {
            return this.session_feed(this.session, line, cwd);
        }

        const trimmed: string = line.trim();
        if (!trimmed) {
            return { stdout: '', stderr: '', workingDirectory: cwd, exitCode: 0 };
        }

        let tokens: string[];
        try {
            tokens = line_tokenize(trimmed);
        } catch (error: unknown) {
            return { stdout: '', stderr: `parse error: ${errorMessage_get(error)}\n`, workingDirectory: cwd, exitCode: 2 };
        }

        const verb: string = tokens[0];
        const args: string[] = tokens.slice(1);

        let outcome: CommandOutcome;
        try {
            const handler: BuiltinHandler | undefined = this.registry.get(verb);
            if (handler === undefined) {
                throw new UnknownCommandError(`${verb}: command not found`);
            }
            outcome = handler(args, cwd);
        } catch (error: unknown) {
            return failure_render(error, cwd);
        }

        if (outcome.kind === 'capture') {
            this.session = new CaptureSession(outcome.request);
            return { stdout: CONTINUATION_MARKER, stderr: '', workingDirectory: cwd, exitCode: 0 };
        }
        return {
            stdout: outcome.stdout,
            stderr: outcome.stderr,
            workingDirectory: outcome.workingDirectory,
            exitCode: outcome.exitCode
        };
    }

    // ─── Capture Sessions ───────────────────────────────────────

    /**
     * Whether a capture session is waiting for input.
     */
    public session_active(): boolean {
        return this.session !== null;
    }

    /**
     * Describe the open capture session, if any.
     */
    public session_describe(): CaptureRequest | null {
        return this.session === null ? null : this.session.request;
    }

    /**
     * Discard the open capture session without writing anything.
     *
     * @returns True if a session was open.
     */
    public session_cancel(): boolean {
        const wasActive: boolean = this.session !== null;
        this.session = null;
        return wasActive;
    }

    /**
     * Return all registered verb names.
     */
    public commands_list(): string[] {
        return commandNames_list();
    }

    private session_feed(session: CaptureSession, line: string, cwd: string): InvocationResult {
        let fed: CaptureFeedResult;
        try {
            fed = session.line_feed(line);
        } catch (error: unknown) {
            this.session = null;
            return failure_render(error, cwd);
        }

        if (fed.state === 'buffered') {
            return { stdout: CONTINUATION_MARKER, stderr: '', workingDirectory: cwd, exitCode: 0 };
        }
        this.session = null;
        return { stdout: '', stderr: '', workingDirectory: cwd, exitCode: 0 };
    }
}

/**
 * Render a thrown value as a failed invocation.
 */
function failure_render(error: unknown, cwd: string): InvocationResult {
    if (error instanceof ShellError) {
        return { stdout: '', stderr: `${error.message}\n`, workingDirectory: cwd, exitCode: error.exitCode };
    }
    return { stdout: '', stderr: `Error: ${errorMessage_get(error)}\n`, workingDirectory: cwd, exitCode: 1 };
}
