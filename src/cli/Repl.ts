/**
 * @file Interactive REPL
 *
 * Readline loop around a local interpreter. Prints stdout verbatim and
 * stderr in red, keeps the working directory between lines, and switches
 * to a `> ` continuation prompt while a capture session is open.
 *
 * @module
 */

import * as readline from 'readline';
import chalk from 'chalk';
import { Interpreter, CONTINUATION_MARKER } from '../shell/Interpreter.js';
import type { InvocationResult } from '../shell/types.js';

const EXIT_WORDS: ReadonlySet<string> = new Set<string>(['exit', 'quit']);

export const REPL_BANNER: string = "termlet - type 'help' for commands. Ctrl-C to quit.";

// ─── Helpers ────────────────────────────────────────────────────────────────

/**
 * Output sinks, split so tests can capture them.
 */
export interface ReplOutput {
    stdout: (text: string) => void;
    stderr: (text: string) => void;
}

export interface ReplState {
    cwd: string;
}

export type ReplLineOutcome = 'continue' | 'exit';

/**
 * Render the prompt for the current state.
 *
 * @param cwd - Working directory shown in the prompt.
 * @param capturing - Whether a capture session is open.
 */
export function prompt_render(cwd: string, capturing: boolean): string {
    if (capturing) {
        return CONTINUATION_MARKER;
    }
    return `${chalk.cyan(cwd)} ${chalk.bold('$')} `;
}

/**
 * Run one input line and print its result.
 *
 * `exit` and `quit` end the loop unless a capture session is open, in
 * which case they are captured like any other line. The continuation
 * marker is not echoed since the prompt already shows it.
 *
 * @param interpreter - Interpreter owned by this REPL.
 * @param state - Mutable REPL state; `cwd` is updated in place.
 * @param line - Raw input line.
 * @param output - Output sinks.
 * @returns Whether the loop should continue.
 */
export function replLine_process(
    interpreter: Interpreter,
    state: ReplState,
    line: string,
    output: ReplOutput
): ReplLineOutcome {
    if (!interpreter.session_active() && EXIT_WORDS.has(line.trim())) {
        return 'exit';
    }

    const result: InvocationResult = interpreter.command_execute(line, state.cwd);
    state.cwd = result.workingDirectory ?? state.cwd;

    const continuation: boolean = interpreter.session_active() && result.stdout === CONTINUATION_MARKER;
    if (result.stdout && !continuation) {
        output.stdout(result.stdout);
    }
    if (result.stderr) {
        output.stderr(chalk.red(result.stderr));
    }
    return 'continue';
}

/**
 * React to Ctrl-C: cancel an open capture session, or ask to exit.
 */
export function replInterrupt_handle(interpreter: Interpreter, output: ReplOutput): ReplLineOutcome {
    if (interpreter.session_cancel()) {
        output.stdout('\n');
        return 'continue';
    }
    return 'exit';
}

/**
 * Build a readline completer offering verb names in command position.
 */
export function replCompleter_create(commands: readonly string[]): readline.Completer {
    return (line: string): readline.CompleterResult => {
        const words: string[] = line.split(/\s+/);
        const last: string = words[words.length - 1] || '';
        if (words.length === 1 && !line.endsWith(' ')) {
            return [commands.filter((command: string): boolean => command.startsWith(last)), last];
        }
        return [[], last];
    };
}

// ─── REPL ───────────────────────────────────────────────────────────────────

export interface ReplOptions {
    cwd: string;
    interpreter?: Interpreter;
}

/**
 * State container for the interactive REPL.
 */
class ShellRepl {
    private rl: readline.Interface | null = null;
    private readonly state: ReplState;
    private readonly output: ReplOutput = {
        stdout: (text: string): void => {
            process.stdout.write(text);
        },
        stderr: (text: string): void => {
            process.stderr.write(text);
        }
    };

    constructor(
        private readonly interpreter: Interpreter,
        cwd: string
    ) {
        this.state = { cwd };
    }

    /**
     * Start the interactive loop.
     */
    public start(): void {
        this.rl = readline.createInterface({
            input: process.stdin,
            output: process.stdout,
            prompt: prompt_render(this.state.cwd, false),
            completer: replCompleter_create(this.interpreter.commands_list())
        });

        console.log(chalk.dim(REPL_BANNER));
        this.rl.prompt();

        this.rl.on('line', (line: string): void => this.line_handle(line));
        this.rl.on('SIGINT', (): void => this.interrupt_handle());
        this.rl.on('close', (): void => this.shutdown());
    }

    private line_handle(line: string): void {
        if (replLine_process(this.interpreter, this.state, line, this.output) === 'exit') {
            this.rl?.close();
            return;
        }
        this.prompt_show();
    }

    private interrupt_handle(): void {
        if (replInterrupt_handle(this.interpreter, this.output) === 'continue') {
            this.prompt_show();
            return;
        }
        console.log('\nExiting.');
        process.exit(0);
    }

    private prompt_show(): void {
        this.rl?.setPrompt(prompt_render(this.state.cwd, this.interpreter.session_active()));
        this.rl?.prompt();
    }

    private shutdown(): void {
        process.stdout.write('\n');
        process.exit(0);
    }
}

/**
 * Start the interactive REPL on stdin/stdout.
 */
export function repl_start(options: ReplOptions): void {
    const repl: ShellRepl = new ShellRepl(options.interpreter ?? new Interpreter(), options.cwd);
    repl.start();
}
