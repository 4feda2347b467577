/**
 * @file Session Registry
 *
 * Owns one interpreter per HTTP session key so capture sessions from
 * different clients never interleave. Least-recently-used sessions are
 * evicted beyond the configured capacity.
 *
 * @module
 */

import { Interpreter } from '../shell/Interpreter.js';

export interface ShellSession {
    id: string;
    interpreter: Interpreter;
    /** Last working directory reported for this session. */
    cwd: string;
}

export type InterpreterFactory = () => Interpreter;

export class SessionRegistry {
    private readonly sessions: Map<string, ShellSession> = new Map();

    constructor(
        private readonly initialCwd: string,
        private readonly capacity: number,
        private readonly interpreter_create: InterpreterFactory = (): Interpreter => new Interpreter()
    ) {}

    /**
     * Return the session for `id`, creating it on first use.
     */
    public session_get(id: string): ShellSession {
        const existing: ShellSession | undefined = this.sessions.get(id);
        if (existing) {
            // re-insert to mark as most recently used
            this.sessions.delete(id);
            this.sessions.set(id, existing);
            return existing;
        }

        const created: ShellSession = { id, interpreter: this.interpreter_create(), cwd: this.initialCwd };
        this.sessions.set(id, created);
        this.sessions_evict();
        return created;
    }

    public size(): number {
        return this.sessions.size;
    }

    private sessions_evict(): void {
        while (this.sessions.size > this.capacity) {
            const oldest: string | undefined = this.sessions.keys().next().value;
            if (oldest === undefined) {
                return;
            }
            this.sessions.delete(oldest);
        }
    }
}
