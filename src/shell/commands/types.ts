import type { SystemMetricsProvider } from '../../system/metrics.js';
import type { CommandOutcome } from '../types.js';

/**
 * Builtin command handler signature.
 *
 * @param args - Tokens following the verb.
 * @param cwd - Caller's working directory (absolute).
 * @returns Completed output, or a request to open a capture session.
 */
export type BuiltinHandler = (args: string[], cwd: string) => CommandOutcome;

/**
 * User and host names reported by `whoami` and `hostname`.
 */
export interface HostIdentity {
    username: string;
    hostname: string;
}

/**
 * Shared dependency bag injected into builtin factories.
 */
export interface BuiltinDeps {
    metrics: SystemMetricsProvider;
    homeDir: string;
    identity: HostIdentity;
    clock: () => Date;
    listCommands: () => string[];
}

/**
 * Declarative builtin descriptor consumed by the command registry.
 */
export interface BuiltinCommand {
    name: string;
    /** Extra verbs dispatching to the same handler. Not listed by `which`. */
    aliases?: readonly string[];
    /**
     * Create a callable builtin handler bound to shared dependencies.
     *
     * @param deps - Shared dependency bag.
     * @returns Runnable builtin handler.
     */
    create: (deps: BuiltinDeps) => BuiltinHandler;
}
