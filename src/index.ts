/**
 * @file Library Entry
 *
 * Public surface for embedding the interpreter.
 *
 * @module
 */

export { Interpreter, CONTINUATION_MARKER, type InterpreterOptions } from './shell/Interpreter.js';
export type {
    InvocationResult,
    CaptureRequest,
    CommandOutcome,
    WriteMode
} from './shell/types.js';
export {
    ShellError,
    ParseError,
    OperandError,
    NotFoundError,
    TypeMismatchError,
    RedirectSyntaxError,
    IOFailure,
    UnknownCommandError,
    CommandFailure
} from './shell/errors.js';
export { path_resolve } from './shell/path.js';
export { line_tokenize } from './shell/tokenizer.js';
export {
    HostMetricsProvider,
    type SystemMetricsProvider,
    type MemoryStats,
    type DiskUsage,
    type ProcessInfo
} from './system/metrics.js';
export { settings_resolve, type TermletSettings, type SettingsOptions } from './config/settings.js';
export { shellServer_start, type ShellServerHandle } from './server/ShellServer.js';
export { VERSION } from './version.js';
