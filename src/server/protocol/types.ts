/**
 * @file Wire Types
 *
 * Outbound payload shapes for the REST exec route and WebSocket replies.
 *
 * @module
 */

export interface ExecResponse {
    stdout: string;
    stderr: string;
    cwd: string;
    code: number;
}

export type ServerMessage =
    | ({ type: 'result'; id: string } & ExecResponse)
    | { type: 'cwd'; id: string; cwd: string }
    | { type: 'error'; id: string; error: string };
