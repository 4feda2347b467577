/**
 * @file WebSocket Connection Handler
 *
 * Each connection owns one interpreter and one working directory for its
 * lifetime, so a capture session opened over a socket continues on the
 * same socket.
 *
 * @module
 */

import type { RawData, WebSocket } from 'ws';
import type { Interpreter } from '../shell/Interpreter.js';
import type { InvocationResult } from '../shell/types.js';
import type { ServerMessage } from './protocol/types.js';
import { ClientMessageSchema, issues_format } from './protocol/schemas.js';

export interface WebSocketHandlerDeps {
    interpreter_create: () => Interpreter;
    initialCwd: string;
}

/**
 * Decode a frame payload into text.
 */
export function messageText_decode(data: RawData | string): string {
    if (typeof data === 'string') {
        return data;
    }
    if (Array.isArray(data)) {
        return Buffer.concat(data).toString('utf-8');
    }
    if (Buffer.isBuffer(data)) {
        return data.toString('utf-8');
    }
    return Buffer.from(data).toString('utf-8');
}

/**
 * Pull a string `id` off an unvalidated payload, for error correlation.
 */
function correlationId_extract(raw: unknown): string {
    if (typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string') {
        return raw.id;
    }
    return 'unknown';
}

/**
 * Handle a single WebSocket connection.
 */
export function wsConnection_handle(ws: WebSocket, deps: WebSocketHandlerDeps): void {
    const interpreter: Interpreter = deps.interpreter_create();
    let cwd: string = deps.initialCwd;

    const send = (msg: ServerMessage): void => {
        if (ws.readyState === ws.OPEN) {
            ws.send(JSON.stringify(msg));
        }
    };

    ws.on('message', (data: RawData | string): void => {
        // ── Boundary: parse + validate before touching any fields ────────────
        let raw: unknown;
        try {
            raw = JSON.parse(messageText_decode(data));
        } catch {
            send({ type: 'error', id: 'unknown', error: 'Invalid JSON' });
            return;
        }

        const parsed = ClientMessageSchema.safeParse(raw);
        if (!parsed.success) {
            send({ type: 'error', id: correlationId_extract(raw), error: `Invalid message: ${issues_format(parsed.error)}` });
            return;
        }

        const msg = parsed.data;
        switch (msg.type) {
            case 'exec': {
                const result: InvocationResult = interpreter.command_execute(msg.cmd, cwd);
                cwd = result.workingDirectory ?? cwd;
                send({
                    type: 'result',
                    id: msg.id,
                    stdout: result.stdout,
                    stderr: result.stderr,
                    cwd,
                    code: result.exitCode
                });
                break;
            }

            case 'cwd': {
                send({ type: 'cwd', id: msg.id, cwd });
                break;
            }
        }
    });

    ws.on('close', (): void => {
        interpreter.session_cancel();
    });
}
