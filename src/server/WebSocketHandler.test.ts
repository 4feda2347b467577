import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import type { WebSocket } from 'ws';
import { messageText_decode, wsConnection_handle } from './WebSocketHandler.js';
import type { Interpreter } from '../shell/Interpreter.js';
import { interpreter_create, workspace_create, workspace_remove } from '../testing/fixtures.js';

interface CapturedMessage {
    type: string;
    [key: string]: unknown;
}

class MockWebSocket extends EventEmitter {
    public OPEN: number = 1;
    public readyState: number = 1;
    public sent: string[] = [];

    send(payload: string): void {
        this.sent.push(payload);
    }
}

function sentMessages_parse(ws: MockWebSocket): CapturedMessage[] {
    return ws.sent.map((payload: string): CapturedMessage => JSON.parse(payload) as CapturedMessage);
}

describe('wsConnection_handle', (): void => {
    let dir: string;
    let ws: MockWebSocket;
    let interpreter: Interpreter;

    function message_send(payload: unknown): void {
        ws.emit('message', Buffer.from(JSON.stringify(payload)));
    }

    beforeEach((): void => {
        dir = workspace_create();
        ws = new MockWebSocket();
        interpreter = interpreter_create(dir);
        wsConnection_handle(ws as unknown as WebSocket, {
            interpreter_create: (): Interpreter => interpreter,
            initialCwd: dir
        });
    });

    afterEach((): void => {
        workspace_remove(dir);
    });

    it('answers exec with a result message', (): void => {
        message_send({ type: 'exec', id: 'req-1', cmd: 'echo hi' });

        expect(sentMessages_parse(ws)).toEqual([
            { type: 'result', id: 'req-1', stdout: 'hi\n', stderr: '', cwd: dir, code: 0 }
        ]);
    });

    it('tracks the connection working directory', (): void => {
        fs.mkdirSync(path.join(dir, 'sub'));
        message_send({ type: 'exec', id: 'req-1', cmd: 'cd sub' });
        message_send({ type: 'exec', id: 'req-2', cmd: 'cpu' });
        message_send({ type: 'cwd', id: 'req-3' });

        const messages: CapturedMessage[] = sentMessages_parse(ws);
        expect(messages[0].cwd).toBe(path.join(dir, 'sub'));
        expect(messages[1].cwd).toBe(path.join(dir, 'sub'));
        expect(messages[2]).toEqual({ type: 'cwd', id: 'req-3', cwd: path.join(dir, 'sub') });
    });

    it('reports malformed JSON', (): void => {
        ws.emit('message', Buffer.from('{ nope'));
        expect(sentMessages_parse(ws)).toEqual([{ type: 'error', id: 'unknown', error: 'Invalid JSON' }]);
    });

    it('reports schema failures with the correlation id', (): void => {
        message_send({ type: 'exec', id: 'req-9' });
        expect(sentMessages_parse(ws)).toEqual([{ type: 'error', id: 'req-9', error: 'Invalid message: cmd: Required' }]);
    });

    it('does not send once the socket is closed', (): void => {
        ws.readyState = 3;
        message_send({ type: 'cwd', id: 'req-1' });
        expect(ws.sent).toEqual([]);
    });

    it('drops an open capture session when the socket closes', (): void => {
        message_send({ type: 'exec', id: 'req-1', cmd: 'cat > draft.txt' });
        expect(interpreter.session_active()).toBe(true);

        ws.emit('close');
        expect(interpreter.session_active()).toBe(false);
        expect(fs.existsSync(path.join(dir, 'draft.txt'))).toBe(false);
    });
});

describe('messageText_decode', (): void => {
    it('accepts strings, buffers and fragment lists', (): void => {
        expect(messageText_decode('plain')).toBe('plain');
        expect(messageText_decode(Buffer.from('buf'))).toBe('buf');
        expect(messageText_decode([Buffer.from('a'), Buffer.from('b')])).toBe('ab');
        const arrayBuffer: ArrayBuffer = new ArrayBuffer(2);
        new Uint8Array(arrayBuffer).set([104, 105]);
        expect(messageText_decode(arrayBuffer)).toBe('hi');
    });
});
