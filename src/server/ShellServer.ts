/**
 * @file Shell Server
 *
 * Combined HTTP + WebSocket server around the interpreter. REST clients
 * are multiplexed onto per-session interpreters; each WebSocket
 * connection gets its own.
 *
 * @module
 */

import http from 'http';
import { URL } from 'url';
import type { Socket } from 'net';
import { WebSocketServer, type WebSocket } from 'ws';
import { Interpreter } from '../shell/Interpreter.js';
import { VERSION } from '../version.js';
import {
    settings_resolve,
    workingDirectory_prepare,
    type ResolvedSettings,
    type SettingsOptions,
    type TermletSettings
} from '../config/settings.js';
import { restRequest_handle } from './RestHandler.js';
import { wsConnection_handle } from './WebSocketHandler.js';
import { SessionRegistry } from './SessionRegistry.js';
import type { RestHandlerDeps } from './rest/types.js';

export type ShellServerOptions = SettingsOptions;

export interface ShellServerHandle {
    server: http.Server;
    settings: TermletSettings;
    close: () => Promise<void>;
}

/**
 * Create and start the shell server with REST + WebSocket support.
 */
export function shellServer_start(options: ShellServerOptions = {}): ShellServerHandle {
    const resolved: ResolvedSettings = settings_resolve(options);
    for (const warning of resolved.warnings) {
        console.warn(warning);
    }
    const settings: TermletSettings = resolved.settings;
    workingDirectory_prepare(settings.initialCwd);

    const deps: RestHandlerDeps = {
        sessions: new SessionRegistry(settings.initialCwd, settings.maxSessions),
        settings,
        version: VERSION
    };

    // HTTP server with REST handler
    const server: http.Server = http.createServer((req: http.IncomingMessage, res: http.ServerResponse): void => {
        restRequest_handle(req, res, deps)
            .then((handled: boolean): void => {
                if (!handled) {
                    res.writeHead(404, { 'Content-Type': 'application/json' });
                    res.end(JSON.stringify({ error: 'Not found', path: req.url }));
                }
            })
            .catch((error: unknown): void => {
                console.error('Request failed:', error);
                if (!res.headersSent) {
                    res.writeHead(500, { 'Content-Type': 'application/json' });
                }
                res.end();
            });
    });

    const wss: WebSocketServer = new WebSocketServer({ noServer: true });

    server.on('upgrade', (req: http.IncomingMessage, socket: Socket, head: Buffer): void => {
        const url: URL = new URL(req.url || '/', `http://${settings.host}:${settings.port}`);
        if (url.pathname === settings.wsPath) {
            socket.setNoDelay(true);
            wss.handleUpgrade(req, socket, head, (ws: WebSocket): void => {
                wss.emit('connection', ws, req);
            });
        } else {
            socket.destroy();
        }
    });

    wss.on('connection', (ws: WebSocket): void => {
        console.log(`WebSocket client connected (total: ${wss.clients.size})`);
        wsConnection_handle(ws, {
            interpreter_create: (): Interpreter => new Interpreter(),
            initialCwd: settings.initialCwd
        });

        ws.on('close', (): void => {
            console.log(`WebSocket client disconnected (total: ${wss.clients.size})`);
        });
    });

    server.listen(settings.port, settings.host, (): void => {
        console.log(`
termlet server v${VERSION}

Listening on http://${settings.host}:${settings.port}
WebSocket:   ws://${settings.host}:${settings.port}${settings.wsPath}
Start cwd:   ${settings.initialCwd}

Endpoints:
  POST /api/exec  - Execute a command line
  GET  /          - Service status

Press Ctrl+C to stop.
`);
    });

    const interrupt_handle = (): void => {
        console.log('\nShutting down...');
        close()
            .then((): void => {
                console.log('Goodbye.');
                process.exit(0);
            })
            .catch((error: unknown): void => {
                console.error('Shutdown failed:', error);
                process.exit(1);
            });
    };

    const close = (): Promise<void> => new Promise((resolve: () => void, reject: (reason?: unknown) => void): void => {
        process.off('SIGINT', interrupt_handle);
        for (const client of wss.clients) {
            client.terminate();
        }
        wss.close();
        server.close((error?: Error): void => {
            if (error) {
                reject(error);
                return;
            }
            resolve();
        });
    });

    process.on('SIGINT', interrupt_handle);

    return { server, settings, close };
}
