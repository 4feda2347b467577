/**
 * @file REST HTTP Helpers
 *
 * Body reading, JSON replies and CORS handling for the exec API.
 *
 * @module
 */

import http from 'http';

const CORS_HEADERS: Readonly<Record<string, string>> = {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type'
};

/** Largest request body accepted, in bytes. */
const BODY_LIMIT: number = 1024 * 1024;

/**
 * Request body that is too large or not JSON. Reported as HTTP 400.
 */
export class RequestBodyError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RequestBodyError';
    }
}

/**
 * Collect the raw request body, refusing anything over `BODY_LIMIT` bytes.
 */
function bodyText_read(req: http.IncomingMessage): Promise<string> {
    return new Promise((resolve: (text: string) => void, reject: (reason?: unknown) => void): void => {
        const chunks: Buffer[] = [];
        let received: number = 0;
        let refused: boolean = false;

        req.on('data', (chunk: Buffer | string): void => {
            if (refused) {
                return;
            }
            const buffer: Buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
            received += buffer.length;
            if (received > BODY_LIMIT) {
                refused = true;
                reject(new RequestBodyError('Request body too large'));
                return;
            }
            chunks.push(buffer);
        });
        req.on('end', (): void => {
            if (!refused) {
                resolve(Buffer.concat(chunks).toString('utf-8'));
            }
        });
        req.on('error', (error: Error): void => {
            reject(error);
        });
    });
}

/**
 * Read a JSON request body. An empty body reads as `{}`.
 *
 * The result is unvalidated; routes check it with their zod schema.
 */
export async function body_parse(req: http.IncomingMessage): Promise<unknown> {
    const text: string = await bodyText_read(req);
    if (!text.trim()) {
        return {};
    }
    try {
        return JSON.parse(text);
    } catch {
        throw new RequestBodyError('Invalid JSON');
    }
}

/**
 * Write a JSON response with standard CORS headers.
 */
export function json_send(res: http.ServerResponse, data: unknown, status: number = 200): void {
    const payload: string = JSON.stringify(data, null, 2);
    res.writeHead(status, {
        'Content-Type': 'application/json',
        'Content-Length': String(Buffer.byteLength(payload, 'utf-8')),
        ...CORS_HEADERS
    });
    res.end(payload);
}

/**
 * Answer a CORS preflight request.
 *
 * @returns True if the request was a preflight.
 */
export function corsPreflight_handle(method: string, res: http.ServerResponse): boolean {
    if (method !== 'OPTIONS') {
        return false;
    }
    res.writeHead(204, { ...CORS_HEADERS, 'Access-Control-Max-Age': '86400' });
    res.end();
    return true;
}
