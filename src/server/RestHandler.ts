/**
 * @file REST Route Handler
 *
 * Dispatches HTTP requests to the route modules in `rest/routes`.
 *
 * @module
 */

import http from 'http';
import { URL } from 'url';
import { corsPreflight_handle, json_send, RequestBodyError } from './rest/http.js';
import { errorMessage_get } from '../shell/errors.js';
import type { RestHandlerDeps, RestRouteContext, RestRouteHandler } from './rest/types.js';
import { route_execHandle } from './rest/routes/exec.js';
import { route_healthHandle } from './rest/routes/health.js';

export type { RestHandlerDeps } from './rest/types.js';

const ROUTES: readonly RestRouteHandler[] = [
    route_execHandle,
    route_healthHandle
];

/**
 * Handle HTTP REST API requests.
 *
 * @returns True if the request was handled, false if it should fall through.
 */
export async function restRequest_handle(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    deps: RestHandlerDeps
): Promise<boolean> {
    const method: string = req.method || 'GET';
    if (corsPreflight_handle(method, res)) {
        return true;
    }

    const url: URL = new URL(req.url || '/', `http://${deps.settings.host}:${deps.settings.port}`);
    const context: RestRouteContext = {
        req,
        res,
        deps,
        url,
        pathname: url.pathname,
        method
    };

    try {
        for (const route of ROUTES) {
            if (await route(context)) {
                return true;
            }
        }
    } catch (error: unknown) {
        const status: number = error instanceof RequestBodyError ? 400 : 500;
        json_send(res, { error: errorMessage_get(error) }, status);
        return true;
    }

    return false;
}
