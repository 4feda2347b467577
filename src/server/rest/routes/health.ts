/**
 * @file Health Route
 *
 * Handles root health/status endpoint.
 *
 * @module
 */

import { json_send } from '../http.js';
import type { RestRouteContext } from '../types.js';

/**
 * Handle root service health endpoint.
 *
 * @param context - Route context.
 * @returns True if handled.
 */
export async function route_healthHandle(context: RestRouteContext): Promise<boolean> {
    if (context.pathname !== '/' || context.method !== 'GET') {
        return false;
    }

    json_send(context.res, {
        service: 'termlet',
        version: context.deps.version,
        status: 'running',
        sessions: context.deps.sessions.size(),
        endpoints: [
            'POST /api/exec',
            `WS   ${context.deps.settings.wsPath}`
        ]
    });
    return true;
}
