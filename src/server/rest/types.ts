/**
 * @file REST Handler Types
 *
 * Shared interfaces for REST request handling and route modules.
 *
 * @module
 */

import type http from 'http';
import type { URL } from 'url';
import type { SessionRegistry } from '../SessionRegistry.js';
import type { TermletSettings } from '../../config/settings.js';

export interface RestHandlerDeps {
    sessions: SessionRegistry;
    settings: TermletSettings;
    version: string;
}

export interface RestRouteContext {
    req: http.IncomingMessage;
    res: http.ServerResponse;
    deps: RestHandlerDeps;
    url: URL;
    pathname: string;
    method: string;
}

export type RestRouteHandler = (context: RestRouteContext) => Promise<boolean>;
