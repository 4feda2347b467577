/**
 * @file Exec Route
 *
 * Handles `POST /api/exec`: run one line on the caller's session.
 *
 * @module
 */

import type { InvocationResult } from '../../../shell/types.js';
import type { ShellSession } from '../../SessionRegistry.js';
import type { ExecResponse } from '../../protocol/types.js';
import { ExecRequestSchema, issues_format } from '../../protocol/schemas.js';
import { body_parse, json_send } from '../http.js';
import type { RestRouteContext } from '../types.js';

const DEFAULT_SESSION: string = 'default';

/**
 * Handle `POST /api/exec`.
 *
 * Body `{ cmd, cwd?, session? }`. Without `cwd` the session's last
 * working directory is used. When the command leaves the directory
 * unchanged the reply echoes the directory it ran in.
 *
 * @param context - Route context.
 * @returns True if handled.
 */
export async function route_execHandle(context: RestRouteContext): Promise<boolean> {
    if (context.pathname !== '/api/exec' || context.method !== 'POST') {
        return false;
    }

    const parsed = ExecRequestSchema.safeParse(await body_parse(context.req));
    if (!parsed.success) {
        json_send(context.res, { error: `Invalid request: ${issues_format(parsed.error)}` }, 400);
        return true;
    }

    const session: ShellSession = context.deps.sessions.session_get(parsed.data.session ?? DEFAULT_SESSION);
    const cwd: string = parsed.data.cwd ?? session.cwd;
    const result: InvocationResult = session.interpreter.command_execute(parsed.data.cmd, cwd);
    session.cwd = result.workingDirectory ?? cwd;

    const response: ExecResponse = {
        stdout: result.stdout,
        stderr: result.stderr,
        cwd: session.cwd,
        code: result.exitCode
    };
    json_send(context.res, response);
    return true;
}
