/**
 * @file Wire Schemas
 *
 * Zod runtime schemas for every inbound payload: the REST exec body and
 * the WebSocket client messages. Handlers `safeParse` at the boundary and
 * touch only the typed result.
 *
 * @module server/protocol/schemas
 */

import { z } from 'zod';

// ─── Shared ──────────────────────────────────────────────────────────────────

/** Every WebSocket client message carries a non-empty correlation ID. */
const IdSchema = z.string().min(1);

// ─── REST ────────────────────────────────────────────────────────────────────

export const ExecRequestSchema = z.object({
    cmd:     z.string(),
    cwd:     z.string().min(1).optional(),
    session: z.string().min(1).max(128).optional()
});

export type ExecRequest = z.infer<typeof ExecRequestSchema>;

// ─── WebSocket ───────────────────────────────────────────────────────────────

export const ExecMessageSchema = z.object({
    type: z.literal('exec'),
    id:   IdSchema,
    cmd:  z.string()
});

export const CwdMessageSchema = z.object({
    type: z.literal('cwd'),
    id:   IdSchema
});

export const ClientMessageSchema = z.discriminatedUnion('type', [
    ExecMessageSchema,
    CwdMessageSchema
]);

export type ValidatedClientMessage = z.infer<typeof ClientMessageSchema>;

/**
 * Join zod issues into one display line.
 */
export function issues_format(error: z.ZodError): string {
    return error.issues.map((issue: z.ZodIssue): string => {
        const location: string = issue.path.join('.');
        return location ? `${location}: ${issue.message}` : issue.message;
    }).join(', ');
}
