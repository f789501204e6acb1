/**
 * Wire protocol: inbound message schemas and outbound serialization
 */

import { ENTITY_TYPES, parseTimestamp, toWireEvent } from '@companion/sync';
import { z } from 'zod';
import type { ServerMessage } from './types.js';

const entityTypesSchema = z.array(z.enum(ENTITY_TYPES)).min(1);

const messageIdSchema = z.string().min(1).optional();

const timestampSchema = z
  .union([z.number(), z.string()])
  .transform((value, ctx) => {
    const parsed = parseTimestamp(value);
    if (parsed === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid timestamp' });
      return z.NEVER;
    }
    return parsed;
  });

/**
 * First message on every socket
 */
export const connectMessageSchema = z.object({
  type: z.literal('connect'),
  id: messageIdSchema,
  userId: z.string().trim().min(1),
  deviceId: z.string().trim().min(1).optional(),
  entityTypes: entityTypesSchema.optional(),
  lastSyncAt: timestampSchema.optional(),
});

export type ConnectMessage = z.infer<typeof connectMessageSchema>;

/**
 * Messages accepted after the handshake. The event payload is validated
 * by the sync manager, not here.
 */
export const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('sync_event'),
    id: messageIdSchema,
    event: z.unknown(),
  }),
  z.object({
    type: z.literal('subscribe'),
    id: messageIdSchema,
    entityTypes: entityTypesSchema,
  }),
  z.object({
    type: z.literal('unsubscribe'),
    id: messageIdSchema,
    entityTypes: entityTypesSchema,
  }),
  z.object({
    type: z.literal('ping'),
    id: messageIdSchema,
  }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

export type ParseResult<T> = { ok: true; message: T } | { ok: false; error: string };

function decode(raw: unknown): ParseResult<unknown> {
  if (typeof raw !== 'string') {
    return { ok: true, message: raw };
  }
  try {
    const message: unknown = JSON.parse(raw);
    return { ok: true, message };
  } catch {
    return { ok: false, error: 'Message is not valid JSON' };
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): ParseResult<T> {
  const decoded = decode(raw);
  if (!decoded.ok) return decoded;

  const result = schema.safeParse(decoded.message);
  if (!result.success) {
    return { ok: false, error: formatIssues(result.error) };
  }
  return { ok: true, message: result.data };
}

/**
 * Parse the handshake message (raw JSON text or an already decoded value)
 */
export function parseConnectMessage(raw: unknown): ParseResult<ConnectMessage> {
  return parseWith(connectMessageSchema, raw);
}

/**
 * Parse a post-handshake message (raw JSON text or an already decoded value)
 */
export function parseClientMessage(raw: unknown): ParseResult<ClientMessage> {
  return parseWith(clientMessageSchema, raw);
}

/**
 * Encode an outbound message as JSON; event timestamps go out as ISO-8601
 */
export function serializeMessage(message: ServerMessage): string {
  if (message.type === 'sync_applied') {
    return JSON.stringify({ ...message, event: toWireEvent(message.event) });
  }
  return JSON.stringify(message);
}
