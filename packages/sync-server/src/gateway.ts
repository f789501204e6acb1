/**
 * Sync Gateway - binds client connections to the sync manager
 */

import {
  ENTITY_TYPES,
  SyncError,
  createLogger,
  generateId,
  type IngestResult,
  type Logger,
  type SyncErrorCode,
  type SyncManager,
} from '@companion/sync';
import type { ConnectionManager } from './connection-manager.js';
import { parseClientMessage, type ClientMessage, type ConnectMessage } from './protocol.js';
import type { ClientConnection, ConnectionRecord, ServerMessage } from './types.js';
import { SERVER_VERSION } from './types.js';

export interface SyncGatewayOptions {
  manager: SyncManager;
  connections: ConnectionManager;
  logger?: Logger;
}

interface ErrorReply {
  code: SyncErrorCode;
  message?: string;
  replyTo?: string;
  eventId?: string;
  conflictId?: string;
  context?: Record<string, unknown>;
}

/**
 * Fill in the connection's user and device on an event payload that omits
 * them. Anything that is not a plain object is passed on for the validator
 * to reject.
 */
function withProvenance(candidate: unknown, record: ConnectionRecord): unknown {
  if (typeof candidate !== 'object' || candidate === null || Array.isArray(candidate)) {
    return candidate;
  }

  const provenance: Record<string, unknown> = { userId: record.userId };
  if (record.deviceId !== undefined) provenance.deviceId = record.deviceId;

  const event: Record<string, unknown> = { ...provenance };
  for (const [key, value] of Object.entries(candidate)) {
    if (value !== undefined && value !== null) event[key] = value;
  }
  return event;
}

export class SyncGateway {
  private readonly manager: SyncManager;
  private readonly connections: ConnectionManager;
  private readonly logger: Logger;

  constructor(options: SyncGatewayOptions) {
    this.manager = options.manager;
    this.connections = options.connections;
    this.logger = options.logger?.child('SyncGateway') ?? createLogger({ context: 'SyncGateway' });
  }

  /**
   * Complete the handshake: acknowledge, then register the connection,
   * which replays anything queued for the user.
   */
  async handleConnect(connection: ClientConnection, hello: ConnectMessage): Promise<ConnectionRecord> {
    const welcome: Extract<ServerMessage, { type: 'connected' }> = {
      type: 'connected',
      id: hello.id ?? generateId('msg'),
      connectionId: connection.id,
      userId: hello.userId,
      queued: this.connections.getQueuedCount(hello.userId),
      serverInfo: { version: SERVER_VERSION, entityTypes: ENTITY_TYPES },
      timestamp: Date.now(),
    };
    if (hello.deviceId !== undefined) welcome.deviceId = hello.deviceId;

    await connection.send(welcome);

    return this.connections.register(connection, {
      userId: hello.userId,
      deviceId: hello.deviceId,
      entityTypes: hello.entityTypes,
      lastSyncAt: hello.lastSyncAt,
    });
  }

  /**
   * Tell a socket that did not open with a valid `connect` why it is being
   * dropped, then close it
   */
  async rejectHandshake(connection: ClientConnection, reason: string): Promise<void> {
    const error = new SyncError({ code: 'NOT_CONNECTED', message: reason });

    try {
      await connection.send({
        type: 'sync_error',
        id: generateId('msg'),
        timestamp: Date.now(),
        ...error.toJSON(),
      });
    } catch (sendError) {
      this.logger.debug('Could not deliver handshake rejection', {
        connectionId: connection.id,
        error: sendError instanceof Error ? sendError.message : String(sendError),
      });
    }

    connection.close(4002, 'Expected connect message');
  }

  /**
   * Handle one inbound message from a registered connection
   */
  async handleMessage(connectionId: string, raw: unknown): Promise<void> {
    const record = this.connections.getConnection(connectionId);
    if (!record) {
      this.logger.warn('Message from unregistered connection', { connectionId });
      return;
    }

    this.connections.touch(connectionId);

    const parsed = parseClientMessage(raw);
    if (!parsed.ok) {
      this.logger.debug('Invalid message', { connectionId, error: parsed.error });
      await this.replyError(connectionId, { code: 'INVALID_MESSAGE', message: parsed.error });
      return;
    }

    await this.dispatch(record, parsed.message);
  }

  /**
   * Drop a connection whose socket closed
   */
  handleDisconnect(connectionId: string, reason = 'closed'): void {
    this.connections.unregister(connectionId, reason);
  }

  private async dispatch(record: ConnectionRecord, message: ClientMessage): Promise<void> {
    const replyId = message.id ?? generateId('msg');

    switch (message.type) {
      case 'sync_event':
        await this.handleSyncEvent(record, message.event, replyId);
        break;

      case 'subscribe':
      case 'unsubscribe': {
        const interests = this.connections.updateInterests(
          record.connectionId,
          message.entityTypes,
          message.type === 'subscribe' ? 'add' : 'remove'
        );
        if (interests) {
          await this.connections.sendToConnection(record.connectionId, {
            type: 'subscribed',
            id: replyId,
            entityTypes: interests,
            timestamp: Date.now(),
          });
        }
        break;
      }

      case 'ping':
        await this.connections.sendToConnection(record.connectionId, {
          type: 'pong',
          id: replyId,
          timestamp: Date.now(),
        });
        break;
    }
  }

  private async handleSyncEvent(
    record: ConnectionRecord,
    candidate: unknown,
    replyId: string
  ): Promise<void> {
    const result = await this.manager.ingest(withProvenance(candidate, record), {
      connectionId: record.connectionId,
      userId: record.userId,
    });

    await this.replyToIngest(record.connectionId, candidate, result, replyId);
  }

  private async replyToIngest(
    connectionId: string,
    candidate: unknown,
    result: IngestResult,
    replyId: string
  ): Promise<void> {
    switch (result.kind) {
      case 'applied': {
        const ack: Extract<ServerMessage, { type: 'sync_ack' }> = {
          type: 'sync_ack',
          id: replyId,
          eventId: sentEventId(candidate) ?? result.event.id,
          appliedEventId: result.event.id,
          version: result.event.version ?? 0,
          timestamp: Date.now(),
        };
        if (result.conflict) ack.conflictId = result.conflict.id;
        if (result.duplicate) ack.duplicate = true;

        await this.connections.sendToConnection(connectionId, ack);
        break;
      }

      case 'invalid_event':
        await this.replyError(connectionId, {
          code: 'INVALID_EVENT',
          message: result.reason,
          replyTo: replyId,
          eventId: result.eventId,
          context: { field: result.field },
        });
        break;

      case 'persistence_error':
        await this.replyError(connectionId, {
          code: 'PERSISTENCE_ERROR',
          replyTo: replyId,
          eventId: result.eventId,
          context: { error: result.error },
        });
        break;

      case 'conflict_unresolved':
        await this.replyError(connectionId, {
          code: 'CONFLICT_UNRESOLVED',
          replyTo: replyId,
          eventId: result.eventId,
          conflictId: result.conflict.id,
          context: {
            entityType: result.conflict.entityType,
            entityId: result.conflict.entityId,
            conflictType: result.conflict.conflictType,
          },
        });
        break;
    }
  }

  private async replyError(connectionId: string, reply: ErrorReply): Promise<void> {
    const error = new SyncError({ code: reply.code, message: reply.message, context: reply.context });

    const message: Extract<ServerMessage, { type: 'sync_error' }> = {
      type: 'sync_error',
      id: reply.replyTo ?? generateId('msg'),
      timestamp: Date.now(),
      ...error.toJSON(),
    };
    if (reply.eventId !== undefined) message.eventId = reply.eventId;
    if (reply.conflictId !== undefined) message.conflictId = reply.conflictId;

    await this.connections.sendToConnection(connectionId, message);
  }
}

function sentEventId(candidate: unknown): string | undefined {
  if (typeof candidate !== 'object' || candidate === null || !('id' in candidate)) return undefined;
  return typeof candidate.id === 'string' ? candidate.id : undefined;
}

/**
 * Create a sync gateway
 */
export function createSyncGateway(options: SyncGatewayOptions): SyncGateway {
  return new SyncGateway(options);
}
