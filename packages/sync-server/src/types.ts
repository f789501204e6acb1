/**
 * Types for the sync connection layer
 */

import type {
  EntityType,
  LogLevel,
  Logger,
  SerializedSyncError,
  SyncConfig,
  SyncOutboundMessage,
  SyncPersistence,
} from '@companion/sync';

/**
 * Messages sent to clients
 */
export type ServerMessage =
  | SyncOutboundMessage
  | {
      type: 'connected';
      id: string;
      connectionId: string;
      userId: string;
      deviceId?: string;
      /** Queued events that follow this message */
      queued: number;
      serverInfo: { version: string; entityTypes: readonly EntityType[] };
      timestamp: number;
    }
  | {
      type: 'sync_ack';
      id: string;
      /** ID of the event the client sent */
      eventId: string;
      /** ID of the event that was applied (differs after conflict resolution) */
      appliedEventId: string;
      version: number;
      conflictId?: string;
      duplicate?: boolean;
      timestamp: number;
    }
  | ({
      type: 'sync_error';
      id: string;
      eventId?: string;
      conflictId?: string;
      timestamp: number;
    } & SerializedSyncError)
  | {
      type: 'subscribed';
      id: string;
      entityTypes: EntityType[];
      timestamp: number;
    }
  | {
      type: 'pong';
      id: string;
      timestamp: number;
    };

export type ServerMessageType = ServerMessage['type'];

/**
 * A live client connection as seen by the transport
 */
export interface ClientConnection {
  /** Connection ID */
  id: string;
  /** Deliver a message; a rejected promise or throw marks the connection dead */
  send(message: ServerMessage): void | Promise<void>;
  /** Close the underlying socket */
  close(code?: number, reason?: string): void;
}

/**
 * Options for registering a connection
 */
export interface RegisterOptions {
  userId: string;
  deviceId?: string;
  /** Entity types the connection wants (default: all) */
  entityTypes?: readonly EntityType[];
  /** Only replay queued messages enqueued after this time (ms) */
  lastSyncAt?: number;
}

/**
 * Public view of a live connection
 */
export interface ConnectionRecord {
  connectionId: string;
  userId: string;
  deviceId?: string;
  connectedAt: number;
  lastSeen: number;
  interests: ReadonlySet<EntityType>;
  /** False until the offline queue has been replayed */
  ready: boolean;
}

/**
 * Transport configuration
 */
export interface TransportConfig {
  /** Per-user offline queue cap; oldest messages are dropped past it */
  offlineQueueLimit?: number;
  /** Idle time after which a connection is dropped (ms) */
  clientTimeout?: number;
  /** How often idle connections are swept (ms) */
  sweepInterval?: number;
  logger?: Logger;
}

export const DEFAULT_TRANSPORT_CONFIG: Required<Omit<TransportConfig, 'logger'>> = {
  offlineQueueLimit: 500,
  clientTimeout: 60000,
  sweepInterval: 30000,
};

/**
 * Transport events
 */
export type TransportEvent =
  | { type: 'client_connected'; connectionId: string; userId: string; replayed: number }
  | { type: 'client_disconnected'; connectionId: string; userId: string; reason: string }
  | { type: 'transport_error'; connectionId: string; userId: string; error: Error }
  | { type: 'offline_enqueued'; userId: string; messageType: ServerMessageType }
  | { type: 'offline_dropped'; userId: string; dropped: number };

/**
 * Transport statistics
 */
export interface TransportStats {
  connections: number;
  connectedUsers: number;
  knownUsers: number;
  queuedMessages: number;
  droppedMessages: number;
  transportErrors: number;
}

/**
 * Server configuration
 */
export interface SyncServerConfig {
  /** Port to listen on */
  port?: number;
  /** Host to bind to */
  host?: string;
  /** Path for WebSocket endpoint */
  path?: string;
  /** Time allowed for the connect message (ms) */
  connectTimeout?: number;
  /** Idle connection timeout (ms) */
  clientTimeout?: number;
  /** Idle sweep interval (ms) */
  heartbeatInterval?: number;
  /** Max message size in bytes */
  maxMessageSize?: number;
  /** Per-user offline queue cap */
  offlineQueueLimit?: number;
  /** Minimum log level, or false to disable logging */
  logging?: boolean | LogLevel;
  /** Sync manager configuration */
  sync?: SyncConfig;
  /** Record store */
  persistence?: SyncPersistence;
  /** Logger (overrides `logging`) */
  logger?: Logger;
}

export const DEFAULT_SERVER_CONFIG: Required<
  Omit<SyncServerConfig, 'sync' | 'persistence' | 'logger'>
> = {
  port: 8080,
  host: '0.0.0.0',
  path: '/sync',
  connectTimeout: 10000,
  clientTimeout: DEFAULT_TRANSPORT_CONFIG.clientTimeout,
  heartbeatInterval: DEFAULT_TRANSPORT_CONFIG.sweepInterval,
  maxMessageSize: 1024 * 1024, // 1MB
  offlineQueueLimit: DEFAULT_TRANSPORT_CONFIG.offlineQueueLimit,
  logging: 'info',
};

export const SERVER_VERSION = '0.1.0';
