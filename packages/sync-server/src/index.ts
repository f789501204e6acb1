/**
 * @companion/sync-server - WebSocket transport for the companion sync core
 *
 * @example
 * ```typescript
 * import { createSyncServer, createMemoryPersistence } from '@companion/sync-server';
 *
 * const server = createSyncServer({
 *   port: 8080,
 *   persistence: createMemoryPersistence(),
 *   sync: { conflictStrategies: { memory: 'manual' } },
 * });
 *
 * await server.start();
 *
 * server.onEvent(({ source, event }) => {
 *   console.log(source, event.type);
 * });
 *
 * await server.stop();
 * ```
 *
 * @example CLI
 * ```bash
 * companion-sync --port 3000 --log-level debug
 * ```
 */

// Types
export type {
  ClientConnection,
  ConnectionRecord,
  RegisterOptions,
  ServerMessage,
  ServerMessageType,
  SyncServerConfig,
  TransportConfig,
  TransportEvent,
  TransportStats,
} from './types.js';

export { DEFAULT_SERVER_CONFIG, DEFAULT_TRANSPORT_CONFIG, SERVER_VERSION } from './types.js';

// Transport
export {
  ConnectionManager,
  createConnectionManager,
  type DrainOptions,
} from './connection-manager.js';
export { OfflineQueue, type EnqueueResult } from './offline-queue.js';

// Gateway & protocol
export { SyncGateway, createSyncGateway, type SyncGatewayOptions } from './gateway.js';
export {
  clientMessageSchema,
  connectMessageSchema,
  parseClientMessage,
  parseConnectMessage,
  serializeMessage,
  type ClientMessage,
  type ConnectMessage,
  type ParseResult,
} from './protocol.js';

// Sync Server
export { SyncServer, createSyncServer, type ServerEvent } from './sync-server.js';

// Configuration
export {
  ENV_PREFIX,
  loadServerConfig,
  parseArgs,
  toServerConfig,
  type LoadConfigResult,
  type ParsedArgs,
  type ServerSettings,
} from './config.js';

// Storage
export {
  MemoryPersistence,
  createMemoryPersistence,
  type MemoryPersistenceOptions,
  type StoredEntity,
} from './storage/memory-persistence.js';
