/**
 * @companion/sync - Event model, validation, conflict handling and the sync manager
 *
 * @example
 * ```typescript
 * import { createSyncManager, createSyncEvent } from '@companion/sync';
 *
 * const manager = createSyncManager({ persistence, transport });
 *
 * const result = await manager.ingest(
 *   createSyncEvent({
 *     entityType: 'task',
 *     entityId: 'task-1',
 *     action: 'update',
 *     data: { status: 'done' },
 *     version: 3,
 *   })
 * );
 * ```
 */

// Types
export type {
  BroadcastOptions,
  ConflictInfo,
  ConflictType,
  EntityType,
  EntityVersionRecord,
  IngestOrigin,
  IngestResult,
  ManualResolutionChoice,
  ManualResolutionResult,
  PersistenceResult,
  ResolutionOutcome,
  ResolutionStrategy,
  SyncAction,
  SyncConfig,
  SyncEvent,
  SyncEventData,
  SyncManagerEvent,
  SyncManagerOptions,
  SyncOutboundMessage,
  SyncPersistence,
  SyncStats,
  SyncTransport,
  ValidationOptions,
} from './types.js';

export {
  DEFAULT_ENTITY_ID_PATTERN,
  DEFAULT_SYNC_CONFIG,
  ENTITY_TYPES,
  MAX_VERSION,
  SYNC_ACTIONS,
} from './types.js';

// Event model
export {
  baseVersionOf,
  createSyncEvent,
  entityKey,
  generateId,
  MAX_TIMESTAMP_MS,
  parseTimestamp,
  toWireEvent,
  type CreateSyncEventInput,
  type WireSyncEvent,
} from './event.js';

// Validation
export { validateSyncEvent, type ValidationResult } from './validator.js';

// Conflicts
export {
  classifyConflict,
  deepEqual,
  detectConflict,
  eventsDiffer,
  type StrategySelector,
} from './conflict-detector.js';
export {
  ConflictResolver,
  compareRecency,
  resolveConflict,
  resolveManually,
} from './conflict-resolver.js';

// Manager
export { SyncManager, createSyncManager } from './sync-manager.js';
export { KeyedMutex } from './keyed-mutex.js';

// Errors
export {
  SyncError,
  toError,
  type SerializedSyncError,
  type SyncErrorCode,
  type SyncErrorOptions,
} from './errors.js';

// Logging
export {
  LOG_LEVELS,
  createLogger,
  formatLogEntry,
  isLogLevel,
  noopLogger,
  type LogEntry,
  type LogLevel,
  type Logger,
  type LoggerOptions,
} from './logger.js';
