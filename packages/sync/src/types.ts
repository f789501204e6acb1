/**
 * Types for the companion sync core
 */

import type { Logger } from './logger.js';

/**
 * Entity kinds that take part in cross-device sync
 */
export const ENTITY_TYPES = ['conversation', 'task', 'idea', 'memory'] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

/**
 * Change actions
 */
export const SYNC_ACTIONS = ['create', 'update', 'delete'] as const;

export type SyncAction = (typeof SYNC_ACTIONS)[number];

/**
 * Field map carried by an event. For `update` this is a sparse patch.
 */
export type SyncEventData = Record<string, unknown>;

/**
 * A single proposed or applied change
 */
export interface SyncEvent {
  /** Unique event ID */
  id: string;
  /** Kind of the target record */
  entityType: EntityType;
  /** Target record ID */
  entityId: string;
  /** Change action */
  action: SyncAction;
  /** Full record, sparse patch or empty (delete) */
  data: SyncEventData;
  /** Origination time (ms since epoch) */
  timestamp: number;
  /** Originating user */
  userId?: string;
  /** Originating device */
  deviceId?: string;
  /**
   * Incoming: the entity version the client last observed (0 or absent = none).
   * Applied: the post-apply version assigned by the manager.
   */
  version?: number;
}

/**
 * Authoritative state for one entity
 */
export interface EntityVersionRecord {
  /** Post-apply version of the last applied event */
  version: number;
  /** Last applied event, stamped with `version` */
  event: SyncEvent;
  /** Base version the last applied event claimed */
  baseVersion: number;
}

/**
 * Conflict classification
 */
export type ConflictType = 'concurrent_update' | 'delete_vs_update' | 'stale_version';

/**
 * Resolution strategies
 */
export type ResolutionStrategy = 'last_write_wins' | 'field_merge' | 'delete_wins' | 'manual';

/**
 * A detected conflict between an applied event and a newly arrived one
 */
export interface ConflictInfo {
  /** Conflict ID (stable for retained conflicts) */
  id: string;
  entityType: EntityType;
  entityId: string;
  /** The event already applied */
  localEvent: SyncEvent;
  /** The newly arrived event */
  remoteEvent: SyncEvent;
  conflictType: ConflictType;
  resolutionStrategy: ResolutionStrategy;
  /** When the conflict was detected */
  detectedAt: number;
}

/**
 * Outcome of conflict resolution
 */
export type ResolutionOutcome =
  | { status: 'resolved'; event: SyncEvent; strategy: Exclude<ResolutionStrategy, 'manual'> }
  | { status: 'unresolved'; conflict: ConflictInfo };

/**
 * Choices for adjudicating a retained conflict
 */
export type ManualResolutionChoice = 'use_local' | 'use_remote' | 'merge';

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/**
 * Result of a persistence apply call
 */
export type PersistenceResult = { ok: true } | { ok: false; error: string };

/**
 * Record store the core writes through. Implementations must apply each
 * event atomically.
 */
export interface SyncPersistence {
  /** Apply an event to the store */
  apply(event: SyncEvent): Promise<PersistenceResult>;

  /** Last applied version and event for an entity, if any */
  getLastVersion(entityType: EntityType, entityId: string): Promise<EntityVersionRecord | null>;
}

/**
 * Messages the manager hands to the transport
 */
export type SyncOutboundMessage =
  | {
      type: 'sync_applied';
      id: string;
      event: SyncEvent;
      timestamp: number;
    }
  | {
      type: 'conflict_notice';
      id: string;
      entityType: EntityType;
      entityId: string;
      conflictType: ConflictType;
      resolutionStrategy: ResolutionStrategy;
      /** ID of the event that superseded the competing changes */
      resolvedEventId: string;
      timestamp: number;
    };

/**
 * Broadcast targeting
 */
export interface BroadcastOptions {
  /** Connection that must not receive the message */
  exclude?: string;
  /** Only deliver to connections interested in this entity type */
  entityType?: EntityType;
}

/**
 * Delivery surface the manager broadcasts through
 */
export interface SyncTransport {
  broadcast(message: SyncOutboundMessage, options?: BroadcastOptions): Promise<void>;
}

// ---------------------------------------------------------------------------
// Ingest
// ---------------------------------------------------------------------------

/**
 * Where an incoming event came from
 */
export interface IngestOrigin {
  /** Connection that delivered the event */
  connectionId?: string;
  /** Authenticated user of that connection; a different event userId is rejected */
  userId?: string;
}

/**
 * Result of ingesting one event
 */
export type IngestResult =
  | {
      kind: 'applied';
      event: SyncEvent;
      /** Present when the applied event came out of conflict resolution */
      conflict?: ConflictInfo;
      /** The event had already been applied; nothing was written or broadcast */
      duplicate?: boolean;
    }
  | { kind: 'invalid_event'; eventId?: string; reason: string; field: string }
  | { kind: 'persistence_error'; eventId: string; error: string }
  | { kind: 'conflict_unresolved'; eventId: string; conflict: ConflictInfo };

/**
 * Result of adjudicating a retained conflict
 */
export type ManualResolutionResult =
  | { kind: 'applied'; event: SyncEvent; conflict: ConflictInfo }
  | { kind: 'not_found'; conflictId: string }
  | { kind: 'persistence_error'; conflictId: string; error: string };

// ---------------------------------------------------------------------------
// Stats & events
// ---------------------------------------------------------------------------

/**
 * Snapshot of manager counters
 */
export interface SyncStats {
  eventsByAction: Record<SyncAction, number>;
  eventsByEntityType: Record<EntityType, number>;
  conflictsByType: Record<ConflictType, number>;
  resolutionsByStrategy: Record<ResolutionStrategy, number>;
  rejectedEvents: number;
  persistenceFailures: number;
  unresolvedConflicts: number;
  trackedEntities: number;
}

/**
 * Events emitted by the sync manager
 */
export type SyncManagerEvent =
  | { type: 'event_applied'; event: SyncEvent; connectionId?: string }
  | { type: 'event_rejected'; eventId?: string; reason: string }
  | { type: 'conflict_detected'; conflict: ConflictInfo }
  | { type: 'conflict_resolved'; conflict: ConflictInfo; event: SyncEvent }
  | { type: 'conflict_unresolved'; conflict: ConflictInfo }
  | { type: 'conflict_evicted'; conflict: ConflictInfo }
  | { type: 'persistence_failed'; eventId: string; error: string };

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

/**
 * Validator options
 */
export interface ValidationOptions {
  /** Accepted entity ID format */
  entityIdPattern?: RegExp;
  /** How far in the future a timestamp may be (ms) */
  maxClockSkewMs?: number;
  /** Reject events whose userId differs from this one */
  expectedUserId?: string;
  /** Clock used for the skew check */
  now?: number;
}

/**
 * Sync manager configuration
 */
export interface SyncConfig {
  /** Per-entity resolution strategy overrides */
  conflictStrategies?: Partial<Record<EntityType, ResolutionStrategy>>;
  /** Strategy for stale versions and unconfigured cases */
  defaultStrategy?: Exclude<ResolutionStrategy, 'manual'>;
  /** Accepted entity ID format */
  entityIdPattern?: RegExp;
  /** Allowed clock skew for event timestamps (ms) */
  maxClockSkewMs?: number;
  /** Cap on retained unresolved conflicts */
  maxUnresolvedConflicts?: number;
}

/**
 * Highest version an entity can reach; beyond it versions stop being exact
 */
export const MAX_VERSION = Number.MAX_SAFE_INTEGER;

/**
 * Default entity ID format: letters, digits, `_` and `-`, up to 128 chars
 */
export const DEFAULT_ENTITY_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,127}$/;

/**
 * Default sync configuration
 */
export const DEFAULT_SYNC_CONFIG: Required<SyncConfig> = {
  conflictStrategies: {},
  defaultStrategy: 'last_write_wins',
  entityIdPattern: DEFAULT_ENTITY_ID_PATTERN,
  maxClockSkewMs: 5 * 60 * 1000,
  maxUnresolvedConflicts: 1000,
};

/**
 * Options for constructing a sync manager
 */
export interface SyncManagerOptions {
  persistence: SyncPersistence;
  transport: SyncTransport;
  config?: SyncConfig;
  logger?: Logger;
}
