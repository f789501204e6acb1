/**
 * Sync Manager — ingests client events, resolves conflicts, writes through
 * the persistence collaborator and rebroadcasts what was applied.
 */

import { Subject, type Observable } from 'rxjs';
import { detectConflict } from './conflict-detector.js';
import { ConflictResolver, resolveManually } from './conflict-resolver.js';
import { toError } from './errors.js';
import { baseVersionOf, entityKey, generateId } from './event.js';
import { KeyedMutex } from './keyed-mutex.js';
import { createLogger, type Logger } from './logger.js';
import type {
  ConflictInfo,
  ConflictType,
  EntityType,
  EntityVersionRecord,
  IngestOrigin,
  IngestResult,
  ManualResolutionChoice,
  ManualResolutionResult,
  ResolutionStrategy,
  SyncAction,
  SyncConfig,
  SyncEvent,
  SyncManagerEvent,
  SyncManagerOptions,
  SyncPersistence,
  SyncStats,
  SyncTransport,
} from './types.js';
import { DEFAULT_SYNC_CONFIG, MAX_VERSION } from './types.js';
import { validateSyncEvent } from './validator.js';

type RecordLookup = { ok: true; record: EntityVersionRecord | null } | { ok: false; error: string };

type CommitResult = { ok: true } | { ok: false; error: string };

function candidateId(candidate: unknown): string | undefined {
  if (typeof candidate !== 'object' || candidate === null || !('id' in candidate)) return undefined;
  return typeof candidate.id === 'string' && candidate.id.length > 0 ? candidate.id : undefined;
}

/**
 * Orchestrates validation, conflict handling, persistence and rebroadcast.
 *
 * Work on one entity is serialized behind a per-entity lock; different
 * entities proceed concurrently.
 *
 * @example
 * ```typescript
 * const manager = new SyncManager({ persistence, transport });
 *
 * const result = await manager.ingest(rawEvent, { connectionId, userId });
 * if (result.kind === 'applied') {
 *   console.log('applied at version', result.event.version);
 * }
 * ```
 */
export class SyncManager {
  private readonly persistence: SyncPersistence;
  private readonly transport: SyncTransport;
  private readonly config: Required<SyncConfig>;
  private readonly resolver: ConflictResolver;
  private readonly logger: Logger;

  private readonly versions = new Map<string, EntityVersionRecord>();
  private readonly entityLocks = new KeyedMutex();
  private readonly unresolved = new Map<string, ConflictInfo>();

  private readonly eventsByAction: Record<SyncAction, number> = { create: 0, update: 0, delete: 0 };
  private readonly eventsByEntityType: Record<EntityType, number> = {
    conversation: 0,
    task: 0,
    idea: 0,
    memory: 0,
  };
  private readonly conflictsByType: Record<ConflictType, number> = {
    concurrent_update: 0,
    delete_vs_update: 0,
    stale_version: 0,
  };
  private readonly resolutionsByStrategy: Record<ResolutionStrategy, number> = {
    last_write_wins: 0,
    field_merge: 0,
    delete_wins: 0,
    manual: 0,
  };
  private rejectedEvents = 0;
  private persistenceFailures = 0;

  private readonly eventsSubject = new Subject<SyncManagerEvent>();

  /** Observable of manager events */
  readonly events$: Observable<SyncManagerEvent>;

  constructor(options: SyncManagerOptions) {
    this.persistence = options.persistence;
    this.transport = options.transport;
    this.config = { ...DEFAULT_SYNC_CONFIG, ...options.config };
    this.resolver = new ConflictResolver(this.config);
    this.logger = options.logger?.child('SyncManager') ?? createLogger({ context: 'SyncManager' });
    this.events$ = this.eventsSubject.asObservable();
  }

  /**
   * Ingest one event from a client
   */
  async ingest(candidate: unknown, origin: IngestOrigin = {}): Promise<IngestResult> {
    const validation = validateSyncEvent(candidate, {
      entityIdPattern: this.config.entityIdPattern,
      maxClockSkewMs: this.config.maxClockSkewMs,
      expectedUserId: origin.userId,
    });

    if (!validation.valid) {
      const eventId = candidateId(candidate);
      this.rejectedEvents++;
      this.logger.warn('Rejected sync event', { eventId, field: validation.field, reason: validation.reason });
      this.eventsSubject.next({ type: 'event_rejected', eventId, reason: validation.reason });
      return { kind: 'invalid_event', eventId, reason: validation.reason, field: validation.field };
    }

    const event = validation.event;
    return this.entityLocks.run(entityKey(event), () => this.ingestLocked(event, origin));
  }

  private async ingestLocked(event: SyncEvent, origin: IngestOrigin): Promise<IngestResult> {
    const lookup = await this.loadRecord(event.entityType, event.entityId);
    if (!lookup.ok) {
      return this.persistenceFailed(event.id, lookup.error);
    }
    const { record } = lookup;

    // Redelivery of an event we already applied
    if (record && record.event.id === event.id) {
      this.logger.debug('Ignoring redelivered event', { eventId: event.id });
      return { kind: 'applied', event: record.event, duplicate: true };
    }

    const conflict = detectConflict(event, record, (conflictType) =>
      this.resolver.selectStrategy(conflictType, event.entityType)
    );

    if (!conflict || !record) {
      const version = Math.max(record?.version ?? 0, baseVersionOf(event)) + 1;
      if (version > MAX_VERSION) return this.versionExhausted(event);
      const applied: SyncEvent = { ...event, version };

      const commit = await this.commit(applied);
      if (!commit.ok) return this.persistenceFailed(event.id, commit.error);

      await this.broadcastApplied(applied, origin.connectionId);
      return { kind: 'applied', event: applied };
    }

    this.conflictsByType[conflict.conflictType]++;
    this.logger.info('Conflict detected', {
      entityType: conflict.entityType,
      entityId: conflict.entityId,
      conflictType: conflict.conflictType,
      strategy: conflict.resolutionStrategy,
    });
    this.eventsSubject.next({ type: 'conflict_detected', conflict });

    const outcome = this.resolver.resolve(conflict);

    if (outcome.status === 'unresolved') {
      this.retainConflict(conflict);
      return { kind: 'conflict_unresolved', eventId: event.id, conflict };
    }

    const applied: SyncEvent = {
      ...outcome.event,
      version: Math.max(outcome.event.version ?? 0, record.version + 1),
    };
    if ((applied.version ?? 0) > MAX_VERSION) return this.versionExhausted(event);

    const commit = await this.commit(applied);
    if (!commit.ok) return this.persistenceFailed(event.id, commit.error);

    this.resolutionsByStrategy[outcome.strategy]++;
    this.eventsSubject.next({ type: 'conflict_resolved', conflict, event: applied });

    // The origin's optimistic state is superseded, so it receives the result too
    await this.broadcastApplied(applied);
    await this.broadcastConflictNotice(conflict, outcome.strategy, applied);

    return { kind: 'applied', event: applied, conflict };
  }

  /**
   * Apply an externally adjudicated outcome for a retained conflict
   */
  async resolveManualConflict(
    conflictId: string,
    choice: ManualResolutionChoice
  ): Promise<ManualResolutionResult> {
    const conflict = this.unresolved.get(conflictId);
    if (!conflict) {
      return { kind: 'not_found', conflictId };
    }

    return this.entityLocks.run(entityKey(conflict), async (): Promise<ManualResolutionResult> => {
      // Another adjudication may have won the race for the lock
      if (!this.unresolved.has(conflictId)) {
        return { kind: 'not_found', conflictId };
      }

      const lookup = await this.loadRecord(conflict.entityType, conflict.entityId);
      if (!lookup.ok) {
        this.persistenceFailures++;
        return { kind: 'persistence_error', conflictId, error: lookup.error };
      }

      const resolved = resolveManually(conflict, choice);
      const applied: SyncEvent = {
        ...resolved,
        version: Math.max(resolved.version ?? 0, (lookup.record?.version ?? 0) + 1),
      };
      if ((applied.version ?? 0) > MAX_VERSION) {
        return { kind: 'persistence_error', conflictId, error: versionLimitMessage(conflict) };
      }

      const commit = await this.commit(applied);
      if (!commit.ok) {
        this.persistenceFailed(applied.id, commit.error);
        return { kind: 'persistence_error', conflictId, error: commit.error };
      }

      this.unresolved.delete(conflictId);
      this.resolutionsByStrategy.manual++;
      this.logger.info('Conflict resolved manually', { conflictId, choice });
      this.eventsSubject.next({ type: 'conflict_resolved', conflict, event: applied });

      await this.broadcastApplied(applied);
      await this.broadcastConflictNotice(conflict, 'manual', applied);

      return { kind: 'applied', event: applied, conflict };
    });
  }

  /**
   * Conflicts waiting for an external decision, oldest first
   */
  getUnresolvedConflicts(): ConflictInfo[] {
    return Array.from(this.unresolved.values());
  }

  /**
   * Last applied state for an entity, if tracked
   */
  getEntityRecord(entityType: EntityType, entityId: string): EntityVersionRecord | undefined {
    return this.versions.get(entityKey({ entityType, entityId }));
  }

  /**
   * Snapshot of counters. Observability only.
   */
  getStats(): SyncStats {
    return {
      eventsByAction: { ...this.eventsByAction },
      eventsByEntityType: { ...this.eventsByEntityType },
      conflictsByType: { ...this.conflictsByType },
      resolutionsByStrategy: { ...this.resolutionsByStrategy },
      rejectedEvents: this.rejectedEvents,
      persistenceFailures: this.persistenceFailures,
      unresolvedConflicts: this.unresolved.size,
      trackedEntities: this.versions.size,
    };
  }

  dispose(): void {
    this.eventsSubject.complete();
  }

  // -----------------------------------------------------------------------
  // Private helpers
  // -----------------------------------------------------------------------

  private async loadRecord(entityType: EntityType, entityId: string): Promise<RecordLookup> {
    const key = entityKey({ entityType, entityId });
    const cached = this.versions.get(key);
    if (cached) return { ok: true, record: cached };

    try {
      const record = await this.persistence.getLastVersion(entityType, entityId);
      if (record) this.versions.set(key, record);
      return { ok: true, record };
    } catch (error) {
      const err = toError(error);
      this.logger.error('Failed to load entity version', err, { entityType, entityId });
      return { ok: false, error: err.message };
    }
  }

  /**
   * Write through persistence, then advance the version table. Nothing
   * changes when the write fails.
   */
  private async commit(event: SyncEvent): Promise<CommitResult> {
    let result: CommitResult;
    try {
      result = await this.persistence.apply(event);
    } catch (error) {
      result = { ok: false, error: toError(error).message };
    }
    if (!result.ok) return result;

    const version = event.version ?? 0;
    this.versions.set(entityKey(event), { version, event, baseVersion: version - 1 });
    this.eventsByAction[event.action]++;
    this.eventsByEntityType[event.entityType]++;

    this.logger.debug('Applied sync event', {
      eventId: event.id,
      entityType: event.entityType,
      entityId: event.entityId,
      action: event.action,
      version,
    });

    return { ok: true };
  }

  private versionExhausted(event: SyncEvent): IngestResult {
    const reason = versionLimitMessage(event);
    this.rejectedEvents++;
    this.logger.warn('Rejected sync event', { eventId: event.id, field: 'version', reason });
    this.eventsSubject.next({ type: 'event_rejected', eventId: event.id, reason });
    return { kind: 'invalid_event', eventId: event.id, reason, field: 'version' };
  }

  private persistenceFailed(eventId: string, error: string): IngestResult {
    this.persistenceFailures++;
    this.logger.warn('Persistence rejected sync event', { eventId, error });
    this.eventsSubject.next({ type: 'persistence_failed', eventId, error });
    return { kind: 'persistence_error', eventId, error };
  }

  private retainConflict(conflict: ConflictInfo): void {
    this.unresolved.set(conflict.id, conflict);
    this.logger.info('Conflict retained for manual resolution', {
      conflictId: conflict.id,
      entityType: conflict.entityType,
      entityId: conflict.entityId,
    });
    this.eventsSubject.next({ type: 'conflict_unresolved', conflict });

    while (this.unresolved.size > this.config.maxUnresolvedConflicts) {
      const oldest = this.unresolved.values().next();
      if (oldest.done) break;

      this.unresolved.delete(oldest.value.id);
      this.logger.warn('Evicted unresolved conflict over capacity', {
        conflictId: oldest.value.id,
        entityType: oldest.value.entityType,
        entityId: oldest.value.entityId,
        capacity: this.config.maxUnresolvedConflicts,
      });
      this.eventsSubject.next({ type: 'conflict_evicted', conflict: oldest.value });
    }
  }

  private async broadcastApplied(event: SyncEvent, originConnectionId?: string): Promise<void> {
    this.eventsSubject.next({ type: 'event_applied', event, connectionId: originConnectionId });

    try {
      await this.transport.broadcast(
        { type: 'sync_applied', id: generateId('msg'), event, timestamp: Date.now() },
        { exclude: originConnectionId, entityType: event.entityType }
      );
    } catch (error) {
      // Already committed; delivery problems never fail the ingest
      this.logger.error('Broadcast of applied event failed', toError(error), { eventId: event.id });
    }
  }

  private async broadcastConflictNotice(
    conflict: ConflictInfo,
    strategy: ResolutionStrategy,
    resolved: SyncEvent
  ): Promise<void> {
    try {
      await this.transport.broadcast(
        {
          type: 'conflict_notice',
          id: generateId('msg'),
          entityType: conflict.entityType,
          entityId: conflict.entityId,
          conflictType: conflict.conflictType,
          resolutionStrategy: strategy,
          resolvedEventId: resolved.id,
          timestamp: Date.now(),
        },
        { entityType: conflict.entityType }
      );
    } catch (error) {
      this.logger.error('Broadcast of conflict notice failed', toError(error), {
        conflictId: conflict.id,
      });
    }
  }
}

function versionLimitMessage(target: Pick<SyncEvent, 'entityType' | 'entityId'>): string {
  return `Entity ${entityKey(target)} has reached the highest version`;
}

/**
 * Create a sync manager
 */
export function createSyncManager(options: SyncManagerOptions): SyncManager {
  return new SyncManager(options);
}
