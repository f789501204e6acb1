/**
 * Conflict resolver. Resolution is pure: the same conflict always yields
 * the same outcome, which keeps offline-queue redelivery idempotent.
 */

import { createHash } from 'node:crypto';
import { baseVersionOf } from './event.js';
import type {
  ConflictInfo,
  ConflictType,
  EntityType,
  ManualResolutionChoice,
  ResolutionOutcome,
  ResolutionStrategy,
  SyncAction,
  SyncConfig,
  SyncEvent,
  SyncEventData,
} from './types.js';
import { DEFAULT_SYNC_CONFIG } from './types.js';

type AutomaticStrategy = Exclude<ResolutionStrategy, 'manual'>;

/**
 * Order two events by recency: later timestamp first, then the lexically
 * greater ID. Positive when `a` is more recent.
 */
export function compareRecency(a: SyncEvent, b: SyncEvent): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
  if (a.id === b.id) return 0;
  return a.id > b.id ? 1 : -1;
}

function resolvedEventId(strategy: string, local: SyncEvent, remote: SyncEvent): string {
  const digest = createHash('sha256')
    .update(`${strategy}|${local.id}|${remote.id}`)
    .digest('hex')
    .slice(0, 24);
  return `res_${digest}`;
}

function buildResolvedEvent(
  conflict: ConflictInfo,
  strategy: string,
  action: SyncAction,
  data: SyncEventData
): SyncEvent {
  const { localEvent: local, remoteEvent: remote } = conflict;

  const event: SyncEvent = {
    id: resolvedEventId(strategy, local, remote),
    entityType: conflict.entityType,
    entityId: conflict.entityId,
    action,
    data,
    timestamp: Math.max(local.timestamp, remote.timestamp),
    version: Math.max(baseVersionOf(local), baseVersionOf(remote)) + 1,
  };

  const userId = remote.userId ?? local.userId;
  const deviceId = remote.deviceId ?? local.deviceId;
  if (userId !== undefined) event.userId = userId;
  if (deviceId !== undefined) event.deviceId = deviceId;

  return event;
}

/**
 * Union of both events' data; overlapping fields take the more recent
 * event's value.
 */
function mergeData(local: SyncEvent, remote: SyncEvent): SyncEventData {
  const [older, newer] = compareRecency(remote, local) > 0 ? [local, remote] : [remote, local];
  return { ...older.data, ...newer.data };
}

function resolveLastWriteWins(conflict: ConflictInfo): SyncEvent {
  const { localEvent: local, remoteEvent: remote } = conflict;
  const winner = compareRecency(remote, local) > 0 ? remote : local;

  const data = winner.action === 'delete' ? {} : mergeData(local, remote);
  return buildResolvedEvent(conflict, 'last_write_wins', winner.action, data);
}

function resolveFieldMerge(conflict: ConflictInfo): SyncEvent {
  const { localEvent: local, remoteEvent: remote } = conflict;
  const action: SyncAction = local.action === remote.action ? local.action : 'update';
  return buildResolvedEvent(conflict, 'field_merge', action, mergeData(local, remote));
}

function resolveDeleteWins(conflict: ConflictInfo): SyncEvent {
  return buildResolvedEvent(conflict, 'delete_wins', 'delete', {});
}

function involvesDelete(conflict: ConflictInfo): boolean {
  return conflict.localEvent.action === 'delete' || conflict.remoteEvent.action === 'delete';
}

/**
 * The strategy that actually applies to a conflict. A field merge cannot
 * partially update a deleted record, and delete-wins needs a delete.
 */
function effectiveStrategy(conflict: ConflictInfo): ResolutionStrategy {
  const strategy = conflict.resolutionStrategy;
  if (strategy === 'manual') return strategy;
  if (conflict.conflictType === 'delete_vs_update') return 'delete_wins';
  if (strategy === 'field_merge' && involvesDelete(conflict)) return 'delete_wins';
  if (strategy === 'delete_wins' && !involvesDelete(conflict)) return 'field_merge';
  return strategy;
}

/**
 * Resolve a conflict. Never throws; `manual` conflicts come back unresolved.
 */
export function resolveConflict(conflict: ConflictInfo): ResolutionOutcome {
  const strategy = effectiveStrategy(conflict);

  switch (strategy) {
    case 'manual':
      return { status: 'unresolved', conflict };
    case 'last_write_wins':
      return { status: 'resolved', strategy, event: resolveLastWriteWins(conflict) };
    case 'field_merge':
      return { status: 'resolved', strategy, event: resolveFieldMerge(conflict) };
    case 'delete_wins':
      return { status: 'resolved', strategy, event: resolveDeleteWins(conflict) };
  }
}

/**
 * Build the event for an externally adjudicated conflict
 */
export function resolveManually(conflict: ConflictInfo, choice: ManualResolutionChoice): SyncEvent {
  const { localEvent: local, remoteEvent: remote } = conflict;

  switch (choice) {
    case 'use_local':
      return buildResolvedEvent(conflict, choice, local.action, { ...local.data });
    case 'use_remote':
      return buildResolvedEvent(conflict, choice, remote.action, { ...remote.data });
    case 'merge':
      return involvesDelete(conflict) ? resolveDeleteWins(conflict) : resolveFieldMerge(conflict);
  }
}

/**
 * Conflict resolver bound to a strategy configuration
 */
export class ConflictResolver {
  private readonly strategies: Partial<Record<EntityType, ResolutionStrategy>>;
  private readonly defaultStrategy: AutomaticStrategy;

  constructor(config: Pick<SyncConfig, 'conflictStrategies' | 'defaultStrategy'> = {}) {
    this.strategies = config.conflictStrategies ?? DEFAULT_SYNC_CONFIG.conflictStrategies;
    this.defaultStrategy = config.defaultStrategy ?? DEFAULT_SYNC_CONFIG.defaultStrategy;
  }

  /**
   * Pick a strategy for a conflict on an entity type.
   *
   * Manual entity types stay manual; deletes always win over updates;
   * otherwise a configured strategy applies, falling back to field merge
   * for concurrent updates and the default strategy for stale versions.
   */
  selectStrategy(conflictType: ConflictType, entityType: EntityType): ResolutionStrategy {
    const configured = this.strategies[entityType];

    if (configured === 'manual') return 'manual';
    if (conflictType === 'delete_vs_update') return 'delete_wins';
    if (configured && configured !== 'delete_wins') return configured;

    return conflictType === 'concurrent_update' ? 'field_merge' : this.defaultStrategy;
  }

  resolve(conflict: ConflictInfo): ResolutionOutcome {
    return resolveConflict(conflict);
  }
}
