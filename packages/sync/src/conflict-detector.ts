import { baseVersionOf, generateId } from './event.js';
import type {
  ConflictInfo,
  ConflictType,
  EntityVersionRecord,
  ResolutionStrategy,
  SyncEvent,
} from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep equality check for event field values
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  if (typeof a !== typeof b) return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, index) => deepEqual(item, b[index]));
  }

  if (isRecord(a) && isRecord(b)) {
    const aKeys = Object.keys(a);
    if (aKeys.length !== Object.keys(b).length) return false;
    return aKeys.every((key) => key in b && deepEqual(a[key], b[key]));
  }

  return false;
}

/**
 * Whether two events on the same base would leave the entity in different
 * states: a different action, or any field that differs or is set on only
 * one side.
 */
export function eventsDiffer(a: SyncEvent, b: SyncEvent): boolean {
  if (a.action !== b.action) return true;

  const keys = new Set([...Object.keys(a.data), ...Object.keys(b.data)]);
  for (const key of keys) {
    if (!(key in a.data) || !(key in b.data)) return true;
    if (!deepEqual(a.data[key], b.data[key])) return true;
  }

  return false;
}

/**
 * Classify an incoming event against the entity's last applied state.
 * Returns null when the event can be applied as is.
 */
export function classifyConflict(
  event: SyncEvent,
  record: EntityVersionRecord | null
): ConflictType | null {
  // First write for this entity
  if (!record) return null;

  const base = baseVersionOf(event);

  // No known prior version: applied on top of whatever is current
  if (base === 0) return null;

  // Up to date, or ahead of us (optimistic local state): version gap is benign
  if (base >= record.version) return null;

  const involvesDelete = record.event.action === 'delete' || event.action === 'delete';

  if (base === record.baseVersion) {
    if (!eventsDiffer(record.event, event)) return null;
    return involvesDelete ? 'delete_vs_update' : 'concurrent_update';
  }

  // A delete on either side takes precedence however far behind the event is
  if (involvesDelete && eventsDiffer(record.event, event)) return 'delete_vs_update';

  return 'stale_version';
}

/**
 * Picks the strategy for a conflict
 */
export type StrategySelector = (conflictType: ConflictType, event: SyncEvent) => ResolutionStrategy;

/**
 * Detect a conflict between an incoming event and the last applied one.
 *
 * Version relationship is authoritative; timestamps never raise a conflict
 * on their own.
 */
export function detectConflict(
  event: SyncEvent,
  record: EntityVersionRecord | null,
  selectStrategy: StrategySelector,
  now: number = Date.now()
): ConflictInfo | null {
  const conflictType = classifyConflict(event, record);
  if (!conflictType || !record) return null;

  return {
    id: generateId('conflict'),
    entityType: event.entityType,
    entityId: event.entityId,
    localEvent: record.event,
    remoteEvent: event,
    conflictType,
    resolutionStrategy: selectStrategy(conflictType, event),
    detectedAt: now,
  };
}
