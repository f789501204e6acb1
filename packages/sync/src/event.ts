/**
 * Sync event construction and wire helpers
 */

import { randomUUID } from 'node:crypto';
import type { EntityType, SyncAction, SyncEvent, SyncEventData } from './types.js';

/**
 * Generate a unique ID
 */
export function generateId(prefix?: string): string {
  const id = randomUUID();
  return prefix ? `${prefix}_${id}` : id;
}

/**
 * Input for {@link createSyncEvent}
 */
export interface CreateSyncEventInput {
  entityType: EntityType;
  entityId: string;
  action: SyncAction;
  data?: SyncEventData;
  id?: string;
  timestamp?: number;
  userId?: string;
  deviceId?: string;
  version?: number;
}

/**
 * Build an event, filling in an ID and the current time when missing.
 *
 * @example
 * ```typescript
 * const event = createSyncEvent({
 *   entityType: 'task',
 *   entityId: 'task-1',
 *   action: 'update',
 *   data: { status: 'done' },
 *   version: 3,
 * });
 * ```
 */
export function createSyncEvent(input: CreateSyncEventInput): SyncEvent {
  const event: SyncEvent = {
    id: input.id ?? generateId('evt'),
    entityType: input.entityType,
    entityId: input.entityId,
    action: input.action,
    data: { ...(input.data ?? {}) },
    timestamp: input.timestamp ?? Date.now(),
  };

  if (input.userId !== undefined) event.userId = input.userId;
  if (input.deviceId !== undefined) event.deviceId = input.deviceId;
  if (input.version !== undefined) event.version = input.version;

  return event;
}

/** Largest offset from the epoch a `Date` can represent (ms) */
export const MAX_TIMESTAMP_MS = 8.64e15;

/**
 * Parse a wire timestamp (epoch ms or ISO-8601 string). Numbers outside
 * the `Date` range are rejected.
 */
export function parseTimestamp(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && Math.abs(value) <= MAX_TIMESTAMP_MS ? value : null;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? null : parsed;
  }
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) ? null : time;
  }
  return null;
}

/**
 * Wire representation of an event, as sent to clients
 */
export interface WireSyncEvent {
  id: string;
  entityType: EntityType;
  entityId: string;
  action: SyncAction;
  data: SyncEventData;
  timestamp: string;
  userId: string | null;
  deviceId: string | null;
  version: number;
}

/**
 * Serialize an event for clients; timestamps go out as ISO strings
 */
export function toWireEvent(event: SyncEvent): WireSyncEvent {
  return {
    id: event.id,
    entityType: event.entityType,
    entityId: event.entityId,
    action: event.action,
    data: event.data,
    timestamp: new Date(event.timestamp).toISOString(),
    userId: event.userId ?? null,
    deviceId: event.deviceId ?? null,
    version: event.version ?? 0,
  };
}

/**
 * Key of the entity an event targets
 */
export function entityKey(event: Pick<SyncEvent, 'entityType' | 'entityId'>): string {
  return `${event.entityType}:${event.entityId}`;
}

/**
 * Base version an incoming event claims (0 when it carries none)
 */
export function baseVersionOf(event: SyncEvent): number {
  return event.version ?? 0;
}
