/**
 * Sync event validator — the gate every client event passes before it can
 * touch shared state.
 */

import { z } from 'zod';
import { parseTimestamp } from './event.js';
import type { SyncEvent, ValidationOptions } from './types.js';
import { DEFAULT_SYNC_CONFIG, ENTITY_TYPES, MAX_VERSION, SYNC_ACTIONS } from './types.js';

export type ValidationResult =
  | { valid: true; event: SyncEvent }
  | { valid: false; reason: string; field: string };

const objectSchema = z.record(z.string(), z.unknown());
const idSchema = z.string().trim().min(1);
const entityTypeSchema = z.enum(ENTITY_TYPES);
const actionSchema = z.enum(SYNC_ACTIONS);
// One below the limit so the applied version still fits
const versionSchema = z.number().int().nonnegative().max(MAX_VERSION - 1);
const provenanceSchema = z.string().min(1);

function fail(field: string, reason: string): ValidationResult {
  return { valid: false, field, reason };
}

function describeValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return `"${value}"`;
  return typeof value;
}

/**
 * Validate a candidate event. Checks run in a fixed order and the first
 * failure is reported.
 */
export function validateSyncEvent(candidate: unknown, options: ValidationOptions = {}): ValidationResult {
  const entityIdPattern = options.entityIdPattern ?? DEFAULT_SYNC_CONFIG.entityIdPattern;
  const maxClockSkewMs = options.maxClockSkewMs ?? DEFAULT_SYNC_CONFIG.maxClockSkewMs;
  const now = options.now ?? Date.now();

  const shape = objectSchema.safeParse(candidate);
  if (!shape.success) {
    return fail('event', 'Event must be an object');
  }
  const raw = shape.data;

  const id = idSchema.safeParse(raw.id);
  if (!id.success) {
    return fail('id', 'Missing or empty "id"');
  }

  const entityType = entityTypeSchema.safeParse(raw.entityType);
  if (!entityType.success) {
    return fail(
      'entityType',
      `Unsupported entityType ${describeValue(raw.entityType)}; expected one of ${ENTITY_TYPES.join(', ')}`
    );
  }

  const entityId = z.string().safeParse(raw.entityId);
  if (!entityId.success || !entityIdPattern.test(entityId.data)) {
    return fail('entityId', `Malformed entityId ${describeValue(raw.entityId)}`);
  }

  const action = actionSchema.safeParse(raw.action);
  if (!action.success) {
    return fail(
      'action',
      `Unknown action ${describeValue(raw.action)}; expected one of ${SYNC_ACTIONS.join(', ')}`
    );
  }

  const data = objectSchema.safeParse(raw.data);
  if (!data.success) {
    return fail('data', 'Missing "data" or not an object');
  }
  if (action.data !== 'delete' && Object.keys(data.data).length === 0) {
    return fail('data', `"data" may only be empty for delete, got ${action.data}`);
  }

  const timestamp = parseTimestamp(raw.timestamp);
  if (timestamp === null) {
    return fail('timestamp', `Unparseable timestamp ${describeValue(raw.timestamp)}`);
  }
  if (timestamp > now + maxClockSkewMs) {
    return fail(
      'timestamp',
      `Timestamp is ${timestamp - now}ms in the future (allowed skew ${maxClockSkewMs}ms)`
    );
  }

  let version: number | undefined;
  if (raw.version !== undefined && raw.version !== null) {
    const parsed = versionSchema.safeParse(raw.version);
    if (!parsed.success) {
      return fail('version', '"version" must be a non-negative safe integer');
    }
    version = parsed.data;
  }

  const userId = provenanceSchema.optional().safeParse(raw.userId ?? undefined);
  if (!userId.success) {
    return fail('userId', '"userId" must be a non-empty string');
  }
  if (options.expectedUserId && userId.data && userId.data !== options.expectedUserId) {
    return fail('userId', 'Event userId does not match the connection user');
  }

  const deviceId = provenanceSchema.optional().safeParse(raw.deviceId ?? undefined);
  if (!deviceId.success) {
    return fail('deviceId', '"deviceId" must be a non-empty string');
  }

  const event: SyncEvent = {
    id: id.data,
    entityType: entityType.data,
    entityId: entityId.data,
    action: action.data,
    data: { ...data.data },
    timestamp,
  };
  if (userId.data !== undefined) event.userId = userId.data;
  if (deviceId.data !== undefined) event.deviceId = deviceId.data;
  if (version !== undefined) event.version = version;

  return { valid: true, event };
}
