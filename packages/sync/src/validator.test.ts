import { describe, expect, it } from 'vitest';
import { validateSyncEvent } from './validator.js';

const NOW = Date.UTC(2024, 5, 1, 12, 0, 0);

function candidate(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'evt-1',
    entityType: 'task',
    entityId: 'task-1',
    action: 'update',
    data: { status: 'done' },
    timestamp: NOW - 1000,
    ...overrides,
  };
}

describe('validateSyncEvent', () => {
  it('should accept a well-formed event and normalize it', () => {
    const result = validateSyncEvent(candidate({ version: 3, userId: 'user-1', deviceId: 'phone' }), {
      now: NOW,
    });

    expect(result).toEqual({
      valid: true,
      event: {
        id: 'evt-1',
        entityType: 'task',
        entityId: 'task-1',
        action: 'update',
        data: { status: 'done' },
        timestamp: NOW - 1000,
        version: 3,
        userId: 'user-1',
        deviceId: 'phone',
      },
    });
  });

  it('should parse ISO-8601 timestamps', () => {
    const result = validateSyncEvent(candidate({ timestamp: '2024-06-01T11:00:00.000Z' }), { now: NOW });

    expect(result.valid && result.event.timestamp).toBe(Date.UTC(2024, 5, 1, 11, 0, 0));
  });

  it('should treat null version and provenance as absent', () => {
    const result = validateSyncEvent(candidate({ version: null, userId: null, deviceId: null }), {
      now: NOW,
    });

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.event).not.toHaveProperty('version');
      expect(result.event).not.toHaveProperty('userId');
      expect(result.event).not.toHaveProperty('deviceId');
    }
  });

  it('should allow empty data for delete', () => {
    const result = validateSyncEvent(candidate({ action: 'delete', data: {} }), { now: NOW });

    expect(result.valid).toBe(true);
  });

  describe('rejections', () => {
    const cases: Array<[string, unknown, string, string]> = [
      ['non-object', 'nope', 'event', 'Event must be an object'],
      ['array', [], 'event', 'Event must be an object'],
      ['missing id', candidate({ id: undefined }), 'id', 'Missing or empty "id"'],
      ['blank id', candidate({ id: '   ' }), 'id', 'Missing or empty "id"'],
      [
        'unknown entity type',
        candidate({ entityType: 'note' }),
        'entityType',
        'Unsupported entityType "note"; expected one of conversation, task, idea, memory',
      ],
      ['entity id with a slash', candidate({ entityId: 'task/1' }), 'entityId', 'Malformed entityId "task/1"'],
      ['numeric entity id', candidate({ entityId: 42 }), 'entityId', 'Malformed entityId number'],
      [
        'unknown action',
        candidate({ action: 'upsert' }),
        'action',
        'Unknown action "upsert"; expected one of create, update, delete',
      ],
      ['missing data', candidate({ data: undefined }), 'data', 'Missing "data" or not an object'],
      ['array data', candidate({ data: ['x'] }), 'data', 'Missing "data" or not an object'],
      ['empty update', candidate({ data: {} }), 'data', '"data" may only be empty for delete, got update'],
      ['bad timestamp', candidate({ timestamp: 'yesterday' }), 'timestamp', 'Unparseable timestamp "yesterday"'],
      ['missing timestamp', candidate({ timestamp: undefined }), 'timestamp', 'Unparseable timestamp undefined'],
      ['timestamp before the date range', candidate({ timestamp: -1e17 }), 'timestamp', 'Unparseable timestamp number'],
      ['negative version', candidate({ version: -1 }), 'version', '"version" must be a non-negative safe integer'],
      ['fractional version', candidate({ version: 1.5 }), 'version', '"version" must be a non-negative safe integer'],
      ['unsafe version', candidate({ version: 2 ** 53 }), 'version', '"version" must be a non-negative safe integer'],
      [
        'version at the limit',
        candidate({ version: Number.MAX_SAFE_INTEGER }),
        'version',
        '"version" must be a non-negative safe integer',
      ],
      ['empty user id', candidate({ userId: '' }), 'userId', '"userId" must be a non-empty string'],
      ['numeric device id', candidate({ deviceId: 7 }), 'deviceId', '"deviceId" must be a non-empty string'],
    ];

    it.each(cases)('should reject %s', (_name, input, field, reason) => {
      expect(validateSyncEvent(input, { now: NOW })).toEqual({ valid: false, field, reason });
    });

    it('should report the first failing field', () => {
      const result = validateSyncEvent(candidate({ entityType: 'note', action: 'upsert' }), { now: NOW });

      expect(result.valid === false && result.field).toBe('entityType');
    });

    it('should reject timestamps beyond the allowed skew', () => {
      const result = validateSyncEvent(candidate({ timestamp: NOW + 10_000 }), {
        now: NOW,
        maxClockSkewMs: 5_000,
      });

      expect(result).toEqual({
        valid: false,
        field: 'timestamp',
        reason: 'Timestamp is 10000ms in the future (allowed skew 5000ms)',
      });
    });

    it('should accept timestamps within the allowed skew', () => {
      const result = validateSyncEvent(candidate({ timestamp: NOW + 5_000 }), {
        now: NOW,
        maxClockSkewMs: 5_000,
      });

      expect(result.valid).toBe(true);
    });

    it('should reject a userId that differs from the connection user', () => {
      const result = validateSyncEvent(candidate({ userId: 'mallory' }), {
        now: NOW,
        expectedUserId: 'user-1',
      });

      expect(result).toEqual({
        valid: false,
        field: 'userId',
        reason: 'Event userId does not match the connection user',
      });
    });

    it('should honor a custom entity id pattern', () => {
      const result = validateSyncEvent(candidate({ entityId: 'task-1' }), {
        now: NOW,
        entityIdPattern: /^[0-9]+$/,
      });

      expect(result.valid === false && result.field).toBe('entityId');
    });
  });
});
