import { describe, expect, it } from 'vitest';
import { SyncError, toError } from './errors.js';

describe('SyncError', () => {
  it('should use the default message and retry policy for a code', () => {
    const error = SyncError.fromCode('PERSISTENCE_ERROR', { eventId: 'evt-1' });

    expect(error.message).toBe('Failed to apply sync event to storage');
    expect(error.retryable).toBe(true);
    expect(error.toJSON()).toEqual({
      code: 'PERSISTENCE_ERROR',
      message: 'Failed to apply sync event to storage',
      retryable: true,
      context: { eventId: 'evt-1' },
    });
  });

  it('should wrap a thrown value and keep it as the cause', () => {
    const cause = new Error('EPIPE');
    const error = SyncError.wrap(cause, 'TRANSPORT_ERROR', { connectionId: 'conn-1' });

    expect(error.message).toBe('EPIPE');
    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({ connectionId: 'conn-1' });
  });

  it('should recognize sync errors and their codes', () => {
    const error = new SyncError({ code: 'INVALID_MESSAGE' });

    expect(SyncError.isSyncError(error)).toBe(true);
    expect(SyncError.isSyncError(new Error('plain'))).toBe(false);
    expect(SyncError.isCode(error, 'INVALID_MESSAGE')).toBe(true);
    expect(SyncError.isCode(error, 'NOT_CONNECTED')).toBe(false);
    expect(SyncError.isCode('INVALID_MESSAGE', 'INVALID_MESSAGE')).toBe(false);
    expect(error.retryable).toBe(false);
  });
});

describe('toError', () => {
  it('should pass errors through and wrap anything else', () => {
    const error = new Error('boom');

    expect(toError(error)).toBe(error);
    expect(toError('boom').message).toBe('boom');
  });
});
