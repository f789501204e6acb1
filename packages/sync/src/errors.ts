/**
 * SyncError - structured error for the sync core
 */

/**
 * Error codes. The first four are the sync error taxonomy; the rest are
 * raised by the gateway and manual conflict adjudication.
 */
export type SyncErrorCode =
  | 'INVALID_EVENT'
  | 'PERSISTENCE_ERROR'
  | 'CONFLICT_UNRESOLVED'
  | 'TRANSPORT_ERROR'
  | 'INVALID_MESSAGE'
  | 'NOT_CONNECTED'
  | 'CONFLICT_NOT_FOUND';

const DEFAULT_MESSAGES: Record<SyncErrorCode, string> = {
  INVALID_EVENT: 'Sync event failed validation',
  PERSISTENCE_ERROR: 'Failed to apply sync event to storage',
  CONFLICT_UNRESOLVED: 'Conflict requires manual resolution',
  TRANSPORT_ERROR: 'Failed to deliver message to connection',
  INVALID_MESSAGE: 'Invalid message format',
  NOT_CONNECTED: 'Connection has not completed the connect handshake',
  CONFLICT_NOT_FOUND: 'Conflict not found',
};

/**
 * Whether the caller may retry the same operation
 */
const RETRYABLE: ReadonlySet<SyncErrorCode> = new Set(['PERSISTENCE_ERROR', 'TRANSPORT_ERROR']);

export interface SyncErrorOptions {
  code: SyncErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error */
  cause?: Error;
}

/**
 * Serialized form, used as the payload of `sync_error` messages
 */
export interface SerializedSyncError {
  code: SyncErrorCode;
  message: string;
  retryable: boolean;
  context: Record<string, unknown>;
}

/**
 * @example
 * ```typescript
 * throw new SyncError({
 *   code: 'TRANSPORT_ERROR',
 *   context: { connectionId: 'conn-1' },
 *   cause: err,
 * });
 * ```
 */
export class SyncError extends Error {
  readonly code: SyncErrorCode;
  readonly context: Record<string, unknown>;
  readonly retryable: boolean;
  override readonly cause?: Error;

  constructor(options: SyncErrorOptions) {
    super(options.message ?? DEFAULT_MESSAGES[options.code], { cause: options.cause });

    this.name = 'SyncError';
    this.code = options.code;
    this.context = options.context ?? {};
    this.retryable = RETRYABLE.has(options.code);
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SyncError);
    }
  }

  static fromCode(code: SyncErrorCode, context?: Record<string, unknown>): SyncError {
    return new SyncError({ code, context });
  }

  /**
   * Wrap an unknown thrown value
   */
  static wrap(error: unknown, code: SyncErrorCode, context?: Record<string, unknown>): SyncError {
    const cause = toError(error);
    return new SyncError({ code, message: cause.message, context, cause });
  }

  static isSyncError(error: unknown): error is SyncError {
    return error instanceof SyncError;
  }

  static isCode(error: unknown, code: SyncErrorCode): error is SyncError {
    return SyncError.isSyncError(error) && error.code === code;
  }

  toJSON(): SerializedSyncError {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
    };
  }
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) return error;
  return new Error(String(error));
}
