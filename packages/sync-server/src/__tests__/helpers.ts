import type { SyncEvent } from '@companion/sync';
import { vi, type Mock } from 'vitest';
import type { ClientConnection, ServerMessage } from '../types.js';

export interface MockConnection extends ClientConnection {
  messages: ServerMessage[];
  close: Mock<(code?: number, reason?: string) => void>;
  /** Make every later send reject */
  fail(error?: Error): void;
}

export function mockConnection(id: string): MockConnection {
  const messages: ServerMessage[] = [];
  let failure: Error | null = null;

  return {
    id,
    messages,
    send: (message: ServerMessage) => {
      if (failure) return Promise.reject(failure);
      messages.push(message);
      return Promise.resolve();
    },
    close: vi.fn<(code?: number, reason?: string) => void>(),
    fail(error = new Error('socket closed')) {
      failure = error;
    },
  };
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function appliedMessage(id: string, overrides: Partial<SyncEvent> = {}): ServerMessage {
  return {
    type: 'sync_applied',
    id,
    event: {
      id: `evt-${id}`,
      entityType: 'memory',
      entityId: 'memory-2',
      action: 'update',
      data: { text: id },
      timestamp: 1000,
      version: 1,
      ...overrides,
    },
    timestamp: 1000,
  };
}

/** Message types a connection received, in order */
export function typesOf(connection: MockConnection): string[] {
  return connection.messages.map((message) => message.type);
}
