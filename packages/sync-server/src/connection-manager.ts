/**
 * Connection Manager - tracks live client connections per user, fans out
 * applied events and buffers them for users with no live connection.
 */

import {
  ENTITY_TYPES,
  KeyedMutex,
  SyncError,
  createLogger,
  type BroadcastOptions,
  type EntityType,
  type Logger,
  type SyncTransport,
} from '@companion/sync';
import { Subject, type Observable } from 'rxjs';
import { OfflineQueue } from './offline-queue.js';
import type {
  ClientConnection,
  ConnectionRecord,
  RegisterOptions,
  ServerMessage,
  TransportConfig,
  TransportEvent,
  TransportStats,
} from './types.js';
import { DEFAULT_TRANSPORT_CONFIG } from './types.js';

/**
 * Internal connection state
 */
interface ManagedConnection {
  connection: ClientConnection;
  connectionId: string;
  userId: string;
  deviceId?: string;
  connectedAt: number;
  lastSeen: number;
  interests: Set<EntityType>;
  ready: boolean;
  /** Messages that arrived while the offline queue was replaying */
  backlog: ServerMessage[];
}

export interface DrainOptions {
  /** Discard messages enqueued at or before this time (ms) */
  since?: number;
}

/**
 * Implements the sync transport on top of abstract client connections.
 *
 * Sends to one connection are serialized, so each connection observes
 * messages in the order they were handed over. Enqueue and drain of a
 * user's offline queue are serialized per user.
 */
export class ConnectionManager implements SyncTransport {
  private readonly config: Required<Omit<TransportConfig, 'logger'>>;
  private readonly logger: Logger;

  private readonly connections = new Map<string, ManagedConnection>();
  private readonly userConnections = new Map<string, Set<string>>();
  /** Interests of every user seen so far, kept after they disconnect */
  private readonly knownUsers = new Map<string, Set<EntityType>>();
  private readonly offlineQueue: OfflineQueue;

  private readonly userLocks = new KeyedMutex();
  private readonly sendLocks = new KeyedMutex();

  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private transportErrors = 0;

  private readonly eventsSubject = new Subject<TransportEvent>();

  /** Observable of transport events */
  readonly events$: Observable<TransportEvent>;

  constructor(config: TransportConfig = {}) {
    this.config = {
      offlineQueueLimit: config.offlineQueueLimit ?? DEFAULT_TRANSPORT_CONFIG.offlineQueueLimit,
      clientTimeout: config.clientTimeout ?? DEFAULT_TRANSPORT_CONFIG.clientTimeout,
      sweepInterval: config.sweepInterval ?? DEFAULT_TRANSPORT_CONFIG.sweepInterval,
    };
    this.logger =
      config.logger?.child('ConnectionManager') ?? createLogger({ context: 'ConnectionManager' });
    this.offlineQueue = new OfflineQueue({ limit: this.config.offlineQueueLimit });
    this.events$ = this.eventsSubject.asObservable();
  }

  /**
   * Start sweeping idle connections
   */
  start(): void {
    if (this.sweepTimer) return;

    this.sweepTimer = setInterval(() => {
      this.sweepIdle();
    }, this.config.sweepInterval);
    this.sweepTimer.unref();
  }

  /**
   * Stop sweeping
   */
  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /**
   * Register a connection and replay the user's offline queue to it.
   *
   * The record is visible immediately but only starts receiving broadcasts
   * once the replay finished; messages broadcast meanwhile are delivered
   * after the replayed ones.
   */
  async register(connection: ClientConnection, options: RegisterOptions): Promise<ConnectionRecord> {
    const now = Date.now();
    const interests = new Set<EntityType>(options.entityTypes ?? ENTITY_TYPES);

    const managed: ManagedConnection = {
      connection,
      connectionId: connection.id,
      userId: options.userId,
      deviceId: options.deviceId,
      connectedAt: now,
      lastSeen: now,
      interests,
      ready: false,
      backlog: [],
    };

    this.connections.set(connection.id, managed);
    let userSet = this.userConnections.get(options.userId);
    if (!userSet) {
      userSet = new Set();
      this.userConnections.set(options.userId, userSet);
    }
    userSet.add(connection.id);
    this.knownUsers.set(options.userId, new Set(interests));

    const replayed = await this.userLocks.run(options.userId, async () => {
      const queued = this.offlineQueue.drain(options.userId, options.lastSyncAt);
      for (const message of queued) {
        await this.send(managed, message);
      }

      // Drain the backlog until nothing new arrived during the last send
      while (managed.backlog.length > 0) {
        const message = managed.backlog.shift();
        if (message) await this.send(managed, message);
      }
      managed.ready = true;

      return queued.length;
    });

    this.logger.info('Client connected', {
      connectionId: connection.id,
      userId: options.userId,
      deviceId: options.deviceId,
      replayed,
    });
    this.eventsSubject.next({
      type: 'client_connected',
      connectionId: connection.id,
      userId: options.userId,
      replayed,
    });

    return toRecord(managed);
  }

  /**
   * Remove a connection. Returns false when it was not registered.
   */
  unregister(connectionId: string, reason = 'closed'): boolean {
    const managed = this.connections.get(connectionId);
    if (!managed) return false;

    this.connections.delete(connectionId);
    const userSet = this.userConnections.get(managed.userId);
    if (userSet) {
      userSet.delete(connectionId);
      if (userSet.size === 0) {
        this.userConnections.delete(managed.userId);
      }
    }

    this.logger.info('Client disconnected', { connectionId, userId: managed.userId, reason });
    this.eventsSubject.next({
      type: 'client_disconnected',
      connectionId,
      userId: managed.userId,
      reason,
    });

    return true;
  }

  /**
   * Deliver a message to every interested live connection except `exclude`,
   * and queue it for known users with no live connection.
   */
  async broadcast(message: ServerMessage, options: BroadcastOptions = {}): Promise<void> {
    const deliveries: Promise<void>[] = [];

    for (const managed of this.connections.values()) {
      if (managed.connectionId === options.exclude) continue;
      if (options.entityType && !managed.interests.has(options.entityType)) continue;
      deliveries.push(this.deliver(managed, message));
    }

    for (const [userId, interests] of this.knownUsers) {
      if (this.userConnections.has(userId)) continue;
      if (options.entityType && !interests.has(options.entityType)) continue;
      deliveries.push(this.enqueueOffline(userId, message));
    }

    await Promise.all(deliveries);
  }

  /**
   * Deliver a message to all of a user's connections. With none live, the
   * message is queued instead. Returns the number of connections reached.
   */
  async sendToUser(userId: string, message: ServerMessage): Promise<number> {
    const ids = this.userConnections.get(userId);
    if (!ids || ids.size === 0) {
      await this.enqueueOffline(userId, message);
      return 0;
    }

    const targets: ManagedConnection[] = [];
    for (const id of ids) {
      const managed = this.connections.get(id);
      if (managed) targets.push(managed);
    }

    await Promise.all(targets.map((managed) => this.deliver(managed, message)));
    return targets.length;
  }

  /**
   * Send a direct reply to one connection, whether or not its replay has
   * finished. Returns false when the connection is unknown.
   */
  async sendToConnection(connectionId: string, message: ServerMessage): Promise<boolean> {
    const managed = this.connections.get(connectionId);
    if (!managed) return false;

    await this.send(managed, message);
    return this.connections.has(connectionId);
  }

  /**
   * Remove and return the queued messages of a user
   */
  async drainOfflineQueue(userId: string, options: DrainOptions = {}): Promise<ServerMessage[]> {
    return this.userLocks.run(userId, async () => this.offlineQueue.drain(userId, options.since));
  }

  /**
   * Record activity on a connection
   */
  touch(connectionId: string, now: number = Date.now()): void {
    const managed = this.connections.get(connectionId);
    if (managed) managed.lastSeen = now;
  }

  /**
   * Add or remove entity-type interests for a connection. Returns the
   * resulting interests, or null for an unknown connection.
   */
  updateInterests(
    connectionId: string,
    entityTypes: readonly EntityType[],
    mode: 'add' | 'remove'
  ): EntityType[] | null {
    const managed = this.connections.get(connectionId);
    if (!managed) return null;

    for (const entityType of entityTypes) {
      if (mode === 'add') managed.interests.add(entityType);
      else managed.interests.delete(entityType);
    }
    this.knownUsers.set(managed.userId, new Set(managed.interests));

    return Array.from(managed.interests);
  }

  /**
   * Close and drop connections idle for longer than the client timeout
   */
  sweepIdle(now: number = Date.now()): string[] {
    const expired: string[] = [];

    for (const managed of this.connections.values()) {
      if (now - managed.lastSeen > this.config.clientTimeout) {
        expired.push(managed.connectionId);
      }
    }

    for (const connectionId of expired) {
      const managed = this.connections.get(connectionId);
      if (!managed) continue;

      this.logger.info('Dropping idle connection', {
        connectionId,
        userId: managed.userId,
        idleMs: now - managed.lastSeen,
      });
      this.closeQuietly(managed, 4006, 'Idle timeout');
      this.unregister(connectionId, 'idle_timeout');
    }

    return expired;
  }

  /**
   * Close every live connection
   */
  closeAll(code = 1001, reason = 'Server shutting down'): void {
    for (const managed of Array.from(this.connections.values())) {
      this.closeQuietly(managed, code, reason);
      this.unregister(managed.connectionId, 'server_shutdown');
    }
  }

  getConnection(connectionId: string): ConnectionRecord | undefined {
    const managed = this.connections.get(connectionId);
    return managed ? toRecord(managed) : undefined;
  }

  getConnections(): ConnectionRecord[] {
    return Array.from(this.connections.values(), toRecord);
  }

  getUserConnections(userId: string): ConnectionRecord[] {
    const ids = this.userConnections.get(userId);
    if (!ids) return [];

    const records: ConnectionRecord[] = [];
    for (const id of ids) {
      const managed = this.connections.get(id);
      if (managed) records.push(toRecord(managed));
    }
    return records;
  }

  /** Messages currently queued for a user */
  getQueuedCount(userId: string): number {
    return this.offlineQueue.size(userId);
  }

  getStats(): TransportStats {
    return {
      connections: this.connections.size,
      connectedUsers: this.userConnections.size,
      knownUsers: this.knownUsers.size,
      queuedMessages: this.offlineQueue.totalSize(),
      droppedMessages: this.offlineQueue.droppedCount(),
      transportErrors: this.transportErrors,
    };
  }

  dispose(): void {
    this.stop();
    this.closeAll();
    this.offlineQueue.clear();
    this.eventsSubject.complete();
  }

  // -----------------------------------------------------------------------
  // Private helpers
  // -----------------------------------------------------------------------

  private deliver(managed: ManagedConnection, message: ServerMessage): Promise<void> {
    if (!managed.ready) {
      managed.backlog.push(message);
      return Promise.resolve();
    }
    return this.send(managed, message);
  }

  /**
   * Queue a send behind earlier sends to the same connection. The lock is
   * taken synchronously, so call order is delivery order.
   */
  private send(managed: ManagedConnection, message: ServerMessage): Promise<void> {
    return this.sendLocks.run(managed.connectionId, async () => {
      // Dropped while waiting for the lock
      if (!this.connections.has(managed.connectionId)) return;

      try {
        await managed.connection.send(message);
        managed.lastSeen = Date.now();
      } catch (error) {
        this.handleSendFailure(managed, error);
      }
    });
  }

  private handleSendFailure(managed: ManagedConnection, error: unknown): void {
    const err = SyncError.isCode(error, 'TRANSPORT_ERROR')
      ? error
      : SyncError.wrap(error, 'TRANSPORT_ERROR', {
          connectionId: managed.connectionId,
          userId: managed.userId,
        });
    this.transportErrors++;
    this.logger.warn('Send failed, dropping connection', {
      connectionId: managed.connectionId,
      userId: managed.userId,
      error: err.message,
    });
    this.eventsSubject.next({
      type: 'transport_error',
      connectionId: managed.connectionId,
      userId: managed.userId,
      error: err,
    });

    this.closeQuietly(managed, 1011, 'Send failed');
    this.unregister(managed.connectionId, 'send_failed');
  }

  private enqueueOffline(userId: string, message: ServerMessage): Promise<void> {
    return this.userLocks.run(userId, async () => {
      // The user may have come back while waiting for the lock
      const ids = this.userConnections.get(userId);
      if (ids && ids.size > 0) {
        const targets: Promise<void>[] = [];
        for (const id of ids) {
          const managed = this.connections.get(id);
          if (managed) targets.push(this.deliver(managed, message));
        }
        await Promise.all(targets);
        return;
      }

      const { dropped } = this.offlineQueue.enqueue(userId, message);
      this.eventsSubject.next({ type: 'offline_enqueued', userId, messageType: message.type });

      if (dropped > 0) {
        this.logger.warn('Offline queue over capacity, dropped oldest messages', {
          userId,
          dropped,
          capacity: this.config.offlineQueueLimit,
        });
        this.eventsSubject.next({ type: 'offline_dropped', userId, dropped });
      }
    });
  }

  private closeQuietly(managed: ManagedConnection, code: number, reason: string): void {
    try {
      managed.connection.close(code, reason);
    } catch (error) {
      this.logger.debug('Error closing connection', {
        connectionId: managed.connectionId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

function toRecord(managed: ManagedConnection): ConnectionRecord {
  return {
    connectionId: managed.connectionId,
    userId: managed.userId,
    deviceId: managed.deviceId,
    connectedAt: managed.connectedAt,
    lastSeen: managed.lastSeen,
    interests: new Set(managed.interests),
    ready: managed.ready,
  };
}

/**
 * Create a connection manager
 */
export function createConnectionManager(config?: TransportConfig): ConnectionManager {
  return new ConnectionManager(config);
}
