/**
 * WebSocket Sync Server
 */

import type { IncomingMessage } from 'http';
import {
  createLogger,
  createSyncManager,
  generateId,
  SyncError,
  toError,
  type Logger,
  type SyncManager,
  type SyncManagerEvent,
} from '@companion/sync';
import { map, merge, type Observable, type Subscription } from 'rxjs';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { ConnectionManager } from './connection-manager.js';
import { SyncGateway } from './gateway.js';
import { parseConnectMessage, serializeMessage } from './protocol.js';
import { MemoryPersistence } from './storage/memory-persistence.js';
import type { ClientConnection, SyncServerConfig, TransportEvent } from './types.js';
import { DEFAULT_SERVER_CONFIG } from './types.js';

/**
 * Events observable on a running server
 */
export type ServerEvent =
  | { source: 'sync'; event: SyncManagerEvent }
  | { source: 'transport'; event: TransportEvent };

type InternalConfig = Required<Omit<SyncServerConfig, 'sync' | 'persistence' | 'logger'>>;

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

/**
 * Sync server: accepts WebSocket clients and wires them to a sync manager
 * through the connection manager and gateway.
 */
export class SyncServer {
  private readonly config: InternalConfig;
  private readonly logger: Logger;
  private wss: WebSocketServer | null = null;
  private readonly sockets = new Map<string, WebSocket>();

  readonly manager: SyncManager;
  readonly connections: ConnectionManager;
  readonly gateway: SyncGateway;

  /** Sync and transport events */
  readonly events$: Observable<ServerEvent>;

  constructor(config: SyncServerConfig = {}) {
    this.config = {
      port: config.port ?? DEFAULT_SERVER_CONFIG.port,
      host: config.host ?? DEFAULT_SERVER_CONFIG.host,
      path: config.path ?? DEFAULT_SERVER_CONFIG.path,
      connectTimeout: config.connectTimeout ?? DEFAULT_SERVER_CONFIG.connectTimeout,
      clientTimeout: config.clientTimeout ?? DEFAULT_SERVER_CONFIG.clientTimeout,
      heartbeatInterval: config.heartbeatInterval ?? DEFAULT_SERVER_CONFIG.heartbeatInterval,
      maxMessageSize: config.maxMessageSize ?? DEFAULT_SERVER_CONFIG.maxMessageSize,
      offlineQueueLimit: config.offlineQueueLimit ?? DEFAULT_SERVER_CONFIG.offlineQueueLimit,
      logging: config.logging ?? DEFAULT_SERVER_CONFIG.logging,
    };

    const logging = this.config.logging;
    this.logger =
      config.logger ??
      createLogger({
        context: 'SyncServer',
        level: typeof logging === 'string' ? logging : 'info',
        enabled: logging !== false,
      });

    this.connections = new ConnectionManager({
      offlineQueueLimit: this.config.offlineQueueLimit,
      clientTimeout: this.config.clientTimeout,
      sweepInterval: this.config.heartbeatInterval,
      logger: this.logger,
    });

    this.manager = createSyncManager({
      persistence: config.persistence ?? new MemoryPersistence(),
      transport: this.connections,
      config: config.sync,
      logger: this.logger,
    });

    this.gateway = new SyncGateway({
      manager: this.manager,
      connections: this.connections,
      logger: this.logger,
    });

    this.events$ = merge(
      this.manager.events$.pipe(map((event): ServerEvent => ({ source: 'sync', event }))),
      this.connections.events$.pipe(map((event): ServerEvent => ({ source: 'transport', event })))
    );
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    if (this.wss) {
      throw new Error('Server already running');
    }

    const wss = new WebSocketServer({
      port: this.config.port,
      host: this.config.host,
      path: this.config.path,
      maxPayload: this.config.maxMessageSize,
    });

    wss.on('connection', (socket, request) => {
      this.handleSocket(socket, request);
    });

    wss.on('error', (error) => {
      this.logger.error('Server error', error);
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => reject(error);
      wss.once('error', onError);
      wss.once('listening', () => {
        wss.off('error', onError);
        resolve();
      });
    });

    this.wss = wss;
    this.connections.start();

    this.logger.info('Sync server started', {
      address: `${this.config.host}:${this.config.port}${this.config.path}`,
    });
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    const wss = this.wss;
    if (!wss) return;

    this.connections.stop();
    this.connections.closeAll(1001, 'Server shutting down');

    // Sockets that never completed the handshake
    for (const socket of this.sockets.values()) {
      socket.close(1001, 'Server shutting down');
    }
    this.sockets.clear();

    await new Promise<void>((resolve, reject) => {
      wss.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });

    this.wss = null;
    this.logger.info('Sync server stopped');
  }

  /**
   * Subscribe to server events
   */
  onEvent(handler: (event: ServerEvent) => void): () => void {
    const subscription: Subscription = this.events$.subscribe((event) => {
      try {
        handler(event);
      } catch (error) {
        this.logger.error('Error in event handler', toError(error));
      }
    });
    return () => subscription.unsubscribe();
  }

  /**
   * Get server info
   */
  getInfo(): {
    running: boolean;
    port: number;
    host: string;
    path: string;
    clientCount: number;
    users: string[];
  } {
    const users = new Set(this.connections.getConnections().map((record) => record.userId));

    return {
      running: this.wss !== null,
      port: this.config.port,
      host: this.config.host,
      path: this.config.path,
      clientCount: this.connections.getStats().connections,
      users: Array.from(users),
    };
  }

  /**
   * Bind a new socket: the first message must be `connect`, everything after
   * is handed to the gateway in arrival order.
   */
  private handleSocket(socket: WebSocket, request: IncomingMessage): void {
    const connectionId = generateId('conn');
    this.sockets.set(connectionId, socket);

    this.logger.debug('New socket', { connectionId, remoteAddress: request.socket.remoteAddress });

    const connection: ClientConnection = {
      id: connectionId,
      send: (message) =>
        new Promise<void>((resolve, reject) => {
          if (socket.readyState !== WebSocket.OPEN) {
            reject(
              new SyncError({
                code: 'TRANSPORT_ERROR',
                message: 'Socket is not open',
                context: { connectionId, readyState: socket.readyState },
              })
            );
            return;
          }
          socket.send(serializeMessage(message), (err) => {
            if (err) reject(SyncError.wrap(err, 'TRANSPORT_ERROR', { connectionId }));
            else resolve();
          });
        }),
      close: (code, reason) => {
        socket.close(code, reason);
      },
    };

    // Messages queue behind the handshake so none reach the gateway early
    let handshake: Promise<boolean> | null = null;

    const connectTimer = setTimeout(() => {
      if (!handshake) socket.close(4001, 'Connection timeout');
    }, this.config.connectTimeout);

    socket.on('message', (data: RawData) => {
      const text = rawDataToString(data);

      if (!handshake) {
        clearTimeout(connectTimer);
        handshake = this.completeHandshake(socket, connection, text).catch((error: unknown) => {
          this.logger.error('Handshake failed', toError(error), { connectionId });
          return false;
        });
        return;
      }

      void handshake
        .then((connected) => (connected ? this.gateway.handleMessage(connectionId, text) : undefined))
        .catch((error: unknown) => {
          this.logger.error('Error handling message', toError(error), { connectionId });
        });
    });

    socket.on('close', () => {
      clearTimeout(connectTimer);
      this.sockets.delete(connectionId);
      this.gateway.handleDisconnect(connectionId);
    });

    socket.on('error', (error) => {
      this.logger.warn('Socket error', { connectionId, error: error.message });
    });
  }

  private async completeHandshake(
    socket: WebSocket,
    connection: ClientConnection,
    text: string
  ): Promise<boolean> {
    const parsed = parseConnectMessage(text);
    if (!parsed.ok) {
      this.logger.debug('Rejected handshake', { connectionId: connection.id, error: parsed.error });
      await this.gateway.rejectHandshake(connection, `Expected connect message: ${parsed.error}`);
      return false;
    }

    try {
      await this.gateway.handleConnect(connection, parsed.message);
      return true;
    } catch (error) {
      this.logger.error('Error handling connect', toError(error), { connectionId: connection.id });
      socket.close(4005, 'Connection error');
      return false;
    }
  }
}

/**
 * Create a sync server
 */
export function createSyncServer(config?: SyncServerConfig): SyncServer {
  return new SyncServer(config);
}
