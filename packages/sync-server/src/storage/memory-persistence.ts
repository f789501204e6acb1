/**
 * In-Memory Persistence
 * Record store for development and testing
 */

import {
  entityKey,
  type EntityType,
  type EntityVersionRecord,
  type PersistenceResult,
  type SyncEvent,
  type SyncEventData,
  type SyncPersistence,
} from '@companion/sync';

/**
 * A stored record; deletes leave a tombstone that keeps the version
 */
export interface StoredEntity {
  entityType: EntityType;
  entityId: string;
  data: SyncEventData;
  deleted: boolean;
  version: number;
  updatedAt: number;
}

export interface MemoryPersistenceOptions {
  /** How many applied events to keep in the change log */
  maxChanges?: number;
}

/**
 * In-memory record store
 */
export class MemoryPersistence implements SyncPersistence {
  private readonly entities = new Map<string, StoredEntity>();
  private readonly lastEvents = new Map<string, SyncEvent>();
  private readonly changes: SyncEvent[] = [];
  private readonly maxChanges: number;

  constructor(options: MemoryPersistenceOptions = {}) {
    this.maxChanges = options.maxChanges ?? 10000;
  }

  async apply(event: SyncEvent): Promise<PersistenceResult> {
    const key = entityKey(event);
    const existing = this.entities.get(key);
    const version = event.version ?? 0;

    switch (event.action) {
      case 'create':
        this.entities.set(key, {
          entityType: event.entityType,
          entityId: event.entityId,
          data: { ...event.data },
          deleted: false,
          version,
          updatedAt: event.timestamp,
        });
        break;

      case 'update':
        if (!existing || existing.deleted) {
          return { ok: false, error: `Entity ${key} not found for update` };
        }
        this.entities.set(key, {
          ...existing,
          data: { ...existing.data, ...event.data },
          version,
          updatedAt: event.timestamp,
        });
        break;

      case 'delete':
        this.entities.set(key, {
          entityType: event.entityType,
          entityId: event.entityId,
          data: {},
          deleted: true,
          version,
          updatedAt: event.timestamp,
        });
        break;
    }

    this.lastEvents.set(key, event);
    this.changes.push(event);
    while (this.changes.length > this.maxChanges) {
      this.changes.shift();
    }

    return { ok: true };
  }

  async getLastVersion(entityType: EntityType, entityId: string): Promise<EntityVersionRecord | null> {
    const event = this.lastEvents.get(entityKey({ entityType, entityId }));
    if (!event) return null;

    const version = event.version ?? 0;
    return { version, event, baseVersion: version - 1 };
  }

  /**
   * Current state of a record, or null when absent or deleted
   */
  getEntity(entityType: EntityType, entityId: string): StoredEntity | null {
    const entity = this.entities.get(entityKey({ entityType, entityId }));
    return entity && !entity.deleted ? entity : null;
  }

  /**
   * Applied events after `since` (ms), oldest first
   */
  getChanges(since = 0, limit?: number): SyncEvent[] {
    const changes = this.changes.filter((event) => event.timestamp > since);
    return limit !== undefined ? changes.slice(0, limit) : changes;
  }

  /**
   * Clear all data (for testing)
   */
  clear(): void {
    this.entities.clear();
    this.lastEvents.clear();
    this.changes.length = 0;
  }

  getStats(): { entities: number; deleted: number; changes: number } {
    let deleted = 0;
    for (const entity of this.entities.values()) {
      if (entity.deleted) deleted++;
    }

    return {
      entities: this.entities.size - deleted,
      deleted,
      changes: this.changes.length,
    };
  }
}

/**
 * Create an in-memory persistence backend
 */
export function createMemoryPersistence(options?: MemoryPersistenceOptions): MemoryPersistence {
  return new MemoryPersistence(options);
}
