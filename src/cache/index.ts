/**
 * Cache Manager Module
 *
 * Session-scoped store of validated dossiers keyed by
 * (entity id, dataset version).
 *
 * - Exact key equality, no expiry
 * - A new dataset version makes older entries unreachable; with
 *   evictOnVersionChange they are also deleted, and later writes for
 *   any other version are dropped
 * - Only the orchestrator's FINALIZE step writes, so every entry is
 *   schema-valid
 */

import { createHash } from 'crypto';
import { createConsoleLogger } from '../observability/index.js';
import type { CacheKey, DatasetVersion, Dossier, EntityId, Logger } from '../types/index.js';

// ============================================================================
// Keys and versions
// ============================================================================

export function makeCacheKey(entityId: EntityId, datasetVersion: DatasetVersion): CacheKey {
  return { entityId, datasetVersion };
}

/**
 * Collision-free string form of a key, used for map lookups and locks
 */
export function serializeCacheKey(key: CacheKey): string {
  return JSON.stringify([key.entityId, key.datasetVersion]);
}

/**
 * SHA-256 hex digest of the dataset bytes
 */
export function computeDatasetVersion(bytes: string | Uint8Array): DatasetVersion {
  return createHash('sha256').update(bytes).digest('hex');
}

// ============================================================================
// Cache
// ============================================================================

export interface ProfileCache {
  get(key: CacheKey): Dossier | undefined;
  /** Writes for a version other than the active one may be dropped */
  put(key: CacheKey, dossier: Dossier): void;
  has(key: CacheKey): boolean;
  /** Drop every entry; returns how many were removed */
  invalidateAll(): number;
  /**
   * Tell the cache which dataset version is current. Returns the number of
   * entries evicted as a result.
   */
  setActiveVersion(version: DatasetVersion): number;
  size(): number;
  clear(): void;
}

export interface MemoryProfileCacheOptions {
  /** Delete entries of other versions when the active version changes (default true) */
  evictOnVersionChange?: boolean;
  logger?: Logger;
}

interface CacheEntry {
  key: CacheKey;
  dossier: Dossier;
  storedAt: string;
}

export class MemoryProfileCache implements ProfileCache {
  private readonly entries = new Map<string, CacheEntry>();
  private activeVersion: DatasetVersion | null = null;
  private readonly evictOnVersionChange: boolean;
  private readonly logger: Logger;

  constructor(options: MemoryProfileCacheOptions = {}) {
    this.evictOnVersionChange = options.evictOnVersionChange ?? true;
    this.logger = options.logger ?? createConsoleLogger('cache');
  }

  get(key: CacheKey): Dossier | undefined {
    return this.entries.get(serializeCacheKey(key))?.dossier;
  }

  put(key: CacheKey, dossier: Dossier): void {
    // A run that started before a version change finishes after it
    if (this.evictOnVersionChange && this.activeVersion !== null && key.datasetVersion !== this.activeVersion) {
      this.logger.warn('Dropped dossier for inactive dataset version', {
        entityId: key.entityId,
        datasetVersion: key.datasetVersion,
        activeVersion: this.activeVersion,
      });
      return;
    }
    this.entries.set(serializeCacheKey(key), {
      key,
      dossier,
      storedAt: new Date().toISOString(),
    });
    this.logger.debug('Dossier cached', { entityId: key.entityId, datasetVersion: key.datasetVersion });
  }

  has(key: CacheKey): boolean {
    return this.entries.has(serializeCacheKey(key));
  }

  invalidateAll(): number {
    const removed = this.entries.size;
    this.entries.clear();
    if (removed > 0) {
      this.logger.info('Profile cache invalidated', { removed });
    }
    return removed;
  }

  setActiveVersion(version: DatasetVersion): number {
    if (this.activeVersion === version) {
      return 0;
    }
    const previous = this.activeVersion;
    this.activeVersion = version;

    if (!this.evictOnVersionChange) {
      return 0;
    }

    let evicted = 0;
    for (const [id, entry] of this.entries) {
      if (entry.key.datasetVersion !== version) {
        this.entries.delete(id);
        evicted += 1;
      }
    }
    this.logger.info('Dataset version changed', { previous, current: version, evicted });
    return evicted;
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
    this.activeVersion = null;
  }

  /**
   * When the dossier for a key was stored, if it is cached
   */
  storedAt(key: CacheKey): string | undefined {
    return this.entries.get(serializeCacheKey(key))?.storedAt;
  }
}
