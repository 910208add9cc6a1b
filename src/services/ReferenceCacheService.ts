import { classifyApiError, type ApiFailureKind } from '../lib/syncErrors';
import {
  REFERENCE_ENTITIES,
  type CachedLocation,
  type CachedProduct,
  type CachedSupplier,
  type ReferenceEntity,
} from '../types/purchase';
import { dedupedLog } from '../utils/logDeduper';
import { logger } from '../utils/logger';
import type { AuthProvider, ConnectivityProbe } from './connectivity';
import type { PurchaseRemote } from './PurchaseApiClient';
import type { ReferenceCacheStore } from './ReferenceCacheStore';
import type { SystemSettingsStore } from './SystemSettingsStore';

export const DEFAULT_REFERENCE_MAX_AGE_MS = 24 * 60 * 60 * 1000;

export type RefreshFailureReason = 'offline' | 'unauthenticated' | 'empty-response' | 'storage' | ApiFailureKind;

export type RefreshResult =
  | { entity: ReferenceEntity; status: 'refreshed'; count: number; syncedAt: Date }
  | { entity: ReferenceEntity; status: 'skipped-fresh'; lastSyncAt: Date }
  | { entity: ReferenceEntity; status: 'failed-kept-stale'; reason: RefreshFailureReason; message?: string };

export type RefreshAllResult = Record<ReferenceEntity, RefreshResult>;

interface StagedRows {
  size: number;
  commit(syncedAt: Date): Promise<number>;
}

export interface CacheEntryStats {
  count: number;
  lastSync: Date | null;
}

export interface CacheStats {
  suppliers: CacheEntryStats;
  products: CacheEntryStats;
  locations: CacheEntryStats;
  lastRefresh: Date | null;
}

export interface ReferenceCacheServiceDeps {
  remote: Pick<PurchaseRemote, 'getSuppliers' | 'getProducts' | 'getLocations'>;
  cache: ReferenceCacheStore;
  settings: SystemSettingsStore;
  connectivity: ConnectivityProbe;
  auth: AuthProvider;
  defaultMaxAgeMs?: number;
  now?: () => Date;
}

/**
 * Keeps supplier, product and location lists available offline. A refresh
 * that cannot complete leaves the previous copy in place.
 */
export class ReferenceCacheService {
  private readonly defaultMaxAgeMs: number;
  private readonly now: () => Date;

  constructor(private readonly deps: ReferenceCacheServiceDeps) {
    this.defaultMaxAgeMs = deps.defaultMaxAgeMs ?? DEFAULT_REFERENCE_MAX_AGE_MS;
    this.now = deps.now ?? (() => new Date());
  }

  /** Stale when never synced or when `now - lastSync >= maxAgeMs`. */
  async isStale(entity: ReferenceEntity, maxAgeMs: number = this.defaultMaxAgeMs): Promise<boolean> {
    const lastSync = await this.deps.settings.getLastSync(entity);
    if (!lastSync) return true;
    return this.now().getTime() - lastSync.getTime() >= maxAgeMs;
  }

  async refreshIfStale(entity: ReferenceEntity, maxAgeMs: number = this.defaultMaxAgeMs): Promise<RefreshResult> {
    const lastSync = await this.deps.settings.getLastSync(entity);
    if (lastSync && this.now().getTime() - lastSync.getTime() < maxAgeMs) {
      return { entity, status: 'skipped-fresh', lastSyncAt: lastSync };
    }
    return this.forceRefresh(entity);
  }

  /** Refreshes without looking at the age of the current copy. Never rejects. */
  async forceRefresh(entity: ReferenceEntity): Promise<RefreshResult> {
    if (!(await this.deps.connectivity.isOnline())) {
      dedupedLog(`reference-cache:offline:${entity}`, 'info', 'Offline, keeping cached reference data', { entity });
      return { entity, status: 'failed-kept-stale', reason: 'offline' };
    }
    if (!(await this.deps.auth.isAuthenticated())) {
      dedupedLog(`reference-cache:unauthenticated:${entity}`, 'warn', 'Not signed in, keeping cached reference data', {
        entity,
      });
      return { entity, status: 'failed-kept-stale', reason: 'unauthenticated' };
    }

    let staged: StagedRows;
    try {
      staged = await this.fetch(entity);
    } catch (error) {
      const classified = classifyApiError(error);
      const reason: RefreshFailureReason = classified?.kind ?? 'network';
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('Reference refresh failed, keeping cached copy', { entity, reason, detail: message });
      return { entity, status: 'failed-kept-stale', reason, message };
    }

    if (staged.size === 0) {
      logger.warn('Remote returned no reference rows, keeping cached copy', { entity });
      return { entity, status: 'failed-kept-stale', reason: 'empty-response' };
    }

    const syncedAt = this.now();
    try {
      const count = await staged.commit(syncedAt);
      await this.deps.settings.setLastSync(entity, syncedAt);
      logger.info('Reference data cached', { entity, count });
      return { entity, status: 'refreshed', count, syncedAt };
    } catch (error) {
      logger.error('Could not store reference data', { entity, err: logger.serializeError(error) });
      return {
        entity,
        status: 'failed-kept-stale',
        reason: 'storage',
        message: error instanceof Error ? error.message : String(error),
      };
    }
  }

  /** Runs the three refreshes side by side and stamps `cache_last_refresh`. */
  async refreshAllIfStale(maxAgeMs: number = this.defaultMaxAgeMs): Promise<RefreshAllResult> {
    const [suppliers, products, locations] = await Promise.all([
      this.refreshIfStale('suppliers', maxAgeMs),
      this.refreshIfStale('products', maxAgeMs),
      this.refreshIfStale('locations', maxAgeMs),
    ]);
    const result: RefreshAllResult = { suppliers, products, locations };
    if (suppliers.status === 'refreshed' || products.status === 'refreshed' || locations.status === 'refreshed') {
      await this.deps.settings.setCacheLastRefresh(this.now());
    }
    return result;
  }

  searchSuppliers(term?: string): Promise<CachedSupplier[]> {
    return this.deps.cache.searchSuppliers(term);
  }

  searchProducts(term?: string): Promise<CachedProduct[]> {
    return this.deps.cache.searchProducts(term);
  }

  listLocations(): Promise<CachedLocation[]> {
    return this.deps.cache.listLocations();
  }

  async getCacheStats(): Promise<CacheStats> {
    const [suppliers, products, locations, lastRefresh] = await Promise.all([
      this.entryStats('suppliers'),
      this.entryStats('products'),
      this.entryStats('locations'),
      this.deps.settings.getCacheLastRefresh(),
    ]);
    return { suppliers, products, locations, lastRefresh };
  }

  async clearCache(): Promise<void> {
    await this.deps.cache.clearAll();
    await Promise.all(REFERENCE_ENTITIES.map((entity) => this.deps.settings.clearLastSync(entity)));
    await this.deps.settings.clearCacheLastRefresh();
    logger.info('Reference cache cleared');
  }

  private async entryStats(entity: ReferenceEntity): Promise<CacheEntryStats> {
    return {
      count: await this.deps.cache.count(entity),
      lastSync: await this.deps.settings.getLastSync(entity),
    };
  }

  private async fetch(entity: ReferenceEntity): Promise<StagedRows> {
    const { remote, cache } = this.deps;
    switch (entity) {
      case 'suppliers': {
        const rows = await remote.getSuppliers();
        return { size: rows.length, commit: (at) => cache.replaceSuppliers(rows, at) };
      }
      case 'products': {
        const rows = await remote.getProducts();
        return { size: rows.length, commit: (at) => cache.replaceProducts(rows, at) };
      }
      case 'locations': {
        const rows = await remote.getLocations();
        return { size: rows.length, commit: (at) => cache.replaceLocations(rows, at) };
      }
    }
  }
}
