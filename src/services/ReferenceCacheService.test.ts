import { ServerFailure } from '../lib/syncErrors';
import type { RemoteLocation, RemoteProduct, RemoteSupplier } from '../schema/purchaseSchemas';
import { createTestEngine, type TestEngine } from '../testing/fakes';

const MINUTE = 60 * 1000;

function supplier(id: number, name: string, overrides: Partial<RemoteSupplier> = {}): RemoteSupplier {
  return {
    id,
    name,
    businessName: null,
    contactId: `CO${String(id).padStart(4, '0')}`,
    mobile: null,
    addressLine1: null,
    city: null,
    state: null,
    country: null,
    zipCode: null,
    payTermType: null,
    payTermNumber: null,
    balance: 0,
    ...overrides,
  };
}

function product(productId: number, productName: string, subSku: string | null = null): RemoteProduct {
  return {
    productId,
    productName,
    productType: 'single',
    variationId: productId * 10,
    variationName: null,
    subSku,
    defaultPurchasePrice: 0,
  };
}

function location(id: number, name: string): RemoteLocation {
  return { id, name, locationId: `BL${id}`, address: null, city: null, state: null, country: null, zipCode: null };
}

describe('ReferenceCacheService', () => {
  let clock: Date;
  let engine: TestEngine;

  beforeEach(() => {
    clock = new Date('2024-05-01T12:00:00.000Z');
    engine = createTestEngine({ now: () => clock });
  });

  afterEach(() => {
    engine.close();
    jest.clearAllMocks();
  });

  describe('staleness', () => {
    it('treats a never-synced entity as stale', async () => {
      await expect(engine.referenceCache.isStale('suppliers', 10 * MINUTE)).resolves.toBe(true);
    });

    it('compares the age of the copy with the max age', async () => {
      await engine.settings.setLastSync('suppliers', new Date(clock.getTime() - 5 * MINUTE));
      await engine.settings.setLastSync('products', new Date(clock.getTime() - 15 * MINUTE));
      await engine.settings.setLastSync('locations', new Date(clock.getTime() - 10 * MINUTE));

      await expect(engine.referenceCache.isStale('suppliers', 10 * MINUTE)).resolves.toBe(false);
      await expect(engine.referenceCache.isStale('products', 10 * MINUTE)).resolves.toBe(true);
      await expect(engine.referenceCache.isStale('locations', 10 * MINUTE)).resolves.toBe(true);
    });

    it('skips the fetch while the copy is fresh', async () => {
      const lastSync = new Date(clock.getTime() - 5 * MINUTE);
      await engine.settings.setLastSync('suppliers', lastSync);

      const result = await engine.referenceCache.refreshIfStale('suppliers', 10 * MINUTE);

      expect(result).toEqual({ entity: 'suppliers', status: 'skipped-fresh', lastSyncAt: lastSync });
      expect(engine.remote.getSuppliers).not.toHaveBeenCalled();
    });
  });

  describe('forceRefresh', () => {
    it('replaces the cached rows and stamps the sync time', async () => {
      engine.remote.getSuppliers.mockResolvedValueOnce([supplier(1, 'Acme Metals'), supplier(2, 'Bolt Depot')]);

      const result = await engine.referenceCache.forceRefresh('suppliers');

      expect(result).toEqual({ entity: 'suppliers', status: 'refreshed', count: 2, syncedAt: clock });
      await expect(engine.settings.getLastSync('suppliers')).resolves.toEqual(clock);
      const cached = await engine.referenceCache.searchSuppliers();
      expect(cached.map((row) => row.name)).toEqual(['Acme Metals', 'Bolt Depot']);
      expect(cached[0]?.lastSync).toBe('2024-05-01T12:00:00.000Z');
    });

    it('keeps the stale copy when offline', async () => {
      engine.remote.getSuppliers.mockResolvedValueOnce([supplier(1, 'Acme Metals')]);
      await engine.referenceCache.forceRefresh('suppliers');
      engine.connectivity.online = false;

      const result = await engine.referenceCache.forceRefresh('suppliers');

      expect(result).toEqual({ entity: 'suppliers', status: 'failed-kept-stale', reason: 'offline' });
      expect(engine.remote.getSuppliers).toHaveBeenCalledTimes(1);
      expect((await engine.referenceCache.searchSuppliers()).map((row) => row.id)).toEqual([1]);
    });

    it('keeps the stale copy when signed out', async () => {
      engine.auth.clear();

      const result = await engine.referenceCache.forceRefresh('products');

      expect(result).toEqual({ entity: 'products', status: 'failed-kept-stale', reason: 'unauthenticated' });
      expect(engine.remote.getProducts).not.toHaveBeenCalled();
    });

    it('reports the failure kind of a rejected fetch', async () => {
      engine.remote.getSuppliers.mockResolvedValueOnce([supplier(1, 'Acme Metals')]);
      await engine.referenceCache.forceRefresh('suppliers');
      engine.remote.getSuppliers.mockRejectedValueOnce(new ServerFailure('Server error (500)', 500));

      const result = await engine.referenceCache.forceRefresh('suppliers');

      expect(result).toEqual({
        entity: 'suppliers',
        status: 'failed-kept-stale',
        reason: 'server',
        message: 'Server error (500)',
      });
      expect(await engine.cacheStore.count('suppliers')).toBe(1);
    });

    it('treats an unknown rejection as a network failure', async () => {
      engine.remote.getLocations.mockRejectedValueOnce(new Error('socket hang up'));

      const result = await engine.referenceCache.forceRefresh('locations');

      expect(result).toMatchObject({ status: 'failed-kept-stale', reason: 'network', message: 'socket hang up' });
    });

    it('does not wipe the cache when the remote returns nothing', async () => {
      engine.remote.getLocations.mockResolvedValueOnce([location(1, 'Main Warehouse')]);
      await engine.referenceCache.forceRefresh('locations');
      engine.remote.getLocations.mockResolvedValueOnce([]);

      const result = await engine.referenceCache.forceRefresh('locations');

      expect(result).toEqual({ entity: 'locations', status: 'failed-kept-stale', reason: 'empty-response' });
      expect((await engine.referenceCache.listLocations()).map((row) => row.name)).toEqual(['Main Warehouse']);
    });
  });

  describe('search', () => {
    beforeEach(async () => {
      engine.remote.getSuppliers.mockResolvedValueOnce([
        supplier(3, 'gamma Supply'),
        supplier(1, 'beta Tools', { businessName: 'Beta Holdings' }),
        supplier(2, 'Alpha Steel'),
        supplier(4, '100% Hardware'),
      ]);
      await engine.referenceCache.forceRefresh('suppliers');
    });

    it('orders suppliers by name ignoring case', async () => {
      const rows = await engine.referenceCache.searchSuppliers();

      expect(rows.map((row) => row.name)).toEqual(['100% Hardware', 'Alpha Steel', 'beta Tools', 'gamma Supply']);
    });

    it('matches name, business name and contact id', async () => {
      expect((await engine.referenceCache.searchSuppliers('alp')).map((row) => row.id)).toEqual([2]);
      expect((await engine.referenceCache.searchSuppliers('holdings')).map((row) => row.id)).toEqual([1]);
      expect((await engine.referenceCache.searchSuppliers('CO0003')).map((row) => row.id)).toEqual([3]);
    });

    it('treats wildcard characters in the term literally', async () => {
      expect((await engine.referenceCache.searchSuppliers('%')).map((row) => row.id)).toEqual([4]);
      expect((await engine.referenceCache.searchSuppliers('_')).map((row) => row.id)).toEqual([]);
    });

    it('ignores case in names outside ASCII', async () => {
      engine.remote.getSuppliers.mockResolvedValueOnce([supplier(5, 'Ölwerk Émile'), supplier(6, 'Σίδηρος Α.Ε.')]);
      await engine.referenceCache.forceRefresh('suppliers');

      expect((await engine.referenceCache.searchSuppliers('ölwerk')).map((row) => row.id)).toEqual([5]);
      expect((await engine.referenceCache.searchSuppliers('ÉMILE')).map((row) => row.id)).toEqual([5]);
      expect((await engine.referenceCache.searchSuppliers('σίδηρος')).map((row) => row.id)).toEqual([6]);
    });

    it('matches products by name or sub-SKU ignoring case', async () => {
      engine.remote.getProducts.mockResolvedValueOnce([
        product(21, 'Çelik Vida', 'SKU-Ä1'),
        product(22, 'Copper Pipe', 'CP-22'),
      ]);
      await engine.referenceCache.forceRefresh('products');

      expect((await engine.referenceCache.searchProducts('çelik')).map((row) => row.productId)).toEqual([21]);
      expect((await engine.referenceCache.searchProducts('sku-ä')).map((row) => row.productId)).toEqual([21]);
      expect((await engine.referenceCache.searchProducts('PIPE')).map((row) => row.productId)).toEqual([22]);
    });
  });

  describe('refreshAllIfStale and stats', () => {
    it('refreshes every entity and records the refresh time', async () => {
      engine.remote.getSuppliers.mockResolvedValueOnce([supplier(1, 'Acme Metals'), supplier(2, 'Bolt Depot')]);
      engine.remote.getLocations.mockResolvedValueOnce([location(1, 'Main Warehouse')]);

      const result = await engine.referenceCache.refreshAllIfStale();

      expect(result.suppliers.status).toBe('refreshed');
      expect(result.products).toEqual({ entity: 'products', status: 'failed-kept-stale', reason: 'empty-response' });
      expect(result.locations.status).toBe('refreshed');
      await expect(engine.referenceCache.getCacheStats()).resolves.toEqual({
        suppliers: { count: 2, lastSync: clock },
        products: { count: 0, lastSync: null },
        locations: { count: 1, lastSync: clock },
        lastRefresh: clock,
      });
    });

    it('leaves the refresh stamp alone when nothing was refreshed', async () => {
      engine.connectivity.online = false;

      await engine.referenceCache.refreshAllIfStale();

      await expect(engine.settings.getCacheLastRefresh()).resolves.toBeNull();
    });

    it('clears rows and timestamps', async () => {
      engine.remote.getSuppliers.mockResolvedValueOnce([supplier(1, 'Acme Metals')]);
      await engine.referenceCache.refreshAllIfStale();

      await engine.referenceCache.clearCache();

      await expect(engine.referenceCache.getCacheStats()).resolves.toEqual({
        suppliers: { count: 0, lastSync: null },
        products: { count: 0, lastSync: null },
        locations: { count: 0, lastSync: null },
        lastRefresh: null,
      });
    });
  });
});
