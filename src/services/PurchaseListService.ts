import { dedupeByRemoteId, findPrunable } from '../lib/reconcile';
import type { KeyedLock } from '../lib/serialQueue';
import { classifyApiError, type ApiFailureKind } from '../lib/syncErrors';
import type { RemotePurchase } from '../schema/purchaseSchemas';
import type { PurchaseHeader, PurchaseView, RemoteId } from '../types/purchase';
import { logger } from '../utils/logger';
import type { AuthProvider, ConnectivityProbe } from './connectivity';
import type { PurchaseRemote, RemotePurchaseFilters } from './PurchaseApiClient';
import type { PurchaseStore } from './PurchaseStore';
import type { ReferenceCacheService } from './ReferenceCacheService';
import type { ReferenceCacheStore } from './ReferenceCacheStore';

export interface PurchaseListFilters {
  supplierId?: number;
  locationId?: number;
  status?: string;
  paymentStatus?: string;
  startDate?: string;
  endDate?: string;
  refNo?: string;
  searchQuery?: string;
  page?: number;
  perPage?: number;
  refreshReferenceData?: boolean;
}

export interface PurchaseListResult {
  purchases: PurchaseView[];
  source: 'remote+local' | 'local';
  currentPage: number;
  lastPage: number;
  perPage: number;
  /** Remote total for the filters, or the local row count when offline. */
  total: number;
  /** Rows in `purchases` that the remote page did not contain. */
  localOnly: number;
  remoteError?: ApiFailureKind | 'unexpected';
}

export interface RefreshSpecifiedResult {
  status: 'refreshed' | 'offline' | 'unauthenticated';
  purchases: RemotePurchase[];
  /** Local ids of synced rows removed because the remote no longer has them. */
  pruned: number[];
}

export interface PurchaseListServiceDeps {
  store: PurchaseStore;
  cache: ReferenceCacheStore;
  remote: Pick<PurchaseRemote, 'listPurchases' | 'getPurchasesByIds'>;
  connectivity: ConnectivityProbe;
  auth: AuthProvider;
  locks: KeyedLock<number>;
  referenceCache?: ReferenceCacheService;
  defaultPageSize?: number;
  maxPages?: number;
}

const DEFAULT_MAX_PAGES = 50;

function refKey(contactId: number | null, refNo: string | null): string | null {
  if (contactId === null || !refNo || !refNo.trim()) return null;
  return `${contactId}|${refNo.trim().toLowerCase()}`;
}

function matchesLocalFilters(header: PurchaseHeader, filters: PurchaseListFilters): boolean {
  if (filters.status && header.status !== filters.status) return false;
  if (filters.supplierId !== undefined && header.contactId !== filters.supplierId) return false;
  return true;
}

function matchesSearch(view: PurchaseView, query: string | undefined): boolean {
  const needle = query?.trim().toLowerCase();
  if (!needle) return true;
  return [view.refNo, view.supplierName].some((field) => field?.toLowerCase().includes(needle) ?? false);
}

/**
 * Builds the purchase list shown to users: the remote page when reachable,
 * plus whatever exists only on this device.
 */
export class PurchaseListService {
  private readonly pageSize: number;

  constructor(private readonly deps: PurchaseListServiceDeps) {
    this.pageSize = deps.defaultPageSize ?? 20;
  }

  async list(filters: PurchaseListFilters = {}): Promise<PurchaseListResult> {
    await this.maybeRefreshReferenceData(filters);
    const page = filters.page ?? 1;
    const perPage = filters.perPage ?? this.pageSize;

    if (!(await this.canReachRemote())) {
      return this.localOnly(filters, perPage);
    }

    try {
      const remotePage = await this.deps.remote.listPurchases(this.toRemoteFilters(filters, page, perPage));
      const { purchases, localOnly } = await this.merge(remotePage.items, filters, remotePage.currentPage === 1);
      return {
        purchases,
        source: 'remote+local',
        currentPage: remotePage.currentPage,
        lastPage: remotePage.lastPage,
        perPage: remotePage.perPage,
        total: remotePage.total,
        localOnly,
      };
    } catch (error) {
      return this.localOnly(filters, perPage, this.remoteErrorKind(error));
    }
  }

  /** Walks every remote page (up to `maxPages`) and merges once at the end. */
  async listAll(filters: PurchaseListFilters = {}): Promise<PurchaseListResult> {
    await this.maybeRefreshReferenceData(filters);
    const perPage = filters.perPage ?? this.pageSize;

    if (!(await this.canReachRemote())) {
      return this.localOnly(filters, perPage);
    }

    const maxPages = this.deps.maxPages ?? DEFAULT_MAX_PAGES;
    const items: RemotePurchase[] = [];
    let lastPage = 1;
    let total = 0;
    let remoteError: PurchaseListResult['remoteError'];

    for (let page = 1; page <= Math.min(lastPage, maxPages); page += 1) {
      try {
        const remotePage = await this.deps.remote.listPurchases(this.toRemoteFilters(filters, page, perPage));
        items.push(...remotePage.items);
        lastPage = remotePage.lastPage;
        total = remotePage.total;
      } catch (error) {
        remoteError = this.remoteErrorKind(error);
        if (page === 1) {
          return this.localOnly(filters, perPage, remoteError);
        }
        break;
      }
    }

    if (lastPage > maxPages) {
      logger.warn('Purchase list truncated', { lastPage, maxPages });
    }

    const { purchases, localOnly } = await this.merge(items, filters, true);
    const result: PurchaseListResult = {
      purchases,
      source: 'remote+local',
      currentPage: 1,
      lastPage: 1,
      perPage,
      total,
      localOnly,
    };
    if (remoteError) result.remoteError = remoteError;
    return result;
  }

  /**
   * Re-reads the given remote ids and drops local synced copies the remote no
   * longer returns. Unsynced rows are never touched.
   */
  async refreshSpecified(transactionIds: readonly RemoteId[]): Promise<RefreshSpecifiedResult> {
    if (!(await this.deps.connectivity.isOnline())) {
      return { status: 'offline', purchases: [], pruned: [] };
    }
    if (!(await this.deps.auth.isAuthenticated())) {
      return { status: 'unauthenticated', purchases: [], pruned: [] };
    }
    if (transactionIds.length === 0) {
      return { status: 'refreshed', purchases: [], pruned: [] };
    }

    const fetched = await this.deps.remote.getPurchasesByIds(transactionIds);
    const purchases = dedupeByRemoteId(fetched, (item) => item.id);

    const requested = new Set(transactionIds);
    const candidates = (await this.deps.store.listPurchases()).filter(
      (header) => header.isSynced && header.transactionId !== null && requested.has(header.transactionId)
    );
    const prunable = findPrunable(
      candidates,
      purchases.map((item) => item.id),
      (header) => header.transactionId
    );

    const pruned: number[] = [];
    for (const header of prunable) {
      // An edit since the read bumps the revision; keep the row then.
      const removed = await this.deps.locks.runExclusive(header.id, () =>
        this.deps.store.deleteSyncedPurchase(header.id, header.revision)
      );
      if (removed) pruned.push(header.id);
    }

    if (pruned.length > 0) {
      logger.info('Pruned purchases removed remotely', { pruned });
    }
    return { status: 'refreshed', purchases, pruned };
  }

  private async maybeRefreshReferenceData(filters: PurchaseListFilters): Promise<void> {
    if (!filters.refreshReferenceData || !this.deps.referenceCache) return;
    try {
      await this.deps.referenceCache.refreshAllIfStale();
    } catch (error) {
      logger.warn('Reference refresh before listing failed', { err: logger.serializeError(error) });
    }
  }

  private async canReachRemote(): Promise<boolean> {
    return (await this.deps.connectivity.isOnline()) && (await this.deps.auth.isAuthenticated());
  }

  private remoteErrorKind(error: unknown): ApiFailureKind | 'unexpected' {
    const classified = classifyApiError(error);
    logger.warn('Remote purchase list unavailable, showing local purchases', {
      kind: classified?.kind ?? 'unexpected',
      err: logger.serializeError(error),
    });
    return classified?.kind ?? 'unexpected';
  }

  private toRemoteFilters(filters: PurchaseListFilters, page: number, perPage: number): RemotePurchaseFilters {
    return {
      supplierId: filters.supplierId,
      locationId: filters.locationId,
      status: filters.status,
      paymentStatus: filters.paymentStatus,
      startDate: filters.startDate,
      endDate: filters.endDate,
      refNo: filters.refNo,
      page,
      perPage,
    };
  }

  private async supplierNames(): Promise<Map<number, string>> {
    const suppliers = await this.deps.cache.searchSuppliers();
    return new Map(suppliers.map((supplier) => [supplier.id, supplier.name]));
  }

  private async localOnly(
    filters: PurchaseListFilters,
    perPage: number,
    remoteError?: ApiFailureKind | 'unexpected'
  ): Promise<PurchaseListResult> {
    const names = await this.supplierNames();
    const headers = (await this.deps.store.listPurchases()).filter((header) => matchesLocalFilters(header, filters));
    const purchases = dedupeByRemoteId(
      headers.map((header) => this.toLocalView(header, names)),
      (view) => view.transactionId
    ).filter((view) => matchesSearch(view, filters.searchQuery));

    const result: PurchaseListResult = {
      purchases,
      source: 'local',
      currentPage: 1,
      lastPage: 1,
      perPage,
      total: purchases.length,
      localOnly: purchases.length,
    };
    if (remoteError) result.remoteError = remoteError;
    return result;
  }

  /**
   * Remote rows first, then local headers the remote rows do not account for.
   * Local-only rows are attached to the first page only.
   */
  private async merge(
    remoteItems: readonly RemotePurchase[],
    filters: PurchaseListFilters,
    includeLocalOnly: boolean
  ): Promise<{ purchases: PurchaseView[]; localOnly: number }> {
    const names = await this.supplierNames();
    const locals = await this.deps.store.listPurchases();
    const items = dedupeByRemoteId(remoteItems, (item) => item.id);

    const localByRemoteId = new Map<RemoteId, PurchaseHeader>();
    for (const header of locals) {
      if (header.transactionId !== null && !localByRemoteId.has(header.transactionId)) {
        localByRemoteId.set(header.transactionId, header);
      }
    }

    const remoteIds = new Set(items.map((item) => item.id));
    const remoteRefKeys = new Set<string>();
    for (const item of items) {
      const key = refKey(item.contactId, item.refNo);
      if (key) remoteRefKeys.add(key);
    }

    const views = items.map((item) => this.toRemoteView(item, localByRemoteId.get(item.id), names));

    let localOnly = 0;
    if (includeLocalOnly) {
      for (const header of locals) {
        if (!matchesLocalFilters(header, filters)) continue;
        const represented =
          header.transactionId !== null
            ? remoteIds.has(header.transactionId)
            : remoteRefKeys.has(refKey(header.contactId, header.refNo) ?? '');
        if (represented) continue;
        views.push(this.toLocalView(header, names));
        localOnly += 1;
      }
    }

    const purchases = dedupeByRemoteId(views, (view) => view.transactionId).filter((view) =>
      matchesSearch(view, filters.searchQuery)
    );
    return { purchases, localOnly };
  }

  private toRemoteView(item: RemotePurchase, local: PurchaseHeader | undefined, names: Map<number, string>): PurchaseView {
    const cachedName = item.contactId !== null ? names.get(item.contactId) : undefined;
    return {
      key: `remote:${item.id}`,
      origin: 'remote',
      localId: local?.id ?? null,
      transactionId: item.id,
      syncState: local && !local.isSynced ? 'pending' : 'synced',
      contactId: item.contactId,
      supplierName: cachedName ?? item.supplierName,
      locationId: item.locationId,
      refNo: item.refNo,
      status: item.status,
      paymentStatus: item.paymentStatus,
      transactionDate: item.transactionDate,
      finalTotal: item.finalTotal,
    };
  }

  private toLocalView(header: PurchaseHeader, names: Map<number, string>): PurchaseView {
    return {
      key: `local:${header.id}`,
      origin: 'local',
      localId: header.id,
      transactionId: header.transactionId,
      syncState: header.isSynced ? 'synced' : 'pending',
      contactId: header.contactId,
      supplierName: names.get(header.contactId) ?? null,
      locationId: header.locationId,
      refNo: header.refNo,
      status: header.status,
      paymentStatus: null,
      transactionDate: header.transactionDate,
      finalTotal: header.finalTotal,
    };
  }
}
