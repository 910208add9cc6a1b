import type { AxiosAdapter } from 'axios';
import { getPurchaseApiConfig, getStorageConfig, getSyncConfig } from './config';
import { openDatabase, type SqliteDatabase } from './db';
import { KeyedLock, SerialQueue } from './lib/serialQueue';
import { HttpConnectivityProbe, StaticTokenAuthProvider, type AuthProvider, type ConnectivityProbe } from './services/connectivity';
import { PurchaseApiClient, type PurchaseRemote } from './services/PurchaseApiClient';
import { PurchaseListService } from './services/PurchaseListService';
import { PurchaseService } from './services/PurchaseService';
import { PurchaseStore } from './services/PurchaseStore';
import { PurchaseSyncService } from './services/PurchaseSyncService';
import { ReferenceCacheService } from './services/ReferenceCacheService';
import { ReferenceCacheStore } from './services/ReferenceCacheStore';
import { SystemSettingsStore } from './services/SystemSettingsStore';
import { logger } from './utils/logger';

export interface PurchaseEngineOptions {
  /** SQLite file, or ':memory:'. Defaults to PURCHASE_DB_PATH. */
  dbPath?: string;
  db?: SqliteDatabase;
  auth?: AuthProvider;
  connectivity?: ConnectivityProbe;
  remote?: PurchaseRemote;
  /** Transport override for the default API client and connectivity probe. */
  adapter?: AxiosAdapter;
  now?: () => Date;
}

export interface PurchaseEngine {
  db: SqliteDatabase;
  store: PurchaseStore;
  cacheStore: ReferenceCacheStore;
  settings: SystemSettingsStore;
  remote: PurchaseRemote;
  referenceCache: ReferenceCacheService;
  sync: PurchaseSyncService;
  list: PurchaseListService;
  purchases: PurchaseService;
  close(): void;
}

/** Wires the stores and services around one database connection. */
export function createPurchaseEngine(options: PurchaseEngineOptions = {}): PurchaseEngine {
  const apiConfig = getPurchaseApiConfig();
  const syncConfig = getSyncConfig();

  const db = options.db ?? openDatabase(options.dbPath ?? getStorageConfig().dbPath);
  const writes = new SerialQueue();
  const locks = new KeyedLock<number>();

  const auth = options.auth ?? new StaticTokenAuthProvider(apiConfig.token);
  const connectivity =
    options.connectivity ??
    new HttpConnectivityProbe({
      url: apiConfig.baseUrl,
      timeoutMs: syncConfig.connectivityProbeTimeoutMs,
      adapter: options.adapter,
    });
  const remote =
    options.remote ??
    new PurchaseApiClient({
      baseUrl: apiConfig.baseUrl,
      apiPrefix: apiConfig.apiPrefix,
      timeoutMs: apiConfig.timeoutMs,
      pageSize: apiConfig.pageSize,
      auth,
      adapter: options.adapter,
    });

  const store = new PurchaseStore(db, writes);
  const cacheStore = new ReferenceCacheStore(db, writes);
  const settings = new SystemSettingsStore(db, writes);

  const referenceCache = new ReferenceCacheService({
    remote,
    cache: cacheStore,
    settings,
    connectivity,
    auth,
    defaultMaxAgeMs: syncConfig.referenceMaxAgeMs,
    now: options.now,
  });
  const sync = new PurchaseSyncService({
    store,
    remote,
    connectivity,
    auth,
    locks,
    referenceCache,
    refreshReferenceDataBeforeSync: syncConfig.refreshReferenceDataBeforeSync,
  });
  const list = new PurchaseListService({
    store,
    cache: cacheStore,
    remote,
    connectivity,
    auth,
    locks,
    referenceCache,
    defaultPageSize: apiConfig.pageSize,
  });
  const purchases = new PurchaseService({ store, remote, sync, connectivity, auth, locks, now: options.now });

  logger.debug('Purchase engine ready', { api: `${apiConfig.baseUrl}${apiConfig.apiPrefix}` });

  return {
    db,
    store,
    cacheStore,
    settings,
    remote,
    referenceCache,
    sync,
    list,
    purchases,
    close: () => db.close(),
  };
}

export * from './types/purchase';
export * from './lib/syncErrors';
export { dedupeByRemoteId, findPrunable } from './lib/reconcile';
export { extractRemoteIdentifier, extractPaymentLines } from './lib/remoteIdentifier';
export { openDatabase } from './db';
export { runMigrations, LATEST_SCHEMA_VERSION } from './migrate';
export { HttpConnectivityProbe, StaticTokenAuthProvider } from './services/connectivity';
export type { AuthProvider, ConnectivityProbe } from './services/connectivity';
export { PurchaseApiClient } from './services/PurchaseApiClient';
export type { PurchaseRemote, RemotePurchasePayload, RemotePurchasePage } from './services/PurchaseApiClient';
export { PurchaseStore, ReferenceCacheStore, SystemSettingsStore };
export { ReferenceCacheService } from './services/ReferenceCacheService';
export type { RefreshResult, CacheStats } from './services/ReferenceCacheService';
export { PurchaseSyncService } from './services/PurchaseSyncService';
export type { SyncRunResult, SyncFailure } from './services/PurchaseSyncService';
export { PurchaseListService } from './services/PurchaseListService';
export type { PurchaseListFilters, PurchaseListResult } from './services/PurchaseListService';
export { PurchaseService, PendingRemoteDeleteError, PurchaseNotFoundError } from './services/PurchaseService';
export { PurchaseInputError } from './utils/schemaError';
