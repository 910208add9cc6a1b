import { buildPurchasePayload } from '../lib/purchasePayload';
import { extractPaymentLines, extractRemoteIdentifier } from '../lib/remoteIdentifier';
import type { KeyedLock } from '../lib/serialQueue';
import { classifyApiError, MalformedResponse, ValidationFailure, type ApiFailureKind } from '../lib/syncErrors';
import type { RemoteId } from '../types/purchase';
import { logger } from '../utils/logger';
import type { AuthProvider, ConnectivityProbe } from './connectivity';
import type { PurchaseRemote } from './PurchaseApiClient';
import type { PurchaseStore } from './PurchaseStore';
import type { ReferenceCacheService } from './ReferenceCacheService';

export type SyncFailureKind = ApiFailureKind | 'empty' | 'unexpected';

export interface SyncFailure {
  localId: number;
  kind: SyncFailureKind;
  message: string;
  statusCode?: number | null;
  fields?: Record<string, string[]>;
}

export interface SyncedPurchase {
  localId: number;
  transactionId: RemoteId;
  operation: 'create' | 'update';
  /** The remote accepted the push, but a local write landed meanwhile and goes out next run. */
  requeued?: true;
}

/**
 * `completed`: every pending header was attempted.
 * `aborted`: the remote rejected the session part way through.
 * `cancelled`: the caller's signal fired between two headers.
 */
export type SyncRunStatus = 'completed' | 'offline' | 'unauthenticated' | 'aborted' | 'cancelled';

export interface SyncRunResult {
  status: SyncRunStatus;
  attempted: number;
  synced: number;
  failed: number;
  requiresReauth: boolean;
  failures: SyncFailure[];
  pushed: SyncedPurchase[];
}

export interface SyncRunOptions {
  signal?: AbortSignal;
  refreshReferenceData?: boolean;
}

type HeaderOutcome =
  | { kind: 'synced'; pushed: SyncedPurchase }
  | { kind: 'failed'; failure: SyncFailure }
  | { kind: 'skipped' };

export interface PurchaseSyncServiceDeps {
  store: PurchaseStore;
  remote: Pick<PurchaseRemote, 'createPurchase' | 'updatePurchase'>;
  connectivity: ConnectivityProbe;
  auth: AuthProvider;
  locks: KeyedLock<number>;
  referenceCache?: ReferenceCacheService;
  refreshReferenceDataBeforeSync?: boolean;
}

function emptyResult(status: SyncRunStatus): SyncRunResult {
  return {
    status,
    attempted: 0,
    synced: 0,
    failed: 0,
    requiresReauth: status === 'unauthenticated',
    failures: [],
    pushed: [],
  };
}

/**
 * Pushes locally created or edited purchases to the remote service and
 * records the identifiers it hands back.
 */
export class PurchaseSyncService {
  private inFlight: Promise<SyncRunResult> | null = null;

  constructor(private readonly deps: PurchaseSyncServiceDeps) {}

  get isSyncing(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Pushes every unsynced header, oldest first. A call made while a run is in
   * progress receives that run's result; its own `signal` and
   * `refreshReferenceData` are not applied to that run. Use `isSyncing` to
   * tell the two cases apart.
   */
  syncPending(options: SyncRunOptions = {}): Promise<SyncRunResult> {
    if (this.inFlight) {
      logger.debug('Purchase sync already running, joining it');
      return this.inFlight;
    }
    const run = this.runPending(options).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  /** Pushes a single header under the same rules as a full run. */
  async syncOne(localId: number): Promise<SyncRunResult> {
    const blocked = await this.checkPreconditions();
    if (blocked) return blocked;

    const result = emptyResult('completed');
    const outcome = await this.syncHeader(localId);
    this.record(result, outcome);
    return result;
  }

  private async runPending(options: SyncRunOptions): Promise<SyncRunResult> {
    const blocked = await this.checkPreconditions();
    if (blocked) return blocked;

    const refresh = options.refreshReferenceData ?? this.deps.refreshReferenceDataBeforeSync ?? false;
    if (refresh && this.deps.referenceCache) {
      try {
        await this.deps.referenceCache.refreshAllIfStale();
      } catch (error) {
        logger.warn('Reference refresh before sync failed', { err: logger.serializeError(error) });
      }
    }

    const pending = await this.deps.store.listUnsynced();
    const result = emptyResult('completed');
    if (pending.length === 0) {
      logger.debug('No purchases waiting to sync');
      return result;
    }

    logger.info('Syncing purchases', { pending: pending.length });
    for (const header of pending) {
      if (options.signal?.aborted) {
        result.status = 'cancelled';
        break;
      }
      const outcome = await this.syncHeader(header.id);
      this.record(result, outcome);
      if (outcome.kind === 'failed' && outcome.failure.kind === 'authentication') {
        result.status = 'aborted';
        break;
      }
    }

    logger.info('Purchase sync finished', {
      status: result.status,
      synced: result.synced,
      failed: result.failed,
      remaining: pending.length - result.synced,
    });
    return result;
  }

  private async checkPreconditions(): Promise<SyncRunResult | null> {
    if (!(await this.deps.connectivity.isOnline())) {
      logger.debug('Offline, purchase sync skipped');
      return emptyResult('offline');
    }
    if (!(await this.deps.auth.isAuthenticated())) {
      logger.warn('Not signed in, purchase sync skipped');
      return emptyResult('unauthenticated');
    }
    return null;
  }

  private record(result: SyncRunResult, outcome: HeaderOutcome): void {
    if (outcome.kind === 'skipped') return;
    result.attempted += 1;
    if (outcome.kind === 'synced') {
      result.synced += 1;
      result.pushed.push(outcome.pushed);
      return;
    }
    result.failed += 1;
    result.failures.push(outcome.failure);
    if (outcome.failure.kind === 'authentication') {
      result.requiresReauth = true;
    }
  }

  /**
   * Reads, pushes and marks one header while holding its lock. Writes that
   * skip the lock still bump the header's revision, and a changed revision
   * keeps the header queued.
   */
  private syncHeader(localId: number): Promise<HeaderOutcome> {
    return this.deps.locks.runExclusive(localId, async (): Promise<HeaderOutcome> => {
      const { store, remote } = this.deps;
      const header = await store.getPurchase(localId);
      if (!header || header.isSynced) {
        return { kind: 'skipped' };
      }

      const lines = await store.getPurchaseLines(localId);
      if (lines.length === 0) {
        logger.warn('Purchase has no lines, not pushing it', { localId });
        return {
          kind: 'failed',
          failure: { localId, kind: 'empty', message: 'Purchase has no lines' },
        };
      }
      const payments = await store.getPurchasePayments(localId);
      const payload = buildPurchasePayload(header, lines, payments);
      const operation = header.transactionId === null ? 'create' : 'update';

      try {
        const body =
          header.transactionId === null
            ? await remote.createPurchase(payload)
            : await remote.updatePurchase(header.transactionId, payload);

        const extracted = extractRemoteIdentifier(body);
        let transactionId = header.transactionId;
        if (transactionId === null) {
          if (!extracted) {
            throw new MalformedResponse('Purchase was accepted but no identifier came back');
          }
          transactionId = extracted.id;
        } else if (extracted && extracted.id !== transactionId) {
          logger.warn('Remote answered an update with a different id, keeping the known one', {
            localId,
            transactionId,
            answered: extracted.id,
          });
        }

        const confirmedPayments = extractPaymentLines(body);
        const marked = await store.markSynced(localId, transactionId, confirmedPayments, header.revision);
        const pushed: SyncedPurchase = { localId, transactionId, operation };
        if (marked === 'changed') {
          logger.info('Purchase changed during push, queued again', { localId, transactionId, operation });
          pushed.requeued = true;
        } else if (marked === 'missing') {
          logger.warn('Purchase was deleted locally during push', { localId, transactionId, operation });
        } else {
          logger.info('Purchase synced', { localId, transactionId, operation });
        }
        return { kind: 'synced', pushed };
      } catch (error) {
        return { kind: 'failed', failure: this.toFailure(localId, error) };
      }
    });
  }

  private toFailure(localId: number, error: unknown): SyncFailure {
    const classified = classifyApiError(error);
    if (!classified) {
      logger.error('Unexpected error while syncing purchase', { localId, err: logger.serializeError(error) });
      return {
        localId,
        kind: 'unexpected',
        message: error instanceof Error ? error.message : String(error),
      };
    }

    logger.warn('Purchase sync failed', {
      localId,
      kind: classified.kind,
      statusCode: classified.statusCode,
      detail: classified.message,
    });
    const failure: SyncFailure = {
      localId,
      kind: classified.kind,
      message: classified.message,
      statusCode: classified.statusCode,
    };
    if (classified instanceof ValidationFailure) {
      failure.fields = classified.fields;
    }
    return failure;
  }
}
