import dayjs from 'dayjs';
import type { KeyedLock } from '../lib/serialQueue';
import { classifyApiError, type PurchaseApiError } from '../lib/syncErrors';
import { NewPurchaseIn, PurchaseEditIn, type NewPurchaseInput, type PurchaseEditInput } from '../schema/purchaseSchemas';
import type { RemotePurchase } from '../schema/purchaseSchemas';
import { PURCHASE_STATUSES, type PurchaseHeader, type PurchaseRecord, type PurchaseStatus, type RemoteId } from '../types/purchase';
import { logger } from '../utils/logger';
import { PurchaseInputError, toValidationProblem } from '../utils/schemaError';
import type { AuthProvider, ConnectivityProbe } from './connectivity';
import type { PurchaseRemote } from './PurchaseApiClient';
import type { PurchaseStore } from './PurchaseStore';
import type { PurchaseSyncService, SyncFailure } from './PurchaseSyncService';

export class PurchaseNotFoundError extends Error {
  constructor(public readonly localId: number) {
    super(`Purchase ${localId} does not exist`);
    this.name = 'PurchaseNotFoundError';
  }
}

/** A synced purchase cannot be removed while the remote copy is out of reach. */
export class PendingRemoteDeleteError extends Error {
  constructor(
    public readonly localId: number,
    public readonly transactionId: RemoteId,
    reason: 'offline' | 'unauthenticated'
  ) {
    super(
      reason === 'offline'
        ? `Purchase ${localId} exists remotely; connect to delete it`
        : `Purchase ${localId} exists remotely; sign in to delete it`
    );
    this.name = 'PendingRemoteDeleteError';
  }
}

export interface SaveOutcome {
  localId: number;
  header: PurchaseHeader;
  synced: boolean;
  failure?: SyncFailure;
}

export interface StatusOutcome {
  header: PurchaseHeader;
  remoteApplied: boolean;
  requiresReauth: boolean;
  error?: PurchaseApiError;
}

export interface PurchaseServiceDeps {
  store: PurchaseStore;
  remote: Pick<PurchaseRemote, 'deletePurchase' | 'updatePurchaseStatus' | 'getPurchase'>;
  sync: PurchaseSyncService;
  connectivity: ConnectivityProbe;
  auth: AuthProvider;
  locks: KeyedLock<number>;
  now?: () => Date;
}

// The remote expects local wall-clock time.
const TRANSACTION_DATE_FORMAT = 'YYYY-MM-DD HH:mm:ss';

/**
 * Local-first purchase operations. Writes land in the local store first and
 * reach the remote through the sync service.
 */
export class PurchaseService {
  private readonly now: () => Date;

  constructor(private readonly deps: PurchaseServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async createPurchase(input: NewPurchaseInput, options: { syncNow?: boolean } = {}): Promise<SaveOutcome> {
    const parsed = NewPurchaseIn.safeParse(input);
    if (!parsed.success) {
      throw new PurchaseInputError(toValidationProblem(parsed.error, 'Invalid purchase'));
    }
    const { lines, payments, ...header } = parsed.data;

    const localId = await this.deps.store.createPurchase(
      { ...header, transactionDate: header.transactionDate ?? dayjs(this.now()).format(TRANSACTION_DATE_FORMAT) },
      lines,
      payments
    );
    logger.info('Purchase saved locally', { localId, lines: lines.length, payments: payments.length });

    if (options.syncNow === false) {
      return { localId, header: await this.requireHeader(localId), synced: false };
    }
    return this.trySync(localId);
  }

  /** Applies edits and queues the purchase for the next sync. */
  async updatePurchase(localId: number, edits: PurchaseEditInput): Promise<PurchaseHeader> {
    const parsed = PurchaseEditIn.safeParse(edits);
    if (!parsed.success) {
      throw new PurchaseInputError(toValidationProblem(parsed.error, 'Invalid purchase changes'));
    }

    const updated = await this.deps.locks.runExclusive(localId, () => this.deps.store.updatePurchase(localId, parsed.data));
    if (!updated) {
      throw new PurchaseNotFoundError(localId);
    }
    return this.requireHeader(localId);
  }

  /**
   * Records a status change. A synced purchase is updated remotely right away
   * when possible; otherwise the change goes out with the next sync.
   */
  async updateStatus(localId: number, status: PurchaseStatus): Promise<StatusOutcome> {
    if (!PURCHASE_STATUSES.includes(status)) {
      throw new PurchaseInputError({
        error: 'Invalid purchase status',
        issues: { formErrors: [`Unknown status "${String(status)}"`], fieldErrors: {} },
      });
    }

    return this.deps.locks.runExclusive(localId, async (): Promise<StatusOutcome> => {
      const header = await this.requireHeader(localId);

      if (header.isSynced && header.transactionId !== null && (await this.canReachRemote())) {
        try {
          await this.deps.remote.updatePurchaseStatus(header.transactionId, status);
          await this.deps.store.recordConfirmedStatus(localId, status);
          return { header: await this.requireHeader(localId), remoteApplied: true, requiresReauth: false };
        } catch (error) {
          const classified = classifyApiError(error);
          if (!classified) throw error;
          await this.deps.store.updatePurchase(localId, { header: { status } });
          logger.warn('Status change kept for next sync', { localId, kind: classified.kind });
          return {
            header: await this.requireHeader(localId),
            remoteApplied: false,
            requiresReauth: classified.kind === 'authentication',
            error: classified,
          };
        }
      }

      await this.deps.store.updatePurchase(localId, { header: { status } });
      return { header: await this.requireHeader(localId), remoteApplied: false, requiresReauth: false };
    });
  }

  /**
   * Deletes remotely first when the purchase was ever pushed, then removes
   * the local header with its lines and payments. Resolves false when the
   * purchase does not exist locally.
   */
  async deletePurchase(localId: number): Promise<boolean> {
    return this.deps.locks.runExclusive(localId, async () => {
      const header = await this.deps.store.getPurchase(localId);
      if (!header) return false;

      if (header.transactionId !== null) {
        if (!(await this.deps.connectivity.isOnline())) {
          throw new PendingRemoteDeleteError(localId, header.transactionId, 'offline');
        }
        if (!(await this.deps.auth.isAuthenticated())) {
          throw new PendingRemoteDeleteError(localId, header.transactionId, 'unauthenticated');
        }
        try {
          await this.deps.remote.deletePurchase(header.transactionId);
        } catch (error) {
          const classified = classifyApiError(error);
          // Already gone remotely.
          if (classified?.kind !== 'request' || classified.statusCode !== 404) throw classified ?? error;
        }
      }

      const removed = await this.deps.store.deletePurchase(localId);
      logger.info('Purchase deleted', { localId, transactionId: header.transactionId });
      return removed;
    });
  }

  async getPurchase(localId: number): Promise<PurchaseRecord | null> {
    const header = await this.deps.store.getPurchase(localId);
    if (!header) return null;
    const [lines, payments] = await Promise.all([
      this.deps.store.getPurchaseLines(localId),
      this.deps.store.getPurchasePayments(localId),
    ]);
    return { header, lines, payments };
  }

  getRemotePurchase(transactionId: RemoteId): Promise<RemotePurchase> {
    return this.deps.remote.getPurchase(transactionId);
  }

  countPending(): Promise<number> {
    return this.deps.store.countUnsynced();
  }

  private async trySync(localId: number): Promise<SaveOutcome> {
    const result = await this.deps.sync.syncOne(localId);
    const header = await this.requireHeader(localId);
    const failure = result.failures[0];
    if (failure) {
      return { localId, header, synced: false, failure };
    }
    return { localId, header, synced: header.isSynced };
  }

  private async canReachRemote(): Promise<boolean> {
    return (await this.deps.connectivity.isOnline()) && (await this.deps.auth.isAuthenticated());
  }

  private async requireHeader(localId: number): Promise<PurchaseHeader> {
    const header = await this.deps.store.getPurchase(localId);
    if (!header) throw new PurchaseNotFoundError(localId);
    return header;
  }
}
