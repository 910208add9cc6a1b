import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { createPurchaseEngine, type PurchaseEngine } from '../index';
import type { RemoteLocation, RemoteProduct, RemotePurchase, RemoteSupplier } from '../schema/purchaseSchemas';
import type { NewPurchaseInput } from '../schema/purchaseSchemas';
import { StaticTokenAuthProvider, type ConnectivityProbe } from '../services/connectivity';
import type {
  PurchaseRemote,
  RemotePurchaseFilters,
  RemotePurchasePage,
  RemotePurchasePayload,
} from '../services/PurchaseApiClient';
import type { PurchaseHeaderInput, PurchaseLineInput, PurchaseStatus, RemoteId } from '../types/purchase';

export class SwitchableConnectivity implements ConnectivityProbe {
  constructor(public online = true) {}

  async isOnline(): Promise<boolean> {
    return this.online;
  }
}

export class MockRemote implements PurchaseRemote {
  createPurchase = jest.fn<Promise<unknown>, [RemotePurchasePayload]>();
  updatePurchase = jest.fn<Promise<unknown>, [RemoteId, RemotePurchasePayload]>();
  listPurchases = jest.fn<Promise<RemotePurchasePage>, [filters?: RemotePurchaseFilters]>();
  getPurchase = jest.fn<Promise<RemotePurchase>, [RemoteId]>();
  getPurchasesByIds = jest.fn<Promise<RemotePurchase[]>, [readonly RemoteId[]]>();
  deletePurchase = jest.fn<Promise<void>, [RemoteId]>();
  updatePurchaseStatus = jest.fn<Promise<void>, [RemoteId, PurchaseStatus]>();
  getSuppliers = jest.fn<Promise<RemoteSupplier[]>, [term?: string]>(async () => []);
  getProducts = jest.fn<Promise<RemoteProduct[]>, [term?: string]>(async () => []);
  getLocations = jest.fn<Promise<RemoteLocation[]>, []>(async () => []);
}

export interface TestEngine extends PurchaseEngine {
  remote: MockRemote;
  connectivity: SwitchableConnectivity;
  auth: StaticTokenAuthProvider;
}

/** Engine over an in-memory database with a scripted remote. */
export function createTestEngine(options: { now?: () => Date } = {}): TestEngine {
  const remote = new MockRemote();
  const connectivity = new SwitchableConnectivity(true);
  const auth = new StaticTokenAuthProvider('test-token');
  const engine = createPurchaseEngine({ dbPath: ':memory:', remote, connectivity, auth, now: options.now });
  return { ...engine, remote, connectivity, auth };
}

export function sampleLine(overrides: Partial<PurchaseLineInput> = {}): PurchaseLineInput {
  return {
    productId: 11,
    variationId: 111,
    quantity: 10,
    unitPrice: 12.5,
    lineDiscountAmount: 0,
    lineDiscountType: 'fixed',
    itemTaxId: null,
    itemTax: 0,
    subUnitId: null,
    lotNumber: null,
    mfgDate: null,
    expDate: null,
    purchaseOrderLineId: null,
    purchaseRequisitionLineId: null,
    ...overrides,
  };
}

export function sampleHeader(overrides: Partial<PurchaseHeaderInput> = {}): PurchaseHeaderInput {
  return {
    contactId: 7,
    locationId: 1,
    refNo: 'PO-1001',
    status: 'ordered',
    transactionDate: '2024-05-01 10:00:00',
    totalBeforeTax: 225,
    discountAmount: 0,
    discountType: 'fixed',
    taxId: null,
    taxAmount: 0,
    shippingCharges: 0,
    shippingDetails: null,
    finalTotal: 225,
    additionalNotes: null,
    ...overrides,
  };
}

/** PO-1001: 10 units at 12.50 and 5 units at 20.00. */
export function samplePurchaseInput(overrides: Partial<NewPurchaseInput> = {}): NewPurchaseInput {
  return {
    contactId: 7,
    locationId: 1,
    refNo: 'PO-1001',
    transactionDate: '2024-05-01 10:00:00',
    totalBeforeTax: 225,
    finalTotal: 225,
    lines: [
      { productId: 11, variationId: 111, quantity: 10, unitPrice: 12.5 },
      { productId: 12, variationId: 121, quantity: 5, unitPrice: 20 },
    ],
    ...overrides,
  };
}

export function remotePurchase(id: RemoteId, overrides: Partial<RemotePurchase> = {}): RemotePurchase {
  return {
    id,
    contactId: 7,
    locationId: 1,
    refNo: `REF-${id}`,
    status: 'received',
    paymentStatus: 'due',
    transactionDate: '2024-05-01 10:00:00',
    finalTotal: 100,
    supplierName: null,
    extra: {},
    ...overrides,
  };
}

export function remotePage(items: RemotePurchase[], meta: Partial<Omit<RemotePurchasePage, 'items'>> = {}): RemotePurchasePage {
  return {
    items,
    currentPage: 1,
    lastPage: 1,
    perPage: 20,
    total: items.length,
    ...meta,
  };
}

export interface RecordedRequest {
  method: string;
  url: string;
  params: unknown;
  data: unknown;
  headers: Record<string, unknown>;
}

export type FakeRoute = (request: RecordedRequest) => { status: number; data: unknown };

/**
 * In-process axios transport. Statuses of 400 and above reject the way the
 * real http adapter does.
 */
export function fakeAdapter(route: FakeRoute, requests: RecordedRequest[] = []): AxiosAdapter {
  return async (config: InternalAxiosRequestConfig) => {
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      params: config.params,
      data: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
      headers: config.headers.toJSON(),
    };
    requests.push(request);
    const { status, data } = route(request);
    const response: AxiosResponse<unknown> = {
      data,
      status,
      statusText: String(status),
      headers: {},
      config,
    };
    if (status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${status}`,
        status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
        config,
        null,
        response
      );
    }
    return response;
  };
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
