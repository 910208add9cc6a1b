import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import type { ZodType, ZodTypeDef } from 'zod';
import { isRecord } from '../lib/remoteIdentifier';
import { classifyApiError, MalformedResponse, RequestFailure } from '../lib/syncErrors';
import {
  PurchasePageEnvelope,
  ReferenceListEnvelope,
  RemoteLocation,
  RemoteProduct,
  RemotePurchase,
  RemoteSupplier,
} from '../schema/purchaseSchemas';
import type { PurchaseStatus, RemoteId } from '../types/purchase';
import { logger } from '../utils/logger';
import type { AuthProvider } from './connectivity';

export interface RemotePurchaseLinePayload {
  product_id: number;
  variation_id: number;
  quantity: number;
  unit_price: number;
  pp_without_discount: number;
  purchase_price: number;
  purchase_price_inc_tax: number;
  discount_percent: number;
  line_discount_amount: number;
  line_discount_type: string;
  item_tax_id: number | null;
  item_tax: number;
  sub_unit_id: number | null;
  lot_number: string | null;
  mfg_date: string | null;
  exp_date: string | null;
  purchase_order_line_id: number | null;
  purchase_requisition_line_id: number | null;
}

export interface RemotePaymentPayload {
  amount: number;
  method: string;
  note: string | null;
  account_id: number | null;
  paid_on: string | null;
}

export interface RemotePurchasePayload {
  contact_id: number;
  location_id: number;
  ref_no: string | null;
  status: PurchaseStatus;
  transaction_date: string;
  total_before_tax: number;
  discount_amount: number;
  discount_type: string;
  tax_id: number | null;
  tax_amount: number;
  shipping_charges: number;
  shipping_details: string | null;
  final_total: number;
  additional_notes: string | null;
  purchases: RemotePurchaseLinePayload[];
  payments?: RemotePaymentPayload[];
}

export interface RemotePurchaseFilters {
  supplierId?: number;
  locationId?: number;
  status?: string;
  paymentStatus?: string;
  startDate?: string;
  endDate?: string;
  refNo?: string;
  page?: number;
  perPage?: number;
  orderBy?: string;
  orderDirection?: 'asc' | 'desc';
}

export interface RemotePurchasePage {
  items: RemotePurchase[];
  currentPage: number;
  lastPage: number;
  perPage: number;
  total: number;
}

/** Everything the sync, cache and list services need from the remote. */
export interface PurchaseRemote {
  createPurchase(payload: RemotePurchasePayload): Promise<unknown>;
  updatePurchase(transactionId: RemoteId, payload: RemotePurchasePayload): Promise<unknown>;
  listPurchases(filters?: RemotePurchaseFilters): Promise<RemotePurchasePage>;
  getPurchase(transactionId: RemoteId): Promise<RemotePurchase>;
  getPurchasesByIds(transactionIds: readonly RemoteId[]): Promise<RemotePurchase[]>;
  deletePurchase(transactionId: RemoteId): Promise<void>;
  updatePurchaseStatus(transactionId: RemoteId, status: PurchaseStatus): Promise<void>;
  getSuppliers(term?: string): Promise<RemoteSupplier[]>;
  getProducts(term?: string): Promise<RemoteProduct[]>;
  getLocations(): Promise<RemoteLocation[]>;
}

export interface PurchaseApiClientOptions {
  baseUrl: string;
  apiPrefix: string;
  timeoutMs: number;
  pageSize: number;
  auth: AuthProvider;
  adapter?: AxiosAdapter;
}

function parseRows<T>(label: string, rows: readonly unknown[], schema: ZodType<T, ZodTypeDef, unknown>): T[] {
  const parsed: T[] = [];
  let skipped = 0;
  for (const row of rows) {
    const result = schema.safeParse(row);
    if (result.success) {
      parsed.push(result.data);
    } else {
      skipped += 1;
    }
  }
  if (skipped > 0) {
    logger.warn('Skipped unreadable rows in remote response', { endpoint: label, skipped, kept: parsed.length });
  }
  return parsed;
}

function messageOf(body: Record<string, unknown>): string | null {
  for (const key of ['msg', 'message']) {
    const value = body[key];
    if (typeof value === 'string' && value.trim()) return value;
  }
  return null;
}

/** Some endpoints answer 200 with `{success: false, msg}` instead of an error status. */
function assertAccepted(response: AxiosResponse<unknown>): unknown {
  const body = response.data;
  if (isRecord(body) && body.success === false) {
    throw new RequestFailure(messageOf(body) ?? 'Request was rejected', response.status);
  }
  return body;
}

// GET /purchase/{id} answers with the row, {data: row} or {data: [row]}.
function unwrapSingle(body: unknown): unknown {
  if (!isRecord(body)) return body;
  const data = body.data;
  if (Array.isArray(data)) return data[0];
  if (isRecord(data)) return data;
  return body;
}

function unwrapMany(body: unknown): unknown[] {
  if (Array.isArray(body)) return body;
  if (isRecord(body)) {
    if (Array.isArray(body.data)) return body.data;
    if (isRecord(body.data)) return [body.data];
  }
  throw new MalformedResponse('Expected a list of purchases');
}

export class PurchaseApiClient implements PurchaseRemote {
  private readonly http: AxiosInstance;

  constructor(private readonly options: PurchaseApiClientOptions) {
    this.http = axios.create({
      baseURL: `${options.baseUrl}${options.apiPrefix}`,
      timeout: options.timeoutMs,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });

    this.http.interceptors.request.use(async (config) => {
      const token = await options.auth.getToken();
      if (token) {
        config.headers.Authorization = `Bearer ${token}`;
      }
      config.headers['Content-Type'] = 'application/json';
      config.headers.Accept = 'application/json';
      return config;
    });

    this.http.interceptors.response.use(
      (response) => {
        logger.debug('Purchase API response', {
          method: response.config.method,
          url: response.config.url,
          status: response.status,
        });
        return response;
      },
      (error: unknown) => {
        const classified = classifyApiError(error);
        if (classified) {
          logger.warn('Purchase API request failed', {
            url: axios.isAxiosError(error) ? error.config?.url : undefined,
            kind: classified.kind,
            statusCode: classified.statusCode,
            detail: classified.message,
          });
        }
        return Promise.reject(classified ?? error);
      }
    );
  }

  async createPurchase(payload: RemotePurchasePayload): Promise<unknown> {
    const response = await this.http.post<unknown>('/purchase', payload);
    return assertAccepted(response);
  }

  async updatePurchase(transactionId: RemoteId, payload: RemotePurchasePayload): Promise<unknown> {
    const response = await this.http.put<unknown>(`/purchase/${transactionId}`, payload);
    return assertAccepted(response);
  }

  async listPurchases(filters: RemotePurchaseFilters = {}): Promise<RemotePurchasePage> {
    const page = filters.page ?? 1;
    const perPage = filters.perPage ?? this.options.pageSize;
    const params: Record<string, string | number> = {
      page,
      per_page: perPage,
      order_by: filters.orderBy ?? 'transaction_date',
      order_direction: filters.orderDirection ?? 'desc',
    };
    if (filters.supplierId !== undefined) params.contact_id = filters.supplierId;
    if (filters.locationId !== undefined) params.location_id = filters.locationId;
    if (filters.status) params.status = filters.status;
    if (filters.paymentStatus) params.payment_status = filters.paymentStatus;
    if (filters.startDate) params.start_date = filters.startDate;
    if (filters.endDate) params.end_date = filters.endDate;
    if (filters.refNo) params.ref_no = filters.refNo;

    const response = await this.http.get<unknown>('/purchase', { params });
    const envelope = PurchasePageEnvelope.safeParse(assertAccepted(response));
    if (!envelope.success) {
      throw new MalformedResponse('Unexpected purchase list shape', response.status);
    }

    const items = parseRows('GET /purchase', envelope.data.data, RemotePurchase);
    return {
      items,
      currentPage: envelope.data.current_page ?? page,
      lastPage: envelope.data.last_page ?? page,
      perPage: envelope.data.per_page ?? perPage,
      total: envelope.data.total ?? items.length,
    };
  }

  async getPurchase(transactionId: RemoteId): Promise<RemotePurchase> {
    const response = await this.http.get<unknown>(`/purchase/${transactionId}`);
    const parsed = RemotePurchase.safeParse(unwrapSingle(assertAccepted(response)));
    if (!parsed.success) {
      throw new MalformedResponse(`Unexpected shape for purchase ${transactionId}`, response.status);
    }
    return parsed.data;
  }

  async getPurchasesByIds(transactionIds: readonly RemoteId[]): Promise<RemotePurchase[]> {
    if (transactionIds.length === 0) return [];
    const response = await this.http.get<unknown>(`/purchase/${transactionIds.join(',')}`);
    return parseRows('GET /purchase/{ids}', unwrapMany(assertAccepted(response)), RemotePurchase);
  }

  async deletePurchase(transactionId: RemoteId): Promise<void> {
    const response = await this.http.delete<unknown>(`/purchase/${transactionId}`);
    assertAccepted(response);
  }

  async updatePurchaseStatus(transactionId: RemoteId, status: PurchaseStatus): Promise<void> {
    const response = await this.http.post<unknown>(`/purchase/${transactionId}/status`, { status });
    assertAccepted(response);
  }

  async getSuppliers(term?: string): Promise<RemoteSupplier[]> {
    return this.getReferenceList('/purchase/suppliers', RemoteSupplier, term);
  }

  async getProducts(term?: string): Promise<RemoteProduct[]> {
    return this.getReferenceList('/purchase/products', RemoteProduct, term);
  }

  async getLocations(): Promise<RemoteLocation[]> {
    return this.getReferenceList('/business-location', RemoteLocation);
  }

  private async getReferenceList<T>(
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    term?: string
  ): Promise<T[]> {
    const params = term && term.trim() ? { term: term.trim() } : undefined;
    const response = await this.http.get<unknown>(path, { params });
    const envelope = ReferenceListEnvelope.safeParse(assertAccepted(response));
    if (!envelope.success) {
      throw new MalformedResponse(`Unexpected list shape from ${path}`, response.status);
    }
    return parseRows(`GET ${path}`, envelope.data, schema);
  }
}
