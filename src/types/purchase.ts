export const PURCHASE_STATUSES = ['ordered', 'pending', 'partial', 'received', 'cancelled'] as const;
export type PurchaseStatus = (typeof PURCHASE_STATUSES)[number];

export const DISCOUNT_TYPES = ['fixed', 'percentage'] as const;
export type DiscountType = (typeof DISCOUNT_TYPES)[number];

/** Identifier assigned by the remote service. */
export type RemoteId = number;

export interface PurchaseHeader {
  id: number;
  transactionId: RemoteId | null;
  contactId: number;
  locationId: number;
  refNo: string | null;
  status: PurchaseStatus;
  transactionDate: string;
  totalBeforeTax: number;
  discountAmount: number;
  discountType: DiscountType;
  taxId: number | null;
  taxAmount: number;
  shippingCharges: number;
  shippingDetails: string | null;
  finalTotal: number;
  additionalNotes: string | null;
  isSynced: boolean;
  /** Bumped by every local write to the header, its lines or its payments. */
  revision: number;
}

export type PurchaseHeaderInput = Omit<PurchaseHeader, 'id' | 'transactionId' | 'isSynced' | 'revision'>;
export type PurchaseHeaderPatch = Partial<PurchaseHeaderInput>;

export interface PurchaseLine {
  id: number;
  purchaseId: number;
  productId: number;
  variationId: number;
  quantity: number;
  unitPrice: number;
  lineDiscountAmount: number;
  lineDiscountType: DiscountType;
  itemTaxId: number | null;
  itemTax: number;
  subUnitId: number | null;
  lotNumber: string | null;
  mfgDate: string | null;
  expDate: string | null;
  purchaseOrderLineId: number | null;
  purchaseRequisitionLineId: number | null;
}

export type PurchaseLineInput = Omit<PurchaseLine, 'id' | 'purchaseId'>;

export interface PurchasePayment {
  id: number;
  purchaseId: number;
  paymentId: RemoteId | null;
  method: string;
  amount: number;
  note: string | null;
  accountId: number | null;
  paidOn: string | null;
}

export type PurchasePaymentInput = Omit<PurchasePayment, 'id' | 'purchaseId'>;

export interface PurchaseRecord {
  header: PurchaseHeader;
  lines: PurchaseLine[];
  payments: PurchasePayment[];
}

export type ReferenceEntity = 'suppliers' | 'products' | 'locations';
export const REFERENCE_ENTITIES: readonly ReferenceEntity[] = ['suppliers', 'products', 'locations'];

export interface CachedSupplier {
  id: number;
  name: string;
  businessName: string | null;
  contactId: string | null;
  mobile: string | null;
  addressLine1: string | null;
  city: string | null;
  state: string | null;
  country: string | null;
  zipCode: string | null;
  payTermType: string | null;
  payTermNumber: number | null;
  balance: number;
  lastSync: string;
}

export interface CachedProduct {
  productId: number;
  productName: string;
  productType: string | null;
  variationId: number | null;
  variationName: string | null;
  subSku: string | null;
  defaultPurchasePrice: number;
  lastSync: string;
}

export interface CachedLocation {
  id: number;
  name: string;
  locationId: string | null;
  address: string | null;
  city: string | null;
  state: string | null;
  country: string | null;
  zipCode: string | null;
  lastSync: string;
}

export type SyncState = 'synced' | 'pending';

/** One row of the merged purchase list. */
export interface PurchaseView {
  key: string;
  origin: 'remote' | 'local';
  localId: number | null;
  transactionId: RemoteId | null;
  syncState: SyncState;
  contactId: number | null;
  supplierName: string | null;
  locationId: number | null;
  refNo: string | null;
  status: string | null;
  paymentStatus: string | null;
  transactionDate: string | null;
  finalTotal: number | null;
}
