import { z } from 'zod';
import { DISCOUNT_TYPES, PURCHASE_STATUSES } from '../types/purchase';

// The remote API serializes numbers inconsistently ("12.50" vs 12.5).
const Numeric = z.union([
  z.number().finite(),
  z
    .string()
    .trim()
    .regex(/^-?\d+(\.\d+)?$/)
    .transform(Number),
]);

const Text = z.union([z.string(), z.number()]).transform((value) => String(value));

const optionalText = Text.nullish().transform((value) => {
  if (value == null) return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
});

const optionalNumber = Numeric.nullish().transform((value) => value ?? null);

// Same rule as the ids the sync path accepts from create/update answers.
const RemoteIdValue = Numeric.pipe(z.number().int().positive().safe());

// ---------------------------------------------------------------------------
// Remote reference rows
// ---------------------------------------------------------------------------

export const RemoteSupplier = z
  .object({
    id: Numeric,
    text: optionalText,
    name: optionalText,
    business_name: optionalText,
    supplier_business_name: optionalText,
    contact_id: optionalText,
    mobile: optionalText,
    address_line_1: optionalText,
    city: optionalText,
    state: optionalText,
    country: optionalText,
    zip_code: optionalText,
    pay_term_type: optionalText,
    pay_term_number: optionalNumber,
    balance: optionalNumber,
  })
  .passthrough()
  .transform((raw, ctx) => {
    const businessName = raw.business_name ?? raw.supplier_business_name;
    const name = raw.text ?? raw.name ?? businessName;
    if (!name) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Supplier has no display name', path: ['name'] });
      return z.NEVER;
    }
    return {
      id: raw.id,
      name,
      businessName,
      contactId: raw.contact_id,
      mobile: raw.mobile,
      addressLine1: raw.address_line_1,
      city: raw.city,
      state: raw.state,
      country: raw.country,
      zipCode: raw.zip_code,
      payTermType: raw.pay_term_type,
      payTermNumber: raw.pay_term_number,
      balance: raw.balance ?? 0,
    };
  });

export const RemoteProduct = z
  .object({
    product_id: Numeric,
    product_name: optionalText,
    name: optionalText,
    product_type: optionalText,
    type: optionalText,
    variation_id: optionalNumber,
    variation_name: optionalText,
    sub_sku: optionalText,
    default_purchase_price: optionalNumber,
  })
  .passthrough()
  .transform((raw, ctx) => {
    const productName = raw.product_name ?? raw.name;
    if (!productName) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Product has no name', path: ['product_name'] });
      return z.NEVER;
    }
    return {
      productId: raw.product_id,
      productName,
      productType: raw.product_type ?? raw.type,
      variationId: raw.variation_id,
      variationName: raw.variation_name,
      subSku: raw.sub_sku,
      defaultPurchasePrice: raw.default_purchase_price ?? 0,
    };
  });

export const RemoteLocation = z
  .object({
    id: Numeric,
    name: Text.transform((value) => value.trim()).pipe(z.string().min(1)),
    location_id: optionalText,
    address: optionalText,
    landmark: optionalText,
    city: optionalText,
    state: optionalText,
    country: optionalText,
    zip_code: optionalText,
  })
  .passthrough()
  .transform((raw) => ({
    id: raw.id,
    name: raw.name,
    locationId: raw.location_id,
    address: raw.address ?? raw.landmark,
    city: raw.city,
    state: raw.state,
    country: raw.country,
    zipCode: raw.zip_code,
  }));

export type RemoteSupplier = z.output<typeof RemoteSupplier>;
export type RemoteProduct = z.output<typeof RemoteProduct>;
export type RemoteLocation = z.output<typeof RemoteLocation>;

// Reference endpoints answer with a bare array, {data: [...]} or {results: [...]}.
export const ReferenceListEnvelope = z.union([
  z.array(z.unknown()),
  z.object({ data: z.array(z.unknown()) }).passthrough().transform((body) => body.data),
  z.object({ results: z.array(z.unknown()) }).passthrough().transform((body) => body.results),
]);

// ---------------------------------------------------------------------------
// Remote purchases
// ---------------------------------------------------------------------------

const RemoteContact = z
  .object({
    name: optionalText,
    supplier_business_name: optionalText,
  })
  .passthrough();

export const RemotePurchase = z
  .object({
    id: RemoteIdValue,
    contact_id: optionalNumber,
    location_id: optionalNumber,
    ref_no: optionalText,
    status: optionalText,
    payment_status: optionalText,
    transaction_date: optionalText,
    final_total: optionalNumber,
    contact: RemoteContact.nullish(),
  })
  .passthrough()
  .transform(({ id, contact_id, location_id, ref_no, status, payment_status, transaction_date, final_total, contact, ...rest }) => ({
    id,
    contactId: contact_id,
    locationId: location_id,
    refNo: ref_no,
    status,
    paymentStatus: payment_status,
    transactionDate: transaction_date,
    finalTotal: final_total,
    supplierName: contact?.supplier_business_name ?? contact?.name ?? null,
    extra: rest,
  }));

export type RemotePurchase = z.output<typeof RemotePurchase>;

const PageMeta = {
  current_page: Numeric.optional(),
  last_page: Numeric.optional(),
  per_page: Numeric.optional(),
  total: Numeric.optional(),
};

const FlatPageEnvelope = z.object({ data: z.array(z.unknown()), ...PageMeta }).passthrough();

// {data: [...], current_page, ...} or {success, data: {data: [...], current_page, ...}}
export const PurchasePageEnvelope = z.union([
  FlatPageEnvelope,
  z
    .object({ data: FlatPageEnvelope })
    .passthrough()
    .transform((body) => body.data),
  z.array(z.unknown()).transform((items) => ({
    data: items,
    current_page: undefined,
    last_page: undefined,
    per_page: undefined,
    total: undefined,
  })),
]);

export const RemotePaymentLine = z
  .object({
    id: optionalNumber,
    amount: Numeric,
    method: optionalText,
    note: optionalText,
    paid_on: optionalText,
    account_id: optionalNumber,
  })
  .passthrough()
  .transform((raw) => ({
    paymentId: raw.id,
    amount: raw.amount,
    method: raw.method ?? 'cash',
    note: raw.note,
    paidOn: raw.paid_on,
    accountId: raw.account_id,
  }));

// ---------------------------------------------------------------------------
// Local input
// ---------------------------------------------------------------------------

const Id = z.number().int().positive();
const Money = z.number().finite().nonnegative();
const DateText = z.string().trim().min(1);

export const PurchaseLineIn = z
  .object({
    productId: Id,
    variationId: Id,
    quantity: z.number().finite().nonnegative(),
    unitPrice: Money,
    lineDiscountAmount: Money.default(0),
    lineDiscountType: z.enum(DISCOUNT_TYPES).default('fixed'),
    itemTaxId: Id.nullable().default(null),
    itemTax: Money.default(0),
    subUnitId: Id.nullable().default(null),
    lotNumber: z.string().nullable().default(null),
    mfgDate: DateText.nullable().default(null),
    expDate: DateText.nullable().default(null),
    purchaseOrderLineId: Id.nullable().default(null),
    purchaseRequisitionLineId: Id.nullable().default(null),
  })
  .strict();

export const PurchasePaymentIn = z
  .object({
    method: z.string().trim().min(1).default('cash'),
    amount: Money,
    note: z.string().nullable().default(null),
    accountId: Id.nullable().default(null),
    paidOn: DateText.nullable().default(null),
    paymentId: Id.nullable().default(null),
  })
  .strict();

const headerShape = {
  contactId: Id,
  locationId: Id,
  refNo: z.string().trim().max(255).nullable(),
  status: z.enum(PURCHASE_STATUSES),
  transactionDate: DateText,
  totalBeforeTax: Money,
  discountAmount: Money,
  discountType: z.enum(DISCOUNT_TYPES),
  taxId: Id.nullable(),
  taxAmount: Money,
  shippingCharges: Money,
  shippingDetails: z.string().nullable(),
  finalTotal: Money,
  additionalNotes: z.string().nullable(),
};

export const PurchaseHeaderPatchIn = z.object(headerShape).partial().strict();

export const NewPurchaseIn = z
  .object({
    ...headerShape,
    refNo: headerShape.refNo.default(null),
    status: headerShape.status.default('ordered'),
    transactionDate: DateText.optional(),
    totalBeforeTax: Money.default(0),
    discountAmount: Money.default(0),
    discountType: headerShape.discountType.default('fixed'),
    taxId: headerShape.taxId.default(null),
    taxAmount: Money.default(0),
    shippingCharges: Money.default(0),
    shippingDetails: headerShape.shippingDetails.default(null),
    finalTotal: Money.default(0),
    additionalNotes: headerShape.additionalNotes.default(null),
    lines: z.array(PurchaseLineIn).min(1, 'A purchase needs at least one line'),
    payments: z.array(PurchasePaymentIn).default([]),
  })
  .strict();

export const PurchaseEditIn = z
  .object({
    header: PurchaseHeaderPatchIn.optional(),
    lines: z.array(PurchaseLineIn).min(1, 'A purchase needs at least one line').optional(),
    payments: z.array(PurchasePaymentIn).optional(),
  })
  .strict();

export type NewPurchaseInput = z.input<typeof NewPurchaseIn>;
export type NewPurchase = z.output<typeof NewPurchaseIn>;
export type PurchaseEditInput = z.input<typeof PurchaseEditIn>;
export type PurchaseLineInputRaw = z.input<typeof PurchaseLineIn>;
export type PurchasePaymentInputRaw = z.input<typeof PurchasePaymentIn>;
