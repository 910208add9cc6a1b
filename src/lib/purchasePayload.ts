import type {
  RemotePaymentPayload,
  RemotePurchaseLinePayload,
  RemotePurchasePayload,
} from '../services/PurchaseApiClient';
import type { PurchaseHeader, PurchaseLine, PurchasePayment } from '../types/purchase';

function round(value: number): number {
  return Math.round(value * 10000) / 10000;
}

export function toLinePayload(line: PurchaseLine): RemotePurchaseLinePayload {
  const fixedDiscount = line.lineDiscountType === 'fixed' ? line.lineDiscountAmount : 0;
  const netPrice = round(Math.max(0, line.unitPrice - fixedDiscount));
  return {
    product_id: line.productId,
    variation_id: line.variationId,
    quantity: line.quantity,
    unit_price: line.unitPrice,
    pp_without_discount: line.unitPrice,
    purchase_price: netPrice,
    purchase_price_inc_tax: netPrice,
    discount_percent: line.lineDiscountType === 'percentage' ? line.lineDiscountAmount : 0,
    line_discount_amount: line.lineDiscountAmount,
    line_discount_type: line.lineDiscountType,
    item_tax_id: line.itemTaxId,
    item_tax: line.itemTax,
    sub_unit_id: line.subUnitId,
    lot_number: line.lotNumber,
    mfg_date: line.mfgDate,
    exp_date: line.expDate,
    purchase_order_line_id: line.purchaseOrderLineId,
    purchase_requisition_line_id: line.purchaseRequisitionLineId,
  };
}

export function toPaymentPayload(payment: PurchasePayment): RemotePaymentPayload {
  return {
    amount: payment.amount,
    method: payment.method,
    note: payment.note,
    account_id: payment.accountId,
    paid_on: payment.paidOn,
  };
}

/** Header fields plus `purchases`; `payments` only when there are any. */
export function buildPurchasePayload(
  header: PurchaseHeader,
  lines: readonly PurchaseLine[],
  payments: readonly PurchasePayment[]
): RemotePurchasePayload {
  const payload: RemotePurchasePayload = {
    contact_id: header.contactId,
    location_id: header.locationId,
    ref_no: header.refNo,
    status: header.status,
    transaction_date: header.transactionDate,
    total_before_tax: header.totalBeforeTax,
    discount_amount: header.discountAmount,
    discount_type: header.discountType,
    tax_id: header.taxId,
    tax_amount: header.taxAmount,
    shipping_charges: header.shippingCharges,
    shipping_details: header.shippingDetails,
    final_total: header.finalTotal,
    additional_notes: header.additionalNotes,
    purchases: lines.map(toLinePayload),
  };
  if (payments.length > 0) {
    payload.payments = payments.map(toPaymentPayload);
  }
  return payload;
}
