import type { SqliteDatabase } from '../db';
import { SerialQueue } from '../lib/serialQueue';
import {
  DISCOUNT_TYPES,
  PURCHASE_STATUSES,
  type DiscountType,
  type PurchaseHeader,
  type PurchaseHeaderInput,
  type PurchaseHeaderPatch,
  type PurchaseLine,
  type PurchaseLineInput,
  type PurchasePayment,
  type PurchasePaymentInput,
  type PurchaseStatus,
  type RemoteId,
} from '../types/purchase';

interface PurchaseRow {
  id: number;
  transaction_id: number | null;
  contact_id: number;
  location_id: number;
  ref_no: string | null;
  status: string | null;
  transaction_date: string | null;
  total_before_tax: number | null;
  discount_amount: number | null;
  discount_type: string | null;
  tax_id: number | null;
  tax_amount: number | null;
  shipping_charges: number | null;
  shipping_details: string | null;
  final_total: number | null;
  additional_notes: string | null;
  is_synced: number | null;
  revision: number | null;
}

type PurchaseColumns = Omit<PurchaseRow, 'id' | 'transaction_id' | 'is_synced' | 'revision'>;

interface PurchaseLineRow {
  id: number;
  purchase_id: number;
  product_id: number;
  variation_id: number;
  quantity: number | null;
  unit_price: number | null;
  line_discount_amount: number | null;
  line_discount_type: string | null;
  item_tax_id: number | null;
  item_tax: number | null;
  sub_unit_id: number | null;
  lot_number: string | null;
  mfg_date: string | null;
  exp_date: string | null;
  purchase_order_line_id: number | null;
  purchase_requisition_line_id: number | null;
}

type PurchaseLineColumns = Omit<PurchaseLineRow, 'id'>;

interface PurchasePaymentRow {
  id: number;
  purchase_id: number;
  payment_id: number | null;
  method: string | null;
  amount: number | null;
  note: string | null;
  account_id: number | null;
  paid_on: string | null;
}

type PurchasePaymentColumns = Omit<PurchasePaymentRow, 'id'>;

const HEADER_COLUMN_MAP: { [K in keyof PurchaseHeaderInput]-?: keyof PurchaseColumns } = {
  contactId: 'contact_id',
  locationId: 'location_id',
  refNo: 'ref_no',
  status: 'status',
  transactionDate: 'transaction_date',
  totalBeforeTax: 'total_before_tax',
  discountAmount: 'discount_amount',
  discountType: 'discount_type',
  taxId: 'tax_id',
  taxAmount: 'tax_amount',
  shippingCharges: 'shipping_charges',
  shippingDetails: 'shipping_details',
  finalTotal: 'final_total',
  additionalNotes: 'additional_notes',
};

function isStatus(value: string | null): value is PurchaseStatus {
  return PURCHASE_STATUSES.some((status) => status === value);
}

function toDiscountType(value: string | null): DiscountType {
  return DISCOUNT_TYPES.find((type) => type === value) ?? 'fixed';
}

function toHeader(row: PurchaseRow): PurchaseHeader {
  return {
    id: row.id,
    transactionId: row.transaction_id,
    contactId: row.contact_id,
    locationId: row.location_id,
    refNo: row.ref_no,
    status: isStatus(row.status) ? row.status : 'ordered',
    transactionDate: row.transaction_date ?? '',
    totalBeforeTax: row.total_before_tax ?? 0,
    discountAmount: row.discount_amount ?? 0,
    discountType: toDiscountType(row.discount_type),
    taxId: row.tax_id,
    taxAmount: row.tax_amount ?? 0,
    shippingCharges: row.shipping_charges ?? 0,
    shippingDetails: row.shipping_details,
    finalTotal: row.final_total ?? 0,
    additionalNotes: row.additional_notes,
    isSynced: row.is_synced === 1 && row.transaction_id !== null,
    revision: row.revision ?? 0,
  };
}

function toHeaderColumns(header: PurchaseHeaderInput): PurchaseColumns {
  return {
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
  };
}

function toLine(row: PurchaseLineRow): PurchaseLine {
  return {
    id: row.id,
    purchaseId: row.purchase_id,
    productId: row.product_id,
    variationId: row.variation_id,
    quantity: row.quantity ?? 0,
    unitPrice: row.unit_price ?? 0,
    lineDiscountAmount: row.line_discount_amount ?? 0,
    lineDiscountType: toDiscountType(row.line_discount_type),
    itemTaxId: row.item_tax_id,
    itemTax: row.item_tax ?? 0,
    subUnitId: row.sub_unit_id,
    lotNumber: row.lot_number,
    mfgDate: row.mfg_date,
    expDate: row.exp_date,
    purchaseOrderLineId: row.purchase_order_line_id,
    purchaseRequisitionLineId: row.purchase_requisition_line_id,
  };
}

function toLineColumns(purchaseId: number, line: PurchaseLineInput): PurchaseLineColumns {
  return {
    purchase_id: purchaseId,
    product_id: line.productId,
    variation_id: line.variationId,
    quantity: line.quantity,
    unit_price: line.unitPrice,
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

function toPayment(row: PurchasePaymentRow): PurchasePayment {
  return {
    id: row.id,
    purchaseId: row.purchase_id,
    paymentId: row.payment_id,
    method: row.method ?? 'cash',
    amount: row.amount ?? 0,
    note: row.note,
    accountId: row.account_id,
    paidOn: row.paid_on,
  };
}

function toPaymentColumns(purchaseId: number, payment: PurchasePaymentInput): PurchasePaymentColumns {
  return {
    purchase_id: purchaseId,
    payment_id: payment.paymentId,
    method: payment.method,
    amount: payment.amount,
    note: payment.note,
    account_id: payment.accountId,
    paid_on: payment.paidOn,
  };
}

const INSERT_PURCHASE = `
  INSERT INTO purchase (
    contact_id, location_id, ref_no, status, transaction_date, total_before_tax,
    discount_amount, discount_type, tax_id, tax_amount, shipping_charges,
    shipping_details, final_total, additional_notes, is_synced, transaction_id
  ) VALUES (
    @contact_id, @location_id, @ref_no, @status, @transaction_date, @total_before_tax,
    @discount_amount, @discount_type, @tax_id, @tax_amount, @shipping_charges,
    @shipping_details, @final_total, @additional_notes, 0, NULL
  )`;

const INSERT_LINE = `
  INSERT INTO purchase_lines (
    purchase_id, product_id, variation_id, quantity, unit_price, line_discount_amount,
    line_discount_type, item_tax_id, item_tax, sub_unit_id, lot_number, mfg_date,
    exp_date, purchase_order_line_id, purchase_requisition_line_id
  ) VALUES (
    @purchase_id, @product_id, @variation_id, @quantity, @unit_price, @line_discount_amount,
    @line_discount_type, @item_tax_id, @item_tax, @sub_unit_id, @lot_number, @mfg_date,
    @exp_date, @purchase_order_line_id, @purchase_requisition_line_id
  )`;

const INSERT_PAYMENT = `
  INSERT INTO purchase_payments (purchase_id, payment_id, method, amount, note, account_id, paid_on)
  VALUES (@purchase_id, @payment_id, @method, @amount, @note, @account_id, @paid_on)`;

/** `changed`: a local write landed during the push, so the header stays queued. */
export type MarkSyncedResult = 'synced' | 'changed' | 'missing';

export interface PurchaseEdits {
  header?: PurchaseHeaderPatch;
  lines?: readonly PurchaseLineInput[];
  payments?: readonly PurchasePaymentInput[];
}

/**
 * Local purchase headers with their lines and payments. Every mutation is
 * queued on the shared write queue and runs inside a SQLite transaction.
 */
export class PurchaseStore {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly writes: SerialQueue = new SerialQueue()
  ) {}

  // -- writes on the header -------------------------------------------------

  createPurchase(
    header: PurchaseHeaderInput,
    lines: readonly PurchaseLineInput[],
    payments: readonly PurchasePaymentInput[] = []
  ): Promise<number> {
    return this.writes.run(() =>
      this.db.transaction(() => {
        const result = this.db.prepare<PurchaseColumns>(INSERT_PURCHASE).run(toHeaderColumns(header));
        const purchaseId = Number(result.lastInsertRowid);
        this.insertLines(purchaseId, lines);
        this.insertPayments(purchaseId, payments);
        return purchaseId;
      })()
    );
  }

  /**
   * Applies local edits and flips the header back to unsynced. The remote id
   * is left alone. Resolves false when the header does not exist.
   */
  updatePurchase(purchaseId: number, edits: PurchaseEdits): Promise<boolean> {
    return this.writes.run(() =>
      this.db.transaction(() => {
        if (!this.headerExists(purchaseId)) return false;
        this.applyHeaderPatch(purchaseId, edits.header ?? {});
        if (edits.lines) {
          this.db.prepare<[number]>('DELETE FROM purchase_lines WHERE purchase_id = ?').run(purchaseId);
          this.insertLines(purchaseId, edits.lines);
        }
        if (edits.payments) {
          this.db.prepare<[number]>('DELETE FROM purchase_payments WHERE purchase_id = ?').run(purchaseId);
          this.insertPayments(purchaseId, edits.payments);
        }
        this.markUnsynced(purchaseId);
        return true;
      })()
    );
  }

  /** Status change the remote already accepted; the sync flag is kept. */
  recordConfirmedStatus(purchaseId: number, status: PurchaseStatus): Promise<boolean> {
    return this.writes.run(() => {
      const result = this.db.prepare<[string, number]>('UPDATE purchase SET status = ? WHERE id = ?').run(status, purchaseId);
      return result.changes > 0;
    });
  }

  /**
   * Records the outcome of a successful push. When `expectedRevision` is given
   * and a local write has landed since it was read, only a missing remote id
   * is filled in and the header stays queued. When `confirmedPayments` is
   * non-empty the local payments are replaced by the remote's copy.
   */
  markSynced(
    purchaseId: number,
    transactionId: RemoteId,
    confirmedPayments: readonly PurchasePaymentInput[] = [],
    expectedRevision?: number
  ): Promise<MarkSyncedResult> {
    return this.writes.run(() =>
      this.db.transaction((): MarkSyncedResult => {
        const current = this.db
          .prepare<[number], { revision: number | null }>('SELECT revision FROM purchase WHERE id = ?')
          .get(purchaseId);
        if (!current) return 'missing';

        if (expectedRevision !== undefined && (current.revision ?? 0) !== expectedRevision) {
          this.db
            .prepare<[RemoteId, number]>('UPDATE purchase SET transaction_id = ? WHERE id = ? AND transaction_id IS NULL')
            .run(transactionId, purchaseId);
          return 'changed';
        }

        this.db
          .prepare<[RemoteId, number]>('UPDATE purchase SET is_synced = 1, transaction_id = ? WHERE id = ?')
          .run(transactionId, purchaseId);
        if (confirmedPayments.length > 0) {
          this.db.prepare<[number]>('DELETE FROM purchase_payments WHERE purchase_id = ?').run(purchaseId);
          this.insertPayments(purchaseId, confirmedPayments);
        }
        return 'synced';
      })()
    );
  }

  /** Removes the header with its lines and payments. */
  deletePurchase(purchaseId: number): Promise<boolean> {
    return this.writes.run(() => this.db.transaction(() => this.cascadeDelete(purchaseId))());
  }

  /** Deletes a synced header only if nothing was written to it since `revision` was read. */
  deleteSyncedPurchase(purchaseId: number, revision: number): Promise<boolean> {
    return this.writes.run(() =>
      this.db.transaction(() => {
        const row = this.db
          .prepare<[number, number], { id: number }>(
            'SELECT id FROM purchase WHERE id = ? AND is_synced = 1 AND transaction_id IS NOT NULL AND revision = ?'
          )
          .get(purchaseId, revision);
        return row ? this.cascadeDelete(purchaseId) : false;
      })()
    );
  }

  deletePurchases(purchaseIds: readonly number[]): Promise<number> {
    return this.writes.run(() =>
      this.db.transaction(() => purchaseIds.filter((purchaseId) => this.cascadeDelete(purchaseId)).length)()
    );
  }

  deleteAllPurchases(): Promise<void> {
    return this.writes.run(() =>
      this.db.transaction(() => {
        this.db.exec('DELETE FROM purchase_lines; DELETE FROM purchase_payments; DELETE FROM purchase;');
      })()
    );
  }

  // -- writes on lines and payments -----------------------------------------

  addLine(purchaseId: number, line: PurchaseLineInput): Promise<number | null> {
    return this.writes.run(() =>
      this.db.transaction(() => {
        if (!this.headerExists(purchaseId)) return null;
        const result = this.db.prepare<PurchaseLineColumns>(INSERT_LINE).run(toLineColumns(purchaseId, line));
        this.markUnsynced(purchaseId);
        return Number(result.lastInsertRowid);
      })()
    );
  }

  updateLine(lineId: number, line: PurchaseLineInput): Promise<boolean> {
    return this.writes.run(() =>
      this.db.transaction(() => {
        const owner = this.lineOwner(lineId);
        if (owner === null) return false;
        this.db
          .prepare<PurchaseLineColumns & { id: number }>(
            `UPDATE purchase_lines SET
               product_id = @product_id, variation_id = @variation_id, quantity = @quantity,
               unit_price = @unit_price, line_discount_amount = @line_discount_amount,
               line_discount_type = @line_discount_type, item_tax_id = @item_tax_id, item_tax = @item_tax,
               sub_unit_id = @sub_unit_id, lot_number = @lot_number, mfg_date = @mfg_date,
               exp_date = @exp_date, purchase_order_line_id = @purchase_order_line_id,
               purchase_requisition_line_id = @purchase_requisition_line_id
             WHERE id = @id AND purchase_id = @purchase_id`
          )
          .run({ ...toLineColumns(owner, line), id: lineId });
        this.markUnsynced(owner);
        return true;
      })()
    );
  }

  deleteLine(lineId: number): Promise<boolean> {
    return this.writes.run(() =>
      this.db.transaction(() => {
        const owner = this.lineOwner(lineId);
        if (owner === null) return false;
        this.db.prepare<[number]>('DELETE FROM purchase_lines WHERE id = ?').run(lineId);
        this.markUnsynced(owner);
        return true;
      })()
    );
  }

  addPayment(purchaseId: number, payment: PurchasePaymentInput): Promise<number | null> {
    return this.writes.run(() =>
      this.db.transaction(() => {
        if (!this.headerExists(purchaseId)) return null;
        const result = this.db.prepare<PurchasePaymentColumns>(INSERT_PAYMENT).run(toPaymentColumns(purchaseId, payment));
        this.markUnsynced(purchaseId);
        return Number(result.lastInsertRowid);
      })()
    );
  }

  deletePayment(paymentRowId: number): Promise<boolean> {
    return this.writes.run(() =>
      this.db.transaction(() => {
        const row = this.db
          .prepare<[number], { purchase_id: number }>('SELECT purchase_id FROM purchase_payments WHERE id = ?')
          .get(paymentRowId);
        if (!row) return false;
        this.db.prepare<[number]>('DELETE FROM purchase_payments WHERE id = ?').run(paymentRowId);
        this.markUnsynced(row.purchase_id);
        return true;
      })()
    );
  }

  // -- reads ----------------------------------------------------------------

  async getPurchase(purchaseId: number): Promise<PurchaseHeader | null> {
    const row = this.db.prepare<[number], PurchaseRow>('SELECT * FROM purchase WHERE id = ?').get(purchaseId);
    return row ? toHeader(row) : null;
  }

  /** Newest first. */
  async listPurchases(): Promise<PurchaseHeader[]> {
    return this.db.prepare<[], PurchaseRow>('SELECT * FROM purchase ORDER BY id DESC').all().map(toHeader);
  }

  /** Oldest first, the order pushes are replayed in. */
  async listUnsynced(): Promise<PurchaseHeader[]> {
    return this.db
      .prepare<[], PurchaseRow>('SELECT * FROM purchase WHERE is_synced = 0 OR is_synced IS NULL OR transaction_id IS NULL ORDER BY id ASC')
      .all()
      .map(toHeader)
      .filter((header) => !header.isSynced);
  }

  async findByTransactionId(transactionId: RemoteId): Promise<PurchaseHeader | null> {
    const row = this.db
      .prepare<[RemoteId], PurchaseRow>('SELECT * FROM purchase WHERE transaction_id = ? ORDER BY id ASC LIMIT 1')
      .get(transactionId);
    return row ? toHeader(row) : null;
  }

  async listTransactionIds(): Promise<RemoteId[]> {
    return this.db
      .prepare<[], { transaction_id: number }>(
        'SELECT DISTINCT transaction_id FROM purchase WHERE transaction_id IS NOT NULL ORDER BY transaction_id ASC'
      )
      .all()
      .map((row) => row.transaction_id);
  }

  async getPurchaseLines(purchaseId: number): Promise<PurchaseLine[]> {
    return this.db
      .prepare<[number], PurchaseLineRow>('SELECT * FROM purchase_lines WHERE purchase_id = ? ORDER BY id ASC')
      .all(purchaseId)
      .map(toLine);
  }

  async getPurchasePayments(purchaseId: number): Promise<PurchasePayment[]> {
    return this.db
      .prepare<[number], PurchasePaymentRow>('SELECT * FROM purchase_payments WHERE purchase_id = ? ORDER BY id ASC')
      .all(purchaseId)
      .map(toPayment);
  }

  async countUnsynced(): Promise<number> {
    const row = this.db
      .prepare<[], { count: number }>(
        'SELECT COUNT(*) AS count FROM purchase WHERE is_synced = 0 OR is_synced IS NULL OR transaction_id IS NULL'
      )
      .get();
    return row?.count ?? 0;
  }

  async countPurchaseLines(purchaseId?: number): Promise<number> {
    const row =
      purchaseId === undefined
        ? this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM purchase_lines').get()
        : this.db
            .prepare<[number], { count: number }>('SELECT COUNT(*) AS count FROM purchase_lines WHERE purchase_id = ?')
            .get(purchaseId);
    return row?.count ?? 0;
  }

  // -- helpers (run inside a transaction) -----------------------------------

  private headerExists(purchaseId: number): boolean {
    return this.db.prepare<[number], { id: number }>('SELECT id FROM purchase WHERE id = ?').get(purchaseId) !== undefined;
  }

  private lineOwner(lineId: number): number | null {
    const row = this.db
      .prepare<[number], { purchase_id: number }>('SELECT purchase_id FROM purchase_lines WHERE id = ?')
      .get(lineId);
    return row ? row.purchase_id : null;
  }

  private markUnsynced(purchaseId: number): void {
    this.db
      .prepare<[number]>('UPDATE purchase SET is_synced = 0, revision = COALESCE(revision, 0) + 1 WHERE id = ?')
      .run(purchaseId);
  }

  private applyHeaderPatch(purchaseId: number, patch: PurchaseHeaderPatch): void {
    const assignments: string[] = [];
    const values: Array<string | number | null> = [];
    for (const key of Object.keys(HEADER_COLUMN_MAP)) {
      if (!isHeaderField(key)) continue;
      const value = patch[key];
      if (value === undefined) continue;
      assignments.push(`${HEADER_COLUMN_MAP[key]} = ?`);
      values.push(value);
    }
    if (assignments.length === 0) return;
    this.db
      .prepare<Array<string | number | null>>(`UPDATE purchase SET ${assignments.join(', ')} WHERE id = ?`)
      .run(...values, purchaseId);
  }

  private insertLines(purchaseId: number, lines: readonly PurchaseLineInput[]): void {
    const insert = this.db.prepare<PurchaseLineColumns>(INSERT_LINE);
    for (const line of lines) {
      insert.run(toLineColumns(purchaseId, line));
    }
  }

  private insertPayments(purchaseId: number, payments: readonly PurchasePaymentInput[]): void {
    const insert = this.db.prepare<PurchasePaymentColumns>(INSERT_PAYMENT);
    for (const payment of payments) {
      insert.run(toPaymentColumns(purchaseId, payment));
    }
  }

  private cascadeDelete(purchaseId: number): boolean {
    this.db.prepare<[number]>('DELETE FROM purchase_lines WHERE purchase_id = ?').run(purchaseId);
    this.db.prepare<[number]>('DELETE FROM purchase_payments WHERE purchase_id = ?').run(purchaseId);
    return this.db.prepare<[number]>('DELETE FROM purchase WHERE id = ?').run(purchaseId).changes > 0;
  }
}

function isHeaderField(key: string): key is keyof PurchaseHeaderInput {
  return Object.prototype.hasOwnProperty.call(HEADER_COLUMN_MAP, key);
}
