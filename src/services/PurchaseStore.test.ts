import { openDatabase, type SqliteDatabase } from '../db';
import { sampleHeader, sampleLine } from '../testing/fakes';
import { PurchaseStore } from './PurchaseStore';

describe('PurchaseStore', () => {
  let db: SqliteDatabase;
  let store: PurchaseStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    store = new PurchaseStore(db);
  });

  afterEach(() => {
    db.close();
  });

  async function seedPurchase(): Promise<number> {
    return store.createPurchase(
      sampleHeader(),
      [sampleLine(), sampleLine({ productId: 12, variationId: 121, quantity: 5, unitPrice: 20 })],
      [{ paymentId: null, method: 'cash', amount: 50, note: null, accountId: null, paidOn: null }]
    );
  }

  it('creates an unsynced header with its lines and payments', async () => {
    const id = await seedPurchase();

    const header = await store.getPurchase(id);
    expect(header).toMatchObject({ id, refNo: 'PO-1001', transactionId: null, isSynced: false, status: 'ordered' });
    const lines = await store.getPurchaseLines(id);
    expect(lines.map((line) => [line.quantity, line.unitPrice])).toEqual([
      [10, 12.5],
      [5, 20],
    ]);
    expect(await store.getPurchasePayments(id)).toHaveLength(1);
    expect(await store.countUnsynced()).toBe(1);
  });

  it('marks a header synced and keeps local payments when none were echoed', async () => {
    const id = await seedPurchase();

    await expect(store.markSynced(id, 555)).resolves.toBe('synced');

    expect(await store.getPurchase(id)).toMatchObject({ transactionId: 555, isSynced: true });
    expect(await store.listUnsynced()).toEqual([]);
    expect((await store.getPurchasePayments(id)).map((payment) => payment.amount)).toEqual([50]);
  });

  it('replaces payments with the confirmed copy', async () => {
    const id = await seedPurchase();

    await store.markSynced(id, 555, [
      { paymentId: 901, method: 'card', amount: 40, note: null, accountId: 2, paidOn: '2024-05-02 09:00:00' },
    ]);

    const payments = await store.getPurchasePayments(id);
    expect(payments).toHaveLength(1);
    expect(payments[0]).toMatchObject({ paymentId: 901, method: 'card', amount: 40, accountId: 2 });
  });

  it('flips a synced header back to unsynced on edit and keeps its remote id', async () => {
    const id = await seedPurchase();
    await store.markSynced(id, 555);

    await expect(store.updatePurchase(id, { header: { refNo: 'PO-1001-B' } })).resolves.toBe(true);

    expect(await store.getPurchase(id)).toMatchObject({ refNo: 'PO-1001-B', transactionId: 555, isSynced: false });
    expect((await store.listUnsynced()).map((header) => header.id)).toEqual([id]);
  });

  it('replaces lines when an edit carries them', async () => {
    const id = await seedPurchase();

    await store.updatePurchase(id, { lines: [sampleLine({ quantity: 3 })] });

    expect(await store.countPurchaseLines(id)).toBe(1);
    expect((await store.getPurchaseLines(id))[0]?.quantity).toBe(3);
  });

  it('flips the header on line and payment edits', async () => {
    const id = await seedPurchase();
    await store.markSynced(id, 555);

    const lineId = await store.addLine(id, sampleLine({ productId: 13, variationId: 131 }));
    expect(lineId).not.toBeNull();
    expect((await store.getPurchase(id))?.isSynced).toBe(false);

    await store.markSynced(id, 555);
    const [firstLine] = await store.getPurchaseLines(id);
    await expect(store.deleteLine(firstLine?.id ?? -1)).resolves.toBe(true);
    expect((await store.getPurchase(id))?.isSynced).toBe(false);

    await store.markSynced(id, 555);
    const [payment] = await store.getPurchasePayments(id);
    await expect(store.deletePayment(payment?.id ?? -1)).resolves.toBe(true);
    expect((await store.getPurchase(id))?.isSynced).toBe(false);
  });

  it('bumps the revision on every local write but not on sync bookkeeping', async () => {
    const id = await seedPurchase();
    expect((await store.getPurchase(id))?.revision).toBe(0);

    await store.updatePurchase(id, { header: { additionalNotes: 'first' } });
    await store.addLine(id, sampleLine({ productId: 13, variationId: 131 }));
    const [payment] = await store.getPurchasePayments(id);
    await store.deletePayment(payment?.id ?? -1);
    expect((await store.getPurchase(id))?.revision).toBe(3);

    await store.markSynced(id, 555);
    await store.recordConfirmedStatus(id, 'received');
    expect((await store.getPurchase(id))?.revision).toBe(3);
  });

  it('leaves a header queued when it changed after the pushed revision was read', async () => {
    const id = await seedPurchase();
    await store.addLine(id, sampleLine({ productId: 13, variationId: 131 }));

    await expect(
      store.markSynced(id, 555, [{ paymentId: 901, method: 'card', amount: 40, note: null, accountId: 2, paidOn: null }], 0)
    ).resolves.toBe('changed');

    expect(await store.getPurchase(id)).toMatchObject({ transactionId: 555, isSynced: false, revision: 1 });
    expect((await store.getPurchasePayments(id)).map((row) => row.amount)).toEqual([50]);

    await expect(store.markSynced(id, 555, [], 1)).resolves.toBe('synced');
    expect((await store.getPurchase(id))?.isSynced).toBe(true);
    await expect(store.markSynced(99, 1)).resolves.toBe('missing');
  });

  it('keeps the known remote id when a changed header is marked', async () => {
    const id = await seedPurchase();
    await store.markSynced(id, 555);
    await store.addLine(id, sampleLine());

    await expect(store.markSynced(id, 600, [], 0)).resolves.toBe('changed');

    expect(await store.getPurchase(id)).toMatchObject({ transactionId: 555, isSynced: false });
  });

  it('deletes a synced header only at the revision it was read at', async () => {
    const id = await seedPurchase();
    await store.markSynced(id, 555);

    await expect(store.deleteSyncedPurchase(id, 1)).resolves.toBe(false);
    await store.updatePurchase(id, { header: { additionalNotes: 'edited' } });
    await expect(store.deleteSyncedPurchase(id, 1)).resolves.toBe(false);

    await store.markSynced(id, 555);
    await expect(store.deleteSyncedPurchase(id, 1)).resolves.toBe(true);
    expect(await store.getPurchase(id)).toBeNull();
    expect(await store.getPurchaseLines(id)).toEqual([]);
  });

  it('refuses line and payment writes for a missing header', async () => {
    await expect(store.addLine(99, sampleLine())).resolves.toBeNull();
    await expect(
      store.addPayment(99, { paymentId: null, method: 'cash', amount: 1, note: null, accountId: null, paidOn: null })
    ).resolves.toBeNull();
    await expect(store.updateLine(99, sampleLine())).resolves.toBe(false);
    await expect(store.updatePurchase(99, { header: { refNo: 'x' } })).resolves.toBe(false);
  });

  it('deletes lines and payments together with the header', async () => {
    const id = await seedPurchase();
    const other = await store.createPurchase(sampleHeader({ refNo: 'PO-1002' }), [sampleLine()]);

    await expect(store.deletePurchase(id)).resolves.toBe(true);

    expect(await store.getPurchase(id)).toBeNull();
    expect(await store.getPurchaseLines(id)).toEqual([]);
    expect(await store.getPurchasePayments(id)).toEqual([]);
    expect(await store.countPurchaseLines()).toBe(1);
    expect(await store.getPurchase(other)).not.toBeNull();
  });

  it('counts only the headers it actually removed', async () => {
    const id = await seedPurchase();

    await expect(store.deletePurchases([id, 99])).resolves.toBe(1);
  });

  it('lists newest first and looks headers up by remote id', async () => {
    const first = await seedPurchase();
    const second = await store.createPurchase(sampleHeader({ refNo: 'PO-1002' }), [sampleLine()]);
    await store.markSynced(second, 777);

    expect((await store.listPurchases()).map((header) => header.id)).toEqual([second, first]);
    expect((await store.findByTransactionId(777))?.id).toBe(second);
    expect(await store.findByTransactionId(778)).toBeNull();
    expect(await store.listTransactionIds()).toEqual([777]);
  });

  it('keeps the sync flag when recording a confirmed status', async () => {
    const id = await seedPurchase();
    await store.markSynced(id, 555);

    await store.recordConfirmedStatus(id, 'received');

    expect(await store.getPurchase(id)).toMatchObject({ status: 'received', isSynced: true });
  });

  it('reads unknown stored values with safe defaults', async () => {
    db.prepare("INSERT INTO purchase (contact_id, location_id, status, discount_type, is_synced) VALUES (1, 1, 'weird', 'odd', 1)").run();

    const [header] = await store.listPurchases();
    expect(header).toMatchObject({ status: 'ordered', discountType: 'fixed', transactionDate: '', isSynced: false });
  });
});
