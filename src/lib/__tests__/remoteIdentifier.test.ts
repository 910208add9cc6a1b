import { extractPaymentLines, extractRemoteIdentifier, toRemoteId } from '../remoteIdentifier';

describe('toRemoteId', () => {
  it('accepts positive integers and digit strings', () => {
    expect(toRemoteId(555)).toBe(555);
    expect(toRemoteId(' 42 ')).toBe(42);
  });

  it('rejects everything else', () => {
    expect(toRemoteId(0)).toBeNull();
    expect(toRemoteId(-3)).toBeNull();
    expect(toRemoteId(1.5)).toBeNull();
    expect(toRemoteId('12a')).toBeNull();
    expect(toRemoteId(null)).toBeNull();
  });
});

describe('extractRemoteIdentifier', () => {
  it('prefers the top-level id', () => {
    expect(extractRemoteIdentifier({ id: 7, transaction_id: 9 })).toEqual({ id: 7, strategy: 'id' });
  });

  it('falls back to transaction_id when id is unusable', () => {
    expect(extractRemoteIdentifier({ id: 0, transaction_id: '9' })).toEqual({
      id: 9,
      strategy: 'transaction_id',
    });
  });

  it('looks inside data after the top level', () => {
    expect(extractRemoteIdentifier({ success: true, data: { id: '31' } })).toEqual({ id: 31, strategy: 'data.id' });
    expect(extractRemoteIdentifier({ data: { transaction_id: 8 } })).toEqual({
      id: 8,
      strategy: 'data.transaction_id',
    });
  });

  it('returns null when no strategy yields an id', () => {
    expect(extractRemoteIdentifier({ success: true, msg: 'Purchase added' })).toBeNull();
    expect(extractRemoteIdentifier([{ id: 1 }])).toBeNull();
    expect(extractRemoteIdentifier('555')).toBeNull();
    expect(extractRemoteIdentifier(null)).toBeNull();
  });
});

describe('extractPaymentLines', () => {
  it('reads payment_lines from the top level', () => {
    const payments = extractPaymentLines({
      id: 555,
      payment_lines: [{ id: '5', amount: '50.00', method: null, paid_on: '2024-05-01 10:00:00' }],
    });

    expect(payments).toEqual([
      { paymentId: 5, amount: 50, method: 'cash', note: null, paidOn: '2024-05-01 10:00:00', accountId: null },
    ]);
  });

  it('reads payments nested under data', () => {
    const payments = extractPaymentLines({
      data: { id: 555, payments: [{ amount: 20, method: 'card', account_id: 3 }] },
    });

    expect(payments).toEqual([
      { paymentId: null, amount: 20, method: 'card', note: null, paidOn: null, accountId: 3 },
    ]);
  });

  it('skips rows without an amount', () => {
    const payments = extractPaymentLines({
      payment_lines: [{ method: 'cash' }, { amount: 5 }],
    });

    expect(payments).toHaveLength(1);
    expect(payments[0]?.amount).toBe(5);
  });

  it('returns an empty list when nothing was echoed', () => {
    expect(extractPaymentLines({ id: 555 })).toEqual([]);
    expect(extractPaymentLines(undefined)).toEqual([]);
  });
});
