import { RemotePaymentLine } from '../schema/purchaseSchemas';
import type { PurchasePaymentInput, RemoteId } from '../types/purchase';
import { logger } from '../utils/logger';

type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nested(body: JsonRecord): JsonRecord | null {
  return isRecord(body.data) ? body.data : null;
}

export function toRemoteId(value: unknown): RemoteId | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value > 0 ? value : null;
  }
  if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    return toRemoteId(Number.parseInt(value, 10));
  }
  return null;
}

interface IdentifierStrategy {
  name: string;
  read(body: JsonRecord): unknown;
}

/** Checked in order; the first that yields a usable id wins. */
export const IDENTIFIER_STRATEGIES: readonly IdentifierStrategy[] = [
  { name: 'id', read: (body) => body.id },
  { name: 'transaction_id', read: (body) => body.transaction_id },
  { name: 'data.id', read: (body) => nested(body)?.id },
  { name: 'data.transaction_id', read: (body) => nested(body)?.transaction_id },
];

export interface ExtractedIdentifier {
  id: RemoteId;
  strategy: string;
}

export function extractRemoteIdentifier(body: unknown): ExtractedIdentifier | null {
  if (!isRecord(body)) return null;
  for (const strategy of IDENTIFIER_STRATEGIES) {
    const id = toRemoteId(strategy.read(body));
    if (id !== null) {
      return { id, strategy: strategy.name };
    }
  }
  return null;
}

const PAYMENT_KEYS = ['payment_lines', 'payments'] as const;

function findPaymentArray(body: JsonRecord): unknown[] | null {
  const scopes = [body, nested(body)];
  for (const scope of scopes) {
    if (!scope) continue;
    for (const key of PAYMENT_KEYS) {
      const candidate = scope[key];
      if (Array.isArray(candidate)) return candidate;
    }
  }
  return null;
}

/**
 * Payment rows the remote echoed back for a saved purchase. Rows that do not
 * look like payments are dropped; an absent array yields an empty list.
 */
export function extractPaymentLines(body: unknown): PurchasePaymentInput[] {
  if (!isRecord(body)) return [];
  const raw = findPaymentArray(body);
  if (!raw) return [];

  const payments: PurchasePaymentInput[] = [];
  raw.forEach((item, index) => {
    const parsed = RemotePaymentLine.safeParse(item);
    if (parsed.success) {
      payments.push(parsed.data);
    } else {
      logger.warn('Ignoring unreadable payment line in purchase response', {
        index,
        issue: parsed.error.issues[0]?.message,
      });
    }
  });
  return payments;
}
