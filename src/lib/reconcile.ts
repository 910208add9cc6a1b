import type { RemoteId } from '../types/purchase';

export type RemoteIdGetter<T> = (record: T) => RemoteId | null | undefined;

/**
 * Collapses records sharing a remote id into one entry. The entry keeps the
 * position of the first occurrence and the payload of the last one. Records
 * without an id are kept where they are.
 */
export function dedupeByRemoteId<T>(records: readonly T[], getId: RemoteIdGetter<T>): T[] {
  const positions = new Map<RemoteId, number>();
  const out: T[] = [];

  for (const record of records) {
    const id = getId(record);
    if (id == null) {
      out.push(record);
      continue;
    }
    const position = positions.get(id);
    if (position === undefined) {
      positions.set(id, out.length);
      out.push(record);
    } else {
      out[position] = record;
    }
  }

  return out;
}

/**
 * Local rows whose remote counterpart is gone from `targetIds`. Rows that were
 * never pushed (no remote id) are never candidates.
 */
export function findPrunable<T>(
  localRows: readonly T[],
  targetIds: Iterable<RemoteId>,
  getId: RemoteIdGetter<T>
): T[] {
  const keep = new Set(targetIds);
  return localRows.filter((row) => {
    const id = getId(row);
    return id != null && !keep.has(id);
  });
}
