import type { SqliteDatabase } from '../db';
import { SerialQueue } from '../lib/serialQueue';
import type { ReferenceEntity } from '../types/purchase';

const LAST_SYNC_KEYS: Record<ReferenceEntity, string> = {
  suppliers: 'suppliers_last_sync',
  products: 'products_last_sync',
  locations: 'locations_last_sync',
};

const CACHE_LAST_REFRESH_KEY = 'cache_last_refresh';

function parseTimestamp(value: string | null): Date | null {
  if (!value) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/** Key/value rows of the `system` table. */
export class SystemSettingsStore {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly writes: SerialQueue = new SerialQueue()
  ) {}

  async get(key: string): Promise<string | null> {
    const row = this.db.prepare<[string], { value: string | null }>('SELECT value FROM system WHERE key = ?').get(key);
    return row?.value ?? null;
  }

  set(key: string, value: string): Promise<void> {
    return this.writes.run(() => {
      this.db
        .prepare<[string, string]>(
          'INSERT INTO system (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value'
        )
        .run(key, value);
    });
  }

  delete(key: string): Promise<void> {
    return this.writes.run(() => {
      this.db.prepare<[string]>('DELETE FROM system WHERE key = ?').run(key);
    });
  }

  async getLastSync(entity: ReferenceEntity): Promise<Date | null> {
    return parseTimestamp(await this.get(LAST_SYNC_KEYS[entity]));
  }

  setLastSync(entity: ReferenceEntity, at: Date): Promise<void> {
    return this.set(LAST_SYNC_KEYS[entity], at.toISOString());
  }

  clearLastSync(entity: ReferenceEntity): Promise<void> {
    return this.delete(LAST_SYNC_KEYS[entity]);
  }

  async getCacheLastRefresh(): Promise<Date | null> {
    return parseTimestamp(await this.get(CACHE_LAST_REFRESH_KEY));
  }

  setCacheLastRefresh(at: Date): Promise<void> {
    return this.set(CACHE_LAST_REFRESH_KEY, at.toISOString());
  }

  clearCacheLastRefresh(): Promise<void> {
    return this.delete(CACHE_LAST_REFRESH_KEY);
  }
}
