import path from 'path';
import dotenv from 'dotenv';

if (process.env.NODE_ENV !== 'production') {
  dotenv.config({ path: path.resolve(process.cwd(), '.env') });
}

export interface PurchaseApiConfig {
  baseUrl: string;
  apiPrefix: string;
  timeoutMs: number;
  token: string | null;
  pageSize: number;
}

export interface StorageConfig {
  dbPath: string;
}

export interface SyncConfig {
  referenceMaxAgeMs: number;
  refreshReferenceDataBeforeSync: boolean;
  connectivityProbeTimeoutMs: number;
}

type NumberBounds = {
  min?: number;
  max?: number;
};

const HOUR_MS = 60 * 60 * 1000;

function clamp(value: number, bounds?: NumberBounds): number {
  if (!bounds) {
    return value;
  }
  const { min, max } = bounds;
  let result = value;
  if (typeof min === 'number' && result < min) {
    result = min;
  }
  if (typeof max === 'number' && result > max) {
    result = max;
  }
  return result;
}

function parseStringSetting(name: string, defaultValue: string): string {
  const raw = process.env[name];
  if (raw == null) {
    return defaultValue;
  }
  const trimmed = raw.trim();
  return trimmed ? trimmed : defaultValue;
}

function parseOptionalStringSetting(name: string): string | null {
  const raw = process.env[name];
  if (raw == null) {
    return null;
  }
  const trimmed = raw.trim();
  return trimmed ? trimmed : null;
}

function parseFloatSetting(name: string, defaultValue: number, bounds?: NumberBounds): number {
  const raw = process.env[name];
  if (raw == null) {
    return defaultValue;
  }

  const numeric = Number.parseFloat(raw);
  if (!Number.isFinite(numeric)) {
    return defaultValue;
  }

  return clamp(numeric, bounds);
}

function parseIntegerSetting(name: string, defaultValue: number, bounds?: NumberBounds): number {
  const raw = process.env[name];
  if (raw == null) {
    return defaultValue;
  }

  const numeric = Number.parseInt(raw, 10);
  if (!Number.isFinite(numeric)) {
    return defaultValue;
  }

  return clamp(numeric, bounds);
}

function parseBooleanSetting(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw == null) {
    return defaultValue;
  }

  const normalized = raw.trim().toLowerCase();
  if (!normalized) {
    return defaultValue;
  }

  if (['true', '1', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

function normalizePrefix(prefix: string): string {
  const trimmed = prefix.replace(/\/+$/, '');
  if (!trimmed) return '';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

export function getPurchaseApiConfig(): PurchaseApiConfig {
  return {
    baseUrl: parseStringSetting('PURCHASE_API_BASE_URL', 'http://localhost:8000').replace(/\/+$/, ''),
    apiPrefix: normalizePrefix(parseStringSetting('PURCHASE_API_PREFIX', '/connector/api')),
    timeoutMs: parseIntegerSetting('PURCHASE_API_TIMEOUT_MS', 30000, { min: 1000, max: 120000 }),
    token: parseOptionalStringSetting('PURCHASE_API_TOKEN'),
    pageSize: parseIntegerSetting('PURCHASE_PAGE_SIZE', 20, { min: 1, max: 200 }),
  };
}

export function getStorageConfig(): StorageConfig {
  return {
    dbPath: parseStringSetting('PURCHASE_DB_PATH', './data/purchases.db'),
  };
}

export function getSyncConfig(): SyncConfig {
  const maxAgeHours = parseFloatSetting('REFERENCE_CACHE_MAX_AGE_HOURS', 24, { min: 1, max: 720 });
  return {
    referenceMaxAgeMs: Math.round(maxAgeHours * HOUR_MS),
    refreshReferenceDataBeforeSync: parseBooleanSetting('SYNC_REFRESH_REFERENCE_DATA', true),
    connectivityProbeTimeoutMs: parseIntegerSetting('CONNECTIVITY_PROBE_TIMEOUT_MS', 3000, { min: 250, max: 30000 }),
  };
}
