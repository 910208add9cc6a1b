import { getPurchaseApiConfig, getStorageConfig, getSyncConfig } from '..';

const KEYS = [
  'PURCHASE_API_BASE_URL',
  'PURCHASE_API_PREFIX',
  'PURCHASE_API_TIMEOUT_MS',
  'PURCHASE_API_TOKEN',
  'PURCHASE_PAGE_SIZE',
  'PURCHASE_DB_PATH',
  'REFERENCE_CACHE_MAX_AGE_HOURS',
  'SYNC_REFRESH_REFERENCE_DATA',
  'CONNECTIVITY_PROBE_TIMEOUT_MS',
];

describe('config', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('falls back to defaults', () => {
    expect(getPurchaseApiConfig()).toEqual({
      baseUrl: 'http://localhost:8000',
      apiPrefix: '/connector/api',
      timeoutMs: 30000,
      token: null,
      pageSize: 20,
    });
    expect(getStorageConfig()).toEqual({ dbPath: './data/purchases.db' });
    expect(getSyncConfig()).toEqual({
      referenceMaxAgeMs: 24 * 60 * 60 * 1000,
      refreshReferenceDataBeforeSync: true,
      connectivityProbeTimeoutMs: 3000,
    });
  });

  it('normalizes the API location', () => {
    process.env.PURCHASE_API_BASE_URL = 'https://erp.example.test///';
    process.env.PURCHASE_API_PREFIX = 'connector/api/';
    process.env.PURCHASE_API_TOKEN = '  ';

    expect(getPurchaseApiConfig()).toMatchObject({
      baseUrl: 'https://erp.example.test',
      apiPrefix: '/connector/api',
      token: null,
    });
  });

  it('clamps numeric settings and ignores garbage', () => {
    process.env.PURCHASE_API_TIMEOUT_MS = '5';
    process.env.PURCHASE_PAGE_SIZE = '500';
    process.env.CONNECTIVITY_PROBE_TIMEOUT_MS = 'soon';
    process.env.REFERENCE_CACHE_MAX_AGE_HOURS = '0.5';

    expect(getPurchaseApiConfig()).toMatchObject({ timeoutMs: 1000, pageSize: 200 });
    expect(getSyncConfig()).toMatchObject({ referenceMaxAgeMs: 60 * 60 * 1000, connectivityProbeTimeoutMs: 3000 });
  });

  it('reads boolean switches', () => {
    process.env.SYNC_REFRESH_REFERENCE_DATA = 'off';
    expect(getSyncConfig().refreshReferenceDataBeforeSync).toBe(false);

    process.env.SYNC_REFRESH_REFERENCE_DATA = 'maybe';
    expect(getSyncConfig().refreshReferenceDataBeforeSync).toBe(true);
  });
});
