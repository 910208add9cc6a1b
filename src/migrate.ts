import type Database from 'better-sqlite3';
import { logger } from './utils/logger';

export interface Migration {
  version: number;
  name: string;
  up(db: Database.Database): void;
}

export interface MigrationReport {
  from: number;
  to: number;
  applied: string[];
}

function columnExists(db: Database.Database, table: string, column: string): boolean {
  const columns = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
  return columns.some((entry) => entry.name === column);
}

// Installs created at an intermediate version may already carry the column.
function addColumnIfMissing(db: Database.Database, table: string, column: string, definition: string): void {
  if (!columnExists(db, table, column)) {
    db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
  }
}

const SELL_LINES_V2 = `
  CREATE TABLE sell_lines (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    sell_id INTEGER,
    product_id INTEGER,
    variation_id INTEGER,
    quantity REAL,
    unit_price REAL,
    tax_rate_id INTEGER,
    discount_amount REAL,
    discount_type TEXT,
    note TEXT,
    is_completed INTEGER
  )`;

const VARIATIONS_V3 = `
  CREATE TABLE variations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    product_id INTEGER,
    variation_id INTEGER,
    product_name TEXT,
    product_variation_name TEXT,
    variation_name TEXT,
    display_name TEXT,
    sku TEXT,
    sub_sku TEXT,
    type TEXT,
    enable_stock INTEGER,
    brand_id INTEGER,
    unit_id INTEGER,
    category_id INTEGER,
    sub_category_id INTEGER,
    tax_id INTEGER,
    default_sell_price REAL,
    sell_price_inc_tax REAL,
    product_image_url TEXT,
    selling_price_group BLOB DEFAULT NULL,
    product_description TEXT
  )`;

/**
 * Ordered schema history. Versions 1-6 are the point-of-sale tables the
 * purchase tables share a database file with; they are kept so that files
 * written by older releases upgrade in place.
 */
export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'base_tables',
    up(db) {
      db.exec(`
        CREATE TABLE system (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          keyId INTEGER DEFAULT NULL,
          key TEXT,
          value TEXT
        );
        CREATE TABLE variations (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          product_id INTEGER,
          variation_id INTEGER,
          product_name TEXT,
          product_variation_name TEXT,
          variation_name TEXT,
          display_name TEXT,
          sku TEXT,
          sub_sku TEXT,
          type TEXT,
          enable_stock INTEGER,
          brand_id INTEGER,
          unit_id INTEGER,
          category_id INTEGER,
          sub_category_id INTEGER,
          tax_id INTEGER,
          default_sell_price REAL,
          sell_price_inc_tax REAL,
          product_image_url TEXT,
          selling_price_group TEXT,
          product_description TEXT
        );
        CREATE TABLE variations_location_details (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          product_id INTEGER,
          variation_id INTEGER,
          location_id INTEGER,
          qty_available REAL
        );
        CREATE TABLE product_locations (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          product_id INTEGER,
          location_id INTEGER
        );
        CREATE TABLE sell (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          transaction_date TEXT,
          invoice_no TEXT,
          contact_id INTEGER,
          location_id INTEGER,
          status TEXT,
          tax_rate_id INTEGER,
          discount_amount REAL,
          discount_type TEXT,
          sale_note TEXT,
          staff_note TEXT,
          shipping_details TEXT,
          is_quotation INTEGER DEFAULT 0,
          shipping_charges REAL DEFAULT 0.00,
          invoice_amount REAL,
          change_return REAL DEFAULT 0.00,
          pending_amount REAL DEFAULT 0.00,
          is_synced INTEGER,
          transaction_id INTEGER DEFAULT NULL
        );
        CREATE TABLE sell_lines (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          sell_id INTEGER,
          product_id INTEGER,
          variation_id INTEGER,
          quantity INTEGER,
          unit_price REAL,
          tax_rate_id INTEGER,
          discount_amount REAL,
          discount_type TEXT,
          note TEXT,
          is_completed INTEGER
        );
        CREATE TABLE sell_payments (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          sell_id INTEGER,
          payment_id INTEGER DEFAULT NULL,
          method TEXT,
          amount REAL,
          note TEXT,
          is_return INTEGER DEFAULT 0
        );
      `);
    },
  },
  {
    version: 2,
    name: 'rebuild_sell_lines',
    up(db) {
      db.exec('ALTER TABLE sell_lines RENAME TO prev_sell_line');
      db.exec(SELL_LINES_V2);
      db.exec('INSERT INTO sell_lines SELECT * FROM prev_sell_line');
    },
  },
  {
    version: 3,
    name: 'rebuild_variations',
    up(db) {
      db.exec('ALTER TABLE variations RENAME TO prev_variations');
      db.exec(VARIATIONS_V3);
      db.exec('INSERT INTO variations SELECT * FROM prev_variations');
    },
  },
  {
    version: 4,
    name: 'contact_table',
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS contact (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          name TEXT,
          city TEXT,
          state TEXT,
          country TEXT,
          address_line_1 TEXT,
          address_line_2 TEXT,
          zip_code TEXT,
          mobile TEXT
        )
      `);
    },
  },
  {
    version: 5,
    name: 'sell_invoice_url',
    up(db) {
      addColumnIfMissing(db, 'sell', 'invoice_url', 'TEXT DEFAULT NULL');
    },
  },
  {
    version: 6,
    name: 'sell_payment_account',
    up(db) {
      addColumnIfMissing(db, 'sell_payments', 'account_id', 'INTEGER DEFAULT NULL');
    },
  },
  {
    version: 7,
    name: 'purchase_tables',
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS purchase (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          transaction_date TEXT,
          ref_no TEXT,
          contact_id INTEGER,
          location_id INTEGER,
          status TEXT,
          tax_id INTEGER,
          discount_amount REAL,
          discount_type TEXT,
          additional_notes TEXT,
          shipping_charges REAL DEFAULT 0.00,
          total_before_tax REAL,
          tax_amount REAL,
          final_total REAL,
          is_synced INTEGER,
          transaction_id INTEGER DEFAULT NULL
        );
        CREATE TABLE IF NOT EXISTS purchase_lines (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          purchase_id INTEGER,
          product_id INTEGER,
          variation_id INTEGER,
          quantity REAL,
          unit_price REAL,
          line_discount_amount REAL,
          line_discount_type TEXT,
          item_tax_id INTEGER,
          item_tax REAL,
          sub_unit_id INTEGER,
          lot_number TEXT,
          mfg_date TEXT,
          exp_date TEXT,
          purchase_order_line_id INTEGER,
          purchase_requisition_line_id INTEGER
        );
        CREATE TABLE IF NOT EXISTS purchase_payments (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          purchase_id INTEGER,
          payment_id INTEGER DEFAULT NULL,
          method TEXT,
          amount REAL,
          note TEXT,
          account_id INTEGER DEFAULT NULL,
          paid_on TEXT
        );
      `);
    },
  },
  {
    version: 8,
    name: 'reference_caches',
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS cached_suppliers (
          id INTEGER PRIMARY KEY,
          name TEXT,
          business_name TEXT,
          mobile TEXT,
          address_line_1 TEXT,
          city TEXT,
          state TEXT,
          country TEXT,
          zip_code TEXT,
          contact_id TEXT,
          pay_term_type TEXT,
          pay_term_number INTEGER,
          balance REAL,
          last_sync TEXT
        );
        CREATE TABLE IF NOT EXISTS cached_products (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          product_id INTEGER,
          product_name TEXT,
          product_type TEXT,
          variation_id INTEGER,
          variation_name TEXT,
          sub_sku TEXT,
          default_purchase_price REAL,
          last_sync TEXT
        );
        CREATE TABLE IF NOT EXISTS cached_locations (
          id INTEGER PRIMARY KEY,
          name TEXT,
          location_id TEXT,
          address TEXT,
          city TEXT,
          state TEXT,
          country TEXT,
          zip_code TEXT,
          last_sync TEXT
        );
      `);
    },
  },
  {
    version: 9,
    name: 'purchase_shipping_details',
    up(db) {
      addColumnIfMissing(db, 'purchase', 'shipping_details', 'TEXT');
    },
  },
  {
    version: 10,
    name: 'sync_indexes',
    up(db) {
      // Older releases appended a row per write; keep the newest value per key.
      db.exec(`
        DELETE FROM system
         WHERE key IS NULL
            OR id NOT IN (SELECT MAX(id) FROM system WHERE key IS NOT NULL GROUP BY key);
        CREATE UNIQUE INDEX IF NOT EXISTS idx_system_key ON system (key);
        CREATE INDEX IF NOT EXISTS idx_purchase_is_synced ON purchase (is_synced);
        CREATE INDEX IF NOT EXISTS idx_purchase_transaction_id ON purchase (transaction_id);
        CREATE INDEX IF NOT EXISTS idx_purchase_lines_purchase_id ON purchase_lines (purchase_id);
        CREATE INDEX IF NOT EXISTS idx_purchase_payments_purchase_id ON purchase_payments (purchase_id);
        CREATE INDEX IF NOT EXISTS idx_cached_products_product_id ON cached_products (product_id);
      `);
    },
  },
  {
    version: 11,
    name: 'purchase_revision',
    up(db) {
      addColumnIfMissing(db, 'purchase', 'revision', 'INTEGER NOT NULL DEFAULT 0');
    },
  },
];

export const LATEST_SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1]?.version ?? 0;

export function getSchemaVersion(db: Database.Database): number {
  const version = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

/**
 * Applies every migration above the file's `user_version`, each in its own
 * transaction together with the version bump. A failing step rolls back and
 * rethrows, leaving the file at the last good version.
 */
export function runMigrations(db: Database.Database, migrations: readonly Migration[] = MIGRATIONS): MigrationReport {
  const from = getSchemaVersion(db);
  const applied: string[] = [];

  const pending = migrations.filter((migration) => migration.version > from);
  if (pending.length === 0) {
    logger.debug('Local schema up to date', { version: from });
    return { from, to: from, applied };
  }

  logger.info('Migrating local database', { from, to: pending[pending.length - 1]?.version });

  for (const migration of pending) {
    const apply = db.transaction(() => {
      migration.up(db);
      db.pragma(`user_version = ${migration.version}`);
    });
    try {
      apply();
    } catch (error) {
      logger.error('Local migration failed', {
        version: migration.version,
        migration: migration.name,
        err: logger.serializeError(error),
      });
      throw error;
    }
    applied.push(migration.name);
    logger.debug('Applied local migration', { version: migration.version, migration: migration.name });
  }

  return { from, to: getSchemaVersion(db), applied };
}
