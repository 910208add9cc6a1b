import type { SqliteDatabase } from '../db';
import { SerialQueue } from '../lib/serialQueue';
import type { RemoteLocation, RemoteProduct, RemoteSupplier } from '../schema/purchaseSchemas';
import type { CachedLocation, CachedProduct, CachedSupplier, ReferenceEntity } from '../types/purchase';

interface SupplierRow {
  id: number;
  name: string | null;
  business_name: string | null;
  mobile: string | null;
  address_line_1: string | null;
  city: string | null;
  state: string | null;
  country: string | null;
  zip_code: string | number | null;
  contact_id: string | number | null;
  pay_term_type: string | null;
  pay_term_number: number | null;
  balance: number | null;
  last_sync: string | null;
}

interface ProductRow {
  id: number;
  product_id: number;
  product_name: string | null;
  product_type: string | null;
  variation_id: number | null;
  variation_name: string | null;
  sub_sku: string | number | null;
  default_purchase_price: number | null;
  last_sync: string | null;
}

interface LocationRow {
  id: number;
  name: string | null;
  location_id: string | number | null;
  address: string | null;
  city: string | null;
  state: string | null;
  country: string | null;
  zip_code: string | number | null;
  last_sync: string | null;
}

// Older files declared some of these columns INTEGER, so text comes back as numbers.
function text(value: string | number | null): string | null {
  return value == null ? null : String(value);
}

function toSupplier(row: SupplierRow): CachedSupplier {
  return {
    id: row.id,
    name: row.name ?? '',
    businessName: row.business_name,
    contactId: text(row.contact_id),
    mobile: row.mobile,
    addressLine1: row.address_line_1,
    city: row.city,
    state: row.state,
    country: row.country,
    zipCode: text(row.zip_code),
    payTermType: row.pay_term_type,
    payTermNumber: row.pay_term_number,
    balance: row.balance ?? 0,
    lastSync: row.last_sync ?? '',
  };
}

function toProduct(row: ProductRow): CachedProduct {
  return {
    productId: row.product_id,
    productName: row.product_name ?? '',
    productType: row.product_type,
    variationId: row.variation_id,
    variationName: row.variation_name,
    subSku: text(row.sub_sku),
    defaultPurchasePrice: row.default_purchase_price ?? 0,
    lastSync: row.last_sync ?? '',
  };
}

function toLocation(row: LocationRow): CachedLocation {
  return {
    id: row.id,
    name: row.name ?? '',
    locationId: text(row.location_id),
    address: row.address,
    city: row.city,
    state: row.state,
    country: row.country,
    zipCode: text(row.zip_code),
    lastSync: row.last_sync ?? '',
  };
}

const TABLES: Record<ReferenceEntity, string> = {
  suppliers: 'cached_suppliers',
  products: 'cached_products',
  locations: 'cached_locations',
};

// SQLite's LIKE and NOCASE only fold ASCII, so matching happens here.
function matchesTerm(term: string, fields: ReadonlyArray<string | number | null>): boolean {
  const needle = term.toLowerCase();
  return fields.some((field) => field !== null && String(field).toLowerCase().includes(needle));
}

/** Local copies of supplier, product and location lists. */
export class ReferenceCacheStore {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly writes: SerialQueue = new SerialQueue()
  ) {}

  replaceSuppliers(suppliers: readonly RemoteSupplier[], syncedAt: Date): Promise<number> {
    const stamp = syncedAt.toISOString();
    return this.writes.run(() =>
      this.db.transaction(() => {
        this.db.exec('DELETE FROM cached_suppliers');
        const insert = this.db.prepare<Omit<SupplierRow, 'zip_code' | 'contact_id'> & { zip_code: string | null; contact_id: string | null }>(
          `INSERT OR REPLACE INTO cached_suppliers (
             id, name, business_name, mobile, address_line_1, city, state, country,
             zip_code, contact_id, pay_term_type, pay_term_number, balance, last_sync
           ) VALUES (
             @id, @name, @business_name, @mobile, @address_line_1, @city, @state, @country,
             @zip_code, @contact_id, @pay_term_type, @pay_term_number, @balance, @last_sync
           )`
        );
        for (const supplier of suppliers) {
          insert.run({
            id: supplier.id,
            name: supplier.name,
            business_name: supplier.businessName,
            mobile: supplier.mobile,
            address_line_1: supplier.addressLine1,
            city: supplier.city,
            state: supplier.state,
            country: supplier.country,
            zip_code: supplier.zipCode,
            contact_id: supplier.contactId,
            pay_term_type: supplier.payTermType,
            pay_term_number: supplier.payTermNumber,
            balance: supplier.balance,
            last_sync: stamp,
          });
        }
        return this.countSync('suppliers');
      })()
    );
  }

  replaceProducts(products: readonly RemoteProduct[], syncedAt: Date): Promise<number> {
    const stamp = syncedAt.toISOString();
    return this.writes.run(() =>
      this.db.transaction(() => {
        this.db.exec('DELETE FROM cached_products');
        const insert = this.db.prepare<Omit<ProductRow, 'id' | 'sub_sku'> & { sub_sku: string | null }>(
          `INSERT INTO cached_products (
             product_id, product_name, product_type, variation_id, variation_name,
             sub_sku, default_purchase_price, last_sync
           ) VALUES (
             @product_id, @product_name, @product_type, @variation_id, @variation_name,
             @sub_sku, @default_purchase_price, @last_sync
           )`
        );
        for (const product of products) {
          insert.run({
            product_id: product.productId,
            product_name: product.productName,
            product_type: product.productType,
            variation_id: product.variationId,
            variation_name: product.variationName,
            sub_sku: product.subSku,
            default_purchase_price: product.defaultPurchasePrice,
            last_sync: stamp,
          });
        }
        return this.countSync('products');
      })()
    );
  }

  replaceLocations(locations: readonly RemoteLocation[], syncedAt: Date): Promise<number> {
    const stamp = syncedAt.toISOString();
    return this.writes.run(() =>
      this.db.transaction(() => {
        this.db.exec('DELETE FROM cached_locations');
        const insert = this.db.prepare<{
          id: number;
          name: string;
          location_id: string | null;
          address: string | null;
          city: string | null;
          state: string | null;
          country: string | null;
          zip_code: string | null;
          last_sync: string;
        }>(
          `INSERT OR REPLACE INTO cached_locations (
             id, name, location_id, address, city, state, country, zip_code, last_sync
           ) VALUES (
             @id, @name, @location_id, @address, @city, @state, @country, @zip_code, @last_sync
           )`
        );
        for (const location of locations) {
          insert.run({
            id: location.id,
            name: location.name,
            location_id: location.locationId,
            address: location.address,
            city: location.city,
            state: location.state,
            country: location.country,
            zip_code: location.zipCode,
            last_sync: stamp,
          });
        }
        return this.countSync('locations');
      })()
    );
  }

  /** Case-insensitive match on name, business name or contact id; all rows when `term` is blank. */
  async searchSuppliers(term?: string): Promise<CachedSupplier[]> {
    const rows = this.db
      .prepare<[], SupplierRow>('SELECT * FROM cached_suppliers ORDER BY name COLLATE NOCASE ASC, id ASC')
      .all();
    const trimmed = term?.trim();
    const matching = trimmed ? rows.filter((row) => matchesTerm(trimmed, [row.name, row.business_name, row.contact_id])) : rows;
    return matching.map(toSupplier);
  }

  /** Case-insensitive match on product name or sub-SKU. */
  async searchProducts(term?: string): Promise<CachedProduct[]> {
    const rows = this.db
      .prepare<[], ProductRow>('SELECT * FROM cached_products ORDER BY product_name COLLATE NOCASE ASC, id ASC')
      .all();
    const trimmed = term?.trim();
    const matching = trimmed ? rows.filter((row) => matchesTerm(trimmed, [row.product_name, row.sub_sku])) : rows;
    return matching.map(toProduct);
  }

  async listLocations(): Promise<CachedLocation[]> {
    return this.db
      .prepare<[], LocationRow>('SELECT * FROM cached_locations ORDER BY name COLLATE NOCASE ASC, id ASC')
      .all()
      .map(toLocation);
  }

  async findSupplier(id: number): Promise<CachedSupplier | null> {
    const row = this.db.prepare<[number], SupplierRow>('SELECT * FROM cached_suppliers WHERE id = ?').get(id);
    return row ? toSupplier(row) : null;
  }

  async count(entity: ReferenceEntity): Promise<number> {
    return this.countSync(entity);
  }

  clear(entity: ReferenceEntity): Promise<void> {
    return this.writes.run(() => {
      this.db.exec(`DELETE FROM ${TABLES[entity]}`);
    });
  }

  clearAll(): Promise<void> {
    return this.writes.run(() =>
      this.db.transaction(() => {
        for (const table of Object.values(TABLES)) {
          this.db.exec(`DELETE FROM ${table}`);
        }
      })()
    );
  }

  private countSync(entity: ReferenceEntity): number {
    const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${TABLES[entity]}`).get();
    return row?.count ?? 0;
  }
}
