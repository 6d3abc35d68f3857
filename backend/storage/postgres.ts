import bcrypt from "bcryptjs";
import { Pool, type QueryResult, type QueryResultRow } from "pg";
import { ConflictError } from "../errors";
import {
  isRole,
  safeUser,
  type NewProduct,
  type NewSaleItem,
  type NewStore,
  type NewUser,
  type Product,
  type ProductFields,
  type Sale,
  type SaleItem,
  type Store,
  type User,
} from "../types";
import { stockOverflow, type Storage, type StorageTx } from "./storage";

// The slice of pg's Pool/PoolClient this module relies on.
export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
  /** Passing an error makes the pool discard the connection. */
  release(err?: Error): void;
}

export interface SqlPool {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

export type PostgresStorageOptions = {
  superadminUsername: string;
  superadminPassword: string;
  bcryptRounds: number;
};

export const SCHEMA = `
  CREATE TABLE IF NOT EXISTS stores (
    id SERIAL PRIMARY KEY,
    name VARCHAR(100) UNIQUE NOT NULL,
    location VARCHAR(200),
    license_validity DATE NOT NULL
  );

  CREATE TABLE IF NOT EXISTS app_users (
    id SERIAL PRIMARY KEY,
    username VARCHAR(80) UNIQUE NOT NULL,
    password_hash VARCHAR(200) NOT NULL,
    role VARCHAR(20) NOT NULL CHECK (role IN ('superadmin', 'admin', 'store')),
    store_id INTEGER REFERENCES stores(id),
    created_at TIMESTAMPTZ NOT NULL DEFAULT now()
  );

  CREATE TABLE IF NOT EXISTS products (
    id SERIAL PRIMARY KEY,
    store_id INTEGER NOT NULL REFERENCES stores(id),
    barcode VARCHAR(100),
    name VARCHAR(100) NOT NULL,
    brand VARCHAR(100),
    category VARCHAR(50),
    size_ml INTEGER NOT NULL,
    price DOUBLE PRECISION NOT NULL,
    stock_quantity INTEGER NOT NULL DEFAULT 0 CHECK (stock_quantity >= 0)
  );

  CREATE TABLE IF NOT EXISTS sales (
    id SERIAL PRIMARY KEY,
    store_id INTEGER NOT NULL REFERENCES stores(id),
    total_amount DOUBLE PRECISION NOT NULL,
    sale_date TIMESTAMPTZ NOT NULL DEFAULT now()
  );

  CREATE TABLE IF NOT EXISTS sale_items (
    id SERIAL PRIMARY KEY,
    sale_id INTEGER NOT NULL REFERENCES sales(id) ON DELETE CASCADE,
    product_id INTEGER NOT NULL REFERENCES products(id),
    quantity INTEGER NOT NULL,
    price_at_sale DOUBLE PRECISION NOT NULL
  );
`;

// ---------- Row mapping ----------
type StoreRow = { id: number; name: string; location: string | null; license_validity: string };
type UserRow = {
  id: number;
  username: string;
  password_hash: string;
  role: string;
  store_id: number | null;
  created_at: Date;
};
type ProductRow = {
  id: number;
  store_id: number;
  barcode: string | null;
  name: string;
  brand: string | null;
  category: string | null;
  size_ml: number;
  price: number;
  stock_quantity: number;
};
type SaleRow = { id: number; store_id: number; total_amount: number; sale_date: Date };
type SaleItemRow = {
  id: number;
  sale_id: number;
  product_id: number;
  product_name: string;
  quantity: number;
  price_at_sale: number;
};

const STORE_COLUMNS = `id, name, location, license_validity::text AS license_validity`;
const USER_COLUMNS = `id, username, password_hash, role, store_id, created_at`;
const PRODUCT_COLUMNS = `id, store_id, barcode, name, brand, category, size_ml, price, stock_quantity`;

function toStore(r: StoreRow): Store {
  return { id: r.id, name: r.name, location: r.location, licenseValidity: r.license_validity };
}

function toUser(r: UserRow): User {
  if (!isRole(r.role)) throw new Error(`Unknown role "${r.role}" for user ${r.id}`);
  return {
    id: r.id,
    username: r.username,
    passwordHash: r.password_hash,
    role: r.role,
    storeId: r.store_id,
    createdAt: new Date(r.created_at).toISOString(),
  };
}

function toProduct(r: ProductRow): Product {
  return {
    id: r.id,
    storeId: r.store_id,
    barcode: r.barcode,
    name: r.name,
    brand: r.brand,
    category: r.category,
    sizeMl: r.size_ml,
    price: Number(r.price),
    stockQuantity: r.stock_quantity,
  };
}

function toSaleItem(r: SaleItemRow): SaleItem {
  return {
    id: r.id,
    saleId: r.sale_id,
    productId: r.product_id,
    productName: r.product_name,
    quantity: r.quantity,
    priceAtSale: Number(r.price_at_sale),
  };
}

function hasCode(e: unknown, code: string) {
  return typeof e === "object" && e !== null && "code" in e && e.code === code;
}

const isUniqueViolation = (e: unknown) => hasCode(e, "23505");
const isNumericOverflow = (e: unknown) => hasCode(e, "22003");

type Queryable = Pick<SqlClient, "query">;

async function loadSales(db: Queryable, sales: SaleRow[]): Promise<Sale[]> {
  if (sales.length === 0) return [];
  const r = await db.query<SaleItemRow>(
    `SELECT si.id, si.sale_id, si.product_id, p.name AS product_name, si.quantity, si.price_at_sale
     FROM sale_items si
     JOIN products p ON p.id = si.product_id
     WHERE si.sale_id = ANY($1::int[])
     ORDER BY si.id ASC`,
    [sales.map(s => s.id)]
  );
  const items = r.rows.map(toSaleItem);
  return sales.map(s => ({
    id: s.id,
    storeId: s.store_id,
    totalAmount: Number(s.total_amount),
    saleDate: new Date(s.sale_date).toISOString(),
    items: items.filter(i => i.saleId === s.id),
  }));
}

class PostgresTx implements StorageTx {
  constructor(private client: SqlClient) {}

  async findProduct(storeId: number, productId: number) {
    // Row lock held until COMMIT/ROLLBACK so concurrent bills cannot oversell.
    const r = await this.client.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id=$1 AND store_id=$2 FOR UPDATE`,
      [productId, storeId]
    );
    return r.rows.length ? toProduct(r.rows[0]) : null;
  }

  async decrementStock(storeId: number, productId: number, quantity: number) {
    const r = await this.client.query(
      `UPDATE products
       SET stock_quantity = stock_quantity - $3
       WHERE id = $1 AND store_id = $2 AND stock_quantity >= $3`,
      [productId, storeId, quantity]
    );
    if (r.rowCount !== 1) throw new Error(`Stock of product ${productId} would go negative`);
  }

  async insertSale(storeId: number, totalAmount: number, items: NewSaleItem[]) {
    const r = await this.client.query<SaleRow>(
      `INSERT INTO sales (store_id, total_amount) VALUES ($1, $2)
       RETURNING id, store_id, total_amount, sale_date`,
      [storeId, totalAmount]
    );
    const sale = r.rows[0];
    for (const item of items) {
      await this.client.query(
        `INSERT INTO sale_items (sale_id, product_id, quantity, price_at_sale) VALUES ($1, $2, $3, $4)`,
        [sale.id, item.productId, item.quantity, item.priceAtSale]
      );
    }
    const [hydrated] = await loadSales(this.client, [sale]);
    return hydrated;
  }
}

export function createPool(url: string, ssl: boolean): SqlPool {
  return new Pool({
    connectionString: url,
    ssl: ssl ? { rejectUnauthorized: false } : false,
  });
}

export class PostgresStorage implements Storage {
  readonly kind = "postgres" as const;

  constructor(private pool: SqlPool, private opts: PostgresStorageOptions) {}

  async init() {
    await this.pool.query(SCHEMA);

    const r = await this.pool.query(`SELECT id FROM app_users WHERE username=$1 LIMIT 1`, [
      this.opts.superadminUsername,
    ]);
    if (r.rows.length === 0) {
      await this.createUser({
        username: this.opts.superadminUsername,
        password: this.opts.superadminPassword,
        role: "superadmin",
        storeId: null,
      });
    }
  }

  async close() {
    await this.pool.end();
  }

  // ---- Stores ----

  async createStore(s: NewStore) {
    try {
      const r = await this.pool.query<StoreRow>(
        `INSERT INTO stores (name, location, license_validity) VALUES ($1, $2, $3)
         RETURNING ${STORE_COLUMNS}`,
        [s.name, s.location, s.licenseValidity]
      );
      return toStore(r.rows[0]);
    } catch (e) {
      if (isUniqueViolation(e)) throw new ConflictError(`Store "${s.name}" already exists`);
      throw e;
    }
  }

  async getStore(id: number) {
    const r = await this.pool.query<StoreRow>(`SELECT ${STORE_COLUMNS} FROM stores WHERE id=$1`, [id]);
    return r.rows.length ? toStore(r.rows[0]) : null;
  }

  async listStoresByLicense() {
    const r = await this.pool.query<StoreRow>(
      `SELECT ${STORE_COLUMNS} FROM stores ORDER BY license_validity ASC, id ASC`
    );
    return r.rows.map(toStore);
  }

  async updateLicense(id: number, licenseValidity: string) {
    const r = await this.pool.query<StoreRow>(
      `UPDATE stores SET license_validity=$2 WHERE id=$1 RETURNING ${STORE_COLUMNS}`,
      [id, licenseValidity]
    );
    return r.rows.length ? toStore(r.rows[0]) : null;
  }

  // ---- Users ----

  async createUser(u: NewUser) {
    const passwordHash = await bcrypt.hash(u.password, this.opts.bcryptRounds);
    try {
      const r = await this.pool.query<UserRow>(
        `INSERT INTO app_users (username, password_hash, role, store_id)
         VALUES ($1, $2, $3, $4)
         RETURNING ${USER_COLUMNS}`,
        [u.username, passwordHash, u.role, u.storeId]
      );
      return safeUser(toUser(r.rows[0]));
    } catch (e) {
      if (isUniqueViolation(e)) throw new ConflictError(`Username "${u.username}" already exists`);
      throw e;
    }
  }

  async findUserById(id: number) {
    const r = await this.pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM app_users WHERE id=$1`, [id]);
    return r.rows.length ? toUser(r.rows[0]) : null;
  }

  async findUserByUsername(username: string) {
    const r = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM app_users WHERE username=$1 LIMIT 1`,
      [username]
    );
    return r.rows.length ? toUser(r.rows[0]) : null;
  }

  async listUsers() {
    const r = await this.pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM app_users ORDER BY id ASC`);
    return r.rows.map(row => safeUser(toUser(row)));
  }

  // ---- Products ----

  async listProducts(storeId: number, opts: { inStockOnly?: boolean } = {}) {
    const r = await this.pool.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products
       WHERE store_id=$1 ${opts.inStockOnly ? "AND stock_quantity > 0" : ""}
       ORDER BY name ASC, id ASC`,
      [storeId]
    );
    return r.rows.map(toProduct);
  }

  async getProduct(storeId: number, productId: number) {
    const r = await this.pool.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id=$1 AND store_id=$2`,
      [productId, storeId]
    );
    return r.rows.length ? toProduct(r.rows[0]) : null;
  }

  async createProduct(storeId: number, p: NewProduct) {
    const r = await this.pool.query<ProductRow>(
      `INSERT INTO products (store_id, barcode, name, brand, category, size_ml, price, stock_quantity)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING ${PRODUCT_COLUMNS}`,
      [storeId, p.barcode, p.name, p.brand, p.category, p.sizeMl, p.price, p.stockQuantity]
    );
    return toProduct(r.rows[0]);
  }

  async updateProduct(storeId: number, productId: number, fields: Partial<ProductFields>) {
    const r = await this.pool.query<ProductRow>(
      `UPDATE products SET
         barcode = CASE WHEN $3 THEN $4 ELSE barcode END,
         name = COALESCE($5, name),
         brand = CASE WHEN $6 THEN $7 ELSE brand END,
         category = CASE WHEN $8 THEN $9 ELSE category END,
         size_ml = COALESCE($10, size_ml),
         price = COALESCE($11, price)
       WHERE id=$1 AND store_id=$2
       RETURNING ${PRODUCT_COLUMNS}`,
      [
        productId,
        storeId,
        fields.barcode !== undefined,
        fields.barcode ?? null,
        fields.name ?? null,
        fields.brand !== undefined,
        fields.brand ?? null,
        fields.category !== undefined,
        fields.category ?? null,
        fields.sizeMl ?? null,
        fields.price ?? null,
      ]
    );
    return r.rows.length ? toProduct(r.rows[0]) : null;
  }

  async addStock(storeId: number, productId: number, quantity: number) {
    try {
      const r = await this.pool.query<ProductRow>(
        `UPDATE products SET stock_quantity = stock_quantity + $3
         WHERE id=$1 AND store_id=$2
         RETURNING ${PRODUCT_COLUMNS}`,
        [productId, storeId, quantity]
      );
      return r.rows.length ? toProduct(r.rows[0]) : null;
    } catch (e) {
      if (isNumericOverflow(e)) throw stockOverflow(productId);
      throw e;
    }
  }

  // ---- Sales ----

  async listSales(storeId: number) {
    const r = await this.pool.query<SaleRow>(
      `SELECT id, store_id, total_amount, sale_date FROM sales
       WHERE store_id=$1
       ORDER BY sale_date DESC, id DESC`,
      [storeId]
    );
    return loadSales(this.pool, r.rows);
  }

  async getSale(storeId: number, saleId: number) {
    const r = await this.pool.query<SaleRow>(
      `SELECT id, store_id, total_amount, sale_date FROM sales WHERE id=$1 AND store_id=$2`,
      [saleId, storeId]
    );
    const [sale] = await loadSales(this.pool, r.rows);
    return sale ?? null;
  }

  async transaction<T>(fn: (tx: StorageTx) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    let broken: Error | undefined;
    try {
      await client.query("BEGIN");
      const result = await fn(new PostgresTx(client));
      await client.query("COMMIT");
      return result;
    } catch (e) {
      // A failed ROLLBACK leaves the connection unusable; the original error still wins.
      await client.query("ROLLBACK").catch((rollbackError: unknown) => {
        broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      });
      throw e;
    } finally {
      client.release(broken);
    }
  }
}
