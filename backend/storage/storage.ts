import { ValidationError } from "../errors";
import {
  MAX_INTEGER,
  type NewProduct,
  type NewSaleItem,
  type NewStore,
  type NewUser,
  type Product,
  type ProductFields,
  type SafeUser,
  type Sale,
  type Store,
  type User,
} from "../types";

/** Transactional view handed to `Storage.transaction` callbacks. */
export interface StorageTx {
  /** Current state of a store's product, including changes staged earlier in this transaction. */
  findProduct(storeId: number, productId: number): Promise<Product | null>;
  decrementStock(storeId: number, productId: number, quantity: number): Promise<void>;
  insertSale(storeId: number, totalAmount: number, items: NewSaleItem[]): Promise<Sale>;
}

export interface Storage {
  readonly kind: "memory" | "postgres";

  init(): Promise<void>;
  close(): Promise<void>;

  // ---- Stores ----
  createStore(s: NewStore): Promise<Store>;
  getStore(id: number): Promise<Store | null>;
  listStoresByLicense(): Promise<Store[]>;
  updateLicense(id: number, licenseValidity: string): Promise<Store | null>;

  // ---- Users ----
  createUser(u: NewUser): Promise<SafeUser>;
  findUserById(id: number): Promise<User | null>;
  findUserByUsername(username: string): Promise<User | null>;
  listUsers(): Promise<SafeUser[]>;

  // ---- Products ----
  listProducts(storeId: number, opts?: { inStockOnly?: boolean }): Promise<Product[]>;
  getProduct(storeId: number, productId: number): Promise<Product | null>;
  createProduct(storeId: number, p: NewProduct): Promise<Product>;
  updateProduct(storeId: number, productId: number, fields: Partial<ProductFields>): Promise<Product | null>;
  addStock(storeId: number, productId: number, quantity: number): Promise<Product | null>;

  // ---- Sales ----
  listSales(storeId: number): Promise<Sale[]>;
  getSale(storeId: number, saleId: number): Promise<Sale | null>;

  /** Commits when `fn` resolves, rolls back everything `fn` staged when it rejects. */
  transaction<T>(fn: (tx: StorageTx) => Promise<T>): Promise<T>;
}

export function stockOverflow(productId: number) {
  return new ValidationError(`add_stock: stock of product ${productId} cannot exceed ${MAX_INTEGER}`);
}

export function nowISO() {
  return new Date().toISOString();
}

/** Copies the defined fields onto a copy of `p`; `null` clears an optional field. */
export function applyProductFields(p: Product, fields: Partial<ProductFields>): Product {
  const next = { ...p };
  if (fields.barcode !== undefined) next.barcode = fields.barcode;
  if (fields.name !== undefined) next.name = fields.name;
  if (fields.brand !== undefined) next.brand = fields.brand;
  if (fields.category !== undefined) next.category = fields.category;
  if (fields.sizeMl !== undefined) next.sizeMl = fields.sizeMl;
  if (fields.price !== undefined) next.price = fields.price;
  return next;
}

export function byName(a: { id: number; name: string }, b: { id: number; name: string }) {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : a.id - b.id;
}
