import bcrypt from "bcryptjs";
import { ConflictError } from "../errors";
import {
  MAX_INTEGER,
  safeUser,
  type NewProduct,
  type NewSaleItem,
  type NewStore,
  type NewUser,
  type Product,
  type ProductFields,
  type Sale,
  type Store,
  type User,
} from "../types";
import { applyProductFields, byName, nowISO, stockOverflow, type Storage, type StorageTx } from "./storage";

type SaleRow = Omit<Sale, "items">;
type SaleItemRow = { id: number; saleId: number; productId: number; quantity: number; priceAtSale: number };

type State = {
  stores: Store[];
  users: User[];
  products: Product[];
  sales: SaleRow[];
  saleItems: SaleItemRow[];
  seq: { store: number; user: number; product: number; sale: number; saleItem: number };
};

export type MemoryStorageOptions = {
  superadminUsername: string;
  superadminPassword: string;
  bcryptRounds: number;
};

function emptyState(): State {
  return {
    stores: [],
    users: [],
    products: [],
    sales: [],
    saleItems: [],
    seq: { store: 0, user: 0, product: 0, sale: 0, saleItem: 0 },
  };
}

function findProduct(state: State, storeId: number, productId: number) {
  return state.products.find(p => p.id === productId && p.storeId === storeId);
}

function hydrateSale(state: State, row: SaleRow): Sale {
  const items = state.saleItems
    .filter(i => i.saleId === row.id)
    .map(i => ({
      ...i,
      productName: state.products.find(p => p.id === i.productId)?.name ?? "",
    }));
  return { ...row, items };
}

class MemoryTx implements StorageTx {
  constructor(private draft: State) {}

  async findProduct(storeId: number, productId: number) {
    const p = findProduct(this.draft, storeId, productId);
    return p ? { ...p } : null;
  }

  async decrementStock(storeId: number, productId: number, quantity: number) {
    const p = findProduct(this.draft, storeId, productId);
    if (!p) throw new Error(`Product ${productId} vanished during transaction`);
    if (p.stockQuantity < quantity) throw new Error(`Stock of product ${productId} would go negative`);
    p.stockQuantity -= quantity;
  }

  async insertSale(storeId: number, totalAmount: number, items: NewSaleItem[]) {
    const sale: SaleRow = { id: ++this.draft.seq.sale, storeId, totalAmount, saleDate: nowISO() };
    this.draft.sales.push(sale);
    for (const item of items) {
      this.draft.saleItems.push({ id: ++this.draft.seq.saleItem, saleId: sale.id, ...item });
    }
    return hydrateSale(this.draft, sale);
  }
}

/**
 * Process-local storage used when no DATABASE_URL is configured and in tests.
 * Writers are serialized; a transaction works on a copy of the state that is
 * swapped in only once its callback resolves.
 */
export class MemoryStorage implements Storage {
  readonly kind = "memory" as const;

  private state: State = emptyState();
  private queue: Promise<void> = Promise.resolve();

  constructor(private opts: MemoryStorageOptions) {}

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.queue.then(fn);
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  async init() {
    if (this.state.users.some(u => u.username === this.opts.superadminUsername)) return;
    await this.createUser({
      username: this.opts.superadminUsername,
      password: this.opts.superadminPassword,
      role: "superadmin",
      storeId: null,
    });
  }

  async close() {
    await this.queue;
  }

  // ---- Stores ----

  createStore(s: NewStore) {
    return this.exclusive(async () => {
      if (this.state.stores.some(x => x.name === s.name)) {
        throw new ConflictError(`Store "${s.name}" already exists`);
      }
      const store: Store = { id: ++this.state.seq.store, ...s };
      this.state.stores.push(store);
      return { ...store };
    });
  }

  async getStore(id: number) {
    const s = this.state.stores.find(x => x.id === id);
    return s ? { ...s } : null;
  }

  async listStoresByLicense() {
    return [...this.state.stores]
      .sort((a, b) => a.licenseValidity.localeCompare(b.licenseValidity) || a.id - b.id)
      .map(s => ({ ...s }));
  }

  updateLicense(id: number, licenseValidity: string) {
    return this.exclusive(async () => {
      const s = this.state.stores.find(x => x.id === id);
      if (!s) return null;
      s.licenseValidity = licenseValidity;
      return { ...s };
    });
  }

  // ---- Users ----

  async createUser(u: NewUser) {
    const passwordHash = await bcrypt.hash(u.password, this.opts.bcryptRounds);
    return this.exclusive(async () => {
      if (this.state.users.some(x => x.username === u.username)) {
        throw new ConflictError(`Username "${u.username}" already exists`);
      }
      const nu: User = {
        id: ++this.state.seq.user,
        username: u.username,
        passwordHash,
        role: u.role,
        storeId: u.storeId,
        createdAt: nowISO(),
      };
      this.state.users.push(nu);
      return safeUser(nu);
    });
  }

  async findUserById(id: number) {
    const u = this.state.users.find(x => x.id === id);
    return u ? { ...u } : null;
  }

  async findUserByUsername(username: string) {
    const u = this.state.users.find(x => x.username === username);
    return u ? { ...u } : null;
  }

  async listUsers() {
    return this.state.users.map(safeUser);
  }

  // ---- Products ----

  async listProducts(storeId: number, opts: { inStockOnly?: boolean } = {}) {
    return this.state.products
      .filter(p => p.storeId === storeId && (!opts.inStockOnly || p.stockQuantity > 0))
      .sort(byName)
      .map(p => ({ ...p }));
  }

  async getProduct(storeId: number, productId: number) {
    const p = findProduct(this.state, storeId, productId);
    return p ? { ...p } : null;
  }

  createProduct(storeId: number, p: NewProduct) {
    return this.exclusive(async () => {
      const product: Product = { id: ++this.state.seq.product, storeId, ...p };
      this.state.products.push(product);
      return { ...product };
    });
  }

  updateProduct(storeId: number, productId: number, fields: Partial<ProductFields>) {
    return this.exclusive(async () => {
      const index = this.state.products.findIndex(p => p.id === productId && p.storeId === storeId);
      if (index < 0) return null;
      const updated = applyProductFields(this.state.products[index], fields);
      this.state.products[index] = updated;
      return { ...updated };
    });
  }

  addStock(storeId: number, productId: number, quantity: number) {
    return this.exclusive(async () => {
      const p = findProduct(this.state, storeId, productId);
      if (!p) return null;
      if (p.stockQuantity + quantity > MAX_INTEGER) throw stockOverflow(productId);
      p.stockQuantity += quantity;
      return { ...p };
    });
  }

  // ---- Sales ----

  async listSales(storeId: number) {
    return this.state.sales
      .filter(s => s.storeId === storeId)
      .sort((a, b) => b.saleDate.localeCompare(a.saleDate) || b.id - a.id)
      .map(s => hydrateSale(this.state, s));
  }

  async getSale(storeId: number, saleId: number) {
    const row = this.state.sales.find(s => s.id === saleId && s.storeId === storeId);
    return row ? hydrateSale(this.state, row) : null;
  }

  transaction<T>(fn: (tx: StorageTx) => Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      const draft = structuredClone(this.state);
      const result = await fn(new MemoryTx(draft));
      this.state = draft;
      return result;
    });
  }
}
