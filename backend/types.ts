// Largest value an INTEGER column holds.
export const MAX_INTEGER = 2_147_483_647;

// ---------- Roles ----------
export const ROLES = ["superadmin", "admin", "store"] as const;
export type Role = (typeof ROLES)[number];

export function isRole(value: unknown): value is Role {
  return ROLES.some(r => r === value);
}

// ---------- Entities ----------
export type Store = {
  id: number;
  name: string;
  location: string | null;
  /** Calendar date, `YYYY-MM-DD`. */
  licenseValidity: string;
};

export type User = {
  id: number;
  username: string;
  passwordHash: string;
  role: Role;
  storeId: number | null;
  createdAt: string;
};

export type SafeUser = Omit<User, "passwordHash">;

export type Product = {
  id: number;
  storeId: number;
  barcode: string | null;
  name: string;
  brand: string | null;
  category: string | null;
  sizeMl: number;
  price: number;
  stockQuantity: number;
};

export type SaleItem = {
  id: number;
  saleId: number;
  productId: number;
  productName: string;
  quantity: number;
  priceAtSale: number;
};

export type Sale = {
  id: number;
  storeId: number;
  totalAmount: number;
  saleDate: string;
  items: SaleItem[];
};

// ---------- Inputs ----------
export type NewStore = {
  name: string;
  location: string | null;
  licenseValidity: string;
};

export type NewUser = {
  username: string;
  password: string;
  role: Role;
  storeId: number | null;
};

export type ProductFields = Omit<Product, "id" | "storeId" | "stockQuantity">;

export type NewProduct = ProductFields & { stockQuantity: number };

export type NewSaleItem = {
  productId: number;
  quantity: number;
  priceAtSale: number;
};

export type BillLine = {
  productId: number;
  quantity: number;
};

export function safeUser(u: User): SafeUser {
  return { id: u.id, username: u.username, role: u.role, storeId: u.storeId, createdAt: u.createdAt };
}
