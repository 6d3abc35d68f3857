import type { Product, SafeUser, Sale, Store } from "./types";

export type ProductJson = {
  id: number;
  barcode: string | null;
  name: string;
  brand: string | null;
  category: string | null;
  size_ml: number;
  price: number;
  stock_quantity: number;
};

export function productJson(p: Product): ProductJson {
  return {
    id: p.id,
    barcode: p.barcode,
    name: p.name,
    brand: p.brand,
    category: p.category,
    size_ml: p.sizeMl,
    price: p.price,
    stock_quantity: p.stockQuantity,
  };
}

export function saleJson(s: Sale) {
  return {
    id: s.id,
    total_amount: s.totalAmount,
    sale_date: s.saleDate,
    items: s.items.map(i => ({
      id: i.id,
      product_id: i.productId,
      product_name: i.productName,
      quantity: i.quantity,
      price_at_sale: i.priceAtSale,
    })),
  };
}

export function storeJson(s: Store, today?: string) {
  return {
    id: s.id,
    name: s.name,
    location: s.location,
    license_validity: s.licenseValidity,
    ...(today === undefined ? {} : { license_expired: s.licenseValidity < today }),
  };
}

export function userJson(u: SafeUser) {
  return {
    id: u.id,
    username: u.username,
    role: u.role,
    store_id: u.storeId,
    created_at: u.createdAt,
  };
}
