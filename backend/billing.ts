import {
  AppError,
  EmptyOrderError,
  InsufficientStockError,
  PersistenceError,
  ProductNotFoundError,
  errorMessage,
} from "./errors";
import type { Storage } from "./storage";
import type { BillLine, NewSaleItem, Sale } from "./types";

export function roundCurrency(amount: number) {
  return Math.round((amount + Number.EPSILON) * 100) / 100;
}

/**
 * Records a sale for `storeId` and takes its lines out of stock, all in one
 * storage transaction. Lines are checked in order against the stock as left
 * by the lines before them, so a product listed twice is validated against
 * its combined quantity. On any failure nothing is persisted.
 *
 * Precondition failures surface as `EmptyOrderError`, `ProductNotFoundError`
 * or `InsufficientStockError`; anything else thrown by storage becomes a
 * `PersistenceError`.
 */
export async function processBill(storage: Storage, storeId: number, lines: BillLine[]): Promise<Sale> {
  if (lines.length === 0) throw new EmptyOrderError();

  try {
    return await storage.transaction(async tx => {
      let total = 0;
      const items: NewSaleItem[] = [];

      for (const [index, line] of lines.entries()) {
        const product = await tx.findProduct(storeId, line.productId);
        if (!product) throw new ProductNotFoundError(line.productId, index);
        if (product.stockQuantity < line.quantity) {
          throw new InsufficientStockError(product.id, product.name, line.quantity, product.stockQuantity, index);
        }

        await tx.decrementStock(storeId, product.id, line.quantity);
        items.push({ productId: product.id, quantity: line.quantity, priceAtSale: product.price });
        total += product.price * line.quantity;
      }

      return tx.insertSale(storeId, roundCurrency(total), items);
    });
  } catch (e) {
    if (e instanceof AppError) throw e;
    throw new PersistenceError(errorMessage(e), e);
  }
}
