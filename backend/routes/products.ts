import { Router } from "express";
import { requireAuth, requirePermission, storeScope } from "../auth";
import { NotFoundError } from "../errors";
import { route } from "../http";
import { productJson } from "../serializers";
import {
  addStockSchema,
  createProductSchema,
  idParam,
  parseWith,
  updateProductSchema,
} from "../validation";
import { notifyInventory, type AppDeps } from "./deps";

export function productRoutes(deps: AppDeps) {
  const { storage, config, logger } = deps;
  const router = Router();
  router.use(["/api/products", "/api/dashboard"], requireAuth(storage, config));

  // Billing screen: only what can be sold right now.
  router.get(
    "/api/products",
    requirePermission("products:available"),
    route(async (req, res) => {
      const products = await storage.listProducts(storeScope(req), { inStockOnly: true });
      res.json(products.map(productJson));
    })
  );

  router.get(
    "/api/dashboard",
    requirePermission("products:list"),
    route(async (req, res) => {
      const products = await storage.listProducts(storeScope(req));
      res.json(products.map(productJson));
    })
  );

  router.post(
    "/api/products",
    requirePermission("products:create"),
    route(async (req, res) => {
      const storeId = storeScope(req);
      const body = parseWith(createProductSchema, req.body);
      const p = await storage.createProduct(storeId, {
        barcode: body.barcode,
        name: body.name,
        brand: body.brand,
        category: body.category,
        sizeMl: body.size_ml,
        price: body.price,
        stockQuantity: body.stock_quantity,
      });
      logger.info("product created", { storeId, productId: p.id });
      await notifyInventory(deps, storeId);
      res.status(201).json(productJson(p));
    })
  );

  router.patch(
    "/api/products/:id",
    requirePermission("products:update"),
    route(async (req, res) => {
      const storeId = storeScope(req);
      const id = parseWith(idParam, req.params.id);
      const body = parseWith(updateProductSchema, req.body);
      const p = await storage.updateProduct(storeId, id, {
        barcode: body.barcode,
        name: body.name,
        brand: body.brand,
        category: body.category,
        sizeMl: body.size_ml,
        price: body.price,
      });
      if (!p) throw new NotFoundError("Product not found");
      await notifyInventory(deps, storeId);
      res.json(productJson(p));
    })
  );

  router.post(
    "/api/products/:id/stock",
    requirePermission("products:addStock"),
    route(async (req, res) => {
      const storeId = storeScope(req);
      const id = parseWith(idParam, req.params.id);
      const { add_stock } = parseWith(addStockSchema, req.body);
      const p = await storage.addStock(storeId, id, add_stock);
      if (!p) throw new NotFoundError("Product not found");
      logger.info("stock added", { storeId, productId: id, quantity: add_stock });
      await notifyInventory(deps, storeId);
      res.json(productJson(p));
    })
  );

  return router;
}
