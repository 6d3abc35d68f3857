import { Router } from "express";
import { requireAuth, requirePermission, storeScope } from "../auth";
import { NotFoundError } from "../errors";
import { route } from "../http";
import { saleJson } from "../serializers";
import { idParam, parseWith } from "../validation";
import type { AppDeps } from "./deps";

export function salesRoutes({ storage, config }: AppDeps) {
  const router = Router();
  router.use("/api/sales", requireAuth(storage, config));

  router.get(
    "/api/sales",
    requirePermission("sales:list"),
    route(async (req, res) => {
      const storeId = storeScope(req);
      const [store, sales] = await Promise.all([storage.getStore(storeId), storage.listSales(storeId)]);
      if (!store) throw new NotFoundError("Store not found");
      res.json({ store_name: store.name, sales: sales.map(saleJson) });
    })
  );

  router.get(
    "/api/sales/:id",
    requirePermission("sales:read"),
    route(async (req, res) => {
      const sale = await storage.getSale(storeScope(req), parseWith(idParam, req.params.id));
      if (!sale) throw new NotFoundError("Sale not found");
      res.json(saleJson(sale));
    })
  );

  return router;
}
