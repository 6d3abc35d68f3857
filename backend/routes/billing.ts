import { Router } from "express";
import { requireAuth, requirePermission, storeScope } from "../auth";
import { processBill } from "../billing";
import { route } from "../http";
import { billSchema, parseWith } from "../validation";
import { notifyInventory, type AppDeps } from "./deps";

export function billingRoutes(deps: AppDeps) {
  const { storage, config, logger } = deps;
  const router = Router();

  router.post(
    "/api/process_bill",
    requireAuth(storage, config),
    requirePermission("bills:process"),
    route(async (req, res) => {
      const storeId = storeScope(req);
      const { items } = parseWith(billSchema, req.body);

      const sale = await processBill(
        storage,
        storeId,
        items.map(i => ({ productId: i.id, quantity: i.quantity }))
      );

      logger.info("bill processed", {
        storeId,
        saleId: sale.id,
        lines: sale.items.length,
        totalAmount: sale.totalAmount,
      });
      await notifyInventory(deps, storeId);
      res.json({ success: true, sale_id: sale.id });
    })
  );

  return router;
}
