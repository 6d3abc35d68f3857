import { Router } from "express";
import { requireAuth, requirePermission } from "../auth";
import { NotFoundError, ValidationError } from "../errors";
import { route } from "../http";
import { storeJson, userJson } from "../serializers";
import {
  createStoreSchema,
  createUserSchema,
  idParam,
  parseWith,
  today,
  updateLicenseSchema,
} from "../validation";
import type { AppDeps } from "./deps";

export function superadminRoutes({ storage, config, logger }: AppDeps) {
  const router = Router();
  router.use("/api/superadmin", requireAuth(storage, config));

  // ---- Stores ----
  router.get(
    "/api/superadmin/stores",
    requirePermission("stores:list"),
    route(async (_req, res) => {
      const day = today();
      const stores = await storage.listStoresByLicense();
      res.json({ today: day, stores: stores.map(s => storeJson(s, day)) });
    })
  );

  router.post(
    "/api/superadmin/stores",
    requirePermission("stores:create"),
    route(async (req, res) => {
      const body = parseWith(createStoreSchema, req.body);
      const store = await storage.createStore({
        name: body.name,
        location: body.location,
        licenseValidity: body.license_validity,
      });
      logger.info("store created", { storeId: store.id, name: store.name });
      res.status(201).json(storeJson(store, today()));
    })
  );

  router.post(
    "/api/superadmin/stores/:id/license",
    requirePermission("stores:updateLicense"),
    route(async (req, res) => {
      const id = parseWith(idParam, req.params.id);
      const { new_validity } = parseWith(updateLicenseSchema, req.body);
      const store = await storage.updateLicense(id, new_validity);
      if (!store) throw new NotFoundError("Store not found");
      logger.info("license updated", { storeId: id, licenseValidity: new_validity });
      res.json(storeJson(store, today()));
    })
  );

  // ---- Users ----
  router.get(
    "/api/superadmin/users",
    requirePermission("users:list"),
    route(async (_req, res) => {
      const users = await storage.listUsers();
      res.json(users.map(userJson));
    })
  );

  router.post(
    "/api/superadmin/users",
    requirePermission("users:create"),
    route(async (req, res) => {
      const body = parseWith(createUserSchema, req.body);
      if (body.store_id !== null && !(await storage.getStore(body.store_id))) {
        throw new ValidationError(`store_id: store ${body.store_id} does not exist`);
      }
      const u = await storage.createUser({
        username: body.username,
        password: body.password,
        role: body.role,
        storeId: body.store_id,
      });
      logger.info("user created", { userId: u.id, role: u.role, storeId: u.storeId });
      res.status(201).json(userJson(u));
    })
  );

  return router;
}
