import { Router } from "express";
import { currentUser, requireAuth, signToken, verifyCredentials } from "../auth";
import { UnauthorizedError } from "../errors";
import { route } from "../http";
import { homeFor } from "../permissions";
import { userJson } from "../serializers";
import { safeUser } from "../types";
import { loginSchema, parseWith } from "../validation";
import type { AppDeps } from "./deps";

export function authRoutes(deps: AppDeps) {
  const { storage, config, logger } = deps;
  const router = Router();

  router.post(
    "/api/login",
    route(async (req, res) => {
      const { username, password } = parseWith(loginSchema, req.body);

      const u = await verifyCredentials(storage, username, password);
      if (!u) {
        logger.info("login rejected", { username });
        throw new UnauthorizedError("Invalid username or password.");
      }

      const token = signToken(u, config);
      res.json({ token, user: userJson(safeUser(u)), home: homeFor(u.role) });
    })
  );

  router.get(
    "/api/me",
    requireAuth(storage, config),
    route(async (req, res) => {
      const u = currentUser(req);
      res.json({ user: userJson(safeUser(u)), home: homeFor(u.role) });
    })
  );

  return router;
}
