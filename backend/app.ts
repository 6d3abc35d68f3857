import cors from "cors";
import express from "express";
import { errorHandler, notFound, requestId } from "./http";
import { authRoutes } from "./routes/auth";
import { billingRoutes } from "./routes/billing";
import type { AppDeps } from "./routes/deps";
import { productRoutes } from "./routes/products";
import { salesRoutes } from "./routes/sales";
import { superadminRoutes } from "./routes/superadmin";

export type { AppDeps } from "./routes/deps";

export function createApp(deps: AppDeps) {
  const { config, storage, logger } = deps;

  const app = express();
  app.disable("x-powered-by");
  app.use(requestId());
  app.use(cors({ origin: config.corsOrigin === "*" ? true : config.corsOrigin, credentials: true }));
  app.use(express.json({ limit: "2mb" }));

  app.get("/health", (_req, res) => {
    res.json({ ok: true, env: config.nodeEnv, db: storage.kind === "postgres" });
  });

  app.use(authRoutes(deps));
  app.use(productRoutes(deps));
  app.use(billingRoutes(deps));
  app.use(salesRoutes(deps));
  app.use(superadminRoutes(deps));

  app.use(notFound());
  app.use(errorHandler(logger));

  return app;
}
