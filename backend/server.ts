import http from "http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { attachRealtime, type InventoryNotifier } from "./realtime";
import { createStorage } from "./storage";

const config = loadConfig();
const logger = createLogger(config.logLevel);
const storage = createStorage(config);

// The socket server needs the HTTP server, the app needs the socket notifier.
let notifier: InventoryNotifier | undefined;
const app = createApp({
  config,
  storage,
  logger,
  notifier: {
    async inventoryChanged(storeId) {
      await notifier?.inventoryChanged(storeId);
    },
  },
});

const server = http.createServer(app);
const realtime = attachRealtime(server, { storage, config, logger });
notifier = realtime.notifier;

function shutdown(signal: string) {
  logger.info("shutting down", { signal });
  // Closes the HTTP server as well.
  void realtime.io.close(() => {
    storage
      .close()
      .then(() => process.exit(0))
      .catch(e => {
        logger.error("storage close failed", { error: String(e) });
        process.exit(1);
      });
  });
}

// ---------- Start ----------
(async () => {
  await storage.init();

  server.listen(config.port, () => {
    logger.info("server running", {
      port: config.port,
      health: "/health",
      db: storage.kind === "postgres" ? "PostgreSQL" : "Memory (no DATABASE_URL)",
    });
  });

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
})().catch(e => {
  logger.error("startup failed", { error: e instanceof Error ? e.message : String(e) });
  process.exit(1);
});
