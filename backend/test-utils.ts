import http from "http";
import { createApp } from "./app";
import { signToken } from "./auth";
import { loadConfig } from "./config";
import type { Logger } from "./logger";
import { silentNotifier, type InventoryNotifier } from "./realtime";
import { MemoryStorage, type Storage } from "./storage";
import type { NewProduct, Role } from "./types";

export const testConfig = loadConfig({
  NODE_ENV: "test",
  JWT_SECRET: "test-secret",
  BCRYPT_ROUNDS: "4",
  SUPERADMIN_USERNAME: "root",
  SUPERADMIN_PASSWORD: "root-pass",
  LOG_LEVEL: "error",
});

export const quietLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child: () => quietLogger,
};

export type LogEntry = { level: "debug" | "info" | "warn" | "error"; msg: string; fields: Record<string, unknown> };

/** Logger that keeps every entry, with child bindings merged in. */
export function recordingLogger(entries: LogEntry[] = [], base: Record<string, unknown> = {}): Logger & {
  entries: LogEntry[];
} {
  const record = (level: LogEntry["level"]) => (msg: string, fields: Record<string, unknown> = {}) => {
    entries.push({ level, msg, fields: { ...base, ...fields } });
  };
  return {
    entries,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    child: fields => recordingLogger(entries, { ...base, ...fields }),
  };
}

export function memoryStorage() {
  return new MemoryStorage({
    superadminUsername: testConfig.superadminUsername,
    superadminPassword: testConfig.superadminPassword,
    bcryptRounds: testConfig.bcryptRounds,
  });
}

export function product(overrides: Partial<NewProduct> = {}): NewProduct {
  return {
    barcode: null,
    name: "Lager",
    brand: "Northbrew",
    category: "Beer",
    sizeMl: 500,
    price: 10,
    stockQuantity: 5,
    ...overrides,
  };
}

export async function userWithToken(storage: Storage, username: string, role: Role, storeId: number | null) {
  const created = await storage.createUser({ username, password: "test-password", role, storeId });
  const user = await storage.findUserById(created.id);
  if (!user) throw new Error(`user ${username} was not stored`);
  return { user, token: signToken(user, testConfig) };
}

export type TestServer = {
  storage: Storage;
  server: http.Server;
  baseUrl: string;
  /** `T` is the body shape the test expects; it is not checked at run time. */
  request<T = unknown>(
    method: string,
    path: string,
    opts?: { token?: string; body?: unknown }
  ): Promise<{ status: number; body: T; headers: Headers }>;
  close(): Promise<void>;
};

export async function startTestServer(
  storage: Storage = memoryStorage(),
  notifier: InventoryNotifier = silentNotifier,
  logger: Logger = quietLogger
): Promise<TestServer> {
  await storage.init();
  const app = createApp({ storage, config: testConfig, logger, notifier });
  const server = http.createServer(app);
  await new Promise<void>(resolve => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("test server has no TCP address");
  const baseUrl = `http://127.0.0.1:${address.port}`;

  return {
    storage,
    server,
    baseUrl,
    async request<T>(method: string, path: string, opts: { token?: string; body?: unknown } = {}) {
      const headers: Record<string, string> = {};
      if (opts.token) headers.Authorization = `Bearer ${opts.token}`;
      if (opts.body !== undefined) headers["Content-Type"] = "application/json";
      const r = await fetch(baseUrl + path, {
        method,
        headers,
        body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
      });
      const text = await r.text();
      const body: T = JSON.parse(text || "null");
      return { status: r.status, body, headers: r.headers };
    },
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
      }),
  };
}
