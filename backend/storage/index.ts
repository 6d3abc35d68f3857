import type { Config } from "../config";
import { MemoryStorage } from "./memory";
import { PostgresStorage, createPool } from "./postgres";
import type { Storage } from "./storage";

export type { Storage, StorageTx } from "./storage";
export { MemoryStorage } from "./memory";
export { PostgresStorage } from "./postgres";

// PostgreSQL when DATABASE_URL is set, otherwise process memory.
export function createStorage(config: Config): Storage {
  const opts = {
    superadminUsername: config.superadminUsername,
    superadminPassword: config.superadminPassword,
    bcryptRounds: config.bcryptRounds,
  };
  if (config.databaseUrl) {
    return new PostgresStorage(createPool(config.databaseUrl, config.databaseSsl), opts);
  }
  return new MemoryStorage(opts);
}
