import type { Config } from "../config";
import { errorMessage } from "../errors";
import type { Logger } from "../logger";
import type { InventoryNotifier } from "../realtime";
import type { Storage } from "../storage";

export type AppDeps = {
  storage: Storage;
  config: Config;
  logger: Logger;
  notifier: InventoryNotifier;
};

// Stock changes are already committed when this runs; a failed broadcast is only logged.
export async function notifyInventory({ notifier, logger }: AppDeps, storeId: number) {
  try {
    await notifier.inventoryChanged(storeId);
  } catch (e) {
    logger.warn("inventory broadcast failed", { storeId, error: errorMessage(e) });
  }
}
