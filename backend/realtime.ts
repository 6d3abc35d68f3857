import type http from "http";
import { Server as SocketIOServer } from "socket.io";
import { bearerToken, userFromToken } from "./auth";
import type { Config } from "./config";
import { errorMessage } from "./errors";
import type { Logger } from "./logger";
import { can } from "./permissions";
import { productJson, type ProductJson } from "./serializers";
import type { Storage } from "./storage";
import type { User } from "./types";

export interface InventoryNotifier {
  inventoryChanged(storeId: number): Promise<void>;
}

export const silentNotifier: InventoryNotifier = {
  async inventoryChanged() {},
};

type ServerToClient = {
  "inventory:snapshot": (products: ProductJson[]) => void;
  "inventory:update": (products: ProductJson[]) => void;
};

type ClientToServer = {
  "inventory:pull": () => void;
};

type SocketData = { user: User };

export type RealtimeServer = SocketIOServer<ClientToServer, ServerToClient, Record<string, never>, SocketData>;

const roomFor = (storeId: number) => `store:${storeId}`;

type RealtimeDeps = {
  storage: Storage;
  config: Pick<Config, "jwtSecret" | "corsOrigin">;
  logger: Logger;
};

/**
 * Socket.IO channel for billing screens. Clients authenticate with the same
 * bearer token as the HTTP API and only ever join their own store's room.
 */
export function attachRealtime(server: http.Server, { storage, config, logger }: RealtimeDeps) {
  const io: RealtimeServer = new SocketIOServer<ClientToServer, ServerToClient, Record<string, never>, SocketData>(server, {
    cors: { origin: config.corsOrigin === "*" ? true : config.corsOrigin, credentials: true },
  });

  io.use((socket, next) => {
    const fromAuth: unknown = socket.handshake.auth?.token;
    const token =
      typeof fromAuth === "string" && fromAuth ? fromAuth : bearerToken(socket.handshake.headers.authorization);

    userFromToken(token, storage, config.jwtSecret)
      .then(user => {
        socket.data.user = user;
        next();
      })
      .catch(e => next(new Error(errorMessage(e))));
  });

  async function availableProducts(storeId: number) {
    const products = await storage.listProducts(storeId, { inStockOnly: true });
    return products.map(productJson);
  }

  io.on("connection", socket => {
    const { user } = socket.data;
    if (user.storeId === null || !can(user.role, "products:available")) return;
    const storeId = user.storeId;

    const sendSnapshot = () =>
      availableProducts(storeId)
        .then(products => {
          socket.emit("inventory:snapshot", products);
        })
        .catch(e => logger.error("inventory snapshot failed", { storeId, error: errorMessage(e) }));

    void socket.join(roomFor(storeId));
    void sendSnapshot();
    socket.on("inventory:pull", () => {
      void sendSnapshot();
    });
  });

  const notifier: InventoryNotifier = {
    async inventoryChanged(storeId: number) {
      io.to(roomFor(storeId)).emit("inventory:update", await availableProducts(storeId));
    },
  };

  return { io, notifier };
}
