import type { QueryResult, QueryResultRow } from "pg";
import { beforeEach, describe, expect, it } from "vitest";
import { processBill } from "../billing";
import { ConflictError, InsufficientStockError, ValidationError } from "../errors";
import { PostgresStorage, SCHEMA, type SqlClient, type SqlPool } from "./postgres";

type Reply = { rows?: QueryResultRow[]; rowCount?: number } | Error;
type Handler = (text: string, values: unknown[]) => Reply | undefined;
type Call = { text: string; values: unknown[]; via: "pool" | "client" };

const squash = (text: string) => text.replace(/\s+/g, " ").trim();

/** Answers queries from a handler and records them; rows travel as JSON like pg's text protocol. */
class FakePool implements SqlPool {
  calls: Call[] = [];
  released = 0;
  releaseErrors: Array<Error | undefined> = [];

  constructor(private handler: Handler) {}

  private async answer<R extends QueryResultRow>(via: Call["via"], text: string, values: unknown[] = []) {
    this.calls.push({ text: squash(text), values, via });
    const reply = this.handler(squash(text), values) ?? {};
    if (reply instanceof Error) throw reply;
    const rows: R[] = JSON.parse(JSON.stringify(reply.rows ?? []));
    const result: QueryResult<R> = {
      command: "",
      rowCount: reply.rowCount ?? rows.length,
      oid: 0,
      fields: [],
      rows,
    };
    return result;
  }

  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) {
    return this.answer<R>("pool", text, values);
  }

  async connect(): Promise<SqlClient> {
    return {
      query: <R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) =>
        this.answer<R>("client", text, values),
      release: (err?: Error) => {
        this.released += 1;
        this.releaseErrors.push(err);
      },
    };
  }

  async end() {}

  texts(via?: Call["via"]) {
    return this.calls.filter(c => !via || c.via === via).map(c => c.text);
  }
}

const opts = { superadminUsername: "root", superadminPassword: "root-pass", bcryptRounds: 4 };

const lagerRow = {
  id: 7,
  store_id: 1,
  barcode: null,
  name: "Lager",
  brand: "Northbrew",
  category: "Beer",
  size_ml: 500,
  price: 10,
  stock_quantity: 5,
};

describe("PostgresStorage", () => {
  describe("init", () => {
    it("creates the schema and seeds a missing superadmin", async () => {
      const pool = new FakePool(text => {
        if (text.startsWith("SELECT id FROM app_users")) return { rows: [] };
        if (text.startsWith("INSERT INTO app_users")) {
          return {
            rows: [
              {
                id: 1,
                username: "root",
                password_hash: "hash",
                role: "superadmin",
                store_id: null,
                created_at: "2026-01-01T00:00:00.000Z",
              },
            ],
          };
        }
        return undefined;
      });

      await new PostgresStorage(pool, opts).init();

      expect(pool.calls[0].text).toBe(squash(SCHEMA));
      const insert = pool.calls.find(c => c.text.startsWith("INSERT INTO app_users"));
      expect(insert?.values.slice(0, 1)).toEqual(["root"]);
      expect(insert?.values.slice(2)).toEqual(["superadmin", null]);
    });

    it("leaves an existing superadmin alone", async () => {
      const pool = new FakePool(text => (text.startsWith("SELECT id FROM app_users") ? { rows: [{ id: 1 }] } : undefined));

      await new PostgresStorage(pool, opts).init();

      expect(pool.texts().some(t => t.startsWith("INSERT"))).toBe(false);
    });
  });

  it("maps unique violations to conflicts", async () => {
    const duplicate = Object.assign(new Error("duplicate key value"), { code: "23505" });
    const pool = new FakePool(() => duplicate);
    const storage = new PostgresStorage(pool, opts);

    await expect(
      storage.createStore({ name: "Corner", location: null, licenseValidity: "2030-01-01" })
    ).rejects.toBeInstanceOf(ConflictError);
  });

  it("maps product rows to camelCase products", async () => {
    const pool = new FakePool(() => ({ rows: [lagerRow] }));
    const storage = new PostgresStorage(pool, opts);

    expect(await storage.getProduct(1, 7)).toEqual({
      id: 7,
      storeId: 1,
      barcode: null,
      name: "Lager",
      brand: "Northbrew",
      category: "Beer",
      sizeMl: 500,
      price: 10,
      stockQuantity: 5,
    });
    expect(pool.calls[0].values).toEqual([7, 1]);
  });

  it("reports stock overflow as a validation error", async () => {
    const overflow = Object.assign(new Error("integer out of range"), { code: "22003" });
    const pool = new FakePool(() => overflow);

    await expect(new PostgresStorage(pool, opts).addStock(1, 7, 2147483647)).rejects.toThrow(
      new ValidationError("add_stock: stock of product 7 cannot exceed 2147483647")
    );
  });

  it("rejects rows carrying an unknown role", async () => {
    const pool = new FakePool(() => ({
      rows: [{ id: 3, username: "x", password_hash: "h", role: "owner", store_id: 1, created_at: "2026-01-01T00:00:00.000Z" }],
    }));

    await expect(new PostgresStorage(pool, opts).findUserById(3)).rejects.toThrow('Unknown role "owner" for user 3');
  });

  describe("billing transaction", () => {
    let stock: number;

    function billingHandler(text: string, values: unknown[]): Reply | undefined {
      if (text.startsWith("SELECT id, store_id, barcode")) return { rows: [{ ...lagerRow, stock_quantity: stock }] };
      if (text.startsWith("UPDATE products SET stock_quantity = stock_quantity -")) {
        const quantity = Number(values[2]);
        if (stock < quantity) return { rowCount: 0 };
        stock -= quantity;
        return { rowCount: 1 };
      }
      if (text.startsWith("INSERT INTO sales")) {
        return { rows: [{ id: 11, store_id: 1, total_amount: values[1], sale_date: "2026-03-01T10:00:00.000Z" }] };
      }
      if (text.startsWith("SELECT si.id")) {
        return {
          rows: [{ id: 21, sale_id: 11, product_id: 7, product_name: "Lager", quantity: 3, price_at_sale: 10 }],
        };
      }
      return undefined;
    }

    beforeEach(() => {
      stock = 5;
    });

    it("runs the bill inside BEGIN/COMMIT on one client", async () => {
      const pool = new FakePool(billingHandler);
      const storage = new PostgresStorage(pool, opts);

      const sale = await processBill(storage, 1, [{ productId: 7, quantity: 3 }]);

      expect(sale).toEqual({
        id: 11,
        storeId: 1,
        totalAmount: 30,
        saleDate: "2026-03-01T10:00:00.000Z",
        items: [{ id: 21, saleId: 11, productId: 7, productName: "Lager", quantity: 3, priceAtSale: 10 }],
      });
      const texts = pool.texts("client");
      expect(texts[0]).toBe("BEGIN");
      expect(texts[1]).toMatch(/FOR UPDATE$/);
      expect(texts[texts.length - 1]).toBe("COMMIT");
      expect(texts).not.toContain("ROLLBACK");
      expect(pool.texts("pool")).toEqual([]);
      expect(pool.released).toBe(1);
      expect(stock).toBe(2);
    });

    it("rolls back when a line cannot be served", async () => {
      const pool = new FakePool(billingHandler);
      const storage = new PostgresStorage(pool, opts);

      await expect(processBill(storage, 1, [{ productId: 7, quantity: 6 }])).rejects.toBeInstanceOf(
        InsufficientStockError
      );

      const texts = pool.texts("client");
      expect(texts[0]).toBe("BEGIN");
      expect(texts[texts.length - 1]).toBe("ROLLBACK");
      expect(texts).not.toContain("COMMIT");
      expect(texts.some(t => t.startsWith("INSERT"))).toBe(false);
      expect(pool.released).toBe(1);
    });

    it("rolls back when the sale insert fails", async () => {
      const pool = new FakePool((text, values) =>
        text.startsWith("INSERT INTO sales") ? new Error("connection reset") : billingHandler(text, values)
      );
      const storage = new PostgresStorage(pool, opts);

      await expect(processBill(storage, 1, [{ productId: 7, quantity: 2 }])).rejects.toMatchObject({
        code: "PERSISTENCE_FAILURE",
        message: "connection reset",
      });
      expect(pool.texts("client").slice(-1)).toEqual(["ROLLBACK"]);
      expect(pool.released).toBe(1);
      expect(pool.releaseErrors).toEqual([undefined]);
    });

    it("keeps the original error and discards the client when ROLLBACK fails", async () => {
      const rollbackFailure = new Error("connection terminated");
      const pool = new FakePool((text, values) =>
        text === "ROLLBACK" ? rollbackFailure : billingHandler(text, values)
      );
      const storage = new PostgresStorage(pool, opts);

      await expect(processBill(storage, 1, [{ productId: 7, quantity: 6 }])).rejects.toBeInstanceOf(
        InsufficientStockError
      );
      expect(pool.released).toBe(1);
      expect(pool.releaseErrors).toEqual([rollbackFailure]);
    });
  });
});
