import { describe, expect, it } from "vitest";
import { OPERATIONS, can, homeFor } from "./permissions";
import { ROLES, isRole } from "./types";

function allowed(role: (typeof ROLES)[number]) {
  return OPERATIONS.filter(op => can(role, op));
}

describe("permissions", () => {
  it("gives the superadmin the license console and nothing store-scoped", () => {
    expect(allowed("superadmin")).toEqual([
      "stores:list",
      "stores:create",
      "stores:updateLicense",
      "users:list",
      "users:create",
    ]);
  });

  it("lets an admin read products and sales only", () => {
    expect(allowed("admin")).toEqual(["products:list", "products:available", "sales:list", "sales:read"]);
  });

  it("lets a store user manage inventory and bill, but not read sales", () => {
    expect(allowed("store")).toEqual([
      "products:list",
      "products:available",
      "products:create",
      "products:update",
      "products:addStock",
      "bills:process",
    ]);
    expect(can("store", "sales:list")).toBe(false);
  });

  it("sends each role to its landing page", () => {
    expect(ROLES.map(homeFor)).toEqual(["/superadmin", "/sales", "/billing"]);
  });

  it("recognises only the three roles", () => {
    expect(ROLES.every(isRole)).toBe(true);
    expect(isRole("owner")).toBe(false);
    expect(isRole(undefined)).toBe(false);
  });
});
