import type { Role } from "./types";

export const OPERATIONS = [
  "stores:list",
  "stores:create",
  "stores:updateLicense",
  "users:list",
  "users:create",
  "products:list",
  "products:available",
  "products:create",
  "products:update",
  "products:addStock",
  "bills:process",
  "sales:list",
  "sales:read",
] as const;

export type Operation = (typeof OPERATIONS)[number];

const PERMISSIONS: Record<Role, ReadonlySet<Operation>> = {
  superadmin: new Set<Operation>([
    "stores:list",
    "stores:create",
    "stores:updateLicense",
    "users:list",
    "users:create",
  ]),
  admin: new Set<Operation>(["products:list", "products:available", "sales:list", "sales:read"]),
  store: new Set<Operation>([
    "products:list",
    "products:available",
    "products:create",
    "products:update",
    "products:addStock",
    "bills:process",
  ]),
};

export function can(role: Role, operation: Operation): boolean {
  return PERMISSIONS[role].has(operation);
}

/** Landing route for each role after login. */
export function homeFor(role: Role): string {
  if (role === "superadmin") return "/superadmin";
  if (role === "admin") return "/sales";
  return "/billing";
}
