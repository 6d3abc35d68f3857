import bcrypt from "bcryptjs";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import jwt from "jsonwebtoken";
import type { Config } from "./config";
import { ForbiddenError, UnauthorizedError } from "./errors";
import { can, type Operation } from "./permissions";
import type { Storage } from "./storage";
import type { User } from "./types";

declare global {
  namespace Express {
    interface Request {
      user?: User;
    }
  }
}

export function signToken(user: User, config: Pick<Config, "jwtSecret" | "jwtExpiresIn">) {
  return jwt.sign({ role: user.role }, config.jwtSecret, {
    subject: String(user.id),
    expiresIn: config.jwtExpiresIn,
  });
}

export function bearerToken(header: string | undefined) {
  const hdr = header || "";
  return hdr.startsWith("Bearer ") ? hdr.slice(7).trim() : "";
}

/**
 * Resolves a token to its user. The user is re-read from storage so a token
 * never outlives the account it was issued for.
 */
export async function userFromToken(token: string, storage: Storage, jwtSecret: string): Promise<User> {
  if (!token) throw new UnauthorizedError("Missing token");

  let subject: string | undefined;
  try {
    const decoded = jwt.verify(token, jwtSecret);
    subject = typeof decoded === "string" ? undefined : decoded.sub;
  } catch {
    throw new UnauthorizedError("Invalid token");
  }

  const id = Number(subject);
  if (!Number.isInteger(id)) throw new UnauthorizedError("Invalid token");

  const user = await storage.findUserById(id);
  if (!user) throw new UnauthorizedError("Invalid token");
  return user;
}

export async function verifyCredentials(storage: Storage, username: string, password: string) {
  const u = await storage.findUserByUsername(username);
  if (!u) return null;
  const ok = await bcrypt.compare(password, u.passwordHash);
  return ok ? u : null;
}

export function requireAuth(storage: Storage, config: Pick<Config, "jwtSecret">): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    userFromToken(bearerToken(req.headers.authorization), storage, config.jwtSecret)
      .then(user => {
        req.user = user;
        next();
      })
      .catch(next);
  };
}

export function requirePermission(operation: Operation): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!req.user) return next(new UnauthorizedError());
    if (!can(req.user.role, operation)) return next(new ForbiddenError());
    next();
  };
}

export function currentUser(req: Request): User {
  if (!req.user) throw new UnauthorizedError();
  return req.user;
}

/** Store the caller is scoped to; store-scoped roles without one are refused. */
export function storeScope(req: Request): number {
  const user = currentUser(req);
  if (user.storeId === null) throw new ForbiddenError("No store assigned to this account");
  return user.storeId;
}
