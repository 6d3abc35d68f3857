import { randomUUID } from "crypto";
import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import { AppError, InsufficientStockError, PersistenceError, ProductNotFoundError, errorMessage } from "./errors";
import { errorFields, type Logger } from "./logger";

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

type AsyncRoute = (req: Request, res: Response) => Promise<unknown>;

/** Forwards a rejected handler promise to the error middleware. */
export function route(fn: AsyncRoute): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

export function requestId(): RequestHandler {
  return (req, res, next) => {
    const incoming = req.headers["x-request-id"];
    req.requestId = typeof incoming === "string" && incoming ? incoming : randomUUID();
    res.setHeader("x-request-id", req.requestId);
    next();
  };
}

function isBodyParseError(err: unknown) {
  return typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";
}

const CLIENT_ERROR_CODES: Record<number, string> = {
  413: "PAYLOAD_TOO_LARGE",
  415: "UNSUPPORTED_MEDIA_TYPE",
};

// Errors raised by express's own middleware (body-parser, http-errors) mark client faults with `expose`.
function exposedClientError(err: unknown) {
  if (typeof err !== "object" || err === null || !("status" in err) || !("expose" in err)) return null;
  const { status, expose } = err;
  if (typeof status !== "number" || status < 400 || status >= 500 || expose !== true) return null;
  return { status, message: errorMessage(err) };
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ success: false, error: "Invalid JSON body", code: "VALIDATION_ERROR" });
      return;
    }

    if (err instanceof AppError && err.status < 500) {
      const line = err instanceof ProductNotFoundError || err instanceof InsufficientStockError ? err.line : undefined;
      res.status(err.status).json({
        success: false,
        error: err.message,
        code: err.code,
        ...(line === undefined ? {} : { line }),
      });
      return;
    }

    const clientError = exposedClientError(err);
    if (clientError) {
      res.status(clientError.status).json({
        success: false,
        error: clientError.message,
        code: CLIENT_ERROR_CODES[clientError.status] ?? "BAD_REQUEST",
      });
      return;
    }

    logger.child({ requestId: req.requestId ?? null }).error("request failed", {
      type: "api_error",
      route: req.originalUrl,
      method: req.method,
      error: errorFields(err instanceof PersistenceError && err.original !== undefined ? err.original : err),
    });

    res.status(500).json({
      success: false,
      error: errorMessage(err),
      code: err instanceof AppError ? err.code : "INTERNAL_ERROR",
      requestId: req.requestId,
    });
  };
}

export function notFound(): RequestHandler {
  return (_req, res) => {
    res.status(404).json({ success: false, error: "Not found", code: "NOT_FOUND" });
  };
}
