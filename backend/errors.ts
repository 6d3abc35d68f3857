export class AppError extends Error {
  constructor(message: string, public readonly code: string, public readonly status: number) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR", 400);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Unauthorized") {
    super(message, "UNAUTHORIZED", 401);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Forbidden") {
    super(message, "FORBIDDEN", 403);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found") {
    super(message, "NOT_FOUND", 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, "CONFLICT", 409);
  }
}

// ---- Billing preconditions ----
// `line` is the zero-based index of the offending bill line.

export class EmptyOrderError extends AppError {
  constructor() {
    super("Empty bill", "EMPTY_ORDER", 400);
  }
}

export class ProductNotFoundError extends AppError {
  constructor(public readonly productId: number, public readonly line: number) {
    super(`Product ID ${productId} not found`, "PRODUCT_NOT_FOUND", 400);
  }
}

export class InsufficientStockError extends AppError {
  constructor(
    public readonly productId: number,
    productName: string,
    public readonly requested: number,
    public readonly available: number,
    public readonly line: number
  ) {
    super(`Not enough stock for ${productName}`, "INSUFFICIENT_STOCK", 400);
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, public readonly original?: unknown) {
    super(message, "PERSISTENCE_FAILURE", 500);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error && typeof error === "object" && "message" in error) {
    if (typeof error.message === "string" && error.message.trim().length > 0) return error.message;
  }
  return String(error);
}
