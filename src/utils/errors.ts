// src/utils/errors.ts

export type ErrorCode =
  | "AUTHENTICATION"
  | "PERMISSION"
  | "VALIDATION"
  | "NOT_FOUND"
  | "CONFLICT"
  | "CAPACITY";

/**
 * Base class for every failure a workflow operation can signal.
 * The error handler turns these into `{ error, code }` responses with `status`.
 */
export abstract class AppError extends Error {
  abstract readonly status: number;
  abstract readonly code: ErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class AuthenticationError extends AppError {
  readonly status = 401;
  readonly code = "AUTHENTICATION";

  constructor(message = "Authentication required.") {
    super(message);
  }
}

export class PermissionError extends AppError {
  readonly status = 403;
  readonly code = "PERMISSION";

  constructor(message = "Access denied.") {
    super(message);
  }
}

export class ValidationError extends AppError {
  readonly status = 400;
  readonly code = "VALIDATION";

  constructor(
    message: string,
    readonly fields: Record<string, string[]> = {}
  ) {
    super(message);
  }
}

export class NotFoundError extends AppError {
  readonly status = 404;
  readonly code = "NOT_FOUND";
}

export class ConflictError extends AppError {
  readonly status = 409;
  readonly code = "CONFLICT";
}

export class CapacityError extends AppError {
  readonly status = 409;
  readonly code = "CAPACITY";

  constructor(
    readonly roomId: string,
    readonly roomNumber: string,
    readonly capacity: number
  ) {
    super(`Room ${roomNumber} is already full!`);
  }
}

// MongoDB reports unique index violations with code 11000
export function isDuplicateKeyError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === 11000;
}
