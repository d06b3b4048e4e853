// src/middleware/errorHandler.ts
import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { AppError, CapacityError, ValidationError } from "../utils/errors";
import { logger } from "../utils/logger";
import { toValidationError } from "../utils/validation";

export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({ error: `Cannot ${req.method} ${req.path}`, code: "NOT_FOUND" });
}

// express.json() reports an unparsable body as a SyntaxError tagged with this type
const isMalformedBody = (err: unknown) =>
  err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";

function normalize(err: unknown): unknown {
  if (err instanceof ZodError) return toValidationError(err);
  if (isMalformedBody(err)) return new ValidationError("Request body is not valid JSON.");
  return err;
}

// Every workflow failure ends here and leaves as `{ error, code }`
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const error = normalize(err);

  if (error instanceof AppError) {
    const body: Record<string, unknown> = { error: error.message, code: error.code };
    if (error instanceof ValidationError && Object.keys(error.fields).length) body.fields = error.fields;
    if (error instanceof CapacityError) {
      body.room = { roomId: error.roomId, roomNumber: error.roomNumber, capacity: error.capacity };
    }
    logger.debug({ code: error.code, path: req.path }, error.message);
    return res.status(error.status).json(body);
  }

  logger.error({ err, method: req.method, path: req.path }, "unhandled error");
  res.status(500).json({ error: "Server error", code: "INTERNAL" });
}
