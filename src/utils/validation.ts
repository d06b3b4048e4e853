// src/utils/validation.ts
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { ValidationError } from "./errors";

export function toValidationError(err: ZodError): ValidationError {
  const fields: Record<string, string[]> = {};
  for (const issue of err.issues) {
    const key = issue.path.length ? issue.path.join(".") : "form";
    (fields[key] ??= []).push(issue.message);
  }
  const [first] = err.issues;
  const message = first
    ? `${first.path.length ? `${first.path.join(".")}: ` : ""}${first.message}`
    : "Invalid input.";
  return new ValidationError(message, fields);
}

/** Parses a submitted form body, rejecting it before any workflow runs. */
export function parseInput<Output, Input>(schema: ZodType<Output, ZodTypeDef, Input>, input: unknown): Output {
  const result = schema.safeParse(input);
  if (!result.success) throw toValidationError(result.error);
  return result.data;
}

// Drops keys whose value is undefined so partial updates never overwrite with nothing
export function definedOnly<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in value) {
    if (value[key] !== undefined) result[key] = value[key];
  }
  return result;
}
