// src/db/helpers.ts
import { Types, isValidObjectId } from "mongoose";
import { ConflictError, isDuplicateKeyError } from "../utils/errors";

// Ids arrive from URLs and forms; anything that is not an ObjectId matches nothing
export function toObjectId(id: string): Types.ObjectId | null {
  return isValidObjectId(id) ? new Types.ObjectId(id) : null;
}

export async function rethrowDuplicate<T>(work: Promise<T>, message: string): Promise<T> {
  try {
    return await work;
  } catch (err) {
    if (isDuplicateKeyError(err)) throw new ConflictError(message);
    throw err;
  }
}

export const escapeRegex = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
