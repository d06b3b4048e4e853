// src/policies/complaintPolicy.ts
import {
  COMPLAINT_STATUSES,
  ComplaintStatus,
  type ComplaintChanges,
} from "../modules/Complaints/complaintModel";
import { Role, type Actor } from "./accessPolicy";
import { PermissionError, ValidationError } from "../utils/errors";

export const isComplaintStatus = (value: unknown): value is ComplaintStatus =>
  typeof value === "string" && COMPLAINT_STATUSES.some((status) => status === value);

/**
 * Administrator-only transition between Pending and Resolved. The resolved
 * timestamp is set on entering Resolved and cleared on entering Pending;
 * same-state transitions are accepted and only refresh `updatedAt`.
 */
export function setStatus(newStatus: unknown, actor: Actor, now: Date): ComplaintChanges {
  if (actor.role !== Role.Admin) {
    throw new PermissionError("Access denied. Admin privileges required.");
  }
  if (!isComplaintStatus(newStatus)) {
    throw new ValidationError("Select a valid choice.", {
      status: [`Select a valid choice. ${String(newStatus)} is not one of the available choices.`],
    });
  }
  return {
    status: newStatus,
    resolvedAt: newStatus === ComplaintStatus.Resolved ? now : null,
    updatedAt: now,
  };
}
