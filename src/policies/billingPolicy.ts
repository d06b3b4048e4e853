// src/policies/billingPolicy.ts
import { BillStatus, type Bill } from "../modules/Bills/billModel";
import { ownsRecord, type Actor } from "./accessPolicy";
import { PermissionError } from "../utils/errors";

export type PayTransition =
  | { kind: "paid"; changes: { status: typeof BillStatus.Paid; paidAt: Date } }
  | { kind: "noop" };

/**
 * Unpaid -> Paid, by the owning tenant only. Paying a paid bill is a no-op
 * and leaves the stored paid timestamp alone.
 */
export function pay(bill: Pick<Bill, "tenantId" | "status">, actor: Actor, now: Date): PayTransition {
  if (!ownsRecord(actor, bill.tenantId)) {
    throw new PermissionError("You do not have permission to pay this bill.");
  }
  if (bill.status === BillStatus.Paid) return { kind: "noop" };
  return { kind: "paid", changes: { status: BillStatus.Paid, paidAt: now } };
}
