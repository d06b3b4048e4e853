// src/modules/Bills/billService.ts
import type { Repositories, ServiceDeps } from "../../store";
import { assertAuthorized, requireOwnTenant, type Actor } from "../../policies/accessPolicy";
import { pay } from "../../policies/billingPolicy";
import { ConflictError, NotFoundError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { noop, success } from "../../utils/result";
import { definedOnly, parseInput } from "../../utils/validation";
import {
  BillFilterSchema,
  CreateBillInputSchema,
  UpdateBillInputSchema,
  type BillChanges,
} from "./billModel";

const BILL_NOT_FOUND = "Bill not found.";
const DUPLICATE_BILL = "Bill with this Tenant and Month already exists.";

async function assertMonthFree(
  tx: Repositories,
  tenantId: string,
  month: string,
  exceptBillId?: string
) {
  const existing = await tx.bills.findByTenantAndMonth(tenantId, month);
  if (existing && existing.billId !== exceptBillId) throw new ConflictError(DUPLICATE_BILL);
}

async function assertTenantExists(tx: Repositories, tenantId: string) {
  const tenant = await tx.tenants.findById(tenantId);
  if (!tenant) throw new NotFoundError("Tenant not found.");
}

export const createBillService = ({ store, now = () => new Date() }: ServiceDeps) => ({
  async getAllBills(actor: Actor, filter: unknown = {}) {
    assertAuthorized(actor, "bill:list");
    return store.bills.findAll(parseInput(BillFilterSchema, filter));
  },

  async getBillById(actor: Actor, billId: string) {
    assertAuthorized(actor, "bill:read");
    const bill = await store.bills.findById(billId);
    if (!bill) throw new NotFoundError(BILL_NOT_FOUND);
    return bill;
  },

  async getOwnBills(actor: Actor) {
    const tenantId = requireOwnTenant(actor, "bill:listOwn");
    return store.bills.findByTenant(tenantId);
  },

  // New bills always start Unpaid
  async createBill(actor: Actor, input: unknown) {
    assertAuthorized(actor, "bill:create");
    const data = parseInput(CreateBillInputSchema, input);

    const bill = await store.transaction(async (tx) => {
      await assertTenantExists(tx, data.tenantId);
      await assertMonthFree(tx, data.tenantId, data.month);
      return tx.bills.create(data);
    });

    logger.info({ billId: bill.billId, tenantId: bill.tenantId, month: bill.month }, "bill created");
    return success("Bill created successfully!", bill);
  },

  /**
   * Administrative edit. The submitted status is stored as given; the paid
   * timestamp only changes when `paidAt` is part of the submission.
   */
  async updateBill(actor: Actor, billId: string, input: unknown) {
    assertAuthorized(actor, "bill:update");
    const changes: BillChanges = definedOnly(parseInput(UpdateBillInputSchema, input));

    const bill = await store.transaction(async (tx) => {
      const current = await tx.bills.findById(billId);
      if (!current) throw new NotFoundError(BILL_NOT_FOUND);

      const tenantId = changes.tenantId ?? current.tenantId;
      const month = changes.month ?? current.month;
      if (tenantId !== current.tenantId) await assertTenantExists(tx, tenantId);
      if (tenantId !== current.tenantId || month !== current.month) {
        await assertMonthFree(tx, tenantId, month, current.billId);
      }

      const updated = await tx.bills.update(current.billId, changes);
      if (!updated) throw new NotFoundError(BILL_NOT_FOUND);
      return updated;
    });

    logger.info({ billId, changes }, "bill updated");
    return success("Bill updated successfully!", bill);
  },

  async deleteBill(actor: Actor, billId: string) {
    assertAuthorized(actor, "bill:delete");
    const deleted = await store.bills.delete(billId);
    if (!deleted) throw new NotFoundError(BILL_NOT_FOUND);
    logger.info({ billId }, "bill deleted");
    return success("Bill deleted successfully!", { billId });
  },

  async payBill(actor: Actor, billId: string) {
    assertAuthorized(actor, "bill:pay");

    const result = await store.transaction(async (tx) => {
      const bill = await tx.bills.findById(billId);
      if (!bill) throw new NotFoundError(BILL_NOT_FOUND);

      const transition = pay(bill, actor, now());
      if (transition.kind === "noop") return noop("This bill has already been paid.", bill);

      const paid = await tx.bills.update(bill.billId, transition.changes);
      if (!paid) throw new NotFoundError(BILL_NOT_FOUND);
      return success(`Bill for ${paid.month} has been paid successfully!`, paid);
    });

    if (result.outcome === "success") logger.info({ billId, paidAt: result.data.paidAt }, "bill paid");
    return result;
  },
});

export type BillService = ReturnType<typeof createBillService>;
