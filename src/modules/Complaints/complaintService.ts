// src/modules/Complaints/complaintService.ts
import type { ServiceDeps } from "../../store";
import { assertAuthorized, requireOwnTenant, type Actor } from "../../policies/accessPolicy";
import { setStatus } from "../../policies/complaintPolicy";
import { NotFoundError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { success } from "../../utils/result";
import { parseInput } from "../../utils/validation";
import { ComplaintFilterSchema, ComplaintInputSchema } from "./complaintModel";

const COMPLAINT_NOT_FOUND = "Complaint not found.";

export const createComplaintService = ({ store, now = () => new Date() }: ServiceDeps) => ({
  async getAllComplaints(actor: Actor, filter: unknown = {}) {
    assertAuthorized(actor, "complaint:list");
    return store.complaints.findAll(parseInput(ComplaintFilterSchema, filter));
  },

  async getOwnComplaints(actor: Actor) {
    const tenantId = requireOwnTenant(actor, "complaint:listOwn");
    return store.complaints.findAll({ tenantId });
  },

  async fileComplaint(actor: Actor, input: unknown) {
    const tenantId = requireOwnTenant(actor, "complaint:create");
    const data = parseInput(ComplaintInputSchema, input);

    const tenant = await store.tenants.findById(tenantId);
    if (!tenant) throw new NotFoundError("Tenant profile not found. Please contact administrator.");

    const complaint = await store.complaints.create(tenant.tenantId, data);
    logger.info({ complaintId: complaint.complaintId, tenantId }, "complaint filed");
    return success("Your complaint has been submitted successfully!", complaint);
  },

  async setComplaintStatus(actor: Actor, complaintId: string, status: unknown) {
    assertAuthorized(actor, "complaint:setStatus");

    const complaint = await store.transaction(async (tx) => {
      const current = await tx.complaints.findById(complaintId);
      if (!current) throw new NotFoundError(COMPLAINT_NOT_FOUND);

      const changes = setStatus(status, actor, now());
      const updated = await tx.complaints.update(current.complaintId, changes);
      if (!updated) throw new NotFoundError(COMPLAINT_NOT_FOUND);
      return updated;
    });

    logger.info({ complaintId, status: complaint.status }, "complaint status changed");
    return success(`Complaint status updated to ${complaint.status}!`, complaint);
  },
});

export type ComplaintService = ReturnType<typeof createComplaintService>;
