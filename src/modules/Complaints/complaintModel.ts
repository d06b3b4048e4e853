// src/modules/Complaints/complaintModel.ts
import { z } from "zod";

export const ComplaintStatus = {
  Pending: "Pending",
  Resolved: "Resolved",
} as const;

export type ComplaintStatus = (typeof ComplaintStatus)[keyof typeof ComplaintStatus];

export const COMPLAINT_STATUSES: readonly ComplaintStatus[] = [
  ComplaintStatus.Pending,
  ComplaintStatus.Resolved,
];

export interface Complaint {
  complaintId: string;
  tenantId: string;
  subject: string;
  message: string;
  status: ComplaintStatus;
  createdAt: Date;
  updatedAt: Date;
  resolvedAt: Date | null;
}

export interface ComplaintFilter {
  status?: ComplaintStatus;
  tenantId?: string;
}

export type ComplaintChanges = Pick<Complaint, "status" | "resolvedAt" | "updatedAt">;

export const ComplaintInputSchema = z.object({
  subject: z.string().trim().min(1, "This field is required.").max(200),
  message: z.string().trim().min(1, "This field is required."),
});

export type ComplaintInput = z.infer<typeof ComplaintInputSchema>;

export const ComplaintFilterSchema = z.object({
  status: z.enum([ComplaintStatus.Pending, ComplaintStatus.Resolved]).optional(),
});
