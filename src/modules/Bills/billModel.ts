// src/modules/Bills/billModel.ts
import { z } from "zod";
import { MoneySchema } from "../Rooms/roomModel";

export const BillStatus = {
  Unpaid: "Unpaid",
  Paid: "Paid",
} as const;

export type BillStatus = (typeof BillStatus)[keyof typeof BillStatus];

export interface Bill {
  billId: string;
  tenantId: string;
  month: string;
  amount: number;
  status: BillStatus;
  createdAt: Date;
  paidAt: Date | null;
}

export interface BillFilter {
  status?: BillStatus;
  tenantId?: string;
  month?: string;
}

export type BillChanges = Partial<Pick<Bill, "tenantId" | "month" | "amount" | "status" | "paidAt">>;

const billStatus = z.enum([BillStatus.Unpaid, BillStatus.Paid], {
  errorMap: () => ({ message: "Select a valid choice." }),
});

export const CreateBillInputSchema = z.object({
  tenantId: z.string().trim().min(1, "This field is required."),
  month: z.string().trim().min(1, "This field is required.").max(20),
  amount: MoneySchema,
});

export type CreateBillInput = z.infer<typeof CreateBillInputSchema>;

export const UpdateBillInputSchema = CreateBillInputSchema.partial().extend({
  status: billStatus.optional(),
  // null clears the paid timestamp, omitted leaves it as stored
  paidAt: z.coerce.date().nullable().optional(),
});

export type UpdateBillInput = z.infer<typeof UpdateBillInputSchema>;

export const BillFilterSchema = z.object({
  status: billStatus.optional(),
  tenantId: z.string().trim().min(1).optional(),
  month: z.string().trim().min(1).optional(),
});
