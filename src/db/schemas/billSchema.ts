// src/db/schemas/billSchema.ts
import mongoose, { Schema, Types } from "mongoose";
import { BillStatus } from "../../modules/Bills/billModel";

export interface BillDocument {
  tenant: Types.ObjectId;
  month: string;
  amount: number;
  status: BillStatus;
  paidAt: Date | null;
  createdAt: Date;
}

const billSchema = new Schema<BillDocument>(
  {
    tenant: { type: Schema.Types.ObjectId, ref: "Tenant", required: true },
    month: { type: String, required: true, trim: true, maxlength: 20 },
    amount: { type: Number, required: true, min: 0 },
    status: {
      type: String,
      enum: Object.values(BillStatus),
      default: BillStatus.Unpaid,
    },
    paidAt: { type: Date, default: null },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

// one bill per tenant per month
billSchema.index({ tenant: 1, month: 1 }, { unique: true });

export const BillModel = mongoose.model<BillDocument>("Bill", billSchema);
