// src/db/schemas/complaintSchema.ts
import mongoose, { Schema, Types } from "mongoose";
import { ComplaintStatus } from "../../modules/Complaints/complaintModel";

export interface ComplaintDocument {
  tenant: Types.ObjectId;
  subject: string;
  message: string;
  status: ComplaintStatus;
  resolvedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const complaintSchema = new Schema<ComplaintDocument>(
  {
    tenant: { type: Schema.Types.ObjectId, ref: "Tenant", required: true, index: true },
    subject: { type: String, required: true, trim: true, maxlength: 200 },
    message: { type: String, required: true },
    status: {
      type: String,
      enum: Object.values(ComplaintStatus),
      default: ComplaintStatus.Pending,
    },
    resolvedAt: { type: Date, default: null },
  },
  { timestamps: true }
);

export const ComplaintModel = mongoose.model<ComplaintDocument>("Complaint", complaintSchema);
