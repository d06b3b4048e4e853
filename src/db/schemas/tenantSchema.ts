// src/db/schemas/tenantSchema.ts
import mongoose, { Schema, Types } from "mongoose";

export interface TenantDocument {
  account: Types.ObjectId;
  room: Types.ObjectId | null;
  joinDate: Date;
  phone: string;
  address: string;
}

const tenantSchema = new Schema<TenantDocument>({
  account: { type: Schema.Types.ObjectId, ref: "Account", required: true, unique: true },
  room: { type: Schema.Types.ObjectId, ref: "Room", default: null, index: true },
  joinDate: { type: Date, default: Date.now, immutable: true },
  phone: { type: String, default: "", trim: true, maxlength: 15 },
  address: { type: String, default: "" },
});

export const TenantModel = mongoose.model<TenantDocument>("Tenant", tenantSchema);
