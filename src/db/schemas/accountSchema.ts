// src/db/schemas/accountSchema.ts
import mongoose, { Schema } from "mongoose";

export interface AccountDocument {
  username: string;
  firstName: string;
  lastName: string;
  email: string;
  passwordHash: string;
  isAdmin: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const accountSchema = new Schema<AccountDocument>(
  {
    username: { type: String, required: true, unique: true, trim: true, maxlength: 150 },
    firstName: { type: String, default: "", trim: true, maxlength: 30 },
    lastName: { type: String, default: "", trim: true, maxlength: 30 },
    email: { type: String, required: true, trim: true, lowercase: true },
    passwordHash: { type: String, required: true },
    isAdmin: { type: Boolean, default: false },
  },
  { timestamps: true }
);

export const AccountModel = mongoose.model<AccountDocument>("Account", accountSchema);
