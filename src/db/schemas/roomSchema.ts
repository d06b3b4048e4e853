// src/db/schemas/roomSchema.ts
import mongoose, { Schema } from "mongoose";

export interface RoomDocument {
  roomNumber: string;
  capacity: number;
  rent: number;
  // bumped inside assignment transactions so concurrent writers conflict
  assignmentVersion: number;
  createdAt: Date;
  updatedAt: Date;
}

const roomSchema = new Schema<RoomDocument>(
  {
    roomNumber: { type: String, required: true, unique: true, trim: true, maxlength: 10 },
    capacity: { type: Number, required: true, min: 1, validate: Number.isInteger },
    rent: { type: Number, required: true, min: 0 },
    assignmentVersion: { type: Number, default: 0 },
  },
  { timestamps: true }
);

export const RoomModel = mongoose.model<RoomDocument>("Room", roomSchema);
