// src/modules/Rooms/roomModel.ts
import { z } from "zod";
import { roundMoney } from "../../utils/money";

export interface Room {
  roomId: string;
  roomNumber: string;
  capacity: number;
  rent: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface RoomWithOccupancy extends Room {
  tenantCount: number;
  isFull: boolean;
}

// Form fields arrive as strings: a blank or null value is missing, not zero
const formNumber = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => {
    if (value === null) return undefined;
    if (typeof value !== "string") return value;
    const trimmed = value.trim();
    return trimmed === "" ? undefined : Number(trimmed);
  }, schema);

const money = formNumber(
  z
    .number({ required_error: "This field is required.", invalid_type_error: "Enter a number." })
    .nonnegative("Ensure this value is greater than or equal to 0.")
    .max(99_999_999.99)
).transform(roundMoney);

export const RoomInputSchema = z.object({
  roomNumber: z.string().trim().min(1, "This field is required.").max(10),
  capacity: formNumber(
    z
      .number({ required_error: "This field is required.", invalid_type_error: "Enter a whole number." })
      .int("Enter a whole number.")
      .min(1, "Ensure this value is greater than or equal to 1.")
  ),
  rent: money,
});

export type RoomInput = z.infer<typeof RoomInputSchema>;

export const UpdateRoomInputSchema = RoomInputSchema.partial();

export type UpdateRoomInput = z.infer<typeof UpdateRoomInputSchema>;

export { money as MoneySchema };
