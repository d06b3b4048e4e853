// src/modules/Tenants/tenantModel.ts
import { z } from "zod";
import type { Room } from "../Rooms/roomModel";

export interface Tenant {
  tenantId: string;
  accountId: string;
  roomId: string | null;
  joinDate: Date;
  phone: string;
  address: string;
}

export interface TenantProfile extends Tenant {
  username: string;
  fullName: string;
  email: string;
  roomNumber: string | null;
}

export interface TenantInput {
  accountId: string;
  phone?: string;
  address?: string;
}

export const AssignRoomInputSchema = z.object({
  roomId: z
    .string()
    .trim()
    .nullish()
    .transform((value) => (value ? value : null)),
});

export type AssignRoomInput = z.infer<typeof AssignRoomInputSchema>;

export const TenantFilterSchema = z.object({
  roomId: z.string().trim().min(1).optional(),
});

export type TenantFilter = z.infer<typeof TenantFilterSchema>;

export interface AssignmentForm {
  tenant: TenantProfile;
  currentRoom: Room | null;
  availableRooms: Room[];
}
