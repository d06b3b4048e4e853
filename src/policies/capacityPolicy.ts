// src/policies/capacityPolicy.ts
import type { Room } from "../modules/Rooms/roomModel";
import type { Tenant } from "../modules/Tenants/tenantModel";

export const ROOM_AT_CAPACITY = "room at capacity";

export type CapacityDecision =
  | { allowed: true; unchanged: boolean }
  | {
      allowed: false;
      reason: typeof ROOM_AT_CAPACITY;
      roomId: string;
      roomNumber: string;
      capacity: number;
    };

/**
 * Decides whether `tenant` may move into `targetRoom` (null = unassign).
 *
 * `occupantCount` is the live number of tenants referencing the room. Only a
 * new assignment is checked: a tenant already in the room always stays, even
 * if its capacity has since been lowered below the headcount.
 */
export function canAssign(
  tenant: Pick<Tenant, "roomId">,
  targetRoom: Pick<Room, "roomId" | "roomNumber" | "capacity"> | null,
  occupantCount: number
): CapacityDecision {
  if (!targetRoom) return { allowed: true, unchanged: tenant.roomId === null };

  if (tenant.roomId === targetRoom.roomId) return { allowed: true, unchanged: true };

  if (occupantCount < targetRoom.capacity) return { allowed: true, unchanged: false };

  return {
    allowed: false,
    reason: ROOM_AT_CAPACITY,
    roomId: targetRoom.roomId,
    roomNumber: targetRoom.roomNumber,
    capacity: targetRoom.capacity,
  };
}

export const isFull = (room: Pick<Room, "capacity">, occupantCount: number) =>
  occupantCount >= room.capacity;

// Rooms offered on the assignment form: any with a free slot, plus the current one
export function availableRooms<R extends Pick<Room, "roomId" | "capacity">>(
  rooms: readonly R[],
  occupancy: ReadonlyMap<string, number>,
  currentRoomId: string | null
): R[] {
  return rooms.filter(
    (room) => room.roomId === currentRoomId || !isFull(room, occupancy.get(room.roomId) ?? 0)
  );
}
