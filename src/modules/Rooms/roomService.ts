// src/modules/Rooms/roomService.ts
import type { ServiceDeps } from "../../store";
import { assertAuthorized, type Actor } from "../../policies/accessPolicy";
import { isFull } from "../../policies/capacityPolicy";
import { NotFoundError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { success } from "../../utils/result";
import { definedOnly, parseInput } from "../../utils/validation";
import {
  RoomInputSchema,
  UpdateRoomInputSchema,
  type Room,
  type RoomWithOccupancy,
} from "./roomModel";

export const withOccupancy = (room: Room, tenantCount: number): RoomWithOccupancy => ({
  ...room,
  tenantCount,
  isFull: isFull(room, tenantCount),
});

export const createRoomService = ({ store }: ServiceDeps) => ({
  async getAllRooms(actor: Actor) {
    assertAuthorized(actor, "room:list");
    const [rooms, occupancy] = await Promise.all([store.rooms.findAll(), store.tenants.countPerRoom()]);
    return rooms.map((room) => withOccupancy(room, occupancy.get(room.roomId) ?? 0));
  },

  async getRoomById(actor: Actor, roomId: string) {
    assertAuthorized(actor, "room:read");
    const room = await store.rooms.findById(roomId);
    if (!room) throw new NotFoundError("Room not found.");
    return withOccupancy(room, await store.tenants.countByRoom(room.roomId));
  },

  async createRoom(actor: Actor, input: unknown) {
    assertAuthorized(actor, "room:create");
    const data = parseInput(RoomInputSchema, input);

    const room = await store.rooms.create(data);
    logger.info({ roomId: room.roomId, roomNumber: room.roomNumber }, "room created");
    return success("Room created successfully!", withOccupancy(room, 0));
  },

  // Lowering capacity below the current headcount is allowed: existing tenants stay
  async updateRoom(actor: Actor, roomId: string, input: unknown) {
    assertAuthorized(actor, "room:update");
    const data = definedOnly(parseInput(UpdateRoomInputSchema, input));

    const room = await store.rooms.update(roomId, data);
    if (!room) throw new NotFoundError("Room not found.");
    logger.info({ roomId, changes: data }, "room updated");
    return success(
      "Room updated successfully!",
      withOccupancy(room, await store.tenants.countByRoom(room.roomId))
    );
  },

  async deleteRoom(actor: Actor, roomId: string) {
    assertAuthorized(actor, "room:delete");

    const unassigned = await store.transaction(async (tx) => {
      const room = await tx.rooms.findById(roomId);
      if (!room) throw new NotFoundError("Room not found.");
      const count = await tx.tenants.clearRoom(room.roomId);
      await tx.rooms.delete(room.roomId);
      return count;
    });

    logger.info({ roomId, unassigned }, "room deleted");
    return success("Room deleted successfully!", { roomId, unassignedTenants: unassigned });
  },
});

export type RoomService = ReturnType<typeof createRoomService>;
