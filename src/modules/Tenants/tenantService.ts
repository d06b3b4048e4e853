// src/modules/Tenants/tenantService.ts
import type { ServiceDeps } from "../../store";
import { assertAuthorized, requireOwnTenant, type Actor } from "../../policies/accessPolicy";
import { availableRooms, canAssign } from "../../policies/capacityPolicy";
import { CapacityError, NotFoundError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { success } from "../../utils/result";
import { parseInput } from "../../utils/validation";
import { withOccupancy } from "../Rooms/roomService";
import { AssignRoomInputSchema, TenantFilterSchema, type AssignmentForm } from "./tenantModel";

const TENANT_NOT_FOUND = "Tenant not found.";

export const createTenantService = ({ store }: ServiceDeps) => ({
  async getAllTenants(actor: Actor, filter: unknown = {}) {
    assertAuthorized(actor, "tenant:list");
    return store.tenants.findAll(parseInput(TenantFilterSchema, filter));
  },

  async getAssignmentForm(actor: Actor, tenantId: string): Promise<AssignmentForm> {
    assertAuthorized(actor, "tenant:assignRoom");
    const tenant = await store.tenants.findProfile(tenantId);
    if (!tenant) throw new NotFoundError(TENANT_NOT_FOUND);

    const [rooms, occupancy] = await Promise.all([store.rooms.findAll(), store.tenants.countPerRoom()]);
    return {
      tenant,
      currentRoom: rooms.find((room) => room.roomId === tenant.roomId) ?? null,
      availableRooms: availableRooms(rooms, occupancy, tenant.roomId),
    };
  },

  /**
   * Moves a tenant into a room (or out of any room when `roomId` is empty).
   * Occupancy is counted and the tenant written inside one transaction that
   * also locks the target room, so the last free slot cannot be taken twice.
   */
  async assignRoom(actor: Actor, tenantId: string, input: unknown) {
    assertAuthorized(actor, "tenant:assignRoom");
    const { roomId } = parseInput(AssignRoomInputSchema, input);

    const { tenant, room } = await store.transaction(async (tx) => {
      const tenant = await tx.tenants.findProfile(tenantId);
      if (!tenant) throw new NotFoundError(TENANT_NOT_FOUND);

      const room = roomId ? await tx.rooms.lockForAssignment(roomId) : null;
      if (roomId && !room) throw new NotFoundError("Room not found.");

      const occupants = room ? await tx.tenants.countByRoom(room.roomId) : 0;
      const decision = canAssign(tenant, room, occupants);
      if (!decision.allowed) {
        throw new CapacityError(decision.roomId, decision.roomNumber, decision.capacity);
      }
      if (!decision.unchanged) await tx.tenants.setRoom(tenant.tenantId, room ? room.roomId : null);

      return { tenant, room };
    });

    logger.info({ tenantId, roomId: room ? room.roomId : null }, "room assignment saved");
    const message = room
      ? `Room ${room.roomNumber} assigned to ${tenant.fullName} successfully!`
      : `Room unassigned from ${tenant.fullName} successfully!`;
    return success(message, {
      ...tenant,
      roomId: room ? room.roomId : null,
      roomNumber: room ? room.roomNumber : null,
    });
  },

  // Removing a tenant removes its account, bills and complaints with it
  async deleteTenant(actor: Actor, tenantId: string) {
    assertAuthorized(actor, "tenant:delete");

    const removed = await store.transaction(async (tx) => {
      const tenant = await tx.tenants.findById(tenantId);
      if (!tenant) throw new NotFoundError(TENANT_NOT_FOUND);
      const bills = await tx.bills.deleteByTenant(tenant.tenantId);
      const complaints = await tx.complaints.deleteByTenant(tenant.tenantId);
      await tx.tenants.delete(tenant.tenantId);
      await tx.accounts.delete(tenant.accountId);
      return { tenantId: tenant.tenantId, bills, complaints };
    });

    logger.info(removed, "tenant deleted");
    return success("Tenant deleted successfully!", removed);
  },

  async getOwnProfile(actor: Actor) {
    const tenantId = requireOwnTenant(actor, "tenant:viewOwn");
    const tenant = await store.tenants.findProfile(tenantId);
    if (!tenant) throw new NotFoundError("Tenant profile not found. Please contact administrator.");

    const room = tenant.roomId ? await store.rooms.findById(tenant.roomId) : null;
    return {
      tenant,
      room: room ? withOccupancy(room, await store.tenants.countByRoom(room.roomId)) : null,
    };
  },
});

export type TenantService = ReturnType<typeof createTenantService>;
