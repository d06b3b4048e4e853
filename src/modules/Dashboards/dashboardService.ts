// src/modules/Dashboards/dashboardService.ts
import type { ServiceDeps } from "../../store";
import { assertAuthorized, requireOwnTenant, type Actor } from "../../policies/accessPolicy";
import { NotFoundError } from "../../utils/errors";
import { roundMoney } from "../../utils/money";
import { withOccupancy } from "../Rooms/roomService";
import { BillStatus } from "../Bills/billModel";
import { ComplaintStatus } from "../Complaints/complaintModel";

const RECENT_LIMIT = 5;

export const createDashboardService = ({ store }: ServiceDeps) => ({
  async getAdminDashboard(actor: Actor) {
    assertAuthorized(actor, "dashboard:admin");

    const [
      totalTenants,
      totalRooms,
      unpaidBills,
      pendingComplaints,
      recentTenants,
      recentComplaints,
      recentBills,
      rooms,
      occupancy,
    ] = await Promise.all([
      store.tenants.count(),
      store.rooms.count(),
      store.bills.countByStatus(BillStatus.Unpaid),
      store.complaints.countByStatus(ComplaintStatus.Pending),
      store.tenants.findRecent(RECENT_LIMIT),
      store.complaints.findRecent(ComplaintStatus.Pending, RECENT_LIMIT),
      store.bills.findRecent(BillStatus.Unpaid, RECENT_LIMIT),
      store.rooms.findAll(),
      store.tenants.countPerRoom(),
    ]);

    return {
      totalTenants,
      totalRooms,
      unpaidBills,
      pendingComplaints,
      recentTenants,
      recentComplaints,
      recentBills,
      rooms: rooms.map((room) => withOccupancy(room, occupancy.get(room.roomId) ?? 0)),
    };
  },

  async getTenantDashboard(actor: Actor) {
    const tenantId = requireOwnTenant(actor, "dashboard:tenant");
    const tenant = await store.tenants.findProfile(tenantId);
    if (!tenant) throw new NotFoundError("Tenant profile not found. Please contact administrator.");

    const [room, bills, complaints, totalPaid, totalUnpaid] = await Promise.all([
      tenant.roomId ? store.rooms.findById(tenant.roomId) : Promise.resolve(null),
      store.bills.findByTenant(tenantId),
      store.complaints.findAll({ tenantId }),
      store.bills.sumAmount(tenantId, BillStatus.Paid),
      store.bills.sumAmount(tenantId, BillStatus.Unpaid),
    ]);

    return {
      tenant,
      room,
      bills,
      paidBills: bills.filter((bill) => bill.status === BillStatus.Paid),
      unpaidBills: bills.filter((bill) => bill.status === BillStatus.Unpaid),
      complaints,
      totalPaid: roundMoney(totalPaid),
      totalUnpaid: roundMoney(totalUnpaid),
    };
  },
});

export type DashboardService = ReturnType<typeof createDashboardService>;
