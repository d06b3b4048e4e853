import { createDashboardService } from '../../src/modules/Dashboards/dashboardService';
import { BillStatus } from '../../src/modules/Bills/billModel';
import { ComplaintStatus } from '../../src/modules/Complaints/complaintModel';
import { PermissionError } from '../../src/utils/errors';
import { MemoryStore } from '../support/memoryStore';
import { adminActor, actorFor, seedRoom, seedTenant } from '../support/fixtures';

describe('dashboardService', () => {
  let store: MemoryStore;
  let dashboardService: ReturnType<typeof createDashboardService>;

  beforeEach(() => {
    store = new MemoryStore();
    dashboardService = createDashboardService({ store });
  });

  const seedHostel = async () => {
    const shared = await seedRoom(store, '101', 2);
    const single = await seedRoom(store, '102', 1);
    const alice = await seedTenant(store, 'alice', { roomId: shared.roomId });
    const bob = await seedTenant(store, 'bob', { roomId: single.roomId });
    const carol = await seedTenant(store, 'carol');

    await store.bills.create({ tenantId: alice.tenantId, month: '2024-01', amount: 500 });
    const paid = await store.bills.create({ tenantId: alice.tenantId, month: '2024-02', amount: 450.5 });
    await store.bills.update(paid.billId, { status: BillStatus.Paid, paidAt: new Date('2024-02-05T00:00:00.000Z') });
    await store.bills.create({ tenantId: bob.tenantId, month: '2024-01', amount: 300 });

    await store.complaints.create(alice.tenantId, { subject: 'Leak', message: 'The tap drips.' });
    const fixed = await store.complaints.create(bob.tenantId, { subject: 'Door', message: 'Lock sticks.' });
    await store.complaints.update(fixed.complaintId, {
      status: ComplaintStatus.Resolved,
      resolvedAt: new Date('2024-02-06T00:00:00.000Z'),
      updatedAt: new Date('2024-02-06T00:00:00.000Z'),
    });

    return { alice, bob, carol };
  };

  it('should summarise the hostel for administrators', async () => {
    await seedHostel();

    const dashboard = await dashboardService.getAdminDashboard(adminActor);

    expect(dashboard.totalTenants).toBe(3);
    expect(dashboard.totalRooms).toBe(2);
    expect(dashboard.unpaidBills).toBe(2);
    expect(dashboard.pendingComplaints).toBe(1);
    expect(dashboard.recentTenants.map((tenant) => tenant.username)).toEqual(['carol', 'bob', 'alice']);
    expect(dashboard.recentBills.map((bill) => bill.amount)).toEqual([300, 500]);
    expect(dashboard.recentComplaints.map((complaint) => complaint.subject)).toEqual(['Leak']);
    expect(dashboard.rooms.map(({ roomNumber, tenantCount, isFull }) => ({ roomNumber, tenantCount, isFull }))).toEqual([
      { roomNumber: '101', tenantCount: 1, isFull: false },
      { roomNumber: '102', tenantCount: 1, isFull: true },
    ]);
  });

  it('should total a tenant bills by status', async () => {
    const { alice } = await seedHostel();

    const dashboard = await dashboardService.getTenantDashboard(actorFor(alice));

    expect(dashboard.room?.roomNumber).toBe('101');
    expect(dashboard.bills).toHaveLength(2);
    expect(dashboard.paidBills.map((bill) => bill.month)).toEqual(['2024-02']);
    expect(dashboard.unpaidBills.map((bill) => bill.month)).toEqual(['2024-01']);
    expect(dashboard.totalPaid).toBe(450.5);
    expect(dashboard.totalUnpaid).toBe(500);
    expect(dashboard.complaints).toHaveLength(1);
  });

  it('should show an unassigned tenant with no room and zero totals', async () => {
    const { carol } = await seedHostel();

    const dashboard = await dashboardService.getTenantDashboard(actorFor(carol));

    expect(dashboard.room).toBeNull();
    expect(dashboard.totalPaid).toBe(0);
    expect(dashboard.totalUnpaid).toBe(0);
  });

  it('should total fractional amounts to the cent', async () => {
    const dora = await seedTenant(store, 'dora');
    await store.bills.create({ tenantId: dora.tenantId, month: '2024-01', amount: 0.1 });
    await store.bills.create({ tenantId: dora.tenantId, month: '2024-02', amount: 0.2 });

    const dashboard = await dashboardService.getTenantDashboard(actorFor(dora));

    expect(dashboard.totalUnpaid).toBe(0.3);
    expect(dashboard.totalPaid).toBe(0);
  });

  it('should keep each dashboard to its role', async () => {
    const { alice } = await seedHostel();

    await expect(dashboardService.getAdminDashboard(actorFor(alice))).rejects.toThrow(PermissionError);
    await expect(dashboardService.getTenantDashboard(adminActor)).rejects.toThrow(PermissionError);
  });
});
