import { createBillService } from '../../src/modules/Bills/billService';
import { ConflictError, NotFoundError, PermissionError, ValidationError } from '../../src/utils/errors';
import { MemoryStore } from '../support/memoryStore';
import { adminActor, actorFor, seedTenant } from '../support/fixtures';

describe('billService', () => {
  const firstPayment = new Date('2024-02-01T10:00:00.000Z');
  const secondPayment = new Date('2024-02-03T09:00:00.000Z');

  let store: MemoryStore;
  let clock: Date;
  let billService: ReturnType<typeof createBillService>;

  beforeEach(() => {
    store = new MemoryStore();
    clock = firstPayment;
    billService = createBillService({ store, now: () => clock });
  });

  describe('createBill', () => {
    it('should create an unpaid bill from the submitted form', async () => {
      const alice = await seedTenant(store, 'alice');

      const result = await billService.createBill(adminActor, {
        tenantId: alice.tenantId,
        month: ' January 2024 ',
        amount: '499.999',
        status: 'Paid',
      });

      expect(result.message).toBe('Bill created successfully!');
      expect(result.data).toMatchObject({
        tenantId: alice.tenantId,
        month: 'January 2024',
        amount: 500,
        status: 'Unpaid',
        paidAt: null,
      });
    });

    it('should reject a second bill for the same tenant and month', async () => {
      const alice = await seedTenant(store, 'alice');
      const first = await billService.createBill(adminActor, {
        tenantId: alice.tenantId,
        month: 'January 2024',
        amount: 500,
      });

      await expect(
        billService.createBill(adminActor, { tenantId: alice.tenantId, month: 'January 2024', amount: 650 })
      ).rejects.toThrow(new ConflictError('Bill with this Tenant and Month already exists.'));

      const bills = await store.bills.findByTenant(alice.tenantId);
      expect(bills).toHaveLength(1);
      expect(bills[0]).toEqual(first.data);
    });

    it('should reject an unknown tenant', async () => {
      await expect(
        billService.createBill(adminActor, { tenantId: 'tenant-missing', month: 'January 2024', amount: 500 })
      ).rejects.toThrow(new NotFoundError('Tenant not found.'));
    });

    it('should reject a negative amount', async () => {
      const alice = await seedTenant(store, 'alice');
      const attempt = billService.createBill(adminActor, {
        tenantId: alice.tenantId,
        month: 'January 2024',
        amount: -1,
      });
      await expect(attempt).rejects.toThrow(ValidationError);
      await expect(attempt).rejects.toMatchObject({
        fields: { amount: ['Ensure this value is greater than or equal to 0.'] },
      });
    });

    it('should treat a blank or null amount as missing', async () => {
      const alice = await seedTenant(store, 'alice');

      for (const amount of ['', '   ', null]) {
        const attempt = billService.createBill(adminActor, { tenantId: alice.tenantId, month: 'January 2024', amount });
        await expect(attempt).rejects.toThrow(new ValidationError('amount: This field is required.'));
      }
      expect(await store.bills.findByTenant(alice.tenantId)).toEqual([]);
    });

    it('should reject an amount that is not a number', async () => {
      const alice = await seedTenant(store, 'alice');

      for (const amount of [true, 'twelve']) {
        const attempt = billService.createBill(adminActor, { tenantId: alice.tenantId, month: 'January 2024', amount });
        await expect(attempt).rejects.toMatchObject({ fields: { amount: ['Enter a number.'] } });
      }
    });

    it('should refuse tenants', async () => {
      const alice = await seedTenant(store, 'alice');
      await expect(
        billService.createBill(actorFor(alice), { tenantId: alice.tenantId, month: 'January 2024', amount: 1 })
      ).rejects.toThrow(PermissionError);
    });
  });

  describe('payBill', () => {
    it('should let the owning tenant pay and refuse anyone else', async () => {
      const alice = await seedTenant(store, 'alice');
      const bob = await seedTenant(store, 'bob');
      const bill = await store.bills.create({ tenantId: alice.tenantId, month: 'January 2024', amount: 500 });

      await expect(billService.payBill(actorFor(bob), bill.billId)).rejects.toThrow(
        new PermissionError('You do not have permission to pay this bill.')
      );
      expect((await store.bills.findById(bill.billId))?.status).toBe('Unpaid');

      const result = await billService.payBill(actorFor(alice), bill.billId);

      expect(result.outcome).toBe('success');
      expect(result.message).toBe('Bill for January 2024 has been paid successfully!');
      expect(result.data.status).toBe('Paid');
      expect(result.data.paidAt).toEqual(firstPayment);
    });

    it('should leave a paid bill untouched when paid again', async () => {
      const alice = await seedTenant(store, 'alice');
      const bill = await store.bills.create({ tenantId: alice.tenantId, month: 'January 2024', amount: 500 });
      await billService.payBill(actorFor(alice), bill.billId);

      clock = secondPayment;
      const repeat = await billService.payBill(actorFor(alice), bill.billId);

      expect(repeat.outcome).toBe('noop');
      expect(repeat.message).toBe('This bill has already been paid.');
      expect(await store.bills.findById(bill.billId)).toEqual({
        ...bill,
        status: 'Paid',
        paidAt: firstPayment,
      });
    });

    it('should keep administrators from paying', async () => {
      const alice = await seedTenant(store, 'alice');
      const bill = await store.bills.create({ tenantId: alice.tenantId, month: 'January 2024', amount: 500 });

      await expect(billService.payBill(adminActor, bill.billId)).rejects.toThrow(
        new PermissionError('This action is only available to tenants.')
      );
    });

    it('should report a missing bill', async () => {
      const alice = await seedTenant(store, 'alice');
      await expect(billService.payBill(actorFor(alice), 'bill-missing')).rejects.toThrow(
        new NotFoundError('Bill not found.')
      );
    });
  });

  describe('updateBill', () => {
    it('should store an edited status without stamping paidAt', async () => {
      const alice = await seedTenant(store, 'alice');
      const bill = await store.bills.create({ tenantId: alice.tenantId, month: 'January 2024', amount: 500 });

      const result = await billService.updateBill(adminActor, bill.billId, { status: 'Paid' });

      expect(result.message).toBe('Bill updated successfully!');
      expect(result.data).toMatchObject({ status: 'Paid', paidAt: null, amount: 500 });
    });

    it('should take a submitted paid timestamp', async () => {
      const alice = await seedTenant(store, 'alice');
      const bill = await store.bills.create({ tenantId: alice.tenantId, month: 'January 2024', amount: 500 });

      const result = await billService.updateBill(adminActor, bill.billId, {
        status: 'Paid',
        paidAt: '2024-03-05T00:00:00.000Z',
      });

      expect(result.data.paidAt).toEqual(new Date('2024-03-05T00:00:00.000Z'));
    });

    it('should reject a month the tenant is already billed for', async () => {
      const alice = await seedTenant(store, 'alice');
      await store.bills.create({ tenantId: alice.tenantId, month: 'January 2024', amount: 500 });
      const february = await store.bills.create({
        tenantId: alice.tenantId,
        month: 'February 2024',
        amount: 500,
      });

      await expect(
        billService.updateBill(adminActor, february.billId, { month: 'January 2024' })
      ).rejects.toThrow(ConflictError);
      expect((await store.bills.findById(february.billId))?.month).toBe('February 2024');
    });

    it('should allow resubmitting the bill own tenant and month', async () => {
      const alice = await seedTenant(store, 'alice');
      const bill = await store.bills.create({ tenantId: alice.tenantId, month: 'January 2024', amount: 500 });

      const result = await billService.updateBill(adminActor, bill.billId, {
        tenantId: alice.tenantId,
        month: 'January 2024',
        amount: 550,
      });

      expect(result.data.amount).toBe(550);
    });

    it('should reject a status outside the enum', async () => {
      const alice = await seedTenant(store, 'alice');
      const bill = await store.bills.create({ tenantId: alice.tenantId, month: 'January 2024', amount: 500 });

      await expect(billService.updateBill(adminActor, bill.billId, { status: 'Overdue' })).rejects.toThrow(
        ValidationError
      );
    });
  });

  describe('listing', () => {
    it('should list a tenant bills by month, descending', async () => {
      const alice = await seedTenant(store, 'alice');
      const bob = await seedTenant(store, 'bob');
      await store.bills.create({ tenantId: alice.tenantId, month: '2024-01', amount: 500 });
      await store.bills.create({ tenantId: alice.tenantId, month: '2024-02', amount: 500 });
      await store.bills.create({ tenantId: bob.tenantId, month: '2024-02', amount: 300 });

      const own = await billService.getOwnBills(actorFor(alice));

      expect(own.map((bill) => bill.month)).toEqual(['2024-02', '2024-01']);
    });

    it('should filter all bills by status for administrators', async () => {
      const alice = await seedTenant(store, 'alice');
      const january = await store.bills.create({ tenantId: alice.tenantId, month: '2024-01', amount: 500 });
      await store.bills.create({ tenantId: alice.tenantId, month: '2024-02', amount: 500 });
      await billService.payBill(actorFor(alice), january.billId);

      const unpaid = await billService.getAllBills(adminActor, { status: 'Unpaid' });

      expect(unpaid.map((bill) => bill.month)).toEqual(['2024-02']);
    });
  });

  describe('deleteBill', () => {
    it('should delete a bill and report a missing one', async () => {
      const alice = await seedTenant(store, 'alice');
      const bill = await store.bills.create({ tenantId: alice.tenantId, month: '2024-01', amount: 500 });

      const result = await billService.deleteBill(adminActor, bill.billId);

      expect(result).toEqual({ outcome: 'success', message: 'Bill deleted successfully!', data: { billId: bill.billId } });
      await expect(billService.deleteBill(adminActor, bill.billId)).rejects.toThrow(NotFoundError);
    });
  });
});
