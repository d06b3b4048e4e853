import { pay } from '../../src/policies/billingPolicy';
import { BillStatus } from '../../src/modules/Bills/billModel';
import { PermissionError } from '../../src/utils/errors';
import { adminActor, actorFor } from '../support/fixtures';

describe('billingPolicy.pay', () => {
  const owner = actorFor({ accountId: 'account-a', tenantId: 'tenant-a' });
  const other = actorFor({ accountId: 'account-b', tenantId: 'tenant-b' });
  const now = new Date('2024-02-01T10:00:00.000Z');

  it('should mark an unpaid bill paid at the given time', () => {
    expect(pay({ tenantId: 'tenant-a', status: BillStatus.Unpaid }, owner, now)).toEqual({
      kind: 'paid',
      changes: { status: 'Paid', paidAt: now },
    });
  });

  it('should be a no-op for a bill that is already paid', () => {
    expect(pay({ tenantId: 'tenant-a', status: BillStatus.Paid }, owner, now)).toEqual({ kind: 'noop' });
  });

  it('should refuse another tenant', () => {
    expect(() => pay({ tenantId: 'tenant-a', status: BillStatus.Unpaid }, other, now)).toThrow(
      new PermissionError('You do not have permission to pay this bill.')
    );
  });

  it('should refuse an administrator', () => {
    expect(() => pay({ tenantId: 'tenant-a', status: BillStatus.Unpaid }, adminActor, now)).toThrow(
      PermissionError
    );
  });
});
