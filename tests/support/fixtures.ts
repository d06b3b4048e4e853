import { Role, type Actor } from '../../src/policies/accessPolicy';
import type { Store } from '../../src/store';
import type { Tenant } from '../../src/modules/Tenants/tenantModel';

export const adminActor: Actor = { accountId: 'account-admin', role: Role.Admin, tenantId: null };

export const actorFor = (tenant: Pick<Tenant, 'accountId' | 'tenantId'>): Actor => ({
  accountId: tenant.accountId,
  role: Role.Tenant,
  tenantId: tenant.tenantId,
});

export async function seedRoom(store: Store, roomNumber: string, capacity: number, rent = 500) {
  return store.rooms.create({ roomNumber, capacity, rent });
}

export async function seedTenant(
  store: Store,
  username: string,
  options: { firstName?: string; lastName?: string; roomId?: string | null } = {}
) {
  const account = await store.accounts.create({
    username,
    firstName: options.firstName ?? username,
    lastName: options.lastName ?? '',
    email: `${username}@example.com`,
    passwordHash: 'not-a-real-hash',
    isAdmin: false,
  });
  const tenant = await store.tenants.create({ accountId: account.accountId });
  if (options.roomId) {
    const placed = await store.tenants.setRoom(tenant.tenantId, options.roomId);
    if (placed) return placed;
  }
  return tenant;
}
