// src/store.ts
import mongoose, { type ClientSession } from "mongoose";
import { createAccountRepository, type AccountRepository } from "./modules/Auths/authRepository";
import { createRoomRepository, type RoomRepository } from "./modules/Rooms/roomRepository";
import { createTenantRepository, type TenantRepository } from "./modules/Tenants/tenantRepository";
import { createBillRepository, type BillRepository } from "./modules/Bills/billRepository";
import {
  createComplaintRepository,
  type ComplaintRepository,
} from "./modules/Complaints/complaintRepository";

export interface Repositories {
  accounts: AccountRepository;
  rooms: RoomRepository;
  tenants: TenantRepository;
  bills: BillRepository;
  complaints: ComplaintRepository;
}

export interface Store extends Repositories {
  /**
   * Runs `work` as one unit against repositories bound to a transaction.
   * Either every write inside `work` commits or none does.
   */
  transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T>;
}

const createRepositories = (session?: ClientSession): Repositories => ({
  accounts: createAccountRepository(session),
  rooms: createRoomRepository(session),
  tenants: createTenantRepository(session),
  bills: createBillRepository(session),
  complaints: createComplaintRepository(session),
});

// connection.transaction() retries the callback on transient write conflicts
export const createMongoStore = (connection = mongoose.connection): Store => ({
  ...createRepositories(),
  transaction: (work) => connection.transaction((session) => work(createRepositories(session))),
});

export interface ServiceDeps {
  store: Store;
  /** Clock for every timestamp a workflow writes. */
  now?: () => Date;
}
