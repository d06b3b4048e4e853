// src/modules/Tenants/tenantRepository.ts
import type { ClientSession, HydratedDocument, Types } from "mongoose";
import { TenantModel, type TenantDocument } from "../../db/schemas/tenantSchema";
import type { AccountDocument } from "../../db/schemas/accountSchema";
import type { RoomDocument } from "../../db/schemas/roomSchema";
import { rethrowDuplicate, toObjectId } from "../../db/helpers";
import { NotFoundError } from "../../utils/errors";
import type { Tenant, TenantFilter, TenantInput, TenantProfile } from "./tenantModel";

export interface TenantRepository {
  findAll(filter?: TenantFilter): Promise<TenantProfile[]>;
  findRecent(limit: number): Promise<TenantProfile[]>;
  findById(tenantId: string): Promise<Tenant | null>;
  findProfile(tenantId: string): Promise<TenantProfile | null>;
  findByAccount(accountId: string): Promise<Tenant | null>;
  create(data: TenantInput): Promise<Tenant>;
  setRoom(tenantId: string, roomId: string | null): Promise<Tenant | null>;
  /** Number of tenants whose room reference points at `roomId`. */
  countByRoom(roomId: string): Promise<number>;
  /** Occupant count per referenced room id; rooms without tenants are absent. */
  countPerRoom(): Promise<Map<string, number>>;
  /** Nulls the room reference of every tenant in `roomId`; returns how many. */
  clearRoom(roomId: string): Promise<number>;
  delete(tenantId: string): Promise<boolean>;
  count(): Promise<number>;
}

type TenantRelations = {
  account: HydratedDocument<AccountDocument> | null;
  room: HydratedDocument<RoomDocument> | null;
};

type PopulatedTenant = Omit<TenantDocument, keyof TenantRelations> &
  TenantRelations & { _id: Types.ObjectId };

const toTenant = (doc: HydratedDocument<TenantDocument>): Tenant => ({
  tenantId: doc._id.toString(),
  accountId: doc.account.toString(),
  roomId: doc.room ? doc.room.toString() : null,
  joinDate: doc.joinDate,
  phone: doc.phone,
  address: doc.address,
});

const toProfile = (doc: PopulatedTenant): TenantProfile | null => {
  const { account, room } = doc;
  if (!account) return null;
  return {
    tenantId: doc._id.toString(),
    accountId: account._id.toString(),
    roomId: room ? room._id.toString() : null,
    joinDate: doc.joinDate,
    phone: doc.phone,
    address: doc.address,
    username: account.username,
    fullName: `${account.firstName} ${account.lastName}`.trim() || account.username,
    email: account.email,
    roomNumber: room ? room.roomNumber : null,
  };
};

const toProfiles = (docs: PopulatedTenant[]) =>
  docs.map(toProfile).filter((profile): profile is TenantProfile => profile !== null);

const byName = (a: TenantProfile, b: TenantProfile) => a.fullName.localeCompare(b.fullName);

export const createTenantRepository = (session?: ClientSession): TenantRepository => ({
  async findAll(filter = {}) {
    const query: { room?: Types.ObjectId } = {};
    if (filter.roomId) {
      const roomId = toObjectId(filter.roomId);
      if (!roomId) return [];
      query.room = roomId;
    }
    const docs = await TenantModel.find(query, null, { session }).populate<TenantRelations>([
      "account",
      "room",
    ]);
    return toProfiles(docs).sort(byName);
  },

  async findRecent(limit) {
    const docs = await TenantModel.find({}, null, { session })
      .sort({ joinDate: -1, _id: -1 })
      .limit(limit)
      .populate<TenantRelations>(["account", "room"]);
    return toProfiles(docs);
  },

  async findById(tenantId) {
    const id = toObjectId(tenantId);
    if (!id) return null;
    const doc = await TenantModel.findById(id, null, { session });
    return doc ? toTenant(doc) : null;
  },

  async findProfile(tenantId) {
    const id = toObjectId(tenantId);
    if (!id) return null;
    const doc = await TenantModel.findById(id, null, { session }).populate<TenantRelations>([
      "account",
      "room",
    ]);
    return doc ? toProfile(doc) : null;
  },

  async findByAccount(accountId) {
    const id = toObjectId(accountId);
    if (!id) return null;
    const doc = await TenantModel.findOne({ account: id }, null, { session });
    return doc ? toTenant(doc) : null;
  },

  async create(data) {
    const account = toObjectId(data.accountId);
    if (!account) throw new NotFoundError("Account not found.");
    const doc = await rethrowDuplicate(
      new TenantModel({ account, phone: data.phone ?? "", address: data.address ?? "" }).save({
        session,
      }),
      "A tenant profile already exists for this account."
    );
    return toTenant(doc);
  },

  async setRoom(tenantId, roomId) {
    const id = toObjectId(tenantId);
    if (!id) return null;
    const room = roomId ? toObjectId(roomId) : null;
    const doc = await TenantModel.findByIdAndUpdate(id, { $set: { room } }, { new: true, session });
    return doc ? toTenant(doc) : null;
  },

  async countByRoom(roomId) {
    const id = toObjectId(roomId);
    if (!id) return 0;
    return TenantModel.countDocuments({ room: id }, { session });
  },

  async countPerRoom() {
    const rows = await TenantModel.aggregate<{ _id: Types.ObjectId; count: number }>(
      [{ $match: { room: { $ne: null } } }, { $group: { _id: "$room", count: { $sum: 1 } } }],
      { session }
    );
    return new Map(rows.map((row) => [row._id.toString(), row.count]));
  },

  async clearRoom(roomId) {
    const id = toObjectId(roomId);
    if (!id) return 0;
    const result = await TenantModel.updateMany({ room: id }, { $set: { room: null } }, { session });
    return result.modifiedCount;
  },

  async delete(tenantId) {
    const id = toObjectId(tenantId);
    if (!id) return false;
    const result = await TenantModel.deleteOne({ _id: id }, { session });
    return result.deletedCount > 0;
  },

  async count() {
    return TenantModel.countDocuments({}, { session });
  },
});
