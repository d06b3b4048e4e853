// src/modules/Bills/billRepository.ts
import type { ClientSession, FilterQuery, HydratedDocument } from "mongoose";
import { BillModel, type BillDocument } from "../../db/schemas/billSchema";
import { escapeRegex, rethrowDuplicate, toObjectId } from "../../db/helpers";
import { NotFoundError } from "../../utils/errors";
import { roundMoney } from "../../utils/money";
import { BillStatus, type Bill, type BillChanges, type BillFilter } from "./billModel";

const DUPLICATE_BILL = "Bill with this Tenant and Month already exists.";

export interface NewBill {
  tenantId: string;
  month: string;
  amount: number;
}

export interface BillRepository {
  /** Newest first. */
  findAll(filter?: BillFilter): Promise<Bill[]>;
  /** Month descending, then newest first. */
  findByTenant(tenantId: string): Promise<Bill[]>;
  findRecent(status: BillStatus, limit: number): Promise<Bill[]>;
  findById(billId: string): Promise<Bill | null>;
  findByTenantAndMonth(tenantId: string, month: string): Promise<Bill | null>;
  create(data: NewBill): Promise<Bill>;
  update(billId: string, changes: BillChanges): Promise<Bill | null>;
  delete(billId: string): Promise<boolean>;
  deleteByTenant(tenantId: string): Promise<number>;
  countByStatus(status: BillStatus): Promise<number>;
  sumAmount(tenantId: string, status: BillStatus): Promise<number>;
}

const toBill = (doc: HydratedDocument<BillDocument>): Bill => ({
  billId: doc._id.toString(),
  tenantId: doc.tenant.toString(),
  month: doc.month,
  amount: doc.amount,
  status: doc.status,
  createdAt: doc.createdAt,
  paidAt: doc.paidAt ?? null,
});

export const createBillRepository = (session?: ClientSession): BillRepository => ({
  async findAll(filter = {}) {
    const query: FilterQuery<BillDocument> = {};
    if (filter.status) query.status = filter.status;
    if (filter.tenantId) {
      const tenant = toObjectId(filter.tenantId);
      if (!tenant) return [];
      query.tenant = tenant;
    }
    if (filter.month) query.month = { $regex: escapeRegex(filter.month), $options: "i" };
    const docs = await BillModel.find(query, null, { session }).sort({ createdAt: -1 });
    return docs.map(toBill);
  },

  async findByTenant(tenantId) {
    const tenant = toObjectId(tenantId);
    if (!tenant) return [];
    const docs = await BillModel.find({ tenant }, null, { session }).sort({ month: -1, createdAt: -1 });
    return docs.map(toBill);
  },

  async findRecent(status, limit) {
    const docs = await BillModel.find({ status }, null, { session }).sort({ createdAt: -1 }).limit(limit);
    return docs.map(toBill);
  },

  async findById(billId) {
    const id = toObjectId(billId);
    if (!id) return null;
    const doc = await BillModel.findById(id, null, { session });
    return doc ? toBill(doc) : null;
  },

  async findByTenantAndMonth(tenantId, month) {
    const tenant = toObjectId(tenantId);
    if (!tenant) return null;
    const doc = await BillModel.findOne({ tenant, month }, null, { session });
    return doc ? toBill(doc) : null;
  },

  async create({ tenantId, month, amount }) {
    const tenant = toObjectId(tenantId);
    if (!tenant) throw new NotFoundError("Tenant not found.");
    const doc = await rethrowDuplicate(
      new BillModel({
        tenant,
        month,
        amount,
        status: BillStatus.Unpaid,
        paidAt: null,
      }).save({ session }),
      DUPLICATE_BILL
    );
    return toBill(doc);
  },

  async update(billId, { tenantId, ...rest }) {
    const id = toObjectId(billId);
    if (!id) return null;
    const set: Partial<BillDocument> = { ...rest };
    if (tenantId !== undefined) {
      const tenant = toObjectId(tenantId);
      if (!tenant) return null;
      set.tenant = tenant;
    }
    const doc = await rethrowDuplicate(
      BillModel.findByIdAndUpdate(id, { $set: set }, { new: true, runValidators: true, session }).exec(),
      DUPLICATE_BILL
    );
    return doc ? toBill(doc) : null;
  },

  async delete(billId) {
    const id = toObjectId(billId);
    if (!id) return false;
    const result = await BillModel.deleteOne({ _id: id }, { session });
    return result.deletedCount > 0;
  },

  async deleteByTenant(tenantId) {
    const tenant = toObjectId(tenantId);
    if (!tenant) return 0;
    const result = await BillModel.deleteMany({ tenant }, { session });
    return result.deletedCount;
  },

  async countByStatus(status) {
    return BillModel.countDocuments({ status }, { session });
  },

  async sumAmount(tenantId, status) {
    const tenant = toObjectId(tenantId);
    if (!tenant) return 0;
    // aggregation pipelines are not cast: match on the ObjectId, not the string
    const [row] = await BillModel.aggregate<{ _id: null; total: number }>(
      [
        { $match: { tenant, status } },
        { $group: { _id: null, total: { $sum: "$amount" } } },
      ],
      { session }
    );
    return row ? roundMoney(row.total) : 0;
  },
});
