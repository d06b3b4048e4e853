// src/modules/Complaints/complaintRepository.ts
import type { ClientSession, FilterQuery, HydratedDocument } from "mongoose";
import { ComplaintModel, type ComplaintDocument } from "../../db/schemas/complaintSchema";
import { toObjectId } from "../../db/helpers";
import { NotFoundError } from "../../utils/errors";
import {
  ComplaintStatus,
  type Complaint,
  type ComplaintChanges,
  type ComplaintFilter,
  type ComplaintInput,
} from "./complaintModel";

export interface ComplaintRepository {
  /** Newest first. */
  findAll(filter?: ComplaintFilter): Promise<Complaint[]>;
  findRecent(status: ComplaintStatus, limit: number): Promise<Complaint[]>;
  findById(complaintId: string): Promise<Complaint | null>;
  create(tenantId: string, data: ComplaintInput): Promise<Complaint>;
  update(complaintId: string, changes: ComplaintChanges): Promise<Complaint | null>;
  deleteByTenant(tenantId: string): Promise<number>;
  countByStatus(status: ComplaintStatus): Promise<number>;
}

const toComplaint = (doc: HydratedDocument<ComplaintDocument>): Complaint => ({
  complaintId: doc._id.toString(),
  tenantId: doc.tenant.toString(),
  subject: doc.subject,
  message: doc.message,
  status: doc.status,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
  resolvedAt: doc.resolvedAt ?? null,
});

export const createComplaintRepository = (session?: ClientSession): ComplaintRepository => ({
  async findAll(filter = {}) {
    const query: FilterQuery<ComplaintDocument> = {};
    if (filter.status) query.status = filter.status;
    if (filter.tenantId) {
      const tenant = toObjectId(filter.tenantId);
      if (!tenant) return [];
      query.tenant = tenant;
    }
    const docs = await ComplaintModel.find(query, null, { session }).sort({ createdAt: -1 });
    return docs.map(toComplaint);
  },

  async findRecent(status, limit) {
    const docs = await ComplaintModel.find({ status }, null, { session })
      .sort({ createdAt: -1 })
      .limit(limit);
    return docs.map(toComplaint);
  },

  async findById(complaintId) {
    const id = toObjectId(complaintId);
    if (!id) return null;
    const doc = await ComplaintModel.findById(id, null, { session });
    return doc ? toComplaint(doc) : null;
  },

  async create(tenantId, { subject, message }) {
    const tenant = toObjectId(tenantId);
    if (!tenant) throw new NotFoundError("Tenant not found.");
    const doc = await new ComplaintModel({
      tenant,
      subject,
      message,
      status: ComplaintStatus.Pending,
      resolvedAt: null,
    }).save({ session });
    return toComplaint(doc);
  },

  async update(complaintId, { status, resolvedAt, updatedAt }) {
    const id = toObjectId(complaintId);
    if (!id) return null;
    // updatedAt is written explicitly so a same-state transition still refreshes it
    const doc = await ComplaintModel.findByIdAndUpdate(
      id,
      { $set: { status, resolvedAt, updatedAt } },
      { new: true, runValidators: true, timestamps: false, session }
    );
    return doc ? toComplaint(doc) : null;
  },

  async deleteByTenant(tenantId) {
    const tenant = toObjectId(tenantId);
    if (!tenant) return 0;
    const result = await ComplaintModel.deleteMany({ tenant }, { session });
    return result.deletedCount;
  },

  async countByStatus(status) {
    return ComplaintModel.countDocuments({ status }, { session });
  },
});
