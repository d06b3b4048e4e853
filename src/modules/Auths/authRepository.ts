// src/modules/Auths/authRepository.ts
import type { ClientSession, HydratedDocument } from "mongoose";
import { AccountModel, type AccountDocument } from "../../db/schemas/accountSchema";
import { rethrowDuplicate, toObjectId } from "../../db/helpers";
import type { Account, AccountInput } from "./authModel";

export interface AccountRepository {
  findById(accountId: string): Promise<Account | null>;
  findByUsername(username: string): Promise<Account | null>;
  create(data: AccountInput): Promise<Account>;
  delete(accountId: string): Promise<boolean>;
}

const toAccount = (doc: HydratedDocument<AccountDocument>): Account => ({
  accountId: doc._id.toString(),
  username: doc.username,
  firstName: doc.firstName,
  lastName: doc.lastName,
  email: doc.email,
  passwordHash: doc.passwordHash,
  isAdmin: doc.isAdmin,
  createdAt: doc.createdAt,
});

export const createAccountRepository = (session?: ClientSession): AccountRepository => ({
  async findById(accountId) {
    const id = toObjectId(accountId);
    if (!id) return null;
    const doc = await AccountModel.findById(id, null, { session });
    return doc ? toAccount(doc) : null;
  },

  async findByUsername(username) {
    const doc = await AccountModel.findOne({ username }, null, { session });
    return doc ? toAccount(doc) : null;
  },

  async create(data) {
    const doc = await rethrowDuplicate(
      new AccountModel(data).save({ session }),
      "A user with that username already exists."
    );
    return toAccount(doc);
  },

  async delete(accountId) {
    const id = toObjectId(accountId);
    if (!id) return false;
    const result = await AccountModel.deleteOne({ _id: id }, { session });
    return result.deletedCount > 0;
  },
});
