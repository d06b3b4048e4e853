// src/modules/Rooms/roomRepository.ts
import type { ClientSession, HydratedDocument } from "mongoose";
import { RoomModel, type RoomDocument } from "../../db/schemas/roomSchema";
import { rethrowDuplicate, toObjectId } from "../../db/helpers";
import type { Room, RoomInput, UpdateRoomInput } from "./roomModel";

const DUPLICATE_ROOM = "Room with this Room number already exists.";

export interface RoomRepository {
  findAll(): Promise<Room[]>;
  findById(roomId: string): Promise<Room | null>;
  create(data: RoomInput): Promise<Room>;
  update(roomId: string, data: UpdateRoomInput): Promise<Room | null>;
  delete(roomId: string): Promise<boolean>;
  count(): Promise<number>;
  /**
   * Loads the room for an assignment and takes a write on it, so that two
   * transactions assigning into the same room cannot both commit.
   */
  lockForAssignment(roomId: string): Promise<Room | null>;
}

const toRoom = (doc: HydratedDocument<RoomDocument>): Room => ({
  roomId: doc._id.toString(),
  roomNumber: doc.roomNumber,
  capacity: doc.capacity,
  rent: doc.rent,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

export const createRoomRepository = (session?: ClientSession): RoomRepository => ({
  async findAll() {
    const docs = await RoomModel.find({}, null, { session }).sort({ roomNumber: 1 });
    return docs.map(toRoom);
  },

  async findById(roomId) {
    const id = toObjectId(roomId);
    if (!id) return null;
    const doc = await RoomModel.findById(id, null, { session });
    return doc ? toRoom(doc) : null;
  },

  async create(data) {
    const doc = await rethrowDuplicate(new RoomModel(data).save({ session }), DUPLICATE_ROOM);
    return toRoom(doc);
  },

  async update(roomId, data) {
    const id = toObjectId(roomId);
    if (!id) return null;
    const doc = await rethrowDuplicate(
      RoomModel.findByIdAndUpdate(id, { $set: data }, { new: true, runValidators: true, session }).exec(),
      DUPLICATE_ROOM
    );
    return doc ? toRoom(doc) : null;
  },

  async delete(roomId) {
    const id = toObjectId(roomId);
    if (!id) return false;
    const result = await RoomModel.deleteOne({ _id: id }, { session });
    return result.deletedCount > 0;
  },

  async count() {
    return RoomModel.countDocuments({}, { session });
  },

  async lockForAssignment(roomId) {
    const id = toObjectId(roomId);
    if (!id) return null;
    const doc = await RoomModel.findOneAndUpdate(
      { _id: id },
      { $inc: { assignmentVersion: 1 } },
      { new: true, session }
    );
    return doc ? toRoom(doc) : null;
  },
});
