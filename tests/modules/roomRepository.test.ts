import type { ClientSession } from 'mongoose';
import { createRoomRepository } from '../../src/modules/Rooms/roomRepository';

const mockFindOneAndUpdate = jest.fn();

jest.mock('../../src/db/schemas/roomSchema', () => ({
  RoomModel: {
    findOneAndUpdate: (...args: unknown[]) => mockFindOneAndUpdate(...args),
  },
}));

describe('roomRepository.lockForAssignment', () => {
  const roomId = '65a1b2c3d4e5f6a7b8c9d0e1';
  const session = { id: 'test-session' } as unknown as ClientSession;
  const createdAt = new Date('2024-01-01T00:00:00.000Z');

  beforeEach(() => {
    mockFindOneAndUpdate.mockReset();
  });

  it('should bump the room version inside the session before returning the room', async () => {
    mockFindOneAndUpdate.mockResolvedValue({
      _id: { toString: () => roomId },
      roomNumber: '101',
      capacity: 2,
      rent: 500,
      createdAt,
      updatedAt: createdAt,
    });

    const room = await createRoomRepository(session).lockForAssignment(roomId);

    expect(mockFindOneAndUpdate).toHaveBeenCalledTimes(1);
    const [filter, update, options] = mockFindOneAndUpdate.mock.calls[0];
    expect(String(filter._id)).toBe(roomId);
    expect(update).toEqual({ $inc: { assignmentVersion: 1 } });
    expect(options).toEqual({ new: true, session });
    expect(room).toEqual({
      roomId,
      roomNumber: '101',
      capacity: 2,
      rent: 500,
      createdAt,
      updatedAt: createdAt,
    });
  });

  it('should return null for a missing room', async () => {
    mockFindOneAndUpdate.mockResolvedValue(null);
    expect(await createRoomRepository(session).lockForAssignment(roomId)).toBeNull();
  });

  it('should not query for an id that is not an ObjectId', async () => {
    expect(await createRoomRepository(session).lockForAssignment('room-1')).toBeNull();
    expect(mockFindOneAndUpdate).not.toHaveBeenCalled();
  });
});
