import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Types } from 'mongoose';

const mocks = vi.hoisted(() => ({
  fabricFindOneAndUpdate: vi.fn(),
  accessoryFindOneAndUpdate: vi.fn(),
  logCreate: vi.fn(),
  auditCreate: vi.fn(),
}));

vi.mock('../../models/index.js', () => ({
  Fabric: { findOneAndUpdate: mocks.fabricFindOneAndUpdate },
  Accessory: { findOneAndUpdate: mocks.accessoryFindOneAndUpdate },
  InventoryLog: { create: mocks.logCreate },
  AuditLog: { create: mocks.auditCreate },
  GarmentType: {},
  Order: {},
}));
vi.mock('../notifications/socket.service.js', () => ({ notifyRole: vi.fn() }));

import { addAccessoryStock, addFabricStock } from './inventory.service.js';

const actorId = new Types.ObjectId().toString();

beforeEach(() => {
  vi.clearAllMocks();
});

describe('addFabricStock', () => {
  it('stores the rounded sum and logs the addition', async () => {
    const fabricId = new Types.ObjectId();
    mocks.fabricFindOneAndUpdate.mockResolvedValue({ _id: fabricId, name: 'Linen', stockMeters: 0.1 });

    const result = await addFabricStock(fabricId.toString(), { quantity: 0.2 }, actorId);

    expect(mocks.fabricFindOneAndUpdate).toHaveBeenCalledWith({ _id: fabricId.toString() }, [
      { $set: { stockMeters: { $round: [{ $add: ['$stockMeters', 0.2] }, 2] } } },
    ]);
    expect(result).toEqual({ id: fabricId, name: 'Linen', previousStock: 0.1, newStock: 0.3 });
    expect(mocks.logCreate).toHaveBeenCalledWith(
      expect.objectContaining({ action: 'add', quantity: 0.2, previousStock: 0.1, newStock: 0.3, notes: 'Stock added' }),
    );
  });

  it('returns 404 for an unknown fabric', async () => {
    mocks.fabricFindOneAndUpdate.mockResolvedValue(null);

    await expect(addFabricStock(new Types.ObjectId().toString(), { quantity: 5 }, actorId)).rejects.toMatchObject({
      statusCode: 404,
    });
    expect(mocks.logCreate).not.toHaveBeenCalled();
  });
});

describe('addAccessoryStock', () => {
  it('uses the rounded stock update for accessories', async () => {
    const accessoryId = new Types.ObjectId();
    mocks.accessoryFindOneAndUpdate.mockResolvedValue({ _id: accessoryId, name: 'Buttons', stockQuantity: 40 });

    const result = await addAccessoryStock(accessoryId.toString(), { quantity: 24, notes: 'Supplier delivery' }, actorId);

    expect(mocks.accessoryFindOneAndUpdate).toHaveBeenCalledWith({ _id: accessoryId.toString() }, [
      { $set: { stockQuantity: { $round: [{ $add: ['$stockQuantity', 24] }, 2] } } },
    ]);
    expect(result.newStock).toBe(64);
  });
});
