import { beforeEach, describe, expect, it, vi } from 'vitest';

const { fabricFindOneAndUpdate, fabricFindById, accessoryFindOneAndUpdate, accessoryFindById, insertMany } =
  vi.hoisted(() => ({
    fabricFindOneAndUpdate: vi.fn(),
    fabricFindById: vi.fn(),
    accessoryFindOneAndUpdate: vi.fn(),
    accessoryFindById: vi.fn(),
    insertMany: vi.fn(),
  }));

vi.mock('../../models/index.js', () => ({
  Fabric: { findOneAndUpdate: fabricFindOneAndUpdate, findById: fabricFindById },
  Accessory: { findOneAndUpdate: accessoryFindOneAndUpdate, findById: accessoryFindById },
  InventoryLog: { insertMany },
}));
vi.mock('../../utils/logger.js', () => ({
  logger: { warn: vi.fn(), error: vi.fn(), info: vi.fn(), debug: vi.fn() },
  smsLogger: { warn: vi.fn(), error: vi.fn(), info: vi.fn(), debug: vi.fn() },
  socketLogger: { warn: vi.fn(), error: vi.fn(), info: vi.fn(), debug: vi.fn() },
}));

import {
  assertAvailable,
  deductStock,
  orderStockLines,
  restoreStock,
  roundedStockChange,
  shortageMessage,
} from './stock.service.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import { InventoryAction, InventoryItemType } from '../../utils/constants.js';

const fabricLine = { itemType: InventoryItemType.FABRIC, itemId: 'fabric-1', quantity: 3 };
const buttonLine = { itemType: InventoryItemType.ACCESSORY, itemId: 'buttons-1', quantity: 12 };

beforeEach(() => {
  vi.clearAllMocks();
  insertMany.mockResolvedValue([]);
});

describe('deductStock', () => {
  it('decrements each item conditionally and logs the deductions', async () => {
    fabricFindOneAndUpdate.mockResolvedValue({ stockMeters: 10 });
    accessoryFindOneAndUpdate.mockResolvedValue({ stockQuantity: 50 });

    await deductStock([fabricLine, buttonLine], { notes: 'Order ORD-00000001', actorId: 'admin-1' });

    expect(fabricFindOneAndUpdate).toHaveBeenCalledWith(
      { _id: 'fabric-1', stockMeters: { $gte: 3 } },
      [{ $set: { stockMeters: { $round: [{ $add: ['$stockMeters', -3] }, 2] } } }],
    );
    expect(accessoryFindOneAndUpdate).toHaveBeenCalledWith(
      { _id: 'buttons-1', stockQuantity: { $gte: 12 } },
      [{ $set: { stockQuantity: { $round: [{ $add: ['$stockQuantity', -12] }, 2] } } }],
    );

    const [entries] = insertMany.mock.calls[0];
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({
      itemType: InventoryItemType.FABRIC,
      fabricId: 'fabric-1',
      action: InventoryAction.DEDUCT,
      quantity: 3,
      previousStock: 10,
      newStock: 7,
      notes: 'Order ORD-00000001',
      createdBy: 'admin-1',
    });
    expect(entries[1]).toMatchObject({ accessoryId: 'buttons-1', previousStock: 50, newStock: 38 });
  });

  it('puts back earlier deductions when a later item is short', async () => {
    fabricFindOneAndUpdate.mockResolvedValueOnce({ stockMeters: 10 }).mockResolvedValueOnce({ stockMeters: 7 });
    accessoryFindOneAndUpdate.mockResolvedValue(null);
    accessoryFindById.mockResolvedValue({ name: 'Buttons', stockQuantity: 4 });

    const error = await deductStock([fabricLine, buttonLine], { notes: 'Order ORD-00000002' }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(AppError);
    if (!(error instanceof AppError)) return;
    expect(error.code).toBe(ErrorCode.INSUFFICIENT_STOCK);
    expect(error.message).toBe('Insufficient Buttons stock. Need 12, available 4.');
    expect(fabricFindOneAndUpdate).toHaveBeenLastCalledWith(
      { _id: 'fabric-1' },
      roundedStockChange('stockMeters', 3),
    );
    expect(insertMany).not.toHaveBeenCalled();
  });

  it('rounds fractional quantities in the stock filter and the stored value', async () => {
    fabricFindOneAndUpdate.mockResolvedValue({ stockMeters: 1 });

    // 0.1 + 0.2 as computed in floating point
    await deductStock([{ ...fabricLine, quantity: 0.30000000000000004 }], { notes: 'Order ORD-00000004' });

    expect(fabricFindOneAndUpdate).toHaveBeenCalledWith(
      { _id: 'fabric-1', stockMeters: { $gte: 0.3 } },
      [{ $set: { stockMeters: { $round: [{ $add: ['$stockMeters', -0.3] }, 2] } } }],
    );
    const [entries] = insertMany.mock.calls[0];
    expect(entries[0]).toMatchObject({ quantity: 0.3, previousStock: 1, newStock: 0.7 });
  });

  it('skips zero-quantity lines', async () => {
    await deductStock([{ ...buttonLine, quantity: 0 }], { notes: 'n/a' });
    expect(accessoryFindOneAndUpdate).not.toHaveBeenCalled();
    expect(insertMany).not.toHaveBeenCalled();
  });
});

describe('assertAvailable', () => {
  it('reports the fabric shortage in meters', async () => {
    fabricFindById.mockResolvedValue({ name: 'Cotton', color: 'White', stockMeters: 2 });

    await expect(assertAvailable([fabricLine])).rejects.toMatchObject({
      code: ErrorCode.INSUFFICIENT_STOCK,
      message: 'Insufficient fabric stock. Need 3m, available 2m.',
    });
  });

  it('returns 404 for an unknown item', async () => {
    fabricFindById.mockResolvedValue(null);
    await expect(assertAvailable([fabricLine])).rejects.toMatchObject({ statusCode: 404 });
  });
});

describe('restoreStock', () => {
  it('adds the quantities back and logs them as additions', async () => {
    fabricFindOneAndUpdate.mockResolvedValue({ stockMeters: 7 });

    await restoreStock([fabricLine], { notes: 'Cancelled order ORD-00000003' });

    expect(fabricFindOneAndUpdate).toHaveBeenCalledWith({ _id: 'fabric-1' }, roundedStockChange('stockMeters', 3));
    const [entries] = insertMany.mock.calls[0];
    expect(entries[0]).toMatchObject({ action: InventoryAction.ADD, previousStock: 7, newStock: 10 });
  });
});

describe('orderStockLines', () => {
  it('lists fabric first, then accessories', () => {
    expect(
      orderStockLines({
        fabricId: 'f1',
        fabricMetersUsed: 2.5,
        accessories: [{ accessoryId: 'a1', quantityUsed: 4 }],
      }),
    ).toEqual([
      { itemType: InventoryItemType.FABRIC, itemId: 'f1', quantity: 2.5 },
      { itemType: InventoryItemType.ACCESSORY, itemId: 'a1', quantity: 4 },
    ]);
  });
});

describe('shortageMessage', () => {
  it('names the accessory', () => {
    expect(
      shortageMessage({
        itemType: InventoryItemType.ACCESSORY,
        itemId: 'x',
        name: 'Zipper',
        required: 2,
        available: 1,
      }),
    ).toBe('Insufficient Zipper stock. Need 2, available 1.');
  });
});
