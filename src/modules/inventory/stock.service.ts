import { Accessory, Fabric, InventoryLog } from '../../models/index.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import { InventoryAction, InventoryItemType } from '../../utils/constants.js';
import { roundMoney } from '../../utils/helpers.js';
import { logger } from '../../utils/logger.js';
import type { Types } from 'mongoose';

export interface StockLine {
  itemType: InventoryItemType;
  itemId: string;
  quantity: number;
}

export interface StockContext {
  actorId?: string;
  orderId?: Types.ObjectId;
  notes: string;
}

interface StockSnapshot {
  name: string;
  stock: number;
}

export interface StockShortage {
  itemType: InventoryItemType;
  itemId: string;
  name: string;
  required: number;
  available: number;
}

async function readStock(line: StockLine): Promise<StockSnapshot | null> {
  if (line.itemType === InventoryItemType.FABRIC) {
    const fabric = await Fabric.findById(line.itemId);
    return fabric ? { name: `${fabric.name} (${fabric.color})`, stock: fabric.stockMeters } : null;
  }
  const accessory = await Accessory.findById(line.itemId);
  return accessory ? { name: accessory.name, stock: accessory.stockQuantity } : null;
}

export type StockField = 'stockMeters' | 'stockQuantity';

/**
 * Update pipeline that adds `delta` to a stock field and rounds the result to
 * two decimals, so repeated fractional moves do not drift.
 */
export function roundedStockChange(field: StockField, delta: number) {
  return [{ $set: { [field]: { $round: [{ $add: [`$${field}`, roundMoney(delta)] }, 2] } } }];
}

/** Conditional decrement; resolves to the pre-update stock, or null when short. */
async function decrement(line: StockLine): Promise<number | null> {
  const quantity = roundMoney(line.quantity);
  if (line.itemType === InventoryItemType.FABRIC) {
    const before = await Fabric.findOneAndUpdate(
      { _id: line.itemId, stockMeters: { $gte: quantity } },
      roundedStockChange('stockMeters', -quantity),
    );
    return before ? before.stockMeters : null;
  }
  const before = await Accessory.findOneAndUpdate(
    { _id: line.itemId, stockQuantity: { $gte: quantity } },
    roundedStockChange('stockQuantity', -quantity),
  );
  return before ? before.stockQuantity : null;
}

async function increment(line: StockLine): Promise<number | null> {
  if (line.itemType === InventoryItemType.FABRIC) {
    const before = await Fabric.findOneAndUpdate({ _id: line.itemId }, roundedStockChange('stockMeters', line.quantity));
    return before ? before.stockMeters : null;
  }
  const before = await Accessory.findOneAndUpdate(
    { _id: line.itemId },
    roundedStockChange('stockQuantity', line.quantity),
  );
  return before ? before.stockQuantity : null;
}

export function shortageMessage(shortage: StockShortage): string {
  if (shortage.itemType === InventoryItemType.FABRIC) {
    return `Insufficient fabric stock. Need ${shortage.required}m, available ${shortage.available}m.`;
  }
  return `Insufficient ${shortage.name} stock. Need ${shortage.required}, available ${shortage.available}.`;
}

function insufficientStock(shortage: StockShortage): AppError {
  return AppError.conflict(shortageMessage(shortage), ErrorCode.INSUFFICIENT_STOCK, { ...shortage });
}

/**
 * Report every line that current stock cannot cover. Missing items are a 404.
 */
export async function findShortages(lines: StockLine[]): Promise<StockShortage[]> {
  const shortages: StockShortage[] = [];
  for (const line of lines) {
    const snapshot = await readStock(line);
    if (!snapshot) {
      throw AppError.notFound(`${line.itemType === InventoryItemType.FABRIC ? 'Fabric' : 'Accessory'} not found`);
    }
    if (snapshot.stock < line.quantity) {
      shortages.push({
        itemType: line.itemType,
        itemId: line.itemId,
        name: snapshot.name,
        required: line.quantity,
        available: snapshot.stock,
      });
    }
  }
  return shortages;
}

export async function assertAvailable(lines: StockLine[]): Promise<void> {
  const [first] = await findShortages(lines);
  if (first) throw insufficientStock(first);
}

function logEntry(line: StockLine, action: InventoryAction, previousStock: number, context: StockContext) {
  const quantity = roundMoney(line.quantity);
  const newStock = action === InventoryAction.DEDUCT ? previousStock - quantity : previousStock + quantity;
  return {
    itemType: line.itemType,
    fabricId: line.itemType === InventoryItemType.FABRIC ? line.itemId : undefined,
    accessoryId: line.itemType === InventoryItemType.ACCESSORY ? line.itemId : undefined,
    action,
    quantity,
    previousStock,
    newStock: roundMoney(newStock),
    orderId: context.orderId,
    notes: context.notes,
    createdBy: context.actorId,
  };
}

/**
 * Deduct every line or none. Each line is a single conditional update, so stock
 * never goes negative under concurrent orders; lines already taken are put back
 * when a later one is short.
 */
export async function deductStock(lines: StockLine[], context: StockContext): Promise<void> {
  const applied: { line: StockLine; previousStock: number }[] = [];

  for (const line of lines.filter((l) => l.quantity > 0)) {
    const previousStock = await decrement(line);
    if (previousStock === null) {
      await rollback(applied.map((a) => a.line));
      const snapshot = await readStock(line);
      if (!snapshot) {
        throw AppError.notFound(`${line.itemType === InventoryItemType.FABRIC ? 'Fabric' : 'Accessory'} not found`);
      }
      throw insufficientStock({
        itemType: line.itemType,
        itemId: line.itemId,
        name: snapshot.name,
        required: line.quantity,
        available: snapshot.stock,
      });
    }
    applied.push({ line, previousStock });
  }

  if (applied.length > 0) {
    await InventoryLog.insertMany(
      applied.map((a) => logEntry(a.line, InventoryAction.DEDUCT, a.previousStock, context)),
    );
  }
}

async function rollback(lines: StockLine[]): Promise<void> {
  for (const line of lines) {
    const previous = await increment(line);
    if (previous === null) {
      logger.error({ itemType: line.itemType, itemId: line.itemId }, 'Stock rollback target missing');
    }
  }
}

/**
 * Return materials to stock (order cancelled or edited) and log each as an addition.
 */
export async function restoreStock(lines: StockLine[], context: StockContext): Promise<void> {
  const entries: ReturnType<typeof logEntry>[] = [];
  for (const line of lines.filter((l) => l.quantity > 0)) {
    const previousStock = await increment(line);
    if (previousStock === null) {
      logger.warn({ itemType: line.itemType, itemId: line.itemId }, 'Cannot restore stock for a deleted item');
      continue;
    }
    entries.push(logEntry(line, InventoryAction.ADD, previousStock, context));
  }
  if (entries.length > 0) {
    await InventoryLog.insertMany(entries);
  }
}

export function orderStockLines(order: {
  fabricId: { toString(): string };
  fabricMetersUsed: number;
  accessories: { accessoryId: { toString(): string }; quantityUsed: number }[];
}): StockLine[] {
  return [
    { itemType: InventoryItemType.FABRIC, itemId: order.fabricId.toString(), quantity: order.fabricMetersUsed },
    ...order.accessories.map((a) => ({
      itemType: InventoryItemType.ACCESSORY,
      itemId: a.accessoryId.toString(),
      quantity: a.quantityUsed,
    })),
  ];
}
