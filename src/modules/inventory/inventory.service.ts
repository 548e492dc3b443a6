import { Accessory, AuditLog, Fabric, GarmentType, InventoryLog, Order } from '../../models/index.js';
import { env } from '../../config/env.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import {
  AuditAction,
  InventoryAction,
  InventoryItemType,
  NotificationPriority,
  NotificationType,
  Role,
} from '../../utils/constants.js';
import { paginate, paginationMeta, roundMoney } from '../../utils/helpers.js';
import { notifyRole } from '../notifications/socket.service.js';
import { computeMaterialRequirements } from '../orders/orders.pricing.js';
import { roundedStockChange, type StockLine } from './stock.service.js';
import type {
  AddStockInput,
  CreateAccessoryInput,
  CreateFabricInput,
  InventoryLogQuery,
  StockCheckQuery,
  UpdateAccessoryInput,
  UpdateFabricInput,
} from './inventory.validation.js';

// ── Fabrics ──

export async function listFabrics() {
  return Fabric.find().sort({ name: 1, color: 1 });
}

export async function getFabric(fabricId: string) {
  const fabric = await Fabric.findById(fabricId);
  if (!fabric) throw AppError.notFound('Fabric not found');
  return fabric;
}

export async function createFabric(input: CreateFabricInput, actorId: string, ip?: string, ua?: string) {
  const fabric = await Fabric.create(input);

  if (fabric.stockMeters > 0) {
    await InventoryLog.create({
      itemType: InventoryItemType.FABRIC,
      fabricId: fabric._id,
      action: InventoryAction.ADD,
      quantity: fabric.stockMeters,
      previousStock: 0,
      newStock: fabric.stockMeters,
      notes: 'Initial stock',
      createdBy: actorId,
    });
  }

  await AuditLog.create({
    action: AuditAction.FABRIC_CREATED,
    actorId,
    targetType: 'fabric',
    targetId: fabric._id,
    details: { name: fabric.name, color: fabric.color, stockMeters: fabric.stockMeters },
    ipAddress: ip,
    userAgent: ua,
  });

  return fabric;
}

export async function updateFabric(
  fabricId: string,
  input: UpdateFabricInput,
  actorId: string,
  ip?: string,
  ua?: string,
) {
  const fabric = await getFabric(fabricId);
  const oldStock = fabric.stockMeters;

  fabric.set(input);
  await fabric.save();

  if (oldStock !== fabric.stockMeters) {
    await InventoryLog.create({
      itemType: InventoryItemType.FABRIC,
      fabricId: fabric._id,
      action: InventoryAction.ADJUST,
      quantity: roundMoney(Math.abs(fabric.stockMeters - oldStock)),
      previousStock: oldStock,
      newStock: fabric.stockMeters,
      notes: 'Manual adjustment',
      createdBy: actorId,
    });
  }

  await AuditLog.create({
    action: AuditAction.FABRIC_UPDATED,
    actorId,
    targetType: 'fabric',
    targetId: fabric._id,
    details: { changes: Object.keys(input) },
    ipAddress: ip,
    userAgent: ua,
  });

  return fabric;
}

export async function addFabricStock(fabricId: string, input: AddStockInput, actorId: string) {
  const before = await Fabric.findOneAndUpdate({ _id: fabricId }, roundedStockChange('stockMeters', input.quantity));
  if (!before) throw AppError.notFound('Fabric not found');

  const newStock = roundMoney(before.stockMeters + input.quantity);
  await InventoryLog.create({
    itemType: InventoryItemType.FABRIC,
    fabricId: before._id,
    action: InventoryAction.ADD,
    quantity: input.quantity,
    previousStock: before.stockMeters,
    newStock,
    notes: input.notes || 'Stock added',
    createdBy: actorId,
  });

  await AuditLog.create({
    action: AuditAction.STOCK_ADDED,
    actorId,
    targetType: 'fabric',
    targetId: before._id,
    details: { quantity: input.quantity, newStock },
  });

  return { id: before._id, name: before.name, previousStock: before.stockMeters, newStock };
}

export async function deleteFabric(fabricId: string, actorId: string, ip?: string, ua?: string) {
  const fabric = await getFabric(fabricId);

  const orderCount = await Order.countDocuments({ fabricId: fabric._id });
  if (orderCount > 0) {
    throw AppError.conflict('Cannot delete a fabric used by orders', ErrorCode.HAS_DEPENDENTS, { orderCount });
  }

  await fabric.deleteOne();

  await AuditLog.create({
    action: AuditAction.FABRIC_DELETED,
    actorId,
    targetType: 'fabric',
    targetId: fabric._id,
    details: { name: fabric.name, color: fabric.color },
    ipAddress: ip,
    userAgent: ua,
  });

  return { message: 'Fabric deleted' };
}

// ── Accessories ──

export async function listAccessories() {
  return Accessory.find().sort({ name: 1 });
}

export async function getAccessory(accessoryId: string) {
  const accessory = await Accessory.findById(accessoryId);
  if (!accessory) throw AppError.notFound('Accessory not found');
  return accessory;
}

export async function createAccessory(input: CreateAccessoryInput, actorId: string, ip?: string, ua?: string) {
  const accessory = await Accessory.create(input);

  if (accessory.stockQuantity > 0) {
    await InventoryLog.create({
      itemType: InventoryItemType.ACCESSORY,
      accessoryId: accessory._id,
      action: InventoryAction.ADD,
      quantity: accessory.stockQuantity,
      previousStock: 0,
      newStock: accessory.stockQuantity,
      notes: 'Initial stock',
      createdBy: actorId,
    });
  }

  await AuditLog.create({
    action: AuditAction.ACCESSORY_CREATED,
    actorId,
    targetType: 'accessory',
    targetId: accessory._id,
    details: { name: accessory.name, stockQuantity: accessory.stockQuantity },
    ipAddress: ip,
    userAgent: ua,
  });

  return accessory;
}

export async function updateAccessory(
  accessoryId: string,
  input: UpdateAccessoryInput,
  actorId: string,
  ip?: string,
  ua?: string,
) {
  const accessory = await getAccessory(accessoryId);
  const oldStock = accessory.stockQuantity;

  accessory.set(input);
  await accessory.save();

  if (oldStock !== accessory.stockQuantity) {
    await InventoryLog.create({
      itemType: InventoryItemType.ACCESSORY,
      accessoryId: accessory._id,
      action: InventoryAction.ADJUST,
      quantity: roundMoney(Math.abs(accessory.stockQuantity - oldStock)),
      previousStock: oldStock,
      newStock: accessory.stockQuantity,
      notes: 'Manual adjustment',
      createdBy: actorId,
    });
  }

  await AuditLog.create({
    action: AuditAction.ACCESSORY_UPDATED,
    actorId,
    targetType: 'accessory',
    targetId: accessory._id,
    details: { changes: Object.keys(input) },
    ipAddress: ip,
    userAgent: ua,
  });

  return accessory;
}

export async function addAccessoryStock(accessoryId: string, input: AddStockInput, actorId: string) {
  const before = await Accessory.findOneAndUpdate(
    { _id: accessoryId },
    roundedStockChange('stockQuantity', input.quantity),
  );
  if (!before) throw AppError.notFound('Accessory not found');

  const newStock = roundMoney(before.stockQuantity + input.quantity);
  await InventoryLog.create({
    itemType: InventoryItemType.ACCESSORY,
    accessoryId: before._id,
    action: InventoryAction.ADD,
    quantity: input.quantity,
    previousStock: before.stockQuantity,
    newStock,
    notes: input.notes || 'Stock added',
    createdBy: actorId,
  });

  await AuditLog.create({
    action: AuditAction.STOCK_ADDED,
    actorId,
    targetType: 'accessory',
    targetId: before._id,
    details: { quantity: input.quantity, newStock },
  });

  return { id: before._id, name: before.name, previousStock: before.stockQuantity, newStock };
}

export async function deleteAccessory(accessoryId: string, actorId: string, ip?: string, ua?: string) {
  const accessory = await getAccessory(accessoryId);

  const [orderCount, garmentCount] = await Promise.all([
    Order.countDocuments({ 'accessories.accessoryId': accessory._id }),
    GarmentType.countDocuments({ 'requiredAccessories.accessoryId': accessory._id }),
  ]);
  if (orderCount > 0 || garmentCount > 0) {
    throw AppError.conflict('Cannot delete an accessory used by orders or garment types', ErrorCode.HAS_DEPENDENTS, {
      orderCount,
      garmentCount,
    });
  }

  await accessory.deleteOne();

  await AuditLog.create({
    action: AuditAction.ACCESSORY_DELETED,
    actorId,
    targetType: 'accessory',
    targetId: accessory._id,
    details: { name: accessory.name },
    ipAddress: ip,
    userAgent: ua,
  });

  return { message: 'Accessory deleted' };
}

// ── Overview ──

export async function getLowStock() {
  const [fabrics, accessories] = await Promise.all([
    Fabric.find({ stockMeters: { $lt: env.LOW_STOCK_FABRIC_METERS } }).sort({ stockMeters: 1 }),
    Accessory.find({ stockQuantity: { $lt: env.LOW_STOCK_ACCESSORY_QUANTITY } }).sort({ stockQuantity: 1 }),
  ]);
  return { fabrics, accessories };
}

export async function getInventoryDashboard() {
  const [fabrics, accessories, lowStock, recentLogs] = await Promise.all([
    listFabrics(),
    listAccessories(),
    getLowStock(),
    InventoryLog.find()
      .populate('fabricId', 'name color')
      .populate('accessoryId', 'name unit')
      .populate('orderId', 'orderNumber')
      .populate('createdBy', 'username firstName lastName')
      .sort({ createdAt: -1 })
      .limit(20),
  ]);

  return { fabrics, accessories, lowStock, recentLogs };
}

export async function listInventoryLogs(query: InventoryLogQuery) {
  const filter: Record<string, unknown> = {};
  if (query.itemType) filter.itemType = query.itemType;
  if (query.action) filter.action = query.action;
  if (query.orderId) filter.orderId = query.orderId;

  const { skip, limit } = paginate(query.page, query.limit);
  const [items, total] = await Promise.all([
    InventoryLog.find(filter)
      .populate('fabricId', 'name color')
      .populate('accessoryId', 'name unit')
      .populate('orderId', 'orderNumber')
      .populate('createdBy', 'username firstName lastName')
      .sort({ createdAt: -1 })
      .skip(skip)
      .limit(limit),
    InventoryLog.countDocuments(filter),
  ]);

  return { items, ...paginationMeta(query.page, query.limit, total) };
}

/**
 * Fabric needed for `quantity` garments against what is on hand.
 */
export async function checkFabricStock(query: StockCheckQuery) {
  const [fabric, garment] = await Promise.all([
    Fabric.findById(query.fabricId),
    GarmentType.findById(query.garmentTypeId),
  ]);
  if (!fabric || !garment) throw AppError.badRequest('Invalid selection');

  const { fabricMeters: required } = computeMaterialRequirements(garment, query.quantity);
  return {
    required,
    available: fabric.stockMeters,
    sufficient: fabric.stockMeters >= required,
  };
}

/**
 * Warn admins about items a deduction pushed under the low-stock threshold.
 */
export async function notifyLowStock(lines: StockLine[]): Promise<void> {
  const fabricIds = lines.filter((l) => l.itemType === InventoryItemType.FABRIC).map((l) => l.itemId);
  const accessoryIds = lines.filter((l) => l.itemType === InventoryItemType.ACCESSORY).map((l) => l.itemId);

  const [fabrics, accessories] = await Promise.all([
    Fabric.find({ _id: { $in: fabricIds }, stockMeters: { $lt: env.LOW_STOCK_FABRIC_METERS } }),
    Accessory.find({ _id: { $in: accessoryIds }, stockQuantity: { $lt: env.LOW_STOCK_ACCESSORY_QUANTITY } }),
  ]);

  const items = [
    ...fabrics.map((f) => `${f.name} (${f.color}): ${f.stockMeters}m left`),
    ...accessories.map((a) => `${a.name}: ${a.stockQuantity} ${a.unit} left`),
  ];
  if (items.length === 0) return;

  await notifyRole(Role.ADMIN, {
    type: NotificationType.LOW_STOCK,
    title: 'Low Stock Alert',
    message: `Running low on ${items.join(', ')}.`,
    priority: NotificationPriority.HIGH,
    actionUrl: '/inventory',
  });
}
