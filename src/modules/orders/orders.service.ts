import {
  AuditLog,
  Customer,
  Fabric,
  GarmentType,
  Order,
  Payment,
  TailoringTask,
  type IGarmentType,
  type IOrder,
} from '../../models/index.js';
import { env } from '../../config/env.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import {
  AuditAction,
  InventoryItemType,
  LOCKED_ORDER_STATUSES,
  NotificationPriority,
  NotificationType,
  OrderStatus,
  PaymentStatus,
  TaskStatus,
} from '../../utils/constants.js';
import { escapeRegex, generateDocumentNumber, paginate, paginationMeta, roundMoney } from '../../utils/helpers.js';
import { logger } from '../../utils/logger.js';
import { orderStateMachine } from '../../utils/stateMachine.js';
import { createCustomer } from '../customers/customers.service.js';
import { unknownMeasurements } from '../garments/garments.measurements.js';
import { notifyLowStock } from '../inventory/inventory.service.js';
import {
  assertAvailable,
  deductStock,
  orderStockLines,
  restoreStock,
  type StockLine,
} from '../inventory/stock.service.js';
import { createAndSendNotification } from '../notifications/socket.service.js';
import { getPaymentSummary } from '../payments/payments.service.js';
import { createTaskForOrder, pickTailor, syncTaskCommission } from '../tasks/tasks.service.js';
import {
  computeMaterialRequirements,
  computeTotalPrice,
  resolveInitialPayment,
  type MaterialRequirements,
} from './orders.pricing.js';
import type { CreateOrderInput, ListOrdersQuery, UpdateOrderInput } from './orders.validation.js';
import type { Types } from 'mongoose';

function materialLines(fabricId: Types.ObjectId | string, materials: MaterialRequirements): StockLine[] {
  return [
    { itemType: InventoryItemType.FABRIC, itemId: fabricId.toString(), quantity: materials.fabricMeters },
    ...materials.accessories.map((a) => ({
      itemType: InventoryItemType.ACCESSORY,
      itemId: a.accessoryId,
      quantity: a.quantity,
    })),
  ];
}

function assertMeasurements(measurements: Record<string, number>, garment: IGarmentType) {
  const unknown = unknownMeasurements(measurements, garment.category);
  if (unknown.length > 0) {
    throw AppError.badRequest(`Measurements not used for ${garment.name}: ${unknown.join(', ')}`, ErrorCode.VALIDATION_ERROR, {
      unknown,
    });
  }
}

async function loadGarmentAndFabric(garmentTypeId: Types.ObjectId | string, fabricId: Types.ObjectId | string) {
  const [garment, fabric] = await Promise.all([GarmentType.findById(garmentTypeId), Fabric.findById(fabricId)]);
  if (!garment || !fabric) {
    throw AppError.badRequest('Invalid garment type or fabric selection.');
  }
  return { garment, fabric };
}

// ── Intake ──

/** Undo a half-taken order: materials back to stock, dependents and the order removed. */
async function discardOrder(order: IOrder, lines: StockLine[], actorId: string) {
  await restoreStock(lines, {
    actorId,
    orderId: order._id,
    notes: `Order ${order.orderNumber} not completed - materials restored`,
  });
  await Promise.all([Payment.deleteMany({ orderId: order._id }), TailoringTask.deleteMany({ orderId: order._id })]);
  await order.deleteOne();
}

async function resolveCustomer(input: CreateOrderInput, actorId: string, ip?: string, ua?: string) {
  if (input.newCustomer) {
    return createCustomer(input.newCustomer, actorId, ip, ua);
  }
  const customer = input.customerId ? await Customer.findById(input.customerId) : null;
  if (!customer) throw AppError.badRequest('Please select or create a customer.');
  return customer;
}

/**
 * Take an order in one step: check and deduct materials, record the initial
 * payment, and hand the work to a tailor.
 */
export async function createOrder(input: CreateOrderInput, actorId: string, ip?: string, ua?: string) {
  const { garment, fabric } = await loadGarmentAndFabric(input.garmentTypeId, input.fabricId);
  assertMeasurements(input.measurements, garment);

  const materials = computeMaterialRequirements(garment, input.quantity);
  const lines = materialLines(fabric._id, materials);
  await assertAvailable(lines);

  const totalPrice = input.totalPrice ?? computeTotalPrice(garment.basePrice, input.quantity);
  const initial = resolveInitialPayment({
    totalPrice,
    option: input.paymentOption,
    depositPercentage: env.DEPOSIT_PERCENTAGE,
    amount: input.initialPayment,
  });

  const customer = await resolveCustomer(input, actorId, ip, ua);

  const order = await Order.create({
    orderNumber: generateDocumentNumber('ORD'),
    customerId: customer._id,
    garmentTypeId: garment._id,
    fabricId: fabric._id,
    quantity: input.quantity,
    fabricMetersUsed: materials.fabricMeters,
    accessories: materials.accessories.map((a) => ({ accessoryId: a.accessoryId, quantityUsed: a.quantity })),
    measurements: input.measurements,
    specialInstructions: input.specialInstructions,
    totalPrice,
    depositAmount: initial.depositAmount,
    balanceAmount: initial.balanceAmount,
    dueDate: input.dueDate,
    createdBy: actorId,
  });

  try {
    await deductStock(lines, { actorId, orderId: order._id, notes: `Order ${order.orderNumber}` });
  } catch (error) {
    // Stock ran out between the check and the deduction
    await order.deleteOne();
    throw error;
  }

  const settle = async () => {
    const payment = await Payment.create({
      paymentNumber: generateDocumentNumber('PAY'),
      orderId: order._id,
      amount: initial.amount,
      paymentType: initial.paymentType,
      paymentMethod: input.paymentMethod,
      status: PaymentStatus.COMPLETED,
      receivedBy: actorId,
    });
    const tailorId = await pickTailor(garment);
    const task = tailorId ? await createTaskForOrder(order, tailorId, actorId) : null;
    return { payment, task };
  };

  const { payment, task } = await settle().catch(async (error: unknown) => {
    await discardOrder(order, lines, actorId).catch((rollbackError: unknown) => {
      logger.error({ orderNumber: order.orderNumber, err: rollbackError }, 'Could not discard a failed order');
    });
    throw error;
  });
  if (!task) {
    logger.warn({ orderNumber: order.orderNumber }, 'No active tailor to assign');
  }

  await AuditLog.create({
    action: AuditAction.ORDER_CREATED,
    actorId,
    targetType: 'order',
    targetId: order._id,
    details: {
      orderNumber: order.orderNumber,
      customer: customer.name,
      garment: garment.name,
      quantity: order.quantity,
      totalPrice,
      initialPayment: initial.amount,
      tailorId: task?.tailorId,
    },
    ipAddress: ip,
    userAgent: ua,
  });

  await notifyLowStock(lines);

  const { summary } = await getPaymentSummary(order);
  return { order, payment, task, paymentSummary: summary };
}

// ── Queries ──

export async function listOrders(query: ListOrdersQuery) {
  const filter: Record<string, unknown> = {};
  if (query.status) filter.status = query.status;
  if (query.customerId) filter.customerId = query.customerId;

  if (query.search) {
    const pattern = { $regex: escapeRegex(query.search), $options: 'i' };
    const customers = await Customer.find({ name: pattern }).select('_id');
    filter.$or = [{ orderNumber: pattern }, { customerId: { $in: customers.map((c) => c._id) } }];
  }

  const { skip, limit } = paginate(query.page, query.limit);
  const [items, total] = await Promise.all([
    Order.find(filter)
      .populate('customerId', 'name contactNumber')
      .populate('garmentTypeId', 'name')
      .populate('fabricId', 'name color')
      .sort({ createdAt: -1 })
      .skip(skip)
      .limit(limit),
    Order.countDocuments(filter),
  ]);

  return { items, ...paginationMeta(query.page, query.limit, total) };
}

export async function getOrder(orderId: string) {
  const order = await Order.findById(orderId)
    .populate('customerId')
    .populate('garmentTypeId')
    .populate('fabricId')
    .populate('accessories.accessoryId', 'name unit')
    .populate('createdBy', 'username firstName lastName');
  if (!order) throw AppError.notFound('Order not found');

  const [{ payments, summary }, task] = await Promise.all([
    getPaymentSummary(order),
    TailoringTask.findOne({ orderId: order._id }).populate('tailorId', 'username firstName lastName'),
  ]);

  return { order, payments, paymentSummary: summary, task };
}

// ── Edit ──

export async function updateOrder(
  orderId: string,
  input: UpdateOrderInput,
  actorId: string,
  ip?: string,
  ua?: string,
) {
  const order = await Order.findById(orderId);
  if (!order) throw AppError.notFound('Order not found');

  if (LOCKED_ORDER_STATUSES.includes(order.status)) {
    throw AppError.badRequest(`Cannot edit orders with status: ${order.status}`, ErrorCode.ORDER_LOCKED);
  }

  const garmentTypeId = input.garmentTypeId ?? order.garmentTypeId.toString();
  const fabricId = input.fabricId ?? order.fabricId.toString();
  const quantity = input.quantity ?? order.quantity;
  const materialsChanged =
    garmentTypeId !== order.garmentTypeId.toString() ||
    fabricId !== order.fabricId.toString() ||
    quantity !== order.quantity;

  const { garment, fabric } = await loadGarmentAndFabric(garmentTypeId, fabricId);
  // A new garment type must also fit the measurements already on file
  const measurements = input.measurements ?? (garment._id.equals(order.garmentTypeId) ? undefined : order.measurements);
  if (measurements) assertMeasurements(measurements, garment);

  if (input.customerId && !(await Customer.exists({ _id: input.customerId }))) {
    throw AppError.badRequest('Customer not found');
  }

  const { summary } = await getPaymentSummary(order);
  if (input.totalPrice !== undefined && input.totalPrice < summary.totalPaid) {
    throw AppError.badRequest('Total price cannot be less than the amount already paid', ErrorCode.VALIDATION_ERROR, {
      totalPaid: summary.totalPaid,
    });
  }

  let newLines: StockLine[] = [];
  if (materialsChanged) {
    const materials = computeMaterialRequirements(garment, quantity);
    const oldLines = orderStockLines(order);
    newLines = materialLines(fabric._id, materials);

    await restoreStock(oldLines, {
      actorId,
      orderId: order._id,
      notes: `Order ${order.orderNumber} edited - restoring previous materials`,
    });
    try {
      await deductStock(newLines, { actorId, orderId: order._id, notes: `Order ${order.orderNumber} edited` });
    } catch (error) {
      await deductStock(oldLines, {
        actorId,
        orderId: order._id,
        notes: `Order ${order.orderNumber} edit rejected - materials re-deducted`,
      }).catch((revertError: unknown) => {
        logger.error(
          { orderNumber: order.orderNumber, err: revertError },
          'Could not re-deduct materials after a rejected order edit',
        );
      });
      throw error;
    }

    order.garmentTypeId = garment._id;
    order.fabricId = fabric._id;
    order.quantity = quantity;
    order.fabricMetersUsed = materials.fabricMeters;
    order.set(
      'accessories',
      materials.accessories.map((a) => ({ accessoryId: a.accessoryId, quantityUsed: a.quantity })),
    );
  }

  if (input.customerId) order.set('customerId', input.customerId);
  if (input.measurements) order.measurements = input.measurements;
  if (input.specialInstructions !== undefined) order.specialInstructions = input.specialInstructions;
  if (input.dueDate !== undefined) order.dueDate = input.dueDate ?? undefined;
  if (input.totalPrice !== undefined) {
    order.totalPrice = input.totalPrice;
    order.balanceAmount = roundMoney(input.totalPrice - summary.totalPaid);
  }
  await order.save();

  if (input.totalPrice !== undefined) {
    await syncTaskCommission(order._id, order.totalPrice);
  }

  await AuditLog.create({
    action: AuditAction.ORDER_UPDATED,
    actorId,
    targetType: 'order',
    targetId: order._id,
    details: { orderNumber: order.orderNumber, changes: Object.keys(input), materialsChanged },
    ipAddress: ip,
    userAgent: ua,
  });

  if (newLines.length > 0) await notifyLowStock(newLines);

  return order;
}

// ── Cancel ──

export async function cancelOrder(orderId: string, actorId: string, ip?: string, ua?: string) {
  const order = await Order.findById(orderId);
  if (!order) throw AppError.notFound('Order not found');

  orderStateMachine.assertTransition(order.status, OrderStatus.CANCELLED);
  order.status = OrderStatus.CANCELLED;
  await order.save();

  await restoreStock(orderStockLines(order), {
    actorId,
    orderId: order._id,
    notes: `Order ${order.orderNumber} cancelled`,
  });

  await AuditLog.create({
    action: AuditAction.ORDER_CANCELLED,
    actorId,
    targetType: 'order',
    targetId: order._id,
    details: { orderNumber: order.orderNumber },
    ipAddress: ip,
    userAgent: ua,
  });

  const task = await TailoringTask.findOne({ orderId: order._id, status: { $ne: TaskStatus.APPROVED } });
  if (task) {
    await createAndSendNotification({
      recipientId: task.tailorId,
      senderId: actorId,
      type: NotificationType.GENERAL,
      title: 'Order Cancelled',
      message: `Order ${order.orderNumber} has been cancelled. Please stop work on this task.`,
      priority: NotificationPriority.HIGH,
      orderId: order._id,
      taskId: task._id,
      actionUrl: `/tasks/${task._id.toString()}`,
    });
  }

  return order;
}
