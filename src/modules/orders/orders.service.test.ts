import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Types } from 'mongoose';

const mocks = vi.hoisted(() => ({
  garmentFindById: vi.fn(),
  fabricFindById: vi.fn(),
  customerFindById: vi.fn(),
  orderCreate: vi.fn(),
  orderFindById: vi.fn(),
  paymentCreate: vi.fn(),
  paymentDeleteMany: vi.fn(),
  taskFindOne: vi.fn(),
  taskDeleteMany: vi.fn(),
  auditCreate: vi.fn(),
  assertAvailable: vi.fn(),
  deductStock: vi.fn(),
  restoreStock: vi.fn(),
  orderStockLines: vi.fn(),
  notify: vi.fn(),
  notifyLowStock: vi.fn(),
  getPaymentSummary: vi.fn(),
  pickTailor: vi.fn(),
  createTaskForOrder: vi.fn(),
}));

vi.mock('../../config/env.js', () => ({ env: { DEPOSIT_PERCENTAGE: 50, DEFAULT_COMMISSION_RATE: 10 } }));
vi.mock('../../utils/logger.js', () => ({
  logger: { warn: vi.fn(), error: vi.fn(), info: vi.fn(), debug: vi.fn() },
  smsLogger: { warn: vi.fn(), error: vi.fn(), info: vi.fn(), debug: vi.fn() },
  socketLogger: { warn: vi.fn(), error: vi.fn(), info: vi.fn(), debug: vi.fn() },
}));
vi.mock('../../models/index.js', () => ({
  GarmentType: { findById: mocks.garmentFindById },
  Fabric: { findById: mocks.fabricFindById },
  Customer: { findById: mocks.customerFindById },
  Order: { create: mocks.orderCreate, findById: mocks.orderFindById },
  Payment: { create: mocks.paymentCreate, deleteMany: mocks.paymentDeleteMany },
  AuditLog: { create: mocks.auditCreate },
  TailoringTask: { findOne: mocks.taskFindOne, deleteMany: mocks.taskDeleteMany },
}));
vi.mock('../customers/customers.service.js', () => ({ createCustomer: vi.fn() }));
vi.mock('../inventory/inventory.service.js', () => ({ notifyLowStock: mocks.notifyLowStock }));
vi.mock('../inventory/stock.service.js', () => ({
  assertAvailable: mocks.assertAvailable,
  deductStock: mocks.deductStock,
  orderStockLines: mocks.orderStockLines,
  restoreStock: mocks.restoreStock,
}));
vi.mock('../notifications/socket.service.js', () => ({ createAndSendNotification: mocks.notify }));
vi.mock('../payments/payments.service.js', () => ({ getPaymentSummary: mocks.getPaymentSummary }));
vi.mock('../tasks/tasks.service.js', () => ({
  pickTailor: mocks.pickTailor,
  createTaskForOrder: mocks.createTaskForOrder,
  syncTaskCommission: vi.fn(),
}));

import { cancelOrder, createOrder, updateOrder } from './orders.service.js';
import type { CreateOrderInput } from './orders.validation.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import { GarmentCategory, OrderStatus, PaymentMethod, PaymentOption } from '../../utils/constants.js';

const actorId = new Types.ObjectId().toString();
const fabricId = new Types.ObjectId();
const tailorId = new Types.ObjectId();

const garment = {
  _id: new Types.ObjectId(),
  name: 'Polo Shirt',
  category: GarmentCategory.UPPER,
  basePrice: 1000,
  estimatedFabricMeters: 2,
  requiredAccessories: [{ accessoryId: 'acc-buttons', quantityRequired: 3 }],
};

function orderInput(overrides: Partial<CreateOrderInput> = {}): CreateOrderInput {
  return {
    customerId: new Types.ObjectId().toString(),
    garmentTypeId: garment._id.toString(),
    fabricId: fabricId.toString(),
    quantity: 2,
    paymentOption: PaymentOption.DEPOSIT,
    paymentMethod: PaymentMethod.CASH,
    measurements: { chest: 40 },
    ...overrides,
  };
}

const trousers = {
  _id: new Types.ObjectId(),
  name: 'Slacks',
  category: GarmentCategory.LOWER,
  basePrice: 900,
  estimatedFabricMeters: 1.5,
  requiredAccessories: [],
};

const fakeOrder = {
  _id: new Types.ObjectId(),
  orderNumber: 'ORD-TEST0001',
  quantity: 2,
  totalPrice: 2000,
  deleteOne: vi.fn(),
};

const createdLines = [
  { itemType: 'fabric', itemId: fabricId.toString(), quantity: 4 },
  { itemType: 'accessory', itemId: 'acc-buttons', quantity: 6 },
];

function storedOrder(status: OrderStatus = OrderStatus.PENDING) {
  return {
    _id: new Types.ObjectId(),
    orderNumber: 'ORD-EDIT0001',
    status,
    garmentTypeId: garment._id,
    fabricId,
    quantity: 2,
    fabricMetersUsed: 4,
    accessories: [{ accessoryId: 'acc-buttons', quantityUsed: 6 }],
    measurements: { chest: 40 },
    totalPrice: 2000,
    set: vi.fn(),
    save: vi.fn(),
  };
}

beforeEach(() => {
  vi.clearAllMocks();
  mocks.garmentFindById.mockImplementation(async (id: string) =>
    trousers._id.equals(id) ? trousers : garment,
  );
  mocks.fabricFindById.mockResolvedValue({ _id: fabricId, name: 'Cotton', color: 'White' });
  mocks.customerFindById.mockResolvedValue({ _id: new Types.ObjectId(), name: 'Ana Cruz' });
  mocks.assertAvailable.mockResolvedValue(undefined);
  mocks.deductStock.mockResolvedValue(undefined);
  mocks.orderCreate.mockResolvedValue(fakeOrder);
  mocks.paymentCreate.mockImplementation(async (fields: Record<string, unknown>) => fields);
  mocks.pickTailor.mockResolvedValue(tailorId);
  mocks.createTaskForOrder.mockResolvedValue({ _id: new Types.ObjectId(), tailorId });
  mocks.orderStockLines.mockReturnValue(createdLines);
  mocks.restoreStock.mockResolvedValue(undefined);
  mocks.paymentDeleteMany.mockResolvedValue({ deletedCount: 1 });
  mocks.taskDeleteMany.mockResolvedValue({ deletedCount: 0 });
  mocks.getPaymentSummary.mockResolvedValue({
    payments: [],
    summary: { totalPaid: 1000, remainingBalance: 1000, paymentStatus: 'partial' },
  });
});

describe('createOrder', () => {
  it('deducts materials, takes the deposit and assigns a tailor', async () => {
    const result = await createOrder(orderInput(), actorId);

    expect(mocks.deductStock).toHaveBeenCalledWith(createdLines, {
      actorId,
      orderId: fakeOrder._id,
      notes: 'Order ORD-TEST0001',
    });
    expect(mocks.orderCreate).toHaveBeenCalledWith(
      expect.objectContaining({ totalPrice: 2000, depositAmount: 1000, balanceAmount: 1000, fabricMetersUsed: 4 }),
    );
    expect(mocks.paymentCreate).toHaveBeenCalledWith(
      expect.objectContaining({ amount: 1000, paymentType: 'deposit', status: 'completed' }),
    );
    expect(mocks.createTaskForOrder).toHaveBeenCalledWith(fakeOrder, tailorId, actorId);
    expect(result.paymentSummary.remainingBalance).toBe(1000);
  });

  it('records a full payment when the customer pays everything up front', async () => {
    await createOrder(orderInput({ paymentOption: PaymentOption.FULL }), actorId);

    expect(mocks.paymentCreate).toHaveBeenCalledWith(expect.objectContaining({ amount: 2000, paymentType: 'full' }));
  });

  it('refuses an initial payment below the deposit before creating anything', async () => {
    await expect(createOrder(orderInput({ initialPayment: 300 }), actorId)).rejects.toMatchObject({
      code: ErrorCode.DEPOSIT_REQUIRED,
      details: { required: 1000, received: 300 },
    });
    expect(mocks.orderCreate).not.toHaveBeenCalled();
    expect(mocks.deductStock).not.toHaveBeenCalled();
  });

  it('removes the order when stock runs out during deduction', async () => {
    mocks.deductStock.mockRejectedValue(
      AppError.conflict('Insufficient fabric stock. Need 4m, available 3m.', ErrorCode.INSUFFICIENT_STOCK),
    );

    await expect(createOrder(orderInput(), actorId)).rejects.toMatchObject({ code: ErrorCode.INSUFFICIENT_STOCK });
    expect(fakeOrder.deleteOne).toHaveBeenCalledTimes(1);
    expect(mocks.paymentCreate).not.toHaveBeenCalled();
  });

  it('refuses an order with a zero total before creating anything', async () => {
    await expect(createOrder(orderInput({ totalPrice: 0 }), actorId)).rejects.toMatchObject({
      code: ErrorCode.VALIDATION_ERROR,
      details: { totalPrice: 0 },
    });
    expect(mocks.orderCreate).not.toHaveBeenCalled();
    expect(mocks.deductStock).not.toHaveBeenCalled();
  });

  it('restores stock and removes the order when the initial payment cannot be saved', async () => {
    const failure = new Error('payment validation failed');
    mocks.paymentCreate.mockRejectedValue(failure);

    await expect(createOrder(orderInput(), actorId)).rejects.toBe(failure);

    expect(mocks.restoreStock).toHaveBeenCalledWith(createdLines, {
      actorId,
      orderId: fakeOrder._id,
      notes: 'Order ORD-TEST0001 not completed - materials restored',
    });
    expect(mocks.paymentDeleteMany).toHaveBeenCalledWith({ orderId: fakeOrder._id });
    expect(mocks.taskDeleteMany).toHaveBeenCalledWith({ orderId: fakeOrder._id });
    expect(fakeOrder.deleteOne).toHaveBeenCalledTimes(1);
    expect(mocks.auditCreate).not.toHaveBeenCalled();
  });

  it('undoes the order when tailor assignment fails', async () => {
    mocks.createTaskForOrder.mockRejectedValue(new Error('task insert failed'));

    await expect(createOrder(orderInput(), actorId)).rejects.toThrow('task insert failed');

    expect(mocks.paymentDeleteMany).toHaveBeenCalledWith({ orderId: fakeOrder._id });
    expect(mocks.restoreStock).toHaveBeenCalledTimes(1);
    expect(fakeOrder.deleteOne).toHaveBeenCalledTimes(1);
  });

  it('rejects measurements the garment does not use', async () => {
    await expect(createOrder(orderInput({ measurements: { inseam: 30 } }), actorId)).rejects.toMatchObject({
      code: ErrorCode.VALIDATION_ERROR,
      details: { unknown: ['inseam'] },
    });
  });

  it('still takes the order when no tailor is available', async () => {
    mocks.pickTailor.mockResolvedValue(null);

    const result = await createOrder(orderInput(), actorId);

    expect(result.task).toBeNull();
    expect(mocks.createTaskForOrder).not.toHaveBeenCalled();
  });
});

describe('updateOrder', () => {
  it('returns the old materials and deducts the new ones when the quantity changes', async () => {
    const order = storedOrder();
    mocks.orderFindById.mockResolvedValue(order);

    await updateOrder(order._id.toString(), { quantity: 3 }, actorId);

    expect(mocks.restoreStock).toHaveBeenCalledWith(createdLines, {
      actorId,
      orderId: order._id,
      notes: 'Order ORD-EDIT0001 edited - restoring previous materials',
    });
    expect(mocks.deductStock).toHaveBeenCalledWith(
      [
        { itemType: 'fabric', itemId: fabricId.toString(), quantity: 6 },
        { itemType: 'accessory', itemId: 'acc-buttons', quantity: 9 },
      ],
      { actorId, orderId: order._id, notes: 'Order ORD-EDIT0001 edited' },
    );
    expect(order.quantity).toBe(3);
    expect(order.fabricMetersUsed).toBe(6);
    expect(order.set).toHaveBeenCalledWith('accessories', [{ accessoryId: 'acc-buttons', quantityUsed: 9 }]);
    expect(order.save).toHaveBeenCalledTimes(1);
  });

  it('takes the previous materials back out when the new ones are short', async () => {
    const order = storedOrder();
    mocks.orderFindById.mockResolvedValue(order);
    mocks.deductStock
      .mockRejectedValueOnce(AppError.conflict('Insufficient fabric stock.', ErrorCode.INSUFFICIENT_STOCK))
      .mockResolvedValueOnce(undefined);

    await expect(updateOrder(order._id.toString(), { quantity: 5 }, actorId)).rejects.toMatchObject({
      code: ErrorCode.INSUFFICIENT_STOCK,
    });

    expect(mocks.deductStock).toHaveBeenCalledTimes(2);
    expect(mocks.deductStock).toHaveBeenLastCalledWith(createdLines, {
      actorId,
      orderId: order._id,
      notes: 'Order ORD-EDIT0001 edit rejected - materials re-deducted',
    });
    expect(order.quantity).toBe(2);
    expect(order.save).not.toHaveBeenCalled();
  });

  it('refuses edits to a completed order', async () => {
    const order = storedOrder(OrderStatus.COMPLETED);
    mocks.orderFindById.mockResolvedValue(order);

    await expect(updateOrder(order._id.toString(), { quantity: 3 }, actorId)).rejects.toMatchObject({
      code: ErrorCode.ORDER_LOCKED,
      message: 'Cannot edit orders with status: completed',
    });
    expect(mocks.restoreStock).not.toHaveBeenCalled();
  });

  it('checks the stored measurements against a new garment type', async () => {
    const order = storedOrder();
    mocks.orderFindById.mockResolvedValue(order);

    await expect(
      updateOrder(order._id.toString(), { garmentTypeId: trousers._id.toString() }, actorId),
    ).rejects.toMatchObject({
      code: ErrorCode.VALIDATION_ERROR,
      details: { unknown: ['chest'] },
    });
    expect(mocks.restoreStock).not.toHaveBeenCalled();
  });
});

describe('cancelOrder', () => {
  it('returns materials to stock and tells the tailor to stop', async () => {
    const order = storedOrder(OrderStatus.IN_PROGRESS);
    const task = { _id: new Types.ObjectId(), tailorId };
    mocks.orderFindById.mockResolvedValue(order);
    mocks.taskFindOne.mockResolvedValue(task);

    await cancelOrder(order._id.toString(), actorId);

    expect(order.status).toBe(OrderStatus.CANCELLED);
    expect(order.save).toHaveBeenCalledTimes(1);
    expect(mocks.restoreStock).toHaveBeenCalledWith(createdLines, {
      actorId,
      orderId: order._id,
      notes: 'Order ORD-EDIT0001 cancelled',
    });
    expect(mocks.notify).toHaveBeenCalledWith(
      expect.objectContaining({ recipientId: tailorId, title: 'Order Cancelled', taskId: task._id }),
    );
  });

  it('refuses to cancel a delivered order', async () => {
    const order = storedOrder(OrderStatus.DELIVERED);
    mocks.orderFindById.mockResolvedValue(order);

    await expect(cancelOrder(order._id.toString(), actorId)).rejects.toMatchObject({
      code: ErrorCode.INVALID_TRANSITION,
    });
    expect(mocks.restoreStock).not.toHaveBeenCalled();
  });
});
