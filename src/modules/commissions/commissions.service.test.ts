import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Types } from 'mongoose';

const mocks = vi.hoisted(() => ({
  taskFindOneAndUpdate: vi.fn(),
  taskUpdateOne: vi.fn(),
  garmentFindById: vi.fn(),
  customerFindById: vi.fn(),
  commissionCreate: vi.fn(),
  auditCreate: vi.fn(),
  notify: vi.fn(),
  taskContext: vi.fn(),
}));

vi.mock('../../models/index.js', () => ({
  TailoringTask: { findOneAndUpdate: mocks.taskFindOneAndUpdate, updateOne: mocks.taskUpdateOne },
  GarmentType: { findById: mocks.garmentFindById },
  Customer: { findById: mocks.customerFindById },
  TailorCommission: { create: mocks.commissionCreate },
  AuditLog: { create: mocks.auditCreate },
  User: {},
  fullName: vi.fn(),
}));
vi.mock('../notifications/socket.service.js', () => ({ createAndSendNotification: mocks.notify }));
vi.mock('../tasks/tasks.service.js', () => ({ taskContext: mocks.taskContext }));

import { creditCommission } from './commissions.service.js';
import { CommissionStatus, NotificationType } from '../../utils/constants.js';

const actorId = new Types.ObjectId().toString();
const tailorId = new Types.ObjectId();

const order = {
  _id: new Types.ObjectId(),
  orderNumber: 'ORD-COM00001',
  garmentTypeId: new Types.ObjectId(),
  customerId: new Types.ObjectId(),
  totalPrice: 2000,
  quantity: 1,
};

const task = { _id: new Types.ObjectId() };

const claimedTask = {
  _id: task._id,
  orderId: order._id,
  tailorId,
  commissionRate: 10,
  commissionAmount: 200,
};

beforeEach(() => {
  vi.clearAllMocks();
  mocks.taskFindOneAndUpdate.mockResolvedValue(claimedTask);
  mocks.garmentFindById.mockResolvedValue({ name: 'Barong' });
  mocks.customerFindById.mockResolvedValue({ name: 'Ana Cruz' });
  mocks.commissionCreate.mockImplementation(async (fields: Record<string, unknown>) => ({
    _id: new Types.ObjectId(),
    ...fields,
  }));
  mocks.taskContext.mockResolvedValue({
    taskId: task._id,
    orderId: order._id,
    orderNumber: order.orderNumber,
    customerName: 'Ana Cruz',
    garmentName: 'Barong',
    tailorName: 'Mario Santos',
  });
});

describe('creditCommission', () => {
  it('claims the task flag and records the commission', async () => {
    const commission = await creditCommission(task, order, actorId);

    expect(mocks.taskFindOneAndUpdate).toHaveBeenCalledWith(
      { _id: task._id, commissionPaid: false },
      { $set: { commissionPaid: true } },
      { new: true },
    );
    expect(mocks.commissionCreate).toHaveBeenCalledWith(
      expect.objectContaining({
        tailorId,
        taskId: task._id,
        orderId: order._id,
        orderAmount: 2000,
        commissionRate: 10,
        commissionAmount: 200,
        status: CommissionStatus.CREDITED,
        garmentType: 'Barong',
        customerName: 'Ana Cruz',
        quantity: 1,
      }),
    );
    expect(mocks.notify).toHaveBeenCalledWith(
      expect.objectContaining({ recipientId: tailorId, type: NotificationType.COMMISSION_CREDITED }),
    );
    expect(commission?.commissionAmount).toBe(200);
  });

  it('does nothing for a task that was already credited', async () => {
    mocks.taskFindOneAndUpdate.mockResolvedValue(null);

    await expect(creditCommission(task, order, actorId)).resolves.toBeNull();

    expect(mocks.commissionCreate).not.toHaveBeenCalled();
    expect(mocks.notify).not.toHaveBeenCalled();
  });

  it('releases the flag when the commission cannot be stored', async () => {
    const failure = new Error('E11000 duplicate key error collection: tailorcommissions index: taskId_1');
    mocks.commissionCreate.mockRejectedValue(failure);

    await expect(creditCommission(task, order, actorId)).rejects.toBe(failure);

    expect(mocks.taskUpdateOne).toHaveBeenCalledWith({ _id: task._id }, { $set: { commissionPaid: false } });
    expect(mocks.auditCreate).not.toHaveBeenCalled();
    expect(mocks.notify).not.toHaveBeenCalled();
  });
});
