import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Types } from 'mongoose';

const mocks = vi.hoisted(() => ({
  taskFindById: vi.fn(),
  orderFindById: vi.fn(),
  userFindById: vi.fn(),
  customerFindById: vi.fn(),
  garmentFindById: vi.fn(),
  auditCreate: vi.fn(),
  getPaymentSummary: vi.fn(),
  notifyRole: vi.fn(),
  createAndSendNotification: vi.fn(),
  sendReadyForPickupSms: vi.fn(),
}));

vi.mock('../../config/env.js', () => ({ env: { DEPOSIT_PERCENTAGE: 50, DEFAULT_COMMISSION_RATE: 10 } }));
vi.mock('../../utils/logger.js', () => ({
  logger: { warn: vi.fn(), error: vi.fn(), info: vi.fn(), debug: vi.fn() },
  smsLogger: { warn: vi.fn(), error: vi.fn(), info: vi.fn(), debug: vi.fn() },
  socketLogger: { warn: vi.fn(), error: vi.fn(), info: vi.fn(), debug: vi.fn() },
}));
vi.mock('../../models/index.js', () => ({
  TailoringTask: { findById: mocks.taskFindById },
  Order: { findById: mocks.orderFindById },
  User: { findById: mocks.userFindById },
  Customer: { findById: mocks.customerFindById },
  GarmentType: { findById: mocks.garmentFindById },
  AuditLog: { create: mocks.auditCreate },
  fullName: (u: { firstName: string; lastName: string }) => `${u.firstName} ${u.lastName}`,
}));
vi.mock('../payments/payments.service.js', () => ({ getPaymentSummary: mocks.getPaymentSummary }));
vi.mock('../notifications/socket.service.js', () => ({
  notifyRole: mocks.notifyRole,
  createAndSendNotification: mocks.createAndSendNotification,
}));
vi.mock('../notifications/sms.service.js', () => ({ sendReadyForPickupSms: mocks.sendReadyForPickupSms }));
vi.mock('../users/users.service.js', () => ({ listTailors: vi.fn() }));

import { approveTask, updateTaskStatus } from './tasks.service.js';
import { Role, TaskStatus } from '../../utils/constants.js';

const tailorId = new Types.ObjectId();
const adminId = new Types.ObjectId().toString();
const tailor = { id: tailorId.toString(), roles: [Role.TAILOR], isAdmin: false };

function fakeTask(status: string) {
  return {
    _id: new Types.ObjectId(),
    orderId: new Types.ObjectId(),
    tailorId,
    status,
    notes: undefined as string | undefined,
    startedDate: undefined as Date | undefined,
    approvedBy: undefined as Types.ObjectId | undefined,
    save: vi.fn().mockResolvedValue(undefined),
  };
}

function fakeOrder(status: string) {
  return {
    _id: new Types.ObjectId(),
    orderNumber: 'ORD-1A2B3C4D',
    customerId: new Types.ObjectId(),
    garmentTypeId: new Types.ObjectId(),
    totalPrice: 1000,
    status,
    completedDate: undefined as Date | undefined,
    save: vi.fn().mockResolvedValue(undefined),
  };
}

/** findById result that can be awaited directly or chained with populate(). */
function queryOf<T>(doc: T) {
  return Object.assign(Promise.resolve(doc), {
    populate: vi.fn().mockResolvedValue({
      orderNumber: 'ORD-1A2B3C4D',
      customerId: { name: 'Ana Cruz' },
      garmentTypeId: { name: 'Barong Tagalog' },
    }),
  });
}

beforeEach(() => {
  vi.clearAllMocks();
  mocks.userFindById.mockResolvedValue({ firstName: 'Mario', lastName: 'Santos' });
});

describe('updateTaskStatus', () => {
  it('refuses to start work before the deposit is paid', async () => {
    const task = fakeTask('assigned');
    const order = fakeOrder('pending');
    mocks.taskFindById.mockResolvedValue(task);
    mocks.orderFindById.mockImplementation(() => queryOf(order));
    mocks.getPaymentSummary.mockResolvedValue({
      payments: [],
      summary: { totalPaid: 400, remainingBalance: 600, paymentStatus: 'partial' },
    });

    await expect(
      updateTaskStatus(task._id.toString(), { status: TaskStatus.IN_PROGRESS }, tailor),
    ).rejects.toMatchObject({ code: 'DEPOSIT_REQUIRED', details: { required: 500, received: 400 } });
    expect(task.save).not.toHaveBeenCalled();
    expect(order.save).not.toHaveBeenCalled();
  });

  it('starts the task, moves the order to in progress and tells the admins', async () => {
    const task = fakeTask('assigned');
    const order = fakeOrder('pending');
    mocks.taskFindById.mockResolvedValue(task);
    mocks.orderFindById.mockImplementation(() => queryOf(order));
    mocks.getPaymentSummary.mockResolvedValue({
      payments: [],
      summary: { totalPaid: 500, remainingBalance: 500, paymentStatus: 'partial' },
    });

    await updateTaskStatus(task._id.toString(), { status: TaskStatus.IN_PROGRESS, notes: 'Cutting today' }, tailor);

    expect(task.status).toBe('in_progress');
    expect(task.startedDate).toBeInstanceOf(Date);
    expect(task.notes).toBe('Cutting today');
    expect(order.status).toBe('in_progress');
    expect(order.save).toHaveBeenCalledTimes(1);
    expect(mocks.notifyRole).toHaveBeenCalledWith(
      'admin',
      expect.objectContaining({
        title: 'Task Started',
        message: 'Task for order ORD-1A2B3C4D has been started by Mario Santos.',
      }),
    );
  });

  it("rejects a tailor updating someone else's task", async () => {
    const task = fakeTask('assigned');
    task.tailorId = new Types.ObjectId();
    mocks.taskFindById.mockResolvedValue(task);

    await expect(
      updateTaskStatus(task._id.toString(), { status: TaskStatus.IN_PROGRESS }, tailor),
    ).rejects.toMatchObject({ statusCode: 403 });
  });

  it('does not skip from assigned straight to completed', async () => {
    const task = fakeTask('assigned');
    mocks.taskFindById.mockResolvedValue(task);
    mocks.orderFindById.mockImplementation(() => queryOf(fakeOrder('pending')));

    await expect(
      updateTaskStatus(task._id.toString(), { status: TaskStatus.COMPLETED }, tailor),
    ).rejects.toMatchObject({ code: 'INVALID_TRANSITION' });
  });
});

describe('approveTask', () => {
  it('only approves completed tasks', async () => {
    mocks.taskFindById.mockResolvedValue(fakeTask('in_progress'));

    await expect(approveTask(new Types.ObjectId().toString(), adminId)).rejects.toMatchObject({
      code: 'INVALID_TRANSITION',
    });
  });

  it('completes the order even when the SMS cannot be sent', async () => {
    const task = fakeTask('completed');
    const order = fakeOrder('in_progress');
    mocks.taskFindById.mockResolvedValue(task);
    mocks.orderFindById.mockImplementation(() => queryOf(order));
    mocks.customerFindById.mockResolvedValue({ _id: order.customerId, name: 'Ana Cruz', contactNumber: '09171234567' });
    mocks.garmentFindById.mockResolvedValue({ name: 'Barong Tagalog' });
    mocks.getPaymentSummary.mockResolvedValue({
      payments: [],
      summary: { totalPaid: 500, remainingBalance: 500, paymentStatus: 'partial' },
    });
    mocks.sendReadyForPickupSms.mockRejectedValue(new Error('connection refused'));

    const result = await approveTask(task._id.toString(), adminId);

    expect(result.smsSent).toBe(false);
    expect(task.status).toBe('approved');
    expect(task.approvedBy?.toString()).toBe(adminId);
    expect(order.status).toBe('completed');
    expect(order.completedDate).toBeInstanceOf(Date);
    expect(mocks.createAndSendNotification).toHaveBeenCalledWith(
      expect.objectContaining({ title: 'Order Completed', recipientId: tailorId }),
    );
  });
});
