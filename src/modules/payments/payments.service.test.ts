import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Types } from 'mongoose';

const mocks = vi.hoisted(() => ({
  orderFindById: vi.fn(),
  orderFindOneAndUpdate: vi.fn(),
  paymentFind: vi.fn(),
  paymentCreate: vi.fn(),
  auditCreate: vi.fn(),
}));

vi.mock('../../models/index.js', () => ({
  Order: { findById: mocks.orderFindById, findOneAndUpdate: mocks.orderFindOneAndUpdate },
  Payment: { find: mocks.paymentFind, create: mocks.paymentCreate },
  AuditLog: { create: mocks.auditCreate },
  TailoringTask: {},
  fullName: vi.fn(),
}));

import { recordPayment } from './payments.service.js';
import { ErrorCode } from '../../utils/appError.js';
import { OrderPaymentStatus, OrderStatus, PaymentMethod, PaymentStatus, PaymentType } from '../../utils/constants.js';

const actorId = new Types.ObjectId().toString();

function fakeOrder(status: OrderStatus, balanceAmount: number) {
  return { _id: new Types.ObjectId(), orderNumber: 'ORD-PAY00001', status, totalPrice: 2000, balanceAmount };
}

function paidSoFar(amounts: number[]) {
  const payments = amounts.map((amount) => ({ amount, status: PaymentStatus.COMPLETED }));
  mocks.paymentFind.mockReturnValue({ sort: vi.fn().mockResolvedValue(payments) });
}

function paymentInput(orderId: Types.ObjectId, amount: number) {
  return {
    orderId: orderId.toString(),
    amount,
    paymentType: PaymentType.BALANCE,
    paymentMethod: PaymentMethod.CASH,
  };
}

beforeEach(() => {
  vi.clearAllMocks();
  mocks.orderFindOneAndUpdate.mockResolvedValue({});
  mocks.paymentCreate.mockImplementation(async (fields: Record<string, unknown>) => ({
    _id: new Types.ObjectId(),
    ...fields,
  }));
});

describe('recordPayment', () => {
  it('clamps an overpayment to the balance and settles the order', async () => {
    const order = fakeOrder(OrderStatus.IN_PROGRESS, 1000);
    mocks.orderFindById.mockResolvedValue(order);
    paidSoFar([1000]);

    const result = await recordPayment(paymentInput(order._id, 1500), actorId);

    expect(mocks.orderFindOneAndUpdate).toHaveBeenCalledWith(
      { _id: order._id, balanceAmount: 1000 },
      { $set: { balanceAmount: 0 } },
    );
    expect(mocks.paymentCreate).toHaveBeenCalledWith(
      expect.objectContaining({ amount: 1000, paymentType: PaymentType.BALANCE, status: PaymentStatus.COMPLETED }),
    );
    expect(result.summary).toEqual({
      totalPaid: 2000,
      remainingBalance: 0,
      paymentStatus: OrderPaymentStatus.FULLY_PAID,
    });
  });

  it('refuses payments for a cancelled order', async () => {
    const order = fakeOrder(OrderStatus.CANCELLED, 1000);
    mocks.orderFindById.mockResolvedValue(order);

    await expect(recordPayment(paymentInput(order._id, 500), actorId)).rejects.toMatchObject({
      code: ErrorCode.ORDER_LOCKED,
      message: 'Cannot record a payment for a cancelled order',
    });
    expect(mocks.paymentCreate).not.toHaveBeenCalled();
  });

  it('refuses payments once nothing is owed', async () => {
    const order = fakeOrder(OrderStatus.COMPLETED, 0);
    mocks.orderFindById.mockResolvedValue(order);
    paidSoFar([1000, 1000]);

    await expect(recordPayment(paymentInput(order._id, 100), actorId)).rejects.toMatchObject({
      code: ErrorCode.ORDER_FULLY_PAID,
    });
    expect(mocks.orderFindOneAndUpdate).not.toHaveBeenCalled();
  });

  it('answers 409 when another payment changed the balance first', async () => {
    const order = fakeOrder(OrderStatus.IN_PROGRESS, 1000);
    mocks.orderFindById.mockResolvedValue(order);
    mocks.orderFindOneAndUpdate.mockResolvedValue(null);
    paidSoFar([1000]);

    await expect(recordPayment(paymentInput(order._id, 400), actorId)).rejects.toMatchObject({
      statusCode: 409,
      code: ErrorCode.CONFLICT,
    });
    expect(mocks.paymentCreate).not.toHaveBeenCalled();
  });
});
