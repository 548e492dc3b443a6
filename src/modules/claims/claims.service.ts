import { AuditLog, Order, Payment, TailoringTask, type IPayment } from '../../models/index.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import { AuditAction, OrderStatus, PaymentMethod, PaymentStatus, PaymentType } from '../../utils/constants.js';
import { generateDocumentNumber, roundMoney } from '../../utils/helpers.js';
import { creditCommission } from '../commissions/commissions.service.js';
import { getPaymentSummary } from '../payments/payments.service.js';
import type { ProcessClaimInput } from './claims.validation.js';

/**
 * Orders waiting for pickup, newest first, and the last ten handed over.
 */
export async function listClaims() {
  const [ready, recentlyDelivered] = await Promise.all([
    Order.find({ status: OrderStatus.COMPLETED })
      .populate('customerId', 'name contactNumber')
      .populate('garmentTypeId', 'name')
      .populate('fabricId', 'name color')
      .sort({ completedDate: -1, createdAt: -1 }),
    Order.find({ status: OrderStatus.DELIVERED })
      .populate('customerId', 'name')
      .populate('garmentTypeId', 'name')
      .sort({ deliveredDate: -1, updatedAt: -1 })
      .limit(10),
  ]);

  const withBalance = ready.filter((o) => o.balanceAmount > 0);
  return {
    orders: ready,
    recentlyDelivered,
    stats: {
      readyForPickup: ready.length,
      withBalance: withBalance.length,
      fullyPaid: ready.length - withBalance.length,
      totalPendingBalance: roundMoney(withBalance.reduce((sum, o) => sum + o.balanceAmount, 0)),
    },
  };
}

/**
 * Hand a finished order to the customer: optionally settle the balance, credit
 * the tailor's commission and mark the order delivered.
 */
export async function processClaim(
  orderId: string,
  input: ProcessClaimInput,
  actorId: string,
  ip?: string,
  ua?: string,
) {
  const order = await Order.findById(orderId);
  if (!order) throw AppError.notFound('Order not found');
  if (order.status !== OrderStatus.COMPLETED) {
    throw AppError.badRequest('This order is not ready for pickup.', ErrorCode.INVALID_TRANSITION, {
      status: order.status,
    });
  }

  const { summary } = await getPaymentSummary(order);
  let balancePayment: IPayment | null = null;

  if (input.collectBalance && summary.remainingBalance > 0) {
    const locked = await Order.findOneAndUpdate(
      { _id: order._id, balanceAmount: order.balanceAmount },
      { $set: { balanceAmount: 0 } },
    );
    if (!locked) {
      throw AppError.conflict('The order balance changed while processing the claim. Please retry.');
    }
    order.balanceAmount = 0;

    balancePayment = await Payment.create({
      paymentNumber: generateDocumentNumber('PAY'),
      orderId: order._id,
      amount: summary.remainingBalance,
      paymentType: PaymentType.BALANCE,
      paymentMethod: PaymentMethod.CASH,
      status: PaymentStatus.COMPLETED,
      notes: 'Balance collected at pickup',
      receivedBy: actorId,
    });
  }

  const task = await TailoringTask.findOne({ orderId: order._id });
  const commission = task ? await creditCommission(task, order, actorId) : null;

  order.status = OrderStatus.DELIVERED;
  order.deliveredDate = new Date();
  await order.save();

  await AuditLog.create({
    action: AuditAction.ORDER_CLAIMED,
    actorId,
    targetType: 'order',
    targetId: order._id,
    details: {
      orderNumber: order.orderNumber,
      balanceCollected: balancePayment?.amount ?? 0,
      commissionNumber: commission?.commissionNumber,
    },
    ipAddress: ip,
    userAgent: ua,
  });

  return {
    order,
    balancePayment,
    commission,
    message: `Order ${order.orderNumber} has been claimed and marked as delivered.`,
  };
}
