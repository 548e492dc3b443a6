import {
  AuditLog,
  Order,
  Payment,
  TailoringTask,
  fullName,
  type IAccessory,
  type ICustomer,
  type IFabric,
  type IGarmentType,
  type IPayment,
  type IUser,
} from '../../models/index.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import { AuditAction, OrderStatus, PaymentStatus } from '../../utils/constants.js';
import { generateDocumentNumber, paginate, paginationMeta, roundMoney } from '../../utils/helpers.js';
import { measurementLabel } from '../garments/garments.measurements.js';
import { applyPaymentToBalance, summarizePayments } from '../orders/orders.pricing.js';
import {
  currentShop,
  type OrderReceiptData,
  type PaymentReceiptData,
  type ReceiptPaymentLine,
} from '../../services/receipt.service.js';
import type { CreatePaymentInput, ListPaymentsQuery } from './payments.validation.js';
import type { Types } from 'mongoose';

/**
 * Completed payments of an order and what is still owed.
 */
export async function getPaymentSummary(order: { _id: Types.ObjectId; totalPrice: number }) {
  const payments = await Payment.find({ orderId: order._id }).sort({ paymentDate: 1 });
  return { payments, summary: summarizePayments(order.totalPrice, payments) };
}

// ── Record Payment ──

export async function recordPayment(input: CreatePaymentInput, actorId: string, ip?: string, ua?: string) {
  const order = await Order.findById(input.orderId);
  if (!order) throw AppError.notFound('Order not found');

  if (order.status === OrderStatus.CANCELLED) {
    throw AppError.badRequest('Cannot record a payment for a cancelled order', ErrorCode.ORDER_LOCKED);
  }

  const { payments, summary } = await getPaymentSummary(order);
  const applied = applyPaymentToBalance(input.amount, summary.remainingBalance, input.paymentType);
  const newBalance = roundMoney(summary.remainingBalance - applied.amount);

  // Optimistic lock on the balance: a concurrent payment makes this miss
  const locked = await Order.findOneAndUpdate(
    { _id: order._id, balanceAmount: order.balanceAmount },
    { $set: { balanceAmount: newBalance } },
  );
  if (!locked) {
    throw AppError.conflict('The order balance changed while recording this payment. Please retry.');
  }

  const payment = await Payment.create({
    paymentNumber: generateDocumentNumber('PAY'),
    orderId: order._id,
    amount: applied.amount,
    paymentType: applied.paymentType,
    paymentMethod: input.paymentMethod,
    status: PaymentStatus.COMPLETED,
    notes: input.notes,
    receivedBy: actorId,
  });

  await AuditLog.create({
    action: AuditAction.PAYMENT_RECORDED,
    actorId,
    targetType: 'payment',
    targetId: payment._id,
    details: {
      orderNumber: order.orderNumber,
      amount: payment.amount,
      requested: input.amount,
      paymentType: payment.paymentType,
    },
    ipAddress: ip,
    userAgent: ua,
  });

  return {
    payment,
    summary: summarizePayments(order.totalPrice, [...payments, payment]),
  };
}

// ── Queries ──

export async function listPayments(query: ListPaymentsQuery) {
  const filter: Record<string, unknown> = {};
  if (query.orderId) filter.orderId = query.orderId;
  if (query.paymentType) filter.paymentType = query.paymentType;
  if (query.paymentMethod) filter.paymentMethod = query.paymentMethod;
  if (query.status) filter.status = query.status;
  if (query.startDate || query.endDate) {
    const range: Record<string, Date> = {};
    if (query.startDate) range.$gte = query.startDate;
    if (query.endDate) range.$lte = query.endDate;
    filter.paymentDate = range;
  }

  const { skip, limit } = paginate(query.page, query.limit);
  const [items, total] = await Promise.all([
    Payment.find(filter)
      .populate({ path: 'orderId', select: 'orderNumber customerId totalPrice', populate: { path: 'customerId', select: 'name' } })
      .populate('receivedBy', 'username firstName lastName')
      .sort({ createdAt: -1 })
      .skip(skip)
      .limit(limit),
    Payment.countDocuments(filter),
  ]);

  return { items, ...paginationMeta(query.page, query.limit, total) };
}

export async function getPayment(paymentId: string) {
  const payment = await Payment.findById(paymentId)
    .populate({ path: 'orderId', populate: { path: 'customerId garmentTypeId', select: 'name contactNumber' } })
    .populate('receivedBy', 'username firstName lastName');
  if (!payment) throw AppError.notFound('Payment not found');
  return payment;
}

// ── Receipts ──

function toReceiptLine(payment: Omit<IPayment, 'receivedBy'>): ReceiptPaymentLine {
  return {
    paymentNumber: payment.paymentNumber,
    paymentDate: payment.paymentDate,
    paymentType: payment.paymentType,
    paymentMethod: payment.paymentMethod,
    amount: payment.amount,
    notes: payment.notes,
  };
}

async function loadReceiptOrder(orderId: Types.ObjectId | string) {
  const order = await Order.findById(orderId).populate<{
    customerId: ICustomer;
    garmentTypeId: IGarmentType;
    fabricId: IFabric;
    accessories: { accessoryId: IAccessory | null; quantityUsed: number }[];
  }>(['customerId', 'garmentTypeId', 'fabricId', 'accessories.accessoryId']);
  if (!order) throw AppError.notFound('Order not found');
  return order;
}

export async function buildPaymentReceipt(paymentId: string): Promise<PaymentReceiptData> {
  const payment = await Payment.findById(paymentId).populate<{ receivedBy: IUser | null }>('receivedBy');
  if (!payment) throw AppError.notFound('Payment not found');

  const order = await loadReceiptOrder(payment.orderId);
  const { summary } = await getPaymentSummary(order);

  return {
    shop: currentShop(),
    payment: toReceiptLine(payment),
    receivedBy: payment.receivedBy ? fullName(payment.receivedBy) : '',
    orderNumber: order.orderNumber,
    customerName: order.customerId.name,
    customerContact: order.customerId.contactNumber,
    garmentName: order.garmentTypeId.name,
    quantity: order.quantity,
    totalPrice: order.totalPrice,
    totalPaid: summary.totalPaid,
    remainingBalance: summary.remainingBalance,
  };
}

/**
 * Full order receipt; the claim variant is only issued once the order has been picked up.
 */
export async function buildOrderReceipt(orderId: string, kind: 'order' | 'claim'): Promise<OrderReceiptData> {
  const order = await loadReceiptOrder(orderId);

  if (kind === 'claim' && order.status !== OrderStatus.DELIVERED) {
    throw AppError.badRequest('This order has not been claimed yet');
  }

  const [{ payments, summary }, task] = await Promise.all([
    getPaymentSummary(order),
    TailoringTask.findOne({ orderId: order._id }).populate<{ tailorId: IUser | null }>('tailorId'),
  ]);

  return {
    shop: currentShop(),
    kind,
    orderNumber: order.orderNumber,
    orderDate: order.orderDate,
    dueDate: order.dueDate,
    status: order.status,
    customerName: order.customerId.name,
    customerContact: order.customerId.contactNumber,
    garmentName: order.garmentTypeId.name,
    fabricName: `${order.fabricId.name} (${order.fabricId.color})`,
    quantity: order.quantity,
    accessories: order.accessories.map((a) => ({
      name: a.accessoryId?.name ?? 'Removed accessory',
      quantity: a.quantityUsed,
      unit: a.accessoryId?.unit ?? '',
    })),
    measurements: Object.entries(order.measurements ?? {}).map(([name, value]) => ({
      label: measurementLabel(name),
      value,
    })),
    specialInstructions: order.specialInstructions,
    tailorName: task?.tailorId ? fullName(task.tailorId) : undefined,
    totalPrice: order.totalPrice,
    payments: payments.filter((p) => p.status === PaymentStatus.COMPLETED).map(toReceiptLine),
    totalPaid: summary.totalPaid,
    remainingBalance: summary.remainingBalance,
    claimDate: kind === 'claim' ? order.deliveredDate : undefined,
  };
}
