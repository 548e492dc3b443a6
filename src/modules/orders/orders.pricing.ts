import { AppError, ErrorCode } from '../../utils/appError.js';
import {
  OrderPaymentStatus,
  PaymentOption,
  PaymentStatus,
  PaymentType,
} from '../../utils/constants.js';
import { roundMoney } from '../../utils/helpers.js';

export interface GarmentRecipe {
  estimatedFabricMeters: number;
  requiredAccessories: { accessoryId: { toString(): string }; quantityRequired: number }[];
}

export interface MaterialRequirements {
  fabricMeters: number;
  accessories: { accessoryId: string; quantity: number }[];
}

/**
 * Fabric and accessories consumed by `quantity` units of a garment.
 */
export function computeMaterialRequirements(garment: GarmentRecipe, quantity: number): MaterialRequirements {
  return {
    fabricMeters: roundMoney(garment.estimatedFabricMeters * quantity),
    accessories: garment.requiredAccessories
      .map((req) => ({
        accessoryId: req.accessoryId.toString(),
        quantity: roundMoney(req.quantityRequired * quantity),
      }))
      .filter((req) => req.quantity > 0),
  };
}

export function computeTotalPrice(basePrice: number, quantity: number): number {
  return roundMoney(basePrice * quantity);
}

export function requiredDeposit(totalPrice: number, depositPercentage: number): number {
  return roundMoney((totalPrice * depositPercentage) / 100);
}

export interface InitialPaymentInput {
  totalPrice: number;
  option: PaymentOption;
  depositPercentage: number;
  /** Explicit amount tendered at intake; defaults to the minimum deposit. */
  amount?: number;
}

export interface InitialPayment {
  amount: number;
  paymentType: PaymentType;
  depositAmount: number;
  balanceAmount: number;
}

/**
 * Resolve the payment taken when an order is placed. A deposit below the
 * configured percentage is refused.
 */
export function resolveInitialPayment(input: InitialPaymentInput): InitialPayment {
  const { totalPrice, depositPercentage } = input;
  if (totalPrice <= 0) {
    throw AppError.badRequest('Order total must be greater than zero', ErrorCode.VALIDATION_ERROR, { totalPrice });
  }
  const minimum = requiredDeposit(totalPrice, depositPercentage);

  const amount =
    input.option === PaymentOption.FULL ? totalPrice : roundMoney(input.amount ?? minimum);

  // A payment record needs a positive amount, even when the deposit rate is 0%
  if (amount <= 0) {
    throw AppError.badRequest('An initial payment is required', ErrorCode.DEPOSIT_REQUIRED, {
      required: minimum,
      received: amount,
    });
  }

  if (amount < minimum) {
    throw AppError.badRequest(
      `A deposit of at least ${depositPercentage}% (${minimum.toFixed(2)}) is required`,
      ErrorCode.DEPOSIT_REQUIRED,
      { required: minimum, received: amount },
    );
  }

  if (amount > totalPrice) {
    throw AppError.badRequest('Initial payment cannot exceed the order total', ErrorCode.VALIDATION_ERROR, {
      totalPrice,
      received: amount,
    });
  }

  return {
    amount,
    paymentType: amount === totalPrice ? PaymentType.FULL : PaymentType.DEPOSIT,
    depositAmount: amount,
    balanceAmount: roundMoney(totalPrice - amount),
  };
}

export interface PaymentSummary {
  totalPaid: number;
  remainingBalance: number;
  paymentStatus: OrderPaymentStatus;
}

export function summarizePayments(
  totalPrice: number,
  payments: { amount: number; status: PaymentStatus }[],
): PaymentSummary {
  const totalPaid = roundMoney(
    payments.filter((p) => p.status === PaymentStatus.COMPLETED).reduce((sum, p) => sum + p.amount, 0),
  );
  const remainingBalance = Math.max(0, roundMoney(totalPrice - totalPaid));

  let paymentStatus = OrderPaymentStatus.PARTIAL;
  if (totalPaid <= 0) paymentStatus = OrderPaymentStatus.UNPAID;
  else if (remainingBalance === 0) paymentStatus = OrderPaymentStatus.FULLY_PAID;

  return { totalPaid, remainingBalance, paymentStatus };
}

export function hasMetDeposit(totalPrice: number, totalPaid: number, depositPercentage: number): boolean {
  return totalPaid >= requiredDeposit(totalPrice, depositPercentage);
}

/**
 * Clamp a payment to what is still owed. Payments that settle the order are
 * recorded as balance payments.
 */
export function applyPaymentToBalance(
  amount: number,
  remainingBalance: number,
  requestedType: PaymentType,
): { amount: number; paymentType: PaymentType } {
  if (remainingBalance <= 0) {
    throw AppError.badRequest('This order is already fully paid', ErrorCode.ORDER_FULLY_PAID);
  }
  if (amount >= remainingBalance) {
    return { amount: remainingBalance, paymentType: PaymentType.BALANCE };
  }
  return { amount: roundMoney(amount), paymentType: requestedType };
}

export function computeCommission(totalPrice: number, rate: number): number {
  return roundMoney((totalPrice * rate) / 100);
}
