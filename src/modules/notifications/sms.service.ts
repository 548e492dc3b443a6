import axios from 'axios';
import { env } from '../../config/env.js';
import { SmsLog } from '../../models/index.js';
import { SmsLogStatus } from '../../utils/constants.js';
import { normalizePhone } from '../../utils/helpers.js';
import { smsLogger as logger } from '../../utils/logger.js';
import type { Types } from 'mongoose';

const SMS_TIMEOUT_MS = 30_000;

export interface ReadyForPickupDetails {
  customerName: string;
  garmentName: string;
  orderNumber: string;
  remainingBalance: number;
}

export interface SmsRequest {
  customerId: Types.ObjectId;
  orderId?: Types.ObjectId;
  phone: string;
  message: string;
}

export interface SmsResult {
  sent: boolean;
  logId: Types.ObjectId;
}

export function buildReadyForPickupMessage(details: ReadyForPickupDetails, shopName = env.SHOP_NAME): string {
  const balanceInfo =
    details.remainingBalance > 0
      ? `Please bring the remaining balance of P${details.remainingBalance.toFixed(2)} upon pickup. `
      : 'Your order is fully paid. ';

  return (
    `Good day, ${details.customerName}! ` +
    `Great news from ${shopName} - your ${details.garmentName} ` +
    `(Order #${details.orderNumber}) is now ready for pickup! ` +
    balanceInfo +
    `Thank you for trusting us! - ${shopName} Team`
  );
}

function describeResponse(data: unknown): string {
  return typeof data === 'string' ? data : JSON.stringify(data);
}

/**
 * Send one SMS through the Semaphore gateway. Every attempt is recorded in
 * SmsLog; gateway failures are logged and reported through the result rather
 * than thrown.
 */
export async function sendSms(request: SmsRequest): Promise<SmsResult> {
  if (!env.SEMAPHORE_API_KEY) {
    logger.warn({ orderId: request.orderId }, 'SMS not sent: SEMAPHORE_API_KEY is not configured');
    const log = await SmsLog.create({
      customerId: request.customerId,
      orderId: request.orderId,
      phoneNumber: request.phone,
      message: 'API key not configured',
      status: SmsLogStatus.FAILED,
      response: 'SEMAPHORE_API_KEY not set',
    });
    return { sent: false, logId: log._id };
  }

  const phone = normalizePhone(request.phone);
  const log = await SmsLog.create({
    customerId: request.customerId,
    orderId: request.orderId,
    phoneNumber: phone,
    message: request.message,
    status: SmsLogStatus.PENDING,
  });

  const form = new URLSearchParams({
    apikey: env.SEMAPHORE_API_KEY,
    number: phone,
    message: request.message,
  });
  if (env.SEMAPHORE_SENDER_NAME) {
    form.set('sendername', env.SEMAPHORE_SENDER_NAME);
  }

  try {
    const response = await axios.post(env.SEMAPHORE_API_URL, form, {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      timeout: SMS_TIMEOUT_MS,
      validateStatus: () => true,
    });

    const sent = response.status === 200;
    log.status = sent ? SmsLogStatus.SENT : SmsLogStatus.FAILED;
    log.response = describeResponse(response.data);
    if (sent) {
      log.sentAt = new Date();
    } else {
      logger.warn({ status: response.status, smsLogId: log._id }, 'SMS gateway rejected message');
    }
    await log.save();
    return { sent, logId: log._id };
  } catch (error) {
    logger.error({ err: error }, 'SMS gateway request failed');
    log.status = SmsLogStatus.FAILED;
    log.response = error instanceof Error ? error.message : String(error);
    await log.save();
    return { sent: false, logId: log._id };
  }
}

export async function sendReadyForPickupSms(
  customer: { _id: Types.ObjectId; contactNumber: string },
  orderId: Types.ObjectId,
  details: ReadyForPickupDetails,
): Promise<SmsResult> {
  return sendSms({
    customerId: customer._id,
    orderId,
    phone: customer.contactNumber,
    message: buildReadyForPickupMessage(details),
  });
}
