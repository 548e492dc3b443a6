import type { Request, Response } from 'express';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { sendPdf } from '../../utils/sendPdf.js';
import { getActor } from '../../middleware/auth.js';
import { parseQuery } from '../../middleware/validate.js';
import { generateOrderReceiptPdf, generatePaymentReceiptPdf } from '../../services/receipt.service.js';
import { renderOrderReceiptHtml, renderPaymentReceiptHtml } from '../../services/receipt.templates.js';
import * as paymentsService from './payments.service.js';
import { listPaymentsQuerySchema, receiptFormatQuerySchema } from './payments.validation.js';

export const recordPayment = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const result = await paymentsService.recordPayment(req.body, actor.id, req.ip, req.get('user-agent'));
  res.status(201).json({ success: true, data: result });
});

export const listPayments = asyncHandler(async (req: Request, res: Response) => {
  const query = parseQuery(listPaymentsQuerySchema, req);
  const result = await paymentsService.listPayments(query);
  res.json({ success: true, data: result });
});

export const getPayment = asyncHandler(async (req: Request, res: Response) => {
  const payment = await paymentsService.getPayment(req.params.id);
  res.json({ success: true, data: payment });
});

export const getPaymentReceipt = asyncHandler(async (req: Request, res: Response) => {
  const { format } = parseQuery(receiptFormatQuerySchema, req);
  const receipt = await paymentsService.buildPaymentReceipt(req.params.id);

  if (format === 'pdf') {
    sendPdf(res, `receipt-${receipt.payment.paymentNumber}.pdf`, await generatePaymentReceiptPdf(receipt));
    return;
  }
  res.type('html').send(renderPaymentReceiptHtml(receipt));
});

export const getOrderReceipt = asyncHandler(async (req: Request, res: Response) => {
  const { format } = parseQuery(receiptFormatQuerySchema, req);
  const receipt = await paymentsService.buildOrderReceipt(req.params.orderId, 'order');

  if (format === 'pdf') {
    sendPdf(res, `order-${receipt.orderNumber}.pdf`, await generateOrderReceiptPdf(receipt));
    return;
  }
  res.type('html').send(renderOrderReceiptHtml(receipt));
});

export const getClaimReceipt = asyncHandler(async (req: Request, res: Response) => {
  const { format } = parseQuery(receiptFormatQuerySchema, req);
  const receipt = await paymentsService.buildOrderReceipt(req.params.orderId, 'claim');

  if (format === 'pdf') {
    sendPdf(res, `claim-${receipt.orderNumber}.pdf`, await generateOrderReceiptPdf(receipt));
    return;
  }
  res.type('html').send(renderOrderReceiptHtml(receipt));
});
