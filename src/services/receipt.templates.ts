import Handlebars from 'handlebars';
import { env } from '../config/env.js';
import { formatCurrency, formatShopDate } from '../utils/helpers.js';
import { humanize, type OrderReceiptData, type PaymentReceiptData } from './receipt.service.js';

Handlebars.registerHelper('currency', (value: unknown) => (typeof value === 'number' ? formatCurrency(value) : ''));
Handlebars.registerHelper('date', (value: unknown) =>
  value instanceof Date ? formatShopDate(value, env.TIMEZONE) : '',
);
Handlebars.registerHelper('label', (value: unknown) => (typeof value === 'string' ? humanize(value) : ''));

Handlebars.registerPartial(
  'header',
  `
  <div style="text-align: center; border-bottom: 2px solid #1a1a2e; padding-bottom: 12px; margin-bottom: 16px;">
    <h1 style="margin: 0; font-size: 22px;">{{shop.name}}</h1>
    {{#if shop.address}}<div style="font-size: 12px;">{{shop.address}}</div>{{/if}}
    {{#if shop.phone}}<div style="font-size: 12px;">{{shop.phone}}</div>{{/if}}
  </div>
`,
);

const layout = (title: string, body: string) => `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${title}</title>
  <style>
    body { font-family: Arial, sans-serif; max-width: 640px; margin: 0 auto; padding: 24px; color: #222; }
    table { width: 100%; border-collapse: collapse; margin-bottom: 16px; }
    th, td { text-align: left; padding: 4px 6px; font-size: 13px; }
    th { border-bottom: 1px solid #ccc; }
    .totals td { font-weight: bold; }
    @media print { .no-print { display: none; } }
  </style>
</head>
<body>
  {{> header}}
${body}
  <p style="text-align: center; font-size: 11px; color: #666;">Thank you for choosing {{shop.name}}.</p>
  <button class="no-print" onclick="window.print()">Print</button>
</body>
</html>
`;

const templates = {
  payment: layout(
    'Receipt {{payment.paymentNumber}}',
    `
  <h2 style="text-align: center;">OFFICIAL RECEIPT</h2>
  <table>
    <tr><th>Receipt No</th><td>{{payment.paymentNumber}}</td></tr>
    <tr><th>Date</th><td>{{date payment.paymentDate}}</td></tr>
    <tr><th>Order No</th><td>{{orderNumber}}</td></tr>
    <tr><th>Customer</th><td>{{customerName}}</td></tr>
    <tr><th>Garment</th><td>{{garmentName}} x {{quantity}}</td></tr>
    <tr><th>Payment Type</th><td>{{label payment.paymentType}}</td></tr>
    <tr><th>Payment Method</th><td>{{label payment.paymentMethod}}</td></tr>
    <tr><th>Amount Paid</th><td>{{currency payment.amount}}</td></tr>
    {{#if payment.notes}}<tr><th>Notes</th><td>{{payment.notes}}</td></tr>{{/if}}
    <tr><th>Received By</th><td>{{receivedBy}}</td></tr>
  </table>
  <table class="totals">
    <tr><td>Order Total</td><td>{{currency totalPrice}}</td></tr>
    <tr><td>Total Paid</td><td>{{currency totalPaid}}</td></tr>
    <tr><td>Remaining Balance</td><td>{{currency remainingBalance}}</td></tr>
  </table>
`,
  ),
  order: layout(
    '{{#if claimDate}}Claim{{else}}Order{{/if}} Receipt {{orderNumber}}',
    `
  <h2 style="text-align: center;">{{#if claimDate}}CLAIM RECEIPT{{else}}ORDER RECEIPT{{/if}}</h2>
  <table>
    <tr><th>Order No</th><td>{{orderNumber}}</td></tr>
    <tr><th>Order Date</th><td>{{date orderDate}}</td></tr>
    {{#if dueDate}}<tr><th>Due Date</th><td>{{date dueDate}}</td></tr>{{/if}}
    {{#if claimDate}}<tr><th>Claimed On</th><td>{{date claimDate}}</td></tr>{{/if}}
    <tr><th>Status</th><td>{{label status}}</td></tr>
    <tr><th>Customer</th><td>{{customerName}} ({{customerContact}})</td></tr>
    <tr><th>Garment</th><td>{{garmentName}} x {{quantity}}</td></tr>
    <tr><th>Fabric</th><td>{{fabricName}}</td></tr>
    {{#each accessories}}<tr><th>{{name}}</th><td>{{quantity}} {{unit}}</td></tr>{{/each}}
    {{#if tailorName}}<tr><th>Tailor</th><td>{{tailorName}}</td></tr>{{/if}}
    {{#if specialInstructions}}<tr><th>Instructions</th><td>{{specialInstructions}}</td></tr>{{/if}}
  </table>
  {{#if measurements.length}}
  <h3>Measurements</h3>
  <table>
    {{#each measurements}}<tr><th>{{label}}</th><td>{{value}}</td></tr>{{/each}}
  </table>
  {{/if}}
  {{#if payments.length}}
  <h3>Payments</h3>
  <table>
    <tr><th>Receipt No</th><th>Date</th><th>Type</th><th>Amount</th></tr>
    {{#each payments}}<tr><td>{{paymentNumber}}</td><td>{{date paymentDate}}</td><td>{{label paymentType}}</td><td>{{currency amount}}</td></tr>{{/each}}
  </table>
  {{/if}}
  <table class="totals">
    <tr><td>Order Total</td><td>{{currency totalPrice}}</td></tr>
    <tr><td>Total Paid</td><td>{{currency totalPaid}}</td></tr>
    <tr><td>Remaining Balance</td><td>{{currency remainingBalance}}</td></tr>
  </table>
`,
  ),
};

const compiled = {
  payment: Handlebars.compile<PaymentReceiptData>(templates.payment),
  order: Handlebars.compile<OrderReceiptData>(templates.order),
};

export function renderPaymentReceiptHtml(data: PaymentReceiptData): string {
  return compiled.payment(data);
}

export function renderOrderReceiptHtml(data: OrderReceiptData): string {
  return compiled.order(data);
}
