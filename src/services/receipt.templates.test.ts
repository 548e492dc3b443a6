import { describe, expect, it } from 'vitest';
import { renderOrderReceiptHtml, renderPaymentReceiptHtml } from './receipt.templates.js';
import type { OrderReceiptData, PaymentReceiptData } from './receipt.service.js';

const shop = { name: 'Test Tailoring', address: '12 Sample St.', phone: '' };

const paymentReceipt: PaymentReceiptData = {
  shop,
  payment: {
    paymentNumber: 'PAY-1A2B3C4D',
    paymentDate: new Date('2026-03-05T02:00:00Z'),
    paymentType: 'deposit',
    paymentMethod: 'bank_transfer',
    amount: 1500,
  },
  receivedBy: 'Shop Admin',
  orderNumber: 'ORD-00AA11BB',
  customerName: 'Ana & Co <b>',
  customerContact: '09171234567',
  garmentName: 'Barong Tagalog',
  quantity: 2,
  totalPrice: 3000,
  totalPaid: 1500,
  remainingBalance: 1500,
};

describe('renderPaymentReceiptHtml', () => {
  const html = renderPaymentReceiptHtml(paymentReceipt);

  it('fills in the payment rows', () => {
    expect(html).toContain('<tr><th>Receipt No</th><td>PAY-1A2B3C4D</td></tr>');
    expect(html).toContain('<tr><th>Date</th><td>March 5, 2026</td></tr>');
    expect(html).toContain('<tr><th>Payment Method</th><td>Bank Transfer</td></tr>');
    expect(html).toContain('<tr><th>Amount Paid</th><td>₱1,500.00</td></tr>');
    expect(html).toContain('<tr><th>Garment</th><td>Barong Tagalog x 2</td></tr>');
  });

  it('escapes customer-supplied text', () => {
    expect(html).toContain('<tr><th>Customer</th><td>Ana &amp; Co &lt;b&gt;</td></tr>');
  });

  it('omits optional rows that have no value', () => {
    expect(html).not.toContain('<th>Notes</th>');
    expect(html).toContain('<title>Receipt PAY-1A2B3C4D</title>');
  });
});

describe('renderOrderReceiptHtml', () => {
  const order: OrderReceiptData = {
    shop,
    kind: 'order',
    orderNumber: 'ORD-00AA11BB',
    orderDate: new Date('2026-03-01T03:00:00Z'),
    status: 'in_progress',
    customerName: 'Ben Reyes',
    customerContact: '09181234567',
    garmentName: 'Slacks',
    fabricName: 'Polyester (Black)',
    quantity: 1,
    accessories: [{ name: 'Zipper', quantity: 1, unit: 'pcs' }],
    measurements: [{ label: 'Waist', value: 32 }],
    totalPrice: 800,
    payments: [
      {
        paymentNumber: 'PAY-99887766',
        paymentDate: new Date('2026-03-01T03:00:00Z'),
        paymentType: 'deposit',
        paymentMethod: 'cash',
        amount: 400,
      },
    ],
    totalPaid: 400,
    remainingBalance: 400,
  };

  it('lists materials, measurements and payments', () => {
    const html = renderOrderReceiptHtml(order);
    expect(html).toContain('ORDER RECEIPT');
    expect(html).toContain('<tr><th>Status</th><td>In Progress</td></tr>');
    expect(html).toContain('<tr><th>Zipper</th><td>1 pcs</td></tr>');
    expect(html).toContain('<tr><th>Waist</th><td>32</td></tr>');
    expect(html).toContain(
      '<tr><td>PAY-99887766</td><td>March 1, 2026</td><td>Deposit</td><td>₱400.00</td></tr>',
    );
    expect(html).toContain('<tr><td>Remaining Balance</td><td>₱400.00</td></tr>');
  });

  it('switches to the claim heading when a claim date is set', () => {
    const html = renderOrderReceiptHtml({
      ...order,
      kind: 'claim',
      status: 'delivered',
      claimDate: new Date('2026-03-10T03:00:00Z'),
    });
    expect(html).toContain('<title>Claim Receipt ORD-00AA11BB</title>');
    expect(html).toContain('CLAIM RECEIPT');
    expect(html).toContain('<tr><th>Claimed On</th><td>March 10, 2026</td></tr>');
  });
});
