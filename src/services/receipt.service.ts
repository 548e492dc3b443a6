import PDFDocument from 'pdfkit';
import { env } from '../config/env.js';
import { formatCurrency, formatShopDate } from '../utils/helpers.js';
import { logger } from '../utils/logger.js';

export interface ShopInfo {
  name: string;
  address: string;
  phone: string;
}

export interface ReceiptPaymentLine {
  paymentNumber: string;
  paymentDate: Date;
  paymentType: string;
  paymentMethod: string;
  amount: number;
  notes?: string;
}

export interface PaymentReceiptData {
  shop: ShopInfo;
  payment: ReceiptPaymentLine;
  receivedBy: string;
  orderNumber: string;
  customerName: string;
  customerContact: string;
  garmentName: string;
  quantity: number;
  totalPrice: number;
  totalPaid: number;
  remainingBalance: number;
}

export interface OrderReceiptData {
  shop: ShopInfo;
  kind: 'order' | 'claim';
  orderNumber: string;
  orderDate: Date;
  dueDate?: Date;
  status: string;
  customerName: string;
  customerContact: string;
  garmentName: string;
  fabricName: string;
  quantity: number;
  accessories: { name: string; quantity: number; unit: string }[];
  measurements: { label: string; value: number }[];
  specialInstructions?: string;
  tailorName?: string;
  totalPrice: number;
  payments: ReceiptPaymentLine[];
  totalPaid: number;
  remainingBalance: number;
  claimDate?: Date;
}

export interface CommissionReportRow {
  commissionNumber: string;
  earnedDate: Date;
  tailorName: string;
  garmentType: string;
  customerName: string;
  orderAmount: number;
  commissionRate: number;
  commissionAmount: number;
  status: string;
}

export interface CommissionReportData {
  shop: ShopInfo;
  title: string;
  periodLabel: string;
  rows: CommissionReportRow[];
  totals: { count: number; orderAmount: number; commissionAmount: number };
  breakdown?: { tailorName: string; count: number; commissionAmount: number }[];
}

export interface TableReportData {
  shop: ShopInfo;
  title: string;
  summary: [string, string][];
  columns: { header: string; width: number }[];
  rows: string[][];
}

export function currentShop(): ShopInfo {
  return { name: env.SHOP_NAME, address: env.SHOP_ADDRESS, phone: env.SHOP_PHONE };
}

export function humanize(value: string): string {
  return value
    .split('_')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

const LEFT = 50;
const VALUE_COL = LEFT + 210;

/**
 * Run a drawing routine on a fresh A4 document and collect the output.
 */
function renderPdf(title: string, shop: ShopInfo, draw: (doc: PDFKit.PDFDocument) => void): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    try {
      const doc = new PDFDocument({
        size: 'A4',
        margin: 50,
        info: { Title: title, Author: shop.name },
      });

      const chunks: Buffer[] = [];
      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);

      drawHeader(doc, shop, title);
      draw(doc);
      drawFooter(doc, shop);

      doc.end();
    } catch (error) {
      logger.error({ err: error }, 'Failed to generate PDF');
      reject(error);
    }
  });
}

function drawHeader(doc: PDFKit.PDFDocument, shop: ShopInfo, title: string) {
  doc.fontSize(20).font('Helvetica-Bold').text(shop.name.toUpperCase(), { align: 'center' });

  const contact = [shop.address, shop.phone].filter(Boolean).join(' | ');
  if (contact) {
    doc.fontSize(10).font('Helvetica').text(contact, { align: 'center' });
  }

  doc.moveDown(0.5).fontSize(16).font('Helvetica-Bold').text(title.toUpperCase(), { align: 'center' }).moveDown(1);
}

function drawFooter(doc: PDFKit.PDFDocument, shop: ShopInfo) {
  doc.moveDown(2);
  drawLine(doc);
  doc.moveDown(0.5);

  doc
    .fontSize(8)
    .font('Helvetica')
    .fillColor('#666666')
    .text(`Thank you for choosing ${shop.name}.`, LEFT, doc.y, { align: 'center' })
    .moveDown(0.3)
    .text(`Generated on ${formatShopDate(new Date(), env.TIMEZONE, 'MMMM d, yyyy h:mm a')}`, { align: 'center' })
    .fillColor('#000000');
}

function drawLine(doc: PDFKit.PDFDocument) {
  const y = doc.y;
  doc
    .strokeColor('#cccccc')
    .lineWidth(1)
    .moveTo(LEFT, y)
    .lineTo(doc.page.width - LEFT, y)
    .stroke();
}

function drawSection(doc: PDFKit.PDFDocument, heading: string, rows: [string, string][]) {
  drawLine(doc);
  doc.moveDown(0.5);
  doc.fontSize(12).font('Helvetica-Bold').text(heading, LEFT);
  doc.moveDown(0.5);

  for (const [label, value] of rows) {
    const y = doc.y;
    doc.fontSize(10).font('Helvetica-Bold').text(`${label}:`, LEFT, y, { width: 200 });
    doc.font('Helvetica').text(value, VALUE_COL, y);
    doc.moveDown(0.3);
  }
  doc.moveDown(1);
}

function drawTable(doc: PDFKit.PDFDocument, columns: { header: string; width: number }[], rows: string[][]) {
  let y = doc.y;
  let x = LEFT;
  doc.fontSize(9).font('Helvetica-Bold');
  for (const col of columns) {
    doc.text(col.header, x, y, { width: col.width });
    x += col.width;
  }
  doc.moveDown(0.5);

  doc.font('Helvetica');
  for (const row of rows) {
    if (doc.y > doc.page.height - 100) doc.addPage();
    y = doc.y;
    x = LEFT;
    row.forEach((cell, i) => {
      doc.text(cell, x, y, { width: columns[i].width });
      x += columns[i].width;
    });
    doc.moveDown(0.4);
  }
  doc.moveDown(1);
}

const date = (value: Date) => formatShopDate(value, env.TIMEZONE);

export async function generatePaymentReceiptPdf(data: PaymentReceiptData): Promise<Buffer> {
  return renderPdf(`Receipt ${data.payment.paymentNumber}`, data.shop, (doc) => {
    drawSection(doc, 'PAYMENT', [
      ['Receipt No', data.payment.paymentNumber],
      ['Date', date(data.payment.paymentDate)],
      ['Payment Type', humanize(data.payment.paymentType)],
      ['Payment Method', humanize(data.payment.paymentMethod)],
      ['Amount Paid', formatCurrency(data.payment.amount)],
      ['Received By', data.receivedBy],
    ]);

    drawSection(doc, 'ORDER', [
      ['Order No', data.orderNumber],
      ['Customer', data.customerName],
      ['Contact', data.customerContact],
      ['Garment', `${data.garmentName} x ${data.quantity}`],
    ]);

    drawSection(doc, 'BALANCE', [
      ['Order Total', formatCurrency(data.totalPrice)],
      ['Total Paid', formatCurrency(data.totalPaid)],
      ['Remaining Balance', formatCurrency(data.remainingBalance)],
    ]);
  });
}

export async function generateOrderReceiptPdf(data: OrderReceiptData): Promise<Buffer> {
  const title = data.kind === 'claim' ? `Claim Receipt ${data.orderNumber}` : `Order Receipt ${data.orderNumber}`;

  return renderPdf(title, data.shop, (doc) => {
    const orderRows: [string, string][] = [
      ['Order No', data.orderNumber],
      ['Order Date', date(data.orderDate)],
      ['Status', humanize(data.status)],
    ];
    if (data.dueDate) orderRows.push(['Due Date', date(data.dueDate)]);
    if (data.claimDate) orderRows.push(['Claimed On', date(data.claimDate)]);
    orderRows.push(['Customer', data.customerName], ['Contact', data.customerContact]);
    drawSection(doc, 'ORDER', orderRows);

    const garmentRows: [string, string][] = [
      ['Garment', data.garmentName],
      ['Fabric', data.fabricName],
      ['Quantity', String(data.quantity)],
    ];
    for (const accessory of data.accessories) {
      garmentRows.push([accessory.name, `${accessory.quantity} ${accessory.unit}`]);
    }
    for (const m of data.measurements) {
      garmentRows.push([m.label, `${m.value}`]);
    }
    if (data.tailorName) garmentRows.push(['Tailor', data.tailorName]);
    if (data.specialInstructions) garmentRows.push(['Instructions', data.specialInstructions]);
    drawSection(doc, 'GARMENT', garmentRows);

    if (data.payments.length > 0) {
      drawLine(doc);
      doc.moveDown(0.5);
      doc.fontSize(12).font('Helvetica-Bold').text('PAYMENTS', LEFT);
      doc.moveDown(0.5);
      drawTable(
        doc,
        [
          { header: 'Receipt No', width: 110 },
          { header: 'Date', width: 120 },
          { header: 'Type', width: 80 },
          { header: 'Method', width: 90 },
          { header: 'Amount', width: 95 },
        ],
        data.payments.map((p) => [
          p.paymentNumber,
          date(p.paymentDate),
          humanize(p.paymentType),
          humanize(p.paymentMethod),
          formatCurrency(p.amount),
        ]),
      );
    }

    drawSection(doc, 'SUMMARY', [
      ['Order Total', formatCurrency(data.totalPrice)],
      ['Total Paid', formatCurrency(data.totalPaid)],
      ['Remaining Balance', formatCurrency(data.remainingBalance)],
    ]);
  });
}

export async function generateCommissionReportPdf(data: CommissionReportData): Promise<Buffer> {
  return renderPdf(data.title, data.shop, (doc) => {
    drawSection(doc, 'SUMMARY', [
      ['Period', data.periodLabel],
      ['Commissions', String(data.totals.count)],
      ['Order Value', formatCurrency(data.totals.orderAmount)],
      ['Total Commission', formatCurrency(data.totals.commissionAmount)],
    ]);

    if (data.breakdown && data.breakdown.length > 0) {
      drawLine(doc);
      doc.moveDown(0.5);
      doc.fontSize(12).font('Helvetica-Bold').text('BY TAILOR', LEFT);
      doc.moveDown(0.5);
      drawTable(
        doc,
        [
          { header: 'Tailor', width: 250 },
          { header: 'Tasks', width: 100 },
          { header: 'Commission', width: 145 },
        ],
        data.breakdown.map((b) => [b.tailorName, String(b.count), formatCurrency(b.commissionAmount)]),
      );
    }

    drawLine(doc);
    doc.moveDown(0.5);
    doc.fontSize(12).font('Helvetica-Bold').text('DETAILS', LEFT);
    doc.moveDown(0.5);
    drawTable(
      doc,
      [
        { header: 'Date', width: 85 },
        { header: 'Tailor', width: 90 },
        { header: 'Garment', width: 90 },
        { header: 'Customer', width: 90 },
        { header: 'Order', width: 70 },
        { header: 'Commission', width: 70 },
      ],
      data.rows.map((r) => [
        formatShopDate(r.earnedDate, env.TIMEZONE, 'MMM d, yyyy'),
        r.tailorName,
        r.garmentType,
        r.customerName,
        formatCurrency(r.orderAmount),
        formatCurrency(r.commissionAmount),
      ]),
    );
  });
}

/**
 * Summary block followed by one table; used by the production and performance reports.
 */
export async function generateTableReportPdf(data: TableReportData): Promise<Buffer> {
  return renderPdf(data.title, data.shop, (doc) => {
    drawSection(doc, 'SUMMARY', data.summary);
    drawLine(doc);
    doc.moveDown(0.5);
    drawTable(doc, data.columns, data.rows);
  });
}
