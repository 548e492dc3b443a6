import {
  AuditLog,
  Customer,
  GarmentType,
  TailorCommission,
  TailoringTask,
  User,
  fullName,
  type IOrder,
  type ITailorCommission,
  type ITailoringTask,
  type IUser,
} from '../../models/index.js';
import { env } from '../../config/env.js';
import type { Actor } from '../../middleware/auth.js';
import { AppError } from '../../utils/appError.js';
import { AuditAction, CommissionPeriod, CommissionStatus, Role, TaskStatus } from '../../utils/constants.js';
import { formatCurrency, generateDocumentNumber, paginate, paginationMeta, roundMoney } from '../../utils/helpers.js';
import { logger } from '../../utils/logger.js';
import {
  currentShop,
  type CommissionReportData,
  type CommissionReportRow,
  type TableReportData,
} from '../../services/receipt.service.js';
import { createAndSendNotification } from '../notifications/socket.service.js';
import { commissionCredited } from '../tasks/tasks.notifications.js';
import { taskContext } from '../tasks/tasks.service.js';
import { resolvePeriod, zonedDayEnd, zonedDayStart, type PeriodRange } from './commissions.period.js';
import { averageCompletionDays, breakdownByGarment, breakdownByTailor, sumCommissions } from './commissions.summary.js';
import type {
  AdminReportQuery,
  CommissionHistoryQuery,
  MarkPaidInput,
  TailorReportQuery,
} from './commissions.validation.js';
import { Types } from 'mongoose';

const TAILOR_FIELDS = 'username firstName lastName';

function period(type: CommissionPeriod, audience: 'tailor' | 'admin', dates: { startDate?: string; endDate?: string } = {}) {
  return resolvePeriod(type, { ...dates, audience, timeZone: env.TIMEZONE });
}

function earnedWithin(range: PeriodRange) {
  return { earnedDate: { $gte: range.start, $lt: range.end } };
}

async function sumAmount(filter: Record<string, unknown>): Promise<number> {
  const [result] = await TailorCommission.aggregate<{ total: number }>([
    { $match: filter },
    { $group: { _id: null, total: { $sum: '$commissionAmount' } } },
  ]);
  return roundMoney(result?.total ?? 0);
}

// ── Crediting ──

/**
 * Credit the tailor for a claimed order. Each task is credited at most once;
 * returns null when the task was already credited.
 */
export async function creditCommission(
  task: Pick<ITailoringTask, '_id'>,
  order: Pick<IOrder, '_id' | 'orderNumber' | 'garmentTypeId' | 'customerId' | 'totalPrice' | 'quantity'>,
  actorId: string,
) {
  const claimed = await TailoringTask.findOneAndUpdate(
    { _id: task._id, commissionPaid: false },
    { $set: { commissionPaid: true } },
    { new: true },
  );
  if (!claimed) return null;

  const [garment, customer] = await Promise.all([
    GarmentType.findById(order.garmentTypeId),
    Customer.findById(order.customerId),
  ]);

  const now = new Date();
  let commission: ITailorCommission;
  try {
    commission = await TailorCommission.create({
      commissionNumber: generateDocumentNumber('COM'),
      tailorId: claimed.tailorId,
      taskId: claimed._id,
      orderId: order._id,
      orderAmount: order.totalPrice,
      commissionRate: claimed.commissionRate,
      commissionAmount: claimed.commissionAmount,
      status: CommissionStatus.CREDITED,
      garmentType: garment?.name ?? 'Unknown',
      quantity: order.quantity,
      customerName: customer?.name ?? 'Unknown',
      earnedDate: now,
      creditedDate: now,
    });
  } catch (error) {
    await TailoringTask.updateOne({ _id: claimed._id }, { $set: { commissionPaid: false } });
    throw error;
  }

  await AuditLog.create({
    action: AuditAction.COMMISSION_CREDITED,
    actorId,
    targetType: 'commission',
    targetId: commission._id,
    details: {
      commissionNumber: commission.commissionNumber,
      orderNumber: order.orderNumber,
      tailorId: commission.tailorId,
      amount: commission.commissionAmount,
    },
  });

  await createAndSendNotification({
    ...commissionCredited(await taskContext(claimed), commission.commissionAmount),
    recipientId: claimed.tailorId,
    senderId: actorId,
  });

  logger.info(
    { commissionNumber: commission.commissionNumber, amount: commission.commissionAmount },
    'Commission credited',
  );
  return commission;
}

// ── Tailor views ──

export async function getCommissionDashboard(tailorId: string) {
  const week = period(CommissionPeriod.WEEKLY, 'tailor');
  const month = period(CommissionPeriod.MONTHLY, 'tailor');
  const own = { tailorId: new Types.ObjectId(tailorId) };

  const [totalEarned, totalTasks, weekTotal, monthTotal, recent, pendingTasks] = await Promise.all([
    sumAmount(own),
    TailorCommission.countDocuments(own),
    sumAmount({ ...own, ...earnedWithin(week) }),
    sumAmount({ ...own, ...earnedWithin(month) }),
    TailorCommission.find(own).sort({ earnedDate: -1 }).limit(20),
    TailoringTask.find({ tailorId, status: TaskStatus.APPROVED, commissionPaid: false }).populate(
      'orderId',
      'orderNumber status',
    ),
  ]);

  return {
    totalEarned,
    totalTasks,
    weekTotal,
    monthTotal,
    pendingAmount: roundMoney(pendingTasks.reduce((sum, t) => sum + t.commissionAmount, 0)),
    pendingTasks,
    recent,
  };
}

export async function listCommissionHistory(query: CommissionHistoryQuery, actor: Actor) {
  const filter: Record<string, unknown> = {};
  if (!actor.isAdmin) filter.tailorId = actor.id;
  else if (query.tailorId) filter.tailorId = query.tailorId;
  if (query.status) filter.status = query.status;
  if (query.startDate || query.endDate) {
    const range: Record<string, Date> = {};
    if (query.startDate) range.$gte = zonedDayStart(query.startDate, env.TIMEZONE);
    if (query.endDate) range.$lt = zonedDayEnd(query.endDate, env.TIMEZONE);
    filter.earnedDate = range;
  }

  const { skip, limit } = paginate(query.page, query.limit);
  const [items, total, rows] = await Promise.all([
    TailorCommission.find(filter)
      .populate('tailorId', TAILOR_FIELDS)
      .populate('orderId', 'orderNumber')
      .sort({ earnedDate: -1 })
      .skip(skip)
      .limit(limit),
    TailorCommission.countDocuments(filter),
    TailorCommission.find(filter).select('tailorId garmentType quantity orderAmount commissionAmount'),
  ]);

  return {
    items,
    summary: sumCommissions(rows),
    ...paginationMeta(query.page, query.limit, total),
  };
}

type ReportSource = Pick<
  ITailorCommission,
  | 'commissionNumber'
  | 'earnedDate'
  | 'garmentType'
  | 'customerName'
  | 'orderAmount'
  | 'commissionRate'
  | 'commissionAmount'
  | 'status'
>;

function toReportRow(commission: ReportSource, tailorName: string): CommissionReportRow {
  return {
    commissionNumber: commission.commissionNumber,
    earnedDate: commission.earnedDate,
    tailorName,
    garmentType: commission.garmentType,
    customerName: commission.customerName,
    orderAmount: commission.orderAmount,
    commissionRate: commission.commissionRate,
    commissionAmount: commission.commissionAmount,
    status: commission.status,
  };
}

/**
 * PDF data for one tailor's commissions. Admins may pick the tailor; tailors
 * always get their own.
 */
export async function buildTailorCommissionReport(query: TailorReportQuery, actor: Actor) {
  const tailorId = actor.isAdmin && query.tailorId ? query.tailorId : actor.id;
  const tailor = await User.findOne({ _id: tailorId, roles: Role.TAILOR });
  if (!tailor) throw AppError.notFound('Tailor not found');

  const range = period(query.type, 'tailor', query);
  const commissions = await TailorCommission.find({ tailorId: tailor._id, ...earnedWithin(range) }).sort({
    earnedDate: -1,
  });

  const name = fullName(tailor);
  const report: CommissionReportData = {
    shop: currentShop(),
    title: `Commission Report - ${name}`,
    periodLabel: range.label,
    rows: commissions.map((c) => toReportRow(c, name)),
    totals: sumCommissions(commissions),
  };
  return { report, filename: `commission_report_${tailor.username}_${range.startDay}_${range.endDay}.pdf` };
}

// ── Admin reports ──

async function commissionsWithin(range: PeriodRange) {
  return TailorCommission.find(earnedWithin(range))
    .populate<{ tailorId: IUser | null }>('tailorId', TAILOR_FIELDS)
    .sort({ earnedDate: -1 });
}

function tailorIdOf(tailor: IUser | null): Types.ObjectId | string {
  return tailor?._id ?? 'unknown';
}

export async function getAdminCommissionReport(query: AdminReportQuery) {
  const range = period(query.type, 'admin', query);
  const commissions = await commissionsWithin(range);

  const names = new Map(commissions.map((c) => [tailorIdOf(c.tailorId).toString(), c.tailorId ? fullName(c.tailorId) : 'Unknown']));
  const figures = commissions.map((c) => ({
    tailorId: tailorIdOf(c.tailorId),
    garmentType: c.garmentType,
    quantity: c.quantity,
    orderAmount: c.orderAmount,
    commissionAmount: c.commissionAmount,
  }));

  return {
    range,
    totals: sumCommissions(figures),
    tailors: breakdownByTailor(figures).map((t) => ({ ...t, tailorName: names.get(t.tailorId) ?? 'Unknown' })),
    recent: commissions.slice(0, 20),
    garments: breakdownByGarment(figures).slice(0, 10),
    rows: commissions.map((c) => toReportRow(c, names.get(tailorIdOf(c.tailorId).toString()) ?? 'Unknown')),
  };
}

export async function buildAdminCommissionReport(query: AdminReportQuery) {
  const report = await getAdminCommissionReport(query);
  const data: CommissionReportData = {
    shop: currentShop(),
    title: 'Commission Report',
    periodLabel: report.range.label,
    rows: report.rows,
    totals: report.totals,
    breakdown: report.tailors.map((t) => ({
      tailorName: t.tailorName,
      count: t.count,
      commissionAmount: t.commissionAmount,
    })),
  };
  return { report: data, filename: `commission_report_admin_${report.range.startDay}_${report.range.endDay}.pdf` };
}

/**
 * Quantity produced, revenue and commission per garment type, highest revenue first.
 */
export async function getGarmentProductionReport(query: AdminReportQuery) {
  const range = period(query.type, 'admin', query);
  const commissions = await TailorCommission.find(earnedWithin(range));
  const garments = breakdownByGarment(commissions, 'orderAmount');

  const pdf: TableReportData = {
    shop: currentShop(),
    title: 'Garment Production Report',
    summary: [
      ['Period', range.label],
      ['Garments Produced', String(garments.reduce((sum, g) => sum + g.quantity, 0))],
      ['Revenue', formatCurrency(roundMoney(garments.reduce((sum, g) => sum + g.orderAmount, 0)))],
    ],
    columns: [
      { header: 'Garment Type', width: 200 },
      { header: 'Quantity', width: 80 },
      { header: 'Revenue', width: 110 },
      { header: 'Commission', width: 105 },
    ],
    rows: garments.map((g) => [
      g.garmentType,
      String(g.quantity),
      formatCurrency(g.orderAmount),
      formatCurrency(g.commissionAmount),
    ]),
  };

  return { range, garments, pdf, filename: `garment_production_report_${range.startDay}_${range.endDay}.pdf` };
}

/**
 * Per tailor: commissioned tasks, average days from assignment to completion,
 * revenue handled and commission earned.
 */
export async function getTailorPerformanceReport(query: AdminReportQuery) {
  const range = period(query.type, 'admin', query);
  const [tailors, commissions, approvedTasks] = await Promise.all([
    User.find({ roles: Role.TAILOR }),
    TailorCommission.find(earnedWithin(range)),
    TailoringTask.find({ status: TaskStatus.APPROVED, approvedDate: { $gte: range.start, $lt: range.end } }),
  ]);

  const totals = new Map(breakdownByTailor(commissions).map((t) => [t.tailorId, t]));
  const performance = tailors
    .flatMap((tailor) => {
      const summary = totals.get(tailor._id.toString());
      if (!summary) return [];
      const tasks = approvedTasks.filter((t) => t.tailorId.equals(tailor._id));
      return [
        {
          tailorId: tailor._id,
          name: fullName(tailor),
          tasksCompleted: summary.count,
          averageCompletionDays: averageCompletionDays(tasks),
          revenue: summary.orderAmount,
          commission: summary.commissionAmount,
        },
      ];
    })
    .sort((a, b) => b.commission - a.commission);

  const pdf: TableReportData = {
    shop: currentShop(),
    title: 'Tailor Performance Report',
    summary: [
      ['Period', range.label],
      ['Tailors', String(performance.length)],
      ['Tasks Completed', String(performance.reduce((sum, p) => sum + p.tasksCompleted, 0))],
    ],
    columns: [
      { header: 'Tailor', width: 150 },
      { header: 'Tasks', width: 60 },
      { header: 'Avg. Time', width: 85 },
      { header: 'Revenue', width: 100 },
      { header: 'Commission', width: 100 },
    ],
    rows: performance.map((p) => [
      p.name,
      String(p.tasksCompleted),
      p.averageCompletionDays === null ? 'N/A' : `${p.averageCompletionDays.toFixed(1)} days`,
      formatCurrency(p.revenue),
      formatCurrency(p.commission),
    ]),
  };

  return { range, tailors: performance, pdf, filename: `tailor_performance_report_${range.startDay}_${range.endDay}.pdf` };
}

// ── Payout ──

export async function markCommissionsPaid(input: MarkPaidInput, actorId: string, ip?: string, ua?: string) {
  const paidDate = new Date();
  const update: Record<string, unknown> = { status: CommissionStatus.PAID, paidDate };
  if (input.notes) update.notes = input.notes;

  const result = await TailorCommission.updateMany(
    { _id: { $in: input.commissionIds }, status: CommissionStatus.CREDITED },
    { $set: update },
  );

  await AuditLog.create({
    action: AuditAction.COMMISSION_PAID,
    actorId,
    targetType: 'commission',
    details: { commissionIds: input.commissionIds, updated: result.modifiedCount },
    ipAddress: ip,
    userAgent: ua,
  });

  return { updated: result.modifiedCount, paidDate };
}
