import { Customer, Order, Payment, TailoringTask } from '../../models/index.js';
import { env } from '../../config/env.js';
import { OrderStatus, PaymentStatus, TaskStatus, OPEN_TASK_STATUSES } from '../../utils/constants.js';
import { roundMoney } from '../../utils/helpers.js';
import { recentDays, zonedDayEnd, zonedDayStart } from '../commissions/commissions.period.js';
import { getLowStock } from '../inventory/inventory.service.js';
import type { Types } from 'mongoose';

async function revenueSince(since?: Date): Promise<number> {
  const match: Record<string, unknown> = { status: PaymentStatus.COMPLETED };
  if (since) match.paymentDate = { $gte: since };

  const [result] = await Payment.aggregate<{ total: number }>([
    { $match: match },
    { $group: { _id: null, total: { $sum: '$amount' } } },
  ]);
  return roundMoney(result?.total ?? 0);
}

// ── Dashboards ──

export async function getAdminDashboard() {
  const [today] = recentDays(1, env.TIMEZONE);
  const todayStart = zonedDayStart(today, env.TIMEZONE);
  const todayRange = { $gte: todayStart, $lt: zonedDayEnd(today, env.TIMEZONE) };

  const [
    totalCustomers,
    totalOrders,
    ordersByStatus,
    todayOrders,
    openTasks,
    awaitingApproval,
    totalRevenue,
    todayRevenue,
    recentOrders,
    lowStock,
    pendingApprovals,
  ] = await Promise.all([
    Customer.countDocuments(),
    Order.countDocuments(),
    Order.aggregate<{ _id: OrderStatus; count: number }>([{ $group: { _id: '$status', count: { $sum: 1 } } }]),
    Order.countDocuments({ orderDate: todayRange }),
    TailoringTask.countDocuments({ status: { $in: [...OPEN_TASK_STATUSES] } }),
    TailoringTask.countDocuments({ status: TaskStatus.COMPLETED }),
    revenueSince(),
    revenueSince(todayStart),
    Order.find()
      .populate('customerId', 'name')
      .populate('garmentTypeId', 'name')
      .populate('fabricId', 'name color')
      .sort({ createdAt: -1 })
      .limit(10),
    getLowStock(),
    TailoringTask.find({ status: TaskStatus.COMPLETED })
      .populate({ path: 'orderId', select: 'orderNumber customerId', populate: { path: 'customerId', select: 'name' } })
      .populate('tailorId', 'username firstName lastName')
      .sort({ completedDate: 1 })
      .limit(5),
  ]);

  const statusCounts = Object.fromEntries(Object.values(OrderStatus).map((status) => [status, 0]));
  for (const row of ordersByStatus) statusCounts[row._id] = row.count;

  return {
    stats: {
      totalCustomers,
      totalOrders,
      ordersByStatus: statusCounts,
      todayOrders,
      openTasks,
      awaitingApproval,
      totalRevenue,
      todayRevenue,
    },
    recentOrders,
    lowStock,
    pendingApprovals,
  };
}

export async function getTailorDashboard(tailorId: string) {
  const [tasks, completedTasks] = await Promise.all([
    TailoringTask.find({ tailorId, status: { $ne: TaskStatus.APPROVED } })
      .populate({
        path: 'orderId',
        select: 'orderNumber status dueDate quantity customerId garmentTypeId fabricId',
        populate: [
          { path: 'customerId', select: 'name' },
          { path: 'garmentTypeId', select: 'name' },
          { path: 'fabricId', select: 'name color' },
        ],
      })
      .sort({ createdAt: -1 }),
    TailoringTask.countDocuments({ tailorId, status: TaskStatus.APPROVED }),
  ]);

  return {
    tasks,
    completedTasks,
    assignedCount: tasks.filter((t) => t.status === TaskStatus.ASSIGNED).length,
    inProgressCount: tasks.filter((t) => t.status === TaskStatus.IN_PROGRESS).length,
    awaitingApprovalCount: tasks.filter((t) => t.status === TaskStatus.COMPLETED).length,
  };
}

// ── Sales report ──

export async function getSalesReport() {
  const days = recentDays(7, env.TIMEZONE);
  const [today] = recentDays(1, env.TIMEZONE);
  const monthAgo = recentDays(30, env.TIMEZONE)[0];

  const [perDay, totalRevenue, monthlyRevenue, weeklyRevenue, popularGarments, topCustomers] = await Promise.all([
    Order.aggregate<{ _id: string; count: number }>([
      { $match: { orderDate: { $gte: zonedDayStart(days[0], env.TIMEZONE) } } },
      {
        $group: {
          _id: { $dateToString: { format: '%Y-%m-%d', date: '$orderDate', timezone: env.TIMEZONE } },
          count: { $sum: 1 },
        },
      },
    ]),
    revenueSince(),
    revenueSince(zonedDayStart(monthAgo, env.TIMEZONE)),
    revenueSince(zonedDayStart(days[0], env.TIMEZONE)),
    Order.aggregate<{ _id: Types.ObjectId; name: string; orderCount: number }>([
      { $group: { _id: '$garmentTypeId', orderCount: { $sum: 1 } } },
      { $sort: { orderCount: -1 } },
      { $limit: 5 },
      { $lookup: { from: 'garmenttypes', localField: '_id', foreignField: '_id', as: 'garment' } },
      { $unwind: '$garment' },
      { $project: { _id: 1, name: '$garment.name', orderCount: 1 } },
    ]),
    Order.aggregate<{ _id: Types.ObjectId; name: string; orderCount: number; totalSpent: number }>([
      { $group: { _id: '$customerId', orderCount: { $sum: 1 }, totalSpent: { $sum: '$totalPrice' } } },
      { $sort: { totalSpent: -1 } },
      { $limit: 10 },
      { $lookup: { from: 'customers', localField: '_id', foreignField: '_id', as: 'customer' } },
      { $unwind: '$customer' },
      { $project: { _id: 1, name: '$customer.name', orderCount: 1, totalSpent: 1 } },
    ]),
  ]);

  const counts = new Map(perDay.map((row) => [row._id, row.count]));

  return {
    today,
    dailyOrders: days.map((date) => ({ date, count: counts.get(date) ?? 0 })),
    revenue: { total: totalRevenue, last30Days: monthlyRevenue, last7Days: weeklyRevenue },
    popularGarments,
    topCustomers: topCustomers.map((c) => ({ ...c, totalSpent: roundMoney(c.totalSpent) })),
  };
}
