import {
  AuditLog,
  Customer,
  GarmentType,
  Order,
  TailoringTask,
  User,
  fullName,
  type ICustomer,
  type IGarmentType,
  type IOrder,
  type ITailoringTask,
} from '../../models/index.js';
import { env } from '../../config/env.js';
import type { Actor } from '../../middleware/auth.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import { AuditAction, OrderStatus, Role, TaskStatus } from '../../utils/constants.js';
import { paginate, paginationMeta } from '../../utils/helpers.js';
import { logger } from '../../utils/logger.js';
import { orderStateMachine, taskStateMachine } from '../../utils/stateMachine.js';
import { createAndSendNotification, notifyRole } from '../notifications/socket.service.js';
import { sendReadyForPickupSms } from '../notifications/sms.service.js';
import { computeCommission, hasMetDeposit, requiredDeposit } from '../orders/orders.pricing.js';
import { getPaymentSummary } from '../payments/payments.service.js';
import { listTailors } from '../users/users.service.js';
import { taskApproved, taskAssigned, taskCompleted, taskStarted, type TaskContext } from './tasks.notifications.js';
import type { AssignTaskInput, ListTasksQuery, UpdateTaskNotesInput, UpdateTaskStatusInput } from './tasks.validation.js';
import { Types } from 'mongoose';

async function findActiveTailor(tailorId: Types.ObjectId | string) {
  return User.findOne({ _id: tailorId, roles: Role.TAILOR, isActive: true });
}

export async function taskContext(task: ITailoringTask): Promise<TaskContext> {
  const [order, tailor] = await Promise.all([
    Order.findById(task.orderId).populate<{ customerId: ICustomer | null; garmentTypeId: IGarmentType | null }>([
      'customerId',
      'garmentTypeId',
    ]),
    User.findById(task.tailorId),
  ]);
  return {
    taskId: task._id,
    orderId: task.orderId,
    orderNumber: order?.orderNumber ?? '',
    customerName: order?.customerId?.name ?? '',
    garmentName: order?.garmentTypeId?.name ?? '',
    tailorName: tailor ? fullName(tailor) : '',
  };
}

function assertTaskAccess(task: ITailoringTask, actor: Actor) {
  if (!actor.isAdmin && task.tailorId.toString() !== actor.id) {
    throw AppError.forbidden('You can only access your own tasks');
  }
}

async function getTaskDocument(taskId: string, actor: Actor) {
  const task = await TailoringTask.findById(taskId);
  if (!task) throw AppError.notFound('Task not found');
  assertTaskAccess(task, actor);
  return task;
}

// ── Assignment ──

/**
 * The garment's default tailor when active, otherwise the active tailor with the
 * fewest open tasks. Null when the shop has no active tailor.
 */
export async function pickTailor(garment: Pick<IGarmentType, 'defaultTailorId'>) {
  if (garment.defaultTailorId) {
    const preferred = await findActiveTailor(garment.defaultTailorId);
    if (preferred) return preferred._id;
  }
  const [leastBusy] = await listTailors();
  return leastBusy ? leastBusy.id : null;
}

/**
 * Create the order's task for a tailor and tell them about it.
 */
export async function createTaskForOrder(
  order: Pick<IOrder, '_id' | 'totalPrice'>,
  tailorId: Types.ObjectId | string,
  actorId: string,
) {
  const commissionRate = env.DEFAULT_COMMISSION_RATE;
  const task = await TailoringTask.create({
    orderId: order._id,
    tailorId,
    status: TaskStatus.ASSIGNED,
    commissionRate,
    commissionAmount: computeCommission(order.totalPrice, commissionRate),
  });

  await createAndSendNotification({
    ...taskAssigned(await taskContext(task)),
    recipientId: task.tailorId,
    senderId: actorId,
  });

  return task;
}

export async function assignTask(input: AssignTaskInput, actorId: string, ip?: string, ua?: string) {
  const order = await Order.findById(input.orderId);
  if (!order) throw AppError.notFound('Order not found');
  if (order.status === OrderStatus.CANCELLED || order.status === OrderStatus.DELIVERED) {
    throw AppError.badRequest(`Cannot assign a tailor to a ${order.status} order`, ErrorCode.ORDER_LOCKED);
  }

  const tailor = await findActiveTailor(input.tailorId);
  if (!tailor) throw AppError.notFound('Tailor not found');

  let task = await TailoringTask.findOne({ orderId: order._id });
  const reassigned = task !== null;

  if (task) {
    if (task.status === TaskStatus.APPROVED) {
      throw AppError.badRequest('An approved task cannot be reassigned', ErrorCode.INVALID_TRANSITION);
    }
    task.tailorId = tailor._id;
    task.status = TaskStatus.ASSIGNED;
    task.assignedDate = new Date();
    task.startedDate = undefined;
    task.completedDate = undefined;
    await task.save();

    await createAndSendNotification({
      ...taskAssigned(await taskContext(task)),
      recipientId: tailor._id,
      senderId: actorId,
    });
  } else {
    task = await createTaskForOrder(order, tailor._id, actorId);
  }

  await AuditLog.create({
    action: AuditAction.TASK_ASSIGNED,
    actorId,
    targetType: 'task',
    targetId: task._id,
    details: { orderNumber: order.orderNumber, tailorId: tailor._id, reassigned },
    ipAddress: ip,
    userAgent: ua,
  });

  return task;
}

/**
 * Keep an unpaid task's commission in line with the order total.
 */
export async function syncTaskCommission(orderId: Types.ObjectId, totalPrice: number): Promise<void> {
  const task = await TailoringTask.findOne({ orderId });
  if (!task || task.commissionPaid) return;
  task.commissionAmount = computeCommission(totalPrice, task.commissionRate);
  await task.save();
}

// ── Queries ──

export async function listTasks(query: ListTasksQuery, actor: Actor) {
  const filter: Record<string, unknown> = {};
  if (!actor.isAdmin) filter.tailorId = actor.id;
  else if (query.tailorId) filter.tailorId = query.tailorId;
  if (query.status) filter.status = query.status;

  const { skip, limit } = paginate(query.page, query.limit);
  const [items, total] = await Promise.all([
    TailoringTask.find(filter)
      .populate({
        path: 'orderId',
        select: 'orderNumber status dueDate quantity customerId garmentTypeId',
        populate: [
          { path: 'customerId', select: 'name' },
          { path: 'garmentTypeId', select: 'name' },
        ],
      })
      .populate('tailorId', 'username firstName lastName')
      .sort({ createdAt: -1 })
      .skip(skip)
      .limit(limit),
    TailoringTask.countDocuments(filter),
  ]);

  return { items, ...paginationMeta(query.page, query.limit, total) };
}

export async function getTask(taskId: string, actor: Actor) {
  const task = await getTaskDocument(taskId, actor);

  const populated = await TailoringTask.findById(task._id)
    .populate({
      path: 'orderId',
      populate: [{ path: 'customerId' }, { path: 'garmentTypeId' }, { path: 'fabricId' }],
    })
    .populate('tailorId', 'username firstName lastName phone')
    .populate('approvedBy', 'username firstName lastName');

  const order = await Order.findById(task.orderId);
  const paymentSummary = order ? (await getPaymentSummary(order)).summary : null;

  return { task: populated, paymentSummary };
}

export async function updateTaskNotes(taskId: string, input: UpdateTaskNotesInput, actor: Actor) {
  const task = await getTaskDocument(taskId, actor);
  task.notes = input.notes;
  await task.save();
  return task;
}

// ── Status ──

export async function updateTaskStatus(
  taskId: string,
  input: UpdateTaskStatusInput,
  actor: Actor,
  ip?: string,
  ua?: string,
) {
  const task = await getTaskDocument(taskId, actor);

  const order = await Order.findById(task.orderId);
  if (!order) throw AppError.notFound('Order not found');
  if (order.status === OrderStatus.CANCELLED) {
    throw AppError.badRequest('The order for this task was cancelled', ErrorCode.ORDER_LOCKED);
  }

  const previous = task.status;
  taskStateMachine.assertTransition(previous, input.status);

  if (input.status === TaskStatus.IN_PROGRESS) {
    const { summary } = await getPaymentSummary(order);
    if (!hasMetDeposit(order.totalPrice, summary.totalPaid, env.DEPOSIT_PERCENTAGE)) {
      throw AppError.badRequest(
        'Work cannot start until the customer has paid the deposit',
        ErrorCode.DEPOSIT_REQUIRED,
        {
          required: requiredDeposit(order.totalPrice, env.DEPOSIT_PERCENTAGE),
          received: summary.totalPaid,
        },
      );
    }

    task.startedDate = new Date();
    if (order.status === OrderStatus.PENDING) {
      orderStateMachine.assertTransition(order.status, OrderStatus.IN_PROGRESS);
      order.status = OrderStatus.IN_PROGRESS;
      await order.save();
    }
  } else {
    task.completedDate = new Date();
  }

  task.status = input.status;
  if (input.notes !== undefined) task.notes = input.notes;
  await task.save();

  await AuditLog.create({
    action: AuditAction.TASK_STATUS_CHANGED,
    actorId: actor.id,
    targetType: 'task',
    targetId: task._id,
    details: { orderNumber: order.orderNumber, from: previous, to: task.status },
    ipAddress: ip,
    userAgent: ua,
  });

  const ctx = await taskContext(task);
  const notification = task.status === TaskStatus.IN_PROGRESS ? taskStarted(ctx) : taskCompleted(ctx);
  await notifyRole(Role.ADMIN, { ...notification, senderId: actor.id });

  return task;
}

/**
 * Admin sign-off on finished work: the order becomes ready for pickup and the
 * customer gets an SMS. A failed SMS is recorded and reported, never raised.
 */
export async function approveTask(taskId: string, actorId: string, ip?: string, ua?: string) {
  const task = await TailoringTask.findById(taskId);
  if (!task) throw AppError.notFound('Task not found');
  if (task.status !== TaskStatus.COMPLETED) {
    throw AppError.badRequest('Only completed tasks can be approved', ErrorCode.INVALID_TRANSITION, {
      from: task.status,
      to: TaskStatus.APPROVED,
    });
  }

  const order = await Order.findById(task.orderId);
  if (!order) throw AppError.notFound('Order not found');
  orderStateMachine.assertTransition(order.status, OrderStatus.COMPLETED);

  const now = new Date();
  task.status = TaskStatus.APPROVED;
  task.approvedDate = now;
  task.approvedBy = new Types.ObjectId(actorId);
  await task.save();

  order.status = OrderStatus.COMPLETED;
  order.completedDate = now;
  await order.save();

  await AuditLog.create({
    action: AuditAction.TASK_APPROVED,
    actorId,
    targetType: 'task',
    targetId: task._id,
    details: { orderNumber: order.orderNumber },
    ipAddress: ip,
    userAgent: ua,
  });

  const ctx = await taskContext(task);
  await createAndSendNotification({ ...taskApproved(ctx), recipientId: task.tailorId, senderId: actorId });

  const smsSent = await notifyCustomerReady(order, ctx);
  return { task, smsSent };
}

async function notifyCustomerReady(order: IOrder, ctx: TaskContext): Promise<boolean> {
  try {
    const customer = await Customer.findById(order.customerId);
    if (!customer) return false;
    const garment = await GarmentType.findById(order.garmentTypeId);
    const { summary } = await getPaymentSummary(order);

    const result = await sendReadyForPickupSms(customer, order._id, {
      customerName: customer.name,
      garmentName: garment?.name ?? ctx.garmentName,
      orderNumber: order.orderNumber,
      remainingBalance: summary.remainingBalance,
    });
    return result.sent;
  } catch (error) {
    logger.error({ orderNumber: order.orderNumber, err: error }, 'Ready-for-pickup SMS failed');
    return false;
  }
}
