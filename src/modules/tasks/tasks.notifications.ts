import { NotificationPriority, NotificationType } from '../../utils/constants.js';
import { formatCurrency } from '../../utils/helpers.js';
import type { NotificationInput } from '../notifications/socket.service.js';
import type { Types } from 'mongoose';

export interface TaskContext {
  taskId: Types.ObjectId;
  orderId: Types.ObjectId;
  orderNumber: string;
  customerName: string;
  garmentName: string;
  tailorName: string;
}

type TaskNotification = Omit<NotificationInput, 'recipientId'>;

function base(ctx: TaskContext): Pick<TaskNotification, 'orderId' | 'taskId' | 'actionUrl'> {
  return { orderId: ctx.orderId, taskId: ctx.taskId, actionUrl: `/tasks/${ctx.taskId.toString()}` };
}

export function taskAssigned(ctx: TaskContext): TaskNotification {
  return {
    ...base(ctx),
    type: NotificationType.TASK_ASSIGNED,
    title: 'New Task Assigned',
    message:
      `You have been assigned a new task for order ${ctx.orderNumber}. ` +
      `Customer: ${ctx.customerName}. Garment: ${ctx.garmentName}.`,
    priority: NotificationPriority.HIGH,
  };
}

export function taskStarted(ctx: TaskContext): TaskNotification {
  return {
    ...base(ctx),
    type: NotificationType.TASK_STARTED,
    title: 'Task Started',
    message: `Task for order ${ctx.orderNumber} has been started by ${ctx.tailorName}.`,
    priority: NotificationPriority.NORMAL,
  };
}

export function taskCompleted(ctx: TaskContext): TaskNotification {
  return {
    ...base(ctx),
    type: NotificationType.TASK_COMPLETED,
    title: 'Task Completed - Ready for Order Completion',
    message:
      `Task for order ${ctx.orderNumber} has been marked as completed by ${ctx.tailorName}. ` +
      `Customer: ${ctx.customerName}. Garment: ${ctx.garmentName}. Please complete the order.`,
    priority: NotificationPriority.HIGH,
  };
}

export function taskApproved(ctx: TaskContext): TaskNotification {
  return {
    ...base(ctx),
    type: NotificationType.TASK_APPROVED,
    title: 'Order Completed',
    message: `Your task for order ${ctx.orderNumber} has been approved. The order is now complete.`,
    priority: NotificationPriority.NORMAL,
  };
}

export function commissionCredited(ctx: TaskContext, amount: number): TaskNotification {
  return {
    orderId: ctx.orderId,
    taskId: ctx.taskId,
    actionUrl: '/commissions',
    type: NotificationType.COMMISSION_CREDITED,
    title: 'Commission Credited',
    message: `You earned a commission of ${formatCurrency(amount)} for completing order ${ctx.orderNumber}. Great job!`,
    priority: NotificationPriority.NORMAL,
  };
}
