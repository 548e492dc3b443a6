import { describe, expect, it } from 'vitest';
import { Types } from 'mongoose';
import { commissionCredited, taskApproved, taskAssigned, taskCompleted, taskStarted } from './tasks.notifications.js';

const taskId = new Types.ObjectId('65f000000000000000000001');
const orderId = new Types.ObjectId('65f000000000000000000002');

const ctx = {
  taskId,
  orderId,
  orderNumber: 'ORD-1A2B3C4D',
  customerName: 'Ana Cruz',
  garmentName: 'Barong Tagalog',
  tailorName: 'Mario Santos',
};

describe('task notifications', () => {
  it('tells the tailor about a new assignment', () => {
    const n = taskAssigned(ctx);
    expect(n.title).toBe('New Task Assigned');
    expect(n.message).toBe(
      'You have been assigned a new task for order ORD-1A2B3C4D. Customer: Ana Cruz. Garment: Barong Tagalog.',
    );
    expect(n.priority).toBe('high');
    expect(n.actionUrl).toBe('/tasks/65f000000000000000000001');
    expect(n.orderId).toBe(orderId);
  });

  it('names the tailor when work starts', () => {
    expect(taskStarted(ctx).message).toBe('Task for order ORD-1A2B3C4D has been started by Mario Santos.');
  });

  it('asks admins to complete the order once the task is done', () => {
    const n = taskCompleted(ctx);
    expect(n.title).toBe('Task Completed - Ready for Order Completion');
    expect(n.type).toBe('task_completed');
    expect(n.message).toBe(
      'Task for order ORD-1A2B3C4D has been marked as completed by Mario Santos. ' +
        'Customer: Ana Cruz. Garment: Barong Tagalog. Please complete the order.',
    );
  });

  it('confirms approval to the tailor', () => {
    expect(taskApproved(ctx).message).toBe(
      'Your task for order ORD-1A2B3C4D has been approved. The order is now complete.',
    );
  });

  it('reports the credited commission in pesos', () => {
    const n = commissionCredited(ctx, 150);
    expect(n.message).toBe('You earned a commission of ₱150.00 for completing order ORD-1A2B3C4D. Great job!');
    expect(n.actionUrl).toBe('/commissions');
  });
});
