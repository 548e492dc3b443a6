import { describe, expect, it } from 'vitest';
import { orderStateMachine, taskStateMachine } from './stateMachine.js';
import { OrderStatus, TaskStatus } from './constants.js';
import { AppError, ErrorCode } from './appError.js';

describe('orderStateMachine', () => {
  it('allows valid transitions', () => {
    expect(orderStateMachine.canTransition(OrderStatus.PENDING, OrderStatus.IN_PROGRESS)).toBe(true);
    expect(orderStateMachine.canTransition(OrderStatus.COMPLETED, OrderStatus.DELIVERED)).toBe(true);
  });

  it('rejects skipping straight to delivered', () => {
    expect(orderStateMachine.canTransition(OrderStatus.PENDING, OrderStatus.DELIVERED)).toBe(false);
  });

  it('does not allow cancelling a completed order', () => {
    expect(orderStateMachine.getAllowed(OrderStatus.COMPLETED)).toEqual([OrderStatus.DELIVERED]);
  });
});

describe('taskStateMachine', () => {
  it('walks assigned → in_progress → completed → approved', () => {
    expect(taskStateMachine.canTransition(TaskStatus.ASSIGNED, TaskStatus.IN_PROGRESS)).toBe(true);
    expect(taskStateMachine.canTransition(TaskStatus.IN_PROGRESS, TaskStatus.COMPLETED)).toBe(true);
    expect(taskStateMachine.canTransition(TaskStatus.COMPLETED, TaskStatus.APPROVED)).toBe(true);
    expect(taskStateMachine.getAllowed(TaskStatus.APPROVED)).toEqual([]);
  });

  it('throws AppError with INVALID_TRANSITION on invalid assertTransition', () => {
    try {
      taskStateMachine.assertTransition(TaskStatus.ASSIGNED, TaskStatus.APPROVED);
      throw new Error('Expected transition assertion to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(AppError);
      const appError = error as AppError;
      expect(appError.code).toBe(ErrorCode.INVALID_TRANSITION);
      expect(appError.details).toEqual({
        from: TaskStatus.ASSIGNED,
        to: TaskStatus.APPROVED,
        allowed: [TaskStatus.IN_PROGRESS],
      });
    }
  });
});
