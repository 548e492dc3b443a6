import { OrderStatus, TaskStatus } from './constants.js';
import { AppError, ErrorCode } from './appError.js';

// ── Generic State Machine Type ──
type TransitionMap<T extends string> = Record<T, T[]>;

function createStateMachine<T extends string>(transitions: TransitionMap<T>) {
  return {
    canTransition(from: T, to: T): boolean {
      return transitions[from]?.includes(to) ?? false;
    },
    assertTransition(from: T, to: T): void {
      if (!this.canTransition(from, to)) {
        throw AppError.badRequest(
          `Invalid status transition: ${from} → ${to}`,
          ErrorCode.INVALID_TRANSITION,
          { from, to, allowed: transitions[from] || [] },
        );
      }
    },
    getAllowed(from: T): T[] {
      return transitions[from] || [];
    },
  };
}

// ── Order State Machine ──
export const orderStateMachine = createStateMachine<OrderStatus>({
  [OrderStatus.PENDING]: [OrderStatus.IN_PROGRESS, OrderStatus.CANCELLED],
  [OrderStatus.IN_PROGRESS]: [OrderStatus.COMPLETED, OrderStatus.CANCELLED],
  [OrderStatus.COMPLETED]: [OrderStatus.DELIVERED],
  [OrderStatus.DELIVERED]: [],
  [OrderStatus.CANCELLED]: [],
});

// ── Tailoring Task State Machine ──
export const taskStateMachine = createStateMachine<TaskStatus>({
  [TaskStatus.ASSIGNED]: [TaskStatus.IN_PROGRESS],
  [TaskStatus.IN_PROGRESS]: [TaskStatus.COMPLETED],
  [TaskStatus.COMPLETED]: [TaskStatus.APPROVED],
  [TaskStatus.APPROVED]: [],
});
