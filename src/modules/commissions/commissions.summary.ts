import { differenceInDays } from 'date-fns';
import { roundMoney } from '../../utils/helpers.js';

export interface CommissionFigures {
  tailorId: { toString(): string };
  garmentType: string;
  quantity: number;
  orderAmount: number;
  commissionAmount: number;
}

export interface Totals {
  count: number;
  orderAmount: number;
  commissionAmount: number;
}

export interface TailorBreakdown extends Totals {
  tailorId: string;
}

export interface GarmentBreakdown extends Totals {
  garmentType: string;
  quantity: number;
}

export function sumCommissions(rows: readonly CommissionFigures[]): Totals {
  return rows.reduce<Totals>(
    (acc, row) => ({
      count: acc.count + 1,
      orderAmount: roundMoney(acc.orderAmount + row.orderAmount),
      commissionAmount: roundMoney(acc.commissionAmount + row.commissionAmount),
    }),
    { count: 0, orderAmount: 0, commissionAmount: 0 },
  );
}

/** Per-tailor totals, highest commission first. */
export function breakdownByTailor(rows: readonly CommissionFigures[]): TailorBreakdown[] {
  const groups = new Map<string, CommissionFigures[]>();
  for (const row of rows) {
    const key = row.tailorId.toString();
    groups.set(key, [...(groups.get(key) ?? []), row]);
  }
  return [...groups.entries()]
    .map(([tailorId, group]) => ({ tailorId, ...sumCommissions(group) }))
    .sort((a, b) => b.commissionAmount - a.commissionAmount);
}

/** Per-garment totals ordered by `sortBy`, descending. */
export function breakdownByGarment(
  rows: readonly CommissionFigures[],
  sortBy: 'commissionAmount' | 'orderAmount' = 'commissionAmount',
): GarmentBreakdown[] {
  const groups = new Map<string, CommissionFigures[]>();
  for (const row of rows) {
    groups.set(row.garmentType, [...(groups.get(row.garmentType) ?? []), row]);
  }
  return [...groups.entries()]
    .map(([garmentType, group]) => ({
      garmentType,
      quantity: group.reduce((sum, r) => sum + r.quantity, 0),
      ...sumCommissions(group),
    }))
    .sort((a, b) => b[sortBy] - a[sortBy]);
}

/**
 * Mean whole days from assignment to completion, to one decimal. Null when no
 * task has both dates.
 */
export function averageCompletionDays(tasks: readonly { assignedDate?: Date; completedDate?: Date }[]): number | null {
  const spans = tasks.flatMap((t) =>
    t.assignedDate && t.completedDate ? [differenceInDays(t.completedDate, t.assignedDate)] : [],
  );
  if (spans.length === 0) return null;
  return Math.round((spans.reduce((a, b) => a + b, 0) / spans.length) * 10) / 10;
}
