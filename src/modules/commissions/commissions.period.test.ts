import { describe, expect, it } from 'vitest';
import { CommissionPeriod } from '../../utils/constants.js';
import { recentDays, resolvePeriod, zonedDayEnd } from './commissions.period.js';

// Friday, March 6 2026 in Manila
const now = new Date('2026-03-05T20:30:00Z');
const base = { timeZone: 'Asia/Manila', now, audience: 'admin' as const };

describe('resolvePeriod', () => {
  it('starts the week on Monday in the shop time zone', () => {
    const range = resolvePeriod(CommissionPeriod.WEEKLY, base);

    expect(range.startDay).toBe('2026-03-02');
    expect(range.endDay).toBe('2026-03-06');
    expect(range.start.toISOString()).toBe('2026-03-01T16:00:00.000Z');
    expect(range.end.toISOString()).toBe('2026-03-06T16:00:00.000Z');
  });

  it('starts the month on the 1st', () => {
    const range = resolvePeriod(CommissionPeriod.MONTHLY, base);

    expect(range.startDay).toBe('2026-03-01');
    expect(range.start.toISOString()).toBe('2026-02-28T16:00:00.000Z');
    expect(range.label).toBe('March 1, 2026 - March 6, 2026');
  });

  it('starts the year on January 1', () => {
    const range = resolvePeriod(CommissionPeriod.YEARLY, base);

    expect(range.startDay).toBe('2026-01-01');
    expect(range.start.toISOString()).toBe('2025-12-31T16:00:00.000Z');
  });

  it('uses the given dates for a custom range', () => {
    const range = resolvePeriod(CommissionPeriod.CUSTOM, { ...base, startDate: '2026-02-01', endDate: '2026-02-10' });

    expect(range.startDay).toBe('2026-02-01');
    expect(range.endDay).toBe('2026-02-10');
    expect(range.end.toISOString()).toBe('2026-02-10T16:00:00.000Z');
    expect(range.label).toBe('February 1, 2026 - February 10, 2026');
  });

  it('falls back to the last 7 days for tailors and month-to-date for admins', () => {
    expect(resolvePeriod(CommissionPeriod.CUSTOM, { ...base, audience: 'tailor' }).startDay).toBe('2026-02-27');
    expect(resolvePeriod(CommissionPeriod.CUSTOM, base).startDay).toBe('2026-03-01');
  });

  it('rejects a range that ends before it starts', () => {
    expect(() =>
      resolvePeriod(CommissionPeriod.CUSTOM, { ...base, startDate: '2026-02-10', endDate: '2026-02-01' }),
    ).toThrow('Start date must be on or before end date');
  });
});

describe('recentDays', () => {
  it('lists the last days oldest first, ending on the shop date', () => {
    expect(recentDays(3, 'Asia/Manila', now)).toEqual(['2026-03-04', '2026-03-05', '2026-03-06']);
    expect(recentDays(2, 'UTC', now)).toEqual(['2026-03-04', '2026-03-05']);
  });

  it('rolls over month ends', () => {
    expect(recentDays(2, 'UTC', new Date('2026-03-01T05:00:00Z'))).toEqual(['2026-02-28', '2026-03-01']);
  });
});

describe('zonedDayEnd', () => {
  it('is the start of the following day in the zone', () => {
    expect(zonedDayEnd('2026-02-28', 'Asia/Manila').toISOString()).toBe('2026-02-28T16:00:00.000Z');
  });
});
