import { InvalidArgumentFailure, fail, ok, type Result } from '@/domain/models/Failure';
import type { Interval, Period } from '@/domain/models/MarketData';

const MINUTES_PER_DAY = 24 * 60;

const INTERVAL_MINUTES: Record<Interval, number> = {
  '1min': 1,
  '5min': 5,
  '15min': 15,
  '30min': 30,
  '60min': 60,
};

/**
 * 1 観測あたりの時間幅を年単位で返す（年率換算用）。
 * 日足 1/365、週足 1/52、月足 1/12、日中足は 分 / (24 * 60)。
 */
export function computeTimeStep(period: Period, interval?: Interval): Result<number, InvalidArgumentFailure> {
  switch (period) {
    case 'daily':
      return ok(1 / 365);
    case 'weekly':
      return ok(1 / 52);
    case 'monthly':
      return ok(1 / 12);
    case 'intraday':
      if (!interval) {
        return fail(new InvalidArgumentFailure('interval is required for intraday data'));
      }
      return ok(INTERVAL_MINUTES[interval] / MINUTES_PER_DAY);
  }
}
