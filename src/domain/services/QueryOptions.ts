import { InvalidArgumentFailure, fail, ok, type Result } from '@/domain/models/Failure';
import { INTERVALS, type Interval, PERIODS, type Period } from '@/domain/models/MarketData';

/**
 * 文字列を Period に変換する。設定ファイルや環境変数など、型のない入力の検証に使う。
 */
export function parsePeriod(text: string): Result<Period, InvalidArgumentFailure> {
  const value = text.trim().toLowerCase();
  const period = PERIODS.find((candidate) => candidate === value);
  if (!period) {
    return fail(new InvalidArgumentFailure(`period must be one of ${PERIODS.join(', ')} (got "${text}")`));
  }
  return ok(period);
}

/**
 * 文字列を Interval に変換する。
 */
export function parseInterval(text: string): Result<Interval, InvalidArgumentFailure> {
  const value = text.trim().toLowerCase();
  const interval = INTERVALS.find((candidate) => candidate === value);
  if (!interval) {
    return fail(new InvalidArgumentFailure(`interval must be one of ${INTERVALS.join(', ')} (got "${text}")`));
  }
  return ok(interval);
}

/**
 * 型のない呼び出し元から来た period を検証する。
 */
export function resolvePeriod(period: unknown): Result<Period, InvalidArgumentFailure> {
  const known = PERIODS.find((candidate) => candidate === period);
  if (!known) {
    return fail(new InvalidArgumentFailure(`period must be one of ${PERIODS.join(', ')}`));
  }
  return ok(known);
}

/**
 * 日中足なら interval を必須とし、それ以外では interval を捨てる。
 * @returns リクエストに載せるべき interval（日中足以外は undefined）
 */
export function resolveInterval(
  period: Period,
  interval: unknown
): Result<Interval | undefined, InvalidArgumentFailure> {
  if (period !== 'intraday') {
    return ok(undefined);
  }
  if (interval === undefined || interval === null) {
    return fail(new InvalidArgumentFailure('interval is required for intraday data'));
  }
  const known = INTERVALS.find((candidate) => candidate === interval);
  if (!known) {
    return fail(new InvalidArgumentFailure(`interval must be one of ${INTERVALS.join(', ')} for intraday data`));
  }
  return ok(known);
}
