import type { ResponseNormalizer } from '@/application/interfaces/ResponseNormalizer';
import { MalformedResponseFailure, type Result, fail, ok } from '@/domain/models/Failure';
import type { AssetClass, PricePoint, PriceSeries, Query, RawPayload } from '@/domain/models/MarketData';
import {
  ADJUSTED_CLOSE_FIELDS,
  CLOSE_FIELDS,
  META_DATA_KEY,
  PROVIDER_MESSAGE_KEYS,
  TIME_SERIES_KEY_FRAGMENT,
} from './types/AlphaVantageRawPayload';

/** `YYYY-MM-DD` または `YYYY-MM-DD HH:MM[:SS]` */
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * インフラ層: Alpha Vantage レスポンスの正規化
 *
 * 責務: 生 JSON → PriceSeries への変換。
 * - 時系列ブロックは「キー名に 'Time Series' を含む唯一のトップレベルキー」で探す
 * - 暗号資産は終値、株式は adjusted かつ日中足以外なら調整後終値、それ以外は終値を使う
 * - パースできない行は捨てずに失敗として返す
 * - 結果はタイムスタンプ昇順（プロバイダは降順で返す）
 */
export class AlphaVantageResponseNormalizer implements ResponseNormalizer {
  normalize(payload: RawPayload, query: Query, assetClass: AssetClass): Result<PriceSeries, MalformedResponseFailure> {
    if (!isRecord(payload)) {
      return fail(new MalformedResponseFailure(`Response for ${query.symbol} is not a JSON object`));
    }

    const blockKey = this.findTimeSeriesKey(payload, query.symbol);
    if (!blockKey.ok) {
      return blockKey;
    }

    const block = payload[blockKey.value];
    if (!isRecord(block)) {
      return fail(new MalformedResponseFailure(`"${blockKey.value}" for ${query.symbol} is not an object`));
    }

    const fields = this.priceFields(query, assetClass);
    const points: PricePoint[] = [];
    const seen = new Set<number>();

    for (const [stamp, row] of Object.entries(block)) {
      const timestamp = parseTimestamp(stamp);
      if (!timestamp) {
        return fail(new MalformedResponseFailure(`Unparseable timestamp "${stamp}" for ${query.symbol}`));
      }
      if (seen.has(timestamp.getTime())) {
        return fail(new MalformedResponseFailure(`Duplicate timestamp "${stamp}" for ${query.symbol}`));
      }
      seen.add(timestamp.getTime());

      const value = readPrice(row, fields);
      if (value === null) {
        return fail(
          new MalformedResponseFailure(`Row "${stamp}" for ${query.symbol} has no numeric ${fields[0]} field`)
        );
      }
      points.push(Object.freeze({ timestamp, value }));
    }

    points.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

    return ok(
      Object.freeze({
        symbol: query.symbol,
        assetClass,
        timeZone: assetClass === 'crypto' ? 'UTC' : this.declaredTimeZone(payload),
        points: Object.freeze(points),
      })
    );
  }

  /**
   * 'Time Series' を含むキーがちょうど 1 つであることを確認して返す。
   * 見つからない場合、プロバイダのエラーメッセージがあれば失敗に含める。
   */
  private findTimeSeriesKey(payload: Record<string, unknown>, symbol: string): Result<string, MalformedResponseFailure> {
    const keys = Object.keys(payload).filter((key) => key.includes(TIME_SERIES_KEY_FRAGMENT));

    if (keys.length === 1 && keys[0] !== undefined) {
      return ok(keys[0]);
    }
    if (keys.length > 1) {
      return fail(new MalformedResponseFailure(`Ambiguous time series blocks for ${symbol}: ${keys.join(', ')}`));
    }

    const messageKey = PROVIDER_MESSAGE_KEYS.find((key) => typeof payload[key] === 'string');
    const providerMessage = messageKey ? String(payload[messageKey]) : null;
    return fail(new MalformedResponseFailure(`No time series block in response for ${symbol}`, providerMessage));
  }

  private priceFields(query: Query, assetClass: AssetClass): readonly string[] {
    if (assetClass === 'equity' && query.adjusted && query.period !== 'intraday') {
      return ADJUSTED_CLOSE_FIELDS;
    }
    return CLOSE_FIELDS;
  }

  /**
   * `Meta Data` の `... Time Zone` を読む（例: "US/Eastern"）。
   */
  private declaredTimeZone(payload: Record<string, unknown>): string | null {
    const meta = payload[META_DATA_KEY];
    if (!isRecord(meta)) {
      return null;
    }
    const entry = Object.entries(meta).find(([key]) => key.endsWith('Time Zone'));
    return entry && typeof entry[1] === 'string' ? entry[1] : null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * タイムスタンプ文字列を Date に変換する。
 * タイムゾーン表記を持たないため、壁時計の値をそのまま UTC フィールドに入れる。
 * @returns 変換できない、または存在しない日時の場合は null
 */
function parseTimestamp(text: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day, hour = '0', minute = '0', second = '0'] = match;
  const parts = [year, month, day, hour, minute, second].map(Number);
  const [y = 0, mo = 1, d = 1, h = 0, mi = 0, s = 0] = parts;
  const date = new Date(Date.UTC(y, mo - 1, d, h, mi, s));

  // 2024-02-30 のような繰り上がりを弾く
  if (
    date.getUTCFullYear() !== y ||
    date.getUTCMonth() !== mo - 1 ||
    date.getUTCDate() !== d ||
    date.getUTCHours() !== h ||
    date.getUTCMinutes() !== mi ||
    date.getUTCSeconds() !== s
  ) {
    return null;
  }
  return date;
}

/**
 * 行から最初に見つかった価格フィールドを数値として読む。
 */
function readPrice(row: unknown, fields: readonly string[]): number | null {
  if (!isRecord(row)) {
    return null;
  }
  const field = fields.find((name) => name in row);
  if (field === undefined) {
    return null;
  }

  const raw = row[field];
  let value: number;
  if (typeof raw === 'number') {
    value = raw;
  } else if (typeof raw === 'string' && DECIMAL_PATTERN.test(raw.trim())) {
    value = Number(raw.trim());
  } else {
    return null;
  }
  return Number.isFinite(value) ? value : null;
}
