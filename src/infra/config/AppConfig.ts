import type { Interval, Period } from '@/domain/models/MarketData';
import { parseInterval, parsePeriod } from '@/domain/services/QueryOptions';
import { AssetAggregator } from '@/application/usecases/AssetAggregator';
import { RetryPolicy } from '@/infra/http/RetryPolicy';

/**
 * 起動時の設定（環境変数から組み立てる）
 */
export interface AppConfig {
  apiKey: string;
  baseUrl: string;
  symbols: string[];
  period: Period;
  interval?: Interval;
  adjusted: boolean;
  timeoutMs: number;
  maxRetries: number;
  backoffFactor: number;
  concurrency: number;
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * 必須環境変数を取得する。未設定の場合はエラーを投げる。
 * @throws {Error} 環境変数が未設定の場合
 */
function requireEnv(env: Env, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function optionalEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function numberEnv(env: Env, key: string, fallback: number, isValid: (value: number) => boolean): number {
  const raw = optionalEnv(env, key);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || !isValid(value)) {
    throw new Error(`Invalid value for ${key}: "${raw}"`);
  }
  return value;
}

function booleanEnv(env: Env, key: string, fallback: boolean): boolean {
  const raw = optionalEnv(env, key)?.toLowerCase();
  if (raw === undefined) {
    return fallback;
  }
  if (raw === 'true' || raw === '1' || raw === 'yes') {
    return true;
  }
  if (raw === 'false' || raw === '0' || raw === 'no') {
    return false;
  }
  throw new Error(`Invalid value for ${key}: "${raw}" (expected true or false)`);
}

const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0;

/**
 * 環境変数から設定を読み込む。不正な値はどの変数かを示してエラーを投げる。
 *
 * 環境変数:
 * - `ALPHA_VANTAGE_API_KEY`（必須）
 * - `SYMBOLS`: カンマ区切りのシンボル（必須）
 * - `PERIOD`: intraday / daily / weekly / monthly（デフォルト daily）
 * - `INTERVAL`: 1min / 5min / 15min / 30min / 60min（intraday では必須）
 * - `ADJUSTED`, `ALPHA_VANTAGE_BASE_URL`, `HTTP_TIMEOUT_MS`, `HTTP_MAX_RETRIES`,
 *   `HTTP_BACKOFF_FACTOR`（秒）, `FETCH_CONCURRENCY`
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const apiKey = requireEnv(env, 'ALPHA_VANTAGE_API_KEY');
  const symbols = requireEnv(env, 'SYMBOLS')
    .split(',')
    .map((symbol) => symbol.trim())
    .filter(Boolean);

  const period = parsePeriod(optionalEnv(env, 'PERIOD') ?? 'daily');
  if (!period.ok) {
    throw new Error(`Invalid value for PERIOD: ${period.error.message}`);
  }

  let interval: Interval | undefined;
  const rawInterval = optionalEnv(env, 'INTERVAL');
  if (period.value === 'intraday') {
    if (rawInterval === undefined) {
      throw new Error('Missing required environment variable: INTERVAL (required when PERIOD=intraday)');
    }
    const parsed = parseInterval(rawInterval);
    if (!parsed.ok) {
      throw new Error(`Invalid value for INTERVAL: ${parsed.error.message}`);
    }
    interval = parsed.value;
  }

  return {
    apiKey,
    baseUrl: optionalEnv(env, 'ALPHA_VANTAGE_BASE_URL') ?? AssetAggregator.DEFAULT_BASE_URL,
    symbols,
    period: period.value,
    interval,
    adjusted: booleanEnv(env, 'ADJUSTED', true),
    timeoutMs: numberEnv(env, 'HTTP_TIMEOUT_MS', AssetAggregator.DEFAULT_TIMEOUT_MS, isPositiveInteger),
    maxRetries: numberEnv(env, 'HTTP_MAX_RETRIES', RetryPolicy.DEFAULT_MAX_RETRIES, isPositiveInteger),
    backoffFactor: numberEnv(env, 'HTTP_BACKOFF_FACTOR', RetryPolicy.DEFAULT_BACKOFF_FACTOR, (value) => value >= 0),
    concurrency: numberEnv(env, 'FETCH_CONCURRENCY', 1, isPositiveInteger),
  };
}
