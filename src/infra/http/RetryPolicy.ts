/**
 * インフラ層: HTTP 再試行の判定ロジック（純粋関数のみ）
 *
 * 試行番号と結果分類から「返す / 待って再試行 / 諦める」を決める。
 * 遅延は backoffFactor * 2^attempt 秒（ジッターなし、上限なし）。
 */

/** 再試行対象の HTTP ステータス */
export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

/** 再試行対象の通信エラーコード（接続失敗とタイムアウト） */
export const RETRYABLE_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNABORTED',
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ERR_NETWORK',
]);

export interface RetryPolicyOptions {
  /** 最大試行回数（初回を含む） */
  maxRetries?: number;
  /** バックオフ係数（秒） */
  backoffFactor?: number;
}

/**
 * 1 回の試行の結果分類
 */
export type AttemptOutcome =
  | { type: 'success'; status: number }
  | { type: 'retryable-status'; status: number }
  | { type: 'retryable-transport'; error: unknown }
  | { type: 'non-retryable'; status: number | null; error?: unknown };

export type RetryDecision =
  | { action: 'return' }
  | { action: 'retry'; delayMs: number }
  | { action: 'give-up' };

export class RetryPolicy {
  static readonly DEFAULT_MAX_RETRIES = 5;
  static readonly DEFAULT_BACKOFF_FACTOR = 0.5;

  readonly maxRetries: number;
  readonly backoffFactor: number;

  constructor(options?: RetryPolicyOptions) {
    this.maxRetries = options?.maxRetries ?? RetryPolicy.DEFAULT_MAX_RETRIES;
    this.backoffFactor = options?.backoffFactor ?? RetryPolicy.DEFAULT_BACKOFF_FACTOR;
    if (!Number.isInteger(this.maxRetries) || this.maxRetries < 1) {
      throw new RangeError(`maxRetries must be a positive integer (got ${this.maxRetries})`);
    }
    if (!Number.isFinite(this.backoffFactor) || this.backoffFactor < 0) {
      throw new RangeError(`backoffFactor must be a non-negative number (got ${this.backoffFactor})`);
    }
  }

  /**
   * HTTP ステータスを分類する。2xx 以外で再試行対象でないものは non-retryable。
   */
  classifyStatus(status: number): AttemptOutcome {
    if (status >= 200 && status < 300) {
      return { type: 'success', status };
    }
    if (RETRYABLE_STATUSES.has(status)) {
      return { type: 'retryable-status', status };
    }
    return { type: 'non-retryable', status };
  }

  /**
   * 通信エラーを分類する。
   * @param code エラーコード（axios / Node の `code`）。不明な場合は undefined
   */
  classifyTransportError(code: string | undefined, error: unknown): AttemptOutcome {
    if (code !== undefined && RETRYABLE_ERROR_CODES.has(code)) {
      return { type: 'retryable-transport', error };
    }
    return { type: 'non-retryable', status: null, error };
  }

  /**
   * 試行 attempt（0 始まり）の後の遅延（ミリ秒）。
   */
  delayMs(attempt: number): number {
    return this.backoffFactor * 2 ** attempt * 1000;
  }

  /**
   * 試行 attempt（0 始まり）の結果から次の行動を決める。
   * 最後の試行の後は待たずに諦める。
   */
  decide(attempt: number, outcome: AttemptOutcome): RetryDecision {
    switch (outcome.type) {
      case 'success':
      case 'non-retryable':
        return { action: 'return' };
      case 'retryable-status':
      case 'retryable-transport':
        if (attempt + 1 >= this.maxRetries) {
          return { action: 'give-up' };
        }
        return { action: 'retry', delayMs: this.delayMs(attempt) };
    }
  }
}
