/**
 * ドメイン層: 取得パイプラインの失敗型
 *
 * パイプラインは例外を投げず、Result として失敗を返す。
 * 呼び出し側は kind で分岐し、上位で再試行するかどうかを判断する。
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export type FailureKind =
  | 'invalid-argument'
  | 'retry-exhausted'
  | 'upstream-rejected'
  | 'malformed-response'
  | 'aggregate-failure';

/**
 * すべての失敗の基底クラス。ログにスタックを残せるよう Error を継承するが、throw はしない。
 */
export abstract class MarketDataFailure extends Error {
  abstract readonly kind: FailureKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * 呼び出し側の入力が不正（空のシンボルリスト、interval なしの日中足など）。
 */
export class InvalidArgumentFailure extends MarketDataFailure {
  readonly kind = 'invalid-argument';
}

/**
 * 再試行可能な失敗（429/5xx、接続エラー、タイムアウト）が再試行上限まで続いた。
 */
export class RetryExhaustedFailure extends MarketDataFailure {
  readonly kind = 'retry-exhausted';

  constructor(
    readonly attempts: number,
    readonly lastStatus: number | null,
    readonly lastError: unknown
  ) {
    super(
      lastStatus !== null
        ? `All ${attempts} attempts failed (last status ${lastStatus})`
        : `All ${attempts} attempts failed (${describeCause(lastError)})`,
      { cause: lastError }
    );
  }
}

/**
 * 再試行しても変わらない応答（401, 404 など）や分類できないエラー。
 */
export class UpstreamRejectedFailure extends MarketDataFailure {
  readonly kind = 'upstream-rejected';

  constructor(
    readonly status: number | null,
    cause?: unknown
  ) {
    super(
      status !== null ? `Upstream rejected request with status ${status}` : `Request failed: ${describeCause(cause)}`,
      { cause }
    );
  }
}

/**
 * レスポンスの形が想定と違う（時系列キーがない、行がパースできない）。
 */
export class MalformedResponseFailure extends MarketDataFailure {
  readonly kind = 'malformed-response';

  /**
   * @param message 失敗内容
   * @param providerMessage プロバイダが返した 'Error Message' / 'Note' / 'Information' の本文
   */
  constructor(
    message: string,
    readonly providerMessage: string | null = null
  ) {
    super(providerMessage ? `${message}: ${providerMessage}` : message);
  }
}

/**
 * テーブル取得中にいずれかのシンボルが失敗した。部分的な結果は返さない。
 */
export class AggregateFailure extends MarketDataFailure {
  readonly kind = 'aggregate-failure';

  constructor(
    readonly symbol: string,
    override readonly cause: SeriesFailure
  ) {
    super(`Failed to fetch ${symbol}: ${cause.message}`, { cause });
  }
}

export type HttpFailure = RetryExhaustedFailure | UpstreamRejectedFailure;

/** 単一シンボル取得で起こりうる失敗 */
export type SeriesFailure = InvalidArgumentFailure | HttpFailure | MalformedResponseFailure;

/** テーブル取得で起こりうる失敗 */
export type TableFailure = InvalidArgumentFailure | AggregateFailure;

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
