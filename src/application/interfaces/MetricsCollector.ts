/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

/**
 * 1 回の HTTP 試行の結果分類（メトリクスのラベル値）
 */
export type AttemptOutcomeLabel = 'success' | 'retryable_status' | 'transport_error' | 'rejected';

/**
 * メトリクス収集インターフェース
 *
 * 責務: メトリクスの収集・保持・公開を抽象化
 */
export interface MetricsCollector {
  /**
   * HTTP 試行回数をカウント（再試行も 1 回として数える）
   * @param outcome 試行の結果分類
   */
  incrementAttempt(outcome: AttemptOutcomeLabel): void;

  /**
   * バックオフ後の再試行回数をカウント
   */
  incrementRetry(): void;

  /**
   * 正規化まで成功した時系列の数をカウント
   * @param assetClass 資産クラス（equity, crypto）
   */
  incrementSeriesFetched(assetClass: string): void;

  /**
   * エラー数をカウント
   * @param errorType 失敗の kind（retry-exhausted, malformed-response など）
   */
  incrementError(errorType: string): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;

  getRegistry(): MetricsRegistry;
}
