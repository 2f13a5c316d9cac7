/**
 * Alpha Vantage の時系列 API が返す JSON のキー定義。
 *
 * 時系列ブロックのキー名はエンドポイントごとに異なる（例を下に列挙）。
 * キーを事前に決め打ちできないため、ここではキーを探すための定数だけを持つ。
 * - `Time Series (Daily)`
 * - `Time Series (5min)`
 * - `Weekly Adjusted Time Series`
 * - `Time Series (Digital Currency Daily)`
 * - `Time Series Crypto (5min)`
 */

/**
 * エラー時は時系列ブロックの代わりにこれらのキーのどれかが返る（HTTP 200 のまま）。
 */
export const PROVIDER_MESSAGE_KEYS = ['Error Message', 'Note', 'Information'] as const;

/** 時系列ブロックを探すためのキーの部分文字列 */
export const TIME_SERIES_KEY_FRAGMENT = 'Time Series';

export const META_DATA_KEY = 'Meta Data';

/** 終値フィールド（新しい名前を優先し、旧名にフォールバック） */
export const CLOSE_FIELDS = ['4. close', '4a. close (USD)'] as const;

/** 調整後終値フィールド */
export const ADJUSTED_CLOSE_FIELDS = ['5. adjusted close'] as const;
