/**
 * ドメイン層: 価格時系列の型定義
 *
 * 注意: プロバイダ固有の形式（関数名、数字付きフィールド名など）はここに持ち込まない。
 * ここにあるのは正規化後の「正準形」のみ。
 */

/**
 * 資産クラス。シンボルが暗号資産リストに含まれるかどうかだけで決まる。
 */
export type AssetClass = 'equity' | 'crypto';

/**
 * 取得する時系列の周期。
 */
export type Period = 'intraday' | 'daily' | 'weekly' | 'monthly';

/**
 * 日中足の間隔。Period が 'intraday' のときのみ意味を持つ。
 */
export type Interval = '1min' | '5min' | '15min' | '30min' | '60min';

export const PERIODS: readonly Period[] = ['intraday', 'daily', 'weekly', 'monthly'];

export const INTERVALS: readonly Interval[] = ['1min', '5min', '15min', '30min', '60min'];

/**
 * 抽象化された取得条件。
 */
export interface Query {
  /** ティッカーシンボル（例: 'SPY', 'BTC'） */
  symbol: string;
  period: Period;
  /** period が 'intraday' のとき必須。それ以外では無視される */
  interval?: Interval;
  /** 調整後終値を使うか（株式の非日中足のみ有効） */
  adjusted: boolean;
}

/**
 * プロバイダから返された生のレスポンス。構造は事前に分からない。
 */
export type RawPayload = unknown;

export interface PricePoint {
  timestamp: Date;
  value: number;
}

/**
 * 正準化された価格時系列。
 * points はタイムスタンプ昇順・重複なしで、返却後は凍結される。
 */
export interface PriceSeries {
  symbol: string;
  assetClass: AssetClass;
  /**
   * 暗号資産は 'UTC'。株式はプロバイダが宣言する取引所のタイムゾーン（不明なら null）で、
   * タイムスタンプはその現地時刻を UTC フィールドに格納した naive な値。
   */
  timeZone: string | null;
  points: readonly PricePoint[];
}

/**
 * 整列済みテーブルの 1 行。values は symbols と同じ順序。
 */
export interface TableRow {
  timestamp: Date;
  values: readonly number[];
}

/**
 * タイムスタンプで整列された行列。どの行もすべての列に値を持つ。
 */
export interface AlignedTable {
  symbols: readonly string[];
  rows: readonly TableRow[];
}

/**
 * 複数シンボルの価格テーブル（内部結合済み）。
 */
export interface PriceTable extends AlignedTable {
  /** シンボル → 元の時系列（結合前） */
  series: ReadonlyMap<string, PriceSeries>;
}
