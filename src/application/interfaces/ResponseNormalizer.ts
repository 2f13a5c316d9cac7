import type { MalformedResponseFailure, Result } from '@/domain/models/Failure';
import type { AssetClass, PriceSeries, Query, RawPayload } from '@/domain/models/MarketData';

/**
 * プロバイダの生レスポンスを正準化された時系列に変換する（インフラ層で実装される）。
 */
export interface ResponseNormalizer {
  /**
   * @param payload プロバイダから受信した JSON
   * @param query リクエスト時の条件（列の選択に使う）
   * @param assetClass 資産クラス
   */
  normalize(payload: RawPayload, query: Query, assetClass: AssetClass): Result<PriceSeries, MalformedResponseFailure>;
}
