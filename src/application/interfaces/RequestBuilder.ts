import type { InvalidArgumentFailure, Result } from '@/domain/models/Failure';
import type { AssetClass, Query } from '@/domain/models/MarketData';

/**
 * プロバイダ向けリクエスト。functionId は params.function と同じ値。
 */
export interface ProviderRequest {
  functionId: string;
  params: Readonly<Record<string, string>>;
}

/**
 * 抽象的な Query をプロバイダ固有のパラメータに変換する（インフラ層で実装される）。
 */
export interface RequestBuilder {
  build(query: Query, assetClass: AssetClass): Result<ProviderRequest, InvalidArgumentFailure>;
}
