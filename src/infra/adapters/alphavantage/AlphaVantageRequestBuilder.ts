import type { ProviderRequest, RequestBuilder } from '@/application/interfaces/RequestBuilder';
import { InvalidArgumentFailure, type Result, fail, ok } from '@/domain/models/Failure';
import type { AssetClass, Period, Query } from '@/domain/models/MarketData';
import { resolveInterval, resolvePeriod } from '@/domain/services/QueryOptions';

/** 暗号資産の価格は常に USD 建てで取得する */
const CRYPTO_MARKET = 'USD';

/**
 * インフラ層: Alpha Vantage のリクエスト組み立て
 *
 * 責務: Query + 資産クラス → function 名とクエリパラメータ（apikey は含まない）。
 *
 * | 資産     | 周期                   | adjusted | function                        |
 * |----------|------------------------|----------|---------------------------------|
 * | crypto   | intraday               | -        | CRYPTO_INTRADAY                 |
 * | crypto   | daily/weekly/monthly   | -        | DIGITAL_CURRENCY_{PERIOD}       |
 * | equity   | intraday               | -        | TIME_SERIES_INTRADAY            |
 * | equity   | daily/weekly/monthly   | true     | TIME_SERIES_{PERIOD}_ADJUSTED   |
 * | equity   | daily/weekly/monthly   | false    | TIME_SERIES_{PERIOD}            |
 */
export class AlphaVantageRequestBuilder implements RequestBuilder {
  build(query: Query, assetClass: AssetClass): Result<ProviderRequest, InvalidArgumentFailure> {
    if (query.symbol.trim() === '') {
      return fail(new InvalidArgumentFailure('symbol must not be empty'));
    }

    const period = resolvePeriod(query.period);
    if (!period.ok) {
      return period;
    }
    const interval = resolveInterval(period.value, query.interval);
    if (!interval.ok) {
      return interval;
    }

    const functionId = this.functionName(period.value, query.adjusted, assetClass);
    const params: Record<string, string> = {
      function: functionId,
      symbol: query.symbol,
      outputsize: 'full',
    };

    if (assetClass === 'crypto') {
      params.market = CRYPTO_MARKET;
    }
    if (interval.value !== undefined) {
      params.interval = interval.value;
    }
    // 調整後価格は株式の日足・週足・月足にしか存在しない
    if (assetClass === 'equity' && period.value !== 'intraday') {
      params.adjusted = query.adjusted ? 'true' : 'false';
    }

    return ok({ functionId, params });
  }

  private functionName(period: Period, adjusted: boolean, assetClass: AssetClass): string {
    const name = period.toUpperCase();

    if (assetClass === 'crypto') {
      return period === 'intraday' ? `CRYPTO_${name}` : `DIGITAL_CURRENCY_${name}`;
    }
    if (period !== 'intraday' && adjusted) {
      return `TIME_SERIES_${name}_ADJUSTED`;
    }
    return `TIME_SERIES_${name}`;
  }
}
