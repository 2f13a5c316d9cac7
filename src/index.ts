import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { AssetAggregator } from '@/application/usecases/AssetAggregator';
import { AlphaVantageRequestBuilder } from '@/infra/adapters/alphavantage/AlphaVantageRequestBuilder';
import { AlphaVantageResponseNormalizer } from '@/infra/adapters/alphavantage/AlphaVantageResponseNormalizer';
import { ResilientHttpClient } from '@/infra/http/ResilientHttpClient';

export type { HttpClient, HttpResponse } from '@/application/interfaces/HttpClient';
export type { LogLevel, Logger } from '@/application/interfaces/Logger';
export type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
export type { ProviderRequest, RequestBuilder } from '@/application/interfaces/RequestBuilder';
export type { ResponseNormalizer } from '@/application/interfaces/ResponseNormalizer';
export { AssetAggregator, type AssetAggregatorOptions } from '@/application/usecases/AssetAggregator';
export * from '@/domain/models/Failure';
export type * from '@/domain/models/MarketData';
export { INTERVALS, PERIODS } from '@/domain/models/MarketData';
export { CRYPTO_SYMBOLS, classifyAsset } from '@/domain/services/AssetClassifier';
export { parseInterval, parsePeriod } from '@/domain/services/QueryOptions';
export { arithmeticReturns, columnMeans, logReturns } from '@/domain/services/Returns';
export { alignSeries } from '@/domain/services/TableAligner';
export { computeTimeStep } from '@/domain/services/TimeStep';
export { AlphaVantageRequestBuilder } from '@/infra/adapters/alphavantage/AlphaVantageRequestBuilder';
export { AlphaVantageResponseNormalizer } from '@/infra/adapters/alphavantage/AlphaVantageResponseNormalizer';
export { ResilientHttpClient, type ResilientHttpClientOptions } from '@/infra/http/ResilientHttpClient';
export { RetryPolicy } from '@/infra/http/RetryPolicy';
export { PinoLogger } from '@/infra/logger/PinoLogger';
export { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';

export interface CreateAssetAggregatorOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  backoffFactor?: number;
  concurrency?: number;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * 既定のコンポーネント（axios クライアント、Alpha Vantage アダプタ）を配線した AssetAggregator を作る。
 * 返される httpClient は呼び出し側が使い終わったら close() する。
 */
export function createAssetAggregator(options: CreateAssetAggregatorOptions): {
  aggregator: AssetAggregator;
  httpClient: ResilientHttpClient;
} {
  const httpClient = new ResilientHttpClient({
    maxRetries: options.maxRetries,
    backoffFactor: options.backoffFactor,
    logger: options.logger,
    metricsCollector: options.metricsCollector,
  });
  const aggregator = new AssetAggregator(
    httpClient,
    new AlphaVantageRequestBuilder(),
    new AlphaVantageResponseNormalizer(),
    options
  );
  return { aggregator, httpClient };
}
