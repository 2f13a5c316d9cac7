import type { HttpClient } from '@/application/interfaces/HttpClient';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { RequestBuilder } from '@/application/interfaces/RequestBuilder';
import type { ResponseNormalizer } from '@/application/interfaces/ResponseNormalizer';
import {
  AggregateFailure,
  InvalidArgumentFailure,
  type MarketDataFailure,
  type Result,
  type SeriesFailure,
  type TableFailure,
  fail,
  ok,
} from '@/domain/models/Failure';
import type { Interval, Period, PriceSeries, PriceTable, Query } from '@/domain/models/MarketData';
import { classifyAsset } from '@/domain/services/AssetClassifier';
import { resolveInterval, resolvePeriod } from '@/domain/services/QueryOptions';
import { alignSeries } from '@/domain/services/TableAligner';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * AssetAggregator の初期化オプション
 */
export interface AssetAggregatorOptions {
  /** プロバイダの API キー（そのまま apikey パラメータとして送る） */
  apiKey: string;
  baseUrl?: string;
  /** 1 試行あたりのタイムアウト（ミリ秒） */
  timeoutMs?: number;
  /** fetchTable で同時に取得するシンボル数の上限（正の整数）。1 なら逐次 */
  concurrency?: number;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * アプリケーション層: 価格時系列の取得ユースケース
 *
 * 責務: シンボルごとに 資産判定 → リクエスト組み立て → HTTP 実行 → 正規化 を行い、
 * 複数シンボルの場合はタイムスタンプで内部結合したテーブルを返す司令塔。
 *
 * 注意: 再試行は HttpClient の中だけで行い、ここでは失敗をそのまま返す。
 */
export class AssetAggregator {
  static readonly DEFAULT_BASE_URL = 'https://www.alphavantage.co/query';
  static readonly DEFAULT_TIMEOUT_MS = 30_000;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly concurrency: number;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;

  constructor(
    private readonly httpClient: HttpClient,
    private readonly requestBuilder: RequestBuilder,
    private readonly normalizer: ResponseNormalizer,
    options: AssetAggregatorOptions
  ) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? AssetAggregator.DEFAULT_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? AssetAggregator.DEFAULT_TIMEOUT_MS;
    this.concurrency = options.concurrency ?? 1;
    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer (got ${this.concurrency})`);
    }
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'AssetAggregator' });
    this.metricsCollector = options.metricsCollector;
  }

  /**
   * 1 シンボルの価格時系列を取得する。
   * @param symbol ティッカーシンボル
   * @param period 周期
   * @param interval 日中足の間隔（period が 'intraday' のとき必須）
   * @param adjusted 調整後終値を使うか（株式の非日中足のみ有効）
   */
  async fetchSeries(
    symbol: string,
    period: Period,
    interval?: Interval,
    adjusted = true
  ): Promise<Result<PriceSeries, SeriesFailure>> {
    const query: Query = { symbol, period, interval, adjusted };
    const assetClass = classifyAsset(symbol);

    const request = this.requestBuilder.build(query, assetClass);
    if (!request.ok) {
      return this.reject(request.error, { symbol });
    }

    const response = await this.httpClient.execute(
      'GET',
      this.baseUrl,
      { ...request.value.params, apikey: this.apiKey },
      this.timeoutMs
    );
    if (!response.ok) {
      return this.reject(response.error, { symbol, function: request.value.functionId });
    }

    const series = this.normalizer.normalize(response.value.data, query, assetClass);
    if (!series.ok) {
      return this.reject(series.error, { symbol, function: request.value.functionId });
    }

    if (this.metricsCollector) {
      this.metricsCollector.incrementSeriesFetched(assetClass);
    }
    this.logger.debug('Fetched series', {
      symbol,
      function: request.value.functionId,
      points: series.value.points.length,
      attempts: response.value.attempts,
    });
    return series;
  }

  /**
   * 複数シンボルの時系列を取得し、全シンボルに共通するタイムスタンプだけのテーブルにする。
   * 列の順序は symbols の順序。1 つでも失敗したら全体を失敗とする（部分的な結果は返さない）。
   */
  async fetchTable(
    symbols: readonly string[],
    period: Period,
    interval?: Interval,
    adjusted = true
  ): Promise<Result<PriceTable, TableFailure>> {
    const invalid = this.validateSymbols(symbols) ?? this.validateQuery(period, interval);
    if (invalid) {
      return this.reject(invalid, { symbols });
    }

    const outcomes = await this.fetchAll(symbols, (symbol) => this.fetchSeries(symbol, period, interval, adjusted));

    const seriesList: PriceSeries[] = [];
    for (const [index, symbol] of symbols.entries()) {
      const outcome = outcomes[index];
      if (!outcome) {
        // 失敗より前のシンボルは必ず取得済み
        throw new Error(`No fetch outcome for ${symbol}`);
      }
      if (!outcome.ok) {
        return this.reject(new AggregateFailure(symbol, outcome.error), { symbol });
      }
      seriesList.push(outcome.value);
    }

    const table = alignSeries(seriesList);
    this.logger.info('Fetched table', { symbols, period, rows: table.rows.length });
    return ok(table);
  }

  /**
   * 最大 concurrency 個のワーカーでシンボルを先頭から順に取得する。
   * 失敗が出たら新しい取得は始めない（実行中のものは完了を待つ）。
   * 返す配列はシンボルと同じ添字で、開始しなかったものは undefined。
   */
  private async fetchAll(
    symbols: readonly string[],
    fetchOne: (symbol: string) => Promise<Result<PriceSeries, SeriesFailure>>
  ): Promise<Array<Result<PriceSeries, SeriesFailure> | undefined>> {
    const outcomes: Array<Result<PriceSeries, SeriesFailure> | undefined> = Array.from(
      { length: symbols.length },
      () => undefined
    );
    let cursor = 0;
    let failed = false;

    const worker = async (): Promise<void> => {
      while (!failed && cursor < symbols.length) {
        const index = cursor++;
        const outcome = await fetchOne(symbols[index]);
        outcomes[index] = outcome;
        if (!outcome.ok) {
          failed = true;
        }
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, symbols.length) }, () => worker());
    await Promise.all(workers);
    return outcomes;
  }

  private validateSymbols(symbols: readonly string[]): InvalidArgumentFailure | null {
    if (symbols.length === 0) {
      return new InvalidArgumentFailure('Empty symbols input');
    }
    if (symbols.some((symbol) => symbol.trim() === '')) {
      return new InvalidArgumentFailure('symbols must not contain empty entries');
    }
    const duplicates = symbols.filter((symbol, index) => symbols.indexOf(symbol) !== index);
    if (duplicates.length > 0) {
      return new InvalidArgumentFailure(`Duplicate symbols: ${[...new Set(duplicates)].join(', ')}`);
    }
    return null;
  }

  private validateQuery(period: Period, interval: Interval | undefined): InvalidArgumentFailure | null {
    const resolvedPeriod = resolvePeriod(period);
    if (!resolvedPeriod.ok) {
      return resolvedPeriod.error;
    }
    const resolvedInterval = resolveInterval(resolvedPeriod.value, interval);
    return resolvedInterval.ok ? null : resolvedInterval.error;
  }

  /**
   * 失敗を記録してそのまま返す。
   */
  private reject<E extends MarketDataFailure>(failure: E, context: object): { ok: false; error: E } {
    if (this.metricsCollector) {
      this.metricsCollector.incrementError(failure.kind);
    }
    this.logger.warn('Fetch failed', { ...context, kind: failure.kind, reason: failure.message });
    return fail(failure);
  }
}
