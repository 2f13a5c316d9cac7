import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { StubAxiosAdapter, type StubReply } from '@test/unit/helpers/stubs/StubAxiosAdapter';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AssetAggregator } from '@/application/usecases/AssetAggregator';
import type { Period } from '@/domain/models/MarketData';
import { logReturns } from '@/domain/services/Returns';
import { AlphaVantageRequestBuilder } from '@/infra/adapters/alphavantage/AlphaVantageRequestBuilder';
import { AlphaVantageResponseNormalizer } from '@/infra/adapters/alphavantage/AlphaVantageResponseNormalizer';
import { ResilientHttpClient } from '@/infra/http/ResilientHttpClient';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';

const BASE_URL = 'https://provider.test/query';

const SPY_DAILY_ADJUSTED = {
  'Meta Data': { '1. Information': 'Daily Time Series with Splits and Dividend Events', '5. Time Zone': 'US/Eastern' },
  'Time Series (Daily)': {
    '2024-01-04': { '4. close': '468.00', '5. adjusted close': '467.00' },
    '2024-01-03': { '4. close': '470.00', '5. adjusted close': '469.00' },
    '2024-01-02': { '4. close': '472.00', '5. adjusted close': '471.00' },
  },
};

const BTC_DAILY = {
  'Meta Data': { '1. Information': 'Daily Prices and Volumes for Digital Currency' },
  'Time Series (Digital Currency Daily)': {
    '2024-01-01': { '4. close': '42000.00' },
    '2024-01-02': { '4. close': '45000.00' },
    '2024-01-03': { '4. close': '43000.00' },
  },
};

const day = (n: number): Date => new Date(Date.UTC(2024, 0, n));

/**
 * 結合テスト: AssetAggregator + ResilientHttpClient + Alpha Vantage アダプタ
 *
 * HTTP はインプロセスの axios アダプタで代替し、それ以外は本物の実装をつなぐ。
 */
describe('価格取得パイプライン', () => {
  let loggerMock: LoggerMock;
  let metricsCollector: PrometheusMetricsCollector;

  const createPipeline = (adapter: StubAxiosAdapter, concurrency = 1) => {
    const httpClient = new ResilientHttpClient({
      logger: loggerMock,
      metricsCollector,
      axiosInstance: adapter.createInstance(),
    });
    return new AssetAggregator(httpClient, new AlphaVantageRequestBuilder(), new AlphaVantageResponseNormalizer(), {
      apiKey: 'test-secret',
      baseUrl: BASE_URL,
      concurrency,
      logger: loggerMock,
      metricsCollector,
    });
  };

  beforeEach(() => {
    vi.useFakeTimers();
    loggerMock = new LoggerMock();
    metricsCollector = new PrometheusMetricsCollector();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('株式と暗号資産を取得し、共通の日付で結合する', async () => {
    const adapter = StubAxiosAdapter.bySymbol({
      SPY: { status: 200, data: SPY_DAILY_ADJUSTED },
      BTC: { status: 200, data: BTC_DAILY },
    });
    const aggregator = createPipeline(adapter);

    const result = await aggregator.fetchTable(['SPY', 'BTC'], 'daily');

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value.symbols).toEqual(['SPY', 'BTC']);
    expect(result.value.rows).toEqual([
      { timestamp: day(2), values: [471, 45000] },
      { timestamp: day(3), values: [469, 43000] },
    ]);
    expect(result.value.series.get('SPY')?.timeZone).toBe('US/Eastern');
    expect(result.value.series.get('BTC')?.timeZone).toBe('UTC');

    expect(adapter.requests.map((request) => request.params)).toEqual([
      {
        function: 'TIME_SERIES_DAILY_ADJUSTED',
        symbol: 'SPY',
        outputsize: 'full',
        adjusted: 'true',
        apikey: 'test-secret',
      },
      { function: 'DIGITAL_CURRENCY_DAILY', symbol: 'BTC', outputsize: 'full', market: 'USD', apikey: 'test-secret' },
    ]);
    expect(adapter.requests.every((request) => request.url === BASE_URL)).toBe(true);

    const log = logReturns(result.value);
    expect(log.rows).toHaveLength(1);
    expect(log.rows[0]?.values[1]).toBeCloseTo(Math.log(43000 / 45000), 12);
  });

  it('一時的な 503 は再試行して成功し、メトリクスに残る', async () => {
    let spyCalls = 0;
    const adapter = new StubAxiosAdapter((config): StubReply => {
      if (StubAxiosAdapter.param(config, 'symbol') === 'BTC') {
        return { status: 200, data: BTC_DAILY };
      }
      spyCalls += 1;
      return spyCalls < 3 ? { status: 503 } : { status: 200, data: SPY_DAILY_ADJUSTED };
    });
    const aggregator = createPipeline(adapter, 2);

    const pending = aggregator.fetchTable(['SPY', 'BTC'], 'daily');
    await vi.runAllTimersAsync();
    const result = await pending;

    expect(result.ok && result.value.rows).toHaveLength(2);
    expect(adapter.requests).toHaveLength(4);

    const metrics = await metricsCollector.getMetrics();
    expect(metrics).toContain('fetcher_http_attempts_total{outcome="retryable_status"} 2');
    expect(metrics).toContain('fetcher_http_attempts_total{outcome="success"} 2');
    expect(metrics).toContain('fetcher_http_retries_total 2');
    expect(metrics).toContain('fetcher_series_fetched_total{asset_class="equity"} 1');
    expect(metrics).toContain('fetcher_series_fetched_total{asset_class="crypto"} 1');
  });

  it('プロバイダが時系列の代わりにメッセージを返したら AggregateFailure', async () => {
    const adapter = StubAxiosAdapter.bySymbol({
      SPY: { status: 200, data: SPY_DAILY_ADJUSTED },
      BTC: { status: 200, data: { Information: 'Please provide a valid API key' } },
    });
    const aggregator = createPipeline(adapter);

    const result = await aggregator.fetchTable(['SPY', 'BTC'], 'daily');

    expect(result.ok).toBe(false);
    if (!result.ok && result.error.kind === 'aggregate-failure') {
      expect(result.error.symbol).toBe('BTC');
      expect(result.error.cause.kind).toBe('malformed-response');
      expect(result.error.message).toBe(
        'Failed to fetch BTC: No time series block in response for BTC: Please provide a valid API key'
      );
    } else {
      expect.unreachable('expected aggregate-failure');
    }
    expect(await metricsCollector.getMetrics()).toContain('fetcher_errors_total{error_type="aggregate-failure"} 1');
  });

  it('再試行しないステータスは 1 回で諦め、後続のシンボルは取得しない', async () => {
    const adapter = StubAxiosAdapter.bySymbol({ SPY: { status: 200, data: SPY_DAILY_ADJUSTED } });
    const aggregator = createPipeline(adapter);

    const result = await aggregator.fetchTable(['UNKNOWN', 'SPY'], 'daily');

    expect(!result.ok && result.error.message).toBe(
      'Failed to fetch UNKNOWN: Upstream rejected request with status 404'
    );
    expect(adapter.requests).toHaveLength(1);
  });

  it('型のない呼び出し元から未知の周期が来ても HTTP を一度も呼ばない', async () => {
    const adapter = StubAxiosAdapter.sequence({ status: 200, data: SPY_DAILY_ADJUSTED });
    const aggregator = createPipeline(adapter);
    const period: Period = JSON.parse('"hourly"');

    const result = await aggregator.fetchSeries('SPY', period);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('invalid-argument');
      expect(result.error.message).toBe('period must be one of intraday, daily, weekly, monthly');
    }
    expect(adapter.requests).toHaveLength(0);
  });

  it('日中足で interval がなければ HTTP を一度も呼ばない', async () => {
    const adapter = StubAxiosAdapter.sequence({ status: 200, data: SPY_DAILY_ADJUSTED });
    const aggregator = createPipeline(adapter);

    const result = await aggregator.fetchTable(['SPY'], 'intraday');

    expect(!result.ok && result.error.kind).toBe('invalid-argument');
    expect(adapter.requests).toHaveLength(0);
  });
});
