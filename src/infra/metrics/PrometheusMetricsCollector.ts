import { Counter, Registry } from 'prom-client';
import type { AttemptOutcomeLabel, MetricsCollector, MetricsRegistry } from '@/application/interfaces/MetricsCollector';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンパターンの実装にはしていない。
 *
 * 責務: prom-client を使用してメトリクスを収集・保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly attemptCounter: Counter<'outcome'>;
  private readonly retryCounter: Counter;
  private readonly seriesCounter: Counter<'asset_class'>;
  private readonly errorCounter: Counter<'error_type'>;

  constructor() {
    this.register = new Registry();

    this.attemptCounter = new Counter({
      name: 'fetcher_http_attempts_total',
      help: 'Total number of HTTP attempts sent to the data provider',
      labelNames: ['outcome'],
      registers: [this.register],
    });

    this.retryCounter = new Counter({
      name: 'fetcher_http_retries_total',
      help: 'Total number of retries scheduled after a transient failure',
      registers: [this.register],
    });

    this.seriesCounter = new Counter({
      name: 'fetcher_series_fetched_total',
      help: 'Total number of price series fetched and normalized',
      labelNames: ['asset_class'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'fetcher_errors_total',
      help: 'Total number of failures returned to callers',
      labelNames: ['error_type'],
      registers: [this.register],
    });
  }

  incrementAttempt(outcome: AttemptOutcomeLabel): void {
    this.attemptCounter.inc({ outcome });
  }

  incrementRetry(): void {
    this.retryCounter.inc();
  }

  incrementSeriesFetched(assetClass: string): void {
    this.seriesCounter.inc({ asset_class: assetClass });
  }

  incrementError(errorType: string): void {
    this.errorCounter.inc({ error_type: errorType });
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): MetricsRegistry {
    return this.register;
  }
}
