import 'dotenv/config';
import process from 'node:process';
import type { AlignedTable } from '@/domain/models/MarketData';
import { arithmeticReturns, columnMeans, logReturns } from '@/domain/services/Returns';
import { computeTimeStep } from '@/domain/services/TimeStep';
import { loadConfig } from '@/infra/config/AppConfig';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { createAssetAggregator } from './index';

const TAIL_ROWS = 5;

/**
 * テーブルの末尾を標準出力に表示する。
 */
function printTail(title: string, table: AlignedTable): void {
  console.log(title);
  console.log(['timestamp', ...table.symbols].join('\t'));
  for (const row of table.rows.slice(-TAIL_ROWS)) {
    console.log([row.timestamp.toISOString(), ...row.values.map((value) => value.toFixed(6))].join('\t'));
  }
}

function printMeans(title: string, means: Map<string, number>, scale = 1): void {
  console.log(title);
  for (const [symbol, mean] of means) {
    console.log(`${symbol}\t${(mean * scale).toFixed(6)}`);
  }
}

/**
 * エントリーポイント: 設定の読み込み、依存関係の注入、取得結果のサンプル表示
 *
 * 注意: 取得・正規化のロジックは持たず、ただ「配線して表示するだけ」にする。
 */
async function bootstrap(): Promise<void> {
  const config = loadConfig();
  const logger = LoggerFactory.create();
  const metricsCollector = new PrometheusMetricsCollector();

  const timeStep = computeTimeStep(config.period, config.interval);
  if (!timeStep.ok) {
    throw timeStep.error;
  }

  const { aggregator, httpClient } = createAssetAggregator({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    maxRetries: config.maxRetries,
    backoffFactor: config.backoffFactor,
    concurrency: config.concurrency,
    logger,
    metricsCollector,
  });

  try {
    logger.info('Fetching historical prices', { symbols: config.symbols, period: config.period });
    const table = await aggregator.fetchTable(config.symbols, config.period, config.interval, config.adjusted);
    if (!table.ok) {
      throw table.error;
    }

    printTail('Sample prices:', table.value);

    const log = logReturns(table.value);
    printTail('\nSample log returns:', log);
    const meanLog = columnMeans(log);
    printMeans('\nMean log returns:', meanLog);
    printMeans('\nAnnualized mean log returns:', meanLog, 1 / timeStep.value);

    const arithmetic = arithmeticReturns(table.value);
    printTail('\nSample arithmetic returns:', arithmetic);
    printMeans('\nMean arithmetic returns:', columnMeans(arithmetic));

    if (logger.isLevelEnabled('debug')) {
      logger.debug('Metrics snapshot', { metrics: await metricsCollector.getMetrics() });
    }
  } finally {
    httpClient.close();
  }
}

bootstrap().catch((error: unknown) => {
  LoggerFactory.create().error('Failed to fetch prices', {
    reason: error instanceof Error ? error.message : String(error),
  });
  process.exitCode = 1;
});
