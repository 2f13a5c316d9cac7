import http from 'node:http';
import https from 'node:https';
import axios, { type AxiosInstance, isAxiosError } from 'axios';
import type { HttpClient, HttpMethod, HttpResponse } from '@/application/interfaces/HttpClient';
import type { Logger } from '@/application/interfaces/Logger';
import type { AttemptOutcomeLabel, MetricsCollector } from '@/application/interfaces/MetricsCollector';
import {
  type HttpFailure,
  RetryExhaustedFailure,
  type Result,
  UpstreamRejectedFailure,
  fail,
  ok,
} from '@/domain/models/Failure';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { type AttemptOutcome, RetryPolicy, type RetryPolicyOptions } from './RetryPolicy';

/**
 * ResilientHttpClient の初期化オプション
 */
export interface ResilientHttpClientOptions extends RetryPolicyOptions {
  logger?: Logger;
  metricsCollector?: MetricsCollector;
  /**
   * 使用する axios インスタンス。未指定の場合は keep-alive エージェント付きで生成する。
   * テストではインプロセスの adapter を持つインスタンスを渡す。
   */
  axiosInstance?: AxiosInstance;
}

interface AttemptResult {
  outcome: AttemptOutcome;
  data?: unknown;
}

/**
 * インフラ層: 再試行付き HTTP クライアント
 *
 * 責務: 1 つの論理リクエストを RetryPolicy に従って実行し、最終結果だけを返す。
 * - 接続（keep-alive エージェント）はインスタンス生成時に作り、全リクエストで共有する
 * - 試行ごとの状態はローカル変数のみで持つため、並行して execute() を呼んでもよい
 * - 待機はそのリクエストを待っている呼び出し元だけを止める
 *
 * 注意: axios のエラーは config（クエリパラメータ = API キー）を持つため、ログにはメッセージとコードだけを出す。
 */
export class ResilientHttpClient implements HttpClient {
  private readonly policy: RetryPolicy;
  private readonly client: AxiosInstance;
  private readonly httpAgent: http.Agent | null = null;
  private readonly httpsAgent: https.Agent | null = null;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;

  constructor(options?: ResilientHttpClientOptions) {
    this.policy = new RetryPolicy(options);
    this.logger = (options?.logger ?? LoggerFactory.create()).child({ component: 'ResilientHttpClient' });
    this.metricsCollector = options?.metricsCollector;

    if (options?.axiosInstance) {
      this.client = options.axiosInstance;
    } else {
      this.httpAgent = new http.Agent({ keepAlive: true });
      this.httpsAgent = new https.Agent({ keepAlive: true });
      this.client = axios.create({ httpAgent: this.httpAgent, httpsAgent: this.httpsAgent });
    }
  }

  /**
   * リクエストを実行する。再試行可能な失敗は内部で再試行し、呼び出し元には最終結果だけを返す。
   */
  async execute(
    method: HttpMethod,
    url: string,
    queryParams: Readonly<Record<string, string>>,
    timeoutMs: number
  ): Promise<Result<HttpResponse, HttpFailure>> {
    for (let attempt = 0; ; attempt++) {
      const { outcome, data } = await this.send(method, url, queryParams, timeoutMs);

      if (this.metricsCollector) {
        this.metricsCollector.incrementAttempt(toOutcomeLabel(outcome));
      }

      const decision = this.policy.decide(attempt, outcome);
      switch (decision.action) {
        case 'return':
          return this.settle(outcome, data, attempt + 1, url);

        case 'give-up': {
          const failure = new RetryExhaustedFailure(
            attempt + 1,
            outcome.type === 'retryable-status' ? outcome.status : null,
            outcome.type === 'retryable-transport' ? outcome.error : null
          );
          this.logger.error('Retry budget exhausted', {
            url,
            attempts: attempt + 1,
            lastStatus: failure.lastStatus,
            reason: failure.message,
          });
          return fail(failure);
        }

        case 'retry':
          this.logger.warn('Request failed, retrying', {
            url,
            attempt: attempt + 1,
            maxRetries: this.policy.maxRetries,
            status: outcome.type === 'retryable-status' ? outcome.status : undefined,
            code: outcome.type === 'retryable-transport' ? errorCode(outcome.error) : undefined,
            delayMs: decision.delayMs,
          });
          if (this.metricsCollector) {
            this.metricsCollector.incrementRetry();
          }
          await new Promise((resolve) => setTimeout(resolve, decision.delayMs));
          break;
      }
    }
  }

  /**
   * keep-alive エージェントを破棄する。外部から渡された axios インスタンスには触れない。
   */
  close(): void {
    this.httpAgent?.destroy();
    this.httpsAgent?.destroy();
  }

  /**
   * 1 回だけ送信し、結果を分類する。例外は外に出さない。
   */
  private async send(
    method: HttpMethod,
    url: string,
    params: Readonly<Record<string, string>>,
    timeoutMs: number
  ): Promise<AttemptResult> {
    try {
      const response = await this.client.request<unknown>({
        method,
        url,
        params,
        timeout: timeoutMs,
        // ステータスの判定は RetryPolicy が行う
        validateStatus: () => true,
      });
      return { outcome: this.policy.classifyStatus(response.status), data: response.data };
    } catch (error) {
      return { outcome: this.policy.classifyTransportError(errorCode(error), error) };
    }
  }

  private settle(
    outcome: AttemptOutcome,
    data: unknown,
    attempts: number,
    url: string
  ): Result<HttpResponse, HttpFailure> {
    if (outcome.type === 'success') {
      return ok({ status: outcome.status, data, attempts });
    }

    const status = outcome.type === 'non-retryable' ? outcome.status : null;
    const cause = outcome.type === 'non-retryable' ? outcome.error : undefined;
    const failure = new UpstreamRejectedFailure(status, cause);
    this.logger.error('Request rejected', { url, status, attempts, reason: failure.message });
    return fail(failure);
  }
}

function errorCode(error: unknown): string | undefined {
  if (isAxiosError(error)) {
    return error.code;
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function toOutcomeLabel(outcome: AttemptOutcome): AttemptOutcomeLabel {
  switch (outcome.type) {
    case 'success':
      return 'success';
    case 'retryable-status':
      return 'retryable_status';
    case 'retryable-transport':
      return 'transport_error';
    case 'non-retryable':
      return 'rejected';
  }
}
