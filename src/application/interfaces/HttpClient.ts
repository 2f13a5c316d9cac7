import type { HttpFailure, Result } from '@/domain/models/Failure';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * 成功した HTTP 応答。data はパース済みの JSON（パースできなければ文字列のまま）。
 */
export interface HttpResponse {
  status: number;
  data: unknown;
  /** 成功までに要した試行回数 */
  attempts: number;
}

/**
 * 再試行込みで 1 回の論理リクエストを実行する HTTP クライアント（インフラ層で実装される）。
 */
export interface HttpClient {
  /**
   * @param method HTTP メソッド
   * @param url リクエスト URL
   * @param queryParams クエリパラメータ
   * @param timeoutMs 1 試行あたりのタイムアウト（ミリ秒）
   */
  execute(
    method: HttpMethod,
    url: string,
    queryParams: Readonly<Record<string, string>>,
    timeoutMs: number
  ): Promise<Result<HttpResponse, HttpFailure>>;
}
