import type { Logger } from '@/application/interfaces/Logger';
import { PinoLogger } from './PinoLogger';

const ROOT_LOGGER_NAME = 'market-series-fetcher';

type Env = Readonly<Record<string, string | undefined>>;

/**
 * ロガーファクトリー
 *
 * アプリケーション全体で 1 つのルートロガーを共有する（シングルトン）。
 * 各コンポーネントはこれを child() して component を付ける。
 */
class LoggerFactory {
  private static instance: Logger | null = null;

  /**
   * ルートロガーを取得または作成
   *
   * 環境変数:
   * - `LOG_LEVEL`: debug / info / warn / error（デフォルト info）
   * - `LOG_PRETTY`: true なら pino-pretty、false なら JSON。未設定時は `NODE_ENV` が production 以外なら pretty
   */
  static create(env: Env = process.env): Logger {
    if (LoggerFactory.instance === null) {
      LoggerFactory.instance = new PinoLogger({
        name: ROOT_LOGGER_NAME,
        level: env.LOG_LEVEL?.trim() || 'info',
        pretty: LoggerFactory.isPretty(env),
      });
    }
    return LoggerFactory.instance;
  }

  /**
   * ロガーインスタンスをリセット（主にテスト用）
   */
  static reset(): void {
    LoggerFactory.instance = null;
  }

  /**
   * pino-pretty で出力するか。`LOG_PRETTY` が true/1/false/0 ならそれに従い、
   * それ以外は production 以外で true。
   */
  static isPretty(env: Env): boolean {
    const flag = env.LOG_PRETTY?.trim().toLowerCase();
    if (flag === 'true' || flag === '1') {
      return true;
    }
    if (flag === 'false' || flag === '0') {
      return false;
    }
    return env.NODE_ENV !== 'production';
  }
}

export { LoggerFactory };
