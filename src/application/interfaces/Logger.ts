export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * ロガーインターフェース
 *
 * 構造化ログ（メッセージ + メタデータ）を出力する。実装は pino。
 * メッセージは英語の固定文にし、可変部分はメタデータに入れる。
 */
export interface Logger {
  debug(msg: string, meta?: object): void;
  info(msg: string, meta?: object): void;
  warn(msg: string, meta?: object): void;
  error(msg: string, meta?: object): void;

  /**
   * 指定レベルが出力対象か。出力内容を作るのが重い場合に先に確認する。
   */
  isLevelEnabled(level: LogLevel): boolean;

  /**
   * 子ロガーを作成する。bindings（component, symbol など）は以降のすべての行に付く。
   */
  child(bindings: object): Logger;
}
