import pino from 'pino';
import type { LogLevel, Logger } from '@/application/interfaces/Logger';

export interface PinoLoggerOptions {
  /** 各行の name フィールド */
  name?: string;
  /** ログレベル（未指定時は環境変数 `LOG_LEVEL`、それもなければ info） */
  level?: string;
  /** pino-pretty で人間可読形式にするか（未指定時は production 以外で true） */
  pretty?: boolean;
}

/**
 * pino を使用したロガー実装
 *
 * 開発環境では `pino-pretty` を使用して人間可読形式で出力。
 * 本番環境では JSON 形式で出力。
 * child() で作成した子ロガーも同じクラスでラップする。
 */
export class PinoLogger implements Logger {
  private readonly pinoLogger: pino.Logger;

  constructor(options?: PinoLoggerOptions | pino.Logger) {
    if (isPinoInstance(options)) {
      this.pinoLogger = options;
      return;
    }

    const level = options?.level ?? process.env.LOG_LEVEL ?? 'info';
    const usePretty = options?.pretty ?? process.env.NODE_ENV !== 'production';

    this.pinoLogger = usePretty
      ? pino({
          name: options?.name,
          level,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss.l',
              ignore: 'pid,hostname',
              // 標準出力は CLI の結果表示に使うため、ログは標準エラーへ
              destination: 2,
            },
          },
        })
      : pino({ name: options?.name, level }, pino.destination(2));
  }

  debug(msg: string, meta?: object): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: object): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: object): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, meta?: object): void {
    this.pinoLogger.error(meta ?? {}, msg);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pinoLogger.isLevelEnabled(level);
  }

  child(bindings: object): Logger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

function isPinoInstance(value: PinoLoggerOptions | pino.Logger | undefined): value is pino.Logger {
  return typeof value === 'object' && 'child' in value && typeof value.child === 'function';
}
