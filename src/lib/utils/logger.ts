/**
 * 構造化ロギングユーティリティ
 *
 * @description 1行1 JSON のログ出力。LOG_LEVEL 環境変数で最小レベルを指定
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** モジュール名 */
  module?: string;
  /** DB名 (FM08, CO など) */
  db?: string;
  /** API エンドポイント名 */
  endpoint?: string;
  /** 処理行数 */
  rowCount?: number;
  /** ページ数 */
  pageCount?: number;
  /** 処理時間（ミリ秒） */
  durationMs?: number;
  /** エラーコード */
  errorCode?: string;
  /** その他のコンテキスト */
  [key: string]: unknown;
}

interface LogPayload extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

/**
 * 最小ログレベル（モジュールロード時に一度だけ評価）
 */
const MIN_LOG_LEVEL: LogLevel = (() => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
})();

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[MIN_LOG_LEVEL];
}

/**
 * エラーオブジェクトをシリアライズ可能な形式に変換
 *
 * BojStatError の code など、Error 上の独自プロパティも残す
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(error)) {
      if (key !== 'cause' && typeof value !== 'function') {
        extra[key] = value;
      }
    }
    return {
      ...extra,
      name: error.name,
      message: error.message,
      stack: error.stack?.split('\n').slice(0, 5).join('\n'),
      ...(error.cause ? { cause: serializeError(error.cause) } : {}),
    };
  }
  return { value: String(error) };
}

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  /** 子ロガーを作成（コンテキストを追加） */
  child: (additionalContext: LogContext) => Logger;
  /** 処理時間を計測するタイマーを開始 */
  startTimer: (label: string) => LogTimer;
}

export interface LogTimer {
  end: (context?: LogContext) => number;
  endWithError: (error: unknown, context?: LogContext) => number;
}

/**
 * ロガーを作成
 *
 * @param defaultContext 全ログに付与するデフォルトコンテキスト
 *
 * @example
 * ```typescript
 * const logger = createLogger({ module: 'boj-client' });
 * logger.info('Fetched observations', { db: 'FM08', rowCount: 24 });
 * logger.error('Request failed', { error: err });
 * ```
 */
export function createLogger(defaultContext: LogContext = {}): Logger {
  const log = (level: LogLevel, message: string, context: LogContext = {}) => {
    if (!shouldLog(level)) {
      return;
    }

    const processedContext = { ...context };
    if (processedContext.error) {
      processedContext.error = serializeError(processedContext.error);
    }

    const payload: LogPayload = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...defaultContext,
      ...processedContext,
    };

    const jsonStr = JSON.stringify(payload);

    switch (level) {
      case 'error':
        console.error(jsonStr);
        break;
      case 'warn':
        console.warn(jsonStr);
        break;
      default:
        console.log(jsonStr);
    }
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),

    child: (additionalContext) => createLogger({ ...defaultContext, ...additionalContext }),

    startTimer: (label) => {
      const startTime = Date.now();
      return {
        end: (context) => {
          const durationMs = Date.now() - startTime;
          log('info', `${label} completed`, { ...context, durationMs });
          return durationMs;
        },
        endWithError: (error, context) => {
          const durationMs = Date.now() - startTime;
          log('error', `${label} failed`, { ...context, durationMs, error });
          return durationMs;
        },
      };
    },
  };
}
