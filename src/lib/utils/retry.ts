/**
 * 指数バックオフリトライユーティリティ
 *
 * @description 429/5xx とネットワークエラーを指数バックオフでリトライする。
 * タイムアウト（AbortSignal.timeout）はリトライしない
 */

export interface RetryOptions {
  /** 最大リトライ回数（デフォルト: 1） */
  maxRetries?: number;
  /** 基本遅延時間（ミリ秒、デフォルト: 1000） */
  baseDelayMs?: number;
  /** 最大遅延時間（ミリ秒、デフォルト: 8000） */
  maxDelayMs?: number;
  /** ジッター幅（ミリ秒、デフォルト: 100） */
  jitterMs?: number;
  /** リトライ対象のステータスコード */
  retryStatusCodes?: number[];
  /** リトライ時のコールバック */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

export const DEFAULT_RETRY_STATUS_CODES = [429, 500, 502, 503, 504];

/**
 * リトライ可能なエラー
 */
export class RetryableError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    /** レスポンスボディ（取得できた場合） */
    public readonly body?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RetryableError';
  }
}

/**
 * リトライ不可能なエラー（即座に失敗）
 */
export class NonRetryableError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    /** レスポンスボディ（取得できた場合） */
    public readonly body?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'NonRetryableError';
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterMs: number
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = Math.random() * jitterMs;
  return cappedDelay + jitter;
}

/**
 * undici の fetch は接続失敗を TypeError('fetch failed') で投げる
 */
function isNetworkError(error: unknown): boolean {
  return error instanceof TypeError;
}

function hasRetryableStatus(error: unknown, retryStatusCodes: number[]): boolean {
  return (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    retryStatusCodes.includes(error.statusCode)
  );
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * 指数バックオフリトライでラップされた関数を実行
 *
 * @example
 * ```typescript
 * const page = await withRetry(
 *   async () => {
 *     const response = await fetch(url);
 *     if (!response.ok) {
 *       throw new RetryableError('Request failed', response.status);
 *     }
 *     return response.json();
 *   },
 *   { maxRetries: 2, baseDelayMs: 1000 }
 * );
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const {
    maxRetries = 1,
    baseDelayMs = 1000,
    maxDelayMs = 8000,
    jitterMs = 100,
    retryStatusCodes = DEFAULT_RETRY_STATUS_CODES,
    onRetry,
  } = options ?? {};

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = toError(error);

      if (error instanceof NonRetryableError) {
        throw error;
      }

      if (attempt === maxRetries) {
        throw error;
      }

      const isRetryable =
        error instanceof RetryableError ||
        hasRetryableStatus(error, retryStatusCodes) ||
        isNetworkError(error);

      if (!isRetryable) {
        throw error;
      }

      const delayMs = calculateDelay(attempt, baseDelayMs, maxDelayMs, jitterMs);
      onRetry?.(attempt + 1, lastError, delayMs);
      await sleep(delayMs);
    }
  }

  throw lastError ?? new Error('Unknown error during retry');
}

/**
 * ボディを読めなかった場合は undefined
 */
async function readBody(response: Response): Promise<string | undefined> {
  try {
    return await response.text();
  } catch {
    return undefined;
  }
}

/**
 * fetch をリトライ付きでラップ
 *
 * 失敗レスポンスのボディはエラーの body に残す（BOJ API はエラー時も JSON を返す）
 */
export async function fetchWithRetry(
  url: string,
  init?: RequestInit,
  retryOptions?: RetryOptions
): Promise<Response> {
  const retryStatusCodes = retryOptions?.retryStatusCodes ?? DEFAULT_RETRY_STATUS_CODES;

  return withRetry(async () => {
    const response = await fetch(url, init);

    if (!response.ok) {
      const statusCode = response.status;
      const body = await readBody(response);
      const message = `HTTP ${statusCode}: ${response.statusText}`;

      if (retryStatusCodes.includes(statusCode)) {
        throw new RetryableError(message, statusCode, body);
      }
      throw new NonRetryableError(message, statusCode, body);
    }

    return response;
  }, retryOptions);
}
