/**
 * BOJ API への HTTP 呼び出し
 *
 * @description fetch + リトライでレスポンスを取得し、エンベロープを検証して ResultPage に変換する
 * @see https://www.stat-search.boj.or.jp/info/api_manual.pdf
 */

import { BASE_URL, STATUS_OK, type EndpointName } from './constants';
import { ServerError, TransportError } from './errors';
import { describeIssues, envelopeSchema, type Envelope } from './schemas';
import type { QueryParams, ResultPage, Transport } from './types';
import { fetchWithRetry, NonRetryableError, RetryableError, type RetryOptions } from '../utils/retry';
import { createLogger, type LogContext, type Logger } from '../utils/logger';

export interface FetchTransportOptions {
  /** API のベース URL（テスト用） */
  baseUrl?: string;
  /** リトライ設定（デフォルト: 1回リトライ） */
  retry?: Pick<RetryOptions, 'maxRetries' | 'baseDelayMs' | 'maxDelayMs' | 'jitterMs'>;
  /** ロガーコンテキスト */
  logContext?: LogContext;
}

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * エンベロープを ResultPage に変換（STATUS のチェックは呼び出し側）
 */
export function toResultPage(envelope: Envelope): ResultPage {
  const next = envelope.NEXTPOSITION;
  return {
    status: envelope.STATUS,
    messageId: envelope.MESSAGEID ?? null,
    message: envelope.MESSAGE ?? null,
    date: envelope.DATE ?? null,
    resultSet: envelope.RESULTSET ?? [],
    nextPosition: next === undefined || next === null || next === '' ? null : String(next),
  };
}

/**
 * JSON 文字列をエンベロープとして解釈する。解釈できなければ null
 */
function tryParseEnvelope(body: string | undefined): Envelope | null {
  if (!body) {
    return null;
  }
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return null;
  }
  const parsed = envelopeSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

/**
 * fetch ベースの Transport 実装
 */
export class FetchTransport implements Transport {
  private readonly baseUrl: string;
  private readonly retry: FetchTransportOptions['retry'];
  private readonly logger: Logger;

  constructor(options?: FetchTransportOptions) {
    this.baseUrl = (options?.baseUrl ?? BASE_URL).replace(/\/+$/, '');
    this.retry = options?.retry;
    this.logger = createLogger({ module: 'boj-transport', ...options?.logContext });
  }

  buildUrl(endpoint: EndpointName, params: QueryParams): string {
    const url = new URL(`${this.baseUrl}/${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.append(key, value);
    }
    return url.toString();
  }

  /**
   * 1回の HTTP 呼び出しを実行する
   *
   * @throws {TransportError} ネットワーク障害・タイムアウト・デコード不能なレスポンス
   * @throws {ServerError} STATUS が 200 以外
   */
  async perform(endpoint: EndpointName, params: QueryParams, timeoutMs: number): Promise<ResultPage> {
    const url = this.buildUrl(endpoint, params);

    this.logger.debug('BOJ API request', { endpoint, params });

    let response: Response;
    try {
      response = await fetchWithRetry(
        url,
        {
          method: 'GET',
          headers: {
            'Accept': 'application/json',
            'Accept-Encoding': 'gzip',
          },
          signal: AbortSignal.timeout(timeoutMs),
        },
        {
          maxRetries: 1,
          baseDelayMs: 1000,
          ...this.retry,
          onRetry: (attempt, error, delayMs) => {
            this.logger.warn('BOJ API request retry', { endpoint, attempt, delayMs, error });
          },
        }
      );
    } catch (error) {
      throw this.toFailure(endpoint, error, timeoutMs);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      // タイムアウトはボディの読み込み中にも発生する
      if (isTimeoutError(error)) {
        throw new TransportError(`${endpoint} timed out after ${timeoutMs}ms`, endpoint, {
          statusCode: response.status,
          timedOut: true,
        }, { cause: error });
      }
      throw new TransportError(`${endpoint} returned a body that is not JSON`, endpoint, {
        statusCode: response.status,
      }, { cause: error });
    }

    const parsed = envelopeSchema.safeParse(json);
    if (!parsed.success) {
      throw new TransportError(
        `${endpoint} returned an unexpected envelope: ${describeIssues(parsed.error)}`,
        endpoint,
        { statusCode: response.status }
      );
    }

    const page = toResultPage(parsed.data);
    if (page.status !== STATUS_OK) {
      throw new ServerError(page.status, page.messageId ?? '', page.message ?? 'Unknown error');
    }

    this.logger.debug('BOJ API response', {
      endpoint,
      seriesCount: page.resultSet.length,
      nextPosition: page.nextPosition,
    });

    return page;
  }

  /**
   * fetch 段階の失敗を ServerError / TransportError に変換
   *
   * HTTP エラーでもボディが BOJ のエンベロープならサーバーのメッセージを優先する
   */
  private toFailure(endpoint: EndpointName, error: unknown, timeoutMs: number): Error {
    if (error instanceof NonRetryableError || error instanceof RetryableError) {
      const envelope = tryParseEnvelope(error.body);
      if (envelope && envelope.STATUS !== STATUS_OK) {
        return new ServerError(envelope.STATUS, envelope.MESSAGEID ?? '', envelope.MESSAGE ?? error.message);
      }
      return new TransportError(`${endpoint} failed: ${error.message}`, endpoint, {
        statusCode: error.statusCode,
      }, { cause: error });
    }

    if (isTimeoutError(error)) {
      return new TransportError(`${endpoint} timed out after ${timeoutMs}ms`, endpoint, {
        timedOut: true,
      }, { cause: error });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(`${endpoint} failed: ${message}`, endpoint, {}, { cause: error });
  }
}

/**
 * デフォルト Transport を作成
 */
export function createFetchTransport(options?: FetchTransportOptions): FetchTransport {
  return new FetchTransport(options);
}
