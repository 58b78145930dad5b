/**
 * 日本銀行 時系列統計データ検索サイト API クライアント
 *
 * @description コード API・階層 API・メタデータ API の呼び出しと縦持ちデータへの正規化
 * @see https://www.stat-search.boj.or.jp/info/api_manual.pdf
 *
 * - リクエストはクライアントごとに直列化し、前回完了から requestIntervalMs 空ける
 * - 1回の呼び出しが失敗したら論理クエリ全体を失敗させる（部分的な結果は返さない）
 * - リトライは Transport のみ。クライアント層では再試行しない
 */

import { BASE_FREQUENCIES, DATABASES, FREQUENCIES, WEEKLY_VARIANTS } from './constants';
import { mergeCallConfig, resolveClientConfig, type ClientConfig, type ClientConfigInput } from './config';
import { TransportError } from './errors';
import { normalizeMetadata, normalizeObservations } from './normalizer';
import { fetchAll, fetchLayerAll, type PageFetcher } from './paginator';
import { buildRequest } from './request-builder';
import { createFetchTransport } from './transport';
import type {
  CallOptions,
  DatabaseCode,
  FrequencyReferenceEntry,
  Language,
  MetadataRow,
  ObservationRow,
  PeriodRange,
  ReferenceEntry,
  ResultPage,
  Transport,
} from './types';
import {
  validateDatabase,
  validateFrequency,
  validateLayer,
  validateSeriesCodes,
} from './validator';
import { RateLimiter } from '../utils/rate-limiter';
import { createLogger, type LogContext, type Logger } from '../utils/logger';

export interface BojStatClientOptions {
  /** 出力言語（省略時は環境変数 BOJSTAT_LANG、既定は "jp"） */
  lang?: Language;
  /**
   * リクエストタイムアウト（ミリ秒、既定: 30000）
   *
   * HTTP 呼び出し1回ごとに適用する。レート制限のキュー待ちがこれを超えた場合も TransportError（timedOut）
   */
  timeoutMs?: number;
  /** 最小リクエスト間隔（ミリ秒、既定: 1000） */
  requestIntervalMs?: number;
  /** HTTP 呼び出しの差し替え（省略時は fetch） */
  transport?: Transport;
  /** ロガーコンテキスト */
  logContext?: LogContext;
}

export interface PeriodQueryOptions extends PeriodRange, CallOptions {}

export interface GetDataOptions extends PeriodQueryOptions {
  /** 検索開始位置（前回レスポンスの NEXTPOSITION） */
  startPosition?: string | number;
}

function countRows(result: unknown[] | ResultPage): number {
  return Array.isArray(result) ? result.length : result.resultSet.length;
}

/**
 * BOJ 統計 API クライアント
 *
 * @example
 * ```typescript
 * const client = createBojStatClient({ lang: 'en' });
 * const rows = await client.getData('FM01', ['STRDCLUCON'], { start: '202501' });
 * ```
 */
export class BojStatClient {
  private readonly config: ClientConfig;
  private readonly transport: Transport;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;

  constructor(options?: BojStatClientOptions) {
    this.config = resolveClientConfig(options);
    this.logger = createLogger({ module: 'boj-client', ...options?.logContext });
    this.transport = options?.transport ?? createFetchTransport({ logContext: options?.logContext });
    this.rateLimiter = new RateLimiter({ minIntervalMs: this.config.requestIntervalMs });
  }

  get lang(): Language {
    return this.config.lang;
  }

  get timeoutMs(): number {
    return this.config.timeoutMs;
  }

  get requestIntervalMs(): number {
    return this.config.requestIntervalMs;
  }

  /**
   * レート制限・タイムアウトを適用した1ページ取得関数
   *
   * キュー待ち（前の呼び出しと最小間隔の待機）が timeoutMs を超えた場合は、送信せずに失敗させる
   */
  private createFetcher(config: ClientConfig): PageFetcher {
    return (request) => {
      const queuedAt = Date.now();
      this.logger.debug('BOJ API request queued', {
        endpoint: request.endpoint,
        queueLength: this.rateLimiter.queueLength,
      });

      return this.rateLimiter.schedule(() => {
        const waitedMs = Date.now() - queuedAt;
        if (waitedMs > config.timeoutMs) {
          throw new TransportError(
            `${request.endpoint} timed out after ${config.timeoutMs}ms waiting in the request queue`,
            request.endpoint,
            { timedOut: true }
          );
        }
        return this.transport.perform(request.endpoint, request.params, config.timeoutMs);
      }, config.requestIntervalMs);
    };
  }

  private resolveCall(options?: CallOptions): ClientConfig {
    const overrides: ClientConfigInput | undefined = options
      ? { lang: options.lang, timeoutMs: options.timeoutMs, requestIntervalMs: options.requestIntervalMs }
      : undefined;
    return mergeCallConfig(this.config, overrides);
  }

  /**
   * 処理時間を計測し、失敗時はログを残して再送出する
   */
  private async track<T extends unknown[] | ResultPage>(
    label: string,
    context: LogContext,
    fn: () => Promise<T>
  ): Promise<T> {
    const timer = this.logger.startTimer(label);
    try {
      const result = await fn();
      timer.end({ ...context, rowCount: countRows(result) });
      return result;
    } catch (error) {
      timer.endWithError(error, context);
      throw error;
    }
  }

  /**
   * コード API：系列コードを指定して時系列データを取得する（1回の HTTP 呼び出し）
   *
   * @param db DB名（例: "FM08", "CO"）。大文字小文字は問わない
   * @param codes 系列コード（1～250件、同じ期種のみ）。"IR01'MADR1Z@D" のような DB名付きは不可
   * @throws {EmptyCodesError}
   * @throws {TooManyCodesError} 251件以上の場合は getDataAll を使う
   */
  async getData(db: string, codes: readonly string[], options?: GetDataOptions): Promise<ObservationRow[]> {
    const config = this.resolveCall(options);
    const dbCode = validateDatabase(db);
    const seriesCodes = validateSeriesCodes(codes);

    return this.track('getData', { db: dbCode, codeCount: seriesCodes.length }, async () => {
      const page = await this.requestCodePage(dbCode, seriesCodes, config, options);
      if (page.nextPosition !== null) {
        this.logger.warn('More data is available; use getDataAll to follow NEXTPOSITION', {
          db: dbCode,
          nextPosition: page.nextPosition,
        });
      }
      return normalizeObservations(page.resultSet, config.lang, { logger: this.logger });
    });
  }

  /**
   * コード API のレスポンスを正規化せずに返す
   */
  async getDataRaw(db: string, codes: readonly string[], options?: GetDataOptions): Promise<ResultPage> {
    const config = this.resolveCall(options);
    const dbCode = validateDatabase(db);
    const seriesCodes = validateSeriesCodes(codes);

    return this.track('getDataRaw', { db: dbCode, codeCount: seriesCodes.length }, () =>
      this.requestCodePage(dbCode, seriesCodes, config, options)
    );
  }

  private requestCodePage(
    db: DatabaseCode,
    codes: readonly string[],
    config: ClientConfig,
    options?: GetDataOptions
  ): Promise<ResultPage> {
    const request = buildRequest(
      {
        kind: 'code',
        args: { codes, start: options?.start, end: options?.end, startPosition: options?.startPosition },
      },
      db,
      config.lang
    );
    return this.createFetcher(config)(request);
  }

  /**
   * コード API：250件ごとの分割と NEXTPOSITION の追跡を自動で行い全データを取得する
   *
   * @param codes 系列コード（件数上限なし）
   */
  async getDataAll(db: string, codes: readonly string[], options?: PeriodQueryOptions): Promise<ObservationRow[]> {
    const config = this.resolveCall(options);
    const dbCode = validateDatabase(db);
    const seriesCodes = validateSeriesCodes(codes, { max: Number.POSITIVE_INFINITY });

    return this.track('getDataAll', { db: dbCode, codeCount: seriesCodes.length }, () =>
      fetchAll(
        this.createFetcher(config),
        { db: dbCode, codes: seriesCodes, lang: config.lang, start: options?.start, end: options?.end },
        { logger: this.logger }
      )
    );
  }

  /**
   * 階層 API：階層情報を指定して時系列データを取得する
   *
   * @param frequency 期種（CY, FY, CH, FH, Q, M, W, W0～W6, D）
   * @param layer 階層指定（例: "*", "1,1", "1,*,1"）
   */
  async getLayer(
    db: string,
    frequency: string,
    layer: string,
    options?: PeriodQueryOptions
  ): Promise<ObservationRow[]> {
    const config = this.resolveCall(options);
    const dbCode = validateDatabase(db);
    const frequencyCode = validateFrequency(frequency);
    const layerSpec = validateLayer(layer);

    return this.track('getLayer', { db: dbCode, frequency: frequencyCode, layer: layerSpec }, () =>
      fetchLayerAll(
        this.createFetcher(config),
        {
          db: dbCode,
          frequency: frequencyCode,
          layer: layerSpec,
          lang: config.lang,
          start: options?.start,
          end: options?.end,
        },
        { logger: this.logger }
      )
    );
  }

  /**
   * 階層 API のレスポンス1ページを正規化せずに返す
   */
  async getLayerRaw(
    db: string,
    frequency: string,
    layer: string,
    options?: GetDataOptions
  ): Promise<ResultPage> {
    const config = this.resolveCall(options);
    const dbCode = validateDatabase(db);
    const frequencyCode = validateFrequency(frequency);
    const layerSpec = validateLayer(layer);

    return this.track('getLayerRaw', { db: dbCode, frequency: frequencyCode, layer: layerSpec }, () =>
      this.createFetcher(config)(
        buildRequest(
          {
            kind: 'layer',
            args: {
              frequency: frequencyCode,
              layer: layerSpec,
              start: options?.start,
              end: options?.end,
              startPosition: options?.startPosition,
            },
          },
          dbCode,
          config.lang
        )
      )
    );
  }

  /**
   * メタデータ API：DB内の全系列のメタ情報を取得する（1回の HTTP 呼び出し）
   */
  async getMetadata(db: string, options?: CallOptions): Promise<MetadataRow[]> {
    const config = this.resolveCall(options);
    const dbCode = validateDatabase(db);

    return this.track('getMetadata', { db: dbCode }, async () => {
      const page = await this.createFetcher(config)(buildRequest({ kind: 'metadata' }, dbCode, config.lang));
      return normalizeMetadata(page.resultSet, config.lang);
    });
  }

  /**
   * メタデータから系列名称にキーワードを含む系列を探す（大文字小文字を区別しない）
   *
   * @param keyword 省略または空文字の場合は全件を返す
   */
  async searchSeries(db: string, keyword?: string, options?: CallOptions): Promise<MetadataRow[]> {
    const metadata = await this.getMetadata(db, options);
    if (keyword === undefined || keyword === '') {
      return metadata;
    }

    const needle = keyword.toLowerCase();
    const matched = metadata.filter((row) => (row.name ?? '').toLowerCase().includes(needle));

    this.logger.debug('Series search', { db, keyword, matched: matched.length, total: metadata.length });
    return matched;
  }

  /**
   * 利用可能な DB名と説明の一覧（ネットワークアクセスなし）
   */
  listDatabases(): ReferenceEntry[] {
    return Object.entries(DATABASES).map(([code, description]) => ({ code, description }));
  }

  /**
   * 期種コードと説明の一覧（週次の曜日別 W0～W6 を含む）
   */
  listFrequencies(): FrequencyReferenceEntry[] {
    const base = BASE_FREQUENCIES.map((code): FrequencyReferenceEntry => ({
      code,
      description: FREQUENCIES[code],
    }));
    const weekly = WEEKLY_VARIANTS.map((code): FrequencyReferenceEntry => ({
      code,
      description: `${FREQUENCIES.W}（${code}）`,
    }));
    return [...base, ...weekly];
  }
}

/**
 * クライアントインスタンスを作成
 */
export function createBojStatClient(options?: BojStatClientOptions): BojStatClient {
  return new BojStatClient(options);
}
