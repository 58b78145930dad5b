/**
 * ページネーション
 *
 * @description 系列コードを 250件ずつに分割し、NEXTPOSITION がなくなるまで取得して連結する。
 * 途中のページで失敗した場合は、それまでに取得した行を返さずに失敗させる
 */

import { MAX_CODES_PER_REQUEST, type Language } from './constants';
import { PaginationLoopError } from './errors';
import { normalizeObservations } from './normalizer';
import { buildRequest, type BuiltRequest } from './request-builder';
import type { DatabaseCode, FrequencyCode, ObservationRow, PeriodRange, ResultPage } from './types';
import { chunkArray } from '../utils/batch';
import { createLogger, type Logger } from '../utils/logger';

const defaultLogger = createLogger({ module: 'boj-paginator' });

/**
 * 1回の HTTP 呼び出し（レート制限・タイムアウト込み）
 */
export type PageFetcher = (request: BuiltRequest) => Promise<ResultPage>;

export interface PaginateOptions {
  /** ログ・エラー用のエンドポイント名 */
  endpoint: string;
  logger?: Logger;
}

/**
 * NEXTPOSITION を辿って全ページを取得する
 *
 * サーバーは総ページ数を返さないため、一度返った NEXTPOSITION が再び返った時点でループとみなす
 *
 * @param fetchPage 検索開始位置（初回は undefined）を受け取り1ページ取得する関数
 * @yields 各ページ
 * @throws {PaginationLoopError}
 */
export async function* paginate(
  fetchPage: (position: string | undefined) => Promise<ResultPage>,
  options: PaginateOptions
): AsyncGenerator<ResultPage, void, unknown> {
  const logger = options.logger ?? defaultLogger;
  const seenPositions = new Set<string>();
  let position: string | undefined;
  let pageCount = 0;

  for (;;) {
    const page = await fetchPage(position);
    pageCount++;

    yield page;

    const next = page.nextPosition;
    if (next === null) {
      break;
    }
    if (seenPositions.has(next)) {
      throw new PaginationLoopError(options.endpoint, next, pageCount);
    }
    seenPositions.add(next);
    position = next;

    logger.debug('Fetching next page', { endpoint: options.endpoint, pageCount, nextPosition: next });
  }

  logger.debug('Pagination complete', { endpoint: options.endpoint, pageCount });
}

async function collectObservations(
  fetchPage: (position: string | undefined) => Promise<ResultPage>,
  lang: Language,
  options: PaginateOptions
): Promise<ObservationRow[]> {
  const rows: ObservationRow[] = [];
  for await (const page of paginate(fetchPage, options)) {
    for (const row of normalizeObservations(page.resultSet, lang, { logger: options.logger })) {
      rows.push(row);
    }
  }
  return rows;
}

export interface FetchAllParams extends PeriodRange {
  db: DatabaseCode;
  codes: readonly string[];
  lang: Language;
}

/**
 * コード API で全系列・全ページを取得する
 *
 * チャンクの順序は保つ。同一チャンク内の系列順はサーバーの返却順
 */
export async function fetchAll(
  fetcher: PageFetcher,
  params: FetchAllParams,
  options?: { logger?: Logger }
): Promise<ObservationRow[]> {
  const logger = options?.logger ?? defaultLogger;
  const { db, codes, lang, start, end } = params;
  const chunks = chunkArray(codes, MAX_CODES_PER_REQUEST);
  const rows: ObservationRow[] = [];

  for (const [chunkIndex, chunk] of chunks.entries()) {
    logger.debug('Fetching code chunk', {
      db,
      chunkIndex,
      chunkCount: chunks.length,
      codeCount: chunk.length,
    });

    const chunkRows = await collectObservations(
      (position) =>
        fetcher(buildRequest({ kind: 'code', args: { codes: chunk, start, end, startPosition: position } }, db, lang)),
      lang,
      { endpoint: 'getDataCode', logger }
    );
    for (const row of chunkRows) {
      rows.push(row);
    }
  }

  return rows;
}

export interface FetchLayerAllParams extends PeriodRange {
  db: DatabaseCode;
  frequency: FrequencyCode;
  layer: string;
  lang: Language;
}

/**
 * 階層 API で全ページを取得する（NEXTPOSITION の扱いはコード API と同じ）
 */
export async function fetchLayerAll(
  fetcher: PageFetcher,
  params: FetchLayerAllParams,
  options?: { logger?: Logger }
): Promise<ObservationRow[]> {
  const { db, frequency, layer, lang, start, end } = params;
  return collectObservations(
    (position) =>
      fetcher(buildRequest({ kind: 'layer', args: { frequency, layer, start, end, startPosition: position } }, db, lang)),
    lang,
    { endpoint: 'getDataLayer', logger: options?.logger ?? defaultLogger }
  );
}
