/**
 * BOJ 統計 API クライアントの型定義
 */

import type { EndpointName, FrequencyCode, Language } from './constants';

export type { EndpointKind, EndpointName, FrequencyCode, Language } from './constants';

/** 検証済み DB名（大文字） */
export type DatabaseCode = string;

/** 送信するクエリパラメータ（値のないものは含めない） */
export type QueryParams = Readonly<Record<string, string>>;

/**
 * 1回の HTTP 呼び出しのデコード結果
 */
export interface ResultPage {
  status: number;
  messageId: string | null;
  message: string | null;
  /** レスポンス作成日時（サーバー形式のまま） */
  date: string | null;
  /** 系列ブロックの配列（未検証） */
  resultSet: unknown[];
  /** 続きがある場合の検索開始位置 */
  nextPosition: string | null;
}

/**
 * 観測値1件（系列 × 期）
 */
export interface ObservationRow {
  readonly seriesCode: string;
  readonly name: string | null;
  readonly unit: string | null;
  readonly frequency: string | null;
  readonly category: string | null;
  readonly lastUpdate: string | null;
  /** 期（サーバー形式のまま。ISO 形式には変換しない） */
  readonly date: string;
  /** 数値に変換できない値は null */
  readonly value: number | null;
}

/**
 * 系列のメタ情報1件
 */
export interface MetadataRow {
  readonly seriesCode: string;
  readonly name: string | null;
  readonly unit: string | null;
  readonly frequency: string | null;
  readonly category: string | null;
  readonly layer1: number | null;
  readonly layer2: number | null;
  readonly layer3: number | null;
  readonly layer4: number | null;
  readonly layer5: number | null;
  readonly startOfSeries: string | null;
  readonly endOfSeries: string | null;
  readonly lastUpdate: string | null;
  readonly notes: string | null;
}

/**
 * 参照テーブルの1行（DB名・期種の一覧）
 */
export interface ReferenceEntry<C extends string = string> {
  code: C;
  description: string;
}

/**
 * 期間指定（期種に応じて YYYYMM / YYYYQQ / YYYYHH / YYYY）
 */
export interface PeriodRange {
  start?: string;
  end?: string;
}

/**
 * HTTP 呼び出しの抽象
 */
export interface Transport {
  perform(endpoint: EndpointName, params: QueryParams, timeoutMs: number): Promise<ResultPage>;
}

/**
 * 呼び出しごとに上書きできる設定
 */
export interface CallOptions {
  /** 出力言語 */
  lang?: Language;
  /** リクエストタイムアウト（ミリ秒） */
  timeoutMs?: number;
  /** 最小リクエスト間隔（ミリ秒） */
  requestIntervalMs?: number;
}

export type FrequencyReferenceEntry = ReferenceEntry<FrequencyCode>;
