/**
 * BOJ 時系列統計データ検索サイト API の定数
 *
 * @see https://www.stat-search.boj.or.jp/info/api_manual.pdf
 */

import databaseTable from './reference/databases.json';

export const BASE_URL = 'https://www.stat-search.boj.or.jp/api/v1';

/** API エンドポイント名 */
export const ENDPOINTS = {
  code: 'getDataCode',
  layer: 'getDataLayer',
  metadata: 'getMetadata',
} as const;

export type EndpointKind = keyof typeof ENDPOINTS;
export type EndpointName = (typeof ENDPOINTS)[EndpointKind];

/** 1リクエストあたりの系列コード数の上限 */
export const MAX_CODES_PER_REQUEST = 250;

/** 階層指定の最大深さ（LAYER1～LAYER5） */
export const MAX_LAYER_DEPTH = 5;

/** 成功時の STATUS */
export const STATUS_OK = 200;

export const LANGUAGES = ['jp', 'en'] as const;
export type Language = (typeof LANGUAGES)[number];

export const BASE_FREQUENCIES = ['CY', 'FY', 'CH', 'FH', 'Q', 'M', 'W', 'D'] as const;
export type BaseFrequency = (typeof BASE_FREQUENCIES)[number];

/** 期種コード → 説明 */
export const FREQUENCIES: Readonly<Record<BaseFrequency, string>> = {
  CY: '暦年',
  FY: '年度',
  CH: '暦年半期',
  FH: '年度半期',
  Q: '四半期',
  M: '月次',
  W: '週次',
  D: '日次',
};

/** 週次系列の曜日別期種（W0～W6） */
export const WEEKLY_VARIANTS = ['W0', 'W1', 'W2', 'W3', 'W4', 'W5', 'W6'] as const;

export type FrequencyCode = BaseFrequency | (typeof WEEKLY_VARIANTS)[number];

/** DB名 → 説明 */
export const DATABASES: Readonly<Record<string, string>> = databaseTable;
