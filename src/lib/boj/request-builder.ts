/**
 * クエリパラメータの組み立て
 *
 * 値のないパラメータ（開始期・終了期・検索開始位置の省略）は空文字で送らず、キーごと省く
 */

import { ENDPOINTS, MAX_CODES_PER_REQUEST, type EndpointName, type FrequencyCode, type Language } from './constants';
import { TooManyCodesError } from './errors';
import type { DatabaseCode, PeriodRange, QueryParams } from './types';

export interface CodeRequestArgs extends PeriodRange {
  codes: readonly string[];
  startPosition?: string | number;
}

export interface LayerRequestArgs extends PeriodRange {
  frequency: FrequencyCode;
  layer: string;
  startPosition?: string | number;
}

export type RequestSpec =
  | { kind: 'code'; args: CodeRequestArgs }
  | { kind: 'layer'; args: LayerRequestArgs }
  | { kind: 'metadata' };

export interface BuiltRequest {
  endpoint: EndpointName;
  params: QueryParams;
}

function compactParams(params: Record<string, string | number | undefined | null>): QueryParams {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null && value !== '') {
      result[key] = String(value);
    }
  }
  return result;
}

/**
 * エンドポイント種別ごとのクエリパラメータを組み立てる
 *
 * @throws {TooManyCodesError} code で 250件を超える場合（Paginator 側で分割済みのはず）
 */
export function buildRequest(spec: RequestSpec, db: DatabaseCode, lang: Language): BuiltRequest {
  const common = { format: 'json', lang, db };

  switch (spec.kind) {
    case 'code': {
      const { codes, start, end, startPosition } = spec.args;
      if (codes.length > MAX_CODES_PER_REQUEST) {
        throw new TooManyCodesError(codes.length, MAX_CODES_PER_REQUEST);
      }
      return {
        endpoint: ENDPOINTS.code,
        params: compactParams({
          ...common,
          code: codes.join(','),
          startDate: start,
          endDate: end,
          startPosition,
        }),
      };
    }
    case 'layer': {
      const { frequency, layer, start, end, startPosition } = spec.args;
      return {
        endpoint: ENDPOINTS.layer,
        params: compactParams({
          ...common,
          frequency,
          layer,
          startDate: start,
          endDate: end,
          startPosition,
        }),
      };
    }
    case 'metadata':
      return {
        endpoint: ENDPOINTS.metadata,
        params: compactParams(common),
      };
  }
}
