/**
 * boj-stat - 日本銀行 時系列統計データ検索サイト API クライアント
 *
 * @example
 * ```typescript
 * import { createBojStatClient } from 'boj-stat';
 *
 * const client = createBojStatClient();
 * const meta = await client.searchSeries('FM08', 'ドル');
 * const rows = await client.getData('FM01', ['STRDCLUCON'], { start: '202501' });
 * ```
 */

export { BojStatClient, createBojStatClient } from './lib/boj/client';
export type { BojStatClientOptions, GetDataOptions, PeriodQueryOptions } from './lib/boj/client';
export { FetchTransport, createFetchTransport } from './lib/boj/transport';
export type { FetchTransportOptions } from './lib/boj/transport';
export {
  BASE_URL,
  DATABASES,
  ENDPOINTS,
  FREQUENCIES,
  LANGUAGES,
  MAX_CODES_PER_REQUEST,
  WEEKLY_VARIANTS,
} from './lib/boj/constants';
export * from './lib/boj/errors';
export { normalizeMetadata, normalizeObservations } from './lib/boj/normalizer';
export { fetchAll, fetchLayerAll, paginate } from './lib/boj/paginator';
export type { PageFetcher } from './lib/boj/paginator';
export { buildRequest } from './lib/boj/request-builder';
export type { BuiltRequest, RequestSpec } from './lib/boj/request-builder';
export {
  validateDatabase,
  validateFrequency,
  validateLanguage,
  validateLayer,
  validateSeriesCodes,
} from './lib/boj/validator';
export { resolveClientConfig } from './lib/boj/config';
export type { ClientConfig } from './lib/boj/config';
export type * from './lib/boj/types';
export { createLogger } from './lib/utils/logger';
export type { LogContext, Logger } from './lib/utils/logger';
