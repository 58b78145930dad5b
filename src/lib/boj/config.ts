/**
 * クライアント設定
 *
 * @description コンストラクタ引数 → 環境変数 → デフォルト値の順で解決する
 *
 * - BOJSTAT_LANG: 出力言語（jp / en）
 * - BOJSTAT_TIMEOUT_MS: リクエストタイムアウト（ミリ秒）
 * - BOJSTAT_REQUEST_INTERVAL_MS: 最小リクエスト間隔（ミリ秒）
 */

import { z } from 'zod';
import type { Language } from './constants';
import { InvalidConfigError } from './errors';
import { describeIssues } from './schemas';
import { validateLanguage } from './validator';

export const DEFAULT_LANG: Language = 'jp';
export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_REQUEST_INTERVAL_MS = 1000;

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z.object({
  BOJSTAT_LANG: z.preprocess(emptyToUndefined, z.string().optional()),
  BOJSTAT_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().optional()),
  BOJSTAT_REQUEST_INTERVAL_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).optional()),
});

export const clientConfigSchema = z.object({
  timeoutMs: z.number().int().positive(),
  requestIntervalMs: z.number().int().min(0),
});

export interface ClientConfig {
  lang: Language;
  timeoutMs: number;
  requestIntervalMs: number;
}

export interface ClientConfigInput {
  lang?: string;
  timeoutMs?: number;
  requestIntervalMs?: number;
}

/**
 * 設定を解決して検証する
 *
 * @throws {InvalidConfigError} タイムアウト・間隔が不正な場合
 * @throws {InvalidLanguageError} 言語が jp / en 以外の場合
 */
export function resolveClientConfig(
  input?: ClientConfigInput,
  env: Record<string, string | undefined> = process.env
): ClientConfig {
  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new InvalidConfigError(describeIssues(parsedEnv.error));
  }

  const lang = validateLanguage(input?.lang ?? parsedEnv.data.BOJSTAT_LANG ?? DEFAULT_LANG);

  const parsed = clientConfigSchema.safeParse({
    timeoutMs: input?.timeoutMs ?? parsedEnv.data.BOJSTAT_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
    requestIntervalMs:
      input?.requestIntervalMs ?? parsedEnv.data.BOJSTAT_REQUEST_INTERVAL_MS ?? DEFAULT_REQUEST_INTERVAL_MS,
  });
  if (!parsed.success) {
    throw new InvalidConfigError(describeIssues(parsed.error));
  }

  return { lang, ...parsed.data };
}

/**
 * 呼び出しごとの上書きを既定の設定に重ねる
 */
export function mergeCallConfig(base: ClientConfig, overrides?: ClientConfigInput): ClientConfig {
  if (!overrides) {
    return base;
  }
  return resolveClientConfig(
    {
      lang: overrides.lang ?? base.lang,
      timeoutMs: overrides.timeoutMs ?? base.timeoutMs,
      requestIntervalMs: overrides.requestIntervalMs ?? base.requestIntervalMs,
    },
    {}
  );
}
