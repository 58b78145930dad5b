/**
 * 入力検証
 *
 * @description DB名・期種・言語・階層指定・系列コードの検証。いずれも副作用なし
 */

import {
  BASE_FREQUENCIES,
  DATABASES,
  LANGUAGES,
  MAX_CODES_PER_REQUEST,
  MAX_LAYER_DEPTH,
  WEEKLY_VARIANTS,
  type FrequencyCode,
  type Language,
} from './constants';
import {
  EmptyCodesError,
  InvalidLanguageError,
  InvalidLayerError,
  InvalidSeriesCodeError,
  TooManyCodesError,
  UnknownDatabaseError,
  UnknownFrequencyError,
} from './errors';
import type { DatabaseCode } from './types';

export const VALID_FREQUENCIES: readonly FrequencyCode[] = [
  ...BASE_FREQUENCIES,
  ...WEEKLY_VARIANTS,
];

const LAYER_COMPONENT = /^(\*|[1-9]\d*)$/;

/** データコード形式（DB名'系列コード）の区切り */
const DB_PREFIX_SEPARATOR = "'";

function isFrequencyCode(value: string): value is FrequencyCode {
  return VALID_FREQUENCIES.some((frequency) => frequency === value);
}

function isLanguage(value: string): value is Language {
  return LANGUAGES.some((lang) => lang === value);
}

/**
 * DB名を検証して大文字で返す
 *
 * @throws {UnknownDatabaseError} 参照テーブルにない場合
 */
export function validateDatabase(code: string): DatabaseCode {
  const db = code.trim().toUpperCase();
  if (!Object.hasOwn(DATABASES, db)) {
    throw new UnknownDatabaseError(db);
  }
  return db;
}

/**
 * 期種を検証して大文字で返す（週次の W0～W6 も可）
 *
 * @throws {UnknownFrequencyError}
 */
export function validateFrequency(code: string): FrequencyCode {
  const frequency = code.trim().toUpperCase();
  if (!isFrequencyCode(frequency)) {
    throw new UnknownFrequencyError(frequency, VALID_FREQUENCIES);
  }
  return frequency;
}

/**
 * @throws {InvalidLanguageError}
 */
export function validateLanguage(lang: string): Language {
  const normalized = lang.trim().toLowerCase();
  if (!isLanguage(normalized)) {
    throw new InvalidLanguageError(lang);
  }
  return normalized;
}

/**
 * 階層指定を検証して正規化する
 *
 * 1～5個のカンマ区切り。各要素は正の整数か "*"。省略した後ろの階層はワイルドカード扱い
 *
 * @example validateLayer('1, *, 1') // => '1,*,1'
 * @throws {InvalidLayerError}
 */
export function validateLayer(layer: string): string {
  const components = layer.split(',').map((component) => component.trim());

  if (components.length > MAX_LAYER_DEPTH) {
    throw new InvalidLayerError(layer, `at most ${MAX_LAYER_DEPTH} components are allowed`);
  }

  for (const component of components) {
    if (!LAYER_COMPONENT.test(component)) {
      throw new InvalidLayerError(layer, `"${component}" is neither a positive integer nor "*"`);
    }
  }

  return components.join(',');
}

export interface ValidateSeriesCodesOptions {
  /** 上限件数（デフォルト: 250） */
  max?: number;
}

/**
 * 系列コードのリストを検証する
 *
 * @throws {EmptyCodesError} 空の場合
 * @throws {TooManyCodesError} 上限を超える場合
 * @throws {InvalidSeriesCodeError} 空文字、または DB名付きのデータコードが含まれる場合
 */
export function validateSeriesCodes(
  codes: readonly string[],
  options?: ValidateSeriesCodesOptions
): string[] {
  const max = options?.max ?? MAX_CODES_PER_REQUEST;

  if (codes.length === 0) {
    throw new EmptyCodesError();
  }
  if (codes.length > max) {
    throw new TooManyCodesError(codes.length, max);
  }

  return codes.map((raw) => {
    const code = raw.trim();
    if (code === '') {
      throw new InvalidSeriesCodeError(raw, 'series code is empty');
    }
    if (code.includes(DB_PREFIX_SEPARATOR)) {
      throw new InvalidSeriesCodeError(
        raw,
        `pass the series code without the DB prefix (e.g. "${code.split(DB_PREFIX_SEPARATOR).pop() ?? code}")`
      );
    }
    return code;
  });
}
