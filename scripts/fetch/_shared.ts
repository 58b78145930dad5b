/**
 * 取得スクリプト共通ユーティリティ
 *
 * @description 環境変数の読み込みと CLI 引数の解析
 */

import { config } from 'dotenv';
import { resolve } from 'path';

let envLoaded = false;

/**
 * プロジェクトルートの .env.local を読み込む（BOJSTAT_* と LOG_LEVEL）
 */
export function loadEnv(): void {
  if (envLoaded) return;

  config({ path: resolve(process.cwd(), '.env.local') });
  envLoaded = true;
}

export const FETCH_MODES = ['code', 'layer', 'metadata', 'search'] as const;
export type FetchMode = (typeof FETCH_MODES)[number];

export interface FetchOptions {
  mode: FetchMode;
  db: string;
  codes: string[];
  frequency?: string;
  layer?: string;
  keyword?: string;
  start?: string;
  end?: string;
  lang?: 'jp' | 'en';
}

/**
 * 引数エラー
 */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

function isFetchMode(value: string): value is FetchMode {
  return FETCH_MODES.some((mode) => mode === value);
}

/**
 * CLIオプションを解析
 *
 * @example
 * ```
 * npm run fetch:series -- --db FM01 --codes STRDCLUCON,STRDCLUCONH --start 202501
 * npm run fetch:series -- --mode layer --db BP01 --frequency M --layer 1,1,1
 * npm run fetch:series -- --mode search --db FM08 --keyword ドル
 * ```
 * @throws {ArgumentError}
 */
export function parseFetchArgs(args: readonly string[]): FetchOptions {
  const values = new Map<string, string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];
    if (!arg.startsWith('--')) {
      throw new ArgumentError(`Unexpected argument: ${arg}`);
    }
    if (nextArg === undefined || nextArg.startsWith('--')) {
      throw new ArgumentError(`Missing value for ${arg}`);
    }
    values.set(arg.slice(2), nextArg);
    i++;
  }

  const mode = values.get('mode') ?? 'code';
  if (!isFetchMode(mode)) {
    throw new ArgumentError(`Invalid --mode: ${mode}. Expected one of ${FETCH_MODES.join(', ')}`);
  }

  const db = values.get('db');
  if (!db) {
    throw new ArgumentError('--db is required');
  }

  const codes = (values.get('codes') ?? '')
    .split(',')
    .map((code) => code.trim())
    .filter((code) => code !== '');
  if (mode === 'code' && codes.length === 0) {
    throw new ArgumentError('--codes is required in code mode');
  }

  const frequency = values.get('frequency');
  const layer = values.get('layer');
  if (mode === 'layer' && (!frequency || !layer)) {
    throw new ArgumentError('--frequency and --layer are required in layer mode');
  }

  const lang = values.get('lang');
  if (lang !== undefined && lang !== 'jp' && lang !== 'en') {
    throw new ArgumentError(`Invalid --lang: ${lang}. Expected jp or en`);
  }

  return {
    mode,
    db,
    codes,
    frequency,
    layer,
    keyword: values.get('keyword'),
    start: values.get('start'),
    end: values.get('end'),
    lang,
  };
}

/**
 * 行を JSON Lines で標準出力に書く
 */
export function printRows(rows: readonly object[]): void {
  for (const row of rows) {
    process.stdout.write(`${JSON.stringify(row)}\n`);
  }
}
