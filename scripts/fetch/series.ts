#!/usr/bin/env tsx
/**
 * 時系列データ取得スクリプト
 *
 * @description BOJ API から取得した行を JSON Lines で標準出力に書き、件数は標準エラーに出す
 *
 * @example
 * ```
 * npm run fetch:series -- --db FM01 --codes STRDCLUCON --start 202501
 * ```
 */

import { ArgumentError, loadEnv, parseFetchArgs, printRows, type FetchOptions } from './_shared';
import { createBojStatClient } from '../../src/lib/boj/client';

async function run(options: FetchOptions): Promise<number> {
  const client = createBojStatClient({ lang: options.lang, logContext: { script: 'fetch-series' } });
  const period = { start: options.start, end: options.end };

  switch (options.mode) {
    case 'code': {
      const rows = await client.getDataAll(options.db, options.codes, period);
      printRows(rows);
      return rows.length;
    }
    case 'layer': {
      const rows = await client.getLayer(options.db, options.frequency ?? '', options.layer ?? '', period);
      printRows(rows);
      return rows.length;
    }
    case 'metadata': {
      const rows = await client.getMetadata(options.db);
      printRows(rows);
      return rows.length;
    }
    case 'search': {
      const rows = await client.searchSeries(options.db, options.keyword);
      printRows(rows);
      return rows.length;
    }
  }
}

async function main(): Promise<void> {
  loadEnv();

  let options: FetchOptions;
  try {
    options = parseFetchArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ArgumentError) {
      console.error(error.message);
      process.exit(2);
    }
    throw error;
  }

  const count = await run(options);
  console.error(`${count} rows`);
}

main().catch((error: unknown) => {
  console.error('Failed to fetch series:', error);
  process.exit(1);
});
