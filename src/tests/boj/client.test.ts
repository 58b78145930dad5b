/**
 * boj/client.ts のユニットテスト
 *
 * HTTP 呼び出しは Transport を差し替えて記録する
 */

import { describe, it, expect } from 'vitest';
import { BojStatClient, createBojStatClient } from '@/lib/boj/client';
import {
  EmptyCodesError,
  InvalidConfigError,
  InvalidLayerError,
  ServerError,
  TooManyCodesError,
  TransportError,
  UnknownDatabaseError,
  UnknownFrequencyError,
} from '@/lib/boj/errors';
import type { EndpointName, QueryParams, ResultPage, Transport } from '@/lib/boj/types';
import { sleep } from '@/lib/utils/retry';

interface RecordedCall {
  endpoint: EndpointName;
  params: QueryParams;
  timeoutMs: number;
}

function page(resultSet: unknown[], nextPosition: string | null = null): ResultPage {
  return { status: 200, messageId: 'M181000I', message: '正常に終了しました。', date: null, resultSet, nextPosition };
}

function series(seriesCode: string, dates: string[], values: Array<number | null>) {
  return {
    SERIES_CODE: seriesCode,
    NAME_OF_TIME_SERIES_J: `${seriesCode} の系列名`,
    NAME_OF_TIME_SERIES: `${seriesCode} series`,
    FREQUENCY: 'MONTHLY',
    LAST_UPDATE: '20250303',
    VALUES: { SURVEY_DATES: dates, VALUES: values },
  };
}

/** 用意したレスポンスを順に返し、呼び出しを記録する Transport */
class FakeTransport implements Transport {
  readonly calls: RecordedCall[] = [];
  maxInFlight = 0;
  private inFlight = 0;
  private readonly responses: Array<ResultPage | Error>;

  constructor(responses: Array<ResultPage | Error> = []) {
    this.responses = [...responses];
  }

  async perform(endpoint: EndpointName, params: QueryParams, timeoutMs: number): Promise<ResultPage> {
    this.calls.push({ endpoint, params, timeoutMs });
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await sleep(5);
    this.inFlight--;

    const next = this.responses.shift() ?? page([]);
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

function createClient(transport: Transport, lang: 'jp' | 'en' = 'jp'): BojStatClient {
  return createBojStatClient({ transport, lang, requestIntervalMs: 0 });
}

describe('boj/client.ts', () => {
  describe('コンストラクタ', () => {
    it('デフォルト設定', () => {
      const client = new BojStatClient({ transport: new FakeTransport() });

      expect(client.lang).toBe('jp');
      expect(client.timeoutMs).toBe(30000);
      expect(client.requestIntervalMs).toBe(1000);
    });

    it('不正な設定は InvalidConfigError', () => {
      expect(() => new BojStatClient({ transport: new FakeTransport(), timeoutMs: 0 })).toThrow(InvalidConfigError);
    });
  });

  describe('getData', () => {
    it('系列コードを指定して縦持ちの行を返す', async () => {
      const transport = new FakeTransport([page([series('STRDCLUCON', ['202501', '202502'], [0.01, 0.02])])]);
      const client = createClient(transport);

      const rows = await client.getData('fm01', ['STRDCLUCON'], { start: '202501' });

      expect(rows).toEqual([
        {
          seriesCode: 'STRDCLUCON',
          name: 'STRDCLUCON の系列名',
          unit: null,
          frequency: 'MONTHLY',
          category: null,
          lastUpdate: '20250303',
          date: '202501',
          value: 0.01,
        },
        {
          seriesCode: 'STRDCLUCON',
          name: 'STRDCLUCON の系列名',
          unit: null,
          frequency: 'MONTHLY',
          category: null,
          lastUpdate: '20250303',
          date: '202502',
          value: 0.02,
        },
      ]);
      expect(transport.calls).toEqual([
        {
          endpoint: 'getDataCode',
          params: { format: 'json', lang: 'jp', db: 'FM01', code: 'STRDCLUCON', startDate: '202501' },
          timeoutMs: 30000,
        },
      ]);
    });

    it('空のコードは HTTP 呼び出しをせずに EmptyCodesError', async () => {
      const transport = new FakeTransport();

      await expect(createClient(transport).getData('FM01', [])).rejects.toThrow(EmptyCodesError);
      expect(transport.calls).toHaveLength(0);
    });

    it('251件は TooManyCodesError、250件は1回の呼び出し', async () => {
      const transport = new FakeTransport();
      const client = createClient(transport);
      const codes = Array.from({ length: 251 }, (_, i) => `CODE${i}`);

      await expect(client.getData('FM01', codes)).rejects.toThrow(TooManyCodesError);
      expect(transport.calls).toHaveLength(0);

      await client.getData('FM01', codes.slice(0, 250));
      expect(transport.calls).toHaveLength(1);
    });

    it('未知の DB名は HTTP 呼び出しをせずに UnknownDatabaseError', async () => {
      const transport = new FakeTransport();

      await expect(createClient(transport).getData('XX99', ['A'])).rejects.toThrow(UnknownDatabaseError);
      expect(transport.calls).toHaveLength(0);
    });

    it('NEXTPOSITION があっても1回だけ呼び出す', async () => {
      const transport = new FakeTransport([page([series('STRDCLUCON', ['202501'], [0.01])], '2')]);

      const rows = await createClient(transport).getData('FM01', ['STRDCLUCON']);

      expect(rows).toHaveLength(1);
      expect(transport.calls).toHaveLength(1);
    });

    it('呼び出しごとに言語・タイムアウトを上書きできる', async () => {
      const transport = new FakeTransport([page([series('STRDCLUCON', ['202501'], [0.01])])]);
      const client = createClient(transport);

      const [row] = await client.getData('FM01', ['STRDCLUCON'], { lang: 'en', timeoutMs: 5000 });

      expect(row.name).toBe('STRDCLUCON series');
      expect(transport.calls[0].params.lang).toBe('en');
      expect(transport.calls[0].timeoutMs).toBe(5000);
      expect(client.lang).toBe('jp');
    });

    it('サーバーエラーはそのまま伝える', async () => {
      const serverError = new ServerError(400, 'M181004E', '系列コードが正しくありません。');
      const transport = new FakeTransport([serverError]);

      await expect(createClient(transport).getData('FM01', ['NOPE'])).rejects.toBe(serverError);
    });

    it('同じクライアントの呼び出しは直列に実行される', async () => {
      const transport = new FakeTransport();
      const client = createClient(transport);

      await Promise.all([
        client.getData('FM01', ['A']),
        client.getData('FM01', ['B']),
        client.getMetadata('FM01'),
      ]);

      expect(transport.calls).toHaveLength(3);
      expect(transport.maxInFlight).toBe(1);
    });
  });

  describe('タイムアウト', () => {
    it('キュー待ちが timeoutMs を超えたら送信せずに timedOut の TransportError', async () => {
      const transport = new FakeTransport();
      const client = createBojStatClient({ transport, requestIntervalMs: 200, timeoutMs: 50 });

      const [first, second] = await Promise.allSettled([
        client.getData('FM01', ['A']),
        client.getData('FM01', ['B']),
      ]);

      expect(first.status).toBe('fulfilled');
      expect(second.status).toBe('rejected');
      if (second.status === 'rejected') {
        expect(second.reason).toBeInstanceOf(TransportError);
        expect(second.reason).toMatchObject({
          timedOut: true,
          message: 'getDataCode timed out after 50ms waiting in the request queue',
        });
      }
      expect(transport.calls).toHaveLength(1);
    });

    it('間隔が timeoutMs 以内なら待機してから送信する', async () => {
      const transport = new FakeTransport();
      const client = createBojStatClient({ transport, requestIntervalMs: 20, timeoutMs: 1000 });

      await Promise.all([client.getData('FM01', ['A']), client.getData('FM01', ['B'])]);

      expect(transport.calls).toHaveLength(2);
    });
  });

  describe('getDataRaw', () => {
    it('レスポンスを正規化せずに返す', async () => {
      const raw = page([series('STRDCLUCON', ['202501'], [0.01])], '2');
      const transport = new FakeTransport([raw]);

      const result = await createClient(transport).getDataRaw('FM01', ['STRDCLUCON'], { startPosition: 1 });

      expect(result).toBe(raw);
      expect(transport.calls[0].params.startPosition).toBe('1');
    });
  });

  describe('getDataAll', () => {
    it('251件以上のコードを分割し、NEXTPOSITION を辿る', async () => {
      const codes = Array.from({ length: 300 }, (_, i) => `CODE${i}`);
      const transport = new FakeTransport([
        page([series('CODE0', ['202501'], [1])], '200'),
        page([series('CODE200', ['202501'], [2])]),
        page([series('CODE250', ['202501'], [3])]),
      ]);

      const rows = await createClient(transport).getDataAll('FM01', codes);

      expect(rows.map((row) => row.value)).toEqual([1, 2, 3]);
      expect(transport.calls.map((call) => call.params.code.split(',').length)).toEqual([250, 250, 50]);
      expect(transport.calls.map((call) => call.params.startPosition)).toEqual([undefined, '200', undefined]);
    });

    it('途中で失敗したら部分的な結果を返さない', async () => {
      const codes = Array.from({ length: 300 }, (_, i) => `CODE${i}`);
      const transport = new FakeTransport([
        page([series('CODE0', ['202501'], [1])]),
        new ServerError(500, 'M181090S', 'Internal error'),
      ]);

      await expect(createClient(transport).getDataAll('FM01', codes)).rejects.toThrow(ServerError);
      expect(transport.calls).toHaveLength(2);
    });
  });

  describe('getLayer', () => {
    it('期種・階層を正規化して送り、全ページを連結する', async () => {
      const transport = new FakeTransport([
        page([series('BPBP6JYNCB', ['202401'], [100])], '255'),
        page([series('BPBP6JYNCB', ['202402'], [null])]),
      ]);

      const rows = await createClient(transport).getLayer('bp01', 'm', '1, 1', { start: '202401' });

      expect(rows.map((row) => [row.date, row.value])).toEqual([
        ['202401', 100],
        ['202402', null],
      ]);
      expect(transport.calls[0]).toEqual({
        endpoint: 'getDataLayer',
        params: { format: 'json', lang: 'jp', db: 'BP01', frequency: 'M', layer: '1,1', startDate: '202401' },
        timeoutMs: 30000,
      });
      expect(transport.calls[1].params.startPosition).toBe('255');
    });

    it('不正な期種・階層は HTTP 呼び出しをせずに失敗する', async () => {
      const transport = new FakeTransport();
      const client = createClient(transport);

      await expect(client.getLayer('BP01', 'X', '*')).rejects.toThrow(UnknownFrequencyError);
      await expect(client.getLayer('BP01', 'M', '1,1,1,1,1,1')).rejects.toThrow(InvalidLayerError);
      expect(transport.calls).toHaveLength(0);
    });
  });

  describe('getLayerRaw', () => {
    it('1ページだけ取得して返す', async () => {
      const raw = page([], '255');
      const transport = new FakeTransport([raw]);

      const result = await createClient(transport).getLayerRaw('BP01', 'Q', '*');

      expect(result).toBe(raw);
      expect(transport.calls).toHaveLength(1);
      expect(transport.calls[0].params.layer).toBe('*');
    });
  });

  describe('getMetadata / searchSeries', () => {
    const metadata = [
      { SERIES_CODE: '', NAME_OF_TIME_SERIES: 'Foreign Exchange Rates', LAYER1: '1' },
      { SERIES_CODE: 'FXERD01', NAME_OF_TIME_SERIES: 'US.Dollar/Yen Spot Rate at 9:00', LAYER1: '1', LAYER2: '1' },
      { SERIES_CODE: 'FXERD31', NAME_OF_TIME_SERIES: 'Euro/US.DOLLAR Spot Rate', LAYER1: '1', LAYER2: '2' },
      { SERIES_CODE: 'FXERD04', NAME_OF_TIME_SERIES: 'Yen/Euro Spot Rate', LAYER1: '1', LAYER2: '3' },
    ];

    it('メタデータを1系列1行で返す', async () => {
      const transport = new FakeTransport([page(metadata)]);

      const rows = await createClient(transport, 'en').getMetadata('FM08');

      expect(rows.map((row) => [row.seriesCode, row.layer1, row.layer2])).toEqual([
        ['', 1, null],
        ['FXERD01', 1, 1],
        ['FXERD31', 1, 2],
        ['FXERD04', 1, 3],
      ]);
      expect(transport.calls[0]).toEqual({
        endpoint: 'getMetadata',
        params: { format: 'json', lang: 'en', db: 'FM08' },
        timeoutMs: 30000,
      });
    });

    it('系列名にキーワードを含む系列を大文字小文字を区別せずに返す', async () => {
      const transport = new FakeTransport([page(metadata)]);

      const rows = await createClient(transport, 'en').searchSeries('FM08', 'dollar');

      expect(rows.map((row) => row.seriesCode)).toEqual(['FXERD01', 'FXERD31']);
    });

    it('キーワードがなければ全件を返す', async () => {
      const transport = new FakeTransport([page(metadata)]);

      const rows = await createClient(transport, 'en').searchSeries('FM08');

      expect(rows).toHaveLength(4);
    });
  });

  describe('参照テーブル', () => {
    it('listDatabases は HTTP 呼び出しをせずに DB一覧を返す', () => {
      const transport = new FakeTransport();
      const databases = createClient(transport).listDatabases();

      expect(databases).toHaveLength(50);
      expect(databases).toContainEqual({ code: 'FM08', description: '外国為替市況' });
      expect(transport.calls).toHaveLength(0);
    });

    it('listFrequencies は W0～W6 を含む', () => {
      const frequencies = createClient(new FakeTransport()).listFrequencies();

      expect(frequencies).toHaveLength(15);
      expect(frequencies[0]).toEqual({ code: 'CY', description: '暦年' });
      expect(frequencies).toContainEqual({ code: 'W3', description: '週次（W3）' });
    });
  });
});
