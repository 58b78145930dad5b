import { describe, it, expect, vi, afterEach } from 'vitest';
import { FetchTransport, toResultPage } from '@/lib/boj/transport';
import { ServerError, TransportError } from '@/lib/boj/errors';
import type { Envelope } from '@/lib/boj/schemas';

const BASE = 'https://boj.example.test/api/v1/';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function envelope(overrides: Partial<Envelope> = {}): Envelope {
  return {
    STATUS: 200,
    MESSAGEID: 'M181000I',
    MESSAGE: '正常に終了しました。',
    DATE: '2025-03-04T09:00:00.000+09:00',
    RESULTSET: [],
    ...overrides,
  };
}

function createTransport() {
  return new FetchTransport({ baseUrl: BASE, retry: { maxRetries: 1, baseDelayMs: 0, jitterMs: 0 } });
}

describe('transport.ts', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('toResultPage', () => {
    it('NEXTPOSITION を文字列に、空文字・null は null にする', () => {
      expect(toResultPage(envelope({ NEXTPOSITION: 251 })).nextPosition).toBe('251');
      expect(toResultPage(envelope({ NEXTPOSITION: '' })).nextPosition).toBeNull();
      expect(toResultPage(envelope({ NEXTPOSITION: null })).nextPosition).toBeNull();
      expect(toResultPage({ STATUS: 200 })).toEqual({
        status: 200,
        messageId: null,
        message: null,
        date: null,
        resultSet: [],
        nextPosition: null,
      });
    });
  });

  describe('buildUrl', () => {
    it('ベース URL の末尾スラッシュを除き、パラメータを付ける', () => {
      const url = createTransport().buildUrl('getDataCode', {
        format: 'json',
        lang: 'jp',
        db: 'FM01',
        code: 'STRDCLUCON,STRDCLUCONH',
      });

      expect(url).toBe(
        'https://boj.example.test/api/v1/getDataCode?format=json&lang=jp&db=FM01&code=STRDCLUCON%2CSTRDCLUCONH'
      );
    });
  });

  describe('perform', () => {
    it('成功レスポンスを ResultPage に変換する', async () => {
      const resultSet = [{ SERIES_CODE: 'STRDCLUCON' }];
      vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse(envelope({ RESULTSET: resultSet, NEXTPOSITION: 251 }))));

      const page = await createTransport().perform('getDataCode', { format: 'json', db: 'FM01' }, 5000);

      expect(page).toEqual({
        status: 200,
        messageId: 'M181000I',
        message: '正常に終了しました。',
        date: '2025-03-04T09:00:00.000+09:00',
        resultSet,
        nextPosition: '251',
      });
      expect(fetch).toHaveBeenCalledWith(
        'https://boj.example.test/api/v1/getDataCode?format=json&db=FM01',
        expect.objectContaining({
          method: 'GET',
          headers: { 'Accept': 'application/json', 'Accept-Encoding': 'gzip' },
          signal: expect.any(AbortSignal),
        })
      );
    });

    it('STATUS が 200 以外なら ServerError', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn().mockResolvedValue(
          jsonResponse(envelope({ STATUS: 400, MESSAGEID: 'M181005E', MESSAGE: 'DB名が正しくありません。' }))
        )
      );

      const error = await createTransport()
        .perform('getDataCode', { db: 'XX' }, 5000)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServerError);
      expect(error).toMatchObject({
        status: 400,
        messageId: 'M181005E',
        serverMessage: 'DB名が正しくありません。',
        message: '[400] M181005E: DB名が正しくありません。',
      });
    });

    it('HTTP エラーでもボディがエンベロープならサーバーのメッセージを使う', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn().mockResolvedValue(
          jsonResponse(envelope({ STATUS: 400, MESSAGEID: 'M181004E', MESSAGE: '系列コードが正しくありません。' }), 400)
        )
      );

      await expect(createTransport().perform('getDataCode', {}, 5000)).rejects.toThrow(
        '[400] M181004E: 系列コードが正しくありません。'
      );
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('5xx は1回リトライし、それでも失敗したら TransportError', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn().mockImplementation(async () => new Response('Internal Server Error', { status: 500, statusText: 'Internal Server Error' }))
      );

      const error = await createTransport()
        .perform('getDataCode', {}, 5000)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({
        endpoint: 'getDataCode',
        statusCode: 500,
        timedOut: false,
        message: 'getDataCode failed: HTTP 500: Internal Server Error',
      });
      expect(fetch).toHaveBeenCalledTimes(2);
    });

    it('タイムアウトはリトライせず timedOut の TransportError', async () => {
      const timeout = new Error('The operation was aborted due to timeout');
      timeout.name = 'TimeoutError';
      vi.stubGlobal('fetch', vi.fn().mockRejectedValue(timeout));

      const error = await createTransport()
        .perform('getMetadata', {}, 5000)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ timedOut: true, message: 'getMetadata timed out after 5000ms' });
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('ボディの読み込み中のタイムアウトも timedOut の TransportError', async () => {
      const timeout = new Error('The operation was aborted due to timeout');
      timeout.name = 'TimeoutError';
      // ヘッダーは届いたが、ボディの途中でタイムアウトしたレスポンス
      const stalled = {
        ok: true,
        status: 200,
        statusText: 'OK',
        json: async () => {
          throw timeout;
        },
      };
      vi.stubGlobal('fetch', vi.fn().mockResolvedValue(stalled));

      const error = await createTransport()
        .perform('getDataCode', {}, 300)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({
        timedOut: true,
        statusCode: 200,
        message: 'getDataCode timed out after 300ms',
      });
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('接続失敗は1回リトライしてから TransportError', async () => {
      vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

      await expect(createTransport().perform('getDataLayer', {}, 5000)).rejects.toThrow(
        'getDataLayer failed: fetch failed'
      );
      expect(fetch).toHaveBeenCalledTimes(2);
    });

    it('JSON でないボディは TransportError', async () => {
      vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('<html>maintenance</html>', { status: 200 })));

      await expect(createTransport().perform('getDataCode', {}, 5000)).rejects.toThrow(
        'getDataCode returned a body that is not JSON'
      );
    });

    it('STATUS のないボディは TransportError', async () => {
      vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ RESULTSET: [] })));

      const error = await createTransport()
        .perform('getDataCode', {}, 5000)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ message: 'getDataCode returned an unexpected envelope: STATUS: Required' });
    });
  });
});
