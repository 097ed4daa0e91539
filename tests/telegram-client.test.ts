import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { TelegramClient, fetchUpdates } from '../src/core/telegram-client.js';
import { APIError, DecodeError, NetworkError } from '../src/core/errors.js';

function mockResponse(status: number, body: string) {
  return {
    status,
    ok: status >= 200 && status < 300,
    text: async () => body,
  };
}

function stubFetch(status: number, body: unknown) {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  const fetchMock = vi.fn().mockResolvedValue(mockResponse(status, text));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('TelegramClient', () => {
  let client: TelegramClient;

  beforeEach(() => {
    client = new TelegramClient({ token: 'test-token' });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('request', () => {
    it('should substitute the token into the getUpdates path', async () => {
      const fetchMock = stubFetch(200, { ok: true, result: [] });

      await client.fetchUpdates();

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock.mock.calls[0][0]).toBe('https://api.telegram.org/bottest-token/getUpdates');
      expect(fetchMock.mock.calls[0][1]).toMatchObject({ method: 'GET' });
    });

    it('should trim a trailing slash from a custom API URL', async () => {
      const fetchMock = stubFetch(200, { ok: true, result: [] });

      await new TelegramClient({ token: 'test-token', apiUrl: 'http://localhost:8081/' }).fetchUpdates();

      expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:8081/bottest-token/getUpdates');
    });

    it('should pass an empty token through unchanged', async () => {
      const fetchMock = stubFetch(404, { ok: false, error_code: 404, description: 'Not Found' });

      await expect(fetchUpdates('')).rejects.toBeInstanceOf(APIError);
      expect(fetchMock.mock.calls[0][0]).toBe('https://api.telegram.org/bot/getUpdates');
    });
  });

  describe('fetchUpdates', () => {
    it('should return an empty list when there are no updates', async () => {
      stubFetch(200, { ok: true, result: [] });

      await expect(client.fetchUpdates()).resolves.toEqual([]);
    });

    it('should keep the order the API returned', async () => {
      stubFetch(200, {
        ok: true,
        result: [
          { update_id: 30 },
          { update_id: 10 },
          { update_id: 20 },
        ],
      });

      const updates = await client.fetchUpdates();

      expect(updates.map(u => u.updateId)).toEqual([30, 10, 20]);
    });

    it('should decode messages and entities', async () => {
      stubFetch(200, {
        ok: true,
        result: [
          {
            update_id: 7,
            message: {
              message_id: 42,
              text: 'hello',
              date: 1700000000,
              entities: [
                { type: 'bold', offset: 0, length: 5 },
                { type: 'url', offset: 0, length: 5, url: 'http://x.test' },
              ],
            },
          },
        ],
      });

      const [update] = await client.fetchUpdates();

      expect(update).toEqual({
        updateId: 7,
        message: {
          messageId: 42,
          text: 'hello',
          entities: [
            { kind: 'annotation', type: 'bold', offset: 0, length: 5 },
            { kind: 'url', offset: 0, length: 5, url: 'http://x.test' },
          ],
        },
      });
    });

    it('should fail with APIError when ok is false', async () => {
      stubFetch(401, { ok: false, error_code: 401, description: 'Unauthorized' });

      const error = await client.fetchUpdates().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(APIError);
      expect(error).toMatchObject({
        code: 'API',
        errorCode: 401,
        description: 'Unauthorized',
        message: 'Failed to get updates: 401 Unauthorized',
      });
    });

    it('should fail with APIError even when ok is false with a 200 status and a result', async () => {
      stubFetch(200, { ok: false, result: [{ update_id: 1 }] });

      const error = await client.fetchUpdates().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(APIError);
      expect(error).toMatchObject({ message: 'Failed to get updates' });
    });

    it('should fail with DecodeError for a body that is not JSON', async () => {
      stubFetch(502, '<html>Bad Gateway</html>');

      const error = await client.fetchUpdates().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DecodeError);
      expect(error).not.toBeInstanceOf(APIError);
      expect(error).toMatchObject({ code: 'DECODE', status: 502 });
    });

    it('should fail with DecodeError when ok is true but result is missing', async () => {
      stubFetch(200, { ok: true });

      await expect(client.fetchUpdates()).rejects.toBeInstanceOf(DecodeError);
    });

    it('should fail with DecodeError when an update has the wrong shape', async () => {
      stubFetch(200, { ok: true, result: [{ update_id: 'seven' }] });

      await expect(client.fetchUpdates()).rejects.toBeInstanceOf(DecodeError);
    });

    it('should fail with NetworkError when the request itself fails', async () => {
      vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

      const error = await client.fetchUpdates().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({
        code: 'NETWORK',
        message: 'GET https://api.telegram.org/bot<token>/getUpdates failed: fetch failed',
      });
    });

    it('should fail with NetworkError when the request times out', async () => {
      vi.stubGlobal('fetch', vi.fn((_url: string, init: RequestInit) => new Promise((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
      })));

      const error = await new TelegramClient({ token: 'test-token', timeout: 5 })
        .fetchUpdates()
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({
        message: 'GET https://api.telegram.org/bot<token>/getUpdates failed: timed out after 5ms',
      });
    });
  });
});
