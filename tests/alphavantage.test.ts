import { describe, it, expect, vi, afterEach } from 'vitest';
import { AlphaVantageClient } from '../src/services/alphavantage.js';
import { ConfigError, MarketDataError } from '../src/helpers/errors.js';
import type { AlphaVantageConfig } from '../src/config.js';

const config: AlphaVantageConfig = {
  apiKey: 'test-key',
  baseUrl: 'https://example.test/query',
  timeoutMs: 1000,
  logBody: false,
};

function respond(body: string, status = 200) {
  return vi.fn(async (_input: string, _init?: RequestInit) => new Response(body, { status }));
}

describe('AlphaVantageClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('refuses to start without an API key', () => {
    expect(() => new AlphaVantageClient({ ...config, apiKey: undefined })).toThrow(ConfigError);
  });

  it('builds query URLs with the key appended and empty params dropped', () => {
    const client = new AlphaVantageClient(config, respond('{}'));
    expect(client.buildUrl({ function: 'NEWS_SENTIMENT', tickers: 'TSLA', topics: undefined, limit: 5 })).toBe(
      'https://example.test/query?function=NEWS_SENTIMENT&tickers=TSLA&limit=5&apikey=test-key',
    );
  });

  it('returns the parsed body for a successful quote', async () => {
    const fetchImpl = respond('{"Global Quote": {"05. price": "10.00"}}');
    const client = new AlphaVantageClient(config, fetchImpl);

    await expect(client.quote('IBM')).resolves.toEqual({
      status: 200,
      data: { 'Global Quote': { '05. price': '10.00' } },
    });
    expect(fetchImpl.mock.calls[0][0]).toBe('https://example.test/query?function=GLOBAL_QUOTE&symbol=IBM&apikey=test-key');
  });

  it('passes provider notices through as data', async () => {
    const client = new AlphaVantageClient(config, respond('{"Note": "call frequency exceeded"}'));
    await expect(client.overview('IBM')).resolves.toEqual({ status: 200, data: { Note: 'call frequency exceeded' } });
  });

  it('returns null data for non-2xx replies', async () => {
    const client = new AlphaVantageClient(config, respond('upstream down', 503));
    await expect(client.quote('IBM')).resolves.toEqual({ status: 503, data: null });
  });

  it('throws MarketDataError when the transport fails', async () => {
    const fetchImpl = vi.fn(async (_input: string, _init?: RequestInit): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    const client = new AlphaVantageClient(config, fetchImpl);
    await expect(client.newsSentiment({ topics: 'financial_markets' })).rejects.toThrow(MarketDataError);
  });

  it('logs the request URL with the key redacted, even when the key needs encoding', async () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const client = new AlphaVantageClient({ ...config, apiKey: 'test key/+' }, respond('{}'));

    await client.quote('IBM');

    expect(debug).toHaveBeenCalledWith(
      '[ALPHAVANTAGE]',
      'request url=https://example.test/query?function=GLOBAL_QUOTE&symbol=IBM&apikey=***',
    );
    expect(debug.mock.calls.flat().join(' ')).not.toContain('test+key');
  });

  it('throws MarketDataError for a body that is not JSON', async () => {
    const client = new AlphaVantageClient(config, respond('<html>oops</html>'));
    await expect(client.quote('IBM')).rejects.toThrow('Alpha Vantage response is not JSON');
  });

  it('throws MarketDataError for a JSON body that is not an object', async () => {
    const client = new AlphaVantageClient(config, respond('[1,2]'));
    await expect(client.quote('IBM')).rejects.toThrow('Alpha Vantage response is not a JSON object');
  });

  it('reports a timeout when the request is aborted', async () => {
    const fetchImpl = vi.fn(
      (_input: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const err = new Error('aborted');
            err.name = 'AbortError';
            reject(err);
          });
        }),
    );
    const client = new AlphaVantageClient({ ...config, timeoutMs: 5 }, fetchImpl);
    await expect(client.quote('IBM')).rejects.toThrow('Alpha Vantage request failed: timeout after 5ms');
  });
});
