import type { AlphaVantageConfig } from '../config.js';
import { ConfigError, MarketDataError, errorMessage } from '../helpers/errors.js';
import { createLogger } from '../helpers/logger.js';

export type ProviderJson = Record<string, unknown>;

export interface ProviderReply {
  status: number;
  /** Parsed body for 2xx replies, `null` otherwise. */
  data: ProviderJson | null;
}

export type QueryParams = Record<string, string | number | undefined>;

export interface NewsSentimentParams {
  tickers?: string;
  topics?: string;
  time_from?: string;
  time_to?: string;
  sort?: 'LATEST' | 'EARLIEST' | 'RELEVANCE';
  limit?: number;
}

/**
 * Lookups the aggregator needs; `AlphaVantageClient` is the production implementation.
 */
export interface MarketDataSource {
  quote(symbol: string): Promise<ProviderReply>;
  overview(symbol: string): Promise<ProviderReply>;
  newsSentiment(params: NewsSentimentParams): Promise<ProviderReply>;
}

type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

const NOTICE_KEYS = ['Note', 'Information', 'Error Message'] as const;

const log = createLogger('ALPHAVANTAGE');

function isRecord(value: unknown): value is ProviderJson {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class AlphaVantageClient implements MarketDataSource {
  private readonly apiKey: string;
  private readonly fetchImpl: FetchFn;

  constructor(private readonly config: AlphaVantageConfig, fetchImpl?: FetchFn) {
    if (!config.apiKey) {
      throw new ConfigError('ALPHA_VANTAGE_API_KEY is not set');
    }
    this.apiKey = config.apiKey;
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  buildUrl(params: QueryParams, apiKey = this.apiKey): string {
    const url = new URL(this.config.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== '') {
        url.searchParams.set(key, String(value));
      }
    }
    url.searchParams.set('apikey', apiKey);
    return url.toString();
  }

  private async fetchText(url: string, fn: string): Promise<{ status: number; ok: boolean; body: string }> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);
    try {
      const res = await this.fetchImpl(url, { method: 'GET', signal: controller.signal });
      const body = await res.text();
      return { status: res.status, ok: res.ok, body };
    } catch (err) {
      const reason = err instanceof Error && err.name === 'AbortError'
        ? `timeout after ${this.config.timeoutMs}ms`
        : errorMessage(err);
      log.warn(`request failed function=${fn}: ${reason}`);
      throw new MarketDataError(`Alpha Vantage request failed: ${reason}`);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async query(params: QueryParams): Promise<ProviderReply> {
    const fn = String(params.function);
    const url = this.buildUrl(params);
    log.debug(`request url=${this.config.logBody ? url : this.buildUrl(params, '***')}`);

    const { status, ok, body } = await this.fetchText(url, fn);
    log.debug(`response status=${status} function=${fn}`);
    if (!ok) {
      return { status, data: null };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (err) {
      throw new MarketDataError(`Alpha Vantage response is not JSON: ${errorMessage(err)}`);
    }
    if (!isRecord(parsed)) {
      throw new MarketDataError('Alpha Vantage response is not a JSON object');
    }
    const data = parsed;

    if (this.config.logBody) {
      log.debug('response body', data);
    } else {
      log.debug(`response keys=${Object.keys(data).join(',')}`);
    }
    const notices = NOTICE_KEYS.filter((key) => key in data);
    if (notices.length) {
      log.warn(`API notice keys_present=${notices.join(',')}`);
    }
    return { status, data };
  }

  quote(symbol: string): Promise<ProviderReply> {
    return this.query({ function: 'GLOBAL_QUOTE', symbol });
  }

  overview(symbol: string): Promise<ProviderReply> {
    return this.query({ function: 'OVERVIEW', symbol });
  }

  newsSentiment(params: NewsSentimentParams): Promise<ProviderReply> {
    return this.query({ function: 'NEWS_SENTIMENT', ...params });
  }
}
