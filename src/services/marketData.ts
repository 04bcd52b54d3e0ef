import type {
  CompanyOverview,
  MarketNewsItem,
  Plan,
  StockPayload,
  StockQuote,
  TickerNews,
} from '../types.js';
import { errorMessage } from '../helpers/errors.js';
import { createLogger } from '../helpers/logger.js';
import type { MarketDataSource, ProviderJson, ProviderReply } from './alphavantage.js';

export const TICKER_NEWS_LIMIT = 5;
export const TICKER_NEWS_CAP = 3;
export const MARKET_NEWS_LIMIT = 5;
export const MARKET_NEWS_TOPIC = 'financial_markets';

const log = createLogger('MARKET');

type Branch<T> = { ok: true; value: T } | { ok: false; error: string };

function toBranch<T>(result: PromiseSettledResult<T>): Branch<T> {
  return result.status === 'fulfilled'
    ? { ok: true, value: result.value }
    : { ok: false, error: errorMessage(result.reason) };
}

function isRecord(value: unknown): value is ProviderJson {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(source: ProviderJson, key: string): string | null {
  const value = source[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

function successBody(reply: ProviderReply): ProviderJson | null {
  return reply.status >= 200 && reply.status < 300 ? reply.data : null;
}

export function extractQuote(reply: ProviderReply): StockQuote | undefined {
  const body = successBody(reply);
  const quote = body?.['Global Quote'];
  if (!isRecord(quote)) return undefined;
  return {
    price: field(quote, '05. price'),
    change_percent: field(quote, '10. change percent'),
    volume: field(quote, '06. volume'),
  };
}

export function extractOverview(reply: ProviderReply): CompanyOverview | undefined {
  const body = successBody(reply);
  if (!body) return undefined;
  const overview: CompanyOverview = {
    market_cap: field(body, 'MarketCapitalization'),
    pe_ratio: field(body, 'PERatio'),
    eps: field(body, 'EPS'),
    week52_high: field(body, '52WeekHigh'),
    week52_low: field(body, '52WeekLow'),
  };
  // a notice object in place of data carries none of the mapped fields
  return Object.values(overview).some((v) => v !== null) ? overview : undefined;
}

function feedOf(reply: ProviderReply): ProviderJson[] | undefined {
  const feed = successBody(reply)?.feed;
  if (!Array.isArray(feed)) return undefined;
  return feed.filter(isRecord);
}

export function extractTickerNews(reply: ProviderReply): TickerNews[] | undefined {
  const feed = feedOf(reply);
  if (!feed) return undefined;
  return feed.slice(0, TICKER_NEWS_CAP).map((item) => ({
    title: field(item, 'title'),
    sentiment: field(item, 'overall_sentiment_label'),
  }));
}

/**
 * Fetches quote, overview and ticker news concurrently. Any branch that throws
 * voids the whole payload; a branch that answered without its expected key only
 * drops its own section.
 */
export async function gatherStockData(source: MarketDataSource, ticker: string): Promise<StockPayload | null> {
  const settled = await Promise.allSettled([
    source.quote(ticker),
    source.overview(ticker),
    source.newsSentiment({ tickers: ticker, limit: TICKER_NEWS_LIMIT }),
  ]);
  const [quote, overview, news] = settled.map((result) => toBranch(result));

  if (!quote.ok || !overview.ok || !news.ok) {
    const errors = [quote, overview, news].flatMap((b) => (b.ok ? [] : [b.error]));
    log.error(`fan-out aborted for ${ticker}: ${errors.join('; ')}`);
    return null;
  }

  const payload: StockPayload = {};
  const quoteData = extractQuote(quote.value);
  if (quoteData) payload.quote = quoteData;
  const overviewData = extractOverview(overview.value);
  if (overviewData) payload.overview = overviewData;
  const newsData = extractTickerNews(news.value);
  if (newsData) payload.news = newsData;

  log.info(
    `responses status: quote=${quote.value.status}, overview=${overview.value.status}, news=${news.value.status}`,
  );
  if (!Object.keys(payload).length) {
    log.warn(`no usable sections for ${ticker}`);
    return null;
  }
  return payload;
}

export async function gatherMarketNews(source: MarketDataSource): Promise<MarketNewsItem[] | null> {
  let reply: ProviderReply;
  try {
    reply = await source.newsSentiment({ topics: MARKET_NEWS_TOPIC, limit: MARKET_NEWS_LIMIT });
  } catch (err) {
    log.error('market news request failed:', errorMessage(err));
    return null;
  }
  const feed = feedOf(reply);
  if (!feed || !feed.length) {
    log.warn(`market news unavailable status=${reply.status}`);
    return null;
  }
  return feed.slice(0, MARKET_NEWS_LIMIT).map((item) => ({
    title: field(item, 'title'),
    summary: field(item, 'summary'),
  }));
}

export function tickerOf(plan: Plan): string | null {
  const first = plan.entities[0];
  if (!first || first.type !== 'ticker') return null;
  const ticker = first.value.trim().toUpperCase();
  return ticker ? ticker : null;
}

export type DataRequest = { intent: 'stock_analysis'; ticker: string } | { intent: 'market_news' };

export type GatherResult =
  | { intent: 'stock_analysis'; ticker: string; payload: StockPayload | null }
  | { intent: 'market_news'; items: MarketNewsItem[] | null };

/**
 * Returns `null` when the plan needs no data (general chat, or a stock request
 * without a usable ticker).
 */
export function dataRequestFor(plan: Plan): DataRequest | null {
  switch (plan.intent) {
    case 'stock_analysis': {
      const ticker = tickerOf(plan);
      return ticker ? { intent: 'stock_analysis', ticker } : null;
    }
    case 'market_news':
      return { intent: 'market_news' };
    case 'general_chat':
      return null;
  }
}

export async function gatherForIntent(source: MarketDataSource, request: DataRequest): Promise<GatherResult> {
  switch (request.intent) {
    case 'stock_analysis':
      return { ...request, payload: await gatherStockData(source, request.ticker) };
    case 'market_news':
      return { intent: 'market_news', items: await gatherMarketNews(source) };
  }
}
