import type {
  ChatMsg,
  CompletionClient,
  CompletionReply,
  GenerateOpts,
  TokenCount,
} from '../../src/ai/provider_gemini.js';
import { replyText } from '../../src/ai/provider_gemini.js';
import type { MarketDataSource, NewsSentimentParams, ProviderReply } from '../../src/services/alphavantage.js';

export type TokenCounter = (text: string) => TokenCount;

/** Counts a text as the sum of the table entries for each of its lines. */
export function tableCounter(table: Record<string, number>): TokenCounter {
  return (text) => ({
    ok: true,
    tokens: text.split('\n').reduce((sum, line) => sum + (table[line] ?? 0), 0),
  });
}

export const wordCounter: TokenCounter = (text) => ({
  ok: true,
  tokens: text.split(/\s+/).filter(Boolean).length,
});

export interface RecordedCall {
  messages: ChatMsg[];
  opts?: GenerateOpts;
}

export class ScriptedCompletion implements CompletionClient {
  readonly backend = 'gemini';
  readonly calls: RecordedCall[] = [];
  readonly counted: string[] = [];
  private readonly replies: Array<string | CompletionReply>;

  constructor(replies: Array<string | CompletionReply>, private readonly counter: TokenCounter = wordCounter) {
    this.replies = [...replies];
  }

  async generateReply(messages: ChatMsg[], opts?: GenerateOpts): Promise<CompletionReply> {
    this.calls.push({ messages, opts });
    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error(`no scripted reply left for call ${this.calls.length}`);
    }
    return typeof next === 'string' ? { kind: 'text', text: next } : next;
  }

  async generate(messages: ChatMsg[], opts?: GenerateOpts): Promise<string> {
    return replyText(await this.generateReply(messages, opts));
  }

  async countTokens(text: string): Promise<TokenCount> {
    this.counted.push(text);
    return this.counter(text);
  }
}

export function reply(data: Record<string, unknown> | null, status = 200): ProviderReply {
  return { status, data };
}

type Lookup<A> = (arg: A) => Promise<ProviderReply>;

export class FakeMarketData implements MarketDataSource {
  readonly requests: string[] = [];

  constructor(
    private readonly handlers: {
      quote?: Lookup<string>;
      overview?: Lookup<string>;
      newsSentiment?: Lookup<NewsSentimentParams>;
    } = {},
  ) {}

  quote(symbol: string): Promise<ProviderReply> {
    this.requests.push(`quote:${symbol}`);
    return this.handlers.quote ? this.handlers.quote(symbol) : Promise.resolve(reply(null, 404));
  }

  overview(symbol: string): Promise<ProviderReply> {
    this.requests.push(`overview:${symbol}`);
    return this.handlers.overview ? this.handlers.overview(symbol) : Promise.resolve(reply(null, 404));
  }

  newsSentiment(params: NewsSentimentParams): Promise<ProviderReply> {
    this.requests.push(`news:${params.tickers ?? params.topics ?? ''}`);
    return this.handlers.newsSentiment
      ? this.handlers.newsSentiment(params)
      : Promise.resolve(reply(null, 404));
  }
}

export const TSLA_QUOTE = {
  'Global Quote': {
    '01. symbol': 'TSLA',
    '05. price': '251.4400',
    '06. volume': '98211020',
    '10. change percent': '1.2345%',
  },
};

export const TSLA_OVERVIEW = {
  Symbol: 'TSLA',
  MarketCapitalization: '800000000000',
  PERatio: '70.5',
  EPS: '3.56',
  '52WeekHigh': '299.29',
  '52WeekLow': '138.80',
};

export const TSLA_NEWS = {
  items: '4',
  feed: [
    { title: 'Deliveries beat estimates', overall_sentiment_label: 'Bullish', summary: 'placeholder' },
    { title: 'New factory announced', overall_sentiment_label: 'Somewhat-Bullish', summary: 'placeholder' },
    { title: 'Recall expands', overall_sentiment_label: 'Bearish', summary: 'placeholder' },
    { title: 'Analyst day recap', overall_sentiment_label: 'Neutral', summary: 'placeholder' },
  ],
};

export function marketFeed(count: number): Record<string, unknown> {
  return {
    feed: Array.from({ length: count }, (_, i) => ({
      title: `Headline ${i + 1}`,
      summary: `Summary body ${i + 1}`,
      overall_sentiment_label: 'Neutral',
    })),
  };
}
