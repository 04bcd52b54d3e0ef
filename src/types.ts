export type Intent = 'stock_analysis' | 'market_news' | 'general_chat';

export const INTENTS: readonly Intent[] = ['stock_analysis', 'market_news', 'general_chat'];

export interface Entity {
  type: string;
  value: string;
}

export interface Plan {
  readonly intent: Intent;
  readonly entities: readonly Entity[];
}

export interface StockQuote {
  price: string | null;
  change_percent: string | null;
  volume: string | null;
}

export interface CompanyOverview {
  market_cap: string | null;
  pe_ratio: string | null;
  eps: string | null;
  week52_high: string | null;
  week52_low: string | null;
}

export interface TickerNews {
  title: string | null;
  sentiment: string | null;
}

export interface StockPayload {
  quote?: StockQuote;
  overview?: CompanyOverview;
  news?: TickerNews[];
}

export interface MarketNewsItem {
  title: string | null;
  summary: string | null;
}

export interface NewsDigestState {
  text: string;
  tokens: number;
}

export interface ChatInput {
  text?: unknown;
}

export interface ChatResult {
  readonly response: string;
  readonly backend: string;
}
