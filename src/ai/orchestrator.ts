import type { ChatResult, Plan } from '../types.js';
import { DEFAULT_CHAT_MAX_TOKENS } from '../config.js';
import { createLogger } from '../helpers/logger.js';
import type { MarketDataSource } from '../services/alphavantage.js';
import { dataRequestFor, gatherForIntent } from '../services/marketData.js';
import { planRequest } from './planner.js';
import type { CompletionClient } from './provider_gemini.js';
import { synthesizeGeneral, synthesizeMarketNews, synthesizeStock } from './synthesizer.js';

export const NEED_TICKER_TEXT = 'I can analyze a stock, but I need a valid ticker symbol.';
export const MARKET_NEWS_UNAVAILABLE_TEXT = "Sorry, I couldn't retrieve the latest market news at the moment.";

export function stockDataUnavailableText(ticker: string): string {
  return `Sorry, I couldn't retrieve financial data for ${ticker}.`;
}

export interface ChatDeps {
  completion: CompletionClient;
  marketData: MarketDataSource;
  maxTokens?: number;
}

type ChatStage = 'planning' | 'routing' | 'gathering' | 'synthesizing' | 'done';

const log = createLogger('CHAT');

/**
 * Runs one request through planning, optional data gathering and synthesis.
 * Anticipated failures come back as fixed answer text; anything else throws.
 */
export async function processChatRequest(text: string, deps: ChatDeps): Promise<ChatResult> {
  const { completion, marketData } = deps;
  const maxTokens = deps.maxTokens ?? DEFAULT_CHAT_MAX_TOKENS;
  const t0 = Date.now();
  const stage = (name: ChatStage, detail?: string) =>
    log.debug(`stage=${name}${detail ? ` ${detail}` : ''} elapsed_ms=${Date.now() - t0}`);
  const done = (response: string): ChatResult => {
    stage('done');
    return Object.freeze({ response, backend: completion.backend });
  };

  stage('planning');
  const plan: Plan = await planRequest(completion, text);
  stage('routing', `intent=${plan.intent} entities=${plan.entities.length}`);
  log.info({ q: text.slice(0, 60), intent: plan.intent });

  if (plan.intent === 'general_chat') {
    stage('synthesizing');
    return done(await synthesizeGeneral(completion, text, maxTokens));
  }

  const request = dataRequestFor(plan);
  if (!request) {
    return done(NEED_TICKER_TEXT);
  }

  stage('gathering');
  const gathered = await gatherForIntent(marketData, request);

  switch (gathered.intent) {
    case 'stock_analysis': {
      if (!gathered.payload) {
        return done(stockDataUnavailableText(gathered.ticker));
      }
      stage('synthesizing');
      return done(await synthesizeStock(completion, gathered.ticker, gathered.payload, maxTokens));
    }
    case 'market_news': {
      if (!gathered.items) {
        return done(MARKET_NEWS_UNAVAILABLE_TEXT);
      }
      log.info(`market news items=${gathered.items.length}`);
      stage('synthesizing');
      return done(await synthesizeMarketNews(completion, text, gathered.items, maxTokens));
    }
  }
}
