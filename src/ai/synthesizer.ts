import type { MarketNewsItem, NewsDigestState, StockPayload } from '../types.js';
import { DEFAULT_CHAT_MAX_TOKENS } from '../config.js';
import { createLogger } from '../helpers/logger.js';
import { generalChatPrompt, newsFinalPrompt, newsItemPrompt, stockAnalysisPrompt } from './prompts.js';
import type { CompletionClient } from './provider_gemini.js';

export const GENERAL_MAX_TOKENS = 512;
const SYNTH_TEMPERATURE = 0.5;

const log = createLogger('SYNTH');

export async function synthesizeStock(
  client: CompletionClient,
  ticker: string,
  payload: StockPayload,
  maxTokens = DEFAULT_CHAT_MAX_TOKENS,
): Promise<string> {
  return client.generate(stockAnalysisPrompt(ticker, payload, maxTokens), {
    temperature: SYNTH_TEMPERATURE,
    max_tokens: maxTokens,
  });
}

/**
 * Summarises news items one at a time, in order, until the next summary would
 * push the digest past `maxTokens`. Items after the first one that does not fit
 * are never summarised.
 */
export async function buildNewsDigest(
  client: CompletionClient,
  items: readonly MarketNewsItem[],
  maxTokens = DEFAULT_CHAT_MAX_TOKENS,
): Promise<NewsDigestState> {
  const state: NewsDigestState = { text: '', tokens: 0 };

  for (const [index, item] of items.entries()) {
    const reply = await client.generateReply(newsItemPrompt(item, maxTokens), {
      temperature: SYNTH_TEMPERATURE,
      max_tokens: maxTokens,
    });
    if (reply.kind !== 'text') {
      log.warn(`news item ${index + 1} produced no summary (${reply.kind})`);
      continue;
    }

    const candidate = await client.countTokens(reply.text);
    if (!candidate.ok) {
      log.warn(`token count unavailable for item ${index + 1} (${candidate.reason}); stopping digest`);
      break;
    }
    if (state.tokens + candidate.tokens > maxTokens) {
      log.info(`token budget reached at item ${index + 1}: ${state.tokens} + ${candidate.tokens} > ${maxTokens}`);
      break;
    }

    const text = state.text ? `${state.text}\n${reply.text}` : reply.text;
    const measured = await client.countTokens(text);
    if (!measured.ok) {
      log.warn(`token count unavailable for digest (${measured.reason}); stopping digest`);
      break;
    }
    state.text = text;
    state.tokens = measured.tokens;
    log.debug(`news item ${index + 1} appended (digest tokens=${state.tokens})`);
  }

  return state;
}

export async function synthesizeMarketNews(
  client: CompletionClient,
  query: string,
  items: readonly MarketNewsItem[],
  maxTokens = DEFAULT_CHAT_MAX_TOKENS,
): Promise<string> {
  const digest = await buildNewsDigest(client, items, maxTokens);
  return client.generate(newsFinalPrompt(query, digest.text, maxTokens), {
    temperature: SYNTH_TEMPERATURE,
    max_tokens: maxTokens * 2,
  });
}

export async function synthesizeGeneral(
  client: CompletionClient,
  text: string,
  maxTokens = DEFAULT_CHAT_MAX_TOKENS,
): Promise<string> {
  return client.generate(generalChatPrompt(text, maxTokens), {
    temperature: SYNTH_TEMPERATURE,
    max_tokens: GENERAL_MAX_TOKENS,
  });
}
