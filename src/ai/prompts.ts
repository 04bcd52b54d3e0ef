import type { ChatMsg } from './provider_gemini.js';
import type { MarketNewsItem, StockPayload } from '../types.js';

export const ANSWER_ONLY_INSTRUCTION =
  'Only provide the answer content. Do not include meta commentary, disclaimers, or statements about tokens or formatting.';

const PLANNER_SYSTEM = [
  "You are a routing agent. Analyze the user's request and output a JSON plan.",
  "Possible intents are 'stock_analysis', 'market_news', and 'general_chat'.",
  "The entity type is 'ticker'. Only output the JSON plan. Examples:",
  'User: \'Analyze Tesla (TSLA)\' -> {"intent": "stock_analysis", "entities": [{"type": "ticker", "value": "TSLA"}]}',
  'User: \'give me the latest market news\' -> {"intent": "market_news", "entities": []}',
  'User: \'Hi there\' -> {"intent": "general_chat", "entities": []}',
].join('\n');

export function plannerPrompt(text: string): ChatMsg[] {
  return [
    { role: 'system', content: PLANNER_SYSTEM },
    { role: 'user', content: text },
  ];
}

export function stockAnalysisPrompt(ticker: string, payload: StockPayload, maxTokens: number): ChatMsg[] {
  return [
    {
      role: 'system',
      content:
        'You are a smart stock analyst. Synthesize the following data into a concise analysis for a retail investor. ' +
        `Start the response directly with the analysis. Format response and provide response less than ${maxTokens} tokens. ` +
        ANSWER_ONLY_INSTRUCTION,
    },
    { role: 'user', content: `Data for ${ticker}:\n${JSON.stringify(payload, null, 2)}` },
  ];
}

function newsDigestSystem(maxTokens: number, query?: string): string {
  const lead = query ? `You are a financial news assistant. ${query}` : 'You are a financial news assistant.';
  return (
    `${lead} Summarize the following market news headlines and summaries into a clear, easy-to-read list for a general audience. ` +
    `Format response and provide response less than ${maxTokens} tokens. ${ANSWER_ONLY_INSTRUCTION}`
  );
}

export function newsItemPrompt(item: MarketNewsItem, maxTokens: number): ChatMsg[] {
  return [
    { role: 'system', content: newsDigestSystem(maxTokens) },
    { role: 'user', content: `Market News:\n${JSON.stringify(item, null, 2)}` },
  ];
}

export function newsFinalPrompt(query: string, digest: string, maxTokens: number): ChatMsg[] {
  return [
    { role: 'system', content: newsDigestSystem(maxTokens, query) },
    { role: 'user', content: `Market News:\n${digest}` },
  ];
}

export function generalChatPrompt(text: string, maxTokens: number): ChatMsg[] {
  return [
    {
      role: 'system',
      content:
        "You are a financial assistant. You can provide a detailed analysis of a stock if given a ticker (e.g., 'analyze TSLA') " +
        'or provide the latest general market news. For other topics, act as a helpful assistant. ' +
        `Format response and provide response less than ${maxTokens} tokens. ${ANSWER_ONLY_INSTRUCTION}`,
    },
    { role: 'user', content: text },
  ];
}
