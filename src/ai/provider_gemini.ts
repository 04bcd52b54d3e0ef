import { GoogleGenAI } from '@google/genai';
import type { CountTokensParameters, GenerateContentParameters } from '@google/genai';
import type { GeminiConfig } from '../config.js';
import { errorMessage } from '../helpers/errors.js';
import { createLogger } from '../helpers/logger.js';

export type ChatMsg = { role: 'system' | 'user'; content: string };

export type GenerateOpts = {
  max_tokens?: number;
  temperature?: number;
};

export const GEMINI_BACKEND = 'gemini';

export const NOT_CONFIGURED_TEXT = 'Gemini API is not configured. Set GEMINI_API_KEY and restart.';
export const BLOCKED_TEXT = "Sorry, I can't respond to that request due to safety policies. Please try rephrasing.";
export const EMPTY_TEXT = "I'm sorry, I didn't understand that. Can you rephrase?";
export const FAILED_TEXT = 'Sorry, something went wrong. Please contact the administrator.';

/**
 * The subset of a `generateContent` reply this client inspects.
 * `GenerateContentResponse` from @google/genai satisfies it.
 */
export interface GenAIResponse {
  readonly text?: string;
  candidates?: Array<{
    finishReason?: string;
    content?: { parts?: Array<{ text?: string }> };
    safetyRatings?: unknown[];
  }>;
  promptFeedback?: { blockReason?: string };
}

export interface GenAIModels {
  generateContent(params: GenerateContentParameters): Promise<GenAIResponse>;
  countTokens(params: CountTokensParameters): Promise<{ totalTokens?: number }>;
}

export type DecodedResponse =
  | { kind: 'plain_text'; text: string }
  | { kind: 'structured_candidates'; text: string }
  | { kind: 'blocked'; reason: string }
  | { kind: 'empty'; finishReason?: string };

export type CompletionReply =
  | { kind: 'text'; text: string }
  | { kind: 'blocked'; reason: string }
  | { kind: 'empty'; finishReason?: string }
  | { kind: 'failed'; error: string }
  | { kind: 'unconfigured' };

export type TokenCount = { ok: true; tokens: number } | { ok: false; reason: string };

export interface CompletionClient {
  readonly backend: string;
  generateReply(messages: ChatMsg[], opts?: GenerateOpts): Promise<CompletionReply>;
  generate(messages: ChatMsg[], opts?: GenerateOpts): Promise<string>;
  countTokens(text: string): Promise<TokenCount>;
}

export function replyText(reply: CompletionReply): string {
  switch (reply.kind) {
    case 'text':
      return reply.text;
    case 'blocked':
      return BLOCKED_TEXT;
    case 'empty':
      return EMPTY_TEXT;
    case 'failed':
      return FAILED_TEXT;
    case 'unconfigured':
      return NOT_CONFIGURED_TEXT;
  }
}

export function decodeResponse(resp: GenAIResponse): DecodedResponse {
  const plain = resp.text;
  if (typeof plain === 'string' && plain.trim()) {
    return { kind: 'plain_text', text: plain };
  }

  const first = resp.candidates?.[0];
  if (first) {
    const text = (first.content?.parts ?? [])
      .map((part) => (typeof part.text === 'string' ? part.text : ''))
      .join('')
      .trim();
    if (text) {
      return { kind: 'structured_candidates', text };
    }
    const finishReason = first.finishReason;
    if ((first.safetyRatings?.length ?? 0) > 0 || finishReason?.toUpperCase() === 'SAFETY') {
      return { kind: 'blocked', reason: finishReason ?? 'SAFETY' };
    }
  }

  const blockReason = resp.promptFeedback?.blockReason;
  if (blockReason) {
    return { kind: 'blocked', reason: blockReason };
  }
  return { kind: 'empty', finishReason: first?.finishReason };
}

function splitMessages(messages: ChatMsg[]): { systemInstruction?: string; prompt: string } {
  const systemParts = messages.filter((m) => m.role === 'system').map((m) => m.content);
  const userParts = messages.filter((m) => m.role === 'user').map((m) => m.content);
  return {
    systemInstruction: systemParts.length ? systemParts.join('\n\n') : undefined,
    prompt: userParts.join('\n\n'),
  };
}

const log = createLogger('GEMINI');

export class GeminiProvider implements CompletionClient {
  readonly backend = GEMINI_BACKEND;
  private readonly models?: GenAIModels;

  constructor(private readonly config: GeminiConfig, models?: GenAIModels) {
    if (models) {
      this.models = models;
    } else if (config.apiKey) {
      this.models = new GoogleGenAI({ apiKey: config.apiKey }).models;
      log.info(`client configured model=${config.model}`);
    } else {
      log.warn('GEMINI_API_KEY not set. Set it in environment to enable Gemini calls.');
    }
  }

  get ready(): boolean {
    return this.models !== undefined;
  }

  async countTokens(text: string): Promise<TokenCount> {
    if (!this.models) {
      return { ok: false, reason: 'unconfigured' };
    }
    try {
      const res = await this.models.countTokens({ model: this.config.model, contents: text || '' });
      if (typeof res.totalTokens === 'number' && Number.isFinite(res.totalTokens)) {
        return { ok: true, tokens: res.totalTokens };
      }
      return { ok: false, reason: 'missing totalTokens' };
    } catch (err) {
      log.debug('countTokens failed:', errorMessage(err));
      return { ok: false, reason: errorMessage(err) };
    }
  }

  async generate(messages: ChatMsg[], opts?: GenerateOpts): Promise<string> {
    return replyText(await this.generateReply(messages, opts));
  }

  async generateReply(messages: ChatMsg[], opts?: GenerateOpts): Promise<CompletionReply> {
    if (!this.models) {
      return { kind: 'unconfigured' };
    }
    const temperature = opts?.temperature ?? 0.7;
    const maxTokens = opts?.max_tokens ?? 1512;

    let reply = await this.callOnce(this.models, messages, temperature, maxTokens);
    if (
      this.config.retryOnMaxTokens &&
      reply.kind === 'empty' &&
      reply.finishReason?.toUpperCase() === 'MAX_TOKENS' &&
      maxTokens < this.config.maxTokensHardCap
    ) {
      const retryTokens = Math.min(maxTokens * 2, this.config.maxTokensHardCap);
      log.info(`retrying after MAX_TOKENS with max_tokens=${retryTokens}`);
      reply = await this.callOnce(this.models, messages, temperature, retryTokens);
    }
    return reply;
  }

  private async callOnce(
    models: GenAIModels,
    messages: ChatMsg[],
    temperature: number,
    maxTokens: number,
  ): Promise<CompletionReply> {
    const { systemInstruction, prompt } = splitMessages(messages);
    if (this.config.logPrompts) {
      log.debug(`request model=${this.config.model} temp=${temperature} max_tokens=${maxTokens}\n[system]\n${systemInstruction ?? ''}\n[prompt]\n${prompt}`);
    } else {
      log.debug(`request model=${this.config.model} messages=${messages.length} temp=${temperature} max_tokens=${maxTokens}`);
    }

    try {
      const resp = await models.generateContent({
        model: this.config.model,
        contents: prompt,
        config: {
          systemInstruction,
          temperature,
          maxOutputTokens: maxTokens,
        },
      });
      const decoded = decodeResponse(resp);
      switch (decoded.kind) {
        case 'plain_text':
        case 'structured_candidates':
          log.debug(`response preview=${decoded.text.slice(0, 200)}`);
          return { kind: 'text', text: decoded.text };
        case 'blocked':
          log.warn(`response blocked reason=${decoded.reason}`);
          return decoded;
        case 'empty':
          log.debug(`response empty finish_reason=${decoded.finishReason ?? 'n/a'}`);
          return decoded;
      }
    } catch (err) {
      log.error('chat failed:', errorMessage(err));
      return { kind: 'failed', error: errorMessage(err) };
    }
  }
}
