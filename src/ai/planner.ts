import type { Entity, Intent, Plan } from '../types.js';
import { INTENTS } from '../types.js';
import { createLogger } from '../helpers/logger.js';
import { plannerPrompt } from './prompts.js';
import type { CompletionClient } from './provider_gemini.js';

export const PLANNER_MAX_TOKENS = 1000;

export const FALLBACK_PLAN: Plan = Object.freeze({ intent: 'general_chat', entities: Object.freeze([]) });

const log = createLogger('PLANNER');

function isIntent(value: unknown): value is Intent {
  return typeof value === 'string' && (INTENTS as readonly string[]).includes(value);
}

export function stripJsonFence(raw: string): string {
  let text = raw.trim();
  if (text.startsWith('```json')) {
    text = text.slice('```json'.length);
    if (text.endsWith('```')) {
      text = text.slice(0, -'```'.length);
    }
    text = text.trim();
  }
  return text;
}

function normalizeEntities(value: unknown): Entity[] {
  if (!Array.isArray(value)) return [];
  return value.map((item: unknown) => {
    if (typeof item !== 'object' || item === null) return { type: '', value: '' };
    const type = 'type' in item ? item.type : undefined;
    const entityValue = 'value' in item ? item.value : undefined;
    return {
      type: typeof type === 'string' ? type : '',
      value: typeof entityValue === 'string' ? entityValue : '',
    };
  });
}

/**
 * Parses a planner reply into a Plan. Never throws: anything that is not a JSON
 * object with an `intent` key becomes the general-chat plan.
 */
export function parsePlan(raw: string): Plan {
  let data: unknown;
  try {
    data = JSON.parse(stripJsonFence(raw));
  } catch {
    log.warn(`failed to decode JSON; falling back to general_chat. Raw: ${raw.slice(0, 200)}`);
    return FALLBACK_PLAN;
  }
  if (typeof data !== 'object' || data === null || Array.isArray(data) || !('intent' in data)) {
    log.warn(`plan missing intent; falling back to general_chat. Raw: ${raw.slice(0, 200)}`);
    return FALLBACK_PLAN;
  }

  const intent: unknown = data.intent;
  const entities = 'entities' in data ? normalizeEntities(data.entities) : [];
  return Object.freeze({
    intent: isIntent(intent) ? intent : 'general_chat',
    entities: Object.freeze(entities),
  });
}

export async function planRequest(client: CompletionClient, text: string): Promise<Plan> {
  const reply = await client.generateReply(plannerPrompt(text), {
    temperature: 0,
    max_tokens: PLANNER_MAX_TOKENS,
  });
  if (reply.kind !== 'text') {
    log.warn(`planner reply unusable (${reply.kind}); falling back to general_chat`);
    return FALLBACK_PLAN;
  }
  return parsePlan(reply.text);
}
