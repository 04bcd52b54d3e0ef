export interface GeminiConfig {
  apiKey?: string;
  model: string;
  retryOnMaxTokens: boolean;
  maxTokensHardCap: number;
  logPrompts: boolean;
}

export interface AlphaVantageConfig {
  apiKey?: string;
  baseUrl: string;
  timeoutMs: number;
  logBody: boolean;
}

export interface AppConfig {
  port: number;
  gemini: GeminiConfig;
  alphaVantage: AlphaVantageConfig;
  chatMaxTokens: number;
  allowOrigins: string[];
  allowOriginRegex: RegExp;
}

export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';
export const DEFAULT_ALPHA_VANTAGE_BASE = 'https://www.alphavantage.co/query';
export const DEFAULT_ORIGIN_REGEX = '^https?://(localhost|127\\.0\\.0\\.1)(:\\d+)?$';
export const DEFAULT_CHAT_MAX_TOKENS = 1024;

type Env = Record<string, string | undefined>;

export function resolveMaxTokens(value: string | undefined, fallback: number): number {
  if (value) {
    const parsed = Number(value);
    if (Number.isFinite(parsed) && parsed > 0) {
      return Math.min(Math.floor(parsed), 8192);
    }
  }
  return fallback;
}

function resolvePositiveInt(value: string | undefined, fallback: number): number {
  if (value) {
    const parsed = Number(value);
    if (Number.isFinite(parsed) && parsed > 0) {
      return Math.floor(parsed);
    }
  }
  return fallback;
}

function resolveFlag(value: string | undefined): boolean {
  return (value ?? '').trim().toLowerCase() === 'true';
}

function resolveSecret(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const allowOrigins = (env.ALLOW_ORIGINS ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    port: resolvePositiveInt(env.PORT, 3001),
    gemini: {
      apiKey: resolveSecret(env.GEMINI_API_KEY),
      model: env.GEMINI_MODEL?.trim() || DEFAULT_GEMINI_MODEL,
      retryOnMaxTokens: resolveFlag(env.GEMINI_RETRY_ON_MAX_TOKENS),
      maxTokensHardCap: resolvePositiveInt(env.GEMINI_MAX_TOKENS_HARD_CAP, 2048),
      logPrompts: resolveFlag(env.LOG_LLM_PROMPTS),
    },
    alphaVantage: {
      apiKey: resolveSecret(env.ALPHA_VANTAGE_API_KEY),
      baseUrl: (env.ALPHA_VANTAGE_BASE_URL?.trim() || DEFAULT_ALPHA_VANTAGE_BASE).replace(/\/+$/, ''),
      timeoutMs: resolvePositiveInt(env.ALPHA_VANTAGE_TIMEOUT_MS, 15_000),
      logBody: resolveFlag(env.LOG_HTTP_BODY),
    },
    chatMaxTokens: resolveMaxTokens(env.CHAT_MAX_TOKENS, DEFAULT_CHAT_MAX_TOKENS),
    allowOrigins,
    allowOriginRegex: new RegExp(env.ALLOW_ORIGIN_REGEX?.trim() || DEFAULT_ORIGIN_REGEX),
  };
}
