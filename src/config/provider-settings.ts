const DEFAULT_OPENROUTER_MODEL = 'openai/gpt-4o-mini';
const DEFAULT_OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1/chat/completions';
const DEFAULT_OPENROUTER_MODELS_URL = 'https://openrouter.ai/api/v1/models';
const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';

export function readStringEnv(key: string): string | undefined {
  const raw = process.env[key];
  if (typeof raw !== 'string') {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function readNumberEnv(key: string, fallback: number): number {
  const raw = readStringEnv(key);
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return parsed;
}

export interface OpenRouterSettings {
  apiKey: string | undefined;
  baseUrl: string;
  modelsUrl: string;
  defaultModel: string;
  appName: string;
  siteUrl: string | undefined;
  temperature: number;
  maxTokens: number;
}

export interface OllamaSettings {
  baseUrl: string;
  temperature: number;
}

// Read on every call so a provider built after the env changes sees the change.
export function getOpenRouterSettings(): OpenRouterSettings {
  return {
    apiKey: readStringEnv('OPENROUTER_API_KEY'),
    baseUrl: readStringEnv('OPENROUTER_BASE_URL') ?? DEFAULT_OPENROUTER_BASE_URL,
    modelsUrl: readStringEnv('OPENROUTER_MODELS_URL') ?? DEFAULT_OPENROUTER_MODELS_URL,
    defaultModel: readStringEnv('OPENROUTER_DEFAULT_MODEL') ?? DEFAULT_OPENROUTER_MODEL,
    appName: readStringEnv('OPENROUTER_APP_NAME') ?? 'subtitle-translator',
    siteUrl: readStringEnv('OPENROUTER_SITE_URL'),
    temperature: 0,
    maxTokens: readNumberEnv('OPENROUTER_TRANSLATION_MAX_TOKENS', 4000)
  };
}

export function getOllamaSettings(): OllamaSettings {
  return {
    baseUrl: readStringEnv('OLLAMA_BASE_URL') ?? DEFAULT_OLLAMA_BASE_URL,
    temperature: 0
  };
}

export function hasOpenRouterApiKey(): boolean {
  return readStringEnv('OPENROUTER_API_KEY') !== undefined;
}
