import { getOpenRouterSettings, type OpenRouterSettings } from '@/config/provider-settings';
import { describeError, ProviderError } from '@/lib/errors';
import { buildTranslationPrompt, parseTranslatedUnits } from '@/services/providers/prompt';
import type {
  ProviderAvailability,
  TranslatedUnit,
  TranslationProvider,
  TranslationRequest
} from '@/services/providers/types';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function extractContent(payload: unknown): string | null {
  const choices = isRecord(payload) ? payload.choices : undefined;
  const first = Array.isArray(choices) ? choices[0] : undefined;
  const message = isRecord(first) ? first.message : undefined;
  const content = isRecord(message) ? message.content : undefined;

  if (typeof content === 'string') {
    return content;
  }

  if (Array.isArray(content)) {
    const text = content
      .map((item) => {
        if (!isRecord(item)) {
          return '';
        }
        return typeof item.text === 'string' ? item.text : '';
      })
      .join('')
      .trim();
    if (text) {
      return text;
    }
  }

  return null;
}

function listModelIds(payload: unknown): string[] {
  const data = isRecord(payload) ? payload.data : undefined;
  if (!Array.isArray(data)) {
    return [];
  }
  return data.flatMap((item: unknown) => (isRecord(item) && typeof item.id === 'string' ? [item.id] : []));
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export class OpenRouterProvider implements TranslationProvider {
  readonly id: string;
  private readonly model: string;
  private readonly settings: OpenRouterSettings;
  private readonly fetchImpl: FetchLike;

  constructor(opts: {
    model?: string;
    baseUrl?: string;
    settings?: OpenRouterSettings;
    fetch?: FetchLike;
  } = {}) {
    const settings = opts.settings ?? getOpenRouterSettings();
    this.settings = opts.baseUrl ? { ...settings, baseUrl: opts.baseUrl } : settings;
    this.model = opts.model ?? settings.defaultModel;
    this.fetchImpl = opts.fetch ?? fetch;
    this.id = `openrouter:${this.model}`;
  }

  private fail(
    kind: 'transport' | 'malformed' | 'timeout',
    unitIds: number[],
    message: string,
    cause?: unknown
  ): ProviderError {
    return new ProviderError({ kind, providerId: this.id, unitIds, message, cause });
  }

  async checkAvailability(signal?: AbortSignal): Promise<ProviderAvailability> {
    const apiKey = this.settings.apiKey;
    if (!apiKey) {
      return { available: false, reason: 'OPENROUTER_API_KEY is missing.' };
    }

    let ids: string[];
    try {
      const response = await this.fetchImpl(this.settings.modelsUrl, {
        method: 'GET',
        headers: { Authorization: `Bearer ${apiKey}` },
        signal
      });
      if (!response.ok) {
        return { available: false, reason: `OpenRouter model list failed (${response.status}).` };
      }
      ids = listModelIds(await response.json());
    } catch (error) {
      return { available: false, reason: `OpenRouter is not reachable: ${describeError(error)}` };
    }

    if (!ids.includes(this.model)) {
      return { available: false, reason: `OpenRouter does not list model "${this.model}".` };
    }
    return { available: true };
  }

  async translate(request: TranslationRequest): Promise<TranslatedUnit[]> {
    const unitIds = request.units.map((unit) => unit.unitId);
    const apiKey = this.settings.apiKey;
    if (!apiKey) {
      throw this.fail('transport', unitIds, 'OPENROUTER_API_KEY is missing.');
    }

    const { systemPrompt, userPrompt } = buildTranslationPrompt(request);
    let payload: unknown;
    try {
      const response = await this.fetchImpl(this.settings.baseUrl, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
          ...(this.settings.siteUrl ? { 'HTTP-Referer': this.settings.siteUrl } : {}),
          'X-Title': this.settings.appName
        },
        body: JSON.stringify({
          model: this.model,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt }
          ],
          temperature: this.settings.temperature,
          max_tokens: this.settings.maxTokens,
          response_format: { type: 'json_object' }
        }),
        signal: request.signal
      });

      if (!response.ok) {
        const detail = await response.text();
        throw this.fail(
          'transport',
          unitIds,
          `OpenRouter request failed (${response.status}): ${detail || response.statusText}`
        );
      }

      payload = await response.json();
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }
      if (isAbortError(error)) {
        throw this.fail('timeout', unitIds, 'OpenRouter request was aborted.', error);
      }
      throw this.fail('transport', unitIds, describeError(error), error);
    }

    const content = extractContent(payload);
    if (content === null) {
      throw this.fail('malformed', unitIds, 'OpenRouter response did not include message content.');
    }
    return parseTranslatedUnits(content, this.id, unitIds);
  }
}
