import { getOllamaSettings, type OllamaSettings } from '@/config/provider-settings';
import { describeError, ProviderError } from '@/lib/errors';
import type { FetchLike } from '@/services/providers/openrouter';
import { buildTranslationPrompt, parseTranslatedUnits } from '@/services/providers/prompt';
import type {
  ProviderAvailability,
  TranslatedUnit,
  TranslationProvider,
  TranslationRequest
} from '@/services/providers/types';

function listModelNames(payload: unknown): string[] {
  const models =
    typeof payload === 'object' && payload !== null && 'models' in payload ? payload.models : undefined;
  if (!Array.isArray(models)) {
    return [];
  }
  return models.flatMap((model: unknown) =>
    typeof model === 'object' && model !== null && 'name' in model && typeof model.name === 'string'
      ? [model.name]
      : []
  );
}

// `llama3.2` matches the `llama3.2:latest` tag Ollama reports.
function servesModel(names: readonly string[], model: string): boolean {
  return names.some((name) => name === model || (!model.includes(':') && name === `${model}:latest`));
}

/** Local models served by Ollama's non-streaming generate endpoint. */
export class OllamaProvider implements TranslationProvider {
  readonly id: string;
  private readonly model: string;
  private readonly settings: OllamaSettings;
  private readonly fetchImpl: FetchLike;

  constructor(opts: { model: string; baseUrl?: string; settings?: OllamaSettings; fetch?: FetchLike }) {
    const settings = opts.settings ?? getOllamaSettings();
    this.settings = opts.baseUrl ? { ...settings, baseUrl: opts.baseUrl } : settings;
    this.model = opts.model;
    this.fetchImpl = opts.fetch ?? fetch;
    this.id = `ollama:${this.model}`;
  }

  private endpoint(pathname: string): string {
    return `${this.settings.baseUrl.replace(/\/+$/, '')}${pathname}`;
  }

  async checkAvailability(signal?: AbortSignal): Promise<ProviderAvailability> {
    let names: string[];
    try {
      const response = await this.fetchImpl(this.endpoint('/api/tags'), { method: 'GET', signal });
      if (!response.ok) {
        return { available: false, reason: `Ollama answered ${response.status} at ${this.settings.baseUrl}.` };
      }
      names = listModelNames(await response.json());
    } catch (error) {
      return { available: false, reason: `Ollama is not reachable at ${this.settings.baseUrl}: ${describeError(error)}` };
    }

    if (!servesModel(names, this.model)) {
      return {
        available: false,
        reason: `Model "${this.model}" is not pulled; available: ${names.join(', ') || 'none'}.`
      };
    }
    return { available: true };
  }

  async translate(request: TranslationRequest): Promise<TranslatedUnit[]> {
    const unitIds = request.units.map((unit) => unit.unitId);
    const { systemPrompt, userPrompt } = buildTranslationPrompt(request);
    const url = this.endpoint('/api/generate');

    let payload: unknown;
    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          system: systemPrompt,
          prompt: userPrompt,
          format: 'json',
          stream: false,
          options: { temperature: this.settings.temperature }
        }),
        signal: request.signal
      });

      if (!response.ok) {
        const detail = await response.text();
        throw new ProviderError({
          kind: 'transport',
          providerId: this.id,
          unitIds,
          message: `Ollama request failed (${response.status}): ${detail || response.statusText}`
        });
      }

      payload = await response.json();
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }
      const aborted = error instanceof Error && error.name === 'AbortError';
      throw new ProviderError({
        kind: aborted ? 'timeout' : 'transport',
        providerId: this.id,
        unitIds,
        message: aborted ? 'Ollama request was aborted.' : describeError(error),
        cause: error
      });
    }

    const content =
      typeof payload === 'object' && payload !== null && 'response' in payload
        ? payload.response
        : undefined;
    if (typeof content !== 'string') {
      throw new ProviderError({
        kind: 'malformed',
        providerId: this.id,
        unitIds,
        message: 'Ollama response did not include a "response" string.'
      });
    }
    return parseTranslatedUnits(content, this.id, unitIds);
  }
}
