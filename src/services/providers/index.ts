import { ProviderUnavailableError } from '@/lib/errors';
import { MockProvider } from '@/services/providers/mock';
import { OllamaProvider } from '@/services/providers/ollama';
import { OpenRouterProvider, type FetchLike } from '@/services/providers/openrouter';
import type { TranslationProvider } from '@/services/providers/types';
import type { ProviderSpec, TranslationLogger } from '@/types/translation';

export type { FetchLike } from '@/services/providers/openrouter';
export type {
  PrecedingUnit,
  ProviderAvailability,
  ProviderUnit,
  TranslatedUnit,
  TranslationProvider,
  TranslationRequest
} from '@/services/providers/types';
export { MockProvider, OllamaProvider, OpenRouterProvider };

export function createProvider(spec: ProviderSpec, opts: { fetch?: FetchLike } = {}): TranslationProvider {
  switch (spec.kind) {
    case 'openrouter':
      return new OpenRouterProvider({ model: spec.model, baseUrl: spec.baseUrl, fetch: opts.fetch });
    case 'ollama':
      return new OllamaProvider({ model: spec.model, baseUrl: spec.baseUrl, fetch: opts.fetch });
    case 'mock':
      return new MockProvider(spec.model);
    default: {
      const exhaustiveCheck: never = spec.kind;
      throw new Error(`Unsupported provider kind: ${String(exhaustiveCheck)}`);
    }
  }
}

/** Ordered fallback list; the first provider is tried first. */
export function createProviders(
  specs: readonly ProviderSpec[],
  opts: { fetch?: FetchLike } = {}
): TranslationProvider[] {
  return specs.map((spec) => createProvider(spec, opts));
}

/**
 * Checks every provider before a run and keeps the ones that can serve it, in
 * their original order. Throws when none can.
 */
export async function selectAvailableProviders(
  providers: readonly TranslationProvider[],
  opts: { logger?: TranslationLogger; signal?: AbortSignal } = {}
): Promise<TranslationProvider[]> {
  const logger = opts.logger ?? console;
  const checks = await Promise.all(
    providers.map(async (provider) => ({ provider, result: await provider.checkAvailability(opts.signal) }))
  );

  const reasons: string[] = [];
  const usable: TranslationProvider[] = [];
  for (const { provider, result } of checks) {
    if (result.available) {
      usable.push(provider);
      continue;
    }
    const reason = `${provider.id}: ${result.reason ?? 'unavailable'}`;
    reasons.push(reason);
    logger.warn(`[providers][availability] skipping ${reason}`);
  }

  if (usable.length === 0) {
    throw new ProviderUnavailableError(reasons);
  }
  return usable;
}

export { parseProviderList } from '@/config/translation';
