import { setTimeout as delay } from 'node:timers/promises';
import { describeError, isProviderError, ProviderError } from '@/lib/errors';
import { validateProviderResponse } from '@/services/execution/validate';
import type {
  TranslatedUnit,
  TranslationProvider,
  TranslationRequest
} from '@/services/providers/types';
import type { TranslationLogger } from '@/types/translation';

export interface RetryPolicy {
  retryCount: number;
  retryDelayMs: number;
  callTimeoutMs: number;
}

export type FallbackResult =
  | { ok: true; units: TranslatedUnit[]; providerId: string; attempts: number }
  | { ok: false; cancelled: boolean; attempts: number; errors: ProviderError[] };

async function attemptWithTimeout(
  provider: TranslationProvider,
  request: Omit<TranslationRequest, 'signal'>,
  timeoutMs: number
): Promise<unknown> {
  const unitIds = request.units.map((unit) => unit.unitId);
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Rejected before the abort so the race settles as a timeout.
      reject(
        new ProviderError({
          kind: 'timeout',
          providerId: provider.id,
          unitIds,
          message: `${provider.id} did not answer within ${timeoutMs}ms.`
        })
      );
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      provider.translate({ ...request, signal: controller.signal }),
      timeout
    ]);
  } finally {
    clearTimeout(timer);
  }
}

function toProviderError(error: unknown, providerId: string, unitIds: number[]): ProviderError {
  if (isProviderError(error)) {
    return error;
  }
  return new ProviderError({
    kind: 'transport',
    providerId,
    unitIds,
    message: describeError(error),
    cause: error
  });
}

/**
 * Walks the providers in priority order, giving each up to `retryCount`
 * attempts. A cancellation seen between attempts ends the walk without a
 * verdict on the units.
 */
export async function callWithFallback(
  providers: readonly TranslationProvider[],
  request: Omit<TranslationRequest, 'signal'>,
  policy: RetryPolicy,
  opts: { logger?: TranslationLogger; signal?: AbortSignal } = {}
): Promise<FallbackResult> {
  const logger = opts.logger ?? console;
  const unitIds = request.units.map((unit) => unit.unitId);
  const errors: ProviderError[] = [];
  let attempts = 0;

  for (const provider of providers) {
    for (let attempt = 1; attempt <= policy.retryCount; attempt += 1) {
      if (opts.signal?.aborted) {
        return { ok: false, cancelled: true, attempts, errors };
      }

      attempts += 1;
      try {
        const response = await attemptWithTimeout(provider, request, policy.callTimeoutMs);
        const units = validateProviderResponse(provider.id, request.units, response);
        return { ok: true, units, providerId: provider.id, attempts };
      } catch (error) {
        const failure = toProviderError(error, provider.id, unitIds);
        errors.push(failure);
        logger.warn(
          `[execution][retry] ${provider.id} attempt ${attempt}/${policy.retryCount} failed (${failure.kind}) for units ${unitIds.join(',')}: ${failure.message}`
        );
      }

      const isLastAttempt =
        attempt === policy.retryCount && provider === providers[providers.length - 1];
      if (policy.retryDelayMs > 0 && !isLastAttempt && !opts.signal?.aborted) {
        await delay(policy.retryDelayMs);
      }
    }
  }

  return { ok: false, cancelled: false, attempts, errors };
}
