import { ProviderError } from '@/lib/errors';
import type { TranslatedUnit } from '@/services/providers/types';

/**
 * Checks a provider reply against the units it was given: same count, same
 * order, same ids, string texts. Any violation rejects the whole reply.
 */
export function validateProviderResponse(
  providerId: string,
  units: ReadonlyArray<{ unitId: number }>,
  response: unknown
): TranslatedUnit[] {
  const unitIds = units.map((unit) => unit.unitId);

  if (!Array.isArray(response)) {
    throw new ProviderError({
      kind: 'malformed',
      providerId,
      unitIds,
      message: `${providerId} did not return a list of units.`
    });
  }

  if (response.length !== units.length) {
    throw new ProviderError({
      kind: 'count_mismatch',
      providerId,
      unitIds,
      message: `${providerId} returned ${response.length} unit(s) for ${units.length} requested.`
    });
  }

  return response.map((item: unknown, position) => {
    const expectedId = unitIds[position];
    const unitId =
      typeof item === 'object' && item !== null && 'unitId' in item ? item.unitId : undefined;
    const text = typeof item === 'object' && item !== null && 'text' in item ? item.text : undefined;

    if (typeof text !== 'string' || text.trim() === '') {
      throw new ProviderError({
        kind: 'malformed',
        providerId,
        unitIds,
        message: `${providerId} returned an empty or non-text translation at position ${position}.`
      });
    }
    if (unitId !== expectedId || typeof unitId !== 'number') {
      throw new ProviderError({
        kind: 'count_mismatch',
        providerId,
        unitIds,
        message: `${providerId} returned unit ${String(unitId)} where unit ${String(expectedId)} was expected.`
      });
    }
    return { unitId, text };
  });
}
