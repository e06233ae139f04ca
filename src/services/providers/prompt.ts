import { ProviderError } from '@/lib/errors';
import type { TranslatedUnit, TranslationRequest } from '@/services/providers/types';

export function buildTranslationPrompt(request: TranslationRequest): {
  systemPrompt: string;
  userPrompt: string;
} {
  const systemPrompt = [
    'You are a professional subtitle translator.',
    `Translate each unit from ${request.sourceLanguage} to ${request.targetLanguage}.`,
    'Each unit is one complete sentence that may span several subtitle entries.',
    'Keep meaning and register; do not merge, split, drop or reorder units.',
    'Context lines and reference translations are for consistency only and must not be returned.',
    'Return JSON only: {"units":[{"id":number,"text":string}]} with one item per input unit, in input order.'
  ].join(' ');

  const sections = [
    `source: ${request.sourceLanguage}`,
    `target: ${request.targetLanguage}`
  ];
  if (request.preceding.length > 0) {
    sections.push(
      'Reference translations of the preceding units JSON:',
      JSON.stringify(
        request.preceding.map((unit) => ({
          id: unit.unitId,
          text: unit.text,
          translation: unit.translatedText
        }))
      )
    );
  }
  sections.push(
    'Input units JSON:',
    JSON.stringify(
      request.units.map((unit) => ({
        id: unit.unitId,
        text: unit.text,
        ...(unit.context.before.length > 0 ? { before: unit.context.before } : {}),
        ...(unit.context.after.length > 0 ? { after: unit.context.after } : {})
      }))
    )
  );

  return { systemPrompt, userPrompt: sections.join('\n\n') };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJsonContent(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    const fenced = content.match(/```(?:json)?\s*([\s\S]*?)\s*```/i)?.[1] ?? content;
    return JSON.parse(fenced);
  }
}

/**
 * Reads `{"units":[{"id":n,"text":s}]}` (a bare array is accepted as well).
 * Anything else is a malformed response for the whole call.
 */
export function parseTranslatedUnits(
  content: string,
  providerId: string,
  unitIds: number[]
): TranslatedUnit[] {
  let payload: unknown;
  try {
    payload = parseJsonContent(content);
  } catch (error) {
    throw new ProviderError({
      kind: 'malformed',
      providerId,
      unitIds,
      message: `${providerId} returned content that is not JSON.`,
      cause: error
    });
  }

  const items = Array.isArray(payload) ? payload : isRecord(payload) ? payload.units : undefined;
  if (!Array.isArray(items)) {
    throw new ProviderError({
      kind: 'malformed',
      providerId,
      unitIds,
      message: `${providerId} response has no "units" array.`
    });
  }

  return items.map((item, position) => {
    const id = isRecord(item) ? (item.id ?? item.unitId) : undefined;
    const text = isRecord(item) ? item.text : undefined;
    if (typeof id !== 'number' || !Number.isInteger(id) || typeof text !== 'string') {
      throw new ProviderError({
        kind: 'malformed',
        providerId,
        unitIds,
        message: `${providerId} response item ${position} needs an integer "id" and a string "text".`
      });
    }
    return { unitId: id, text };
  });
}
