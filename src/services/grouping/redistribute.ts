import { RedistributionError } from '@/lib/errors';
import { reinsertMarkup } from '@/services/subtitle/markup';
import type { CrossEntryGroup, SubtitleEntry } from '@/types/subtitle';

export interface RedistributionResult {
  texts: string[];
  // What joins `texts` back into the normalised translation.
  separator: ' ' | '';
  flagged: number[];
  error: RedistributionError | null;
}

export interface GroupTranslationResult {
  entries: Array<{ index: number; text: string }>;
  error: RedistributionError | null;
}

// Scripts that are written without spaces between words.
const UNSPACED_SCRIPT =
  /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Thai}\p{Script=Lao}\p{Script=Khmer}\p{Script=Myanmar}]/u;

function tokenize(text: string): { tokens: string[]; separator: ' ' | '' } {
  const words = text ? text.split(' ') : [];
  if (words.length === 1 && UNSPACED_SCRIPT.test(text)) {
    return { tokens: Array.from(text), separator: '' };
  }
  return { tokens: words, separator: ' ' };
}

function nearestBoundary(starts: readonly number[], target: number): number {
  let best = 0;
  let bestDistance = Number.POSITIVE_INFINITY;
  starts.forEach((start, position) => {
    const distance = Math.abs(start - target);
    if (distance < bestDistance) {
      best = position;
      bestDistance = distance;
    }
  });
  return best;
}

/**
 * Splits a group's translation across its member entries in proportion to
 * each member's share of the source text. Every member gets at least one
 * token; when there are fewer tokens than members the whole text stays on
 * the first member and the rest are flagged.
 */
export function redistributeTranslation(
  translatedText: string,
  weights: readonly number[]
): RedistributionResult {
  const normalized = translatedText.trim().replace(/\s+/g, ' ');
  const memberCount = weights.length;

  if (memberCount <= 1) {
    return { texts: [normalized], separator: ' ', flagged: [], error: null };
  }

  const { tokens, separator } = tokenize(normalized);
  if (tokens.length < memberCount) {
    return {
      texts: [normalized, ...weights.slice(1).map(() => '')],
      separator: ' ',
      flagged: weights.slice(1).map((_, position) => position + 1),
      error: new RedistributionError(memberCount, tokens.length)
    };
  }

  // starts[k] is the character offset where token k begins; starts[T] is the end.
  const starts: number[] = [0];
  for (const token of tokens) {
    starts.push((starts[starts.length - 1] ?? 0) + token.length + separator.length);
  }
  starts[tokens.length] = normalized.length;

  const totalWeight = weights.reduce((sum, weight) => sum + Math.max(0, weight), 0);
  const shares =
    totalWeight > 0
      ? weights.map((weight) => Math.max(0, weight) / totalWeight)
      : weights.map(() => 1 / memberCount);

  const cuts: number[] = [0];
  let cumulative = 0;
  for (let i = 1; i < memberCount; i += 1) {
    cumulative += shares[i - 1] ?? 0;
    cuts.push(nearestBoundary(starts, normalized.length * cumulative));
  }
  cuts.push(tokens.length);

  for (let i = 1; i < memberCount; i += 1) {
    cuts[i] = Math.max(cuts[i] ?? 0, (cuts[i - 1] ?? 0) + 1);
  }
  for (let i = memberCount - 1; i >= 1; i -= 1) {
    cuts[i] = Math.min(cuts[i] ?? 0, (cuts[i + 1] ?? tokens.length) - 1);
  }

  const texts: string[] = [];
  for (let i = 0; i < memberCount; i += 1) {
    texts.push(tokens.slice(cuts[i], cuts[i + 1]).join(separator));
  }

  return { texts, separator, flagged: [], error: null };
}

export function applyGroupTranslation(
  group: CrossEntryGroup,
  entries: readonly SubtitleEntry[],
  translatedText: string,
  continuationMarker: string
): GroupTranslationResult {
  const byIndex = new Map(entries.map((entry) => [entry.index, entry]));
  const { texts, flagged, error } = redistributeTranslation(translatedText, group.weights);
  const flaggedSet = new Set(flagged);

  return {
    error,
    entries: group.entryIndices.map((index, position) => {
      if (flaggedSet.has(position)) {
        return { index, text: continuationMarker };
      }
      const text = texts[position] ?? '';
      const entry = byIndex.get(index);
      return {
        index,
        text: entry ? reinsertMarkup(text, entry.spans, entry.plainText.length) : text
      };
    })
  };
}
