import type { FormattingSpan } from '@/types/subtitle';

const MARKUP_PATTERN = /<\/?[a-zA-Z][^>]*>|\{\\[^}]*\}/g;
const WHITESPACE = /\s/;

function isClosingMarkup(markup: string): boolean {
  return markup.startsWith('</');
}

export function stripMarkup(text: string): string {
  return extractMarkup(text).plainText;
}

/**
 * Separates inline formatting (HTML-style tags and `{\...}` override blocks)
 * from subtitle text. Whitespace, line breaks included, collapses to single
 * spaces; each span keeps its offset into the returned plain text.
 */
export function extractMarkup(text: string): { plainText: string; spans: FormattingSpan[] } {
  const spans: FormattingSpan[] = [];
  let plainText = '';
  let pendingSpace = false;

  const appendText = (segment: string) => {
    for (const char of segment) {
      if (WHITESPACE.test(char)) {
        pendingSpace = plainText.length > 0;
        continue;
      }
      if (pendingSpace) {
        plainText += ' ';
        pendingSpace = false;
      }
      plainText += char;
    }
  };

  let cursor = 0;
  for (const match of text.matchAll(MARKUP_PATTERN)) {
    const start = match.index ?? 0;
    appendText(text.slice(cursor, start));
    const markup = match[0];
    // An opening tag belongs to the word after the gap.
    if (pendingSpace && !isClosingMarkup(markup)) {
      plainText += ' ';
      pendingSpace = false;
    }
    spans.push({ markup, offset: plainText.length });
    cursor = start + markup.length;
  }
  appendText(text.slice(cursor));

  if (plainText.endsWith(' ')) {
    plainText = plainText.slice(0, -1);
    for (const span of spans) {
      span.offset = Math.min(span.offset, plainText.length);
    }
  }

  return { plainText, spans };
}

function snapToWordBoundary(text: string, target: number, closing: boolean): number {
  const candidates = [0, text.length];
  for (let i = 0; i < text.length; i += 1) {
    if (text[i] === ' ') {
      candidates.push(closing ? i : i + 1);
    }
  }

  let best = 0;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const candidate of candidates) {
    const distance = Math.abs(candidate - target);
    if (distance < bestDistance || (distance === bestDistance && candidate < best)) {
      best = candidate;
      bestDistance = distance;
    }
  }
  return best;
}

export function reinsertMarkup(
  text: string,
  spans: readonly FormattingSpan[],
  sourceLength: number
): string {
  if (spans.length === 0) {
    return text;
  }

  let floor = 0;
  const placements = spans.map((span) => {
    let position: number;
    if (span.offset <= 0) {
      position = 0;
    } else if (span.offset >= sourceLength) {
      position = text.length;
    } else {
      const target = Math.round((span.offset / sourceLength) * text.length);
      position = snapToWordBoundary(text, target, isClosingMarkup(span.markup));
    }
    position = Math.max(position, floor);
    floor = position;
    return { markup: span.markup, position };
  });

  let output = '';
  let cursor = 0;
  for (const placement of placements) {
    output += text.slice(cursor, placement.position) + placement.markup;
    cursor = placement.position;
  }
  return output + text.slice(cursor);
}
