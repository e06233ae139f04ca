import type { ReflowOptions } from '@/types/subtitle';

function normalizeWhitespace(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

// Lengths and cuts count code points so surrogate pairs never split.
function codePointLength(value: string): number {
  return Array.from(value).length;
}

function splitByWords(value: string, maxChars: number): string[] {
  const parts: string[] = [];
  let cursor = '';

  for (const word of value.split(' ')) {
    const next = cursor ? `${cursor} ${word}` : word;
    if (codePointLength(next) <= maxChars) {
      cursor = next;
      continue;
    }

    // An over-long word gets a row of its own.
    if (cursor) {
      parts.push(cursor);
    }
    cursor = word;
  }

  if (cursor) {
    parts.push(cursor);
  }

  return parts;
}

function splitByChars(value: string, maxChars: number): string[] {
  const chars = Array.from(value);
  const parts: string[] = [];
  for (let i = 0; i < chars.length; i += maxChars) {
    const chunk = chars.slice(i, i + maxChars).join('').trim();
    if (chunk) {
      parts.push(chunk);
    }
  }
  return parts;
}

/**
 * Code point position of the space that splits `value` into the two most
 * evenly sized rows. Ties go to the break closest to the midpoint, then to the
 * earlier one. Returns `null` when the text has no space to break at.
 */
export function findEvenSplit(value: string): number | null {
  const chars = Array.from(value);
  const midpoint = chars.length / 2;
  let best: number | null = null;
  let bestDifference = Number.POSITIVE_INFINITY;
  let bestDistance = Number.POSITIVE_INFINITY;

  for (let i = 0; i < chars.length; i += 1) {
    if (chars[i] !== ' ') {
      continue;
    }

    const difference = Math.abs(i - (chars.length - i - 1));
    const distance = Math.abs(i - midpoint);
    if (
      difference < bestDifference ||
      (difference === bestDifference && distance < bestDistance)
    ) {
      best = i;
      bestDifference = difference;
      bestDistance = distance;
    }
  }

  return best;
}

function splitEvenly(value: string, maxChars: number): string[] {
  const chars = Array.from(value);
  if (chars.length <= maxChars) {
    return [value];
  }

  const at = findEvenSplit(value);
  if (at === null) {
    return splitByChars(value, maxChars);
  }

  return [
    ...splitEvenly(chars.slice(0, at).join(''), maxChars),
    ...splitEvenly(chars.slice(at + 1).join(''), maxChars)
  ];
}

export function reflowText(text: string, options: ReflowOptions): string {
  if (!Number.isFinite(options.maxRowLength) || options.maxRowLength < 1) {
    return text;
  }

  const paragraphs = text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map(normalizeWhitespace)
    .filter(Boolean);

  return paragraphs
    .flatMap((paragraph) => {
      switch (options.splitMethod) {
        case 'word':
          return splitByWords(paragraph, options.maxRowLength);
        case 'char':
          return splitByChars(paragraph, options.maxRowLength);
        case 'even':
          return splitEvenly(paragraph, options.maxRowLength);
        default: {
          const exhaustiveCheck: never = options.splitMethod;
          throw new Error(`Unsupported split method: ${String(exhaustiveCheck)}`);
        }
      }
    })
    .join('\n');
}
