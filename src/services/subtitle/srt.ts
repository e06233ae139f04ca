import { ParseError } from '@/lib/errors';
import { extractMarkup } from '@/services/subtitle/markup';
import { reflowText } from '@/services/subtitle/reflow';
import type {
  LayoutLine,
  LineEnding,
  ReflowOptions,
  SubtitleBlockLayout,
  SubtitleDocument,
  SubtitleEntry
} from '@/types/subtitle';

const INDEX_PATTERN = /^\d+$/;
const TIMESTAMP_PATTERN = /^(\d{2,}):(\d{2}):(\d{2}),(\d{3})$/;
const TIMING_PATTERN =
  /^(\d{2,}:\d{2}:\d{2},\d{3})\s*-->\s*(\d{2,}:\d{2}:\d{2},\d{3})(?:\s+.*)?$/;
const BYTE_ORDER_MARK = '\uFEFF';

export interface SubtitleEntryInput {
  index: number;
  startMs: number;
  endMs: number;
  lines: string[];
}

export interface FormatSubtitleOptions {
  reflow?: ReflowOptions;
}

export function formatSrtTimestamp(totalMs: number): string {
  const clamped = Math.max(0, Math.round(totalMs));
  const hours = Math.floor(clamped / 3_600_000)
    .toString()
    .padStart(2, '0');
  const minutes = Math.floor((clamped % 3_600_000) / 60_000)
    .toString()
    .padStart(2, '0');
  const seconds = Math.floor((clamped % 60_000) / 1000)
    .toString()
    .padStart(2, '0');
  const milliseconds = (clamped % 1000).toString().padStart(3, '0');
  return `${hours}:${minutes}:${seconds},${milliseconds}`;
}

export function parseSrtTimestamp(value: string): number | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const hours = Number.parseInt(match[1] ?? '0', 10);
  const minutes = Number.parseInt(match[2] ?? '0', 10);
  const seconds = Number.parseInt(match[3] ?? '0', 10);
  const millis = Number.parseInt(match[4] ?? '0', 10);
  if (minutes > 59 || seconds > 59) {
    return null;
  }
  return ((hours * 60 + minutes) * 60 + seconds) * 1000 + millis;
}

function formatTimingLine(startMs: number, endMs: number): string {
  return `${formatSrtTimestamp(startMs)} --> ${formatSrtTimestamp(endMs)}`;
}

function splitLayoutLines(content: string): LayoutLine[] {
  const parts = content.split(/(\r?\n)/);
  const lines: LayoutLine[] = [];
  for (let i = 0; i < parts.length; i += 2) {
    const ending = parts[i + 1];
    lines.push({
      text: parts[i] ?? '',
      ending: ending === '\r\n' || ending === '\n' ? ending : ''
    });
  }
  return lines;
}

function detectLineEnding(lines: readonly LayoutLine[]): LineEnding {
  const first = lines.find((line) => line.ending !== '');
  return first && first.ending !== '' ? first.ending : '\n';
}

function toEntry(input: SubtitleEntryInput): SubtitleEntry {
  const { plainText, spans } = extractMarkup(input.lines.join('\n'));
  return {
    index: input.index,
    startMs: input.startMs,
    endMs: input.endMs,
    lines: [...input.lines],
    plainText,
    spans,
    translatedText: null
  };
}

export function parseSubtitleDocument(content: string): SubtitleDocument {
  const text = content.startsWith(BYTE_ORDER_MARK) ? content.slice(1) : content;
  const layoutLines = splitLayoutLines(text);
  const lineEnding = detectLineEnding(layoutLines);
  const lines = layoutLines.map((line) => line.text);

  const entries: SubtitleEntry[] = [];
  const blocks: SubtitleBlockLayout[] = [];
  const gaps: LayoutLine[][] = [];
  const seenIndices = new Set<number>();
  let currentGap: LayoutLine[] = [];
  let i = 0;

  while (i < lines.length) {
    const line = lines[i] ?? '';
    if (line.trim() === '') {
      currentGap.push(layoutLines[i] ?? { text: line, ending: '' });
      i += 1;
      continue;
    }

    gaps.push(currentGap);
    currentGap = [];

    const indexLineNumber = i + 1;
    const indexValue = line.trim();
    if (!INDEX_PATTERN.test(indexValue)) {
      throw new ParseError(`expected a subtitle index, found "${indexValue}".`, indexLineNumber);
    }
    const index = Number.parseInt(indexValue, 10);
    if (index < 1) {
      throw new ParseError(`subtitle index must be 1 or greater, found ${index}.`, indexLineNumber);
    }
    if (seenIndices.has(index)) {
      throw new ParseError(`subtitle index ${index} is used more than once.`, indexLineNumber);
    }
    seenIndices.add(index);

    const timingLine = lines[i + 1];
    const timingMatch = timingLine === undefined ? null : TIMING_PATTERN.exec(timingLine.trim());
    if (!timingLine || !timingMatch) {
      throw new ParseError(
        `subtitle ${index} needs a "HH:MM:SS,mmm --> HH:MM:SS,mmm" timing line.`,
        indexLineNumber + 1
      );
    }
    const startMs = parseSrtTimestamp(timingMatch[1] ?? '');
    const endMs = parseSrtTimestamp(timingMatch[2] ?? '');
    if (startMs === null || endMs === null) {
      throw new ParseError(`subtitle ${index} has an out-of-range timestamp.`, indexLineNumber + 1);
    }
    if (endMs <= startMs) {
      throw new ParseError(`subtitle ${index} ends before it starts.`, indexLineNumber + 1);
    }

    const blockStart = i;
    i += 2;
    const textLines: string[] = [];
    const textEndings: Array<LineEnding | ''> = [];
    while (i < lines.length && (lines[i] ?? '').trim() !== '') {
      textLines.push(lines[i] ?? '');
      textEndings.push(layoutLines[i]?.ending ?? '');
      i += 1;
    }
    if (textLines.length === 0) {
      throw new ParseError(`subtitle ${index} has no text lines.`, indexLineNumber + 2);
    }

    blocks.push({
      indexLine: { text: line, ending: layoutLines[blockStart]?.ending ?? lineEnding },
      timingLine: { text: timingLine, ending: layoutLines[blockStart + 1]?.ending ?? lineEnding },
      textEndings
    });
    entries.push(toEntry({ index, startMs, endMs, lines: textLines }));
  }
  gaps.push(currentGap);

  if (entries.length === 0) {
    throw new ParseError('no subtitle blocks found.', 1);
  }

  return { entries, layout: { lineEnding, blocks, gaps } };
}

export function buildSubtitleDocument(inputs: SubtitleEntryInput[]): SubtitleDocument {
  return {
    entries: inputs.map(toEntry),
    layout: {
      lineEnding: '\n',
      blocks: inputs.map((input) => ({
        indexLine: { text: String(input.index), ending: '\n' },
        timingLine: { text: formatTimingLine(input.startMs, input.endMs), ending: '\n' },
        textEndings: input.lines.map(() => '\n' as const)
      })),
      gaps: [[], ...inputs.slice(1).map((): LayoutLine[] => [{ text: '', ending: '\n' }]), []]
    }
  };
}

export function attachTranslations(
  document: SubtitleDocument,
  byIndex: ReadonlyMap<number, string>
): SubtitleDocument {
  return {
    layout: document.layout,
    entries: document.entries.map((entry) => {
      const translated = byIndex.get(entry.index);
      return translated === undefined ? entry : { ...entry, translatedText: translated };
    })
  };
}

function renderEntryLines(entry: SubtitleEntry, reflow: ReflowOptions | undefined): string[] {
  if (entry.translatedText === null) {
    return entry.lines;
  }

  const text = reflow ? reflowText(entry.translatedText, reflow) : entry.translatedText;
  const lines = text.split(/\r?\n/).filter((line) => line.trim() !== '');
  return lines.length > 0 ? lines : entry.lines;
}

// Rows beyond the original count take the document's line ending; the block keeps its final terminator.
function renderTextLines(
  lines: readonly string[],
  originalEndings: ReadonlyArray<LineEnding | ''> | undefined,
  lineEnding: LineEnding
): string {
  const endings = originalEndings ?? [];
  const last = endings.length > 0 ? endings[endings.length - 1] ?? lineEnding : lineEnding;
  return lines
    .map((line, position) => {
      if (position === lines.length - 1) {
        return line + last;
      }
      const inner = position < endings.length - 1 ? endings[position] : undefined;
      return line + (inner ?? lineEnding);
    })
    .join('');
}

function renderLayoutLines(lines: readonly LayoutLine[]): string {
  return lines.map((line) => line.text + line.ending).join('');
}

export function formatSubtitleDocument(
  document: SubtitleDocument,
  options: FormatSubtitleOptions = {}
): string {
  const { layout, entries } = document;
  const defaultGap: LayoutLine[] = [{ text: '', ending: layout.lineEnding }];
  let output = '';

  entries.forEach((entry, position) => {
    output += renderLayoutLines(layout.gaps[position] ?? (position > 0 ? defaultGap : []));
    const block = layout.blocks[position];
    output += block
      ? renderLayoutLines([block.indexLine, block.timingLine])
      : `${entry.index}${layout.lineEnding}${formatTimingLine(entry.startMs, entry.endMs)}${layout.lineEnding}`;
    output += renderTextLines(renderEntryLines(entry, options.reflow), block?.textEndings, layout.lineEnding);
  });
  output += renderLayoutLines(layout.gaps[entries.length] ?? []);

  return output;
}

/**
 * Reflows the source rows of every entry without translating anything. Each
 * row is split again under `reflow`; plain text and spans are rebuilt from the
 * new rows.
 */
export function reformatSubtitleDocument(
  document: SubtitleDocument,
  reflow: ReflowOptions
): SubtitleDocument {
  return {
    layout: document.layout,
    entries: document.entries.map((entry) => {
      const rows = reflowText(entry.lines.join('\n'), reflow)
        .split('\n')
        .filter((row) => row.trim() !== '');
      if (rows.length === 0) {
        return entry;
      }
      return {
        ...toEntry({ index: entry.index, startMs: entry.startMs, endMs: entry.endMs, lines: rows }),
        translatedText: entry.translatedText
      };
    })
  };
}
