export interface FormattingSpan {
  markup: string;
  offset: number;
}

export interface SubtitleEntry {
  index: number;
  startMs: number;
  endMs: number;
  lines: string[];
  plainText: string;
  spans: FormattingSpan[];
  translatedText: string | null;
}

export type LineEnding = '\n' | '\r\n';

// A raw line and the terminator that followed it; '' only on the last line of a file.
export interface LayoutLine {
  text: string;
  ending: LineEnding | '';
}

export interface SubtitleBlockLayout {
  indexLine: LayoutLine;
  timingLine: LayoutLine;
  // Terminators after each original text line.
  textEndings: Array<LineEnding | ''>;
}

export interface SubtitleDocumentLayout {
  // First terminator seen; used for rows a translation adds.
  lineEnding: LineEnding;
  blocks: SubtitleBlockLayout[];
  // gaps[i] holds the raw blank lines before block i; the last item trails the final block.
  gaps: LayoutLine[][];
}

export interface SubtitleDocument {
  entries: readonly SubtitleEntry[];
  layout: SubtitleDocumentLayout;
}

export type SplitMethod = 'word' | 'char' | 'even';

export interface ReflowOptions {
  maxRowLength: number;
  splitMethod: SplitMethod;
}

export interface CrossEntryGroup {
  unitId: number;
  entryIndices: number[];
  memberTexts: string[];
  sourceText: string;
  weights: number[];
  translatedText: string | null;
}
