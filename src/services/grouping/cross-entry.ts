import { stripMarkup } from '@/services/subtitle/markup';
import type { CrossEntryGroup, SubtitleEntry } from '@/types/subtitle';
import type { CrossEntryOptions } from '@/types/translation';

function stripClosingQuotes(text: string, closingQuotes: readonly string[]): string {
  let value = text;
  let stripped = true;
  while (stripped && value) {
    stripped = false;
    for (const quote of closingQuotes) {
      if (quote && value.endsWith(quote)) {
        value = value.slice(0, -quote.length).trimEnd();
        stripped = true;
      }
    }
  }
  return value;
}

function startsWithDialogueMarker(line: string, markers: readonly string[]): boolean {
  const text = stripMarkup(line);
  return markers.some((marker) => marker !== '' && text.startsWith(marker));
}

export function entryCompletesSentence(
  entry: Pick<SubtitleEntry, 'plainText'>,
  options: Pick<CrossEntryOptions, 'terminalPunctuation' | 'closingQuotes'>
): boolean {
  const text = stripClosingQuotes(entry.plainText.trimEnd(), options.closingQuotes);
  return options.terminalPunctuation.some((mark) => mark !== '' && text.endsWith(mark));
}

export function entryContinuesInto(
  current: SubtitleEntry,
  next: SubtitleEntry,
  options: CrossEntryOptions
): boolean {
  if (entryCompletesSentence(current, options)) {
    return false;
  }
  // A speaker turn anywhere in the entry closes the group.
  if (current.lines.some((line) => startsWithDialogueMarker(line, options.dialogueMarkers))) {
    return false;
  }
  if (startsWithDialogueMarker(next.lines[0] ?? '', options.dialogueMarkers)) {
    return false;
  }
  return next.startMs - current.endMs < options.continuityGapMs;
}

function toGroup(unitId: number, members: readonly SubtitleEntry[]): CrossEntryGroup {
  const memberTexts = members.map((entry) => entry.plainText);
  return {
    unitId,
    entryIndices: members.map((entry) => entry.index),
    memberTexts,
    sourceText: memberTexts.filter(Boolean).join(' '),
    weights: memberTexts.map((text) => text.length),
    translatedText: null
  };
}

/**
 * Partitions entries into translation units, left to right. A group grows
 * while its last entry continues into the next one; with detection disabled
 * every entry is a unit of its own.
 */
export function detectCrossEntryGroups(
  entries: readonly SubtitleEntry[],
  options: CrossEntryOptions
): CrossEntryGroup[] {
  const groups: CrossEntryGroup[] = [];
  let members: SubtitleEntry[] = [];

  entries.forEach((entry, position) => {
    members.push(entry);
    const next = entries[position + 1];
    if (options.enabled && next && entryContinuesInto(entry, next, options)) {
      return;
    }
    groups.push(toGroup(groups.length, members));
    members = [];
  });

  return groups;
}
