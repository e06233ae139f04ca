import { TRANSLATION_VERSIONS } from '@/config/translation';
import type { ProgressRecord } from '@/types/progress';
import type { ProcessingMode } from '@/types/translation';

export interface CreateProgressRecordInput {
  sourcePath: string;
  sourceHash: string;
  targetPath: string;
  totalUnits: number;
  mode: ProcessingMode;
  fingerprint: string;
  now?: Date;
}

export function createProgressRecord(input: CreateProgressRecordInput): ProgressRecord {
  const now = (input.now ?? new Date()).toISOString();
  return {
    schemaVersion: TRANSLATION_VERSIONS.progressSchemaVersion,
    status: 'in_progress',
    source: { path: input.sourcePath, contentSha256: input.sourceHash },
    targetPath: input.targetPath,
    totalUnits: input.totalUnits,
    mode: input.mode,
    configFingerprint: input.fingerprint,
    completedUnits: [],
    failedUnits: [],
    translations: {},
    createdAt: now,
    updatedAt: now
  };
}

/**
 * Adds freshly translated units. The completed set only grows; a unit that
 * is already complete (an overlap replacement) just gets its text updated.
 */
export function recordTranslatedUnits(
  record: ProgressRecord,
  translated: ReadonlyMap<number, string>,
  now: Date = new Date()
): ProgressRecord {
  const completed = new Set(record.completedUnits);
  const translations = { ...record.translations };
  for (const [unitId, text] of translated) {
    completed.add(unitId);
    translations[String(unitId)] = text;
  }

  return {
    ...record,
    status: 'in_progress',
    completedUnits: [...completed].sort((a, b) => a - b),
    failedUnits: record.failedUnits.filter((unitId) => !completed.has(unitId)),
    translations,
    updatedAt: now.toISOString()
  };
}

export function finalizeProgressRecord(
  record: ProgressRecord,
  failedUnits: readonly number[],
  now: Date = new Date()
): ProgressRecord {
  const completed = new Set(record.completedUnits);
  const failed = [...new Set(failedUnits)]
    .filter((unitId) => !completed.has(unitId))
    .sort((a, b) => a - b);

  return {
    ...record,
    status: failed.length === 0 && completed.size >= record.totalUnits ? 'completed' : 'failed',
    failedUnits: failed,
    updatedAt: now.toISOString()
  };
}

export function completedTranslations(record: ProgressRecord): Map<number, string> {
  const translations = new Map<number, string>();
  for (const unitId of record.completedUnits) {
    const text = record.translations[String(unitId)];
    if (text !== undefined) {
      translations.set(unitId, text);
    }
  }
  return translations;
}
