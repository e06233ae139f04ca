import path from 'node:path';
import { TRANSLATION_VERSIONS } from '@/config/translation';
import { ConfigMismatchError, describeError, ProgressCorruptionError } from '@/lib/errors';
import { readJsonFile, removeFile, writeJsonFile } from '@/lib/json-store';
import type {
  ProgressExpectation,
  ProgressLoadResult,
  ProgressRecord,
  ProgressStatus
} from '@/types/progress';
import type { ProcessingMode, TranslationLogger } from '@/types/translation';

const ABSENT = Symbol('absent');
const STATUSES: readonly ProgressStatus[] = ['in_progress', 'completed', 'failed'];
const MODES: readonly ProcessingMode[] = ['line-by-line', 'batch', 'whole-file'];

export function progressPathFor(targetPath: string): string {
  return path.join(path.dirname(targetPath), `.${path.basename(targetPath)}.progress.json`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isUnitList(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => Number.isInteger(item) && item >= 0);
}

function isStatus(value: unknown): value is ProgressStatus {
  return typeof value === 'string' && STATUSES.some((item) => item === value);
}

function isMode(value: unknown): value is ProcessingMode {
  return typeof value === 'string' && MODES.some((item) => item === value);
}

/** Returns the record, or a description of the first problem found. */
export function parseProgressRecord(value: unknown): ProgressRecord | string {
  if (!isRecord(value)) {
    return 'expected a JSON object';
  }
  if (value.schemaVersion !== TRANSLATION_VERSIONS.progressSchemaVersion) {
    return `unsupported schemaVersion ${String(value.schemaVersion)}`;
  }
  if (!isStatus(value.status)) {
    return 'status is invalid';
  }
  const source = value.source;
  if (!isRecord(source) || typeof source.path !== 'string' || typeof source.contentSha256 !== 'string') {
    return 'source must carry path and contentSha256';
  }
  if (typeof value.targetPath !== 'string') {
    return 'targetPath is missing';
  }
  if (typeof value.totalUnits !== 'number' || !Number.isInteger(value.totalUnits) || value.totalUnits < 0) {
    return 'totalUnits is invalid';
  }
  if (!isMode(value.mode)) {
    return 'mode is invalid';
  }
  if (typeof value.configFingerprint !== 'string') {
    return 'configFingerprint is missing';
  }
  if (!isUnitList(value.completedUnits) || !isUnitList(value.failedUnits)) {
    return 'completedUnits and failedUnits must be lists of unit ids';
  }
  const translations = value.translations;
  if (!isRecord(translations)) {
    return 'translations must be an object';
  }
  const texts: Record<string, string> = {};
  for (const [key, text] of Object.entries(translations)) {
    if (typeof text !== 'string') {
      return `translation for unit ${key} is not text`;
    }
    texts[key] = text;
  }
  if (value.completedUnits.some((unitId) => texts[String(unitId)] === undefined)) {
    return 'a completed unit has no stored translation';
  }
  if (typeof value.createdAt !== 'string' || typeof value.updatedAt !== 'string') {
    return 'timestamps are missing';
  }

  return {
    schemaVersion: TRANSLATION_VERSIONS.progressSchemaVersion,
    status: value.status,
    source: { path: source.path, contentSha256: source.contentSha256 },
    targetPath: value.targetPath,
    totalUnits: value.totalUnits,
    mode: value.mode,
    configFingerprint: value.configFingerprint,
    completedUnits: value.completedUnits,
    failedUnits: value.failedUnits,
    translations: texts,
    createdAt: value.createdAt,
    updatedAt: value.updatedAt
  };
}

function findMismatches(record: ProgressRecord, expected: ProgressExpectation): string[] {
  const mismatched: string[] = [];
  if (record.configFingerprint !== expected.fingerprint) {
    mismatched.push('configuration');
  }
  if (record.source.contentSha256 !== expected.sourceHash) {
    mismatched.push('source content');
  }
  if (path.resolve(record.targetPath) !== path.resolve(expected.targetPath)) {
    mismatched.push('target path');
  }
  if (record.totalUnits !== expected.totalUnits) {
    mismatched.push('unit count');
  }
  return mismatched;
}

/**
 * One progress file per target, stored beside it. Every save replaces the
 * file atomically.
 */
export class ProgressStore {
  readonly progressPath: string;
  private readonly logger: TranslationLogger;

  constructor(targetPath: string, opts: { logger?: TranslationLogger } = {}) {
    this.progressPath = progressPathFor(targetPath);
    this.logger = opts.logger ?? console;
  }

  async load(expected: ProgressExpectation): Promise<ProgressLoadResult> {
    let raw: unknown;
    try {
      raw = await readJsonFile<unknown>(this.progressPath, ABSENT);
    } catch (error) {
      const corruption = new ProgressCorruptionError(this.progressPath, describeError(error), error);
      this.logger.warn(`[progress][load] ${corruption.message} ${corruption.operatorHint}`);
      return { state: 'not_started', reason: 'corrupt' };
    }

    if (raw === ABSENT) {
      return { state: 'not_started', reason: 'absent' };
    }

    const parsed = parseProgressRecord(raw);
    if (typeof parsed === 'string') {
      const corruption = new ProgressCorruptionError(this.progressPath, parsed);
      this.logger.warn(`[progress][load] ${corruption.message} ${corruption.operatorHint}`);
      return { state: 'not_started', reason: 'corrupt' };
    }

    const mismatched = findMismatches(parsed, expected);
    if (mismatched.length > 0) {
      const mismatch = new ConfigMismatchError(this.progressPath, mismatched);
      this.logger.warn(`[progress][load] ${mismatch.message} ${mismatch.operatorHint}`);
      await removeFile(this.progressPath);
      return { state: 'not_started', reason: 'mismatch' };
    }

    return { state: parsed.status, record: parsed };
  }

  async save(record: ProgressRecord): Promise<void> {
    await writeJsonFile(this.progressPath, record);
  }

  async clear(): Promise<boolean> {
    return removeFile(this.progressPath);
  }
}
