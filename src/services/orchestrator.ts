import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { buildConfigFingerprint } from '@/config/translation';
import { describeError } from '@/lib/errors';
import { hashSha256 } from '@/lib/hash';
import { writeTextFileAtomic } from '@/lib/json-store';
import { ExecutionEngine } from '@/services/execution/engine';
import { detectCrossEntryGroups } from '@/services/grouping/cross-entry';
import { applyGroupTranslation } from '@/services/grouping/redistribute';
import { ProgressStore } from '@/services/progress/progress-store';
import {
  completedTranslations,
  createProgressRecord,
  finalizeProgressRecord,
  recordTranslatedUnits
} from '@/services/progress/transitions';
import type { TranslationProvider } from '@/services/providers/types';
import {
  attachTranslations,
  formatSubtitleDocument,
  parseSubtitleDocument
} from '@/services/subtitle/srt';
import type { ProgressRecord } from '@/types/progress';
import type { CrossEntryGroup, SubtitleDocument } from '@/types/subtitle';
import type {
  FileTranslationState,
  FileTranslationSummary,
  TranslationConfig,
  TranslationLogger
} from '@/types/translation';

export { buildConfigFingerprint };

export interface OrchestratorDeps {
  providers: readonly TranslationProvider[];
  logger?: TranslationLogger;
  signal?: AbortSignal;
  now?: () => Date;
}

export interface TranslateFileRequest {
  sourcePath: string;
  targetPath: string;
  restart?: boolean;
}

export class SubtitleTranslationOrchestrator {
  private readonly config: TranslationConfig;
  private readonly deps: OrchestratorDeps;
  private readonly logger: TranslationLogger;

  constructor(config: TranslationConfig, deps: OrchestratorDeps) {
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger ?? console;
  }

  private now(): Date {
    return this.deps.now?.() ?? new Date();
  }

  /**
   * Translates one subtitle file. A malformed source throws `ParseError`
   * before anything is written; provider failures only mark their units.
   */
  async translateFile(request: TranslateFileRequest): Promise<FileTranslationSummary> {
    const { sourcePath, targetPath } = request;
    const bytes = await readFile(sourcePath);
    const sourceHash = hashSha256(bytes);
    const document = parseSubtitleDocument(bytes.toString('utf8'));
    const groups = detectCrossEntryGroups(document.entries, this.config.crossEntry);
    const fingerprint = buildConfigFingerprint(this.config);

    const store = new ProgressStore(targetPath, { logger: this.logger });
    if (request.restart) {
      const removed = await store.clear();
      this.logger.info(
        `[orchestrator][restart] ${removed ? 'discarded saved progress' : 'no saved progress'} for ${targetPath}.`
      );
    }

    const loaded = await store.load({
      sourceHash,
      fingerprint,
      targetPath,
      totalUnits: groups.length
    });
    let record: ProgressRecord | null = loaded.state === 'not_started' ? null : loaded.record;
    const completed = record ? completedTranslations(record) : new Map<number, string>();
    if (record) {
      this.logger.info(
        `[orchestrator][resume] ${targetPath}: ${completed.size}/${groups.length} units already translated (${record.status}).`
      );
    }

    const engine = new ExecutionEngine({
      config: this.config,
      providers: this.deps.providers,
      logger: this.logger,
      signal: this.deps.signal
    });
    const mode = engine.planMode(groups.filter((group) => !completed.has(group.unitId)).length);
    const result = await engine.run(groups, {
      completed,
      onUnitsTranslated: async (translated) => {
        const base =
          record ??
          createProgressRecord({
            sourcePath,
            sourceHash,
            targetPath,
            totalUnits: groups.length,
            mode,
            fingerprint,
            now: this.now()
          });
        record = recordTranslatedUnits({ ...base, mode }, translated, this.now());
        await store.save(record);
      }
    });

    const summary = {
      sourcePath,
      targetPath,
      mode: result.mode,
      totalUnits: groups.length,
      completedUnits: result.translations.size,
      failedUnits: result.failed.length,
      resumedUnits: completed.size,
      reassessedUnits: result.reassessed.length,
      providerCalls: result.providerCalls
    };

    if (result.cancelled) {
      if (record) {
        await store.save(record);
      }
      this.logger.warn(
        `[orchestrator][cancel] ${targetPath}: stopped after ${result.translations.size}/${groups.length} units; progress saved, no output written.`
      );
      return {
        ...summary,
        state: record ? 'in_progress' : 'not_started',
        redistributionWarnings: 0,
        cancelled: true,
        outputWritten: false
      };
    }

    let state: FileTranslationState = result.failed.length > 0 ? 'failed' : 'completed';
    if (record) {
      record = finalizeProgressRecord(record, result.failed, this.now());
      await store.save(record);
      state = record.status;
    }

    const { output, redistributionWarnings } = this.renderOutput(
      document,
      groups,
      result.translations
    );
    await writeTextFileAtomic(targetPath, output);

    this.logger.info(
      `[orchestrator][summary] ${path.basename(sourcePath)}: ${summary.completedUnits}/${groups.length} units translated, ${summary.failedUnits} failed, ${summary.providerCalls} provider call(s).`
    );

    return {
      ...summary,
      state,
      redistributionWarnings,
      cancelled: false,
      outputWritten: true
    };
  }

  private renderOutput(
    document: SubtitleDocument,
    groups: readonly CrossEntryGroup[],
    translations: ReadonlyMap<number, string>
  ): { output: string; redistributionWarnings: number } {
    const entriesByIndex = new Map(document.entries.map((entry) => [entry.index, entry]));
    const texts = new Map<number, string>();
    let redistributionWarnings = 0;

    for (const group of groups) {
      const translated = translations.get(group.unitId);
      if (translated === undefined) {
        for (const index of group.entryIndices) {
          const source = entriesByIndex.get(index)?.lines.join('\n') ?? '';
          texts.set(index, `${this.config.failedPlaceholder} ${source}`);
        }
        continue;
      }

      const applied = applyGroupTranslation(
        group,
        document.entries,
        translated,
        this.config.continuationMarker
      );
      if (applied.error) {
        redistributionWarnings += 1;
        this.logger.warn(
          `[orchestrator][redistribute] unit ${group.unitId} (entries ${group.entryIndices.join(',')}): ${applied.error.message} ${applied.error.operatorHint}`
        );
      }
      for (const entry of applied.entries) {
        texts.set(entry.index, entry.text);
      }
    }

    const output = formatSubtitleDocument(attachTranslations(document, texts), {
      reflow: { maxRowLength: this.config.maxRowLength, splitMethod: this.config.splitMethod }
    });
    return { output, redistributionWarnings };
  }
}

function failedSummary(
  request: TranslateFileRequest,
  config: TranslationConfig,
  error: string
): FileTranslationSummary {
  return {
    sourcePath: request.sourcePath,
    targetPath: request.targetPath,
    state: 'failed',
    mode: config.mode,
    totalUnits: 0,
    completedUnits: 0,
    failedUnits: 0,
    resumedUnits: 0,
    reassessedUnits: 0,
    providerCalls: 0,
    redistributionWarnings: 0,
    cancelled: false,
    outputWritten: false,
    error
  };
}

/**
 * Runs several files with at most `fileConcurrency` in flight. Each file has
 * its own orchestrator and progress file; one file failing does not stop
 * the others.
 */
export async function translateFiles(
  files: readonly TranslateFileRequest[],
  config: TranslationConfig,
  deps: OrchestratorDeps
): Promise<FileTranslationSummary[]> {
  const logger = deps.logger ?? console;
  const summaries: FileTranslationSummary[] = [];
  const seenTargets = new Set<string>();
  const runnable: number[] = [];

  files.forEach((file, position) => {
    const target = path.resolve(file.targetPath);
    if (path.resolve(file.sourcePath) === target) {
      summaries[position] = failedSummary(file, config, `Target ${file.targetPath} would overwrite its own source.`);
      return;
    }
    if (seenTargets.has(target)) {
      summaries[position] = failedSummary(
        file,
        config,
        `Target ${file.targetPath} is already used by another file in this run.`
      );
      return;
    }
    seenTargets.add(target);
    runnable.push(position);
  });

  let cursor = 0;
  const worker = async () => {
    while (cursor < runnable.length) {
      const position = runnable[cursor];
      cursor += 1;
      const file = position === undefined ? undefined : files[position];
      if (position === undefined || !file) {
        continue;
      }

      if (deps.signal?.aborted) {
        summaries[position] = {
          ...failedSummary(file, config, 'Cancelled before the file was started.'),
          state: 'not_started',
          cancelled: true
        };
        continue;
      }

      try {
        summaries[position] = await new SubtitleTranslationOrchestrator(config, deps).translateFile(file);
      } catch (error) {
        const message = describeError(error);
        logger.error(`[orchestrator][file] ${file.sourcePath} failed: ${message}`);
        summaries[position] = failedSummary(file, config, message);
      }
    }
  };

  const workerCount = Math.max(1, Math.min(config.fileConcurrency, runnable.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return summaries;
}
