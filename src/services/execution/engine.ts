import { callWithFallback, type FallbackResult } from '@/services/execution/retry';
import type {
  PrecedingUnit,
  ProviderUnit,
  TranslationProvider
} from '@/services/providers/types';
import type { CrossEntryGroup } from '@/types/subtitle';
import type {
  ProcessingMode,
  TranslationConfig,
  TranslationLogger
} from '@/types/translation';

export interface ExecutionEngineOptions {
  config: TranslationConfig;
  providers: readonly TranslationProvider[];
  logger?: TranslationLogger;
  signal?: AbortSignal;
}

export interface EngineRunOptions {
  // Translations already persisted by an earlier run, keyed by unit id.
  completed?: ReadonlyMap<number, string>;
  // Called after every successful call with the new and replaced translations.
  onUnitsTranslated?: (translated: ReadonlyMap<number, string>) => Promise<void> | void;
}

export interface EngineResult {
  translations: Map<number, string>;
  failed: number[];
  reassessed: number[];
  providerCalls: number;
  cancelled: boolean;
  mode: ProcessingMode;
}

interface RunState {
  groups: readonly CrossEntryGroup[];
  positionById: Map<number, number>;
  translations: Map<number, string>;
  failed: number[];
  reassessed: Set<number>;
  providerCalls: number;
  cancelled: boolean;
  onUnitsTranslated: EngineRunOptions['onUnitsTranslated'];
}

export class ExecutionEngine {
  private readonly config: TranslationConfig;
  private readonly providers: readonly TranslationProvider[];
  private readonly logger: TranslationLogger;
  private readonly signal: AbortSignal | undefined;

  constructor(opts: ExecutionEngineOptions) {
    if (opts.providers.length === 0) {
      throw new Error('ExecutionEngine needs at least one translation provider.');
    }
    this.config = opts.config;
    this.providers = opts.providers;
    this.logger = opts.logger ?? console;
    this.signal = opts.signal;
  }

  /** Mode a run over `pendingUnits` untranslated units will use; whole-file above its limit runs as batch. */
  planMode(pendingUnits: number): ProcessingMode {
    if (this.config.mode === 'whole-file' && pendingUnits > this.config.wholeFileMaxUnits) {
      return 'batch';
    }
    return this.config.mode;
  }

  async run(groups: readonly CrossEntryGroup[], opts: EngineRunOptions = {}): Promise<EngineResult> {
    const state: RunState = {
      groups,
      positionById: new Map(groups.map((group, position) => [group.unitId, position])),
      translations: new Map(opts.completed ?? []),
      failed: [],
      reassessed: new Set(),
      providerCalls: 0,
      cancelled: false,
      onUnitsTranslated: opts.onUnitsTranslated
    };
    const pending = groups.filter((group) => !state.translations.has(group.unitId));

    const mode = this.planMode(pending.length);
    if (mode !== this.config.mode) {
      this.logger.warn(
        `[execution][whole-file] ${pending.length} units exceed the whole-file limit of ${this.config.wholeFileMaxUnits}; using batch mode.`
      );
    }

    if (pending.length > 0) {
      switch (mode) {
        case 'line-by-line':
          await this.runLineByLine(state, pending);
          break;
        case 'batch':
          await this.runBatches(state, pending);
          break;
        case 'whole-file':
          await this.runWholeFile(state, pending);
          break;
        default: {
          const exhaustiveCheck: never = mode;
          throw new Error(`Unsupported processing mode: ${String(exhaustiveCheck)}`);
        }
      }
    }

    return {
      translations: state.translations,
      failed: state.failed,
      reassessed: [...state.reassessed].sort((a, b) => a - b),
      providerCalls: state.providerCalls,
      cancelled: state.cancelled,
      mode
    };
  }

  private toProviderUnit(state: RunState, group: CrossEntryGroup): ProviderUnit {
    const position = state.positionById.get(group.unitId) ?? 0;
    const window = this.config.contextWindow;
    return {
      unitId: group.unitId,
      text: group.sourceText,
      context: {
        before: state.groups
          .slice(Math.max(0, position - window), position)
          .map((neighbor) => neighbor.sourceText),
        after: state.groups
          .slice(position + 1, position + 1 + window)
          .map((neighbor) => neighbor.sourceText)
      }
    };
  }

  private async call(
    state: RunState,
    units: ProviderUnit[],
    preceding: PrecedingUnit[] = []
  ): Promise<FallbackResult> {
    const result = await callWithFallback(
      this.providers,
      {
        sourceLanguage: this.config.sourceLanguage,
        targetLanguage: this.config.targetLanguage,
        units,
        preceding
      },
      this.config,
      { logger: this.logger, signal: this.signal }
    );
    state.providerCalls += result.attempts;
    if (!result.ok && result.cancelled) {
      state.cancelled = true;
    }
    return result;
  }

  private markFailed(state: RunState, groups: readonly CrossEntryGroup[]): void {
    const unitIds = groups.map((group) => group.unitId);
    state.failed.push(...unitIds);
    this.logger.error(
      `[execution][failed] every provider failed for units ${unitIds.join(',')}; continuing with the rest.`
    );
  }

  private async persist(state: RunState, translated: ReadonlyMap<number, string>): Promise<void> {
    for (const [unitId, text] of translated) {
      state.translations.set(unitId, text);
    }
    await state.onUnitsTranslated?.(translated);
  }

  private async runLineByLine(state: RunState, pending: readonly CrossEntryGroup[]): Promise<void> {
    for (const group of pending) {
      if (this.signal?.aborted) {
        state.cancelled = true;
        return;
      }

      const result = await this.call(state, [this.toProviderUnit(state, group)]);
      if (result.ok) {
        await this.persist(state, new Map(result.units.map((unit) => [unit.unitId, unit.text])));
      } else if (result.cancelled) {
        return;
      } else {
        this.markFailed(state, [group]);
      }
    }
  }

  // The last `overlapSize` translated units right before `group`.
  private overlapFor(state: RunState, group: CrossEntryGroup): CrossEntryGroup[] {
    if (this.config.overlapSize === 0) {
      return [];
    }

    const overlap: CrossEntryGroup[] = [];
    const position = state.positionById.get(group.unitId) ?? 0;
    for (let i = position - 1; i >= 0 && overlap.length < this.config.overlapSize; i -= 1) {
      const candidate = state.groups[i];
      if (!candidate || !state.translations.has(candidate.unitId)) {
        break;
      }
      overlap.unshift(candidate);
    }
    return overlap;
  }

  private async runBatches(state: RunState, pending: readonly CrossEntryGroup[]): Promise<void> {
    for (let start = 0; start < pending.length; start += this.config.batchSize) {
      if (this.signal?.aborted) {
        state.cancelled = true;
        return;
      }

      const batch = pending.slice(start, start + this.config.batchSize);
      const first = batch[0];
      const overlap = first ? this.overlapFor(state, first) : [];
      const reassess = this.config.reassessOverlap && overlap.length > 0;

      const units = [...(reassess ? overlap : []), ...batch].map((group) =>
        this.toProviderUnit(state, group)
      );
      const preceding: PrecedingUnit[] = reassess
        ? []
        : overlap.map((group) => ({
            unitId: group.unitId,
            text: group.sourceText,
            translatedText: state.translations.get(group.unitId) ?? ''
          }));

      const result = await this.call(state, units, preceding);
      if (!result.ok) {
        if (result.cancelled) {
          return;
        }
        this.markFailed(state, batch);
        continue;
      }

      const translated = new Map<number, string>();
      const overlapIds = new Set(reassess ? overlap.map((group) => group.unitId) : []);
      for (const unit of result.units) {
        if (!overlapIds.has(unit.unitId)) {
          translated.set(unit.unitId, unit.text);
          continue;
        }

        const stored = state.translations.get(unit.unitId);
        if (stored !== undefined && stored.trim() !== unit.text.trim()) {
          translated.set(unit.unitId, unit.text);
          state.reassessed.add(unit.unitId);
          this.logger.info(
            `[execution][reassess] unit ${unit.unitId} replaced after overlap review.`
          );
        }
      }
      await this.persist(state, translated);
    }
  }

  private async runWholeFile(state: RunState, pending: readonly CrossEntryGroup[]): Promise<void> {
    if (this.signal?.aborted) {
      state.cancelled = true;
      return;
    }

    const result = await this.call(
      state,
      pending.map((group) => this.toProviderUnit(state, group))
    );
    if (result.ok) {
      await this.persist(state, new Map(result.units.map((unit) => [unit.unitId, unit.text])));
    } else if (!result.cancelled) {
      this.markFailed(state, pending);
    }
  }
}
