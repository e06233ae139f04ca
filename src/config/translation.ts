import { getOpenRouterSettings } from '@/config/provider-settings';
import { ConfigValidationError } from '@/lib/errors';
import { hashSha256 } from '@/lib/hash';
import type { SplitMethod } from '@/types/subtitle';
import type {
  ProcessingMode,
  ProviderKind,
  ProviderSpec,
  TranslationConfig,
  TranslationConfigInput
} from '@/types/translation';

export const TRANSLATION_VERSIONS = {
  promptVersion: 'v1',
  progressSchemaVersion: 1
} as const;

const PROCESSING_MODES: readonly ProcessingMode[] = ['line-by-line', 'batch', 'whole-file'];
const SPLIT_METHODS: readonly SplitMethod[] = ['word', 'char', 'even'];
const PROVIDER_KINDS: readonly ProviderKind[] = ['openrouter', 'ollama', 'mock'];

export const DEFAULT_TRANSLATION_CONFIG: TranslationConfig = {
  sourceLanguage: 'en',
  targetLanguage: 'hu',
  mode: 'batch',
  batchSize: 10,
  overlapSize: 2,
  reassessOverlap: false,
  wholeFileMaxUnits: 400,
  contextWindow: 2,
  crossEntry: {
    enabled: true,
    continuityGapMs: 1000,
    terminalPunctuation: ['.', '!', '?', '…'],
    closingQuotes: ['"', "'", '”', '’', '»', ')'],
    dialogueMarkers: ['-', '–', '—']
  },
  retryCount: 3,
  retryDelayMs: 500,
  callTimeoutMs: 60_000,
  providers: [{ kind: 'mock', model: 'echo' }],
  maxRowLength: 42,
  splitMethod: 'even',
  failedPlaceholder: '[UNTRANSLATED]',
  continuationMarker: '…',
  fileConcurrency: 2
};

function requireInteger(value: number, field: string, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigValidationError(`${field} must be an integer of at least ${min}.`);
  }
  return value;
}

function requireNonEmpty(value: string, field: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ConfigValidationError(`${field} cannot be empty.`);
  }
  return trimmed;
}

function isProcessingMode(value: string): value is ProcessingMode {
  return PROCESSING_MODES.some((item) => item === value);
}

function isSplitMethod(value: string): value is SplitMethod {
  return SPLIT_METHODS.some((item) => item === value);
}

function isProviderKind(value: string): value is ProviderKind {
  return PROVIDER_KINDS.some((item) => item === value);
}

function defaultModelFor(kind: ProviderKind): string {
  switch (kind) {
    case 'openrouter':
      return getOpenRouterSettings().defaultModel;
    case 'ollama':
      return 'llama3.2';
    case 'mock':
      return 'echo';
  }
}

export function normalizeProcessingMode(value: string): ProcessingMode {
  const normalized = value.trim().toLowerCase();
  if (!isProcessingMode(normalized)) {
    throw new ConfigValidationError(
      `mode must be one of ${PROCESSING_MODES.join(', ')}; received "${value}".`
    );
  }
  return normalized;
}

/**
 * Reads the `kind:model[@baseUrl]` comma list used by `SUBTITLE_PROVIDERS`,
 * e.g. `openrouter:openai/gpt-4o-mini,ollama:llama3.2@http://gpu-box:11434`.
 */
export function parseProviderList(raw: string): ProviderSpec[] {
  return raw
    .split(',')
    .map((value) => value.trim())
    .filter(Boolean)
    .map((value) => {
      const separator = value.indexOf(':');
      const kind = (separator === -1 ? value : value.slice(0, separator)).trim().toLowerCase();
      if (!isProviderKind(kind)) {
        throw new ConfigValidationError(`Unknown provider kind "${kind}".`);
      }

      const rest = separator === -1 ? '' : value.slice(separator + 1).trim();
      const at = rest.indexOf('@');
      const model = (at === -1 ? rest : rest.slice(0, at)).trim();
      const baseUrl = at === -1 ? undefined : rest.slice(at + 1).trim() || undefined;
      return {
        kind,
        model: model || defaultModelFor(kind),
        ...(baseUrl ? { baseUrl } : {})
      };
    });
}

export function resolveTranslationConfig(input: TranslationConfigInput = {}): TranslationConfig {
  const merged: TranslationConfig = {
    ...DEFAULT_TRANSLATION_CONFIG,
    ...input,
    crossEntry: {
      ...DEFAULT_TRANSLATION_CONFIG.crossEntry,
      ...input.crossEntry
    }
  };

  if (!isProcessingMode(merged.mode)) {
    throw new ConfigValidationError(`Unknown processing mode "${String(merged.mode)}".`);
  }
  if (!isSplitMethod(merged.splitMethod)) {
    throw new ConfigValidationError(`Unknown split method "${String(merged.splitMethod)}".`);
  }
  if (merged.providers.length === 0) {
    throw new ConfigValidationError('At least one translation provider is required.');
  }
  for (const provider of merged.providers) {
    if (!isProviderKind(provider.kind)) {
      throw new ConfigValidationError(`Unknown provider kind "${String(provider.kind)}".`);
    }
    requireNonEmpty(provider.model, `providers[${provider.kind}].model`);
  }
  if (merged.crossEntry.continuityGapMs < 0) {
    throw new ConfigValidationError('crossEntry.continuityGapMs cannot be negative.');
  }

  return {
    ...merged,
    sourceLanguage: requireNonEmpty(merged.sourceLanguage, 'sourceLanguage'),
    targetLanguage: requireNonEmpty(merged.targetLanguage, 'targetLanguage'),
    batchSize: requireInteger(merged.batchSize, 'batchSize', 1),
    overlapSize: requireInteger(merged.overlapSize, 'overlapSize', 0),
    wholeFileMaxUnits: requireInteger(merged.wholeFileMaxUnits, 'wholeFileMaxUnits', 1),
    contextWindow: requireInteger(merged.contextWindow, 'contextWindow', 0),
    retryCount: requireInteger(merged.retryCount, 'retryCount', 1),
    retryDelayMs: requireInteger(merged.retryDelayMs, 'retryDelayMs', 0),
    callTimeoutMs: requireInteger(merged.callTimeoutMs, 'callTimeoutMs', 1),
    maxRowLength: requireInteger(merged.maxRowLength, 'maxRowLength', 0),
    fileConcurrency: requireInteger(merged.fileConcurrency, 'fileConcurrency', 1)
  };
}

/**
 * Hash of every setting that changes what the provider is asked to produce.
 * Output-only settings (reflow, placeholders, concurrency, retry pacing) are
 * left out so changing them never invalidates saved progress.
 */
export function buildConfigFingerprint(config: TranslationConfig): string {
  return hashSha256(
    JSON.stringify({
      sourceLanguage: config.sourceLanguage,
      targetLanguage: config.targetLanguage,
      mode: config.mode,
      batchSize: config.batchSize,
      overlapSize: config.overlapSize,
      reassessOverlap: config.reassessOverlap,
      contextWindow: config.contextWindow,
      crossEntry: {
        enabled: config.crossEntry.enabled,
        continuityGapMs: config.crossEntry.continuityGapMs,
        terminalPunctuation: config.crossEntry.terminalPunctuation,
        closingQuotes: config.crossEntry.closingQuotes,
        dialogueMarkers: config.crossEntry.dialogueMarkers
      },
      providers: config.providers.map((provider) => ({
        kind: provider.kind,
        model: provider.model
      })),
      promptVersion: TRANSLATION_VERSIONS.promptVersion
    })
  );
}
