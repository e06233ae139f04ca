import type { SplitMethod } from '@/types/subtitle';

export type ProcessingMode = 'line-by-line' | 'batch' | 'whole-file';

export type ProviderKind = 'openrouter' | 'ollama' | 'mock';

export interface ProviderSpec {
  kind: ProviderKind;
  model: string;
  baseUrl?: string;
}

export interface CrossEntryOptions {
  enabled: boolean;
  continuityGapMs: number;
  terminalPunctuation: string[];
  closingQuotes: string[];
  dialogueMarkers: string[];
}

export interface TranslationConfig {
  sourceLanguage: string;
  targetLanguage: string;
  mode: ProcessingMode;
  batchSize: number;
  overlapSize: number;
  reassessOverlap: boolean;
  wholeFileMaxUnits: number;
  contextWindow: number;
  crossEntry: CrossEntryOptions;
  retryCount: number;
  retryDelayMs: number;
  callTimeoutMs: number;
  providers: ProviderSpec[];
  maxRowLength: number;
  splitMethod: SplitMethod;
  failedPlaceholder: string;
  continuationMarker: string;
  fileConcurrency: number;
}

export interface TranslationConfigInput
  extends Partial<Omit<TranslationConfig, 'crossEntry'>> {
  crossEntry?: Partial<CrossEntryOptions>;
}

export type TranslationLogger = Pick<Console, 'info' | 'warn' | 'error'>;

export type FileTranslationState = 'not_started' | 'in_progress' | 'completed' | 'failed';

export interface FileTranslationSummary {
  sourcePath: string;
  targetPath: string;
  state: FileTranslationState;
  mode: ProcessingMode;
  totalUnits: number;
  completedUnits: number;
  failedUnits: number;
  resumedUnits: number;
  reassessedUnits: number;
  providerCalls: number;
  redistributionWarnings: number;
  cancelled: boolean;
  outputWritten: boolean;
  error?: string;
}
