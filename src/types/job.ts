import type { FileTranslationSummary, ProcessingMode } from '@/types/translation';

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface JobFile {
  sourcePath: string;
  targetPath: string;
}

export interface JobOptions {
  sourceLanguage?: string;
  targetLanguage?: string;
  mode?: ProcessingMode;
  restart?: boolean;
}

export interface JobCreatePayload {
  files: JobFile[];
  options?: JobOptions;
}

export interface JobError {
  sourcePath?: string;
  message: string;
  at: string;
  code?: string;
  operatorHint?: string;
}

export interface JobRecord {
  id: string;
  files: JobFile[];
  options: JobOptions;
  status: JobStatus;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  results: FileTranslationSummary[];
  errors: JobError[];
}

export interface JobsDb {
  jobs: JobRecord[];
}
