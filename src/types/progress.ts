import type { ProcessingMode } from '@/types/translation';

export type ProgressStatus = 'in_progress' | 'completed' | 'failed';

export type ProgressState = 'not_started' | ProgressStatus;

export interface ProgressRecord {
  schemaVersion: 1;
  status: ProgressStatus;
  source: {
    path: string;
    contentSha256: string;
  };
  targetPath: string;
  totalUnits: number;
  mode: ProcessingMode;
  configFingerprint: string;
  completedUnits: number[];
  failedUnits: number[];
  translations: Record<string, string>;
  createdAt: string;
  updatedAt: string;
}

export interface ProgressExpectation {
  sourceHash: string;
  fingerprint: string;
  targetPath: string;
  totalUnits: number;
}

export type ProgressLoadResult =
  | { state: 'not_started'; reason: 'absent' | 'corrupt' | 'mismatch' }
  | { state: ProgressStatus; record: ProgressRecord };
