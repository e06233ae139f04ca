import { env } from '@/config/env';
import { parseProviderList, resolveTranslationConfig } from '@/config/translation';
import {
  appendJobError,
  getJobById,
  recordFileResult,
  setJobStatus
} from '@/data/job-store';
import { describeError, isTranslatorError } from '@/lib/errors';
import { translateFiles } from '@/services/orchestrator';
import { installInterruptHandler } from '@/services/progress/interrupt';
import { createProviders, selectAvailableProviders } from '@/services/providers';
import type { TranslationProvider } from '@/services/providers/types';
import type { JobOptions } from '@/types/job';
import type {
  TranslationConfig,
  TranslationConfigInput,
  TranslationLogger
} from '@/types/translation';

export interface SubtitleTranslationDeps {
  providers?: readonly TranslationProvider[];
  logger?: TranslationLogger;
  signal?: AbortSignal;
  config?: TranslationConfigInput;
}

export function resolveJobConfig(
  options: JobOptions,
  overrides: TranslationConfigInput = {}
): TranslationConfig {
  const input: TranslationConfigInput = {
    providers: parseProviderList(env.subtitleProviders),
    ...overrides
  };
  const sourceLanguage = options.sourceLanguage ?? env.sourceLanguage;
  const targetLanguage = options.targetLanguage ?? env.targetLanguage;
  if (sourceLanguage) {
    input.sourceLanguage = sourceLanguage;
  }
  if (targetLanguage) {
    input.targetLanguage = targetLanguage;
  }
  if (options.mode) {
    input.mode = options.mode;
  }
  return resolveTranslationConfig(input);
}

export async function startSubtitleTranslation(
  jobId: string,
  deps: SubtitleTranslationDeps = {}
): Promise<void> {
  const job = await getJobById(jobId);
  if (!job || job.status === 'running' || job.status === 'completed') {
    return;
  }

  const logger = deps.logger ?? console;
  // Without a caller-owned signal, SIGINT/SIGTERM stop the job at the next unit boundary.
  const controller = deps.signal ? null : new AbortController();
  const disposeInterrupt = controller ? installInterruptHandler(controller, { logger }) : null;
  const signal = deps.signal ?? controller?.signal;

  try {
    await setJobStatus(jobId, 'running');
    const config = resolveJobConfig(job.options, deps.config);
    const providers = await selectAvailableProviders(
      deps.providers ?? createProviders(config.providers),
      { logger, signal }
    );

    const summaries = await translateFiles(
      job.files.map((file) => ({ ...file, restart: job.options.restart })),
      config,
      { providers, logger, signal }
    );

    for (const summary of summaries) {
      await recordFileResult(jobId, summary);
      if (summary.error) {
        await appendJobError(jobId, { sourcePath: summary.sourcePath, message: summary.error });
      } else if (summary.failedUnits > 0) {
        await appendJobError(jobId, {
          sourcePath: summary.sourcePath,
          message: `${summary.failedUnits} of ${summary.totalUnits} units could not be translated.`,
          code: 'PROVIDER_ERROR'
        });
      } else if (summary.cancelled) {
        await appendJobError(jobId, {
          sourcePath: summary.sourcePath,
          message: 'Stopped before finishing; saved progress resumes on the next run.'
        });
      }
    }

    const allCompleted = summaries.every((summary) => summary.state === 'completed');
    await setJobStatus(jobId, allCompleted ? 'completed' : 'failed');
  } catch (error) {
    const message = describeError(error);
    logger.error(`[workflow][subtitle-translation] job ${jobId} failed: ${message}`);
    await appendJobError(jobId, {
      message,
      ...(isTranslatorError(error)
        ? { code: error.code, operatorHint: error.operatorHint }
        : {})
    });
    await setJobStatus(jobId, 'failed');
  } finally {
    disposeInterrupt?.();
  }
}
