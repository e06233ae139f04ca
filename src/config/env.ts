import path from 'node:path';
import { hasOpenRouterApiKey, readStringEnv } from '@/config/provider-settings';

const requiredInProd = ['OPENROUTER_API_KEY'];

// Getters so tests that change process.env see the change without reloading modules.
export const env = {
  get nodeEnv(): string {
    return process.env.NODE_ENV ?? 'development';
  },
  get jobsDbPath(): string {
    return readStringEnv('JOBS_DB_PATH') ?? '.data/jobs.json';
  },
  // Job file paths resolve against this directory and may not leave it.
  get subtitleRootPath(): string {
    return path.resolve(readStringEnv('SUBTITLE_ROOT') ?? process.cwd());
  },
  get subtitleProviders(): string {
    return readStringEnv('SUBTITLE_PROVIDERS') ?? (hasOpenRouterApiKey() ? 'openrouter' : 'mock');
  },
  get sourceLanguage(): string | undefined {
    return readStringEnv('SUBTITLE_SOURCE_LANGUAGE');
  },
  get targetLanguage(): string | undefined {
    return readStringEnv('SUBTITLE_TARGET_LANGUAGE');
  }
};

export function getRuntimeWarnings(): string[] {
  if (env.nodeEnv !== 'production') {
    return [];
  }

  const usesOpenRouter = env.subtitleProviders
    .split(',')
    .some((spec) => spec.trim().toLowerCase().startsWith('openrouter'));

  return requiredInProd
    .filter((key) => usesOpenRouter && !process.env[key])
    .map((key) => `${key} is not configured in production mode.`);
}
