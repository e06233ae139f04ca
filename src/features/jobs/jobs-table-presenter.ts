import path from 'node:path';
import type { JobRecord } from '@/types/job';
import type { FileTranslationState } from '@/types/translation';

export type LanguageBadge = { key: string; text: string };

export type JobsByDayGroup = {
  dayKey: string;
  dayLabel: string;
  jobs: JobRecord[];
};

export type JobUnitCounts = {
  total: number;
  completed: number;
  failed: number;
};

const LANGUAGE_FLAG_BY_CODE: Record<string, string> = {
  ar: '🇸🇦',
  de: '🇩🇪',
  en: '🇺🇸',
  es: '🇪🇸',
  fa: '🇮🇷',
  fi: '🇫🇮',
  fr: '🇫🇷',
  he: '🇮🇱',
  hi: '🇮🇳',
  hu: '🇭🇺',
  id: '🇮🇩',
  it: '🇮🇹',
  ja: '🇯🇵',
  ko: '🇰🇷',
  nl: '🇳🇱',
  no: '🇳🇴',
  pl: '🇵🇱',
  pt: '🇧🇷',
  ru: '🇷🇺',
  sv: '🇸🇪',
  th: '🇹🇭',
  tr: '🇹🇷',
  uk: '🇺🇦',
  vi: '🇻🇳',
  zh: '🇨🇳'
};

export function formatTime(iso?: string): string {
  if (!iso) return 'n/a';

  return new Intl.DateTimeFormat('en-US', {
    hour: 'numeric',
    minute: '2-digit'
  }).format(new Date(iso));
}

function formatDayLabel(date: Date, includeYear: boolean): string {
  return new Intl.DateTimeFormat('en-US', {
    weekday: 'long',
    month: 'short',
    day: 'numeric',
    ...(includeYear ? { year: 'numeric' } : {})
  }).format(date);
}

export function groupJobsByDay(jobs: JobRecord[]): JobsByDayGroup[] {
  const dayKeyFormatter = new Intl.DateTimeFormat('en-CA', {
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  });
  const grouped = new Map<string, { date: Date; jobs: JobRecord[] }>();

  for (const job of jobs) {
    const createdDate = new Date(job.createdAt);
    const dayKey = dayKeyFormatter.format(createdDate);
    const existing = grouped.get(dayKey);
    if (existing) {
      existing.jobs.push(job);
      continue;
    }
    grouped.set(dayKey, { date: createdDate, jobs: [job] });
  }

  const groups = Array.from(grouped.entries()).map(([dayKey, value]) => ({
    dayKey,
    date: value.date,
    jobs: value.jobs
  }));

  return groups.map((group, index) => {
    const previous = groups[index - 1]?.date;
    const next = groups[index + 1]?.date;
    const year = group.date.getFullYear();
    const month = group.date.getMonth();
    const isYearBoundary =
      (previous && previous.getFullYear() !== year) || (next && next.getFullYear() !== year);
    const includeYear = Boolean(isYearBoundary && (month === 11 || month === 0));

    return {
      dayKey: group.dayKey,
      dayLabel: formatDayLabel(group.date, includeYear),
      jobs: group.jobs
    };
  });
}

function toLanguageLabel(value: string): string {
  const code = value.trim().split('-')[0]?.toLowerCase() ?? '';
  const flag = LANGUAGE_FLAG_BY_CODE[code];
  const label = value.trim().toUpperCase();
  return flag ? `${flag} ${label}` : label;
}

export function getLanguageBadge(
  job: JobRecord,
  defaults: { sourceLanguage: string; targetLanguage: string }
): LanguageBadge {
  const source = job.options.sourceLanguage ?? defaults.sourceLanguage;
  const target = job.options.targetLanguage ?? defaults.targetLanguage;
  return {
    key: `${source}-${target}`.toLowerCase(),
    text: `${toLanguageLabel(source)} → ${toLanguageLabel(target)}`
  };
}

export function getSourceTitle(job: JobRecord): string {
  const [first, ...rest] = job.files;
  if (!first) return 'No files';
  const name = path.basename(first.sourcePath);
  return rest.length > 0 ? `${name} +${rest.length} more` : name;
}

export function getUnitCounts(job: JobRecord): JobUnitCounts {
  return job.results.reduce<JobUnitCounts>(
    (counts, result) => ({
      total: counts.total + result.totalUnits,
      completed: counts.completed + result.completedUnits,
      failed: counts.failed + result.failedUnits
    }),
    { total: 0, completed: 0, failed: 0 }
  );
}

export function getProgressSummary(job: JobRecord): string {
  if (job.status === 'pending') return 'Queued';
  if (job.status === 'running') {
    return `In progress (${job.results.length}/${job.files.length} files)`;
  }

  const counts = getUnitCounts(job);
  const prefix = job.status === 'completed' ? 'Completed' : 'Failed';
  return `${prefix}: ${counts.completed} translated, ${counts.failed} failed`;
}

export function getFileStateSymbol(state: FileTranslationState): string {
  if (state === 'completed') return '✓';
  if (state === 'failed') return '×';
  if (state === 'in_progress') return '•';
  return '';
}
