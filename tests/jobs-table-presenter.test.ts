import assert from 'node:assert/strict';
import test from 'node:test';
import type { JobRecord } from '../src/types/job';
import type { FileTranslationSummary } from '../src/types/translation';
import {
  getFileStateSymbol,
  getLanguageBadge,
  getProgressSummary,
  getSourceTitle,
  getUnitCounts,
  groupJobsByDay
} from '../src/features/jobs/jobs-table-presenter';

const defaults = { sourceLanguage: 'en', targetLanguage: 'hu' };

function createJob(overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    id: 'job_1',
    files: [{ sourcePath: '/subs/episode-01.en.srt', targetPath: '/subs/episode-01.hu.srt' }],
    options: {},
    status: 'pending',
    createdAt: '2026-02-19T08:00:00.000Z',
    updatedAt: '2026-02-19T08:00:00.000Z',
    results: [],
    errors: [],
    ...overrides
  };
}

function createResult(overrides: Partial<FileTranslationSummary> = {}): FileTranslationSummary {
  return {
    sourcePath: '/subs/episode-01.en.srt',
    targetPath: '/subs/episode-01.hu.srt',
    state: 'completed',
    mode: 'batch',
    totalUnits: 10,
    completedUnits: 10,
    failedUnits: 0,
    resumedUnits: 0,
    reassessedUnits: 0,
    providerCalls: 1,
    redistributionWarnings: 0,
    cancelled: false,
    outputWritten: true,
    ...overrides
  };
}

test('groupJobsByDay groups records with same created day', () => {
  const jobs = [
    createJob({ id: 'job_1', createdAt: '2026-02-19T11:00:00.000Z' }),
    createJob({ id: 'job_2', createdAt: '2026-02-19T12:30:00.000Z' }),
    createJob({ id: 'job_3', createdAt: '2026-02-18T12:00:00.000Z' })
  ];

  const grouped = groupJobsByDay(jobs);
  assert.equal(grouped.length, 2);
  assert.equal(grouped[0]?.jobs.length, 2);
  assert.equal(grouped[1]?.jobs.length, 1);
});

test('getUnitCounts adds up every file result', () => {
  const job = createJob({
    results: [
      createResult(),
      createResult({ sourcePath: '/subs/episode-02.en.srt', totalUnits: 8, completedUnits: 5, failedUnits: 3 })
    ]
  });

  assert.deepEqual(getUnitCounts(job), { total: 18, completed: 15, failed: 3 });
});

test('getProgressSummary describes each job status', () => {
  assert.equal(getProgressSummary(createJob()), 'Queued');
  assert.equal(
    getProgressSummary(
      createJob({
        status: 'running',
        files: [
          { sourcePath: '/subs/a.srt', targetPath: '/subs/a.hu.srt' },
          { sourcePath: '/subs/b.srt', targetPath: '/subs/b.hu.srt' }
        ],
        results: [createResult({ sourcePath: '/subs/a.srt' })]
      })
    ),
    'In progress (1/2 files)'
  );
  assert.equal(
    getProgressSummary(createJob({ status: 'completed', results: [createResult()] })),
    'Completed: 10 translated, 0 failed'
  );
  assert.equal(
    getProgressSummary(
      createJob({
        status: 'failed',
        results: [createResult({ state: 'failed', completedUnits: 7, failedUnits: 3 })]
      })
    ),
    'Failed: 7 translated, 3 failed'
  );
});

test('getLanguageBadge falls back to the defaults and adds known flags', () => {
  assert.deepEqual(getLanguageBadge(createJob(), defaults), {
    key: 'en-hu',
    text: '🇺🇸 EN → 🇭🇺 HU'
  });
  assert.deepEqual(
    getLanguageBadge(createJob({ options: { sourceLanguage: 'pt-BR', targetLanguage: 'xx' } }), defaults),
    { key: 'pt-br-xx', text: '🇧🇷 PT-BR → XX' }
  );
});

test('getSourceTitle shows the first file and how many follow', () => {
  assert.equal(getSourceTitle(createJob()), 'episode-01.en.srt');
  assert.equal(
    getSourceTitle(
      createJob({
        files: [
          { sourcePath: '/subs/a.srt', targetPath: '/subs/a.hu.srt' },
          { sourcePath: '/subs/b.srt', targetPath: '/subs/b.hu.srt' },
          { sourcePath: '/subs/c.srt', targetPath: '/subs/c.hu.srt' }
        ]
      })
    ),
    'a.srt +2 more'
  );
  assert.equal(getSourceTitle(createJob({ files: [] })), 'No files');
});

test('getFileStateSymbol maps file states to symbols', () => {
  assert.equal(getFileStateSymbol('completed'), '✓');
  assert.equal(getFileStateSymbol('failed'), '×');
  assert.equal(getFileStateSymbol('in_progress'), '•');
  assert.equal(getFileStateSymbol('not_started'), '');
});
