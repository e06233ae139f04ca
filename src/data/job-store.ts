import { env } from '@/config/env';
import { createId } from '@/lib/id';
import { updateJsonFile, readJsonFile } from '@/lib/json-store';
import type { FileTranslationSummary } from '@/types/translation';
import type { JobCreatePayload, JobError, JobRecord, JobsDb, JobStatus } from '@/types/job';

const EMPTY_DB: JobsDb = { jobs: [] };

async function loadDb(): Promise<JobsDb> {
  return readJsonFile(env.jobsDbPath, EMPTY_DB);
}

export async function listJobs(): Promise<JobRecord[]> {
  const db = await loadDb();
  return [...db.jobs].sort((a, b) => b.createdAt.localeCompare(a.createdAt));
}

export async function getJobById(id: string): Promise<JobRecord | undefined> {
  const db = await loadDb();
  return db.jobs.find((job) => job.id === id);
}

export async function createJob(payload: JobCreatePayload): Promise<JobRecord> {
  const now = new Date().toISOString();
  const job: JobRecord = {
    id: createId('job'),
    files: payload.files,
    options: payload.options ?? {},
    status: 'pending',
    createdAt: now,
    updatedAt: now,
    results: [],
    errors: []
  };

  await updateJsonFile(env.jobsDbPath, EMPTY_DB, (db) => ({
    jobs: [...db.jobs, job]
  }));

  return job;
}

export async function mutateJob(
  jobId: string,
  mutator: (job: JobRecord) => JobRecord
): Promise<JobRecord | undefined> {
  let updated: JobRecord | undefined;

  await updateJsonFile(env.jobsDbPath, EMPTY_DB, (db) => {
    const jobs = db.jobs.map((job) => {
      if (job.id !== jobId) {
        return job;
      }
      updated = mutator(job);
      return updated;
    });
    return { jobs };
  });

  return updated;
}

export async function setJobStatus(jobId: string, status: JobStatus): Promise<void> {
  await mutateJob(jobId, (job) => {
    const now = new Date().toISOString();
    return {
      ...job,
      status,
      startedAt: job.startedAt ?? (status === 'running' ? now : job.startedAt),
      completedAt:
        status === 'completed' || status === 'failed' ? now : job.completedAt,
      updatedAt: now
    };
  });
}

// Replaces any earlier result for the same source file.
export async function recordFileResult(
  jobId: string,
  summary: FileTranslationSummary
): Promise<void> {
  await mutateJob(jobId, (job) => ({
    ...job,
    results: [
      ...job.results.filter((result) => result.sourcePath !== summary.sourcePath),
      summary
    ],
    updatedAt: new Date().toISOString()
  }));
}

export async function appendJobError(
  jobId: string,
  error: Omit<JobError, 'at'>
): Promise<void> {
  await mutateJob(jobId, (job) => {
    const now = new Date().toISOString();
    return {
      ...job,
      errors: [...job.errors, { ...error, at: now }],
      updatedAt: now
    };
  });
}
