import React from 'react';
import Link from 'next/link';
import { Check, Clock, RefreshCw, X } from 'lucide-react';
import { env, getRuntimeWarnings } from '@/config/env';
import { DEFAULT_TRANSLATION_CONFIG } from '@/config/translation';
import { listJobs } from '@/data/job-store';
import {
  formatTime,
  getFileStateSymbol,
  getLanguageBadge,
  getProgressSummary,
  getSourceTitle,
  getUnitCounts,
  groupJobsByDay
} from '@/features/jobs/jobs-table-presenter';
import type { JobStatus } from '@/types/job';

export const dynamic = 'force-dynamic';

function StatusIcon({ status }: { status: JobStatus }) {
  if (status === 'completed') return <Check className="icon" aria-hidden="true" />;
  if (status === 'failed') return <X className="icon" aria-hidden="true" />;
  return <Clock className="icon" aria-hidden="true" />;
}

export default async function JobsPage() {
  const jobs = await listJobs();
  const groupedJobs = groupJobsByDay(jobs);
  const warnings = getRuntimeWarnings();
  const languageDefaults = {
    sourceLanguage: env.sourceLanguage ?? DEFAULT_TRANSLATION_CONFIG.sourceLanguage,
    targetLanguage: env.targetLanguage ?? DEFAULT_TRANSLATION_CONFIG.targetLanguage
  };

  return (
    <main className="jobs-main">
      <div className="report-shell jobs-report-shell">
        <header className="report-header jobs-header">
          <div className="header-content">
            <span className="control-label control-label--title">Translation Queue</span>
          </div>
        </header>

        {warnings.length > 0 && (
          <section className="report-error jobs-panel-warning">
            <strong>Runtime warnings</strong>
            <ul className="small">
              {warnings.map((warning) => (
                <li key={warning}>{warning}</li>
              ))}
            </ul>
          </section>
        )}

        <section className="collection-card jobs-card">
          <div className="jobs-card-header">
            <h2 className="jobs-card-title">Jobs</h2>
            <Link href="/dashboard/jobs" className="jobs-refresh-link">
              <RefreshCw className="icon" aria-hidden="true" />
              Refresh
            </Link>
          </div>

          {jobs.length === 0 ? (
            <p className="small">No jobs yet. POST to /api/jobs to queue subtitle files.</p>
          ) : (
            <div className="jobs-day-groups">
              {groupedJobs.map((group) => (
                <section key={group.dayKey} className="jobs-day-group">
                  <h3 className="jobs-day-heading">{group.dayLabel}</h3>
                  <div className="jobs-table-wrap">
                    <table className="table jobs-table">
                      <thead>
                        <tr>
                          <th>Time</th>
                          <th>Source</th>
                          <th>Languages</th>
                          <th>Units</th>
                          <th>Progress</th>
                        </tr>
                      </thead>
                      <tbody>
                        {group.jobs.map((job) => {
                          const latestError =
                            job.status === 'failed' ? (job.errors.at(-1)?.message ?? 'Failed') : null;
                          const badge = getLanguageBadge(job, languageDefaults);
                          const counts = getUnitCounts(job);

                          return (
                            <React.Fragment key={job.id}>
                              <tr className={latestError ? 'jobs-row-with-issue' : undefined}>
                                <td>{formatTime(job.createdAt)}</td>
                                <td className="jobs-source-cell">
                                  <span className="jobs-source-title" title={job.id}>
                                    {getSourceTitle(job)}
                                  </span>
                                </td>
                                <td>
                                  <span className="jobs-language-badge">{badge.text}</span>
                                </td>
                                <td>
                                  <span className="jobs-unit-counts">
                                    Completed: {counts.completed} · Failed: {counts.failed}
                                  </span>
                                </td>
                                <td>
                                  <div className="jobs-progress-cell">
                                    <div className="jobs-progress-track">
                                      {job.results.map((result) => (
                                        <span
                                          key={`${job.id}-${result.sourcePath}`}
                                          className={`jobs-step-dot jobs-step-dot-${result.state}`}
                                          title={result.sourcePath}
                                        >
                                          {getFileStateSymbol(result.state)}
                                        </span>
                                      ))}
                                    </div>
                                    <p
                                      className={`jobs-progress-summary jobs-progress-summary-${job.status}`}
                                    >
                                      <StatusIcon status={job.status} /> {getProgressSummary(job)}
                                    </p>
                                  </div>
                                </td>
                              </tr>
                              {latestError && (
                                <tr className="jobs-issue-row">
                                  <td aria-hidden="true" />
                                  <td colSpan={4}>
                                    <p className="jobs-error-text" title={latestError}>
                                      {latestError}
                                    </p>
                                  </td>
                                </tr>
                              )}
                            </React.Fragment>
                          );
                        })}
                      </tbody>
                    </table>
                  </div>
                </section>
              ))}
            </div>
          )}
        </section>
      </div>
    </main>
  );
}
