import path from 'node:path';
import { NextResponse } from 'next/server';
import { env } from '@/config/env';
import { normalizeProcessingMode } from '@/config/translation';
import { createJob, listJobs } from '@/data/job-store';
import { isTranslatorError } from '@/lib/errors';
import { startSubtitleTranslation } from '@/workflows/subtitleTranslation';
import type { JobCreatePayload, JobFile, JobOptions } from '@/types/job';

export const dynamic = 'force-dynamic';

class PayloadValidationError extends Error {}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isInside(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

function parseFile(value: unknown, position: number, root: string): JobFile {
  if (!isRecord(value)) {
    throw new PayloadValidationError(`files[${position}] must be an object.`);
  }

  const readPath = (field: 'sourcePath' | 'targetPath') => {
    const raw = value[field];
    if (typeof raw !== 'string' || !raw.trim()) {
      throw new PayloadValidationError(`files[${position}].${field} is required and must be a string.`);
    }
    const resolved = path.resolve(root, raw.trim());
    if (!isInside(root, resolved)) {
      throw new PayloadValidationError(`files[${position}].${field} must resolve inside the subtitle root.`);
    }
    return resolved;
  };

  const file = { sourcePath: readPath('sourcePath'), targetPath: readPath('targetPath') };
  if (file.sourcePath === file.targetPath) {
    throw new PayloadValidationError(`files[${position}] cannot overwrite its own source.`);
  }
  return file;
}

function parseOptions(value: unknown): JobOptions {
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new PayloadValidationError('options must be an object when provided.');
  }

  const readString = (field: 'sourceLanguage' | 'targetLanguage') => {
    const raw = value[field];
    if (raw === undefined) {
      return undefined;
    }
    if (typeof raw !== 'string' || !raw.trim()) {
      throw new PayloadValidationError(`options.${field} must be a non-empty string when provided.`);
    }
    return raw.trim();
  };

  if (value.restart !== undefined && typeof value.restart !== 'boolean') {
    throw new PayloadValidationError('options.restart must be a boolean when provided.');
  }

  let mode: JobOptions['mode'];
  if (value.mode !== undefined) {
    if (typeof value.mode !== 'string') {
      throw new PayloadValidationError('options.mode must be a string when provided.');
    }
    try {
      mode = normalizeProcessingMode(value.mode);
    } catch (error) {
      throw new PayloadValidationError(
        isTranslatorError(error) ? `options.${error.message}` : 'options.mode is invalid.'
      );
    }
  }

  const options: JobOptions = {};
  const sourceLanguage = readString('sourceLanguage');
  const targetLanguage = readString('targetLanguage');
  if (sourceLanguage) options.sourceLanguage = sourceLanguage;
  if (targetLanguage) options.targetLanguage = targetLanguage;
  if (mode) options.mode = mode;
  if (typeof value.restart === 'boolean') options.restart = value.restart;
  return options;
}

function parsePayload(input: unknown): JobCreatePayload {
  if (!isRecord(input)) {
    throw new PayloadValidationError('Payload must be an object.');
  }

  if (!Array.isArray(input.files) || input.files.length === 0) {
    throw new PayloadValidationError('files is required and must be a non-empty array.');
  }

  const root = env.subtitleRootPath;
  const files = input.files.map((file: unknown, position) => parseFile(file, position, root));
  const targets = new Set(files.map((file) => file.targetPath));
  if (targets.size !== files.length) {
    throw new PayloadValidationError('Each file needs its own targetPath.');
  }

  return { files, options: parseOptions(input.options) };
}

export async function GET() {
  const jobs = await listJobs();
  return NextResponse.json(jobs, { status: 200 });
}

export async function POST(request: Request) {
  try {
    let parsedJson: unknown;
    try {
      parsedJson = await request.json();
    } catch {
      throw new PayloadValidationError('Request body must be valid JSON.');
    }

    const payload = parsePayload(parsedJson);
    const job = await createJob(payload);
    void startSubtitleTranslation(job.id).catch((error) => {
      console.error('Failed to start subtitle translation workflow.', error);
    });

    return NextResponse.json(
      {
        jobId: job.id,
        status: job.status
      },
      { status: 202 }
    );
  } catch (error) {
    if (error instanceof PayloadValidationError) {
      return NextResponse.json({ error: error.message }, { status: 400 });
    }

    return NextResponse.json({ error: 'Unable to create job.' }, { status: 500 });
  }
}
