import assert from 'node:assert/strict';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import test from 'node:test';
import { createJob, getJobById } from '../src/data/job-store';
import { resolveJobConfig, startSubtitleTranslation } from '../src/workflows/subtitleTranslation';
import { createCapturingLogger, FakeProvider } from './helpers/fake-provider';
import { SOURCE_SRT, UPPERCASED_SRT } from './helpers/srt-fixture';
import { withEnv, withTempDataEnv } from './helpers/temp-env';

const fastRetries = { retryCount: 1, retryDelayMs: 0 };

test('a job with only good files completes and records one result per file', async () => {
  await withTempDataEnv('workflow-complete', async ({ root }) => {
    const files = ['a', 'b'].map((name) => ({
      sourcePath: path.join(root, `${name}.srt`),
      targetPath: path.join(root, `${name}.hu.srt`)
    }));
    for (const file of files) {
      await writeFile(file.sourcePath, SOURCE_SRT, 'utf8');
    }
    const job = await createJob({ files });

    await startSubtitleTranslation(job.id, {
      providers: [new FakeProvider()],
      logger: createCapturingLogger().logger,
      config: fastRetries
    });

    const finished = await getJobById(job.id);
    assert.equal(finished?.status, 'completed');
    assert.ok(finished?.startedAt);
    assert.ok(finished?.completedAt);
    assert.deepEqual(
      finished?.results.map((result) => [path.basename(result.sourcePath), result.state]),
      [
        ['a.srt', 'completed'],
        ['b.srt', 'completed']
      ]
    );
    assert.deepEqual(finished?.errors, []);
    assert.equal(await readFile(path.join(root, 'b.hu.srt'), 'utf8'), UPPERCASED_SRT);
  });
});

test('a missing file fails the job but the other file is still translated', async () => {
  await withTempDataEnv('workflow-missing', async ({ root }) => {
    const good = path.join(root, 'good.srt');
    const missing = path.join(root, 'missing.srt');
    await writeFile(good, SOURCE_SRT, 'utf8');
    const job = await createJob({
      files: [
        { sourcePath: good, targetPath: path.join(root, 'good.hu.srt') },
        { sourcePath: missing, targetPath: path.join(root, 'missing.hu.srt') }
      ]
    });

    await startSubtitleTranslation(job.id, {
      providers: [new FakeProvider()],
      logger: createCapturingLogger().logger,
      config: fastRetries
    });

    const finished = await getJobById(job.id);
    assert.equal(finished?.status, 'failed');
    assert.equal(finished?.results.length, 2);
    assert.equal(finished?.errors.length, 1);
    assert.equal(finished?.errors[0]?.sourcePath, missing);
    assert.match(finished?.errors[0]?.message ?? '', /ENOENT/);
    assert.equal(await readFile(path.join(root, 'good.hu.srt'), 'utf8'), UPPERCASED_SRT);
  });
});

test('untranslated units are reported as a provider error on the job', async () => {
  await withTempDataEnv('workflow-failed-units', async ({ root }) => {
    const sourcePath = path.join(root, 'episode.srt');
    await writeFile(sourcePath, SOURCE_SRT, 'utf8');
    const job = await createJob({
      files: [{ sourcePath, targetPath: path.join(root, 'episode.hu.srt') }],
      options: { mode: 'line-by-line' }
    });

    await startSubtitleTranslation(job.id, {
      providers: [new FakeProvider('fake', ['ok', 'fail', 'ok'])],
      logger: createCapturingLogger().logger,
      config: fastRetries
    });

    const finished = await getJobById(job.id);
    assert.equal(finished?.status, 'failed');
    assert.equal(finished?.errors[0]?.code, 'PROVIDER_ERROR');
    assert.equal(finished?.errors[0]?.message, '1 of 3 units could not be translated.');
    assert.equal(finished?.results[0]?.mode, 'line-by-line');
  });
});

test('an invalid configuration fails the job with its operator hint', async () => {
  await withTempDataEnv('workflow-bad-config', async ({ root }) => {
    const { logger, lines } = createCapturingLogger();
    const job = await createJob({
      files: [{ sourcePath: path.join(root, 'a.srt'), targetPath: path.join(root, 'b.srt') }]
    });

    await startSubtitleTranslation(job.id, {
      providers: [new FakeProvider()],
      logger,
      config: { batchSize: 0 }
    });

    const finished = await getJobById(job.id);
    assert.equal(finished?.status, 'failed');
    assert.deepEqual(
      finished?.errors.map((error) => [error.code, error.message, error.operatorHint]),
      [
        [
          'CONFIG_INVALID',
          'batchSize must be an integer of at least 1.',
          'Correct the translation settings and run again.'
        ]
      ]
    );
    assert.deepEqual(lines.error, [
      `[workflow][subtitle-translation] job ${job.id} failed: batchSize must be an integer of at least 1.`
    ]);
  });
});

test('job options take precedence over environment language defaults', async () => {
  await withEnv(
    {
      SUBTITLE_SOURCE_LANGUAGE: 'de',
      SUBTITLE_TARGET_LANGUAGE: 'fr',
      SUBTITLE_PROVIDERS: 'ollama:llama3.2,mock'
    },
    async () => {
      const fromEnv = resolveJobConfig({});
      assert.equal(fromEnv.sourceLanguage, 'de');
      assert.equal(fromEnv.targetLanguage, 'fr');
      assert.deepEqual(fromEnv.providers, [
        { kind: 'ollama', model: 'llama3.2' },
        { kind: 'mock', model: 'echo' }
      ]);

      const fromJob = resolveJobConfig({ targetLanguage: 'hu', mode: 'whole-file' });
      assert.equal(fromJob.sourceLanguage, 'de');
      assert.equal(fromJob.targetLanguage, 'hu');
      assert.equal(fromJob.mode, 'whole-file');
    }
  );
});

test('a cancelled job fails and keeps the reason per file', async () => {
  await withTempDataEnv('workflow-cancelled', async ({ root }) => {
    const sourcePath = path.join(root, 'episode.srt');
    await writeFile(sourcePath, SOURCE_SRT, 'utf8');
    const job = await createJob({
      files: [{ sourcePath, targetPath: path.join(root, 'episode.hu.srt') }]
    });
    const controller = new AbortController();
    controller.abort();
    const provider = new FakeProvider();

    await startSubtitleTranslation(job.id, {
      providers: [provider],
      logger: createCapturingLogger().logger,
      signal: controller.signal,
      config: fastRetries
    });

    const finished = await getJobById(job.id);
    assert.equal(provider.calls, 0);
    assert.equal(finished?.status, 'failed');
    assert.equal(finished?.results[0]?.state, 'not_started');
    assert.deepEqual(
      finished?.errors.map((error) => error.message),
      ['Cancelled before the file was started.']
    );
  });
});

test('a job whose providers are all unavailable fails before translating anything', async () => {
  await withTempDataEnv('workflow-unavailable', async ({ root }) => {
    const sourcePath = path.join(root, 'episode.srt');
    const targetPath = path.join(root, 'episode.hu.srt');
    await writeFile(sourcePath, SOURCE_SRT, 'utf8');
    const job = await createJob({ files: [{ sourcePath, targetPath }] });
    const provider = new FakeProvider('ollama:llama3.2');
    provider.availability = { available: false, reason: 'Ollama is not reachable.' };

    await startSubtitleTranslation(job.id, {
      providers: [provider],
      logger: createCapturingLogger().logger,
      config: fastRetries
    });

    const finished = await getJobById(job.id);
    assert.equal(provider.calls, 0);
    assert.equal(finished?.status, 'failed');
    assert.deepEqual(finished?.results, []);
    assert.equal(finished?.errors[0]?.code, 'PROVIDER_UNAVAILABLE');
    assert.equal(
      finished?.errors[0]?.message,
      'No translation provider is available: ollama:llama3.2: Ollama is not reachable.'
    );
    await assert.rejects(readFile(targetPath, 'utf8'), /ENOENT/);
  });
});
