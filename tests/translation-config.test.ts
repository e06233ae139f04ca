import assert from 'node:assert/strict';
import test from 'node:test';
import {
  buildConfigFingerprint,
  DEFAULT_TRANSLATION_CONFIG,
  normalizeProcessingMode,
  parseProviderList,
  resolveTranslationConfig
} from '../src/config/translation';
import { ConfigValidationError } from '../src/lib/errors';
import { withEnv } from './helpers/temp-env';

test('an empty input resolves to the defaults', () => {
  assert.deepEqual(resolveTranslationConfig(), DEFAULT_TRANSLATION_CONFIG);
});

test('cross-entry settings merge field by field', () => {
  const config = resolveTranslationConfig({ crossEntry: { continuityGapMs: 250 } });

  assert.equal(config.crossEntry.continuityGapMs, 250);
  assert.equal(config.crossEntry.enabled, true);
  assert.deepEqual(config.crossEntry.terminalPunctuation, ['.', '!', '?', '…']);
});

test('languages are trimmed', () => {
  const config = resolveTranslationConfig({ sourceLanguage: ' en ', targetLanguage: 'de ' });
  assert.equal(config.sourceLanguage, 'en');
  assert.equal(config.targetLanguage, 'de');
});

test('out-of-range settings are rejected with a validation error', () => {
  assert.throws(() => resolveTranslationConfig({ batchSize: 0 }), ConfigValidationError);
  assert.throws(() => resolveTranslationConfig({ overlapSize: -1 }), ConfigValidationError);
  assert.throws(() => resolveTranslationConfig({ retryCount: 0 }), ConfigValidationError);
  assert.throws(() => resolveTranslationConfig({ providers: [] }), ConfigValidationError);
  assert.throws(() => resolveTranslationConfig({ targetLanguage: '  ' }), ConfigValidationError);
  assert.throws(
    () => resolveTranslationConfig({ crossEntry: { continuityGapMs: -5 } }),
    ConfigValidationError
  );
  assert.throws(
    () => resolveTranslationConfig({ batchSize: 0 }),
    /batchSize must be an integer of at least 1\./
  );
});

test('processing modes are normalized', () => {
  assert.equal(normalizeProcessingMode(' Whole-File '), 'whole-file');
  assert.equal(normalizeProcessingMode('batch'), 'batch');
  assert.throws(() => normalizeProcessingMode('turbo'), ConfigValidationError);
});

test('provider lists read kind, model and an optional base url', () => {
  assert.deepEqual(
    parseProviderList('openrouter:openai/gpt-4o-mini, ollama:llama3.2@http://gpu-box:11434,mock'),
    [
      { kind: 'openrouter', model: 'openai/gpt-4o-mini' },
      { kind: 'ollama', model: 'llama3.2', baseUrl: 'http://gpu-box:11434' },
      { kind: 'mock', model: 'echo' }
    ]
  );
  assert.throws(() => parseProviderList('deepl:x'), /Unknown provider kind "deepl"/);
});

test('an openrouter entry without a model uses the configured default model', async () => {
  await withEnv({ OPENROUTER_DEFAULT_MODEL: 'anthropic/claude-3.5-haiku' }, async () => {
    assert.deepEqual(parseProviderList('openrouter'), [
      { kind: 'openrouter', model: 'anthropic/claude-3.5-haiku' }
    ]);
  });
});

test('the fingerprint ignores output-only settings', () => {
  const base = buildConfigFingerprint(DEFAULT_TRANSLATION_CONFIG);

  assert.match(base, /^[0-9a-f]{64}$/);
  assert.equal(
    buildConfigFingerprint(
      resolveTranslationConfig({
        maxRowLength: 30,
        splitMethod: 'word',
        failedPlaceholder: '[??]',
        retryCount: 5,
        retryDelayMs: 0,
        fileConcurrency: 4
      })
    ),
    base
  );
});

test('the fingerprint changes with anything that shapes the translation', () => {
  const base = buildConfigFingerprint(DEFAULT_TRANSLATION_CONFIG);

  assert.notEqual(buildConfigFingerprint(resolveTranslationConfig({ targetLanguage: 'de' })), base);
  assert.notEqual(buildConfigFingerprint(resolveTranslationConfig({ mode: 'line-by-line' })), base);
  assert.notEqual(
    buildConfigFingerprint(resolveTranslationConfig({ providers: [{ kind: 'mock', model: 'other' }] })),
    base
  );
  assert.notEqual(
    buildConfigFingerprint(resolveTranslationConfig({ crossEntry: { enabled: false } })),
    base
  );
});
