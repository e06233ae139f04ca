import assert from 'node:assert/strict';
import test from 'node:test';
import type { OllamaSettings, OpenRouterSettings } from '../src/config/provider-settings';
import { ProviderError, ProviderUnavailableError } from '../src/lib/errors';
import {
  createProviders,
  MockProvider,
  OllamaProvider,
  OpenRouterProvider,
  selectAvailableProviders,
  type FetchLike,
  type TranslationRequest
} from '../src/services/providers';
import { buildTranslationPrompt, parseTranslatedUnits } from '../src/services/providers/prompt';
import { createCapturingLogger, FakeProvider } from './helpers/fake-provider';

const openRouterSettings: OpenRouterSettings = {
  apiKey: 'test-secret',
  baseUrl: 'https://router.test/api/v1/chat/completions',
  modelsUrl: 'https://router.test/api/v1/models',
  defaultModel: 'test/model',
  appName: 'subtitle-translator-tests',
  siteUrl: undefined,
  temperature: 0,
  maxTokens: 1000
};

const ollamaSettings: OllamaSettings = {
  baseUrl: 'http://ollama.test:11434/',
  temperature: 0
};

const request: TranslationRequest = {
  sourceLanguage: 'en',
  targetLanguage: 'hu',
  units: [
    { unitId: 1, text: 'Good morning.', context: { before: [], after: ['See you.'] } },
    { unitId: 2, text: 'See you.', context: { before: ['Good morning.'], after: [] } }
  ],
  preceding: []
};

interface RecordedCall {
  url: string;
  init: RequestInit;
}

function stubFetch(respond: () => Response): { fetch: FetchLike; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  return {
    calls,
    fetch: async (url, init) => {
      calls.push({ url, init });
      return respond();
    }
  };
}

function chatReply(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status: 200 });
}

function bodyOf(call: RecordedCall | undefined): unknown {
  assert.ok(call);
  assert.equal(typeof call.init.body, 'string');
  return JSON.parse(String(call.init.body));
}

async function rejectsWithKind(promise: Promise<unknown>, kind: ProviderError['kind']): Promise<void> {
  await assert.rejects(promise, (error: unknown) => {
    assert.ok(error instanceof ProviderError);
    assert.equal(error.kind, kind);
    return true;
  });
}

test('openrouter posts the prompt and reads the units back', async () => {
  const stub = stubFetch(() =>
    chatReply('{"units":[{"id":1,"text":"Jó reggelt."},{"id":2,"text":"Viszlát."}]}')
  );
  const provider = new OpenRouterProvider({ settings: openRouterSettings, fetch: stub.fetch });

  const units = await provider.translate(request);

  assert.equal(provider.id, 'openrouter:test/model');
  assert.deepEqual(units, [
    { unitId: 1, text: 'Jó reggelt.' },
    { unitId: 2, text: 'Viszlát.' }
  ]);
  assert.equal(stub.calls[0]?.url, openRouterSettings.baseUrl);
  assert.deepEqual(stub.calls[0]?.init.headers, {
    Authorization: 'Bearer test-secret',
    'Content-Type': 'application/json',
    'X-Title': 'subtitle-translator-tests'
  });
  const body = bodyOf(stub.calls[0]);
  assert.ok(typeof body === 'object' && body !== null && 'model' in body);
  assert.equal(body.model, 'test/model');
});

test('openrouter accepts a fenced JSON reply', async () => {
  const stub = stubFetch(() =>
    chatReply('```json\n[{"id":1,"text":"Jó reggelt."},{"id":2,"text":"Viszlát."}]\n```')
  );
  const provider = new OpenRouterProvider({ settings: openRouterSettings, fetch: stub.fetch });

  const units = await provider.translate(request);
  assert.deepEqual(units.map((unit) => unit.text), ['Jó reggelt.', 'Viszlát.']);
});

test('openrouter failures are typed by kind', async () => {
  const httpError = stubFetch(() => new Response('rate limited', { status: 429 }));
  await rejectsWithKind(
    new OpenRouterProvider({ settings: openRouterSettings, fetch: httpError.fetch }).translate(request),
    'transport'
  );

  const notJson = stubFetch(() => chatReply('Sorry, I cannot help with that.'));
  await rejectsWithKind(
    new OpenRouterProvider({ settings: openRouterSettings, fetch: notJson.fetch }).translate(request),
    'malformed'
  );

  const noContent = stubFetch(() => new Response(JSON.stringify({ choices: [] }), { status: 200 }));
  await rejectsWithKind(
    new OpenRouterProvider({ settings: openRouterSettings, fetch: noContent.fetch }).translate(request),
    'malformed'
  );
});

test('openrouter without an api key fails before any request', async () => {
  const stub = stubFetch(() => chatReply('{}'));
  const provider = new OpenRouterProvider({
    settings: { ...openRouterSettings, apiKey: undefined },
    fetch: stub.fetch
  });

  await assert.rejects(provider.translate(request), /OPENROUTER_API_KEY is missing\./);
  assert.equal(stub.calls.length, 0);
});

test('ollama calls the generate endpoint with a JSON format request', async () => {
  const stub = stubFetch(
    () =>
      new Response(
        JSON.stringify({
          response: '{"units":[{"id":1,"text":"Jó reggelt."},{"id":2,"text":"Viszlát."}]}'
        }),
        { status: 200 }
      )
  );
  const provider = new OllamaProvider({ model: 'llama3.2', settings: ollamaSettings, fetch: stub.fetch });

  const units = await provider.translate(request);

  assert.equal(provider.id, 'ollama:llama3.2');
  assert.equal(stub.calls[0]?.url, 'http://ollama.test:11434/api/generate');
  const body = bodyOf(stub.calls[0]);
  assert.ok(typeof body === 'object' && body !== null && 'format' in body && 'stream' in body);
  assert.equal(body.format, 'json');
  assert.equal(body.stream, false);
  assert.deepEqual(units.map((unit) => unit.unitId), [1, 2]);
});

test('ollama reports a reply without a response string as malformed', async () => {
  const stub = stubFetch(() => new Response(JSON.stringify({ done: true }), { status: 200 }));
  await rejectsWithKind(
    new OllamaProvider({ model: 'llama3.2', settings: ollamaSettings, fetch: stub.fetch }).translate(request),
    'malformed'
  );
});

test('the prompt carries reference translations and per-unit context', () => {
  const { systemPrompt, userPrompt } = buildTranslationPrompt({
    ...request,
    preceding: [{ unitId: 0, text: 'Hello.', translatedText: 'Helló.' }]
  });

  assert.match(systemPrompt, /from en to hu/);
  assert.ok(userPrompt.includes('[{"id":0,"text":"Hello.","translation":"Helló."}]'));
  assert.ok(
    userPrompt.includes(
      '[{"id":1,"text":"Good morning.","after":["See you."]},{"id":2,"text":"See you.","before":["Good morning."]}]'
    )
  );
});

test('reply items need an integer id and a text', () => {
  assert.deepEqual(parseTranslatedUnits('{"units":[{"unitId":4,"text":"x"}]}', 'p', [4]), [
    { unitId: 4, text: 'x' }
  ]);
  assert.throws(() => parseTranslatedUnits('{"units":[{"id":"4","text":"x"}]}', 'p', [4]), ProviderError);
  assert.throws(() => parseTranslatedUnits('{"items":[]}', 'p', [4]), /has no "units" array/);
});

test('the mock provider tags each unit with the target language', async () => {
  const units = await new MockProvider().translate(request);
  assert.deepEqual(units, [
    { unitId: 1, text: '[hu] Good morning.' },
    { unitId: 2, text: '[hu] See you.' }
  ]);
});

test('providers are built in fallback order', () => {
  const stub = stubFetch(() => chatReply('{}'));
  const providers = createProviders(
    [
      { kind: 'ollama', model: 'llama3.2', baseUrl: 'http://gpu-box:11434' },
      { kind: 'mock', model: 'echo' }
    ],
    { fetch: stub.fetch }
  );

  assert.deepEqual(
    providers.map((provider) => provider.id),
    ['ollama:llama3.2', 'mock:echo']
  );
});

test('openrouter availability needs the key and a listed model', async () => {
  const listed = stubFetch(() => new Response(JSON.stringify({ data: [{ id: 'test/model' }] }), { status: 200 }));
  assert.deepEqual(
    await new OpenRouterProvider({ settings: openRouterSettings, fetch: listed.fetch }).checkAvailability(),
    { available: true }
  );
  assert.equal(listed.calls[0]?.url, 'https://router.test/api/v1/models');
  assert.equal(listed.calls[0]?.init.method, 'GET');

  const other = stubFetch(() => new Response(JSON.stringify({ data: [{ id: 'other/model' }] }), { status: 200 }));
  assert.deepEqual(
    await new OpenRouterProvider({ settings: openRouterSettings, fetch: other.fetch }).checkAvailability(),
    { available: false, reason: 'OpenRouter does not list model "test/model".' }
  );

  const noKey = stubFetch(() => new Response('{}', { status: 200 }));
  assert.deepEqual(
    await new OpenRouterProvider({
      settings: { ...openRouterSettings, apiKey: undefined },
      fetch: noKey.fetch
    }).checkAvailability(),
    { available: false, reason: 'OPENROUTER_API_KEY is missing.' }
  );
  assert.equal(noKey.calls.length, 0);
});

test('ollama availability reads the pulled models from the tags endpoint', async () => {
  const tags = stubFetch(
    () => new Response(JSON.stringify({ models: [{ name: 'llama3.2:latest' }, { name: 'qwen2.5:7b' }] }), { status: 200 })
  );

  assert.deepEqual(
    await new OllamaProvider({ model: 'llama3.2', settings: ollamaSettings, fetch: tags.fetch }).checkAvailability(),
    { available: true }
  );
  assert.equal(tags.calls[0]?.url, 'http://ollama.test:11434/api/tags');
  assert.deepEqual(
    await new OllamaProvider({ model: 'mistral', settings: ollamaSettings, fetch: tags.fetch }).checkAvailability(),
    { available: false, reason: 'Model "mistral" is not pulled; available: llama3.2:latest, qwen2.5:7b.' }
  );

  const down: FetchLike = async () => {
    throw new Error('connect ECONNREFUSED');
  };
  assert.deepEqual(
    await new OllamaProvider({ model: 'llama3.2', settings: ollamaSettings, fetch: down }).checkAvailability(),
    {
      available: false,
      reason: 'Ollama is not reachable at http://ollama.test:11434/: connect ECONNREFUSED'
    }
  );
});

test('the mock provider is always available', async () => {
  assert.deepEqual(await new MockProvider().checkAvailability(), { available: true });
});

test('unavailable providers are dropped from the chain and none left is an error', async () => {
  const { logger, lines } = createCapturingLogger();
  const down = new FakeProvider('down');
  down.availability = { available: false, reason: 'not reachable' };
  const up = new FakeProvider('up');

  const usable = await selectAvailableProviders([down, up], { logger });
  assert.deepEqual(
    usable.map((provider) => provider.id),
    ['up']
  );
  assert.deepEqual(lines.warn, ['[providers][availability] skipping down: not reachable']);

  await assert.rejects(selectAvailableProviders([down], { logger }), (error: unknown) => {
    assert.ok(error instanceof ProviderUnavailableError);
    assert.equal(error.code, 'PROVIDER_UNAVAILABLE');
    assert.equal(error.message, 'No translation provider is available: down: not reachable');
    return true;
  });
});
