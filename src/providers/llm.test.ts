import { beforeEach, describe, expect, it, vi } from 'vitest';
import { LlmTranslator, parseTranslations } from './llm.js';
import { createBatchFile, parseBatchContent } from './batch-job.js';
import { GoogleTranslator } from './google.js';
import { createTranslator } from './index.js';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { FormatError, ProviderError } from '../core/errors.js';

const mocks = vi.hoisted(() => {
  class MockAPIError extends Error {
    constructor(
      public readonly status: number | undefined,
      message: string
    ) {
      super(message);
    }
  }

  const clientOptions: unknown[] = [];

  return {
    MockAPIError,
    completionsCreate: vi.fn(),
    filesCreate: vi.fn(),
    filesContent: vi.fn(),
    batchesCreate: vi.fn(),
    batchesRetrieve: vi.fn(),
    toFile: vi.fn(),
    clientOptions,
  };
});

vi.mock('openai', () => {
  class OpenAI {
    static APIError = mocks.MockAPIError;
    chat = { completions: { create: mocks.completionsCreate } };
    files = { create: mocks.filesCreate, content: mocks.filesContent };
    batches = { create: mocks.batchesCreate, retrieve: mocks.batchesRetrieve };

    constructor(options: unknown) {
      mocks.clientOptions.push(options);
    }
  }
  return { default: OpenAI, toFile: mocks.toFile };
});

function completion(content: string | null) {
  return { choices: [{ message: { role: 'assistant', content } }] };
}

function batchLine(id: string, content: string): string {
  return JSON.stringify({
    id: `req-${id}`,
    custom_id: id,
    response: { status_code: 200, body: { choices: [{ message: { role: 'assistant', content } }] } },
  });
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe('parseTranslations', () => {
  it('orders texts by id', () => {
    const content = '{"translations":[{"id":2,"text":"World"},{"id":1,"text":"Hello"}]}';
    expect(parseTranslations(content, 2)).toEqual(['Hello', 'World']);
  });

  it('rejects empty and malformed answers', () => {
    expect(() => parseTranslations(null, 1)).toThrow(new FormatError('Model returned an empty response'));
    expect(() => parseTranslations('not json', 1)).toThrow('Model response is not valid JSON: not json');
    expect(() => parseTranslations('{"items":[]}', 1)).toThrow(
      'Model response does not contain a "translations" list of {id, text} items'
    );
  });

  it('rejects a different number of items', () => {
    expect(() => parseTranslations('{"translations":[{"id":1,"text":"Hello"}]}', 2)).toThrow(
      'Expected 2 translations, received 1'
    );
  });

  it('rejects ids outside of the request', () => {
    expect(() => parseTranslations('{"translations":[{"id":1,"text":"A"},{"id":3,"text":"B"}]}', 2)).toThrow(
      'Translation for item 2 is missing'
    );
  });
});

describe('LlmTranslator (chat)', () => {
  it('sends numbered items and returns the answers in order', async () => {
    mocks.completionsCreate.mockResolvedValue(
      completion('{"translations":[{"id":1,"text":"Hello"},{"id":2,"text":"World"}]}')
    );
    const translator = new LlmTranslator({ apiKey: 'test-secret' });

    expect(await translator.translateBatch(['Привет', 'Мир'], 'ru', 'en')).toEqual(['Hello', 'World']);

    expect(mocks.clientOptions.at(-1)).toEqual({ apiKey: 'test-secret', httpAgent: undefined });
    expect(mocks.completionsCreate).toHaveBeenCalledTimes(1);
    const [request] = mocks.completionsCreate.mock.calls[0];
    expect(request.model).toBe('gpt-4o-mini');
    expect(request.response_format).toEqual({ type: 'json_object' });
    expect(request.messages[0].content).toContain('from ru to en');
    expect(request.messages[1]).toEqual({
      role: 'user',
      content: '{"items":[{"id":1,"text":"Привет"},{"id":2,"text":"Мир"}]}',
    });
  });

  it('fills the language placeholders of a custom prompt', () => {
    const translator = new LlmTranslator({
      apiKey: 'test-secret',
      systemPrompt: 'Translate {source_language} -> {target_language}',
    });

    expect(translator.buildMessages(['x'], 'de', 'fr')[0]).toEqual({
      role: 'system',
      content: 'Translate de -> fr',
    });
  });

  it('fails with FormatError on a count mismatch', async () => {
    mocks.completionsCreate.mockResolvedValue(completion('{"translations":[{"id":1,"text":"Hello"}]}'));
    const translator = new LlmTranslator({ apiKey: 'test-secret' });

    await expect(translator.translateBatch(['Привет', 'Мир'], 'ru', 'en')).rejects.toThrow(FormatError);
  });

  it('wraps API errors with their status', async () => {
    mocks.completionsCreate.mockRejectedValue(new mocks.MockAPIError(429, 'Rate limit'));
    const translator = new LlmTranslator({ apiKey: 'test-secret' });

    const error = await translator.translateBatch(['Привет'], 'ru', 'en').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ message: 'OpenAI API error: Rate limit', statusCode: 429 });
  });

  it('wraps other failures', async () => {
    mocks.completionsCreate.mockRejectedValue(new Error('socket hang up'));
    const translator = new LlmTranslator({ apiKey: 'test-secret' });

    await expect(translator.translate('Привет')).rejects.toThrow(
      new ProviderError('OpenAI request failed: socket hang up')
    );
  });

  it('makes no call for an empty batch', async () => {
    const translator = new LlmTranslator({ apiKey: 'test-secret' });
    expect(await translator.translateBatch([], 'ru', 'en')).toEqual([]);
    expect(mocks.completionsCreate).not.toHaveBeenCalled();
  });
});

describe('LlmTranslator (batch)', () => {
  function setUpJob(): void {
    mocks.toFile.mockResolvedValue('uploadable');
    mocks.filesCreate.mockResolvedValue({ id: 'file-1' });
    mocks.batchesCreate.mockResolvedValue({ id: 'batch-1' });
  }

  it('polls the job until it completes and maps answers by custom id', async () => {
    setUpJob();
    mocks.batchesRetrieve
      .mockResolvedValueOnce({ id: 'batch-1', status: 'in_progress' })
      .mockResolvedValueOnce({ id: 'batch-1', status: 'completed', output_file_id: 'out-1' });
    mocks.filesContent.mockResolvedValue({
      text: async () =>
        [
          batchLine('item-2', '{"translations":[{"id":1,"text":"World"}]}'),
          batchLine('item-1', '{"translations":[{"id":1,"text":"Hello"}]}'),
        ].join('\n') + '\n',
    });
    const statuses: string[] = [];
    const translator = new LlmTranslator({
      apiKey: 'test-secret',
      mode: 'batch',
      checkInterval: 1,
      onBatchStatus: (status) => statuses.push(status),
    });

    expect(await translator.translateBatch(['Привет', 'Мир'], 'ru', 'en')).toEqual(['Hello', 'World']);

    expect(statuses).toEqual(['in_progress', 'completed']);
    expect(mocks.filesCreate).toHaveBeenCalledWith({ file: 'uploadable', purpose: 'batch' });
    expect(mocks.batchesCreate).toHaveBeenCalledWith({
      input_file_id: 'file-1',
      endpoint: '/v1/chat/completions',
      completion_window: '24h',
      metadata: { model: 'gpt-4o-mini', purpose: 'translate' },
    });
    expect(mocks.filesContent).toHaveBeenCalledWith('out-1');

    const [upload, fileName] = mocks.toFile.mock.calls[0];
    expect(fileName).toBe('translate-batch.jsonl');
    const lines = String(upload).trim().split('\n').map((line) => JSON.parse(line));
    expect(lines.map((line) => line.custom_id)).toEqual(['item-1', 'item-2']);
    expect(lines[1].body.messages[1].content).toBe('{"items":[{"id":1,"text":"Мир"}]}');
  });

  it('fails when the job fails', async () => {
    setUpJob();
    mocks.batchesRetrieve.mockResolvedValue({
      id: 'batch-1',
      status: 'failed',
      errors: { data: [{ message: 'bad input' }] },
    });
    const translator = new LlmTranslator({ apiKey: 'test-secret', mode: 'batch', checkInterval: 1 });

    await expect(translator.translateBatch(['Привет'], 'ru', 'en')).rejects.toThrow(
      new ProviderError('Batch job batch-1 failed: bad input')
    );
  });
});

describe('batch files', () => {
  it('writes one request per conversation', () => {
    const jsonl = createBatchFile([[{ role: 'user', content: 'a' }]], 'gpt-4o-mini');
    expect(jsonl).toBe(
      '{"custom_id":"item-1","method":"POST","url":"/v1/chat/completions",' +
        '"body":{"model":"gpt-4o-mini","messages":[{"role":"user","content":"a"}],' +
        '"response_format":{"type":"json_object"}}}\n'
    );
  });

  it('rejects output lines without message content', () => {
    const line = JSON.stringify({ custom_id: 'item-1', response: { body: { choices: [] } } });
    expect(() => parseBatchContent(line)).toThrow('Batch output for item-1 has no message content');
  });
});

describe('createTranslator', () => {
  it('picks the adapter from the provider', () => {
    expect(createTranslator({ provider: 'google', localesDir: 'locales' })).toBeInstanceOf(GoogleTranslator);
    expect(createTranslator({ provider: 'llm', apiKey: 'test-secret', localesDir: 'locales' })).toBeInstanceOf(
      LlmTranslator
    );
  });

  it('reports batch job statuses through the hooks', async () => {
    mocks.toFile.mockResolvedValue('uploadable');
    mocks.filesCreate.mockResolvedValue({ id: 'file-1' });
    mocks.batchesCreate.mockResolvedValue({ id: 'batch-1' });
    mocks.batchesRetrieve.mockResolvedValue({ id: 'batch-1', status: 'completed', output_file_id: 'out-1' });
    mocks.filesContent.mockResolvedValue({
      text: async () => batchLine('item-1', '{"translations":[{"id":1,"text":"Hello"}]}'),
    });
    const statuses: string[] = [];
    const translator = createTranslator(
      { provider: 'llm', apiKey: 'test-secret', localesDir: 'locales', mode: 'batch' },
      { onBatchStatus: (status) => statuses.push(status) }
    );

    expect(await translator.translateBatch(['Привет'], 'ru', 'en')).toEqual(['Hello']);
    expect(statuses).toEqual(['completed']);
  });

  it('routes the LLM client through the proxy', () => {
    createTranslator({
      provider: 'llm',
      apiKey: 'test-secret',
      localesDir: 'locales',
      proxy: 'http://127.0.0.1:8080',
    });

    expect(mocks.clientOptions.at(-1)).toMatchObject({ apiKey: 'test-secret' });
    expect(mocks.clientOptions.at(-1)).toHaveProperty('httpAgent', expect.any(HttpsProxyAgent));
  });
});
