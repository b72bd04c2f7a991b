const mockCreate = jest.fn();

jest.mock('openai', () => {
  const actual = jest.requireActual<typeof import('openai')>('openai');
  return {
    ...actual,
    __esModule: true,
    default: jest.fn().mockImplementation(() => ({ chat: { completions: { create: mockCreate } } })),
  };
});

jest.mock('../../../src/utils/logger.js', () => ({
  logger: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

import { APIConnectionTimeoutError, APIUserAbortError } from 'openai';
import { AIProvider } from '../../../src/providers/ai.js';
import { SentimentResponseSchema } from '../../../src/core/pipeline/stages/schemas.js';
import { ErrorCode } from '../../../src/types/index.js';

function reply(content: string) {
  return { choices: [{ message: { content } }] };
}

describe('AIProvider', () => {
  const request = { task: 'sentiment', system: 'system prompt', user: 'user prompt', schema: SentimentResponseSchema };
  let provider: AIProvider;

  beforeEach(() => {
    mockCreate.mockReset();
    provider = new AIProvider('test-key', { model: 'test-model', temperature: 0.2 });
  });

  it('requires an API key', () => {
    expect(() => new AIProvider()).toThrow('An OpenAI API key is required');
  });

  it('returns the validated object', async () => {
    mockCreate.mockResolvedValue(reply('Sure: {"sentiment":"neutral","sentiment_score":0.5,"tone":" calm "}'));

    await expect(provider.generate(request, { timeoutMs: 3000 })).resolves.toEqual({
      sentiment: 'neutral',
      sentiment_score: 0.5,
      tone: 'calm',
    });
    expect(mockCreate).toHaveBeenCalledWith(
      {
        model: 'test-model',
        messages: [
          { role: 'system', content: 'system prompt' },
          { role: 'user', content: 'user prompt' },
        ],
        temperature: 0.2,
        response_format: { type: 'json_object' },
      },
      { signal: undefined, timeout: 3000 }
    );
  });

  it('reports schema mismatches by path', async () => {
    mockCreate.mockResolvedValue(reply('{"sentiment":"neutral","sentiment_score":2,"tone":"calm"}'));

    await expect(provider.generate(request)).rejects.toMatchObject({
      code: ErrorCode.SCHEMA_VIOLATION,
      message: 'invalid sentiment response (sentiment_score: Number must be less than or equal to 1)',
    });
  });

  it('rejects replies without a JSON object', async () => {
    mockCreate.mockResolvedValue(reply('I cannot help with that.'));

    await expect(provider.generate(request)).rejects.toMatchObject({
      code: ErrorCode.SCHEMA_VIOLATION,
      message: 'invalid sentiment response (no JSON object found)',
    });
  });

  it('rejects malformed JSON', async () => {
    mockCreate.mockResolvedValue(reply('{"sentiment": }'));

    await expect(provider.generate(request)).rejects.toMatchObject({
      code: ErrorCode.SCHEMA_VIOLATION,
      message: 'invalid sentiment response (malformed JSON)',
    });
  });

  it('maps client timeouts', async () => {
    mockCreate.mockRejectedValue(new APIConnectionTimeoutError());

    await expect(provider.generate(request, { timeoutMs: 3000 })).rejects.toMatchObject({
      code: ErrorCode.PROVIDER_TIMEOUT,
      message: 'sentiment request failed: request timed out after 3000ms',
    });
  });

  it('maps aborted requests', async () => {
    const controller = new AbortController();
    controller.abort();
    mockCreate.mockRejectedValue(new APIUserAbortError());

    await expect(provider.generate(request, { signal: controller.signal })).rejects.toMatchObject({
      code: ErrorCode.CANCELLED,
      message: 'sentiment request failed: request cancelled',
    });
  });

  it('maps other client failures', async () => {
    mockCreate.mockRejectedValue(new Error('503 Service Unavailable'));

    await expect(provider.generate(request)).rejects.toMatchObject({
      code: ErrorCode.PROVIDER_UNAVAILABLE,
      message: 'sentiment request failed: 503 Service Unavailable',
    });
  });
});
