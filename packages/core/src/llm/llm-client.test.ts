import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import type { LlmConfig } from '@cognisync/schemas/src/config.schema.js';
import { ConfigurationError, LlmError } from '@cognisync/shared/src/utils/errors.js';
import { createLlmClient, isTransientError, withTimeout } from './llm-client.js';

const { invokeMock, constructorMock } = vi.hoisted(() => ({
  invokeMock: vi.fn(),
  constructorMock: vi.fn(),
}));

vi.mock('@langchain/google-genai', () => ({
  ChatGoogleGenerativeAI: class {
    invoke = invokeMock;

    constructor(fields: unknown) {
      constructorMock(fields);
    }
  },
}));

const request = { systemPrompt: 'Verify the text.', userMessage: 'The sky is green.' };

function httpError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}

const modelAnswer = {
  content: '{"summary":"ok"}',
  usage_metadata: { input_tokens: 12, output_tokens: 7, total_tokens: 19 },
};

const baseConfig: LlmConfig = {
  mock: true,
  model: 'gemini-2.5-flash',
  timeoutMs: 1000,
  maxRetries: 0,
};

describe('createLlmClient', () => {
  describe('mock mode', () => {
    it('should derive a knowledge answer from the delimited source text', async () => {
      const client = await createLlmClient(baseConfig);
      const response = await client.invoke({
        systemPrompt: 'You are a knowledge verification agent.',
        userMessage: '<source_text>\nThe sky is green. Obviously it never rains.\n</source_text>',
      });

      expect(response.model).toBe('mock-gemini');
      expect(JSON.parse(response.content)).toEqual({
        summary: 'The sky is green.',
        key_claims: ['The sky is green.', 'Obviously it never rains.'],
        reliability_score: 50,
        bias_level: 'high',
        bias_explanation: 'Loaded language detected: never, obviously.',
      });
    });

    it('should report low bias when no markers are present', async () => {
      const client = await createLlmClient(baseConfig);
      const response = await client.invoke({
        systemPrompt: 'test',
        userMessage: '<source_text>\nWater is wet.\n</source_text>',
      });

      const parsed = JSON.parse(response.content) as Record<string, unknown>;
      expect(parsed['bias_level']).toBe('low');
      expect(parsed['bias_explanation']).toBe('No loaded language detected.');
    });

    it('should include token usage in the response', async () => {
      const client = await createLlmClient(baseConfig);
      const response = await client.invoke({ systemPrompt: 'test', userMessage: 'Hello.' });

      expect(response.tokenUsage).toEqual({ input: 100, output: 50 });
    });
  });

  describe('gemini mode', () => {
    const geminiConfig: LlmConfig = {
      mock: false,
      apiKey: 'test-key',
      model: 'gemini-test',
      timeoutMs: 60000,
      maxRetries: 0,
    };

    beforeEach(() => {
      invokeMock.mockReset();
      constructorMock.mockReset();
      vi.spyOn(Math, 'random').mockReturnValue(0);
    });

    afterEach(() => {
      vi.useRealTimers();
      vi.restoreAllMocks();
    });

    it('should throw ConfigurationError when the API key is missing', async () => {
      await expect(createLlmClient({ ...baseConfig, mock: false })).rejects.toThrow(
        ConfigurationError,
      );
    });

    it('should disable the provider retries and return content with token usage', async () => {
      invokeMock.mockResolvedValue(modelAnswer);
      const client = await createLlmClient(geminiConfig);

      const response = await client.invoke(request);

      expect(constructorMock).toHaveBeenCalledWith({
        model: 'gemini-test',
        apiKey: 'test-key',
        temperature: 0.2,
        maxRetries: 0,
        json: true,
      });
      expect(response).toEqual({
        content: '{"summary":"ok"}',
        model: 'gemini-test',
        tokenUsage: { input: 12, output: 7 },
      });
    });

    it('should make a single call by default and keep the provider message', async () => {
      invokeMock.mockRejectedValue(httpError(503, '[503 Service Unavailable] The model is overloaded.'));
      const client = await createLlmClient(geminiConfig);

      const error: unknown = await client.invoke(request).catch((e: unknown) => e);

      expect(invokeMock).toHaveBeenCalledTimes(1);
      expect(error).toBeInstanceOf(LlmError);
      expect(error).toHaveProperty('message', '[503 Service Unavailable] The model is overloaded.');
      expect(error).toHaveProperty('isTransient', true);
    });

    it('should retry a 503 after the backoff delay', async () => {
      vi.useFakeTimers();
      invokeMock
        .mockRejectedValueOnce(httpError(503, '[503 Service Unavailable] The model is overloaded.'))
        .mockResolvedValueOnce(modelAnswer);
      const client = await createLlmClient({ ...geminiConfig, maxRetries: 2 });

      const pending = client.invoke(request);

      await vi.advanceTimersByTimeAsync(999);
      expect(invokeMock).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1000);
      await expect(pending).resolves.toHaveProperty('content', '{"summary":"ok"}');
      expect(invokeMock).toHaveBeenCalledTimes(2);
    });

    it('should stop after maxRetries and report the last provider message', async () => {
      vi.useFakeTimers();
      invokeMock
        .mockRejectedValueOnce(httpError(503, '[503 Service Unavailable] first'))
        .mockRejectedValueOnce(httpError(429, '[429 Too Many Requests] Resource has been exhausted'));
      const client = await createLlmClient({ ...geminiConfig, maxRetries: 1 });

      const pending = client.invoke(request);
      const assertion = expect(pending).rejects.toThrow(
        '[429 Too Many Requests] Resource has been exhausted',
      );

      await vi.advanceTimersByTimeAsync(5000);
      await assertion;
      expect(invokeMock).toHaveBeenCalledTimes(2);
    });

    it('should not retry a 400', async () => {
      invokeMock.mockRejectedValue(httpError(400, '[400 Bad Request] API key not valid.'));
      const client = await createLlmClient({ ...geminiConfig, maxRetries: 3 });

      const error: unknown = await client.invoke(request).catch((e: unknown) => e);

      expect(invokeMock).toHaveBeenCalledTimes(1);
      expect(error).toBeInstanceOf(LlmError);
      expect(error).toHaveProperty('message', '[400 Bad Request] API key not valid.');
      expect(error).toHaveProperty('isTransient', false);
    });
  });
});

describe('isTransientError', () => {
  it('should treat rate limits and server errors as transient', () => {
    expect(isTransientError(Object.assign(new Error('quota'), { status: 429 }))).toBe(true);
    expect(isTransientError(Object.assign(new Error('boom'), { statusCode: 503 }))).toBe(true);
    expect(isTransientError(new Error('socket hang up'))).toBe(true);
  });

  it('should treat client errors as permanent', () => {
    expect(isTransientError(Object.assign(new Error('API key not valid'), { status: 400 }))).toBe(
      false,
    );
    expect(isTransientError('not an error')).toBe(false);
  });

  it('should only match status codes and timeouts as whole words', () => {
    expect(isTransientError(new Error('text exceeds 5000 tokens'))).toBe(false);
    expect(isTransientError(new Error('field timeoutSeconds is invalid'))).toBe(false);
    expect(isTransientError(new Error('[502 Bad Gateway]'))).toBe(true);
    expect(isTransientError(new Error('Request timed out'))).toBe(true);
  });

  it('should respect the flag on LlmError', () => {
    expect(isTransientError(new LlmError('timed out', true))).toBe(true);
    expect(isTransientError(new LlmError('503 but flagged permanent', false))).toBe(false);
  });
});

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve with the operation result when it finishes in time', async () => {
    await expect(withTimeout(() => Promise.resolve('done'), 1000)).resolves.toBe('done');
  });

  it('should reject with a transient LlmError and abort the signal on timeout', async () => {
    vi.useFakeTimers();
    let capturedSignal: AbortSignal | undefined;

    const pending = withTimeout((signal) => {
      capturedSignal = signal;
      return new Promise<string>(() => undefined);
    }, 500);
    const assertion = expect(pending).rejects.toThrow('Model call timed out after 500ms');

    await vi.advanceTimersByTimeAsync(500);
    await assertion;
    expect(capturedSignal?.aborted).toBe(true);
  });
});
