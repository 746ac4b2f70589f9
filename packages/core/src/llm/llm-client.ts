import type { LlmConfig } from '@cognisync/schemas/src/config.schema.js';
import type { TokenUsage } from '@cognisync/shared/src/types/knowledge.types.js';
import { createChildLogger } from '@cognisync/shared/src/logger.js';
import { ConfigurationError, LlmError, toError } from '@cognisync/shared/src/utils/errors.js';
import { findBiasMarkers } from '../analysis/bias-markers.js';

const log = createChildLogger('llm:client');

const BASE_DELAY_MS = 1000;
const MOCK_MODEL = 'mock-gemini';

export interface LlmRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
}

export interface LlmResponse {
  readonly content: string;
  readonly model: string;
  readonly tokenUsage?: TokenUsage;
}

export interface LlmClient {
  invoke(request: LlmRequest): Promise<LlmResponse>;
}

// Matched against lower-cased provider messages; status codes only as whole numbers.
const TRANSIENT_MESSAGE_PATTERNS: readonly RegExp[] = [
  /\b(429|500|502|503|504)\b/,
  /rate limit|too many requests|resource (has been )?exhausted/,
  /internal server error|bad gateway|service unavailable|socket hang up/,
  /\b(econnreset|econnrefused|etimedout)\b/,
  /\btimed? ?out\b/,
  /\bnetwork\b/,
];

const SOURCE_TEXT_PATTERN = /<source_text>\n([\s\S]*)\n<\/source_text>/;

function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function createMockResponse(userMessage: string): string {
  const text = SOURCE_TEXT_PATTERN.exec(userMessage)?.[1] ?? userMessage;
  const sentences = splitSentences(text);
  const markers = findBiasMarkers(text);
  const biasLevel = markers.length === 0 ? 'low' : markers.length === 1 ? 'medium' : 'high';

  return JSON.stringify({
    summary: sentences[0] ?? text.slice(0, 200),
    key_claims: sentences.slice(0, 5),
    reliability_score: 50,
    bias_level: biasLevel,
    bias_explanation:
      markers.length === 0
        ? 'No loaded language detected.'
        : `Loaded language detected: ${markers.join(', ')}.`,
  });
}

function createMockClient(): LlmClient {
  log.info('Using mock LLM client');

  return {
    invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ userMessageLength: request.userMessage.length }, 'Mock LLM invocation');

      return Promise.resolve({
        content: createMockResponse(request.userMessage),
        model: MOCK_MODEL,
        tokenUsage: { input: 100, output: 50 },
      });
    },
  };
}

export function isTransientError(error: unknown): boolean {
  if (error instanceof LlmError) {
    return error.isTransient;
  }
  if (!(error instanceof Error)) {
    return false;
  }

  const statusCode =
    'status' in error && typeof error.status === 'number'
      ? error.status
      : 'statusCode' in error && typeof error.statusCode === 'number'
        ? error.statusCode
        : undefined;

  if (statusCode !== undefined && (statusCode === 429 || statusCode >= 500)) {
    return true;
  }

  const message = error.message.toLowerCase();
  return TRANSIENT_MESSAGE_PATTERNS.some((pattern) => pattern.test(message));
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function computeBackoffMs(attempt: number): number {
  const exponential = BASE_DELAY_MS * Math.pow(2, attempt);
  const jitter = Math.random() * BASE_DELAY_MS;
  return exponential + jitter;
}

/**
 * Races `operation` against a timer. The signal handed to the operation is
 * aborted when the timer fires.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new LlmError(`Model call timed out after ${String(timeoutMs)}ms`, true));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function contentToText(content: unknown): string {
  if (typeof content === 'string') {
    return content;
  }
  if (Array.isArray(content)) {
    return content
      .map((part: unknown) =>
        typeof part === 'string'
          ? part
          : typeof part === 'object' && part !== null && 'text' in part && typeof part.text === 'string'
            ? part.text
            : '',
      )
      .join('');
  }
  return '';
}

async function createGeminiClient(config: LlmConfig): Promise<LlmClient> {
  if (!config.apiKey) {
    throw new ConfigurationError('GEMINI_API_KEY is required for the Gemini LLM client');
  }

  const { ChatGoogleGenerativeAI } = await import('@langchain/google-genai');

  const model = new ChatGoogleGenerativeAI({
    model: config.model,
    apiKey: config.apiKey,
    temperature: 0.2,
    maxRetries: 0,
    json: true,
  });

  const maxAttempts = config.maxRetries + 1;

  log.info({ model: config.model, timeoutMs: config.timeoutMs, maxAttempts }, 'Using Gemini LLM client');

  return {
    async invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Gemini LLM invocation');

      let lastError: Error | undefined;

      for (let attempt = 0; attempt < maxAttempts; attempt++) {
        try {
          const response = await withTimeout(
            (signal) =>
              model.invoke(
                [
                  ['system', request.systemPrompt],
                  ['human', request.userMessage],
                ],
                { signal },
              ),
            config.timeoutMs,
          );

          return {
            content: contentToText(response.content),
            model: config.model,
            tokenUsage: response.usage_metadata
              ? {
                  input: response.usage_metadata.input_tokens,
                  output: response.usage_metadata.output_tokens,
                }
              : undefined,
          };
        } catch (error) {
          lastError = toError(error);

          if (!isTransientError(error)) {
            throw new LlmError(lastError.message, false, lastError);
          }

          log.warn(
            { attempt: attempt + 1, maxAttempts, error: lastError.message },
            'Transient LLM error',
          );

          if (attempt < maxAttempts - 1) {
            await sleep(computeBackoffMs(attempt));
          }
        }
      }

      throw new LlmError(lastError?.message ?? 'Model call failed', true, lastError);
    },
  };
}

export async function createLlmClient(config: LlmConfig): Promise<LlmClient> {
  if (config.mock) {
    return createMockClient();
  }

  return createGeminiClient(config);
}
