import type { CallOutcome, ModelResponse, ModelType, RetryState, UserContent } from '../../types/index.js';
import {
  getDefaultModel,
  getModelConfig,
  getOpenAIEndpoint,
  getOpenAIModelName,
  isOpenAIModel
} from '../../config/aiModels.js';
import { ErrorHandler, TransientServiceError } from '../../utils/errorHandler.js';
import { createLogger } from '../../utils/LoggerUtils.js';
import { isJsonRecord, JsonRecord } from './JsonUtils.js';

const logger = createLogger('API RETRY');

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  rateLimitMaxAttempts: number;
  rateLimitBaseDelayMs: number;
}

/**
 * One raw model call. Implementations never throw: every failure is reported
 * through the outcome tag so the retry loop can decide what to do.
 */
export interface ChatModel {
  complete(systemPrompt: string, content: UserContent): Promise<CallOutcome>;
}

export interface ModelProviderOptions {
  model?: ModelType;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

const RETRYABLE_STATUSES = new Set([408, 500, 502, 503, 504]);

/**
 * Retry-After header as milliseconds: delta-seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }
  const date = Date.parse(trimmed);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Model client bound to a single API key. A new key means a new instance.
 */
export class ModelProvider implements ChatModel {
  readonly model: ModelType;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly apiKey: string, options: ModelProviderOptions = {}) {
    if (!apiKey.trim()) {
      throw new Error('API key is empty');
    }
    this.model = options.model ?? getDefaultModel();
    this.timeoutMs = options.timeoutMs ?? 120000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  // --- Exponential Backoff Helper ---
  /**
   * Drive `operation` until it succeeds, fails fatally or runs out of attempts.
   * Rate-limit outcomes use their own base delay and attempt ceiling, and a
   * server-sent retry-after is the floor for the next delay.
   * A fatal outcome resolves null; running out of attempts rejects with
   * TransientServiceError.
   */
  public static async withRetry(
    operation: () => Promise<CallOutcome>,
    policy: RetryPolicy,
    wait: (ms: number) => Promise<void> = sleep,
    context = 'model call'
  ): Promise<ModelResponse | null> {
    const state: RetryState = { attempt: 0, delayMs: 0 };

    while (true) {
      state.attempt++;
      const outcome = await operation();

      if (outcome.kind === 'ok') {
        return outcome.response;
      }

      state.lastError = outcome.error;

      if (outcome.kind === 'fatal') {
        logger.error(`${context} failed (not retryable)`, outcome.error);
        return null;
      }

      const maxAttempts = outcome.rateLimited ? policy.rateLimitMaxAttempts : policy.maxAttempts;
      if (state.attempt >= maxAttempts) {
        logger.error(`${context} gave up after ${state.attempt} attempts`, state.lastError);
        throw outcome.error instanceof TransientServiceError
          ? outcome.error
          : new TransientServiceError(outcome.error.message, outcome.rateLimited);
      }

      const base = outcome.rateLimited ? policy.rateLimitBaseDelayMs : policy.baseDelayMs;
      state.delayMs = Math.max(base * Math.pow(2, state.attempt - 1), outcome.retryAfterMs ?? 0);
      logger.warn(`Attempt ${state.attempt}/${maxAttempts} failed. Retrying in ${state.delayMs}ms... (Error: ${outcome.error.message})`);
      await wait(state.delayMs);
    }
  }

  async complete(systemPrompt: string, content: UserContent): Promise<CallOutcome> {
    let response: Response;
    try {
      response = isOpenAIModel(this.model)
        ? await this.makeOpenAIRequest(systemPrompt, content)
        : await this.makeGeminiRequest(systemPrompt, content);
    } catch (raw) {
      return ModelProvider.classifyError(ErrorHandler.toError(raw));
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      const message = `${isOpenAIModel(this.model) ? 'OpenAI' : 'Gemini'} API error: ${response.status} ${response.statusText} - ${errorText}`;
      const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'));
      if (response.status === 429) {
        return { kind: 'retryable', rateLimited: true, error: new TransientServiceError(message, true), retryAfterMs };
      }
      if (RETRYABLE_STATUSES.has(response.status)) {
        return { kind: 'retryable', rateLimited: false, error: new TransientServiceError(message), retryAfterMs };
      }
      return ModelProvider.classifyError(new Error(message));
    }

    try {
      const body: unknown = await response.json();
      return {
        kind: 'ok',
        response: isOpenAIModel(this.model)
          ? ModelProvider.extractOpenAIContent(body)
          : ModelProvider.extractGeminiContent(body)
      };
    } catch (raw) {
      return { kind: 'fatal', error: ErrorHandler.toError(raw) };
    }
  }

  static classifyError(error: Error): CallOutcome {
    const info = ErrorHandler.analyzeError(error);
    if (!info.retryable) {
      return { kind: 'fatal', error };
    }
    logger.debug(ErrorHandler.getLogMessage(error, 'model call'));
    return {
      kind: 'retryable',
      rateLimited: info.isRateLimit,
      error: error instanceof TransientServiceError ? error : new TransientServiceError(error.message, info.isRateLimit),
      retryAfterMs: info.retryAfter === undefined ? undefined : info.retryAfter * 1000
    };
  }

  private async makeOpenAIRequest(systemPrompt: string, content: UserContent): Promise<Response> {
    const config = getModelConfig(this.model);

    const userContent = content.kind === 'text'
      ? content.text
      : [
        { type: 'text', text: content.text },
        ...content.images.map(image => ({
          type: 'image_url',
          image_url: { url: `data:${image.mimeType};base64,${image.base64}`, detail: 'high' }
        }))
      ];

    return this.fetchImpl(getOpenAIEndpoint(), {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`
      },
      body: JSON.stringify({
        model: getOpenAIModelName(this.model),
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userContent }
        ],
        temperature: config.temperature,
        max_tokens: config.maxTokens,
        response_format: { type: 'json_object' }
      }),
      signal: AbortSignal.timeout(this.timeoutMs)
    });
  }

  private async makeGeminiRequest(systemPrompt: string, content: UserContent): Promise<Response> {
    const config = getModelConfig(this.model);

    const parts: Array<Record<string, unknown>> = [
      { text: systemPrompt },
      { text: content.text }
    ];
    if (content.kind === 'images') {
      for (const image of content.images) {
        parts.push({ text: `\n--- Page ${image.pageNumber} ---` });
        parts.push({ inline_data: { mime_type: image.mimeType, data: image.base64 } });
      }
    }

    return this.fetchImpl(`${config.apiEndpoint}?key=${encodeURIComponent(this.apiKey)}`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json'
      },
      body: JSON.stringify({
        contents: [{ parts }],
        generationConfig: {
          temperature: config.temperature,
          maxOutputTokens: config.maxTokens,
          responseMimeType: 'application/json'
        }
      }),
      signal: AbortSignal.timeout(this.timeoutMs)
    });
  }

  static extractOpenAIContent(body: unknown): ModelResponse {
    const choices = isJsonRecord(body) && Array.isArray(body.choices) ? body.choices : [];
    const first: unknown = choices[0];
    const message = isJsonRecord(first) && isJsonRecord(first.message) ? first.message : undefined;
    const content = message && typeof message.content === 'string' ? message.content : '';
    if (!content) {
      throw new Error('OpenAI API error: No content in response');
    }
    const usage: JsonRecord = isJsonRecord(body) && isJsonRecord(body.usage) ? body.usage : {};
    const totalTokens = typeof usage.total_tokens === 'number' ? usage.total_tokens : 0;
    return { content, usageTokens: totalTokens };
  }

  static extractGeminiContent(body: unknown): ModelResponse {
    const candidates = isJsonRecord(body) && Array.isArray(body.candidates) ? body.candidates : [];
    const candidate: unknown = candidates[0];
    const finishReason = isJsonRecord(candidate) && typeof candidate.finishReason === 'string'
      ? candidate.finishReason
      : undefined;

    // Check for truncation even if content exists
    if (finishReason === 'MAX_TOKENS') {
      throw new Error('Gemini response truncated (MAX_TOKENS)');
    }

    const contentNode = isJsonRecord(candidate) && isJsonRecord(candidate.content) ? candidate.content : undefined;
    const parts = contentNode && Array.isArray(contentNode.parts) ? contentNode.parts : [];
    const firstPart: unknown = parts[0];
    const content = isJsonRecord(firstPart) && typeof firstPart.text === 'string' ? firstPart.text : '';
    if (!content) {
      throw new Error(`Gemini API error: ${finishReason ?? 'No content in Gemini response'}`);
    }

    const usage: JsonRecord = isJsonRecord(body) && isJsonRecord(body.usageMetadata) ? body.usageMetadata : {};
    const totalTokens = typeof usage.totalTokenCount === 'number' ? usage.totalTokenCount : 0;
    return { content, usageTokens: totalTokens };
  }
}
