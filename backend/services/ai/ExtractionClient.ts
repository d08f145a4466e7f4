/**
 * ExtractionClient
 * Prompts, model calls and response parsing for one section at a time.
 * A fatal call or an unparseable reply yields []. A service that stays
 * unavailable through every retry rejects with TransientServiceError.
 */

import type { AnswerRecord, Question, Section, UserContent } from '../../types/index.js';
import type { ParsingConfig } from '../../config/parsing.js';
import { AI_PROMPTS } from '../../config/prompts.js';
import { createLogger } from '../../utils/LoggerUtils.js';
import { buildAnswerRecords, buildQuestions } from '../parsing/ResponseValidator.js';
import { ChatModel, ModelProvider, ModelProviderOptions, RetryPolicy, sleep } from './ModelProvider.js';

const logger = createLogger('EXTRACTION');

export function retryPolicyFrom(config: ParsingConfig): RetryPolicy {
  return {
    maxAttempts: config.maxApiRetries,
    baseDelayMs: config.backoffBaseMs,
    rateLimitMaxAttempts: config.rateLimitMaxRetries,
    rateLimitBaseDelayMs: config.rateLimitBackoffBaseMs
  };
}

/** Page numbers named by "[PAGE n]" markers, in order of appearance. */
export function pageNumbersIn(text: string): number[] {
  return Array.from(text.matchAll(/\[PAGE (\d+)\]/g), match => parseInt(match[1], 10));
}

export class ExtractionClient {
  constructor(
    private readonly model: ChatModel,
    private readonly policy: RetryPolicy,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {}

  static fromApiKey(apiKey: string, config: ParsingConfig, options: ModelProviderOptions = {}): ExtractionClient {
    const model = new ModelProvider(apiKey, { timeoutMs: config.requestTimeoutMs, ...options });
    return new ExtractionClient(model, retryPolicyFrom(config));
  }

  private async call(systemPrompt: string, content: UserContent, context: string): Promise<string | null> {
    const response = await ModelProvider.withRetry(
      () => this.model.complete(systemPrompt, content),
      this.policy,
      this.wait,
      context
    );
    if (response) {
      logger.debug(`${context}: ${response.usageTokens} tokens`);
    }
    return response ? response.content : null;
  }

  /**
   * One call, and one more with a stricter JSON instruction if the first
   * response could not be parsed.
   */
  private async callAndParse<T>(
    systemPrompt: string,
    content: UserContent,
    context: string,
    parse: (raw: string) => T[] | null
  ): Promise<T[]> {
    const raw = await this.call(systemPrompt, content, context);
    if (raw === null) {
      return [];
    }

    const parsed = parse(raw);
    if (parsed !== null) {
      return parsed;
    }

    logger.warn(`${context}: response was not valid JSON, asking again`);
    const retried = await this.call(systemPrompt + AI_PROMPTS.strictJsonSuffix, content, context);
    const reparsed = retried === null ? null : parse(retried);
    if (reparsed === null) {
      logger.error(`${context}: no usable response`);
      return [];
    }
    return reparsed;
  }

  async extractQuestions(section: Section): Promise<Question[]> {
    const { payload, subjectHint, label } = section;
    const context = `questions ${label}`;

    if (payload.kind === 'images') {
      const pageNumbers = payload.pages.map(page => page.pageNumber);
      const content: UserContent = {
        kind: 'images',
        text: AI_PROMPTS.questionExtraction.visionUser(pageNumbers),
        images: payload.pages
      };
      return this.callAndParse(AI_PROMPTS.questionExtraction.visionSystem, content, context,
        raw => buildQuestions(raw, pageNumbers, subjectHint));
    }

    const pageNumbers = pageNumbersIn(payload.text);
    const content: UserContent = { kind: 'text', text: AI_PROMPTS.questionExtraction.textUser(label, payload.text) };
    return this.callAndParse(AI_PROMPTS.questionExtraction.textSystem, content, context,
      raw => buildQuestions(raw, pageNumbers, subjectHint));
  }

  async extractAnswers(section: Section): Promise<AnswerRecord[]> {
    if (section.payload.kind !== 'text') {
      logger.warn(`answers ${section.label}: image sections are not supported for answer keys`);
      return [];
    }
    const content: UserContent = {
      kind: 'text',
      text: AI_PROMPTS.answerExtraction.user(section.subjectHint, section.payload.text)
    };
    return this.callAndParse(AI_PROMPTS.answerExtraction.system, content, `answers ${section.label}`,
      raw => buildAnswerRecords(raw, section.subjectHint));
  }
}
