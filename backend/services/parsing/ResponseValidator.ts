/**
 * ResponseValidator
 * Turns raw model output into validated Question records and loose AnswerRecords.
 * A null return means the response could not be read as JSON at all; an item that
 * fails validation is logged and dropped without affecting its siblings.
 */

import type { AnswerRecord, Question } from '../../types/index.js';
import { JsonUtils, isJsonRecord, JsonRecord } from '../ai/JsonUtils.js';
import { QuestionValidationError } from '../../utils/errorHandler.js';
import { createLogger } from '../../utils/LoggerUtils.js';
import { matchAnswerToOption } from './AnswerMatcher.js';
import { createQuestion } from './QuestionFactory.js';

const logger = createLogger('VALIDATOR');

const QUESTION_LIST_KEYS = ['questions', 'items'] as const;
const ANSWER_LIST_KEYS = ['answers', 'items'] as const;
const OPTION_MARKER = /[①②③④⑤]/;

function asText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return '';
}

/**
 * Options as a string list. A single run-on string carrying several circled
 * markers is split at each marker.
 */
export function normalizeOptions(value: unknown): string[] {
  const options = typeof value === 'string'
    ? [value]
    : Array.isArray(value)
      ? value.map(asText).filter(option => option.trim() !== '')
      : [];

  if (options.length === 1 && OPTION_MARKER.test(options[0])) {
    const parts = options[0]
      .split(/(?=[①②③④⑤])/)
      .map(part => part.trim())
      .filter(Boolean);
    if (parts.length >= 2) {
      return parts;
    }
  }

  return options;
}

function prepareQuestionItem(item: JsonRecord, pageNumbers: number[], subjectHint: string): JsonRecord | null {
  const questionText = asText(item.question_text).trim();
  if (!questionText) {
    return null;
  }

  const options = normalizeOptions(item.options);
  if (options.length === 0) {
    return null;
  }

  let answer = asText(item.answer).trim();
  if (answer && !options.includes(answer)) {
    answer = matchAnswerToOption(answer, options);
  }

  return {
    ...item,
    subject: asText(item.subject).trim() || subjectHint,
    question_text: questionText,
    options,
    answer,
    page_number: item.page_number || pageNumbers[0] || 1
  };
}

/**
 * Build Questions from a model response. Returns null when the response is not JSON.
 */
export function buildQuestions(raw: string, pageNumbers: number[], subjectHint: string): Question[] | null {
  const items = JsonUtils.extractItemList(JsonUtils.parseModelJson(raw), QUESTION_LIST_KEYS);
  if (items === null) {
    return null;
  }

  const questions: Question[] = [];
  items.forEach((item, index) => {
    if (!isJsonRecord(item)) {
      return;
    }

    const prepared = prepareQuestionItem(item, pageNumbers, subjectHint);
    if (!prepared) {
      logger.debug(`item[${index}] dropped: missing question text or options`);
      return;
    }

    try {
      questions.push(createQuestion(prepared));
    } catch (error) {
      if (!(error instanceof QuestionValidationError)) {
        throw error;
      }
      logger.warn(`item[${index}] rejected`, error.issues);
    }
  });

  return questions;
}

/**
 * Build AnswerRecords from a model response. Returns null when the response is not JSON.
 */
export function buildAnswerRecords(raw: string, subjectHint: string): AnswerRecord[] | null {
  const items = JsonUtils.extractItemList(JsonUtils.parseModelJson(raw), ANSWER_LIST_KEYS);
  if (items === null) {
    return null;
  }

  const records: AnswerRecord[] = [];
  for (const item of items) {
    if (!isJsonRecord(item) || item.id === undefined || item.answer === undefined) {
      continue;
    }
    const id = parseInt(asText(item.id), 10);
    if (Number.isNaN(id)) {
      continue;
    }
    records.push({
      id,
      subject: asText(item.subject).trim() || subjectHint,
      answer: asText(item.answer).trim(),
      explanation: asText(item.explanation)
    });
  }
  return records;
}
