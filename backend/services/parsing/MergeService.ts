/**
 * MergeService
 * Attaches answer-key records to extracted questions by (subject, id), falling
 * back to id alone when the subjects do not line up.
 */

import type { AnswerRecord, MergeResult, Question } from '../../types/index.js';
import { QuestionValidationError } from '../../utils/errorHandler.js';
import { createLogger } from '../../utils/LoggerUtils.js';
import { matchAnswerToOption } from './AnswerMatcher.js';
import { withAnswer } from './QuestionFactory.js';

const logger = createLogger('MERGE');

export function normalizeSubject(subject: string | undefined): string {
  if (!subject) {
    return '';
  }
  return subject.replace(/[\s·‧\-_]/g, '').toLowerCase();
}

const compositeKey = (subject: string, id: number) => `${subject}#${id}`;

export function mergeAnswersDetailed(questions: readonly Question[], records: readonly AnswerRecord[]): MergeResult {
  const bySubject = new Map<string, AnswerRecord>();
  const byId = new Map<number, AnswerRecord>();

  for (const record of records) {
    const subject = normalizeSubject(record.subject);
    if (subject) {
      bySubject.set(compositeKey(subject, record.id), record);
    }
    byId.set(record.id, record);
  }

  let matchedCount = 0;
  const merged = questions.map(question => {
    const record = bySubject.get(compositeKey(normalizeSubject(question.subject), question.id))
      ?? byId.get(question.id);
    if (!record) {
      return question;
    }

    const answer = matchAnswerToOption(record.answer, question.options);
    const explanation = record.explanation || question.explanation;
    try {
      const updated = withAnswer(question, answer, explanation);
      if (answer) {
        matchedCount++;
      }
      return updated;
    } catch (error) {
      if (!(error instanceof QuestionValidationError)) {
        throw error;
      }
      logger.warn(`Q${question.id}: merge skipped`, error.issues);
      return question;
    }
  });

  logger.info(`${matchedCount}/${questions.length} answers matched`);
  return { questions: merged, matchedCount };
}

export function mergeAnswers(questions: readonly Question[], records: readonly AnswerRecord[]): Question[] {
  return mergeAnswersDetailed(questions, records).questions;
}
