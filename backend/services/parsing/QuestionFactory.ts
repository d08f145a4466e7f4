/**
 * Validating constructor for Question records.
 * Every Question in the system is created here or copied from one that was.
 */

import { z } from 'zod';
import type { Question } from '../../types/index.js';
import { QuestionValidationError } from '../../utils/errorHandler.js';

export const QuestionSchema = z.object({
  id: z.coerce.number().int().positive(),
  subject: z.string().trim().min(1),
  context: z.string().nullable().optional().transform(value => (value ? value : null)),
  question_text: z.string().trim().min(1),
  options: z.array(z.string()).min(2, 'options need at least 2 entries'),
  answer: z.string().default(''),
  explanation: z.string().nullable().optional().transform(value => value ?? ''),
  page_number: z.coerce.number().int().positive()
}).refine(
  question => question.answer === '' || question.options.includes(question.answer),
  question => ({ message: `answer "${question.answer}" is not one of the options`, path: ['answer'] })
);

export function createQuestion(input: unknown): Question {
  const parsed = QuestionSchema.safeParse(input);
  if (!parsed.success) {
    throw new QuestionValidationError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'question'}: ${issue.message}`)
    );
  }
  return Object.freeze({ ...parsed.data, options: Object.freeze([...parsed.data.options]) });
}

/**
 * Copy-with-update; the result goes through the same validation as a new record.
 */
export function withAnswer(question: Question, answer: string, explanation: string): Question {
  return createQuestion({ ...question, options: [...question.options], answer, explanation });
}
