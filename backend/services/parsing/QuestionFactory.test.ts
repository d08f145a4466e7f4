import { createQuestion, withAnswer } from './QuestionFactory.js';
import { QuestionValidationError } from '../../utils/errorHandler.js';

const base = {
  id: 1,
  subject: '무역규범',
  question_text: '다음 중 옳은 것은?',
  options: ['① 가', '② 나', '③ 다'],
  page_number: 2
};

describe('createQuestion', () => {
  it('fills defaults for optional fields', () => {
    const question = createQuestion(base);
    expect(question).toEqual({ ...base, context: null, answer: '', explanation: '' });
  });

  it('coerces numeric strings for id and page number', () => {
    const question = createQuestion({ ...base, id: '12', page_number: '3' });
    expect(question.id).toBe(12);
    expect(question.page_number).toBe(3);
  });

  it('treats an empty context as absent', () => {
    expect(createQuestion({ ...base, context: '' }).context).toBeNull();
    expect(createQuestion({ ...base, context: '<table></table>' }).context).toBe('<table></table>');
  });

  it('rejects an answer that is not one of the options', () => {
    expect(() => createQuestion({ ...base, answer: '⑤' })).toThrow(QuestionValidationError);
    try {
      createQuestion({ ...base, answer: '⑤' });
    } catch (error) {
      expect(error).toBeInstanceOf(QuestionValidationError);
      if (error instanceof QuestionValidationError) {
        expect(error.issues).toEqual(['answer: answer "⑤" is not one of the options']);
      }
    }
  });

  it('rejects fewer than two options', () => {
    expect(() => createQuestion({ ...base, options: ['① 가'] })).toThrow('options need at least 2 entries');
  });

  it('rejects a blank question text and a non-positive id', () => {
    expect(() => createQuestion({ ...base, question_text: '  ' })).toThrow(QuestionValidationError);
    expect(() => createQuestion({ ...base, id: 0 })).toThrow(QuestionValidationError);
  });

  it('returns a frozen record', () => {
    const question = createQuestion(base);
    expect(Object.isFrozen(question)).toBe(true);
    expect(Object.isFrozen(question.options)).toBe(true);
  });
});

describe('withAnswer', () => {
  it('returns an updated copy and leaves the original alone', () => {
    const question = createQuestion(base);
    const answered = withAnswer(question, '② 나', '해설');
    expect(answered.answer).toBe('② 나');
    expect(answered.explanation).toBe('해설');
    expect(question.answer).toBe('');
  });

  it('validates the update', () => {
    const question = createQuestion(base);
    expect(() => withAnswer(question, '④ 라', '')).toThrow(QuestionValidationError);
  });
});
