import type { AnswerRecord, ExtractionMode, Question } from '../types/index.js';
import { ExamPdfPipeline } from '../services/ExamPdfPipeline.js';
import { createQuestion } from '../services/parsing/QuestionFactory.js';
import { mergeAnswersDetailed } from '../services/parsing/MergeService.js';
import { isJsonRecord } from '../services/ai/JsonUtils.js';
import { PipelineError, PipelineErrorCode, QuestionValidationError } from '../utils/errorHandler.js';
import { createLogger } from '../utils/LoggerUtils.js';

const logger = createLogger('PARSING API');

const STATUS_BY_CODE: Record<PipelineErrorCode, number> = {
  EMPTY_INPUT: 400,
  MISSING_API_KEY: 400,
  DOCUMENT_UNREADABLE: 422,
  SIZE_LIMIT: 413,
  UNEXTRACTABLE_CONTENT: 422,
  SERVICE_UNAVAILABLE: 503,
  VALIDATION: 400
};

const MODES: readonly ExtractionMode[] = ['auto', 'text', 'vision'];

function readMode(value: unknown): ExtractionMode | undefined {
  return MODES.find(mode => mode === value);
}

/** HTTP status for a pipeline failure; anything unrecognised is a 500. */
export function statusForError(error: unknown): number {
  return error instanceof PipelineError ? STATUS_BY_CODE[error.code] : 500;
}

export function toAnswerRecords(value: unknown): AnswerRecord[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const records: AnswerRecord[] = [];
  for (const item of value) {
    if (!isJsonRecord(item)) continue;
    const id = Number(item.id);
    if (!Number.isInteger(id)) continue;
    records.push({
      id,
      subject: typeof item.subject === 'string' ? item.subject : undefined,
      answer: typeof item.answer === 'string' ? item.answer : String(item.answer ?? ''),
      explanation: typeof item.explanation === 'string' ? item.explanation : undefined
    });
  }
  return records;
}

/** The part of an express Response the handlers write to. */
export interface JsonReply {
  status(code: number): JsonReply;
  json(body: unknown): unknown;
}

/** The part of an express Request the handlers read; `file` is set by multer. */
export interface ParsingRequest {
  file?: { buffer: Buffer };
  query: Record<string, unknown>;
  body: unknown;
}

export class ParsingController {
  constructor(private readonly pipeline: ExamPdfPipeline) {}

  private sendError(res: JsonReply, error: unknown, context: string): void {
    if (error instanceof PipelineError) {
      logger.warn(`${context}: ${error.code}`, error.message);
      res.status(statusForError(error)).json({ error: error.code, message: error.message });
      return;
    }
    logger.error(`${context} failed`, error);
    res.status(500).json({ error: 'INTERNAL', message: 'Internal server error' });
  }

  /**
   * POST /api/set-api-key
   */
  setApiKey = (req: ParsingRequest, res: JsonReply): void => {
    const body = req.body;
    const apiKey = isJsonRecord(body) && typeof body.api_key === 'string' ? body.api_key.trim() : '';
    if (!apiKey) {
      res.status(400).json({ error: 'MISSING_API_KEY', message: 'API key is empty.' });
      return;
    }
    this.pipeline.setApiKey(apiKey);
    res.json({ ok: true });
  };

  /**
   * GET /api/status
   */
  status = (_req: ParsingRequest, res: JsonReply): void => {
    res.json({ ok: true, apiKeySet: this.pipeline.credentials.hasApiKey() });
  };

  /**
   * POST /api/parse-pdf
   */
  parseQuestions = async (req: ParsingRequest, res: JsonReply): Promise<void> => {
    if (!req.file) {
      res.status(400).json({ error: 'EMPTY_INPUT', message: 'No file uploaded.' });
      return;
    }
    try {
      const body = req.body;
      const mode = readMode(req.query.mode) ?? (isJsonRecord(body) ? readMode(body.mode) : undefined);
      const questions = await this.pipeline.parseQuestions(req.file.buffer, { mode });
      if (questions.length === 0) {
        res.status(422).json({ error: 'NO_QUESTIONS', message: 'No questions could be extracted. Check the PDF format.' });
        return;
      }
      res.json({ ok: true, count: questions.length, questions });
    } catch (error) {
      this.sendError(res, error, 'parse-pdf');
    }
  };

  /**
   * POST /api/parse-answer
   */
  parseAnswerKey = async (req: ParsingRequest, res: JsonReply): Promise<void> => {
    if (!req.file) {
      res.status(400).json({ error: 'EMPTY_INPUT', message: 'No file uploaded.' });
      return;
    }
    const answers = await this.pipeline.parseAnswerKey(req.file.buffer);
    if (answers.length === 0) {
      res.status(422).json({ error: 'NO_ANSWERS', message: 'No answers could be extracted.' });
      return;
    }
    res.json({ ok: true, count: answers.length, answers });
  };

  /**
   * POST /api/merge
   * Body: { questions: Question[], answers: AnswerRecord[] }
   */
  merge = (req: ParsingRequest, res: JsonReply): void => {
    const body: unknown = req.body;
    if (!isJsonRecord(body) || !Array.isArray(body.questions)) {
      res.status(400).json({ error: 'VALIDATION', message: 'questions must be an array.' });
      return;
    }
    try {
      const questions: Question[] = body.questions.map((item: unknown) => createQuestion(item));
      const result = mergeAnswersDetailed(questions, toAnswerRecords(body.answers));
      res.json({ ok: true, matched: result.matchedCount, questions: result.questions });
    } catch (error) {
      if (error instanceof QuestionValidationError) {
        res.status(400).json({ error: error.code, message: error.message, issues: error.issues });
        return;
      }
      this.sendError(res, error, 'merge');
    }
  };
}
