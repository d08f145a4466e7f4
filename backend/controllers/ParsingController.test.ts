import type { CallOutcome, PageImage, UserContent } from '../types/index.js';
import { DEFAULT_PARSING_CONFIG, ParsingConfig } from '../config/parsing.js';
import { ExtractionClient, retryPolicyFrom } from '../services/ai/ExtractionClient.js';
import { ExtractionClientProvider } from '../services/ai/ExtractionClientProvider.js';
import { ChatModel } from '../services/ai/ModelProvider.js';
import { ExamPdfPipeline } from '../services/ExamPdfPipeline.js';
import { PageRenderer } from '../services/pdf/PdfProcessingService.js';
import {
  DocumentError,
  EmptyInputError,
  MissingCredentialError,
  SizeLimitError,
  TransientServiceError,
  UnextractableContentError
} from '../utils/errorHandler.js';
import { JsonReply, ParsingController, ParsingRequest, statusForError, toAnswerRecords } from './ParsingController.js';

describe('statusForError', () => {
  it('maps pipeline failures to HTTP statuses', () => {
    expect(statusForError(new EmptyInputError())).toBe(400);
    expect(statusForError(new MissingCredentialError())).toBe(400);
    expect(statusForError(new DocumentError('broken'))).toBe(422);
    expect(statusForError(new UnextractableContentError('scanned'))).toBe(422);
    expect(statusForError(new SizeLimitError(300, 200))).toBe(413);
    expect(statusForError(new TransientServiceError('down'))).toBe(503);
  });

  it('treats anything else as an internal error', () => {
    expect(statusForError(new Error('bug'))).toBe(500);
    expect(statusForError('string')).toBe(500);
  });
});

describe('toAnswerRecords', () => {
  it('keeps well-formed records and normalises their fields', () => {
    expect(toAnswerRecords([
      { id: '2', subject: '무역영어', answer: 3 },
      { id: 4, answer: '①', explanation: 'UCP 600' },
      { id: 'x', answer: '②' },
      'not a record'
    ])).toEqual([
      { id: 2, subject: '무역영어', answer: '3', explanation: undefined },
      { id: 4, subject: undefined, answer: '①', explanation: 'UCP 600' }
    ]);
  });

  it('returns an empty list for anything but an array', () => {
    expect(toAnswerRecords(undefined)).toEqual([]);
  });
});

class RecordingReply implements JsonReply {
  statusCode = 200;
  body: unknown;

  status(code: number): RecordingReply {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): RecordingReply {
    this.body = body;
    return this;
  }
}

class OnePageRenderer implements PageRenderer {
  calls = 0;

  async renderPages(): Promise<PageImage[]> {
    this.calls++;
    return [{ pageNumber: 1, base64: 'QUJD', mimeType: 'image/png', width: 100, height: 100 }];
  }
}

class ReplyModel implements ChatModel {
  readonly contents: UserContent[] = [];

  constructor(private readonly outcome: CallOutcome) {}

  async complete(_systemPrompt: string, content: UserContent): Promise<CallOutcome> {
    this.contents.push(content);
    return this.outcome;
  }
}

const config: ParsingConfig = { ...DEFAULT_PARSING_CONFIG, maxWorkers: 1 };

const ok = (content: unknown): CallOutcome => ({
  kind: 'ok',
  response: { content: JSON.stringify(content), usageTokens: 1 }
});

function controllerWith(model?: ChatModel) {
  const credentials = new ExtractionClientProvider(
    config,
    (_apiKey, cfg) => new ExtractionClient(model ?? new ReplyModel(ok({})), retryPolicyFrom(cfg), async () => undefined)
  );
  if (model) {
    credentials.setApiKey('test-secret');
  }
  const renderer = new OnePageRenderer();
  const pipeline = new ExamPdfPipeline({ config, credentials, renderer });
  return { controller: new ParsingController(pipeline), renderer };
}

const upload = (query: Record<string, unknown> = {}, body: unknown = {}): ParsingRequest => ({
  file: { buffer: Buffer.from('%PDF') },
  query,
  body
});

const validQuestion = {
  id: 1,
  subject: '무역영어',
  question_text: 'Which term fits?',
  options: ['① yes', '② no'],
  page_number: 1
};

describe('ParsingController.parseQuestions', () => {
  it('asks for a file when none was uploaded', async () => {
    const { controller } = controllerWith();
    const res = new RecordingReply();

    await controller.parseQuestions({ query: {}, body: {} }, res);

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: 'EMPTY_INPUT', message: 'No file uploaded.' });
  });

  it('returns the extracted questions with their count', async () => {
    const model = new ReplyModel(ok({ questions: [{ id: 1, question_text: 'Which term fits?', options: ['① yes', '② no'] }] }));
    const { controller, renderer } = controllerWith(model);
    const res = new RecordingReply();

    await controller.parseQuestions(upload({ mode: 'vision' }), res);

    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({ ok: true, count: 1, questions: [{ id: 1, page_number: 1 }] });
    expect(renderer.calls).toBe(1);
    expect(model.contents.map(c => c.kind)).toEqual(['images']);
  });

  it('takes the mode from the form body when the query has none', async () => {
    const model = new ReplyModel(ok({ questions: [] }));
    const { controller, renderer } = controllerWith(model);
    const res = new RecordingReply();

    await controller.parseQuestions(upload({}, { mode: 'vision' }), res);

    expect(renderer.calls).toBe(1);
    expect(res.statusCode).toBe(422);
    expect(res.body).toMatchObject({ error: 'NO_QUESTIONS' });
  });

  it('reports a missing API key as a client error', async () => {
    const { controller, renderer } = controllerWith();
    const res = new RecordingReply();

    await controller.parseQuestions(upload({ mode: 'vision' }), res);

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: 'MISSING_API_KEY', message: 'API key is not set.' });
    expect(renderer.calls).toBe(0);
  });

  it('answers 503 when the extraction service stays unavailable', async () => {
    const model = new ReplyModel({ kind: 'retryable', rateLimited: true, error: new TransientServiceError('429', true) });
    const { controller } = controllerWith(model);
    const res = new RecordingReply();

    await controller.parseQuestions(upload({ mode: 'vision' }), res);

    expect(res.statusCode).toBe(503);
    expect(res.body).toEqual({
      error: 'SERVICE_UNAVAILABLE',
      message: 'The extraction service is unavailable. Try again later.'
    });
    expect(model.contents).toHaveLength(config.rateLimitMaxRetries);
  });
});

describe('ParsingController.parseAnswerKey', () => {
  it('answers 422 when no answer could be read', async () => {
    const { controller } = controllerWith();
    const res = new RecordingReply();

    await controller.parseAnswerKey({ file: { buffer: Buffer.alloc(0) }, query: {}, body: {} }, res);

    expect(res.statusCode).toBe(422);
    expect(res.body).toEqual({ error: 'NO_ANSWERS', message: 'No answers could be extracted.' });
  });
});

describe('ParsingController.merge', () => {
  it('merges answers into the posted questions', () => {
    const { controller } = controllerWith();
    const res = new RecordingReply();

    controller.merge({ query: {}, body: { questions: [validQuestion], answers: [{ id: 1, subject: '무역영어', answer: '2' }] } }, res);

    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({ ok: true, matched: 1, questions: [{ id: 1, answer: '② no' }] });
  });

  it('lists the problems of an invalid question', () => {
    const { controller } = controllerWith();
    const res = new RecordingReply();

    controller.merge({ query: {}, body: { questions: [{ ...validQuestion, options: ['① yes'] }], answers: [] } }, res);

    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({ error: 'VALIDATION', issues: ['options: options need at least 2 entries'] });
  });

  it('requires a question list', () => {
    const { controller } = controllerWith();
    const res = new RecordingReply();

    controller.merge({ query: {}, body: { answers: [] } }, res);

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: 'VALIDATION', message: 'questions must be an array.' });
  });
});

describe('ParsingController.setApiKey and status', () => {
  it('refuses a blank key and reports a stored one', () => {
    const { controller } = controllerWith();

    const blank = new RecordingReply();
    controller.setApiKey({ query: {}, body: { api_key: '   ' } }, blank);
    expect(blank.statusCode).toBe(400);

    const before = new RecordingReply();
    controller.status({ query: {}, body: {} }, before);
    expect(before.body).toEqual({ ok: true, apiKeySet: false });

    const saved = new RecordingReply();
    controller.setApiKey({ query: {}, body: { api_key: 'test-secret' } }, saved);
    expect(saved.body).toEqual({ ok: true });

    const after = new RecordingReply();
    controller.status({ query: {}, body: {} }, after);
    expect(after.body).toEqual({ ok: true, apiKeySet: true });
  });
});
