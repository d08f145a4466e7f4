import type { CallOutcome, Section, UserContent } from '../../types/index.js';
import { AI_PROMPTS } from '../../config/prompts.js';
import { DEFAULT_PARSING_CONFIG } from '../../config/parsing.js';
import { TransientServiceError } from '../../utils/errorHandler.js';
import { ChatModel } from './ModelProvider.js';
import { ExtractionClient, pageNumbersIn, retryPolicyFrom } from './ExtractionClient.js';

class ScriptedModel implements ChatModel {
  readonly prompts: string[] = [];
  readonly contents: UserContent[] = [];

  constructor(private readonly replies: CallOutcome[]) {}

  async complete(systemPrompt: string, content: UserContent): Promise<CallOutcome> {
    this.prompts.push(systemPrompt);
    this.contents.push(content);
    const reply = this.replies.shift();
    return reply ?? { kind: 'fatal', error: new Error('no scripted reply') };
  }
}

const reply = (content: string): CallOutcome => ({ kind: 'ok', response: { content, usageTokens: 1 } });

const questionJson = JSON.stringify({
  questions: [{ id: 1, question_text: 'Incoterms 2020의 규칙 수는?', options: ['① 9', '② 11', '③ 13'], answer: '②' }]
});

const textSection: Section = {
  subjectHint: '무역계약',
  label: '무역계약',
  payload: { kind: 'text', text: '[PAGE 3]\n1. Incoterms 2020의 규칙 수는?\n① 9 ② 11 ③ 13' }
};

const noWait = async (): Promise<void> => undefined;
const policy = retryPolicyFrom(DEFAULT_PARSING_CONFIG);

describe('pageNumbersIn', () => {
  it('lists page markers in order', () => {
    expect(pageNumbersIn('[PAGE 2]\na\n[PAGE 10]\nb')).toEqual([2, 10]);
    expect(pageNumbersIn('none')).toEqual([]);
  });
});

describe('ExtractionClient.extractQuestions', () => {
  it('builds questions from a text section', async () => {
    const model = new ScriptedModel([reply(questionJson)]);
    const client = new ExtractionClient(model, policy, noWait);

    const questions = await client.extractQuestions(textSection);

    expect(questions).toHaveLength(1);
    expect(questions[0]).toMatchObject({ subject: '무역계약', answer: '② 11', page_number: 3 });
    expect(model.prompts).toEqual([AI_PROMPTS.questionExtraction.textSystem]);
    expect(model.contents[0]).toEqual({
      kind: 'text',
      text: AI_PROMPTS.questionExtraction.textUser('무역계약', textSection.payload.kind === 'text' ? textSection.payload.text : '')
    });
  });

  it('asks once more with a stricter instruction when the reply is not JSON', async () => {
    const model = new ScriptedModel([reply('Sorry, here is a summary instead.'), reply(questionJson)]);
    const client = new ExtractionClient(model, policy, noWait);

    const questions = await client.extractQuestions(textSection);

    expect(questions).toHaveLength(1);
    expect(model.prompts[1]).toBe(AI_PROMPTS.questionExtraction.textSystem + AI_PROMPTS.strictJsonSuffix);
  });

  it('returns nothing when both replies are unreadable', async () => {
    const model = new ScriptedModel([reply('nope'), reply('still nope')]);
    const client = new ExtractionClient(model, policy, noWait);

    expect(await client.extractQuestions(textSection)).toEqual([]);
    expect(model.prompts).toHaveLength(2);
  });

  it('returns nothing when the call fails fatally', async () => {
    const model = new ScriptedModel([{ kind: 'fatal', error: new Error('401 unauthorized') }]);
    const client = new ExtractionClient(model, policy, noWait);

    expect(await client.extractQuestions(textSection)).toEqual([]);
    expect(model.prompts).toHaveLength(1);
  });

  it('rejects when the service stays unavailable', async () => {
    const unavailable: CallOutcome = { kind: 'retryable', rateLimited: false, error: new TransientServiceError('503') };
    const model = new ScriptedModel([unavailable, unavailable, unavailable]);
    const client = new ExtractionClient(model, policy, noWait);

    await expect(client.extractQuestions(textSection)).rejects.toBeInstanceOf(TransientServiceError);
    expect(model.prompts).toHaveLength(DEFAULT_PARSING_CONFIG.maxApiRetries);
  });

  it('sends page images for an image section', async () => {
    const model = new ScriptedModel([reply(questionJson)]);
    const client = new ExtractionClient(model, policy, noWait);
    const images = [
      { pageNumber: 4, base64: 'QUJD', mimeType: 'image/png', width: 1, height: 1 },
      { pageNumber: 5, base64: 'REVG', mimeType: 'image/png', width: 1, height: 1 }
    ];

    const questions = await client.extractQuestions({
      subjectHint: '일반',
      label: 'pages 4-5',
      payload: { kind: 'images', pages: images }
    });

    expect(questions[0].page_number).toBe(4);
    expect(questions[0].subject).toBe('일반');
    expect(model.prompts).toEqual([AI_PROMPTS.questionExtraction.visionSystem]);
    expect(model.contents[0]).toEqual({
      kind: 'images',
      text: AI_PROMPTS.questionExtraction.visionUser([4, 5]),
      images
    });
  });
});

describe('ExtractionClient.extractAnswers', () => {
  it('reads answer records from a text section', async () => {
    const model = new ScriptedModel([reply('{"answers": [{"id": 1, "answer": "③"}]}')]);
    const client = new ExtractionClient(model, policy, noWait);

    expect(await client.extractAnswers(textSection)).toEqual([
      { id: 1, subject: '무역계약', answer: '③', explanation: '' }
    ]);
  });

  it('skips image sections without calling the model', async () => {
    const model = new ScriptedModel([]);
    const client = new ExtractionClient(model, policy, noWait);

    const records = await client.extractAnswers({ subjectHint: '일반', label: 'page 1', payload: { kind: 'images', pages: [] } });

    expect(records).toEqual([]);
    expect(model.prompts).toEqual([]);
  });
});
