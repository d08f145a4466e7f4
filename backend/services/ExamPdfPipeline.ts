/**
 * ExamPdfPipeline
 * Entry point for turning exam PDFs into Question records:
 * question booklets through model extraction, answer keys through the table
 * parser with a model fallback, and the merge of the two.
 */

import type { AnswerRecord, ParseQuestionsOptions, Question, Section } from '../types/index.js';
import { getParsingConfig, ParsingConfig } from '../config/parsing.js';
import {
  EmptyInputError,
  MissingCredentialError,
  TransientServiceError,
  UnextractableContentError
} from '../utils/errorHandler.js';
import { createLogger } from '../utils/LoggerUtils.js';
import { runPool } from '../utils/WorkerPool.js';
import { ExtractionClient } from './ai/ExtractionClient.js';
import { ExtractionClientProvider } from './ai/ExtractionClientProvider.js';
import { parseAnswerTable } from './parsing/AnswerTableParser.js';
import { mergeAnswersDetailed } from './parsing/MergeService.js';
import { groupPages, segmentText } from './parsing/SubjectSegmenter.js';
import { PageRenderer, PdfProcessingService } from './pdf/PdfProcessingService.js';
import { PdfTextExtractionService } from './pdf/PdfTextExtractionService.js';
import { UNDERLINE_CLOSE, UNDERLINE_OPEN } from './pdf/UnderlineDetector.js';

const logger = createLogger('PIPELINE');

export interface PipelineDependencies {
  config?: ParsingConfig;
  credentials?: ExtractionClientProvider;
  renderer?: PageRenderer;
}

const stripUnderlineMarkers = (text: string) =>
  text.split(UNDERLINE_OPEN).join('').split(UNDERLINE_CLOSE).join('');

export class ExamPdfPipeline {
  readonly config: ParsingConfig;
  readonly credentials: ExtractionClientProvider;
  private readonly renderer: PageRenderer;

  constructor(deps: PipelineDependencies = {}) {
    this.config = deps.config ?? getParsingConfig();
    this.credentials = deps.credentials ?? new ExtractionClientProvider(this.config);
    this.renderer = deps.renderer ?? new PdfProcessingService();
  }

  setApiKey(apiKey: string): void {
    this.credentials.setApiKey(apiKey);
  }

  private textOptions() {
    return {
      maxPages: this.config.maxPdfPages,
      nearEmptyPageChars: this.config.nearEmptyPageChars,
      scannedPageRatio: this.config.scannedPageRatio
    };
  }

  private requireClient(): ExtractionClient {
    const client = this.credentials.getClient();
    if (!client) {
      throw new MissingCredentialError();
    }
    return client;
  }

  private async visionSections(pdfBuffer: Buffer): Promise<Section[]> {
    const pages = await this.renderer.renderPages(pdfBuffer, {
      dpi: this.config.visionDpi,
      maxPages: this.config.maxPdfPages
    });
    if (pages.length === 0) {
      throw new UnextractableContentError('No page of the PDF could be rendered.');
    }
    return groupPages(pages, this.config.pagesPerGroup);
  }

  /**
   * Extract questions from a question booklet.
   * Document-level problems throw, and so does a missing API key, before any
   * page is rendered. A section that fails contributes no questions, unless
   * every section failed because the service was unavailable.
   */
  async parseQuestions(pdfBuffer: Buffer, options: ParseQuestionsOptions = {}): Promise<Question[]> {
    if (pdfBuffer.length === 0) {
      throw new EmptyInputError();
    }
    const mode = options.mode ?? 'auto';
    let client: ExtractionClient;
    let sections: Section[];

    if (mode === 'vision') {
      client = this.requireClient();
      sections = await this.visionSections(pdfBuffer);
    } else {
      const extracted = await PdfTextExtractionService.extract(pdfBuffer, this.textOptions());
      client = this.requireClient();
      const textIsUsable = extracted.nonWhitespaceChars >= this.config.minTextChars && !extracted.likelyScanned;

      if (mode === 'text' || textIsUsable) {
        PdfTextExtractionService.requireText(extracted, this.config.minTextChars);
        sections = segmentText(extracted.taggedText, this.config);
      } else {
        logger.info('Text layer is too thin, switching to vision mode');
        sections = await this.visionSections(pdfBuffer);
      }
    }

    logger.info(`Extracting questions from ${sections.length} sections (${mode} mode)`);

    let unavailable = 0;
    const perSection = await runPool(
      sections,
      this.config.maxWorkers,
      section => client.extractQuestions(section),
      (_section, _index, error): Question[] => {
        if (error instanceof TransientServiceError) {
          unavailable++;
        }
        return [];
      }
    );
    if (sections.length > 0 && unavailable === sections.length) {
      throw new TransientServiceError('The extraction service is unavailable. Try again later.');
    }
    const questions = perSection.flat();

    logger.success(`Extracted ${questions.length} questions`);
    return questions;
  }

  /**
   * Extract answer records from an answer key. Never rejects; returns [] when nothing could be read.
   */
  async parseAnswerKey(pdfBuffer: Buffer): Promise<AnswerRecord[]> {
    if (pdfBuffer.length === 0) {
      return [];
    }

    try {
      const extracted = await PdfTextExtractionService.extract(pdfBuffer, this.textOptions());
      const plainText = stripUnderlineMarkers(extracted.pages.map(page => page.text).join('\n'));

      const table = parseAnswerTable(plainText);
      if (table.length > 0) {
        logger.success(`Answer table parsed without the model: ${table.length} answers`);
        return table;
      }

      if (extracted.nonWhitespaceChars < this.config.minTextChars) {
        logger.warn(`Answer key has ${extracted.nonWhitespaceChars} characters of text, nothing to send to the model`);
        return [];
      }

      const client = this.credentials.getClient();
      if (!client) {
        logger.warn('Answer table not recognised and no API key is set');
        return [];
      }

      logger.info('Answer table not recognised, falling back to model extraction');
      const sections = segmentText(stripUnderlineMarkers(extracted.taggedText), this.config);
      const perSection = await runPool(
        sections,
        this.config.maxWorkers,
        section => client.extractAnswers(section),
        (): AnswerRecord[] => []
      );
      return perSection.flat();
    } catch (error) {
      logger.error('Answer key parsing failed', error);
      return [];
    }
  }

  merge(questions: readonly Question[], records: readonly AnswerRecord[]): Question[] {
    return mergeAnswersDetailed(questions, records).questions;
  }
}
