/**
 * Core type definitions for the exam PDF extraction pipeline
 */

// Question records
export interface Question {
  readonly id: number;
  readonly subject: string;
  readonly context: string | null;
  readonly question_text: string;
  readonly options: readonly string[];
  readonly answer: string;
  readonly explanation: string;
  readonly page_number: number;
}

/**
 * Answer-key entry as it comes out of the table parser or the model.
 * Nothing here is checked against option lists until merge time.
 */
export interface AnswerRecord {
  id: number;
  subject?: string;
  answer: string;
  explanation?: string;
}

// Document extraction types
export interface TextSpan {
  text: string;
  x: number;
  y: number; // baseline, PDF user space (y grows upward)
  width: number;
  height: number;
}

export interface LineSegment {
  x1: number;
  x2: number;
  y: number;
}

export interface PageText {
  pageNumber: number; // 1-based
  text: string;
  underlinedSpans: number;
}

export interface ExtractedText {
  pages: PageText[];
  taggedText: string;
  pageCount: number;
  nonWhitespaceChars: number;
  likelyScanned: boolean;
}

export interface PageImage {
  pageNumber: number; // 1-based
  base64: string;
  mimeType: string;
  width: number;
  height: number;
}

// Sections
export type SectionPayload =
  | { kind: 'text'; text: string }
  | { kind: 'images'; pages: PageImage[] };

export interface Section {
  subjectHint: string;
  label: string;
  payload: SectionPayload;
}

export type ExtractionMode = 'auto' | 'text' | 'vision';

export interface ParseQuestionsOptions {
  mode?: ExtractionMode;
}

export interface MergeResult {
  questions: Question[];
  matchedCount: number;
}

// AI model types
export type ModelType =
  | 'openai-gpt-4o'
  | 'openai-gpt-4o-mini'
  | 'gemini-2.0-flash'
  | 'gemini-2.5-flash';

export interface AIModelConfig {
  name: string;
  apiEndpoint: string;
  maxTokens: number;
  temperature: number;
}

export type UserContent =
  | { kind: 'text'; text: string }
  | { kind: 'images'; text: string; images: PageImage[] };

export interface ModelResponse {
  content: string;
  usageTokens: number;
}

/**
 * Result of one raw model request; the retry loop branches on `kind`.
 */
export type CallOutcome =
  | { kind: 'ok'; response: ModelResponse }
  | { kind: 'retryable'; error: Error; rateLimited: boolean; retryAfterMs?: number }
  | { kind: 'fatal'; error: Error };

export interface RetryState {
  attempt: number;
  lastError?: Error;
  delayMs: number;
}
