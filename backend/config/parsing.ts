/**
 * PDF Parsing Configuration
 * Numeric limits for extraction, segmentation and model calls.
 * Each value can be overridden from .env.local; unset values fall back to defaults.
 */

// Load environment variables from .env.local FIRST
import * as dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });

export interface ParsingConfig {
  maxPdfPages: number;
  visionDpi: number;
  pagesPerGroup: number;
  maxWorkers: number;
  minTextChars: number;
  nearEmptyPageChars: number;
  scannedPageRatio: number;
  maxSectionChars: number;
  pagesPerChunk: number;
  maxApiRetries: number;
  backoffBaseMs: number;
  rateLimitMaxRetries: number;
  rateLimitBackoffBaseMs: number;
  requestTimeoutMs: number;
}

export const DEFAULT_PARSING_CONFIG: ParsingConfig = {
  maxPdfPages: 200,
  visionDpi: 200,
  pagesPerGroup: 3,
  maxWorkers: 3,
  minTextChars: 100,
  nearEmptyPageChars: 20,
  scannedPageRatio: 0.5,
  maxSectionChars: 30000,
  pagesPerChunk: 5,
  maxApiRetries: 3,
  backoffBaseMs: 1000,
  rateLimitMaxRetries: 5,
  rateLimitBackoffBaseMs: 2000,
  requestTimeoutMs: 120000
};

/**
 * Read a positive number from the environment, or return the fallback.
 */
function getNumericEnv(key: string, fallback: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    console.warn(`⚠️ [CONFIG] Ignoring invalid ${key}="${value}", using ${fallback}`);
    return fallback;
  }
  return parsed;
}

export function getParsingConfig(overrides: Partial<ParsingConfig> = {}): ParsingConfig {
  const d = DEFAULT_PARSING_CONFIG;
  return {
    maxPdfPages: getNumericEnv('MAX_PDF_PAGES', d.maxPdfPages),
    visionDpi: getNumericEnv('VISION_DPI', d.visionDpi),
    pagesPerGroup: getNumericEnv('PAGES_PER_GROUP', d.pagesPerGroup),
    maxWorkers: getNumericEnv('MAX_WORKERS', d.maxWorkers),
    minTextChars: getNumericEnv('MIN_TEXT_CHARS', d.minTextChars),
    nearEmptyPageChars: d.nearEmptyPageChars,
    scannedPageRatio: d.scannedPageRatio,
    maxSectionChars: getNumericEnv('MAX_SECTION_CHARS', d.maxSectionChars),
    pagesPerChunk: getNumericEnv('PAGES_PER_CHUNK', d.pagesPerChunk),
    maxApiRetries: getNumericEnv('MAX_API_RETRIES', d.maxApiRetries),
    backoffBaseMs: getNumericEnv('BACKOFF_BASE_MS', d.backoffBaseMs),
    rateLimitMaxRetries: getNumericEnv('RATE_LIMIT_MAX_RETRIES', d.rateLimitMaxRetries),
    rateLimitBackoffBaseMs: getNumericEnv('RATE_LIMIT_BACKOFF_BASE_MS', d.rateLimitBackoffBaseMs),
    requestTimeoutMs: getNumericEnv('REQUEST_TIMEOUT_MS', d.requestTimeoutMs),
    ...overrides
  };
}

/** Subject names printed as section headers in the supported exam. */
export const SUBJECT_NAMES = ['무역규범', '무역결제', '무역계약', '무역영어'] as const;

/** Header variants that also start a section but are not answer-table columns. */
export const EXTRA_SUBJECT_HEADERS = ['무역물류'] as const;

export const GENERAL_SUBJECT = '일반';
