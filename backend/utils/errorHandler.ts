/**
 * Error taxonomy and classification utilities for the extraction pipeline
 */

export type PipelineErrorCode =
  | 'EMPTY_INPUT'
  | 'DOCUMENT_UNREADABLE'
  | 'SIZE_LIMIT'
  | 'UNEXTRACTABLE_CONTENT'
  | 'SERVICE_UNAVAILABLE'
  | 'MISSING_API_KEY'
  | 'VALIDATION';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The user must fix the file itself. */
export class InputError extends PipelineError {}

export class EmptyInputError extends InputError {
  constructor(message = 'PDF file is empty.') {
    super('EMPTY_INPUT', message);
  }
}

export class DocumentError extends InputError {
  constructor(message: string) {
    super('DOCUMENT_UNREADABLE', message);
  }
}

export class SizeLimitError extends InputError {
  readonly pageCount: number;
  readonly maxPages: number;

  constructor(pageCount: number, maxPages: number) {
    super('SIZE_LIMIT', `PDF has too many pages (${pageCount}). At most ${maxPages} pages are supported.`);
    this.pageCount = pageCount;
    this.maxPages = maxPages;
  }
}

export class UnextractableContentError extends PipelineError {
  constructor(message: string) {
    super('UNEXTRACTABLE_CONTENT', message);
  }
}

export class TransientServiceError extends PipelineError {
  readonly rateLimited: boolean;

  constructor(message: string, rateLimited = false) {
    super('SERVICE_UNAVAILABLE', message);
    this.rateLimited = rateLimited;
  }
}

export class MissingCredentialError extends PipelineError {
  constructor(message = 'API key is not set.') {
    super('MISSING_API_KEY', message);
  }
}

export class QuestionValidationError extends PipelineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('VALIDATION', `Invalid question: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export interface ErrorInfo {
  isRateLimit: boolean;
  isAuthError: boolean;
  isServerError: boolean;
  isNetworkError: boolean;
  retryable: boolean;
  retryAfter?: number;
}

export class ErrorHandler {
  /**
   * Analyze error and return structured error information
   */
  static analyzeError(error: Error): ErrorInfo {
    if (error instanceof TransientServiceError) {
      return {
        isRateLimit: error.rateLimited,
        isAuthError: false,
        isServerError: !error.rateLimited,
        isNetworkError: false,
        retryable: true
      };
    }

    const message = error.message.toLowerCase();

    const isRateLimit = message.includes('429') ||
                       message.includes('rate limit') ||
                       message.includes('quota exceeded') ||
                       message.includes('resource exhausted') ||
                       message.includes('too many requests');

    const isAuthError = message.includes('401') ||
                       message.includes('403') ||
                       message.includes('unauthorized') ||
                       message.includes('forbidden');

    const isServerError = /\b(500|502|503|504)\b/.test(message) ||
                         message.includes('unavailable');

    const isNetworkError = error.name === 'AbortError' ||
                          error.name === 'TimeoutError' ||
                          message.includes('network') ||
                          message.includes('timeout') ||
                          message.includes('timed out') ||
                          message.includes('connection') ||
                          message.includes('fetch failed') ||
                          message.includes('econnreset') ||
                          message.includes('econnrefused');

    const retryable = !isAuthError && (isRateLimit || isServerError || isNetworkError);

    // Extract retry-after from error message if available
    let retryAfter: number | undefined;
    const retryMatch = message.match(/retry.?after[:\s]+(\d+)/i);
    if (retryMatch) {
      retryAfter = parseInt(retryMatch[1], 10);
    }

    return {
      isRateLimit,
      isAuthError,
      isServerError,
      isNetworkError,
      retryable,
      retryAfter
    };
  }

  /**
   * Get appropriate log message for error type
   */
  static getLogMessage(error: Error, context: string): string {
    const errorInfo = this.analyzeError(error);

    if (errorInfo.isRateLimit) {
      return `🔄 [429 DETECTED] Rate limit detected in ${context}, backing off...`;
    } else if (errorInfo.isAuthError) {
      return `❌ [AUTH ERROR] Authentication failed in ${context}`;
    } else if (errorInfo.isServerError) {
      return `🛠️ [SERVER ERROR] Upstream failure in ${context}`;
    } else if (errorInfo.isNetworkError) {
      return `🌐 [NETWORK ERROR] Network issue in ${context}`;
    } else {
      return `❌ [ERROR] ${context} failed with unknown error`;
    }
  }

  static toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
  }
}
