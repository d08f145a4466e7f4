import {
  ErrorHandler,
  InputError,
  MissingCredentialError,
  QuestionValidationError,
  SizeLimitError,
  TransientServiceError
} from './errorHandler.js';

describe('error taxonomy', () => {
  it('groups input errors and carries codes', () => {
    const error = new SizeLimitError(250, 200);
    expect(error).toBeInstanceOf(InputError);
    expect(error.code).toBe('SIZE_LIMIT');
    expect(error.name).toBe('SizeLimitError');
    expect(error.message).toBe('PDF has too many pages (250). At most 200 pages are supported.');
  });

  it('keeps validation issues', () => {
    const error = new QuestionValidationError(['options: too few', 'answer: not an option']);
    expect(error.message).toBe('Invalid question: options: too few; answer: not an option');
    expect(error.code).toBe('VALIDATION');
  });

  it('uses a default message for a missing key', () => {
    expect(new MissingCredentialError().message).toBe('API key is not set.');
  });
});

describe('ErrorHandler.analyzeError', () => {
  it('detects rate limits', () => {
    expect(ErrorHandler.analyzeError(new Error('429 Too Many Requests'))).toMatchObject({
      isRateLimit: true,
      retryable: true
    });
  });

  it('never retries authentication failures', () => {
    expect(ErrorHandler.analyzeError(new Error('401 Unauthorized: rate limit'))).toMatchObject({
      isAuthError: true,
      retryable: false
    });
  });

  it('treats network failures as retryable', () => {
    expect(ErrorHandler.analyzeError(new TypeError('fetch failed')).retryable).toBe(true);
  });

  it('reads transient service errors directly', () => {
    expect(ErrorHandler.analyzeError(new TransientServiceError('upstream', true))).toMatchObject({
      isRateLimit: true,
      isServerError: false,
      retryable: true
    });
  });

  it('reads a retry-after hint', () => {
    expect(ErrorHandler.analyzeError(new Error('503 unavailable, retry after: 30')).retryAfter).toBe(30);
  });

  it('treats unknown errors as fatal', () => {
    expect(ErrorHandler.analyzeError(new Error('something odd')).retryable).toBe(false);
  });
});
