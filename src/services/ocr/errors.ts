/**
 * OCR service error classes
 *
 * Server, rate-limit and timeout categories are retryable; API (4xx) and
 * response errors are not.
 */

export type OCRErrorCategory =
  | 'OCR_API_ERROR'
  | 'OCR_SERVER_ERROR'
  | 'OCR_RATE_LIMIT'
  | 'OCR_TIMEOUT'
  | 'OCR_RESPONSE_ERROR';

export class OCRError extends Error {
  constructor(
    message: string,
    public readonly category: OCRErrorCategory,
    public readonly requestId?: string
  ) {
    super(message);
    this.name = 'OCRError';
  }
}

export class OCRAPIError extends OCRError {
  constructor(
    message: string,
    public readonly statusCode: number,
    requestId?: string
  ) {
    super(message, statusCode >= 500 ? 'OCR_SERVER_ERROR' : 'OCR_API_ERROR', requestId);
    this.name = 'OCRAPIError';
  }
}

export class OCRRateLimitError extends OCRError {
  constructor(
    message: string = 'Rate limit exceeded',
    public readonly retryAfter: number = 60
  ) {
    super(message, 'OCR_RATE_LIMIT');
    this.name = 'OCRRateLimitError';
  }
}

export class OCRTimeoutError extends OCRError {
  constructor(message: string, requestId?: string) {
    super(message, 'OCR_TIMEOUT', requestId);
    this.name = 'OCRTimeoutError';
  }
}

/**
 * The service answered, but not with a usable fragment list
 */
export class OCRResponseError extends OCRError {
  constructor(message: string, requestId?: string) {
    super(message, 'OCR_RESPONSE_ERROR', requestId);
    this.name = 'OCRResponseError';
  }
}

/**
 * Map a non-2xx HTTP response to an OCR error
 */
export function ocrErrorFromStatus(
  status: number,
  body: string,
  retryAfterHeader: string | null,
  requestId?: string
): OCRError {
  const detail = body.length > 200 ? `${body.slice(0, 200)}...` : body;
  if (status === 429) {
    const retryAfter = retryAfterHeader === null ? NaN : parseInt(retryAfterHeader, 10);
    return new OCRRateLimitError(
      `OCR service rate limited: ${detail}`,
      Number.isNaN(retryAfter) ? 60 : retryAfter
    );
  }
  if (status === 408 || status === 504) {
    return new OCRTimeoutError(`OCR service timed out (HTTP ${status})`, requestId);
  }
  return new OCRAPIError(`OCR service returned HTTP ${status}: ${detail}`, status, requestId);
}

const RETRYABLE_CATEGORIES = new Set<OCRErrorCategory>([
  'OCR_SERVER_ERROR',
  'OCR_RATE_LIMIT',
  'OCR_TIMEOUT',
]);

export function isRetryableOcrError(error: unknown): boolean {
  return error instanceof OCRError && RETRYABLE_CATEGORIES.has(error.category);
}
