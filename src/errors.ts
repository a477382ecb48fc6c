import { FailureReason, Session } from './types.js';

export type ScrapeErrorCode = 'search_unavailable' | 'no_candidates' | FailureReason;

export class ScrapeError extends Error {
  readonly code: ScrapeErrorCode;

  constructor(code: ScrapeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class SearchUnavailableError extends ScrapeError {
  constructor(backend: string, message: string, options?: { cause?: unknown }) {
    super('search_unavailable', `${backend}: ${message}`, options);
  }
}

export class NoCandidatesError extends ScrapeError {
  constructor(query: string) {
    super('no_candidates', `No scrapeable candidates for "${query}"`);
  }
}

export class BlockedError extends ScrapeError {
  constructor(url: string, reason: string) {
    super('blocked', `Blocked by ${url}: ${reason}`);
  }
}

export class FetchTimeoutError extends ScrapeError {
  constructor(url: string, timeoutMs: number) {
    super('timeout', `Timed out after ${timeoutMs}ms: ${url}`);
  }
}

export class NonHtmlContentError extends ScrapeError {
  constructor(url: string, contentType: string) {
    super('non_html', `Not an HTML page (${contentType || 'no content-type'}): ${url}`);
  }
}

export class ExtractionFailedError extends ScrapeError {
  constructor(url: string, reason: string, options?: { cause?: unknown }) {
    super('extraction_failed', `Extraction failed for ${url}: ${reason}`, options);
  }
}

export class CancelledError extends ScrapeError {
  constructor(url: string) {
    super('cancelled', `Cancelled: ${url}`);
  }
}

const FAILURE_CODES = new Set<ScrapeErrorCode>([
  'timeout',
  'blocked',
  'non_html',
  'extraction_failed',
  'cancelled'
]);

function isFailureReason(code: ScrapeErrorCode): code is FailureReason {
  return FAILURE_CODES.has(code);
}

/**
 * Maps anything thrown while fetching a candidate onto the per-candidate
 * failure taxonomy. Unknown errors (DNS, TLS, resets) count as extraction failures.
 */
export function toFailureReason(error: unknown): FailureReason {
  if (error instanceof ScrapeError && isFailureReason(error.code)) {
    return error.code;
  }
  return 'extraction_failed';
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * For callers that prefer exceptions: the error matching a failed session, or
 * null when the session produced at least one result.
 */
export function sessionError(session: Session): ScrapeError | null {
  if (session.status !== 'failed') {
    return null;
  }
  switch (session.failure) {
    case 'search_failed':
      return new SearchUnavailableError('search', `no backend answered for "${session.query}"`);
    case 'no_candidates':
      return new NoCandidatesError(session.query);
    case 'deadline_exceeded':
      return new FetchTimeoutError(session.query, session.elapsedMs);
    default:
      return new ExtractionFailedError(session.query, 'every candidate failed');
  }
}
