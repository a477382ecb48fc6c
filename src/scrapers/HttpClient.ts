import fetch, { RequestInit, Response } from 'node-fetch';

import {
  BlockedError,
  CancelledError,
  ExtractionFailedError,
  FetchTimeoutError,
  NonHtmlContentError,
  ScrapeError
} from '../errors.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  userAgent: string;
  minBodyBytes?: number;
  fetchImpl?: FetchLike;
}

export interface RequestControl {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface HtmlDocument {
  url: string;
  status: number;
  contentType: string;
  html: string;
}

const BLOCK_STATUSES = new Set<number>([403, 429, 503]);

// Checked only against short bodies: real articles mention these words too.
const BLOCK_SIGNATURES = [
  'access denied',
  'captcha',
  'bot protection',
  'rate limit',
  'too many requests',
  'suspicious activity',
  'verification required',
  'human verification',
  'attention required',
  'are you a robot'
];
const BLOCK_PAGE_MAX_LENGTH = 5_000;

export function detectBlockPage(html: string, serverHeader = ''): string | null {
  if (serverHeader.toLowerCase().includes('cloudflare') && html.length < 1_000) {
    return 'Cloudflare protection detected';
  }
  if (html.length >= BLOCK_PAGE_MAX_LENGTH) {
    return null;
  }
  const lower = html.toLowerCase();
  const signature = BLOCK_SIGNATURES.find((item) => lower.includes(item));
  return signature ? `page contains "${signature}"` : null;
}

function isHtmlContentType(contentType: string): boolean {
  const lower = contentType.toLowerCase();
  return lower.includes('text/html') || lower.includes('application/xhtml+xml');
}

/**
 * Single GET per call, no retries. Aborts the socket when either the caller's
 * signal fires or the per-request timeout elapses.
 */
export class HttpClient {
  private userAgent: string;
  private minBodyBytes: number;
  private fetchImpl: FetchLike;

  constructor(options: HttpClientOptions) {
    this.userAgent = options.userAgent;
    this.minBodyBytes = options.minBodyBytes ?? 100;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async getHtml(url: string, control: RequestControl): Promise<HtmlDocument> {
    if (control.signal?.aborted) {
      throw new CancelledError(url);
    }

    const timeoutSignal = AbortSignal.timeout(control.timeoutMs);
    const signal = control.signal ? AbortSignal.any([control.signal, timeoutSignal]) : timeoutSignal;

    try {
      const response = await this.fetchImpl(url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.5'
        },
        redirect: 'follow',
        signal
      });

      if (BLOCK_STATUSES.has(response.status)) {
        throw new BlockedError(url, `HTTP ${response.status}`);
      }
      if (response.status !== 200) {
        throw new ExtractionFailedError(url, `HTTP ${response.status}`);
      }

      const contentType = response.headers.get('content-type') ?? '';
      if (!isHtmlContentType(contentType)) {
        throw new NonHtmlContentError(url, contentType);
      }

      const html = await response.text();
      if (Buffer.byteLength(html) < this.minBodyBytes) {
        throw new ExtractionFailedError(url, `body too small (${Buffer.byteLength(html)} bytes)`);
      }

      const blockReason = detectBlockPage(html, response.headers.get('server') ?? '');
      if (blockReason) {
        throw new BlockedError(url, blockReason);
      }

      return {
        url: response.url || url,
        status: response.status,
        contentType,
        html
      };
    } catch (error) {
      if (control.signal?.aborted) {
        throw new CancelledError(url);
      }
      if (timeoutSignal.aborted) {
        throw new FetchTimeoutError(url, control.timeoutMs);
      }
      if (error instanceof ScrapeError) {
        throw error;
      }
      throw new ExtractionFailedError(url, error instanceof Error ? error.message : String(error), {
        cause: error
      });
    }
  }
}
