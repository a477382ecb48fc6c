import { ContentExtractor, ParsedPage, ReadableText } from '../extractors/ContentExtractor.js';
import { describeError, toFailureReason } from '../errors.js';
import {
  Candidate,
  FailureReason,
  FetchAttempt,
  FetchOutcome,
  ScrapeResult,
  Tier,
  TIER_ORDER
} from '../types.js';
import { logger } from '../utils/logger.js';

import { HtmlDocument, HttpClient } from './HttpClient.js';
import { PageRenderer } from './PageRenderer.js';

export interface FetchOptions {
  /** Budget for the whole attempt, every tier included. */
  timeoutMs: number;
  ceiling?: Tier;
  signal?: AbortSignal;
}

/** Anything the dispatcher can fan out over. */
export interface CandidateFetcher {
  attempt(candidate: Candidate, options: FetchOptions): Promise<FetchAttempt>;
}

export interface TieredFetcherOptions {
  minExtractedLength?: number;
  settleMs?: number;
  /** Fraction of the budget the direct GET may use when a render could follow. */
  directShare?: number;
}

export interface TieredFetcherDependencies {
  httpClient: HttpClient;
  extractor?: ContentExtractor;
  renderer?: PageRenderer | null;
}

const log = logger.child('fetcher');

export function allowsTier(ceiling: Tier, tier: Tier): boolean {
  return TIER_ORDER.indexOf(tier) <= TIER_ORDER.indexOf(ceiling);
}

/**
 * Direct GET, then Readability over the same HTML, then a headless render,
 * stopping at the first tier that produces usable content. Never retries and
 * never throws: every failure is reported on the returned attempt.
 *
 * All tiers share one `timeoutMs` budget. When a render may follow, the GET
 * gets `directShare` of it and the render gets whatever is left.
 */
export class TieredFetcher implements CandidateFetcher {
  private http: HttpClient;
  private extractor: ContentExtractor;
  private renderer: PageRenderer | null;
  private minExtractedLength: number;
  private settleMs: number;
  private directShare: number;

  constructor(dependencies: TieredFetcherDependencies, options: TieredFetcherOptions = {}) {
    this.http = dependencies.httpClient;
    this.extractor = dependencies.extractor ?? new ContentExtractor();
    this.renderer = dependencies.renderer ?? null;
    this.minExtractedLength = options.minExtractedLength ?? 30;
    this.settleMs = options.settleMs ?? 2_000;
    this.directShare = options.directShare ?? 0.5;
  }

  async fetch(candidate: Candidate, options: FetchOptions): Promise<ScrapeResult | null> {
    const attempt = await this.attempt(candidate, options);
    return attempt.outcome.status === 'success' ? attempt.outcome.result : null;
  }

  async attempt(candidate: Candidate, options: FetchOptions): Promise<FetchAttempt> {
    const { signal, timeoutMs } = options;
    const ceiling = options.ceiling ?? 'rendered';
    const startedAt = Date.now();
    const deadline = startedAt + timeoutMs;
    const tiers: Tier[] = [];
    const mayRender = allowsTier(ceiling, 'rendered') && this.renderer !== null;

    const finish = (outcome: FetchOutcome): FetchAttempt => {
      const attempt: FetchAttempt = { candidate, tiers, elapsedMs: Date.now() - startedAt, outcome };
      if (outcome.status === 'success') {
        log.debug(`${candidate.domain} scraped via ${outcome.result.method} in ${attempt.elapsedMs}ms`);
      } else if (outcome.reason !== 'cancelled') {
        log.debug(`${candidate.domain} failed (${outcome.reason}) after ${attempt.elapsedMs}ms`, outcome.detail);
      }
      return attempt;
    };
    const fail = (reason: FailureReason, detail?: string) =>
      finish({ status: 'failed', reason, ...(detail ? { detail } : {}) });
    const succeed = (tier: Tier, page: ParsedPage, contentType: string, readable?: ReadableText | null) =>
      finish({ status: 'success', result: this.buildResult(candidate, tier, page, contentType, startedAt, readable) });

    if (signal?.aborted) {
      return fail('cancelled');
    }

    let failure: FailureReason = 'extraction_failed';
    let detail: string | undefined;
    let document: HtmlDocument | null = null;

    tiers.push('direct');
    try {
      const directTimeoutMs = mayRender ? Math.max(1, Math.floor(timeoutMs * this.directShare)) : timeoutMs;
      document = await this.http.getHtml(candidate.url, { timeoutMs: directTimeoutMs, signal });
    } catch (error) {
      failure = toFailureReason(error);
      detail = describeError(error);
      if (failure === 'cancelled' || failure === 'non_html') {
        return fail(failure, detail);
      }
    }
    if (signal?.aborted) {
      return fail('cancelled');
    }

    if (document) {
      const page = this.extractor.parse(document.html, candidate.url);
      if (this.extractor.isUsable(page)) {
        return succeed('direct', page, document.contentType);
      }
      failure = 'extraction_failed';
      detail = 'direct parse found too little content';

      if (allowsTier(ceiling, 'extracted')) {
        tiers.push('extracted');
        const readable = this.extractor.readable(document.html, candidate.url);
        if (signal?.aborted) {
          return fail('cancelled');
        }
        if (readable && readable.text.length > this.minExtractedLength) {
          return succeed('extracted', page, document.contentType, readable);
        }
        detail = 'readability found too little content';
      }
    }

    if (!allowsTier(ceiling, 'rendered') || !this.renderer) {
      return fail(failure, detail);
    }
    const remainingMs = deadline - Date.now();
    if (remainingMs <= 0) {
      return fail('timeout', `no time left to render within ${timeoutMs}ms`);
    }

    tiers.push('rendered');
    // Settle time comes out of the same budget as navigation.
    const settleMs = Math.min(this.settleMs, Math.floor(remainingMs / 4));
    let html: string;
    try {
      html = await this.renderer.render(candidate.url, { timeoutMs: remainingMs - settleMs, settleMs, signal });
    } catch (error) {
      return fail(signal?.aborted ? 'cancelled' : toFailureReason(error), describeError(error));
    }
    if (signal?.aborted) {
      return fail('cancelled');
    }

    const rendered = this.extractor.parse(html, candidate.url);
    if (this.extractor.hasAnyContent(rendered)) {
      return succeed('rendered', rendered, 'text/html');
    }
    return fail('extraction_failed', 'rendered page has no title or content');
  }

  private buildResult(
    candidate: Candidate,
    method: Tier,
    page: ParsedPage,
    contentType: string,
    startedAt: number,
    readable?: ReadableText | null
  ): ScrapeResult {
    const { title, payload } = this.extractor.refine(page, readable);
    const body = readable ? readable.text : page.generic.mainContent;
    return Object.freeze({
      candidate,
      url: candidate.url,
      domain: candidate.domain,
      title,
      method,
      contentType,
      fetchedAt: new Date().toISOString(),
      elapsedMs: Date.now() - startedAt,
      body,
      payload: Object.freeze(payload)
    });
  }
}
