import { load } from 'cheerio';
import fetch from 'node-fetch';

import { SearchUnavailableError } from '../errors.js';
import { FetchLike } from '../scrapers/HttpClient.js';
import { SearchHit } from '../types.js';
import { logger } from '../utils/logger.js';

import { SearchBackend, SearchRequest } from './SearchBackend.js';

export interface DuckDuckGoBackendOptions {
  userAgent: string;
  language?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

const SEARCH_URL = 'https://html.duckduckgo.com/html/';

const log = logger.child('duckduckgo');

/**
 * Result links on the HTML endpoint go through a `/l/?uddg=<target>` redirect.
 */
export function resolveDuckDuckGoUrl(rawHref: string): string {
  try {
    const url = new URL(rawHref, 'https://duckduckgo.com');
    if (url.hostname.endsWith('duckduckgo.com')) {
      const redirected = url.searchParams.get('uddg');
      if (redirected) {
        return redirected;
      }
    }
    return url.href;
  } catch {
    return rawHref;
  }
}

export function parseDuckDuckGoResults(html: string, limit: number): SearchHit[] {
  const $ = load(html);
  const hits: SearchHit[] = [];

  $('div.result').each((_, element) => {
    if (hits.length >= limit) return false;
    if ($(element).hasClass('result--ad')) return undefined;
    const anchor = $(element).find('a.result__a').first();
    const href = anchor.attr('href');
    if (!href) return undefined;
    const url = resolveDuckDuckGoUrl(href);
    if (!/^https?:\/\//.test(url)) return undefined;

    hits.push({
      title: anchor.text().trim(),
      url,
      snippet: $(element).find('.result__snippet').text().trim()
    });
    return undefined;
  });

  return hits;
}

export class DuckDuckGoBackend implements SearchBackend {
  readonly name = 'duckduckgo' as const;
  private userAgent: string;
  private language: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(options: DuckDuckGoBackendOptions) {
    this.userAgent = options.userAgent;
    this.language = options.language ?? 'en';
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search({ query, limit, signal }: SearchRequest): Promise<SearchHit[]> {
    const url = new URL(SEARCH_URL);
    url.searchParams.set('q', query);
    const timeoutSignal = AbortSignal.timeout(this.timeoutMs);

    let html: string;
    try {
      const response = await this.fetchImpl(url.toString(), {
        headers: {
          'User-Agent': this.userAgent,
          'Accept-Language': this.language
        },
        signal: signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal
      });
      // DuckDuckGo answers rate-limited clients with 202 and a challenge page.
      if (response.status !== 200) {
        throw new SearchUnavailableError(this.name, `HTTP ${response.status} ${response.statusText}`);
      }
      html = await response.text();
    } catch (error) {
      if (error instanceof SearchUnavailableError) {
        throw error;
      }
      const reason = timeoutSignal.aborted ? `timed out after ${this.timeoutMs}ms` : String(error);
      throw new SearchUnavailableError(this.name, reason, { cause: error });
    }

    if (html.includes('anomaly-modal')) {
      throw new SearchUnavailableError(this.name, 'challenge page returned');
    }

    const hits = parseDuckDuckGoResults(html, limit);
    log.debug(`"${query}" returned ${hits.length} results.`);
    return hits;
  }
}
