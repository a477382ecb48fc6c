import fetch from 'node-fetch';

import { SearchUnavailableError } from '../errors.js';
import { FetchLike } from '../scrapers/HttpClient.js';
import { SearchHit } from '../types.js';
import { logger } from '../utils/logger.js';

import { isRecord, readString, SearchBackend, SearchRequest } from './SearchBackend.js';

export interface SearxngBackendOptions {
  baseUrl: string;
  userAgent: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

const log = logger.child('searxng');

/**
 * Local SearXNG metasearch instance. Requires `json` in the instance's
 * `search.formats` setting.
 */
export class SearxngBackend implements SearchBackend {
  readonly name = 'searxng' as const;
  private endpoint: string;
  private userAgent: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(options: SearxngBackendOptions) {
    this.endpoint = new URL('/search', options.baseUrl).toString();
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search({ query, limit, signal }: SearchRequest): Promise<SearchHit[]> {
    const timeoutSignal = AbortSignal.timeout(this.timeoutMs);
    const body = new URLSearchParams({ q: query, format: 'json' });

    let payload: unknown;
    try {
      const response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        body: body.toString(),
        headers: {
          'User-Agent': this.userAgent,
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json'
        },
        signal: signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal
      });
      if (!response.ok) {
        throw new SearchUnavailableError(this.name, `HTTP ${response.status} ${response.statusText}`);
      }
      payload = await response.json();
    } catch (error) {
      if (error instanceof SearchUnavailableError) {
        throw error;
      }
      const reason = timeoutSignal.aborted ? `timed out after ${this.timeoutMs}ms` : String(error);
      throw new SearchUnavailableError(this.name, reason, { cause: error });
    }

    const results: unknown = isRecord(payload) ? payload.results : undefined;
    if (!Array.isArray(results)) {
      throw new SearchUnavailableError(this.name, 'response has no "results" array');
    }

    const items: unknown[] = results;
    const hits: SearchHit[] = [];
    for (const item of items) {
      if (hits.length >= limit) break;
      if (!isRecord(item)) continue;
      const url = readString(item, 'url');
      if (!url) continue;
      hits.push({
        title: readString(item, 'title'),
        url,
        snippet: readString(item, 'content')
      });
    }

    log.debug(`"${query}" returned ${items.length} results, kept ${hits.length}.`);
    return hits;
  }
}
