import { describeError } from '../errors.js';
import { BackendName, Candidate, SearchHit } from '../types.js';
import { logger } from '../utils/logger.js';
import { getDomain, isRejected } from '../utils/url.js';

import { SearchBackend } from './SearchBackend.js';

export type ResolutionStatus = 'ok' | 'empty' | 'unavailable';

export interface Resolution {
  status: ResolutionStatus;
  candidates: Candidate[];
  backend?: BackendName;
}

export interface QueryResolverOptions {
  rejectDomains: readonly string[];
}

const log = logger.child('resolver');

/**
 * Turns search hits into an ordered candidate list: reject-listed domains
 * removed, one candidate per domain (the highest ranked), at most `maxResults`.
 */
export function toCandidates(
  hits: SearchHit[],
  maxResults: number,
  rejectDomains: readonly string[]
): Candidate[] {
  const seen = new Set<string>();
  const candidates: Candidate[] = [];

  hits.forEach((hit, index) => {
    if (candidates.length >= maxResults) return;
    const domain = getDomain(hit.url);
    if (!domain) return;
    if (isRejected(domain, rejectDomains)) {
      log.debug(`Skipping rejected domain ${domain}`);
      return;
    }
    if (seen.has(domain)) return;
    seen.add(domain);
    candidates.push(
      Object.freeze({
        url: hit.url,
        rank: index + 1,
        domain,
        title: hit.title,
        snippet: hit.snippet
      })
    );
  });

  return candidates;
}

export class QueryResolver {
  private backends: SearchBackend[];
  private rejectDomains: readonly string[];

  constructor(backends: SearchBackend[], options: QueryResolverOptions) {
    this.backends = backends;
    this.rejectDomains = options.rejectDomains;
  }

  /** Never throws; an unreachable or broken backend yields an empty list. */
  async resolve(query: string, maxResults: number, signal?: AbortSignal): Promise<Candidate[]> {
    const { candidates } = await this.resolveDetailed(query, maxResults, signal);
    return candidates;
  }

  async resolveDetailed(query: string, maxResults: number, signal?: AbortSignal): Promise<Resolution> {
    let answered = false;

    for (const backend of this.backends) {
      if (signal?.aborted) break;
      try {
        // Ask for extra hits: dedup and the reject list thin the list out.
        const hits = await backend.search({ query, limit: maxResults * 3, signal });
        answered = true;
        const candidates = toCandidates(hits, maxResults, this.rejectDomains);
        log.info(
          `${backend.name} returned ${hits.length} hits for "${query}", ${candidates.length} candidates after filtering.`
        );
        if (candidates.length > 0) {
          return { status: 'ok', candidates, backend: backend.name };
        }
      } catch (error) {
        log.warn(`${backend.name} search failed for "${query}": ${describeError(error)}`);
      }
    }

    return { status: answered ? 'empty' : 'unavailable', candidates: [] };
  }
}
