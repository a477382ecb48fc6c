import { RequestInit, Response } from 'node-fetch';

import { FetchLike } from '../src/scrapers/HttpClient.js';
import { CandidateFetcher, FetchOptions } from '../src/scrapers/TieredFetcher.js';
import { Candidate, FailureReason, FetchAttempt, ScrapeResult, Tier } from '../src/types.js';
import { getDomain } from '../src/utils/url.js';

export const ARTICLE_P1 =
  'Trail shoes need a grippy outsole, a protective toe cap and a snug heel so that your foot stays put on rough descents.';
export const ARTICLE_P2 = 'Weight: 280 grams per shoe in a typical size.';

export const ARTICLE_HTML = `<!doctype html>
<html>
  <head>
    <title>Trail Running Shoes Guide</title>
    <meta name="description" content="A guide to picking trail shoes.">
  </head>
  <body>
    <nav>Home | Shop</nav>
    <article>
      <h2>Choosing a pair</h2>
      <p>${ARTICLE_P1}</p>
      <p>${ARTICLE_P2}</p>
    </article>
  </body>
</html>`;

const PLAIN_SENTENCES = [
  'The harbour town sits at the mouth of a slow river, and most of its streets run downhill towards the old stone quay.',
  'Fishing boats still leave before dawn, although the catch is smaller now, and the market hall opens only on weekends.',
  'Visitors usually arrive by the coastal road, park near the chapel, and walk along the sea wall to the lighthouse.',
  'In winter the wind comes straight off the water, so the cafes close early, and the ferry runs twice a day at most.',
  'Local records describe the first bridge in some detail, including its timber piles, its toll house, and its repairs.'
];

/** No article/main element, no headings, no paragraphs: the direct parser finds nothing. */
export const DIV_ONLY_HTML = `<!doctype html>
<html>
  <head><title>Harbour Town Notes</title></head>
  <body>
    <div>
${PLAIN_SENTENCES.map((sentence) => `      <div>${sentence}</div>`).join('\n')}
    </div>
  </body>
</html>`;

export const PLAIN_FIRST_SENTENCE = PLAIN_SENTENCES[0];

export function makeCandidate(url: string, rank = 1): Candidate {
  return Object.freeze({ url, rank, domain: getDomain(url) ?? url, title: `Result ${rank}`, snippet: '' });
}

export interface ResponseSpec {
  status?: number;
  contentType?: string;
  server?: string;
}

export function htmlResponse(body: string, spec: ResponseSpec = {}): Response {
  const headers: Record<string, string> = { 'content-type': spec.contentType ?? 'text/html; charset=utf-8' };
  if (spec.server) {
    headers.server = spec.server;
  }
  return new Response(body, { status: spec.status ?? 200, headers });
}

export interface RecordedRequest {
  url: string;
  init?: RequestInit;
}

/** A fetch stand-in that answers from a handler and keeps every request. */
export function recordingFetch(handler: (url: string, init?: RequestInit) => Response | Promise<Response>) {
  const requests: RecordedRequest[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    requests.push({ url, init });
    return handler(url, init);
  };
  return { fetchImpl, requests };
}

/** Never answers; rejects once the request signal aborts. */
export const hangingFetch: FetchLike = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted.')));
  });

export function fakeResult(candidate: Candidate, method: Tier = 'direct'): ScrapeResult {
  return Object.freeze<ScrapeResult>({
    candidate,
    url: candidate.url,
    domain: candidate.domain,
    title: `Title of ${candidate.domain}`,
    method,
    contentType: 'text/html',
    fetchedAt: '2024-01-01T00:00:00.000Z',
    elapsedMs: 5,
    body: `Body of ${candidate.domain}`,
    payload: {
      kind: 'generic',
      summary: '',
      mainContent: `Body of ${candidate.domain}`,
      keySections: [],
      importantDetails: []
    }
  });
}

export interface ScriptStep {
  delayMs: number;
  outcome: 'success' | FailureReason | 'throw';
}

/**
 * Fetcher driven by a per-domain script. Each attempt settles after its delay
 * unless the signal aborts first, in which case it reports `cancelled`.
 */
export class ScriptedFetcher implements CandidateFetcher {
  started: string[] = [];
  cancelled: string[] = [];
  ceilings: Tier[] = [];
  active = 0;
  maxActive = 0;
  private script: Record<string, ScriptStep>;

  constructor(script: Record<string, ScriptStep>) {
    this.script = script;
  }

  attempt(candidate: Candidate, options: FetchOptions): Promise<FetchAttempt> {
    const step = this.script[candidate.domain] ?? { delayMs: 0, outcome: 'extraction_failed' };
    const { signal } = options;
    this.started.push(candidate.domain);
    this.ceilings.push(options.ceiling ?? 'rendered');
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);

    return new Promise<FetchAttempt>((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        this.active -= 1;
        this.cancelled.push(candidate.domain);
        resolve({ candidate, tiers: ['direct'], elapsedMs: 0, outcome: { status: 'failed', reason: 'cancelled' } });
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        this.active -= 1;
        if (step.outcome === 'throw') {
          reject(new Error(`scripted failure for ${candidate.domain}`));
        } else if (step.outcome === 'success') {
          resolve({
            candidate,
            tiers: ['direct'],
            elapsedMs: step.delayMs,
            outcome: { status: 'success', result: fakeResult(candidate) }
          });
        } else {
          resolve({
            candidate,
            tiers: ['direct'],
            elapsedMs: step.delayMs,
            outcome: { status: 'failed', reason: step.outcome }
          });
        }
      }, step.delayMs);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
