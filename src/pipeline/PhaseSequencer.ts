import { v4 as uuidv4 } from 'uuid';

import { appConfig, ScraperConfig } from '../config.js';
import { ContentExtractor } from '../extractors/ContentExtractor.js';
import { HttpClient } from '../scrapers/HttpClient.js';
import { PageRenderer } from '../scrapers/PageRenderer.js';
import { PlaywrightRenderer } from '../scrapers/PlaywrightRenderer.js';
import { TieredFetcher } from '../scrapers/TieredFetcher.js';
import { DuckDuckGoBackend } from '../search/DuckDuckGoBackend.js';
import { QueryResolver } from '../search/QueryResolver.js';
import { SearchBackend } from '../search/SearchBackend.js';
import { SearxngBackend } from '../search/SearxngBackend.js';
import {
  BatchReport,
  Candidate,
  ScrapeResult,
  Session,
  SessionFailure,
  SessionStatus
} from '../types.js';
import { logger } from '../utils/logger.js';

import { Dispatcher } from './Dispatcher.js';

export interface SessionOptions {
  quota?: number;
  globalTimeoutMs?: number;
  maxResults?: number;
  signal?: AbortSignal;
}

export interface PhaseSequencerDependencies {
  resolver: QueryResolver;
  dispatcher: Dispatcher;
  renderer?: PageRenderer | null;
}

const log = logger.child('session');

/**
 * Runs one query end to end: resolve candidates, then walk the configured
 * phases over fresh domains until the quota is met or the global deadline hits.
 */
export class PhaseSequencer {
  private config: ScraperConfig;
  private resolver: QueryResolver;
  private dispatcher: Dispatcher;
  private renderer: PageRenderer | null;

  constructor(config: ScraperConfig, dependencies: PhaseSequencerDependencies) {
    this.config = config;
    this.resolver = dependencies.resolver;
    this.dispatcher = dependencies.dispatcher;
    this.renderer = dependencies.renderer ?? null;
  }

  async run(query: string, options: SessionOptions = {}): Promise<Session> {
    const id = uuidv4();
    const started = Date.now();
    const startedAt = new Date(started).toISOString();
    const quota = options.quota ?? this.config.quota;
    const globalTimeoutMs = options.globalTimeoutMs ?? this.config.globalTimeoutMs;
    const maxResults = options.maxResults ?? this.config.maxSearchResults;

    const deadline = AbortSignal.timeout(globalTimeoutMs);
    const signal = options.signal ? AbortSignal.any([deadline, options.signal]) : deadline;

    const batches: BatchReport[] = [];
    const results: ScrapeResult[] = [];
    let candidates: Candidate[] = [];

    const finish = (status: SessionStatus, failure?: SessionFailure): Session => {
      const finished = Date.now();
      const session: Session = Object.freeze({
        id,
        query,
        quota,
        startedAt,
        finishedAt: new Date(finished).toISOString(),
        elapsedMs: finished - started,
        candidates: Object.freeze([...candidates]),
        batches: Object.freeze([...batches]),
        results: Object.freeze([...results]),
        status,
        ...(failure ? { failure } : {})
      });
      const summary = `"${query}": ${status}${failure ? ` (${failure})` : ''}, ${results.length}/${quota} results in ${session.elapsedMs}ms.`;
      if (status === 'failed') {
        log.warn(summary);
      } else {
        log.success(summary);
      }
      return session;
    };

    log.info(`Session ${id} for "${query}" (quota ${quota}, budget ${globalTimeoutMs}ms).`);

    const resolution = await this.resolver.resolveDetailed(query, maxResults, signal);
    candidates = resolution.candidates;
    if (resolution.status === 'unavailable') {
      return finish('failed', signal.aborted ? 'deadline_exceeded' : 'search_failed');
    }
    if (candidates.length === 0) {
      return finish('failed', signal.aborted ? 'deadline_exceeded' : 'no_candidates');
    }

    const attempted = new Set<string>();
    for (const phase of this.config.phases) {
      if (results.length >= quota) break;
      if (signal.aborted) {
        log.warn(`Global deadline reached; skipping phase ${phase.name} and later.`);
        break;
      }

      const fresh = candidates.filter((candidate) => !attempted.has(candidate.domain)).slice(0, phase.take);
      if (fresh.length === 0) {
        log.debug(`No untried candidates left for phase ${phase.name}.`);
        break;
      }
      fresh.forEach((candidate) => attempted.add(candidate.domain));

      const needed = quota - results.length;
      log.info(
        `Phase ${phase.name}: ${fresh.length} candidates, need ${needed}, ` +
          `${phase.perSiteTimeoutMs}ms per site, up to ${phase.ceiling}.`
      );
      const report = await this.dispatcher.dispatch(fresh, {
        name: phase.name,
        quota: needed,
        perSiteTimeoutMs: phase.perSiteTimeoutMs,
        ceiling: phase.ceiling,
        signal
      });
      batches.push(report);
      results.push(...report.results.slice(0, needed));
    }

    if (results.length >= quota) {
      return finish('complete');
    }
    const failure: SessionFailure = signal.aborted ? 'deadline_exceeded' : 'all_candidates_exhausted';
    return finish(results.length > 0 ? 'partial' : 'failed', failure);
  }

  /** Releases the headless browser, if one was ever launched. */
  async close(): Promise<void> {
    await this.renderer?.close();
  }
}

function createBackends(config: ScraperConfig): SearchBackend[] {
  return config.backends.map((name) =>
    name === 'searxng'
      ? new SearxngBackend({
          baseUrl: config.searxngUrl,
          userAgent: config.userAgent,
          timeoutMs: config.searchTimeoutMs
        })
      : new DuckDuckGoBackend({ userAgent: config.userAgent, timeoutMs: config.searchTimeoutMs })
  );
}

/** Wires the default network stack around a config. */
export function createPhaseSequencer(config: ScraperConfig): PhaseSequencer {
  const renderer = config.enableRender
    ? new PlaywrightRenderer({
        userAgent: config.userAgent,
        ...(appConfig.chromiumPath ? { executablePath: appConfig.chromiumPath } : {})
      })
    : null;
  const fetcher = new TieredFetcher(
    {
      httpClient: new HttpClient({ userAgent: config.userAgent, minBodyBytes: config.minBodyBytes }),
      extractor: new ContentExtractor({ minContentLength: config.minContentLength }),
      renderer
    },
    { minExtractedLength: config.minExtractedLength, settleMs: config.settleMs }
  );
  return new PhaseSequencer(config, {
    resolver: new QueryResolver(createBackends(config), { rejectDomains: config.rejectDomains }),
    dispatcher: new Dispatcher(fetcher, { maxWorkers: config.maxWorkers }),
    renderer
  });
}
