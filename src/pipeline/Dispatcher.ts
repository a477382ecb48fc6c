import { PromisePool } from '@supercharge/promise-pool';

import { describeError } from '../errors.js';
import { CandidateFetcher } from '../scrapers/TieredFetcher.js';
import { BatchReport, Candidate, FetchAttempt, Tier } from '../types.js';
import { logger } from '../utils/logger.js';

import { BatchJob } from './BatchJob.js';

export interface DispatcherOptions {
  maxWorkers?: number;
  /** Added to the per-site timeout to get the default batch deadline. */
  deadlineGraceMs?: number;
  /** Same, for batches whose ceiling allows rendering. */
  renderGraceMs?: number;
}

export interface DispatchOptions {
  name?: string;
  quota: number;
  perSiteTimeoutMs: number;
  ceiling: Tier;
  /** Batch deadline; defaults to the per-site timeout plus a grace period. */
  deadlineMs?: number;
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: Required<DispatcherOptions> = {
  maxWorkers: 8,
  deadlineGraceMs: 1_000,
  renderGraceMs: 3_000
};

const log = logger.child('dispatcher');

function emptyReport(candidates: Candidate[], options: DispatchOptions): BatchReport {
  return {
    name: options.name ?? 'batch',
    ceiling: options.ceiling,
    perSiteTimeoutMs: options.perSiteTimeoutMs,
    quota: options.quota,
    candidates: [...candidates],
    results: [],
    attempts: [],
    abandoned: [...candidates],
    endedBy: 'exhausted',
    elapsedMs: 0
  };
}

/**
 * Fans a batch of candidates out to the fetcher with bounded concurrency and
 * resolves as soon as the quota is met, the deadline passes, or the pool drains.
 * Whatever is still in flight at that point is aborted and its result ignored.
 */
export class Dispatcher {
  private fetcher: CandidateFetcher;
  private options: Required<DispatcherOptions>;

  constructor(fetcher: CandidateFetcher, options: DispatcherOptions = {}) {
    this.fetcher = fetcher;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  dispatch(candidates: Candidate[], options: DispatchOptions): Promise<BatchReport> {
    if (candidates.length === 0 || options.quota <= 0) {
      return Promise.resolve(emptyReport(candidates, options));
    }

    const job = new BatchJob({
      name: options.name ?? 'batch',
      candidates,
      quota: options.quota,
      perSiteTimeoutMs: options.perSiteTimeoutMs,
      ceiling: options.ceiling,
      deadlineMs: options.deadlineMs ?? this.defaultDeadline(options),
      parentSignal: options.signal
    });
    const concurrency = Math.min(candidates.length, this.options.maxWorkers);
    log.debug(`${job.name}: ${candidates.length} candidates, quota ${job.quota}, ${concurrency} workers.`);

    const pool = PromisePool.withConcurrency(concurrency)
      .for(candidates)
      .process(async (candidate) => {
        if (job.isSettled) {
          return;
        }
        let attempt: FetchAttempt;
        try {
          attempt = await this.fetcher.attempt(candidate, {
            timeoutMs: options.perSiteTimeoutMs,
            ceiling: options.ceiling,
            signal: job.signal
          });
        } catch (error) {
          attempt = {
            candidate,
            tiers: [],
            elapsedMs: 0,
            outcome: { status: 'failed', reason: 'extraction_failed', detail: describeError(error) }
          };
        }
        if (!job.record(attempt)) {
          log.debug(`${job.name}: dropped late result from ${candidate.domain}.`);
        }
      });

    void pool.then(
      () => job.exhaust(),
      (error: unknown) => {
        log.error(`${job.name}: worker pool failed.`, error);
        job.exhaust();
      }
    );

    return job.done.then((report) => {
      log.info(
        `${report.name}: ${report.results.length}/${report.quota} results from ${report.attempts.length} attempts ` +
          `(${report.abandoned.length} abandoned), ended by ${report.endedBy} after ${report.elapsedMs}ms.`
      );
      return report;
    });
  }

  /** Strictly longer than any single attempt, so the last tier can report its own timeout. */
  private defaultDeadline({ perSiteTimeoutMs, ceiling }: DispatchOptions): number {
    const grace = ceiling === 'rendered' ? this.options.renderGraceMs : this.options.deadlineGraceMs;
    return perSiteTimeoutMs + grace;
  }
}
