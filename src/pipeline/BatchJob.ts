import { BatchEnd, BatchReport, Candidate, FetchAttempt, ScrapeResult, Tier } from '../types.js';

export interface BatchJobOptions {
  name: string;
  candidates: Candidate[];
  quota: number;
  perSiteTimeoutMs: number;
  ceiling: Tier;
  deadlineMs: number;
  parentSignal?: AbortSignal;
}

function endFromParent(signal: AbortSignal): BatchEnd {
  const reason: unknown = signal.reason;
  const isTimeout =
    typeof reason === 'object' && reason !== null && 'name' in reason && reason.name === 'TimeoutError';
  return isTimeout ? 'deadline' : 'cancelled';
}

/**
 * One dispatch: a set of candidates sharing a deadline, a quota and a single
 * cancellation signal. The job settles exactly once, on whichever comes first
 * of quota, deadline, parent abort, or every attempt having reported.
 */
export class BatchJob {
  readonly name: string;
  readonly quota: number;

  private controller = new AbortController();
  private options: BatchJobOptions;
  private startedAt = Date.now();
  private attempts: FetchAttempt[] = [];
  private results: ScrapeResult[] = [];
  private settled = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private resolveDone: (report: BatchReport) => void = () => undefined;
  private onParentAbort = () => {
    if (this.options.parentSignal) {
      this.settle(endFromParent(this.options.parentSignal));
    }
  };

  readonly done: Promise<BatchReport>;

  constructor(options: BatchJobOptions) {
    this.options = options;
    this.name = options.name;
    this.quota = options.quota;
    this.done = new Promise<BatchReport>((resolve) => {
      this.resolveDone = resolve;
    });

    const { parentSignal } = options;
    if (parentSignal?.aborted) {
      this.settle(endFromParent(parentSignal));
      return;
    }
    parentSignal?.addEventListener('abort', this.onParentAbort, { once: true });
    this.timer = setTimeout(() => this.settle('deadline'), options.deadlineMs);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isSettled(): boolean {
    return this.settled;
  }

  /**
   * Appends a finished attempt and checks the quota in the same step.
   * Returns false when the job had already settled and the attempt was dropped.
   */
  record(attempt: FetchAttempt): boolean {
    if (this.settled) {
      return false;
    }
    this.attempts.push(attempt);
    if (attempt.outcome.status === 'success') {
      this.results.push(attempt.outcome.result);
      if (this.results.length >= this.quota) {
        this.settle('quota');
        return true;
      }
    }
    if (this.attempts.length >= this.options.candidates.length) {
      this.settle('exhausted');
    }
    return true;
  }

  /** Called once the pool has drained; a no-op if something else settled first. */
  exhaust(): void {
    this.settle('exhausted');
  }

  private settle(endedBy: BatchEnd) {
    if (this.settled) {
      return;
    }
    this.settled = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.options.parentSignal?.removeEventListener('abort', this.onParentAbort);
    this.controller.abort(new Error(`batch ${this.name} ended: ${endedBy}`));

    const reported = new Set(this.attempts.map((attempt) => attempt.candidate.domain));
    this.resolveDone({
      name: this.name,
      ceiling: this.options.ceiling,
      perSiteTimeoutMs: this.options.perSiteTimeoutMs,
      quota: this.quota,
      candidates: [...this.options.candidates],
      results: [...this.results],
      attempts: [...this.attempts],
      abandoned: this.options.candidates.filter((candidate) => !reported.has(candidate.domain)),
      endedBy,
      elapsedMs: Date.now() - this.startedAt
    });
  }
}
