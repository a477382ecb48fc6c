import { setTimeout as sleep } from 'node:timers/promises';

import { toFlatRecords } from '../storage/flatten.js';
import { ResultStore } from '../storage/ResultStore.js';
import { FlatRecord, Session } from '../types.js';
import { logger } from '../utils/logger.js';

import { SessionOptions } from './PhaseSequencer.js';

export interface SessionRunner {
  run(query: string, options?: SessionOptions): Promise<Session>;
}

export interface BulkRunnerOptions {
  delayMs?: number;
  dryRun?: boolean;
  basename?: string;
  session?: SessionOptions;
}

export interface BulkSummary {
  sessions: Session[];
  records: FlatRecord[];
  succeeded: number;
  failed: number;
  files: string[];
}

const DEFAULT_OPTIONS: Required<Omit<BulkRunnerOptions, 'session'>> = {
  delayMs: 2_000,
  dryRun: false,
  basename: 'bulk_scraping_results'
};

const log = logger.child('bulk');

/**
 * Queries run one after another, never overlapping, with a pause in between.
 * The CSV grows after every query; the JSON is written once at the end.
 */
export class BulkRunner {
  private sequencer: SessionRunner;
  private resultStore: ResultStore;
  private options: Required<Omit<BulkRunnerOptions, 'session'>>;
  private sessionOptions: SessionOptions;

  constructor(sequencer: SessionRunner, resultStore?: ResultStore, options: BulkRunnerOptions = {}) {
    this.sequencer = sequencer;
    this.resultStore = resultStore ?? new ResultStore();
    const { session, ...rest } = options;
    this.options = { ...DEFAULT_OPTIONS, ...rest };
    this.sessionOptions = session ?? {};
  }

  async run(queries: string[]): Promise<BulkSummary> {
    const sessions: Session[] = [];
    const records: FlatRecord[] = [];
    const { basename, dryRun } = this.options;
    let csvPath: string | null = null;
    let succeeded = 0;

    for (const [index, query] of queries.entries()) {
      log.info(`[${index + 1}/${queries.length}] ${query}`);
      const session = await this.sequencer.run(query, this.sessionOptions);
      sessions.push(session);
      const rows = toFlatRecords(session);
      records.push(...rows);
      // Each query's rows hit the CSV as soon as it finishes, so an interrupted run keeps them.
      if (!dryRun) {
        csvPath = await this.resultStore.saveAsCsv(rows, `${basename}.csv`, csvPath !== null);
      }
      if (session.results.length > 0) {
        succeeded += 1;
      }
      log.info(`Progress: ${index + 1}/${queries.length}, ${succeeded} succeeded, ${index + 1 - succeeded} failed.`);

      if (index < queries.length - 1 && this.options.delayMs > 0) {
        await sleep(this.options.delayMs);
      }
    }

    const files = csvPath === null ? [] : [csvPath, this.resultStore.saveAsJson(records, `${basename}.json`)];
    return { sessions, records, succeeded, failed: queries.length - succeeded, files };
  }
}
