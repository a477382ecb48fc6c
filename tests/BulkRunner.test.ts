import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { BulkRunner, SessionRunner } from '../src/pipeline/BulkRunner.js';
import { SessionOptions } from '../src/pipeline/PhaseSequencer.js';
import { ResultStore } from '../src/storage/ResultStore.js';
import { Session } from '../src/types.js';
import { parseQueries } from '../src/utils/queries.js';

import { fakeResult, makeCandidate } from './helpers.js';

class StubSequencer implements SessionRunner {
  calls: Array<{ query: string; options?: SessionOptions }> = [];

  async run(query: string, options?: SessionOptions): Promise<Session> {
    this.calls.push({ query, options });
    const found = query.startsWith('good');
    return {
      id: `id-${this.calls.length}`,
      query,
      quota: 1,
      startedAt: '2024-01-01T00:00:00.000Z',
      finishedAt: '2024-01-01T00:00:01.000Z',
      elapsedMs: 1_000,
      candidates: [],
      batches: [],
      results: found ? [fakeResult(makeCandidate(`https://${query.replace(/\s+/g, '-')}.com/`))] : [],
      status: found ? 'complete' : 'failed',
      ...(found ? {} : { failure: 'no_candidates' as const })
    };
  }
}

describe('BulkRunner', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = mkdtempSync(join(tmpdir(), 'bulk-runner-'));
  });

  afterEach(() => {
    rmSync(outputDir, { recursive: true, force: true });
  });

  it('runs queries in order and counts outcomes', async () => {
    const sequencer = new StubSequencer();
    const runner = new BulkRunner(sequencer, new ResultStore({ outputDir }), {
      delayMs: 0,
      dryRun: true,
      session: { quota: 1 }
    });

    const summary = await runner.run(['good one', 'bad one', 'good two']);

    expect(sequencer.calls).toEqual([
      { query: 'good one', options: { quota: 1 } },
      { query: 'bad one', options: { quota: 1 } },
      { query: 'good two', options: { quota: 1 } }
    ]);
    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.records.map((record) => [record.query, record.status])).toEqual([
      ['good one', 'SUCCESS'],
      ['bad one', 'FAILED'],
      ['good two', 'SUCCESS']
    ]);
    expect(summary.files).toEqual([]);
  });

  it('saves the rows unless running dry', async () => {
    const runner = new BulkRunner(new StubSequencer(), new ResultStore({ outputDir }), {
      delayMs: 1,
      basename: 'bulk'
    });

    const summary = await runner.run(['good one', 'bad one']);

    expect(summary.files).toEqual([join(outputDir, 'bulk.csv'), join(outputDir, 'bulk.json')]);
    expect(readFileSync(summary.files[0], 'utf8').trim().split('\n')).toHaveLength(3);
  });

  it('writes each query to the CSV before starting the next', async () => {
    const csvPath = join(outputDir, 'bulk.csv');
    const seenBeforeSecond: boolean[] = [];
    const stub = new StubSequencer();
    const crashing: SessionRunner = {
      run: async (query, options) => {
        if (query === 'crash') {
          seenBeforeSecond.push(existsSync(csvPath));
          throw new Error('interrupted');
        }
        return stub.run(query, options);
      }
    };
    const runner = new BulkRunner(crashing, new ResultStore({ outputDir }), { delayMs: 0, basename: 'bulk' });

    await expect(runner.run(['good one', 'crash'])).rejects.toThrow('interrupted');

    expect(seenBeforeSecond).toEqual([true]);
    const lines = readFileSync(csvPath, 'utf8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[1].startsWith('good one,1,https://good-one.com/,direct,good-one.com,generic,Title of good-one.com,')).toBe(
      true
    );
    expect(existsSync(join(outputDir, 'bulk.json'))).toBe(false);
  });
});

describe('parseQueries', () => {
  it('reads JSON arrays of strings or query objects', () => {
    const content = JSON.stringify(['first', { query: ' second ' }, { term: 'ignored' }, 42, '']);
    expect(parseQueries(content, 'queries.json')).toEqual(['first', 'second']);
  });

  it('rejects JSON that is not an array', () => {
    expect(() => parseQueries('{"query": "x"}', 'queries.json')).toThrow('queries.json must be a JSON array of queries.');
  });

  it('reads the query column of a CSV with a header', () => {
    const content = 'id,query\n1,"Kettle, 1.7L"\n2,Trail shoes\n';
    expect(parseQueries(content, 'list.csv')).toEqual(['Kettle, 1.7L', 'Trail shoes']);
  });

  it('reads the first column of a CSV without a header', () => {
    expect(parseQueries('Trail shoes,extra\nRain jacket\n', 'list.CSV')).toEqual(['Trail shoes', 'Rain jacket']);
  });

  it('reads plain text line by line, skipping blanks and comments', () => {
    expect(parseQueries('# products\nTrail shoes\n\n  Rain jacket  \r\n', 'list.txt')).toEqual([
      'Trail shoes',
      'Rain jacket'
    ]);
  });
});
