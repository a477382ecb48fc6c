import { describe, expect, it } from 'vitest';

import { Dispatcher } from '../src/pipeline/Dispatcher.js';
import { HttpClient } from '../src/scrapers/HttpClient.js';
import { PageRenderer, RenderOptions } from '../src/scrapers/PageRenderer.js';
import { TieredFetcher } from '../src/scrapers/TieredFetcher.js';

import { ARTICLE_HTML, hangingFetch, makeCandidate, ScriptedFetcher } from './helpers.js';

class QuickRenderer implements PageRenderer {
  calls: RenderOptions[] = [];

  async render(_url: string, options: RenderOptions): Promise<string> {
    this.calls.push(options);
    return ARTICLE_HTML;
  }

  async close(): Promise<void> {
    return undefined;
  }
}

const sites = ['s1', 's2', 's3', 's4', 's5'].map((name, index) => makeCandidate(`https://${name}.com/`, index + 1));

describe('Dispatcher', () => {
  it('returns as soon as the quota is met and cancels the rest', async () => {
    const fetcher = new ScriptedFetcher({
      's1.com': { delayMs: 10, outcome: 'success' },
      's2.com': { delayMs: 2_000, outcome: 'success' },
      's3.com': { delayMs: 30, outcome: 'success' },
      's4.com': { delayMs: 2_000, outcome: 'success' },
      's5.com': { delayMs: 2_000, outcome: 'success' }
    });
    const dispatcher = new Dispatcher(fetcher, { maxWorkers: 5 });
    const startedAt = Date.now();

    const report = await dispatcher.dispatch(sites, { quota: 2, perSiteTimeoutMs: 5_000, ceiling: 'extracted' });

    expect(Date.now() - startedAt).toBeLessThan(1_000);
    expect(report.endedBy).toBe('quota');
    expect(report.results.map((result) => result.domain)).toEqual(['s1.com', 's3.com']);
    expect(report.abandoned.map((candidate) => candidate.domain)).toEqual(['s2.com', 's4.com', 's5.com']);
    expect([...fetcher.cancelled].sort()).toEqual(['s2.com', 's4.com', 's5.com']);
    expect(report.attempts).toHaveLength(2);
  });

  it('keeps results in completion order', async () => {
    const fetcher = new ScriptedFetcher({
      's1.com': { delayMs: 40, outcome: 'success' },
      's2.com': { delayMs: 5, outcome: 'success' }
    });
    const dispatcher = new Dispatcher(fetcher);

    const report = await dispatcher.dispatch(sites.slice(0, 2), { quota: 2, perSiteTimeoutMs: 1_000, ceiling: 'direct' });

    expect(report.results.map((result) => result.domain)).toEqual(['s2.com', 's1.com']);
    expect(report.endedBy).toBe('quota');
  });

  it('never returns more results than the quota', async () => {
    const candidates = ['a', 'b', 'c', 'd', 'e', 'f'].map((name) => makeCandidate(`https://${name}.com/`));
    const script = Object.fromEntries(
      candidates.map((candidate) => [candidate.domain, { delayMs: 5, outcome: 'success' as const }])
    );
    const dispatcher = new Dispatcher(new ScriptedFetcher(script), { maxWorkers: 6 });

    const report = await dispatcher.dispatch(candidates, { quota: 3, perSiteTimeoutMs: 1_000, ceiling: 'direct' });

    expect(report.results).toHaveLength(3);
    expect(report.attempts).toHaveLength(3);
  });

  it('caps concurrency at maxWorkers', async () => {
    const script = Object.fromEntries(sites.map((site) => [site.domain, { delayMs: 15, outcome: 'success' as const }]));
    const fetcher = new ScriptedFetcher(script);
    const dispatcher = new Dispatcher(fetcher, { maxWorkers: 2 });

    const report = await dispatcher.dispatch(sites, { quota: 5, perSiteTimeoutMs: 2_000, ceiling: 'direct' });

    expect(fetcher.maxActive).toBe(2);
    expect(report.results).toHaveLength(5);
  });

  it('returns what it has when the batch deadline passes', async () => {
    const fetcher = new ScriptedFetcher({
      's1.com': { delayMs: 5, outcome: 'success' },
      's2.com': { delayMs: 2_000, outcome: 'success' },
      's3.com': { delayMs: 2_000, outcome: 'success' }
    });
    const dispatcher = new Dispatcher(fetcher);
    const startedAt = Date.now();

    const report = await dispatcher.dispatch(sites.slice(0, 3), {
      quota: 2,
      perSiteTimeoutMs: 60,
      ceiling: 'direct',
      deadlineMs: 60
    });

    expect(Date.now() - startedAt).toBeLessThan(1_000);
    expect(report.endedBy).toBe('deadline');
    expect(report.results.map((result) => result.domain)).toEqual(['s1.com']);
    expect(report.abandoned.map((candidate) => candidate.domain)).toEqual(['s2.com', 's3.com']);
  });

  it('ends as exhausted when every candidate fails', async () => {
    const fetcher = new ScriptedFetcher({
      's1.com': { delayMs: 5, outcome: 'blocked' },
      's2.com': { delayMs: 10, outcome: 'timeout' },
      's3.com': { delayMs: 1, outcome: 'non_html' }
    });
    const dispatcher = new Dispatcher(fetcher);

    const report = await dispatcher.dispatch(sites.slice(0, 3), { quota: 1, perSiteTimeoutMs: 1_000, ceiling: 'direct' });

    expect(report.endedBy).toBe('exhausted');
    expect(report.results).toEqual([]);
    expect(report.abandoned).toEqual([]);
    expect(report.attempts.map((attempt) => attempt.outcome.status === 'failed' && attempt.outcome.reason)).toEqual([
      'non_html',
      'blocked',
      'timeout'
    ]);
  });

  it('absorbs a fetcher that throws', async () => {
    const fetcher = new ScriptedFetcher({
      's1.com': { delayMs: 1, outcome: 'throw' },
      's2.com': { delayMs: 5, outcome: 'success' }
    });
    const dispatcher = new Dispatcher(fetcher);

    const report = await dispatcher.dispatch(sites.slice(0, 2), { quota: 2, perSiteTimeoutMs: 1_000, ceiling: 'direct' });

    expect(report.endedBy).toBe('exhausted');
    expect(report.results.map((result) => result.domain)).toEqual(['s2.com']);
    expect(report.attempts[0].outcome).toEqual({
      status: 'failed',
      reason: 'extraction_failed',
      detail: 'scripted failure for s1.com'
    });
  });

  it('stops when the parent signal aborts', async () => {
    const fetcher = new ScriptedFetcher({
      's1.com': { delayMs: 2_000, outcome: 'success' },
      's2.com': { delayMs: 2_000, outcome: 'success' }
    });
    const dispatcher = new Dispatcher(fetcher);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const report = await dispatcher.dispatch(sites.slice(0, 2), {
      quota: 1,
      perSiteTimeoutMs: 5_000,
      ceiling: 'direct',
      signal: controller.signal
    });

    expect(report.endedBy).toBe('cancelled');
    expect(report.results).toEqual([]);
    expect([...fetcher.cancelled].sort()).toEqual(['s1.com', 's2.com']);
  });

  it('reports a parent timeout as a deadline', async () => {
    const fetcher = new ScriptedFetcher({ 's1.com': { delayMs: 2_000, outcome: 'success' } });
    const dispatcher = new Dispatcher(fetcher);

    const report = await dispatcher.dispatch(sites.slice(0, 1), {
      quota: 1,
      perSiteTimeoutMs: 5_000,
      ceiling: 'direct',
      signal: AbortSignal.timeout(20)
    });

    expect(report.endedBy).toBe('deadline');
  });

  it('does nothing for a zero quota or an empty batch', async () => {
    const fetcher = new ScriptedFetcher({});
    const dispatcher = new Dispatcher(fetcher);

    const zeroQuota = await dispatcher.dispatch(sites, { quota: 0, perSiteTimeoutMs: 1_000, ceiling: 'direct' });
    const empty = await dispatcher.dispatch([], { quota: 2, perSiteTimeoutMs: 1_000, ceiling: 'direct' });

    expect(zeroQuota.results).toEqual([]);
    expect(empty.endedBy).toBe('exhausted');
    expect(fetcher.started).toEqual([]);
  });

  it('reaches the render tier when the direct GET hangs', async () => {
    const renderer = new QuickRenderer();
    const fetcher = new TieredFetcher(
      { httpClient: new HttpClient({ userAgent: 'test-agent', fetchImpl: hangingFetch }), renderer },
      { settleMs: 10 }
    );
    const dispatcher = new Dispatcher(fetcher);

    const report = await dispatcher.dispatch(sites.slice(0, 1), { quota: 1, perSiteTimeoutMs: 200, ceiling: 'rendered' });

    expect(report.endedBy).toBe('quota');
    expect(renderer.calls).toHaveLength(1);
    expect(report.results.map((result) => result.method)).toEqual(['rendered']);
    expect(report.attempts.map((attempt) => attempt.tiers)).toEqual([['direct', 'rendered']]);
  });
});
