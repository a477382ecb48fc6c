import { FlatRecord, ScrapeResult, Session } from '../types.js';

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/** `YYYY-MM-DD HH:mm:ss` in local time. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function serializeContent(result: ScrapeResult): string {
  return JSON.stringify({ title: result.title, domain: result.domain, url: result.url, ...result.payload });
}

/**
 * One row per distinct result URL, numbered from 1. A session without
 * results still gets a single FAILED row so every query shows up in the output.
 */
export function toFlatRecords(session: Session, now: Date = new Date()): FlatRecord[] {
  const totalTime = (session.elapsedMs / 1000).toFixed(2);
  const timestamp = formatTimestamp(now);
  const failure = session.failure ?? '';

  const seen = new Set<string>();
  const unique = session.results.filter((result) => {
    if (seen.has(result.url)) return false;
    seen.add(result.url);
    return true;
  });

  if (unique.length === 0) {
    return [
      {
        query: session.query,
        siteIndex: 0,
        url: '',
        method: '',
        domain: '',
        contentType: '',
        title: '',
        scrapedContent: '',
        totalTime,
        status: 'FAILED',
        failure,
        timestamp
      }
    ];
  }

  return unique.map((result, index) => ({
    query: session.query,
    siteIndex: index + 1,
    url: result.url,
    method: result.method,
    domain: result.domain,
    contentType: result.payload.kind,
    title: result.title,
    scrapedContent: serializeContent(result),
    totalTime,
    status: 'SUCCESS',
    failure,
    timestamp
  }));
}
