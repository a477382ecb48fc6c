import { extname } from 'node:path';

import { parse } from 'csv-parse/sync';

const QUERY_COLUMNS = ['query', 'queries', 'search', 'product', 'term'];

function fromJson(content: string, source: string): string[] {
  const parsed: unknown = JSON.parse(content);
  if (!Array.isArray(parsed)) {
    throw new Error(`${source} must be a JSON array of queries.`);
  }
  const items: unknown[] = parsed;
  const queries: string[] = [];
  for (const item of items) {
    if (typeof item === 'string') {
      queries.push(item);
    } else if (typeof item === 'object' && item !== null && 'query' in item && typeof item.query === 'string') {
      queries.push(item.query);
    }
  }
  return queries;
}

function fromCsv(content: string): string[] {
  const parsed: unknown = parse(content, {
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true
  });
  if (!Array.isArray(parsed)) {
    return [];
  }
  const items: unknown[] = parsed;
  const rows = items.filter((row): row is string[] => Array.isArray(row) && row.every((cell) => typeof cell === 'string'));
  if (rows.length === 0) {
    return [];
  }

  const header = rows[0].map((cell) => cell.toLowerCase());
  const column = header.findIndex((cell) => QUERY_COLUMNS.includes(cell));
  if (column >= 0) {
    return rows.slice(1).map((row) => row[column] ?? '');
  }
  return rows.map((row) => row[0] ?? '');
}

/**
 * Reads a list of queries. `.json` takes an array of strings or of
 * `{ query }` objects; `.csv` uses a `query`-like column when the header has
 * one, otherwise the first column; anything else is one query per line.
 */
export function parseQueries(content: string, source: string): string[] {
  const extension = extname(source).toLowerCase();
  let queries: string[];
  if (extension === '.json') {
    queries = fromJson(content, source);
  } else if (extension === '.csv') {
    queries = fromCsv(content);
  } else {
    queries = content.split(/\r?\n/);
  }
  return queries.map((query) => query.trim()).filter((query) => query.length > 0 && !query.startsWith('#'));
}
