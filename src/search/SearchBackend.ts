import { BackendName, SearchHit } from '../types.js';

export interface SearchRequest {
  query: string;
  limit: number;
  signal?: AbortSignal;
}

/**
 * A search provider. Implementations return hits in rank order and throw
 * `SearchUnavailableError` when the provider cannot be reached or answers garbage.
 */
export interface SearchBackend {
  readonly name: BackendName;
  search(request: SearchRequest): Promise<SearchHit[]>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}
