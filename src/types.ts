export type Tier = 'direct' | 'extracted' | 'rendered';

export const TIER_ORDER: readonly Tier[] = ['direct', 'extracted', 'rendered'];

export type FailureReason = 'timeout' | 'blocked' | 'non_html' | 'extraction_failed' | 'cancelled';

export type BackendName = 'searxng' | 'duckduckgo';

export interface SearchHit {
  title: string;
  url: string;
  snippet: string;
}

export interface Candidate {
  readonly url: string;
  readonly rank: number;
  readonly domain: string;
  readonly title: string;
  readonly snippet: string;
}

export interface KeySection {
  heading: string;
  content: string;
}

export interface GenericPayload {
  kind: 'generic';
  summary: string;
  mainContent: string;
  keySections: KeySection[];
  importantDetails: string[];
}

export interface ProductPayload {
  kind: 'product';
  price?: string;
  rating?: string;
  keyFeatures: string[];
  description?: string;
  specs: Record<string, string>;
}

export interface EncyclopediaPayload {
  kind: 'encyclopedia';
  summary: string;
  keySections: string[];
}

export interface ForumPayload {
  kind: 'forum';
  question: string;
  topAnswers: string[];
  tags: string[];
}

export interface VideoPayload {
  kind: 'video';
  description: string;
  duration?: string;
  views?: string;
}

export type PagePayload =
  | GenericPayload
  | ProductPayload
  | EncyclopediaPayload
  | ForumPayload
  | VideoPayload;

export type PageType = PagePayload['kind'];

export interface ScrapeResult {
  readonly candidate: Candidate;
  readonly url: string;
  readonly domain: string;
  readonly title: string;
  readonly method: Tier;
  readonly contentType: string;
  readonly fetchedAt: string;
  readonly elapsedMs: number;
  readonly body: string;
  readonly payload: Readonly<PagePayload>;
}

export type FetchOutcome =
  | { status: 'success'; result: ScrapeResult }
  | { status: 'failed'; reason: FailureReason; detail?: string };

export interface FetchAttempt {
  candidate: Candidate;
  tiers: Tier[];
  elapsedMs: number;
  outcome: FetchOutcome;
}

export interface PhaseDefinition {
  name: string;
  take: number;
  perSiteTimeoutMs: number;
  ceiling: Tier;
}

export type BatchEnd = 'quota' | 'deadline' | 'exhausted' | 'cancelled';

export interface BatchReport {
  name: string;
  ceiling: Tier;
  perSiteTimeoutMs: number;
  quota: number;
  candidates: Candidate[];
  results: ScrapeResult[];
  attempts: FetchAttempt[];
  abandoned: Candidate[];
  endedBy: BatchEnd;
  elapsedMs: number;
}

export type SessionStatus = 'complete' | 'partial' | 'failed';

export type SessionFailure =
  | 'search_failed'
  | 'no_candidates'
  | 'all_candidates_exhausted'
  | 'deadline_exceeded';

export interface Session {
  readonly id: string;
  readonly query: string;
  readonly quota: number;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly elapsedMs: number;
  readonly candidates: readonly Candidate[];
  readonly batches: readonly BatchReport[];
  readonly results: readonly ScrapeResult[];
  readonly status: SessionStatus;
  readonly failure?: SessionFailure;
}

// Alias, not interface: csv-writer takes index-signature rows.
export type FlatRecord = {
  query: string;
  siteIndex: number;
  url: string;
  method: string;
  domain: string;
  contentType: string;
  title: string;
  scrapedContent: string;
  totalTime: string;
  status: 'SUCCESS' | 'FAILED';
  failure: string;
  timestamp: string;
};
