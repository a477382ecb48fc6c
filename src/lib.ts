export { appConfig, createScraperConfig, DEFAULT_PHASES, loadRejectDomains } from './config.js';
export type { ScraperConfig } from './config.js';
export * from './errors.js';
export type * from './types.js';
export { TIER_ORDER } from './types.js';

export { ContentExtractor, detectPageType } from './extractors/ContentExtractor.js';
export type { Extraction, ParsedPage, ReadableText } from './extractors/ContentExtractor.js';

export { detectBlockPage, HttpClient } from './scrapers/HttpClient.js';
export type { FetchLike, HtmlDocument, HttpClientOptions } from './scrapers/HttpClient.js';
export type { PageRenderer, RenderOptions } from './scrapers/PageRenderer.js';
export { PlaywrightRenderer } from './scrapers/PlaywrightRenderer.js';
export { allowsTier, TieredFetcher } from './scrapers/TieredFetcher.js';
export type { CandidateFetcher, FetchOptions } from './scrapers/TieredFetcher.js';

export { DuckDuckGoBackend, parseDuckDuckGoResults } from './search/DuckDuckGoBackend.js';
export { QueryResolver, toCandidates } from './search/QueryResolver.js';
export type { Resolution, ResolutionStatus } from './search/QueryResolver.js';
export type { SearchBackend, SearchRequest } from './search/SearchBackend.js';
export { SearxngBackend } from './search/SearxngBackend.js';

export { BatchJob } from './pipeline/BatchJob.js';
export { BulkRunner } from './pipeline/BulkRunner.js';
export type { BulkSummary, SessionRunner } from './pipeline/BulkRunner.js';
export { Dispatcher } from './pipeline/Dispatcher.js';
export type { DispatchOptions } from './pipeline/Dispatcher.js';
export { createPhaseSequencer, PhaseSequencer } from './pipeline/PhaseSequencer.js';
export type { SessionOptions } from './pipeline/PhaseSequencer.js';

export { formatTimestamp, toFlatRecords } from './storage/flatten.js';
export { ResultStore } from './storage/ResultStore.js';
export { createLogger, logger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
