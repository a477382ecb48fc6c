import { readFileSync } from 'node:fs';

import { config as loadDotenv } from 'dotenv';

import { BackendName, PhaseDefinition } from './types.js';

loadDotenv();

interface AppConfig {
  searxngUrl: string;
  userAgent: string | undefined;
  extraRejectDomains: string[];
  enableRender: boolean;
  maxWorkers: number | undefined;
  outputDir: string;
  chromiumPath: string | undefined;
}

function parseList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

function parsePositiveInt(value: string | undefined): number | undefined {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

export const appConfig: AppConfig = {
  searxngUrl: process.env.SEARXNG_URL ?? 'http://localhost:8888',
  userAgent: process.env.SCRAPER_USER_AGENT || undefined,
  extraRejectDomains: parseList(process.env.SCRAPER_REJECT_DOMAINS),
  enableRender: process.env.SCRAPER_ENABLE_RENDER !== 'false' && process.env.SCRAPER_ENABLE_RENDER !== '0',
  maxWorkers: parsePositiveInt(process.env.SCRAPER_MAX_WORKERS),
  outputDir: process.env.SCRAPER_OUTPUT_DIR ?? './output',
  chromiumPath: process.env.SCRAPER_CHROMIUM_PATH || undefined
};

export interface ScraperConfig {
  readonly searxngUrl: string;
  readonly userAgent: string;
  readonly backends: readonly BackendName[];
  readonly rejectDomains: readonly string[];
  readonly maxSearchResults: number;
  readonly searchTimeoutMs: number;
  readonly quota: number;
  readonly globalTimeoutMs: number;
  readonly maxWorkers: number;
  readonly minBodyBytes: number;
  readonly minContentLength: number;
  readonly minExtractedLength: number;
  readonly settleMs: number;
  readonly enableRender: boolean;
  readonly phases: readonly PhaseDefinition[];
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const DEFAULT_PHASES: readonly PhaseDefinition[] = [
  { name: 'quick', take: 8, perSiteTimeoutMs: 15_000, ceiling: 'extracted' },
  { name: 'wider', take: 5, perSiteTimeoutMs: 12_000, ceiling: 'extracted' },
  { name: 'rendered', take: 5, perSiteTimeoutMs: 20_000, ceiling: 'rendered' }
];

export function loadRejectDomains(): string[] {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../config/reject-domains.json', import.meta.url), 'utf8')
  );
  if (!Array.isArray(raw)) {
    throw new Error('config/reject-domains.json must be a JSON array of strings.');
  }
  return raw
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

/**
 * Builds the immutable configuration handed to the resolver, fetcher,
 * dispatcher and sequencer. Environment values fill the gaps left by overrides.
 */
export function createScraperConfig(overrides: Partial<ScraperConfig> = {}): ScraperConfig {
  const enableRender = overrides.enableRender ?? appConfig.enableRender;
  const phases = (overrides.phases ?? DEFAULT_PHASES).filter(
    (phase) => enableRender || phase.ceiling !== 'rendered'
  );
  const rejectDomains =
    overrides.rejectDomains ?? Array.from(new Set([...loadRejectDomains(), ...appConfig.extraRejectDomains]));

  const config: ScraperConfig = {
    searxngUrl: overrides.searxngUrl ?? appConfig.searxngUrl,
    userAgent: overrides.userAgent ?? appConfig.userAgent ?? DEFAULT_USER_AGENT,
    backends: overrides.backends ?? ['searxng', 'duckduckgo'],
    rejectDomains: Object.freeze([...rejectDomains]),
    maxSearchResults: overrides.maxSearchResults ?? 20,
    searchTimeoutMs: overrides.searchTimeoutMs ?? 15_000,
    quota: overrides.quota ?? 2,
    globalTimeoutMs: overrides.globalTimeoutMs ?? 60_000,
    maxWorkers: overrides.maxWorkers ?? appConfig.maxWorkers ?? 8,
    minBodyBytes: overrides.minBodyBytes ?? 100,
    minContentLength: overrides.minContentLength ?? 100,
    minExtractedLength: overrides.minExtractedLength ?? 30,
    settleMs: overrides.settleMs ?? 2_000,
    enableRender,
    phases: Object.freeze(phases.map((phase) => Object.freeze({ ...phase })))
  };

  if (config.quota < 1) {
    throw new Error(`quota must be at least 1 (got ${config.quota}).`);
  }
  if (config.maxWorkers < 1) {
    throw new Error(`maxWorkers must be at least 1 (got ${config.maxWorkers}).`);
  }

  return Object.freeze(config);
}
