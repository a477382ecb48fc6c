#!/usr/bin/env node
import { existsSync, readFileSync } from 'node:fs';

import { createScraperConfig, ScraperConfig } from './config.js';
import { sessionError } from './errors.js';
import { BulkRunner } from './pipeline/BulkRunner.js';
import { createPhaseSequencer } from './pipeline/PhaseSequencer.js';
import { ResultStore } from './storage/ResultStore.js';
import { CLIOptions, parseArgs } from './utils/args.js';
import { logger } from './utils/logger.js';
import { parseQueries } from './utils/queries.js';

/** Inline queries first, then the file; `--start`/`--end` pick an inclusive slice. */
function loadQueries(options: CLIOptions): string[] {
  const queries = [...options.queries];
  if (options.queriesFile) {
    if (!existsSync(options.queriesFile)) {
      throw new Error(`Queries file not found: ${options.queriesFile}`);
    }
    queries.push(...parseQueries(readFileSync(options.queriesFile, 'utf8'), options.queriesFile));
  }
  const start = options.start ?? 0;
  const end = options.end === undefined ? queries.length : options.end + 1;
  return queries.slice(start, end);
}

function toConfig(options: CLIOptions): ScraperConfig {
  return createScraperConfig({
    ...(options.sites !== undefined ? { quota: options.sites } : {}),
    ...(options.timeoutSeconds !== undefined ? { globalTimeoutMs: options.timeoutSeconds * 1000 } : {}),
    ...(options.maxResults !== undefined ? { maxSearchResults: options.maxResults } : {}),
    ...(options.workers !== undefined ? { maxWorkers: options.workers } : {}),
    ...(options.noRender ? { enableRender: false } : {})
  });
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  const queries = loadQueries(options);
  if (queries.length === 0) {
    throw new Error('No queries given. Pass a query, --query or --queries-file.');
  }

  const config = toConfig(options);
  const sequencer = createPhaseSequencer(config);
  logger.info(
    `Scraping ${queries.length} ${queries.length === 1 ? 'query' : 'queries'}: ${config.quota} sites each, ` +
      `${config.globalTimeoutMs / 1000}s budget, rendering ${config.enableRender ? 'on' : 'off'}.`
  );

  try {
    const runner = new BulkRunner(sequencer, new ResultStore(options.outputDir ? { outputDir: options.outputDir } : {}), {
      dryRun: options.dryRun ?? false,
      delayMs: (options.delaySeconds ?? 2) * 1000,
      basename: queries.length === 1 ? 'results' : 'bulk_scraping_results'
    });
    const summary = await runner.run(queries);

    for (const session of summary.sessions) {
      for (const [index, result] of session.results.entries()) {
        logger.info(`  ${index + 1}. ${result.url} (${result.method}, ${result.payload.kind})`);
      }
      const error = sessionError(session);
      if (error) {
        logger.warn(error.message);
      }
    }
    logger.success(`Done: ${summary.succeeded} succeeded, ${summary.failed} failed.`);
    if (summary.succeeded === 0) {
      process.exitCode = 1;
    }
  } finally {
    await sequencer.close();
  }
}

main().catch((error: unknown) => {
  logger.error('Scraper failed.', error);
  process.exitCode = 1;
});
