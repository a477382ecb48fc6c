import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';

import { createObjectCsvWriter } from 'csv-writer';

import { appConfig } from '../config.js';
import { FlatRecord } from '../types.js';
import { logger } from '../utils/logger.js';

export interface ResultStoreOptions {
  outputDir?: string;
}

const CSV_HEADER: Array<{ id: keyof FlatRecord; title: string }> = [
  { id: 'query', title: 'query' },
  { id: 'siteIndex', title: 'site_index' },
  { id: 'url', title: 'url' },
  { id: 'method', title: 'method' },
  { id: 'domain', title: 'domain' },
  { id: 'contentType', title: 'content_type' },
  { id: 'title', title: 'title' },
  { id: 'scrapedContent', title: 'scraped_content' },
  { id: 'totalTime', title: 'total_time' },
  { id: 'status', title: 'status' },
  { id: 'failure', title: 'failure' },
  { id: 'timestamp', title: 'timestamp' }
];

export class ResultStore {
  private outputDir: string;

  constructor(options: ResultStoreOptions = {}) {
    this.outputDir = options.outputDir ?? appConfig.outputDir;
  }

  /** With `append`, rows go after the existing ones and no header is written. */
  async saveAsCsv(records: FlatRecord[], filename = 'results.csv', append = false): Promise<string> {
    const filePath = this.ensureAbsolute(filename);
    const csvWriter = createObjectCsvWriter({ path: filePath, header: CSV_HEADER, append });
    await csvWriter.writeRecords(records);
    logger.success(`${append ? 'Appended' : 'Saved'} ${records.length} CSV rows to ${filePath}`);
    return filePath;
  }

  saveAsJson(records: FlatRecord[], filename = 'results.json'): string {
    const filePath = this.ensureAbsolute(filename);
    writeFileSync(filePath, JSON.stringify(records, null, 2), 'utf8');
    logger.success(`Saved JSON results to ${filePath}`);
    return filePath;
  }

  async save(records: FlatRecord[], basename = 'results'): Promise<string[]> {
    const csvPath = await this.saveAsCsv(records, `${basename}.csv`);
    const jsonPath = this.saveAsJson(records, `${basename}.json`);
    return [csvPath, jsonPath];
  }

  private ensureAbsolute(filename: string): string {
    const filePath = join(this.outputDir, filename);
    mkdirSync(dirname(filePath), { recursive: true });
    return filePath;
  }
}
