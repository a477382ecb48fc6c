import { Browser, BrowserContext, chromium, errors } from 'playwright-core';

import { CancelledError, ExtractionFailedError, FetchTimeoutError } from '../errors.js';
import { logger } from '../utils/logger.js';

import { PageRenderer, RenderOptions } from './PageRenderer.js';

export interface PlaywrightRendererOptions {
  userAgent: string;
  headless?: boolean;
  executablePath?: string;
}

const log = logger.child('renderer');

/**
 * One Chromium process shared by every render; each render gets its own
 * context so an abort can tear it down without touching the others.
 */
export class PlaywrightRenderer implements PageRenderer {
  private options: PlaywrightRendererOptions;
  private browser: Promise<Browser> | null = null;

  constructor(options: PlaywrightRendererOptions) {
    this.options = options;
  }

  async render(url: string, { timeoutMs, settleMs, signal }: RenderOptions): Promise<string> {
    if (signal?.aborted) {
      throw new CancelledError(url);
    }

    let context: BrowserContext | null = null;
    const closeContext = async () => {
      if (!context) return;
      try {
        await context.close();
      } catch (error) {
        log.debug(`Failed to close browser context for ${url}`, error);
      }
    };
    const onAbort = () => {
      void closeContext();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const browser = await this.getBrowser();
      if (signal?.aborted) {
        throw new CancelledError(url);
      }
      context = await browser.newContext({ userAgent: this.options.userAgent });
      // An abort while the context was opening found nothing to close.
      if (signal?.aborted) {
        throw new CancelledError(url);
      }
      const page = await context.newPage();
      if (signal?.aborted) {
        throw new CancelledError(url);
      }
      await page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' });
      await page.waitForTimeout(settleMs);
      if (signal?.aborted) {
        throw new CancelledError(url);
      }
      return await page.content();
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError(url);
      }
      if (error instanceof errors.TimeoutError) {
        throw new FetchTimeoutError(url, timeoutMs);
      }
      throw new ExtractionFailedError(url, error instanceof Error ? error.message : String(error), {
        cause: error
      });
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await closeContext();
    }
  }

  async close(): Promise<void> {
    if (!this.browser) {
      return;
    }
    const pending = this.browser;
    this.browser = null;
    try {
      const browser = await pending;
      await browser.close();
    } catch (error) {
      log.debug('Browser was not running or failed to close.', error);
    }
  }

  private getBrowser(): Promise<Browser> {
    if (!this.browser) {
      log.debug('Launching headless Chromium.');
      const launching = chromium.launch({
        headless: this.options.headless ?? true,
        ...(this.options.executablePath ? { executablePath: this.options.executablePath } : {})
      });
      // A failed launch is not cached; the next render tries again.
      void launching.then(
        () => undefined,
        (error: unknown) => {
          log.warn('Chromium failed to launch.', error);
          if (this.browser === launching) {
            this.browser = null;
          }
        }
      );
      this.browser = launching;
    }
    return this.browser;
  }
}
