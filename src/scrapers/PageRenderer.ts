export interface RenderOptions {
  timeoutMs: number;
  settleMs: number;
  signal?: AbortSignal;
}

/**
 * Headless rendering backend: navigate, let scripts settle, hand back the DOM
 * as HTML. Throws the scrape error taxonomy (timeout, cancelled, extraction_failed).
 */
export interface PageRenderer {
  render(url: string, options: RenderOptions): Promise<string>;
  close(): Promise<void>;
}
