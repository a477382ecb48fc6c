const CRUFT_REGEX = /(cookie|privacy policy|terms of service|subscribe|newsletter)/gi;

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Collapses whitespace and drops the consent/newsletter words that leak into
 * nearly every scraped block.
 */
export function cleanText(text: string | undefined | null): string {
  if (!text) {
    return '';
  }
  return normalizeWhitespace(normalizeWhitespace(text).replace(CRUFT_REGEX, ''));
}

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
