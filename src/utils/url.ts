/**
 * Normalized domain of a URL: lower-cased hostname without a leading `www.`.
 * Returns null for anything that is not an absolute http(s) URL.
 */
export function getDomain(url: string): string | null {
  try {
    const parsed = new URL(url);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      return null;
    }
    return parsed.hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return null;
  }
}

export function isRejected(domain: string, rejectDomains: readonly string[]): boolean {
  return rejectDomains.some((entry) => domain.includes(entry));
}
