export const DEFAULT_SEARCH_ENGINE_DOMAINS: readonly string[] = ['google.com'];

/**
 * True when `url` points at a search engine's own pages (and so is likely an
 * indirection link rather than the store itself). Matches the domain and its
 * subdomains; strings that do not parse as URLs fall back to substring matching.
 */
export function isSearchEngineUrl(
  url: string,
  domains: readonly string[] = DEFAULT_SEARCH_ENGINE_DOMAINS,
): boolean {
  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return domains.some((domain) => url.includes(domain));
  }
  return domains.some((domain) => hostname === domain || hostname.endsWith(`.${domain}`));
}

/**
 * Pull the `q` target out of a `/url?q=<target>&...` redirect href.
 * Relative hrefs are resolved against `baseUrl`. Returns null when absent.
 */
export function extractRedirectTarget(href: string, baseUrl: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(href, baseUrl);
  } catch {
    return null;
  }
  const target = parsed.searchParams.get('q');
  return target ? target : null;
}
