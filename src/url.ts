import { DEFAULT_HEURISTICS } from './config';
import type { Heuristics } from './types';

function stripWww(host: string): string {
  return host.startsWith('www.') ? host.slice(4) : host;
}

/**
 * Canonicalizes a raw href into an absolute http(s) URL.
 * Drops the fragment, lower-cases the host, keeps the query and strips a trailing
 * slash unless the path is root. Returns null for empty input, denylisted strings,
 * unparsable values and non-HTTP schemes.
 * @param raw - Link as found in the page or sitemap.
 * @param base - URL the link is resolved against.
 * @param denylist - Substrings that reject the raw value outright (matched lower-cased).
 */
export function normalizeUrl(
  raw: string,
  base: string,
  denylist: readonly string[] = DEFAULT_HEURISTICS.denylist
): string | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;

  const lower = trimmed.toLowerCase();
  if (denylist.some((pattern) => lower.includes(pattern))) return null;

  let parsed: URL;
  try {
    parsed = new URL(trimmed.startsWith('//') ? `https:${trimmed}` : trimmed, base);
  } catch {
    return null;
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return null;

  const pathname = parsed.pathname === '/' ? '/' : parsed.pathname.replace(/\/+$/, '') || '/';
  return `${parsed.protocol}//${parsed.host.toLowerCase()}${pathname}${parsed.search}`;
}

/**
 * True when the URL's host is the domain or one of its subdomains.
 * A leading `www.` is ignored on both sides.
 */
export function isSameDomain(url: string, domain: string): boolean {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }
  const site = stripWww(domain.toLowerCase());
  const candidate = stripWww(host);
  return candidate === site || candidate.endsWith(`.${site}`);
}

/** Host of the URL without a leading `www.`. Throws on an unparsable URL. */
export function extractDomain(url: string): string {
  return stripWww(new URL(url).hostname.toLowerCase());
}

/** True for absolute http(s) URLs: the only carrier websites worth crawling. */
export function isHttpUrl(value: string): boolean {
  return /^https?:\/\/[^\s/]+/i.test(value.trim());
}

// ---------------------------------------------------------------------------
// URL predicates shared by the frontier and the classifier
// ---------------------------------------------------------------------------

/** Listing page by path suffix, e.g. `/locations` or `/terminals`, or a service-map PDF. */
export function isIndexPath(url: string, heuristics: Heuristics = DEFAULT_HEURISTICS): boolean {
  const lower = url.toLowerCase().replace(/\/+$/, '');
  if (heuristics.indexPathSuffixes.some((suffix) => lower.endsWith(suffix))) return true;
  return lower.includes('servicemap') && lower.includes('.pdf');
}

export function isPdfOrMap(url: string, heuristics: Heuristics = DEFAULT_HEURISTICS): boolean {
  const lower = url.toLowerCase();
  return lower.includes('.pdf') && heuristics.pdfMapKeywords.some((kw) => lower.includes(kw));
}

/**
 * Tool and portal subdomains (`tools.`, `portal.`, `locator.` ...) often host location finders.
 * Markers are matched against the host only, as a leading label or after a dot.
 */
export function isToolSubdomain(url: string, heuristics: Heuristics = DEFAULT_HEURISTICS): boolean {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }
  return heuristics.toolSubdomainMarkers.some(
    (marker) => host.startsWith(marker) || host.includes(`.${marker}`)
  );
}

export function hasLocationKeyword(url: string, heuristics: Heuristics = DEFAULT_HEURISTICS): boolean {
  const lower = url.toLowerCase();
  return heuristics.locationUrlKeywords.some((kw) => lower.includes(kw));
}
