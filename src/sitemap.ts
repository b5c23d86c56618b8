import axios, { type AxiosInstance } from 'axios';
import { load } from 'cheerio';
import { isSameDomain } from './url';

export interface SitemapOptions {
  /** Only `<url><loc>` entries on this domain (or its subdomains) are kept. */
  domain: string;
  userAgent: string;
  timeoutMs: number;
  /** Children followed per sitemap index. */
  maxChildSitemaps: number;
  http?: AxiosInstance;
}

export interface ParsedSitemap {
  kind: 'index' | 'urlset';
  locs: string[];
}

/** True when a response body looks like sitemap XML rather than an HTML error page. */
export function isXmlDocument(body: string): boolean {
  const head = body.trimStart();
  return head.startsWith('<?xml') || body.includes('<urlset') || body.includes('<sitemapindex');
}

/**
 * Reads the `<loc>` entries of a sitemap or sitemap index.
 * Malformed markup yields whatever entries could still be read.
 */
export function parseSitemap(xml: string): ParsedSitemap {
  const $ = load(xml, { xml: true });
  const kind = $('sitemapindex').length > 0 ? 'index' : 'urlset';
  const locs = $(kind === 'index' ? 'sitemap > loc' : 'url > loc')
    .map((_, el) => $(el).text().trim())
    .get()
    .filter(Boolean);
  return { kind, locs };
}

async function fetchXml(url: string, options: SitemapOptions): Promise<string | null> {
  const http = options.http ?? axios;
  try {
    const response = await http.get<unknown>(url, {
      timeout: options.timeoutMs,
      headers: { 'User-Agent': options.userAgent },
      responseType: 'text',
      validateStatus: null,
    });
    if (response.status !== 200 || typeof response.data !== 'string') return null;
    return isXmlDocument(response.data) ? response.data : null;
  } catch (err) {
    console.warn(`Sitemap fetch failed for ${url}: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

/**
 * Fetches one sitemap and returns its same-domain page URLs.
 * Sitemap indexes are expanded recursively, following at most
 * `maxChildSitemaps` children per index. Returns an empty array when the
 * document is missing, not XML, or unreadable.
 * @param url - Absolute sitemap URL.
 * @param options - Domain filter, HTTP settings and child limit.
 * @param fetched - Sitemap URLs already requested; shared across calls to avoid cycles.
 * @returns Page URLs in document order, deduplicated.
 */
async function getUrls(
  url: string,
  options: SitemapOptions,
  fetched: Set<string> = new Set()
): Promise<string[]> {
  if (fetched.has(url)) return [];
  fetched.add(url);

  const xml = await fetchXml(url, options);
  if (xml === null) return [];

  const { kind, locs } = parseSitemap(xml);
  const urls = new Set<string>();

  if (kind === 'index') {
    for (const child of locs.slice(0, options.maxChildSitemaps)) {
      for (const pageUrl of await getUrls(child, options, fetched)) urls.add(pageUrl);
    }
  } else {
    for (const loc of locs) {
      if (isSameDomain(loc, options.domain)) urls.add(loc);
    }
  }

  return [...urls];
}

export default { getUrls };
