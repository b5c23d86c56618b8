import type { AxiosInstance } from 'axios';
import robots from './robots';
import sitemap from './sitemap';
import { extractDomain } from './url';
import type { Config, Heuristics } from './types';

export interface DiscoveryResult {
  /** Candidate page URLs, always including the site root. */
  urls: Set<string>;
  /** Subset of `urls` whose text contains a location keyword. Advisory only. */
  priority: Set<string>;
  /** Sitemap documents that were requested. */
  sitemapUrls: Set<string>;
}

export interface DiscoveryOptions {
  config: Config;
  heuristics: Heuristics;
  http?: AxiosInstance;
}

export type DiscoverFn = (siteRoot: string, options: DiscoveryOptions) => Promise<DiscoveryResult>;

/**
 * Collects candidate URLs for a site from its sitemaps and robots.txt.
 *
 * The conventional sitemap paths are tried in order and the first one that yields
 * same-domain URLs wins; a sitemap listing only other hosts is passed over.
 * Every `Sitemap:` entry in robots.txt is then fetched and merged.
 * Nothing here is fatal: a site without sitemaps comes back as just its root.
 * @param siteRoot - Root URL, e.g. 'https://example.com'
 * @param options - Config, heuristics and optional HTTP client.
 */
export async function discover(siteRoot: string, options: DiscoveryOptions): Promise<DiscoveryResult> {
  const { config, heuristics, http } = options;
  const domain = extractDomain(siteRoot);
  const sitemapOptions = {
    domain,
    userAgent: config.userAgent,
    timeoutMs: config.requestTimeoutMs,
    maxChildSitemaps: config.maxChildSitemaps,
    http,
  };

  const fetched = new Set<string>();
  const found = new Set<string>();

  for (const sitemapPath of heuristics.sitemapPaths) {
    const urls = await sitemap.getUrls(new URL(sitemapPath, siteRoot).href, sitemapOptions, fetched);
    if (urls.length > 0) {
      for (const url of urls) found.add(url);
      break;
    }
  }

  const rules = await robots.fetchRobots(siteRoot, {
    userAgent: config.userAgent,
    timeoutMs: config.requestTimeoutMs,
    http,
  });
  for (const sitemapUrl of rules.sitemaps) {
    for (const url of await sitemap.getUrls(sitemapUrl, sitemapOptions, fetched)) found.add(url);
  }

  const urls = new Set<string>([siteRoot]);
  for (const url of found) {
    if (config.respectRobotsTxt && !rules.allows(url)) continue;
    urls.add(url);
  }

  const priority = new Set<string>();
  for (const url of urls) {
    const lower = url.toLowerCase();
    if (heuristics.discoveryKeywords.some((kw) => lower.includes(kw))) priority.add(url);
  }

  console.log(`  ${domain}: discovered ${urls.size} URLs (${priority.size} priority)`);
  return { urls, priority, sitemapUrls: fetched };
}
