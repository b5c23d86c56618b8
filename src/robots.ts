import axios, { type AxiosInstance } from 'axios';
import robotsParser from 'robots-parser';

/** What a carrier site's robots.txt tells discovery. */
export interface RobotsRules {
  /** `Sitemap:` entries, in file order. */
  sitemaps: string[];
  allows(url: string): boolean;
}

export interface RobotsOptions {
  userAgent: string;
  timeoutMs: number;
  http?: AxiosInstance;
}

const NO_RULES: RobotsRules = { sitemaps: [], allows: () => true };

/**
 * Reads `<site>/robots.txt`. A missing file, a non-200 answer or a network
 * failure all mean no rules and no sitemaps.
 * @param siteRoot - Site root URL, e.g. 'https://acme-freight.test'
 */
async function fetchRobots(siteRoot: string, options: RobotsOptions): Promise<RobotsRules> {
  const http = options.http ?? axios;
  const robotsUrl = new URL('/robots.txt', siteRoot).href;

  let body = '';
  try {
    const res = await http.get<unknown>(robotsUrl, {
      timeout: options.timeoutMs,
      headers: { 'User-Agent': options.userAgent },
      responseType: 'text',
      validateStatus: null,
    });
    if (res.status === 200 && typeof res.data === 'string') body = res.data;
  } catch (err) {
    console.warn(`robots.txt unavailable at ${robotsUrl}: ${err instanceof Error ? err.message : String(err)}`);
    return NO_RULES;
  }

  const parsed = robotsParser(robotsUrl, body);
  return {
    sitemaps: parsed.getSitemaps(),
    // undefined means the URL is on another host
    allows: (url) => parsed.isAllowed(url, options.userAgent) !== false,
  };
}

export default { fetchRobots };
