import { setTimeout as sleep } from 'node:timers/promises';
import type Db from './db';
import { Frontier, tierFor } from './frontier';
import type { PageRenderer } from './renderer';
import type { PageStore } from './store';
import { extractDomain, isIndexPath, isPdfOrMap, isSameDomain, normalizeUrl } from './url';
import type { Config, Heuristics, PageRecord, SiteCrawlSummary } from './types';

export interface CrawlSite {
  name: string;
  baseUrl: string;
}

export interface CrawlerDeps {
  config: Config;
  heuristics: Heuristics;
  renderer: PageRenderer;
  store: PageStore;
  /** Optional SQLite ledger of attempted pages. */
  ledger?: Db;
}

/** Result of one page visit. Failures are values, not exceptions. */
export type PageOutcome =
  | { ok: true; record: PageRecord }
  | { ok: false; url: string; statusCode: number | null; reason: string };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Crawls one site: a bounded, prioritized walk from the root and discovered seeds.
 *
 * Pages are visited one at a time in frontier order until the frontier is empty or
 * `maxPagesPerSite` pages have been attempted. A page that fails to render is marked
 * failed and skipped; it never ends the crawl. Owns the renderer for the crawl and
 * closes it on exit.
 */
export class SiteCrawler {
  readonly frontier = new Frontier();
  readonly pages: PageRecord[] = [];
  readonly domain: string;
  private readonly rootUrl: string;
  private readonly seedDenylist: string[];

  constructor(
    private readonly site: CrawlSite,
    private readonly deps: CrawlerDeps
  ) {
    this.domain = extractDomain(site.baseUrl);
    this.rootUrl = normalizeUrl(site.baseUrl, site.baseUrl, []) ?? site.baseUrl;
    // Seeds may be location documents, so document extensions are allowed through
    const documents = new Set(deps.heuristics.documentExtensions);
    this.seedDenylist = deps.heuristics.denylist.filter((pattern) => !documents.has(pattern));
  }

  /**
   * Runs the crawl and writes crawl_summary.json.
   * @param seeds - Candidate URLs from discovery, in discovery order.
   * @returns The crawl summary; signal fields are left empty for the classifier.
   */
  async crawl(seeds: Iterable<string>): Promise<SiteCrawlSummary> {
    const { config } = this.deps;
    const started = Date.now();
    this.seed(seeds);
    console.log(`  ${this.site.name}: starting with ${this.frontier.size} seed URLs`);

    try {
      let pageNum = 0;
      while (this.frontier.attempted < config.maxPagesPerSite) {
        const entry = this.frontier.next();
        if (!entry) break;
        pageNum++;

        const outcome = await this.visit(entry.url, pageNum === 1);
        if (outcome.ok) {
          this.frontier.markVisited(entry.url);
          this.pages.push(outcome.record);
          this.deps.ledger?.recordVisited(outcome.record);
          const added = this.enqueueLinks(outcome.record);
          if (pageNum % 10 === 0 || added > 20) {
            console.log(`  ${this.site.name}: ${pageNum} pages, queue=${this.frontier.size}, +${added} links`);
          }
        } else {
          this.frontier.markFailed(entry.url);
          this.deps.ledger?.recordFailed(entry.url, outcome.statusCode, outcome.reason);
          console.warn(`  ${this.site.name}: failed ${entry.url} (${outcome.reason})`);
        }

        if (config.requestDelayMs > 0) await sleep(config.requestDelayMs);
      }
    } finally {
      await this.deps.renderer.close();
    }

    const summary = this.summarize(started);
    this.deps.store.writeSummary(summary);
    console.log(
      `  ${this.site.name}: done - ${summary.crawlStats.pagesVisited} pages crawled, ${summary.crawlStats.pagesFailed} failed`
    );
    return summary;
  }

  /** Root first, then index-or-document seeds, then a capped number of other seeds. */
  private seed(seeds: Iterable<string>): void {
    const { heuristics, config } = this.deps;
    this.frontier.enqueue(this.rootUrl, 'root', 'seed');

    const others: string[] = [];
    for (const raw of seeds) {
      const url = normalizeUrl(raw, this.rootUrl, this.seedDenylist);
      if (!url || url === this.rootUrl || !isSameDomain(url, this.domain)) continue;
      if (isIndexPath(url, heuristics) || isPdfOrMap(url, heuristics)) {
        this.frontier.enqueue(url, tierFor(url, heuristics), 'seed');
      } else {
        others.push(url);
      }
    }
    for (const url of others.slice(0, config.maxOtherSeeds)) {
      this.frontier.enqueue(url, 'ordinary', 'seed');
    }
  }

  /** Renders, saves and records one page. Every per-page error becomes a failed outcome. */
  private async visit(url: string, isFirst: boolean): Promise<PageOutcome> {
    const { config, heuristics, renderer, store } = this.deps;
    try {
      const settle = isFirst || isIndexPath(url, heuristics);
      const rendered = await renderer.open(url, { timeoutMs: config.pageTimeoutMs, settle });
      if (!rendered) return { ok: false, url, statusCode: null, reason: 'no response' };
      if (rendered.status >= 400) {
        return { ok: false, url, statusCode: rendered.status, reason: `HTTP ${rendered.status}` };
      }

      const links = new Set<string>();
      for (const href of rendered.links) {
        const link = normalizeUrl(href, rendered.finalUrl, heuristics.denylist);
        if (link && isSameDomain(link, this.domain)) links.add(link);
      }

      const htmlFile = store.savePage(rendered.finalUrl, rendered.html);
      return {
        ok: true,
        record: {
          requestedUrl: url,
          finalUrl: rendered.finalUrl,
          statusCode: rendered.status,
          title: rendered.title,
          htmlByteLength: Buffer.byteLength(rendered.html, 'utf8'),
          htmlFile,
          extractedLinks: [...links],
          crawledAt: new Date().toISOString(),
        },
      };
    } catch (err) {
      return { ok: false, url, statusCode: null, reason: errorMessage(err) };
    }
  }

  /** Queues a page's unseen links by tier. @returns How many were added. */
  private enqueueLinks(record: PageRecord): number {
    const finalUrl = normalizeUrl(record.finalUrl, record.finalUrl, []);
    if (finalUrl) this.frontier.markSeen(finalUrl);

    let added = 0;
    for (const link of record.extractedLinks) {
      if (this.frontier.enqueue(link, tierFor(link, this.deps.heuristics))) added++;
    }
    return added;
  }

  private summarize(started: number): SiteCrawlSummary {
    const durationSeconds = Math.round((Date.now() - started) / 100) / 10;
    const pagesVisited = this.frontier.visited.size;
    return {
      siteName: this.site.name,
      baseUrl: this.site.baseUrl,
      domain: this.domain,
      crawlStats: {
        pagesVisited,
        pagesFailed: this.frontier.failed.size,
        pagesSaved: this.pages.length,
        durationSeconds,
        pagesPerSecond: durationSeconds > 0 ? Math.round((pagesVisited / durationSeconds) * 100) / 100 : 0,
      },
      pagesWithSignals: [],
      signalSummary: {},
      crawledAt: new Date().toISOString(),
    };
  }
}

/** Crawls one site with a fresh orchestrator. */
export function crawl(site: CrawlSite, seeds: Iterable<string>, deps: CrawlerDeps): Promise<SiteCrawlSummary> {
  return new SiteCrawler(site, deps).crawl(seeds);
}
