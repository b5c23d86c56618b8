import { isIndexPath, isPdfOrMap, isToolSubdomain } from './url';
import type { Heuristics } from './types';

/**
 * Priority tag of a queued URL.
 * - root: the site root, always first
 * - index / pdf-or-map: listing pages and location documents
 * - tool-subdomain: links onto tool or portal subdomains
 * - ordinary: everything else on the site
 */
export type FrontierTier = 'root' | 'index' | 'pdf-or-map' | 'tool-subdomain' | 'ordinary';

/** Whether a URL came from the seed set or was found on a crawled page. */
export type FrontierOrigin = 'seed' | 'discovered';

export interface FrontierEntry {
  url: string;
  tier: FrontierTier;
  /** Ordering key within a tier; lower pops first. */
  key: number;
}

const TIER_RANK: Record<FrontierTier, number> = {
  root: 0,
  index: 1,
  'pdf-or-map': 1,
  'tool-subdomain': 2,
  ordinary: 3,
};

/**
 * Frontier order: tier rank first, then key.
 *
 * In the index and tool tiers, links found on pages get negative, decreasing keys, so the
 * most recently found link pops first and all of them pop before seeds of the same tier.
 * Seeds get increasing non-negative keys and keep their given order. The ordinary tier
 * is plain FIFO.
 */
export function compareEntries(a: FrontierEntry, b: FrontierEntry): number {
  return TIER_RANK[a.tier] - TIER_RANK[b.tier] || a.key - b.key;
}

/** Picks the tier for a same-domain URL. */
export function tierFor(url: string, heuristics: Heuristics): Exclude<FrontierTier, 'root'> {
  if (isIndexPath(url, heuristics)) return 'index';
  if (isPdfOrMap(url, heuristics)) return 'pdf-or-map';
  if (isToolSubdomain(url, heuristics)) return 'tool-subdomain';
  return 'ordinary';
}

/**
 * Priority queue of normalized URLs for one site crawl.
 * A URL enters at most once: the seen set covers queued, visited and failed URLs.
 */
export class Frontier {
  readonly visited = new Set<string>();
  readonly failed = new Set<string>();
  private readonly seen = new Set<string>();
  private readonly queue: FrontierEntry[] = [];
  private seedSeq = 0;
  private discoveredSeq = 0;
  private ordinarySeq = 0;

  /**
   * Queues a URL unless it has been seen before.
   * @returns true if the URL was added.
   */
  enqueue(url: string, tier: FrontierTier, origin: FrontierOrigin = 'discovered'): boolean {
    if (this.seen.has(url)) return false;
    this.seen.add(url);
    this.insert({ url, tier, key: this.nextKey(tier, origin) });
    return true;
  }

  /**
   * Records a URL as covered without visiting it, e.g. the final URL of a redirect.
   * A queued copy is dropped so the page is not rendered twice.
   */
  markSeen(url: string): void {
    this.seen.add(url);
    const queued = this.queue.findIndex((entry) => entry.url === url);
    if (queued !== -1) this.queue.splice(queued, 1);
  }

  /** Removes and returns the front entry, skipping anything already visited or failed. */
  next(): FrontierEntry | undefined {
    let entry = this.queue.shift();
    while (entry && (this.visited.has(entry.url) || this.failed.has(entry.url))) {
      entry = this.queue.shift();
    }
    return entry;
  }

  markVisited(url: string): void {
    this.visited.add(url);
  }

  markFailed(url: string): void {
    this.failed.add(url);
  }

  /** Pages attempted so far, successful or not. Counted against the page budget. */
  get attempted(): number {
    return this.visited.size + this.failed.size;
  }

  get size(): number {
    return this.queue.length;
  }

  has(url: string): boolean {
    return this.seen.has(url);
  }

  /** Queued URLs in pop order. */
  peekAll(): string[] {
    return this.queue.map((entry) => entry.url);
  }

  private nextKey(tier: FrontierTier, origin: FrontierOrigin): number {
    if (tier === 'root') return 0;
    if (tier === 'ordinary') return this.ordinarySeq++;
    return origin === 'seed' ? this.seedSeq++ : -++this.discoveredSeq;
  }

  private insert(entry: FrontierEntry): void {
    // Binary search for the first position that sorts after the entry
    let lo = 0;
    let hi = this.queue.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compareEntries(this.queue[mid], entry) <= 0) lo = mid + 1;
      else hi = mid;
    }
    this.queue.splice(lo, 0, entry);
  }
}
