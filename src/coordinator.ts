import fs from 'node:fs';
import path from 'node:path';
import type { AxiosInstance } from 'axios';
import { classifySiteDirectory } from './classifier';
import { crawl } from './crawler';
import Db from './db';
import { discover as defaultDiscover, type DiscoverFn } from './discovery';
import type { OutcomeCounts } from './report';
import type { PageRenderer, RendererFactory } from './renderer';
import { PageStore } from './store';
import { extractDomain, isHttpUrl } from './url';
import {
  SIGNAL_KINDS,
  type Carrier,
  type Config,
  type Heuristics,
  type RunCheckpoint,
  type SignalKind,
  type SiteOutcome,
  type SiteOutcomeStatus,
  type SiteReport,
} from './types';

export const CHECKPOINT_FILE = 'crawl_checkpoint.json';

export interface CoordinatorOptions {
  carriers: readonly Carrier[];
  config: Config;
  heuristics: Heuristics;
  rendererFactory: RendererFactory;
  discover?: DiscoverFn;
  http?: AxiosInstance;
  /** Index of the first carrier to process. Ignored when a checkpoint is resumed. */
  startIndex?: number;
  resume?: boolean;
  /** Defaults to `<outputDir>/crawl_checkpoint.json`. */
  checkpointPath?: string;
}

export interface RunResult {
  outcomes: SiteOutcome[];
  counts: OutcomeCounts;
  elapsedMs: number;
  /** Reports for every successful site, those restored from a checkpoint first. */
  reports: SiteReport[];
}

export interface ResumePoint {
  startIndex: number;
  outcomes: SiteOutcome[];
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Admission gate
// ---------------------------------------------------------------------------

/** Counting semaphore. Waiters are admitted in arrival order. */
export class Semaphore {
  private active = 0;
  private readonly waiting: (() => void)[] = [];

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`Semaphore limit must be a positive integer, got: ${limit}`);
    }
  }

  get inFlight(): number {
    return this.active;
  }

  private async acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return;
    }
    // The releasing holder hands its slot straight to us
    await new Promise<void>((resolve) => this.waiting.push(resolve));
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) next();
    else this.active--;
  }

  /** Runs `fn` once a slot is free and releases the slot however `fn` ends. */
  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

// ---------------------------------------------------------------------------
// Checkpoints
// ---------------------------------------------------------------------------

/**
 * Writes the checkpoint atomically (temp file, then rename).
 * @param lastIndex - Index of the last carrier in the batch that just completed.
 * @returns false when the write failed; the failure is logged, not thrown.
 */
export function saveCheckpoint(
  file: string,
  outcomes: readonly SiteOutcome[],
  startIndex: number,
  lastIndex: number
): boolean {
  const checkpoint: RunCheckpoint = {
    timestamp: new Date().toISOString(),
    completedCount: outcomes.length,
    startIndex,
    lastIndex,
    results: [...outcomes],
  };
  const tmp = `${file}.tmp`;
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(tmp, JSON.stringify(checkpoint, null, 2), 'utf8');
    fs.renameSync(tmp, file);
    return true;
  } catch (err) {
    console.warn(`Could not save checkpoint ${file}: ${errorMessage(err)}`);
    return false;
  }
}

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSignalKind(value: unknown): value is SignalKind {
  return SIGNAL_KINDS.some((kind) => kind === value);
}

function parseOutcome(value: unknown): SiteOutcome | null {
  if (!isRecord(value)) return null;
  const { name, url, elapsedSeconds, status } = value;
  if (typeof name !== 'string' || typeof url !== 'string' || typeof elapsedSeconds !== 'number') return null;
  const base = { name, url, elapsedSeconds };

  switch (status) {
    case 'success-with-locations':
    case 'success-no-locations': {
      const { domain, pagesCrawled, pagesFailed, acceptedPages, totalPages, topUrl, topScore, modalities, approach } = value;
      if (
        typeof domain !== 'string' ||
        typeof pagesCrawled !== 'number' ||
        typeof pagesFailed !== 'number' ||
        typeof acceptedPages !== 'number' ||
        typeof totalPages !== 'number' ||
        (topUrl !== null && typeof topUrl !== 'string') ||
        typeof topScore !== 'number' ||
        !Array.isArray(modalities) ||
        typeof approach !== 'string'
      ) {
        return null;
      }
      const kinds = modalities.filter(isSignalKind);
      if (kinds.length !== modalities.length) return null;
      return { ...base, status, domain, pagesCrawled, pagesFailed, acceptedPages, totalPages, topUrl, topScore, modalities: kinds, approach };
    }
    case 'error': {
      const { domain, error } = value;
      if (typeof domain !== 'string' || typeof error !== 'string') return null;
      return { ...base, status, domain, error };
    }
    case 'skipped-invalid-url': {
      const { reason } = value;
      if (typeof reason !== 'string') return null;
      return { ...base, status, reason };
    }
    default:
      return null;
  }
}

/**
 * Reads a checkpoint written by saveCheckpoint.
 * @returns Where to resume (the carrier after `lastIndex`) and the outcomes so far,
 *   or null when the file is missing or not a valid checkpoint.
 */
export function loadCheckpoint(file: string): ResumePoint | null {
  if (!fs.existsSync(file)) return null;
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    console.warn(`Ignoring unreadable checkpoint ${file}: ${errorMessage(err)}`);
    return null;
  }
  if (!isRecord(data) || typeof data.lastIndex !== 'number' || !Array.isArray(data.results)) {
    console.warn(`Ignoring malformed checkpoint ${file}`);
    return null;
  }

  const outcomes: SiteOutcome[] = [];
  for (const entry of data.results) {
    const outcome = parseOutcome(entry);
    if (!outcome) {
      console.warn(`Ignoring malformed checkpoint ${file}: bad result entry`);
      return null;
    }
    outcomes.push(outcome);
  }
  return { startIndex: data.lastIndex + 1, outcomes };
}

// ---------------------------------------------------------------------------
// Per-site pipeline
// ---------------------------------------------------------------------------

/** True for an absolute http(s) URL with a host. */
export function isValidSiteUrl(url: string): boolean {
  if (!isHttpUrl(url)) return false;
  try {
    extractDomain(url);
    return true;
  } catch {
    return false;
  }
}

/** Zero in every bucket, then one per outcome. */
export function countOutcomes(outcomes: readonly SiteOutcome[]): OutcomeCounts {
  const counts: Record<SiteOutcomeStatus, number> = {
    'success-with-locations': 0,
    'success-no-locations': 0,
    error: 0,
    'skipped-invalid-url': 0,
  };
  for (const outcome of outcomes) counts[outcome.status]++;
  return counts;
}

interface SiteDeps {
  config: Config;
  heuristics: Heuristics;
  rendererFactory: RendererFactory;
  discover: DiscoverFn;
  http?: AxiosInstance;
}

function elapsedSince(started: number): number {
  return Math.round((Date.now() - started) / 100) / 10;
}

/**
 * Discovers, crawls and classifies one site. Never throws: every failure is folded
 * into the returned outcome, and the site's browser is closed on every path.
 */
export async function processSite(
  carrier: Carrier,
  deps: SiteDeps
): Promise<{ outcome: SiteOutcome; report: SiteReport | null }> {
  const started = Date.now();
  const { name, website } = carrier;
  if (!isValidSiteUrl(website)) {
    return {
      outcome: { name, url: website, elapsedSeconds: 0, status: 'skipped-invalid-url', reason: `Invalid URL: ${website}` },
      report: null,
    };
  }

  const { config, heuristics } = deps;
  const domain = extractDomain(website);
  let renderer: PageRenderer | null = null;
  let ledger: Db | null = null;
  try {
    const store = new PageStore(config.outputDir, domain);
    store.reset();
    ledger = new Db(store.dir);

    const discovery = await deps.discover(website, { config, heuristics, http: deps.http });
    renderer = await deps.rendererFactory();
    const summary = await crawl({ name, baseUrl: website }, discovery.urls, {
      config,
      heuristics,
      renderer,
      store,
      ledger,
    });

    const report = classifySiteDirectory(name, domain, store.dir, { heuristics });
    store.writeSummary({
      ...summary,
      pagesWithSignals: report.topPages.map((page) => ({
        url: page.url,
        score: page.totalScore,
        signals: page.signals.filter((s) => s.points > 0).map((s) => s.kind),
      })),
      signalSummary: report.modalityCounts,
    });

    const attempts = ledger.countByStatus();
    const top = report.topPages.length > 0 ? report.topPages[0] : null;
    console.log(`  ${name}: ${report.acceptedPages} location pages of ${report.totalPagesSeen}`);
    return {
      outcome: {
        name,
        url: website,
        elapsedSeconds: elapsedSince(started),
        status: report.acceptedPages > 0 ? 'success-with-locations' : 'success-no-locations',
        domain,
        pagesCrawled: attempts.visited,
        pagesFailed: attempts.failed,
        acceptedPages: report.acceptedPages,
        totalPages: report.totalPagesSeen,
        topUrl: top ? top.url : null,
        topScore: top ? top.totalScore : 0,
        modalities: Object.keys(report.modalityCounts).filter(isSignalKind),
        approach: report.recommendedApproach,
      },
      report,
    };
  } catch (err) {
    console.error(`  ${name}: ERROR - ${errorMessage(err)}`);
    return {
      outcome: { name, url: website, elapsedSeconds: elapsedSince(started), status: 'error', domain, error: errorMessage(err) },
      report: null,
    };
  } finally {
    if (renderer) {
      await renderer.close().catch((err: unknown) => {
        console.warn(`  ${name}: browser close failed: ${errorMessage(err)}`);
      });
    }
    ledger?.close();
  }
}

/**
 * Rebuilds the reports of successful sites from their page stores, for outcomes
 * carried over from a checkpoint.
 */
export function reportsFromStore(outcomes: readonly SiteOutcome[], config: Config, heuristics: Heuristics): SiteReport[] {
  const reports: SiteReport[] = [];
  for (const outcome of outcomes) {
    if (outcome.status !== 'success-with-locations' && outcome.status !== 'success-no-locations') continue;
    const store = new PageStore(config.outputDir, outcome.domain);
    reports.push(classifySiteDirectory(outcome.name, outcome.domain, store.dir, { heuristics }));
  }
  return reports;
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

/**
 * Runs every carrier from the start index through discovery, crawl and classification.
 *
 * Carriers go in batches of `checkpointBatchSize`; within a batch at most `concurrency`
 * sites run at once. A checkpoint is saved after each batch, so a resumed run restarts
 * at the first carrier of the first unfinished batch. One site's failure never stops the run.
 */
export async function runCoordinator(options: CoordinatorOptions): Promise<RunResult> {
  const started = Date.now();
  const { carriers, config, heuristics } = options;
  const checkpointPath = options.checkpointPath ?? path.join(config.outputDir, CHECKPOINT_FILE);

  let startIndex = options.startIndex ?? 0;
  const outcomes: SiteOutcome[] = [];
  let restored: SiteOutcome[] = [];
  if (options.resume) {
    const resumed = loadCheckpoint(checkpointPath);
    if (resumed) {
      startIndex = resumed.startIndex;
      restored = resumed.outcomes;
      outcomes.push(...resumed.outcomes);
      console.log(`Resuming from checkpoint: ${resumed.outcomes.length} sites done, starting at index ${startIndex}`);
    }
  }

  const deps: SiteDeps = {
    config,
    heuristics,
    rendererFactory: options.rendererFactory,
    discover: options.discover ?? defaultDiscover,
    http: options.http,
  };
  const gate = new Semaphore(config.concurrency);
  const reports: SiteReport[] = [];
  const batchSize = config.checkpointBatchSize;

  for (let batchStart = startIndex; batchStart < carriers.length; batchStart += batchSize) {
    const batch = carriers.slice(batchStart, batchStart + batchSize);
    await Promise.all(
      batch.map((carrier, i) =>
        gate.use(async () => {
          console.log(`[${batchStart + i + 1}/${carriers.length}] ${carrier.name} (${carrier.website})`);
          const { outcome, report } = await processSite(carrier, deps);
          outcomes.push(outcome);
          if (report) reports.push(report);
        })
      )
    );
    saveCheckpoint(checkpointPath, outcomes, startIndex, batchStart + batch.length - 1);
  }

  return {
    outcomes,
    counts: countOutcomes(outcomes),
    elapsedMs: Date.now() - started,
    reports: [...reportsFromStore(restored, config, heuristics), ...reports],
  };
}
