import fs from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import { Readable } from 'node:stream';
import { format } from 'fast-csv';
import { DEFAULT_HEURISTICS } from './config';
import {
  SIGNAL_KINDS,
  type Confidence,
  type ModalityCounts,
  type PageClassification,
  type Signal,
  type SignalKind,
  type SiteOutcome,
  type SiteOutcomeStatus,
  type SiteReport,
  type Verdict,
} from './types';

/** Per-bucket outcome counts for a run. */
export type OutcomeCounts = Record<SiteOutcomeStatus, number>;

/** What a run hands to the reporting layer. */
export interface RunSummary {
  outcomes: SiteOutcome[];
  counts: OutcomeCounts;
  elapsedMs: number;
}

/**
 * Writes an array of row objects to a CSV file using stream.pipeline for correct
 * backpressure handling and error propagation.
 * Uses the first row's keys as headers (fast-csv default with `headers: true`).
 * An empty rows array produces an empty file with no header row.
 * @param filePath - Absolute or relative path to write to.
 * @param rows - Array of plain objects; all objects must share the same key set.
 * @returns Resolves when the file is fully written.
 */
export async function writeCsv(filePath: string, rows: Record<string, unknown>[]): Promise<void> {
  await pipeline(Readable.from(rows), format({ headers: true }), fs.createWriteStream(filePath));
}

// ---------------------------------------------------------------------------
// Modality report
// ---------------------------------------------------------------------------

function positiveSignals(page: PageClassification): Signal[] {
  return page.signals.filter((s) => s.points > 0);
}

function formatCounts(counts: ModalityCounts): string {
  const entries = Object.entries(counts);
  if (entries.length === 0) return 'None detected';
  return entries.map(([kind, count]) => `${kind}=${count}`).join(', ');
}

/**
 * Number of sites using each modality, most common first, ties by name.
 * @param reports - Site reports to aggregate.
 */
export function modalitySummary(reports: readonly SiteReport[]): [string, number][] {
  const totals = new Map<string, number>();
  for (const report of reports) {
    for (const kind of Object.keys(report.modalityCounts)) totals.set(kind, (totals.get(kind) ?? 0) + 1);
  }
  return [...totals.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

/**
 * Human-readable modality report.
 * @param reports - One report per classified site.
 * @param threshold - Acceptance threshold, printed in the header.
 */
export function formatModalityReport(reports: readonly SiteReport[], threshold: number): string {
  const rule = '='.repeat(80);
  const withData = reports.filter((r) => r.acceptedPages > 0).length;
  const lines = [
    rule,
    'LOCATION DATA MODALITY REPORT',
    `Score threshold: ${threshold}+ points`,
    rule,
    '',
    `Total Carriers Analyzed: ${reports.length}`,
    `Carriers with Location Pages: ${withData}`,
    '',
    'MODALITY SUMMARY (carriers using each type):',
    '-'.repeat(40),
  ];
  for (const [kind, count] of modalitySummary(reports)) lines.push(`  ${kind}: ${count} carriers`);

  lines.push('', rule, 'CARRIER DETAILS', rule);
  for (const report of [...reports].sort((a, b) => a.siteId.localeCompare(b.siteId))) {
    lines.push(
      '',
      `### ${report.siteId} (${report.domain})`,
      `Total pages: ${report.totalPagesSeen}`,
      `Location pages (score >= ${threshold}): ${report.acceptedPages}`,
      `Modalities: ${formatCounts(report.modalityCounts)}`,
      `Approach: ${report.recommendedApproach}`
    );
    if (report.topPages.length > 0) {
      lines.push('Top location pages:');
      for (const page of report.topPages.slice(0, 5)) {
        const title = page.title.length > 40 ? `${page.title.slice(0, 40)}...` : page.title;
        const signals = positiveSignals(page).map((s) => `${s.kind}(${s.points})`).join(', ');
        lines.push(`  - [${page.totalScore}pts] ${title || page.url.slice(0, 40)}`, `    Signals: ${signals}`);
      }
    }
  }
  return lines.join('\n') + '\n';
}

/** Machine-readable counterpart of formatModalityReport, keyed by site id. */
export function toModalityJson(reports: readonly SiteReport[]): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const report of reports) {
    out[report.siteId] = {
      siteId: report.siteId,
      domain: report.domain,
      totalPages: report.totalPagesSeen,
      locationPages: report.acceptedPages,
      modalities: report.modalityCounts,
      recommendedApproach: report.recommendedApproach,
      topPages: report.topPages.slice(0, 10).map((page) => ({
        url: page.url,
        title: page.title,
        score: page.totalScore,
        signals: positiveSignals(page),
      })),
    };
  }
  return out;
}

// ---------------------------------------------------------------------------
// SiteReport round trip
// ---------------------------------------------------------------------------

/** Full-fidelity JSON form of a site report. */
export function serializeSiteReport(report: SiteReport): string {
  return JSON.stringify(report, null, 2);
}

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(field: string): never {
  throw new Error(`Invalid site report: bad or missing ${field}`);
}

function str(obj: Json, key: string, where: string): string {
  const value = obj[key];
  return typeof value === 'string' ? value : fail(`${where}.${key}`);
}

function num(obj: Json, key: string, where: string): number {
  const value = obj[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fail(`${where}.${key}`);
}

function bool(obj: Json, key: string, where: string): boolean {
  const value = obj[key];
  return typeof value === 'boolean' ? value : fail(`${where}.${key}`);
}

function isSignalKind(value: unknown): value is SignalKind {
  return SIGNAL_KINDS.some((kind) => kind === value);
}

const CONFIDENCES: readonly Confidence[] = ['high', 'medium', 'low'];
const VERDICTS: readonly Verdict[] = ['disqualified', 'rejected', 'scored'];

function parseSignal(value: unknown, where: string): Signal {
  if (!isRecord(value)) return fail(where);
  const kind = value.kind;
  const confidence = CONFIDENCES.find((c) => c === value.confidence);
  if (!isSignalKind(kind)) return fail(`${where}.kind`);
  if (!confidence) return fail(`${where}.confidence`);
  return Object.freeze({
    kind,
    confidence,
    points: num(value, 'points', where),
    rationale: str(value, 'rationale', where),
    evidence: str(value, 'evidence', where),
  });
}

function parsePage(value: unknown, where: string): PageClassification {
  if (!isRecord(value) || !Array.isArray(value.signals)) return fail(where);
  const verdict = VERDICTS.find((v) => v === value.verdict) ?? fail(`${where}.verdict`);
  return Object.freeze({
    url: str(value, 'url', where),
    title: str(value, 'title', where),
    signals: Object.freeze(value.signals.map((s: unknown, i: number) => parseSignal(s, `${where}.signals[${i}]`))),
    totalScore: num(value, 'totalScore', where),
    accepted: bool(value, 'accepted', where),
    verdict,
  });
}

/**
 * Rebuilds a SiteReport from serializeSiteReport output, checking its shape.
 * Key order of `modalityCounts` and the order of `topPages` are preserved.
 * @throws Error naming the first field that is missing or has the wrong type.
 */
export function deserializeSiteReport(json: string): SiteReport {
  const data: unknown = JSON.parse(json);
  if (!isRecord(data)) return fail('report');
  if (!isRecord(data.modalityCounts)) return fail('modalityCounts');
  if (!Array.isArray(data.topPages)) return fail('topPages');

  const modalityCounts: ModalityCounts = {};
  for (const [kind, count] of Object.entries(data.modalityCounts)) {
    if (!isSignalKind(kind) || typeof count !== 'number') return fail(`modalityCounts.${kind}`);
    modalityCounts[kind] = count;
  }

  return {
    siteId: str(data, 'siteId', 'report'),
    domain: str(data, 'domain', 'report'),
    totalPagesSeen: num(data, 'totalPagesSeen', 'report'),
    acceptedPages: num(data, 'acceptedPages', 'report'),
    modalityCounts,
    topPages: data.topPages.map((page: unknown, i: number) => parsePage(page, `topPages[${i}]`)),
    recommendedApproach: str(data, 'recommendedApproach', 'report'),
  };
}

// ---------------------------------------------------------------------------
// Row generators
// ---------------------------------------------------------------------------

/**
 * Builds rows for crawl_results.csv, one row per site outcome.
 * @param outcomes - Outcomes in the order they completed.
 */
export function outcomeRows(outcomes: readonly SiteOutcome[]): Record<string, unknown>[] {
  return outcomes.map((o) => {
    const base = { name: o.name, url: o.url, status: o.status, time_seconds: o.elapsedSeconds };
    switch (o.status) {
      case 'success-with-locations':
      case 'success-no-locations':
        return {
          ...base,
          domain: o.domain,
          pages_crawled: o.pagesCrawled,
          pages_failed: o.pagesFailed,
          location_pages: o.acceptedPages,
          top_url: o.topUrl ?? '',
          top_score: o.topScore,
          modalities: o.modalities.join(' '),
          approach: o.approach,
          error: '',
        };
      case 'error':
        return { ...base, domain: o.domain, pages_crawled: '', pages_failed: '', location_pages: '', top_url: '', top_score: '', modalities: '', approach: '', error: o.error };
      case 'skipped-invalid-url':
        return { ...base, domain: '', pages_crawled: '', pages_failed: '', location_pages: '', top_url: '', top_score: '', modalities: '', approach: '', error: o.reason };
    }
  });
}

/**
 * Builds rows for top_pages.csv: the ranked accepted pages of every site.
 * @param reports - Site reports.
 */
export function topPageRows(reports: readonly SiteReport[]): Record<string, unknown>[] {
  return reports.flatMap((report) =>
    report.topPages.map((page, i) => ({
      site: report.siteId,
      rank: i + 1,
      score: page.totalScore,
      url: page.url,
      title: page.title,
      signals: positiveSignals(page).map((s) => s.kind).join(' '),
    }))
  );
}

/**
 * Writes all run reports into a directory:
 * modality_report.txt, modality_report.json, crawl_results.csv, crawl_results.json and top_pages.csv.
 * @returns Paths of the files written.
 */
export async function writeReports(
  outDir: string,
  reports: readonly SiteReport[],
  outcomes: readonly SiteOutcome[],
  threshold = DEFAULT_HEURISTICS.acceptThreshold
): Promise<string[]> {
  fs.mkdirSync(outDir, { recursive: true });
  const files = {
    text: path.join(outDir, 'modality_report.txt'),
    json: path.join(outDir, 'modality_report.json'),
    results: path.join(outDir, 'crawl_results.json'),
    resultsCsv: path.join(outDir, 'crawl_results.csv'),
    topPages: path.join(outDir, 'top_pages.csv'),
  };
  fs.writeFileSync(files.text, formatModalityReport(reports, threshold), 'utf8');
  fs.writeFileSync(files.json, JSON.stringify(toModalityJson(reports), null, 2), 'utf8');
  fs.writeFileSync(files.results, JSON.stringify(outcomes, null, 2), 'utf8');
  await writeCsv(files.resultsCsv, outcomeRows(outcomes));
  await writeCsv(files.topPages, topPageRows(reports));
  return Object.values(files);
}

/** Logs bucket counts, elapsed time and the best page per successful site. */
export function printRunSummary(summary: RunSummary): void {
  const { counts, outcomes } = summary;
  const minutes = summary.elapsedMs / 60000;
  console.log(`\n${'='.repeat(80)}\nCRAWL COMPLETE\n${'='.repeat(80)}`);
  console.log(`Total time: ${minutes.toFixed(1)} minutes`);
  console.log(`Carriers:            ${outcomes.length}`);
  console.log(`  With locations:    ${counts['success-with-locations']}`);
  console.log(`  No locations:      ${counts['success-no-locations']}`);
  console.log(`  Errors:            ${counts.error}`);
  console.log(`  Skipped (bad URL): ${counts['skipped-invalid-url']}`);

  const best = outcomes
    .flatMap((o) => (o.status === 'success-with-locations' ? [o] : []))
    .sort((a, b) => b.topScore - a.topScore)
    .slice(0, 20);
  if (best.length > 0) {
    console.log('\nTop results (by score):');
    for (const o of best) {
      console.log(`  [${String(o.topScore).padStart(2)}pts] ${o.name.slice(0, 35).padEnd(35)} | ${o.topUrl ?? 'N/A'}`);
    }
  }
}
