import fs from 'node:fs';
import path from 'node:path';
import { analyzePage, recoverPageUrl } from './analyze';
import { DEFAULT_HEURISTICS } from './config';
import { createSignal, DEFAULT_DETECTORS, urlContextSignal, type Detector } from './detectors';
import { hasLocationKeyword } from './url';
import type { Heuristics, ModalityCounts, PageClassification, Signal, SignalKind, SiteReport, Verdict } from './types';

export interface ClassifyOptions {
  heuristics?: Heuristics;
  detectors?: readonly Detector[];
}

/**
 * Extraction approach per modality, in the order they are listed in a recommendation.
 * A row applies when any of its kinds is present.
 */
export const RECOMMENDATIONS: readonly { kinds: readonly SignalKind[]; approach: string }[] = [
  { kinds: ['ADDRESS_LIST', 'ADDRESS_PAIR'], approach: 'Parse addresses from HTML' },
  { kinds: ['GOOGLE_MAPS_EMBED', 'GOOGLE_MAPS_API'], approach: 'Extract from Google Maps embed' },
  { kinds: ['GOOGLE_MAPS_LINK'], approach: 'Parse Google Maps URLs' },
  { kinds: ['MAP_MAPBOX', 'MAP_LEAFLET', 'MAP_ARCGIS'], approach: 'Query map API/data source' },
  { kinds: ['COORDINATE_DATA'], approach: 'Extract coordinates from page source' },
  { kinds: ['PDF_SERVICEMAP', 'PDF_LOCATIONS'], approach: 'Parse PDF documents' },
  { kinds: ['LOCATION_FINDER', 'LOCATION_SEARCH'], approach: 'Automate location search form' },
  { kinds: ['JSON_LD_LOCATIONS'], approach: 'Parse JSON-LD structured data' },
  { kinds: ['LOCATION_IFRAME'], approach: 'Inspect embedded locator iframe' },
];

export const NO_DATA_APPROACH = 'No location data detected - manual review needed';
export const MANUAL_REVIEW_APPROACH = 'Manual review needed';

function result(
  url: string,
  title: string,
  signals: Signal[],
  totalScore: number,
  accepted: boolean,
  verdict: Verdict
): PageClassification {
  return Object.freeze({ url, title, signals: Object.freeze(signals), totalScore, accepted, verdict });
}

/**
 * Scores one rendered page for location content.
 *
 * Stage 1 disqualifiers stop at the first rule that fires (score 0). Stage 2 needs at
 * least one qualifying primary signal, or a location keyword in the URL; otherwise the
 * page is rejected with score 0 and whatever weak signals were seen. Stage 3 adds
 * secondary signals and penalties. The total is floored at 0 and the page is accepted
 * at `acceptThreshold` points.
 * @param html - Rendered HTML.
 * @param url - URL the page was fetched from.
 * @param options - Heuristics and detector registry; defaults to the built-in set.
 */
export function classify(html: string, url: string, options: ClassifyOptions = {}): PageClassification {
  const heuristics = options.heuristics ?? DEFAULT_HEURISTICS;
  const detectors = options.detectors ?? DEFAULT_DETECTORS;
  const page = analyzePage(html, url, heuristics);

  for (const detector of detectors.filter((d) => d.stage === 'disqualifier')) {
    const signal = detector.detect(page, heuristics);
    if (signal) return result(url, page.title, [signal], 0, false, 'disqualified');
  }

  const signals: Signal[] = [];
  let passed = false;
  for (const detector of detectors.filter((d) => d.stage === 'primary')) {
    const signal = detector.detect(page, heuristics);
    if (!signal) continue;
    signals.push(signal);
    if (detector.qualifies ? detector.qualifies(signal) : true) passed = true;
  }

  if (!passed && hasLocationKeyword(url, heuristics)) {
    signals.push(urlContextSignal(url));
    passed = true;
  }

  if (!passed) {
    const kept = signals.length > 0
      ? signals
      : [createSignal('NO_LOCATION_CONTENT', 'high', 0, 'No primary location signals found')];
    return result(url, page.title, kept, 0, false, 'rejected');
  }

  for (const detector of detectors.filter((d) => d.stage === 'secondary')) {
    const signal = detector.detect(page, heuristics);
    if (signal) signals.push(signal);
  }

  const totalScore = Math.max(0, signals.reduce((sum, s) => sum + s.points, 0));
  return result(url, page.title, signals, totalScore, totalScore >= heuristics.acceptThreshold, 'scored');
}

/**
 * Maps the modalities present on a site to an extraction approach.
 * @returns Approaches joined by "; ", or a manual-review message.
 */
export function recommendApproach(modalityCounts: ModalityCounts): string {
  const present = Object.keys(modalityCounts);
  if (present.length === 0) return NO_DATA_APPROACH;
  const approaches = RECOMMENDATIONS
    .filter((row) => row.kinds.some((kind) => (modalityCounts[kind] ?? 0) > 0))
    .map((row) => row.approach);
  return approaches.length > 0 ? approaches.join('; ') : MANUAL_REVIEW_APPROACH;
}

/**
 * Rolls page classifications up into a site report.
 * Only accepted pages count toward modalities and top pages; each accepted page adds
 * one to every distinct signal kind it carries with positive points.
 */
export function classifySite(
  siteId: string,
  domain: string,
  pages: readonly PageClassification[],
  heuristics: Heuristics = DEFAULT_HEURISTICS
): SiteReport {
  const accepted = pages.filter((p) => p.accepted);
  const modalityCounts: ModalityCounts = {};
  for (const page of accepted) {
    const kinds = new Set(page.signals.filter((s) => s.points > 0).map((s) => s.kind));
    for (const kind of kinds) modalityCounts[kind] = (modalityCounts[kind] ?? 0) + 1;
  }

  const topPages = [...accepted]
    .sort((a, b) => b.totalScore - a.totalScore)
    .slice(0, heuristics.topPagesLimit);

  return {
    siteId,
    domain,
    totalPagesSeen: pages.length,
    acceptedPages: accepted.length,
    modalityCounts,
    topPages,
    recommendedApproach: recommendApproach(modalityCounts),
  };
}

/**
 * Classifies every saved page in a site's page store directory.
 * The page URL comes from the injected crawler marker or the page's own canonical tags,
 * falling back to the file name. Unreadable files are skipped.
 */
export function classifySiteDirectory(
  siteId: string,
  domain: string,
  dir: string,
  options: ClassifyOptions = {}
): SiteReport {
  const files = fs.existsSync(dir)
    ? fs.readdirSync(dir).filter((f) => f.endsWith('.html')).sort()
    : [];

  const pages: PageClassification[] = [];
  for (const file of files) {
    let html: string;
    try {
      html = fs.readFileSync(path.join(dir, file), 'utf8');
    } catch (err) {
      console.warn(`  ${siteId}: skipping unreadable page ${file}: ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }
    const url = recoverPageUrl(html) ?? path.basename(file, '.html');
    pages.push(classify(html, url, options));
  }

  return classifySite(siteId, domain, pages, options.heuristics);
}
