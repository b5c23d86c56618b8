/** Crawler runtime configuration, populated from environment variables by loadConfig(). */
export interface Config {
  maxPagesPerSite: number;
  concurrency: number;
  pageTimeoutMs: number;
  requestTimeoutMs: number;
  requestDelayMs: number;
  settleDelayMs: number;
  scrollSettleMs: number;
  maxOtherSeeds: number;
  maxChildSitemaps: number;
  checkpointBatchSize: number;
  userAgent: string;
  outputDir: string;
  headless: boolean;
  respectRobotsTxt: boolean;
}

/**
 * Keyword lists, patterns and thresholds used by discovery, the frontier and the classifier.
 * Defaults live in heuristics.json; pattern entries are regular expression sources.
 */
export interface Heuristics {
  acceptThreshold: number;
  minHtmlBytes: number;
  addressListMin: number;
  addressPairMin: number;
  minAddressLength: number;
  coordinateStrongMin: number;
  mapsLinkStrongMin: number;
  mapsMarkerStrongMin: number;
  jsonLdMinAddresses: number;
  topPagesLimit: number;
  denylist: string[];
  documentExtensions: string[];
  sitemapPaths: string[];
  discoveryKeywords: string[];
  indexPathSuffixes: string[];
  pdfMapKeywords: string[];
  toolSubdomainMarkers: string[];
  indexUrlPatterns: string[];
  locationUrlKeywords: string[];
  errorTitleKeywords: string[];
  errorHeadingPrefixes: string[];
  excludedPageKeywords: string[];
  boilerplateClassPattern: string;
  googleMapsEmbedPatterns: string[];
  googleMapsExcludePatterns: string[];
  googleMapsLinkPattern: string;
  googleMapsApiMarker: string;
  googleMapsInitPatterns: string[];
  googleMapsMarkerTokens: string[];
  finderKeywords: string[];
  radiusKeywords: string[];
  quoteFormKeywords: string[];
  /** Fingerprints are matched case-sensitively against the raw page source. */
  mapLibraries: Record<MapLibrary, string[]>;
  iframeKeywords: string[];
  pdfHighValueKeywords: string[];
  pdfKeywords: string[];
  nonUsUrlPatterns: string[];
  usUrlPatterns: string[];
  lowValueUrlPatterns: string[];
}

export type MapLibrary = 'mapbox' | 'leaflet' | 'arcgis';

export const SIGNAL_KINDS = [
  'DISQUALIFIED',
  'NO_LOCATION_CONTENT',
  'INDEX_PAGE',
  'ADDRESS_LIST',
  'ADDRESS_PAIR',
  'COORDINATE_DATA',
  'GOOGLE_MAPS_EMBED',
  'GOOGLE_MAPS_LINK',
  'GOOGLE_MAPS_API',
  'LOCATION_FINDER',
  'LOCATION_SEARCH',
  'URL_CONTEXT',
  'JSON_LD_LOCATIONS',
  'MAP_MAPBOX',
  'MAP_LEAFLET',
  'MAP_ARCGIS',
  'LOCATION_IFRAME',
  'PDF_SERVICEMAP',
  'PDF_LOCATIONS',
  'NON_US_LOCALE',
  'LOW_VALUE_PAGE',
] as const;

export type SignalKind = (typeof SIGNAL_KINDS)[number];

export type Confidence = 'high' | 'medium' | 'low';

/** One piece of evidence produced by a single detector. Frozen on creation. */
export interface Signal {
  readonly kind: SignalKind;
  readonly confidence: Confidence;
  /** Signed; penalty signals carry negative points. */
  readonly points: number;
  readonly rationale: string;
  readonly evidence: string;
}

/**
 * 'disqualified' pages were stopped by a Stage 1 rule; 'rejected' pages had no
 * primary signal; 'scored' pages went through all three stages.
 */
export type Verdict = 'disqualified' | 'rejected' | 'scored';

export interface PageClassification {
  readonly url: string;
  readonly title: string;
  readonly signals: readonly Signal[];
  /** Sum of signal points, floored at 0. */
  readonly totalScore: number;
  readonly accepted: boolean;
  readonly verdict: Verdict;
}

export type ModalityCounts = Partial<Record<SignalKind, number>>;

/** Per-site classification roll-up. */
export interface SiteReport {
  siteId: string;
  domain: string;
  totalPagesSeen: number;
  acceptedPages: number;
  /** Accepted pages carrying each positive signal kind. */
  modalityCounts: ModalityCounts;
  topPages: PageClassification[];
  recommendedApproach: string;
}

/** A page the orchestrator rendered and saved. */
export interface PageRecord {
  requestedUrl: string;
  finalUrl: string;
  statusCode: number;
  title: string;
  htmlByteLength: number;
  htmlFile: string;
  extractedLinks: string[];
  crawledAt: string;
}

/** Contents of crawl_summary.json. */
export interface SiteCrawlSummary {
  siteName: string;
  baseUrl: string;
  domain: string;
  crawlStats: {
    pagesVisited: number;
    pagesFailed: number;
    pagesSaved: number;
    durationSeconds: number;
    pagesPerSecond: number;
  };
  /** Filled in once the site has been classified; empty straight after a crawl. */
  pagesWithSignals: { url: string; score: number; signals: SignalKind[] }[];
  signalSummary: ModalityCounts;
  crawledAt: string;
}

/** A row of the carrier source: one site to crawl. */
export interface Carrier {
  name: string;
  website: string;
}

export type SiteOutcomeStatus =
  | 'success-with-locations'
  | 'success-no-locations'
  | 'error'
  | 'skipped-invalid-url';

interface OutcomeBase {
  name: string;
  url: string;
  elapsedSeconds: number;
}

export interface SiteSuccess extends OutcomeBase {
  status: 'success-with-locations' | 'success-no-locations';
  domain: string;
  pagesCrawled: number;
  pagesFailed: number;
  acceptedPages: number;
  totalPages: number;
  topUrl: string | null;
  topScore: number;
  modalities: SignalKind[];
  approach: string;
}

export interface SiteError extends OutcomeBase {
  status: 'error';
  domain: string;
  error: string;
}

export interface SiteSkipped extends OutcomeBase {
  status: 'skipped-invalid-url';
  reason: string;
}

/** Result of one site's pass through the run coordinator. */
export type SiteOutcome = SiteSuccess | SiteError | SiteSkipped;

/** Contents of crawl_checkpoint.json. */
export interface RunCheckpoint {
  timestamp: string;
  completedCount: number;
  startIndex: number;
  /** Index of the last carrier covered by a completed batch. */
  lastIndex: number;
  results: SiteOutcome[];
}
