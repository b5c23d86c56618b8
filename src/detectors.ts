import { hasLocationKeyword } from './url';
import type { PageFeatures } from './analyze';
import type { Confidence, Heuristics, MapLibrary, Signal, SignalKind } from './types';

export type DetectorStage = 'disqualifier' | 'primary' | 'secondary';

/**
 * One independent heuristic. Disqualifiers end classification when they fire,
 * primary detectors decide whether a page is scored at all, secondary detectors
 * only add to pages that passed.
 */
export interface Detector {
  name: string;
  stage: DetectorStage;
  detect(page: PageFeatures, heuristics: Heuristics): Signal | null;
  /** Primary stage: whether this signal alone lets the page through. Defaults to true. */
  qualifies?(signal: Signal): boolean;
}

/** Point values per signal strength. */
export const POINTS = {
  indexPage: 15,
  addressList: 10,
  addressPair: 3,
  coordinatesStrong: 8,
  coordinatesWeak: 2,
  mapsStrong: 5,
  mapsEmbed: 3,
  mapsApiWeak: 2,
  mapsLinkWeak: 1,
  locationFinder: 8,
  locationSearch: 4,
  urlContext: 3,
  jsonLd: 5,
  mapLibrary: 3,
  locationIframe: 3,
  pdfServiceMap: 8,
  pdfLocations: 2,
  nonUsLocale: -3,
  lowValuePage: -5,
} as const;

export function createSignal(
  kind: SignalKind,
  confidence: Confidence,
  points: number,
  rationale: string,
  evidence = ''
): Signal {
  return Object.freeze({ kind, confidence, points, rationale, evidence });
}

function disqualified(rationale: string, evidence: string): Signal {
  return createSignal('DISQUALIFIED', 'high', 0, rationale, evidence);
}

function includesAny(haystack: string, needles: readonly string[]): string | undefined {
  return needles.find((needle) => haystack.includes(needle));
}

function matchesAny(value: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => new RegExp(pattern, 'i').test(value));
}

// ---------------------------------------------------------------------------
// Stage 1: disqualifiers
// ---------------------------------------------------------------------------

export const errorPage: Detector = {
  name: 'error-page',
  stage: 'disqualifier',
  detect(page, h) {
    const titleLower = page.title.toLowerCase();
    const keyword = includesAny(titleLower, h.errorTitleKeywords);
    if (keyword) return disqualified(`Error page title (${keyword})`, page.title.slice(0, 50));

    const heading = page.headings.find((text) => h.errorHeadingPrefixes.some((p) => text.startsWith(p)));
    if (heading !== undefined) return disqualified('Error page heading', heading.slice(0, 50));

    if (page.htmlBytes < h.minHtmlBytes) {
      return disqualified(`HTML shorter than ${h.minHtmlBytes} bytes`, `${page.htmlBytes} bytes`);
    }
    return null;
  },
};

export const nonEnglish: Detector = {
  name: 'non-english',
  stage: 'disqualifier',
  detect(page, h) {
    if (!page.lang || page.lang.startsWith('en')) return null;
    if (hasLocationKeyword(page.url, h)) return null;
    return disqualified('Non-English page', `lang=${page.lang}`);
  },
};

export const excludedCategory: Detector = {
  name: 'excluded-category',
  stage: 'disqualifier',
  detect(page, h) {
    const keyword =
      includesAny(page.urlLower, h.excludedPageKeywords) ??
      includesAny(page.title.toLowerCase(), h.excludedPageKeywords);
    if (!keyword) return null;
    return disqualified(`Excluded page type (${keyword})`, page.url.slice(0, 50));
  },
};

// ---------------------------------------------------------------------------
// Stage 2: primary detectors
// ---------------------------------------------------------------------------

export const indexUrl: Detector = {
  name: 'index-url',
  stage: 'primary',
  detect(page, h) {
    if (!matchesAny(page.url, h.indexUrlPatterns)) return null;
    return createSignal('INDEX_PAGE', 'high', POINTS.indexPage, 'URL is a location index page', page.url.slice(0, 80));
  },
};

const STREET_ADDRESS =
  /\b\d{1,5}\s+(?:[A-Za-z0-9.]+\s+){0,5}?(?:Street|St|Avenue|Ave|Road|Rd|Drive|Dr|Boulevard|Blvd|Way|Lane|Ln|Highway|Hwy|Parkway|Pkwy|Court|Ct)\b\.?,?\s+(?:[A-Za-z]+\s?){1,4},?\s+[A-Z]{2}\s+\d{5}(?:-\d{4})?\b/g;
const CITY_STATE_ZIP = /\b[A-Z][a-z]+(?:\s[A-Z][a-z]+)*,\s*[A-Z]{2}\s+\d{5}(?:-\d{4})?\b/g;

/**
 * Distinct postal addresses in a block of text. Full street addresses are matched
 * first; a bare "City, ST 12345" only counts when it is not part of one of them.
 * Addresses are compared case- and whitespace-insensitively.
 */
export function findAddresses(text: string, minLength: number): string[] {
  const found = new Map<string, string>();
  const covered: [number, number][] = [];

  const add = (match: string) => {
    const clean = match.replace(/\s+/g, ' ').trim();
    if (clean.length < minLength) return;
    const key = clean.toLowerCase();
    if (!found.has(key)) found.set(key, clean);
  };

  for (const match of text.matchAll(STREET_ADDRESS)) {
    const start = match.index ?? 0;
    covered.push([start, start + match[0].length]);
    add(match[0]);
  }
  for (const match of text.matchAll(CITY_STATE_ZIP)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    if (covered.some(([s, e]) => start < e && end > s)) continue;
    add(match[0]);
  }
  return [...found.values()];
}

export const addresses: Detector = {
  name: 'addresses',
  stage: 'primary',
  detect(page, h) {
    const found = findAddresses(page.mainText, h.minAddressLength);
    if (found.length >= h.addressListMin) {
      return createSignal(
        'ADDRESS_LIST',
        'high',
        POINTS.addressList,
        `${found.length} addresses found - location listing page`,
        found.slice(0, 3).join('; ')
      );
    }
    if (found.length >= h.addressPairMin) {
      return createSignal('ADDRESS_PAIR', 'medium', POINTS.addressPair, `${found.length} addresses found`, found.slice(0, 2).join('; '));
    }
    return null;
  },
  qualifies: (signal) => signal.kind === 'ADDRESS_LIST',
};

const KEYED_LAT = /\b(?:lat|latitude)["']?\s*[:=]\s*["']?(-?\d{1,3}\.\d{3,})/gi;
const KEYED_LNG = /\b(?:lng|lon|long|longitude)["']?\s*[:=]\s*["']?(-?\d{1,3}\.\d{3,})/gi;
const LAT_LNG_CALL = /LatLng\s*\(\s*(-?\d{1,3}\.\d+)\s*,\s*(-?\d{1,3}\.\d+)\s*\)/g;

function pointKey(lat: string, lng: string | undefined): string | null {
  const latValue = Number(lat);
  if (!Number.isFinite(latValue) || Math.abs(latValue) > 90) return null;
  if (lng === undefined) return `${latValue},`;
  const lngValue = Number(lng);
  if (!Number.isFinite(lngValue) || Math.abs(lngValue) > 180) return null;
  return `${latValue},${lngValue}`;
}

/**
 * Distinct coordinate pairs in the page source.
 * Keyed `lat`/`lng` values (object literals, data attributes) are paired in the order
 * they appear; a latitude with no longitude left to pair with counts on its own.
 * `LatLng(a, b)` calls add their pairs, and a point written both ways counts once.
 */
export function countCoordinates(html: string): number {
  const points = new Set<string>();
  const lats = [...html.matchAll(KEYED_LAT)].map((m) => m[1]);
  const lngs = [...html.matchAll(KEYED_LNG)].map((m) => m[1]);
  lats.forEach((lat, i) => {
    const key = pointKey(lat, lngs[i]);
    if (key) points.add(key);
  });
  for (const match of html.matchAll(LAT_LNG_CALL)) {
    const key = pointKey(match[1], match[2]);
    if (key) points.add(key);
  }
  return points.size;
}

export const coordinates: Detector = {
  name: 'coordinates',
  stage: 'primary',
  detect(page, h) {
    const count = countCoordinates(page.html);
    if (count >= h.coordinateStrongMin) {
      return createSignal('COORDINATE_DATA', 'high', POINTS.coordinatesStrong, `${count} coordinate markers found`, 'Multiple lat/lng coordinates');
    }
    if (count >= 1) {
      return createSignal('COORDINATE_DATA', 'medium', POINTS.coordinatesWeak, `${count} coordinate(s) found`, 'lat/lng data');
    }
    return null;
  },
  qualifies: (signal) => signal.points >= POINTS.coordinatesStrong,
};

function countOccurrences(haystack: string, needle: string): number {
  return needle ? haystack.split(needle).length - 1 : 0;
}

/**
 * A single embedded map or a lone maps link usually marks the head office, so it only
 * scores a few points; two links score nothing. Three or more maps links, an embed
 * backed by several links, or a Maps API page placing several markers qualify the page.
 */
export const googleMaps: Detector = {
  name: 'google-maps',
  stage: 'primary',
  detect(page, h) {
    const linkPattern = new RegExp(h.googleMapsLinkPattern, 'i');
    const linkCount = page.anchors.filter((a) => linkPattern.test(a.href)).length;
    const strongLinks = linkCount >= h.mapsLinkStrongMin;

    const embed = page.iframes
      .map((iframe) => iframe.src.toLowerCase())
      .find((src) => includesAny(src, h.googleMapsEmbedPatterns) && !includesAny(src, h.googleMapsExcludePatterns));
    if (embed !== undefined) {
      return strongLinks
        ? createSignal('GOOGLE_MAPS_EMBED', 'high', POINTS.mapsStrong, `Google Maps embed iframe (links=${linkCount})`, embed.slice(0, 80))
        : createSignal('GOOGLE_MAPS_EMBED', 'medium', POINTS.mapsEmbed, `Google Maps embed iframe (links=${linkCount})`, embed.slice(0, 80));
    }

    if (strongLinks) {
      return createSignal('GOOGLE_MAPS_LINK', 'high', POINTS.mapsStrong, `${linkCount} Google Maps links`, 'Multiple maps links');
    }

    if (page.htmlLower.includes(h.googleMapsApiMarker) && includesAny(page.htmlLower, h.googleMapsInitPatterns)) {
      const markers = h.googleMapsMarkerTokens.reduce((sum, token) => sum + countOccurrences(page.htmlLower, token), 0);
      const latLngCalls = page.htmlLower.match(/latlng\s*\(/g)?.length ?? 0;
      const estimate = Math.max(markers, latLngCalls);
      return estimate >= h.mapsMarkerStrongMin
        ? createSignal('GOOGLE_MAPS_API', 'high', POINTS.mapsStrong, `Google Maps API with multiple markers (~${estimate})`, h.googleMapsApiMarker)
        : createSignal('GOOGLE_MAPS_API', 'low', POINTS.mapsApiWeak, 'Google Maps API (possibly single marker)', h.googleMapsApiMarker);
    }

    if (linkCount === 1) {
      return createSignal('GOOGLE_MAPS_LINK', 'low', POINTS.mapsLinkWeak, 'Single Google Maps link, likely head office only', 'maps link');
    }
    return null;
  },
  qualifies: (signal) => signal.points >= POINTS.mapsStrong,
};

/**
 * Location finder forms pair finder wording with a radius or distance field.
 * Forms that mention quotes, leads, contact, orders or shipping are skipped.
 * A form with only one of the two traits is a weaker search signal.
 */
export const finderForm: Detector = {
  name: 'finder-form',
  stage: 'primary',
  detect(page, h) {
    let weak: Signal | null = null;
    for (const form of page.forms) {
      if (includesAny(form.html, h.quoteFormKeywords) || includesAny(form.action, h.quoteFormKeywords)) continue;
      const finder = h.finderKeywords.some((kw) => form.html.includes(kw) || form.text.includes(kw));
      const radius = includesAny(form.html, h.radiusKeywords) !== undefined;
      if (finder && radius) {
        return createSignal('LOCATION_FINDER', 'high', POINTS.locationFinder, 'Location finder/locator form', 'Form with finder wording and radius field');
      }
      if ((finder || radius) && !weak) {
        weak = createSignal(
          'LOCATION_SEARCH',
          'medium',
          POINTS.locationSearch,
          finder ? 'Search form with finder wording' : 'Search form with radius/distance',
          'Form with partial location search capability'
        );
      }
    }
    return weak;
  },
  qualifies: (signal) => signal.kind === 'LOCATION_FINDER',
};

// ---------------------------------------------------------------------------
// Stage 3: secondary detectors
// ---------------------------------------------------------------------------

type JsonParseResult = { ok: true; value: unknown } | { ok: false; error: string };

function parseJson(text: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function collectAddresses(value: unknown, out: Set<string>): void {
  if (Array.isArray(value)) {
    for (const item of value) collectAddresses(item, out);
    return;
  }
  if (!isRecord(value)) return;
  const keys = Object.keys(value).map((key) => key.toLowerCase());
  if (keys.includes('streetaddress') || keys.includes('postalcode')) {
    out.add(JSON.stringify(value).toLowerCase());
  }
  for (const child of Object.values(value)) collectAddresses(child, out);
}

/** Distinct address objects across a page's JSON-LD blocks. Malformed blocks are skipped. */
export function countJsonLdAddresses(blocks: readonly string[]): number {
  const found = new Set<string>();
  for (const block of blocks) {
    const parsed = parseJson(block);
    if (parsed.ok) collectAddresses(parsed.value, found);
  }
  return found.size;
}

export const jsonLd: Detector = {
  name: 'json-ld',
  stage: 'secondary',
  detect(page, h) {
    const count = countJsonLdAddresses(page.jsonLd);
    if (count < h.jsonLdMinAddresses) return null;
    return createSignal('JSON_LD_LOCATIONS', 'high', POINTS.jsonLd, `JSON-LD with ${count} addresses`, 'Structured data with multiple addresses');
  },
};

const MAP_LIBRARY_SIGNALS: Record<MapLibrary, SignalKind> = {
  mapbox: 'MAP_MAPBOX',
  leaflet: 'MAP_LEAFLET',
  arcgis: 'MAP_ARCGIS',
};

export function mapLibraryDetector(library: MapLibrary): Detector {
  return {
    name: `map-${library}`,
    stage: 'secondary',
    detect(page, h) {
      const fingerprint = h.mapLibraries[library].find((fp) => page.html.includes(fp));
      if (fingerprint === undefined) return null;
      return createSignal(MAP_LIBRARY_SIGNALS[library], 'high', POINTS.mapLibrary, `${library} map detected`, fingerprint);
    },
  };
}

export const locationIframe: Detector = {
  name: 'location-iframe',
  stage: 'secondary',
  detect(page, h) {
    const matches = page.iframes.filter((iframe) => {
      const src = iframe.src.toLowerCase();
      if (src.includes('google.com/maps') || src.includes('maps.google')) return false;
      const haystack = `${src} ${iframe.title.toLowerCase()} ${iframe.name.toLowerCase()}`;
      return includesAny(haystack, h.iframeKeywords) !== undefined;
    });
    if (matches.length === 0) return null;
    return createSignal(
      'LOCATION_IFRAME',
      'medium',
      POINTS.locationIframe,
      `${matches.length} location-related iframe(s)`,
      matches.slice(0, 2).map((iframe) => iframe.src.slice(0, 60)).join(', ')
    );
  },
};

export const pdfLinks: Detector = {
  name: 'pdf-links',
  stage: 'secondary',
  detect(page, h) {
    const highValue: string[] = [];
    const regular: string[] = [];
    for (const anchor of page.anchors) {
      const href = anchor.href.toLowerCase();
      if (!href.includes('.pdf')) continue;
      if (includesAny(href, h.pdfHighValueKeywords)) highValue.push(href);
      else if (includesAny(href, h.pdfKeywords) || includesAny(anchor.text.toLowerCase(), h.pdfKeywords)) regular.push(href);
    }
    if (highValue.length > 0) {
      return createSignal('PDF_SERVICEMAP', 'high', POINTS.pdfServiceMap, `Service/location map PDF: ${highValue[0].slice(0, 50)}`, highValue.slice(0, 2).join('; '));
    }
    if (regular.length > 0) {
      return createSignal('PDF_LOCATIONS', 'medium', POINTS.pdfLocations, `${regular.length} location-related PDF(s)`, regular.slice(0, 2).join('; '));
    }
    return null;
  },
};

export const nonUsLocale: Detector = {
  name: 'non-us-locale',
  stage: 'secondary',
  detect(page, h) {
    if (!matchesAny(page.urlLower, h.nonUsUrlPatterns) || matchesAny(page.urlLower, h.usUrlPatterns)) return null;
    return createSignal('NON_US_LOCALE', 'low', POINTS.nonUsLocale, 'URL points at a non-US region', page.url.slice(0, 80));
  },
};

export const lowValuePage: Detector = {
  name: 'low-value-page',
  stage: 'secondary',
  detect(page, h) {
    const hit = matchesAny(page.urlLower, h.lowValueUrlPatterns) || matchesAny(page.title.toLowerCase(), h.lowValueUrlPatterns);
    if (!hit) return null;
    return createSignal('LOW_VALUE_PAGE', 'low', POINTS.lowValuePage, 'URL or title suggests a non-location page', page.url.slice(0, 80));
  },
};

/** Detectors in evaluation order. Signals keep this order on the page. */
export const DEFAULT_DETECTORS: readonly Detector[] = [
  errorPage,
  nonEnglish,
  excludedCategory,
  indexUrl,
  addresses,
  coordinates,
  googleMaps,
  finderForm,
  jsonLd,
  mapLibraryDetector('mapbox'),
  mapLibraryDetector('leaflet'),
  mapLibraryDetector('arcgis'),
  locationIframe,
  pdfLinks,
  nonUsLocale,
  lowValuePage,
];

/** Builds the signal that lets a page without primary evidence through on its URL alone. */
export function urlContextSignal(url: string): Signal {
  return createSignal('URL_CONTEXT', 'medium', POINTS.urlContext, 'URL suggests location content', url.slice(0, 60));
}
