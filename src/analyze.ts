import { load } from 'cheerio';
import { DEFAULT_HEURISTICS } from './config';
import type { Heuristics } from './types';

export interface AnchorFeature {
  href: string;
  text: string;
}

export interface IframeFeature {
  src: string;
  title: string;
  name: string;
}

/** A form, lower-cased for keyword matching. */
export interface FormFeature {
  html: string;
  text: string;
  action: string;
}

/** Everything a detector may look at, extracted from a page's HTML in one pass. */
export interface PageFeatures {
  url: string;
  urlLower: string;
  html: string;
  htmlLower: string;
  htmlBytes: number;
  title: string;
  /** Lower-cased `<html lang>`, or null when absent. */
  lang: string | null;
  /** Lower-cased `<h1>` texts. */
  headings: string[];
  /** Visible text with header, footer, nav and look-alike elements removed. */
  mainText: string;
  anchors: AnchorFeature[];
  iframes: IframeFeature[];
  forms: FormFeature[];
  /** Raw contents of `application/ld+json` script blocks. */
  jsonLd: string[];
}

/**
 * Extracts detector inputs from a page's HTML.
 * Pure function, no I/O.
 * @param html - Rendered HTML of the page.
 * @param url - Absolute URL of the page.
 * @param heuristics - Supplies the boilerplate class pattern.
 */
export function analyzePage(
  html: string,
  url: string,
  heuristics: Heuristics = DEFAULT_HEURISTICS
): PageFeatures {
  const $ = load(html);

  const title = $('title').first().text().trim();
  const lang = $('html').attr('lang')?.trim().toLowerCase() || null;
  const headings = $('h1')
    .map((_, el) => $(el).text().replace(/\s+/g, ' ').trim().toLowerCase())
    .get();

  const anchors: AnchorFeature[] = [];
  $('a[href]').each((_, el) => {
    const href = $(el).attr('href')?.trim();
    if (href) anchors.push({ href, text: $(el).text().replace(/\s+/g, ' ').trim() });
  });

  const iframes: IframeFeature[] = $('iframe')
    .map((_, el) => ({
      src: $(el).attr('src') ?? '',
      title: $(el).attr('title') ?? '',
      name: $(el).attr('name') ?? '',
    }))
    .get();

  const forms: FormFeature[] = $('form')
    .map((_, el) => ({
      html: $.html(el).toLowerCase(),
      text: $(el).text().toLowerCase(),
      action: ($(el).attr('action') ?? '').toLowerCase(),
    }))
    .get();

  const jsonLd = $('script[type="application/ld+json"]')
    .map((_, el) => $(el).html() ?? '')
    .get();

  // Main content: drop page chrome so a footer address repeated on every page is not counted
  const boilerplate = new RegExp(heuristics.boilerplateClassPattern, 'i');
  $('script, style, noscript, template, header, footer, nav').remove();
  $('[class]')
    .not('html, body')
    .filter((_, el) => boilerplate.test($(el).attr('class') ?? ''))
    .remove();
  // Separate adjacent blocks so "TX 75201</p><p>4100" does not read as one token
  $('body *').append(' ');
  const mainText = $('body').text().replace(/\s+/g, ' ').trim();

  return {
    url,
    urlLower: url.toLowerCase(),
    html,
    htmlLower: html.toLowerCase(),
    htmlBytes: Buffer.byteLength(html, 'utf8'),
    title,
    lang,
    headings,
    mainText,
    anchors,
    iframes,
    forms,
    jsonLd,
  };
}

/** All non-empty href values of a document's anchors, in document order. */
export function extractHrefs(html: string): string[] {
  const $ = load(html);
  return $('a[href]')
    .map((_, el) => $(el).attr('href')?.trim() ?? '')
    .get()
    .filter(Boolean);
}

/**
 * Recovers the URL a saved page was fetched from: the crawler's injected marker,
 * then the canonical link, `og:url` and `twitter:url`. Null when none is present.
 */
export function recoverPageUrl(html: string): string | null {
  const $ = load(html);
  const candidates = [
    $('meta[name="crawler-original-url"]').attr('content'),
    $('link[rel="canonical"]').attr('href'),
    $('meta[property="og:url"]').attr('content'),
    $('meta[name="twitter:url"]').attr('content'),
  ];
  for (const candidate of candidates) {
    const value = candidate?.trim();
    if (value) return value;
  }
  return null;
}
