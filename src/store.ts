import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import type { SiteCrawlSummary } from './types';

export const ORIGIN_META_NAME = 'crawler-original-url';
export const SUMMARY_FILE = 'crawl_summary.json';

/** Directory name for a site, e.g. 'acme-freight.com' -> 'acme-freight_com'. */
export function siteDirName(domain: string): string {
  return domain.replace(/[./\\:]/g, '_');
}

/** Stable file name for a page: the first 12 hex chars of the URL's MD5. */
export function pageFileName(url: string): string {
  return `${crypto.createHash('md5').update(url).digest('hex').slice(0, 12)}.html`;
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;');
}

/**
 * Adds `<meta name="crawler-original-url">` right after the opening head tag
 * (or at the top when there is none). Pages that already carry the marker are returned as-is.
 */
export function injectOriginMarker(html: string, url: string): string {
  if (html.includes(`<meta name="${ORIGIN_META_NAME}"`)) return html;
  const tag = `<meta name="${ORIGIN_META_NAME}" content="${escapeAttribute(url)}">\n`;
  const head = /<head(?:\s[^>]*)?>/i.exec(html);
  if (!head) return tag + html;
  const at = head.index + head[0].length;
  return `${html.slice(0, at)}\n${tag}${html.slice(at)}`;
}

/**
 * On-disk page store for one site: `<outputDir>/crawled_pages/<site>/`.
 * Holds one HTML file per page plus the crawl summary.
 */
export class PageStore {
  readonly dir: string;

  constructor(outputDir: string, domain: string) {
    this.dir = path.join(outputDir, 'crawled_pages', siteDirName(domain));
  }

  /** Deletes anything from a previous crawl and recreates the directory. */
  reset(): void {
    fs.rmSync(this.dir, { recursive: true, force: true });
    fs.mkdirSync(this.dir, { recursive: true });
  }

  /**
   * Writes a rendered page with its origin marker injected.
   * @returns The file name the page was stored under.
   */
  savePage(url: string, html: string): string {
    const file = pageFileName(url);
    fs.mkdirSync(this.dir, { recursive: true });
    fs.writeFileSync(path.join(this.dir, file), injectOriginMarker(html, url), 'utf8');
    return file;
  }

  /**
   * Best-effort: a failed write is logged and reported as false, never thrown.
   */
  writeSummary(summary: SiteCrawlSummary): boolean {
    try {
      fs.mkdirSync(this.dir, { recursive: true });
      fs.writeFileSync(path.join(this.dir, SUMMARY_FILE), JSON.stringify(summary, null, 2), 'utf8');
      return true;
    } catch (err) {
      console.warn(`Could not write crawl summary in ${this.dir}: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  }
}
