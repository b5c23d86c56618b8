import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type { PageRecord } from '../types';

const schema = fs.readFileSync(path.join(__dirname, 'schema.sql'), 'utf8');

export const LEDGER_FILE = 'crawl.db';

/** A row from the pages table. */
export interface LedgerPage {
  id: number;
  requested_url: string;
  status: 'visited' | 'failed';
  final_url: string | null;
  status_code: number | null;
  title: string | null;
  html_bytes: number | null;
  html_file: string | null;
  link_count: number;
  error_message: string | null;
  crawled_at: string;
}

/**
 * SQLite ledger of every page a site crawl attempted.
 * One instance per site: open once after the page store is reset, close when the crawl is done.
 */
class Db {
  db: Database.Database;
  closed: boolean;

  /**
   * Opens (or creates) the ledger inside a site's page store directory.
   * @param dir - The site's page store directory.
   */
  constructor(dir: string) {
    fs.mkdirSync(dir, { recursive: true });
    this.db = new Database(path.join(dir, LEDGER_FILE));
    this.db.pragma('journal_mode = WAL');
    this.db.exec(schema);
    this.closed = false;
  }

  /**
   * Closes the database connection. Safe to call twice.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }

  /**
   * Records a rendered and saved page. A repeat of the same requested URL overwrites the row.
   * @param record - The page record produced by the orchestrator.
   */
  recordVisited(record: PageRecord): void {
    this.db
      .prepare(
        `
      INSERT INTO pages (requested_url, status, final_url, status_code, title, html_bytes, html_file, link_count, crawled_at)
      VALUES (@requested_url, 'visited', @final_url, @status_code, @title, @html_bytes, @html_file, @link_count, @crawled_at)
      ON CONFLICT(requested_url) DO UPDATE SET
        status = 'visited', final_url = excluded.final_url, status_code = excluded.status_code,
        title = excluded.title, html_bytes = excluded.html_bytes, html_file = excluded.html_file,
        link_count = excluded.link_count, error_message = NULL, crawled_at = excluded.crawled_at
    `
      )
      .run({
        requested_url: record.requestedUrl,
        final_url: record.finalUrl,
        status_code: record.statusCode,
        title: record.title,
        html_bytes: record.htmlByteLength,
        html_file: record.htmlFile,
        link_count: record.extractedLinks.length,
        crawled_at: record.crawledAt,
      });
  }

  /**
   * Records a page that could not be rendered.
   * @param url - The requested URL.
   * @param statusCode - HTTP status code, or null for timeouts and network errors.
   * @param errorMessage - Human-readable error description.
   */
  recordFailed(url: string, statusCode: number | null, errorMessage: string): void {
    this.db
      .prepare(
        `
      INSERT INTO pages (requested_url, status, status_code, error_message, crawled_at)
      VALUES (?, 'failed', ?, ?, ?)
      ON CONFLICT(requested_url) DO UPDATE SET
        status = 'failed', status_code = excluded.status_code,
        error_message = excluded.error_message, crawled_at = excluded.crawled_at
    `
      )
      .run(url, statusCode, errorMessage, new Date().toISOString());
  }

  /** Visited and failed page counts; the run's per-site outcome reports these. */
  countByStatus(): { visited: number; failed: number } {
    const rows = this.db
      .prepare<[], { status: 'visited' | 'failed'; count: number }>(
        'SELECT status, COUNT(*) AS count FROM pages GROUP BY status'
      )
      .all();
    const counts = { visited: 0, failed: 0 };
    for (const row of rows) counts[row.status] = row.count;
    return counts;
  }
}

export default Db;
