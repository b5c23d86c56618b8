import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import axios, { type AxiosInstance } from 'axios';
import { extractHrefs } from '../src/analyze';
import type { PageRenderer, RenderOptions, RenderResult } from '../src/renderer';

const FILLER = 'Lorem ipsum dolor sit amet, consectetur adipiscing elit. ';

/**
 * A full HTML document around `body`, padded with filler text so it clears the
 * minimum page size.
 */
export function pageHtml(body: string, { title = 'Test page', lang = 'en' } = {}): string {
  const filler = `<div class="content-filler"><p>${FILLER.repeat(40)}</p></div>`;
  return `<!DOCTYPE html><html lang="${lang}"><head><title>${title}</title></head><body>${body}${filler}</body></html>`;
}

export function tmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'location-scout-'));
}

/** Parses a JSON file that must hold an object. */
export function readJsonObject(file: string): Record<string, unknown> {
  const data: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  if (typeof data !== 'object' || data === null || Array.isArray(data)) throw new Error(`${file} is not a JSON object`);
  return Object.fromEntries(Object.entries(data));
}

export type Route = { status?: number; body: string } | Error;

/**
 * An axios instance answered in-process from a route table keyed by absolute URL.
 * Unknown URLs get a 404; Error routes reject like a network failure.
 */
export function fakeHttp(routes: Record<string, Route>): { http: AxiosInstance; requested: string[] } {
  const table = new Map(Object.entries(routes));
  const requested: string[] = [];
  const http = axios.create({
    adapter: async (config) => {
      const url = config.url ?? '';
      requested.push(url);
      const route = table.get(url) ?? { status: 404, body: 'Not Found' };
      if (route instanceof Error) throw route;
      return { data: route.body, status: route.status ?? 200, statusText: 'OK', headers: {}, config };
    },
  });
  return { http, requested };
}

/** A rendered page: plain HTML, a status code, a thrown error or a redirect. */
export type FakePage = string | number | Error | { finalUrl: string; html: string };

/** In-memory renderer keyed by requested URL. Unknown URLs render as 404. */
export class FakeRenderer implements PageRenderer {
  readonly opened: string[] = [];
  readonly settles: boolean[] = [];
  closes = 0;
  private readonly pages: Map<string, FakePage>;

  constructor(pages: Record<string, FakePage>) {
    this.pages = new Map(Object.entries(pages));
  }

  async open(url: string, options: RenderOptions): Promise<RenderResult | null> {
    this.opened.push(url);
    this.settles.push(options.settle);
    const page = this.pages.get(url) ?? 404;
    if (page instanceof Error) throw page;
    if (typeof page === 'number') return { status: page, finalUrl: url, html: '', title: '', links: [] };
    const finalUrl = typeof page === 'string' ? url : page.finalUrl;
    const html = typeof page === 'string' ? page : page.html;
    const title = /<title>([^<]*)<\/title>/.exec(html)?.[1] ?? '';
    return { status: 200, finalUrl, html, title, links: extractHrefs(html) };
  }

  async close(): Promise<void> {
    this.closes++;
  }
}
