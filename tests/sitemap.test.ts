import { test } from 'node:test';
import assert from 'node:assert/strict';
import sitemap, { isXmlDocument, parseSitemap } from '../src/sitemap';
import { fakeHttp, type Route } from './helpers';

const SITE = 'https://acme-freight.test';

function urlset(...locs: string[]): string {
  const entries = locs.map((loc) => `<url><loc>${loc}</loc></url>`).join('');
  return `<?xml version="1.0" encoding="UTF-8"?><urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">${entries}</urlset>`;
}

function sitemapIndex(...locs: string[]): string {
  const entries = locs.map((loc) => `<sitemap><loc>${loc}</loc></sitemap>`).join('');
  return `<?xml version="1.0" encoding="UTF-8"?><sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">${entries}</sitemapindex>`;
}

function options(routes: Record<string, Route>, maxChildSitemaps = 10) {
  const { http, requested } = fakeHttp(routes);
  return { opts: { domain: 'acme-freight.test', userAgent: 'test-agent', timeoutMs: 1000, maxChildSitemaps, http }, requested };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

test('isXmlDocument: tells sitemap XML from an HTML error page', () => {
  assert.equal(isXmlDocument('<?xml version="1.0"?><urlset></urlset>'), true);
  assert.equal(isXmlDocument('  <urlset xmlns="x"><url><loc>a</loc></url></urlset>'), true);
  assert.equal(isXmlDocument('<html><body>Not found</body></html>'), false);
});

test('parseSitemap: reads urlset entries in document order', () => {
  const parsed = parseSitemap(urlset(`${SITE}/locations`, `${SITE}/about`));
  assert.equal(parsed.kind, 'urlset');
  assert.deepEqual(parsed.locs, [`${SITE}/locations`, `${SITE}/about`]);
});

test('parseSitemap: recognises a sitemap index', () => {
  const parsed = parseSitemap(sitemapIndex(`${SITE}/sitemap-pages.xml`));
  assert.equal(parsed.kind, 'index');
  assert.deepEqual(parsed.locs, [`${SITE}/sitemap-pages.xml`]);
});

// ---------------------------------------------------------------------------
// getUrls
// ---------------------------------------------------------------------------

test('getUrls: keeps same-domain URLs including subdomains', async () => {
  const { opts } = options({
    [`${SITE}/sitemap.xml`]: { body: urlset(`${SITE}/terminals`, 'https://other.test/x', 'https://tools.acme-freight.test/finder') },
  });
  const urls = await sitemap.getUrls(`${SITE}/sitemap.xml`, opts);
  assert.deepEqual(urls, [`${SITE}/terminals`, 'https://tools.acme-freight.test/finder']);
});

test('getUrls: follows at most maxChildSitemaps children of an index', async () => {
  const { opts, requested } = options(
    {
      [`${SITE}/sitemap.xml`]: { body: sitemapIndex(`${SITE}/a.xml`, `${SITE}/b.xml`, `${SITE}/c.xml`) },
      [`${SITE}/a.xml`]: { body: urlset(`${SITE}/locations`) },
      [`${SITE}/b.xml`]: { body: urlset(`${SITE}/terminals`, `${SITE}/locations`) },
      [`${SITE}/c.xml`]: { body: urlset(`${SITE}/facilities`) },
    },
    2
  );
  const urls = await sitemap.getUrls(`${SITE}/sitemap.xml`, opts);
  assert.deepEqual(urls, [`${SITE}/locations`, `${SITE}/terminals`]);
  assert.deepEqual(requested, [`${SITE}/sitemap.xml`, `${SITE}/a.xml`, `${SITE}/b.xml`]);
});

test('getUrls: an index that lists itself is fetched once', async () => {
  const { opts, requested } = options({
    [`${SITE}/sitemap.xml`]: { body: sitemapIndex(`${SITE}/sitemap.xml`) },
  });
  assert.deepEqual(await sitemap.getUrls(`${SITE}/sitemap.xml`, opts), []);
  assert.equal(requested.length, 1);
});

test('getUrls: missing, non-XML and unreachable sitemaps give no URLs', async () => {
  const { opts } = options({
    [`${SITE}/html.xml`]: { body: '<html><body>Oops</body></html>' },
    [`${SITE}/down.xml`]: new Error('connect ECONNREFUSED'),
  });
  assert.deepEqual(await sitemap.getUrls(`${SITE}/missing.xml`, opts), []);
  assert.deepEqual(await sitemap.getUrls(`${SITE}/html.xml`, opts), []);
  assert.deepEqual(await sitemap.getUrls(`${SITE}/down.xml`, opts), []);
});
