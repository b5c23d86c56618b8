import { test } from 'node:test';
import assert from 'node:assert/strict';
import { analyzePage, extractHrefs, recoverPageUrl } from '../src/analyze';

const URL = 'https://acme-freight.test/Terminals';

test('analyzePage: extracts title, language, headings and URL forms', () => {
  const page = analyzePage(
    '<html lang="EN-us"><head><title> Our Terminals </title></head><body><h1>Find a  Terminal</h1><h1>Texas</h1></body></html>',
    URL
  );
  assert.equal(page.title, 'Our Terminals');
  assert.equal(page.lang, 'en-us');
  assert.deepEqual(page.headings, ['find a terminal', 'texas']);
  assert.equal(page.urlLower, 'https://acme-freight.test/terminals');
});

test('analyzePage: missing lang is null', () => {
  assert.equal(analyzePage('<html><body></body></html>', URL).lang, null);
});

test('analyzePage: collects anchors, iframes, forms and JSON-LD blocks', () => {
  const page = analyzePage(
    [
      '<html><body>',
      '<a href=" /locations ">All  locations</a><a>no href</a>',
      '<iframe src="https://maps.test/embed" title="Terminal map" name="locator"></iframe>',
      '<form action="/Search"><input name="Radius"></form>',
      '<script type="application/ld+json">{"@type":"Organization"}</script>',
      '</body></html>',
    ].join(''),
    URL
  );
  assert.deepEqual(page.anchors, [{ href: '/locations', text: 'All locations' }]);
  assert.deepEqual(page.iframes, [{ src: 'https://maps.test/embed', title: 'Terminal map', name: 'locator' }]);
  assert.equal(page.forms.length, 1);
  assert.equal(page.forms[0].action, '/search');
  assert.ok(page.forms[0].html.includes('name="radius"'));
  assert.deepEqual(page.jsonLd, ['{"@type":"Organization"}']);
});

test('analyzePage: main text leaves out page chrome', () => {
  const page = analyzePage(
    [
      '<html><body>',
      '<nav>Menu Link</nav>',
      '<div class="site-footer">Footer Text</div>',
      '<main><p>Main</p><p>Body</p></main>',
      '<footer>Foot</footer>',
      '<script>var x = 1;</script>',
      '</body></html>',
    ].join(''),
    URL
  );
  assert.equal(page.mainText, 'Main Body');
});

test('analyzePage: measures HTML size in bytes', () => {
  assert.equal(analyzePage('<p>é</p>', URL).htmlBytes, 9);
});

test('extractHrefs: returns non-empty hrefs in document order', () => {
  const html = '<a href=" /a ">A</a><a href="">empty</a><a>none</a><a href="https://acme-freight.test/b">B</a>';
  assert.deepEqual(extractHrefs(html), ['/a', 'https://acme-freight.test/b']);
});

// ---------------------------------------------------------------------------
// recoverPageUrl
// ---------------------------------------------------------------------------

test('recoverPageUrl: the crawler marker wins over the canonical link', () => {
  const html =
    '<head><meta name="crawler-original-url" content="https://acme-freight.test/a">' +
    '<link rel="canonical" href="https://acme-freight.test/b"></head>';
  assert.equal(recoverPageUrl(html), 'https://acme-freight.test/a');
});

test('recoverPageUrl: falls back to canonical, then og:url', () => {
  assert.equal(recoverPageUrl('<link rel="canonical" href="https://acme-freight.test/b">'), 'https://acme-freight.test/b');
  assert.equal(recoverPageUrl('<meta property="og:url" content="https://acme-freight.test/c">'), 'https://acme-freight.test/c');
});

test('recoverPageUrl: null when the page names no URL', () => {
  assert.equal(recoverPageUrl('<html><body>Hi</body></html>'), null);
});
